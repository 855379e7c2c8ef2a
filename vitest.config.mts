// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `vitest.config`
 * Purpose: Vitest test runner configuration for unit tests of the app and its workspace packages.
 * Scope: Configures the node test environment and path aliases. No infrastructure required.
 * Invariants: Tests never reach a network or chain; setup file pins APP_ENV=test.
 * Side-effects: none
 * Notes: Uses vite-tsconfig-paths for module resolution of @/ and @compounder/vault-core.
 * @public
 */

import path from "node:path";
import { fileURLToPath } from "node:url";
import tsconfigPaths from "vite-tsconfig-paths";
import { defineConfig } from "vitest/config";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    setupFiles: ["./tests/setup.ts"],
    include: [
      "tests/**/*.{test,spec}.ts",
      "packages/*/tests/**/*.{test,spec}.ts",
    ],
    exclude: ["node_modules", "dist", "tests/_fakes/**"],
    testTimeout: 10_000,
    hookTimeout: 10_000,
  },
  plugins: [tsconfigPaths()],
  resolve: {
    alias: {
      "@tests": path.resolve(__dirname, "./tests"),
    },
  },
});
