// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env/server`
 * Purpose: Server-side environment variable validation and type-safe configuration schema using Zod.
 * Scope: Validates process.env for the vault runtime; provides lazy server environment access. Does not read the vault spec file itself.
 * Invariants: All env vars validated on first access; provides boolean flags for runtime and test modes; fails fast on invalid env.
 * Side-effects: process.env
 * Notes: APP_ENV selects in-memory vs chain-backed adapters; SERVICE_NAME for observability; EVM_RPC_URL only required for chain reads.
 * Links: src/shared/config/vaultSpec.server.ts, .vault/vault-spec.yaml
 * @public
 */

import { ZodError, z } from "zod";

export interface EnvValidationMeta {
  code: "INVALID_ENV";
  missing: string[];
  invalid: string[];
}

export class EnvValidationError extends Error {
  readonly meta: EnvValidationMeta;

  constructor(meta: EnvValidationMeta) {
    super(`Invalid server env: ${JSON.stringify(meta)}`);
    this.name = "EnvValidationError";
    this.meta = meta;
  }
}

const serverSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),

  // Application environment (controls adapter wiring)
  APP_ENV: z.enum(["test", "production"]),

  // Service identity for observability
  SERVICE_NAME: z.string().default("vault"),

  // Chain reads (lens, preview script); absent means no chain-backed adapters
  EVM_RPC_URL: z.string().url().optional(),

  // Deployment description (addresses, emission params, bounds, feeds)
  VAULT_SPEC_PATH: z.string().min(1).default(".vault/vault-spec.yaml"),

  PINO_LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error"])
    .default("info"),
});

type ServerEnv = z.infer<typeof serverSchema> & {
  isDev: boolean;
  isTest: boolean;
  isProd: boolean;
  isTestMode: boolean;
};

let ENV: ServerEnv | null = null;

export function serverEnv(): ServerEnv {
  if (ENV === null) {
    try {
      const parsed = serverSchema.parse(process.env);
      ENV = {
        ...parsed,
        isDev: parsed.NODE_ENV === "development",
        isTest: parsed.NODE_ENV === "test",
        isProd: parsed.NODE_ENV === "production",
        isTestMode: parsed.APP_ENV === "test",
      };
    } catch (error) {
      if (error instanceof ZodError) {
        const missing = new Set<string>();
        const invalid = new Set<string>();

        for (const issue of error.issues) {
          const key = issue.path[0]?.toString();
          if (!key) continue;

          /*
           * Treat all invalid_type as missing (avoids any casting)
           */
          if (issue.code === "invalid_type") {
            missing.add(key);
          } else {
            invalid.add(key);
          }
        }

        throw new EnvValidationError({
          code: "INVALID_ENV",
          missing: [...missing],
          invalid: [...invalid],
        });
      }

      throw error;
    }
  }
  return ENV;
}

/**
 * Reset cached env (for testing only).
 */
export function resetServerEnv(): void {
  ENV = null;
}

export type { ServerEnv };
