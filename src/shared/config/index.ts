// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/config`
 * Purpose: Barrel export for the vault deployment configuration sourced from .vault/vault-spec.yaml.
 * Scope: Server-only helpers. Does not expose env overrides.
 * Invariants: Callers import from this entry point only.
 * Side-effects: none (delegates to vaultSpec.server.ts for IO)
 * @public
 */

export { type PriceFeedSpec, type VaultSpec, vaultSpecSchema } from "./vaultSpec.schema";
export {
  type LoadedVaultSpec,
  loadVaultSpec,
  type PriceFeedEntry,
  type PriceFeedTable,
  parseVaultSpec,
  resetVaultSpecCache,
} from "./vaultSpec.server";
