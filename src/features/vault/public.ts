// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/vault/public`
 * Purpose: Public API surface for the vault feature - barrel export for stable feature boundaries.
 * Scope: Re-exports public types and classes; does not implement logic.
 * Invariants: Feature consumers import from this file only, never from internal modules.
 * Side-effects: none
 * @public
 */

export {
  CompoundingVault,
  type CompoundingVaultDeps,
} from "./compoundingVault";
export { type ClaimDeps, executeClaim } from "./services/claimOrchestrator";
export { callExternal } from "./services/externalCall";
export { OperationGuard } from "./services/operationGuard";
export { VaultConfigStore } from "./services/vaultConfigStore";
export { VaultLens, type VaultLensDeps } from "./services/vaultLens";
export type { ClaimReceipt, ClaimRequest, RewardPreview } from "./types";
