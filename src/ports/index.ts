// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports`
 * Purpose: Hex entry file for port interfaces - canonical import surface.
 * Scope: Re-exports public port interfaces and event types. Does not export implementations or runtime objects.
 * Invariants: Named exports only, type-only, no export *
 * Side-effects: none
 * Links: Used by features and adapters for port contracts
 * @public
 */

export type { AtomicExecutor, Checkpointable } from "./atomic-executor.port";
export type { Clock } from "./clock.port";
export type { EmissionSupplyReader } from "./emission-supply.port";
export type { PriceOracle } from "./price-oracle.port";
export type { RewardPoolPort, RewardPoolReader } from "./reward-pool.port";
export type {
  TokenLedgerPort,
  TokenReader,
  TokenTransfer,
} from "./token-ledger.port";
export type {
  ClaimedEvent,
  ConfigUpdatedEvent,
  DepositedEvent,
  VaultEvent,
  VaultEventSink,
  WithdrawnEvent,
} from "./vault-events.port";
