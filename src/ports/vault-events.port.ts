// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/vault-events`
 * Purpose: Domain events emitted by vault operations.
 * Scope: Event payload types and the sink interface. Does not decide where events go.
 * Invariants: An event is emitted only as the last step of an operation that succeeded.
 * Side-effects: none (interface definition only)
 * Links: src/adapters/server/events/logging-event-sink.adapter.ts
 * @public
 */

import type { Address } from "viem";

export interface ClaimedEvent {
  readonly type: "Claimed";
  readonly caller: Address;
  readonly primaryAmount: bigint;
  readonly secondaryAmount: bigint;
  readonly compoundedAmount: bigint;
}

export interface ConfigUpdatedEvent {
  readonly type: "ConfigUpdated";
  readonly caller: Address;
  readonly claimerIncentiveBps: number;
  readonly lockerIncentiveBps: number;
  readonly lockerRewardsAddress: Address;
  readonly version: number;
}

export interface DepositedEvent {
  readonly type: "Deposit";
  readonly caller: Address;
  readonly owner: Address;
  readonly assets: bigint;
  readonly shares: bigint;
}

export interface WithdrawnEvent {
  readonly type: "Withdraw";
  readonly caller: Address;
  readonly receiver: Address;
  readonly owner: Address;
  readonly assets: bigint;
  readonly shares: bigint;
}

export type VaultEvent =
  | ClaimedEvent
  | ConfigUpdatedEvent
  | DepositedEvent
  | WithdrawnEvent;

export interface VaultEventSink {
  emit(event: VaultEvent, context: { opId: string }): void;
}
