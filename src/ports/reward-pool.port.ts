// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/reward-pool`
 * Purpose: Port for the external staking pool that custodies the pooled asset and emits rewards.
 * Scope: Interface only. Does not define the pool's reward accounting.
 * Invariants:
 * - balanceOf(vault) is the sole source of truth for staked assets.
 * - Mutating calls act on behalf of the account the adapter is bound to (the vault).
 * - Every call is all-or-nothing; failures throw.
 * Side-effects: none (interface definition only)
 * Links: src/adapters/server/ledger/in-memory-reward-pool.adapter.ts, src/adapters/server/onchain/viem-reward-pool.adapter.ts
 * @public
 */

import type { Address } from "viem";

/** Read side, usable against a live pool */
export interface RewardPoolReader {
  /** Pooled-asset amount staked by `account` */
  balanceOf(account: Address): Promise<bigint>;
  /** Primary reward accrued to `account` and not yet paid out */
  earned(account: Address): Promise<bigint>;
}

/**
 * Full pool port, bound to the vault account.
 */
export interface RewardPoolPort extends RewardPoolReader {
  /** Stake `amount` of the pooled asset held by the bound account, credited to `onBehalfOf` */
  deposit(amount: bigint, onBehalfOf: Address): Promise<bigint>;
  /** Unstake `amount` back to the bound account, optionally claiming extra rewards */
  withdraw(amount: bigint, claimExtras: boolean): Promise<void>;
  /** Transfer all earned rewards to the bound account */
  getReward(): Promise<void>;
}
