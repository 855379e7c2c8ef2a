// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@compounder/vault-core/model`
 * Purpose: Domain types for the compounding vault.
 * Scope: Pure types. Does not contain business logic or perform I/O.
 * Invariants: All token quantities are bigint raw units; incentive rates are integer basis points; addresses are checksummed viem Address values.
 * Side-effects: none
 * @public
 */

import type { Address } from "viem";

/** Immutable upper bounds for incentive rates, fixed at construction */
export interface IncentiveBounds {
  readonly maxClaimerIncentiveBps: number;
  readonly maxLockerIncentiveBps: number;
}

/** Mutable incentive configuration input, as accepted by setConfig */
export interface VaultConfigInput {
  readonly claimerIncentiveBps: number;
  readonly lockerIncentiveBps: number;
  readonly lockerRewardsAddress: Address;
}

/** Stored configuration record. Replaced whole, never patched. */
export interface VaultConfig extends VaultConfigInput {
  /** Starts at 0 for the construction-time record, +1 per replacement */
  readonly version: number;
}

/** Parameters of the secondary token's decaying emission schedule */
export interface EmissionParams {
  readonly initialMintAmount: bigint;
  readonly totalCliffs: bigint;
  readonly reductionPerCliff: bigint;
  readonly maxEmissionSupply: bigint;
}

/** One reward stream entering the incentive split */
export interface RewardQuote {
  readonly token: Address;
  readonly amount: bigint;
  /** USD price, 18 decimals */
  readonly priceUsd: bigint;
}

/** Per-token outcome of the incentive split */
export interface RewardCut {
  readonly token: Address;
  readonly amount: bigint;
  readonly lockerCut: bigint;
  readonly callerCut: bigint;
}

/** Result of computeIncentiveSplit */
export interface IncentiveSplit {
  readonly cuts: readonly RewardCut[];
  /** USD value of all rewards, expressed in pooled-asset units */
  readonly assetValue: bigint;
  /** Pooled-asset amount the caller pays in and the vault re-stakes */
  readonly amountToCompound: bigint;
}

/** Identity and immutable parameters of one deployed vault */
export interface VaultDeployment {
  /** Vault account; also the address of its share token */
  readonly vault: Address;
  readonly asset: Address;
  readonly primaryRewardToken: Address;
  readonly secondaryRewardToken: Address | null;
  readonly rewardPool: Address;
  readonly emission: EmissionParams;
  readonly bounds: IncentiveBounds;
  readonly admins: readonly Address[];
  /** Forwarded to the pool's withdraw(amount, claimExtras) */
  readonly claimExtrasOnWithdraw: boolean;
}
