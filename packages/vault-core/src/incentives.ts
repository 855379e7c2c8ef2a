// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@compounder/vault-core/incentives`
 * Purpose: Three-way split of claimed rewards: locker cut, caller cut, and the pooled-asset amount to compound.
 * Scope: Pure function over reward amounts, USD quotes and incentive rates. Does not fetch prices.
 * Invariants:
 * - lockerCut + callerCut === amount for every reward token (NET_OF_LOCKER_CUT).
 * - amountToCompound = assetValue * claimerIncentiveBps / INCENTIVE_BASIS (CLAIMER_INCENTIVE_RATE).
 * - A zero price anywhere is a PrecisionError; all divisions truncate.
 * Side-effects: none
 * @public
 */

import { INCENTIVE_BASIS, MAX_REWARD_STREAMS } from "./constants";
import { ConfigurationError, PrecisionError } from "./errors";
import { assertUint256, mulDiv } from "./math";
import type {
  IncentiveSplit,
  RewardCut,
  RewardQuote,
  VaultConfigInput,
} from "./model";

/**
 * The caller receives each claimed amount minus the locker cut.
 * Locker and caller together receive exactly the claimed amount.
 */
export const CALLER_PAYOUT_POLICY = "NET_OF_LOCKER_CUT" as const;

/**
 * The claimer-incentive rate is the fraction of the rewards' asset value the
 * caller pays in to take them. The (INCENTIVE_BASIS - rate) variant is not supported.
 */
export const COMPOUND_FRACTION_POLICY = "CLAIMER_INCENTIVE_RATE" as const;

const BASIS = BigInt(INCENTIVE_BASIS);

export interface IncentiveSplitInput {
  readonly rewards: readonly RewardQuote[];
  /** USD price of the pooled asset, 18 decimals */
  readonly assetPriceUsd: bigint;
  readonly config: Pick<
    VaultConfigInput,
    "claimerIncentiveBps" | "lockerIncentiveBps"
  >;
}

function toRate(bps: number, field: string): bigint {
  if (!Number.isInteger(bps) || bps < 0 || bps > INCENTIVE_BASIS) {
    throw new ConfigurationError(
      `${field} must be an integer in [0, ${INCENTIVE_BASIS}], got ${bps}`,
      field
    );
  }
  return BigInt(bps);
}

/** Locker share of one reward amount */
export function lockerCutOf(amount: bigint, lockerIncentiveBps: number): bigint {
  return mulDiv(amount, toRate(lockerIncentiveBps, "lockerIncentiveBps"), BASIS);
}

/**
 * Compute the incentive split for up to two reward streams.
 *
 * assetValue = (Σ amount[i] * priceUsd[i]) / assetPriceUsd
 */
export function computeIncentiveSplit(
  input: IncentiveSplitInput
): IncentiveSplit {
  const { rewards, assetPriceUsd, config } = input;

  if (rewards.length > MAX_REWARD_STREAMS) {
    throw new ConfigurationError(
      `At most ${MAX_REWARD_STREAMS} reward streams are supported, got ${rewards.length}`
    );
  }

  const claimerRate = toRate(config.claimerIncentiveBps, "claimerIncentiveBps");
  const lockerRate = toRate(config.lockerIncentiveBps, "lockerIncentiveBps");

  assertUint256(assetPriceUsd, "assetPriceUsd");
  if (assetPriceUsd === 0n) {
    throw new PrecisionError("Pooled asset has a zero USD price");
  }

  let totalUsd = 0n;
  const cuts: RewardCut[] = [];
  for (const reward of rewards) {
    assertUint256(reward.priceUsd, `price of ${reward.token}`);
    if (reward.priceUsd === 0n) {
      throw new PrecisionError(`Reward token ${reward.token} has a zero USD price`);
    }
    assertUint256(reward.amount, `amount of ${reward.token}`);

    totalUsd = assertUint256(
      totalUsd + assertUint256(reward.amount * reward.priceUsd, "reward value"),
      "total reward value"
    );

    const lockerCut = mulDiv(reward.amount, lockerRate, BASIS);
    cuts.push({
      token: reward.token,
      amount: reward.amount,
      lockerCut,
      callerCut: reward.amount - lockerCut,
    });
  }

  const assetValue = totalUsd / assetPriceUsd;
  const amountToCompound = mulDiv(assetValue, claimerRate, BASIS);

  return { cuts, assetValue, amountToCompound };
}
