// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@compounder/vault-core/config`
 * Purpose: Validation and construction of incentive bounds, configuration records and vault deployments.
 * Scope: Pure validation. Does not store configuration; see the feature-layer config store.
 * Invariants:
 * - Bounds are integers in [0, INCENTIVE_BASIS] and never change after construction.
 * - Every record produced by nextVaultConfig respects the bounds and has a non-zero payout address.
 * - Records are frozen; a replacement is a new object with version + 1.
 * Side-effects: none
 * @public
 */

import { type Address, getAddress, isAddress, zeroAddress } from "viem";

import { INCENTIVE_BASIS } from "./constants";
import { validateEmissionParams } from "./emission";
import { ConfigurationError } from "./errors";
import type {
  IncentiveBounds,
  VaultConfig,
  VaultConfigInput,
  VaultDeployment,
} from "./model";

function assertBps(value: number, field: string, max: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(
      `${field} must be a non-negative integer, got ${value}`,
      field
    );
  }
  if (value > max) {
    throw new ConfigurationError(`${field} ${value} exceeds maximum ${max}`, field);
  }
}

/**
 * Normalise an address, rejecting malformed input and (unless allowed) the zero address.
 */
export function toVaultAddress(
  raw: string,
  field: string,
  options: { allowZero?: boolean } = {}
): Address {
  if (!isAddress(raw, { strict: false })) {
    throw new ConfigurationError(`${field} is not a valid address: ${raw}`, field);
  }
  const address = getAddress(raw);
  if (!options.allowZero && address === zeroAddress) {
    throw new ConfigurationError(`${field} must not be the zero address`, field);
  }
  return address;
}

export function validateIncentiveBounds(bounds: IncentiveBounds): IncentiveBounds {
  assertBps(bounds.maxClaimerIncentiveBps, "maxClaimerIncentiveBps", INCENTIVE_BASIS);
  assertBps(bounds.maxLockerIncentiveBps, "maxLockerIncentiveBps", INCENTIVE_BASIS);
  return Object.freeze({ ...bounds });
}

/** Construction-time record: zero rates, unset payout address */
export function initialVaultConfig(): VaultConfig {
  return Object.freeze({
    claimerIncentiveBps: 0,
    lockerIncentiveBps: 0,
    lockerRewardsAddress: zeroAddress,
    version: 0,
  });
}

/**
 * Validate a config input against the immutable bounds.
 * @throws ConfigurationError on a rate above its bound or a null payout address
 */
export function validateVaultConfigInput(
  input: VaultConfigInput,
  bounds: IncentiveBounds
): VaultConfigInput {
  assertBps(
    input.claimerIncentiveBps,
    "claimerIncentiveBps",
    bounds.maxClaimerIncentiveBps
  );
  assertBps(
    input.lockerIncentiveBps,
    "lockerIncentiveBps",
    bounds.maxLockerIncentiveBps
  );
  return {
    claimerIncentiveBps: input.claimerIncentiveBps,
    lockerIncentiveBps: input.lockerIncentiveBps,
    lockerRewardsAddress: toVaultAddress(
      input.lockerRewardsAddress,
      "lockerRewardsAddress"
    ),
  };
}

/** Build the record that replaces `current` */
export function nextVaultConfig(
  current: VaultConfig,
  input: VaultConfigInput,
  bounds: IncentiveBounds
): VaultConfig {
  const validated = validateVaultConfigInput(input, bounds);
  return Object.freeze({ ...validated, version: current.version + 1 });
}

/**
 * Validate a whole deployment: addresses, token identities, emission schedule, bounds, admins.
 */
export function validateVaultDeployment(
  deployment: VaultDeployment
): VaultDeployment {
  const vault = toVaultAddress(deployment.vault, "vault");
  const asset = toVaultAddress(deployment.asset, "asset");
  const primaryRewardToken = toVaultAddress(
    deployment.primaryRewardToken,
    "primaryRewardToken"
  );
  const secondaryRewardToken =
    deployment.secondaryRewardToken === null
      ? null
      : toVaultAddress(deployment.secondaryRewardToken, "secondaryRewardToken");
  const rewardPool = toVaultAddress(deployment.rewardPool, "rewardPool");

  const tokens = [vault, asset, primaryRewardToken, secondaryRewardToken].filter(
    (token): token is Address => token !== null
  );
  if (new Set(tokens).size !== tokens.length) {
    throw new ConfigurationError(
      "vault, asset and reward tokens must be distinct addresses"
    );
  }

  if (deployment.admins.length === 0) {
    throw new ConfigurationError("at least one admin is required", "admins");
  }
  const admins = deployment.admins.map((admin, i) =>
    toVaultAddress(admin, `admins[${i}]`)
  );

  return Object.freeze({
    vault,
    asset,
    primaryRewardToken,
    secondaryRewardToken,
    rewardPool,
    emission: validateEmissionParams(deployment.emission),
    bounds: validateIncentiveBounds(deployment.bounds),
    admins: Object.freeze(admins),
    claimExtrasOnWithdraw: deployment.claimExtrasOnWithdraw,
  });
}
