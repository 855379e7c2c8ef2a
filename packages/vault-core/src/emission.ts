// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@compounder/vault-core/emission`
 * Purpose: Decaying emission curve for the secondary reward token, minted in proportion to the primary reward.
 * Scope: Pure functions. Does not read token supply; callers pass the live supply in.
 * Invariants:
 * - Integer arithmetic only, truncating, evaluated in the documented order.
 * - Result is in [0, maxEmissionSupply - emissionsMinted]; 0 once the schedule is exhausted.
 * - Non-increasing in emissionsMinted for a fixed primary amount.
 * Side-effects: none
 * @public
 */

import {
  EMISSION_REDUCTION_DENOMINATOR,
  EMISSION_REDUCTION_FLOOR,
  EMISSION_REDUCTION_NUMERATOR,
} from "./constants";
import { ConfigurationError } from "./errors";
import { assertUint256, checkedSub, mulDiv } from "./math";
import type { EmissionParams } from "./model";

/**
 * Validate emission parameters once, at construction.
 * @throws ConfigurationError on a zero cliff count, zero cliff size or zero max supply
 */
export function validateEmissionParams(params: EmissionParams): EmissionParams {
  const fields = [
    ["initialMintAmount", params.initialMintAmount],
    ["totalCliffs", params.totalCliffs],
    ["reductionPerCliff", params.reductionPerCliff],
    ["maxEmissionSupply", params.maxEmissionSupply],
  ] as const;

  for (const [field, value] of fields) {
    if (value < 0n) {
      throw new ConfigurationError(`emission.${field} must be >= 0`, field);
    }
  }
  for (const [field, value] of fields.slice(1)) {
    if (value === 0n) {
      throw new ConfigurationError(`emission.${field} must be > 0`, field);
    }
  }

  return Object.freeze({ ...params });
}

/**
 * Supply minted through emissions so far.
 * emissionsMinted = totalSupply - initialMintAmount - externallyMinted
 *
 * @throws PrecisionError if the live supply is below the fixed mint amounts
 */
export function emissionsMinted(
  secondaryTotalSupply: bigint,
  params: EmissionParams,
  externallyMinted = 0n
): bigint {
  assertUint256(secondaryTotalSupply, "secondaryTotalSupply");
  assertUint256(externallyMinted, "externallyMinted");
  const afterInitial = checkedSub(
    secondaryTotalSupply,
    params.initialMintAmount,
    "secondaryTotalSupply - initialMintAmount"
  );
  return checkedSub(afterInitial, externallyMinted, "emissionsMinted");
}

/**
 * Amount of the secondary token mintable for a given primary reward.
 *
 * 1. cliff = emissionsMinted / reductionPerCliff
 * 2. cliff >= totalCliffs → 0
 * 3. reduction = (totalCliffs - cliff) * 5 / 2 + 700
 * 4. amount = primaryAmount * reduction / totalCliffs
 * 5. clamp to maxEmissionSupply - emissionsMinted
 *
 * @param externallyMinted - supply minted outside the emission schedule (minter allowance)
 */
export function mintableSecondary(
  primaryAmount: bigint,
  secondaryTotalSupply: bigint,
  params: EmissionParams,
  externallyMinted = 0n
): bigint {
  assertUint256(primaryAmount, "primaryAmount");
  const minted = emissionsMinted(
    secondaryTotalSupply,
    params,
    externallyMinted
  );

  const cliff = minted / params.reductionPerCliff;
  if (cliff >= params.totalCliffs) {
    return 0n;
  }

  const reduction =
    ((params.totalCliffs - cliff) * EMISSION_REDUCTION_NUMERATOR) /
      EMISSION_REDUCTION_DENOMINATOR +
    EMISSION_REDUCTION_FLOOR;
  const amount = mulDiv(primaryAmount, reduction, params.totalCliffs);

  const remainingToMax = params.maxEmissionSupply - minted;
  if (remainingToMax <= 0n) {
    return 0n;
  }
  return amount > remainingToMax ? remainingToMax : amount;
}
