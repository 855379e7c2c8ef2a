// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@compounder/vault-core/constants`
 * Purpose: Protocol constants shared by the incentive split and the emission curve.
 * Scope: Constants only.
 * Side-effects: none
 * @public
 */

/** Incentive rates are expressed in basis points out of this value */
export const INCENTIVE_BASIS = 10_000;

/** Price quotes are USD with 18 decimals */
export const PRICE_DECIMALS = 18;
export const WAD = 10n ** 18n;

/** Emission curve: reduction = (totalCliffs - cliff) * 5 / 2 + 700 */
export const EMISSION_REDUCTION_NUMERATOR = 5n;
export const EMISSION_REDUCTION_DENOMINATOR = 2n;
export const EMISSION_REDUCTION_FLOOR = 700n;

/** Reward streams supported by one vault: primary and optional secondary */
export const MAX_REWARD_STREAMS = 2;
