// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@compounder/vault-core/shares`
 * Purpose: Proportional share/asset conversion in the ERC-4626 style.
 * Scope: Pure functions over a totals snapshot. Does not read balances.
 * Invariants: Virtual offset of one share and one asset (no decimals offset); deposit/redeem round down, mint/withdraw round up, always in the vault's favour.
 * Side-effects: none
 * @public
 */

import { mulDiv, type Rounding } from "./math";

export interface ShareTotals {
  readonly totalAssets: bigint;
  readonly totalSupply: bigint;
}

export function convertToShares(
  assets: bigint,
  totals: ShareTotals,
  rounding: Rounding = "floor"
): bigint {
  return mulDiv(assets, totals.totalSupply + 1n, totals.totalAssets + 1n, rounding);
}

export function convertToAssets(
  shares: bigint,
  totals: ShareTotals,
  rounding: Rounding = "floor"
): bigint {
  return mulDiv(shares, totals.totalAssets + 1n, totals.totalSupply + 1n, rounding);
}

export function previewDeposit(assets: bigint, totals: ShareTotals): bigint {
  return convertToShares(assets, totals, "floor");
}

export function previewMint(shares: bigint, totals: ShareTotals): bigint {
  return convertToAssets(shares, totals, "ceil");
}

export function previewWithdraw(assets: bigint, totals: ShareTotals): bigint {
  return convertToShares(assets, totals, "ceil");
}

export function previewRedeem(shares: bigint, totals: ShareTotals): bigint {
  return convertToAssets(shares, totals, "floor");
}
