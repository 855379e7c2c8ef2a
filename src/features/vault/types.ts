// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/vault/types`
 * Purpose: Request and result shapes of vault operations.
 * Scope: Types only.
 * Side-effects: none
 * @public
 */

import type { IncentiveSplit } from "@compounder/vault-core";
import type { Address } from "viem";

export interface ClaimRequest {
  /** Pays in the compound amount and receives the caller cuts */
  readonly caller: Address;
  readonly primaryAmount: bigint;
  /** Derived from primaryAmount through the emission curve when omitted */
  readonly secondaryAmount?: bigint;
  /** Ceiling on the pooled-asset amount the caller is willing to pay in */
  readonly maxAssetAmountIn: bigint;
}

export interface ClaimReceipt {
  readonly opId: string;
  /** Pooled asset collected from the caller and re-staked */
  readonly amountPaidIn: bigint;
  readonly primaryAmount: bigint;
  readonly secondaryAmount: bigint;
  readonly split: IncentiveSplit;
}

/** Breakdown behind previewReward() */
export interface RewardPreview {
  /** Primary reward still held by the pool for the vault */
  readonly pendingPrimary: bigint;
  /** Reward tokens already sitting in the vault */
  readonly heldPrimary: bigint;
  readonly heldSecondary: bigint;
  /** Secondary the pool would mint for pendingPrimary right now */
  readonly estimatedSecondary: bigint;
  readonly primaryAmount: bigint;
  readonly secondaryAmount: bigint;
  /** null when there is nothing to claim (no prices are read) */
  readonly split: IncentiveSplit | null;
  readonly estimatedCompoundAmount: bigint;
}
