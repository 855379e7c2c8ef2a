// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/jobs/previewReward.job`
 * Purpose: Job module that reads the vault's reward preview and total assets through the container.
 * Scope: Resolves views from the container, logs one vault.reward_previewed event and returns the figures. Does not mutate anything.
 * Invariants: Amounts are returned as decimal strings (exact, JSON-safe).
 * Side-effects: IO (chain reads via container adapters, logging)
 * Links: src/features/vault/services/vaultLens.ts, src/scripts/preview-reward.ts
 * @public
 */

import { randomUUID } from "node:crypto";

import { getContainer } from "@/bootstrap/container";
import { EVENT_NAMES, logEvent } from "@/shared/observability";

export interface RewardPreviewReport {
  vault: string;
  /** Head block when the reads were issued; reads are not pinned to it */
  blockNumber: string;
  pendingPrimary: string;
  estimatedSecondary: string;
  previewReward: string;
  totalAssets: string;
}

export async function runPreviewRewardJob(): Promise<RewardPreviewReport> {
  const { log, spec, views, onchainClient } = getContainer();
  const opId = randomUUID();

  const [blockNumber, breakdown, totalAssets] = await Promise.all([
    onchainClient.getBlockNumber(),
    views.previewRewardBreakdown(),
    views.totalAssets(),
  ]);

  const report: RewardPreviewReport = {
    vault: spec.deployment.vault,
    blockNumber: blockNumber.toString(),
    pendingPrimary: breakdown.pendingPrimary.toString(),
    estimatedSecondary: breakdown.estimatedSecondary.toString(),
    previewReward: breakdown.estimatedCompoundAmount.toString(),
    totalAssets: totalAssets.toString(),
  };

  logEvent(log, EVENT_NAMES.VAULT_REWARD_PREVIEWED, { opId, ...report });
  return report;
}
