// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/vault/services/vaultLens`
 * Purpose: Read-only views over the vault: reward preview and total assets.
 * Scope: Reads pool, token, supply and price ports; never mutates. Works against live chain readers or the in-memory ledger.
 * Invariants:
 * - totalAssets = rewardPool.balanceOf(vault) + previewReward().
 * - Prices are read fresh on every call; with nothing to claim no price is read.
 * - Pending secondary is estimated with the same emission curve the pool mints with.
 * Side-effects: IO (via ports)
 * Links: src/features/vault/services/claimOrchestrator.ts
 * @public
 */

import {
  computeIncentiveSplit,
  mintableSecondary,
  type RewardQuote,
  type VaultConfig,
  type VaultDeployment,
} from "@compounder/vault-core";

import type {
  EmissionSupplyReader,
  PriceOracle,
  RewardPoolReader,
  TokenReader,
} from "@/ports";

import type { RewardPreview } from "../types";
import { callExternal } from "./externalCall";

export interface VaultLensDeps {
  deployment: VaultDeployment;
  rewardPool: RewardPoolReader;
  tokens: TokenReader;
  oracle: PriceOracle;
  /** null when the deployment has no secondary reward token */
  emissionSupply: EmissionSupplyReader | null;
  /** Current incentive configuration */
  config: () => VaultConfig;
}

/**
 * Secondary the pool would mint for `primaryAmount` at the current supply.
 * Shared with the claim path so both use identical inputs.
 */
export async function estimateSecondary(
  deployment: VaultDeployment,
  emissionSupply: EmissionSupplyReader | null,
  primaryAmount: bigint
): Promise<bigint> {
  if (emissionSupply === null || primaryAmount === 0n) {
    return 0n;
  }
  const [supply, externallyMinted] = await Promise.all([
    callExternal("emission-supply", "totalSupply", () =>
      emissionSupply.totalSupply()
    ),
    callExternal("emission-supply", "externallyMinted", () =>
      emissionSupply.externallyMinted()
    ),
  ]);
  return mintableSecondary(
    primaryAmount,
    supply,
    deployment.emission,
    externallyMinted
  );
}

/** Reward quotes for the deployment's reward streams, asset price included */
export async function quoteRewards(
  deployment: VaultDeployment,
  oracle: PriceOracle,
  amounts: { primary: bigint; secondary: bigint }
): Promise<{ assetPriceUsd: bigint; rewards: RewardQuote[] }> {
  const price = (token: RewardQuote["token"]) =>
    callExternal("price-oracle", "price", () => oracle.price(token));

  const assetPriceUsd = await price(deployment.asset);
  const rewards: RewardQuote[] = [
    {
      token: deployment.primaryRewardToken,
      amount: amounts.primary,
      priceUsd: await price(deployment.primaryRewardToken),
    },
  ];
  if (deployment.secondaryRewardToken !== null) {
    rewards.push({
      token: deployment.secondaryRewardToken,
      amount: amounts.secondary,
      priceUsd: await price(deployment.secondaryRewardToken),
    });
  }
  return { assetPriceUsd, rewards };
}

export class VaultLens {
  constructor(private readonly deps: VaultLensDeps) {}

  async previewRewardBreakdown(): Promise<RewardPreview> {
    const { deployment, rewardPool, tokens, emissionSupply } = this.deps;
    const vault = deployment.vault;
    const secondaryToken = deployment.secondaryRewardToken;

    const [pendingPrimary, heldPrimary, heldSecondary] = await Promise.all([
      callExternal("reward-pool", "earned", () => rewardPool.earned(vault)),
      callExternal("token", "balanceOf", () =>
        tokens.balanceOf(deployment.primaryRewardToken, vault)
      ),
      secondaryToken === null
        ? Promise.resolve(0n)
        : callExternal("token", "balanceOf", () =>
            tokens.balanceOf(secondaryToken, vault)
          ),
    ]);
    const estimatedSecondary = await estimateSecondary(
      deployment,
      emissionSupply,
      pendingPrimary
    );

    const primaryAmount = pendingPrimary + heldPrimary;
    const secondaryAmount = estimatedSecondary + heldSecondary;
    const base = {
      pendingPrimary,
      heldPrimary,
      heldSecondary,
      estimatedSecondary,
      primaryAmount,
      secondaryAmount,
    };

    if (primaryAmount === 0n && secondaryAmount === 0n) {
      return { ...base, split: null, estimatedCompoundAmount: 0n };
    }

    const { assetPriceUsd, rewards } = await quoteRewards(
      deployment,
      this.deps.oracle,
      { primary: primaryAmount, secondary: secondaryAmount }
    );
    const split = computeIncentiveSplit({
      rewards,
      assetPriceUsd,
      config: this.deps.config(),
    });
    return { ...base, split, estimatedCompoundAmount: split.amountToCompound };
  }

  async previewReward(): Promise<bigint> {
    const preview = await this.previewRewardBreakdown();
    return preview.estimatedCompoundAmount;
  }

  async totalAssets(): Promise<bigint> {
    const vault = this.deps.deployment.vault;
    const [staked, reward] = await Promise.all([
      callExternal("reward-pool", "balanceOf", () =>
        this.deps.rewardPool.balanceOf(vault)
      ),
      this.previewReward(),
    ]);
    return staked + reward;
  }
}
