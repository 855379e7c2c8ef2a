// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/config/vaultSpec.server`
 * Purpose: Server-only accessor for the vault deployment stored in .vault/vault-spec.yaml.
 * Scope: Reads, validates and caches the spec on first access per path; maps it to a VaultDeployment plus the price feed table. Does not accept env overrides for individual fields.
 * Invariants: Chain ID must match `@shared/web3` CHAIN_ID; deployment passes validateVaultDeployment; one feed per token.
 * Side-effects: IO (reads vault-spec from disk) on first call per path only.
 * Links: .vault/vault-spec.yaml, vaultSpec.schema.ts
 * @public
 */

import fs from "node:fs";
import path from "node:path";

import {
  ConfigurationError,
  type VaultConfigInput,
  type VaultDeployment,
  validateVaultConfigInput,
  validateVaultDeployment,
} from "@compounder/vault-core";
import type { Address } from "viem";
import { parse } from "yaml";

import { CHAIN_ID } from "@/shared/web3/chain";

import { vaultSpecSchema } from "./vaultSpec.schema";

export interface PriceFeedEntry {
  feed: Address;
  maxAgeSeconds: number;
}

export type PriceFeedTable = ReadonlyMap<Address, PriceFeedEntry>;

export interface LoadedVaultSpec {
  chainId: number;
  deployment: VaultDeployment;
  priceFeeds: PriceFeedTable;
  /** null for a vault whose config was never set */
  initialConfig: VaultConfigInput | null;
}

const cache = new Map<string, LoadedVaultSpec>();

function readSpecFile(specPath: string): unknown {
  if (!fs.existsSync(specPath)) {
    throw new ConfigurationError(
      `[vault-spec] Missing configuration at ${specPath}; vault deployment settings must be committed`
    );
  }

  const content = fs.readFileSync(specPath, "utf8");
  try {
    return parse(content);
  } catch (error) {
    throw new ConfigurationError(
      `[vault-spec] Failed to parse ${specPath}; ensure valid YAML (${
        error instanceof Error ? error.message : String(error)
      })`
    );
  }
}

/**
 * Validate raw YAML content and map it to domain types.
 * Exposed separately so callers holding an already-parsed document skip the disk read.
 */
export function parseVaultSpec(raw: unknown): LoadedVaultSpec {
  const result = vaultSpecSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join(".") ?? "";
    throw new ConfigurationError(
      `[vault-spec] Invalid ${field || "document"}: ${issue?.message ?? "unknown"}`,
      field || undefined
    );
  }
  const spec = result.data;

  const chainId = Number(spec.chain_id);
  if (!Number.isInteger(chainId)) {
    throw new ConfigurationError(
      "[vault-spec] Invalid chain_id; expected a numeric chain ID",
      "chain_id"
    );
  }
  if (chainId !== CHAIN_ID) {
    throw new ConfigurationError(
      `[vault-spec] Chain mismatch: vault-spec declares ${chainId}, app requires ${CHAIN_ID}`,
      "chain_id"
    );
  }

  const deployment = validateVaultDeployment({
    vault: spec.vault.address,
    asset: spec.vault.asset,
    rewardPool: spec.vault.reward_pool,
    primaryRewardToken: spec.vault.primary_reward_token,
    secondaryRewardToken: spec.vault.secondary_reward_token ?? null,
    claimExtrasOnWithdraw: spec.vault.claim_extras_on_withdraw,
    emission: {
      initialMintAmount: spec.emission.initial_mint_amount,
      totalCliffs: spec.emission.total_cliffs,
      reductionPerCliff: spec.emission.reduction_per_cliff,
      maxEmissionSupply: spec.emission.max_emission_supply,
    },
    bounds: {
      maxClaimerIncentiveBps: spec.incentive_bounds.max_claimer_incentive_bps,
      maxLockerIncentiveBps: spec.incentive_bounds.max_locker_incentive_bps,
    },
    admins: spec.admins,
  });

  const priceFeeds = new Map<Address, PriceFeedEntry>();
  for (const entry of spec.price_feeds) {
    if (priceFeeds.has(entry.token)) {
      throw new ConfigurationError(
        `[vault-spec] Duplicate price feed for token ${entry.token}`,
        "price_feeds"
      );
    }
    priceFeeds.set(entry.token, {
      feed: entry.feed,
      maxAgeSeconds: entry.max_age_seconds,
    });
  }

  const initialConfig = spec.config
    ? validateVaultConfigInput(
        {
          claimerIncentiveBps: spec.config.claimer_incentive_bps,
          lockerIncentiveBps: spec.config.locker_incentive_bps,
          lockerRewardsAddress: spec.config.locker_rewards_address,
        },
        deployment.bounds
      )
    : null;

  return { chainId, deployment, priceFeeds, initialConfig };
}

/**
 * Load the vault spec from disk (relative paths resolve against cwd).
 * Cached per resolved path.
 */
export function loadVaultSpec(specPath: string): LoadedVaultSpec {
  const resolved = path.resolve(process.cwd(), specPath);
  const cached = cache.get(resolved);
  if (cached) {
    return cached;
  }

  const loaded = parseVaultSpec(readSpecFile(resolved));
  cache.set(resolved, loaded);
  return loaded;
}

/**
 * Reset cached specs (for testing only).
 */
export function resetVaultSpecCache(): void {
  cache.clear();
}
