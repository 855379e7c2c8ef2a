// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/features/vault/vaultLens`
 * Purpose: Unit tests for previewReward and totalAssets over the chain readers.
 * Scope: VaultLens wired to the viem readers on top of FakeEvmOnchainClient. Does not test the price adapter.
 * Invariants: totalAssets = staked balance + previewReward; no price reads when nothing is claimable.
 * Side-effects: none
 * Links: src/features/vault/services/vaultLens.ts
 * @public
 */

import { initialVaultConfig, WAD } from "@compounder/vault-core";
import { beforeEach, describe, expect, it } from "vitest";

import {
  ViemEmissionSupplyReader,
  ViemRewardPoolReader,
  ViemTokenReader,
} from "@/adapters/server";
import { FakeEvmOnchainClient, FakePriceOracle } from "@/adapters/test";
import { VaultConfigStore, VaultLens } from "@/features/vault/public";
import {
  ADMIN,
  ASSET,
  INITIAL_MINT,
  POOL,
  PRIMARY,
  SECONDARY,
  TEST_CONFIG,
  TEST_DEPLOYMENT,
  VAULT,
} from "@tests/_fakes";

describe("features/vault/vaultLens", () => {
  let client: FakeEvmOnchainClient;
  let oracle: FakePriceOracle;
  let store: VaultConfigStore;
  let lens: VaultLens;

  beforeEach(() => {
    client = new FakeEvmOnchainClient();
    client.setTotalSupply(SECONDARY, INITIAL_MINT);
    oracle = new FakePriceOracle([
      [ASSET, WAD],
      [PRIMARY, 2n * WAD],
      [SECONDARY, WAD],
    ]);
    store = new VaultConfigStore({
      bounds: TEST_DEPLOYMENT.bounds,
      admins: TEST_DEPLOYMENT.admins,
      initial: TEST_CONFIG,
    });
    lens = new VaultLens({
      deployment: TEST_DEPLOYMENT,
      rewardPool: new ViemRewardPoolReader(client, POOL),
      tokens: new ViemTokenReader(client),
      oracle,
      emissionSupply: new ViemEmissionSupplyReader(client, SECONDARY),
      config: () => store.get(),
    });
  });

  it("previews the compound amount for pending primary plus estimated secondary", async () => {
    client.setPoolPosition(POOL, VAULT, { balance: 10_000n, earned: 1000n });

    const preview = await lens.previewRewardBreakdown();

    expect(preview).toMatchObject({
      pendingPrimary: 1000n,
      heldPrimary: 0n,
      heldSecondary: 0n,
      estimatedSecondary: 3900n,
      primaryAmount: 1000n,
      secondaryAmount: 3900n,
      estimatedCompoundAmount: 295n,
    });
    expect(preview.split?.assetValue).toBe(5900n);
  });

  it("adds the staked balance to the preview in totalAssets", async () => {
    client.setPoolPosition(POOL, VAULT, { balance: 10_000n, earned: 1000n });

    await expect(lens.previewReward()).resolves.toBe(295n);
    await expect(lens.totalAssets()).resolves.toBe(10_295n);
  });

  it("counts reward tokens the vault already holds", async () => {
    client.setPoolPosition(POOL, VAULT, { balance: 0n, earned: 1000n });
    client.setErc20Balance(PRIMARY, VAULT, 500n);

    // (1500 * $2 + 3900 * $1) / $1 = 6900; 5% of it
    await expect(lens.previewReward()).resolves.toBe(345n);
  });

  it("discounts the estimate once off-curve mints push the supply past a cliff", async () => {
    client.setPoolPosition(POOL, VAULT, { balance: 0n, earned: 1000n });
    // 100 cliffs of emissions minted: reduction = (500 - 100) * 5 / 2 + 700 = 1700
    client.setTotalSupply(SECONDARY, INITIAL_MINT + 100n * 100_000n * WAD + 7n);
    client.setMinterMinted(SECONDARY, 7n);

    const preview = await lens.previewRewardBreakdown();

    expect(preview.estimatedSecondary).toBe(3400n);
  });

  it("reads no prices when there is nothing to claim", async () => {
    client.setPoolPosition(POOL, VAULT, { balance: 4000n, earned: 0n });

    await expect(lens.previewReward()).resolves.toBe(0n);
    await expect(lens.totalAssets()).resolves.toBe(4000n);
    expect(oracle.priceCalls).toEqual([]);
  });

  it("previews zero while the claimer incentive is unset", async () => {
    const unset = new VaultLens({
      deployment: TEST_DEPLOYMENT,
      rewardPool: new ViemRewardPoolReader(client, POOL),
      tokens: new ViemTokenReader(client),
      oracle,
      emissionSupply: null,
      config: initialVaultConfig,
    });
    client.setPoolPosition(POOL, VAULT, { balance: 0n, earned: 1000n });

    await expect(unset.previewRewardBreakdown()).resolves.toMatchObject({
      estimatedSecondary: 0n,
      estimatedCompoundAmount: 0n,
    });
  });

  it("follows config replacements on the next read", async () => {
    client.setPoolPosition(POOL, VAULT, { balance: 0n, earned: 1000n });
    store.replace(ADMIN, { ...TEST_CONFIG, claimerIncentiveBps: 100 });

    // 5900 * 100 / 10000
    await expect(lens.previewReward()).resolves.toBe(59n);
  });

  it("surfaces oracle failures as ExternalCallFailure", async () => {
    client.setPoolPosition(POOL, VAULT, { balance: 0n, earned: 1000n });
    oracle.failWith(new Error("feed offline"));

    await expect(lens.totalAssets()).rejects.toMatchObject({
      code: "EXTERNAL_CALL_FAILED",
      collaborator: "price-oracle",
    });
  });
});
