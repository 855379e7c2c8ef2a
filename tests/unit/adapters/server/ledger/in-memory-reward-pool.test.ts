// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/adapters/server/ledger/in-memory-reward-pool`
 * Purpose: Unit tests for the in-memory staking pool and its secondary emissions.
 * Scope: Stake/withdraw, accrue/getReward, emission minting and rollback with the ledger. Does not test the vault.
 * Invariants: Secondary minted per getReward follows the emission curve at the live supply.
 * Side-effects: none
 * Links: src/adapters/server/ledger/in-memory-reward-pool.adapter.ts
 * @public
 */

import { WAD } from "@compounder/vault-core";
import { beforeEach, describe, expect, it } from "vitest";

import { InMemoryLedger, InMemoryRewardPool } from "@/adapters/server";
import {
  ALICE,
  ASSET,
  INITIAL_MINT,
  POOL,
  PRIMARY,
  SECONDARY,
  TEST_DEPLOYMENT,
  TREASURY,
} from "@tests/_fakes";

describe("InMemoryRewardPool", () => {
  let ledger: InMemoryLedger;
  let pool: InMemoryRewardPool;

  beforeEach(async () => {
    ledger = new InMemoryLedger();
    pool = new InMemoryRewardPool(ledger, {
      address: POOL,
      stakingToken: ASSET,
      primaryRewardToken: PRIMARY,
      secondaryRewardToken: SECONDARY,
      emission: TEST_DEPLOYMENT.emission,
    });
    await ledger.mint(SECONDARY, TREASURY, INITIAL_MINT);
    await ledger.mint(ASSET, ALICE, 1000n);
  });

  it("stakes 1:1 on behalf of an account", async () => {
    await expect(pool.deposit(ALICE, 600n, ALICE)).resolves.toBe(600n);

    expect(await pool.balanceOf(ALICE)).toBe(600n);
    expect(await ledger.balanceOf(ASSET, POOL)).toBe(600n);
  });

  it("rejects a zero stake", async () => {
    await expect(pool.deposit(ALICE, 0n, ALICE)).rejects.toThrow(
      "[InMemoryRewardPool] Cannot stake 0"
    );
  });

  it("rejects withdrawing more than the stake", async () => {
    await pool.deposit(ALICE, 100n, ALICE);

    await expect(pool.withdraw(ALICE, 101n, false)).rejects.toThrow(
      "exceeds stake 100"
    );
  });

  it("pays primary and mints secondary on the emission curve", async () => {
    await pool.accrue(ALICE, 1000n);
    expect(await pool.earned(ALICE)).toBe(1000n);

    await pool.getReward(ALICE);

    expect(await pool.earned(ALICE)).toBe(0n);
    expect(await ledger.balanceOf(PRIMARY, ALICE)).toBe(1000n);
    expect(await ledger.balanceOf(SECONDARY, ALICE)).toBe(3900n);
  });

  it("excludes off-curve mints from the emission count", async () => {
    await pool.mintExternal(TREASURY, 100n * 100_000n * WAD);
    await pool.accrue(ALICE, 1000n);

    await pool.getReward(ALICE);

    // Still at cliff 0 since the external mint is not an emission
    expect(await ledger.balanceOf(SECONDARY, ALICE)).toBe(3900n);
    await expect(pool.emissionSupply().externallyMinted()).resolves.toBe(
      100n * 100_000n * WAD
    );
  });

  it("claims rewards on withdraw when asked to", async () => {
    await pool.deposit(ALICE, 500n, ALICE);
    await pool.accrue(ALICE, 10n);

    await pool.withdraw(ALICE, 500n, true);

    expect(await ledger.balanceOf(ASSET, ALICE)).toBe(1000n);
    expect(await ledger.balanceOf(PRIMARY, ALICE)).toBe(10n);
  });

  it("rolls back with the ledger", async () => {
    await pool.accrue(ALICE, 1000n);

    await ledger
      .runAtomic(async () => {
        await pool.deposit(ALICE, 500n, ALICE);
        await pool.getReward(ALICE);
        throw new Error("abort");
      })
      .catch(() => undefined);

    expect(await pool.balanceOf(ALICE)).toBe(0n);
    expect(await pool.earned(ALICE)).toBe(1000n);
    expect(await ledger.totalSupply(SECONDARY)).toBe(INITIAL_MINT);
  });

  it("has no emission supply without a secondary token", () => {
    const single = new InMemoryRewardPool(new InMemoryLedger(), {
      address: POOL,
      stakingToken: ASSET,
      primaryRewardToken: PRIMARY,
      secondaryRewardToken: null,
      emission: TEST_DEPLOYMENT.emission,
    });

    expect(() => single.emissionSupply()).toThrow(
      "[InMemoryRewardPool] Pool has no secondary reward token"
    );
  });
});
