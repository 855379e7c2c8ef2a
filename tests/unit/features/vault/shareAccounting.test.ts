// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/features/vault/shareAccounting`
 * Purpose: Unit tests for deposit, mint, withdraw and redeem against totalAssets.
 * Scope: Share math through the vault facade, staking side effects, ownership and serialisation. Does not test claims.
 * Invariants: totalAssets counts the staked balance plus the compoundable pending reward.
 * Side-effects: none
 * Links: src/features/vault/compoundingVault.ts, packages/vault-core/src/shares.ts
 * @public
 */

import { beforeEach, describe, expect, it } from "vitest";

import {
  ALICE,
  ASSET,
  BOB,
  makeTestVault,
  POOL,
  TEST_CONFIG,
  type TestVault,
  VAULT,
} from "@tests/_fakes";
import { vaultOperationsTotal } from "@/shared/observability";

async function operationCount(
  operation: string,
  outcome: string
): Promise<number> {
  const metric = await vaultOperationsTotal.get();
  const entry = metric.values.find(
    (value) =>
      value.labels.operation === operation && value.labels.outcome === outcome
  );
  return entry?.value ?? 0;
}

describe("features/vault/shareAccounting", () => {
  let t: TestVault;

  beforeEach(async () => {
    t = await makeTestVault();
    await t.ledger.mint(ASSET, ALICE, 1000n);
    await t.ledger.mint(ASSET, BOB, 1000n);
  });

  describe("deposit", () => {
    it("mints shares 1:1 into an empty vault and stakes the assets", async () => {
      await expect(t.vault.deposit(1000n, ALICE, ALICE)).resolves.toBe(1000n);

      expect(await t.vault.balanceOf(ALICE)).toBe(1000n);
      expect(await t.vault.totalSupply()).toBe(1000n);
      expect(await t.pool.balanceOf(VAULT)).toBe(1000n);
      expect(await t.ledger.balanceOf(ASSET, POOL)).toBe(1000n);
      expect(await t.ledger.balanceOf(ASSET, VAULT)).toBe(0n);
      expect(await t.vault.totalAssets()).toBe(1000n);
      expect(t.events.events).toEqual([
        {
          type: "Deposit",
          caller: ALICE,
          owner: ALICE,
          assets: 1000n,
          shares: 1000n,
        },
      ]);
    });

    it("credits the receiver, not the payer", async () => {
      await t.vault.deposit(300n, BOB, ALICE);

      expect(await t.vault.balanceOf(BOB)).toBe(300n);
      expect(await t.vault.balanceOf(ALICE)).toBe(0n);
      expect(await t.ledger.balanceOf(ASSET, ALICE)).toBe(700n);
    });

    it("keeps proportional pricing for a second depositor", async () => {
      await t.vault.deposit(1000n, ALICE, ALICE);

      await expect(t.vault.deposit(500n, BOB, BOB)).resolves.toBe(500n);
      expect(await t.vault.totalSupply()).toBe(1500n);
    });

    it("counts the compoundable pending reward in totalAssets", async () => {
      const rewarded = await makeTestVault({ config: TEST_CONFIG });
      await rewarded.ledger.mint(ASSET, ALICE, 1000n);
      await rewarded.pool.accrue(VAULT, 1000n);

      expect(await rewarded.vault.totalAssets()).toBe(295n);
      // 1000 * (0 + 1) / (295 + 1)
      await expect(rewarded.vault.deposit(1000n, ALICE, ALICE)).resolves.toBe(
        3n
      );
      expect(await rewarded.vault.totalAssets()).toBe(1295n);
    });

    it("mints nothing and moves nothing for a zero deposit", async () => {
      await expect(t.vault.deposit(0n, ALICE, ALICE)).resolves.toBe(0n);

      expect(t.ledger.transfers()).toEqual([]);
      expect(await t.pool.balanceOf(VAULT)).toBe(0n);
    });

    it("rolls back and counts an aborted deposit the caller cannot fund", async () => {
      const before = await operationCount("deposit", "aborted");

      await expect(
        t.vault.deposit(5000n, ALICE, ALICE)
      ).rejects.toMatchObject({
        code: "EXTERNAL_CALL_FAILED",
        collaborator: "token",
        operation: "transfer",
      });

      expect(await operationCount("deposit", "aborted")).toBe(before + 1);
      expect(await t.vault.totalSupply()).toBe(0n);
      expect(t.events.events).toEqual([]);
    });
  });

  describe("mint", () => {
    it("charges the rounded-up asset amount for the requested shares", async () => {
      await t.vault.deposit(1000n, ALICE, ALICE);

      await expect(t.vault.mint(500n, BOB, BOB)).resolves.toBe(500n);
      expect(await t.vault.balanceOf(BOB)).toBe(500n);
      expect(await t.ledger.balanceOf(ASSET, BOB)).toBe(500n);
    });
  });

  describe("withdraw and redeem", () => {
    beforeEach(async () => {
      await t.vault.deposit(1000n, ALICE, ALICE);
    });

    it("burns shares for the withdrawn assets and unstakes them", async () => {
      await expect(
        t.vault.withdraw(400n, ALICE, ALICE, ALICE)
      ).resolves.toBe(400n);

      expect(await t.vault.balanceOf(ALICE)).toBe(600n);
      expect(await t.ledger.balanceOf(ASSET, ALICE)).toBe(400n);
      expect(await t.pool.balanceOf(VAULT)).toBe(600n);
      expect(t.events.ofType("Withdraw")).toEqual([
        {
          type: "Withdraw",
          caller: ALICE,
          receiver: ALICE,
          owner: ALICE,
          assets: 400n,
          shares: 400n,
        },
      ]);
    });

    it("redeems shares to a different receiver", async () => {
      await expect(t.vault.redeem(250n, BOB, ALICE, ALICE)).resolves.toBe(
        250n
      );

      expect(await t.ledger.balanceOf(ASSET, BOB)).toBe(1250n);
      expect(await t.vault.balanceOf(ALICE)).toBe(750n);
    });

    it("reports withdraw and redeem limits", async () => {
      expect(await t.vault.maxWithdraw(ALICE)).toBe(1000n);
      expect(await t.vault.maxRedeem(ALICE)).toBe(1000n);
      expect(await t.vault.maxWithdraw(BOB)).toBe(0n);
      expect(await t.vault.maxRedeem(BOB)).toBe(0n);
    });

    it("rejects redeeming more shares than the owner holds", async () => {
      await expect(
        t.vault.redeem(1001n, ALICE, ALICE, ALICE)
      ).rejects.toMatchObject({
        code: "INSUFFICIENT_SHARES",
        owner: ALICE,
        requested: 1001n,
        available: 1000n,
      });
      expect(await t.vault.balanceOf(ALICE)).toBe(1000n);
    });

    it("rejects withdrawing on behalf of another owner", async () => {
      await expect(
        t.vault.withdraw(100n, BOB, ALICE, BOB)
      ).rejects.toMatchObject({
        code: "UNAUTHORIZED",
        caller: BOB,
        operation: "withdraw",
      });
      expect(await t.pool.balanceOf(VAULT)).toBe(1000n);
    });

    it("pulls pending rewards into the vault on withdraw when claimExtrasOnWithdraw is set", async () => {
      await t.pool.accrue(VAULT, 10n);

      await t.vault.redeem(100n, ALICE, ALICE, ALICE);

      expect(await t.pool.earned(VAULT)).toBe(0n);
      expect(await t.ledger.balanceOf(t.deployment.primaryRewardToken, VAULT)).toBe(
        10n
      );
    });
  });

  describe("serialisation", () => {
    it("runs concurrent deposits one after the other in call order", async () => {
      const [alice, bob] = await Promise.all([
        t.vault.deposit(1000n, ALICE, ALICE),
        t.vault.deposit(1000n, BOB, BOB),
      ]);

      expect([alice, bob]).toEqual([1000n, 1000n]);
      expect(t.events.ofType("Deposit").map((event) => event.owner)).toEqual([
        ALICE,
        BOB,
      ]);
      expect(await t.vault.totalSupply()).toBe(2000n);
    });

    it("keeps the queue moving after a failed operation", async () => {
      const results = await Promise.allSettled([
        t.vault.deposit(5000n, ALICE, ALICE),
        t.vault.deposit(500n, BOB, BOB),
      ]);

      expect(results[0]?.status).toBe("rejected");
      expect(results[1]).toEqual({ status: "fulfilled", value: 500n });
    });
  });
});
