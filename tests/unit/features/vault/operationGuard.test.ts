// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/features/vault/operationGuard`
 * Purpose: Unit tests for operation serialisation and re-entry detection.
 * Scope: OperationGuard in isolation. Does not involve ledgers or rollback.
 * Invariants: Queued work starts in call order; nested calls fail instead of deadlocking.
 * Side-effects: none
 * Links: src/features/vault/services/operationGuard.ts
 * @public
 */

import { describe, expect, it } from "vitest";

import { OperationGuard } from "@/features/vault/public";

describe("features/vault/operationGuard", () => {
  it("runs queued work strictly one at a time in call order", async () => {
    const guard = new OperationGuard();
    const trace: string[] = [];
    let releaseFirst: () => void = () => undefined;
    const firstBlocked = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = guard.run("deposit", async () => {
      trace.push("first:start");
      await firstBlocked;
      trace.push("first:end");
      return 1;
    });
    const second = guard.run("claim", async () => {
      trace.push("second:start");
      return 2;
    });

    // Let the queue advance as far as it can while the first is blocked
    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(trace).toEqual(["first:start"]);

    releaseFirst();
    await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
    expect(trace).toEqual(["first:start", "first:end", "second:start"]);
  });

  it("exposes the running operation name inside its async context only", async () => {
    const guard = new OperationGuard();

    const seen = await guard.run("redeem", async () => {
      await Promise.resolve();
      return guard.current();
    });

    expect(seen).toBe("redeem");
    expect(guard.current()).toBeUndefined();
  });

  it("rejects a nested call with ReentrancyError", async () => {
    const guard = new OperationGuard();

    const outer = guard.run("claim", () =>
      guard.run("withdraw", async () => "never")
    );

    await expect(outer).rejects.toMatchObject({
      name: "ReentrancyError",
      code: "REENTRANT_CALL",
      operation: "withdraw",
      activeOperation: "claim",
    });
  });

  it("does not stall the queue after a failure", async () => {
    const guard = new OperationGuard();

    const failing = guard.run("mint", async () => {
      throw new Error("boom");
    });
    const next = guard.run("mint", async () => "ok");

    await expect(failing).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ok");
  });

  it("holds a read until the operation queued before it has finished", async () => {
    const guard = new OperationGuard();
    const trace: string[] = [];
    let release: () => void = () => undefined;
    const blocked = new Promise<void>((resolve) => {
      release = resolve;
    });

    const operation = guard.run("claim", async () => {
      await blocked;
      trace.push("claim:end");
    });
    const read = guard.read("totalAssets", async () => {
      trace.push("read");
      return guard.current();
    });

    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(trace).toEqual([]);

    release();
    await operation;
    await expect(read).resolves.toBeUndefined();
    expect(trace).toEqual(["claim:end", "read"]);
  });

  it("rejects a read issued from inside an operation", async () => {
    const guard = new OperationGuard();

    const outer = guard.run("deposit", () =>
      guard.read("previewDeposit", async () => 0n)
    );

    await expect(outer).rejects.toMatchObject({
      code: "REENTRANT_CALL",
      operation: "previewDeposit",
      activeOperation: "deposit",
    });
  });
});
