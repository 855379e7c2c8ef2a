// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/ledger/in-memory-ledger`
 * Purpose: Single-writer token ledger that also provides the atomic unit of work for vault operations.
 * Scope: Balances, supplies, transfers, mint and burn for any token address; checkpoint/restore of every registered participant. Does not model approvals or gas.
 * Invariants:
 * - Balances and supplies stay within [0, UINT256_MAX]; sum of balances of a token equals its supply.
 * - A failed runAtomic restores the ledger and every registered participant to the state at entry.
 * - The transfer log only ever contains committed or in-flight transfers; rollback trims it and clearTransfers empties it.
 * Side-effects: none (process memory only)
 * Links: src/ports/token-ledger.port.ts, src/ports/atomic-executor.port.ts
 * @public
 */

import { assertUint256 } from "@compounder/vault-core";
import type { Address } from "viem";

import type {
  AtomicExecutor,
  Checkpointable,
  TokenLedgerPort,
  TokenTransfer,
} from "@/ports";

export class InsufficientBalanceError extends Error {
  public readonly code = "INSUFFICIENT_BALANCE" as const;

  constructor(
    public readonly token: Address,
    public readonly account: Address,
    public readonly balance: bigint,
    public readonly requested: bigint
  ) {
    super(
      `Insufficient balance of ${token} for ${account}: has ${balance}, needs ${requested}`
    );
    this.name = "InsufficientBalanceError";
  }
}

export function isInsufficientBalanceError(
  error: unknown
): error is InsufficientBalanceError {
  return error instanceof Error && error.name === "InsufficientBalanceError";
}

/**
 * Called after every non-zero transfer, inside the same unit of work.
 * Models tokens that call back into the recipient.
 */
export type TransferHook = (transfer: TokenTransfer) => Promise<void>;

const balanceKey = (token: Address, account: Address): string =>
  `${token.toLowerCase()}:${account.toLowerCase()}`;

const supplyKey = (token: Address): string => token.toLowerCase();

export class InMemoryLedger
  implements TokenLedgerPort, AtomicExecutor, Checkpointable
{
  private balances = new Map<string, bigint>();
  private supplies = new Map<string, bigint>();
  private log: TokenTransfer[] = [];
  private readonly participants: Checkpointable[] = [this];
  private transferHook: TransferHook | null = null;

  /** Add state that must roll back together with the ledger */
  register(participant: Checkpointable): void {
    if (!this.participants.includes(participant)) {
      this.participants.push(participant);
    }
  }

  setTransferHook(hook: TransferHook | null): void {
    this.transferHook = hook;
  }

  /** Transfers applied since the last clear (rolled-back ones excluded) */
  transfers(): readonly TokenTransfer[] {
    return [...this.log];
  }

  /** Drop the transfer log; balances and supplies are untouched. Returns how many entries were dropped. */
  clearTransfers(): number {
    const dropped = this.log.length;
    this.log = [];
    return dropped;
  }

  async balanceOf(token: Address, account: Address): Promise<bigint> {
    return this.balances.get(balanceKey(token, account)) ?? 0n;
  }

  async totalSupply(token: Address): Promise<bigint> {
    return this.supplies.get(supplyKey(token)) ?? 0n;
  }

  async transfer(transfer: TokenTransfer): Promise<void> {
    const { token, from, to, amount } = transfer;
    assertUint256(amount, "transfer amount");
    if (amount === 0n) return;

    const fromKey = balanceKey(token, from);
    const fromBalance = this.balances.get(fromKey) ?? 0n;
    if (fromBalance < amount) {
      throw new InsufficientBalanceError(token, from, fromBalance, amount);
    }

    const toKey = balanceKey(token, to);
    this.balances.set(fromKey, fromBalance - amount);
    this.balances.set(toKey, (this.balances.get(toKey) ?? 0n) + amount);
    this.log.push(Object.freeze({ ...transfer }));

    if (this.transferHook) {
      await this.transferHook(transfer);
    }
  }

  async mint(token: Address, to: Address, amount: bigint): Promise<void> {
    assertUint256(amount, "mint amount");
    if (amount === 0n) return;

    const supply = assertUint256(
      (this.supplies.get(supplyKey(token)) ?? 0n) + amount,
      "token supply"
    );
    const key = balanceKey(token, to);
    this.supplies.set(supplyKey(token), supply);
    this.balances.set(key, (this.balances.get(key) ?? 0n) + amount);
  }

  async burn(token: Address, from: Address, amount: bigint): Promise<void> {
    assertUint256(amount, "burn amount");
    if (amount === 0n) return;

    const key = balanceKey(token, from);
    const balance = this.balances.get(key) ?? 0n;
    if (balance < amount) {
      throw new InsufficientBalanceError(token, from, balance, amount);
    }
    this.balances.set(key, balance - amount);
    this.supplies.set(
      supplyKey(token),
      (this.supplies.get(supplyKey(token)) ?? 0n) - amount
    );
  }

  checkpoint(): () => void {
    const balances = new Map(this.balances);
    const supplies = new Map(this.supplies);
    const logLength = this.log.length;
    return () => {
      this.balances = balances;
      this.supplies = supplies;
      this.log = this.log.slice(0, logLength);
    };
  }

  async runAtomic<T>(
    work: () => Promise<T>,
    participants: readonly Checkpointable[] = []
  ): Promise<T> {
    const restores = [...this.participants, ...participants].map(
      (participant) => participant.checkpoint()
    );
    try {
      return await work();
    } catch (error) {
      for (const restore of restores.reverse()) {
        restore();
      }
      throw error;
    }
  }
}
