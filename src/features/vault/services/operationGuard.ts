// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/vault/services/operationGuard`
 * Purpose: Serialise vault operations and views, and reject re-entry.
 * Scope: FIFO queue plus an AsyncLocalStorage marker for the running operation. Does not roll anything back; the atomic executor does.
 * Invariants:
 * - At most one operation runs at a time; queued operations start in call order.
 * - A view queues behind every operation called before it, so it never observes a half-applied operation.
 * - A call made from inside a running operation's async context (operation or view) fails with ReentrancyError instead of queueing (it would deadlock).
 * - A failed operation does not block the queue.
 * Side-effects: none
 * @internal
 */

import { AsyncLocalStorage } from "node:async_hooks";

import { ReentrancyError } from "@compounder/vault-core";

export class OperationGuard {
  private readonly active = new AsyncLocalStorage<string>();
  private tail: Promise<void> = Promise.resolve();

  /** Name of the operation whose async context we are in, if any */
  current(): string | undefined {
    return this.active.getStore();
  }

  run<T>(operation: string, work: () => Promise<T>): Promise<T> {
    return this.enqueue(operation, () => this.active.run(operation, work));
  }

  /** Consistent read: waits for earlier operations, runs outside any operation context */
  read<T>(view: string, work: () => Promise<T>): Promise<T> {
    return this.enqueue(view, work);
  }

  private enqueue<T>(name: string, work: () => Promise<T>): Promise<T> {
    const activeOperation = this.current();
    if (activeOperation !== undefined) {
      return Promise.reject(new ReentrancyError(name, activeOperation));
    }

    const result = this.tail.then(work);
    // Queue position only; the caller still observes the rejection via `result`
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
