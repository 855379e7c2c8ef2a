// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/atomic-executor`
 * Purpose: Unit-of-work boundary for vault operations.
 * Scope: Interface only.
 * Invariants: If `work` throws, every balance and pool mutation made inside it is undone before the error propagates.
 * Side-effects: none (interface definition only)
 * Links: src/adapters/server/ledger/in-memory-ledger.ts
 * @public
 */

export interface AtomicExecutor {
  /**
   * Run `work` as one unit. `participants` join the executor's own registered
   * state for this unit only.
   */
  runAtomic<T>(
    work: () => Promise<T>,
    participants?: readonly Checkpointable[]
  ): Promise<T>;
}

/**
 * State that takes part in an atomic unit.
 * checkpoint() captures the current state and returns a function restoring it.
 */
export interface Checkpointable {
  checkpoint(): () => void;
}
