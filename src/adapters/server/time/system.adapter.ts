// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/time/system`
 * Purpose: System clock for feed staleness checks in production wiring.
 * Scope: Reads wall-clock time. Does not correct for drift against the chain's block time.
 * Invariants: nowSeconds() truncates toward the past.
 * Side-effects: IO (reads system time)
 * Links: Implements Clock port
 * @internal
 */

import type { Clock } from "@/ports";

export class SystemClock implements Clock {
  now(): string {
    return new Date().toISOString();
  }

  nowSeconds(): bigint {
    return BigInt(Math.floor(Date.now() / 1000));
  }
}
