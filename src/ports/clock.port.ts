// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/clock.port`
 * Purpose: Time abstraction for price-feed staleness checks.
 * Scope: Current time only. Does not handle timezones or date arithmetic.
 * Invariants: now() is ISO 8601; nowSeconds() is whole unix seconds of the same instant, the unit feeds report updatedAt in.
 * Side-effects: none (interface only)
 * Links: src/adapters/server/time/system.adapter.ts
 * @public
 */

export interface Clock {
  now(): string;
  nowSeconds(): bigint;
}
