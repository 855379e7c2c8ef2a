// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/price-oracle`
 * Purpose: Read-only USD price feed port.
 * Scope: Interface only. Does not cache quotes.
 * Invariants: Prices are USD with 18 decimals; unsupported tokens and stale feeds throw rather than return a default.
 * Side-effects: none (interface definition only)
 * Links: src/adapters/server/onchain/viem-price-oracle.adapter.ts
 * @public
 */

import type { Address } from "viem";

export interface PriceOracle {
  /**
   * Current USD price of one whole `token`, 18 decimals.
   * @throws when the token has no feed or the feed is stale
   */
  price(token: Address): Promise<bigint>;
}
