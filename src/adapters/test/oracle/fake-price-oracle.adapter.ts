// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/test/oracle/fake-price-oracle`
 * Purpose: Configurable PriceOracle for tests and APP_ENV=test wiring.
 * Scope: Fixed prices per token plus injectable failures. Does not make network calls.
 * Invariants: Unknown tokens throw, like the live adapter; prices are 18-decimal USD.
 * Side-effects: none (in-memory only)
 * Links: src/ports/price-oracle.port.ts
 * @public
 */

import { WAD } from "@compounder/vault-core";
import { type Address, getAddress } from "viem";

import type { PriceOracle } from "@/ports";

export class FakePriceOracle implements PriceOracle {
  private prices = new Map<Address, bigint>();
  private failure: Error | null = null;

  public priceCalls: Address[] = [];

  constructor(initial: Iterable<readonly [Address, bigint]> = []) {
    for (const [token, price] of initial) {
      this.setPrice(token, price);
    }
  }

  setPrice(token: Address, priceUsdWad: bigint): void {
    this.prices.set(getAddress(token), priceUsdWad);
  }

  /** Convenience: whole-dollar price */
  setPriceUsd(token: Address, dollars: bigint): void {
    this.setPrice(token, dollars * WAD);
  }

  /** Make every subsequent price() call reject with `error` (null clears) */
  failWith(error: Error | null): void {
    this.failure = error;
  }

  async price(token: Address): Promise<bigint> {
    this.priceCalls.push(token);
    if (this.failure) {
      throw this.failure;
    }
    const price = this.prices.get(getAddress(token));
    if (price === undefined) {
      throw new Error(`[FakePriceOracle] No price configured for ${token}`);
    }
    return price;
  }
}
