// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/onchain/viem-price-oracle`
 * Purpose: PriceOracle backed by AggregatorV3 price feeds, one feed per token.
 * Scope: Reads latestRoundData and decimals through EvmOnchainClient; normalises to 18-decimal USD. Does not cache quotes.
 * Invariants:
 * - Unknown token, non-positive answer or an answer older than the feed's max age throws; no fallback price.
 * - Feed decimals above 18 are scaled down with truncation.
 * Side-effects: IO (RPC via EvmOnchainClient), logging on stale feeds
 * Links: src/ports/price-oracle.port.ts, .vault/vault-spec.yaml price_feeds
 * @public
 */

import { PRICE_DECIMALS } from "@compounder/vault-core";
import { type Address, getAddress } from "viem";

import type { Clock, PriceOracle } from "@/ports";
import type { PriceFeedTable } from "@/shared/config";
import { EVENT_NAMES, makeLogger } from "@/shared/observability";
import type { EvmOnchainClient } from "@/shared/web3";

const logger = makeLogger({ component: "ViemPriceOracleAdapter" });

/** Scale an integer with `decimals` places to PRICE_DECIMALS places */
export function normalisePrice(answer: bigint, decimals: number): bigint {
  if (decimals === PRICE_DECIMALS) return answer;
  if (decimals < PRICE_DECIMALS) {
    return answer * 10n ** BigInt(PRICE_DECIMALS - decimals);
  }
  return answer / 10n ** BigInt(decimals - PRICE_DECIMALS);
}

export class ViemPriceOracleAdapter implements PriceOracle {
  private readonly decimalsCache = new Map<Address, number>();

  constructor(
    private readonly client: EvmOnchainClient,
    private readonly feeds: PriceFeedTable,
    private readonly clock: Clock
  ) {}

  async price(token: Address): Promise<bigint> {
    const checksummed = getAddress(token);
    const entry = this.feeds.get(checksummed);
    if (!entry) {
      throw new Error(
        `[ViemPriceOracleAdapter] No price feed configured for token ${checksummed}`
      );
    }

    const round = await this.client.getLatestRoundData(entry.feed);
    if (round.answer <= 0n) {
      logger.error(
        {
          event: EVENT_NAMES.ADAPTER_PRICE_ORACLE_ERROR,
          token: checksummed,
          feed: entry.feed,
          answer: round.answer.toString(),
        },
        EVENT_NAMES.ADAPTER_PRICE_ORACLE_ERROR
      );
      throw new Error(
        `[ViemPriceOracleAdapter] Feed ${entry.feed} returned non-positive answer ${round.answer}`
      );
    }

    const ageSeconds = this.clock.nowSeconds() - round.updatedAt;
    if (ageSeconds > BigInt(entry.maxAgeSeconds)) {
      logger.warn(
        {
          event: EVENT_NAMES.ADAPTER_PRICE_ORACLE_STALE_FEED,
          token: checksummed,
          feed: entry.feed,
          ageSeconds: Number(ageSeconds),
          maxAgeSeconds: entry.maxAgeSeconds,
        },
        EVENT_NAMES.ADAPTER_PRICE_ORACLE_STALE_FEED
      );
      throw new Error(
        `[ViemPriceOracleAdapter] Feed ${entry.feed} is stale: updated ${ageSeconds}s ago, max ${entry.maxAgeSeconds}s`
      );
    }

    return normalisePrice(round.answer, await this.feedDecimals(entry.feed));
  }

  private async feedDecimals(feed: Address): Promise<number> {
    const cached = this.decimalsCache.get(feed);
    if (cached !== undefined) return cached;
    const decimals = await this.client.getPriceFeedDecimals(feed);
    this.decimalsCache.set(feed, decimals);
    return decimals;
  }
}
