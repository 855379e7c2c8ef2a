// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/web3/onchain/evm-onchain-client.interface`
 * Purpose: Internal infra seam for EVM RPC reads (NOT a domain port).
 * Scope: Typed view calls the vault adapters need. Does not implement business logic or validation.
 * Invariants: All EVM adapters MUST use this interface (never call viem/RPC directly).
 * Side-effects: none (interface definition only)
 * Notes: Production uses ViemEvmOnchainClient; tests use FakeEvmOnchainClient.
 * @public
 */

import type { Address } from "viem";

/** AggregatorV3 `latestRoundData` tuple, named. */
export interface PriceFeedRound {
  roundId: bigint;
  answer: bigint;
  startedAt: bigint;
  /** Unix seconds */
  updatedAt: bigint;
  answeredInRound: bigint;
}

/**
 * EVM on-chain client interface for RPC reads.
 * Internal infrastructure seam - NOT a domain port.
 */
export interface EvmOnchainClient {
  getBlockNumber(): Promise<bigint>;

  getErc20Balance(params: {
    tokenAddress: Address;
    holderAddress: Address;
  }): Promise<bigint>;

  getErc20TotalSupply(tokenAddress: Address): Promise<bigint>;

  /** Staked balance of `account` in the reward pool. */
  getPoolBalance(params: {
    poolAddress: Address;
    account: Address;
  }): Promise<bigint>;

  /** Pending primary rewards of `account` in the reward pool. */
  getPoolEarned(params: {
    poolAddress: Address;
    account: Address;
  }): Promise<bigint>;

  /** Amount of the emission token minted outside the emission curve. */
  getMinterMinted(tokenAddress: Address): Promise<bigint>;

  getPriceFeedDecimals(feedAddress: Address): Promise<number>;

  getLatestRoundData(feedAddress: Address): Promise<PriceFeedRound>;
}
