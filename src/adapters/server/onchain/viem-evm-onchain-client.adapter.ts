// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/onchain/viem-evm-onchain-client`
 * Purpose: Production EVM on-chain client using viem for RPC reads.
 * Scope: Implements EvmOnchainClient with real view calls. Does not implement business logic.
 * Invariants: Requires EVM_RPC_URL on first call; all reads use the typed ABIs from `@shared/web3`.
 * Side-effects: IO (RPC calls to EVM node)
 * Notes: Used by the price oracle, reward pool, token and emission supply readers.
 * @public
 */

import {
  type Address,
  createPublicClient,
  http,
  type PublicClient,
} from "viem";

import { serverEnv } from "@/shared/env";
import {
  CHAIN,
  EMISSION_TOKEN_ABI,
  ERC20_ABI,
  type EvmOnchainClient,
  PRICE_FEED_ABI,
  type PriceFeedRound,
  REWARD_POOL_ABI,
} from "@/shared/web3";

/**
 * Production EVM on-chain client using viem.
 * Validates configuration lazily (on first method call) so the container can be built without EVM_RPC_URL.
 */
export class ViemEvmOnchainClient implements EvmOnchainClient {
  private client: PublicClient | null = null;

  constructor(private readonly rpcUrl?: string) {}

  private getClient(): PublicClient {
    if (this.client) {
      return this.client;
    }

    const rpcUrl = this.rpcUrl ?? serverEnv().EVM_RPC_URL;
    if (!rpcUrl) {
      throw new Error(
        "[ViemEvmOnchainClient] EVM_RPC_URL is required for on-chain reads. " +
          "Set it in your environment or use APP_ENV=test for in-memory adapters."
      );
    }

    this.client = createPublicClient({
      chain: CHAIN,
      transport: http(rpcUrl),
    });

    return this.client;
  }

  async getBlockNumber(): Promise<bigint> {
    return this.getClient().getBlockNumber();
  }

  async getErc20Balance(params: {
    tokenAddress: Address;
    holderAddress: Address;
  }): Promise<bigint> {
    return this.getClient().readContract({
      address: params.tokenAddress,
      abi: ERC20_ABI,
      functionName: "balanceOf",
      args: [params.holderAddress],
    });
  }

  async getErc20TotalSupply(tokenAddress: Address): Promise<bigint> {
    return this.getClient().readContract({
      address: tokenAddress,
      abi: ERC20_ABI,
      functionName: "totalSupply",
    });
  }

  async getPoolBalance(params: {
    poolAddress: Address;
    account: Address;
  }): Promise<bigint> {
    return this.getClient().readContract({
      address: params.poolAddress,
      abi: REWARD_POOL_ABI,
      functionName: "balanceOf",
      args: [params.account],
    });
  }

  async getPoolEarned(params: {
    poolAddress: Address;
    account: Address;
  }): Promise<bigint> {
    return this.getClient().readContract({
      address: params.poolAddress,
      abi: REWARD_POOL_ABI,
      functionName: "earned",
      args: [params.account],
    });
  }

  async getMinterMinted(tokenAddress: Address): Promise<bigint> {
    return this.getClient().readContract({
      address: tokenAddress,
      abi: EMISSION_TOKEN_ABI,
      functionName: "minterMinted",
    });
  }

  async getPriceFeedDecimals(feedAddress: Address): Promise<number> {
    return this.getClient().readContract({
      address: feedAddress,
      abi: PRICE_FEED_ABI,
      functionName: "decimals",
    });
  }

  async getLatestRoundData(feedAddress: Address): Promise<PriceFeedRound> {
    const [roundId, answer, startedAt, updatedAt, answeredInRound] =
      await this.getClient().readContract({
        address: feedAddress,
        abi: PRICE_FEED_ABI,
        functionName: "latestRoundData",
      });
    return { roundId, answer, startedAt, updatedAt, answeredInRound };
  }
}
