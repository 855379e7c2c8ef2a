// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/onchain/viem-reward-pool`
 * Purpose: Read-only RewardPoolReader over a live staking pool.
 * Scope: balanceOf and earned via EvmOnchainClient. Does not submit transactions.
 * Invariants: Pool address fixed at construction.
 * Side-effects: IO (RPC via EvmOnchainClient)
 * Links: src/ports/reward-pool.port.ts
 * @public
 */

import type { Address } from "viem";

import type { RewardPoolReader } from "@/ports";
import type { EvmOnchainClient } from "@/shared/web3";

export class ViemRewardPoolReader implements RewardPoolReader {
  constructor(
    private readonly client: EvmOnchainClient,
    private readonly poolAddress: Address
  ) {}

  balanceOf(account: Address): Promise<bigint> {
    return this.client.getPoolBalance({ poolAddress: this.poolAddress, account });
  }

  earned(account: Address): Promise<bigint> {
    return this.client.getPoolEarned({ poolAddress: this.poolAddress, account });
  }
}
