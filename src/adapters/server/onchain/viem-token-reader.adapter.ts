// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/onchain/viem-token-reader`
 * Purpose: ERC20 reads for the vault lens: balances and supply, plus the emission token's supply figures.
 * Scope: Implements TokenReader and EmissionSupplyReader via EvmOnchainClient. Does not transfer.
 * Side-effects: IO (RPC via EvmOnchainClient)
 * Links: src/ports/token-ledger.port.ts, src/ports/emission-supply.port.ts
 * @public
 */

import type { Address } from "viem";

import type { EmissionSupplyReader, TokenReader } from "@/ports";
import type { EvmOnchainClient } from "@/shared/web3";

export class ViemTokenReader implements TokenReader {
  constructor(private readonly client: EvmOnchainClient) {}

  balanceOf(token: Address, account: Address): Promise<bigint> {
    return this.client.getErc20Balance({
      tokenAddress: token,
      holderAddress: account,
    });
  }

  totalSupply(token: Address): Promise<bigint> {
    return this.client.getErc20TotalSupply(token);
  }
}

/** Supply of the secondary reward token and its off-curve mints (`minterMinted`) */
export class ViemEmissionSupplyReader implements EmissionSupplyReader {
  constructor(
    private readonly client: EvmOnchainClient,
    private readonly token: Address
  ) {}

  totalSupply(): Promise<bigint> {
    return this.client.getErc20TotalSupply(this.token);
  }

  externallyMinted(): Promise<bigint> {
    return this.client.getMinterMinted(this.token);
  }
}
