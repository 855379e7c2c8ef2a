// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/web3`
 * Purpose: Barrel export for web3 chain configuration and ABIs.
 * Scope: Re-exports chain constants and contract ABIs; does not contain runtime logic or side effects.
 * Side-effects: none
 * @public
 */

export * from "./chain";
export * from "./erc20-abi";
export type {
  EvmOnchainClient,
  PriceFeedRound,
} from "./onchain/evm-onchain-client.interface";
export * from "./vault-abis";
