// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server`
 * Purpose: Hex entry file for server adapters - canonical import surface.
 * Scope: Re-exports only public server adapter implementations with named exports. Does not export test doubles or internal utilities.
 * Invariants: Named exports only, no export *, runtime implementations
 * Side-effects: none (at import time - adapters have runtime effects when instantiated)
 * Links: Used by bootstrap layer for DI container assembly
 * @public
 */

export { LoggingVaultEventSink } from "./events/logging-event-sink.adapter";
export {
  InMemoryLedger,
  InsufficientBalanceError,
  isInsufficientBalanceError,
  type TransferHook,
} from "./ledger/in-memory-ledger";
export {
  InMemoryRewardPool,
  type InMemoryRewardPoolParams,
} from "./ledger/in-memory-reward-pool.adapter";
export { ViemEvmOnchainClient } from "./onchain/viem-evm-onchain-client.adapter";
export {
  normalisePrice,
  ViemPriceOracleAdapter,
} from "./onchain/viem-price-oracle.adapter";
export { ViemRewardPoolReader } from "./onchain/viem-reward-pool.adapter";
export {
  ViemEmissionSupplyReader,
  ViemTokenReader,
} from "./onchain/viem-token-reader.adapter";
export { SystemClock } from "./time/system.adapter";
