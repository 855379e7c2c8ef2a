// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/container`
 * Purpose: Dependency injection container for the composition root with environment-based adapter selection.
 * Scope: Wire adapters to ports for the read-only vault views. Does not hold per-operation state.
 * Invariants: Single container instance per process; APP_ENV=test never touches the network.
 * Side-effects: IO (initializes logger, reads the vault spec and emits a startup log on first access)
 * Notes: APP_ENV=test reads through FakeEvmOnchainClient (configurable from tests); production reads through viem.
 * Links: Used by src/bootstrap/jobs and src/scripts.
 * @public
 */

import {
  SystemClock,
  ViemEmissionSupplyReader,
  ViemEvmOnchainClient,
  ViemPriceOracleAdapter,
  ViemRewardPoolReader,
  ViemTokenReader,
} from "@/adapters/server";
import { getTestEvmOnchainClient } from "@/adapters/test";
import { VaultConfigStore, VaultLens } from "@/features/vault/public";
import type { Clock, PriceOracle } from "@/ports";
import { type LoadedVaultSpec, loadVaultSpec } from "@/shared/config";
import { serverEnv } from "@/shared/env";
import { type Logger, makeLogger } from "@/shared/observability";
import type { EvmOnchainClient } from "@/shared/web3";

/** Read-only views the container exposes, satisfied by VaultLens and CompoundingVault alike */
export type VaultViews = Pick<
  VaultLens,
  "previewReward" | "previewRewardBreakdown" | "totalAssets"
>;

export interface Container {
  log: Logger;
  clock: Clock;
  spec: LoadedVaultSpec;
  onchainClient: EvmOnchainClient;
  oracle: PriceOracle;
  views: VaultViews;
}

// Module-level singleton
let _container: Container | null = null;

/**
 * Get the singleton container instance.
 * Lazily initializes on first access.
 */
export function getContainer(): Container {
  if (!_container) {
    _container = createContainer();
  }
  return _container;
}

/**
 * Reset the singleton container.
 * For tests only - allows fresh container between test runs.
 */
export function resetContainer(): void {
  _container = null;
}

function createContainer(): Container {
  const env = serverEnv();
  const log = makeLogger({ service: env.SERVICE_NAME });
  const spec = loadVaultSpec(env.VAULT_SPEC_PATH);
  const { deployment } = spec;

  // Startup log - confirm config (no URLs/secrets)
  log.info(
    {
      env: env.APP_ENV,
      logLevel: env.PINO_LOG_LEVEL,
      chainId: spec.chainId,
      vault: deployment.vault,
      priceFeeds: spec.priceFeeds.size,
    },
    "container initialized"
  );

  // Environment-based adapter wiring - single source of truth
  const onchainClient: EvmOnchainClient = env.isTestMode
    ? getTestEvmOnchainClient()
    : new ViemEvmOnchainClient(env.EVM_RPC_URL);

  const clock = new SystemClock();
  const oracle = new ViemPriceOracleAdapter(
    onchainClient,
    spec.priceFeeds,
    clock
  );

  const configStore = new VaultConfigStore({
    bounds: deployment.bounds,
    admins: deployment.admins,
    initial: spec.initialConfig ?? undefined,
  });

  const views = new VaultLens({
    deployment,
    rewardPool: new ViemRewardPoolReader(onchainClient, deployment.rewardPool),
    tokens: new ViemTokenReader(onchainClient),
    oracle,
    emissionSupply:
      deployment.secondaryRewardToken === null
        ? null
        : new ViemEmissionSupplyReader(
            onchainClient,
            deployment.secondaryRewardToken
          ),
    config: () => configStore.get(),
  });

  return { log, clock, spec, onchainClient, oracle, views };
}
