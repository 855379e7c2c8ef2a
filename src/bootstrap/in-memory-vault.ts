// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/in-memory-vault`
 * Purpose: Assemble a complete CompoundingVault over the in-process ledger and reward pool.
 * Scope: Wiring only; the caller supplies the price oracle. Does not configure prices or balances beyond the secondary token's initial mint.
 * Invariants: Ledger, pool and config store share one atomic unit; the pool port is bound to the vault account.
 * Side-effects: none (process memory only)
 * Links: src/adapters/server/ledger/in-memory-ledger.ts, src/features/vault/compoundingVault.ts
 * @public
 */

import type { VaultConfigInput, VaultDeployment } from "@compounder/vault-core";
import type { Address } from "viem";

import {
  InMemoryLedger,
  InMemoryRewardPool,
  LoggingVaultEventSink,
} from "@/adapters/server";
import { CompoundingVault } from "@/features/vault/public";
import type { PriceOracle, VaultEventSink } from "@/ports";
import { type Logger, makeNoopLogger } from "@/shared/observability";

export interface InMemoryVaultOptions {
  deployment: VaultDeployment;
  logger?: Logger;
  /** Defaults to logging events through `logger` */
  events?: VaultEventSink;
  oracle: PriceOracle;
  initialConfig?: VaultConfigInput;
  /** Receives the secondary token's initial mint; defaults to the first admin */
  treasury?: Address;
}

export interface InMemoryVault {
  vault: CompoundingVault;
  ledger: InMemoryLedger;
  pool: InMemoryRewardPool;
  oracle: PriceOracle;
}

export async function createInMemoryVault(
  options: InMemoryVaultOptions
): Promise<InMemoryVault> {
  const { deployment, oracle } = options;
  const logger = options.logger ?? makeNoopLogger();

  const ledger = new InMemoryLedger();
  const pool = new InMemoryRewardPool(ledger, {
    address: deployment.rewardPool,
    stakingToken: deployment.asset,
    primaryRewardToken: deployment.primaryRewardToken,
    secondaryRewardToken: deployment.secondaryRewardToken,
    emission: deployment.emission,
  });

  if (deployment.secondaryRewardToken !== null) {
    await ledger.mint(
      deployment.secondaryRewardToken,
      options.treasury ?? deployment.admins[0] ?? deployment.vault,
      deployment.emission.initialMintAmount
    );
  }

  const vault = new CompoundingVault({
    deployment,
    ledger,
    atomic: ledger,
    rewardPool: pool.connect(deployment.vault),
    oracle,
    emissionSupply:
      deployment.secondaryRewardToken === null ? null : pool.emissionSupply(),
    events: options.events ?? new LoggingVaultEventSink(logger),
    logger,
    initialConfig: options.initialConfig,
  });

  return { vault, ledger, pool, oracle };
}
