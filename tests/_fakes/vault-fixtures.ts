// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/_fakes/vault-fixtures`
 * Purpose: Shared addresses, deployment and a one-call builder for an in-memory vault under test.
 * Scope: Test wiring only. Does NOT assert anything.
 * Invariants: Emission schedule starts at cliff 0 (supply == initial mint); prices: asset $1, primary $2, secondary $1.
 * Side-effects: none
 * Links: src/bootstrap/in-memory-vault.ts
 * @public
 */

import {
  type VaultConfigInput,
  type VaultDeployment,
  WAD,
  validateVaultDeployment,
} from "@compounder/vault-core";
import type { Address } from "viem";

import { FakePriceOracle } from "@/adapters/test";
import { createInMemoryVault } from "@/bootstrap/in-memory-vault";

import { RecordingVaultEventSink } from "./recording-event-sink";

export const VAULT: Address = "0x1000000000000000000000000000000000000001";
export const ASSET: Address = "0x1000000000000000000000000000000000000002";
export const POOL: Address = "0x1000000000000000000000000000000000000003";
export const PRIMARY: Address = "0x1000000000000000000000000000000000000004";
export const SECONDARY: Address = "0x1000000000000000000000000000000000000005";
export const ADMIN: Address = "0x2000000000000000000000000000000000000001";
export const LOCKER: Address = "0x2000000000000000000000000000000000000002";
export const TREASURY: Address = "0x2000000000000000000000000000000000000003";
export const ALICE: Address = "0x4000000000000000000000000000000000000001";
export const BOB: Address = "0x4000000000000000000000000000000000000002";

export const INITIAL_MINT = 50_000_000n * WAD;

export const TEST_DEPLOYMENT: VaultDeployment = validateVaultDeployment({
  vault: VAULT,
  asset: ASSET,
  rewardPool: POOL,
  primaryRewardToken: PRIMARY,
  secondaryRewardToken: SECONDARY,
  emission: {
    initialMintAmount: INITIAL_MINT,
    totalCliffs: 500n,
    reductionPerCliff: 100_000n * WAD,
    maxEmissionSupply: INITIAL_MINT,
  },
  bounds: { maxClaimerIncentiveBps: 500, maxLockerIncentiveBps: 1000 },
  admins: [ADMIN],
  claimExtrasOnWithdraw: true,
});

/** claimer 500 bps, locker 1000 bps, paid to LOCKER */
export const TEST_CONFIG: VaultConfigInput = {
  claimerIncentiveBps: 500,
  lockerIncentiveBps: 1000,
  lockerRewardsAddress: LOCKER,
};

export interface TestVaultOptions {
  deployment?: Partial<VaultDeployment>;
  config?: VaultConfigInput;
}

export async function makeTestVault(options: TestVaultOptions = {}) {
  const deployment = validateVaultDeployment({
    ...TEST_DEPLOYMENT,
    ...options.deployment,
  });
  const oracle = new FakePriceOracle([
    [ASSET, WAD],
    [PRIMARY, 2n * WAD],
    [SECONDARY, WAD],
  ]);
  const events = new RecordingVaultEventSink();

  const { vault, ledger, pool } = await createInMemoryVault({
    deployment,
    oracle,
    events,
    treasury: TREASURY,
    ...(options.config ? { initialConfig: options.config } : {}),
  });

  return { vault, ledger, pool, oracle, events, deployment };
}

export type TestVault = Awaited<ReturnType<typeof makeTestVault>>;
