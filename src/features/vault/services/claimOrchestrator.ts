// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/vault/services/claimOrchestrator`
 * Purpose: One claim cycle: pull rewards, split them, collect the caller's payment, re-stake it, pay out the cuts.
 * Scope: Fixed step order over injected ports. Does not open the atomic unit or serialise callers; the vault facade does both.
 * Invariants:
 * - Steps run in order PullRewards, ComputeSplit, SlippageCheck, CollectPayment, Compound, Distribute, Emit.
 * - Nothing leaves the caller before the slippage check passes.
 * - Zero-amount transfers are skipped; a non-zero locker cut needs a non-zero locker address.
 * - The Claimed event is the last effect.
 * Side-effects: IO (via ports)
 * Links: packages/vault-core/src/incentives.ts, packages/vault-core/src/emission.ts
 * @public
 */

import {
  assertUint256,
  ConfigurationError,
  computeIncentiveSplit,
  SlippageError,
  toVaultAddress,
  type VaultConfig,
  type VaultDeployment,
} from "@compounder/vault-core";
import { zeroAddress } from "viem";

import type {
  EmissionSupplyReader,
  PriceOracle,
  RewardPoolPort,
  TokenLedgerPort,
  TokenTransfer,
  VaultEventSink,
} from "@/ports";

import type { ClaimReceipt, ClaimRequest } from "../types";
import { callExternal } from "./externalCall";
import { estimateSecondary, quoteRewards } from "./vaultLens";

export interface ClaimDeps {
  deployment: VaultDeployment;
  rewardPool: RewardPoolPort;
  ledger: TokenLedgerPort;
  oracle: PriceOracle;
  emissionSupply: EmissionSupplyReader | null;
  events: VaultEventSink;
  /** Snapshot taken when the operation started */
  config: VaultConfig;
  opId: string;
}

function transfer(ledger: TokenLedgerPort, move: TokenTransfer): Promise<void> {
  if (move.amount === 0n) {
    return Promise.resolve();
  }
  return callExternal("token", "transfer", () => ledger.transfer(move));
}

export async function executeClaim(
  deps: ClaimDeps,
  request: ClaimRequest
): Promise<ClaimReceipt> {
  const { deployment, rewardPool, ledger, config } = deps;
  const vault = deployment.vault;
  const caller = toVaultAddress(request.caller, "caller");
  assertUint256(request.primaryAmount, "primaryAmount");
  assertUint256(request.maxAssetAmountIn, "maxAssetAmountIn");
  if (request.secondaryAmount !== undefined) {
    assertUint256(request.secondaryAmount, "secondaryAmount");
  }

  // 1. PullRewards
  await callExternal("reward-pool", "getReward", () => rewardPool.getReward());

  // 2. ComputeSplit
  const secondaryAmount =
    request.secondaryAmount ??
    (await estimateSecondary(
      deployment,
      deps.emissionSupply,
      request.primaryAmount
    ));
  if (deployment.secondaryRewardToken === null && secondaryAmount > 0n) {
    throw new ConfigurationError(
      "Vault has no secondary reward token but a secondary amount was claimed",
      "secondaryAmount"
    );
  }

  const { assetPriceUsd, rewards } = await quoteRewards(
    deployment,
    deps.oracle,
    { primary: request.primaryAmount, secondary: secondaryAmount }
  );
  const split = computeIncentiveSplit({ rewards, assetPriceUsd, config });

  const lockerOwed = split.cuts.some((cut) => cut.lockerCut > 0n);
  if (lockerOwed && config.lockerRewardsAddress === zeroAddress) {
    throw new ConfigurationError(
      "Locker cut is owed but lockerRewardsAddress is not set",
      "lockerRewardsAddress"
    );
  }

  // 3. SlippageCheck
  if (split.amountToCompound > request.maxAssetAmountIn) {
    throw new SlippageError(split.amountToCompound, request.maxAssetAmountIn);
  }

  // 4. CollectPayment
  await transfer(ledger, {
    token: deployment.asset,
    from: caller,
    to: vault,
    amount: split.amountToCompound,
  });

  // 5. Compound
  if (split.amountToCompound > 0n) {
    await callExternal("reward-pool", "deposit", () =>
      rewardPool.deposit(split.amountToCompound, vault)
    );
  }

  // 6. Distribute
  for (const cut of split.cuts) {
    await transfer(ledger, {
      token: cut.token,
      from: vault,
      to: config.lockerRewardsAddress,
      amount: cut.lockerCut,
    });
    await transfer(ledger, {
      token: cut.token,
      from: vault,
      to: caller,
      amount: cut.callerCut,
    });
  }

  // 7. Emit
  deps.events.emit(
    {
      type: "Claimed",
      caller,
      primaryAmount: request.primaryAmount,
      secondaryAmount,
      compoundedAmount: split.amountToCompound,
    },
    { opId: deps.opId }
  );

  return {
    opId: deps.opId,
    amountPaidIn: split.amountToCompound,
    primaryAmount: request.primaryAmount,
    secondaryAmount,
    split,
  };
}
