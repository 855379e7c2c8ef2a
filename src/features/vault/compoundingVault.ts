// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/vault/compoundingVault`
 * Purpose: Public face of one compounding vault: claim, configuration, share accounting and read views.
 * Scope: Wraps every mutating operation in the operation guard and one atomic unit; delegates claim to the orchestrator and reads to the lens. Does not implement pool or token behaviour.
 * Invariants:
 * - Mutating operations are serialised; re-entry fails with ReentrancyError.
 * - Public views queue behind pending operations and are rejected from inside one, so no caller sees a half-applied operation.
 * - A failed operation leaves ledger, pool and config exactly as before, is logged once as vault.operation_aborted, and rethrows.
 * - Vault shares are the ledger token at deployment.vault.
 * - withdraw/redeem act only on the caller's own shares.
 * Side-effects: IO (via ports), logging, metrics
 * Links: src/features/vault/services/claimOrchestrator.ts, src/features/vault/services/vaultLens.ts
 * @public
 */

import { randomUUID } from "node:crypto";

import {
  AuthorizationError,
  assertUint256,
  convertToAssets,
  convertToShares,
  type IncentiveBounds,
  InsufficientSharesError,
  isExternalCallFailure,
  isVaultDomainError,
  previewDeposit,
  previewMint,
  previewRedeem,
  previewWithdraw,
  type ShareTotals,
  toVaultAddress,
  type VaultConfig,
  type VaultConfigInput,
  type VaultDeployment,
} from "@compounder/vault-core";
import type { Address } from "viem";

import type {
  AtomicExecutor,
  EmissionSupplyReader,
  PriceOracle,
  RewardPoolPort,
  TokenLedgerPort,
  VaultEventSink,
} from "@/ports";
import {
  EVENT_NAMES,
  type Logger,
  logEvent,
  recordVaultOperation,
} from "@/shared/observability";

import { executeClaim } from "./services/claimOrchestrator";
import { callExternal } from "./services/externalCall";
import { OperationGuard } from "./services/operationGuard";
import { VaultConfigStore } from "./services/vaultConfigStore";
import { VaultLens } from "./services/vaultLens";
import type { ClaimReceipt, ClaimRequest, RewardPreview } from "./types";

export interface CompoundingVaultDeps {
  deployment: VaultDeployment;
  ledger: TokenLedgerPort;
  atomic: AtomicExecutor;
  /** Pool port bound to the vault account */
  rewardPool: RewardPoolPort;
  oracle: PriceOracle;
  emissionSupply: EmissionSupplyReader | null;
  events: VaultEventSink;
  logger: Logger;
  initialConfig?: VaultConfigInput | undefined;
}

type VaultOperation =
  | "claim"
  | "setConfig"
  | "deposit"
  | "mint"
  | "withdraw"
  | "redeem";

interface OperationContext {
  opId: string;
}

function describeFailure(error: unknown): Record<string, unknown> {
  if (isExternalCallFailure(error)) {
    return {
      errorCode: error.code,
      collaborator: error.collaborator,
      externalOperation: error.operation,
      errorMessage: error.message,
    };
  }
  if (isVaultDomainError(error)) {
    return { errorCode: error.code, errorMessage: error.message };
  }
  return {
    errorCode: "UNEXPECTED",
    errorMessage: error instanceof Error ? error.message : String(error),
  };
}

export class CompoundingVault {
  private readonly guard = new OperationGuard();
  private readonly configStore: VaultConfigStore;
  private readonly lens: VaultLens;

  constructor(private readonly deps: CompoundingVaultDeps) {
    this.configStore = new VaultConfigStore({
      bounds: deps.deployment.bounds,
      admins: deps.deployment.admins,
      initial: deps.initialConfig,
    });
    this.lens = new VaultLens({
      deployment: deps.deployment,
      rewardPool: deps.rewardPool,
      tokens: deps.ledger,
      oracle: deps.oracle,
      emissionSupply: deps.emissionSupply,
      config: () => this.configStore.get(),
    });
  }

  get deployment(): VaultDeployment {
    return this.deps.deployment;
  }

  // ---------------------------------------------------------------------------
  // Claim & configuration
  // ---------------------------------------------------------------------------

  /** Permissionless. Returns the amount paid in along with the split. */
  claim(request: ClaimRequest): Promise<ClaimReceipt> {
    return this.runOperation("claim", ({ opId }) =>
      executeClaim(
        {
          deployment: this.deps.deployment,
          rewardPool: this.deps.rewardPool,
          ledger: this.deps.ledger,
          oracle: this.deps.oracle,
          emissionSupply: this.deps.emissionSupply,
          events: this.deps.events,
          config: this.configStore.get(),
          opId,
        },
        request
      )
    );
  }

  /** Admin only. Replaces the whole record or leaves it untouched. */
  setConfig(caller: Address, input: VaultConfigInput): Promise<true> {
    return this.runOperation<true>("setConfig", async ({ opId }) => {
      const next = this.configStore.replace(caller, input);
      this.deps.events.emit(
        {
          type: "ConfigUpdated",
          caller,
          claimerIncentiveBps: next.claimerIncentiveBps,
          lockerIncentiveBps: next.lockerIncentiveBps,
          lockerRewardsAddress: next.lockerRewardsAddress,
          version: next.version,
        },
        { opId }
      );
      return true;
    });
  }

  getConfig(): VaultConfig {
    return this.configStore.get();
  }

  getBounds(): IncentiveBounds {
    return this.configStore.getBounds();
  }

  // ---------------------------------------------------------------------------
  // Views
  // ---------------------------------------------------------------------------

  previewReward(): Promise<bigint> {
    return this.guard.read("previewReward", () => this.lens.previewReward());
  }

  previewRewardBreakdown(): Promise<RewardPreview> {
    return this.guard.read("previewRewardBreakdown", () =>
      this.lens.previewRewardBreakdown()
    );
  }

  totalAssets(): Promise<bigint> {
    return this.guard.read("totalAssets", () => this.lens.totalAssets());
  }

  totalSupply(): Promise<bigint> {
    return this.guard.read("totalSupply", () => this.shareSupply());
  }

  balanceOf(account: Address): Promise<bigint> {
    return this.guard.read("balanceOf", () => this.shareBalance(account));
  }

  convertToShares(assets: bigint): Promise<bigint> {
    return this.guard.read("convertToShares", async () =>
      convertToShares(assets, await this.shareTotals())
    );
  }

  convertToAssets(shares: bigint): Promise<bigint> {
    return this.guard.read("convertToAssets", async () =>
      convertToAssets(shares, await this.shareTotals())
    );
  }

  previewDeposit(assets: bigint): Promise<bigint> {
    return this.guard.read("previewDeposit", async () =>
      previewDeposit(assets, await this.shareTotals())
    );
  }

  previewMint(shares: bigint): Promise<bigint> {
    return this.guard.read("previewMint", async () =>
      previewMint(shares, await this.shareTotals())
    );
  }

  previewWithdraw(assets: bigint): Promise<bigint> {
    return this.guard.read("previewWithdraw", async () =>
      previewWithdraw(assets, await this.shareTotals())
    );
  }

  previewRedeem(shares: bigint): Promise<bigint> {
    return this.guard.read("previewRedeem", async () =>
      previewRedeem(shares, await this.shareTotals())
    );
  }

  /** Capped by what the pool can return right now */
  maxWithdraw(owner: Address): Promise<bigint> {
    return this.guard.read("maxWithdraw", async () => {
      const [shares, staked, totals] = await Promise.all([
        this.shareBalance(owner),
        this.stakedAssets(),
        this.shareTotals(),
      ]);
      const owned = convertToAssets(shares, totals);
      return owned < staked ? owned : staked;
    });
  }

  maxRedeem(owner: Address): Promise<bigint> {
    return this.guard.read("maxRedeem", async () => {
      const [shares, staked, totals] = await Promise.all([
        this.shareBalance(owner),
        this.stakedAssets(),
        this.shareTotals(),
      ]);
      if (convertToAssets(shares, totals) <= staked) {
        return shares;
      }
      return convertToShares(staked, totals);
    });
  }

  // ---------------------------------------------------------------------------
  // Share accounting
  // ---------------------------------------------------------------------------

  deposit(assets: bigint, receiver: Address, caller: Address): Promise<bigint> {
    return this.runOperation("deposit", async (ctx) => {
      assertUint256(assets, "assets");
      const shares = previewDeposit(assets, await this.shareTotals());
      await this.enter(ctx, { assets, shares, receiver, caller });
      return shares;
    });
  }

  mint(shares: bigint, receiver: Address, caller: Address): Promise<bigint> {
    return this.runOperation("mint", async (ctx) => {
      assertUint256(shares, "shares");
      const assets = previewMint(shares, await this.shareTotals());
      await this.enter(ctx, { assets, shares, receiver, caller });
      return assets;
    });
  }

  withdraw(
    assets: bigint,
    receiver: Address,
    owner: Address,
    caller: Address
  ): Promise<bigint> {
    return this.runOperation("withdraw", async (ctx) => {
      assertUint256(assets, "assets");
      const shares = previewWithdraw(assets, await this.shareTotals());
      await this.exit(ctx, { assets, shares, receiver, owner, caller });
      return shares;
    });
  }

  redeem(
    shares: bigint,
    receiver: Address,
    owner: Address,
    caller: Address
  ): Promise<bigint> {
    return this.runOperation("redeem", async (ctx) => {
      assertUint256(shares, "shares");
      const assets = previewRedeem(shares, await this.shareTotals());
      await this.exit(ctx, { assets, shares, receiver, owner, caller });
      return assets;
    });
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private async enter(
    ctx: OperationContext,
    params: { assets: bigint; shares: bigint; receiver: Address; caller: Address }
  ): Promise<void> {
    const { vault, asset } = this.deps.deployment;
    const caller = toVaultAddress(params.caller, "caller");
    const receiver = toVaultAddress(params.receiver, "receiver");

    if (params.assets > 0n) {
      await callExternal("token", "transfer", () =>
        this.deps.ledger.transfer({
          token: asset,
          from: caller,
          to: vault,
          amount: params.assets,
        })
      );
      await callExternal("reward-pool", "deposit", () =>
        this.deps.rewardPool.deposit(params.assets, vault)
      );
    }
    await callExternal("token", "mint", () =>
      this.deps.ledger.mint(vault, receiver, params.shares)
    );

    this.deps.events.emit(
      {
        type: "Deposit",
        caller,
        owner: receiver,
        assets: params.assets,
        shares: params.shares,
      },
      { opId: ctx.opId }
    );
  }

  private async exit(
    ctx: OperationContext,
    params: {
      assets: bigint;
      shares: bigint;
      receiver: Address;
      owner: Address;
      caller: Address;
    }
  ): Promise<void> {
    const { vault, asset, claimExtrasOnWithdraw } = this.deps.deployment;
    const caller = toVaultAddress(params.caller, "caller");
    const owner = toVaultAddress(params.owner, "owner");
    const receiver = toVaultAddress(params.receiver, "receiver");

    if (owner !== caller) {
      throw new AuthorizationError(caller, "withdraw");
    }
    const available = await this.shareBalance(owner);
    if (params.shares > available) {
      throw new InsufficientSharesError(owner, params.shares, available);
    }

    await callExternal("token", "burn", () =>
      this.deps.ledger.burn(vault, owner, params.shares)
    );
    if (params.assets > 0n) {
      await callExternal("reward-pool", "withdraw", () =>
        this.deps.rewardPool.withdraw(params.assets, claimExtrasOnWithdraw)
      );
      await callExternal("token", "transfer", () =>
        this.deps.ledger.transfer({
          token: asset,
          from: vault,
          to: receiver,
          amount: params.assets,
        })
      );
    }

    this.deps.events.emit(
      {
        type: "Withdraw",
        caller,
        receiver,
        owner,
        assets: params.assets,
        shares: params.shares,
      },
      { opId: ctx.opId }
    );
  }

  private stakedAssets(): Promise<bigint> {
    const vault = this.deps.deployment.vault;
    return callExternal("reward-pool", "balanceOf", () =>
      this.deps.rewardPool.balanceOf(vault)
    );
  }

  private shareSupply(): Promise<bigint> {
    return this.deps.ledger.totalSupply(this.deps.deployment.vault);
  }

  private shareBalance(account: Address): Promise<bigint> {
    return this.deps.ledger.balanceOf(this.deps.deployment.vault, account);
  }

  private async shareTotals(): Promise<ShareTotals> {
    const [totalAssets, totalSupply] = await Promise.all([
      this.lens.totalAssets(),
      this.shareSupply(),
    ]);
    return { totalAssets, totalSupply };
  }

  private runOperation<T>(
    operation: VaultOperation,
    work: (ctx: OperationContext) => Promise<T>
  ): Promise<T> {
    return this.guard.run(operation, async () => {
      const opId = randomUUID();
      const log = this.deps.logger.child({ opId, operation });
      const startedAt = Date.now();

      try {
        const result = await this.deps.atomic.runAtomic(
          () => work({ opId }),
          [this.configStore]
        );
        recordVaultOperation(operation, "succeeded", Date.now() - startedAt);
        return result;
      } catch (error) {
        recordVaultOperation(operation, "aborted", Date.now() - startedAt);
        logEvent(log, EVENT_NAMES.VAULT_OPERATION_ABORTED, {
          opId,
          operation,
          ...describeFailure(error),
        });
        throw error;
      }
    });
  }
}
