// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/ledger/in-memory-reward-pool`
 * Purpose: Staking reward pool over the in-memory ledger: 1:1 staking, accrued primary rewards, secondary rewards minted on the emission curve.
 * Scope: Pool bookkeeping and an EmissionSupplyReader for its secondary token. Does not model reward rates over time; rewards are credited explicitly via accrue().
 * Invariants:
 * - Staked amounts are held by the pool address on the ledger.
 * - Accrued primary rewards are fully backed by primary tokens held by the pool.
 * - Secondary mints on getReward follow mintableSecondary with the live supply; mintExternal() is the only off-curve mint.
 * - Registered with the ledger, so pool state rolls back with it.
 * Side-effects: none (process memory only)
 * Links: src/ports/reward-pool.port.ts, packages/vault-core/src/emission.ts
 * @public
 */

import {
  assertUint256,
  type EmissionParams,
  mintableSecondary,
} from "@compounder/vault-core";
import type { Address } from "viem";

import type {
  Checkpointable,
  EmissionSupplyReader,
  RewardPoolPort,
} from "@/ports";

import type { InMemoryLedger } from "./in-memory-ledger";

export interface InMemoryRewardPoolParams {
  /** Ledger account holding staked assets and unpaid rewards */
  address: Address;
  stakingToken: Address;
  primaryRewardToken: Address;
  secondaryRewardToken: Address | null;
  emission: EmissionParams;
}

export class InMemoryRewardPool implements Checkpointable {
  private stakes = new Map<Address, bigint>();
  private rewards = new Map<Address, bigint>();
  private minterMinted = 0n;

  constructor(
    private readonly ledger: InMemoryLedger,
    private readonly params: InMemoryRewardPoolParams
  ) {
    ledger.register(this);
  }

  get address(): Address {
    return this.params.address;
  }

  async balanceOf(account: Address): Promise<bigint> {
    return this.stakes.get(account) ?? 0n;
  }

  async earned(account: Address): Promise<bigint> {
    return this.rewards.get(account) ?? 0n;
  }

  /** Credit `amount` of primary reward to `account`, minted into the pool */
  async accrue(account: Address, amount: bigint): Promise<void> {
    assertUint256(amount, "accrued reward");
    await this.ledger.mint(this.params.primaryRewardToken, this.params.address, amount);
    this.rewards.set(account, (this.rewards.get(account) ?? 0n) + amount);
  }

  /** Off-curve secondary mint (counted as externally minted) */
  async mintExternal(to: Address, amount: bigint): Promise<void> {
    const token = this.requireSecondary();
    await this.ledger.mint(token, to, amount);
    this.minterMinted += amount;
  }

  async deposit(
    account: Address,
    amount: bigint,
    onBehalfOf: Address
  ): Promise<bigint> {
    assertUint256(amount, "deposit amount");
    if (amount === 0n) {
      throw new Error("[InMemoryRewardPool] Cannot stake 0");
    }
    await this.ledger.transfer({
      token: this.params.stakingToken,
      from: account,
      to: this.params.address,
      amount,
    });
    this.stakes.set(onBehalfOf, (this.stakes.get(onBehalfOf) ?? 0n) + amount);
    return amount;
  }

  async withdraw(
    account: Address,
    amount: bigint,
    claimExtras: boolean
  ): Promise<void> {
    assertUint256(amount, "withdraw amount");
    const staked = this.stakes.get(account) ?? 0n;
    if (staked < amount) {
      throw new Error(
        `[InMemoryRewardPool] Withdraw of ${amount} exceeds stake ${staked} for ${account}`
      );
    }
    this.stakes.set(account, staked - amount);
    await this.ledger.transfer({
      token: this.params.stakingToken,
      from: this.params.address,
      to: account,
      amount,
    });
    if (claimExtras) {
      await this.getReward(account);
    }
  }

  async getReward(account: Address): Promise<void> {
    const amount = this.rewards.get(account) ?? 0n;
    if (amount === 0n) return;

    this.rewards.set(account, 0n);
    await this.ledger.transfer({
      token: this.params.primaryRewardToken,
      from: this.params.address,
      to: account,
      amount,
    });

    const secondary = this.params.secondaryRewardToken;
    if (secondary === null) return;
    const mintable = mintableSecondary(
      amount,
      await this.ledger.totalSupply(secondary),
      this.params.emission,
      this.minterMinted
    );
    await this.ledger.mint(secondary, account, mintable);
  }

  /** A RewardPoolPort acting as `account` */
  connect(account: Address): RewardPoolPort {
    return {
      balanceOf: (who) => this.balanceOf(who),
      earned: (who) => this.earned(who),
      deposit: (amount, onBehalfOf) => this.deposit(account, amount, onBehalfOf),
      withdraw: (amount, claimExtras) =>
        this.withdraw(account, amount, claimExtras),
      getReward: () => this.getReward(account),
    };
  }

  /** Supply figures of the secondary token as the emission curve sees them */
  emissionSupply(): EmissionSupplyReader {
    const token = this.requireSecondary();
    return {
      totalSupply: () => this.ledger.totalSupply(token),
      externallyMinted: async () => this.minterMinted,
    };
  }

  checkpoint(): () => void {
    const stakes = new Map(this.stakes);
    const rewards = new Map(this.rewards);
    const minterMinted = this.minterMinted;
    return () => {
      this.stakes = stakes;
      this.rewards = rewards;
      this.minterMinted = minterMinted;
    };
  }

  private requireSecondary(): Address {
    if (this.params.secondaryRewardToken === null) {
      throw new Error("[InMemoryRewardPool] Pool has no secondary reward token");
    }
    return this.params.secondaryRewardToken;
  }
}
