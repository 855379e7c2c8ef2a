// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/vault/services/vaultConfigStore`
 * Purpose: Holds the current incentive configuration and applies admin replacements.
 * Scope: Authorization, validation and whole-record replacement. Does not emit events; the vault facade does.
 * Invariants:
 * - The stored record is frozen and replaced in a single assignment; readers never see a partial update.
 * - Authorization and validation both run before the assignment.
 * - Bounds and the admin set are fixed at construction.
 * Side-effects: none (process memory only)
 * Links: packages/vault-core/src/config.ts
 * @public
 */

import {
  AuthorizationError,
  type IncentiveBounds,
  initialVaultConfig,
  nextVaultConfig,
  type VaultConfig,
  type VaultConfigInput,
  validateIncentiveBounds,
} from "@compounder/vault-core";
import type { Address } from "viem";

import type { Checkpointable } from "@/ports";

export class VaultConfigStore implements Checkpointable {
  private current: VaultConfig = initialVaultConfig();
  private readonly bounds: IncentiveBounds;
  private readonly admins: ReadonlySet<string>;

  constructor(params: {
    bounds: IncentiveBounds;
    admins: readonly Address[];
    /** Seeds the store as version 1 (deployments whose config was already set) */
    initial?: VaultConfigInput | undefined;
  }) {
    this.bounds = validateIncentiveBounds(params.bounds);
    this.admins = new Set(params.admins.map((admin) => admin.toLowerCase()));
    if (params.initial) {
      this.current = nextVaultConfig(this.current, params.initial, this.bounds);
    }
  }

  get(): VaultConfig {
    return this.current;
  }

  getBounds(): IncentiveBounds {
    return this.bounds;
  }

  isAdmin(caller: Address): boolean {
    return this.admins.has(caller.toLowerCase());
  }

  /**
   * Replace the whole record.
   * @throws AuthorizationError when caller is not an admin
   * @throws ConfigurationError when a rate exceeds its bound or the payout address is null
   */
  replace(caller: Address, input: VaultConfigInput): VaultConfig {
    if (!this.isAdmin(caller)) {
      throw new AuthorizationError(caller, "setConfig");
    }
    const next = nextVaultConfig(this.current, input, this.bounds);
    this.current = next;
    return next;
  }

  checkpoint(): () => void {
    const snapshot = this.current;
    return () => {
      this.current = snapshot;
    };
  }
}
