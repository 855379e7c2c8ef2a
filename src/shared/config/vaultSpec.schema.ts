// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/config/vaultSpec.schema`
 * Purpose: Zod schemas and derived types for .vault/vault-spec.yaml validation.
 * Scope: Defines the deployment description (addresses, emission schedule, bounds, admins, price feeds); validates structure at runtime; does not perform I/O or business logic.
 * Invariants: Addresses are checksummed on parse; token amounts are decimal strings (YAML numbers lose precision past 2^53).
 * Side-effects: none
 * Links: .vault/vault-spec.yaml
 * @public
 */

import { type Address, getAddress, isAddress } from "viem";
import { z } from "zod";

const evmAddress = z
  .string()
  .trim()
  .refine((value) => isAddress(value, { strict: false }), {
    message: "Must be a valid EVM address (0x + 40 hex chars)",
  })
  .transform((value): Address => getAddress(value));

/** Unsigned integer amount written as a decimal string */
const uintString = z
  .string()
  .regex(/^\d+$/, "Must be a non-negative integer in decimal notation")
  .transform((value) => BigInt(value));

const bps = z.number().int().min(0).max(10_000);

export const priceFeedSpecSchema = z.object({
  /** Token whose USD price the feed reports */
  token: evmAddress,
  /** AggregatorV3-compatible feed contract */
  feed: evmAddress,
  /** Reject answers older than this many seconds */
  max_age_seconds: z.number().int().positive(),
});

export type PriceFeedSpec = z.infer<typeof priceFeedSpecSchema>;

export const vaultSpecSchema = z.object({
  /**
   * Chain ID as string or number (YAML flexibility).
   * Must match `@shared/web3` CHAIN_ID after conversion to number.
   */
  chain_id: z.union([z.string(), z.number()]),

  vault: z.object({
    address: evmAddress,
    asset: evmAddress,
    reward_pool: evmAddress,
    primary_reward_token: evmAddress,
    /** Omit or null when the pool pays a single reward stream */
    secondary_reward_token: evmAddress.nullish(),
    claim_extras_on_withdraw: z.boolean().default(true),
  }),

  emission: z.object({
    initial_mint_amount: uintString,
    total_cliffs: uintString,
    reduction_per_cliff: uintString,
    max_emission_supply: uintString,
  }),

  /** Immutable upper bounds on the configurable incentive rates */
  incentive_bounds: z.object({
    max_claimer_incentive_bps: bps,
    max_locker_incentive_bps: bps,
  }),

  admins: z.array(evmAddress).min(1, "At least one admin is required"),

  /**
   * Incentive configuration already set on the deployed vault.
   * Read-only views use it; omit for a fresh vault (all zero).
   */
  config: z
    .object({
      claimer_incentive_bps: bps,
      locker_incentive_bps: bps,
      locker_rewards_address: evmAddress,
    })
    .optional(),

  price_feeds: z.array(priceFeedSpecSchema).default([]),
});

export type VaultSpec = z.infer<typeof vaultSpecSchema>;
