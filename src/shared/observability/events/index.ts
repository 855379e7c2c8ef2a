// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/events`
 * Purpose: Event name registry for structured logging - prevents ad-hoc strings and schema drift.
 * Scope: Define valid event names as const registry and the base fields every event carries. Does not define full payload schemas.
 * Invariants: All event names registered here; logEvent() enforces base fields (opId always).
 * Side-effects: none
 * Links: Used by logEvent(); consumed by vault features and adapters.
 * @public
 */

export const EVENT_NAMES = {
  // Vault Domain
  VAULT_CLAIMED: "vault.claimed",
  VAULT_CONFIG_UPDATED: "vault.config_updated",
  VAULT_DEPOSITED: "vault.deposited",
  VAULT_WITHDRAWN: "vault.withdrawn",
  VAULT_OPERATION_ABORTED: "vault.operation_aborted",
  VAULT_REWARD_PREVIEWED: "vault.reward_previewed",

  // Adapter Events
  ADAPTER_PRICE_ORACLE_STALE_FEED: "adapter.price_oracle.stale_feed",
  ADAPTER_PRICE_ORACLE_ERROR: "adapter.price_oracle.error",

  // Test Events
  TEST_EVENT: "TEST_EVENT",
} as const;

export type EventName = (typeof EVENT_NAMES)[keyof typeof EVENT_NAMES];

/**
 * Required base fields for all events.
 * opId identifies one vault operation (claim, deposit, setConfig, ...).
 */
export interface EventBase {
  opId: string;
}
