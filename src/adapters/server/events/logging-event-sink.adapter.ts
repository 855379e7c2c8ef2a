// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/events/logging-event-sink`
 * Purpose: VaultEventSink that writes domain events as structured log lines.
 * Scope: Maps each VaultEvent to its registered event name. Does not persist or publish events elsewhere.
 * Invariants: One log line per event; token amounts logged as decimal strings.
 * Side-effects: IO (logging)
 * Links: src/ports/vault-events.port.ts, src/shared/observability/events/index.ts
 * @public
 */

import type { VaultEvent, VaultEventSink } from "@/ports";
import {
  EVENT_NAMES,
  type EventName,
  type Logger,
  logEvent,
} from "@/shared/observability";

const EVENT_NAME_BY_TYPE: Record<VaultEvent["type"], EventName> = {
  Claimed: EVENT_NAMES.VAULT_CLAIMED,
  ConfigUpdated: EVENT_NAMES.VAULT_CONFIG_UPDATED,
  Deposit: EVENT_NAMES.VAULT_DEPOSITED,
  Withdraw: EVENT_NAMES.VAULT_WITHDRAWN,
};

export class LoggingVaultEventSink implements VaultEventSink {
  constructor(private readonly logger: Logger) {}

  emit(event: VaultEvent, context: { opId: string }): void {
    const { type, ...fields } = event;
    logEvent(this.logger, EVENT_NAME_BY_TYPE[type], {
      opId: context.opId,
      ...fields,
    });
  }
}
