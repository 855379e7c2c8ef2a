// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/server`
 * Purpose: Server-side logging and metrics utilities (pino, prom-client).
 * Scope: Logger factory, logEvent() wrapper and vault metrics. Does not define events.
 * Side-effects: IO (logging to stdout)
 * Links: Uses event registry from ../events
 * @public
 */

export { logEvent } from "./logEvent";
export type { Logger } from "./logger";
export { makeLogger, makeNoopLogger } from "./logger";
export {
  metricsRegistry,
  recordVaultOperation,
  type VaultOperationOutcome,
  vaultOperationDurationMs,
  vaultOperationsTotal,
} from "./metrics";
export { REDACT_PATHS } from "./redact";
