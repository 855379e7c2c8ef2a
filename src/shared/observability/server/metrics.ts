// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/server/metrics`
 * Purpose: Prometheus metrics registry and vault operation metrics.
 * Scope: Shared observability singleton. Provides metrics registry and recording helpers. Does not expose a scrape endpoint.
 * Invariants: Single registry per process via globalThis; labels always low-cardinality (operation name and outcome only, never addresses).
 * Side-effects: global (module-scoped registry via globalThis)
 * Notes: Uses getOrCreate pattern to prevent duplicate registration errors across test reloads.
 * @public
 */

import type { Counter, Histogram, Registry } from "prom-client";
import client from "prom-client";

// Singleton via globalThis to survive test reloads
const globalForMetrics = globalThis as typeof globalThis & {
  metricsRegistry?: Registry;
};

export const metricsRegistry: Registry =
  globalForMetrics.metricsRegistry ?? new client.Registry();

if (!globalForMetrics.metricsRegistry) {
  globalForMetrics.metricsRegistry = metricsRegistry;
  metricsRegistry.setDefaultLabels({ app: "compounding-vault" });
}

function getOrCreateCounter<T extends string>(
  name: string,
  help: string,
  labelNames: readonly T[]
): Counter<T> {
  const existing = metricsRegistry.getSingleMetric(name);
  if (existing) return existing as Counter<T>;
  return new client.Counter({
    name,
    help,
    labelNames,
    registers: [metricsRegistry],
  });
}

function getOrCreateHistogram<T extends string>(
  name: string,
  help: string,
  labelNames: readonly T[],
  buckets: number[]
): Histogram<T> {
  const existing = metricsRegistry.getSingleMetric(name);
  if (existing) return existing as Histogram<T>;
  return new client.Histogram({
    name,
    help,
    labelNames,
    buckets,
    registers: [metricsRegistry],
  });
}

export type VaultOperationOutcome = "succeeded" | "aborted";

export const vaultOperationsTotal = getOrCreateCounter(
  "vault_operations_total",
  "Vault operations by name and outcome",
  ["operation", "outcome"] as const
);

export const vaultOperationDurationMs = getOrCreateHistogram(
  "vault_operation_duration_ms",
  "Vault operation wall time in milliseconds",
  ["operation"] as const,
  [1, 5, 10, 25, 50, 100, 250, 500, 1000, 5000]
);

export function recordVaultOperation(
  operation: string,
  outcome: VaultOperationOutcome,
  durationMs: number
): void {
  vaultOperationsTotal.inc({ operation, outcome });
  vaultOperationDurationMs.observe({ operation }, durationMs);
}
