// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/server/redact`
 * Purpose: Redaction paths for sensitive data in logs.
 * Scope: Define paths to redact from log output. Does not implement redaction logic.
 * Invariants: Only redact known secret-bearing keys; RPC URLs are redacted because providers embed API keys in them.
 * Side-effects: none
 * Links: Imported by logger module.
 * @public
 */

export const REDACT_PATHS = [
  // Auth & secrets
  "password",
  "token.secret",
  "secret",
  "apiKey",
  "api_key",
  // RPC endpoints carry provider keys
  "EVM_RPC_URL",
  "rpcUrl",
  // Wallet/crypto
  "privateKey",
  "mnemonic",
  "seed",
];
