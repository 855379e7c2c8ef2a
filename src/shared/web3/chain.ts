// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/web3/chain`
 * Purpose: Canonical blockchain network configuration for the vault deployment.
 * Scope: Exports the viem chain object and its id; does not perform network calls. EVM-only.
 * Invariants: Single active chain per deployment; vault-spec chain_id must match CHAIN_ID or loading the spec fails.
 * Side-effects: none
 * Links: .vault/vault-spec.yaml
 * @public
 */

import { mainnet } from "viem/chains";

/** Viem chain object for the active network. */
export const CHAIN = mainnet;

/** Chain ID for the active network. Validated against vault-spec at load time. */
export const CHAIN_ID = CHAIN.id;
