// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/emission-supply`
 * Purpose: Live supply figures the secondary-token emission curve depends on.
 * Scope: Interface only.
 * Invariants: externallyMinted() is the supply minted outside the emission schedule; it is read, never assumed zero.
 * Side-effects: none (interface definition only)
 * @public
 */

export interface EmissionSupplyReader {
  totalSupply(): Promise<bigint>;
  externallyMinted(): Promise<bigint>;
}
