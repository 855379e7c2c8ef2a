// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/token-ledger`
 * Purpose: Token balance reads and the transfer primitive used by the vault.
 * Scope: Interface only. Approvals are not modelled; the ledger decides who may move funds.
 * Invariants: A transfer either moves exactly `amount` or throws; it never reports a soft failure.
 * Side-effects: none (interface definition only)
 * Links: src/adapters/server/ledger/in-memory-ledger.ts, src/adapters/server/onchain/viem-token-reader.adapter.ts
 * @public
 */

import type { Address } from "viem";

export interface TokenTransfer {
  readonly token: Address;
  readonly from: Address;
  readonly to: Address;
  readonly amount: bigint;
}

export interface TokenReader {
  balanceOf(token: Address, account: Address): Promise<bigint>;
  totalSupply(token: Address): Promise<bigint>;
}

export interface TokenLedgerPort extends TokenReader {
  transfer(transfer: TokenTransfer): Promise<void>;
  /** Issue new units; the vault uses this for its own share token only */
  mint(token: Address, to: Address, amount: bigint): Promise<void>;
  burn(token: Address, from: Address, amount: bigint): Promise<void>;
}
