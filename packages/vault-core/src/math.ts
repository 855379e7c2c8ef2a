// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@compounder/vault-core/math`
 * Purpose: Unsigned 256-bit integer helpers over BigInt.
 * Scope: Pure functions. Does not perform I/O.
 * Invariants:
 * - Every value entering or leaving these helpers is within [0, UINT256_MAX]; anything else is a PrecisionError.
 * - Division truncates toward zero unless "ceil" rounding is requested.
 * - Division by zero is a PrecisionError, never 0 or Infinity.
 * Side-effects: none
 * @public
 */

import { PrecisionError } from "./errors";

export const UINT256_MAX = (1n << 256n) - 1n;

export type Rounding = "floor" | "ceil";

/**
 * Assert that a value fits the unsigned 256-bit domain.
 * @returns the value, for inline use
 */
export function assertUint256(value: bigint, label: string): bigint {
  if (value < 0n) {
    throw new PrecisionError(`${label} underflows uint256: ${value}`);
  }
  if (value > UINT256_MAX) {
    throw new PrecisionError(`${label} overflows uint256`);
  }
  return value;
}

/** a - b, failing instead of going negative */
export function checkedSub(a: bigint, b: bigint, label: string): bigint {
  return assertUint256(a - b, label);
}

/**
 * floor(a * b / d) or ceil(a * b / d) with every intermediate checked.
 */
export function mulDiv(
  a: bigint,
  b: bigint,
  d: bigint,
  rounding: Rounding = "floor"
): bigint {
  assertUint256(a, "mulDiv operand");
  assertUint256(b, "mulDiv operand");
  if (d === 0n) {
    throw new PrecisionError("mulDiv division by zero");
  }
  assertUint256(d, "mulDiv divisor");

  const product = assertUint256(a * b, "mulDiv product");
  const quotient = product / d;
  if (rounding === "ceil" && product % d !== 0n) {
    return quotient + 1n;
  }
  return quotient;
}
