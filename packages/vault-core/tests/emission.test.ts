// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@compounder/vault-core/tests/emission`
 * Purpose: Unit tests for the secondary-token emission curve.
 * Scope: Pure function testing. Does not test supply reads or I/O.
 * Invariants: Exhausted schedule mints 0; curve never increases as emissions grow; result never exceeds the remaining supply.
 * Side-effects: none
 * Links: packages/vault-core/src/emission.ts
 * @public
 */

import {
  ConfigurationError,
  type EmissionParams,
  emissionsMinted,
  mintableSecondary,
  PrecisionError,
  validateEmissionParams,
} from "@compounder/vault-core";
import { describe, expect, it } from "vitest";

const E18 = 10n ** 18n;

const PARAMS: EmissionParams = {
  initialMintAmount: 50_000_000n * E18, // 5e25
  totalCliffs: 500n,
  reductionPerCliff: 100_000n * E18, // 1e23
  maxEmissionSupply: 50_000_000n * E18, // 5e25
};

/** Total supply that puts emissionsMinted at `minted` */
function supplyAt(minted: bigint): bigint {
  return PARAMS.initialMintAmount + minted;
}

describe("core/vault/emission", () => {
  describe("mintableSecondary", () => {
    it("mints 1700/500 of the primary amount at cliff 100", () => {
      const minted = 100n * PARAMS.reductionPerCliff;
      const result = mintableSecondary(10n * E18, supplyAt(minted), PARAMS);
      expect(result).toBe(34n * E18);
    });

    it("mints 1950/500 of the primary amount before the first cliff", () => {
      const result = mintableSecondary(10n * E18, supplyAt(0n), PARAMS);
      expect(result).toBe(39n * E18);
    });

    it("applies the x5, /2, +700 steps in order with truncation", () => {
      const params: EmissionParams = {
        initialMintAmount: 0n,
        totalCliffs: 3n,
        reductionPerCliff: 1000n,
        maxEmissionSupply: 3000n,
      };
      // (3 * 5) / 2 + 700 = 707, not 3 * (5 / 2) + 700 = 706
      expect(mintableSecondary(3n, 0n, params)).toBe(707n);
    });

    it("truncates the 5/2 step in the last cliff", () => {
      const minted = 499n * PARAMS.reductionPerCliff;
      // reduction = 1 * 5 / 2 + 700 = 702
      const result = mintableSecondary(10n * E18, supplyAt(minted), PARAMS);
      expect(result).toBe(14_040_000_000_000_000_000n);
    });

    it("clamps to the supply remaining before the max", () => {
      const minted = PARAMS.maxEmissionSupply - E18;
      const result = mintableSecondary(1000n * E18, supplyAt(minted), PARAMS);
      expect(result).toBe(E18);
    });

    it("returns 0 once emissions reach the max supply", () => {
      const atMax = mintableSecondary(
        10n * E18,
        supplyAt(PARAMS.maxEmissionSupply),
        PARAMS
      );
      const beyond = mintableSecondary(
        10n * E18,
        supplyAt(PARAMS.maxEmissionSupply + 123n * E18),
        PARAMS
      );
      expect(atMax).toBe(0n);
      expect(beyond).toBe(0n);
    });

    it("returns 0 when the remaining supply is exhausted before the last cliff", () => {
      const params: EmissionParams = {
        initialMintAmount: 0n,
        totalCliffs: 10n,
        reductionPerCliff: 1000n,
        maxEmissionSupply: 500n,
      };
      expect(mintableSecondary(100n, 500n, params)).toBe(0n);
      expect(mintableSecondary(100n, 700n, params)).toBe(0n);
    });

    it("returns 0 for a zero primary amount", () => {
      expect(mintableSecondary(0n, supplyAt(0n), PARAMS)).toBe(0n);
    });

    it("never increases as emissions grow", () => {
      const primary = 7n * E18 + 3n;
      let previous = mintableSecondary(primary, supplyAt(0n), PARAMS);
      for (let step = 1n; step <= 520n; step += 1n) {
        const minted = step * (PARAMS.reductionPerCliff - 1n);
        const current = mintableSecondary(primary, supplyAt(minted), PARAMS);
        expect(current).toBeLessThanOrEqual(previous);
        previous = current;
      }
      expect(previous).toBe(0n);
    });

    it("subtracts externally minted supply before locating the cliff", () => {
      const external = 100n * PARAMS.reductionPerCliff;
      const supply = supplyAt(external);
      expect(mintableSecondary(10n * E18, supply, PARAMS, external)).toBe(
        39n * E18
      );
      expect(mintableSecondary(10n * E18, supply, PARAMS)).toBe(34n * E18);
    });

    it("fails loudly when supply is below the fixed mint amounts", () => {
      expect(() =>
        mintableSecondary(E18, PARAMS.initialMintAmount - 1n, PARAMS)
      ).toThrow(PrecisionError);
      expect(() =>
        mintableSecondary(E18, supplyAt(5n), PARAMS, 6n)
      ).toThrow(PrecisionError);
    });

    it("rejects a negative primary amount", () => {
      expect(() => mintableSecondary(-1n, supplyAt(0n), PARAMS)).toThrow(
        PrecisionError
      );
    });

    it("rejects operands outside uint256", () => {
      expect(() => mintableSecondary(1n << 256n, supplyAt(0n), PARAMS)).toThrow(
        PrecisionError
      );
    });
  });

  describe("emissionsMinted", () => {
    it("subtracts the initial mint and the external mint", () => {
      expect(emissionsMinted(supplyAt(42n), PARAMS, 2n)).toBe(40n);
    });
  });

  describe("validateEmissionParams", () => {
    it("accepts the standard schedule and freezes it", () => {
      const validated = validateEmissionParams(PARAMS);
      expect(validated).toEqual(PARAMS);
      expect(Object.isFrozen(validated)).toBe(true);
    });

    it("rejects a zero cliff count", () => {
      expect(() =>
        validateEmissionParams({ ...PARAMS, totalCliffs: 0n })
      ).toThrow(ConfigurationError);
    });

    it("rejects a zero cliff size", () => {
      expect(() =>
        validateEmissionParams({ ...PARAMS, reductionPerCliff: 0n })
      ).toThrow(ConfigurationError);
    });

    it("allows a zero initial mint", () => {
      expect(
        validateEmissionParams({ ...PARAMS, initialMintAmount: 0n })
          .initialMintAmount
      ).toBe(0n);
    });
  });
});
