import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { ONE } from "./constants";
import { CurveError } from "./errors";
import {
  calculateInvariant,
  calculateBondsOutGivenSharesIn,
  calculateSharesOutGivenBondsIn,
  calculateSharesInGivenBondsOut,
  calculateBondsInGivenSharesOut,
  calculateOutGivenIn,
  calculateInGivenOut,
  calculateSpotPrice,
  calculateMaxBuy,
  calculateMaxSell,
} from "./yield-space";

// 5% pool: 1000 shares, LP supply 1000, stretch for a 5% rate
const Z = 1000n * ONE;
const ADJ = 1000n * ONE;
const Y = 1996118033880151421000n;
const S = 44463125629060298n;

describe("YieldSpace", () => {
  describe("Constant-Product Limit (s * t = 1)", () => {
    const z = 100n * ONE;
    const y = 100n * ONE;

    it("should price bonds in against the closed-form solve", () => {
      // z' = ceil(z * y / (y + dy)) = 90909090909090909091
      expect(calculateSharesOutGivenBondsIn(z, y, ONE, ONE, ONE, 10n * ONE)).toBe(9090909090909090909n);
      expect(calculateOutGivenIn(z, y, 0n, 10n * ONE, ONE, ONE, ONE, ONE, false)).toBe(
        9090909090909090909n
      );
    });

    it("should price shares in symmetrically", () => {
      expect(calculateBondsOutGivenSharesIn(z, y, ONE, ONE, ONE, 10n * ONE)).toBe(9090909090909090909n);
    });

    it("should round amounts in up", () => {
      // z' = ceil(100 * 100 / 90) = 111111111111111111112
      expect(calculateSharesInGivenBondsOut(z, y, ONE, ONE, ONE, 10n * ONE)).toBe(11111111111111111112n);
      expect(calculateBondsInGivenSharesOut(z, y, ONE, ONE, ONE, 10n * ONE)).toBe(11111111111111111112n);
    });

    it("should quote a unit spot price at equal reserves", () => {
      expect(calculateSpotPrice(z, y, 0n, ONE, ONE)).toBe(ONE);
    });

    it("should have no maximum trade", () => {
      expect(() => calculateMaxBuy(z, y, 0n, ONE, ONE, ONE, ONE)).toThrow(CurveError);
      expect(() => calculateMaxSell(z, y, 0n, ONE, ONE, ONE, ONE, ONE)).toThrow(CurveError);
    });
  });

  describe("Invariant", () => {
    it("should bracket the invariant by rounding direction", () => {
      const down = calculateInvariant(Z, Y + ADJ, ONE, ONE, S, false);
      const up = calculateInvariant(Z, Y + ADJ, ONE, ONE, S, true);
      expect(up).toBeGreaterThanOrEqual(down);
    });

    it("should reject a time stretch above one", () => {
      expect(() => calculateInvariant(Z, Y, ONE, ONE, ONE + 1n)).toThrow(
        expect.objectContaining({ code: "Underflow" })
      );
    });
  });

  describe("Trades", () => {
    it("should match reference outputs", () => {
      expect(calculateOutGivenIn(Z, Y, ADJ, 10n * ONE, ONE, S, ONE, ONE, true)).toBe(10496855194053387825n);
      expect(calculateOutGivenIn(Z, Y, ADJ, 10n * ONE, ONE, S, ONE, ONE, false)).toBe(9521081638877662781n);
      expect(calculateInGivenOut(Z, Y, ADJ, 10n * ONE, ONE, S, ONE, ONE, true)).toBe(9526527984872871839n);
    });

    it("should quote the pool's rate", () => {
      expect(calculateSpotPrice(Z, Y, ADJ, S, ONE)).toBe(952380952380952381n);
    });

    it("should pay at least one bond per share at a positive rate", () => {
      const bonds = calculateOutGivenIn(Z, Y, ADJ, 10n * ONE, ONE, S, ONE, ONE, true);
      expect(bonds).toBeGreaterThan(10n * ONE);
    });

    it("should reject trades that exhaust a reserve", () => {
      expect(() => calculateSharesInGivenBondsOut(Z, Y, ONE, ONE, S, Y)).toThrow(CurveError);
      expect(() => calculateBondsInGivenSharesOut(Z, Y, ONE, ONE, S, Z)).toThrow(CurveError);
    });

    it("should reject a purchase past the curve's limit", () => {
      const { sharesIn } = calculateMaxBuy(Z, Y, ADJ, ONE, S, ONE, ONE);
      expect(() =>
        calculateOutGivenIn(Z, Y, ADJ, sharesIn * 5n, ONE, S, ONE, ONE, true)
      ).toThrow(CurveError);
    });
  });

  describe("Limits", () => {
    it("should size the maximum buy to a unit price", () => {
      const { sharesIn, bondsOut } = calculateMaxBuy(Z, Y, ADJ, ONE, S, ONE, ONE);
      expect(sharesIn).toBeGreaterThan(0n);
      expect(bondsOut).toBeGreaterThan(sharesIn);
    });

    it("should size the maximum sell to the minimum reserves", () => {
      const maxSell = calculateMaxSell(Z, Y, ADJ, ONE, S, ONE, ONE, 10n * ONE);
      const sharesOut = calculateOutGivenIn(Z, Y, ADJ, maxSell, ONE, S, ONE, ONE, false);
      expect(Z - sharesOut).toBeGreaterThanOrEqual(10n * ONE);
    });
  });

  describe("Properties", () => {
    const amountArb = fc.bigInt(ONE / 1000n, 100n * ONE);

    it("should increase output strictly with input", () => {
      fc.assert(
        fc.property(amountArb, fc.bigInt(ONE / 1000n, 10n * ONE), fc.boolean(), (amount, extra, isBondOut) => {
          const smaller = calculateOutGivenIn(Z, Y, ADJ, amount, ONE, S, ONE, ONE, isBondOut);
          const larger = calculateOutGivenIn(Z, Y, ADJ, amount + extra, ONE, S, ONE, ONE, isBondOut);
          expect(larger).toBeGreaterThan(smaller);
        })
      );
    });

    it("should invert a trade in the other direction", () => {
      fc.assert(
        fc.property(amountArb, (shares) => {
          const bonds = calculateOutGivenIn(Z, Y, ADJ, shares, ONE, S, ONE, ONE, true);
          const sharesBack = calculateInGivenOut(Z, Y, ADJ, bonds, ONE, S, ONE, ONE, true);
          const diff = sharesBack > shares ? sharesBack - shares : shares - sharesBack;
          expect(diff).toBeLessThanOrEqual(shares / 10n ** 10n + 10n ** 6n);
        })
      );
    });

    it("should invert a sale of bonds", () => {
      fc.assert(
        fc.property(amountArb, (bonds) => {
          const shares = calculateOutGivenIn(Z, Y, ADJ, bonds, ONE, S, ONE, ONE, false);
          const bondsBack = calculateInGivenOut(Z, Y, ADJ, shares, ONE, S, ONE, ONE, false);
          const diff = bondsBack > bonds ? bondsBack - bonds : bonds - bondsBack;
          expect(diff).toBeLessThanOrEqual(bonds / 10n ** 10n + 10n ** 6n);
        })
      );
    });
  });
});
