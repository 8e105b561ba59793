/**
 * Property-Based Fuzz Tests
 *
 * Drives a live pool with random trades and checks the accounting
 * invariants that must hold whatever the sequence.
 */
import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { ONE, SECONDS_PER_DAY, SECONDS_PER_YEAR } from "./constants";
import { loadConfig } from "./config";
import { isAmmError } from "./errors";
import { InMemoryLedger } from "./ledger";
import { InMemoryToken } from "./token";
import { InMemoryYieldSource } from "./yield-source";
import { WITHDRAWAL_SHARE_ASSET_ID, longAssetId, shortAssetId } from "./asset-id";
import { Pool, type TradeOptions } from "./pool";

const POOL = "0x0000000000000000000000000000000000000001";
const VAULT = "0x0000000000000000000000000000000000000002";
const LP = "0x00000000000000000000000000000000000000a1";
const TRADER = "0x00000000000000000000000000000000000000b1";
const START = 19_700n * SECONDS_PER_DAY;
const MATURITY = START + SECONDS_PER_YEAR;

const options: TradeOptions = { destination: TRADER, asBase: true };

// ============================================================================
// Arbitrary Generators
// ============================================================================

// 0.01 to 50 tokens against 1000 tokens of liquidity
const tradeArb = fc.bigInt(ONE / 100n, 50n * ONE);

// 1% to 20% initial rate
const aprArb = fc.bigInt(ONE / 100n, ONE / 5n);

type Action = {
  kind: "openLong" | "openShort" | "mint" | "addLiquidity" | "removeLiquidity" | "redeem";
  amount: bigint;
};

const actionArb: fc.Arbitrary<Action> = fc.record({
  kind: fc.constantFrom<Action["kind"]>(
    "openLong",
    "openShort",
    "mint",
    "addLiquidity",
    "removeLiquidity",
    "redeem"
  ),
  amount: fc.bigInt(ONE, 20n * ONE),
});

const lpOptions: TradeOptions = { destination: LP, asBase: true };

function livePool(apr: bigint = ONE / 20n) {
  const base = new InMemoryToken("BASE");
  const shares = new InMemoryToken("vBASE");
  const yieldSource = new InMemoryYieldSource(base, shares, { custodian: POOL, vault: VAULT });
  const ledger = new InMemoryLedger();
  const clock = { now: START };
  const pool = new Pool(loadConfig({}).pool, {
    ledger,
    yieldSource,
    governance: LP,
    clock: () => clock.now,
  });
  base.mint(LP, 1000n * ONE);
  base.mint(TRADER, 10_000n * ONE);
  pool.initialize(LP, 1000n * ONE, apr, { destination: LP, asBase: true });
  return { pool, shares, ledger, clock };
}

/** Run `fn`, letting the pool refuse the trade */
function attempt(fn: () => void): void {
  try {
    fn();
  } catch (err) {
    if (!isAmmError(err)) throw err;
  }
}

// ============================================================================
// Round Trips
// ============================================================================

describe("Pool Fuzz Tests", () => {
  describe("Round Trips", () => {
    it("should never profit from opening and closing a long at once", () => {
      fc.assert(
        fc.property(tradeArb, aprArb, (amount, apr) => {
          const { pool } = livePool(apr);
          const { maturityTime, bondAmount } = pool.openLong(TRADER, amount, 0n, options);
          expect(bondAmount).toBeGreaterThanOrEqual(amount);
          const proceeds = pool.closeLong(TRADER, maturityTime, bondAmount, 0n, options);
          expect(proceeds).toBeLessThanOrEqual(amount);
        }),
        { numRuns: 100 }
      );
    });

    it("should never profit from opening and closing a short at once", () => {
      fc.assert(
        fc.property(tradeArb, aprArb, (bondAmount, apr) => {
          const { pool } = livePool(apr);
          const { maturityTime, deposit } = pool.openShort(TRADER, bondAmount, bondAmount, options);
          expect(deposit).toBeLessThanOrEqual(bondAmount);
          const proceeds = pool.closeShort(TRADER, maturityTime, bondAmount, 0n, options);
          expect(proceeds).toBeLessThanOrEqual(deposit);
        }),
        { numRuns: 100 }
      );
    });

    it("should never return more than was contributed as liquidity", () => {
      fc.assert(
        fc.property(tradeArb, (contribution) => {
          const { pool } = livePool();
          const lpShares = pool.addLiquidity(TRADER, contribution, 0n, options);
          const { proceeds, withdrawalShares } = pool.removeLiquidity(TRADER, lpShares, 0n, options);
          expect(proceeds).toBeLessThanOrEqual(contribution);
          expect(withdrawalShares).toBe(0n);
        }),
        { numRuns: 100 }
      );
    });
  });

  // ============================================================================
  // Accounting
  // ============================================================================

  describe("Accounting", () => {
    it("should hold exactly the reserves, fees and claims in vault shares", () => {
      fc.assert(
        fc.property(fc.array(actionArb, { minLength: 1, maxLength: 8 }), (actions) => {
          const { pool, shares, ledger, clock } = livePool();
          // Custody beyond the reserves, governance fees and ready withdrawals
          const unclaimed = () => {
            const state = pool.getPoolState();
            return (
              shares.balanceOf(POOL) -
              state.shareReserves -
              state.governanceFeesAccrued -
              state.withdrawalSharesProceeds
            );
          };
          const redeemAll = (holder: string) => {
            const balance = ledger.balanceOf(WITHDRAWAL_SHARE_ASSET_ID, holder);
            if (balance > 0n) {
              pool.redeemWithdrawalShares(holder, balance, 0n, { destination: holder, asBase: true });
            }
          };

          for (const { kind, amount } of actions) {
            attempt(() => {
              if (kind === "openLong") {
                pool.openLong(TRADER, amount, 0n, options);
              } else if (kind === "openShort") {
                pool.openShort(TRADER, amount, amount, options);
              } else if (kind === "mint") {
                pool.mint(TRADER, amount, 2n * amount, {
                  longDestination: TRADER,
                  shortDestination: TRADER,
                  asBase: true,
                });
              } else if (kind === "addLiquidity") {
                pool.addLiquidity(TRADER, amount, 0n, options);
              } else if (kind === "removeLiquidity") {
                pool.removeLiquidity(LP, 10n * amount, 0n, lpOptions);
              } else {
                redeemAll(LP);
              }
            });
            expect(unclaimed()).toBeGreaterThanOrEqual(0n);
          }

          // Settle every position and claim at maturity: only rounding may remain.
          clock.now = MATURITY;
          pool.checkpoint(MATURITY);
          const longs = ledger.balanceOf(longAssetId(MATURITY), TRADER);
          if (longs > 0n) pool.closeLong(TRADER, MATURITY, longs, 0n, options);
          const shorts = ledger.balanceOf(shortAssetId(MATURITY), TRADER);
          if (shorts > 0n) pool.closeShort(TRADER, MATURITY, shorts, 0n, options);
          redeemAll(LP);

          expect(unclaimed()).toBeGreaterThanOrEqual(0n);
          expect(unclaimed()).toBeLessThanOrEqual(100n);
          expect(pool.getPoolState().withdrawalSharesProceeds).toBe(0n);
        }),
        { numRuns: 50 }
      );
    });

    it("should keep open interest equal to the positions issued", () => {
      fc.assert(
        fc.property(fc.array(actionArb, { minLength: 1, maxLength: 8 }), (actions) => {
          const { pool } = livePool();
          let longs = 0n;
          let shorts = 0n;
          for (const { kind, amount } of actions) {
            attempt(() => {
              if (kind === "openLong") {
                longs += pool.openLong(TRADER, amount, 0n, options).bondAmount;
              } else if (kind === "openShort") {
                pool.openShort(TRADER, amount, amount, options);
                shorts += amount;
              } else {
                pool.mint(TRADER, amount, 2n * amount, {
                  longDestination: TRADER,
                  shortDestination: TRADER,
                  asBase: true,
                });
                longs += amount;
                shorts += amount;
              }
            });
          }
          const state = pool.getPoolState();
          expect(state.longsOutstanding).toBe(longs);
          expect(state.shortsOutstanding).toBe(shorts);
        }),
        { numRuns: 50 }
      );
    });
  });
});
