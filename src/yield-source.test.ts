import { describe, it, expect } from "vitest";
import { ONE, RAY } from "./constants";
import { InMemoryToken } from "./token";
import { InMemoryYieldSource, IndexedYieldSource } from "./yield-source";

const POOL = "0x0000000000000000000000000000000000000001";
const VAULT = "0x0000000000000000000000000000000000000002";
const ALICE = "0x00000000000000000000000000000000000A11cE";

function setup() {
  const base = new InMemoryToken("BASE");
  const shares = new InMemoryToken("vBASE");
  const source = new InMemoryYieldSource(base, shares, { custodian: POOL, vault: VAULT });
  base.mint(ALICE, 1000n * ONE);
  return { base, shares, source };
}

describe("InMemoryToken", () => {
  it("should reject transfers above the balance", () => {
    const token = new InMemoryToken("BASE");
    token.mint(ALICE, 5n);
    expect(() => token.transfer(ALICE, POOL, 6n)).toThrow(
      expect.objectContaining({ code: "InsufficientBalance" })
    );
  });
});

describe("InMemoryYieldSource", () => {
  it("should issue shares one to one before interest", () => {
    const { base, shares, source } = setup();
    const { shares: issued, refund } = source.depositBase(ALICE, 100n * ONE);
    expect(issued).toBe(100n * ONE);
    expect(refund).toBe(0n);
    expect(shares.balanceOf(POOL)).toBe(100n * ONE);
    expect(base.balanceOf(VAULT)).toBe(100n * ONE);
    expect(source.vaultSharePrice()).toBe(ONE);
  });

  it("should raise the share price as interest accrues", () => {
    const { source } = setup();
    source.depositBase(ALICE, 100n * ONE);
    source.accrue(10n * ONE);
    expect(source.vaultSharePrice()).toBe(1_100000000000000000n);
    expect(source.convertToShares(11n * ONE)).toBe(10n * ONE);
  });

  it("should pay base out at the share price", () => {
    const { base, source } = setup();
    source.depositBase(ALICE, 100n * ONE);
    source.accrue(10n * ONE);
    expect(source.withdrawBase(10n * ONE, ALICE)).toBe(11n * ONE);
    expect(base.balanceOf(ALICE)).toBe(911n * ONE);
  });

  it("should move vault shares directly", () => {
    const { shares, source } = setup();
    source.depositBase(ALICE, 100n * ONE);
    source.withdrawShares(40n * ONE, ALICE);
    source.depositShares(ALICE, 15n * ONE);
    expect(shares.balanceOf(ALICE)).toBe(25n * ONE);
    expect(shares.balanceOf(POOL)).toBe(75n * ONE);
    expect(source.totalShares()).toBe(100n * ONE);
  });

  it("should reject empty deposits", () => {
    const { source } = setup();
    expect(() => source.depositBase(ALICE, 0n)).toThrow(expect.objectContaining({ code: "ZeroAmount" }));
    expect(() => source.depositShares(ALICE, 0n)).toThrow(expect.objectContaining({ code: "ZeroAmount" }));
  });

  it("should restore both tokens from a snapshot", () => {
    const { base, shares, source } = setup();
    const restore = source.snapshot();
    source.depositBase(ALICE, 100n * ONE);
    restore();
    expect(base.balanceOf(ALICE)).toBe(1000n * ONE);
    expect(shares.totalSupply()).toBe(0n);
  });
});

describe("IndexedYieldSource", () => {
  function indexed(rayIndex: bigint) {
    const base = new InMemoryToken("BASE");
    const shares = new InMemoryToken("aBASE");
    const source = new IndexedYieldSource(base, shares, { custodian: POOL, vault: VAULT, rayIndex });
    base.mint(ALICE, 1000n * ONE);
    return { base, shares, source };
  }

  it("should rescale the ray index to 18 decimals", () => {
    const { source } = indexed(1_050000000_000000000_000000000n);
    expect(source.vaultSharePrice()).toBe(1_050000000000000000n);
    expect(source.convertToBase(2n * ONE)).toBe(2_100000000000000000n);
  });

  it("should back a rising index with base", () => {
    const { base, source } = indexed(RAY);
    source.depositBase(ALICE, 100n * ONE);
    source.setIndex(1_100000000_000000000_000000000n);
    expect(base.balanceOf(VAULT)).toBe(110n * ONE);
    expect(source.withdrawBase(100n * ONE, ALICE)).toBe(110n * ONE);
  });

  it("should reject a falling index", () => {
    const { source } = indexed(2n * RAY);
    expect(() => source.setIndex(RAY)).toThrow(expect.objectContaining({ code: "InvalidConfig" }));
  });

  it("should restore the index from a snapshot", () => {
    const { source } = indexed(RAY);
    const restore = source.snapshot();
    source.setIndex(2n * RAY);
    restore();
    expect(source.vaultSharePrice()).toBe(ONE);
  });
});
