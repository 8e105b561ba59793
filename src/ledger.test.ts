import { describe, it, expect } from "vitest";
import { InMemoryLedger } from "./ledger";
import { longAssetId, LP_ASSET_ID } from "./asset-id";
import { ValidationError } from "./errors";

const ALICE = "0x00000000000000000000000000000000000A11cE";
const BOB = "0x0000000000000000000000000000000000000B0b";
const LONG = longAssetId(86_400n);

describe("InMemoryLedger", () => {
  it("should track balances and supply per asset", () => {
    const ledger = new InMemoryLedger();
    ledger.mint(LONG, ALICE, 10n);
    ledger.mint(LONG, BOB, 5n);
    ledger.mint(LP_ASSET_ID, ALICE, 7n);

    expect(ledger.balanceOf(LONG, ALICE)).toBe(10n);
    expect(ledger.totalSupply(LONG)).toBe(15n);
    expect(ledger.totalSupply(LP_ASSET_ID)).toBe(7n);

    ledger.burn(LONG, ALICE, 4n);
    expect(ledger.balanceOf(LONG, ALICE)).toBe(6n);
    expect(ledger.totalSupply(LONG)).toBe(11n);
  });

  it("should treat addresses case-insensitively", () => {
    const ledger = new InMemoryLedger();
    ledger.mint(LONG, ALICE, 10n);
    expect(ledger.balanceOf(LONG, ALICE.toLowerCase())).toBe(10n);
  });

  it("should reject burning more than the balance", () => {
    const ledger = new InMemoryLedger();
    ledger.mint(LONG, ALICE, 1n);
    expect(() => ledger.burn(LONG, ALICE, 2n)).toThrow(ValidationError);
    expect(() => ledger.burn(LONG, ALICE, 2n)).toThrow(
      expect.objectContaining({ code: "InsufficientBalance" })
    );
  });

  it("should transfer positions without changing supply", () => {
    const ledger = new InMemoryLedger();
    ledger.mint(LONG, ALICE, 10n);
    ledger.transfer(LONG, ALICE, BOB, 3n);
    expect(ledger.balanceOf(LONG, ALICE)).toBe(7n);
    expect(ledger.balanceOf(LONG, BOB)).toBe(3n);
    expect(ledger.totalSupply(LONG)).toBe(10n);
  });

  it("should restore a snapshot", () => {
    const ledger = new InMemoryLedger();
    ledger.mint(LONG, ALICE, 10n);
    const restore = ledger.snapshot();
    ledger.burn(LONG, ALICE, 10n);
    ledger.mint(LP_ASSET_ID, BOB, 1n);
    restore();
    expect(ledger.balanceOf(LONG, ALICE)).toBe(10n);
    expect(ledger.totalSupply(LONG)).toBe(10n);
    expect(ledger.totalSupply(LP_ASSET_ID)).toBe(0n);
  });
});
