import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import {
  AssetKind,
  encodeAssetId,
  decodeAssetId,
  longAssetId,
  shortAssetId,
  LP_ASSET_ID,
  WITHDRAWAL_SHARE_ASSET_ID,
} from "./asset-id";
import { ASSET_ID_TIMESTAMP_MASK } from "./constants";
import { ValidationError } from "./errors";

const timestampArb = fc.bigInt(0n, ASSET_ID_TIMESTAMP_MASK);

describe("Asset Ids", () => {
  it("should put the kind in the top byte", () => {
    expect(longAssetId(1_735_689_600n)).toBe((1n << 248n) | 1_735_689_600n);
    expect(shortAssetId(1_735_689_600n)).toBe((2n << 248n) | 1_735_689_600n);
    expect(LP_ASSET_ID).toBe(0n);
    expect(WITHDRAWAL_SHARE_ASSET_ID).toBe(3n << 248n);
  });

  it("should round-trip positions with a maturity", () => {
    fc.assert(
      fc.property(fc.constantFrom(AssetKind.Long, AssetKind.Short), timestampArb, (kind, timestamp) => {
        expect(decodeAssetId(encodeAssetId(kind, timestamp))).toEqual({ kind, timestamp });
      })
    );
  });

  it("should round-trip timeless positions", () => {
    expect(decodeAssetId(LP_ASSET_ID)).toEqual({ kind: AssetKind.LP, timestamp: 0n });
    expect(decodeAssetId(WITHDRAWAL_SHARE_ASSET_ID)).toEqual({
      kind: AssetKind.WithdrawalShare,
      timestamp: 0n,
    });
  });

  it("should reject unknown kind tags", () => {
    fc.assert(
      fc.property(fc.bigInt(4n, 255n), timestampArb, (tag, timestamp) => {
        expect(() => decodeAssetId((tag << 248n) | timestamp)).toThrow(ValidationError);
      })
    );
    const unknownKind: number = 7;
    expect(() => encodeAssetId(unknownKind, 0n)).toThrow(expect.objectContaining({ code: "InvalidAssetId" }));
  });

  it("should reject ids outside uint256", () => {
    expect(() => decodeAssetId(-1n)).toThrow(expect.objectContaining({ code: "InvalidAssetId" }));
    expect(() => decodeAssetId(1n << 256n)).toThrow(expect.objectContaining({ code: "InvalidAssetId" }));
  });

  it("should reject timestamps that do not fit", () => {
    expect(() => longAssetId(ASSET_ID_TIMESTAMP_MASK + 1n)).toThrow(
      expect.objectContaining({ code: "InvalidTimestamp" })
    );
    expect(() => longAssetId(-1n)).toThrow(expect.objectContaining({ code: "InvalidTimestamp" }));
  });

  it("should reject timeless ids carrying a timestamp", () => {
    expect(() => encodeAssetId(AssetKind.LP, 1n)).toThrow(expect.objectContaining({ code: "InvalidTimestamp" }));
    expect(() => decodeAssetId(WITHDRAWAL_SHARE_ASSET_ID | 5n)).toThrow(
      expect.objectContaining({ code: "InvalidAssetId" })
    );
  });
});
