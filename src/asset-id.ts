/**
 * Position identifiers.
 *
 * An asset id packs a position kind and a maturity timestamp into a single
 * uint256: the kind tag in the top 8 bits, the timestamp in the low 248.
 */

import {
  ASSET_ID_TIMESTAMP_BITS,
  ASSET_ID_TIMESTAMP_MASK,
  MAX_UINT256,
} from "./constants";
import { ValidationError } from "./errors";

export enum AssetKind {
  LP = 0,
  Long = 1,
  Short = 2,
  WithdrawalShare = 3,
}

export interface DecodedAssetId {
  kind: AssetKind;
  timestamp: bigint;
}

function toAssetKind(tag: bigint): AssetKind | undefined {
  switch (tag) {
    case 0n:
      return AssetKind.LP;
    case 1n:
      return AssetKind.Long;
    case 2n:
      return AssetKind.Short;
    case 3n:
      return AssetKind.WithdrawalShare;
    default:
      return undefined;
  }
}

/** LP and withdrawal shares are fungible across maturities */
function isTimeless(kind: AssetKind): boolean {
  return kind === AssetKind.LP || kind === AssetKind.WithdrawalShare;
}

/**
 * Pack a position kind and maturity into an asset id.
 *
 * @throws ValidationError("InvalidAssetId") for an unknown kind
 * @throws ValidationError("InvalidTimestamp") for a timestamp outside 248 bits
 */
export function encodeAssetId(kind: AssetKind, timestamp: bigint): bigint {
  if (toAssetKind(BigInt(kind)) === undefined) {
    throw new ValidationError("InvalidAssetId", `encodeAssetId: unknown kind ${kind}`);
  }
  if (timestamp < 0n || timestamp > ASSET_ID_TIMESTAMP_MASK) {
    throw new ValidationError(
      "InvalidTimestamp",
      `encodeAssetId: timestamp ${timestamp} does not fit in ${ASSET_ID_TIMESTAMP_BITS} bits`
    );
  }
  if (isTimeless(kind) && timestamp !== 0n) {
    throw new ValidationError(
      "InvalidTimestamp",
      `encodeAssetId: ${AssetKind[kind]} ids carry no maturity`
    );
  }
  return (BigInt(kind) << ASSET_ID_TIMESTAMP_BITS) | timestamp;
}

/**
 * Split an asset id into its kind and maturity.
 *
 * @throws ValidationError("InvalidAssetId") for ids outside uint256, unknown
 *   kind tags, or LP/withdrawal ids carrying a timestamp
 */
export function decodeAssetId(id: bigint): DecodedAssetId {
  if (id < 0n || id > MAX_UINT256) {
    throw new ValidationError("InvalidAssetId", `decodeAssetId: ${id} is not a uint256`);
  }
  const kind = toAssetKind(id >> ASSET_ID_TIMESTAMP_BITS);
  if (kind === undefined) {
    throw new ValidationError(
      "InvalidAssetId",
      `decodeAssetId: unknown kind tag ${id >> ASSET_ID_TIMESTAMP_BITS}`
    );
  }
  const timestamp = id & ASSET_ID_TIMESTAMP_MASK;
  if (isTimeless(kind) && timestamp !== 0n) {
    throw new ValidationError(
      "InvalidAssetId",
      `decodeAssetId: ${AssetKind[kind]} id carries timestamp ${timestamp}`
    );
  }
  return { kind, timestamp };
}

export const LP_ASSET_ID = encodeAssetId(AssetKind.LP, 0n);
export const WITHDRAWAL_SHARE_ASSET_ID = encodeAssetId(AssetKind.WithdrawalShare, 0n);

export function longAssetId(maturityTime: bigint): bigint {
  return encodeAssetId(AssetKind.Long, maturityTime);
}

export function shortAssetId(maturityTime: bigint): bigint {
  return encodeAssetId(AssetKind.Short, maturityTime);
}
