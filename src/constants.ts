/**
 * Shared constants used across the fixed-rate AMM core.
 *
 * Fixed-point values use 18 decimals, matching the on-chain representation.
 */

// ============================================
// Precision Constants
// ============================================

/** One unit in 18-decimal fixed point (1e18) */
export const ONE = 10n ** 18n;

/** Alias used by code that talks about "wad" precision */
export const PRECISION = ONE;

/** One unit in 27-decimal ("ray") precision, used by some yield source indices */
export const RAY = 10n ** 27n;

/** Ray to wad conversion factor (1e9) */
export const WAD_RAY_RATIO = RAY / ONE;

// ============================================
// Integer Bounds
// ============================================

/** Largest unsigned 256-bit value */
export const MAX_UINT256 = (1n << 256n) - 1n;

/** Largest signed 256-bit value */
export const MAX_INT256 = (1n << 255n) - 1n;

/** Smallest signed 256-bit value */
export const MIN_INT256 = -(1n << 255n);

/** Largest unsigned 128-bit value (reserve storage width) */
export const MAX_UINT128 = (1n << 128n) - 1n;

// ============================================
// exp / ln Domain
// ============================================

/**
 * exp(x) is below 0.5e-18 for x <= floor(ln(0.5e-18) * 1e18), so the result
 * rounds to zero.
 */
export const EXP_MIN_INPUT = -42139678854452767551n;

/** exp(x) no longer fits in int256 for x >= floor(ln((2^255 - 1) / 1e18) * 1e18) */
export const EXP_MAX_INPUT = 135305999368893231589n;

// ============================================
// Asset Id Layout
// ============================================

/** Bits reserved for the maturity timestamp in an asset id */
export const ASSET_ID_TIMESTAMP_BITS = 248n;

/** Bits reserved for the position kind tag */
export const ASSET_ID_KIND_BITS = 8n;

/** Mask for the timestamp portion of an asset id */
export const ASSET_ID_TIMESTAMP_MASK = (1n << ASSET_ID_TIMESTAMP_BITS) - 1n;

// ============================================
// Time
// ============================================

/** Seconds in a (365-day) year, the annualization basis for rates */
export const SECONDS_PER_YEAR = 365n * 24n * 60n * 60n;

/** Seconds in a day */
export const SECONDS_PER_DAY = 24n * 60n * 60n;

// ============================================
// Time Stretch Calibration
// ============================================

/** Numerator of the time stretch calibration curve (5.24592) */
export const TIME_STRETCH_NUMERATOR = 5_245920000000000000n;

/** Rate coefficient of the time stretch calibration curve (0.04665) */
export const TIME_STRETCH_RATE_COEFFICIENT = 46650000000000000n;

// ============================================
// Addresses
// ============================================

/** The zero address, meaning "anyone" for order counterparties */
export const ZERO_ADDRESS = "0x0000000000000000000000000000000000000000";
