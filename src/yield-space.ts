/**
 * YieldSpace Curve Math
 *
 * Solves the constant-power invariant that prices bonds against vault shares:
 *
 *   k = (c / µ) * (µ * z)^(1 - τ) + (y + adj)^(1 - τ)
 *
 * where z is the share reserves, y the bond reserves, adj the bond reserve
 * adjustment (the LP total supply), c the vault share price, µ the initial
 * vault share price and τ = s * t the time stretch scaled by the normalized
 * time remaining.
 *
 * Every solve rounds against the trader: amounts the pool pays out are
 * underestimated and amounts the pool receives are overestimated.
 *
 * At τ = 1 the exponent vanishes and the invariant degenerates to its limit,
 * the weighted product (µ * z)^(c / µ) * (y + adj) = const. With c = µ this
 * is the constant-product curve.
 *
 * References:
 * - YieldSpace paper: https://yieldprotocol.com/YieldSpace.pdf
 */

import { ONE } from "./constants";
import { CurveError } from "./errors";
import {
  add,
  sub,
  mulDivDown,
  mulDivUp,
  mulDown,
  mulUp,
  divDown,
  divUp,
  pow,
} from "./fixed-point";

// ============================================
// Internal helpers
// ============================================

/** 1 - τ; τ > 1 underflows */
function exponent(t: bigint): bigint {
  return sub(ONE, t);
}

/**
 * x^(1/a), rounded so the result is overestimated. For x >= 1 a larger
 * exponent yields a larger result, below 1 a smaller one does.
 */
function invPowUp(x: bigint, a: bigint): bigint {
  return x >= ONE ? pow(x, divUp(ONE, a)) : pow(x, divDown(ONE, a));
}

/** x^(1/a), rounded so the result is underestimated */
function invPowDown(x: bigint, a: bigint): bigint {
  return x >= ONE ? pow(x, divDown(ONE, a)) : pow(x, divUp(ONE, a));
}

function radicand(fn: string, k: bigint, term: bigint): bigint {
  if (term > k) {
    throw new CurveError(
      "InvalidCurveState",
      `${fn}: invariant ${k} is below the reserve term ${term}`
    );
  }
  return k - term;
}

// ============================================
// Invariant
// ============================================

/**
 * Calculate the YieldSpace invariant k.
 *
 * With `roundUp` the share term is rounded up so k is overestimated,
 * otherwise it is underestimated. At τ = 1 the weighted-product form
 * (µ * z)^(c / µ) * y is returned instead.
 *
 * @param z - Share reserves
 * @param y - Adjusted bond reserves (bond reserves plus adjustment)
 * @param c - Vault share price
 * @param mu - Initial vault share price
 * @param t - Time stretch times normalized time remaining
 */
export function calculateInvariant(
  z: bigint,
  y: bigint,
  c: bigint,
  mu: bigint,
  t: bigint,
  roundUp = false
): bigint {
  const a = exponent(t);
  if (a === 0n) {
    return roundUp
      ? mulUp(pow(mulUp(mu, z), divUp(c, mu)), y)
      : mulDown(pow(mulDown(mu, z), divDown(c, mu)), y);
  }
  if (roundUp) {
    return add(mulDivUp(c, pow(mulUp(mu, z), a), mu), pow(y, a));
  }
  return add(mulDivDown(c, pow(mulDown(mu, z), a), mu), pow(y, a));
}

// ============================================
// Trade Solvers
// ============================================

/**
 * Bonds the pool pays out for `dz` shares in. Underestimated.
 *
 * @param z - Share reserves
 * @param y - Adjusted bond reserves
 * @param c - Vault share price
 * @param mu - Initial vault share price
 * @param t - Time stretch times normalized time remaining
 * @param dz - Shares in
 * @returns Bonds out
 */
export function calculateBondsOutGivenSharesIn(
  z: bigint,
  y: bigint,
  c: bigint,
  mu: bigint,
  t: bigint,
  dz: bigint
): bigint {
  const a = exponent(t);
  const zNew = add(z, dz);

  let yNew: bigint;
  if (a === 0n) {
    // y' = y * (z / (z + dz))^(c / µ), rounded up
    yNew =
      c === mu
        ? mulDivUp(y, z, zNew)
        : mulUp(y, pow(divUp(z, zNew), divDown(c, mu)));
  } else {
    const k = calculateInvariant(z, y, c, mu, t, true);
    const zTerm = mulDivDown(c, pow(mulDown(mu, zNew), a), mu);
    yNew = invPowUp(radicand("calculateBondsOutGivenSharesIn", k, zTerm), a);
  }

  if (yNew > y) {
    throw new CurveError(
      "InvalidCurveState",
      `calculateBondsOutGivenSharesIn: bond reserves would grow from ${y} to ${yNew}`
    );
  }
  return y - yNew;
}

/**
 * Shares the pool pays out for `dy` bonds in. Underestimated, and clamped
 * at zero when rounding leaves nothing to pay.
 *
 * @param z - Share reserves
 * @param y - Adjusted bond reserves
 * @param c - Vault share price
 * @param mu - Initial vault share price
 * @param t - Time stretch times normalized time remaining
 * @param dy - Bonds in
 * @returns Shares out
 */
export function calculateSharesOutGivenBondsIn(
  z: bigint,
  y: bigint,
  c: bigint,
  mu: bigint,
  t: bigint,
  dy: bigint
): bigint {
  const a = exponent(t);
  const yNew = add(y, dy);

  let zNew: bigint;
  if (a === 0n) {
    // z' = z * (y / (y + dy))^(µ / c), rounded up
    zNew =
      c === mu
        ? mulDivUp(z, y, yNew)
        : mulUp(z, pow(divUp(y, yNew), divDown(mu, c)));
  } else {
    const k = calculateInvariant(z, y, c, mu, t, true);
    const yTerm = pow(yNew, a);
    const scaled = mulDivUp(radicand("calculateSharesOutGivenBondsIn", k, yTerm), mu, c);
    zNew = divUp(invPowUp(scaled, a), mu);
  }

  return z > zNew ? z - zNew : 0n;
}

/**
 * Shares the pool must receive to pay out `dy` bonds. Overestimated.
 *
 * @param z - Share reserves
 * @param y - Adjusted bond reserves
 * @param c - Vault share price
 * @param mu - Initial vault share price
 * @param t - Time stretch times normalized time remaining
 * @param dy - Bonds out
 * @returns Shares in
 */
export function calculateSharesInGivenBondsOut(
  z: bigint,
  y: bigint,
  c: bigint,
  mu: bigint,
  t: bigint,
  dy: bigint
): bigint {
  if (dy >= y) {
    throw new CurveError(
      "InvalidCurveState",
      `calculateSharesInGivenBondsOut: bonds out ${dy} exhaust bond reserves ${y}`
    );
  }
  const a = exponent(t);
  const yNew = y - dy;

  let zNew: bigint;
  if (a === 0n) {
    // z' = z * (y / (y - dy))^(µ / c), rounded up
    zNew =
      c === mu
        ? mulDivUp(z, y, yNew)
        : mulUp(z, pow(divUp(y, yNew), divUp(mu, c)));
  } else {
    const k = calculateInvariant(z, y, c, mu, t, true);
    const yTerm = pow(yNew, a);
    const scaled = mulDivUp(radicand("calculateSharesInGivenBondsOut", k, yTerm), mu, c);
    zNew = divUp(invPowUp(scaled, a), mu);
  }

  if (zNew < z) {
    throw new CurveError(
      "InvalidCurveState",
      `calculateSharesInGivenBondsOut: share reserves would shrink from ${z} to ${zNew}`
    );
  }
  return zNew - z;
}

/**
 * Bonds the pool must receive to pay out `dz` shares. Overestimated.
 *
 * @param z - Share reserves
 * @param y - Adjusted bond reserves
 * @param c - Vault share price
 * @param mu - Initial vault share price
 * @param t - Time stretch times normalized time remaining
 * @param dz - Shares out
 * @returns Bonds in
 */
export function calculateBondsInGivenSharesOut(
  z: bigint,
  y: bigint,
  c: bigint,
  mu: bigint,
  t: bigint,
  dz: bigint
): bigint {
  if (dz >= z) {
    throw new CurveError(
      "InvalidCurveState",
      `calculateBondsInGivenSharesOut: shares out ${dz} exhaust share reserves ${z}`
    );
  }
  const a = exponent(t);
  const zNew = z - dz;

  let yNew: bigint;
  if (a === 0n) {
    // y' = y * (z / (z - dz))^(c / µ), rounded up
    yNew =
      c === mu
        ? mulDivUp(y, z, zNew)
        : mulUp(y, pow(divUp(z, zNew), divUp(c, mu)));
  } else {
    const k = calculateInvariant(z, y, c, mu, t, true);
    const zTerm = mulDivDown(c, pow(mulDown(mu, zNew), a), mu);
    yNew = invPowUp(radicand("calculateBondsInGivenSharesOut", k, zTerm), a);
  }

  if (yNew < y) {
    throw new CurveError(
      "InvalidCurveState",
      `calculateBondsInGivenSharesOut: bond reserves would shrink from ${y} to ${yNew}`
    );
  }
  return yNew - y;
}

// ============================================
// Entry Points
// ============================================

/**
 * Price a trade against the curve.
 *
 * With `isBondOut` the trader pays `amountIn` shares and receives bonds;
 * otherwise the trader pays `amountIn` bonds and receives shares. Both
 * outputs are rounded down.
 *
 * @param z - Share reserves
 * @param y - Bond reserves
 * @param adj - Bond reserve adjustment
 * @param amountIn - Shares or bonds in
 * @param t - Normalized time remaining
 * @param s - Time stretch
 * @param c - Vault share price
 * @param mu - Initial vault share price
 * @param isBondOut - Direction of the trade
 */
export function calculateOutGivenIn(
  z: bigint,
  y: bigint,
  adj: bigint,
  amountIn: bigint,
  t: bigint,
  s: bigint,
  c: bigint,
  mu: bigint,
  isBondOut: boolean
): bigint {
  const tau = mulDown(s, t);
  const adjusted = add(y, adj);
  return isBondOut
    ? calculateBondsOutGivenSharesIn(z, adjusted, c, mu, tau, amountIn)
    : calculateSharesOutGivenBondsIn(z, adjusted, c, mu, tau, amountIn);
}

/**
 * Price a trade by the amount the trader wants out. Inputs are rounded up.
 *
 * With `isBondOut` the trader receives `amountOut` bonds and the result is
 * the shares in; otherwise the trader receives `amountOut` shares and the
 * result is the bonds in.
 */
export function calculateInGivenOut(
  z: bigint,
  y: bigint,
  adj: bigint,
  amountOut: bigint,
  t: bigint,
  s: bigint,
  c: bigint,
  mu: bigint,
  isBondOut: boolean
): bigint {
  const tau = mulDown(s, t);
  const adjusted = add(y, adj);
  return isBondOut
    ? calculateSharesInGivenBondsOut(z, adjusted, c, mu, tau, amountOut)
    : calculateBondsInGivenSharesOut(z, adjusted, c, mu, tau, amountOut);
}

// ============================================
// Prices and Limits
// ============================================

/**
 * Spot price of a bond in base: p = (µ * z / (y + adj))^s.
 */
export function calculateSpotPrice(
  z: bigint,
  y: bigint,
  adj: bigint,
  s: bigint,
  mu: bigint
): bigint {
  return pow(divDown(mulDown(mu, z), add(y, adj)), s);
}

export interface MaxBuy {
  sharesIn: bigint;
  bondsOut: bigint;
}

function requireExponent(fn: string, t: bigint): bigint {
  const a = exponent(t);
  if (a === 0n) {
    throw new CurveError("InvalidCurveState", `${fn}: requires s * t < 1`);
  }
  return a;
}

/**
 * Largest purchase of bonds the curve allows. The spot price can never
 * exceed 1, and at price 1 µ * z = y, so
 *
 *   z' = (1 / µ) * (k / (c / µ + 1))^(1 / (1 - τ)),  y' = µ * z'.
 *
 * Both amounts are underestimated.
 */
export function calculateMaxBuy(
  z: bigint,
  y: bigint,
  adj: bigint,
  t: bigint,
  s: bigint,
  c: bigint,
  mu: bigint
): MaxBuy {
  const tau = mulDown(s, t);
  const a = requireExponent("calculateMaxBuy", tau);
  const adjusted = add(y, adj);

  const kDown = calculateInvariant(z, adjusted, c, mu, tau, false);
  const optimalZ = divDown(invPowDown(divDown(kDown, add(divUp(c, mu), ONE)), a), mu);

  const kUp = calculateInvariant(z, adjusted, c, mu, tau, true);
  const optimalY = invPowUp(divUp(kUp, add(divDown(c, mu), ONE)), a);

  if (optimalZ < z || optimalY > adjusted) {
    throw new CurveError(
      "InvalidCurveState",
      "calculateMaxBuy: spot price is already at or above 1"
    );
  }
  return { sharesIn: optimalZ - z, bondsOut: adjusted - optimalY };
}

/**
 * Largest sale of bonds the curve allows before share reserves fall to
 * `zMin`. Underestimated.
 */
export function calculateMaxSell(
  z: bigint,
  y: bigint,
  adj: bigint,
  t: bigint,
  s: bigint,
  c: bigint,
  mu: bigint,
  zMin: bigint
): bigint {
  const tau = mulDown(s, t);
  const a = requireExponent("calculateMaxSell", tau);
  const adjusted = add(y, adj);

  const k = calculateInvariant(z, adjusted, c, mu, tau, false);
  const zTerm = mulDivUp(c, pow(mulUp(mu, zMin), a), mu);
  const optimalY = invPowDown(radicand("calculateMaxSell", k, zTerm), a);

  if (optimalY < adjusted) {
    throw new CurveError(
      "InvalidCurveState",
      `calculateMaxSell: share reserves ${z} are at or below the minimum ${zMin}`
    );
  }
  return optimalY - adjusted;
}
