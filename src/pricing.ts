/**
 * Fixed-Rate Pricing
 *
 * Splits every trade into a flat leg, the already-matured portion settled
 * one-to-one at the vault share price, and a curve leg priced through the
 * YieldSpace invariant with the full time stretch. Also converts between
 * reserves and annualized rates, prices LP shares and computes fees.
 *
 * Share amounts are denominated in vault shares, base amounts in the
 * underlying asset, bonds in base at maturity. All values are 18-decimal
 * fixed point.
 */

import {
  ONE,
  SECONDS_PER_YEAR,
  TIME_STRETCH_NUMERATOR,
  TIME_STRETCH_RATE_COEFFICIENT,
} from "./constants";
import { CurveError, ValidationError, isAmmError } from "./errors";
import {
  add,
  sub,
  mulDivDown,
  mulDivUp,
  mulDown,
  mulUp,
  divDown,
  divUp,
  min,
  max,
  pow,
} from "./fixed-point";
import * as yieldSpace from "./yield-space";

/**
 * Reserves and parameters a trade is priced against.
 */
export interface MarketState {
  shareReserves: bigint;
  bondReserves: bigint;
  /** The curve's bond reserve adjustment */
  lpTotalSupply: bigint;
  vaultSharePrice: bigint;
  initialVaultSharePrice: bigint;
  timeStretch: bigint;
  curveFee: bigint;
  flatFee: bigint;
  governanceFee: bigint;
}

// ============================================
// Time
// ============================================

/** Start of the checkpoint containing `time` */
export function toCheckpoint(time: bigint, checkpointDuration: bigint): bigint {
  if (checkpointDuration <= 0n) {
    throw new ValidationError("InvalidConfig", "toCheckpoint: checkpoint duration must be positive");
  }
  return time - (time % checkpointDuration);
}

/**
 * Normalized time remaining until `maturityTime`, measured from the latest
 * checkpoint so every position in a bucket prices identically. Rounded
 * down; zero once matured.
 */
export function calculateTimeRemaining(
  maturityTime: bigint,
  currentTime: bigint,
  checkpointDuration: bigint,
  positionDuration: bigint
): bigint {
  const latest = toCheckpoint(currentTime, checkpointDuration);
  if (maturityTime <= latest) return 0n;
  const remaining = divDown(maturityTime - latest, positionDuration);
  return remaining > ONE ? ONE : remaining;
}

/** Position duration in years */
export function annualize(duration: bigint): bigint {
  return divDown(duration, SECONDS_PER_YEAR);
}

/**
 * Time stretch calibrated to a target rate:
 *
 *   s = 1 / (5.24592 / (0.04665 * (apr * 100)))
 */
export function calculateTimeStretch(apr: bigint): bigint {
  if (apr <= 0n) {
    throw new ValidationError("InvalidApr", `calculateTimeStretch: apr ${apr} must be positive`);
  }
  const rate = apr * 100n;
  const stretch = divDown(TIME_STRETCH_NUMERATOR, mulDown(TIME_STRETCH_RATE_COEFFICIENT, rate));
  return divDown(ONE, stretch);
}

// ============================================
// Rates and Reserves
// ============================================

/**
 * Fixed rate implied by the reserves:
 *
 *   p = (µ * z / (y + l))^s,  apr = (1 - p) / (p * T)
 *
 * where T is the position duration in years.
 */
export function calculateAPRFromReserves(
  bondReserves: bigint,
  shareReserves: bigint,
  lpTotalSupply: bigint,
  initialVaultSharePrice: bigint,
  positionDuration: bigint,
  timeStretch: bigint
): bigint {
  const price = yieldSpace.calculateSpotPrice(
    shareReserves,
    bondReserves,
    lpTotalSupply,
    timeStretch,
    initialVaultSharePrice
  );
  return calculateRateFromPrice(price, positionDuration);
}

/** apr = (1 - p) / (p * T) */
export function calculateRateFromPrice(price: bigint, positionDuration: bigint): bigint {
  if (price > ONE) {
    throw new CurveError("NegativeInterest", `calculateRateFromPrice: price ${price} exceeds 1`);
  }
  return divDown(ONE - price, mulDown(price, annualize(positionDuration)));
}

/**
 * Bond reserves that realize `apr` at the given share reserves:
 *
 *   y = µ * z * (1 + apr * T)^(1 / s) - l
 */
export function calculateBondReserves(
  shareReserves: bigint,
  lpTotalSupply: bigint,
  initialVaultSharePrice: bigint,
  apr: bigint,
  positionDuration: bigint,
  timeStretch: bigint
): bigint {
  const growth = add(ONE, mulDown(apr, annualize(positionDuration)));
  const target = mulDown(
    mulDown(initialVaultSharePrice, shareReserves),
    pow(growth, divDown(ONE, timeStretch))
  );
  if (target < lpTotalSupply) {
    throw new CurveError(
      "InvalidCurveState",
      `calculateBondReserves: target ${target} is below the adjustment ${lpTotalSupply}`
    );
  }
  return target - lpTotalSupply;
}

export function calculateSpotPrice(market: MarketState): bigint {
  return yieldSpace.calculateSpotPrice(
    market.shareReserves,
    market.bondReserves,
    market.lpTotalSupply,
    market.timeStretch,
    market.initialVaultSharePrice
  );
}

// ============================================
// Liquidity Updates
// ============================================

export interface Reserves {
  shareReserves: bigint;
  bondReserves: bigint;
}

/**
 * Apply a share reserves delta while holding the spot rate:
 * z' = z + delta, y' = y * z' / z (rounded down). No-op on an empty pool.
 */
export function applyLiquidityDelta(reserves: Reserves, delta: bigint): Reserves {
  const { shareReserves: z, bondReserves: y } = reserves;
  if (z === 0n) return { ...reserves };
  const zNew = z + delta;
  if (zNew < 0n) {
    throw new CurveError(
      "InsufficientLiquidity",
      `applyLiquidityDelta: share reserves ${z} cannot absorb ${delta}`
    );
  }
  return { shareReserves: zNew, bondReserves: mulDivDown(y, zNew, z) };
}

// ============================================
// Flat + Curve Split
// ============================================

export interface TradeSplit {
  /** Output of the flat leg */
  flat: bigint;
  /** Output of the curve leg */
  curve: bigint;
  /** Input routed through the curve */
  curveIn: bigint;
  total: bigint;
}

/**
 * Price `amountIn` against the market with `timeRemaining` left to maturity.
 *
 * Bonds in: the flat leg pays `amountIn * (1 - t) / c` shares; the flat
 * payout is removed from local copies of the reserves (rate-preserving) and
 * the curve leg sells `amountIn * t` bonds at full time stretch.
 *
 * Shares in (`isBondOut`): only fresh positions (t = 1) can be priced, so
 * the whole amount goes through the curve.
 *
 * @throws ValidationError("UnsupportedTrade") for `isBondOut` with t < 1
 */
export function calculateOutGivenIn(
  market: MarketState,
  amountIn: bigint,
  timeRemaining: bigint,
  isBondOut: boolean
): TradeSplit {
  const { vaultSharePrice: c, initialVaultSharePrice: mu, timeStretch: s } = market;

  if (isBondOut) {
    if (timeRemaining < ONE) {
      throw new ValidationError(
        "UnsupportedTrade",
        "calculateOutGivenIn: bonds out are only priced for fresh positions"
      );
    }
    const curve = yieldSpace.calculateOutGivenIn(
      market.shareReserves,
      market.bondReserves,
      market.lpTotalSupply,
      amountIn,
      ONE,
      s,
      c,
      mu,
      true
    );
    return { flat: 0n, curve, curveIn: amountIn, total: curve };
  }

  const flat = mulDivDown(amountIn, ONE - timeRemaining, c);
  const curveIn = mulDown(amountIn, timeRemaining);
  let curve = 0n;
  if (curveIn > 0n) {
    const local = applyLiquidityDelta(market, -flat);
    curve = yieldSpace.calculateOutGivenIn(
      local.shareReserves,
      local.bondReserves,
      market.lpTotalSupply,
      curveIn,
      ONE,
      s,
      c,
      mu,
      false
    );
  }
  return { flat, curve, curveIn, total: flat + curve };
}

/**
 * Shares a trader must pay to buy back `bondAmount` bonds with
 * `timeRemaining` left. The flat leg costs `bondAmount * (1 - t) / c`
 * (rounded up) and is credited to local reserves before the curve leg buys
 * `bondAmount * t` bonds.
 */
export function calculateInGivenOut(
  market: MarketState,
  bondAmount: bigint,
  timeRemaining: bigint
): TradeSplit {
  const { vaultSharePrice: c, initialVaultSharePrice: mu, timeStretch: s } = market;

  const flat = mulDivUp(bondAmount, ONE - timeRemaining, c);
  const curveIn = mulUp(bondAmount, timeRemaining);
  let curve = 0n;
  if (curveIn > 0n) {
    const local = applyLiquidityDelta(market, flat);
    curve = yieldSpace.calculateInGivenOut(
      local.shareReserves,
      local.bondReserves,
      market.lpTotalSupply,
      curveIn,
      ONE,
      s,
      c,
      mu,
      true
    );
  }
  return { flat, curve, curveIn, total: flat + curve };
}

// ============================================
// Fees
// ============================================

/** Curve fee on opening a long, in bonds: φc * (1 / p - 1) * base */
export function calculateOpenLongCurveFee(
  baseAmount: bigint,
  spotPrice: bigint,
  curveFee: bigint
): bigint {
  const premium = sub(divUp(ONE, spotPrice), ONE);
  return mulUp(mulUp(curveFee, premium), baseAmount);
}

/** Curve fee on opening a short, in base: φc * (1 - p) * bonds */
export function calculateOpenShortCurveFee(
  bondAmount: bigint,
  spotPrice: bigint,
  curveFee: bigint
): bigint {
  return mulUp(mulUp(curveFee, sub(ONE, spotPrice)), bondAmount);
}

/** Curve fee on closing, in shares: φc * (1 - p) * bonds * t / c */
export function calculateCloseCurveFee(
  bondAmount: bigint,
  timeRemaining: bigint,
  spotPrice: bigint,
  vaultSharePrice: bigint,
  curveFee: bigint
): bigint {
  return mulUp(
    mulUp(curveFee, sub(ONE, spotPrice)),
    mulDivDown(bondAmount, timeRemaining, vaultSharePrice)
  );
}

/** Flat fee on closing, in shares: bonds * (1 - t) / c * φf */
export function calculateCloseFlatFee(
  bondAmount: bigint,
  timeRemaining: bigint,
  vaultSharePrice: bigint,
  flatFee: bigint
): bigint {
  return mulUp(mulDivDown(bondAmount, ONE - timeRemaining, vaultSharePrice), flatFee);
}

/** Governance's cut of a fee, rounded down */
export function calculateGovernanceFee(fee: bigint, governanceFee: bigint): bigint {
  return mulDown(fee, governanceFee);
}

// ============================================
// Longs
// ============================================

export interface OpenLongResult {
  /** Bonds the trader receives, net of the curve fee */
  bondProceeds: bigint;
  /** Curve fee retained by the pool, in bonds */
  curveFee: bigint;
  /** Governance fee, in shares */
  governanceFee: bigint;
  /** Shares credited to the reserves */
  shareReservesDelta: bigint;
  /** Bonds debited from the reserves */
  bondReservesDelta: bigint;
  spotPrice: bigint;
}

/**
 * Open a long with `shareAmount` shares at t = 1.
 *
 * @throws CurveError("NegativeInterest") when the trader would receive fewer
 *   bonds than the base paid
 */
export function calculateOpenLong(market: MarketState, shareAmount: bigint): OpenLongResult {
  const c = market.vaultSharePrice;
  const spotPrice = calculateSpotPrice(market);
  if (spotPrice > ONE) {
    throw new CurveError("NegativeInterest", `calculateOpenLong: spot price ${spotPrice} exceeds 1`);
  }
  const baseAmount = mulDown(shareAmount, c);

  const { curve: bondsOut } = calculateOutGivenIn(market, shareAmount, ONE, true);
  const curveFee = calculateOpenLongCurveFee(baseAmount, spotPrice, market.curveFee);
  const governanceFee = divDown(
    calculateGovernanceFee(mulDown(curveFee, spotPrice), market.governanceFee),
    c
  );

  const bondProceeds = sub(bondsOut, curveFee);
  if (bondProceeds < baseAmount) {
    throw new CurveError(
      "NegativeInterest",
      `calculateOpenLong: ${bondProceeds} bonds for ${baseAmount} base`
    );
  }

  return {
    bondProceeds,
    curveFee,
    governanceFee,
    shareReservesDelta: sub(shareAmount, governanceFee),
    bondReservesDelta: bondProceeds,
    spotPrice,
  };
}

export interface CloseResult {
  /** Output (longs) or payment (shorts) of the flat leg, in shares */
  flat: bigint;
  /** Output (longs) or payment (shorts) of the curve leg, in shares */
  curve: bigint;
  /** Bonds traded on the curve */
  curveBonds: bigint;
  curveFee: bigint;
  flatFee: bigint;
  governanceCurveFee: bigint;
  governanceFlatFee: bigint;
}

export interface CloseLongResult extends CloseResult {
  /** Shares the trader receives */
  shareProceeds: bigint;
}

/**
 * Close `bondAmount` longs with `timeRemaining` left. Fees are deducted from
 * the proceeds; proceeds floor at zero.
 */
export function calculateCloseLong(
  market: MarketState,
  bondAmount: bigint,
  timeRemaining: bigint
): CloseLongResult {
  const c = market.vaultSharePrice;
  const spotPrice = calculateSpotPrice(market);
  const split = calculateOutGivenIn(market, bondAmount, timeRemaining, false);

  const curveFee = min(
    calculateCloseCurveFee(bondAmount, timeRemaining, spotPrice, c, market.curveFee),
    split.curve
  );
  const flatFee = min(calculateCloseFlatFee(bondAmount, timeRemaining, c, market.flatFee), split.flat);

  return {
    flat: split.flat,
    curve: split.curve,
    curveBonds: split.curveIn,
    curveFee,
    flatFee,
    governanceCurveFee: calculateGovernanceFee(curveFee, market.governanceFee),
    governanceFlatFee: calculateGovernanceFee(flatFee, market.governanceFee),
    shareProceeds: split.total - curveFee - flatFee,
  };
}

// ============================================
// Shorts
// ============================================

export interface OpenShortResult {
  /** Shares the trader deposits */
  traderDeposit: bigint;
  /** Shares the curve pays for the bonds sold */
  shareProceeds: bigint;
  /** Curve fee, in shares */
  curveFee: bigint;
  /** Governance fee, in shares */
  governanceFee: bigint;
  /** Shares debited from the reserves */
  shareReservesDelta: bigint;
  /** Bonds credited to the reserves */
  bondReservesDelta: bigint;
  spotPrice: bigint;
}

/**
 * Open a short on `bondAmount` bonds at t = 1. The trader deposits the
 * difference between the bonds' face value (scaled by accrued interest since
 * the open checkpoint) and the curve proceeds, plus the prepaid flat fee:
 *
 *   deposit = bonds * c / c0 + φf * bonds + fee - c * proceeds   (base)
 */
export function calculateOpenShort(
  market: MarketState,
  bondAmount: bigint,
  openVaultSharePrice: bigint
): OpenShortResult {
  const c = market.vaultSharePrice;
  const c0 = openVaultSharePrice === 0n ? c : openVaultSharePrice;
  const spotPrice = calculateSpotPrice(market);

  const { curve: shareProceeds } = calculateOutGivenIn(market, bondAmount, ONE, false);
  const curveFee = min(
    divUp(calculateOpenShortCurveFee(bondAmount, spotPrice, market.curveFee), c),
    shareProceeds
  );
  const governanceFee = calculateGovernanceFee(curveFee, market.governanceFee);
  const netProceeds = shareProceeds - curveFee;

  const backing = add(mulDivUp(bondAmount, c, c0), mulUp(market.flatFee, bondAmount));
  const depositBase = sub(backing, mulDown(netProceeds, c));

  return {
    traderDeposit: divUp(depositBase, c),
    shareProceeds,
    curveFee,
    governanceFee,
    shareReservesDelta: add(netProceeds, governanceFee),
    bondReservesDelta: bondAmount,
    spotPrice,
  };
}

export interface CloseShortResult extends CloseResult {
  /** Shares owed to the pool to buy back the bonds, fees included */
  sharePayment: bigint;
  /** Shares the trader receives */
  shareProceeds: bigint;
}

/**
 * Proceeds of a short: the backing grown by interest from `openVaultSharePrice`
 * to `closeVaultSharePrice`, plus the prepaid flat fee, less the payment.
 *
 *   bonds * c1 / (c0 * c) + bonds * φf / c - payment
 *
 * Floors at zero.
 */
export function calculateShortProceeds(
  bondAmount: bigint,
  sharePayment: bigint,
  openVaultSharePrice: bigint,
  closeVaultSharePrice: bigint,
  vaultSharePrice: bigint,
  flatFee: bigint
): bigint {
  const bondFactor = add(
    mulDivDown(bondAmount, closeVaultSharePrice, mulUp(openVaultSharePrice, vaultSharePrice)),
    mulDivDown(bondAmount, flatFee, vaultSharePrice)
  );
  return bondFactor > sharePayment ? bondFactor - sharePayment : 0n;
}

/**
 * Close `bondAmount` shorts with `timeRemaining` left. Before maturity the
 * close price is the current vault share price.
 */
export function calculateCloseShort(
  market: MarketState,
  bondAmount: bigint,
  openVaultSharePrice: bigint,
  closeVaultSharePrice: bigint,
  timeRemaining: bigint
): CloseShortResult {
  const c = market.vaultSharePrice;
  const spotPrice = calculateSpotPrice(market);
  const split = calculateInGivenOut(market, bondAmount, timeRemaining);

  const curveFee = calculateCloseCurveFee(bondAmount, timeRemaining, spotPrice, c, market.curveFee);
  const flatFee = calculateCloseFlatFee(bondAmount, timeRemaining, c, market.flatFee);
  const sharePayment = split.total + curveFee + flatFee;

  return {
    flat: split.flat,
    curve: split.curve,
    curveBonds: split.curveIn,
    curveFee,
    flatFee,
    governanceCurveFee: calculateGovernanceFee(curveFee, market.governanceFee),
    governanceFlatFee: calculateGovernanceFee(flatFee, market.governanceFee),
    sharePayment,
    shareProceeds: calculateShortProceeds(
      bondAmount,
      sharePayment,
      openVaultSharePrice,
      closeVaultSharePrice,
      c,
      market.flatFee
    ),
  };
}

// ============================================
// Mint
// ============================================

/**
 * Base cost of minting a matched long/short pair of `bondAmount` bonds:
 *
 *   bonds * max(c, c0) / c0 + φf * bonds + 2 * φg * φf * bonds
 *
 * Rounded up. The governance term is charged twice, once per side.
 */
export function calculateMintCost(
  bondAmount: bigint,
  vaultSharePrice: bigint,
  openVaultSharePrice: bigint,
  flatFee: bigint,
  governanceFee: bigint
): bigint {
  const c0 = openVaultSharePrice === 0n ? vaultSharePrice : openVaultSharePrice;
  const flat = mulUp(bondAmount, flatFee);
  return add(
    add(mulDivUp(bondAmount, max(vaultSharePrice, c0), c0), flat),
    2n * mulUp(flat, governanceFee)
  );
}

/**
 * Shares returned for burning a matched long/short pair of `bondAmount`
 * bonds with `timeRemaining` left:
 *
 *   bonds * c1 / (c0 * c) + bonds * φf * t / c - bonds * φf * (1 - t) / c
 *
 * The pair's backing grows with interest from c0 to c1, the unearned part
 * of the prepaid flat fee is refunded and the earned part is charged.
 * Floors at zero.
 */
export function calculateBurnProceeds(
  bondAmount: bigint,
  timeRemaining: bigint,
  openVaultSharePrice: bigint,
  closeVaultSharePrice: bigint,
  vaultSharePrice: bigint,
  flatFee: bigint
): bigint {
  const backing = mulDivDown(
    bondAmount,
    closeVaultSharePrice,
    mulUp(openVaultSharePrice, vaultSharePrice)
  );
  const refund = mulDivDown(bondAmount, mulDown(flatFee, timeRemaining), vaultSharePrice);
  const fee = calculateBurnFlatFee(bondAmount, timeRemaining, vaultSharePrice, flatFee);
  const gross = backing + refund;
  return gross > fee ? gross - fee : 0n;
}

/** Flat fee earned on the matured part of a burned pair, in shares */
export function calculateBurnFlatFee(
  bondAmount: bigint,
  timeRemaining: bigint,
  vaultSharePrice: bigint,
  flatFee: bigint
): bigint {
  return mulDivUp(bondAmount, mulUp(flatFee, ONE - timeRemaining), vaultSharePrice);
}

// ============================================
// Max Trades
// ============================================

export interface OpenPositions {
  longsOutstanding: bigint;
  shortsOutstanding: bigint;
  minimumShareReserves: bigint;
}

/** z - (longs - shorts)/c must stay at or above the minimum reserves */
function isSolvent(
  shareReserves: bigint,
  longsOutstanding: bigint,
  shortsOutstanding: bigint,
  vaultSharePrice: bigint,
  minimumShareReserves: bigint
): boolean {
  const net = longsOutstanding > shortsOutstanding ? longsOutstanding - shortsOutstanding : 0n;
  return shareReserves >= divUp(net, vaultSharePrice) + minimumShareReserves;
}

/** Whether `trade` prices; a pricing failure counts as no */
function prices(trade: () => boolean): boolean {
  try {
    return trade();
  } catch (err) {
    if (isAmmError(err)) return false;
    throw err;
  }
}

/**
 * Largest x in [lo, hi] with fits(x), given fits(lo) and !fits(hi) and a
 * single crossing between them.
 */
function bisect(lo: bigint, hi: bigint, fits: (x: bigint) => boolean): bigint {
  while (hi - lo > 1n) {
    const mid = (lo + hi) / 2n;
    if (fits(mid)) {
      lo = mid;
    } else {
      hi = mid;
    }
  }
  return lo;
}

/**
 * Largest long, in shares paid, that opens against `market` within `budget`
 * shares. The trade must price on the curve without negative interest, fit
 * in the bond reserves and leave the pool solvent. Returns 0 when nothing
 * fits.
 */
export function calculateMaxLong(
  market: MarketState,
  positions: OpenPositions,
  budget: bigint
): bigint {
  const c = market.vaultSharePrice;
  const fits = (shareAmount: bigint): boolean =>
    prices(() => {
      const result = calculateOpenLong(market, shareAmount);
      return (
        result.bondReservesDelta <= market.bondReserves &&
        isSolvent(
          market.shareReserves + result.shareReservesDelta,
          positions.longsOutstanding + result.bondProceeds,
          positions.shortsOutstanding,
          c,
          positions.minimumShareReserves
        )
      );
    });

  if (budget <= 0n) return 0n;
  if (fits(budget)) return budget;
  return bisect(0n, budget, fits);
}

/**
 * Largest short, in bonds, that opens against `market` for a deposit of at
 * most `budget` shares. The curve must pay for the bonds out of the share
 * reserves and leave the pool solvent. Returns 0 when nothing fits.
 */
export function calculateMaxShort(
  market: MarketState,
  positions: OpenPositions,
  openVaultSharePrice: bigint,
  budget: bigint
): bigint {
  const c = market.vaultSharePrice;
  const fits = (bondAmount: bigint): boolean =>
    prices(() => {
      const result = calculateOpenShort(market, bondAmount, openVaultSharePrice);
      return (
        result.traderDeposit <= budget &&
        result.shareReservesDelta <= market.shareReserves &&
        isSolvent(
          market.shareReserves - result.shareReservesDelta,
          positions.longsOutstanding,
          positions.shortsOutstanding + bondAmount,
          c,
          positions.minimumShareReserves
        )
      );
    });

  let lo = 0n;
  let hi = ONE;
  while (fits(hi)) {
    lo = hi;
    hi *= 2n;
  }
  return bisect(lo, hi, fits);
}

// ============================================
// LP Shares
// ============================================

/**
 * z + shorts / c - longs / c, the share reserves not backing open positions.
 */
function adjustedShareReserves(
  shareReserves: bigint,
  longsOutstanding: bigint,
  shortsOutstanding: bigint,
  vaultSharePrice: bigint,
  roundUp: boolean
): bigint {
  const credit = roundUp
    ? divUp(shortsOutstanding, vaultSharePrice)
    : divDown(shortsOutstanding, vaultSharePrice);
  const debit = roundUp
    ? divDown(longsOutstanding, vaultSharePrice)
    : divUp(longsOutstanding, vaultSharePrice);
  const gross = shareReserves + credit;
  if (gross <= debit) {
    throw new CurveError(
      "InsufficientLiquidity",
      `adjustedShareReserves: longs ${longsOutstanding} exhaust share reserves ${shareReserves}`
    );
  }
  return gross - debit;
}

/**
 * LP shares minted for `shareAmount` shares: dz * l / (z + shorts/c - longs/c).
 * Rounded down.
 */
export function calculateLpSharesOutForSharesIn(
  shareAmount: bigint,
  shareReserves: bigint,
  lpTotalSupply: bigint,
  longsOutstanding: bigint,
  shortsOutstanding: bigint,
  vaultSharePrice: bigint
): bigint {
  const adjusted = adjustedShareReserves(
    shareReserves,
    longsOutstanding,
    shortsOutstanding,
    vaultSharePrice,
    true
  );
  return mulDivDown(shareAmount, lpTotalSupply, adjusted);
}

/**
 * Shares paid for `lpShares` LP shares: dl * (z + shorts/c - longs/c) / l.
 * Rounded down.
 */
export function calculateSharesOutForLpSharesIn(
  lpShares: bigint,
  shareReserves: bigint,
  lpTotalSupply: bigint,
  longsOutstanding: bigint,
  shortsOutstanding: bigint,
  vaultSharePrice: bigint
): bigint {
  const adjusted = adjustedShareReserves(
    shareReserves,
    longsOutstanding,
    shortsOutstanding,
    vaultSharePrice,
    false
  );
  return mulDivDown(lpShares, adjusted, lpTotalSupply);
}

// ============================================
// Present Value
// ============================================

export interface OpenInterest {
  longsOutstanding: bigint;
  shortsOutstanding: bigint;
  /** Average normalized time remaining of the longs */
  longTimeRemaining: bigint;
  /** Average normalized time remaining of the shorts */
  shortTimeRemaining: bigint;
}

/**
 * Shares the LPs would hold if every open position closed now, less the
 * minimum share reserves.
 *
 * The net of open longs and shorts still on the curve is traded against the
 * curve; the matured portion settles flat.
 */
export function calculatePresentValue(
  market: MarketState,
  interest: OpenInterest,
  minimumShareReserves: bigint
): bigint {
  const c = market.vaultSharePrice;
  const tau = market.timeStretch;
  const y = add(market.bondReserves, market.lpTotalSupply);

  let value = market.shareReserves;

  // Flat: matured shorts pay in, matured longs are paid out.
  value += mulDivDown(interest.shortsOutstanding, ONE - interest.shortTimeRemaining, c);
  value -= mulDivUp(interest.longsOutstanding, ONE - interest.longTimeRemaining, c);

  // Curve: the pool buys back net longs or sells bonds to net shorts.
  const netCurve =
    mulDown(interest.longsOutstanding, interest.longTimeRemaining) -
    mulDown(interest.shortsOutstanding, interest.shortTimeRemaining);
  if (netCurve > 0n) {
    value -= yieldSpace.calculateSharesOutGivenBondsIn(
      market.shareReserves,
      y,
      c,
      market.initialVaultSharePrice,
      tau,
      netCurve
    );
  } else if (netCurve < 0n) {
    value += yieldSpace.calculateSharesInGivenBondsOut(
      market.shareReserves,
      y,
      c,
      market.initialVaultSharePrice,
      tau,
      -netCurve
    );
  }

  value -= minimumShareReserves;
  if (value < 0n) {
    throw new CurveError("InsufficientLiquidity", `calculatePresentValue: negative present value ${value}`);
  }
  return value;
}
