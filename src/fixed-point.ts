/**
 * 18-Decimal Fixed-Point Math
 *
 * Deterministic fixed-point arithmetic over bigint with explicit rounding
 * direction. Values are integers scaled by 1e18 and bounded by the uint256
 * range, so results match the on-chain math bit for bit.
 *
 * exp/ln use binary range reduction followed by a rational polynomial
 * approximation with fixed coefficients, so `pow` is reproducible across
 * implementations.
 *
 * References:
 * - Remco Bloemen, exp and ln in fixed point: https://xn--2-umb.com/22/exp-ln/
 */

export { ONE, RAY, MAX_UINT256, MAX_INT256 } from "./constants";

import {
  ONE,
  RAY,
  WAD_RAY_RATIO,
  MAX_UINT256,
  MAX_INT256,
  EXP_MIN_INPUT,
  EXP_MAX_INPUT,
} from "./constants";
import { ArithmeticError, ValidationError } from "./errors";

// ============================================
// Checked Integer Arithmetic
// ============================================

function assertUint(fn: string, x: bigint): void {
  if (x < 0n) {
    throw new ArithmeticError("Underflow", `${fn}: negative operand ${x}`);
  }
  if (x > MAX_UINT256) {
    throw new ArithmeticError("Overflow", `${fn}: operand ${x} exceeds uint256`);
  }
}

/**
 * Checked addition.
 * @throws ArithmeticError("Overflow") if the sum exceeds uint256
 */
export function add(x: bigint, y: bigint): bigint {
  assertUint("add", x);
  assertUint("add", y);
  const z = x + y;
  if (z > MAX_UINT256) {
    throw new ArithmeticError("Overflow", `add: ${x} + ${y} overflows uint256`);
  }
  return z;
}

/**
 * Checked subtraction.
 * @throws ArithmeticError("Underflow") if y > x
 */
export function sub(x: bigint, y: bigint): bigint {
  assertUint("sub", x);
  assertUint("sub", y);
  if (y > x) {
    throw new ArithmeticError("Underflow", `sub: ${x} - ${y} underflows`);
  }
  return x - y;
}

/**
 * floor(x * y / d)
 * @throws ArithmeticError on a zero divisor or a product outside uint256
 */
export function mulDivDown(x: bigint, y: bigint, d: bigint): bigint {
  assertUint("mulDivDown", x);
  assertUint("mulDivDown", y);
  if (d === 0n) {
    throw new ArithmeticError("DivisionByZero", "mulDivDown: division by zero");
  }
  const product = x * y;
  if (product > MAX_UINT256) {
    throw new ArithmeticError("Overflow", `mulDivDown: ${x} * ${y} overflows uint256`);
  }
  return product / d;
}

/**
 * ceil(x * y / d), and exactly 0 when x * y == 0.
 * @throws ArithmeticError on a zero divisor or a product outside uint256
 */
export function mulDivUp(x: bigint, y: bigint, d: bigint): bigint {
  assertUint("mulDivUp", x);
  assertUint("mulDivUp", y);
  if (d === 0n) {
    throw new ArithmeticError("DivisionByZero", "mulDivUp: division by zero");
  }
  const product = x * y;
  if (product > MAX_UINT256) {
    throw new ArithmeticError("Overflow", `mulDivUp: ${x} * ${y} overflows uint256`);
  }
  if (product === 0n) return 0n;
  return (product - 1n) / d + 1n;
}

/** x * y / 1e18, rounded down */
export function mulDown(x: bigint, y: bigint): bigint {
  return mulDivDown(x, y, ONE);
}

/** x * y / 1e18, rounded up */
export function mulUp(x: bigint, y: bigint): bigint {
  return mulDivUp(x, y, ONE);
}

/** x * 1e18 / y, rounded down */
export function divDown(x: bigint, y: bigint): bigint {
  return mulDivDown(x, ONE, y);
}

/** x * 1e18 / y, rounded up */
export function divUp(x: bigint, y: bigint): bigint {
  return mulDivUp(x, ONE, y);
}

export function min(x: bigint, y: bigint): bigint {
  return x < y ? x : y;
}

export function max(x: bigint, y: bigint): bigint {
  return x > y ? x : y;
}

// ============================================
// Exponentials
// ============================================

/**
 * Natural logarithm of a signed 18-decimal value.
 *
 * @throws ArithmeticError("InvalidLnInput") for x <= 0 or x > int256 max
 */
export function ln(x: bigint): bigint {
  if (x <= 0n) {
    throw new ArithmeticError("InvalidLnInput", `ln: input ${x} must be positive`);
  }
  if (x > MAX_INT256) {
    throw new ArithmeticError("InvalidLnInput", `ln: input ${x} exceeds int256`);
  }

  // ln(x * C) = ln(x) + ln(C): stay in the 1e18 basis here and add
  // ln(2^96 / 1e18) at the end.

  // Reduce range of x to (1, 2) * 2^96 using ln(2^k * x) = k * ln(2) + ln(x).
  const log2 = BigInt(x.toString(2).length - 1);
  const k = log2 - 96n;
  x = (x << (159n - k)) >> 159n;

  // (8, 8)-term rational approximation. p is monic, scaled later.
  let p = x + 3273285459638523848632254066296n;
  p = ((p * x) >> 96n) + 24828157081833163892658089445524n;
  p = ((p * x) >> 96n) + 43456485725739037958740375743393n;
  p = ((p * x) >> 96n) - 11111509109440967052023855526967n;
  p = ((p * x) >> 96n) - 45023709667254063763336534515857n;
  p = ((p * x) >> 96n) - 14706773417378608786704636184526n;
  p = p * x - (795164235651350426258249787498n << 96n);

  // p stays in 2^192 basis so the division needs no rescale. q is monic.
  let q = x + 5573035233440673466300451813936n;
  q = ((q * x) >> 96n) + 71694874799317883764090561454958n;
  q = ((q * x) >> 96n) + 283447036172924575727196451306956n;
  q = ((q * x) >> 96n) + 401686690394027663651624208769553n;
  q = ((q * x) >> 96n) + 204048457590392012362485061816622n;
  q = ((q * x) >> 96n) + 31853899698501571402653359427138n;
  q = ((q * x) >> 96n) + 909429971244387300277376558375n;

  // r is in (0, 0.125) * 2^96
  let r = p / q;

  // Finalize: multiply by the scale factor s * 5e18 * 2^96, add k * ln(2)
  // and ln(2^96 / 1e18) in the same basis, then convert back to 1e18.
  r *= 1677202110996718588342820967067443963516166n;
  r += 16597577552685614221487285958193947469193820559219878177908093499208371n * k;
  r += 600920179829731861736702779321621459595472258049074101567377883020018308n;
  return r >> 174n;
}

/**
 * e^x for a signed 18-decimal exponent.
 *
 * Returns 0 for x <= EXP_MIN_INPUT, where the exact result is below half a
 * unit.
 *
 * @throws ArithmeticError("InvalidExpInput") for x >= EXP_MAX_INPUT
 */
export function exp(x: bigint): bigint {
  if (x <= EXP_MIN_INPUT) return 0n;
  if (x >= EXP_MAX_INPUT) {
    throw new ArithmeticError("InvalidExpInput", `exp: input ${x} is out of range`);
  }

  // Convert to (-42, 136) * 2^96 for more intermediate precision and a
  // binary basis: multiply by 1e18 / 2^96 = 5^18 / 2^78.
  x = (x << 78n) / 5n ** 18n;

  // Reduce range to (-½ ln 2, ½ ln 2) * 2^96 with exp(x) = exp(x') * 2^k,
  // k = round(x / ln 2). k is in [-61, 195].
  const k = (((x << 96n) / 54916777467707473351141471128n) + (1n << 95n)) >> 96n;
  x = x - k * 54916777467707473351141471128n;

  // (6, 7)-term rational approximation. p is monic, scaled later.
  const y0 = x + 1346386616545796478920950773328n;
  const y = ((y0 * x) >> 96n) + 57155421227552351082224309758442n;
  let p = y + x - 94201549194550492254356042504812n;
  p = ((p * y) >> 96n) + 28719021644029726153956944680412240n;
  p = p * x + (4385272521454847904659076985693276n << 96n);

  // p stays in 2^192 basis so the division needs no rescale.
  let q = x - 2855989394907223263936484059900n;
  q = ((q * x) >> 96n) + 50020603652535783019961831881945n;
  q = ((q * x) >> 96n) - 533845033583426703283633433725380n;
  q = ((q * x) >> 96n) + 3604857256930695427073651918091429n;
  q = ((q * x) >> 96n) - 14423608567350463180887372962807573n;
  q = ((q * x) >> 96n) + 26449188498355588339934803723976023n;

  // r is in (0.09, 0.25) * 2^96
  const r = p / q;

  // Multiply by the scale factor s ≈ 6.031367120, the 2^k factor and the
  // 1e18 / 2^96 basis change at once, in a 2^213 basis so the final shift
  // is always positive.
  return (r * 3822833074963236453042738258902158003155416615667n) >> (195n - k);
}

/**
 * x^y for 18-decimal x and y, computed as exp(y * ln(x)).
 *
 * pow(x, 0) = 1e18 and pow(0, y) = 0 for y > 0.
 *
 * @throws ArithmeticError when ln or exp leave their domains
 */
export function pow(x: bigint, y: bigint): bigint {
  assertUint("pow", x);
  assertUint("pow", y);
  if (y === 0n) return ONE;
  if (x === 0n) return 0n;
  if (y > MAX_INT256) {
    throw new ArithmeticError("Overflow", `pow: exponent ${y} exceeds int256`);
  }

  // Truncating division, like the signed division it replaces.
  const yLnX = (y * ln(x)) / ONE;
  return exp(yLnX);
}

// ============================================
// Scale Conversion
// ============================================

/** Rescale a 27-decimal (ray) value to 18 decimals, rounding down */
export function rayToWad(x: bigint): bigint {
  assertUint("rayToWad", x);
  return x / WAD_RAY_RATIO;
}

/** Rescale an 18-decimal value to 27 decimals */
export function wadToRay(x: bigint): bigint {
  return mulDivDown(x, RAY, ONE);
}

// ============================================
// Parsing / Formatting
// ============================================

/**
 * Parse a decimal number or string into 18-decimal fixed point.
 *
 * toFixed("1.5") === 1_500000000000000000n. Extra decimals beyond 18 are
 * truncated.
 */
export function toFixed(value: string | number | bigint): bigint {
  if (typeof value === "bigint") return value * ONE;
  const text = typeof value === "number" ? value.toString() : value.trim();
  if (!/^-?\d+(\.\d+)?(e[+-]?\d+)?$/i.test(text)) {
    throw new ValidationError("InvalidNumber", `toFixed: cannot parse "${text}"`);
  }

  const [mantissa, exponentPart] = text.toLowerCase().split("e");
  const exponent = exponentPart === undefined ? 0 : Number(exponentPart);
  const negative = mantissa.startsWith("-");
  const [whole, fraction = ""] = mantissa.replace("-", "").split(".");

  // Shift the decimal point by the exponent, then pad/truncate to 18 places.
  const digits = whole + fraction;
  const pointIndex = whole.length + exponent;
  let result: bigint;
  if (pointIndex <= 0) {
    const padded = ("0".repeat(-pointIndex) + digits).padEnd(18, "0").slice(0, 18);
    result = BigInt(padded);
  } else {
    const intPart = digits.slice(0, pointIndex).padEnd(pointIndex, "0");
    const fracPart = digits.slice(pointIndex).padEnd(18, "0").slice(0, 18);
    result = BigInt(intPart) * ONE + BigInt(fracPart);
  }
  return negative ? -result : result;
}

/** Format an 18-decimal value as a decimal string without trailing zeros */
export function formatFixed(value: bigint): string {
  const negative = value < 0n;
  const abs = negative ? -value : value;
  const whole = abs / ONE;
  const fraction = (abs % ONE).toString().padStart(18, "0").replace(/0+$/, "");
  const text = fraction.length > 0 ? `${whole}.${fraction}` : whole.toString();
  return negative ? `-${text}` : text;
}
