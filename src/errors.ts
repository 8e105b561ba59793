/**
 * Typed failures raised by the AMM core.
 *
 * Every failure aborts the operation that raised it. The `kind` groups codes
 * the way callers usually branch on them; `code` is stable and safe to match.
 */

export type ErrorKind =
  | "arithmetic"
  | "curve"
  | "validation"
  | "authorization"
  | "slippage";

export type ArithmeticErrorCode =
  | "Overflow"
  | "Underflow"
  | "DivisionByZero"
  | "InvalidLnInput"
  | "InvalidExpInput";

export type CurveErrorCode =
  | "InvalidCurveState"
  | "InsufficientLiquidity"
  | "NegativeInterest";

export type ValidationErrorCode =
  | "InvalidAssetId"
  | "InvalidNumber"
  | "MalformedOrder"
  | "InvalidTimestamp"
  | "InvalidCheckpointTime"
  | "InvalidConfig"
  | "ZeroAmount"
  | "MinimumTransactionAmount"
  | "InvalidApr"
  | "PoolAlreadyInitialized"
  | "PoolNotInitialized"
  | "UnsupportedTrade"
  | "InvalidMaturityTime"
  | "InvalidDestination"
  | "InvalidCounterparty"
  | "MismatchedPool"
  | "UnknownPool"
  | "MismatchedSettlementAsset"
  | "InvalidOrderCombination"
  | "InsufficientBalance"
  | "ReentrantCall";

export type AuthorizationErrorCode =
  | "InvalidSignature"
  | "OrderExpired"
  | "OrderCancelled"
  | "AlreadyFullyExecuted"
  | "InsufficientFunding"
  | "InvalidSender";

export type SlippageErrorCode =
  | "OutputLimit"
  | "DepositLimit"
  | "MinimumSharePrice";

export type ErrorCode =
  | ArithmeticErrorCode
  | CurveErrorCode
  | ValidationErrorCode
  | AuthorizationErrorCode
  | SlippageErrorCode;

export abstract class AmmError extends Error {
  abstract readonly kind: ErrorKind;
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.code = code;
    this.name = new.target.name;
  }
}

/** Overflow/underflow, division by zero, ln/exp domain violations */
export class ArithmeticError extends AmmError {
  readonly kind = "arithmetic" as const;

  constructor(code: ArithmeticErrorCode, message: string) {
    super(code, message);
  }
}

/** The curve cannot be solved at the current reserves */
export class CurveError extends AmmError {
  readonly kind = "curve" as const;

  constructor(code: CurveErrorCode, message: string) {
    super(code, message);
  }
}

/** Malformed input or a request the pool cannot take in its current state */
export class ValidationError extends AmmError {
  readonly kind = "validation" as const;

  constructor(code: ValidationErrorCode, message: string) {
    super(code, message);
  }
}

/** Signature, expiry, cancellation and funding failures */
export class AuthorizationError extends AmmError {
  readonly kind = "authorization" as const;

  constructor(code: AuthorizationErrorCode, message: string) {
    super(code, message);
  }
}

/** A result fell outside a caller-specified limit */
export class SlippageError extends AmmError {
  readonly kind = "slippage" as const;

  constructor(code: SlippageErrorCode, message: string) {
    super(code, message);
  }
}

export function isAmmError(err: unknown): err is AmmError {
  return err instanceof AmmError;
}
