/**
 * Fixed-rate yield AMM core
 *
 * - fixed-point: 18-decimal bigint math with explicit rounding
 * - yield-space: the YieldSpace invariant and its trade solvers
 * - pricing: flat + curve trade split, fees, rates and LP pricing
 * - pool: checkpointed reserves, positions and liquidity
 * - matching-engine: settlement of signed order intents
 */

export * from "./constants";
export * from "./errors";
export {
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
  ln,
  exp,
  pow,
  rayToWad,
  wadToRay,
  toFixed,
  formatFixed,
} from "./fixed-point";
export * as yieldSpace from "./yield-space";
export * from "./pricing";
export * from "./asset-id";
export * from "./ledger";
export * from "./token";
export * from "./yield-source";
export * from "./pool";
export * from "./order-intent";
export * from "./matching-engine";
export * from "./config";
export * from "./logger";
