import "dotenv/config";
import { ONE, SECONDS_PER_DAY, SECONDS_PER_YEAR, ZERO_ADDRESS } from "./constants";
import { ValidationError } from "./errors";
import { toFixed } from "./fixed-point";
import { calculateTimeStretch } from "./pricing";

export interface Fees {
  /** Fee on the curve leg of a trade, charged on the rate spread */
  curve: bigint;
  /** Fee on the flat leg of a trade */
  flat: bigint;
  /** Governance's cut of the curve and flat fees */
  governance: bigint;
}

export interface PoolConfig {
  positionDuration: bigint;
  checkpointDuration: bigint;
  timeStretch: bigint;
  initialVaultSharePrice: bigint;
  minimumShareReserves: bigint;
  minimumTransactionAmount: bigint;
  fees: Fees;
}

export interface EngineConfig {
  name: string;
  version: string;
  chainId: bigint;
  /** Address the engine's signatures are bound to */
  address: string;
}

export interface AppConfig {
  logLevel: string;
  /** Address of the pool's own account */
  poolAddress: string;
  initialApr: bigint;
  pool: PoolConfig;
  engine: EngineConfig;
}

function invalid(message: string): never {
  throw new ValidationError("InvalidConfig", message);
}

/**
 * Check a pool configuration before a pool is built from it.
 *
 * @throws ValidationError("InvalidConfig")
 */
export function validatePoolConfig(config: PoolConfig): void {
  const { positionDuration, checkpointDuration } = config;
  if (checkpointDuration <= 0n) invalid("checkpointDuration must be positive");
  if (positionDuration < checkpointDuration) {
    invalid("positionDuration must be at least one checkpoint");
  }
  if (positionDuration % checkpointDuration !== 0n) {
    invalid("positionDuration must be a multiple of checkpointDuration");
  }
  if (config.timeStretch <= 0n || config.timeStretch >= ONE) {
    invalid("timeStretch must be in (0, 1)");
  }
  if (config.initialVaultSharePrice <= 0n) invalid("initialVaultSharePrice must be positive");
  if (config.minimumShareReserves <= 0n) invalid("minimumShareReserves must be positive");
  if (config.minimumTransactionAmount < 0n) invalid("minimumTransactionAmount must not be negative");
  for (const [name, fee] of Object.entries(config.fees)) {
    if (fee < 0n || fee > ONE) invalid(`${name} fee must be in [0, 1]`);
  }
}

type Env = Record<string, string | undefined>;

function readBigInt(env: Env, name: string, fallback: bigint): bigint {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  if (!/^\d+$/.test(raw.trim())) invalid(`${name} must be an integer, got "${raw}"`);
  return BigInt(raw.trim());
}

function readFixed(env: Env, name: string, fallback: bigint): bigint {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  try {
    return toFixed(raw);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    return invalid(`${name}: ${detail}`);
  }
}

/**
 * Read the configuration from the environment. Fixed-point values are given
 * as decimals ("0.05"), durations in seconds. `TIME_STRETCH` overrides the
 * stretch derived from `INITIAL_APR`.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const initialApr = readFixed(env, "INITIAL_APR", toFixed("0.05"));
  const pool: PoolConfig = {
    positionDuration: readBigInt(env, "POSITION_DURATION", SECONDS_PER_YEAR),
    checkpointDuration: readBigInt(env, "CHECKPOINT_DURATION", SECONDS_PER_DAY),
    timeStretch: readFixed(env, "TIME_STRETCH", 0n) || calculateTimeStretch(initialApr),
    initialVaultSharePrice: readFixed(env, "INITIAL_VAULT_SHARE_PRICE", ONE),
    minimumShareReserves: readFixed(env, "MINIMUM_SHARE_RESERVES", toFixed("10")),
    minimumTransactionAmount: readFixed(env, "MINIMUM_TRANSACTION_AMOUNT", toFixed("0.001")),
    fees: {
      curve: readFixed(env, "CURVE_FEE", toFixed("0.01")),
      flat: readFixed(env, "FLAT_FEE", toFixed("0.0005")),
      governance: readFixed(env, "GOVERNANCE_FEE", toFixed("0.15")),
    },
  };
  validatePoolConfig(pool);

  return {
    logLevel: env.LOG_LEVEL ?? "info",
    poolAddress: env.POOL_ADDRESS ?? ZERO_ADDRESS,
    initialApr,
    pool,
    engine: {
      name: env.ENGINE_NAME ?? "Fixed Rate Matching Engine",
      version: env.ENGINE_VERSION ?? "v1.0.0",
      chainId: readBigInt(env, "CHAIN_ID", 1n),
      address: env.ENGINE_ADDRESS ?? ZERO_ADDRESS,
    },
  };
}
