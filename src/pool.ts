/**
 * Fixed-Rate Pool
 *
 * Holds the reserves, checkpoints and open interest of one pool and applies
 * every trade, liquidity change and maturity to them. Each public operation
 * runs as a single transaction: on any failure the pool state, checkpoints,
 * position ledger and yield source are restored, and a nested call into the
 * pool from inside an operation is rejected.
 *
 * Positions are tracked in the ledger under their asset ids; the LP total
 * supply doubles as the curve's bond reserve adjustment. Withdrawal shares
 * are denominated in LP shares: until they are ready they keep their claim
 * on the pool's value alongside the LP shares.
 */

import { ZERO_ADDRESS } from "./constants";
import {
  AuthorizationError,
  CurveError,
  SlippageError,
  ValidationError,
} from "./errors";
import { add, divDown, divUp, mulDivDown, mulDivUp, mulDown, mulUp, min, sub } from "./fixed-point";
import {
  LP_ASSET_ID,
  WITHDRAWAL_SHARE_ASSET_ID,
  longAssetId,
  shortAssetId,
} from "./asset-id";
import { validatePoolConfig, type PoolConfig } from "./config";
import type { Ledger, Revertible } from "./ledger";
import { silentLogger, toLogFields, type Logger } from "./logger";
import {
  applyLiquidityDelta,
  calculateBondReserves,
  calculateBurnFlatFee,
  calculateBurnProceeds,
  calculateCloseLong,
  calculateCloseShort,
  calculateLpSharesOutForSharesIn,
  calculateMaxLong,
  calculateMaxShort,
  calculateMintCost,
  calculateOpenLong,
  calculateOpenShort,
  calculatePresentValue,
  calculateRateFromPrice,
  calculateSharesOutForLpSharesIn,
  calculateSpotPrice,
  calculateTimeRemaining,
  calculateGovernanceFee,
  toCheckpoint,
  type MarketState,
  type OpenPositions,
} from "./pricing";
import type { YieldSource } from "./yield-source";

// ============================================
// Types
// ============================================

export interface PoolState {
  shareReserves: bigint;
  bondReserves: bigint;
  longsOutstanding: bigint;
  shortsOutstanding: bigint;
  longAverageMaturityTime: bigint;
  shortAverageMaturityTime: bigint;
  withdrawalSharesReadyToWithdraw: bigint;
  /** Vault shares set aside to pay the ready withdrawal shares */
  withdrawalSharesProceeds: bigint;
  governanceFeesAccrued: bigint;
}

export interface PoolInfo extends PoolState {
  lpTotalSupply: bigint;
  withdrawalSharesOutstanding: bigint;
  vaultSharePrice: bigint;
}

export interface Checkpoint {
  /** Vault share price recorded the first time the checkpoint was touched */
  vaultSharePrice: bigint;
  /** Bond-weighted vault share price at which the bucket's longs opened */
  longSharePrice: bigint;
}

export interface TradeOptions {
  /** Receiver of positions and proceeds */
  destination: string;
  /** Settle in base rather than vault shares */
  asBase: boolean;
  /** Reject if the vault share price is below this */
  minVaultSharePrice?: bigint;
}

export interface MintOptions {
  longDestination: string;
  shortDestination: string;
  asBase: boolean;
  minVaultSharePrice?: bigint;
}

export interface PoolDependencies {
  ledger: Ledger & Revertible;
  yieldSource: YieldSource & Revertible;
  /** Account allowed to collect governance fees */
  governance: string;
  /** Current time in seconds */
  clock: () => bigint;
  logger?: Logger;
}

export interface OpenLongReceipt {
  maturityTime: bigint;
  bondAmount: bigint;
}

export interface OpenShortReceipt {
  maturityTime: bigint;
  /** Amount deposited, in base or shares per `asBase` */
  deposit: bigint;
}

export interface MintReceipt {
  maturityTime: bigint;
  bondAmount: bigint;
  /** Amount deposited, in base or shares per `asBase` */
  cost: bigint;
}

export interface RemoveLiquidityReceipt {
  proceeds: bigint;
  withdrawalShares: bigint;
}

export interface RedeemReceipt {
  redeemed: bigint;
  proceeds: bigint;
}

function emptyState(): PoolState {
  return {
    shareReserves: 0n,
    bondReserves: 0n,
    longsOutstanding: 0n,
    shortsOutstanding: 0n,
    longAverageMaturityTime: 0n,
    shortAverageMaturityTime: 0n,
    withdrawalSharesReadyToWithdraw: 0n,
    withdrawalSharesProceeds: 0n,
    governanceFeesAccrued: 0n,
  };
}

/**
 * Weighted average of timestamps or prices after adding or removing
 * `deltaWeight` at `delta`. Rounded down.
 */
export function updateWeightedAverage(
  average: bigint,
  totalWeight: bigint,
  delta: bigint,
  deltaWeight: bigint,
  isAdding: boolean
): bigint {
  if (isAdding) {
    const total = add(totalWeight, deltaWeight);
    if (total === 0n) return 0n;
    return mulDivDown(average, totalWeight, total) + mulDivDown(delta, deltaWeight, total);
  }
  if (deltaWeight >= totalWeight) return 0n;
  const kept = average * totalWeight;
  const removed = delta * deltaWeight;
  return kept > removed ? (kept - removed) / (totalWeight - deltaWeight) : 0n;
}

function scaleForNegativeInterest(
  proceeds: bigint,
  closePrice: bigint,
  openPrice: bigint
): bigint {
  return openPrice > closePrice ? mulDivDown(proceeds, closePrice, openPrice) : proceeds;
}

// ============================================
// Pool
// ============================================

export class Pool implements Revertible {
  private state: PoolState = emptyState();
  private checkpoints = new Map<bigint, Checkpoint>();
  private locked = false;

  private readonly ledger: Ledger & Revertible;
  private readonly yieldSource: YieldSource & Revertible;
  private readonly governance: string;
  private readonly clock: () => bigint;
  private readonly logger: Logger;

  constructor(readonly config: PoolConfig, deps: PoolDependencies) {
    validatePoolConfig(config);
    this.ledger = deps.ledger;
    this.yieldSource = deps.yieldSource;
    this.governance = deps.governance;
    this.clock = deps.clock;
    this.logger = deps.logger ?? silentLogger;
  }

  // ============================================
  // Transactions
  // ============================================

  snapshot(): () => void {
    const state = { ...this.state };
    const checkpoints = new Map(
      [...this.checkpoints].map(([time, cp]) => [time, { ...cp }] as const)
    );
    const restoreLedger = this.ledger.snapshot();
    const restoreYieldSource = this.yieldSource.snapshot();
    return () => {
      this.state = state;
      this.checkpoints = checkpoints;
      restoreYieldSource();
      restoreLedger();
    };
  }

  private transact<T>(operation: string, fn: () => T): T {
    if (this.locked) {
      throw new ValidationError(
        "ReentrantCall",
        `${operation}: pool is already executing an operation`
      );
    }
    const restore = this.snapshot();
    this.locked = true;
    try {
      return fn();
    } catch (err) {
      restore();
      throw err;
    } finally {
      this.locked = false;
    }
  }

  // ============================================
  // Liquidity
  // ============================================

  /**
   * Seed the pool with its first deposit. Mints c * z LP shares and sets the
   * bond reserves so the pool quotes `apr`.
   */
  initialize(provider: string, contribution: bigint, apr: bigint, options: TradeOptions): bigint {
    return this.transact("initialize", () => {
      if (this.isInitialized()) {
        throw new ValidationError("PoolAlreadyInitialized", "initialize: pool is already initialized");
      }
      if (apr <= 0n) {
        throw new ValidationError("InvalidApr", `initialize: apr ${apr} must be positive`);
      }
      this.requireDestination(options.destination);
      const c = this.readVaultSharePrice(options.minVaultSharePrice);

      const shares = this.deposit(provider, contribution, options.asBase);
      if (shares <= this.config.minimumShareReserves) {
        throw new ValidationError(
          "MinimumTransactionAmount",
          `initialize: ${shares} shares do not exceed the minimum reserves`
        );
      }
      this.applyCheckpoint(this.latestCheckpoint(), c);

      const lpShares = mulDown(c, shares);
      this.state.shareReserves = shares;
      this.state.bondReserves = calculateBondReserves(
        shares,
        lpShares,
        this.config.initialVaultSharePrice,
        apr,
        this.config.positionDuration,
        this.config.timeStretch
      );
      this.ledger.mint(LP_ASSET_ID, options.destination, lpShares);

      this.logger.info(
        toLogFields({ provider, shares, lpShares, bondReserves: this.state.bondReserves }),
        "pool initialized"
      );
      return lpShares;
    });
  }

  addLiquidity(
    provider: string,
    contribution: bigint,
    minLpShares: bigint,
    options: TradeOptions
  ): bigint {
    return this.transact("addLiquidity", () => {
      this.requireInitialized("addLiquidity");
      this.requireDestination(options.destination);
      const c = this.readVaultSharePrice(options.minVaultSharePrice);
      this.requireMinimumAmount("addLiquidity", contribution, options.asBase);
      this.applyCheckpoint(this.latestCheckpoint(), c);

      const shares = this.deposit(provider, contribution, options.asBase);
      const { shareReserves: z, bondReserves: y } = this.state;
      const lpShares = calculateLpSharesOutForSharesIn(
        shares,
        z,
        this.lpClaims(),
        this.state.longsOutstanding,
        this.state.shortsOutstanding,
        c
      );
      if (lpShares === 0n) {
        throw new ValidationError("MinimumTransactionAmount", "addLiquidity: no LP shares for the contribution");
      }
      if (lpShares < minLpShares) {
        throw new SlippageError("OutputLimit", `addLiquidity: ${lpShares} LP shares < ${minLpShares}`);
      }

      this.resizeReserves(z + shares, this.lpTotalSupply() + lpShares, "addLiquidity");
      this.ledger.mint(LP_ASSET_ID, options.destination, lpShares);

      this.logger.info(toLogFields({ provider, shares, lpShares, bondReserves: y }), "liquidity added");
      return lpShares;
    });
  }

  /**
   * Redeem `lpShares`. They are exchanged one for one for withdrawal shares,
   * which are paid at the LP share price as far as idle liquidity allows;
   * the rest stay outstanding until checkpoints free liquidity.
   */
  removeLiquidity(
    provider: string,
    lpShares: bigint,
    minOutput: bigint,
    options: TradeOptions
  ): RemoveLiquidityReceipt {
    return this.transact("removeLiquidity", () => {
      this.requireInitialized("removeLiquidity");
      this.requireDestination(options.destination);
      if (lpShares <= 0n) {
        throw new ValidationError("ZeroAmount", "removeLiquidity: amount must be positive");
      }
      const c = this.readVaultSharePrice(options.minVaultSharePrice);
      this.applyCheckpoint(this.latestCheckpoint(), c);

      // The curve adjustment drops with the LP supply; y takes up the
      // difference so the spot price holds.
      this.resizeReserves(this.state.shareReserves, this.lpTotalSupply() - lpShares, "removeLiquidity");
      this.ledger.burn(LP_ASSET_ID, provider, lpShares);
      this.ledger.mint(WITHDRAWAL_SHARE_ASSET_ID, options.destination, lpShares);
      this.distributeExcessIdle(c);

      const { redeemed, shares } = this.redeemReady(options.destination, lpShares);
      const proceeds = this.withdraw(shares, options);
      if (proceeds < minOutput) {
        throw new SlippageError("OutputLimit", `removeLiquidity: ${proceeds} < ${minOutput}`);
      }

      const withdrawalShares = lpShares - redeemed;
      this.logger.info(
        toLogFields({ provider, lpShares, shares, withdrawalShares }),
        "liquidity removed"
      );
      return { proceeds, withdrawalShares };
    });
  }

  /** Redeem up to `shares` withdrawal shares that are ready */
  redeemWithdrawalShares(
    provider: string,
    shares: bigint,
    minOutput: bigint,
    options: TradeOptions
  ): RedeemReceipt {
    return this.transact("redeemWithdrawalShares", () => {
      this.requireDestination(options.destination);
      const c = this.readVaultSharePrice(options.minVaultSharePrice);
      this.applyCheckpoint(this.latestCheckpoint(), c);

      const { redeemed, shares: shareProceeds } = this.redeemReady(provider, shares);
      if (redeemed === 0n) return { redeemed: 0n, proceeds: 0n };

      const proceeds = this.withdraw(shareProceeds, options);
      if (proceeds < minOutput) {
        throw new SlippageError("OutputLimit", `redeemWithdrawalShares: ${proceeds} < ${minOutput}`);
      }

      this.logger.info(toLogFields({ provider, redeemed, proceeds }), "withdrawal shares redeemed");
      return { redeemed, proceeds };
    });
  }

  // ============================================
  // Longs
  // ============================================

  openLong(
    trader: string,
    amount: bigint,
    minOutput: bigint,
    options: TradeOptions
  ): OpenLongReceipt {
    return this.transact("openLong", () => {
      this.requireInitialized("openLong");
      this.requireDestination(options.destination);
      const c = this.readVaultSharePrice(options.minVaultSharePrice);
      this.requireMinimumAmount("openLong", amount, options.asBase);

      const latest = this.latestCheckpoint();
      this.applyCheckpoint(latest, c);
      const maturityTime = latest + this.config.positionDuration;

      const shares = this.deposit(trader, amount, options.asBase);
      const result = calculateOpenLong(this.market(c), shares);
      if (result.bondProceeds < minOutput) {
        throw new SlippageError("OutputLimit", `openLong: ${result.bondProceeds} bonds < ${minOutput}`);
      }

      this.state.shareReserves = add(this.state.shareReserves, result.shareReservesDelta);
      this.state.bondReserves = this.debitBondReserves(result.bondReservesDelta, "openLong");
      this.state.governanceFeesAccrued += result.governanceFee;
      this.recordLongOpened(latest, maturityTime, result.bondProceeds, c);
      this.ledger.mint(longAssetId(maturityTime), options.destination, result.bondProceeds);

      this.assertSolvency(c, "openLong");
      this.logger.info(
        toLogFields({ trader, shares, bondAmount: result.bondProceeds, maturityTime }),
        "long opened"
      );
      return { maturityTime, bondAmount: result.bondProceeds };
    });
  }

  closeLong(
    trader: string,
    maturityTime: bigint,
    bondAmount: bigint,
    minOutput: bigint,
    options: TradeOptions
  ): bigint {
    return this.transact("closeLong", () => {
      this.requireDestination(options.destination);
      this.requireMaturityTime(maturityTime, "closeLong");
      this.requirePositiveAmount(bondAmount, "closeLong");
      const c = this.readVaultSharePrice(options.minVaultSharePrice);
      const timeRemaining = this.touchMaturity(maturityTime, c);

      this.ledger.burn(longAssetId(maturityTime), trader, bondAmount);
      const openPrice = this.getCheckpoint(maturityTime - this.config.positionDuration).longSharePrice;

      let shareProceeds: bigint;
      if (timeRemaining > 0n) {
        const result = calculateCloseLong(this.market(c), bondAmount, timeRemaining);
        this.updateLiquidity(-(result.flat - result.flatFee + result.governanceFlatFee));
        this.debitShareReserves(
          result.curve - result.curveFee + result.governanceCurveFee,
          "closeLong"
        );
        this.state.bondReserves = add(this.state.bondReserves, result.curveBonds);
        this.state.governanceFeesAccrued += result.governanceCurveFee + result.governanceFlatFee;
        this.recordLongClosed(maturityTime, bondAmount);
        shareProceeds = scaleForNegativeInterest(result.shareProceeds, c, openPrice);
        // The negative interest haircut stays with the LPs.
        this.updateLiquidity(result.shareProceeds - shareProceeds);
      } else {
        // Matured longs were settled against the reserves at their checkpoint.
        const closePrice = this.getCheckpoint(maturityTime).vaultSharePrice;
        const result = calculateCloseLong(this.market(closePrice), bondAmount, 0n);
        shareProceeds = scaleForNegativeInterest(result.shareProceeds, closePrice, openPrice);
      }

      const proceeds = this.withdraw(shareProceeds, options);
      if (proceeds < minOutput) {
        throw new SlippageError("OutputLimit", `closeLong: ${proceeds} < ${minOutput}`);
      }

      this.logger.info(
        toLogFields({ trader, bondAmount, maturityTime, shareProceeds }),
        "long closed"
      );
      return proceeds;
    });
  }

  // ============================================
  // Shorts
  // ============================================

  openShort(
    trader: string,
    bondAmount: bigint,
    maxDeposit: bigint,
    options: TradeOptions
  ): OpenShortReceipt {
    return this.transact("openShort", () => {
      this.requireInitialized("openShort");
      this.requireDestination(options.destination);
      const c = this.readVaultSharePrice(options.minVaultSharePrice);
      if (bondAmount < this.config.minimumTransactionAmount || bondAmount === 0n) {
        throw new ValidationError(
          "MinimumTransactionAmount",
          `openShort: ${bondAmount} bonds is below the minimum`
        );
      }

      const latest = this.latestCheckpoint();
      const openPrice = this.applyCheckpoint(latest, c);
      const maturityTime = latest + this.config.positionDuration;

      const result = calculateOpenShort(this.market(c), bondAmount, openPrice);
      const deposit = options.asBase ? mulUp(result.traderDeposit, c) : result.traderDeposit;
      if (deposit > maxDeposit) {
        throw new SlippageError("DepositLimit", `openShort: deposit ${deposit} > ${maxDeposit}`);
      }
      this.deposit(trader, deposit, options.asBase);

      this.debitShareReserves(result.shareReservesDelta, "openShort");
      this.state.bondReserves = add(this.state.bondReserves, result.bondReservesDelta);
      this.state.governanceFeesAccrued += result.governanceFee;
      this.recordShortOpened(maturityTime, bondAmount);
      this.ledger.mint(shortAssetId(maturityTime), options.destination, bondAmount);

      this.assertSolvency(c, "openShort");
      this.logger.info(toLogFields({ trader, bondAmount, deposit, maturityTime }), "short opened");
      return { maturityTime, deposit };
    });
  }

  closeShort(
    trader: string,
    maturityTime: bigint,
    bondAmount: bigint,
    minOutput: bigint,
    options: TradeOptions
  ): bigint {
    return this.transact("closeShort", () => {
      this.requireDestination(options.destination);
      this.requireMaturityTime(maturityTime, "closeShort");
      this.requirePositiveAmount(bondAmount, "closeShort");
      const c = this.readVaultSharePrice(options.minVaultSharePrice);
      const timeRemaining = this.touchMaturity(maturityTime, c);

      this.ledger.burn(shortAssetId(maturityTime), trader, bondAmount);
      const openPrice = this.openVaultSharePrice(maturityTime, c);

      let shareProceeds: bigint;
      if (timeRemaining > 0n) {
        const result = calculateCloseShort(this.market(c), bondAmount, openPrice, c, timeRemaining);
        this.updateLiquidity(result.flat + result.flatFee - result.governanceFlatFee);
        this.state.shareReserves = add(
          this.state.shareReserves,
          result.curve + result.curveFee - result.governanceCurveFee
        );
        this.state.bondReserves = this.debitBondReserves(result.curveBonds, "closeShort");
        this.state.governanceFeesAccrued += result.governanceCurveFee + result.governanceFlatFee;
        this.recordShortClosed(maturityTime, bondAmount);
        shareProceeds = result.shareProceeds;
      } else {
        // Matured shorts were settled against the reserves at their checkpoint.
        const closePrice = this.getCheckpoint(maturityTime).vaultSharePrice;
        shareProceeds = calculateCloseShort(this.market(c), bondAmount, openPrice, closePrice, 0n)
          .shareProceeds;
      }

      const proceeds = this.withdraw(shareProceeds, options);
      if (proceeds < minOutput) {
        throw new SlippageError("OutputLimit", `closeShort: ${proceeds} < ${minOutput}`);
      }

      this.logger.info(
        toLogFields({ trader, bondAmount, maturityTime, shareProceeds }),
        "short closed"
      );
      return proceeds;
    });
  }

  // ============================================
  // Pairs
  // ============================================

  /**
   * Mint a matched long and short of `bondAmount` bonds, funded by `payer`.
   * The pair nets out against the curve, so reserves are untouched.
   */
  mint(payer: string, bondAmount: bigint, maxDeposit: bigint, options: MintOptions): MintReceipt {
    return this.transact("mint", () => {
      this.requireInitialized("mint");
      this.requireDestination(options.longDestination);
      this.requireDestination(options.shortDestination);
      const c = this.readVaultSharePrice(options.minVaultSharePrice);
      if (bondAmount < this.config.minimumTransactionAmount || bondAmount === 0n) {
        throw new ValidationError("MinimumTransactionAmount", `mint: ${bondAmount} bonds is below the minimum`);
      }

      const latest = this.latestCheckpoint();
      const openPrice = this.applyCheckpoint(latest, c);
      const maturityTime = latest + this.config.positionDuration;

      const { flat: flatFee, governance: governanceFee } = this.config.fees;
      const costBase = calculateMintCost(bondAmount, c, openPrice, flatFee, governanceFee);
      const cost = options.asBase ? costBase : divUp(costBase, c);
      if (cost > maxDeposit) {
        throw new SlippageError("DepositLimit", `mint: cost ${cost} > ${maxDeposit}`);
      }
      this.deposit(payer, cost, options.asBase);

      const governanceBase = 2n * mulUp(mulUp(bondAmount, flatFee), governanceFee);
      this.state.governanceFeesAccrued += divDown(governanceBase, c);
      this.recordLongOpened(latest, maturityTime, bondAmount, c);
      this.recordShortOpened(maturityTime, bondAmount);
      this.ledger.mint(longAssetId(maturityTime), options.longDestination, bondAmount);
      this.ledger.mint(shortAssetId(maturityTime), options.shortDestination, bondAmount);

      this.logger.info(toLogFields({ payer, bondAmount, cost, maturityTime }), "pair minted");
      return { maturityTime, bondAmount, cost };
    });
  }

  /**
   * Burn `bondAmount` of `longHolder`'s longs together with as many of
   * `shortHolder`'s shorts and pay out the pair's backing.
   */
  burn(
    longHolder: string,
    shortHolder: string,
    maturityTime: bigint,
    bondAmount: bigint,
    minOutput: bigint,
    options: TradeOptions
  ): bigint {
    return this.transact("burn", () => {
      this.requireDestination(options.destination);
      this.requireMaturityTime(maturityTime, "burn");
      this.requirePositiveAmount(bondAmount, "burn");
      const c = this.readVaultSharePrice(options.minVaultSharePrice);
      const timeRemaining = this.touchMaturity(maturityTime, c);

      this.ledger.burn(longAssetId(maturityTime), longHolder, bondAmount);
      this.ledger.burn(shortAssetId(maturityTime), shortHolder, bondAmount);
      const openPrice = this.openVaultSharePrice(maturityTime, c);
      const flatFee = this.config.fees.flat;

      let closePrice = c;
      if (timeRemaining > 0n) {
        const retained = 2n * calculateBurnFlatFee(bondAmount, timeRemaining, c, flatFee);
        const governance = calculateGovernanceFee(retained, this.config.fees.governance);
        this.updateLiquidity(retained - governance);
        this.state.governanceFeesAccrued += governance;
        this.recordLongClosed(maturityTime, bondAmount);
        this.recordShortClosed(maturityTime, bondAmount);
      } else {
        closePrice = this.getCheckpoint(maturityTime).vaultSharePrice;
      }

      const shareProceeds = calculateBurnProceeds(
        bondAmount,
        timeRemaining,
        openPrice,
        closePrice,
        c,
        flatFee
      );
      const proceeds = this.withdraw(shareProceeds, options);
      if (proceeds < minOutput) {
        throw new SlippageError("OutputLimit", `burn: ${proceeds} < ${minOutput}`);
      }

      this.logger.info(
        toLogFields({ longHolder, shortHolder, bondAmount, maturityTime, shareProceeds }),
        "pair burned"
      );
      return proceeds;
    });
  }

  // ============================================
  // Checkpoints and Governance
  // ============================================

  /**
   * Record the checkpoint at `checkpointTime` and mature the positions that
   * expire there. Repeat calls are no-ops.
   */
  checkpoint(checkpointTime: bigint): void {
    this.transact("checkpoint", () => {
      const now = this.clock();
      if (
        checkpointTime < 0n ||
        checkpointTime > now ||
        checkpointTime % this.config.checkpointDuration !== 0n
      ) {
        throw new ValidationError(
          "InvalidCheckpointTime",
          `checkpoint: ${checkpointTime} is not a past checkpoint boundary`
        );
      }
      this.applyCheckpoint(checkpointTime, this.yieldSource.vaultSharePrice());
    });
  }

  collectGovernanceFees(caller: string, options: TradeOptions): bigint {
    return this.transact("collectGovernanceFees", () => {
      if (caller.toLowerCase() !== this.governance.toLowerCase()) {
        throw new AuthorizationError("InvalidSender", `collectGovernanceFees: ${caller} is not governance`);
      }
      this.requireDestination(options.destination);
      const fees = this.state.governanceFeesAccrued;
      this.state.governanceFeesAccrued = 0n;
      const proceeds = this.withdraw(fees, options);
      this.logger.info(toLogFields({ fees, proceeds }), "governance fees collected");
      return proceeds;
    });
  }

  // ============================================
  // Views
  // ============================================

  getPoolState(): PoolInfo {
    return {
      ...this.state,
      lpTotalSupply: this.lpTotalSupply(),
      withdrawalSharesOutstanding: this.ledger.totalSupply(WITHDRAWAL_SHARE_ASSET_ID),
      vaultSharePrice: this.yieldSource.vaultSharePrice(),
    };
  }

  getCheckpoint(checkpointTime: bigint): Checkpoint {
    const cp = this.checkpoints.get(checkpointTime);
    return cp ? { ...cp } : { vaultSharePrice: 0n, longSharePrice: 0n };
  }

  latestCheckpoint(): bigint {
    return toCheckpoint(this.clock(), this.config.checkpointDuration);
  }

  getSpotPrice(): bigint {
    return calculateSpotPrice(this.market(this.yieldSource.vaultSharePrice()));
  }

  getSpotRate(): bigint {
    return calculateRateFromPrice(this.getSpotPrice(), this.config.positionDuration);
  }

  /** Shares the LPs would hold if every open position closed now */
  getPresentValue(): bigint {
    const now = this.clock();
    const remaining = (maturity: bigint): bigint =>
      calculateTimeRemaining(
        maturity,
        now,
        this.config.checkpointDuration,
        this.config.positionDuration
      );
    return calculatePresentValue(
      this.market(this.yieldSource.vaultSharePrice()),
      {
        longsOutstanding: this.state.longsOutstanding,
        shortsOutstanding: this.state.shortsOutstanding,
        longTimeRemaining: remaining(this.state.longAverageMaturityTime),
        shortTimeRemaining: remaining(this.state.shortAverageMaturityTime),
      },
      this.config.minimumShareReserves
    );
  }

  /** Largest long, in shares paid, that opens now for at most `budget` shares */
  getMaxLong(budget: bigint): bigint {
    const c = this.yieldSource.vaultSharePrice();
    return calculateMaxLong(this.market(c), this.openPositions(), budget);
  }

  /** Largest short, in bonds, that opens now for a deposit of at most `budget` shares */
  getMaxShort(budget: bigint): bigint {
    const c = this.yieldSource.vaultSharePrice();
    const maturityTime = this.latestCheckpoint() + this.config.positionDuration;
    return calculateMaxShort(
      this.market(c),
      this.openPositions(),
      this.openVaultSharePrice(maturityTime, c),
      budget
    );
  }

  /** Base value of one LP share, or of one withdrawal share not yet ready */
  getLpSharePrice(): bigint {
    const claims = this.lpClaims();
    if (claims === 0n) return 0n;
    return mulDivDown(this.getPresentValue(), this.yieldSource.vaultSharePrice(), claims);
  }

  // ============================================
  // Internals
  // ============================================

  private isInitialized(): boolean {
    return this.state.shareReserves > 0n;
  }

  private lpTotalSupply(): bigint {
    return this.ledger.totalSupply(LP_ASSET_ID);
  }

  private unreadyWithdrawalShares(): bigint {
    return (
      this.ledger.totalSupply(WITHDRAWAL_SHARE_ASSET_ID) - this.state.withdrawalSharesReadyToWithdraw
    );
  }

  /** LP shares plus the withdrawal shares still waiting for liquidity */
  private lpClaims(): bigint {
    return this.lpTotalSupply() + this.unreadyWithdrawalShares();
  }

  private market(vaultSharePrice: bigint): MarketState {
    return {
      shareReserves: this.state.shareReserves,
      bondReserves: this.state.bondReserves,
      lpTotalSupply: this.lpTotalSupply(),
      vaultSharePrice,
      initialVaultSharePrice: this.config.initialVaultSharePrice,
      timeStretch: this.config.timeStretch,
      curveFee: this.config.fees.curve,
      flatFee: this.config.fees.flat,
      governanceFee: this.config.fees.governance,
    };
  }

  private openPositions(): OpenPositions {
    return {
      longsOutstanding: this.state.longsOutstanding,
      shortsOutstanding: this.state.shortsOutstanding,
      minimumShareReserves: this.config.minimumShareReserves,
    };
  }

  /**
   * Record a checkpoint once and settle the positions maturing at it against
   * the reserves. Returns the checkpoint's vault share price.
   */
  private applyCheckpoint(checkpointTime: bigint, vaultSharePrice: bigint): bigint {
    const existing = this.checkpoints.get(checkpointTime);
    if (existing && existing.vaultSharePrice !== 0n) return existing.vaultSharePrice;

    const cp = existing ?? { vaultSharePrice: 0n, longSharePrice: 0n };
    cp.vaultSharePrice = vaultSharePrice;
    this.checkpoints.set(checkpointTime, cp);
    const c = vaultSharePrice;

    // Matured shorts pay in before matured longs are paid out.
    const maturedShorts = this.ledger.totalSupply(shortAssetId(checkpointTime));
    if (maturedShorts > 0n) {
      const openPrice = this.openVaultSharePrice(checkpointTime, c);
      const result = calculateCloseShort(this.market(c), maturedShorts, openPrice, c, 0n);
      this.updateLiquidity(result.sharePayment - result.governanceFlatFee);
      this.state.governanceFeesAccrued += result.governanceFlatFee;
      this.recordShortClosed(checkpointTime, maturedShorts);
    }

    const maturedLongs = this.ledger.totalSupply(longAssetId(checkpointTime));
    if (maturedLongs > 0n) {
      const openPrice = this.getCheckpoint(checkpointTime - this.config.positionDuration).longSharePrice;
      const result = calculateCloseLong(this.market(c), maturedLongs, 0n);
      const proceeds = scaleForNegativeInterest(result.shareProceeds, c, openPrice);
      this.updateLiquidity(-(proceeds + result.governanceFlatFee));
      this.state.governanceFeesAccrued += result.governanceFlatFee;
      this.recordLongClosed(checkpointTime, maturedLongs);
    }

    this.distributeExcessIdle(c);

    this.logger.info(
      toLogFields({ checkpointTime, vaultSharePrice: c, maturedLongs, maturedShorts }),
      "checkpoint recorded"
    );
    return c;
  }

  /**
   * Apply the latest checkpoint and, for a matured position, its maturity
   * checkpoint. Returns the position's normalized time remaining.
   */
  private touchMaturity(maturityTime: bigint, c: bigint): bigint {
    const now = this.clock();
    this.applyCheckpoint(this.latestCheckpoint(), c);
    if (maturityTime <= now) {
      this.applyCheckpoint(maturityTime, c);
    }
    return calculateTimeRemaining(
      maturityTime,
      now,
      this.config.checkpointDuration,
      this.config.positionDuration
    );
  }

  private openVaultSharePrice(maturityTime: bigint, fallback: bigint): bigint {
    const price = this.getCheckpoint(maturityTime - this.config.positionDuration).vaultSharePrice;
    return price === 0n ? fallback : price;
  }

  /** z' = z + delta, y' = y * z' / z */
  private updateLiquidity(delta: bigint): void {
    const next = applyLiquidityDelta(this.state, delta);
    this.state.shareReserves = next.shareReserves;
    this.state.bondReserves = next.bondReserves;
  }

  /**
   * Set new share reserves and LP supply while holding the spot price: the
   * adjusted bond reserves y + l scale with the share reserves.
   */
  private resizeReserves(shareReserves: bigint, lpTotalSupply: bigint, fn: string): void {
    const { shareReserves: z, bondReserves: y } = this.state;
    const adjusted = mulDivDown(y + this.lpTotalSupply(), shareReserves, z);
    if (adjusted < lpTotalSupply) {
      throw new CurveError("InvalidCurveState", `${fn}: bond reserves would turn negative`);
    }
    this.state.shareReserves = shareReserves;
    this.state.bondReserves = adjusted - lpTotalSupply;
  }

  private debitShareReserves(amount: bigint, fn: string): void {
    if (amount > this.state.shareReserves) {
      throw new CurveError(
        "InsufficientLiquidity",
        `${fn}: share reserves ${this.state.shareReserves} cannot cover ${amount}`
      );
    }
    this.state.shareReserves -= amount;
  }

  private debitBondReserves(amount: bigint, fn: string): bigint {
    if (amount > this.state.bondReserves) {
      throw new CurveError(
        "InsufficientLiquidity",
        `${fn}: bond reserves ${this.state.bondReserves} cannot cover ${amount}`
      );
    }
    return this.state.bondReserves - amount;
  }

  /** Longs net of shorts, the bonds the reserves must be able to pay */
  private netExposure(): bigint {
    const { longsOutstanding, shortsOutstanding } = this.state;
    return longsOutstanding > shortsOutstanding ? longsOutstanding - shortsOutstanding : 0n;
  }

  /** Share reserves not backing open positions or the minimum reserves */
  private idleShares(c: bigint): bigint {
    const reserved = divUp(this.netExposure(), c) + this.config.minimumShareReserves;
    return this.state.shareReserves > reserved ? this.state.shareReserves - reserved : 0n;
  }

  private assertSolvency(c: bigint, fn: string): void {
    const reserved = divUp(this.netExposure(), c) + this.config.minimumShareReserves;
    if (this.state.shareReserves < reserved) {
      throw new CurveError(
        "InsufficientLiquidity",
        `${fn}: share reserves ${this.state.shareReserves} cannot cover ${reserved}`
      );
    }
  }

  /**
   * Pay waiting withdrawal shares out of idle liquidity at the value per
   * claim, z + shorts/c - longs/c over the LP and waiting withdrawal shares.
   * The shares paid move out of the reserves into the withdrawal proceeds.
   */
  private distributeExcessIdle(c: bigint): void {
    const waiting = this.unreadyWithdrawalShares();
    if (waiting === 0n) return;
    const { shareReserves: z, bondReserves: y } = this.state;
    const claims = this.lpClaims();
    const value = calculateSharesOutForLpSharesIn(
      claims,
      z,
      claims,
      this.state.longsOutstanding,
      this.state.shortsOutstanding,
      c
    );
    // The curve keeps enough shares to carry the remaining LP adjustment.
    const l = this.lpTotalSupply();
    const curveFloor = mulDivUp(l, z, y + l);
    const available = min(this.idleShares(c), z > curveFloor ? z - curveFloor : 0n);
    const ready = min(waiting, mulDivDown(available, claims, value));
    if (ready === 0n) return;
    const freed = mulDivDown(ready, value, claims);

    this.resizeReserves(z - freed, l, "distributeExcessIdle");
    this.state.withdrawalSharesReadyToWithdraw += ready;
    this.state.withdrawalSharesProceeds += freed;
  }

  /** Burn up to `amount` of `holder`'s ready withdrawal shares for their share of the proceeds */
  private redeemReady(holder: string, amount: bigint): { redeemed: bigint; shares: bigint } {
    const { withdrawalSharesReadyToWithdraw: ready, withdrawalSharesProceeds: proceeds } = this.state;
    const redeemed = min(amount, ready);
    if (redeemed === 0n) return { redeemed: 0n, shares: 0n };
    const shares = mulDivDown(redeemed, proceeds, ready);

    this.ledger.burn(WITHDRAWAL_SHARE_ASSET_ID, holder, redeemed);
    this.state.withdrawalSharesReadyToWithdraw = ready - redeemed;
    this.state.withdrawalSharesProceeds = proceeds - shares;
    return { redeemed, shares };
  }

  private recordLongOpened(
    checkpointTime: bigint,
    maturityTime: bigint,
    bondAmount: bigint,
    c: bigint
  ): void {
    const { longsOutstanding, longAverageMaturityTime } = this.state;
    this.state.longAverageMaturityTime = updateWeightedAverage(
      longAverageMaturityTime,
      longsOutstanding,
      maturityTime,
      bondAmount,
      true
    );
    this.state.longsOutstanding = add(longsOutstanding, bondAmount);

    const cp = this.checkpoints.get(checkpointTime);
    if (cp) {
      cp.longSharePrice = updateWeightedAverage(
        cp.longSharePrice,
        this.ledger.totalSupply(longAssetId(maturityTime)),
        c,
        bondAmount,
        true
      );
    }
  }

  private recordLongClosed(maturityTime: bigint, bondAmount: bigint): void {
    const { longsOutstanding, longAverageMaturityTime } = this.state;
    this.state.longAverageMaturityTime = updateWeightedAverage(
      longAverageMaturityTime,
      longsOutstanding,
      maturityTime,
      bondAmount,
      false
    );
    this.state.longsOutstanding = sub(longsOutstanding, bondAmount);
  }

  private recordShortOpened(maturityTime: bigint, bondAmount: bigint): void {
    const { shortsOutstanding, shortAverageMaturityTime } = this.state;
    this.state.shortAverageMaturityTime = updateWeightedAverage(
      shortAverageMaturityTime,
      shortsOutstanding,
      maturityTime,
      bondAmount,
      true
    );
    this.state.shortsOutstanding = add(shortsOutstanding, bondAmount);
  }

  private recordShortClosed(maturityTime: bigint, bondAmount: bigint): void {
    const { shortsOutstanding, shortAverageMaturityTime } = this.state;
    this.state.shortAverageMaturityTime = updateWeightedAverage(
      shortAverageMaturityTime,
      shortsOutstanding,
      maturityTime,
      bondAmount,
      false
    );
    this.state.shortsOutstanding = sub(shortsOutstanding, bondAmount);
  }

  private readVaultSharePrice(minVaultSharePrice = 0n): bigint {
    const c = this.yieldSource.vaultSharePrice();
    if (c === 0n) {
      throw new CurveError("InvalidCurveState", "vault share price is zero");
    }
    if (c < minVaultSharePrice) {
      throw new SlippageError(
        "MinimumSharePrice",
        `vault share price ${c} is below the minimum ${minVaultSharePrice}`
      );
    }
    return c;
  }

  private deposit(from: string, amount: bigint, asBase: boolean): bigint {
    if (asBase) {
      return this.yieldSource.depositBase(from, amount).shares;
    }
    this.yieldSource.depositShares(from, amount);
    return amount;
  }

  /** Pay out `shares`; returns the amount sent in the requested unit */
  private withdraw(shares: bigint, options: TradeOptions): bigint {
    if (shares === 0n) return 0n;
    if (options.asBase) {
      return this.yieldSource.withdrawBase(shares, options.destination);
    }
    this.yieldSource.withdrawShares(shares, options.destination);
    return shares;
  }

  private requireInitialized(fn: string): void {
    if (!this.isInitialized()) {
      throw new ValidationError("PoolNotInitialized", `${fn}: pool is not initialized`);
    }
  }

  private requireDestination(destination: string): void {
    if (destination === "" || destination.toLowerCase() === ZERO_ADDRESS) {
      throw new ValidationError("InvalidDestination", "destination must not be the zero address");
    }
  }

  private requirePositiveAmount(amount: bigint, fn: string): void {
    if (amount <= 0n) {
      throw new ValidationError("ZeroAmount", `${fn}: amount must be positive`);
    }
  }

  private requireMinimumAmount(fn: string, amount: bigint, asBase: boolean): void {
    this.requirePositiveAmount(amount, fn);
    const base = asBase ? amount : this.yieldSource.convertToBase(amount);
    if (base < this.config.minimumTransactionAmount) {
      throw new ValidationError(
        "MinimumTransactionAmount",
        `${fn}: ${base} is below the minimum ${this.config.minimumTransactionAmount}`
      );
    }
  }

  private requireMaturityTime(maturityTime: bigint, fn: string): void {
    const latest = this.latestCheckpoint();
    if (
      maturityTime <= 0n ||
      maturityTime % this.config.checkpointDuration !== 0n ||
      maturityTime > latest + this.config.positionDuration
    ) {
      throw new ValidationError("InvalidMaturityTime", `${fn}: invalid maturity ${maturityTime}`);
    }
  }
}
