/**
 * Matching Engine
 *
 * Settles pairs of signed order intents against a pool:
 *
 *   (OpenLong, OpenShort)   mint a long/short pair funded by both traders
 *   (CloseLong, CloseShort) burn the pair and split the proceeds
 *   (OpenLong, CloseLong)   move longs from the closer to the opener
 *   (OpenShort, CloseShort) move shorts from the closer to the opener
 *
 * Intents fill partially. The engine keeps the cumulative bond and fund
 * amounts used per intent hash and never lets them pass the intent's
 * declared amounts. Funds in transit sit on the engine's own account and
 * whatever is left after settlement goes to the surplus recipient.
 */

import { shortAssetId, longAssetId } from "./asset-id";
import type { EngineConfig } from "./config";
import { ZERO_ADDRESS } from "./constants";
import { AuthorizationError, ValidationError } from "./errors";
import { divUp, max, mulDivDown, mulDivUp } from "./fixed-point";
import { accountKey, type Ledger, type Revertible } from "./ledger";
import { silentLogger, toLogFields, type Logger } from "./logger";
import {
  AccountSignatureVerifier,
  OrderType,
  hashOrderIntent,
  isOpenOrder,
  type OrderDomain,
  type OrderIntent,
  type SignatureVerifier,
} from "./order-intent";
import type { Pool } from "./pool";
import { calculateMintCost } from "./pricing";
import type { Token } from "./token";

export interface PositionLedger extends Ledger {
  transfer(assetId: bigint, from: string, to: string, amount: bigint): void;
}

/** A pool the engine can settle against, with the accounts it settles in */
export interface Market {
  /** The address intents name in their `pool` field */
  address: string;
  pool: Pool;
  ledger: PositionLedger;
  baseToken: Token & Revertible;
  vaultShareToken: Token & Revertible;
}

export interface OrderAmounts {
  bondAmount: bigint;
  fundAmount: bigint;
}

export type SettlementKind = "mint" | "burn" | "transfer";

export interface MatchResult {
  kind: SettlementKind;
  maturityTime: bigint;
  bondAmount: bigint;
  /** Funds paid or received by the first order's trader */
  fundAmount1: bigint;
  /** Funds paid or received by the second order's trader */
  fundAmount2: bigint;
  /** Funds sent to the surplus recipient */
  surplus: bigint;
}

export interface MatchingEngineDependencies {
  config: EngineConfig;
  markets: Market[];
  /** Current time in seconds */
  clock: () => bigint;
  verifier?: SignatureVerifier;
  logger?: Logger;
}

interface Side {
  order: OrderIntent;
  hash: string;
  /** Unsigned taker intents are not tracked */
  tracked: boolean;
}

function isZeroAddress(address: string): boolean {
  return address === "" || accountKey(address) === ZERO_ADDRESS;
}

function classify(first: OrderType, second: OrderType): SettlementKind | undefined {
  if (first === OrderType.OpenLong && second === OrderType.OpenShort) return "mint";
  if (first === OrderType.CloseLong && second === OrderType.CloseShort) return "burn";
  if (first === OrderType.OpenLong && second === OrderType.CloseLong) return "transfer";
  if (first === OrderType.OpenShort && second === OrderType.CloseShort) return "transfer";
  return undefined;
}

export class MatchingEngine implements Revertible {
  private amountsUsed = new Map<string, OrderAmounts>();
  private cancelled = new Set<string>();
  private locked = false;

  private readonly markets = new Map<string, Market>();
  private readonly domain: OrderDomain;
  private readonly address: string;
  private readonly clock: () => bigint;
  private readonly verifier: SignatureVerifier;
  private readonly logger: Logger;

  constructor(deps: MatchingEngineDependencies) {
    for (const market of deps.markets) {
      this.markets.set(accountKey(market.address), market);
    }
    this.domain = {
      name: deps.config.name,
      version: deps.config.version,
      chainId: deps.config.chainId,
      verifyingContract: deps.config.address,
    };
    this.address = deps.config.address;
    this.clock = deps.clock;
    this.verifier = deps.verifier ?? new AccountSignatureVerifier();
    this.logger = deps.logger ?? silentLogger;
  }

  hashOrderIntent(order: OrderIntent): string {
    return hashOrderIntent(order, this.domain);
  }

  getOrderAmountsUsed(orderHash: string): OrderAmounts {
    const used = this.amountsUsed.get(orderHash);
    return used ? { ...used } : { bondAmount: 0n, fundAmount: 0n };
  }

  isCancelled(orderHash: string): boolean {
    return this.cancelled.has(orderHash);
  }

  /**
   * Cancel intents signed by `caller`. Cancellation is permanent.
   */
  cancelOrders(orders: OrderIntent[], caller: string): string[] {
    return this.transact("cancelOrders", () => {
      const hashes = orders.map((order) => {
        if (accountKey(order.trader) !== accountKey(caller)) {
          throw new AuthorizationError(
            "InvalidSender",
            `cancelOrders: ${caller} did not sign the order from ${order.trader}`
          );
        }
        const hash = this.hashOrderIntent(order);
        this.verifySignature(hash, order);
        return hash;
      });
      for (const hash of hashes) {
        this.cancelled.add(hash);
      }
      this.logger.info({ caller, orders: hashes }, "orders cancelled");
      return hashes;
    });
  }

  /**
   * Match two signed intents. `order1` is the long side of a mint or burn,
   * or the opening side of a transfer.
   */
  matchOrders(order1: OrderIntent, order2: OrderIntent, surplusRecipient: string): MatchResult {
    return this.transact("matchOrders", () => {
      const first: Side = { order: order1, hash: this.hashOrderIntent(order1), tracked: true };
      const second: Side = { order: order2, hash: this.hashOrderIntent(order2), tracked: true };
      return this.settle(first, second, surplusRecipient);
    });
  }

  /**
   * Fill a signed maker intent against a taker intent built by `caller`.
   * The taker intent is unsigned and its amounts are not tracked; the
   * surplus goes to the caller.
   */
  fillOrder(makerOrder: OrderIntent, takerOrder: OrderIntent, caller: string): MatchResult {
    return this.transact("fillOrder", () => {
      if (accountKey(takerOrder.trader) !== accountKey(caller)) {
        throw new AuthorizationError(
          "InvalidSender",
          `fillOrder: taker ${takerOrder.trader} is not the caller ${caller}`
        );
      }
      const maker: Side = { order: makerOrder, hash: this.hashOrderIntent(makerOrder), tracked: true };
      const taker: Side = { order: takerOrder, hash: this.hashOrderIntent(takerOrder), tracked: false };
      return classify(makerOrder.orderType, takerOrder.orderType) !== undefined
        ? this.settle(maker, taker, caller)
        : this.settle(taker, maker, caller);
    });
  }

  snapshot(): () => void {
    const amountsUsed = new Map(
      [...this.amountsUsed].map(([hash, used]) => [hash, { ...used }] as const)
    );
    const cancelled = new Set(this.cancelled);
    const restores: Array<() => void> = [];
    for (const market of this.markets.values()) {
      restores.push(market.pool.snapshot());
      restores.push(market.baseToken.snapshot());
      restores.push(market.vaultShareToken.snapshot());
    }
    return () => {
      this.amountsUsed = amountsUsed;
      this.cancelled = cancelled;
      for (const restore of restores.reverse()) {
        restore();
      }
    };
  }

  // ============================================
  // Settlement
  // ============================================

  private settle(first: Side, second: Side, surplusRecipient: string): MatchResult {
    const market = this.validate(first, second);
    const kind = classify(first.order.orderType, second.order.orderType);
    if (kind === undefined) {
      throw new ValidationError(
        "InvalidOrderCombination",
        `settle: cannot match ${OrderType[first.order.orderType]} with ${OrderType[second.order.orderType]}`
      );
    }
    if (isZeroAddress(surplusRecipient)) {
      throw new ValidationError("InvalidDestination", "settle: surplus recipient must not be the zero address");
    }

    const remaining1 = this.remaining(first);
    const remaining2 = this.remaining(second);
    const bondAmount =
      remaining1.bondAmount < remaining2.bondAmount ? remaining1.bondAmount : remaining2.bondAmount;

    let result: MatchResult;
    if (kind === "mint") {
      result = this.settleMint(market, first.order, second.order, remaining1, remaining2, bondAmount, surplusRecipient);
    } else if (kind === "burn") {
      result = this.settleBurn(market, first.order, second.order, remaining1, remaining2, bondAmount, surplusRecipient);
    } else {
      result = this.settleTransfer(market, first.order, second.order, remaining1, remaining2, bondAmount, surplusRecipient);
    }

    this.recordFill(first, bondAmount, result.fundAmount1);
    this.recordFill(second, bondAmount, result.fundAmount2);

    this.logger.info(
      toLogFields({
        kind,
        order1: first.hash,
        order2: second.hash,
        bondAmount,
        maturityTime: result.maturityTime,
        surplus: result.surplus,
      }),
      "orders matched"
    );
    return result;
  }

  private settleMint(
    market: Market,
    order1: OrderIntent,
    order2: OrderIntent,
    remaining1: OrderAmounts,
    remaining2: OrderAmounts,
    bondAmount: bigint,
    surplusRecipient: string
  ): MatchResult {
    const { pool } = market;
    const asBase = order1.options.asBase;
    const latest = pool.latestCheckpoint();
    const maturityTime = latest + pool.config.positionDuration;
    this.requireMaturityInWindow(order1, maturityTime);
    this.requireMaturityInWindow(order2, maturityTime);

    // Payers: round down.
    const fund1 = mulDivDown(remaining1.fundAmount, bondAmount, remaining1.bondAmount);
    const fund2 = mulDivDown(remaining2.fundAmount, bondAmount, remaining2.bondAmount);

    const c = pool.getPoolState().vaultSharePrice;
    const checkpointPrice = pool.getCheckpoint(latest).vaultSharePrice;
    const costBase = calculateMintCost(
      bondAmount,
      c,
      checkpointPrice === 0n ? c : checkpointPrice,
      pool.config.fees.flat,
      pool.config.fees.governance
    );
    const cost = asBase ? costBase : divUp(costBase, c);
    if (fund1 + fund2 < cost) {
      throw new AuthorizationError(
        "InsufficientFunding",
        `settleMint: ${fund1 + fund2} offered for a mint costing ${cost}`
      );
    }

    const token = this.settlementToken(market, asBase);
    token.transfer(order1.trader, this.address, fund1);
    token.transfer(order2.trader, this.address, fund2);
    const receipt = pool.mint(this.address, bondAmount, cost, {
      longDestination: order1.options.destination,
      shortDestination: order2.options.destination,
      asBase,
      minVaultSharePrice: max(order1.minVaultSharePrice, order2.minVaultSharePrice),
    });

    const surplus = fund1 + fund2 - receipt.cost;
    if (surplus > 0n) {
      token.transfer(this.address, surplusRecipient, surplus);
    }
    return {
      kind: "mint",
      maturityTime: receipt.maturityTime,
      bondAmount,
      fundAmount1: fund1,
      fundAmount2: fund2,
      surplus,
    };
  }

  private settleBurn(
    market: Market,
    order1: OrderIntent,
    order2: OrderIntent,
    remaining1: OrderAmounts,
    remaining2: OrderAmounts,
    bondAmount: bigint,
    surplusRecipient: string
  ): MatchResult {
    const maturityTime = order1.maxMaturityTime;
    if (order2.maxMaturityTime !== maturityTime) {
      throw new ValidationError(
        "InvalidMaturityTime",
        `settleBurn: maturities ${maturityTime} and ${order2.maxMaturityTime} differ`
      );
    }

    // Receivers' minimums: round up.
    const min1 = mulDivUp(remaining1.fundAmount, bondAmount, remaining1.bondAmount);
    const min2 = mulDivUp(remaining2.fundAmount, bondAmount, remaining2.bondAmount);

    const asBase = order1.options.asBase;
    const proceeds = market.pool.burn(order1.trader, order2.trader, maturityTime, bondAmount, 0n, {
      destination: this.address,
      asBase,
      minVaultSharePrice: max(order1.minVaultSharePrice, order2.minVaultSharePrice),
    });
    if (proceeds < min1 + min2) {
      throw new AuthorizationError(
        "InsufficientFunding",
        `settleBurn: burn returned ${proceeds}, orders require ${min1 + min2}`
      );
    }

    const token = this.settlementToken(market, asBase);
    token.transfer(this.address, order1.options.destination, min1);
    token.transfer(this.address, order2.options.destination, min2);
    const surplus = proceeds - min1 - min2;
    if (surplus > 0n) {
      token.transfer(this.address, surplusRecipient, surplus);
    }
    return {
      kind: "burn",
      maturityTime,
      bondAmount,
      fundAmount1: min1,
      fundAmount2: min2,
      surplus,
    };
  }

  /** The opener pays for the closer's position directly */
  private settleTransfer(
    market: Market,
    opener: OrderIntent,
    closer: OrderIntent,
    remainingOpen: OrderAmounts,
    remainingClose: OrderAmounts,
    bondAmount: bigint,
    surplusRecipient: string
  ): MatchResult {
    const maturityTime = closer.maxMaturityTime;
    this.requireMaturityInWindow(opener, maturityTime);

    const payment = mulDivDown(remainingOpen.fundAmount, bondAmount, remainingOpen.bondAmount);
    const minimum = mulDivUp(remainingClose.fundAmount, bondAmount, remainingClose.bondAmount);
    if (payment < minimum) {
      throw new AuthorizationError(
        "InsufficientFunding",
        `settleTransfer: ${payment} offered, ${minimum} required`
      );
    }

    const assetId =
      opener.orderType === OrderType.OpenLong ? longAssetId(maturityTime) : shortAssetId(maturityTime);
    market.ledger.transfer(assetId, closer.trader, opener.options.destination, bondAmount);

    const token = this.settlementToken(market, opener.options.asBase);
    token.transfer(opener.trader, this.address, payment);
    token.transfer(this.address, closer.options.destination, minimum);
    const surplus = payment - minimum;
    if (surplus > 0n) {
      token.transfer(this.address, surplusRecipient, surplus);
    }
    return {
      kind: "transfer",
      maturityTime,
      bondAmount,
      fundAmount1: payment,
      fundAmount2: minimum,
      surplus,
    };
  }

  // ============================================
  // Validation and Bookkeeping
  // ============================================

  private validate(first: Side, second: Side): Market {
    const sides = [first, second];
    const now = this.clock();

    for (const { order } of sides) {
      if (isZeroAddress(order.options.destination)) {
        throw new ValidationError("InvalidDestination", "validate: destination must not be the zero address");
      }
    }
    const pairs: Array<[OrderIntent, OrderIntent]> = [
      [first.order, second.order],
      [second.order, first.order],
    ];
    for (const [self, other] of pairs) {
      if (!isZeroAddress(self.counterparty) && accountKey(self.counterparty) !== accountKey(other.trader)) {
        throw new ValidationError(
          "InvalidCounterparty",
          `validate: ${other.trader} is not the counterparty ${self.counterparty}`
        );
      }
    }
    for (const { order } of sides) {
      if (now > order.expiry) {
        throw new AuthorizationError("OrderExpired", `validate: order expired at ${order.expiry}`);
      }
    }

    if (accountKey(first.order.pool) !== accountKey(second.order.pool)) {
      throw new ValidationError(
        "MismatchedPool",
        `validate: orders target ${first.order.pool} and ${second.order.pool}`
      );
    }
    const market = this.markets.get(accountKey(first.order.pool));
    if (!market) {
      throw new ValidationError("UnknownPool", `validate: no market at ${first.order.pool}`);
    }
    if (first.order.options.asBase !== second.order.options.asBase) {
      throw new ValidationError("MismatchedSettlementAsset", "validate: orders settle in different assets");
    }

    for (const { order } of sides) {
      if (order.minMaturityTime > order.maxMaturityTime) {
        throw new ValidationError(
          "InvalidMaturityTime",
          `validate: maturity window [${order.minMaturityTime}, ${order.maxMaturityTime}] is empty`
        );
      }
    }
    for (const { order } of sides) {
      if (!isOpenOrder(order.orderType) && order.minMaturityTime !== order.maxMaturityTime) {
        throw new ValidationError("InvalidMaturityTime", "validate: close orders name a single maturity");
      }
    }
    for (const side of sides) {
      if (side.tracked && this.cancelled.has(side.hash)) {
        throw new AuthorizationError("OrderCancelled", `validate: order ${side.hash} was cancelled`);
      }
    }
    for (const side of sides) {
      if (this.isFullyExecuted(side)) {
        throw new AuthorizationError("AlreadyFullyExecuted", `validate: order ${side.hash} is fully executed`);
      }
    }
    for (const side of sides) {
      if (side.tracked) this.verifySignature(side.hash, side.order);
    }
    return market;
  }

  private verifySignature(hash: string, order: OrderIntent): void {
    if (!this.verifier.verify(hash, order.signature, order.trader)) {
      throw new AuthorizationError("InvalidSignature", `verifySignature: order ${hash} not signed by ${order.trader}`);
    }
  }

  private isFullyExecuted(side: Side): boolean {
    const { order } = side;
    const used = this.usedBy(side);
    if (used.bondAmount >= order.bondAmount) return true;
    // Open orders spend their fund amount; close orders only set a floor.
    return isOpenOrder(order.orderType) && used.fundAmount >= order.fundAmount;
  }

  private usedBy(side: Side): OrderAmounts {
    return side.tracked ? this.getOrderAmountsUsed(side.hash) : { bondAmount: 0n, fundAmount: 0n };
  }

  private remaining(side: Side): OrderAmounts {
    const used = this.usedBy(side);
    const fundAmount = side.order.fundAmount > used.fundAmount ? side.order.fundAmount - used.fundAmount : 0n;
    return { bondAmount: side.order.bondAmount - used.bondAmount, fundAmount };
  }

  private recordFill(side: Side, bondAmount: bigint, fundAmount: bigint): void {
    if (!side.tracked) return;
    const used = this.getOrderAmountsUsed(side.hash);
    const next = {
      bondAmount: used.bondAmount + bondAmount,
      fundAmount: used.fundAmount + fundAmount,
    };
    if (next.bondAmount > side.order.bondAmount || next.fundAmount > side.order.fundAmount) {
      throw new AuthorizationError(
        "AlreadyFullyExecuted",
        `recordFill: fill exceeds the amounts of order ${side.hash}`
      );
    }
    this.amountsUsed.set(side.hash, next);
  }

  private requireMaturityInWindow(order: OrderIntent, maturityTime: bigint): void {
    if (maturityTime < order.minMaturityTime || maturityTime > order.maxMaturityTime) {
      throw new ValidationError(
        "InvalidMaturityTime",
        `requireMaturityInWindow: ${maturityTime} outside [${order.minMaturityTime}, ${order.maxMaturityTime}]`
      );
    }
  }

  private settlementToken(market: Market, asBase: boolean): Token {
    return asBase ? market.baseToken : market.vaultShareToken;
  }

  private transact<T>(operation: string, fn: () => T): T {
    if (this.locked) {
      throw new ValidationError("ReentrantCall", `${operation}: engine is already executing an operation`);
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
}
