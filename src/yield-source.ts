/**
 * Yield sources hold the pool's collateral as interest-bearing vault shares.
 *
 * The pool only sees the `YieldSource` interface. Two in-memory adapters back
 * the tests and simulations: an ERC4626-style vault whose share price is
 * assets over shares, and an index-priced vault whose 27-decimal index is
 * rescaled to 18 decimals at the boundary.
 */

import { ONE } from "./constants";
import { ValidationError } from "./errors";
import { divDown, mulDivDown, mulDown, rayToWad } from "./fixed-point";
import type { Revertible } from "./ledger";
import type { InMemoryToken } from "./token";

export interface DepositResult {
  /** Vault shares credited to the pool */
  shares: bigint;
  /** Base returned to the depositor */
  refund: bigint;
}

export interface YieldSource {
  /** Pull `amount` base from `from` and convert it to shares held by the pool */
  depositBase(from: string, amount: bigint): DepositResult;
  /** Pull `amount` vault shares from `from` into the pool */
  depositShares(from: string, amount: bigint): void;
  /** Redeem `shares` and send the base to `destination` */
  withdrawBase(shares: bigint, destination: string): bigint;
  /** Send `shares` vault shares to `destination` */
  withdrawShares(shares: bigint, destination: string): void;
  convertToBase(shares: bigint): bigint;
  convertToShares(base: bigint): bigint;
  totalShares(): bigint;
  /** Base per vault share, 18 decimals */
  vaultSharePrice(): bigint;
}

export interface VaultOptions {
  /** Account holding the pool's vault shares */
  custodian: string;
  /** Account holding the vault's base */
  vault: string;
}

abstract class InMemoryVault implements YieldSource, Revertible {
  protected readonly custodian: string;
  protected readonly vault: string;

  constructor(
    protected readonly baseToken: InMemoryToken,
    protected readonly shareToken: InMemoryToken,
    options: VaultOptions
  ) {
    this.custodian = options.custodian;
    this.vault = options.vault;
  }

  abstract convertToBase(shares: bigint): bigint;
  abstract convertToShares(base: bigint): bigint;

  depositBase(from: string, amount: bigint): DepositResult {
    if (amount <= 0n) {
      throw new ValidationError("ZeroAmount", "depositBase: amount must be positive");
    }
    const shares = this.convertToShares(amount);
    this.baseToken.transfer(from, this.vault, amount);
    this.shareToken.mint(this.custodian, shares);
    return { shares, refund: 0n };
  }

  depositShares(from: string, amount: bigint): void {
    if (amount <= 0n) {
      throw new ValidationError("ZeroAmount", "depositShares: amount must be positive");
    }
    this.shareToken.transfer(from, this.custodian, amount);
  }

  withdrawBase(shares: bigint, destination: string): bigint {
    const base = this.convertToBase(shares);
    this.shareToken.burn(this.custodian, shares);
    this.baseToken.transfer(this.vault, destination, base);
    return base;
  }

  withdrawShares(shares: bigint, destination: string): void {
    this.shareToken.transfer(this.custodian, destination, shares);
  }

  totalShares(): bigint {
    return this.shareToken.totalSupply();
  }

  totalAssets(): bigint {
    return this.baseToken.balanceOf(this.vault);
  }

  vaultSharePrice(): bigint {
    return this.convertToBase(ONE);
  }

  snapshot(): () => void {
    const restoreBase = this.baseToken.snapshot();
    const restoreShares = this.shareToken.snapshot();
    return () => {
      restoreShares();
      restoreBase();
    };
  }
}

/**
 * ERC4626-style vault: shares are priced at total assets over total shares.
 * Interest accrues by minting base into the vault.
 */
export class InMemoryYieldSource extends InMemoryVault {
  convertToShares(base: bigint): bigint {
    const supply = this.totalShares();
    const assets = this.totalAssets();
    return supply === 0n || assets === 0n ? base : mulDivDown(base, supply, assets);
  }

  convertToBase(shares: bigint): bigint {
    const supply = this.totalShares();
    return supply === 0n ? shares : mulDivDown(shares, this.totalAssets(), supply);
  }

  /** Accrue `amount` base of interest to every share holder */
  accrue(amount: bigint): void {
    this.baseToken.mint(this.vault, amount);
  }
}

/**
 * Vault priced by a 27-decimal liquidity index, as lending markets report
 * it. The index is rescaled to 18 decimals before any pricing.
 */
export class IndexedYieldSource extends InMemoryVault {
  private index: bigint;

  constructor(
    baseToken: InMemoryToken,
    shareToken: InMemoryToken,
    options: VaultOptions & { rayIndex: bigint }
  ) {
    super(baseToken, shareToken, options);
    this.index = options.rayIndex;
  }

  vaultSharePrice(): bigint {
    return rayToWad(this.index);
  }

  convertToShares(base: bigint): bigint {
    return divDown(base, this.vaultSharePrice());
  }

  convertToBase(shares: bigint): bigint {
    return mulDown(shares, this.vaultSharePrice());
  }

  /**
   * Move the index forward and mint the base that backs the new share
   * price.
   */
  setIndex(rayIndex: bigint): void {
    if (rayIndex < this.index) {
      throw new ValidationError("InvalidConfig", "setIndex: index cannot decrease");
    }
    this.index = rayIndex;
    const owed = this.convertToBase(this.totalShares());
    const held = this.totalAssets();
    if (owed > held) {
      this.baseToken.mint(this.vault, owed - held);
    }
  }

  snapshot(): () => void {
    const restoreTokens = super.snapshot();
    const index = this.index;
    return () => {
      restoreTokens();
      this.index = index;
    };
  }
}
