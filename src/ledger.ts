/**
 * Position ledger: balances per (asset id, account).
 */

import { ValidationError } from "./errors";

/**
 * State that can be rolled back. `snapshot()` captures the current state and
 * returns a function that restores it.
 */
export interface Revertible {
  snapshot(): () => void;
}

export interface Ledger {
  balanceOf(assetId: bigint, account: string): bigint;
  totalSupply(assetId: bigint): bigint;
  mint(assetId: bigint, account: string, amount: bigint): void;
  burn(assetId: bigint, account: string, amount: bigint): void;
}

/** Accounts are addresses; compare them case-insensitively */
export function accountKey(account: string): string {
  return account.toLowerCase();
}

export class InMemoryLedger implements Ledger, Revertible {
  private balances = new Map<bigint, Map<string, bigint>>();
  private supplies = new Map<bigint, bigint>();

  balanceOf(assetId: bigint, account: string): bigint {
    return this.balances.get(assetId)?.get(accountKey(account)) ?? 0n;
  }

  totalSupply(assetId: bigint): bigint {
    return this.supplies.get(assetId) ?? 0n;
  }

  mint(assetId: bigint, account: string, amount: bigint): void {
    if (amount < 0n) {
      throw new ValidationError("ZeroAmount", `mint: negative amount ${amount}`);
    }
    if (amount === 0n) return;
    const holders = this.holders(assetId);
    const key = accountKey(account);
    holders.set(key, (holders.get(key) ?? 0n) + amount);
    this.supplies.set(assetId, this.totalSupply(assetId) + amount);
  }

  burn(assetId: bigint, account: string, amount: bigint): void {
    if (amount < 0n) {
      throw new ValidationError("ZeroAmount", `burn: negative amount ${amount}`);
    }
    if (amount === 0n) return;
    const balance = this.balanceOf(assetId, account);
    if (balance < amount) {
      throw new ValidationError(
        "InsufficientBalance",
        `burn: ${account} holds ${balance} of ${assetId}, needs ${amount}`
      );
    }
    this.holders(assetId).set(accountKey(account), balance - amount);
    this.supplies.set(assetId, this.totalSupply(assetId) - amount);
  }

  /** Move a position between accounts */
  transfer(assetId: bigint, from: string, to: string, amount: bigint): void {
    this.burn(assetId, from, amount);
    this.mint(assetId, to, amount);
  }

  snapshot(): () => void {
    const balances = new Map(
      [...this.balances].map(([id, holders]) => [id, new Map(holders)] as const)
    );
    const supplies = new Map(this.supplies);
    return () => {
      this.balances = balances;
      this.supplies = supplies;
    };
  }

  private holders(assetId: bigint): Map<string, bigint> {
    let holders = this.balances.get(assetId);
    if (!holders) {
      holders = new Map();
      this.balances.set(assetId, holders);
    }
    return holders;
  }
}
