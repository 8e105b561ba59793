/**
 * Fungible token balances (base asset and vault shares).
 */

import { ValidationError } from "./errors";
import { accountKey, type Revertible } from "./ledger";

export interface Token {
  readonly symbol: string;
  balanceOf(account: string): bigint;
  transfer(from: string, to: string, amount: bigint): void;
}

export class InMemoryToken implements Token, Revertible {
  private balances = new Map<string, bigint>();
  private supply = 0n;

  constructor(readonly symbol: string) {}

  balanceOf(account: string): bigint {
    return this.balances.get(accountKey(account)) ?? 0n;
  }

  totalSupply(): bigint {
    return this.supply;
  }

  transfer(from: string, to: string, amount: bigint): void {
    this.debit(from, amount, "transfer");
    this.credit(to, amount);
  }

  mint(to: string, amount: bigint): void {
    if (amount < 0n) {
      throw new ValidationError("ZeroAmount", `mint: negative amount ${amount}`);
    }
    this.credit(to, amount);
    this.supply += amount;
  }

  burn(from: string, amount: bigint): void {
    this.debit(from, amount, "burn");
    this.supply -= amount;
  }

  snapshot(): () => void {
    const balances = new Map(this.balances);
    const supply = this.supply;
    return () => {
      this.balances = balances;
      this.supply = supply;
    };
  }

  private credit(account: string, amount: bigint): void {
    const key = accountKey(account);
    this.balances.set(key, (this.balances.get(key) ?? 0n) + amount);
  }

  private debit(account: string, amount: bigint, fn: string): void {
    if (amount < 0n) {
      throw new ValidationError("ZeroAmount", `${fn}: negative amount ${amount}`);
    }
    const balance = this.balanceOf(account);
    if (balance < amount) {
      throw new ValidationError(
        "InsufficientBalance",
        `${fn}: ${account} holds ${balance} ${this.symbol}, needs ${amount}`
      );
    }
    this.balances.set(accountKey(account), balance - amount);
  }
}
