/**
 * Signed order intents and their EIP-712 signing payload.
 *
 * An intent is hashed with its settlement options nested as a struct, so
 * the options hash is `hashStruct(Options(destination, asBase))`. The domain
 * binds signatures to one engine deployment on one chain.
 */

import { ethers } from "ethers";
import { AuthorizationError, ValidationError } from "./errors";
import { accountKey } from "./ledger";

export enum OrderType {
  OpenLong = 0,
  OpenShort = 1,
  CloseLong = 2,
  CloseShort = 3,
}

export interface Options {
  destination: string;
  asBase: boolean;
}

export interface OrderIntent {
  trader: string;
  /** Only this account may fill the intent; the zero address means anyone */
  counterparty: string;
  /** Address of the pool the intent trades against */
  pool: string;
  /** Max paid for open orders, min received for close orders */
  fundAmount: bigint;
  bondAmount: bigint;
  minVaultSharePrice: bigint;
  options: Options;
  orderType: OrderType;
  minMaturityTime: bigint;
  maxMaturityTime: bigint;
  expiry: bigint;
  /** 32-byte hex string */
  salt: string;
  signature: string;
}

export interface OrderDomain {
  name: string;
  version: string;
  chainId: bigint;
  verifyingContract: string;
}

export const ORDER_INTENT_TYPES: Record<string, ethers.TypedDataField[]> = {
  OrderIntent: [
    { name: "trader", type: "address" },
    { name: "counterparty", type: "address" },
    { name: "pool", type: "address" },
    { name: "fundAmount", type: "uint256" },
    { name: "bondAmount", type: "uint256" },
    { name: "minVaultSharePrice", type: "uint256" },
    { name: "options", type: "Options" },
    { name: "orderType", type: "uint8" },
    { name: "minMaturityTime", type: "uint256" },
    { name: "maxMaturityTime", type: "uint256" },
    { name: "expiry", type: "uint256" },
    { name: "salt", type: "bytes32" },
  ],
  Options: [
    { name: "destination", type: "address" },
    { name: "asBase", type: "bool" },
  ],
};

/** The signed fields of an intent, in typed-data form */
export function toTypedData(order: OrderIntent): Record<string, unknown> {
  return {
    trader: order.trader,
    counterparty: order.counterparty,
    pool: order.pool,
    fundAmount: order.fundAmount,
    bondAmount: order.bondAmount,
    minVaultSharePrice: order.minVaultSharePrice,
    options: {
      destination: order.options.destination,
      asBase: order.options.asBase,
    },
    orderType: order.orderType,
    minMaturityTime: order.minMaturityTime,
    maxMaturityTime: order.maxMaturityTime,
    expiry: order.expiry,
    salt: order.salt,
  };
}

export function hashOrderIntent(order: OrderIntent, domain: OrderDomain): string {
  try {
    return ethers.TypedDataEncoder.hash(domain, ORDER_INTENT_TYPES, toTypedData(order));
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ValidationError("MalformedOrder", `hashOrderIntent: ${detail}`);
  }
}

export function isOpenOrder(orderType: OrderType): boolean {
  return orderType === OrderType.OpenLong || orderType === OrderType.OpenShort;
}

// ============================================
// Signature Verification
// ============================================

export interface SignatureVerifier {
  verify(hash: string, signature: string, signer: string): boolean;
}

/** Externally-owned accounts: recover the signer from the ECDSA signature */
export class EcdsaSignatureVerifier implements SignatureVerifier {
  verify(hash: string, signature: string, signer: string): boolean {
    let recovered: string;
    try {
      recovered = ethers.recoverAddress(hash, signature);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new AuthorizationError("InvalidSignature", `verify: malformed signature: ${detail}`);
    }
    return accountKey(recovered) === accountKey(signer);
  }
}

/** A smart-contract account that validates signatures on its own terms */
export interface ContractAccount {
  isValidSignature(hash: string, signature: string): boolean;
}

/** Contract accounts: delegate to the account's own check */
export class ContractSignatureVerifier implements SignatureVerifier {
  constructor(private readonly accounts: ReadonlyMap<string, ContractAccount>) {}

  verify(hash: string, signature: string, signer: string): boolean {
    const account = this.accounts.get(accountKey(signer));
    return account !== undefined && account.isValidSignature(hash, signature);
  }
}

/**
 * Picks the contract verifier for registered contract accounts and ECDSA
 * recovery for everyone else.
 */
export class AccountSignatureVerifier implements SignatureVerifier {
  private readonly contracts = new Map<string, ContractAccount>();
  private readonly ecdsa = new EcdsaSignatureVerifier();
  private readonly delegated = new ContractSignatureVerifier(this.contracts);

  registerContract(address: string, account: ContractAccount): void {
    this.contracts.set(accountKey(address), account);
  }

  isContract(address: string): boolean {
    return this.contracts.has(accountKey(address));
  }

  verify(hash: string, signature: string, signer: string): boolean {
    return this.isContract(signer)
      ? this.delegated.verify(hash, signature, signer)
      : this.ecdsa.verify(hash, signature, signer);
  }
}
