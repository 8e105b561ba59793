import { describe, it, expect } from "vitest";
import { ethers } from "ethers";
import { ONE, ZERO_ADDRESS } from "./constants";
import { ValidationError } from "./errors";
import {
  AccountSignatureVerifier,
  ContractSignatureVerifier,
  EcdsaSignatureVerifier,
  OrderType,
  hashOrderIntent,
  isOpenOrder,
  type ContractAccount,
  type OrderDomain,
  type OrderIntent,
} from "./order-intent";

const wallet = new ethers.Wallet("0x" + "11".repeat(32));
const other = new ethers.Wallet("0x" + "22".repeat(32));

const domain: OrderDomain = {
  name: "Fixed Rate Matching Engine",
  version: "v1.0.0",
  chainId: 1n,
  verifyingContract: "0x00000000000000000000000000000000000000e1",
};

function order(overrides: Partial<OrderIntent> = {}): OrderIntent {
  return {
    trader: wallet.address,
    counterparty: ZERO_ADDRESS,
    pool: "0x0000000000000000000000000000000000000001",
    fundAmount: 10n * ONE,
    bondAmount: 11n * ONE,
    minVaultSharePrice: 0n,
    options: { destination: wallet.address, asBase: true },
    orderType: OrderType.OpenLong,
    minMaturityTime: 0n,
    maxMaturityTime: 2n ** 64n,
    expiry: 1_700_000_000n,
    salt: "0x" + "01".repeat(32),
    signature: "0x",
    ...overrides,
  };
}

function sign(signer: ethers.Wallet, hash: string): string {
  return signer.signingKey.sign(hash).serialized;
}

describe("hashOrderIntent", () => {
  it("should produce a 32-byte digest", () => {
    expect(hashOrderIntent(order(), domain)).toMatch(/^0x[0-9a-f]{64}$/);
  });

  it("should ignore the signature", () => {
    expect(hashOrderIntent(order({ signature: "0x1234" }), domain)).toBe(hashOrderIntent(order(), domain));
  });

  it("should commit to every signed field", () => {
    const hash = hashOrderIntent(order(), domain);
    expect(hashOrderIntent(order({ salt: "0x" + "02".repeat(32) }), domain)).not.toBe(hash);
    expect(hashOrderIntent(order({ bondAmount: 11n * ONE + 1n }), domain)).not.toBe(hash);
    expect(hashOrderIntent(order({ orderType: OrderType.OpenShort }), domain)).not.toBe(hash);
    expect(
      hashOrderIntent(order({ options: { destination: wallet.address, asBase: false } }), domain)
    ).not.toBe(hash);
  });

  it("should reject fields that do not encode", () => {
    expect(() => hashOrderIntent(order({ salt: "salt" }), domain)).toThrow(
      expect.objectContaining({ code: "MalformedOrder" })
    );
    expect(() => hashOrderIntent(order({ pool: "0x1234" }), domain)).toThrow(ValidationError);
  });

  it("should bind to the domain", () => {
    const hash = hashOrderIntent(order(), domain);
    expect(hashOrderIntent(order(), { ...domain, chainId: 5n })).not.toBe(hash);
    expect(
      hashOrderIntent(order(), { ...domain, verifyingContract: "0x00000000000000000000000000000000000000e2" })
    ).not.toBe(hash);
  });
});

describe("isOpenOrder", () => {
  it("should split open and close orders", () => {
    expect(isOpenOrder(OrderType.OpenLong)).toBe(true);
    expect(isOpenOrder(OrderType.OpenShort)).toBe(true);
    expect(isOpenOrder(OrderType.CloseLong)).toBe(false);
    expect(isOpenOrder(OrderType.CloseShort)).toBe(false);
  });
});

describe("EcdsaSignatureVerifier", () => {
  const verifier = new EcdsaSignatureVerifier();
  const hash = hashOrderIntent(order(), domain);

  it("should accept the signer's signature", () => {
    expect(verifier.verify(hash, sign(wallet, hash), wallet.address)).toBe(true);
    expect(verifier.verify(hash, sign(wallet, hash), wallet.address.toLowerCase())).toBe(true);
  });

  it("should reject another key's signature", () => {
    expect(verifier.verify(hash, sign(other, hash), wallet.address)).toBe(false);
  });

  it("should reject a malformed signature", () => {
    expect(() => verifier.verify(hash, "0x1234", wallet.address)).toThrow(
      expect.objectContaining({ code: "InvalidSignature" })
    );
  });
});

describe("Contract accounts", () => {
  const contract = "0x00000000000000000000000000000000000000c1";
  const account: ContractAccount = {
    isValidSignature: (_hash, signature) => signature === "0xbeef",
  };
  const hash = hashOrderIntent(order(), domain);

  it("should delegate to the account", () => {
    const verifier = new ContractSignatureVerifier(new Map([[contract, account]]));
    expect(verifier.verify(hash, "0xbeef", contract)).toBe(true);
    expect(verifier.verify(hash, "0xdead", contract)).toBe(false);
    expect(verifier.verify(hash, "0xbeef", wallet.address)).toBe(false);
  });

  it("should route registered contracts away from ECDSA", () => {
    const verifier = new AccountSignatureVerifier();
    verifier.registerContract(contract, account);
    expect(verifier.isContract(contract)).toBe(true);
    expect(verifier.isContract(wallet.address)).toBe(false);
    expect(verifier.verify(hash, "0xbeef", contract)).toBe(true);
    expect(verifier.verify(hash, sign(wallet, hash), wallet.address)).toBe(true);
  });
});
