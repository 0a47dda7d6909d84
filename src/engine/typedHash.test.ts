import { describe, it, expect } from "vitest";
import { TypedDataEncoder, ZeroAddress } from "ethers";
import {
  EIP712_DOMAIN_NAME,
  EIP712_DOMAIN_VERSION,
  ORDER_TYPES,
  OrderHasher,
  buildDomain,
  getDomainHash,
  orderValues,
} from "./typedHash.js";
import { CHAIN_ID, VERIFYING_CONTRACT, TAKER, makeOrder } from "../testing/fixtures.js";

describe("getDomainHash", () => {
  it("matches the EIP-712 domain separator computed by ethers", () => {
    const domain = buildDomain(CHAIN_ID, VERIFYING_CONTRACT);
    expect(getDomainHash(domain)).toBe(TypedDataEncoder.hashDomain(domain));
  });

  it("uses the protocol name and version", () => {
    const domain = buildDomain(CHAIN_ID, VERIFYING_CONTRACT);
    expect(domain.name).toBe(EIP712_DOMAIN_NAME);
    expect(domain.version).toBe(EIP712_DOMAIN_VERSION);
  });

  it("changes with chain id and verifying contract", () => {
    const a = getDomainHash(buildDomain(CHAIN_ID, VERIFYING_CONTRACT));
    const b = getDomainHash(buildDomain(CHAIN_ID + 1n, VERIFYING_CONTRACT));
    const c = getDomainHash(buildDomain(CHAIN_ID, TAKER));
    expect(a).not.toBe(b);
    expect(a).not.toBe(c);
  });
});

describe("OrderHasher", () => {
  const hasher = new OrderHasher(CHAIN_ID, VERIFYING_CONTRACT);

  it("agrees with ethers TypedDataEncoder bit for bit", () => {
    const order = makeOrder({ triggerPrice: 5n, expiration: 99n, taker: TAKER });
    expect(hasher.hash(order)).toBe(
      TypedDataEncoder.hash(hasher.domain, ORDER_TYPES, orderValues(order))
    );
  });

  it("is deterministic", () => {
    expect(hasher.hash(makeOrder())).toBe(hasher.hash(makeOrder()));
  });

  it("changes when any field changes", () => {
    const base = hasher.hash(makeOrder());
    const variants = [
      makeOrder({ flags: { salt: 43n } }),
      makeOrder({ flags: { isBuy: false } }),
      makeOrder({ flags: { isDecreaseOnly: true } }),
      makeOrder({ flags: { isNegativeFee: true } }),
      makeOrder({ baseMarket: 3n }),
      makeOrder({ quoteMarket: 3n }),
      makeOrder({ amount: 101n }),
      makeOrder({ limitPrice: 1n }),
      makeOrder({ triggerPrice: 1n }),
      makeOrder({ limitFee: 1n }),
      makeOrder({ makerAccountOwner: TAKER }),
      makeOrder({ makerAccountNumber: 1n }),
      makeOrder({ taker: TAKER }),
      makeOrder({ expiration: 1n }),
    ];
    const hashes = new Set(variants.map((o) => hasher.hash(o)));
    expect(hashes.size).toBe(variants.length);
    expect(hashes.has(base)).toBe(false);
  });

  it("treats address case as irrelevant", () => {
    const order = makeOrder({ taker: TAKER });
    const lower = makeOrder({ taker: TAKER.toLowerCase(), makerAccountOwner: order.makerAccountOwner.toLowerCase() });
    expect(hasher.hash(lower)).toBe(hasher.hash(order));
    expect(lower.taker).not.toBe(ZeroAddress);
  });
});
