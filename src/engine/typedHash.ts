/**
 * EIP-712 hashing of canonical orders.
 *
 * orderHash = keccak256(0x1901 ‖ domainSeparator ‖ structHash)
 *
 * The struct tag and field order must stay in sync with ORDER_TYPES below
 * (used by signers) and the ABI layout in calldata.ts.
 */

import { AbiCoder, concat, getAddress, id, keccak256 } from "ethers";
import { flagsToBytes32 } from "./flags.js";
import type { Order } from "../types/order.js";

export const EIP712_DOMAIN_NAME = "CanonicalOrders";
export const EIP712_DOMAIN_VERSION = "1.1";

const EIP712_DOMAIN_SCHEMA_HASH = id(
  "EIP712Domain(string name,string version,uint256 chainId,address verifyingContract)"
);

const EIP712_ORDER_STRUCT_SCHEMA_HASH = id(
  "CanonicalOrder(" +
    "bytes32 flags," +
    "uint256 baseMarket," +
    "uint256 quoteMarket," +
    "uint256 amount," +
    "uint256 limitPrice," +
    "uint256 triggerPrice," +
    "uint256 limitFee," +
    "address makerAccountOwner," +
    "uint256 makerAccountNumber," +
    "address taker," +
    "uint256 expiration" +
    ")"
);

/** ethers-style type description of the same struct, for signTypedData. */
export const ORDER_TYPES = {
  CanonicalOrder: [
    { name: "flags", type: "bytes32" },
    { name: "baseMarket", type: "uint256" },
    { name: "quoteMarket", type: "uint256" },
    { name: "amount", type: "uint256" },
    { name: "limitPrice", type: "uint256" },
    { name: "triggerPrice", type: "uint256" },
    { name: "limitFee", type: "uint256" },
    { name: "makerAccountOwner", type: "address" },
    { name: "makerAccountNumber", type: "uint256" },
    { name: "taker", type: "address" },
    { name: "expiration", type: "uint256" },
  ],
};

export interface TypedDomain {
  name: string;
  version: string;
  chainId: bigint;
  verifyingContract: string;
}

const abi = AbiCoder.defaultAbiCoder();

export function buildDomain(chainId: bigint, verifyingContract: string): TypedDomain {
  return {
    name: EIP712_DOMAIN_NAME,
    version: EIP712_DOMAIN_VERSION,
    chainId,
    verifyingContract: getAddress(verifyingContract),
  };
}

export function getDomainHash(domain: TypedDomain): string {
  return keccak256(
    abi.encode(
      ["bytes32", "bytes32", "bytes32", "uint256", "address"],
      [
        EIP712_DOMAIN_SCHEMA_HASH,
        id(domain.name),
        id(domain.version),
        domain.chainId,
        domain.verifyingContract,
      ]
    )
  );
}

/**
 * Order fields in struct order, flags as bytes32.
 */
export function orderValues(order: Order) {
  return {
    flags: flagsToBytes32(order.flags),
    baseMarket: order.baseMarket,
    quoteMarket: order.quoteMarket,
    amount: order.amount,
    limitPrice: order.limitPrice,
    triggerPrice: order.triggerPrice,
    limitFee: order.limitFee,
    makerAccountOwner: getAddress(order.makerAccountOwner),
    makerAccountNumber: order.makerAccountNumber,
    taker: getAddress(order.taker),
    expiration: order.expiration,
  };
}

export function getOrderStructHash(order: Order): string {
  const v = orderValues(order);
  return keccak256(
    abi.encode(
      [
        "bytes32",
        "bytes32",
        "uint256",
        "uint256",
        "uint256",
        "uint256",
        "uint256",
        "uint256",
        "address",
        "uint256",
        "address",
        "uint256",
      ],
      [
        EIP712_ORDER_STRUCT_SCHEMA_HASH,
        v.flags,
        v.baseMarket,
        v.quoteMarket,
        v.amount,
        v.limitPrice,
        v.triggerPrice,
        v.limitFee,
        v.makerAccountOwner,
        v.makerAccountNumber,
        v.taker,
        v.expiration,
      ]
    )
  );
}

/**
 * Hash an order with a precomputed domain separator.
 */
export function getOrderHash(order: Order, domainHash: string): string {
  return keccak256(concat(["0x1901", domainHash, getOrderStructHash(order)]));
}

/**
 * Binds a domain once and hashes orders against it.
 */
export class OrderHasher {
  readonly domain: TypedDomain;
  readonly domainHash: string;

  constructor(chainId: bigint, verifyingContract: string) {
    this.domain = buildDomain(chainId, verifyingContract);
    this.domainHash = getDomainHash(this.domain);
  }

  hash(order: Order): string {
    return getOrderHash(order, this.domainHash);
  }
}
