/**
 * JSON form of orders and trade args: integers as decimal strings, flags
 * spelled out. This is what the CLI reads and prints.
 */

import { getAddress, ZeroAddress } from "ethers";
import type { Order, TradeArgs } from "../types/order.js";

export interface OrderJson {
  salt: string;
  isBuy: boolean;
  isDecreaseOnly: boolean;
  isNegativeFee: boolean;
  baseMarket: string;
  quoteMarket: string;
  amount: string;
  limitPrice: string;
  triggerPrice?: string;
  limitFee: string;
  makerAccountOwner: string;
  makerAccountNumber: string;
  taker?: string;
  expiration?: string;
}

export interface TradeArgsJson {
  price: string;
  fee: string;
  isNegativeFee: boolean;
}

function readUint(obj: Record<string, unknown>, field: string, fallback?: string): bigint {
  const raw = obj[field] ?? fallback;
  if (typeof raw !== "string" && typeof raw !== "number") {
    throw new TypeError(`${field}: expected a decimal string`);
  }
  const value = BigInt(raw);
  if (value < 0n) throw new RangeError(`${field}: must not be negative`);
  return value;
}

function readBool(obj: Record<string, unknown>, field: string): boolean {
  const raw = obj[field] ?? false;
  if (typeof raw !== "boolean") throw new TypeError(`${field}: expected a boolean`);
  return raw;
}

function readAddress(obj: Record<string, unknown>, field: string, fallback?: string): string {
  const raw = obj[field] ?? fallback;
  if (typeof raw !== "string") throw new TypeError(`${field}: expected an address`);
  return getAddress(raw);
}

function asRecord(value: unknown, what: string): Record<string, unknown> {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    throw new TypeError(`${what}: expected an object`);
  }
  return Object.fromEntries(Object.entries(value));
}

export function orderFromJson(value: unknown): Order {
  const o = asRecord(value, "order");
  return {
    flags: {
      salt: readUint(o, "salt"),
      isBuy: readBool(o, "isBuy"),
      isDecreaseOnly: readBool(o, "isDecreaseOnly"),
      isNegativeFee: readBool(o, "isNegativeFee"),
    },
    baseMarket: readUint(o, "baseMarket"),
    quoteMarket: readUint(o, "quoteMarket"),
    amount: readUint(o, "amount"),
    limitPrice: readUint(o, "limitPrice"),
    triggerPrice: readUint(o, "triggerPrice", "0"),
    limitFee: readUint(o, "limitFee"),
    makerAccountOwner: readAddress(o, "makerAccountOwner"),
    makerAccountNumber: readUint(o, "makerAccountNumber"),
    taker: readAddress(o, "taker", ZeroAddress),
    expiration: readUint(o, "expiration", "0"),
  };
}

export function orderToJson(order: Order): OrderJson {
  return {
    salt: order.flags.salt.toString(),
    isBuy: order.flags.isBuy,
    isDecreaseOnly: order.flags.isDecreaseOnly,
    isNegativeFee: order.flags.isNegativeFee,
    baseMarket: order.baseMarket.toString(),
    quoteMarket: order.quoteMarket.toString(),
    amount: order.amount.toString(),
    limitPrice: order.limitPrice.toString(),
    triggerPrice: order.triggerPrice.toString(),
    limitFee: order.limitFee.toString(),
    makerAccountOwner: order.makerAccountOwner,
    makerAccountNumber: order.makerAccountNumber.toString(),
    taker: order.taker,
    expiration: order.expiration.toString(),
  };
}

export function tradeArgsFromJson(value: unknown): TradeArgs {
  const t = asRecord(value, "tradeArgs");
  return {
    price: readUint(t, "price"),
    fee: readUint(t, "fee", "0"),
    isNegativeFee: readBool(t, "isNegativeFee"),
  };
}

export function tradeArgsToJson(tradeArgs: TradeArgs): TradeArgsJson {
  return {
    price: tradeArgs.price.toString(),
    fee: tradeArgs.fee.toString(),
    isNegativeFee: tradeArgs.isNegativeFee,
  };
}
