import { Wallet, ZeroAddress } from "ethers";
import { PRICE_BASE } from "../engine/pricing.js";
import type { Order, OrderFlags, TradeArgs } from "../types/order.js";

export const CHAIN_ID = 1337n;
export const VERIFYING_CONTRACT = "0x2000000000000000000000000000000000000002";
export const LEDGER_ADDRESS = "0x3000000000000000000000000000000000000003";
export const OWNER = "0x4000000000000000000000000000000000000004";
export const TAKER = "0x5000000000000000000000000000000000000005";
export const NOW = 1_700_000_000n;

export const BASE = 1n;
export const QUOTE = 2n;

// Placeholder keys 1 and 2.
export const maker = new Wallet("0x" + "1".padStart(64, "0"));
export const stranger = new Wallet("0x" + "2".padStart(64, "0"));

type OrderOverrides = Partial<Omit<Order, "flags">> & { flags?: Partial<OrderFlags> };

/**
 * A buy order for up to 100 base units at 2 quote per base.
 */
export function makeOrder(overrides: OrderOverrides = {}): Order {
  const { flags, ...rest } = overrides;
  return {
    flags: { salt: 42n, isBuy: true, isDecreaseOnly: false, isNegativeFee: false, ...flags },
    baseMarket: BASE,
    quoteMarket: QUOTE,
    amount: 100n,
    limitPrice: 2n * PRICE_BASE,
    triggerPrice: 0n,
    limitFee: 0n,
    makerAccountOwner: maker.address,
    makerAccountNumber: 0n,
    taker: ZeroAddress,
    expiration: 0n,
    ...rest,
  };
}

export function makeTradeArgs(overrides: Partial<TradeArgs> = {}): TradeArgs {
  return { price: 2n * PRICE_BASE, fee: 0n, isNegativeFee: false, ...overrides };
}
