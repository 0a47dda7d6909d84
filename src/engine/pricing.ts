/**
 * Fixed-point pricing for fills. Prices and fees are scaled by PRICE_BASE
 * and every division floors, matching integer math on the ledger.
 */

import { requireThat } from "../utils/errors.js";
import type { Order, TradeArgs } from "../types/order.js";

export const PRICE_BASE = 10n ** 18n;

export function getPartial(target: bigint, numerator: bigint, denominator: bigint): bigint {
  return (target * numerator) / denominator;
}

export function abs(value: bigint): bigint {
  return value < 0n ? -value : value;
}

/**
 * Trade price after applying the fee. A positive fee costs the maker; a
 * negative fee (rebate) moves the price in the maker's favour.
 */
export function getFeeAdjustedPrice(isBuy: boolean, tradeArgs: TradeArgs): bigint {
  const fee = getPartial(tradeArgs.price, tradeArgs.fee, PRICE_BASE);
  return isBuy === tradeArgs.isNegativeFee
    ? tradeArgs.price - fee
    : tradeArgs.price + fee;
}

export interface FillQuote {
  /** Magnitude of the maker's change on the output market. */
  outputAmount: bigint;
  /** Amount counted against order.amount. */
  fillAmount: bigint;
}

/**
 * Price a fill of `inputWei` (maker's signed change on the input market).
 * Assumes market correspondence has already been checked. A fee that
 * leaves no usable price is a FeeOutOfBounds rejection.
 */
export function quoteFill(
  order: Order,
  tradeArgs: TradeArgs,
  inputMarketId: bigint,
  inputWei: bigint,
  orderHash?: string
): FillQuote {
  const adjustedPrice = getFeeAdjustedPrice(order.flags.isBuy, tradeArgs);
  const inputAmount = abs(inputWei);
  const quoteInput = order.quoteMarket === inputMarketId;
  requireThat(
    quoteInput ? adjustedPrice > 0n : adjustedPrice >= 0n,
    "FeeOutOfBounds",
    "Fee-adjusted price out of range",
    {
      orderHash,
      details: {
        price: tradeArgs.price.toString(),
        fee: tradeArgs.fee.toString(),
        adjustedPrice: adjustedPrice.toString(),
      },
    }
  );

  if (quoteInput) {
    const outputAmount = getPartial(inputAmount, PRICE_BASE, adjustedPrice);
    return { outputAmount, fillAmount: outputAmount };
  }

  return {
    outputAmount: getPartial(inputAmount, adjustedPrice, PRICE_BASE),
    fillAmount: inputAmount,
  };
}

/**
 * Ratio of two oracle prices, scaled by PRICE_BASE.
 */
export function getCurrentPrice(basePrice: bigint, quotePrice: bigint): bigint {
  if (quotePrice === 0n) {
    throw new RangeError("quote market price is zero");
  }
  return getPartial(basePrice, PRICE_BASE, quotePrice);
}
