/**
 * Business rules a fill must satisfy. Each check throws a
 * CanonicalOrderError carrying the order hash; the engine runs them in
 * the order listed here.
 */

import { getAddress, ZeroAddress } from "ethers";
import { verifySignature } from "./signature.js";
import { requireThat } from "../utils/errors.js";
import { OrderStatus, type AccountInfo, type OrderInfo } from "../types/order.js";

export interface TradeContext {
  inputMarketId: bigint;
  outputMarketId: bigint;
  makerAccount: AccountInfo;
  takerAccount: AccountInfo;
  oldInputPar: bigint;
  newInputPar: bigint;
  /** Maker's signed change on the input market. */
  inputWei: bigint;
}

/**
 * Orders never seen before need a maker signature; approved orders skip it;
 * canceled orders are dead.
 */
export function verifyAuthorization(
  orderInfo: OrderInfo,
  status: OrderStatus,
  signature: string | null
): void {
  const { orderHash, order } = orderInfo;
  if (status === OrderStatus.Null) {
    requireThat(signature !== null, "InvalidSignature", "Order has no signature and is not approved", {
      orderHash,
    });
    verifySignature(orderHash, signature, order.makerAccountOwner);
    return;
  }
  requireThat(status !== OrderStatus.Canceled, "OrderCanceled", "Order canceled", { orderHash });
}

export function verifyPriceAndFee(orderInfo: OrderInfo): void {
  const { order, tradeArgs, orderHash } = orderInfo;

  requireThat(
    order.flags.isBuy
      ? tradeArgs.price <= order.limitPrice
      : tradeArgs.price >= order.limitPrice,
    "PriceOutOfBounds",
    "Fill invalid price",
    {
      orderHash,
      details: { price: tradeArgs.price.toString(), limitPrice: order.limitPrice.toString() },
    }
  );

  // A rebate always satisfies an order that tolerates a positive fee.
  const feeOk = order.flags.isNegativeFee
    ? tradeArgs.isNegativeFee && tradeArgs.fee >= order.limitFee
    : tradeArgs.isNegativeFee || tradeArgs.fee <= order.limitFee;
  requireThat(feeOk, "FeeOutOfBounds", "Fill invalid fee", {
    orderHash,
    details: {
      fee: tradeArgs.fee.toString(),
      isNegativeFee: String(tradeArgs.isNegativeFee),
      limitFee: order.limitFee.toString(),
    },
  });
}

/**
 * `currentPrice` is base/quote scaled by 1e18; only consulted when the
 * order has a trigger.
 */
export function verifyTrigger(orderInfo: OrderInfo, currentPrice: bigint): void {
  const { order, orderHash } = orderInfo;
  if (order.triggerPrice === 0n) return;
  requireThat(
    order.flags.isBuy
      ? currentPrice >= order.triggerPrice
      : currentPrice <= order.triggerPrice,
    "NotTriggered",
    "Order triggerPrice not triggered",
    {
      orderHash,
      details: {
        currentPrice: currentPrice.toString(),
        triggerPrice: order.triggerPrice.toString(),
      },
    }
  );
}

export function verifyOrderAndTrade(
  orderInfo: OrderInfo,
  ctx: TradeContext,
  nowSeconds: bigint
): void {
  const { order, orderHash } = orderInfo;

  requireThat(
    order.expiration === 0n || order.expiration >= nowSeconds,
    "Expired",
    "Order expired",
    { orderHash, details: { expiration: order.expiration.toString(), now: nowSeconds.toString() } }
  );

  requireThat(
    getAddress(ctx.makerAccount.owner) === getAddress(order.makerAccountOwner) &&
      ctx.makerAccount.number === order.makerAccountNumber,
    "AccountMismatch",
    "Order maker account mismatch",
    { orderHash }
  );

  requireThat(
    getAddress(order.taker) === ZeroAddress ||
      getAddress(order.taker) === getAddress(ctx.takerAccount.owner),
    "TakerMismatch",
    "Order taker mismatch",
    { orderHash, details: { taker: order.taker, actual: ctx.takerAccount.owner } }
  );

  requireThat(
    (order.baseMarket === ctx.outputMarketId && order.quoteMarket === ctx.inputMarketId) ||
      (order.quoteMarket === ctx.outputMarketId && order.baseMarket === ctx.inputMarketId),
    "MarketMismatch",
    "Market mismatch",
    {
      orderHash,
      details: {
        inputMarketId: ctx.inputMarketId.toString(),
        outputMarketId: ctx.outputMarketId.toString(),
      },
    }
  );

  requireThat(ctx.inputWei !== 0n, "ZeroInput", "InputWei is zero", { orderHash });

  requireThat(
    (ctx.inputWei > 0n) === ((order.baseMarket === ctx.inputMarketId) === order.flags.isBuy),
    "DirectionMismatch",
    "InputWei sign mismatch",
    { orderHash, details: { inputWei: ctx.inputWei.toString() } }
  );
}
