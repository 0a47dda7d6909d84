/**
 * Canonical order engine. Validates fills proposed by the margin ledger
 * and keeps per-order fill accounting.
 *
 * Fill path (getTradeCost):
 * 1. Caller must be the ledger and the module operational
 * 2. Decode order + trade args (+ signature); fall back to transient args
 * 3. Hash the order; check signature / approval / cancellation
 * 4. Price and fee limits, trigger, expiry, accounts, markets, direction
 * 5. Price the fill, guard against overfill, record the new total
 * 6. Decrease-only orders: check both legs move toward zero
 *
 * Every public operation runs inside a store transaction on the store's
 * serial queue, so operations on one store never interleave (even across
 * engines sharing it) and a rejection leaves no state behind.
 */

import { EventEmitter } from "node:events";
import { OrderHasher } from "./typedHash.js";
import { decodeCallFunction, decodeTradeData, CallFunctionType } from "./calldata.js";
import { sameAddress } from "./signature.js";
import { getCurrentPrice, quoteFill } from "./pricing.js";
import {
  verifyAuthorization,
  verifyOrderAndTrade,
  verifyPriceAndFee,
  verifyTrigger,
  type TradeContext,
} from "./validator.js";
import { verifyDecreaseOnly } from "./decreaseOnly.js";
import { OrderStore, type StoreTransaction } from "../store/orderStore.js";
import { isRejection, requireThat } from "../utils/errors.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import {
  OrderStatus,
  type AccountInfo,
  type Order,
  type OrderInfo,
  type OrderState,
} from "../types/order.js";
import type { EngineEvent, EngineEventName, EngineEvents } from "../types/events.js";
import type { MarginLedger } from "../types/ledger.js";
import type { BytesLike } from "ethers";

export interface CanonicalOrdersOptions {
  chainId: bigint;
  /** Address the orders are signed for (EIP-712 verifyingContract). */
  verifyingContract: string;
  /** Only this caller may submit fills and delegated calls. */
  ledgerAddress: string;
  /** Only this caller may shut the module down or start it up. */
  owner: string;
  ledger: MarginLedger;
  logger?: Logger;
  store?: OrderStore;
  /** Current time in unix seconds. */
  clock?: () => bigint;
}

export interface TradeCostParams extends TradeContext {
  data: BytesLike;
}

export class CanonicalOrders {
  readonly hasher: OrderHasher;
  private ledger: MarginLedger;
  private ledgerAddress: string;
  private owner: string;
  private store: OrderStore;
  private logger: Logger;
  private clock: () => bigint;
  private emitter = new EventEmitter();
  private log: EngineEvent[] = [];

  constructor(opts: CanonicalOrdersOptions) {
    this.hasher = new OrderHasher(opts.chainId, opts.verifyingContract);
    this.ledger = opts.ledger;
    this.ledgerAddress = opts.ledgerAddress;
    this.owner = opts.owner;
    this.store = opts.store ?? new OrderStore();
    this.logger = opts.logger ?? silentLogger();
    this.clock = opts.clock ?? (() => BigInt(Math.floor(Date.now() / 1000)));
  }

  // ============ Admin ============

  shutDown(caller: string): Promise<void> {
    return this.setOperational(caller, false);
  }

  startUp(caller: string): Promise<void> {
    return this.setOperational(caller, true);
  }

  private setOperational(caller: string, operational: boolean): Promise<void> {
    return this.transact(operational ? "startUp" : "shutDown", async (tx) => {
      requireThat(sameAddress(caller, this.owner), "Unauthorized", "Caller is not the owner", {
        details: { caller },
      });
      tx.setOperational(operational);
      tx.emit({ name: "ContractStatusSet", args: { operational } });
    });
  }

  // ============ Order control ============

  cancelOrder(caller: string, order: Order): Promise<void> {
    return this.transact("cancelOrder", async (tx) => this.cancelOrderInternal(tx, caller, order));
  }

  approveOrder(caller: string, order: Order): Promise<void> {
    return this.transact("approveOrder", async (tx) => this.approveOrderInternal(tx, caller, order));
  }

  /**
   * Delegated entry point: the ledger forwards an order-management action
   * on behalf of `sender`, typically batched with other ledger actions.
   */
  callFunction(caller: string, sender: AccountInfo, data: BytesLike): Promise<void> {
    return this.transact("callFunction", async (tx) => {
      this.requireLedger(caller);
      const call = decodeCallFunction(data);
      switch (call.kind) {
        case CallFunctionType.Approve:
          this.approveOrderInternal(tx, sender.owner, call.order);
          break;
        case CallFunctionType.Cancel:
          this.cancelOrderInternal(tx, sender.owner, call.order);
          break;
        case CallFunctionType.SetTradeArgs:
          tx.setTransientTradeArgs(call.tradeArgs);
          this.logger.debug(
            { price: call.tradeArgs.price.toString(), sender: sender.owner },
            "Transient trade args set"
          );
          break;
      }
    });
  }

  private cancelOrderInternal(tx: StoreTransaction, canceler: string, order: Order): void {
    const orderHash = this.hasher.hash(order);
    requireThat(
      sameAddress(canceler, order.makerAccountOwner),
      "Unauthorized",
      "Canceler must be maker",
      { orderHash, details: { canceler } }
    );
    tx.setStatus(orderHash, OrderStatus.Canceled);
    tx.emit({
      name: "OrderCanceled",
      args: {
        orderHash,
        canceler,
        baseMarket: order.baseMarket,
        quoteMarket: order.quoteMarket,
      },
    });
  }

  private approveOrderInternal(tx: StoreTransaction, approver: string, order: Order): void {
    const orderHash = this.hasher.hash(order);
    requireThat(
      sameAddress(approver, order.makerAccountOwner),
      "Unauthorized",
      "Approver must be maker",
      { orderHash, details: { approver } }
    );
    requireThat(
      tx.getStatus(orderHash) !== OrderStatus.Canceled,
      "OrderCanceled",
      "Cannot approve canceled order",
      { orderHash }
    );
    tx.setStatus(orderHash, OrderStatus.Approved);
    tx.emit({
      name: "OrderApproved",
      args: {
        orderHash,
        approver,
        baseMarket: order.baseMarket,
        quoteMarket: order.quoteMarket,
      },
    });
  }

  // ============ Fills ============

  /**
   * Validate a proposed fill and return the maker's signed change on the
   * output market, for the ledger to apply.
   */
  getTradeCost(caller: string, params: TradeCostParams): Promise<bigint> {
    return this.transact("getTradeCost", async (tx) => {
      this.requireLedger(caller);
      requireThat(tx.isOperational(), "ModuleInactive", "Contract is not operational");

      const { orderInfo, signature } = this.getOrderInfo(tx, params.data);
      const { order, orderHash } = orderInfo;
      this.logger.debug({ orderHash }, "Order decoded");

      verifyAuthorization(orderInfo, tx.getStatus(orderHash), signature);
      verifyPriceAndFee(orderInfo);
      if (order.triggerPrice > 0n) {
        verifyTrigger(orderInfo, await this.getCurrentPrice(order.baseMarket, order.quoteMarket));
      }
      verifyOrderAndTrade(orderInfo, params, this.clock());

      const { outputAmount, fillAmount } = quoteFill(
        order,
        orderInfo.tradeArgs,
        params.inputMarketId,
        params.inputWei,
        orderHash
      );
      this.updateFilledAmount(tx, orderInfo, fillAmount);
      const outputWei = params.inputWei > 0n ? -outputAmount : outputAmount;

      if (order.flags.isDecreaseOnly) {
        const oldOutputWei = await this.ledger.getAccountWei(
          params.makerAccount,
          params.outputMarketId
        );
        verifyDecreaseOnly({
          orderHash,
          oldInputPar: params.oldInputPar,
          newInputPar: params.newInputPar,
          oldOutputWei,
          outputWei,
        });
      }

      return outputWei;
    });
  }

  private getOrderInfo(
    tx: StoreTransaction,
    data: BytesLike
  ): { orderInfo: OrderInfo; signature: string | null } {
    const { order, tradeArgs: inline, signature } = decodeTradeData(data);
    const orderHash = this.hasher.hash(order);

    let tradeArgs = inline;
    if (tradeArgs.price === 0n) {
      tradeArgs = tx.takeTransientTradeArgs() ?? tradeArgs;
      requireThat(tradeArgs.price !== 0n, "StaleTradeArgs", "FillArgs loaded price is zero", {
        orderHash,
      });
    }

    return { orderInfo: { order, tradeArgs, orderHash }, signature };
  }

  private updateFilledAmount(tx: StoreTransaction, orderInfo: OrderInfo, fillAmount: bigint): void {
    const { order, orderHash, tradeArgs } = orderInfo;
    const oldFilledAmount = tx.getFilledAmount(orderHash);
    const totalFilledAmount = oldFilledAmount + fillAmount;
    requireThat(totalFilledAmount <= order.amount, "Overfill", "Cannot overfill order", {
      orderHash,
      details: {
        oldFilledAmount: oldFilledAmount.toString(),
        fillAmount: fillAmount.toString(),
        amount: order.amount.toString(),
      },
    });
    tx.setFilledAmount(orderHash, totalFilledAmount);
    tx.emit({
      name: "OrderFilled",
      args: {
        orderHash,
        orderMaker: order.makerAccountOwner,
        fillAmount,
        totalFilledAmount,
        isBuy: order.flags.isBuy,
        tradeArgs: { ...tradeArgs },
      },
    });
  }

  private async getCurrentPrice(baseMarket: bigint, quoteMarket: bigint): Promise<bigint> {
    const [basePrice, quotePrice] = await Promise.all([
      this.ledger.getMarketPrice(baseMarket),
      this.ledger.getMarketPrice(quoteMarket),
    ]);
    return getCurrentPrice(basePrice, quotePrice);
  }

  // ============ Queries ============

  getOrderHash(order: Order): string {
    return this.hasher.hash(order);
  }

  getOrderStates(orderHashes: string[]): OrderState[] {
    return orderHashes.map((hash) => this.store.getState(hash));
  }

  isOperational(): boolean {
    return this.store.isOperational();
  }

  /** Committed events, oldest first. */
  events(): readonly EngineEvent[] {
    return this.log;
  }

  on<K extends EngineEventName>(name: K, listener: (args: EngineEvents[K]) => void): () => void {
    this.emitter.on(name, listener);
    return () => {
      this.emitter.off(name, listener);
    };
  }

  // ============ Internals ============

  private requireLedger(caller: string): void {
    requireThat(sameAddress(caller, this.ledgerAddress), "Unauthorized", "Only the ledger can call", {
      details: { caller },
    });
  }

  private transact<T>(label: string, fn: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    return this.store.serialize(async () => {
      const tx = this.store.begin();
      let result: T;
      try {
        result = await fn(tx);
      } catch (err) {
        tx.rollback();
        if (isRejection(err)) {
          this.logger.warn(
            { op: label, reason: err.reason, orderHash: err.orderHash, details: err.details },
            err.message
          );
        } else {
          this.logger.error({ op: label, err }, "Operation failed");
        }
        throw err;
      }
      this.publish(tx.commit());
      return result;
    });
  }

  private publish(events: EngineEvent[]): void {
    for (const event of events) {
      this.log.push(event);
      this.logger.info({ event: event.name, ...printable(event.args) }, "Event");
      try {
        this.emitter.emit(event.name, event.args);
      } catch (err) {
        this.logger.error({ event: event.name, err }, "Event listener threw");
      }
    }
  }
}

/**
 * Stringify bigints (and nested trade args) for structured logging.
 */
function printable(args: object): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(args)) {
    if (typeof v === "bigint") out[k] = v.toString();
    else if (v !== null && typeof v === "object") out[k] = printable(v);
    else out[k] = v;
  }
  return out;
}
