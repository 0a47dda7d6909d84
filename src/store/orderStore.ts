/**
 * Keyed engine state: per-order status and filled amount, the transient
 * trade-args slot and the operational flag.
 *
 * All mutation goes through a StoreTransaction. Writes are staged and only
 * reach the store on commit(), so an operation that throws part-way leaves
 * nothing behind. Operations that read, await and then commit must run
 * through serialize(); whoever holds the store shares its queue.
 */

import { OrderStatus, type OrderState, type TradeArgs } from "../types/order.js";
import type { EngineEvent } from "../types/events.js";
import { SerialQueue } from "../utils/serial.js";

function key(orderHash: string): string {
  return orderHash.toLowerCase();
}

export class OrderStore {
  private statuses = new Map<string, OrderStatus>();
  private filledAmounts = new Map<string, bigint>();
  private transientTradeArgs: TradeArgs | null = null;
  private operational = true;
  private queue = new SerialQueue();

  getStatus(orderHash: string): OrderStatus {
    return this.statuses.get(key(orderHash)) ?? OrderStatus.Null;
  }

  getFilledAmount(orderHash: string): bigint {
    return this.filledAmounts.get(key(orderHash)) ?? 0n;
  }

  getState(orderHash: string): OrderState {
    return {
      status: this.getStatus(orderHash),
      filledAmount: this.getFilledAmount(orderHash),
    };
  }

  getTransientTradeArgs(): TradeArgs | null {
    return this.transientTradeArgs;
  }

  isOperational(): boolean {
    return this.operational;
  }

  /**
   * Run `task` after every task queued before it on this store has settled.
   */
  serialize<T>(task: () => Promise<T>): Promise<T> {
    return this.queue.run(task);
  }

  begin(): StoreTransaction {
    return new StoreTransaction(this, (tx) => this.apply(tx));
  }

  private apply(tx: StagedWrites): void {
    for (const [hash, status] of tx.statuses) this.statuses.set(hash, status);
    for (const [hash, amount] of tx.filledAmounts) this.filledAmounts.set(hash, amount);
    if (tx.transientTradeArgs !== undefined) this.transientTradeArgs = tx.transientTradeArgs;
    if (tx.operational !== undefined) this.operational = tx.operational;
  }
}

export interface StagedWrites {
  statuses: Map<string, OrderStatus>;
  filledAmounts: Map<string, bigint>;
  transientTradeArgs: TradeArgs | null | undefined;
  operational: boolean | undefined;
}

export class StoreTransaction {
  private staged: StagedWrites = {
    statuses: new Map(),
    filledAmounts: new Map(),
    transientTradeArgs: undefined,
    operational: undefined,
  };
  private pending: EngineEvent[] = [];
  private done = false;

  constructor(
    private readonly base: OrderStore,
    private readonly onCommit: (writes: StagedWrites) => void
  ) {}

  getStatus(orderHash: string): OrderStatus {
    return this.staged.statuses.get(key(orderHash)) ?? this.base.getStatus(orderHash);
  }

  setStatus(orderHash: string, status: OrderStatus): void {
    this.assertOpen();
    this.staged.statuses.set(key(orderHash), status);
  }

  getFilledAmount(orderHash: string): bigint {
    return this.staged.filledAmounts.get(key(orderHash)) ?? this.base.getFilledAmount(orderHash);
  }

  setFilledAmount(orderHash: string, amount: bigint): void {
    this.assertOpen();
    if (amount < this.getFilledAmount(orderHash)) {
      throw new RangeError("filled amount cannot decrease");
    }
    this.staged.filledAmounts.set(key(orderHash), amount);
  }

  /**
   * Read and clear the transient trade args in one step.
   */
  takeTransientTradeArgs(): TradeArgs | null {
    this.assertOpen();
    const current =
      this.staged.transientTradeArgs !== undefined
        ? this.staged.transientTradeArgs
        : this.base.getTransientTradeArgs();
    this.staged.transientTradeArgs = null;
    return current;
  }

  setTransientTradeArgs(tradeArgs: TradeArgs): void {
    this.assertOpen();
    this.staged.transientTradeArgs = { ...tradeArgs };
  }

  isOperational(): boolean {
    return this.staged.operational ?? this.base.isOperational();
  }

  setOperational(operational: boolean): void {
    this.assertOpen();
    this.staged.operational = operational;
  }

  emit(event: EngineEvent): void {
    this.assertOpen();
    this.pending.push(event);
  }

  /**
   * Apply staged writes and hand back the events to publish.
   */
  commit(): EngineEvent[] {
    this.assertOpen();
    this.done = true;
    this.onCommit(this.staged);
    return this.pending;
  }

  rollback(): void {
    this.done = true;
  }

  private assertOpen(): void {
    if (this.done) throw new Error("transaction already finished");
  }
}
