import type { TradeArgs } from "./order.js";

/**
 * Events emitted by the engine once an operation has committed.
 * Field names follow the on-chain log definitions in chain/contracts.ts.
 */
export interface EngineEvents {
  ContractStatusSet: { operational: boolean };
  OrderCanceled: {
    orderHash: string;
    canceler: string;
    baseMarket: bigint;
    quoteMarket: bigint;
  };
  OrderApproved: {
    orderHash: string;
    approver: string;
    baseMarket: bigint;
    quoteMarket: bigint;
  };
  OrderFilled: {
    orderHash: string;
    orderMaker: string;
    fillAmount: bigint;
    totalFilledAmount: bigint;
    isBuy: boolean;
    tradeArgs: TradeArgs;
  };
}

export type EngineEventName = keyof EngineEvents;

export type EngineEvent = {
  [K in EngineEventName]: { name: K; args: EngineEvents[K] };
}[EngineEventName];
