/**
 * Canonical order as signed by the maker.
 * Addresses are 0x-prefixed hex strings; the zero address means "unset".
 */
export interface Order {
  flags: OrderFlags;
  baseMarket: bigint;
  quoteMarket: bigint;
  amount: bigint;
  limitPrice: bigint;   // quote per base, scaled by 1e18
  triggerPrice: bigint; // 0 = always active
  limitFee: bigint;     // scaled by 1e18, sign given by flags.isNegativeFee
  makerAccountOwner: string;
  makerAccountNumber: bigint;
  taker: string;
  expiration: bigint;   // unix seconds, 0 = never
}

/**
 * The flags word decoded into its parts.
 * Wire layout: salt << 3 | isNegativeFee << 2 | isDecreaseOnly << 1 | isBuy
 */
export interface OrderFlags {
  salt: bigint;
  isBuy: boolean;
  isDecreaseOnly: boolean;
  isNegativeFee: boolean;
}

/**
 * Execution terms proposed for a single fill.
 */
export interface TradeArgs {
  price: bigint;
  fee: bigint;
  isNegativeFee: boolean;
}

export interface OrderInfo {
  order: Order;
  tradeArgs: TradeArgs;
  orderHash: string;
}

export enum OrderStatus {
  Null = 0,
  Approved = 1,
  Canceled = 2,
}

export interface OrderState {
  status: OrderStatus;
  filledAmount: bigint;
}

/**
 * A margin account: owner address plus sub-account number.
 */
export interface AccountInfo {
  owner: string;
  number: bigint;
}
