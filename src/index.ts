export { CanonicalOrders } from "./engine/canonicalOrders.js";
export type { CanonicalOrdersOptions, TradeCostParams } from "./engine/canonicalOrders.js";
export {
  OrderHasher,
  ORDER_TYPES,
  EIP712_DOMAIN_NAME,
  EIP712_DOMAIN_VERSION,
  buildDomain,
  getDomainHash,
  getOrderHash,
  getOrderStructHash,
} from "./engine/typedHash.js";
export type { TypedDomain } from "./engine/typedHash.js";
export { decodeFlags, encodeFlags, flagsToBytes32 } from "./engine/flags.js";
export {
  ORDER_BYTES,
  CallFunctionType,
  decodeTradeData,
  encodeTradeData,
  decodeCallFunction,
  encodeCallFunction,
} from "./engine/calldata.js";
export type { CallFunction, TradeData } from "./engine/calldata.js";
export {
  SIGNATURE_BYTES,
  SignatureType,
  parseTypedSignature,
  serializeTypedSignature,
  recoverSigner,
  verifySignature,
} from "./engine/signature.js";
export { signOrder, signTradeData, isValidSignature } from "./engine/signer.js";
export { PRICE_BASE, getFeeAdjustedPrice, quoteFill, getCurrentPrice } from "./engine/pricing.js";
export { orderFromJson, orderToJson, tradeArgsFromJson, tradeArgsToJson } from "./engine/orderJson.js";
export { OrderStore } from "./store/orderStore.js";
export { LedgerClient } from "./chain/ledger.js";
export { CanonicalOrderError, isRejection } from "./utils/errors.js";
export type { RejectReason } from "./utils/errors.js";
export { createLogger } from "./utils/logger.js";
export type { Logger } from "./utils/logger.js";
export * from "./types/order.js";
export type * from "./types/events.js";
export type { MarginLedger } from "./types/ledger.js";
