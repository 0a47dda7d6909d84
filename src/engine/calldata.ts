/**
 * Wire codecs for the opaque payloads the ledger forwards to the engine.
 *
 * Fill payload (ABI static tuples, 32-byte words):
 *   [0..10]  Order      flags, baseMarket, quoteMarket, amount, limitPrice,
 *                       triggerPrice, limitFee, makerAccountOwner,
 *                       makerAccountNumber, taker, expiration
 *   [11..13] TradeArgs  price, fee, isNegativeFee
 *   optional 66-byte typed signature
 *
 * Delegated payload: uint256 discriminant followed by an Order (Approve,
 * Cancel) or TradeArgs (SetTradeArgs).
 */

import {
  AbiCoder,
  concat,
  dataLength,
  dataSlice,
  getAddress,
  getBigInt,
  hexlify,
  type BytesLike,
  type Result,
} from "ethers";
import { decodeFlags } from "./flags.js";
import { orderValues } from "./typedHash.js";
import { SIGNATURE_BYTES } from "./signature.js";
import { CanonicalOrderError } from "../utils/errors.js";
import type { Order, TradeArgs } from "../types/order.js";

export const ORDER_WORDS = 11;
export const TRADE_ARGS_WORDS = 3;
export const ORDER_BYTES = (ORDER_WORDS + TRADE_ARGS_WORDS) * 32; // 448

const ORDER_TUPLE =
  "tuple(bytes32 flags,uint256 baseMarket,uint256 quoteMarket,uint256 amount," +
  "uint256 limitPrice,uint256 triggerPrice,uint256 limitFee,address makerAccountOwner," +
  "uint256 makerAccountNumber,address taker,uint256 expiration)";
const TRADE_ARGS_TUPLE = "tuple(uint256 price,uint256 fee,bool isNegativeFee)";

const abi = AbiCoder.defaultAbiCoder();

export interface TradeData {
  order: Order;
  tradeArgs: TradeArgs;
  signature: string | null;
}

export enum CallFunctionType {
  Approve = 0,
  Cancel = 1,
  SetTradeArgs = 2,
}

export type CallFunction =
  | { kind: CallFunctionType.Approve; order: Order }
  | { kind: CallFunctionType.Cancel; order: Order }
  | { kind: CallFunctionType.SetTradeArgs; tradeArgs: TradeArgs };

/**
 * abi.decode plus conversion. ethers defers errors in malformed words
 * (e.g. an address wider than 20 bytes) until the value is read, so both
 * steps sit inside the same guard and surface as DecodeError.
 */
function decodeAs<T>(types: string[], data: BytesLike, convert: (r: Result) => T): T {
  try {
    return convert(abi.decode(types, data));
  } catch (err) {
    throw new CanonicalOrderError("DecodeError", "Malformed payload", {
      details: { cause: err instanceof Error ? err.message : String(err) },
    });
  }
}

/**
 * ABI bools decode any nonzero word as true; only canonical 0 and 1 are
 * accepted so a payload re-encodes to the same bytes.
 */
function requireBoolWord(data: BytesLike, word: number, field: string): void {
  const value = getBigInt(dataSlice(data, word * 32, (word + 1) * 32));
  if (value > 1n) {
    throw new CanonicalOrderError("DecodeError", `Malformed bool in ${field}`, {
      details: { word: String(word), value: value.toString() },
    });
  }
}

function orderFromResult(r: Result): Order {
  return {
    flags: decodeFlags(getBigInt(r[0])),
    baseMarket: getBigInt(r[1]),
    quoteMarket: getBigInt(r[2]),
    amount: getBigInt(r[3]),
    limitPrice: getBigInt(r[4]),
    triggerPrice: getBigInt(r[5]),
    limitFee: getBigInt(r[6]),
    makerAccountOwner: getAddress(r[7]),
    makerAccountNumber: getBigInt(r[8]),
    taker: getAddress(r[9]),
    expiration: getBigInt(r[10]),
  };
}

function tradeArgsFromResult(r: Result): TradeArgs {
  return {
    price: getBigInt(r[0]),
    fee: getBigInt(r[1]),
    isNegativeFee: Boolean(r[2]),
  };
}

/**
 * Split a fill payload into order, trade args and optional signature.
 */
export function decodeTradeData(data: BytesLike): TradeData {
  const length = dataLength(data);
  if (length !== ORDER_BYTES && length !== ORDER_BYTES + SIGNATURE_BYTES) {
    throw new CanonicalOrderError("DecodeError", "Cannot parse order from data", {
      details: { length: String(length) },
    });
  }

  requireBoolWord(data, ORDER_WORDS + 2, "isNegativeFee");
  const { order, tradeArgs } = decodeAs(
    [ORDER_TUPLE, TRADE_ARGS_TUPLE],
    dataSlice(data, 0, ORDER_BYTES),
    (r) => ({ order: orderFromResult(r[0]), tradeArgs: tradeArgsFromResult(r[1]) })
  );

  return {
    order,
    tradeArgs,
    signature:
      length === ORDER_BYTES
        ? null
        : dataSlice(data, ORDER_BYTES, ORDER_BYTES + SIGNATURE_BYTES),
  };
}

export function encodeTradeData(
  order: Order,
  tradeArgs: TradeArgs,
  signature?: string | null
): string {
  const body = abi.encode([ORDER_TUPLE, TRADE_ARGS_TUPLE], [orderValues(order), tradeArgs]);
  if (signature == null) return body;
  if (dataLength(signature) !== SIGNATURE_BYTES) {
    throw new RangeError(`signature must be ${SIGNATURE_BYTES} bytes`);
  }
  return hexlify(concat([body, signature]));
}

export function decodeCallFunction(data: BytesLike): CallFunction {
  const length = dataLength(data);
  if (length < 32) {
    throw new CanonicalOrderError("DecodeError", "Cannot parse call function type", {
      details: { length: String(length) },
    });
  }

  const kind = getBigInt(dataSlice(data, 0, 32));
  const expected =
    kind === BigInt(CallFunctionType.SetTradeArgs)
      ? 32 * (1 + TRADE_ARGS_WORDS)
      : 32 * (1 + ORDER_WORDS);
  if (kind > BigInt(CallFunctionType.SetTradeArgs) || length !== expected) {
    throw new CanonicalOrderError("DecodeError", "Cannot parse call function data", {
      details: { kind: kind.toString(), length: String(length) },
    });
  }

  if (kind === BigInt(CallFunctionType.SetTradeArgs)) {
    requireBoolWord(data, 3, "isNegativeFee");
    const tradeArgs = decodeAs(["uint256", TRADE_ARGS_TUPLE], data, (r) => tradeArgsFromResult(r[1]));
    return { kind: CallFunctionType.SetTradeArgs, tradeArgs };
  }

  const order = decodeAs(["uint256", ORDER_TUPLE], data, (r) => orderFromResult(r[1]));
  return kind === BigInt(CallFunctionType.Approve)
    ? { kind: CallFunctionType.Approve, order }
    : { kind: CallFunctionType.Cancel, order };
}

export function encodeCallFunction(call: CallFunction): string {
  if (call.kind === CallFunctionType.SetTradeArgs) {
    return abi.encode(["uint256", TRADE_ARGS_TUPLE], [call.kind, call.tradeArgs]);
  }
  return abi.encode(["uint256", ORDER_TUPLE], [call.kind, orderValues(call.order)]);
}
