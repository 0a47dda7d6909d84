/**
 * Off-chain signing of canonical orders, for makers and tests.
 */

import { Signature, getBytes, type Wallet } from "ethers";
import { ORDER_TYPES, orderValues, type OrderHasher } from "./typedHash.js";
import {
  SignatureType,
  serializeTypedSignature,
  signedDigest,
  verifySignature,
} from "./signature.js";
import { encodeTradeData } from "./calldata.js";
import { isRejection } from "../utils/errors.js";
import type { Order, TradeArgs } from "../types/order.js";

/**
 * Sign an order, returning the 66-byte typed signature as hex.
 *
 * NoPrepend goes through signTypedData so the wallet hashes the struct
 * itself; the prefixed variants sign the order hash as a message.
 */
export async function signOrder(
  order: Order,
  hasher: OrderHasher,
  wallet: Wallet,
  type: SignatureType = SignatureType.NoPrepend
): Promise<string> {
  let raw: string;
  switch (type) {
    case SignatureType.NoPrepend:
      raw = await wallet.signTypedData(
        { ...hasher.domain },
        ORDER_TYPES,
        orderValues(order)
      );
      break;
    case SignatureType.Decimal:
      raw = await wallet.signMessage(getBytes(hasher.hash(order)));
      break;
    case SignatureType.Hexadecimal:
      raw = wallet.signingKey.sign(signedDigest(hasher.hash(order), type)).serialized;
      break;
    default:
      throw new Error(`Unsupported signature type ${String(type)}`);
  }
  const sig = Signature.from(raw);
  return serializeTypedSignature({ r: sig.r, s: sig.s, v: sig.v, type });
}

/**
 * Sign an order and return the full fill payload (order, trade args and
 * signature) ready to hand to the engine.
 */
export async function signTradeData(
  order: Order,
  tradeArgs: TradeArgs,
  hasher: OrderHasher,
  wallet: Wallet,
  type: SignatureType = SignatureType.NoPrepend
): Promise<string> {
  const signature = await signOrder(order, hasher, wallet, type);
  return encodeTradeData(order, tradeArgs, signature);
}

export function isValidSignature(order: Order, hasher: OrderHasher, signature: string): boolean {
  try {
    verifySignature(hasher.hash(order), signature, order.makerAccountOwner);
    return true;
  } catch (err) {
    if (isRejection(err)) return false;
    throw err;
  }
}
