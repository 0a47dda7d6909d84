import { toBeHex } from "ethers";
import type { OrderFlags } from "../types/order.js";

const IS_BUY_FLAG = 1n;
const IS_DECREASE_ONLY_FLAG = 1n << 1n;
const IS_NEGATIVE_FEE_FLAG = 1n << 2n;
const SALT_SHIFT = 3n;
const MAX_WORD = (1n << 256n) - 1n;
const MAX_SALT = MAX_WORD >> SALT_SHIFT;

export function decodeFlags(word: bigint): OrderFlags {
  if (word < 0n || word > MAX_WORD) {
    throw new RangeError(`flags word out of range: ${word}`);
  }
  return {
    salt: word >> SALT_SHIFT,
    isBuy: (word & IS_BUY_FLAG) !== 0n,
    isDecreaseOnly: (word & IS_DECREASE_ONLY_FLAG) !== 0n,
    isNegativeFee: (word & IS_NEGATIVE_FEE_FLAG) !== 0n,
  };
}

export function encodeFlags(flags: OrderFlags): bigint {
  if (flags.salt < 0n || flags.salt > MAX_SALT) {
    throw new RangeError(`salt out of range: ${flags.salt}`);
  }
  let word = flags.salt << SALT_SHIFT;
  if (flags.isBuy) word |= IS_BUY_FLAG;
  if (flags.isDecreaseOnly) word |= IS_DECREASE_ONLY_FLAG;
  if (flags.isNegativeFee) word |= IS_NEGATIVE_FEE_FLAG;
  return word;
}

/**
 * Flags as the bytes32 hex string that gets hashed and signed.
 */
export function flagsToBytes32(flags: OrderFlags): string {
  return toBeHex(encodeFlags(flags), 32);
}
