/**
 * Typed signatures: 65-byte ECDSA signature plus a trailing type byte that
 * says which prefix, if any, was applied to the hash before signing.
 *
 * Layout: r (32) ‖ s (32) ‖ v (1) ‖ type (1)
 */

import {
  concat,
  dataSlice,
  getAddress,
  getBytes,
  hexlify,
  keccak256,
  recoverAddress,
  toUtf8Bytes,
} from "ethers";
import { CanonicalOrderError } from "../utils/errors.js";

export const SIGNATURE_BYTES = 66;

export enum SignatureType {
  NoPrepend = 0,
  Decimal = 1,
  Hexadecimal = 2,
}

const PREPEND_DEC = toUtf8Bytes("\x19Ethereum Signed Message:\n32");
const PREPEND_HEX = toUtf8Bytes("\x19Ethereum Signed Message:\n\x20");

export interface TypedSignature {
  r: string;
  s: string;
  v: number;
  type: number;
}

export function parseTypedSignature(sig: string | Uint8Array): TypedSignature {
  const bytes = getBytes(sig);
  if (bytes.length !== SIGNATURE_BYTES) {
    throw new CanonicalOrderError(
      "InvalidSignature",
      `Expected ${SIGNATURE_BYTES}-byte signature, got ${bytes.length}`
    );
  }
  return {
    r: dataSlice(bytes, 0, 32),
    s: dataSlice(bytes, 32, 64),
    v: bytes[64],
    type: bytes[65],
  };
}

export function serializeTypedSignature(sig: TypedSignature): string {
  return hexlify(concat([sig.r, sig.s, new Uint8Array([sig.v, sig.type])]));
}

/**
 * The digest a signature of the given type was produced over.
 */
export function signedDigest(hash: string, type: number): string {
  switch (type) {
    case SignatureType.NoPrepend:
      return hash;
    case SignatureType.Decimal:
      return keccak256(concat([PREPEND_DEC, hash]));
    case SignatureType.Hexadecimal:
      return keccak256(concat([PREPEND_HEX, hash]));
    default:
      throw new CanonicalOrderError("InvalidSignature", `Invalid signature type ${type}`);
  }
}

/**
 * Recover the signer of `hash` from a typed signature. Throws
 * InvalidSignature when the signature cannot be recovered.
 */
export function recoverSigner(hash: string, sig: string | Uint8Array): string {
  const parsed = parseTypedSignature(sig);
  if (parsed.v !== 27 && parsed.v !== 28) {
    throw new CanonicalOrderError("InvalidSignature", `Invalid signature v value ${parsed.v}`);
  }
  const digest = signedDigest(hash, parsed.type);
  try {
    return recoverAddress(digest, { r: parsed.r, s: parsed.s, v: parsed.v });
  } catch (err) {
    throw new CanonicalOrderError("InvalidSignature", "Signature recovery failed", {
      details: { cause: err instanceof Error ? err.message : String(err) },
    });
  }
}

export function sameAddress(a: string, b: string): boolean {
  return getAddress(a) === getAddress(b);
}

/**
 * Check that `sig` over `hash` was produced by `expectedSigner`.
 */
export function verifySignature(
  hash: string,
  sig: string | Uint8Array,
  expectedSigner: string
): void {
  let signer: string;
  try {
    signer = recoverSigner(hash, sig);
  } catch (err) {
    if (err instanceof CanonicalOrderError) {
      throw new CanonicalOrderError(err.reason, err.message, {
        orderHash: hash,
        details: err.details,
      });
    }
    throw err;
  }
  if (!sameAddress(signer, expectedSigner)) {
    throw new CanonicalOrderError("InvalidSignature", "Order invalid signature", {
      orderHash: hash,
      details: { signer, expected: getAddress(expectedSigner) },
    });
  }
}
