import { describe, it, expect } from "vitest";
import { getBytes, hexlify } from "ethers";
import {
  SIGNATURE_BYTES,
  SignatureType,
  parseTypedSignature,
  recoverSigner,
  serializeTypedSignature,
  verifySignature,
} from "./signature.js";
import { signOrder, isValidSignature } from "./signer.js";
import { OrderHasher } from "./typedHash.js";
import { CanonicalOrderError } from "../utils/errors.js";
import { CHAIN_ID, VERIFYING_CONTRACT, maker, stranger, makeOrder } from "../testing/fixtures.js";

const hasher = new OrderHasher(CHAIN_ID, VERIFYING_CONTRACT);

function flipBit(sig: string, byteIndex: number, bit: number): string {
  const bytes = getBytes(sig);
  bytes[byteIndex] ^= 1 << bit;
  return hexlify(bytes);
}

function rejectionReason(fn: () => void): string | null {
  try {
    fn();
    return null;
  } catch (err) {
    return err instanceof CanonicalOrderError ? err.reason : "other";
  }
}

describe("typed signatures", () => {
  it("serializes r, s, v and type into 66 bytes", () => {
    const sig = serializeTypedSignature({
      r: "0x" + "aa".repeat(32),
      s: "0x" + "bb".repeat(32),
      v: 27,
      type: 2,
    });
    expect(getBytes(sig)).toHaveLength(SIGNATURE_BYTES);
    expect(parseTypedSignature(sig)).toEqual({
      r: "0x" + "aa".repeat(32),
      s: "0x" + "bb".repeat(32),
      v: 27,
      type: 2,
    });
  });

  it("rejects signatures of the wrong length", () => {
    expect(rejectionReason(() => parseTypedSignature("0x" + "00".repeat(65)))).toBe(
      "InvalidSignature"
    );
  });
});

describe("recoverSigner", () => {
  const order = makeOrder();
  const hash = hasher.hash(order);

  it.each([
    ["NoPrepend", SignatureType.NoPrepend],
    ["Decimal", SignatureType.Decimal],
    ["Hexadecimal", SignatureType.Hexadecimal],
  ])("recovers the maker from a %s signature", async (_name, type) => {
    const sig = await signOrder(order, hasher, maker, type);
    expect(getBytes(sig)[65]).toBe(type);
    expect(recoverSigner(hash, sig)).toBe(maker.address);
  });

  it("rejects an unknown signature type", async () => {
    const sig = await signOrder(order, hasher, maker);
    const bytes = getBytes(sig);
    bytes[65] = 3;
    expect(rejectionReason(() => recoverSigner(hash, bytes))).toBe("InvalidSignature");
  });

  it("rejects a v other than 27 or 28", async () => {
    const sig = await signOrder(order, hasher, maker);
    const bytes = getBytes(sig);
    bytes[64] = 1;
    expect(rejectionReason(() => recoverSigner(hash, bytes))).toBe("InvalidSignature");
  });
});

describe("verifySignature", () => {
  const order = makeOrder();
  const hash = hasher.hash(order);

  it("accepts the maker's signature", async () => {
    const sig = await signOrder(order, hasher, maker);
    expect(() => verifySignature(hash, sig, order.makerAccountOwner)).not.toThrow();
  });

  it("rejects another signer and reports the order hash", async () => {
    const sig = await signOrder(order, hasher, stranger);
    try {
      verifySignature(hash, sig, order.makerAccountOwner);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(CanonicalOrderError);
      if (err instanceof CanonicalOrderError) {
        expect(err.reason).toBe("InvalidSignature");
        expect(err.orderHash).toBe(hash);
      }
    }
  });

  it.each([
    ["r", 31, 0],
    ["s", 63, 0],
    ["s", 40, 3],
    ["v", 64, 0],
    ["type", 65, 0],
  ])("fails when a bit of %s is flipped (byte %i, bit %i)", async (_field, byteIndex, bit) => {
    const sig = await signOrder(order, hasher, maker);
    const mutated = flipBit(sig, byteIndex, bit);
    expect(rejectionReason(() => verifySignature(hash, mutated, order.makerAccountOwner))).toBe(
      "InvalidSignature"
    );
  });

  it("fails when the order changes after signing", async () => {
    const sig = await signOrder(order, hasher, maker);
    const changed = makeOrder({ amount: order.amount + 1n });
    expect(isValidSignature(order, hasher, sig)).toBe(true);
    expect(isValidSignature(changed, hasher, sig)).toBe(false);
  });
});
