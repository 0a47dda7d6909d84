import { describe, it, expect } from "vitest";
import { decodeFlags, encodeFlags, flagsToBytes32 } from "./flags.js";

describe("encodeFlags", () => {
  it("packs salt above the three flag bits", () => {
    // 5 << 3 | negativeFee(4) | buy(1) = 45
    expect(
      encodeFlags({ salt: 5n, isBuy: true, isDecreaseOnly: false, isNegativeFee: true })
    ).toBe(45n);
  });

  it("sets the decrease-only bit", () => {
    expect(
      encodeFlags({ salt: 0n, isBuy: false, isDecreaseOnly: true, isNegativeFee: false })
    ).toBe(2n);
  });

  it("rejects a salt that does not fit in 253 bits", () => {
    expect(() =>
      encodeFlags({ salt: 1n << 253n, isBuy: false, isDecreaseOnly: false, isNegativeFee: false })
    ).toThrow(RangeError);
  });
});

describe("decodeFlags", () => {
  it("splits the word into salt and flags", () => {
    expect(decodeFlags(45n)).toEqual({
      salt: 5n,
      isBuy: true,
      isDecreaseOnly: false,
      isNegativeFee: true,
    });
  });

  it("reads all flags from 7", () => {
    expect(decodeFlags(7n)).toEqual({
      salt: 0n,
      isBuy: true,
      isDecreaseOnly: true,
      isNegativeFee: true,
    });
  });

  it("rejects words wider than 256 bits", () => {
    expect(() => decodeFlags(1n << 256n)).toThrow(RangeError);
  });
});

describe("flagsToBytes32", () => {
  it("left-pads to 32 bytes", () => {
    expect(
      flagsToBytes32({ salt: 0n, isBuy: true, isDecreaseOnly: false, isNegativeFee: false })
    ).toBe("0x" + "0".repeat(63) + "1");
  });
});
