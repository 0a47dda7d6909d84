import { describe, it, expect } from "vitest";
import { verifyDecreaseOnly } from "./decreaseOnly.js";
import { CanonicalOrderError } from "../utils/errors.js";

const orderHash = "0x" + "ab".repeat(32);

function check(oldInputPar: bigint, newInputPar: bigint, oldOutputWei: bigint, outputWei: bigint) {
  return () => verifyDecreaseOnly({ orderHash, oldInputPar, newInputPar, oldOutputWei, outputWei });
}

function messageOf(fn: () => void): string | null {
  try {
    fn();
    return null;
  } catch (err) {
    expect(err).toBeInstanceOf(CanonicalOrderError);
    return err instanceof CanonicalOrderError ? `${err.reason}: ${err.message}` : null;
  }
}

describe("verifyDecreaseOnly", () => {
  it("accepts a fill that shrinks both legs", () => {
    expect(messageOf(check(100n, 90n, -50n, 20n))).toBeNull();
  });

  it("accepts closing the input position exactly", () => {
    expect(messageOf(check(100n, 0n, -50n, 20n))).toBeNull();
  });

  it("accepts a zero output", () => {
    expect(messageOf(check(-10n, -5n, 0n, 0n))).toBeNull();
  });

  it("rejects an input position that grows", () => {
    expect(messageOf(check(-10n, -20n, 50n, -5n))).toBe(
      `DecreaseViolation: inputMarket not decreased <${orderHash}>`
    );
  });

  it("rejects an input position that flips sign", () => {
    expect(messageOf(check(100n, -5n, -50n, 20n))).toBe(
      `DecreaseViolation: inputMarket not decreased <${orderHash}>`
    );
  });

  it("rejects opening an input position from zero", () => {
    expect(messageOf(check(0n, 5n, -50n, 20n))).toBe(
      `DecreaseViolation: inputMarket not decreased <${orderHash}>`
    );
  });

  it("rejects an output in the same direction as the existing balance", () => {
    expect(messageOf(check(100n, 90n, 50n, 20n))).toBe(
      `DecreaseViolation: outputMarket not decreased <${orderHash}>`
    );
  });

  it("rejects an output larger than the existing balance", () => {
    expect(messageOf(check(100n, 90n, -10n, 20n))).toBe(
      `DecreaseViolation: outputMarket not decreased <${orderHash}>`
    );
  });

  it("rejects any output when there is no balance", () => {
    expect(messageOf(check(100n, 90n, 0n, 20n))).toBe(
      `DecreaseViolation: outputMarket not decreased <${orderHash}>`
    );
  });
});
