import { describe, it, expect } from "vitest";
import { ZeroAddress } from "ethers";
import { orderFromJson, orderToJson, tradeArgsFromJson, tradeArgsToJson } from "./orderJson.js";
import { TAKER, maker, makeOrder, makeTradeArgs } from "../testing/fixtures.js";

describe("orderFromJson", () => {
  it("parses decimal strings and fills in optional fields", () => {
    const order = orderFromJson({
      salt: "42",
      isBuy: true,
      isDecreaseOnly: false,
      isNegativeFee: false,
      baseMarket: "1",
      quoteMarket: "2",
      amount: "100",
      limitPrice: "2000000000000000000",
      limitFee: "0",
      makerAccountOwner: maker.address.toLowerCase(),
      makerAccountNumber: "0",
    });
    expect(order).toEqual(makeOrder());
    expect(order.taker).toBe(ZeroAddress);
  });

  it("round-trips through orderToJson", () => {
    const order = makeOrder({ taker: TAKER, expiration: 5n, flags: { isNegativeFee: true } });
    expect(orderFromJson(JSON.parse(JSON.stringify(orderToJson(order))))).toEqual(order);
  });

  it("rejects a negative amount", () => {
    expect(() => orderFromJson({ ...orderToJson(makeOrder()), amount: "-1" })).toThrow(
      "amount: must not be negative"
    );
  });

  it("rejects a non-boolean flag", () => {
    expect(() => orderFromJson({ ...orderToJson(makeOrder()), isBuy: "yes" })).toThrow(
      "isBuy: expected a boolean"
    );
  });

  it("rejects something that is not an object", () => {
    expect(() => orderFromJson([])).toThrow("order: expected an object");
  });
});

describe("tradeArgsFromJson", () => {
  it("round-trips", () => {
    const tradeArgs = makeTradeArgs({ fee: 3n, isNegativeFee: true });
    expect(tradeArgsFromJson(tradeArgsToJson(tradeArgs))).toEqual(tradeArgs);
  });

  it("defaults the fee to zero", () => {
    expect(tradeArgsFromJson({ price: "7" })).toEqual({ price: 7n, fee: 0n, isNegativeFee: false });
  });
});
