import { describe, it, expect, vi, afterEach } from "vitest";
import { isUsable, toPriceQuote } from "./normalize.js";

describe("toPriceQuote", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should stamp latency from the start time", () => {
    vi.spyOn(Date, "now").mockReturnValue(1_500);
    expect(toPriceQuote("cmc", 3.5, 1_200)).toEqual({ price: 3.5, source: "cmc", latencyMs: 300 });
  });

  it("should turn non-finite prices into the zero sentinel", () => {
    expect(toPriceQuote("cmc", Number.NaN, Date.now()).price).toBe(0);
    expect(toPriceQuote("cmc", Number.POSITIVE_INFINITY, Date.now()).price).toBe(0);
  });

  it("should freeze the quote", () => {
    expect(Object.isFrozen(toPriceQuote("coingecko", 1, Date.now()))).toBe(true);
  });
});

describe("isUsable", () => {
  it.each([
    [42000.5, true],
    [0.0001, true],
    [0, false],
    [-1, false],
  ])("should treat price %d as usable=%s", (price, expected) => {
    expect(isUsable({ price, source: "cryptocompare", latencyMs: 0 })).toBe(expected);
  });
});
