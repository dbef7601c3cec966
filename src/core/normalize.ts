import type { PriceQuote, ProviderId } from "../types.js";

/**
 * Build the common quote shape every provider answer collapses into.
 * Non-finite prices become the zero sentinel.
 */
export function toPriceQuote(source: ProviderId, price: number, startedAt: number): PriceQuote {
  return Object.freeze({
    price: Number.isFinite(price) ? price : 0,
    source,
    latencyMs: Math.max(0, Date.now() - startedAt),
  });
}

export function isUsable(quote: PriceQuote): boolean {
  return quote.price > 0;
}
