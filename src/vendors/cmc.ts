import { z } from "zod";
import { ProviderError } from "../errors.js";
import { PROVIDER_NAMES, type PriceProvider } from "../types.js";

// CoinMarketCap v1 ticker by slug. Answers an array with one ticker whose
// price is a decimal string.

const TickerSchema = z.array(z.object({ price_usd: z.string() }));

export function cmcUrl(slug: string): string {
  return `https://api.coinmarketcap.com/v1/ticker/${encodeURIComponent(slug)}/`;
}

export function extractCmcPrice(body: unknown): number {
  const parsed = TickerSchema.safeParse(body);
  if (!parsed.success) throw new ProviderError("schema", "cmc", "unexpected ticker shape");
  const first = parsed.data[0];
  if (!first) throw new ProviderError("schema", "cmc", "empty ticker list");
  const n = Number.parseFloat(first.price_usd);
  if (!Number.isFinite(n)) throw new ProviderError("schema", "cmc", `bad price_usd "${first.price_usd}"`);
  return n;
}

export const cmc: PriceProvider = {
  id: "cmc",
  name: PROVIDER_NAMES.cmc,
  url: cmcUrl,
  extract: extractCmcPrice,
};
