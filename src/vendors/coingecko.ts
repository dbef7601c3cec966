import { z } from "zod";
import { ProviderError } from "../errors.js";
import { PROVIDER_NAMES, type PriceProvider } from "../types.js";

/**
 * CoinGecko public simple-price endpoint. Takes ids (aka slugs) such as
 * `bitcoin`, not ticker symbols.
 */

const SimplePriceSchema = z.record(z.string(), z.object({ usd: z.number() }));

export function coingeckoUrl(id: string): string {
  return `https://api.coingecko.com/api/v3/simple/price?ids=${encodeURIComponent(id)}&vs_currencies=usd`;
}

/** `{ "<id>": { "usd": n } }` → n. Falls back to the first entry when the key differs. */
export function extractCoingeckoPrice(body: unknown, id: string): number {
  const parsed = SimplePriceSchema.safeParse(body);
  if (!parsed.success) throw new ProviderError("schema", "coingecko", "unexpected simple/price shape");
  const data = parsed.data;
  const entry = Object.hasOwn(data, id) ? data[id] : Object.values(data)[0];
  if (!entry) throw new ProviderError("schema", "coingecko", `no price for ${id}`);
  return entry.usd;
}

export const coingecko: PriceProvider = {
  id: "coingecko",
  name: PROVIDER_NAMES.coingecko,
  url: coingeckoUrl,
  extract: extractCoingeckoPrice,
};
