import { z } from "zod";
import { ProviderError } from "../errors.js";
import { PROVIDER_NAMES, type PriceProvider } from "../types.js";

const PriceSchema = z.object({ USD: z.number() });

export function cryptocompareUrl(symbol: string): string {
  return `https://min-api.cryptocompare.com/data/price?fsym=${encodeURIComponent(symbol)}&tsyms=USD`;
}

/**
 * `{ "USD": n }` → n. Unknown symbols come back as
 * `{ "Response": "Error", ... }` with HTTP 200, which fails the schema.
 */
export function extractCryptocomparePrice(body: unknown): number {
  const parsed = PriceSchema.safeParse(body);
  if (!parsed.success) throw new ProviderError("schema", "cryptocompare", "no USD field");
  return parsed.data.USD;
}

export const cryptocompare: PriceProvider = {
  id: "cryptocompare",
  name: PROVIDER_NAMES.cryptocompare,
  url: cryptocompareUrl,
  extract: extractCryptocomparePrice,
};
