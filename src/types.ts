export type ProviderId = "coingecko" | "cmc" | "cryptocompare";

/** Display name per provider, as shown in the CLI output. */
export const PROVIDER_NAMES: Record<ProviderId, string> = {
  coingecko: "CoinGecko",
  cmc: "CoinMarketCap",
  cryptocompare: "CryptoCompare",
};

/**
 * One provider's answer for one coin. `price <= 0` means the provider
 * could not supply a usable price.
 */
export interface PriceQuote {
  readonly price: number;       // USD
  readonly source: ProviderId;
  readonly latencyMs: number;
}

/**
 * A price source: fixed endpoint template plus the rule that pulls the USD
 * price out of its JSON body.
 */
export interface PriceProvider {
  readonly id: ProviderId;
  readonly name: string;
  url(coin: string): string;
  /** Throws ProviderError("schema") when the body carries no usable price. */
  extract(body: unknown, coin: string): number;
}

/** Anything that can produce a quote for a coin; must honour the signal. */
export type QuoteFetcher = (coin: string, signal: AbortSignal) => Promise<PriceQuote>;

export type RacePhase = "idle" | "racing" | "winner-found" | "timed-out" | "all-failed" | "done";

export type RaceOutcome =
  | { readonly ok: true; readonly quote: PriceQuote }
  | { readonly ok: false; readonly reason: "timed-out" | "all-failed" };
