/**
 * Shared test helpers: an in-process axios adapter that answers by URL, and
 * quote fetchers driven by timers.
 */

import axios, {
  AxiosError,
  CanceledError,
  type AxiosAdapter,
  type AxiosInstance,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from "axios";
import type { PriceQuote, ProviderId, QuoteFetcher } from "./types.js";

export interface FakeReply {
  status?: number;
  body?: string;
  /** Reject like a refused connection instead of answering. */
  networkError?: boolean;
  delayMs?: number;
}

export interface FakeHttp {
  http: AxiosInstance;
  urls: string[];
}

export function createFakeHttp(reply: (url: string) => FakeReply): FakeHttp {
  const urls: string[] = [];
  const adapter: AxiosAdapter = (config: InternalAxiosRequestConfig) => {
    const url = config.url ?? "";
    urls.push(url);
    const r = reply(url);
    return new Promise<AxiosResponse>((resolve, reject) => {
      const finish = () => {
        if (r.networkError) {
          reject(new AxiosError("connect ECONNREFUSED", "ECONNREFUSED", config));
          return;
        }
        resolve({ data: r.body ?? "", status: r.status ?? 200, statusText: "", headers: {}, config });
      };
      if (!r.delayMs) {
        finish();
        return;
      }
      const t = setTimeout(finish, r.delayMs);
      config.signal?.addEventListener?.(
        "abort",
        () => {
          clearTimeout(t);
          reject(new CanceledError(undefined, config));
        },
        { once: true }
      );
    });
  };
  return { http: axios.create({ adapter }), urls };
}

/** Route helper keyed on the provider hosts. */
export function byHost(replies: Partial<Record<ProviderId, FakeReply>>, fallback: FakeReply = { status: 500 }) {
  return (url: string): FakeReply => {
    if (url.includes("api.coingecko.com")) return replies.coingecko ?? fallback;
    if (url.includes("api.coinmarketcap.com")) return replies.cmc ?? fallback;
    if (url.includes("min-api.cryptocompare.com")) return replies.cryptocompare ?? fallback;
    return fallback;
  };
}

/**
 * Fetcher that resolves with `price` after `ms`. On abort it resolves at once
 * with a zero price, unless `ignoreAbort` is set.
 */
export function quoteAfter(
  source: ProviderId,
  price: number,
  ms: number,
  opts: { ignoreAbort?: boolean; onSignal?: (signal: AbortSignal) => void } = {}
): QuoteFetcher {
  return (_coin, signal) => {
    opts.onSignal?.(signal);
    return new Promise<PriceQuote>((resolve) => {
      const t = setTimeout(() => resolve({ price, source, latencyMs: ms }), ms);
      if (opts.ignoreAbort) return;
      signal.addEventListener(
        "abort",
        () => {
          clearTimeout(t);
          resolve({ price: 0, source, latencyMs: ms });
        },
        { once: true }
      );
    });
  };
}

/** Fetcher that only ever settles when aborted, `afterAbortMs` later. */
export function hangUntilAbort(source: ProviderId, afterAbortMs = 0): QuoteFetcher {
  return (_coin, signal) =>
    new Promise<PriceQuote>((resolve) => {
      signal.addEventListener(
        "abort",
        () => {
          const quote: PriceQuote = { price: 0, source, latencyMs: 0 };
          if (afterAbortMs > 0) setTimeout(() => resolve(quote), afterAbortMs);
          else resolve(quote);
        },
        { once: true }
      );
    });
}
