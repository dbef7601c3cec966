import type { AxiosInstance } from "axios";
import { ProviderError, toProviderError } from "../errors.js";
import { JsonLogger, LogEvents, logger as defaultLogger, type Logger } from "../logger.js";
import type { PriceProvider, PriceQuote } from "../types.js";
import { http as defaultHttp } from "./http.js";
import { toPriceQuote } from "./normalize.js";

export interface FetchQuoteOptions {
  signal?: AbortSignal;
  http?: AxiosInstance;
  logger?: Logger;
}

function decodeJson(text: string, provider: PriceProvider): unknown {
  try {
    return JSON.parse(text);
  } catch (e) {
    throw new ProviderError("decode", provider.id, `invalid JSON: ${JsonLogger.sanitizeErrorMessage(e)}`);
  }
}

async function requestPrice(provider: PriceProvider, coin: string, http: AxiosInstance, signal?: AbortSignal) {
  const res = await http.get<string>(provider.url(coin), {
    signal,
    responseType: "text",
    validateStatus: () => true,
  });
  if (res.status < 200 || res.status >= 300) {
    throw new ProviderError("status", provider.id, `${provider.name} HTTP ${res.status}`, res.status);
  }
  const body = typeof res.data === "string" ? decodeJson(res.data, provider) : res.data;
  return provider.extract(body, coin);
}

/**
 * Ask one provider for the USD price of `coin`.
 *
 * Never rejects: transport errors, bad statuses, undecodable bodies and
 * bodies without a price all come back as a zero-price quote.
 */
export async function fetchQuote(
  provider: PriceProvider,
  coin: string,
  opts: FetchQuoteOptions = {}
): Promise<PriceQuote> {
  const log = opts.logger ?? defaultLogger;
  const startedAt = Date.now();
  try {
    const price = await requestPrice(provider, coin, opts.http ?? defaultHttp, opts.signal);
    const quote = toPriceQuote(provider.id, price, startedAt);
    log.debug(LogEvents.QUOTE_RECEIVED, { coin, provider: provider.id, price: quote.price, latencyMs: quote.latencyMs });
    return quote;
  } catch (e) {
    const err = toProviderError(e, provider.id);
    const quote = toPriceQuote(provider.id, 0, startedAt);
    log.debug(LogEvents.QUOTE_FAILED, {
      coin,
      provider: provider.id,
      errorKind: err.kind,
      status: err.status,
      error: JsonLogger.sanitizeErrorMessage(err),
      latencyMs: quote.latencyMs,
    });
    return quote;
  }
}
