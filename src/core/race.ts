import type { AxiosInstance } from "axios";
import { JsonLogger, LogEvents, logger as defaultLogger, type Logger } from "../logger.js";
import type { PriceQuote, QuoteFetcher, RaceOutcome, RacePhase } from "../types.js";
import { PROVIDERS } from "../vendors/index.js";
import { fetchQuote } from "./fetchQuote.js";
import { isUsable } from "./normalize.js";

export const RACE_TIMEOUT_MS = 10_000;

export interface RaceOptions {
  /** Defaults to every built-in provider through fetchQuote. */
  fetchers?: readonly QuoteFetcher[];
  /** HTTP client for the default fetchers. */
  http?: AxiosInstance;
  timeoutMs?: number;
  logger?: Logger;
}

type Settlement =
  | { phase: "winner-found"; quote: PriceQuote }
  | { phase: "timed-out" }
  | { phase: "all-failed" };

export function defaultFetchers(http?: AxiosInstance, logger?: Logger): QuoteFetcher[] {
  return PROVIDERS.map((provider) => (coin: string, signal: AbortSignal) =>
    fetchQuote(provider, coin, { http, signal, logger })
  );
}

/**
 * Ask every provider at once and return the first quote with a positive
 * price, in completion order. Gives up after `timeoutMs` (10s by default).
 *
 * Once a winner is in, the shared signal is aborted and stragglers are not
 * awaited. On timeout the signal is aborted and every fetcher is awaited
 * before returning. Never rejects.
 */
export async function raceForPrice(coin: string, opts: RaceOptions = {}): Promise<RaceOutcome> {
  const log = opts.logger ?? defaultLogger;
  const fetchers = opts.fetchers ?? defaultFetchers(opts.http, log);
  const timeoutMs = opts.timeoutMs ?? RACE_TIMEOUT_MS;
  const controller = new AbortController();

  let phase: RacePhase = "idle";
  const enter = (next: RacePhase) => {
    log.debug(LogEvents.RACE_PHASE, { coin, phase: next, message: `${phase} -> ${next}` });
    phase = next;
  };

  // a fetcher that breaks its contract by throwing or rejecting counts as a failed quote
  const dispatch = (fetcher: QuoteFetcher): Promise<PriceQuote | null> => {
    const failed = (e: unknown): null => {
      log.debug(LogEvents.QUOTE_FAILED, { coin, error: JsonLogger.sanitizeErrorMessage(e) });
      return null;
    };
    try {
      return fetcher(coin, controller.signal).catch(failed);
    } catch (e) {
      return Promise.resolve(failed(e));
    }
  };
  const inFlight = fetchers.map(dispatch);
  enter("racing");

  let timer: NodeJS.Timeout | undefined;
  const settlement = await new Promise<Settlement>((resolve) => {
    let pending = inFlight.length;
    if (pending === 0) {
      resolve({ phase: "all-failed" });
      return;
    }
    timer = setTimeout(() => resolve({ phase: "timed-out" }), timeoutMs);
    for (const task of inFlight) {
      void task.then((quote) => {
        pending--;
        if (quote && isUsable(quote)) resolve({ phase: "winner-found", quote });
        else if (pending === 0) resolve({ phase: "all-failed" });
      });
    }
  });
  clearTimeout(timer);
  enter(settlement.phase);

  controller.abort();
  if (settlement.phase === "timed-out") {
    await Promise.all(inFlight);
  }
  enter("done");

  return settlement.phase === "winner-found"
    ? { ok: true, quote: settlement.quote }
    : { ok: false, reason: settlement.phase };
}
