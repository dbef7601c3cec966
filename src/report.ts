import { PROVIDER_NAMES, type RaceOutcome } from "./types.js";

export const FAILURE_MESSAGE = "Failed to fetch the price";

export interface ReportOptions {
  showLatency?: boolean;
}

export function formatOutcome(coin: string, outcome: RaceOutcome, opts: ReportOptions = {}): string {
  if (!outcome.ok) return FAILURE_MESSAGE;
  const { price, source, latencyMs } = outcome.quote;
  const line = `The current price of ${coin} is $${price.toFixed(2)} (Source: ${PROVIDER_NAMES[source]})`;
  return opts.showLatency ? `${line} in ${latencyMs}ms` : line;
}
