import axios from "axios";
import type { ProviderId } from "./types.js";

export type ProviderErrorKind = "transport" | "status" | "decode" | "schema";

/**
 * Failure inside a provider adapter. Never crosses into the race outcome:
 * fetchQuote turns it into a zero-price quote.
 */
export class ProviderError extends Error {
  readonly kind: ProviderErrorKind;
  readonly provider: ProviderId;
  readonly status?: number;

  constructor(kind: ProviderErrorKind, provider: ProviderId, message: string, status?: number) {
    super(message);
    this.name = "ProviderError";
    this.kind = kind;
    this.provider = provider;
    this.status = status;
  }
}

export function toProviderError(err: unknown, provider: ProviderId): ProviderError {
  if (err instanceof ProviderError) return err;
  if (axios.isCancel(err)) return new ProviderError("transport", provider, "request cancelled");
  if (axios.isAxiosError(err)) {
    return new ProviderError("transport", provider, err.message || String(err.code ?? "request failed"));
  }
  return new ProviderError("transport", provider, err instanceof Error ? err.message : String(err));
}
