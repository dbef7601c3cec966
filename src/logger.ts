/**
 * Structured JSON diagnostics.
 *
 * One JSON object per line on stderr so stdout stays reserved for the
 * CLI's answer. Disabled unless PRICE_LOG is set.
 */

import { CFG, type LogLevelName } from "./config.js";

export const LogEvents = {
  RACE_PHASE: "race_phase",
  QUOTE_RECEIVED: "quote_received",
  QUOTE_FAILED: "quote_failed",
  CLI_ERROR: "cli_error",
} as const;

export type LogEventType = (typeof LogEvents)[keyof typeof LogEvents];

export interface LogContext {
  coin?: string;
  provider?: string;
  phase?: string;
  price?: number;
  latencyMs?: number;
  status?: number;
  errorKind?: string;
  error?: string;
  message?: string;
}

export interface LogEntry extends LogContext {
  timestamp: string;
  level: LogLevelName;
  event: LogEventType;
  service: string;
}

export interface Logger {
  debug(event: LogEventType, context?: LogContext): void;
  info(event: LogEventType, context?: LogContext): void;
  warn(event: LogEventType, context?: LogContext): void;
  error(event: LogEventType, context?: LogContext): void;
}

export interface JsonLoggerConfig {
  enabled?: boolean;
  level?: LogLevelName;
  service?: string;
}

const LEVEL_RANK: Record<LogLevelName, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const MAX_ERROR_MESSAGE_LENGTH = 200;

export class JsonLogger implements Logger {
  private readonly enabled: boolean;
  private readonly minRank: number;
  private readonly service: string;

  constructor(config: JsonLoggerConfig = {}) {
    this.enabled = config.enabled ?? true;
    this.minRank = LEVEL_RANK[config.level ?? "info"];
    this.service = config.service ?? CFG.log.service;
  }

  debug(event: LogEventType, context?: LogContext): void {
    this.log("debug", event, context);
  }

  info(event: LogEventType, context?: LogContext): void {
    this.log("info", event, context);
  }

  warn(event: LogEventType, context?: LogContext): void {
    this.log("warn", event, context);
  }

  error(event: LogEventType, context?: LogContext): void {
    this.log("error", event, context);
  }

  static sanitizeErrorMessage(error: unknown): string {
    const msg = error instanceof Error ? error.message : String(error);
    return msg.length > MAX_ERROR_MESSAGE_LENGTH ? msg.substring(0, MAX_ERROR_MESSAGE_LENGTH) + "..." : msg;
  }

  private log(level: LogLevelName, event: LogEventType, context?: LogContext): void {
    if (!this.enabled || LEVEL_RANK[level] < this.minRank) return;

    // base fields last so context can't overwrite them
    const entry: LogEntry = {
      ...context,
      timestamp: new Date().toISOString(),
      level,
      event,
      service: this.service,
    };
    console.error(JSON.stringify(entry));
  }
}

export const logger: Logger = new JsonLogger({
  enabled: CFG.log.enabled,
  level: CFG.log.level,
});
