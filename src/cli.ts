import type { AxiosInstance } from "axios";
import { raceForPrice } from "./core/race.js";
import { formatOutcome } from "./report.js";

export const USAGE = [
  "Usage: crypto-price [options] <coin>",
  "",
  "Fetch the current USD price of a cryptocurrency from several providers at once.",
  "",
  "Options:",
  "  -l, --latency  show how long the winning provider took",
  "  -h, --help     show this help",
].join("\n");

export const MISSING_COIN_HINT = "Please specify a cryptocurrency (e.g., bitcoin, ethereum)";

export interface CliArgs {
  coin?: string;
  showLatency: boolean;
  help: boolean;
  unknown: string[];
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const out: CliArgs = { showLatency: false, help: false, unknown: [] };
  for (const arg of argv) {
    if (arg === "-h" || arg === "--help") out.help = true;
    else if (arg === "-l" || arg === "--latency") out.showLatency = true;
    else if (arg.startsWith("-") && arg !== "-") out.unknown.push(arg);
    else if (out.coin === undefined) out.coin = arg;
  }
  return out;
}

export interface CliDeps {
  http?: AxiosInstance;
  timeoutMs?: number;
}

/** Returns the process exit code. */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const args = parseArgs(argv);

  if (args.unknown.length) {
    console.error(`Unknown option: ${args.unknown[0]}`);
    console.error(USAGE);
    return 1;
  }
  if (args.help) {
    console.log(USAGE);
    return 0;
  }
  if (!args.coin) {
    console.log(MISSING_COIN_HINT);
    return 0;
  }

  const outcome = await raceForPrice(args.coin, {
    http: deps.http,
    timeoutMs: deps.timeoutMs,
  });
  console.log(formatOutcome(args.coin, outcome, { showLatency: args.showLatency }));
  return 0;
}
