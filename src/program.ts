// src/program.ts
import { Command, InvalidArgumentError } from "commander";
import { cfg } from "./config.js";
import { log } from "./logger.js";
import {
  defaultDeps,
  runAnnotate,
  type AnnotateDeps,
  type AnnotateOptions,
} from "./run.js";
import { isIsoDay } from "./utils/format.js";

/* ---------------- option parsers ---------------- */
export function parseDay(value: string): string {
  if (!isIsoDay(value)) throw new InvalidArgumentError("Expected YYYY-MM-DD.");
  return value;
}

export function parseNumber(value: string): number {
  const n = Number(value);
  if (value.trim() === "" || !Number.isFinite(n))
    throw new InvalidArgumentError("Not a number.");
  return n;
}

export function parseNonNegative(value: string): number {
  const n = parseNumber(value);
  if (n < 0) throw new InvalidArgumentError("Must be >= 0.");
  return n;
}

export function parseCount(value: string): number {
  const n = parseNonNegative(value);
  if (!Number.isInteger(n)) throw new InvalidArgumentError("Must be an integer.");
  return n;
}

type CliOptions = {
  start?: string;
  end?: string;
  minPct: number;
  top: number;
  noise: number;
  output?: string;
  name?: string;
  windowDays?: number;
  sourcePrefix?: boolean;
  delay: number;
  concurrency: number;
  annotate: boolean;
  clearCache?: boolean;
  clearAll?: boolean;
};

export function toAnnotateOptions(symbol: string, o: CliOptions): AnnotateOptions {
  const upper = symbol.toUpperCase();
  return {
    symbol: upper,
    start: o.start,
    end: o.end,
    minPct: o.minPct,
    topN: o.top > 0 ? o.top : undefined,
    noisePct: o.noise,
    output: o.output ?? `${upper}_chart.html`,
    companyName: o.name,
    annotate: o.annotate,
    clear: o.clearAll ? "all" : o.clearCache ? "symbol" : undefined,
    windowDays: o.windowDays,
    prefixSource: o.sourcePrefix ?? false,
    maxResults: cfg.NEWS_MAX_RESULTS,
    delayMs: o.delay,
    concurrency: Math.max(1, o.concurrency),
  };
}

export function buildProgram(deps: () => AnnotateDeps = () => defaultDeps()): Command {
  const program = new Command();

  program
    .name("price-move-annotator")
    .description(
      "Chart a ticker's largest consecutive-day moves, annotated with the news behind them"
    )
    .version("0.1.0")
    .argument("<symbol>", "ticker symbol, e.g. AAPL")
    .option(
      "-s, --start <date>",
      "start date (YYYY-MM-DD, default: 1 year before end)",
      parseDay
    )
    .option(
      "-e, --end <date>",
      "end date (YYYY-MM-DD, default: today)",
      parseDay
    )
    .option(
      "-m, --min-pct <pct>",
      "minimum |cumulative %| for a move",
      parseNumber,
      cfg.MIN_PCT
    )
    .option(
      "-t, --top <n>",
      "keep the N largest moves (0 = all)",
      parseCount,
      cfg.TOP_N
    )
    .option(
      "-n, --noise <pct>",
      "absorb countertrend days up to this % (0 = off)",
      parseNonNegative,
      cfg.NOISE_PCT
    )
    .option(
      "-o, --output <path>",
      "output HTML file (default: <SYMBOL>_chart.html)"
    )
    .option(
      "--name <company>",
      "company name used for news search (default: symbol)"
    )
    .option(
      "--window-days <n>",
      "only use news published within ±N days",
      parseCount,
      cfg.NEWS_WINDOW_DAYS
    )
    .option("--source-prefix", "show headlines as [source] title")
    .option(
      "--delay <ms>",
      "pause between spans that need lookups",
      parseNonNegative,
      cfg.ENRICH_DELAY_MS
    )
    .option("--concurrency <n>", "spans enriched in parallel", parseCount, 1)
    .option("--no-annotate", "skip news search and LLM summaries")
    .option(
      "--clear-cache",
      "delete this symbol's cached prices and annotations first"
    )
    .option("--clear-all", "delete every cached file first")
    .action(async (symbol: string, o: CliOptions) => {
      try {
        await runAnnotate(toAnnotateOptions(symbol, o), deps());
      } catch (err) {
        log.error(err instanceof Error ? err.message : err);
        process.exitCode = 1;
      }
    });

  return program;
}
