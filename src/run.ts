// src/run.ts
import { cfg } from "./config.js";
import { FileAnnotationStore, type AnnotationStore } from "./db/AnnotationStore.js";
import { FilePriceStore, type PriceCache } from "./db/PriceStore.js";
import { NoPriceDataError } from "./errors.js";
import { errMessage, log } from "./logger.js";
import { enrichSpans } from "./pipeline/enrich.js";
import { IntervalPacer, type Pacer } from "./pipeline/pacer.js";
import { segmentMoves } from "./pipeline/segment.js";
import { OpenAiCauseSummarizer, type CauseSummarizer } from "./pipeline/summarize.js";
import { GoogleNewsLookup, type NewsLookup } from "./providers/news.js";
import { YahooPriceProvider, type PriceProvider } from "./providers/prices.js";
import { renderChart, type ChartInput } from "./render/chart.js";
import type { PriceSeries, Span } from "./types.js";
import { addDays, isoDay } from "./utils/format.js";

export type AnnotateOptions = {
  symbol: string;
  /** YYYY-MM-DD; defaults to one year before `end` */
  start?: string;
  /** YYYY-MM-DD; defaults to today */
  end?: string;
  minPct: number;
  topN?: number;
  noisePct: number;
  output: string;
  companyName?: string;
  annotate: boolean;
  /** Drop cached files for this symbol, or for every symbol, before running */
  clear?: "symbol" | "all";
  windowDays?: number;
  /** Render headlines as "[source] title" */
  prefixSource?: boolean;
  maxResults: number;
  delayMs: number;
  concurrency: number;
};

export type AnnotateDeps = {
  priceStore: PriceCache;
  annotationStore: AnnotationStore;
  prices: PriceProvider;
  news: NewsLookup;
  summarizer: CauseSummarizer;
  /** Defaults to an IntervalPacer over `delayMs` */
  pacer?: Pacer;
  render?: (input: ChartInput) => string;
  today?: () => string;
};

export type AnnotateResult = {
  output: string;
  rangeLabel: string;
  spans: Span[];
  cachedCount: number;
};

export function defaultDeps(cacheDir = cfg.CACHE_DIR): AnnotateDeps {
  return {
    priceStore: new FilePriceStore(cacheDir),
    annotationStore: new FileAnnotationStore(cacheDir),
    prices: new YahooPriceProvider(),
    news: new GoogleNewsLookup(),
    summarizer: new OpenAiCauseSummarizer(),
  };
}

export function resolveRange(
  start: string | undefined,
  end: string | undefined,
  today: string
) {
  const endDay = end ?? today;
  const startDay = start ?? addDays(endDay, -365);
  if (startDay > endDay)
    throw new Error(`start ${startDay} is after end ${endDay}`);
  return { start: startDay, end: endDay, label: `${startDay} → ${endDay}` };
}

/** Cached series for the range, else fetch (fatal when empty) and cache it. */
export async function loadPrices(
  symbol: string,
  start: string,
  end: string,
  deps: Pick<AnnotateDeps, "priceStore" | "prices">
): Promise<PriceSeries> {
  const cached = deps.priceStore.load(symbol, start, end);
  if (cached) {
    log.info("[CACHE] prices loaded", { symbol, points: cached.length });
    return cached;
  }

  const series = await deps.prices.fetch(symbol, start, end);
  if (!series.length) throw new NoPriceDataError(symbol, start, end);
  try {
    deps.priceStore.save(symbol, start, end, series);
  } catch (err) {
    log.warn("[CACHE] could not save prices", { symbol, err: errMessage(err) });
  }
  return series;
}

export async function runAnnotate(
  opts: AnnotateOptions,
  deps: AnnotateDeps
): Promise<AnnotateResult> {
  const symbol = opts.symbol.toUpperCase();

  if (opts.clear) {
    const removed = deps.annotationStore.clear(
      opts.clear === "all" ? undefined : symbol
    );
    log.info("[CACHE] cleared", { scope: opts.clear === "all" ? "*" : symbol, removed });
  }

  const today = deps.today?.() ?? isoDay(new Date());
  const range = resolveRange(opts.start, opts.end, today);
  log.info(`Loading ${symbol} prices (${range.label})…`);
  const series = await loadPrices(symbol, range.start, range.end, deps);

  let spans = segmentMoves(series, {
    minPct: opts.minPct,
    topN: opts.topN,
    noisePct: opts.noisePct,
  });
  log.info(`Found ${spans.length} moves ≥ ${opts.minPct}%`);

  let cachedCount = 0;
  if (opts.annotate && spans.length) {
    log.info("[ENRICH] annotating moves…");
    const report = await enrichSpans(spans, {
      instrument: symbol,
      companyName: opts.companyName,
      store: deps.annotationStore,
      news: deps.news,
      summarizer: deps.summarizer,
      pacer: deps.pacer ?? new IntervalPacer(opts.delayMs),
      maxResults: opts.maxResults,
      windowDays: opts.windowDays,
      prefixSource: opts.prefixSource,
      concurrency: opts.concurrency,
    });
    spans = report.spans;
    cachedCount = report.cachedCount;
  }

  const render = deps.render ?? ((input: ChartInput) => renderChart(input));
  const output = render({
    instrument: symbol,
    rangeLabel: range.label,
    dates: series.map((p) => p.date),
    prices: series.map((p) => Math.round(p.close * 100) / 100),
    spans,
    output: opts.output,
  });
  log.info(`Chart saved to ${output}`);

  return { output, rangeLabel: range.label, spans, cachedCount };
}
