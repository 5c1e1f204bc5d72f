// src/pipeline/enrich.ts
import type { AnnotationStore } from "../db/AnnotationStore.js";
import { errMessage, log } from "../logger.js";
import type { NewsLookup } from "../providers/news.js";
import type { AnnotationRecord, HeadlineRecord, Outcome, Span } from "../types.js";
import { degraded } from "../types.js";
import { fallbackEvent, signedPct } from "../utils/format.js";
import { immediatePacer, type Pacer } from "./pacer.js";
import { runWithConcurrency } from "./pool.js";
import type { CauseSummarizer } from "./summarize.js";

/**
 * Per-span lifecycle:
 *   pending → cache-hit                       (terminal, no external calls)
 *   pending → searched → summarized | fallback (persisted before moving on)
 */
export type EnrichState =
  | "pending"
  | "cache-hit"
  | "searched"
  | "summarized"
  | "fallback";

export type EnrichOptions = {
  instrument: string;
  /** Search/prompt name; defaults to the instrument symbol */
  companyName?: string;
  store: AnnotationStore;
  news: NewsLookup;
  summarizer: CauseSummarizer;
  /** Spacing between spans that hit the network */
  pacer?: Pacer;
  maxResults?: number;
  windowDays?: number;
  /** Render headlines as "[source] title" */
  prefixSource?: boolean;
  /** 1 = sequential */
  concurrency?: number;
};

export type EnrichReport = {
  spans: Span[];
  states: EnrichState[];
  cachedCount: number;
};

type SpanResult = { span: Span; state: EnrichState };

const MAX_HEADLINES = 3;

function formatHeadline(h: HeadlineRecord, prefixSource: boolean): string {
  return prefixSource && h.source ? `[${h.source}] ${h.title}` : h.title;
}

/** Collaborators are expected not to throw; if one does, degrade instead. */
async function settle<T>(
  what: string,
  call: () => Promise<Outcome<T>>
): Promise<Outcome<T>> {
  try {
    return await call();
  } catch (err) {
    log.warn(`[ENRICH] ${what} threw`, { err: errMessage(err) });
    return degraded(errMessage(err));
  }
}

async function lookupCause(
  span: Span,
  opts: EnrichOptions
): Promise<{ record: AnnotationRecord; state: EnrichState }> {
  const entityName = opts.companyName || opts.instrument;

  const news = await settle("news lookup", () =>
    opts.news.search({
      companyName: entityName,
      aroundDate: span.startDate,
      maxResults: opts.maxResults ?? 5,
      windowDays: opts.windowDays,
    })
  );
  const items = news.kind === "ok" ? news.value : [];
  const headlines = items
    .slice(0, MAX_HEADLINES)
    .map((h) => formatHeadline(h, opts.prefixSource ?? false));

  const summary = await settle("summarizer", () =>
    opts.summarizer.summarize({
      entityName,
      symbol: opts.instrument,
      date: span.startDate,
      pctChange: span.pct,
      headlines: items,
    })
  );
  if (summary.kind === "ok")
    return { record: { event: summary.value, headlines }, state: "summarized" };

  return {
    record: { event: fallbackEvent(span.pct), headlines },
    state: "fallback",
  };
}

async function enrichOne(
  span: Span,
  idx: number,
  total: number,
  opts: EnrichOptions,
  pacer: Pacer
): Promise<SpanResult> {
  const tag = `[${idx + 1}/${total}]`;

  let cached: AnnotationRecord | undefined;
  try {
    cached = opts.store.get(opts.instrument, span);
  } catch (err) {
    log.warn("[CACHE] annotation read failed", { err: errMessage(err) });
  }
  if (cached) {
    log.info(`  ${tag} Cached: ${cached.event}`);
    return { span: { ...span, ...cached }, state: "cache-hit" };
  }

  log.info(
    `  ${tag} Searching news for ${span.startDate} (${signedPct(span.pct)})…`
  );
  const { record, state } = await pacer.run(() => lookupCause(span, opts));

  try {
    opts.store.put(opts.instrument, {
      startDate: span.startDate,
      endDate: span.endDate,
      ...record,
    });
  } catch (err) {
    log.warn("[CACHE] annotation write failed", {
      span: `${span.startDate}|${span.endDate}`,
      err: errMessage(err),
    });
  }

  log.info(`         → ${record.event}`);
  return { span: { ...span, ...record }, state };
}

/**
 * Attach `event` + `headlines` to every span, consulting the annotation store
 * first. Never throws on enrichment failures; input spans are not mutated.
 */
export async function enrichSpans(
  spans: readonly Span[],
  opts: EnrichOptions
): Promise<EnrichReport> {
  const pacer = opts.pacer ?? immediatePacer;
  const total = spans.length;
  const results: Array<SpanResult | undefined> = spans.map(() => undefined);

  await runWithConcurrency(
    spans,
    async (span, i) => {
      results[i] = await enrichOne(span, i, total, opts, pacer);
    },
    opts.concurrency ?? 1
  );

  const out = results.map(
    (r, i): SpanResult => r ?? { span: { ...spans[i] }, state: "pending" }
  );
  const cachedCount = out.filter((r) => r.state === "cache-hit").length;
  if (cachedCount) log.info(`  (${cachedCount}/${total} loaded from cache)`);

  return {
    spans: out.map((r) => r.span),
    states: out.map((r) => r.state),
    cachedCount,
  };
}
