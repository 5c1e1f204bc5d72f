// src/pipeline/segment.ts
import type { PriceSeries, Span } from "../types.js";

export type SegmentOptions = {
  /** Keep spans with |pct| >= minPct (negative → 0). */
  minPct: number;
  /** Keep only the N largest spans. */
  topN?: number;
  /** Countertrend days with |change| <= noisePct do not break a span. 0 disables. */
  noisePct: number;
};

const round2 = (x: number) => Math.round(x * 100) / 100;

/** Day-over-day % change at index i; null when undefined or flat. */
function dailyChange(series: PriceSeries, i: number): number | null {
  const prev = series[i - 1].close;
  const cur = series[i].close;
  if (!Number.isFinite(prev) || !Number.isFinite(cur) || prev === 0) return null;
  const chg = ((cur - prev) / prev) * 100;
  return chg === 0 ? null : chg;
}

function makeSpan(series: PriceSeries, start: number, end: number): Span {
  const before = series[start - 1].close;
  const price = series[end].close;
  return {
    startDate: series[start].date,
    endDate: series[end].date,
    days: end - start + 1,
    price,
    pct: round2(((price - before) / before) * 100),
  };
}

/**
 * Split a close series into consecutive-day directional spans and rank them
 * by absolute cumulative move.
 *
 * Noise absorption compares each countertrend day's own change against
 * `noisePct`; absorbed days never accumulate towards a reversal.
 */
export function segmentMoves(
  series: PriceSeries,
  opts: SegmentOptions
): Span[] {
  if (series.length < 2) return [];

  const minPct = Math.max(0, opts.minPct);
  const noisePct = Math.max(0, opts.noisePct);

  const spans: Span[] = [];
  let sign = 0;
  let start = -1;
  let last = -1;

  for (let i = 1; i < series.length; i++) {
    const chg = dailyChange(series, i);
    if (chg == null) continue;
    const s = chg > 0 ? 1 : -1;

    if (start >= 0 && s === sign) {
      last = i;
    } else if (start >= 0 && Math.abs(chg) <= noisePct) {
      last = i; // absorbed
    } else {
      if (start >= 0) spans.push(makeSpan(series, start, last));
      start = i;
      last = i;
      sign = s;
    }
  }
  if (start >= 0) spans.push(makeSpan(series, start, last));

  // Array.prototype.sort is stable: ties keep chronological order
  const ranked = spans
    .filter((sp) => Math.abs(sp.pct) >= minPct)
    .sort((a, b) => Math.abs(b.pct) - Math.abs(a.pct));

  return opts.topN === undefined
    ? ranked
    : ranked.slice(0, Math.max(0, Math.floor(opts.topN)));
}

