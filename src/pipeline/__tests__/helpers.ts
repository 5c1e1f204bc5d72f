import type { PricePoint, PriceSeries, Span } from "../../types.js";
import { isoDay } from "../../utils/format.js";

/** Build a series from closes, one weekday per point from `startDay`. */
export function seriesFromCloses(
  closes: readonly number[],
  startDay = "2024-01-01"
): PriceSeries {
  const out: PricePoint[] = [];
  const d = new Date(`${startDay}T00:00:00Z`);
  for (const close of closes) {
    while (d.getUTCDay() === 0 || d.getUTCDay() === 6)
      d.setUTCDate(d.getUTCDate() + 1);
    out.push({ date: isoDay(d), close });
    d.setUTCDate(d.getUTCDate() + 1);
  }
  return out;
}

/** Compound daily % changes onto a starting close. */
export function closesFromChanges(changes: readonly number[], base = 100) {
  const closes = [base];
  for (const c of changes) closes.push(closes[closes.length - 1] * (1 + c / 100));
  return closes;
}

export function span(
  startDate: string,
  endDate: string,
  pct: number,
  extra: Partial<Span> = {}
): Span {
  return { startDate, endDate, days: 1, price: 100, pct, ...extra };
}
