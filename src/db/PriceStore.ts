import { existsSync, readFileSync } from "fs";
import type { PricePoint, PriceSeries } from "../types.js";
import { errMessage, log } from "../logger.js";
import { pricesPath, writeFileAtomic } from "./cache.js";

const HEADER = "Date,Close";

export interface PriceCache {
  load(instrument: string, start: string, end: string): PriceSeries | undefined;
  save(instrument: string, start: string, end: string, series: PriceSeries): void;
}

/** CSV cache of fetched price series, one file per (instrument, start, end). */
export class FilePriceStore implements PriceCache {
  constructor(private readonly dir: string) {}

  load(instrument: string, start: string, end: string): PriceSeries | undefined {
    const path = pricesPath(this.dir, instrument, start, end);
    if (!existsSync(path)) return undefined;
    try {
      const series = parsePriceCsv(readFileSync(path, "utf8"));
      if (series) return series;
      log.warn("[CACHE] malformed price file, ignoring", { path });
    } catch (err) {
      log.warn("[CACHE] unreadable price file, ignoring", {
        path,
        err: errMessage(err),
      });
    }
    return undefined;
  }

  save(instrument: string, start: string, end: string, series: PriceSeries): void {
    writeFileAtomic(
      pricesPath(this.dir, instrument, start, end),
      formatPriceCsv(series)
    );
  }
}

export function formatPriceCsv(series: PriceSeries): string {
  const rows = series.map((p) => `${p.date},${p.close}`);
  return [HEADER, ...rows].join("\n") + "\n";
}

/** Parse a cached CSV; null when the file is not a well-formed series. */
export function parsePriceCsv(csv: string): PriceSeries | null {
  const lines = csv.trim().split(/\r?\n/);
  if (lines[0]?.trim() !== HEADER) return null;

  const out: PricePoint[] = [];
  for (const line of lines.slice(1)) {
    const [date, closeRaw] = line.split(",");
    const close = Number(closeRaw);
    if (!/^\d{4}-\d{2}-\d{2}$/.test(date ?? "") || !Number.isFinite(close))
      return null;
    if (out.length && out[out.length - 1].date >= date) return null;
    out.push({ date, close });
  }
  return out.length ? out : null;
}
