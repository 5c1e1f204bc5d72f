// src/providers/prices.ts
import { z } from "zod";
import { NoPriceDataError } from "../errors.js";
import { log } from "../logger.js";
import type { PricePoint, PriceSeries } from "../types.js";
import { addDays, isoDay } from "../utils/format.js";
import { createHttpGet, type HttpGet } from "./http.js";

/** Market-data source for daily closes. Must throw rather than return []. */
export interface PriceProvider {
  fetch(instrument: string, start: string, end: string): Promise<PriceSeries>;
}

const YAHOO_CHART = "https://query1.finance.yahoo.com/v8/finance/chart/";

const httpGet = createHttpGet("Mozilla/5.0 (price-move-annotator)");

const closes = z.array(z.number().nullable());

const ChartSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          meta: z.object({ gmtoffset: z.number().default(0) }).passthrough(),
          timestamp: z.array(z.number()).default([]),
          indicators: z.object({
            quote: z.array(z.object({ close: closes.default([]) })).default([]),
            adjclose: z
              .array(z.object({ adjclose: closes.default([]) }))
              .optional(),
          }),
        })
      )
      .nullable(),
    error: z
      .object({ code: z.string().optional(), description: z.string().optional() })
      .nullable()
      .optional(),
  }),
});

const toEpoch = (day: string) => Math.floor(Date.parse(`${day}T00:00:00Z`) / 1000);

/** Chart API payload → strictly increasing (date, adjusted close) series. */
export function parseYahooChart(data: unknown): PriceSeries {
  const parsed = ChartSchema.parse(data);
  const result = parsed.chart.result?.[0];
  if (!result) return [];

  const { gmtoffset } = result.meta;
  const adj = result.indicators.adjclose?.[0]?.adjclose ?? [];
  const raw = result.indicators.quote[0]?.close ?? [];
  const values = adj.length === result.timestamp.length ? adj : raw;

  const out: PricePoint[] = [];
  result.timestamp.forEach((ts, i) => {
    const close = values[i];
    if (close == null || !Number.isFinite(close)) return;
    const date = isoDay(new Date((ts + gmtoffset) * 1000));
    if (out.length && out[out.length - 1].date >= date) return;
    out.push({ date, close });
  });
  return out;
}

/** Yahoo Finance chart API (no key required). */
export class YahooPriceProvider implements PriceProvider {
  constructor(private readonly get: HttpGet = httpGet) {}

  async fetch(instrument: string, start: string, end: string): Promise<PriceSeries> {
    log.info("[PRICES] downloading", { instrument, start, end });
    const { data } = await this.get(YAHOO_CHART + encodeURIComponent(instrument), {
      params: {
        period1: toEpoch(start),
        // period2 is exclusive
        period2: toEpoch(addDays(end, 1)),
        interval: "1d",
        events: "history",
        includeAdjustedClose: true,
      },
    });
    const series = parseYahooChart(data);
    if (!series.length) throw new NoPriceDataError(instrument, start, end);
    return series;
  }
}
