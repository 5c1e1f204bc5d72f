/**
 * Shared types across the pipeline
 */
export type PricePoint = {
  date: string; // YYYY-MM-DD
  close: number;
};

/** Ordered by date, strictly increasing, one entry per trading day. */
export type PriceSeries = readonly PricePoint[];

/** Cache identity of a span. */
export type SpanBounds = {
  startDate: string;
  endDate: string;
};

export interface Span extends SpanBounds {
  /** Trading days in [startDate, endDate] */
  days: number;
  /** Close at endDate */
  price: number;
  /** Signed cumulative % change from the close before startDate */
  pct: number;
  event?: string;
  headlines?: string[];
}

export type AnnotationRecord = {
  event: string;
  headlines: string[];
};

export type HeadlineRecord = {
  title: string;
  body: string;
  url: string;
  date: string; // YYYY-MM-DD, "" when unknown
  source: string;
};

/** Result of a best-effort external call. */
export type Outcome<T> =
  | { kind: "ok"; value: T }
  | { kind: "degraded"; reason: string };

export const ok = <T>(value: T): Outcome<T> => ({ kind: "ok", value });
export const degraded = <T = never>(reason: string): Outcome<T> => ({
  kind: "degraded",
  reason,
});
