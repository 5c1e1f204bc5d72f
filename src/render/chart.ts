// src/render/chart.ts
import { mkdirSync, readFileSync, writeFileSync } from "fs";
import { dirname } from "path";
import { fileURLToPath } from "url";
import type { Span } from "../types.js";
import { signedPct } from "../utils/format.js";

const TEMPLATE_PATH = fileURLToPath(
  new URL("../../templates/chart.html", import.meta.url)
);

const UP_COLOR = "#00e676";
const DOWN_COLOR = "#ff1744";

export type ChartInput = {
  instrument: string;
  rangeLabel: string;
  dates: readonly string[];
  prices: readonly number[];
  spans: readonly Span[];
  output: string;
};

export type SpanArea = { start: string; end: string; up: boolean };

export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/** JSON safe to drop inside a <script> block. */
export function scriptJson(value: unknown): string {
  return JSON.stringify(value)
    .replace(/</g, "\\u003c")
    .replace(/\u2028/g, "\\u2028")
    .replace(/\u2029/g, "\\u2029");
}

/** Shaded backgrounds behind each span. */
export function buildAreas(spans: readonly Span[]): SpanArea[] {
  return spans.map((s) => ({ start: s.startDate, end: s.endDate, up: s.pct > 0 }));
}

export function tooltipHtml(s: Span): string {
  const up = s.pct > 0;
  const range = s.startDate !== s.endDate ? `${s.startDate} → ${s.endDate}` : s.startDate;
  const bullets = (s.headlines ?? [])
    .map((h) => `<br/>• ${escapeHtml(h)}`)
    .join("");
  return (
    `<b>${range}</b><br/>` +
    `${up ? "▲" : "▼"} ${signedPct(s.pct)} over ${s.days} day${s.days > 1 ? "s" : ""}<br/>` +
    `Close: $${s.price.toFixed(2)}<br/>` +
    `<br/><b>${escapeHtml(s.event ?? "")}</b>` +
    bullets
  );
}

/** ECharts markPoint entries: one triangle per span at its end date. */
export function buildMarkers(spans: readonly Span[]) {
  return spans.map((s) => {
    const up = s.pct > 0;
    const color = up ? UP_COLOR : DOWN_COLOR;
    const label = s.event || signedPct(s.pct);
    const coord: [string, number] = [s.endDate, s.price];
    return {
      coord,
      value: label,
      symbol: "triangle",
      symbolSize: 10,
      symbolRotate: up ? 0 : 180,
      itemStyle: { color },
      label: {
        show: true,
        position: up ? "top" : "bottom",
        formatter: label.replace(/[{}|]/g, ""),
        color,
        fontSize: 11,
        fontWeight: "bold",
        backgroundColor: "rgba(26,26,46,0.72)",
        borderRadius: 4,
        padding: [3, 6],
      },
      tooltip: { formatter: tooltipHtml(s) },
    };
  });
}

export function renderHtml(template: string, input: Omit<ChartInput, "output">): string {
  const values: Record<string, string> = {
    instrument: escapeHtml(input.instrument),
    title: scriptJson(`${input.instrument} — Closing Price (${input.rangeLabel})`),
    dates: scriptJson(input.dates),
    prices: scriptJson(input.prices),
    markers: scriptJson(buildMarkers(input.spans)),
    areas: scriptJson(buildAreas(input.spans)),
  };
  return template.replace(/\{\{(\w+)\}\}/g, (m, key: string) => values[key] ?? m);
}

/** Write the self-contained chart page; returns the output path. */
export function renderChart(input: ChartInput, templatePath = TEMPLATE_PATH): string {
  const html = renderHtml(readFileSync(templatePath, "utf8"), input);
  mkdirSync(dirname(input.output), { recursive: true });
  writeFileSync(input.output, html, "utf8");
  return input.output;
}
