// src/providers/news.ts
import * as cheerio from "cheerio";
import { cfg } from "../config.js";
import { errMessage, log } from "../logger.js";
import type { HeadlineRecord, Outcome } from "../types.js";
import { degraded, ok } from "../types.js";
import { addDays, isoDay } from "../utils/format.js";
import { createHttpGet, type HttpGet } from "./http.js";

export type NewsQuery = {
  companyName: string;
  /** YYYY-MM-DD anchor */
  aroundDate: string;
  maxResults: number;
  /** Restrict to articles published within ±windowDays of aroundDate */
  windowDays?: number;
};

/** Headline search; never throws, failures come back as `degraded`. */
export interface NewsLookup {
  search(query: NewsQuery): Promise<Outcome<HeadlineRecord[]>>;
}

const GOOGLE_NEWS_RSS = "https://news.google.com/rss/search";

const httpGet = createHttpGet("price-move-annotator/0.1", {
  responseType: "text",
});

export function buildNewsQuery(q: NewsQuery): string {
  if (q.windowDays === undefined) return `${q.companyName} stock ${q.aroundDate}`;
  const [from, to] = newsWindow(q.aroundDate, q.windowDays);
  // Google's before: is exclusive
  return `${q.companyName} stock after:${from} before:${addDays(to, 1)}`;
}

function newsWindow(aroundDate: string, windowDays: number): [string, string] {
  const w = Math.max(0, Math.floor(windowDays));
  return [addDays(aroundDate, -w), addDays(aroundDate, w)];
}

/** "Tue, 02 Jan 2024 08:00:00 GMT" → "2024-01-02"; "" when undetectable. */
function pubDay(raw: string): string {
  if (!raw.trim()) return "";
  const d = new Date(raw);
  return isNaN(+d) ? "" : isoDay(d);
}

/** Map an RSS feed to headline records, keeping feed (relevance) order. */
export function parseNewsRss(xml: string): HeadlineRecord[] {
  const $ = cheerio.load(xml, { xml: true });
  const out: HeadlineRecord[] = [];

  $("item").each((_, el) => {
    const $el = $(el);
    const source = $el.find("source").first().text().trim();
    let title = $el.find("title").first().text().trim();
    // Google News appends " - Publisher" to every title
    if (source && title.endsWith(` - ${source}`))
      title = title.slice(0, -(source.length + 3)).trim();
    if (!title) return;

    const descHtml = $el.find("description").first().text();
    let body = descHtml
      ? cheerio.load(descHtml).root().text().replace(/\s+/g, " ").trim()
      : "";
    // Descriptions that only echo the headline carry no extra context
    if (body.startsWith(title)) body = "";

    out.push({
      title,
      body,
      url: $el.find("link").first().text().trim(),
      date: pubDay($el.find("pubDate").first().text()),
      source,
    });
  });
  return out;
}

/** Google News RSS search. */
export class GoogleNewsLookup implements NewsLookup {
  constructor(private readonly get: HttpGet = httpGet) {}

  async search(q: NewsQuery): Promise<Outcome<HeadlineRecord[]>> {
    const query = buildNewsQuery(q);
    try {
      const { data } = await this.get(GOOGLE_NEWS_RSS, {
        params: { q: query, hl: "en-US", gl: "US", ceid: "US:en" },
      });
      if (typeof data !== "string") {
        log.warn("[NEWS] non-text response", { query });
        return degraded("unexpected response body");
      }

      let items = parseNewsRss(data);
      if (q.windowDays !== undefined) {
        const [from, to] = newsWindow(q.aroundDate, q.windowDays);
        items = items.filter((it) => !it.date || (it.date >= from && it.date <= to));
      }
      return ok(items.slice(0, Math.max(0, q.maxResults)));
    } catch (err) {
      log.warn("[NEWS] search failed", { query, err: errMessage(err) });
      return degraded(`search failed: ${errMessage(err)}`);
    }
  }
}

/** Plain-array form: headlines for a company around a date, [] on any failure. */
export async function searchNews(
  companyName: string,
  aroundDate: string,
  maxResults = cfg.NEWS_MAX_RESULTS,
  windowDays?: number,
  lookup: NewsLookup = new GoogleNewsLookup()
): Promise<HeadlineRecord[]> {
  const res = await lookup.search({ companyName, aroundDate, maxResults, windowDays });
  return res.kind === "ok" ? res.value : [];
}
