// src/pipeline/summarize.ts
import OpenAI from "openai";
import { cfg } from "../config.js";
import { errMessage, log } from "../logger.js";
import type { HeadlineRecord, Outcome } from "../types.js";
import { degraded, ok } from "../types.js";
import { defaultSleep, type Sleep } from "./pacer.js";

/* ============================================================
   Types
   ============================================================ */

export type SummaryInput = {
  entityName: string;
  symbol: string;
  /** YYYY-MM-DD */
  date: string;
  pctChange: number;
  headlines: readonly HeadlineRecord[];
};

/** Short causal phrase for a move, or `degraded` when none could be produced. */
export interface CauseSummarizer {
  summarize(input: SummaryInput): Promise<Outcome<string>>;
}

/** One completion round trip: prompt in, raw model text out. */
export type CompletionFn = (prompt: string) => Promise<string | null | undefined>;

/* ============================================================
   Config & constants
   ============================================================ */

const MAX_HEADLINES = 5;
const MAX_BODY_CHARS = 300;
const MAX_WORDS = 12;
const MIN_SANE_CHARS = 5;

/* ============================================================
   Prompt
   ============================================================ */

export function buildPrompt(input: SummaryInput): string {
  const { entityName, symbol, date, pctChange } = input;
  const direction = pctChange > 0 ? "rose" : "dropped";

  const blocks = input.headlines.slice(0, MAX_HEADLINES).map((h) => {
    const head = `[${h.source || "?"}] ${h.title.trim()}`;
    const body = h.body.trim();
    if (!body) return head;
    const snippet =
      body.length > MAX_BODY_CHARS ? body.slice(0, MAX_BODY_CHARS) + "…" : body;
    return `${head}\n  ${snippet}`;
  });

  return [
    `On ${date}, ${entityName} (${symbol}) stock ${direction} ${Math.abs(pctChange).toFixed(1)}%.`,
    "",
    "Your task: identify the ROOT CAUSE of this price move based on the news below.",
    "",
    `News articles:\n${blocks.join("\n\n")}`,
    "",
    "Instructions:",
    "- Focus on the specific event, announcement, or factor that most directly caused the move.",
    "- If multiple causes, pick the most impactful one.",
    "- Reply in ≤10 words. No intro, no explanation, just the cause.",
    "Cause:",
  ].join("\n");
}

/** Strip whitespace/quotes and keep at most 12 words; "" if nothing is left. */
export function cleanPhrase(text: string): string {
  const stripped = text.trim().replace(/^["'“”‘’]+|["'“”‘’]+$/g, "").trim();
  if (!stripped) return "";
  return stripped.split(/\s+/).slice(0, MAX_WORDS).join(" ");
}

/* ============================================================
   OpenAI-backed summarizer
   ============================================================ */

export type SummarizerOptions = {
  /** Attempts per call (first try included) */
  retries?: number;
  backoffMs?: number;
  model?: string;
  /** Override the completion call (tests, other providers) */
  complete?: CompletionFn;
  sleep?: Sleep;
};

function openAiCompletion(model: string): CompletionFn | undefined {
  const apiKey = cfg.OPENAI_API_KEY;
  if (!apiKey) return undefined;
  const client = new OpenAI({
    apiKey,
    baseURL: cfg.OPENAI_BASE_URL || undefined,
  });
  return async (prompt) => {
    const resp = await client.chat.completions.create({
      model,
      messages: [{ role: "user", content: prompt }],
    });
    return resp.choices[0]?.message?.content;
  };
}

export class OpenAiCauseSummarizer implements CauseSummarizer {
  private readonly retries: number;
  private readonly backoffMs: number;
  private readonly complete?: CompletionFn;
  private readonly sleep: Sleep;

  constructor(opts: SummarizerOptions = {}) {
    this.retries = Math.max(0, Math.floor(opts.retries ?? cfg.LLM_RETRIES));
    this.backoffMs = opts.backoffMs ?? cfg.LLM_BACKOFF_MS;
    this.complete =
      opts.complete ?? openAiCompletion(opts.model ?? cfg.OPENAI_MODEL);
    this.sleep = opts.sleep ?? defaultSleep;
  }

  async summarize(input: SummaryInput): Promise<Outcome<string>> {
    // Never ask the model without grounding context
    if (!input.headlines.length) return degraded("no headlines");
    const complete = this.complete;
    if (!complete) return degraded("OPENAI_API_KEY not configured");
    if (this.retries < 1) return degraded("retries disabled");

    const prompt = buildPrompt(input);
    let lastError = "";

    for (let attempt = 1; attempt <= this.retries; attempt++) {
      try {
        const text = await complete(prompt);
        const phrase = cleanPhrase(text ?? "");
        if (phrase) {
          if (phrase.length <= MIN_SANE_CHARS)
            log.warn("[LLM] suspiciously short cause", {
              symbol: input.symbol,
              phrase,
            });
          return ok(phrase);
        }
        lastError = "empty response";
      } catch (err) {
        lastError = errMessage(err);
      }
      if (attempt < this.retries) await this.sleep(this.backoffMs);
    }

    log.warn(`[LLM] summarisation failed after ${this.retries} attempts`, {
      symbol: input.symbol,
      date: input.date,
      err: lastError,
    });
    return degraded(`llm failed: ${lastError}`);
  }
}
