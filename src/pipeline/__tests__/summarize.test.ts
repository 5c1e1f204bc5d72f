import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { HeadlineRecord } from "../../types.js";
import {
  OpenAiCauseSummarizer,
  buildPrompt,
  cleanPhrase,
  type CompletionFn,
} from "../summarize.js";

const headline = (title: string, extra: Partial<HeadlineRecord> = {}): HeadlineRecord => ({
  title,
  body: "",
  url: "https://news.example.com/a",
  date: "2024-01-02",
  source: "Reuters",
  ...extra,
});

const input = {
  entityName: "Acme Corp",
  symbol: "ACME",
  date: "2024-01-02",
  pctChange: -7.25,
  headlines: [headline("Acme recalls widgets")],
};

describe("buildPrompt", () => {
  it("describes the move and lists headlines with snippets", () => {
    const prompt = buildPrompt({
      ...input,
      headlines: [
        headline("Acme recalls widgets", { body: "x".repeat(301) }),
        headline("Analysts cut Acme", { source: "" }),
      ],
    });
    const lines = prompt.split("\n");

    expect(lines[0]).toBe("On 2024-01-02, Acme Corp (ACME) stock dropped 7.3%.");
    expect(prompt).toContain(
      `[Reuters] Acme recalls widgets\n  ${"x".repeat(300)}…\n\n[?] Analysts cut Acme`
    );
    expect(lines[lines.length - 1]).toBe("Cause:");
  });

  it("uses at most five headlines", () => {
    const many = ["a", "b", "c", "d", "e", "f"].map((t) => headline(`Story ${t}`));
    const prompt = buildPrompt({ ...input, pctChange: 4, headlines: many });
    expect(prompt.startsWith("On 2024-01-02, Acme Corp (ACME) stock rose 4.0%.")).toBe(true);
    expect(prompt).toContain("[Reuters] Story e");
    expect(prompt).not.toContain("Story f");
  });
});

describe("cleanPhrase", () => {
  it("strips whitespace and quotes", () => {
    expect(cleanPhrase('  "Product recall announced"\n')).toBe("Product recall announced");
  });

  it("keeps at most twelve words", () => {
    const words = Array.from({ length: 15 }, (_, i) => `w${i + 1}`).join(" ");
    expect(cleanPhrase(words)).toBe("w1 w2 w3 w4 w5 w6 w7 w8 w9 w10 w11 w12");
  });

  it("returns empty for blank or quote-only text", () => {
    expect(cleanPhrase("   ")).toBe("");
    expect(cleanPhrase('""')).toBe("");
  });
});

describe("OpenAiCauseSummarizer", () => {
  const sleep = vi.fn(async (_ms: number) => {});

  beforeEach(() => {
    sleep.mockClear();
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("does not call the model without headlines", async () => {
    const complete = vi.fn<CompletionFn>(async () => "anything");
    const s = new OpenAiCauseSummarizer({ complete, sleep, retries: 3 });
    expect(await s.summarize({ ...input, headlines: [] })).toEqual({
      kind: "degraded",
      reason: "no headlines",
    });
    expect(complete).not.toHaveBeenCalled();
  });

  it("returns the cleaned phrase", async () => {
    const complete = vi.fn<CompletionFn>(async () => ' "Widget recall over safety defect" ');
    const s = new OpenAiCauseSummarizer({ complete, sleep, retries: 3 });
    expect(await s.summarize(input)).toEqual({
      kind: "ok",
      value: "Widget recall over safety defect",
    });
    expect(complete).toHaveBeenCalledWith(buildPrompt(input));
  });

  it("retries with backoff between attempts", async () => {
    const complete = vi
      .fn<CompletionFn>()
      .mockRejectedValueOnce(new Error("429"))
      .mockResolvedValueOnce("   ")
      .mockResolvedValueOnce("Widget recall");
    const s = new OpenAiCauseSummarizer({ complete, sleep, retries: 3, backoffMs: 250 });

    expect(await s.summarize(input)).toEqual({ kind: "ok", value: "Widget recall" });
    expect(complete).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[250], [250]]);
  });

  it("degrades after the last failed attempt without a trailing sleep", async () => {
    const complete = vi.fn<CompletionFn>(async () => {
      throw new Error("upstream 500");
    });
    const s = new OpenAiCauseSummarizer({ complete, sleep, retries: 2, backoffMs: 10 });

    expect(await s.summarize(input)).toEqual({
      kind: "degraded",
      reason: "llm failed: upstream 500",
    });
    expect(complete).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it("treats null content as empty", async () => {
    const complete = vi.fn<CompletionFn>(async () => null);
    const s = new OpenAiCauseSummarizer({ complete, sleep, retries: 1 });
    expect(await s.summarize(input)).toEqual({
      kind: "degraded",
      reason: "llm failed: empty response",
    });
    expect(sleep).not.toHaveBeenCalled();
  });

  it("accepts a very short phrase with a warning", async () => {
    const complete = vi.fn<CompletionFn>(async () => "FDA");
    const s = new OpenAiCauseSummarizer({ complete, sleep, retries: 1 });
    expect(await s.summarize(input)).toEqual({ kind: "ok", value: "FDA" });
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it("degrades when retries are disabled", async () => {
    const complete = vi.fn<CompletionFn>(async () => "Widget recall");
    const s = new OpenAiCauseSummarizer({ complete, sleep, retries: 0 });
    expect((await s.summarize(input)).kind).toBe("degraded");
    expect(complete).not.toHaveBeenCalled();
  });
});
