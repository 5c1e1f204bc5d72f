import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FilePriceStore, formatPriceCsv, parsePriceCsv } from "../PriceStore.js";

const series = [
  { date: "2024-01-02", close: 100 },
  { date: "2024-01-03", close: 101.5 },
];

describe("FilePriceStore", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "prices-"));
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it("saves and reloads a series for the same key", () => {
    const store = new FilePriceStore(dir);
    store.save("ACME", "2024-01-01", "2024-01-31", series);
    expect(store.load("ACME", "2024-01-01", "2024-01-31")).toEqual(series);
    expect(store.load("ACME", "2024-01-01", "2024-02-29")).toBeUndefined();
  });

  it("treats a malformed file as a miss", () => {
    writeFileSync(join(dir, "ACME_2024-01-01_2024-01-31.csv"), "garbage\n1,2\n");
    expect(new FilePriceStore(dir).load("ACME", "2024-01-01", "2024-01-31")).toBeUndefined();
  });
});

describe("price CSV", () => {
  it("writes a Date,Close table", () => {
    expect(formatPriceCsv(series)).toBe(
      "Date,Close\n2024-01-02,100\n2024-01-03,101.5\n"
    );
  });

  it("rejects bad rows and non-increasing dates", () => {
    expect(parsePriceCsv("Date,Close\n2024-01-02,abc\n")).toBeNull();
    expect(parsePriceCsv("Date,Close\n2024-01-03,1\n2024-01-02,2\n")).toBeNull();
    expect(parsePriceCsv("Date,Close\n")).toBeNull();
  });
});
