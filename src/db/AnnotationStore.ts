import { existsSync, readFileSync } from "fs";
import { z } from "zod";
import type { AnnotationRecord, SpanBounds } from "../types.js";
import { errMessage, log } from "../logger.js";
import { annotationsPath, clearCache, writeFileAtomic } from "./cache.js";

/** Per-instrument span → {event, headlines} cache. Single writer, no locking. */
export interface AnnotationStore {
  get(instrument: string, span: SpanBounds): AnnotationRecord | undefined;
  put(instrument: string, span: SpanBounds & AnnotationRecord): void;
  /** Remove cached files for one instrument (or all); returns count removed. */
  clear(instrument?: string): number;
}

export const spanKey = (s: SpanBounds) => `${s.startDate}|${s.endDate}`;

const RecordSchema = z.object({
  event: z.string(),
  headlines: z.array(z.string()),
});
const FileSchema = z.record(RecordSchema);

type Entries = Record<string, AnnotationRecord>;

/** JSON file per instrument, fully rewritten on every put. */
export class FileAnnotationStore implements AnnotationStore {
  constructor(private readonly dir: string) {}

  private load(instrument: string): Entries {
    const path = annotationsPath(this.dir, instrument);
    if (!existsSync(path)) return {};
    try {
      const parsed = FileSchema.safeParse(JSON.parse(readFileSync(path, "utf8")));
      if (parsed.success) return parsed.data;
      log.warn("[CACHE] invalid annotation file, ignoring", { path });
    } catch (err) {
      log.warn("[CACHE] unreadable annotation file, ignoring", {
        path,
        err: errMessage(err),
      });
    }
    return {};
  }

  get(instrument: string, span: SpanBounds): AnnotationRecord | undefined {
    const hit = this.load(instrument)[spanKey(span)];
    return hit ? { event: hit.event, headlines: [...hit.headlines] } : undefined;
  }

  put(instrument: string, span: SpanBounds & AnnotationRecord): void {
    const entries = this.load(instrument);
    entries[spanKey(span)] = {
      event: span.event,
      headlines: [...span.headlines],
    };
    writeFileAtomic(
      annotationsPath(this.dir, instrument),
      JSON.stringify(entries, null, 2)
    );
  }

  clear(instrument?: string): number {
    return clearCache(this.dir, instrument);
  }
}

/** Process-local store for tests and dry runs. */
export class MemoryAnnotationStore implements AnnotationStore {
  private readonly byInstrument = new Map<string, Map<string, AnnotationRecord>>();

  get(instrument: string, span: SpanBounds): AnnotationRecord | undefined {
    const hit = this.byInstrument.get(instrument)?.get(spanKey(span));
    return hit ? { event: hit.event, headlines: [...hit.headlines] } : undefined;
  }

  put(instrument: string, span: SpanBounds & AnnotationRecord): void {
    let entries = this.byInstrument.get(instrument);
    if (!entries) {
      entries = new Map();
      this.byInstrument.set(instrument, entries);
    }
    entries.set(spanKey(span), {
      event: span.event,
      headlines: [...span.headlines],
    });
  }

  clear(instrument?: string): number {
    if (instrument === undefined) {
      let n = 0;
      for (const entries of this.byInstrument.values()) n += entries.size;
      this.byInstrument.clear();
      return n;
    }
    const n = this.byInstrument.get(instrument)?.size ?? 0;
    this.byInstrument.delete(instrument);
    return n;
  }
}
