import {
  existsSync,
  mkdirSync,
  readdirSync,
  renameSync,
  unlinkSync,
  writeFileSync,
} from "fs";
import { dirname, join } from "path";

/*
 * Cache layout (one directory, shared by both stores):
 *   <dir>/<SYMBOL>_<start>_<end>.csv     price series
 *   <dir>/<SYMBOL>_annotations.json      span annotations
 */

/** Make an instrument symbol safe to use as a file-name prefix. */
export function fileSafe(instrument: string): string {
  return instrument.trim().replace(/[\\/:*?"<>|\s]/g, "-");
}

export function pricesPath(dir: string, instrument: string, start: string, end: string) {
  return join(dir, `${fileSafe(instrument)}_${start}_${end}.csv`);
}

export function annotationsPath(dir: string, instrument: string) {
  return join(dir, `${fileSafe(instrument)}_annotations.json`);
}

/** Write via temp file + rename so readers never see a half-written file. */
export function writeFileAtomic(path: string, data: string) {
  mkdirSync(dirname(path), { recursive: true });
  const tmp = `${path}.tmp`;
  writeFileSync(tmp, data, "utf8");
  renameSync(tmp, path);
}

/**
 * Delete cached files for one instrument (price + annotation), or every file
 * when no instrument is given. Returns the number of files removed.
 */
export function clearCache(dir: string, instrument?: string): number {
  if (!existsSync(dir)) return 0;
  const names = readdirSync(dir, { withFileTypes: true })
    .filter((e) => e.isFile())
    .map((e) => e.name);

  const prefix = instrument ? `${fileSafe(instrument)}_` : "";
  let removed = 0;
  for (const name of names) {
    if (!name.startsWith(prefix)) continue;
    unlinkSync(join(dir, name));
    removed++;
  }
  return removed;
}
