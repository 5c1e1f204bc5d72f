import { log } from "../logger.js";

/**
 * Tiny concurrency pool (no deps). Worker errors are logged, never rethrown;
 * callers that need per-item results should catch inside `worker`.
 */
export async function runWithConcurrency<T>(
  items: readonly T[],
  worker: (item: T, idx: number) => Promise<void>,
  concurrency: number
): Promise<void> {
  if (items.length === 0) return;
  const limit = Math.max(1, Math.floor(concurrency));
  let active = 0;
  let cursor = 0;

  return new Promise<void>((resolve) => {
    const launch = () => {
      if (cursor >= items.length) {
        if (active === 0) resolve();
        return;
      }
      const i = cursor++;
      active++;
      Promise.resolve()
        .then(() => worker(items[i], i))
        .catch((err: unknown) => {
          log.error("[WORKER] unhandled error", { idx: i, err });
        })
        .finally(() => {
          active--;
          launch();
        });
    };
    const first = Math.min(limit, items.length);
    for (let k = 0; k < first; k++) launch();
  });
}
