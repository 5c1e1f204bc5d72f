import { setTimeout as delay } from "timers/promises";

/** Scheduling policy wrapped around every span that needs external calls. */
export interface Pacer {
  run<T>(task: () => Promise<T>): Promise<T>;
}

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = async (ms) => {
  await delay(ms);
};

type Slot = { start: number; done?: number };

/**
 * Hands out start slots one at a time. A task starts `intervalMs` after the
 * previous task finished, or after it started while it is still running.
 * The first task starts immediately.
 */
export class IntervalPacer implements Pacer {
  private gate: Promise<unknown> = Promise.resolve();
  private prev?: Slot;

  constructor(
    private readonly intervalMs: number,
    private readonly sleep: Sleep = defaultSleep,
    private readonly now: () => number = Date.now
  ) {}

  private async reserve(): Promise<Slot> {
    const prev = this.prev;
    if (prev && this.intervalMs > 0) {
      const wait = (prev.done ?? prev.start) + this.intervalMs - this.now();
      if (wait > 0) await this.sleep(wait);
    }
    const slot: Slot = { start: this.now() };
    this.prev = slot;
    return slot;
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    const next = this.gate.then(() => this.reserve());
    this.gate = next;
    const slot = await next;
    try {
      return await task();
    } finally {
      slot.done = this.now();
    }
  }
}

export const immediatePacer: Pacer = {
  run: (task) => task(),
};
