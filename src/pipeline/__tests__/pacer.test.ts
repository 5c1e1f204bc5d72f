import { describe, expect, it, vi } from "vitest";
import { IntervalPacer, immediatePacer } from "../pacer.js";

describe("IntervalPacer", () => {
  it("starts the first task immediately and spaces the rest", async () => {
    let clock = 0;
    const sleep = vi.fn(async (ms: number) => {
      clock += ms;
    });
    const pacer = new IntervalPacer(1000, sleep, () => clock);

    await pacer.run(async () => {
      clock += 200;
    });
    expect(sleep).not.toHaveBeenCalled();

    clock += 300;
    await pacer.run(async () => "second");
    expect(sleep).toHaveBeenLastCalledWith(700);

    clock += 5000;
    expect(await pacer.run(async () => 42)).toBe(42);
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it("counts a failed task as done", async () => {
    let clock = 0;
    const sleep = vi.fn(async (ms: number) => {
      clock += ms;
    });
    const pacer = new IntervalPacer(500, sleep, () => clock);

    await expect(pacer.run(async () => Promise.reject(new Error("boom")))).rejects.toThrow(
      "boom"
    );
    await pacer.run(async () => undefined);
    expect(sleep.mock.calls).toEqual([[500]]);
  });

  it("spaces overlapping tasks from the previous start", async () => {
    let clock = 0;
    const sleep = vi.fn(async (ms: number) => {
      clock += ms;
    });
    const pacer = new IntervalPacer(1000, sleep, () => clock);
    const starts: number[] = [];
    let release = () => {};
    const blocked = new Promise<void>((resolve) => {
      release = resolve;
    });

    const runs = [1, 2, 3].map(() =>
      pacer.run(async () => {
        starts.push(clock);
        await blocked;
      })
    );
    await pacer.run(async () => {
      release();
    });
    await Promise.all(runs);

    expect(starts).toEqual([0, 1000, 2000]);
    expect(sleep.mock.calls).toEqual([[1000], [1000], [1000]]);
  });

  it("never sleeps with a zero interval", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const pacer = new IntervalPacer(0, sleep, () => 0);
    await pacer.run(async () => 1);
    await pacer.run(async () => 2);
    expect(sleep).not.toHaveBeenCalled();
  });
});

describe("immediatePacer", () => {
  it("runs the task as is", async () => {
    expect(await immediatePacer.run(async () => "done")).toBe("done");
  });
});
