import { describe, it, expect } from "vitest";
import { createSemaphore } from "../../src/utils/semaphore.js";

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe("createSemaphore", () => {
  it("never runs more than the limit at once and starts tasks in order", async () => {
    const gate = createSemaphore(2);
    const started: number[] = [];
    let active = 0;
    let peak = 0;

    const results = await Promise.all(
      [0, 1, 2, 3, 4].map((n) =>
        gate(async () => {
          started.push(n);
          active++;
          peak = Math.max(peak, active);
          await sleep(5);
          active--;
          return n * 10;
        })
      )
    );

    expect(results).toEqual([0, 10, 20, 30, 40]);
    expect(peak).toBe(2);
    expect(started).toEqual([0, 1, 2, 3, 4]);
  });

  it("releases the slot when a task fails", async () => {
    const gate = createSemaphore(1);

    await expect(gate(() => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    await expect(gate(async () => "next")).resolves.toBe("next");
  });

  it("treats a limit below one as one", async () => {
    const gate = createSemaphore(0);
    let active = 0;
    let peak = 0;

    await Promise.all(
      [1, 2, 3].map(() =>
        gate(async () => {
          active++;
          peak = Math.max(peak, active);
          await sleep(2);
          active--;
        })
      )
    );

    expect(peak).toBe(1);
  });
});
