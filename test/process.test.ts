import { describe, expect, it } from "vitest";
import { CancelledError, TimeoutError } from "../src/core/errors.js";
import { mapWithConcurrency } from "../src/core/concurrency.js";
import { isProcessAlive, runProcess, type OutputStream } from "../src/core/process.js";
import { MAX_TIMER_MS, pause, withTimeout } from "../src/core/timeout.js";

const NODE = process.execPath;

describe("runProcess", () => {
  it("collects output and reports lines per stream", async () => {
    const lines: [string, OutputStream][] = [];
    const result = await runProcess(NODE, ["-e", 'process.stdout.write("a\\nb\\n"); process.stderr.write("warn\\n")'], {
      onLine: (line, stream) => lines.push([line, stream]),
    });

    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe("a\nb\n");
    expect(result.stderr).toBe("warn\n");
    expect(lines.filter(([, s]) => s === "stdout").map(([l]) => l)).toEqual(["a", "b"]);
    expect(lines.filter(([, s]) => s === "stderr").map(([l]) => l)).toEqual(["warn"]);
    expect(result.timedOut).toBe(false);
  });

  it("passes extra environment to the child only", async () => {
    const result = await runProcess(NODE, ["-e", 'process.stdout.write(process.env.COMFY_EXTRA ?? "unset")'], {
      env: { COMFY_EXTRA: "from-parent" },
    });

    expect(result.stdout).toBe("from-parent");
    expect(process.env.COMFY_EXTRA).toBeUndefined();
  });

  it("reports a non-zero exit code", async () => {
    const result = await runProcess(NODE, ["-e", "process.exit(3)"]);
    expect(result.exitCode).toBe(3);
    expect(result.error).toBeNull();
  });

  it("kills the process when the timeout expires", async () => {
    const result = await runProcess(NODE, ["-e", "setInterval(() => {}, 1000)"], { timeoutMs: 200 });

    expect(result.timedOut).toBe(true);
    expect(result.exitCode).toBeNull();
    expect(result.pid).not.toBeNull();
    if (result.pid !== null) expect(isProcessAlive(result.pid)).toBe(false);
  });

  it("kills the process when the signal aborts", async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 100);
    const result = await runProcess(NODE, ["-e", "setInterval(() => {}, 1000)"], { signal: controller.signal });

    expect(result.aborted).toBe(true);
    expect(result.timedOut).toBe(false);
  });

  it("returns the spawn error for a missing executable", async () => {
    const result = await runProcess("/nonexistent/comfy-test-missing-binary", []);

    expect(result.pid).toBeNull();
    expect(result.error?.message).toMatch(/ENOENT/);
  });
});

describe("withTimeout", () => {
  const hang = (signal: AbortSignal) =>
    new Promise<string>((resolve) => signal.addEventListener("abort", () => resolve("late"), { once: true }));

  it("returns the task's value", async () => {
    await expect(withTimeout(async () => 42, { label: "quick task", timeoutMs: 1000 })).resolves.toBe(42);
  });

  it("passes the task's own failure through", async () => {
    const failing = async (): Promise<number> => {
      throw new Error("boom");
    };
    await expect(withTimeout(failing, { label: "failing task", timeoutMs: 1000 })).rejects.toThrow("boom");
  });

  it("throws a TimeoutError once the budget expires", async () => {
    const run = withTimeout(hang, { label: "slow task", timeoutMs: 100 });
    await expect(run).rejects.toBeInstanceOf(TimeoutError);
    await expect(withTimeout(hang, { label: "slow task", timeoutMs: 100 })).rejects.toThrow(
      "slow task timed out after 0.1s",
    );
  });

  it("holds budgets beyond the timer range instead of expiring at once", async () => {
    const task = () => new Promise<string>((resolve) => setTimeout(() => resolve("done"), 50));
    await expect(withTimeout(task, { label: "long task", timeoutMs: MAX_TIMER_MS + 1000 })).resolves.toBe("done");
  });

  it("throws CancelledError for an already aborted parent", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(withTimeout(hang, { label: "install", timeoutMs: 1000, signal: controller.signal })).rejects.toThrow(
      new CancelledError("install"),
    );
  });

  it("cancels the task when the parent aborts", async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 50);
    await expect(withTimeout(hang, { label: "server", timeoutMs: 5000, signal: controller.signal })).rejects.toThrow(
      "server was cancelled",
    );
  });
});

describe("pause", () => {
  it("ends early when the signal aborts", async () => {
    const controller = new AbortController();
    const started = Date.now();
    setTimeout(() => controller.abort(), 20);
    await pause(10_000, controller.signal);
    expect(Date.now() - started).toBeLessThan(5000);
  });
});

describe("mapWithConcurrency", () => {
  it("keeps input order and respects the limit", async () => {
    let inFlight = 0;
    let peak = 0;
    const results = await mapWithConcurrency([30, 10, 20, 5], 2, async (ms, i) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, ms));
      inFlight--;
      return `${i}:${ms}`;
    });

    expect(results).toEqual(["0:30", "1:10", "2:20", "3:5"]);
    expect(peak).toBe(2);
  });

  it("rethrows the first failure", async () => {
    await expect(
      mapWithConcurrency(["a", "b"], 1, async (item) => {
        if (item === "a") throw new Error("a failed");
        return item;
      }),
    ).rejects.toThrow("a failed");
  });

  it("handles an empty list", async () => {
    await expect(mapWithConcurrency([], 4, async () => 1)).resolves.toEqual([]);
  });
});
