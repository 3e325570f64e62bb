import { CancelledError, TimeoutError } from "./errors.js";

/** Largest delay a Node timer accepts; longer ones fire after 1 ms. */
export const MAX_TIMER_MS = 2 ** 31 - 1;

type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

export type TimeoutOptions = {
  label: string;
  timeoutMs: number;
  /** Parent cancellation; aborting it cancels the task. */
  signal?: AbortSignal;
  /** How long to wait for the task to release its resources after abort. */
  settleMs?: number;
};

/**
 * Run `task` with its own abort signal. When the budget expires (or the parent
 * aborts) the signal fires and the task gets `settleMs` to wind down before a
 * TimeoutError or CancelledError is thrown.
 */
export async function withTimeout<T>(task: (signal: AbortSignal) => Promise<T>, opts: TimeoutOptions): Promise<T> {
  if (opts.signal?.aborted) throw new CancelledError(opts.label);

  const controller = new AbortController();
  let reason: "timeout" | "cancelled" | null = null;
  const abort = (why: "timeout" | "cancelled") => {
    reason ??= why;
    controller.abort();
  };

  const onParentAbort = () => abort("cancelled");
  opts.signal?.addEventListener("abort", onParentAbort, { once: true });
  const timer = setTimeout(() => abort("timeout"), Math.min(opts.timeoutMs, MAX_TIMER_MS));

  const running: Promise<Settled<T>> = task(controller.signal).then(
    (value) => ({ ok: true, value }),
    (error: unknown) => ({ ok: false, error }),
  );
  const aborted = new Promise<"aborted">((resolve) => {
    controller.signal.addEventListener("abort", () => resolve("aborted"), { once: true });
  });

  try {
    const first = await Promise.race([running, aborted]);
    if (first === "aborted" || reason !== null) {
      await settleWithin(running, opts.settleMs ?? 5000);
      throw reason === "cancelled" ? new CancelledError(opts.label) : new TimeoutError(opts.label, opts.timeoutMs);
    }
    if (first.ok) return first.value;
    throw first.error;
  } finally {
    clearTimeout(timer);
    opts.signal?.removeEventListener("abort", onParentAbort);
  }
}

async function settleWithin(running: Promise<unknown>, ms: number): Promise<void> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const grace = new Promise<void>((resolve) => {
    timer = setTimeout(resolve, ms);
  });
  try {
    await Promise.race([running, grace]);
  } finally {
    if (timer !== undefined) clearTimeout(timer);
  }
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
export function pause(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      signal.removeEventListener("abort", done);
      resolve();
    }
    if (signal.aborted) done();
    else signal.addEventListener("abort", done, { once: true });
  });
}
