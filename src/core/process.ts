import { spawn, type ChildProcess } from "node:child_process";
import { MAX_TIMER_MS } from "./timeout.js";

export type OutputStream = "stdout" | "stderr";

export type SpawnOptions = {
  cwd?: string;
  /** Merged over the parent environment for the child only. */
  env?: Readonly<Record<string, string>>;
  onLine?: (line: string, stream: OutputStream) => void;
};

export type ProcessExit = {
  pid: number | null;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  /** Set when the process could not be spawned at all. */
  error: Error | null;
};

export type ProcessResult = ProcessExit & {
  timedOut: boolean;
  aborted: boolean;
  durationMs: number;
};

const KILL_GRACE_MS = 2000;

/**
 * A child process running in its own process group. `stop()` signals the whole
 * group and resolves only after the child has closed.
 */
export class ManagedProcess {
  readonly pid: number | null;
  readonly exited: Promise<ProcessExit>;
  private readonly child: ChildProcess;
  private readonly stdoutChunks: Buffer[] = [];
  private readonly stderrChunks: Buffer[] = [];
  private closed = false;

  constructor(command: string, args: readonly string[], opts: SpawnOptions = {}) {
    this.child = spawn(command, [...args], {
      cwd: opts.cwd,
      env: { ...process.env, ...opts.env },
      stdio: ["ignore", "pipe", "pipe"],
      detached: process.platform !== "win32",
    });
    this.pid = this.child.pid ?? null;

    this.child.stdout?.on("data", lineSplitter(this.stdoutChunks, "stdout", opts.onLine));
    this.child.stderr?.on("data", lineSplitter(this.stderrChunks, "stderr", opts.onLine));

    this.exited = new Promise<ProcessExit>((resolve) => {
      let spawnError: Error | null = null;
      this.child.on("error", (err) => {
        spawnError = err;
        // "close" does not follow a failed spawn
        if (this.pid === null) {
          this.closed = true;
          resolve(this.snapshot(null, null, err));
        }
      });
      this.child.on("close", (code, signal) => {
        this.closed = true;
        resolve(this.snapshot(code, signal, spawnError));
      });
    });
  }

  get running(): boolean {
    return !this.closed;
  }

  output(): string {
    return Buffer.concat([...this.stdoutChunks, ...this.stderrChunks]).toString("utf8");
  }

  async stop(graceMs: number = KILL_GRACE_MS): Promise<ProcessExit> {
    if (this.closed) return this.exited;

    this.signalGroup("SIGTERM");
    const forceKill = setTimeout(() => this.signalGroup("SIGKILL"), graceMs);
    try {
      return await this.exited;
    } finally {
      clearTimeout(forceKill);
    }
  }

  private signalGroup(signal: NodeJS.Signals): void {
    if (this.pid === null || this.closed) return;
    if (process.platform === "win32") {
      this.child.kill(signal);
      return;
    }
    try {
      // Negative PID addresses the whole process group
      process.kill(-this.pid, signal);
    } catch {
      // Group already gone or not ours; fall back to the direct child
      this.child.kill(signal);
    }
  }

  private snapshot(code: number | null, signal: NodeJS.Signals | null, error: Error | null): ProcessExit {
    return {
      pid: this.pid,
      exitCode: code,
      signal,
      stdout: Buffer.concat(this.stdoutChunks).toString("utf8"),
      stderr: Buffer.concat(this.stderrChunks).toString("utf8"),
      error,
    };
  }
}

export type RunProcessOptions = SpawnOptions & {
  timeoutMs?: number;
  signal?: AbortSignal;
};

/**
 * Run a command to completion. On timeout or abort the process group is
 * terminated and the result is returned once the child has closed.
 */
export async function runProcess(
  command: string,
  args: readonly string[],
  opts: RunProcessOptions = {},
): Promise<ProcessResult> {
  const started = Date.now();
  const proc = new ManagedProcess(command, args, opts);
  let timedOut = false;
  let aborted = false;

  const onAbort = () => {
    aborted = true;
    void proc.stop();
  };

  let timer: ReturnType<typeof setTimeout> | undefined;
  if (opts.timeoutMs !== undefined) {
    timer = setTimeout(() => {
      timedOut = true;
      void proc.stop();
    }, Math.min(opts.timeoutMs, MAX_TIMER_MS));
  }

  if (opts.signal?.aborted) onAbort();
  else opts.signal?.addEventListener("abort", onAbort, { once: true });

  try {
    const exit = await proc.exited;
    return { ...exit, timedOut, aborted, durationMs: Date.now() - started };
  } finally {
    if (timer !== undefined) clearTimeout(timer);
    opts.signal?.removeEventListener("abort", onAbort);
  }
}

/** True when a process with this pid still exists. */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    if (isNoSuchProcess(err)) return false;
    throw err;
  }
}

function isNoSuchProcess(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ESRCH";
}

function lineSplitter(
  chunks: Buffer[],
  stream: OutputStream,
  onLine: SpawnOptions["onLine"],
): (chunk: Buffer) => void {
  let pending = "";
  return (chunk) => {
    chunks.push(chunk);
    if (!onLine) return;
    pending += chunk.toString("utf8");
    const lines = pending.split(/\r?\n/);
    pending = lines.pop() ?? "";
    for (const line of lines) onLine(line, stream);
  };
}
