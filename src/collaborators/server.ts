import net from "node:net";
import path from "node:path";
import axios, { type AxiosInstance } from "axios";
import { CancelledError, RegistrationError, TimeoutError } from "../core/errors.js";
import { ManagedProcess } from "../core/process.js";
import { pause } from "../core/timeout.js";
import { runHelperScript } from "./scripts.js";
import type { HostServer, HostServerCollaborator, InstalledEnvironment, RunScope, ServerStartOptions } from "./types.js";

const READY_TIMEOUT_MS = 180_000;
const POLL_INTERVAL_MS = 1000;
const REQUEST_TIMEOUT_MS = 30_000;

/** ComfyUI's log lines for a custom node package that failed to import. */
export function isImportErrorLine(line: string): boolean {
  return (line.includes("Cannot import") && line.includes("module for custom nodes")) || line.includes("IMPORT FAILED");
}

export function findFreePort(): Promise<number> {
  return new Promise((resolve, reject) => {
    const listener = net.createServer();
    listener.unref();
    listener.once("error", reject);
    listener.listen(0, "127.0.0.1", () => {
      const address = listener.address();
      const port = typeof address === "object" && address !== null ? address.port : 0;
      listener.close(() => (port > 0 ? resolve(port) : reject(new Error("Could not allocate a local port"))));
    });
  });
}

function isStringRecordOfLists(value: unknown): value is Record<string, string[]> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every((v) => Array.isArray(v) && v.every((d) => typeof d === "string"))
  );
}

/** A ComfyUI `main.py` process owned by one pipeline. */
export class ComfyServer implements HostServer {
  readonly http: AxiosInstance;

  constructor(
    readonly baseUrl: string,
    private readonly proc: ManagedProcess,
    private readonly lines: readonly string[],
    private readonly scope: RunScope,
    private readonly environment: InstalledEnvironment,
    private readonly mockPackages: readonly string[],
  ) {
    this.http = axios.create({ baseURL: baseUrl, timeout: REQUEST_TIMEOUT_MS });
  }

  importErrors(): string[] {
    return this.lines.filter(isImportErrorLine);
  }

  async objectInfo(signal: AbortSignal): Promise<unknown> {
    const res = await this.http.get<unknown>("/object_info", { signal });
    return res.data;
  }

  async dependencyClosures(classTypes: readonly string[], signal: AbortSignal): Promise<Record<string, string[]>> {
    const result = await runHelperScript({ ...this.scope, signal }, this.environment, {
      script: "dependencies.py",
      label: "resolve node dependencies",
      kind: "RegistrationError",
      classTypes,
      mockPackages: this.mockPackages,
    });
    const closures =
      typeof result === "object" && result !== null && "closures" in result ? result.closures : undefined;
    if (!isStringRecordOfLists(closures)) {
      throw new RegistrationError("Dependency helper returned an unexpected result");
    }
    return closures;
  }

  async waitUntilReady(timeoutMs: number): Promise<void> {
    const { signal } = this.scope;
    const deadline = Date.now() + timeoutMs;
    while (Date.now() < deadline) {
      if (signal.aborted) throw new CancelledError("host server start");
      if (!this.proc.running) {
        const exit = await this.proc.exited;
        throw new RegistrationError(`ComfyUI exited during startup (${exit.exitCode ?? exit.signal ?? "spawn failed"})`, {
          details: this.lines.slice(-40).join("\n"),
        });
      }
      const ready = await this.http.get("/system_stats", { timeout: 5000, signal }).then(
        () => true,
        () => false,
      );
      if (ready) return;
      await pause(POLL_INTERVAL_MS, signal);
    }
    throw new TimeoutError("host server start", timeoutMs);
  }

  async stop(): Promise<void> {
    this.scope.logger.info("stopping ComfyUI", { pid: this.proc.pid });
    await this.proc.stop();
  }
}

/** Interpreter arguments that launch ComfyUI's main.py on `port`. */
export function serverArgs(environment: InstalledEnvironment, port: number, runner: RunScope["runner"]): string[] {
  return [
    ...(environment.portable ? ["-s"] : []),
    path.join(environment.comfyuiDir, "main.py"),
    "--listen",
    "127.0.0.1",
    "--port",
    String(port),
    ...(runner === "gpu" ? [] : ["--cpu"]),
    ...(environment.portable ? ["--windows-standalone-build"] : []),
  ];
}

/** Starts ComfyUI on a free loopback port and waits for it to answer. */
export class ComfyServerLauncher implements HostServerCollaborator {
  async start(scope: RunScope, environment: InstalledEnvironment, opts: ServerStartOptions): Promise<HostServer> {
    const port = await findFreePort();
    const lines: string[] = [];
    const args = serverArgs(environment, port, scope.runner);
    const env: Record<string, string> = { ...scope.env };
    if (opts.mockPackages.length > 0) {
      env.COMFY_TEST_MOCK_PACKAGES = opts.mockPackages.join(",");
      env.COMFY_TEST_STRICT_IMPORTS = "1";
    }

    scope.logger.info("starting ComfyUI", { port, mockPackages: opts.mockPackages });
    const proc = new ManagedProcess(environment.python, args, {
      cwd: environment.comfyuiDir,
      env,
      onLine: (line) => {
        lines.push(line);
        scope.logger.debug(line, { source: "comfyui" });
      },
    });

    const server = new ComfyServer(`http://127.0.0.1:${port}`, proc, lines, scope, environment, opts.mockPackages);
    try {
      await server.waitUntilReady(READY_TIMEOUT_MS);
    } catch (err) {
      await proc.stop();
      throw err;
    }
    return server;
  }
}
