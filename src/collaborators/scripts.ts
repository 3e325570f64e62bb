import path from "node:path";
import { fileURLToPath } from "node:url";
import { EngineError, type ErrorKind } from "../core/errors.js";
import { runStep } from "./environment.js";
import type { InstalledEnvironment, RunScope } from "./types.js";

/** Python helpers shipped beside the package, run with the workspace venv. */
export const SCRIPT_DIR = fileURLToPath(new URL("../../scripts/", import.meta.url));

const HELPER_TIMEOUT_MS = 10 * 60_000;

/** The helpers print one JSON document as their last stdout line. */
export function lastJsonLine(stdout: string): unknown {
  const lines = stdout.trimEnd().split(/\r?\n/);
  const last = lines[lines.length - 1] ?? "";
  try {
    return JSON.parse(last);
  } catch {
    return undefined;
  }
}

/**
 * Run `script` against the installed extension. Failures of the script
 * itself are reported with `kind`; timeouts and cancellation keep theirs.
 */
export async function runHelperScript(
  scope: RunScope,
  environment: InstalledEnvironment,
  opts: { script: string; label: string; kind: ErrorKind; classTypes: readonly string[]; mockPackages: readonly string[] },
): Promise<unknown> {
  const args = [path.join(SCRIPT_DIR, opts.script), environment.comfyuiDir, environment.extensionDir, JSON.stringify(opts.classTypes)];
  const env = opts.mockPackages.length > 0 ? { COMFY_TEST_MOCK_PACKAGES: opts.mockPackages.join(",") } : undefined;

  let stdout: string;
  try {
    stdout = await runStep(scope, opts.label, environment.python, args, {
      cwd: environment.comfyuiDir,
      env,
      timeoutMs: HELPER_TIMEOUT_MS,
    });
  } catch (err) {
    if (err instanceof EngineError && (err.kind === "Timeout" || err.kind === "Cancelled")) throw err;
    const message = err instanceof Error ? err.message : String(err);
    throw new EngineError(opts.kind, message, {
      cause: err,
      details: err instanceof EngineError ? (err.details ?? undefined) : undefined,
    });
  }

  const result = lastJsonLine(stdout);
  if (result === undefined) throw new EngineError(opts.kind, `${opts.label} printed no result`);
  return result;
}
