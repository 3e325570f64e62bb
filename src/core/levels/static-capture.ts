import type { ScreenshotSession } from "../../collaborators/types.js";
import { diag, type Diagnostic } from "../../types/diagnostic.js";
import { mapWithConcurrency } from "../concurrency.js";
import { EngineError } from "../errors.js";
import { failed, loadWorkflows, passed, requireServer, type LevelRunner } from "./context.js";

/**
 * STATIC_CAPTURE level: screenshot every workflow without executing it.
 * Individual capture failures are warnings; only a collaborator that cannot
 * start fails the level.
 */
export const runStaticCapture: LevelRunner = async (ctx) => {
  const { scope, writer } = ctx;
  const server = requireServer(ctx);
  const { loaded } = loadWorkflows(ctx);
  const diagnostics: Diagnostic[] = [];

  if (loaded.length === 0) {
    return passed([diag("info", "CAPTURE_NOTHING", "No workflows to capture")]);
  }

  let opened: ScreenshotSession | null;
  try {
    opened = await ctx.collaborators.screenshots.open(scope, server);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return failed(new EngineError("CaptureError", `Screenshot capture could not start: ${message}`, { cause: err }), []);
  }
  if (opened === null) {
    return passed([diag("warn", "CAPTURE_DISABLED", "Screenshot capture is not available on this host")]);
  }

  const session = opened;
  const artifacts: string[] = [];
  try {
    await mapWithConcurrency(loaded, ctx.config.workflows.concurrency, async (workflow) => {
      const rel = `${scope.platform}/screenshots/${workflow.name}.png`;
      try {
        await session.capture(workflow, writer.resolve(rel), scope.signal);
        artifacts.push(writer.track(rel, "static_capture").path);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        diagnostics.push(diag("warn", "CAPTURE_FAILED", `${workflow.name}: ${message}`, { path: workflow.file }));
      }
    });
  } finally {
    await session.close();
  }

  diagnostics.push(diag("info", "CAPTURE_OK", `Captured ${artifacts.length} of ${loaded.length} workflow(s)`));
  return passed(diagnostics, artifacts.sort());
};
