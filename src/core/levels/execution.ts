import { diag, type Diagnostic } from "../../types/diagnostic.js";
import type { Workflow } from "../../workflow/model.js";
import { toPrompt } from "../../workflow/prompt.js";
import { mapWithConcurrency } from "../concurrency.js";
import { toErrorInfo, type ErrorInfo, type ErrorKind } from "../errors.js";
import { withTimeout } from "../timeout.js";
import { eligibleWorkflows, loadWorkflows, passed, requireServer, type LevelContext, type LevelRunner } from "./context.js";

type RunOutcome = { workflow: string; error: ErrorInfo | null; log: string };

async function executeOne(ctx: LevelContext, workflow: Workflow): Promise<RunOutcome> {
  const { scope, state, writer } = ctx;
  const server = requireServer(ctx);
  const lines: string[] = [];
  const started = Date.now();
  let error: ErrorInfo | null = null;

  try {
    const prompt = toPrompt(workflow, state.definitions);
    const result = await withTimeout(
      (signal) =>
        ctx.collaborators.execution.run({ ...scope, signal }, server, {
          prompt,
          label: workflow.name,
          signal,
          onLog: (line) => lines.push(line),
        }),
      { label: `workflow ${workflow.name}`, timeoutMs: ctx.config.timeout * 1000, signal: scope.signal },
    );
    lines.push(`prompt ${result.promptId} finished with ${Object.keys(result.outputs).length} output node(s)`);
  } catch (err) {
    error = toErrorInfo(err, "ExecutionError");
    lines.push(`FAILED [${error.kind}] ${error.message}`);
  }
  lines.push(`duration ${((Date.now() - started) / 1000).toFixed(1)}s`);

  const log = writer.writeText(`${scope.platform}/logs/${workflow.name}.log`, `${lines.join("\n")}\n`, "execution");
  return { workflow: workflow.name, error, log };
}

function failureKind(errors: readonly ErrorInfo[]): ErrorKind {
  if (errors.every((e) => e.kind === "Timeout")) return "Timeout";
  if (errors.every((e) => e.kind === "Cancelled")) return "Cancelled";
  return "ExecutionError";
}

/**
 * EXECUTION level: run every eligible workflow end to end, each under its own
 * timeout, with bounded concurrency.
 */
export const runExecution: LevelRunner = async (ctx) => {
  requireServer(ctx);
  const diagnostics: Diagnostic[] = [];
  const { unreadable } = loadWorkflows(ctx);
  const workflows = eligibleWorkflows(ctx, diagnostics);

  const errors: ErrorInfo[] = unreadable.map(({ meta, error }): ErrorInfo => {
    const info = toErrorInfo(error, "ExecutionError");
    diagnostics.push(diag("error", "EXECUTION_UNREADABLE", `${meta.name}: ${info.message}`, { path: meta.file }));
    return { ...info, kind: "ExecutionError" };
  });

  if (workflows.length === 0 && errors.length === 0) {
    return passed([...diagnostics, diag("info", "EXECUTION_NOTHING", "No workflows to execute")]);
  }

  const outcomes = await mapWithConcurrency(workflows, ctx.config.workflows.concurrency, (w) => executeOne(ctx, w));
  for (const outcome of outcomes) {
    if (outcome.error === null) {
      diagnostics.push(diag("info", "EXECUTION_OK", `${outcome.workflow}: passed`, { path: outcome.log }));
    } else {
      errors.push(outcome.error);
      diagnostics.push(
        diag("error", "EXECUTION_FAILED", `${outcome.workflow}: [${outcome.error.kind}] ${outcome.error.message}`, {
          path: outcome.log,
        }),
      );
    }
  }

  const artifacts = outcomes.map((o) => o.log);
  if (errors.length === 0) return passed(diagnostics, artifacts);

  const failedNames = [
    ...unreadable.map((u) => u.meta.name),
    ...outcomes.filter((o) => o.error !== null).map((o) => o.workflow),
  ];
  return {
    status: "failed",
    error: {
      kind: failureKind(errors),
      message: `${failedNames.length} of ${workflows.length + unreadable.length} workflow(s) failed: ${failedNames.join(", ")}`,
      details: errors.map((e) => e.message).join("\n"),
    },
    diagnostics,
    artifacts,
  };
};
