import { diag, type Diagnostic } from "../../types/diagnostic.js";
import type { ValidationReport } from "../../types/report.js";
import { ValidationEngine, unreadableWorkflowReport, type PartialRunner } from "../../validation/engine.js";
import { eligibleWorkflows, loadWorkflows, passed, requireServer, type LevelRunner } from "./context.js";

/**
 * VALIDATION level: all four sub-levels over every eligible workflow. Passes
 * only when every workflow passes.
 */
export const runValidation: LevelRunner = async (ctx) => {
  const { scope, state, writer } = ctx;
  const server = requireServer(ctx);
  const diagnostics: Diagnostic[] = [];
  const { unreadable } = loadWorkflows(ctx);
  const workflows = eligibleWorkflows(ctx, diagnostics);

  const runPartial: PartialRunner | null = ctx.target.skipWorkflow
    ? null
    : async (prompt, signal) => {
        await ctx.collaborators.execution.run({ ...scope, signal }, server, {
          prompt,
          label: "partial execution",
          signal,
          onLog: (line) => scope.logger.debug(line, { phase: "partial_execution" }),
        });
      };

  const engine = new ValidationEngine({
    definitions: state.definitions,
    extensionClassTypes: state.extensionClassTypes,
    cudaFlags: state.cudaFlags,
    runPartial,
    partialTimeoutMs: ctx.config.validation.partial_timeout * 1000,
    signal: scope.signal,
  });

  const reports: ValidationReport[] = unreadable.map(({ meta, error }) => unreadableWorkflowReport(meta, error));
  for (const workflow of workflows) {
    reports.push(await engine.validate(workflow));
  }
  reports.sort((a, b) => (a.workflow < b.workflow ? -1 : a.workflow > b.workflow ? 1 : 0));

  const artifacts: string[] = [];
  for (const report of reports) {
    ctx.reportValidation(report);
    artifacts.push(writer.writeJson(`${scope.platform}/validation/${report.workflow}.json`, report, "validation"));
  }

  const failing = reports.filter((r) => !r.passed);
  for (const report of failing) {
    const names = report.subLevels.filter((s) => s.status === "failed").map((s) => s.name);
    diagnostics.push(diag("error", "VALIDATION_FAILED", `${report.workflow}: ${names.join(", ")} failed`, { path: report.file }));
  }

  if (failing.length === 0) {
    diagnostics.push(diag("info", "VALIDATION_OK", `${reports.length} workflow(s) validated`));
    return passed(diagnostics, artifacts);
  }

  const firstError = failing
    .flatMap((r) => r.subLevels)
    .find((s) => s.status === "failed" && s.error !== null)?.error;
  return {
    status: "failed",
    error: {
      kind: firstError?.kind ?? "ValidationError.Schema",
      message: `${failing.length} of ${reports.length} workflow(s) failed validation`,
      details: firstError?.message ?? null,
    },
    diagnostics,
    artifacts,
  };
};
