import { toErrorInfo, type ErrorInfo, type ValidationSubKind } from "../core/errors.js";
import { withTimeout } from "../core/timeout.js";
import type { CudaFlagSet } from "../cuda/classifier.js";
import { diag, type Diagnostic } from "../types/diagnostic.js";
import type { SubLevelName, SubLevelResult, ValidationReport } from "../types/report.js";
import type { Workflow, WorkflowMeta } from "../workflow/model.js";
import type { NodeDefinition } from "../workflow/node-definitions.js";
import { toPrompt, type PromptGraph } from "../workflow/prompt.js";
import { validateGraph } from "./graph.js";
import { validateIntrospection } from "./introspection.js";
import { planPartialExecution, type PartialPlan } from "./partial.js";
import { validateSchema } from "./schema.js";

/** Submits a prompt and resolves once it has run without error. */
export type PartialRunner = (prompt: PromptGraph, signal: AbortSignal) => Promise<void>;

export type ValidationContext = {
  definitions: ReadonlyMap<string, NodeDefinition>;
  extensionClassTypes: readonly string[];
  cudaFlags: CudaFlagSet;
  /** Null when workflows are not executed on this platform. */
  runPartial: PartialRunner | null;
  partialTimeoutMs: number;
  signal?: AbortSignal;
};

function failure(kind: ValidationSubKind, errors: readonly Diagnostic[]): ErrorInfo {
  const first = errors[0]?.message ?? "validation failed";
  return {
    kind: `ValidationError.${kind}`,
    message: errors.length > 1 ? `${errors.length} problems, first: ${first}` : first,
    details: null,
  };
}

function fromDiagnostics(name: SubLevelName, kind: ValidationSubKind, diagnostics: Diagnostic[]): SubLevelResult {
  const errors = diagnostics.filter((d) => d.level === "error");
  return errors.length === 0
    ? { name, status: "passed", skipReason: null, error: null, diagnostics }
    : { name, status: "failed", skipReason: null, error: failure(kind, errors), diagnostics };
}

/** Run a synchronous check; a throw fails only this sub-level. */
function guarded(name: SubLevelName, kind: ValidationSubKind, check: () => Diagnostic[]): SubLevelResult {
  try {
    return fromDiagnostics(name, kind, check());
  } catch (err) {
    return { name, status: "failed", skipReason: null, error: toErrorInfo(err, `ValidationError.${kind}`), diagnostics: [] };
  }
}

function skipped(name: SubLevelName, reason: string, diagnostics: Diagnostic[] = []): SubLevelResult {
  return { name, status: "skipped", skipReason: reason, error: null, diagnostics };
}

function report(meta: WorkflowMeta, subLevels: SubLevelResult[]): ValidationReport {
  return {
    workflow: meta.name,
    file: meta.file,
    runner: meta.runner,
    passed: subLevels.every((s) => s.status !== "failed"),
    subLevels,
  };
}

/**
 * Runs the four validation sub-levels over a workflow. A failing sub-level
 * never prevents the later ones from running.
 */
export class ValidationEngine {
  constructor(private readonly ctx: ValidationContext) {}

  async validate(workflow: Workflow): Promise<ValidationReport> {
    const { definitions } = this.ctx;
    const usedClassTypes = workflow.nodes.map((n) => n.classType);

    const subLevels = [
      guarded("schema", "Schema", () => validateSchema(workflow, definitions)),
      guarded("graph", "Graph", () => validateGraph(workflow, definitions)),
      guarded("introspection", "Introspection", () =>
        validateIntrospection([...usedClassTypes, ...this.ctx.extensionClassTypes], definitions),
      ),
      await this.partialExecution(workflow),
    ];
    return report(workflow, subLevels);
  }

  private async partialExecution(workflow: Workflow): Promise<SubLevelResult> {
    const run = this.ctx.runPartial;
    if (run === null) return skipped("partial_execution", "skip_workflow");

    let plan: PartialPlan;
    try {
      plan = planPartialExecution(workflow, this.ctx.definitions, this.ctx.cudaFlags);
    } catch (err) {
      return {
        name: "partial_execution",
        status: "failed",
        skipReason: null,
        error: toErrorInfo(err, "ValidationError.PartialExecution"),
        diagnostics: [],
      };
    }

    const diagnostics = plan.excluded.map((e) =>
      diag("info", "PARTIAL_EXCLUDED", `node ${e.nodeId} (${e.classType}) excluded: ${e.reason}`, { nodeId: e.nodeId }),
    );
    if (plan.included.size === 0) {
      return skipped("partial_execution", "no CUDA-independent nodes to run", diagnostics);
    }

    const prompt = toPrompt(workflow, this.ctx.definitions, plan.included);
    diagnostics.push(
      diag("info", "PARTIAL_INCLUDED", `running ${plan.included.size} of ${workflow.nodes.length} nodes`, {
        details: { nodes: [...plan.included].sort((a, b) => a - b) },
      }),
    );

    try {
      await withTimeout((signal) => run(prompt, signal), {
        label: `partial execution of ${workflow.name}`,
        timeoutMs: this.ctx.partialTimeoutMs,
        signal: this.ctx.signal,
      });
      return { name: "partial_execution", status: "passed", skipReason: null, error: null, diagnostics };
    } catch (err) {
      return {
        name: "partial_execution",
        status: "failed",
        skipReason: null,
        error: toErrorInfo(err, "ValidationError.PartialExecution"),
        diagnostics,
      };
    }
  }
}

/**
 * Report for a workflow file that could not be parsed: schema fails and the
 * remaining sub-levels are present but skipped.
 */
export function unreadableWorkflowReport(meta: WorkflowMeta, err: unknown): ValidationReport {
  const error = toErrorInfo(err, "ValidationError.Schema");
  const reason = "workflow could not be parsed";
  return report(meta, [
    {
      name: "schema",
      status: "failed",
      skipReason: null,
      error,
      diagnostics: [diag("error", "SCHEMA_UNREADABLE", error.message, { path: meta.file })],
    },
    skipped("graph", reason),
    skipped("introspection", reason),
    skipped("partial_execution", reason),
  ]);
}
