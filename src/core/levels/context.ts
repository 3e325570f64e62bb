import type { ArtifactWriter } from "../../artifact-writer/writer.js";
import type { Collaborators, HostServer, InstalledEnvironment, RunScope } from "../../collaborators/types.js";
import type { CudaClassifier, CudaFlagSet } from "../../cuda/classifier.js";
import { diag, type Diagnostic } from "../../types/diagnostic.js";
import type { PlatformTarget, Project, TestConfig } from "../../types/config.js";
import type { LevelOutcome, ValidationReport } from "../../types/report.js";
import { readWorkflowFile, type Workflow, type WorkflowMeta } from "../../workflow/model.js";
import type { NodeDefinition } from "../../workflow/node-definitions.js";
import { RegistrationError, type EngineError, type ErrorKind } from "../errors.js";
import type { LevelName } from "../state-machine.js";

/** Mutable state one pipeline carries from level to level. */
export type PipelineState = {
  environment: InstalledEnvironment | null;
  server: HostServer | null;
  definitions: Map<string, NodeDefinition>;
  extensionClassTypes: string[];
  failedClassTypes: Set<string>;
  cudaFlags: CudaFlagSet;
  workflows: LoadedWorkflows | null;
};

export type LoadedWorkflows = {
  loaded: Workflow[];
  unreadable: { meta: WorkflowMeta; error: unknown }[];
};

export type LevelContext = {
  project: Project;
  config: TestConfig;
  target: PlatformTarget;
  scope: RunScope;
  collaborators: Collaborators;
  classifier: CudaClassifier;
  /** Declared workflows for this platform's runner class. */
  workflows: readonly WorkflowMeta[];
  writer: ArtifactWriter;
  reportValidation: (report: ValidationReport) => void;
  state: PipelineState;
};

export type LevelRunner = (ctx: LevelContext) => Promise<LevelOutcome>;

export type LevelDescriptor = {
  level: LevelName;
  /** Kind recorded when the runner throws something that is not an EngineError. */
  failureKind: ErrorKind;
  run: LevelRunner;
};

export function initialState(): PipelineState {
  return {
    environment: null,
    server: null,
    definitions: new Map(),
    extensionClassTypes: [],
    failedClassTypes: new Set(),
    cudaFlags: new Set(),
    workflows: null,
  };
}

export function passed(diagnostics: Diagnostic[], artifacts: string[] = []): LevelOutcome {
  return { status: "passed", diagnostics, artifacts };
}

export function failed(error: EngineError, diagnostics: Diagnostic[], artifacts: string[] = []): LevelOutcome {
  return { status: "failed", error: error.toInfo(), diagnostics, artifacts };
}

export function requireEnvironment(ctx: LevelContext): InstalledEnvironment {
  if (!ctx.state.environment) throw new RegistrationError("No installed environment; INSTALL did not run");
  return ctx.state.environment;
}

export function requireServer(ctx: LevelContext): HostServer {
  if (!ctx.state.server) throw new RegistrationError("No host server; REGISTRATION did not run");
  return ctx.state.server;
}

/** Parse this platform's workflows once per pipeline. */
export function loadWorkflows(ctx: LevelContext): LoadedWorkflows {
  if (ctx.state.workflows) return ctx.state.workflows;
  const result: LoadedWorkflows = { loaded: [], unreadable: [] };
  for (const meta of ctx.workflows) {
    try {
      result.loaded.push(readWorkflowFile(meta.file, meta));
    } catch (error) {
      result.unreadable.push({ meta, error });
    }
  }
  ctx.state.workflows = result;
  return result;
}

/**
 * Workflows eligible for VALIDATION and EXECUTION. Under the `restrict`
 * policy, workflows using a class that failed INSTANTIATION are dropped with
 * a warning.
 */
export function eligibleWorkflows(ctx: LevelContext, diagnostics: Diagnostic[]): Workflow[] {
  const { loaded } = loadWorkflows(ctx);
  const failedTypes = ctx.state.failedClassTypes;
  if (ctx.config.validation.on_instantiation_failure !== "restrict" || failedTypes.size === 0) return loaded;

  return loaded.filter((workflow) => {
    const broken = [...new Set(workflow.nodes.map((n) => n.classType).filter((t) => failedTypes.has(t)))].sort();
    if (broken.length === 0) return true;
    diagnostics.push(
      diag("warn", "WORKFLOW_RESTRICTED", `${workflow.name}: skipped, uses nodes that failed to instantiate: ${broken.join(", ")}`, {
        path: workflow.file,
      }),
    );
    return false;
  });
}
