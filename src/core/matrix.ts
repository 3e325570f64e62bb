import path from "node:path";
import type { ArtifactWriter } from "../artifact-writer/writer.js";
import type { Collaborators } from "../collaborators/types.js";
import { requireEnabledTargets, resolvePlatformTargets } from "../config/validator.js";
import { CudaClassifier } from "../cuda/classifier.js";
import type { Logger } from "../logger.js";
import type { ResultAggregator } from "../report/aggregator.js";
import type { PlatformName, PlatformTarget, Project, RunnerClass, TestConfig } from "../types/config.js";
import { discoverWorkflows, workflowsForRunner } from "../workflow/discovery.js";
import type { WorkflowMeta } from "../workflow/model.js";
import { acquireWorkspace, type WorkspaceLease } from "./concurrency.js";
import { EngineError } from "./errors.js";
import type { LevelDescriptor } from "./levels/context.js";
import { LevelPipeline } from "./pipeline.js";
import { planLevels, type LevelName, type PlannedLevel } from "./state-machine.js";

export type PlatformPlan = {
  target: PlatformTarget;
  runner: RunnerClass;
  workflows: WorkflowMeta[];
  levels: PlannedLevel[];
};

export type MatrixPlan = {
  runner: RunnerClass;
  platforms: PlatformPlan[];
};

/** A platform's workspace is already held by another run. */
export class WorkspaceConflictError extends EngineError {
  constructor(
    message: string,
    readonly holder: string,
  ) {
    super("EnvironmentError", message);
    this.name = "WorkspaceConflictError";
  }
}

export function defaultWorkspaceRoot(projectDir: string): string {
  return path.join(projectDir, ".comfy-test", "workspaces");
}

/**
 * Expand configuration into the per-platform plan. Throws ConfigError when
 * no platform is enabled, before anything is installed or started.
 */
export function planMatrix(args: {
  config: TestConfig;
  project: Project;
  only?: PlatformName;
  until?: LevelName;
  gpu: boolean;
}): MatrixPlan {
  const targets = requireEnabledTargets(resolvePlatformTargets(args.config, args.only), args.only);
  const declared = discoverWorkflows(args.project.projectDir, args.config.workflows);
  const runner: RunnerClass = args.gpu ? "gpu" : "cpu";
  const levels = planLevels(args.config.levels, args.until);
  return {
    runner,
    platforms: targets.map((target) => ({
      target,
      runner,
      workflows: workflowsForRunner(declared, runner),
      levels: levels.map((l) => ({ ...l })),
    })),
  };
}

export type MatrixRunnerOptions = {
  project: Project;
  config: TestConfig;
  collaborators: Collaborators;
  writer: ArtifactWriter;
  aggregator: ResultAggregator;
  logger: Logger;
  workspaceRoot?: string;
  /** Owner string written into workspace locks. */
  owner: string;
  levels?: readonly LevelDescriptor[];
};

/**
 * Platform Matrix Runner: one Level Pipeline per enabled platform, run
 * concurrently, each in a workspace it holds exclusively.
 */
export class PlatformMatrixRunner {
  private readonly classifier = new CudaClassifier();

  constructor(private readonly opts: MatrixRunnerOptions) {}

  async run(plan: MatrixPlan, signal: AbortSignal): Promise<void> {
    const root = this.opts.workspaceRoot ?? defaultWorkspaceRoot(this.opts.project.projectDir);
    const leases = this.acquireAll(plan, root);

    try {
      const results = await Promise.allSettled(
        plan.platforms.map((p, i) => {
          const lease = leases[i];
          if (!lease) throw new Error(`No workspace lease for ${p.target.name}`);
          return this.pipelineFor(p, lease, signal).run();
        }),
      );
      const rejected = results.find((r): r is PromiseRejectedResult => r.status === "rejected");
      if (rejected) throw rejected.reason;
    } finally {
      for (const lease of leases) lease.release();
    }
  }

  private acquireAll(plan: MatrixPlan, root: string): WorkspaceLease[] {
    const leases: WorkspaceLease[] = [];
    for (const p of plan.platforms) {
      const acquired = acquireWorkspace(path.join(root, p.target.name), this.opts.owner);
      if (!acquired.allowed) {
        for (const lease of leases) lease.release();
        throw new WorkspaceConflictError(acquired.reason, acquired.holder);
      }
      leases.push(acquired.lease);
    }
    return leases;
  }

  private pipelineFor(p: PlatformPlan, lease: WorkspaceLease, signal: AbortSignal): LevelPipeline {
    return new LevelPipeline({
      project: this.opts.project,
      config: this.opts.config,
      target: p.target,
      runner: p.runner,
      plan: p.levels,
      workflows: p.workflows,
      collaborators: this.opts.collaborators,
      classifier: this.classifier,
      writer: this.opts.writer,
      aggregator: this.opts.aggregator,
      workspaceDir: lease.dir,
      logger: this.opts.logger,
      signal,
      levels: this.opts.levels,
    });
  }
}
