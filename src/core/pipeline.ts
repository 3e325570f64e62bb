import type { ArtifactWriter } from "../artifact-writer/writer.js";
import type { Collaborators, RunScope } from "../collaborators/types.js";
import type { CudaClassifier } from "../cuda/classifier.js";
import type { Logger } from "../logger.js";
import type { ResultAggregator } from "../report/aggregator.js";
import type { PlatformTarget, Project, RunnerClass, TestConfig } from "../types/config.js";
import type { LevelOutcome } from "../types/report.js";
import type { WorkflowMeta } from "../workflow/model.js";
import { toErrorInfo } from "./errors.js";
import { initialState, type LevelContext, type LevelDescriptor } from "./levels/context.js";
import { LEVELS } from "./levels/index.js";
import { gateLevel, type PlannedLevel } from "./state-machine.js";

/** CUDA wheel version pip resolves GPU-only packages against, even on CPU hosts. */
export const CUDA_VERSION_HINT = "12.8";

/**
 * Variables added to every child process of a pipeline: the extension's
 * declared `envVars`, then the engine's own, which win on a clash.
 */
export function buildRunEnv(runner: RunnerClass, envVars: Readonly<Record<string, string>> = {}): Record<string, string> {
  return {
    ...envVars,
    COMFY_ENV_CUDA_VERSION: CUDA_VERSION_HINT,
    ...(runner === "gpu" ? { COMFY_TEST_GPU: "1" } : {}),
  };
}

export type PipelineOptions = {
  project: Project;
  config: TestConfig;
  target: PlatformTarget;
  runner: RunnerClass;
  plan: readonly PlannedLevel[];
  workflows: readonly WorkflowMeta[];
  collaborators: Collaborators;
  classifier: CudaClassifier;
  writer: ArtifactWriter;
  aggregator: ResultAggregator;
  workspaceDir: string;
  logger: Logger;
  signal: AbortSignal;
  levels?: readonly LevelDescriptor[];
};

/**
 * Level Pipeline: drives one platform through the ordered levels.
 *
 * Loop: reach level → gate → run → record terminal status. A failure blocks
 * every later level; the host server is stopped however the loop ends.
 */
export class LevelPipeline {
  private readonly levels: readonly LevelDescriptor[];

  constructor(private readonly opts: PipelineOptions) {
    this.levels = opts.levels ?? LEVELS;
  }

  async run(): Promise<void> {
    const { target, aggregator, runner, signal } = this.opts;
    const logger = this.opts.logger.child({ platform: target.name });
    aggregator.platformStarted(target.name, runner);

    const scope: RunScope = {
      platform: target.name,
      runner,
      workspaceDir: this.opts.workspaceDir,
      env: buildRunEnv(runner, this.opts.project.envVars),
      pythonVersion: this.opts.project.pythonVersion,
      comfyuiVersion: this.opts.project.comfyuiVersion,
      portableVersion: target.portableVersion,
      signal,
      logger,
    };
    const ctx: LevelContext = {
      project: this.opts.project,
      config: this.opts.config,
      target,
      scope,
      collaborators: this.opts.collaborators,
      classifier: this.opts.classifier,
      workflows: this.opts.workflows,
      writer: this.opts.writer,
      reportValidation: (report) => aggregator.validationReported(target.name, report),
      state: initialState(),
    };

    let blocked = false;
    try {
      for (const planned of this.opts.plan) {
        const descriptor = this.levels.find((d) => d.level === planned.level);
        if (!descriptor) throw new Error(`No runner for level ${planned.level}`);

        aggregator.levelReached(target.name, planned.level, planned.mode === "implicit");
        const decision = gateLevel(planned, { blocked, cancelled: signal.aborted, skipWorkflow: target.skipWorkflow });
        if (decision.action === "skip") {
          aggregator.levelFinished(target.name, planned.level, { status: "skipped", skipReason: decision.reason });
          logger.debug("level skipped", { level: planned.level, reason: decision.reason });
          continue;
        }

        aggregator.levelStarted(target.name, planned.level);
        const levelScope = { ...scope, logger: logger.child({ level: planned.level }) };
        const outcome = await this.runLevel(descriptor, { ...ctx, scope: levelScope });
        aggregator.levelFinished(target.name, planned.level, outcome);

        if (outcome.status === "failed") {
          blocked = true;
          logger.warn("level failed", { level: planned.level, kind: outcome.error?.kind, error: outcome.error?.message });
        } else {
          logger.info("level passed", { level: planned.level });
        }
      }
      aggregator.platformFinished(target.name);
    } finally {
      await this.release(ctx, logger);
    }
  }

  private async runLevel(descriptor: LevelDescriptor, ctx: LevelContext): Promise<LevelOutcome> {
    try {
      return await descriptor.run(ctx);
    } catch (err) {
      const fallback = ctx.scope.signal.aborted ? "Cancelled" : descriptor.failureKind;
      return { status: "failed", error: toErrorInfo(err, fallback), diagnostics: [], artifacts: [] };
    }
  }

  private async release(ctx: LevelContext, logger: Logger): Promise<void> {
    const server = ctx.state.server;
    if (!server) return;
    ctx.state.server = null;
    try {
      await server.stop();
    } catch (err) {
      logger.error("failed to stop host server", { error: err instanceof Error ? err.message : String(err) });
    }
  }
}
