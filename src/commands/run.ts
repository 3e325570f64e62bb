import crypto from "node:crypto";
import path from "node:path";
import { ArtifactWriter } from "../artifact-writer/writer.js";
import { createDefaultCollaborators } from "../collaborators/index.js";
import type { Collaborators } from "../collaborators/types.js";
import { loadConfig } from "../config/loader.js";
import { loadProject } from "../config/project.js";
import { isPlatformName } from "../config/validator.js";
import { ConfigError, type ErrorInfo } from "../core/errors.js";
import type { DeepReadonly } from "../core/freeze.js";
import type { LevelDescriptor } from "../core/levels/context.js";
import { PlatformMatrixRunner, WorkspaceConflictError, planMatrix, type MatrixPlan } from "../core/matrix.js";
import { parseLevelName, type LevelName } from "../core/state-machine.js";
import { createLogger, type Logger } from "../logger.js";
import { ResultAggregator } from "../report/aggregator.js";
import type { PlatformName, Project } from "../types/config.js";
import type { RunReport } from "../types/report.js";
import { EXIT } from "./exit-codes.js";

export const REPORT_FILE = "run-report.json";

export type RunOptions = {
  projectDir: string;
  configPath?: string;
  platform?: string;
  /** Run levels up to and including this one. */
  level?: string;
  dryRun?: boolean;
  gpu?: boolean;
  /** Defaults to `<project>/.comfy-test/results/<runId>`. */
  outputDir?: string;
  workspaceRoot?: string;
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
  logger?: Logger;
  runId?: string;
  clock?: () => Date;
  /** Replaces the default level runners. */
  levels?: readonly LevelDescriptor[];
};

export type RunCommandResult =
  | { ok: true; dryRun: true; exitCode: number; plan: MatrixPlan }
  | {
      ok: true;
      dryRun: false;
      exitCode: number;
      report: DeepReadonly<RunReport>;
      outputDir: string;
      reportPath: string;
    }
  | { ok: false; exitCode: number; error: ErrorInfo };

export type CollaboratorFactory = (project: Project, env: NodeJS.ProcessEnv) => Collaborators;

export function makeRunId(now: Date = new Date()): string {
  const ts = now.toISOString().replace(/[:.]/g, "-");
  return `${ts}-${crypto.randomBytes(3).toString("hex")}`;
}

/** `COMFY_TEST_GPU` counts as set unless empty, 0, false or no. */
export function gpuRequested(env: NodeJS.ProcessEnv): boolean {
  const value = (env.COMFY_TEST_GPU ?? "").trim().toLowerCase();
  return value !== "" && value !== "0" && value !== "false" && value !== "no";
}

function invalidArgs(message: string): RunCommandResult {
  return { ok: false, exitCode: EXIT.INVALID_ARGS, error: { kind: "ConfigError", message, details: null } };
}

function parseSelectors(opts: RunOptions): { only?: PlatformName; until?: LevelName } | RunCommandResult {
  let only: PlatformName | undefined;
  if (opts.platform !== undefined) {
    if (!isPlatformName(opts.platform)) {
      return invalidArgs(`Unknown platform '${opts.platform}' (expected linux, macos, windows or windows_portable)`);
    }
    only = opts.platform;
  }
  let until: LevelName | undefined;
  if (opts.level !== undefined) {
    try {
      until = parseLevelName(opts.level);
    } catch (err) {
      return invalidArgs(err instanceof Error ? err.message : String(err));
    }
  }
  return { only, until };
}

/**
 * `comfy-test run`: load the project, expand the platform matrix and run a
 * Level Pipeline per platform. Writes run-report.json and manifest.json.
 */
export async function runTests(
  opts: RunOptions,
  collaborators: CollaboratorFactory = createDefaultCollaborators,
): Promise<RunCommandResult> {
  const selectors = parseSelectors(opts);
  if ("ok" in selectors) return selectors;

  const env = opts.env ?? process.env;
  const clock = opts.clock ?? (() => new Date());
  const logger = opts.logger ?? createLogger();
  const projectDir = path.resolve(opts.projectDir);

  try {
    const config = loadConfig({ projectDir, configPath: opts.configPath, env });
    const project = loadProject(projectDir, config);
    const plan = planMatrix({ config, project, only: selectors.only, until: selectors.until, gpu: opts.gpu ?? gpuRequested(env) });
    if (opts.dryRun) return { ok: true, dryRun: true, exitCode: EXIT.SUCCESS, plan };

    const runId = opts.runId ?? makeRunId(clock());
    const outputDir = path.resolve(projectDir, opts.outputDir ?? path.join(".comfy-test", "results", runId));
    const runLogger = logger.child({ runId });
    runLogger.info("run started", {
      project: project.name,
      platforms: plan.platforms.map((p) => p.target.name),
      runner: plan.runner,
    });

    const writer = new ArtifactWriter(outputDir, runId);
    const aggregator = new ResultAggregator(runId, project, clock);
    const signal = opts.signal ?? new AbortController().signal;
    const matrix = new PlatformMatrixRunner({
      project,
      config,
      collaborators: collaborators(project, env),
      writer,
      aggregator,
      logger: runLogger,
      workspaceRoot: opts.workspaceRoot,
      owner: `${runId} (pid ${process.pid})`,
      levels: opts.levels,
    });
    await matrix.run(plan, signal);

    aggregator.complete({ cancelled: signal.aborted });
    const report = aggregator.snapshot();
    const reportPath = writer.writeText(REPORT_FILE, aggregator.serialize(), "aggregator");
    writer.writeManifest(clock());
    runLogger.info("run finished", { success: report.success, exitCode: report.exitCode });

    return { ok: true, dryRun: false, exitCode: report.exitCode, report, outputDir, reportPath: path.join(outputDir, reportPath) };
  } catch (err) {
    if (err instanceof WorkspaceConflictError) return { ok: false, exitCode: EXIT.WORKSPACE_CONFLICT, error: err.toInfo() };
    if (err instanceof ConfigError) return { ok: false, exitCode: EXIT.CONFIG_ERROR, error: err.toInfo() };
    throw err;
  }
}
