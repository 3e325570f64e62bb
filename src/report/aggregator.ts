import { EXIT } from "../commands/exit-codes.js";
import type { ErrorInfo } from "../core/errors.js";
import { deepFreeze, type DeepReadonly } from "../core/freeze.js";
import { ALL_LEVELS, isConfiguredSkip, type LevelName, type SkipReason } from "../core/state-machine.js";
import { PLATFORM_NAMES, type PlatformName, type Project, type RunnerClass } from "../types/config.js";
import type { Diagnostic } from "../types/diagnostic.js";
import type { LevelResult, PlatformReport, RunReport, ValidationReport } from "../types/report.js";
import { stableStringify } from "./serialize.js";

export type LevelTermination =
  | { status: "passed" | "failed"; error?: ErrorInfo; diagnostics?: Diagnostic[]; artifacts?: string[] }
  | { status: "skipped"; skipReason: SkipReason };

/** Every level passed or was skipped by configuration. */
export function platformSucceeded(platform: Pick<PlatformReport, "levels">): boolean {
  return platform.levels.every(
    (l) => l.status === "passed" || (l.status === "skipped" && isConfiguredSkip(l.skipReason)),
  );
}

/**
 * Result Aggregator: receives pipeline events and owns the RunReport.
 * A platform's subtree is frozen once `platformFinished` is called; later
 * events for it are rejected.
 */
export class ResultAggregator {
  private readonly platforms = new Map<PlatformName, PlatformReport>();
  private readonly startedAt: string;
  private finishedAt: string | null = null;
  private cancelled = false;

  constructor(
    private readonly runId: string,
    private readonly project: Project,
    private readonly clock: () => Date = () => new Date(),
  ) {
    this.startedAt = clock().toISOString();
  }

  platformStarted(platform: PlatformName, runner: RunnerClass): void {
    if (this.platforms.has(platform)) {
      throw new Error(`Platform ${platform} already started`);
    }
    this.platforms.set(platform, { platform, runner, status: "running", finalized: false, levels: [], validation: [] });
  }

  /** Create the pending result when the pipeline reaches `level`. */
  levelReached(platform: PlatformName, level: LevelName, implicit: boolean): void {
    const report = this.open(platform);
    if (report.levels.some((l) => l.level === level)) {
      throw new Error(`Level ${level} on ${platform} was already reached`);
    }
    report.levels.push({
      level,
      status: "pending",
      implicit,
      startedAt: null,
      finishedAt: null,
      skipReason: null,
      error: null,
      diagnostics: [],
      artifacts: [],
    });
  }

  levelStarted(platform: PlatformName, level: LevelName): void {
    const result = this.level(platform, level);
    if (result.status !== "pending") {
      throw new Error(`Level ${level} on ${platform} cannot start from ${result.status}`);
    }
    result.status = "running";
    result.startedAt = this.clock().toISOString();
  }

  /** The single terminal transition of a level. */
  levelFinished(platform: PlatformName, level: LevelName, termination: LevelTermination): void {
    const result = this.level(platform, level);
    if (result.status !== "pending" && result.status !== "running") {
      throw new Error(`Level ${level} on ${platform} already finished as ${result.status}`);
    }
    result.finishedAt = this.clock().toISOString();
    if (termination.status === "skipped") {
      result.status = "skipped";
      result.skipReason = termination.skipReason;
      return;
    }
    result.status = termination.status;
    result.error = termination.error ?? null;
    result.diagnostics = termination.diagnostics ?? [];
    result.artifacts = termination.artifacts ?? [];
  }

  validationReported(platform: PlatformName, report: ValidationReport): void {
    const target = this.open(platform);
    if (target.validation.some((v) => v.workflow === report.workflow)) {
      throw new Error(`Validation of ${report.workflow} on ${platform} was already reported`);
    }
    target.validation.push(structuredClone(report));
  }

  platformFinished(platform: PlatformName): void {
    const report = this.open(platform);
    const unfinished = report.levels.filter((l) => l.status === "pending" || l.status === "running");
    if (unfinished.length > 0) {
      throw new Error(`Platform ${platform} finished with open levels: ${unfinished.map((l) => l.level).join(", ")}`);
    }
    report.status = platformSucceeded(report) ? "passed" : "failed";
    report.finalized = true;
    deepFreeze(report);
  }

  /** Stamp the finish time. A cancelled run reports exit code 130 whatever the levels say. */
  complete(opts: { cancelled?: boolean } = {}): void {
    this.finishedAt ??= this.clock().toISOString();
    if (opts.cancelled) this.cancelled = true;
  }

  success(): boolean {
    const reports = [...this.platforms.values()];
    return reports.length > 0 && reports.every((r) => r.finalized && platformSucceeded(r));
  }

  /** Deep-frozen copy in canonical platform, level and workflow order. */
  snapshot(): DeepReadonly<RunReport> {
    const platforms = PLATFORM_NAMES.flatMap((name) => {
      const report = this.platforms.get(name);
      if (!report) return [];
      const copy = structuredClone(report);
      copy.levels.sort((a, b) => ALL_LEVELS.indexOf(a.level) - ALL_LEVELS.indexOf(b.level));
      copy.validation.sort((a, b) => (a.workflow < b.workflow ? -1 : a.workflow > b.workflow ? 1 : 0));
      return [copy];
    });
    const success = this.success() && !this.cancelled;
    const report: RunReport = {
      runId: this.runId,
      project: {
        name: this.project.name,
        pythonVersion: this.project.pythonVersion,
        comfyuiVersion: this.project.comfyuiVersion,
        cudaPackages: [...this.project.cudaPackages],
      },
      startedAt: this.startedAt,
      finishedAt: this.finishedAt,
      platforms,
      success,
      exitCode: this.cancelled ? EXIT.CANCELLED : success ? EXIT.SUCCESS : EXIT.LEVEL_FAILED,
    };
    return deepFreeze(report);
  }

  serialize(): string {
    return stableStringify(this.snapshot());
  }

  private open(platform: PlatformName): PlatformReport {
    const report = this.platforms.get(platform);
    if (!report) throw new Error(`Platform ${platform} was never started`);
    if (report.finalized) throw new Error(`Platform ${platform} is finalized`);
    return report;
  }

  private level(platform: PlatformName, level: LevelName): LevelResult {
    const result = this.open(platform).levels.find((l) => l.level === level);
    if (!result) throw new Error(`Level ${level} on ${platform} was never reached`);
    return result;
  }
}
