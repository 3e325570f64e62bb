/** Run report types. Serialized as run-report.json. */
import type { ErrorInfo } from "../core/errors.js";
import type { LevelName, SkipReason } from "../core/state-machine.js";
import type { Diagnostic } from "./diagnostic.js";
import type { PlatformName, RunnerClass } from "./config.js";

export type LevelStatus = "pending" | "running" | "passed" | "failed" | "skipped";

export type LevelResult = {
  level: LevelName;
  status: LevelStatus;
  /** Pulled in as a prerequisite of a requested level. */
  implicit: boolean;
  startedAt: string | null;
  finishedAt: string | null;
  skipReason: SkipReason | null;
  error: ErrorInfo | null;
  diagnostics: Diagnostic[];
  artifacts: string[];
};

export const SUB_LEVELS = ["schema", "graph", "introspection", "partial_execution"] as const;

export type SubLevelName = (typeof SUB_LEVELS)[number];

export type SubLevelResult = {
  name: SubLevelName;
  status: "passed" | "failed" | "skipped";
  skipReason: string | null;
  error: ErrorInfo | null;
  diagnostics: Diagnostic[];
};

export type ValidationReport = {
  workflow: string;
  file: string;
  runner: RunnerClass;
  passed: boolean;
  subLevels: SubLevelResult[];
};

export type PlatformReport = {
  platform: PlatformName;
  runner: RunnerClass;
  status: "running" | "passed" | "failed";
  finalized: boolean;
  levels: LevelResult[];
  validation: ValidationReport[];
};

export type RunReport = {
  runId: string;
  project: {
    name: string;
    pythonVersion: string;
    comfyuiVersion: string;
    cudaPackages: string[];
  };
  startedAt: string;
  finishedAt: string | null;
  platforms: PlatformReport[];
  success: boolean;
  exitCode: number;
};

/** Outcome a level runner hands back to the pipeline. */
export type LevelOutcome = {
  status: "passed" | "failed";
  error?: ErrorInfo;
  diagnostics: Diagnostic[];
  artifacts: string[];
};
