/** Configuration types for `comfy-test.yaml`. */
import type { LevelName } from "../core/state-machine.js";

export const PLATFORM_NAMES = ["linux", "macos", "windows", "windows_portable"] as const;

export type PlatformName = (typeof PLATFORM_NAMES)[number];

export type RunnerClass = "cpu" | "gpu";

/** "all" or an explicit list of workflow file names. */
export type WorkflowSelection = "all" | string[];

export type PlatformSection = {
  enabled?: boolean;
  skip_workflow: boolean;
  comfyui_portable_version?: string;
};

export type WorkflowsConfig = {
  cpu: WorkflowSelection;
  gpu: WorkflowSelection;
  overlap: RunnerClass;
  concurrency: number;
};

export type ValidationConfig = {
  partial_timeout: number;
  on_instantiation_failure: "continue" | "restrict";
};

export type TestConfig = {
  name?: string;
  comfyui_version: string;
  python_version: string;
  levels: "all" | LevelName[];
  timeout: number;
  platforms: Record<PlatformName, boolean>;
  workflows: WorkflowsConfig;
  validation: ValidationConfig;
  linux: PlatformSection;
  macos: PlatformSection;
  windows: PlatformSection;
  windows_portable: PlatformSection;
};

export type PlatformTarget = {
  name: PlatformName;
  enabled: boolean;
  skipWorkflow: boolean;
  /** windows_portable only. */
  portableVersion: string | null;
};

export type Project = {
  readonly name: string;
  readonly projectDir: string;
  readonly pythonVersion: string;
  readonly comfyuiVersion: string;
  readonly cudaPackages: readonly string[];
  /** `[env_vars]` of the root comfy-env.toml. */
  readonly envVars: Readonly<Record<string, string>>;
};
