/** Interfaces between the engine and the systems it drives. */
import type { Logger } from "../logger.js";
import type { PlatformName, Project, RunnerClass } from "../types/config.js";
import type { Workflow } from "../workflow/model.js";
import type { PromptGraph } from "../workflow/prompt.js";

/**
 * Run-scoped context handed to every collaborator call. `env` carries the
 * variables the engine sets for child processes; process.env is never
 * modified.
 */
export type RunScope = {
  platform: PlatformName;
  runner: RunnerClass;
  /** Directory owned exclusively by this platform's pipeline. */
  workspaceDir: string;
  env: Readonly<Record<string, string>>;
  pythonVersion: string;
  comfyuiVersion: string;
  /** windows_portable only. */
  portableVersion: string | null;
  signal: AbortSignal;
  logger: Logger;
};

export type InstalledEnvironment = {
  comfyuiDir: string;
  python: string;
  customNodesDir: string;
  /** `custom_nodes/<name>`; its basename is the extension's import name. */
  extensionDir: string;
  /** Embedded interpreter of the Windows portable build; no virtual environment. */
  portable: boolean;
};

export interface EnvironmentCollaborator {
  /** Clone the host, create the runtime and install the extension. */
  install(scope: RunScope, project: Project): Promise<InstalledEnvironment>;
}

/** A running host server owned by one pipeline. */
export interface HostServer {
  readonly baseUrl: string;
  /** Import failures the server printed while loading custom nodes. */
  importErrors(): string[];
  objectInfo(signal: AbortSignal): Promise<unknown>;
  /** Resolved dependency names per node class, where the host can report them. */
  dependencyClosures(classTypes: readonly string[], signal: AbortSignal): Promise<Record<string, string[]>>;
  stop(): Promise<void>;
}

export type ServerStartOptions = {
  /** CUDA packages to stub out on CPU runners. */
  mockPackages: readonly string[];
};

export interface HostServerCollaborator {
  start(scope: RunScope, environment: InstalledEnvironment, opts: ServerStartOptions): Promise<HostServer>;
}

export type InstantiationReport = {
  instantiated: string[];
  failures: { classType: string; error: string }[];
};

export interface InstantiationCollaborator {
  instantiate(scope: RunScope, environment: InstalledEnvironment, classTypes: readonly string[]): Promise<InstantiationReport>;
}

export interface ScreenshotSession {
  /** Render `workflow` without running it and write the image to `outputPath`. */
  capture(workflow: Workflow, outputPath: string, signal: AbortSignal): Promise<void>;
  close(): Promise<void>;
}

export interface ScreenshotCollaborator {
  /** Null when capture is unavailable on this host. */
  open(scope: RunScope, server: HostServer): Promise<ScreenshotSession | null>;
}

export type ExecutionRequest = {
  prompt: PromptGraph;
  label: string;
  signal: AbortSignal;
  onLog: (line: string) => void;
};

export type ExecutionResult = {
  promptId: string;
  outputs: Record<string, unknown>;
};

export interface ExecutionCollaborator {
  /** Resolves when the prompt has finished; rejects with ExecutionError when it failed. */
  run(scope: RunScope, server: HostServer, request: ExecutionRequest): Promise<ExecutionResult>;
}

export interface PublishCollaborator {
  publish(resultsDir: string, target: { remoteUrl: string; branch: string }): Promise<void>;
}

export type Collaborators = {
  environment: EnvironmentCollaborator;
  server: HostServerCollaborator;
  instantiation: InstantiationCollaborator;
  screenshots: ScreenshotCollaborator;
  execution: ExecutionCollaborator;
};
