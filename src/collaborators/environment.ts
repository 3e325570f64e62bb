import fs from "node:fs";
import path from "node:path";
import { simpleGit } from "simple-git";
import { CancelledError, EnvironmentError, TimeoutError } from "../core/errors.js";
import { runProcess } from "../core/process.js";
import type { PlatformName, Project } from "../types/config.js";
import type { EnvironmentCollaborator, InstalledEnvironment, RunScope } from "./types.js";

export const COMFYUI_REPO = "https://github.com/comfyanonymous/ComfyUI.git";
const PYTORCH_CUDA_INDEX = "https://download.pytorch.org/whl/cu128";
const PYPI_INDEX = "https://pypi.org/simple";
const STEP_TIMEOUT_MS = 30 * 60_000;

/** Left behind when the extension is copied into custom_nodes. */
const COPY_EXCLUDE = new Set([".git", "__pycache__", ".venv", ".comfy-test", "node_modules"]);

function copyable(name: string): boolean {
  return !COPY_EXCLUDE.has(name) && !name.startsWith("_env_");
}

/**
 * Run one install step inside the pipeline's scope. Non-zero exit, timeout
 * and abort each map to their own error kind.
 */
export async function runStep(
  scope: RunScope,
  label: string,
  command: string,
  args: readonly string[],
  opts: { cwd: string; env?: Record<string, string>; timeoutMs?: number },
): Promise<string> {
  const timeoutMs = opts.timeoutMs ?? STEP_TIMEOUT_MS;
  scope.logger.info(label, { command });
  const res = await runProcess(command, args, {
    cwd: opts.cwd,
    env: { ...scope.env, ...opts.env },
    signal: scope.signal,
    timeoutMs,
    onLine: (line) => scope.logger.debug(line, { step: label }),
  });
  if (res.aborted) throw new CancelledError(label);
  if (res.timedOut) throw new TimeoutError(label, timeoutMs);
  if (res.error) throw new EnvironmentError(`${label}: ${res.error.message}`, { cause: res.error });
  if (res.exitCode !== 0) {
    throw new EnvironmentError(`${label} failed with exit code ${res.exitCode ?? res.signal ?? "unknown"}`, {
      details: tail(res.stderr || res.stdout),
    });
  }
  return res.stdout;
}

function tail(text: string, lines = 40): string {
  return text.trimEnd().split(/\r?\n/).slice(-lines).join("\n");
}

/** Copy the extension into `custom_nodes/<name>`, replacing an earlier copy. */
export function copyExtension(project: Project, customNodesDir: string): string {
  const target = path.join(customNodesDir, project.name);
  fs.rmSync(target, { recursive: true, force: true });
  fs.cpSync(project.projectDir, target, {
    recursive: true,
    filter: (src) => src === project.projectDir || copyable(path.basename(src)),
  });
  return target;
}

export async function runInstallScript(scope: RunScope, python: string, extensionDir: string): Promise<void> {
  const installScript = path.join(extensionDir, "install.py");
  if (!fs.existsSync(installScript)) return;
  await runStep(scope, "run install.py", python, [installScript], {
    cwd: extensionDir,
    env: { COMFY_ENV_CACHE_DIR: path.join(scope.workspaceDir, ".comfy-env") },
  });
}

/** Routes each platform to its own installer. */
export class PlatformEnvironment implements EnvironmentCollaborator {
  constructor(
    private readonly fallback: EnvironmentCollaborator,
    private readonly byPlatform: Partial<Record<PlatformName, EnvironmentCollaborator>> = {},
  ) {}

  install(scope: RunScope, project: Project): Promise<InstalledEnvironment> {
    return (this.byPlatform[scope.platform] ?? this.fallback).install(scope, project);
  }
}

export function venvPython(venvDir: string): string {
  return process.platform === "win32" ? path.join(venvDir, "Scripts", "python.exe") : path.join(venvDir, "bin", "python");
}

/**
 * Installs ComfyUI into the workspace with uv and copies the extension into
 * `custom_nodes/<name>`.
 */
export class UvEnvironment implements EnvironmentCollaborator {
  async install(scope: RunScope, project: Project): Promise<InstalledEnvironment> {
    const work = scope.workspaceDir;
    const comfyuiDir = path.join(work, "ComfyUI");
    const venvDir = path.join(work, ".venv");
    const python = venvPython(venvDir);

    await runStep(scope, "create virtual environment", "uv", ["venv", venvDir, "--python", scope.pythonVersion], {
      cwd: work,
    });

    fs.rmSync(comfyuiDir, { recursive: true, force: true });
    const cloneArgs = ["--depth", "1", ...(scope.comfyuiVersion === "latest" ? [] : ["--branch", scope.comfyuiVersion])];
    scope.logger.info("cloning ComfyUI", { version: scope.comfyuiVersion });
    try {
      await simpleGit({ baseDir: work, abort: scope.signal }).clone(COMFYUI_REPO, comfyuiDir, cloneArgs);
    } catch (err) {
      if (scope.signal.aborted) throw new CancelledError("clone ComfyUI");
      throw new EnvironmentError(`Could not clone ComfyUI ${scope.comfyuiVersion}`, { cause: err });
    }

    const customNodesDir = path.join(comfyuiDir, "custom_nodes");
    fs.mkdirSync(customNodesDir, { recursive: true });
    await this.pipInstall(scope, python, path.join(comfyuiDir, "requirements.txt"), work);

    const target = copyExtension(project, customNodesDir);
    await this.pipInstall(scope, python, path.join(target, "requirements.txt"), target);
    await runInstallScript(scope, python, target);

    return { comfyuiDir, python, customNodesDir, extensionDir: target, portable: false };
  }

  private async pipInstall(scope: RunScope, python: string, requirements: string, cwd: string): Promise<void> {
    if (!fs.existsSync(requirements)) return;
    const index = scope.runner === "gpu" ? ["--index-url", PYTORCH_CUDA_INDEX, "--extra-index-url", PYPI_INDEX] : [];
    await runStep(
      scope,
      `install ${path.relative(scope.workspaceDir, requirements) || requirements}`,
      "uv",
      ["pip", "install", "--python", python, ...index, "-r", requirements],
      { cwd },
    );
  }
}
