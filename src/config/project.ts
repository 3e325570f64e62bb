import path from "node:path";
import { findCudaPackages, findEnvVars } from "../cuda/packages.js";
import type { Project, TestConfig } from "../types/config.js";

/** Build the immutable Project for a run from its directory and config. */
export function loadProject(projectDir: string, config: TestConfig): Project {
  const dir = path.resolve(projectDir);
  return Object.freeze({
    name: config.name ?? path.basename(dir),
    projectDir: dir,
    pythonVersion: config.python_version,
    comfyuiVersion: config.comfyui_version,
    cudaPackages: Object.freeze(findCudaPackages(dir)),
    envVars: Object.freeze(findEnvVars(dir)),
  });
}
