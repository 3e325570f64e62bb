import fs from "node:fs";
import path from "node:path";
import { parse } from "smol-toml";
import { ConfigError } from "../core/errors.js";
import { walkProjectFiles } from "../core/walk.js";
import { schemaRegistry } from "../schema/registry.js";

export const COMFY_ENV_FILE = "comfy-env.toml";

type EnvValue = string | number | boolean;
type ComfyEnvFile = { cuda?: { packages?: string[] }; env_vars?: Record<string, EnvValue> };

function isComfyEnvFile(value: unknown): value is ComfyEnvFile {
  return schemaRegistry().check("comfy-env", value).valid;
}

function readComfyEnv(projectDir: string, rel: string): ComfyEnvFile {
  let parsed: unknown;
  try {
    parsed = parse(fs.readFileSync(path.join(projectDir, rel), "utf8"));
  } catch (err) {
    throw new ConfigError(`Cannot parse ${rel}: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
  }
  if (isComfyEnvFile(parsed)) return parsed;
  schemaRegistry().assertValid("comfy-env", parsed, rel);
  throw new ConfigError(`${rel} is invalid`);
}

/**
 * Declared CUDA-only packages: `[cuda].packages` of every comfy-env.toml in
 * the project, deduplicated in discovery order. Names are returned as import
 * names (`flash-attn` becomes `flash_attn`).
 */
export function findCudaPackages(projectDir: string): string[] {
  const packages: string[] = [];
  for (const rel of walkProjectFiles(projectDir, (name) => name === COMFY_ENV_FILE)) {
    for (const pkg of readComfyEnv(projectDir, rel).cuda?.packages ?? []) {
      const name = pkg.replace(/-/g, "_");
      if (!packages.includes(name)) packages.push(name);
    }
  }
  return packages;
}

/** `[env_vars]` of the root comfy-env.toml, values as strings. */
export function findEnvVars(projectDir: string): Record<string, string> {
  if (!fs.existsSync(path.join(projectDir, COMFY_ENV_FILE))) return {};
  const vars = readComfyEnv(projectDir, COMFY_ENV_FILE).env_vars ?? {};
  return Object.fromEntries(Object.entries(vars).map(([key, value]) => [key, String(value)]));
}
