import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { ConfigError } from "../core/errors.js";
import { deepFreeze } from "../core/freeze.js";
import { parseLevelName } from "../core/state-machine.js";
import type { TestConfig } from "../types/config.js";
import { validateConfig } from "./validator.js";

export const CONFIG_FILE = "comfy-test.yaml";

export const PYTHON_VERSIONS = ["3.10", "3.11", "3.12", "3.13"] as const;

const ENV_PREFIX = "COMFY_TEST_";

const DEFAULTS: Record<string, unknown> = {
  comfyui_version: "latest",
  levels: "all",
  timeout: 3600,
  platforms: { linux: true, macos: true, windows: true, windows_portable: true },
  workflows: { cpu: "all", gpu: [], overlap: "gpu", concurrency: 1 },
  validation: { partial_timeout: 120, on_instantiation_failure: "continue" },
  linux: { skip_workflow: false },
  macos: { skip_workflow: false },
  windows: { skip_workflow: false },
  windows_portable: { skip_workflow: false, comfyui_portable_version: "latest" },
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated; null and undefined leave the base.
 */
function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const current = result[key];
    if (isPlainObject(val) && isPlainObject(current)) {
      result[key] = deepMerge(current, val);
    } else if (val !== undefined && val !== null) {
      result[key] = val;
    }
  }
  return result;
}

function loadYaml(filePath: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = YAML.parse(fs.readFileSync(filePath, "utf8"));
  } catch (err) {
    throw new ConfigError(`Cannot parse ${filePath}: ${err instanceof Error ? err.message : String(err)}`, {
      cause: err,
    });
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`${filePath} must contain a mapping at the top level`);
  }
  return parsed;
}

const ENV_COERCE: Record<string, (raw: string, variable: string) => unknown> = {
  name: (raw) => raw,
  comfyui_version: (raw) => raw,
  python_version: (raw) => raw,
  timeout: (raw, variable) => {
    const n = Number(raw);
    if (raw.trim() === "" || Number.isNaN(n)) {
      throw new ConfigError(`${variable} must be a number of seconds, got '${raw}'`);
    }
    return n;
  },
  levels: (raw) =>
    raw.trim().toLowerCase() === "all"
      ? "all"
      : raw
          .split(",")
          .filter((s) => s.trim() !== "")
          .map((s) => parseLevelName(s)),
};

/**
 * Apply COMFY_TEST_ prefixed overrides for top-level scalar keys.
 * Unrelated COMFY_TEST_ variables (such as COMFY_TEST_GPU) are left alone.
 */
function applyEnvOverrides(config: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const result = { ...config };
  for (const [variable, value] of Object.entries(env)) {
    if (!variable.startsWith(ENV_PREFIX) || value === undefined) continue;
    // COMFY_TEST_COMFYUI_VERSION → comfyui_version
    const key = variable.slice(ENV_PREFIX.length).toLowerCase();
    const coerce = ENV_COERCE[key];
    if (coerce) result[key] = coerce(value, variable);
  }
  return result;
}

export type LoadConfigOptions = {
  projectDir: string;
  /** Explicit path; defaults to `<projectDir>/comfy-test.yaml`. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  /** Source of randomness for the default python version. */
  random?: () => number;
};

/**
 * Load layered config: defaults ← comfy-test.yaml ← COMFY_TEST_* variables.
 * The result is validated and immutable for the run.
 */
export function loadConfig(opts: LoadConfigOptions): TestConfig {
  const filePath = opts.configPath ?? path.join(opts.projectDir, CONFIG_FILE);
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`No ${CONFIG_FILE} found in ${path.dirname(filePath)}. Run 'comfy-test init' to create one.`);
  }

  let merged = deepMerge(DEFAULTS, loadYaml(filePath));
  merged = applyEnvOverrides(merged, opts.env ?? process.env);

  if (merged.python_version === undefined) {
    const random = opts.random ?? Math.random;
    const index = Math.min(PYTHON_VERSIONS.length - 1, Math.floor(random() * PYTHON_VERSIONS.length));
    merged.python_version = PYTHON_VERSIONS[index];
  }

  const config = validateConfig(merged, filePath);
  deepFreeze(config);
  return config;
}
