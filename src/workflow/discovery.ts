import fs from "node:fs";
import path from "node:path";
import { ConfigError } from "../core/errors.js";
import type { RunnerClass, WorkflowSelection, WorkflowsConfig } from "../types/config.js";
import type { WorkflowMeta } from "./model.js";

export const WORKFLOW_DIR = "workflows";

function listCandidates(dir: string): string[] {
  if (!fs.existsSync(dir)) return [];
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((e) => e.isFile() && e.name.endsWith(".json"))
    .map((e) => e.name)
    .sort();
}

/** "workflows/basic.json", "basic.json" and "basic" all name basic.json. */
function normalizeName(entry: string): string {
  const base = path.basename(entry.replace(/\\/g, "/"));
  return base.endsWith(".json") ? base : `${base}.json`;
}

function resolveSelection(selection: WorkflowSelection, candidates: readonly string[], set: RunnerClass): string[] {
  if (selection === "all") return [...candidates];
  const missing: string[] = [];
  const picked: string[] = [];
  for (const entry of selection) {
    const name = normalizeName(entry);
    if (!candidates.includes(name)) missing.push(entry);
    else if (!picked.includes(name)) picked.push(name);
  }
  if (missing.length > 0) {
    throw new ConfigError(`workflows.${set} lists files not found in ${WORKFLOW_DIR}/: ${missing.join(", ")}`);
  }
  return picked;
}

/**
 * Declared workflows with their runner class. A file in both sets goes to
 * the `overlap` class.
 */
export function discoverWorkflows(projectDir: string, config: WorkflowsConfig): WorkflowMeta[] {
  const dir = path.join(projectDir, WORKFLOW_DIR);
  const candidates = listCandidates(dir);
  const cpu = new Set(resolveSelection(config.cpu, candidates, "cpu"));
  const gpu = new Set(resolveSelection(config.gpu, candidates, "gpu"));

  const declared: WorkflowMeta[] = [];
  for (const file of candidates) {
    const inCpu = cpu.has(file);
    const inGpu = gpu.has(file);
    if (!inCpu && !inGpu) continue;
    const runner: RunnerClass = inCpu && inGpu ? config.overlap : inGpu ? "gpu" : "cpu";
    declared.push({ name: file.replace(/\.json$/, ""), file: path.join(dir, file), runner });
  }
  return declared;
}

/** CPU runners take CPU workflows; GPU runners take both sets. */
export function workflowsForRunner(declared: readonly WorkflowMeta[], runner: RunnerClass): WorkflowMeta[] {
  return runner === "gpu" ? [...declared] : declared.filter((w) => w.runner === "cpu");
}
