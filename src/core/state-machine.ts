import { ConfigError } from "./errors.js";

/**
 * All test levels in execution order.
 */
export const ALL_LEVELS = [
  "syntax",
  "install",
  "registration",
  "instantiation",
  "static_capture",
  "validation",
  "execution",
] as const;

export type LevelName = (typeof ALL_LEVELS)[number];

/**
 * Level each level reads its inputs from. Requesting a level pulls in this
 * chain even when the configuration does not list it.
 */
const PREREQUISITE: Record<LevelName, LevelName | null> = {
  syntax: null,
  install: "syntax",
  registration: "install",
  instantiation: "registration",
  static_capture: "registration",
  validation: "registration",
  execution: "registration",
};

export type LevelMode = "run" | "implicit" | "not_requested";

export type PlannedLevel = { level: LevelName; mode: LevelMode };

export type SkipReason =
  | "not requested"
  | "skip_workflow"
  | "blocked by failed predecessor"
  | "cancelled";

export type GateDecision = { action: "run" } | { action: "skip"; reason: SkipReason };

export function isLevelName(value: string): value is LevelName {
  return (ALL_LEVELS as readonly string[]).includes(value);
}

/** Accepts `REGISTRATION`, `registration` and `static-capture` spellings. */
export function parseLevelName(value: string): LevelName {
  const normalized = value.trim().toLowerCase().replace(/-/g, "_");
  if (!isLevelName(normalized)) {
    throw new ConfigError(`Unknown level '${value}'. Expected one of: ${ALL_LEVELS.join(", ")}`);
  }
  return normalized;
}

/** Contiguous prefix of levels through `until`. */
export function truncateLevels(until: LevelName): LevelName[] {
  return ALL_LEVELS.slice(0, ALL_LEVELS.indexOf(until) + 1);
}

/**
 * Resolve the requested levels into one planned entry per level, in order.
 * `until` (the CLI's `--level`) truncates before dependency resolution, so a
 * level past it is never run.
 */
export function planLevels(requested: "all" | readonly LevelName[], until?: LevelName): PlannedLevel[] {
  const allowed = new Set<LevelName>(until ? truncateLevels(until) : ALL_LEVELS);
  const explicit = new Set<LevelName>((requested === "all" ? ALL_LEVELS : requested).filter((l) => allowed.has(l)));

  const implicit = new Set<LevelName>();
  for (const level of explicit) {
    let prereq = PREREQUISITE[level];
    while (prereq !== null) {
      if (!explicit.has(prereq)) implicit.add(prereq);
      prereq = PREREQUISITE[prereq];
    }
  }

  return ALL_LEVELS.map((level) => ({
    level,
    mode: explicit.has(level) ? "run" : implicit.has(level) ? "implicit" : "not_requested",
  }));
}

/**
 * Pure gate: decide whether a planned level runs given the pipeline's state.
 */
export function gateLevel(
  planned: PlannedLevel,
  state: { blocked: boolean; cancelled: boolean; skipWorkflow: boolean },
): GateDecision {
  if (state.blocked) return { action: "skip", reason: "blocked by failed predecessor" };
  if (state.cancelled) return { action: "skip", reason: "cancelled" };
  if (planned.mode === "not_requested") return { action: "skip", reason: "not requested" };
  if (planned.level === "execution" && state.skipWorkflow) return { action: "skip", reason: "skip_workflow" };
  return { action: "run" };
}

/** Skip reasons that still count as success for the exit code. */
export function isConfiguredSkip(reason: SkipReason | null): boolean {
  return reason === "not requested" || reason === "skip_workflow";
}
