import type { DeepReadonly } from "../core/freeze.js";
import type { MatrixPlan } from "../core/matrix.js";
import { ALL_LEVELS, type PlannedLevel } from "../core/state-machine.js";
import type { LevelResult, RunReport } from "../types/report.js";

export function levelLabel(result: Pick<LevelResult, "status" | "skipReason">): string {
  switch (result.status) {
    case "passed":
      return "PASS";
    case "failed":
      return "FAIL";
    case "pending":
      return "PENDING";
    case "running":
      return "RUNNING";
    case "skipped":
      switch (result.skipReason) {
        case "skip_workflow":
          return "SKIP";
        case "blocked by failed predecessor":
          return "BLOCKED";
        case "cancelled":
          return "CANCELLED";
        default:
          return "-";
      }
  }
}

function planLabel(planned: PlannedLevel, skipWorkflow: boolean): string {
  if (planned.mode === "not_requested") return "-";
  if (planned.level === "execution" && skipWorkflow) return "SKIP";
  return planned.mode === "implicit" ? "IMPLICIT" : "RUN";
}

/** Left-aligned columns separated by two spaces. */
export function formatColumns(rows: readonly (readonly string[])[]): string {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, cell.length);
    });
  }
  return rows.map((row) => row.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join("  ").trimEnd()).join("\n");
}

const HEADER = ["PLATFORM", ...ALL_LEVELS.map((l) => l.toUpperCase())];

/** Platform × level status grid. */
export function renderStatusTable(report: DeepReadonly<RunReport>): string {
  const rows = report.platforms.map((p) => [
    p.platform,
    ...ALL_LEVELS.map((level) => {
      const result = p.levels.find((l) => l.level === level);
      return result ? levelLabel(result) : "";
    }),
  ]);
  return formatColumns([HEADER, ...rows]);
}

/** One line per failed level: `linux/registration [RegistrationError] message`. */
export function renderFailures(report: DeepReadonly<RunReport>): string[] {
  return report.platforms.flatMap((p) =>
    p.levels
      .filter((l) => l.status === "failed")
      .map((l) => `${p.platform}/${l.level} [${l.error?.kind ?? "unknown"}] ${l.error?.message ?? ""}`.trimEnd()),
  );
}

export function renderPlan(plan: MatrixPlan): string {
  const rows = plan.platforms.map((p) => [
    p.target.name,
    ...p.levels.map((planned) => planLabel(planned, p.target.skipWorkflow)),
  ]);
  const lines = [formatColumns([HEADER, ...rows]), ""];
  for (const p of plan.platforms) {
    const names = p.workflows.map((w) => w.name);
    lines.push(`${p.target.name} (${p.runner}): ${names.length} workflow(s)${names.length > 0 ? `: ${names.join(", ")}` : ""}`);
  }
  return lines.join("\n");
}
