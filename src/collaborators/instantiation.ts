import type { InstalledEnvironment, InstantiationCollaborator, InstantiationReport, RunScope } from "./types.js";
import { InstantiationError } from "../core/errors.js";
import { runHelperScript } from "./scripts.js";

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function isFailure(value: unknown): value is InstantiationReport["failures"][number] {
  return (
    typeof value === "object" &&
    value !== null &&
    "classType" in value &&
    typeof value.classType === "string" &&
    "error" in value &&
    typeof value.error === "string"
  );
}

export function parseInstantiationReport(value: unknown): InstantiationReport {
  if (typeof value !== "object" || value === null || !("instantiated" in value) || !("failures" in value)) {
    throw new InstantiationError("Instantiation helper returned an unexpected result");
  }
  const { instantiated, failures } = value;
  if (!isStringArray(instantiated) || !Array.isArray(failures) || !failures.every(isFailure)) {
    throw new InstantiationError("Instantiation helper returned an unexpected result");
  }
  return { instantiated, failures };
}

/** Constructs each node class in a fresh interpreter, outside the server. */
export class ScriptInstantiation implements InstantiationCollaborator {
  constructor(private readonly mockPackages: readonly string[] = []) {}

  async instantiate(scope: RunScope, environment: InstalledEnvironment, classTypes: readonly string[]): Promise<InstantiationReport> {
    const result = await runHelperScript(scope, environment, {
      script: "instantiate.py",
      label: "instantiate nodes",
      kind: "InstantiationError",
      classTypes,
      mockPackages: scope.runner === "gpu" ? [] : this.mockPackages,
    });
    return parseInstantiationReport(result);
  }
}
