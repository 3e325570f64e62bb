import { diag, type Diagnostic } from "../types/diagnostic.js";
import type { NodeDefinition } from "../workflow/node-definitions.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isWellFormedSpec(spec: unknown): boolean {
  if (!Array.isArray(spec) || spec.length === 0) return false;
  const head: unknown = spec[0];
  return typeof head === "string" || Array.isArray(head);
}

function inspectInputs(classType: string, input: unknown): Diagnostic[] {
  const problems: Diagnostic[] = [];
  const fail = (message: string) =>
    problems.push(diag("error", "INTROSPECTION_INPUT", `${classType}: ${message}`, { details: { classType } }));

  if (!isRecord(input)) {
    fail("input declaration is missing or not an object");
    return problems;
  }
  for (const group of ["required", "optional"] as const) {
    const specs = input[group];
    if (specs === undefined) continue;
    if (!isRecord(specs)) {
      fail(`input.${group} is not an object`);
      continue;
    }
    for (const [name, spec] of Object.entries(specs)) {
      if (!isWellFormedSpec(spec)) fail(`input '${name}' has a malformed spec`);
    }
  }
  return problems;
}

function inspectOutputs(classType: string, info: Record<string, unknown>): Diagnostic[] {
  const problems: Diagnostic[] = [];
  const fail = (message: string) =>
    problems.push(diag("error", "INTROSPECTION_OUTPUT", `${classType}: ${message}`, { details: { classType } }));

  const output = info.output;
  if (!Array.isArray(output)) {
    fail("output is not a list");
    return problems;
  }
  for (const key of ["output_name", "output_is_list"] as const) {
    const value = info[key];
    if (value === undefined) continue;
    if (!Array.isArray(value)) {
      fail(`${key} is not a list`);
    } else if (value.length !== output.length) {
      fail(`${key} has ${value.length} entries but output declares ${output.length}`);
    }
  }
  return problems;
}

/** One definition's structural problems. */
export function inspectDefinition(def: NodeDefinition): Diagnostic[] {
  if (!isRecord(def.raw)) {
    return [
      diag("error", "INTROSPECTION_MALFORMED", `${def.classType}: definition is not an object`, {
        details: { classType: def.classType },
      }),
    ];
  }

  const problems = [...inspectInputs(def.classType, def.raw.input), ...inspectOutputs(def.classType, def.raw)];
  if (def.pythonModule === "" || def.functionName === null || def.functionName === "") {
    problems.push(
      diag("error", "INTROSPECTION_ENTRY_POINT", `${def.classType}: entry point is not resolvable (python_module or name missing)`, {
        details: { classType: def.classType },
      }),
    );
  }
  return problems;
}

/**
 * Introspection sub-level over the given class types. Unknown class types are
 * reported by the schema sub-level and skipped here.
 */
export function validateIntrospection(
  classTypes: Iterable<string>,
  definitions: ReadonlyMap<string, NodeDefinition>,
): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  for (const classType of [...new Set(classTypes)].sort()) {
    const def = definitions.get(classType);
    if (def) diagnostics.push(...inspectDefinition(def));
  }
  return diagnostics;
}
