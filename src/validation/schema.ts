import { diag, type Diagnostic } from "../types/diagnostic.js";
import { isVirtual, type Workflow } from "../workflow/model.js";
import type { InputSpec, NodeDefinition } from "../workflow/node-definitions.js";
import { bindWidgetValues } from "../workflow/widgets.js";

function describe(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

function show(value: unknown): string {
  return typeof value === "string" ? `'${value}'` : JSON.stringify(value) ?? String(value);
}

/** Upload widgets accept files that are not in the server's list yet. */
function isUploadWidget(spec: InputSpec): boolean {
  return Object.entries(spec.options).some(([key, v]) => key.endsWith("_upload") && v === true);
}

function checkRange(spec: InputSpec, value: number): string | null {
  const { min, max } = spec.options;
  if (typeof min === "number" && value < min) return `${value} is below minimum ${min}`;
  if (typeof max === "number" && value > max) return `${value} is above maximum ${max}`;
  return null;
}

/** Problem with a single widget value, or null when it fits the spec. */
export function checkWidgetValue(spec: InputSpec, value: unknown): string | null {
  switch (spec.type) {
    case "COMBO": {
      if (isUploadWidget(spec)) return null;
      const choices = spec.choices ?? [];
      if (choices.some((c) => c === value)) return null;
      return `${show(value)} not in allowed values [${choices.map(String).join(", ")}]`;
    }
    case "INT":
      if (typeof value !== "number" || !Number.isInteger(value)) return `expected INT, got ${show(value)}`;
      return checkRange(spec, value);
    case "FLOAT":
      if (typeof value !== "number") return `expected FLOAT, got ${describe(value)}`;
      return checkRange(spec, value);
    case "STRING":
      return typeof value === "string" ? null : `expected STRING, got ${describe(value)}`;
    case "BOOLEAN":
      return typeof value === "boolean" ? null : `expected BOOLEAN, got ${describe(value)}`;
    default:
      return null;
  }
}

/**
 * Schema sub-level: every stored widget value against its input spec.
 */
export function validateSchema(workflow: Workflow, definitions: ReadonlyMap<string, NodeDefinition>): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];

  for (const node of workflow.nodes) {
    if (isVirtual(node)) continue;
    const def = definitions.get(node.classType);
    if (!def) {
      diagnostics.push(
        diag("error", "SCHEMA_UNKNOWN_NODE", `node ${node.id}: unknown node type '${node.classType}'`, {
          nodeId: node.id,
        }),
      );
      continue;
    }

    for (const binding of bindWidgetValues(node, def)) {
      if (!binding.present) continue;
      const problem = checkWidgetValue(binding.spec, binding.value);
      if (problem === null) continue;
      diagnostics.push(
        diag("error", "SCHEMA_WIDGET_VALUE", `node ${node.id} (${node.classType}): ${binding.spec.name}: ${problem}`, {
          nodeId: node.id,
          field: binding.spec.name,
        }),
      );
    }
  }

  return diagnostics;
}
