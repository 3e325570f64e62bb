import type { InputSpec, NodeDefinition } from "./node-definitions.js";
import type { WorkflowNode } from "./model.js";

/** Values stored after a seed widget by its "control after generate" companion. */
const CONTROL_VALUES = new Set(["fixed", "increment", "decrement", "randomize"]);

export type WidgetBinding = {
  spec: InputSpec;
  value: unknown;
  /** False when the workflow ran out of stored values before this widget. */
  present: boolean;
};

function hasControlCompanion(spec: InputSpec): boolean {
  if (spec.options.control_after_generate === true) return true;
  return spec.type === "INT" && (spec.name === "seed" || spec.name === "noise_seed");
}

/**
 * Pair a node's stored widget values with the widget inputs of its
 * definition: required then optional, in declaration order.
 */
export function bindWidgetValues(node: WorkflowNode, def: NodeDefinition): WidgetBinding[] {
  const widgets = def.inputs.filter((i) => i.widget);
  const stored = node.widgetValues;

  if (!Array.isArray(stored)) {
    return widgets.map((spec) => ({ spec, value: stored[spec.name], present: Object.hasOwn(stored, spec.name) }));
  }

  const bindings: WidgetBinding[] = [];
  let idx = 0;
  for (const spec of widgets) {
    if (idx >= stored.length) {
      bindings.push({ spec, value: undefined, present: false });
      continue;
    }
    bindings.push({ spec, value: stored[idx], present: true });
    idx++;
    const companion = stored[idx];
    if (hasControlCompanion(spec) && typeof companion === "string" && CONTROL_VALUES.has(companion)) idx++;
  }
  return bindings;
}
