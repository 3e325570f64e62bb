import type { NodeDefinition } from "./node-definitions.js";
import { indexLinks, isActive, isVirtual, type Workflow } from "./model.js";
import { bindWidgetValues } from "./widgets.js";

/** A link in API format: [source node id, output slot]. */
export type PromptLink = [string, number];

export type PromptNode = {
  class_type: string;
  inputs: Record<string, unknown>;
  _meta?: { title: string };
};

/** The `/prompt` API graph, keyed by node id. */
export type PromptGraph = Record<string, PromptNode>;

/**
 * Convert a litegraph workflow into the API prompt format. `include`
 * restricts the graph to a node subset; links from nodes outside it are
 * dropped. Muted, bypassed and annotation nodes never appear.
 */
export function toPrompt(
  workflow: Workflow,
  definitions: ReadonlyMap<string, NodeDefinition>,
  include?: ReadonlySet<number>,
): PromptGraph {
  const links = indexLinks(workflow);
  const selected = workflow.nodes.filter(
    (n) => isActive(n) && !isVirtual(n) && (include === undefined || include.has(n.id)),
  );
  const selectedIds = new Set(selected.map((n) => n.id));
  const prompt: PromptGraph = {};

  for (const node of selected) {
    const inputs: Record<string, unknown> = {};
    const def = definitions.get(node.classType);
    if (def) {
      for (const binding of bindWidgetValues(node, def)) {
        if (binding.present) inputs[binding.spec.name] = binding.value;
      }
    }
    for (const input of node.inputs) {
      if (input.link === null) continue;
      const link = links.get(input.link);
      if (!link || !selectedIds.has(link.fromNode)) continue;
      const ref: PromptLink = [String(link.fromNode), link.fromSlot];
      inputs[input.name] = ref;
    }
    prompt[String(node.id)] = {
      class_type: node.classType,
      inputs,
      ...(node.title !== null ? { _meta: { title: node.title } } : {}),
    };
  }
  return prompt;
}
