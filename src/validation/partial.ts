import type { CudaFlagSet } from "../cuda/classifier.js";
import { indexLinks, indexNodes, isActive, isVirtual, type Workflow, type WorkflowNode } from "../workflow/model.js";
import type { NodeDefinition } from "../workflow/node-definitions.js";
import { bindWidgetValues } from "../workflow/widgets.js";

export type ExclusionReason = "cuda" | "inactive" | "unknown class" | "missing upstream";

export type PartialPlan = {
  included: ReadonlySet<number>;
  excluded: { nodeId: number; classType: string; reason: ExclusionReason }[];
};

/**
 * Whether every required input of `node` can be fed from `kept` nodes or
 * from its own stored widget value.
 */
function isRunnable(
  node: WorkflowNode,
  def: NodeDefinition,
  kept: ReadonlySet<number>,
  sourceOf: (linkId: number) => number | undefined,
): boolean {
  const bound = new Set(bindWidgetValues(node, def).filter((b) => b.present).map((b) => b.spec.name));
  for (const spec of def.inputs) {
    if (!spec.required) continue;
    const input = node.inputs.find((i) => i.name === spec.name);
    const source = input !== undefined && input.link !== null ? sourceOf(input.link) : undefined;
    if (source !== undefined && kept.has(source)) continue;
    if (spec.widget && (bound.has(spec.name) || spec.options.default !== undefined)) continue;
    return false;
  }
  return true;
}

/**
 * The induced subgraph of nodes outside the CUDA flag set, pruned until
 * every kept node's required inputs come from kept nodes.
 */
export function planPartialExecution(
  workflow: Workflow,
  definitions: ReadonlyMap<string, NodeDefinition>,
  cudaFlags: CudaFlagSet,
): PartialPlan {
  const links = indexLinks(workflow);
  const nodes = indexNodes(workflow);
  const excluded: PartialPlan["excluded"] = [];
  const kept = new Set<number>();

  for (const node of workflow.nodes) {
    if (isVirtual(node)) continue;
    const reason: ExclusionReason | null = !isActive(node)
      ? "inactive"
      : !definitions.has(node.classType)
        ? "unknown class"
        : cudaFlags.has(node.classType)
          ? "cuda"
          : null;
    if (reason === null) kept.add(node.id);
    else excluded.push({ nodeId: node.id, classType: node.classType, reason });
  }

  const sourceOf = (linkId: number) => links.get(linkId)?.fromNode;
  let changed = true;
  while (changed) {
    changed = false;
    for (const id of [...kept]) {
      const node = nodes.get(id);
      const def = node ? definitions.get(node.classType) : undefined;
      if (node && def && isRunnable(node, def, kept, sourceOf)) continue;
      kept.delete(id);
      excluded.push({ nodeId: id, classType: node?.classType ?? "", reason: "missing upstream" });
      changed = true;
    }
  }

  excluded.sort((a, b) => a.nodeId - b.nodeId);
  return { included: kept, excluded };
}
