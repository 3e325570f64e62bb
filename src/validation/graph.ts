import { diag, type Diagnostic } from "../types/diagnostic.js";
import { indexLinks, indexNodes, isActive, isVirtual, type Workflow, type WorkflowNode } from "../workflow/model.js";
import type { NodeDefinition } from "../workflow/node-definitions.js";
import { bindWidgetValues } from "../workflow/widgets.js";

function splitTypes(type: string): string[] {
  return type
    .split(",")
    .map((t) => t.trim())
    .filter((t) => t !== "");
}

/** `*` matches anything; comma-separated types match any member. */
export function typesCompatible(outputType: string, inputType: string): boolean {
  if (outputType === "*" || inputType === "*") return true;
  const accepted = splitTypes(inputType);
  return splitTypes(outputType).some((t) => accepted.includes(t));
}

function label(node: WorkflowNode): string {
  return `node ${node.id} (${node.classType})`;
}

function checkLinks(
  workflow: Workflow,
  nodes: ReadonlyMap<number, WorkflowNode>,
  definitions: ReadonlyMap<string, NodeDefinition>,
): Diagnostic[] {
  const out: Diagnostic[] = [];
  for (const link of workflow.links) {
    const from = nodes.get(link.fromNode);
    const to = nodes.get(link.toNode);
    if (!from) {
      out.push(
        diag("error", "GRAPH_MISSING_NODE", `link ${link.id}: source node ${link.fromNode} does not exist`, {
          nodeId: link.fromNode,
        }),
      );
    }
    if (!to) {
      out.push(
        diag("error", "GRAPH_MISSING_NODE", `link ${link.id}: target node ${link.toNode} does not exist`, {
          nodeId: link.toNode,
        }),
      );
    }
    if (!from || !to) continue;

    const fromDef = definitions.get(from.classType);
    const outputType = fromDef?.outputs[link.fromSlot];
    if (fromDef && outputType === undefined) {
      out.push(
        diag("error", "GRAPH_BAD_SLOT", `link ${link.id}: output slot ${link.fromSlot} does not exist on ${label(from)}`, {
          nodeId: from.id,
        }),
      );
    }
    const input = to.inputs[link.toSlot];
    if (input === undefined) {
      out.push(
        diag("error", "GRAPH_BAD_SLOT", `link ${link.id}: input slot ${link.toSlot} does not exist on ${label(to)}`, {
          nodeId: to.id,
        }),
      );
    }
    if (outputType !== undefined && input !== undefined && !typesCompatible(outputType, input.type)) {
      out.push(
        diag(
          "error",
          "GRAPH_TYPE_MISMATCH",
          `link ${link.id}: ${outputType} output of ${label(from)} cannot feed ${input.type} input '${input.name}' of ${label(to)}`,
          { nodeId: to.id, field: input.name },
        ),
      );
    }
  }
  return out;
}

function checkRequiredInputs(
  workflow: Workflow,
  definitions: ReadonlyMap<string, NodeDefinition>,
  linkIds: ReadonlySet<number>,
): Diagnostic[] {
  const out: Diagnostic[] = [];
  for (const node of workflow.nodes) {
    if (!isActive(node) || isVirtual(node)) continue;
    const def = definitions.get(node.classType);
    if (!def) continue;

    const linked = new Set(
      node.inputs.filter((i) => i.link !== null && linkIds.has(i.link)).map((i) => i.name),
    );
    const bound = new Set(bindWidgetValues(node, def).filter((b) => b.present).map((b) => b.spec.name));

    for (const spec of def.inputs) {
      if (!spec.required || linked.has(spec.name)) continue;
      if (!spec.widget) {
        out.push(
          diag("error", "GRAPH_REQUIRED_INPUT", `${label(node)}: required input '${spec.name}' is not connected`, {
            nodeId: node.id,
            field: spec.name,
          }),
        );
      } else if (!bound.has(spec.name) && spec.options.default === undefined) {
        out.push(
          diag("error", "GRAPH_REQUIRED_INPUT", `${label(node)}: required input '${spec.name}' has no value`, {
            nodeId: node.id,
            field: spec.name,
          }),
        );
      }
    }
  }
  return out;
}

/** Node ids left over after Kahn's algorithm, i.e. on or behind a cycle. */
export function findCycleNodes(workflow: Workflow): number[] {
  const nodes = indexNodes(workflow);
  const indegree = new Map<number, number>([...nodes.keys()].map((id) => [id, 0]));
  const edges = new Map<number, number[]>();
  for (const link of workflow.links) {
    if (!nodes.has(link.fromNode) || !nodes.has(link.toNode)) continue;
    edges.set(link.fromNode, [...(edges.get(link.fromNode) ?? []), link.toNode]);
    indegree.set(link.toNode, (indegree.get(link.toNode) ?? 0) + 1);
  }

  const queue = [...indegree].filter(([, d]) => d === 0).map(([id]) => id);
  while (queue.length > 0) {
    const id = queue.shift();
    if (id === undefined) break;
    indegree.delete(id);
    for (const next of edges.get(id) ?? []) {
      const d = (indegree.get(next) ?? 0) - 1;
      indegree.set(next, d);
      if (d === 0) queue.push(next);
    }
  }
  return [...indegree.keys()].sort((a, b) => a - b);
}

/**
 * Graph sub-level: link endpoints and slots, type compatibility, required
 * inputs and acyclicity.
 */
export function validateGraph(workflow: Workflow, definitions: ReadonlyMap<string, NodeDefinition>): Diagnostic[] {
  const nodes = indexNodes(workflow);
  const diagnostics: Diagnostic[] = [];

  const seen = new Set<number>();
  for (const node of workflow.nodes) {
    if (seen.has(node.id)) {
      diagnostics.push(diag("error", "GRAPH_DUPLICATE_NODE", `node id ${node.id} is used more than once`, { nodeId: node.id }));
    }
    seen.add(node.id);
    if (isActive(node) && !isVirtual(node) && !definitions.has(node.classType)) {
      diagnostics.push(
        diag("error", "GRAPH_UNKNOWN_CLASS", `${label(node)}: class type is not registered`, { nodeId: node.id }),
      );
    }
  }

  diagnostics.push(...checkLinks(workflow, nodes, definitions));
  diagnostics.push(...checkRequiredInputs(workflow, definitions, new Set(indexLinks(workflow).keys())));

  const cycle = findCycleNodes(workflow);
  if (cycle.length > 0) {
    diagnostics.push(
      diag("error", "GRAPH_CYCLE", `cycle detected among nodes ${cycle.join(", ")}`, { details: { nodes: cycle } }),
    );
  }
  return diagnostics;
}
