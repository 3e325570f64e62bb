import fs from "node:fs";
import { ValidationError } from "../core/errors.js";
import { schemaRegistry } from "../schema/registry.js";
import type { RunnerClass } from "../types/config.js";

export type WorkflowInput = { name: string; type: string; link: number | null };

export type WorkflowOutput = { name: string; type: string; links: number[] };

export type WorkflowNode = {
  id: number;
  classType: string;
  title: string | null;
  /** Litegraph mode: 0 always, 2 muted, 4 bypassed. */
  mode: number;
  inputs: WorkflowInput[];
  outputs: WorkflowOutput[];
  widgetValues: unknown[] | Record<string, unknown>;
};

export type WorkflowLink = {
  id: number;
  fromNode: number;
  fromSlot: number;
  toNode: number;
  toSlot: number;
  type: string;
};

export type Workflow = {
  name: string;
  file: string;
  runner: RunnerClass;
  nodes: WorkflowNode[];
  links: WorkflowLink[];
};

export type WorkflowMeta = Pick<Workflow, "name" | "file" | "runner">;

const MODE_MUTED = 2;
const MODE_BYPASSED = 4;

/** Frontend-only annotations that never reach the server. */
const VIRTUAL_NODE_TYPES = new Set(["Note", "MarkdownNote"]);

type RawNode = {
  id: number;
  type: string;
  mode?: number;
  title?: string;
  inputs?: { name: string; type?: string; link?: number | null }[];
  outputs?: { name?: string; type?: string; links?: number[] | null }[];
  widgets_values?: unknown[] | Record<string, unknown>;
};

type RawLink =
  | unknown[]
  | { id: number; origin_id: number; origin_slot: number; target_id: number; target_slot: number; type?: string };

type RawWorkflow = { nodes: RawNode[]; links?: RawLink[] };

function isRawWorkflow(value: unknown): value is RawWorkflow {
  return schemaRegistry().check("workflow", value).valid;
}

export function isActive(node: WorkflowNode): boolean {
  return node.mode !== MODE_MUTED && node.mode !== MODE_BYPASSED;
}

export function isVirtual(node: WorkflowNode): boolean {
  return VIRTUAL_NODE_TYPES.has(node.classType);
}

function parseLink(raw: RawLink, index: number, name: string): WorkflowLink {
  if (!Array.isArray(raw)) {
    return {
      id: raw.id,
      fromNode: raw.origin_id,
      fromSlot: raw.origin_slot,
      toNode: raw.target_id,
      toSlot: raw.target_slot,
      type: raw.type ?? "*",
    };
  }
  const [id, fromNode, fromSlot, toNode, toSlot, type] = raw;
  const ints = [id, fromNode, fromSlot, toNode, toSlot];
  if (!ints.every((v): v is number => typeof v === "number" && Number.isInteger(v))) {
    throw new ValidationError("Schema", `${name}: link #${index} is not [id, from, fromSlot, to, toSlot, type]`);
  }
  return {
    id: ints[0],
    fromNode: ints[1],
    fromSlot: ints[2],
    toNode: ints[3],
    toSlot: ints[4],
    type: typeof type === "string" ? type : "*",
  };
}

/**
 * Parse a litegraph workflow document. Structural problems raise
 * ValidationError.Schema.
 */
export function parseWorkflow(raw: unknown, meta: WorkflowMeta): Workflow {
  if (!isRawWorkflow(raw)) {
    const check = schemaRegistry().check("workflow", raw);
    const errors = check.valid ? [] : check.errors;
    throw new ValidationError("Schema", `${meta.name}: not a litegraph workflow: ${errors.join("; ")}`, {
      details: errors.join("\n"),
    });
  }

  const nodes = raw.nodes.map(
    (n): WorkflowNode => ({
      id: n.id,
      classType: n.type,
      title: n.title ?? null,
      mode: n.mode ?? 0,
      inputs: (n.inputs ?? []).map((i) => ({ name: i.name, type: i.type ?? "*", link: i.link ?? null })),
      outputs: (n.outputs ?? []).map((o, slot) => ({
        name: o.name ?? `output_${slot}`,
        type: o.type ?? "*",
        links: o.links ?? [],
      })),
      widgetValues: n.widgets_values ?? [],
    }),
  );

  return {
    ...meta,
    nodes,
    links: (raw.links ?? []).map((l, i) => parseLink(l, i, meta.name)),
  };
}

export function readWorkflowFile(filePath: string, meta: WorkflowMeta): Workflow {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (err) {
    throw new ValidationError("Schema", `${meta.name}: invalid JSON: ${err instanceof Error ? err.message : String(err)}`, {
      cause: err,
    });
  }
  return parseWorkflow(raw, meta);
}

/** Index helpers shared by the validators and the prompt builder. */
export function indexNodes(workflow: Workflow): Map<number, WorkflowNode> {
  return new Map(workflow.nodes.map((n) => [n.id, n]));
}

export function indexLinks(workflow: Workflow): Map<number, WorkflowLink> {
  return new Map(workflow.links.map((l) => [l.id, l]));
}
