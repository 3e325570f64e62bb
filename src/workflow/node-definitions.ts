import { RegistrationError } from "../core/errors.js";

/** Input types that render as widgets and consume a widget value. */
export const WIDGET_TYPES = new Set(["INT", "FLOAT", "STRING", "BOOLEAN", "COMBO"]);

export type InputSpec = {
  name: string;
  required: boolean;
  /** Declared type; "COMBO" for enum lists. */
  type: string;
  /** Allowed values for enum inputs, null otherwise. */
  choices: readonly unknown[] | null;
  options: Readonly<Record<string, unknown>>;
  /** True when the input is edited in place and stored in widgets_values. */
  widget: boolean;
};

/**
 * Data-only description of a node class as reported by `/object_info`.
 * `raw` keeps the original payload for introspection checks.
 */
export type NodeDefinition = {
  classType: string;
  displayName: string;
  category: string;
  pythonModule: string;
  functionName: string | null;
  inputs: InputSpec[];
  outputs: string[];
  outputNames: string[];
  outputIsList: boolean[];
  outputNode: boolean;
  dependencies: string[];
  raw: unknown;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function stringOr(value: unknown, fallback: string): string {
  return typeof value === "string" ? value : fallback;
}

function isConnectionType(type: string, options: Readonly<Record<string, unknown>>): boolean {
  if (options.forceInput === true) return true;
  if (WIDGET_TYPES.has(type)) return false;
  return type === "*" || /^[A-Z0-9_,*]+$/.test(type);
}

/** Normalize one `[type, options?]` declaration; null when malformed. */
function parseInputSpec(name: string, spec: unknown, required: boolean): InputSpec | null {
  if (!Array.isArray(spec) || spec.length === 0) return null;
  const items: unknown[] = spec;
  const [head, maybeOptions] = items;
  const options: Record<string, unknown> = isRecord(maybeOptions) ? maybeOptions : {};

  if (Array.isArray(head)) {
    return { name, required, type: "COMBO", choices: head, options, widget: options.forceInput !== true };
  }
  if (typeof head !== "string") return null;
  if (head === "COMBO" && Array.isArray(options.options)) {
    return { name, required, type: "COMBO", choices: options.options, options, widget: options.forceInput !== true };
  }
  return { name, required, type: head, choices: null, options, widget: !isConnectionType(head, options) };
}

function parseInputGroup(group: unknown, required: boolean): InputSpec[] {
  if (!isRecord(group)) return [];
  const specs: InputSpec[] = [];
  for (const [name, spec] of Object.entries(group)) {
    const parsed = parseInputSpec(name, spec, required);
    if (parsed) specs.push(parsed);
  }
  return specs;
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.map((v: unknown) => (typeof v === "string" ? v : String(v))) : [];
}

/**
 * Normalize a raw `/object_info` entry. Malformed parts are dropped here and
 * reported by the introspection sub-level, which reads `raw`.
 */
export function normalizeDefinition(classType: string, raw: unknown): NodeDefinition {
  const info = isRecord(raw) ? raw : {};
  const input = isRecord(info.input) ? info.input : {};
  const functionName = typeof info.function === "string" ? info.function : typeof info.name === "string" ? info.name : null;

  return {
    classType,
    displayName: stringOr(info.display_name, classType),
    category: stringOr(info.category, ""),
    pythonModule: stringOr(info.python_module, ""),
    functionName,
    inputs: [...parseInputGroup(input.required, true), ...parseInputGroup(input.optional, false)],
    outputs: stringList(info.output),
    outputNames: stringList(info.output_name),
    outputIsList: Array.isArray(info.output_is_list) ? info.output_is_list.map((v: unknown) => v === true) : [],
    outputNode: info.output_node === true,
    dependencies: [],
    raw,
  };
}

/** Parse the whole `/object_info` payload into class type → definition. */
export function parseObjectInfo(payload: unknown): Map<string, NodeDefinition> {
  if (!isRecord(payload)) {
    throw new RegistrationError("/object_info did not return an object");
  }
  const definitions = new Map<string, NodeDefinition>();
  for (const [classType, raw] of Object.entries(payload)) {
    definitions.set(classType, normalizeDefinition(classType, raw));
  }
  return definitions;
}

/**
 * Class types registered by the extension, identified by the module
 * the host loaded them from (`custom_nodes.<name>` or a submodule).
 */
export function extensionClassTypes(definitions: ReadonlyMap<string, NodeDefinition>, extensionName: string): string[] {
  const prefix = `custom_nodes.${extensionName}`;
  return [...definitions.values()]
    .filter((d) => d.pythonModule === prefix || d.pythonModule.startsWith(`${prefix}.`))
    .map((d) => d.classType)
    .sort();
}

/** Attach dependency closures reported by the host; returns a new map. */
export function withDependencies(
  definitions: ReadonlyMap<string, NodeDefinition>,
  closures: Readonly<Record<string, readonly string[]>>,
): Map<string, NodeDefinition> {
  const result = new Map<string, NodeDefinition>();
  for (const [classType, def] of definitions) {
    const deps = closures[classType];
    result.set(classType, deps ? { ...def, dependencies: [...deps] } : def);
  }
  return result;
}
