import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { ConfigError } from "../core/errors.js";
import { createAjv, formatAjvErrors, type AjvInstance, type AjvValidateFn } from "./ajv.js";

export type SchemaName = "config" | "comfy-env" | "workflow" | "run-report";

export type SchemaEntry = {
  name: string;
  version: string;
  filePath: string;
  schema: unknown;
};

export type SchemaCheck = { valid: true } | { valid: false; errors: string[] };

export const DEFAULT_SCHEMA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../schemas");

/**
 * Schema registry: loads every `*.schema.json` in a directory and compiles
 * validators on first use.
 */
export class SchemaRegistry {
  private readonly entries = new Map<string, SchemaEntry>();
  private readonly validators = new Map<string, AjvValidateFn>();
  private readonly ajv: AjvInstance = createAjv();

  constructor(private readonly schemaDir: string = DEFAULT_SCHEMA_DIR) {
    if (!fs.existsSync(schemaDir)) {
      throw new Error(`Schema directory not found: ${schemaDir}`);
    }

    for (const file of fs.readdirSync(schemaDir).filter((f) => f.endsWith(".schema.json")).sort()) {
      const filePath = path.join(schemaDir, file);
      const schema = JSON.parse(fs.readFileSync(filePath, "utf8")) as Record<string, unknown>;
      // "run-report.schema.json" → "run-report"
      const name = file.replace(/\.schema\.json$/, "");
      this.entries.set(name, { name, version: extractVersion(schema) ?? "1.0.0", filePath, schema });
    }
  }

  get(name: string): SchemaEntry | undefined {
    return this.entries.get(name);
  }

  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  check(name: SchemaName, data: unknown): SchemaCheck {
    const validate = this.validator(name);
    if (validate(data)) return { valid: true };
    return { valid: false, errors: formatAjvErrors(validate.errors) };
  }

  /** Throws ConfigError naming `label` when `data` does not match. */
  assertValid(name: SchemaName, data: unknown, label: string): void {
    const result = this.check(name, data);
    if (!result.valid) {
      throw new ConfigError(`${label} is invalid: ${result.errors.join("; ")}`, {
        details: result.errors.join("\n"),
      });
    }
  }

  private validator(name: string): AjvValidateFn {
    const cached = this.validators.get(name);
    if (cached) return cached;

    const entry = this.entries.get(name);
    if (!entry) {
      throw new Error(`Schema not found: ${name} (in ${this.schemaDir})`);
    }
    const validate = this.ajv.compile(entry.schema);
    this.validators.set(name, validate);
    return validate;
  }
}

/** Version from `$id` (e.g. "urn:comfy-test:config@1.0.0"). */
function extractVersion(schema: Record<string, unknown>): string | null {
  if (typeof schema.$id === "string") {
    const m = /@(\d+\.\d+\.\d+)/.exec(schema.$id);
    if (m) return m[1];
  }
  return null;
}

let shared: SchemaRegistry | null = null;

/** Registry over the bundled schemas directory, created once per process. */
export function schemaRegistry(): SchemaRegistry {
  shared ??= new SchemaRegistry();
  return shared;
}
