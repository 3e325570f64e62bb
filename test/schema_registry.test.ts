import { describe, expect, it } from "vitest";
import path from "node:path";
import { ConfigError } from "../src/core/errors.js";
import { SchemaRegistry, schemaRegistry } from "../src/schema/registry.js";

describe("schema registry", () => {
  it("discovers the bundled schemas", () => {
    expect(schemaRegistry().names()).toEqual(["comfy-env", "config", "run-report", "workflow"]);
  });

  it("reads the version from $id", () => {
    expect(schemaRegistry().get("config")?.version).toBe("1.0.0");
    expect(schemaRegistry().get("missing")).toBeUndefined();
  });

  it("is shared within a process", () => {
    expect(schemaRegistry()).toBe(schemaRegistry());
  });

  it("checks comfy-env documents", () => {
    const registry = schemaRegistry();
    expect(registry.check("comfy-env", { cuda: { packages: ["flash-attn"] } })).toEqual({ valid: true });
    expect(registry.check("comfy-env", { cuda: { packages: "flash-attn" } }).valid).toBe(false);
    expect(registry.check("comfy-env", { env_vars: { DEBUG: true, THREADS: 4 } })).toEqual({ valid: true });
    expect(registry.check("comfy-env", { env_vars: { NESTED: { a: 1 } } }).valid).toBe(false);
  });

  it("throws ConfigError naming the document on assertValid", () => {
    const registry = schemaRegistry();
    expect(() => registry.assertValid("comfy-env", { cuda: { packages: 3 } }, "comfy-env.toml")).toThrow(ConfigError);
    expect(() => registry.assertValid("comfy-env", { cuda: { packages: 3 } }, "comfy-env.toml")).toThrow(
      /^comfy-env\.toml is invalid: /,
    );
  });

  it("fails on a missing schema directory", () => {
    const dir = path.join("/nonexistent", "schemas");
    expect(() => new SchemaRegistry(dir)).toThrow(`Schema directory not found: ${dir}`);
  });
});
