import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { ConfigError, ValidationError } from "../src/core/errors.js";
import { discoverWorkflows, workflowsForRunner } from "../src/workflow/discovery.js";
import { readWorkflowFile } from "../src/workflow/model.js";
import { extensionClassTypes, normalizeDefinition, parseObjectInfo } from "../src/workflow/node-definitions.js";
import { toPrompt } from "../src/workflow/prompt.js";
import { bindWidgetValues } from "../src/workflow/widgets.js";
import { EXTENSION, basicDocument, definitions, makeTempDir, objectInfo, workflowFrom, writeFiles } from "./stubs/fixtures.js";

describe("workflow parsing", () => {
  it("reads litegraph nodes and array links", () => {
    const workflow = workflowFrom(basicDocument());
    expect(workflow.nodes.map((n) => `${n.id}:${n.classType}`)).toEqual(["1:ExampleLoader", "2:ExampleBlur", "3:SaveImage"]);
    expect(workflow.nodes[1]?.inputs).toEqual([{ name: "image", type: "IMAGE", link: 1 }]);
    expect(workflow.links[0]).toEqual({ id: 1, fromNode: 1, fromSlot: 0, toNode: 2, toSlot: 0, type: "IMAGE" });
  });

  it("reads object links and defaults a missing type to *", () => {
    const doc = {
      nodes: [{ id: 1, type: "ExampleLoader" }],
      links: [{ id: 4, origin_id: 1, origin_slot: 0, target_id: 2, target_slot: 0 }],
    };
    expect(workflowFrom(doc).links).toEqual([{ id: 4, fromNode: 1, fromSlot: 0, toNode: 2, toSlot: 0, type: "*" }]);
  });

  it("rejects an array link with non-integer endpoints", () => {
    const doc = { nodes: [], links: [[1, "a", 0, 2, 0]] };
    expect(() => workflowFrom(doc)).toThrow(ValidationError);
    expect(() => workflowFrom(doc)).toThrow("basic: link #0 is not [id, from, fromSlot, to, toSlot, type]");
  });

  it("rejects a document without nodes", () => {
    expect(() => workflowFrom({ links: [] })).toThrow(/^basic: not a litegraph workflow: /);
  });

  it("reports unparseable JSON as a schema problem", () => {
    const dir = makeTempDir("comfy-wf-");
    try {
      const file = path.join(dir, "broken.json");
      fs.writeFileSync(file, "{ nodes: ");
      expect(() => readWorkflowFile(file, { name: "broken", file, runner: "cpu" })).toThrow(/^broken: invalid JSON: /);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe("node definitions", () => {
  it("separates connection inputs from widgets", () => {
    const blur = definitions().get("ExampleBlur");
    expect(blur?.inputs.map((i) => `${i.name}:${i.type}:${i.widget}`)).toEqual(["image:IMAGE:false", "radius:INT:true"]);
    expect(blur?.functionName).toBe("blur");
  });

  it("recognises combo lists and forced inputs", () => {
    const def = normalizeDefinition("Picker", {
      input: {
        required: { mode: [["fast", "slow"]], steps: ["INT", { forceInput: true }] },
        optional: { scheduler: ["COMBO", { options: ["a", "b"] }] },
      },
      output: [],
      name: "Picker",
    });
    expect(def.inputs.map((i) => `${i.name}:${i.type}:${i.required}:${i.widget}`)).toEqual([
      "mode:COMBO:true:true",
      "steps:INT:true:false",
      "scheduler:COMBO:false:true",
    ]);
    expect(def.inputs[0]?.choices).toEqual(["fast", "slow"]);
    expect(def.functionName).toBe("Picker");
  });

  it("identifies the extension's nodes by module", () => {
    const info = {
      ...objectInfo(),
      OtherNode: { input: {}, output: [], python_module: `custom_nodes.${EXTENSION}-Extra`, function: "run" },
    };
    expect(extensionClassTypes(parseObjectInfo(info), EXTENSION)).toEqual(["ExampleBlur", "ExampleLoader", "FlashUpscale"]);
  });

  it("rejects an /object_info payload that is not an object", () => {
    expect(() => parseObjectInfo(["SaveImage"])).toThrow("/object_info did not return an object");
  });
});

describe("widget binding", () => {
  const sampler = normalizeDefinition("Sampler", {
    input: { required: { model: ["MODEL"], seed: ["INT"], steps: ["INT", { default: 20 }] } },
    output: ["LATENT"],
    python_module: "nodes",
    function: "sample",
  });

  it("skips the control value stored after a seed", () => {
    const node = workflowFrom({ nodes: [{ id: 1, type: "Sampler", widgets_values: [42, "randomize", 30] }] }).nodes[0];
    if (!node) throw new Error("node missing");
    expect(bindWidgetValues(node, sampler).map((b) => [b.spec.name, b.value, b.present])).toEqual([
      ["seed", 42, true],
      ["steps", 30, true],
    ]);
  });

  it("marks widgets past the stored values as absent", () => {
    const node = workflowFrom({ nodes: [{ id: 1, type: "Sampler", widgets_values: [7] }] }).nodes[0];
    if (!node) throw new Error("node missing");
    expect(bindWidgetValues(node, sampler).map((b) => b.present)).toEqual([true, false]);
  });

  it("binds object-form values by name", () => {
    const node = workflowFrom({ nodes: [{ id: 1, type: "Sampler", widgets_values: { steps: 12 } }] }).nodes[0];
    if (!node) throw new Error("node missing");
    expect(bindWidgetValues(node, sampler).map((b) => [b.spec.name, b.value, b.present])).toEqual([
      ["seed", undefined, false],
      ["steps", 12, true],
    ]);
  });
});

describe("prompt conversion", () => {
  it("restricts the prompt to included nodes and drops dangling links", () => {
    const prompt = toPrompt(workflowFrom(basicDocument()), definitions(), new Set([1, 2]));
    expect(prompt).toEqual({
      "1": { class_type: "ExampleLoader", inputs: { path: "input.png" } },
      "2": { class_type: "ExampleBlur", inputs: { radius: 5, image: ["1", 0] } },
    });
  });

  it("omits muted and annotation nodes and keeps titles", () => {
    const doc = basicDocument();
    const nodes = doc.nodes;
    const workflow = workflowFrom({
      ...doc,
      nodes: [
        { ...nodes[0], title: "Source" },
        { ...nodes[1], mode: 2 },
        nodes[2],
        { id: 9, type: "Note", widgets_values: ["remember"] },
      ],
    });
    const prompt = toPrompt(workflow, definitions());
    expect(Object.keys(prompt)).toEqual(["1", "3"]);
    expect(prompt["1"]?._meta).toEqual({ title: "Source" });
    expect(prompt["3"]?.inputs).toEqual({ filename_prefix: "out" });
  });
});

describe("workflow discovery", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir("comfy-discover-");
    writeFiles(dir, { "workflows/basic.json": "{}", "workflows/upscale.json": "{}", "workflows/readme.txt": "" });
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("assigns files in both sets to the overlap class", () => {
    const declared = discoverWorkflows(dir, { cpu: "all", gpu: ["upscale"], overlap: "gpu", concurrency: 1 });
    expect(declared.map((w) => `${w.name}:${w.runner}`)).toEqual(["basic:cpu", "upscale:gpu"]);
    expect(declared[0]?.file).toBe(path.join(dir, "workflows", "basic.json"));

    const cpuOverlap = discoverWorkflows(dir, { cpu: "all", gpu: ["upscale.json"], overlap: "cpu", concurrency: 1 });
    expect(cpuOverlap.map((w) => w.runner)).toEqual(["cpu", "cpu"]);
  });

  it("rejects names that are not in workflows/", () => {
    expect(() => discoverWorkflows(dir, { cpu: ["ghost"], gpu: [], overlap: "gpu", concurrency: 1 })).toThrow(ConfigError);
    expect(() => discoverWorkflows(dir, { cpu: ["ghost"], gpu: [], overlap: "gpu", concurrency: 1 })).toThrow(
      "workflows.cpu lists files not found in workflows/: ghost",
    );
  });

  it("hands GPU runners both sets", () => {
    const declared = discoverWorkflows(dir, { cpu: ["workflows/basic.json"], gpu: ["upscale"], overlap: "gpu", concurrency: 1 });
    expect(workflowsForRunner(declared, "cpu").map((w) => w.name)).toEqual(["basic"]);
    expect(workflowsForRunner(declared, "gpu").map((w) => w.name)).toEqual(["basic", "upscale"]);
  });
});
