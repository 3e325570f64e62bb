import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { parseWorkflow, type Workflow } from "../../src/workflow/model.js";
import { parseObjectInfo, type NodeDefinition } from "../../src/workflow/node-definitions.js";
import type { RunnerClass } from "../../src/types/config.js";

export const EXTENSION = "ComfyUI-Example";
const MODULE = `custom_nodes.${EXTENSION}`;

export function makeTempDir(prefix = "comfy-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function writeFiles(root: string, files: Record<string, string>): void {
  for (const [rel, content] of Object.entries(files)) {
    const filePath = path.join(root, rel);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content, "utf8");
  }
}

/** `/object_info` payload: three extension nodes and one core node. */
export function objectInfo(): Record<string, unknown> {
  return {
    ExampleLoader: {
      input: { required: { path: ["STRING", { default: "input.png" }] } },
      output: ["IMAGE"],
      output_name: ["IMAGE"],
      output_is_list: [false],
      name: "ExampleLoader",
      display_name: "Example Loader",
      category: "example",
      python_module: MODULE,
      function: "load",
      output_node: false,
    },
    ExampleBlur: {
      input: { required: { image: ["IMAGE"], radius: ["INT", { default: 3, min: 0, max: 64 }] } },
      output: ["IMAGE"],
      output_name: ["IMAGE"],
      output_is_list: [false],
      name: "ExampleBlur",
      display_name: "Example Blur",
      category: "example",
      python_module: `${MODULE}.nodes.blur`,
      function: "blur",
      output_node: false,
    },
    FlashUpscale: {
      input: { required: { image: ["IMAGE"] } },
      output: ["IMAGE"],
      output_name: ["IMAGE"],
      output_is_list: [false],
      name: "FlashUpscale",
      display_name: "Flash Upscale",
      category: "example",
      python_module: MODULE,
      function: "upscale",
      output_node: false,
    },
    SaveImage: {
      input: { required: { images: ["IMAGE"], filename_prefix: ["STRING", { default: "ComfyUI" }] } },
      output: [],
      output_name: [],
      output_is_list: [],
      name: "SaveImage",
      display_name: "Save Image",
      category: "image",
      python_module: "nodes",
      function: "save_images",
      output_node: true,
    },
  };
}

export type WorkflowDocument = {
  nodes: Record<string, unknown>[];
  links: unknown[];
  [key: string]: unknown;
};

export const CLOSURES: Record<string, string[]> = {
  ExampleLoader: [],
  ExampleBlur: ["torch"],
  FlashUpscale: ["torch", "flash_attn"],
};

export function definitions(): Map<string, NodeDefinition> {
  return parseObjectInfo(objectInfo());
}

function chain(middle: string, middleWidgets: unknown[]): WorkflowDocument {
  return {
    last_node_id: 3,
    last_link_id: 2,
    nodes: [
      {
        id: 1,
        type: "ExampleLoader",
        mode: 0,
        outputs: [{ name: "IMAGE", type: "IMAGE", links: [1] }],
        widgets_values: ["input.png"],
      },
      {
        id: 2,
        type: middle,
        mode: 0,
        inputs: [{ name: "image", type: "IMAGE", link: 1 }],
        outputs: [{ name: "IMAGE", type: "IMAGE", links: [2] }],
        widgets_values: middleWidgets,
      },
      {
        id: 3,
        type: "SaveImage",
        mode: 0,
        inputs: [{ name: "images", type: "IMAGE", link: 2 }],
        widgets_values: ["out"],
      },
    ],
    links: [
      [1, 1, 0, 2, 0, "IMAGE"],
      [2, 2, 0, 3, 0, "IMAGE"],
    ],
  };
}

/** Loader → ExampleBlur(radius 5) → SaveImage. */
export function basicDocument(): WorkflowDocument {
  return chain("ExampleBlur", [5]);
}

/** Loader → FlashUpscale → SaveImage. */
export function upscaleDocument(): WorkflowDocument {
  return chain("FlashUpscale", []);
}

export function workflowFrom(doc: unknown, name = "basic", runner: RunnerClass = "cpu"): Workflow {
  return parseWorkflow(doc, { name, file: `/workflows/${name}.json`, runner });
}

export const PROJECT_CONFIG = `name: ${EXTENSION}
python_version: "3.11"
timeout: 30
platforms:
  linux: true
  macos: false
  windows: false
  windows_portable: false
workflows:
  cpu: [basic]
  gpu: [upscale]
`;

/**
 * A minimal extension checkout: manifest, one Python module, a comfy-env.toml
 * declaring flash-attn and two workflows.
 */
export function writeProject(root: string, opts: { config?: string; files?: Record<string, string> } = {}): string {
  writeFiles(root, {
    "comfy-test.yaml": opts.config ?? PROJECT_CONFIG,
    "pyproject.toml": `[project]\nname = "comfyui-example"\nversion = "0.1.0"\n`,
    "__init__.py": "NODE_CLASS_MAPPINGS = {}\n",
    "comfy-env.toml": '[cuda]\npackages = ["flash-attn"]\n',
    "workflows/basic.json": JSON.stringify(basicDocument(), null, 2),
    "workflows/upscale.json": JSON.stringify(upscaleDocument(), null, 2),
    ...opts.files,
  });
  return root;
}
