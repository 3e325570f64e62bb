import { describe, expect, it, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { PlatformEnvironment, runStep } from "../src/collaborators/environment.js";
import { describePromptRejection, interpretHistory } from "../src/collaborators/execution.js";
import { parseInstantiationReport } from "../src/collaborators/instantiation.js";
import { lastJsonLine } from "../src/collaborators/scripts.js";
import { findPortableLayout, portableArchiveUrl, releaseTag } from "../src/collaborators/portable.js";
import { findFreePort, isImportErrorLine, serverArgs } from "../src/collaborators/server.js";
import type { EnvironmentCollaborator, InstalledEnvironment, RunScope } from "../src/collaborators/types.js";
import { EnvironmentError } from "../src/core/errors.js";
import { silentLogger } from "../src/logger.js";
import type { PlatformName, Project } from "../src/types/config.js";
import { makeTempDir, writeFiles } from "./stubs/fixtures.js";

function scope(platform: PlatformName = "linux"): RunScope {
  return {
    platform,
    runner: "cpu",
    workspaceDir: process.cwd(),
    env: { COMFY_ENV_CUDA_VERSION: "12.8" },
    pythonVersion: "3.11",
    comfyuiVersion: "latest",
    portableVersion: null,
    signal: new AbortController().signal,
    logger: silentLogger,
  };
}

describe("prompt history", () => {
  it("treats a missing entry as pending", () => {
    expect(interpretHistory(undefined)).toEqual({ state: "pending" });
    expect(interpretHistory({ status: { status_str: "running", completed: false } })).toEqual({ state: "pending" });
  });

  it("returns outputs of a finished prompt", () => {
    const entry = { status: { status_str: "success", completed: true }, outputs: { "3": { images: [] } } };
    expect(interpretHistory(entry)).toEqual({ state: "success", outputs: { "3": { images: [] } } });
  });

  it("describes the failing node of an errored prompt", () => {
    const entry = {
      status: {
        status_str: "error",
        messages: [
          ["execution_start", { prompt_id: "p1" }],
          ["execution_error", { node_id: "2", node_type: "ExampleBlur", exception_message: "CUDA out of memory\n" }],
        ],
      },
    };
    expect(interpretHistory(entry)).toEqual({ state: "error", message: "node 2 (ExampleBlur): CUDA out of memory" });
  });

  it("falls back when an error carries no messages", () => {
    expect(interpretHistory({ status: { status_str: "error" } })).toEqual({ state: "error", message: "Unknown error" });
  });

  it("reports an error stored on a node output", () => {
    expect(interpretHistory({ status: {}, outputs: { "5": { error: "bad tensor" } } })).toEqual({
      state: "error",
      message: "node 5: bad tensor",
    });
  });

  it("lists node errors of a rejected prompt", () => {
    const body = {
      error: { message: "Prompt outputs failed validation" },
      node_errors: { "2": { errors: [{ message: "Value -1 smaller than min of 0" }] } },
    };
    expect(describePromptRejection(body)).toBe("Prompt outputs failed validation: node 2: Value -1 smaller than min of 0");
    expect(describePromptRejection("nope")).toBe("prompt rejected");
  });
});

describe("helper output", () => {
  it("reads the last line as JSON", () => {
    expect(lastJsonLine('loading nodes\n{"instantiated": ["A"]}\n')).toEqual({ instantiated: ["A"] });
    expect(lastJsonLine("Traceback (most recent call last):\n")).toBeUndefined();
    expect(lastJsonLine("")).toBeUndefined();
  });

  it("validates instantiation reports", () => {
    const report = { instantiated: ["ExampleLoader"], failures: [{ classType: "FlashUpscale", error: "No module named 'flash_attn'" }] };
    expect(parseInstantiationReport(report)).toEqual(report);
    expect(() => parseInstantiationReport({ instantiated: ["A"], failures: [{ classType: 1 }] })).toThrow(
      "Instantiation helper returned an unexpected result",
    );
    expect(() => parseInstantiationReport(null)).toThrow("Instantiation helper returned an unexpected result");
  });

  it("recognises import failures in the server log", () => {
    expect(isImportErrorLine("Cannot import /w/custom_nodes/ComfyUI-Example module for custom nodes: No module named 'cv2'")).toBe(true);
    expect(isImportErrorLine("   0.1 seconds (IMPORT FAILED): /w/custom_nodes/ComfyUI-Example")).toBe(true);
    expect(isImportErrorLine("Import times for custom nodes:")).toBe(false);
  });

  it("allocates a local port", async () => {
    expect(await findFreePort()).toBeGreaterThan(0);
  });
});

describe("install steps", () => {
  it("returns stdout and passes the run environment to the child", async () => {
    const out = await runStep(scope(), "version check", process.execPath, ["-e", "process.stdout.write(process.env.COMFY_ENV_CUDA_VERSION ?? '')"], {
      cwd: process.cwd(),
    });
    expect(out).toBe("12.8");
  });

  it("maps a non-zero exit to EnvironmentError with the output tail", async () => {
    const step = runStep(scope(), "pip install", process.execPath, ["-e", "process.stderr.write('boom\\n'); process.exit(2)"], {
      cwd: process.cwd(),
    });
    await expect(step).rejects.toBeInstanceOf(EnvironmentError);
    await expect(step).rejects.toMatchObject({ message: "pip install failed with exit code 2", details: "boom" });
  });
});

describe("windows portable", () => {
  let dir = "";

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
  });

  it("builds the release archive URL", () => {
    expect(portableArchiveUrl("v0.3.10")).toBe(
      "https://github.com/comfyanonymous/ComfyUI/releases/download/v0.3.10/ComfyUI_windows_portable_nvidia.7z",
    );
  });

  it("reads the tag of the latest release", () => {
    expect(releaseTag({ tag_name: "v0.3.10", name: "v0.3.10" })).toBe("v0.3.10");
    expect(() => releaseTag({ tag_name: "" })).toThrow(EnvironmentError);
    expect(() => releaseTag(null)).toThrow("No tag_name in the latest ComfyUI release response");
  });

  it("finds ComfyUI and the embedded interpreter one level down", () => {
    dir = makeTempDir("comfy-portable-");
    writeFiles(dir, {
      "ComfyUI_windows_portable/ComfyUI/main.py": "",
      "ComfyUI_windows_portable/python_embeded/python.exe": "",
    });
    expect(findPortableLayout(dir)).toEqual({
      comfyuiDir: path.join(dir, "ComfyUI_windows_portable", "ComfyUI"),
      python: path.join(dir, "ComfyUI_windows_portable", "python_embeded", "python.exe"),
    });
  });

  it("prefers a top-level layout", () => {
    dir = makeTempDir("comfy-portable-");
    writeFiles(dir, { "ComfyUI/main.py": "", "python_embeded/python.exe": "", "other/ComfyUI/main.py": "" });
    expect(findPortableLayout(dir)).toEqual({
      comfyuiDir: path.join(dir, "ComfyUI"),
      python: path.join(dir, "python_embeded", "python.exe"),
    });
  });

  it("fails when the archive has no ComfyUI or no interpreter", () => {
    dir = makeTempDir("comfy-portable-");
    writeFiles(dir, { "ComfyUI/README.md": "" });
    expect(() => findPortableLayout(dir)).toThrow("Could not find ComfyUI in the portable archive");

    writeFiles(dir, { "ComfyUI/main.py": "" });
    expect(() => findPortableLayout(dir)).toThrow("Could not find python_embeded in the portable archive");
  });

  it("launches the embedded interpreter as a standalone build", () => {
    const environment: InstalledEnvironment = {
      comfyuiDir: path.join("w", "ComfyUI"),
      python: path.join("w", "python_embeded", "python.exe"),
      customNodesDir: path.join("w", "ComfyUI", "custom_nodes"),
      extensionDir: path.join("w", "ComfyUI", "custom_nodes", "ComfyUI-Example"),
      portable: true,
    };
    const main = path.join("w", "ComfyUI", "main.py");
    expect(serverArgs(environment, 8190, "cpu")).toEqual([
      "-s", main, "--listen", "127.0.0.1", "--port", "8190", "--cpu", "--windows-standalone-build",
    ]);
    expect(serverArgs({ ...environment, portable: false }, 8190, "gpu")).toEqual([main, "--listen", "127.0.0.1", "--port", "8190"]);
  });

  it("routes the portable platform to its own installer", async () => {
    const used: string[] = [];
    const installer = (name: string): EnvironmentCollaborator => ({
      install: async (s) => {
        used.push(`${name}:${s.platform}`);
        return { comfyuiDir: "", python: "", customNodesDir: "", extensionDir: "", portable: name === "portable" };
      },
    });
    const project: Project = {
      name: "ComfyUI-Example",
      projectDir: "/tmp/ComfyUI-Example",
      pythonVersion: "3.11",
      comfyuiVersion: "latest",
      cudaPackages: [],
      envVars: {},
    };
    const environment = new PlatformEnvironment(installer("uv"), { windows_portable: installer("portable") });

    expect((await environment.install(scope("windows_portable"), project)).portable).toBe(true);
    expect((await environment.install(scope("windows"), project)).portable).toBe(false);
    expect(used).toEqual(["portable:windows_portable", "uv:windows"]);
  });
});
