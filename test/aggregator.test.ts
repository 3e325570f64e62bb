import { describe, expect, it } from "vitest";
import { ResultAggregator } from "../src/report/aggregator.js";
import { ALL_LEVELS, type LevelName } from "../src/core/state-machine.js";
import { schemaRegistry } from "../src/schema/registry.js";
import type { PlatformName, Project } from "../src/types/config.js";
import { SUB_LEVELS, type SubLevelResult, type ValidationReport } from "../src/types/report.js";

const project: Project = {
  name: "ComfyUI-Example",
  projectDir: "/tmp/ComfyUI-Example",
  pythonVersion: "3.11",
  comfyuiVersion: "latest",
  cudaPackages: ["flash_attn"],
  envVars: {},
};

const fixedClock = () => new Date("2026-01-02T03:04:05.000Z");

function passAll(agg: ResultAggregator, platform: PlatformName, until: LevelName = "execution"): void {
  agg.platformStarted(platform, "cpu");
  const last = ALL_LEVELS.indexOf(until);
  ALL_LEVELS.forEach((level, i) => {
    agg.levelReached(platform, level, false);
    if (i <= last) {
      agg.levelStarted(platform, level);
      agg.levelFinished(platform, level, { status: "passed" });
    } else {
      agg.levelFinished(platform, level, { status: "skipped", skipReason: "not requested" });
    }
  });
  agg.platformFinished(platform);
}

function validation(workflow: string): ValidationReport {
  return {
    workflow,
    file: `/workflows/${workflow}.json`,
    runner: "cpu",
    passed: true,
    subLevels: SUB_LEVELS.map((name): SubLevelResult => ({
      name,
      status: "passed",
      skipReason: null,
      error: null,
      diagnostics: [],
    })),
  };
}

describe("result aggregator", () => {
  it("succeeds when every level passed or was not requested", () => {
    const agg = new ResultAggregator("run-1", project, fixedClock);
    passAll(agg, "linux", "registration");
    agg.complete();
    const report = agg.snapshot();

    expect(report.success).toBe(true);
    expect(report.exitCode).toBe(0);
    expect(report.startedAt).toBe("2026-01-02T03:04:05.000Z");
    expect(report.finishedAt).toBe("2026-01-02T03:04:05.000Z");
    expect(report.platforms[0]?.status).toBe("passed");
  });

  it("fails the run on a failed level or a blocked skip", () => {
    const agg = new ResultAggregator("run-1", project, fixedClock);
    agg.platformStarted("linux", "cpu");
    agg.levelReached("linux", "syntax", false);
    agg.levelStarted("linux", "syntax");
    agg.levelFinished("linux", "syntax", {
      status: "failed",
      error: { kind: "SyntaxError", message: "1 syntax problem(s) found", details: null },
    });
    for (const level of ALL_LEVELS.slice(1)) {
      agg.levelReached("linux", level, false);
      agg.levelFinished("linux", level, { status: "skipped", skipReason: "blocked by failed predecessor" });
    }
    agg.platformFinished("linux");
    const report = agg.snapshot();

    expect(report.success).toBe(false);
    expect(report.exitCode).toBe(1);
    expect(report.platforms[0]?.status).toBe("failed");
    expect(report.platforms[0]?.levels[0]?.error?.kind).toBe("SyntaxError");
  });

  it("reports 130 for a cancelled run even when levels passed", () => {
    const agg = new ResultAggregator("run-1", project, fixedClock);
    passAll(agg, "linux");
    agg.complete({ cancelled: true });

    expect(agg.snapshot().exitCode).toBe(130);
    expect(agg.snapshot().success).toBe(false);
  });

  it("is unsuccessful with no platforms", () => {
    const agg = new ResultAggregator("run-1", project, fixedClock);
    expect(agg.success()).toBe(false);
    expect(agg.snapshot().exitCode).toBe(1);
  });

  it("rejects events for a finalized platform", () => {
    const agg = new ResultAggregator("run-1", project, fixedClock);
    passAll(agg, "linux");
    expect(() => agg.validationReported("linux", validation("basic"))).toThrow("Platform linux is finalized");
  });

  it("allows exactly one terminal transition per level", () => {
    const agg = new ResultAggregator("run-1", project, fixedClock);
    agg.platformStarted("linux", "cpu");
    agg.levelReached("linux", "syntax", false);
    agg.levelStarted("linux", "syntax");
    agg.levelFinished("linux", "syntax", { status: "passed" });

    expect(() => agg.levelFinished("linux", "syntax", { status: "failed" })).toThrow(
      "Level syntax on linux already finished as passed",
    );
    expect(() => agg.levelStarted("linux", "syntax")).toThrow("Level syntax on linux cannot start from passed");
    expect(() => agg.levelReached("linux", "syntax", false)).toThrow("Level syntax on linux was already reached");
  });

  it("refuses to finish a platform with open levels", () => {
    const agg = new ResultAggregator("run-1", project, fixedClock);
    agg.platformStarted("linux", "cpu");
    agg.levelReached("linux", "syntax", false);
    agg.levelStarted("linux", "syntax");
    agg.levelFinished("linux", "syntax", { status: "passed" });
    agg.levelReached("linux", "install", false);

    expect(() => agg.platformFinished("linux")).toThrow("Platform linux finished with open levels: install");
  });

  it("orders platforms and validation reports canonically", () => {
    const agg = new ResultAggregator("run-1", project, fixedClock);
    agg.platformStarted("macos", "cpu");
    agg.validationReported("macos", validation("zeta"));
    agg.validationReported("macos", validation("alpha"));
    passAll(agg, "linux");

    const report = agg.snapshot();
    expect(report.platforms.map((p) => p.platform)).toEqual(["linux", "macos"]);
    expect(report.platforms[1]?.validation.map((v) => v.workflow)).toEqual(["alpha", "zeta"]);
    expect(report.success).toBe(false);
  });

  it("rejects a second validation report for the same workflow", () => {
    const agg = new ResultAggregator("run-1", project, fixedClock);
    agg.platformStarted("linux", "cpu");
    agg.validationReported("linux", validation("basic"));
    expect(() => agg.validationReported("linux", validation("basic"))).toThrow(
      "Validation of basic on linux was already reported",
    );
  });

  it("returns frozen snapshots", () => {
    const agg = new ResultAggregator("run-1", project, fixedClock);
    passAll(agg, "linux");
    const report = agg.snapshot();
    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.platforms[0]?.levels[0])).toBe(true);
  });

  it("serializes a report that matches the run-report schema", () => {
    const agg = new ResultAggregator("run-1", project, fixedClock);
    passAll(agg, "linux");
    agg.complete();
    const parsed: unknown = JSON.parse(agg.serialize());

    expect(schemaRegistry().check("run-report", parsed)).toEqual({ valid: true });
    expect(agg.serialize().endsWith("}\n")).toBe(true);
  });
});
