#!/usr/bin/env node

import { Command } from "commander";
import { EXIT } from "./commands/exit-codes.js";
import { init } from "./commands/init.js";
import { publish } from "./commands/publish.js";
import { runTests, type RunCommandResult } from "./commands/run.js";
import { renderFailures, renderPlan, renderStatusTable } from "./report/table.js";

type Format = "human" | "jsonl";

const program = new Command();

program
  .name("comfy-test")
  .description("Test orchestration for ComfyUI custom-node extensions")
  .version("0.1.0");

function writeLine(value: unknown): void {
  process.stdout.write(JSON.stringify(value) + "\n");
}

function printRunResult(res: RunCommandResult, format: Format): void {
  if (!res.ok) {
    if (format === "jsonl") writeLine({ level: "error", kind: res.error.kind, message: res.error.message });
    else console.error(res.error.message);
    return;
  }

  if (res.dryRun) {
    if (format === "jsonl") {
      for (const p of res.plan.platforms) {
        writeLine({
          platform: p.target.name,
          runner: p.runner,
          levels: p.levels,
          workflows: p.workflows.map((w) => w.name),
        });
      }
    } else {
      console.log(renderPlan(res.plan));
    }
    return;
  }

  if (format === "jsonl") {
    for (const p of res.report.platforms) {
      for (const l of p.levels) {
        writeLine({ platform: p.platform, level: l.level, status: l.status, skipReason: l.skipReason, error: l.error });
      }
    }
    writeLine({ level: "info", code: "RUN_FINISHED", runId: res.report.runId, exitCode: res.exitCode, report: res.reportPath });
    return;
  }

  console.log(renderStatusTable(res.report));
  const failures = renderFailures(res.report);
  if (failures.length > 0) {
    console.log("");
    for (const line of failures) console.log(line);
  }
  console.log("");
  console.log(`Report: ${res.reportPath}`);
}

program
  .command("init")
  .description("Create comfy-test.yaml and a CI workflow in the current directory")
  .option("--force", "Overwrite an existing comfy-test.yaml")
  .action((opts: { force?: boolean }) => {
    const res = init({ projectDir: process.cwd(), force: opts.force });
    if (!res.ok) {
      console.error(res.error);
      process.exit(EXIT.LEVEL_FAILED);
    }
    for (const file of res.created) console.log(`Created ${file}`);
  });

program
  .command("run")
  .description("Run the test levels on every enabled platform")
  .option("--project <path>", "Extension directory", ".")
  .option("--platform <name>", "Only this platform: linux|macos|windows|windows_portable")
  .option("--level <name>", "Run levels up to and including this one")
  .option("--dry-run", "Print the plan without running anything")
  .option("--gpu", "Run in GPU mode (same as COMFY_TEST_GPU=1)")
  .option("--output <dir>", "Output directory (default: .comfy-test/results/<run id>)")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(
    async (opts: {
      project: string;
      platform?: string;
      level?: string;
      dryRun?: boolean;
      gpu?: boolean;
      output?: string;
      format: string;
    }) => {
      if (opts.format !== "human" && opts.format !== "jsonl") {
        console.error(`Unknown format '${opts.format}' (expected human or jsonl)`);
        process.exit(EXIT.INVALID_ARGS);
      }
      const format: Format = opts.format;

      const controller = new AbortController();
      const onSigint = () => {
        if (controller.signal.aborted) process.exit(EXIT.CANCELLED);
        console.error("Cancelling; press Ctrl-C again to exit immediately");
        controller.abort();
      };
      process.on("SIGINT", onSigint);

      try {
        const res = await runTests({
          projectDir: opts.project,
          platform: opts.platform,
          level: opts.level,
          dryRun: opts.dryRun,
          gpu: opts.gpu,
          outputDir: opts.output,
          signal: controller.signal,
        });
        printRunResult(res, format);
        process.exitCode = res.exitCode;
      } finally {
        process.off("SIGINT", onSigint);
      }
    },
  );

program
  .command("publish")
  .description("Index run reports and push them to a GitHub Pages branch")
  .argument("<results-dir>", "Directory holding run-report.json files")
  .requiredOption("--repo <owner/repo>", "Target GitHub repository")
  .option("--branch <name>", "Target branch", "gh-pages")
  .option("--dry-run", "Validate and write index.json without pushing")
  .action(async (resultsDir: string, opts: { repo: string; branch: string; dryRun?: boolean }) => {
    const res = await publish({ resultsDir, repo: opts.repo, branch: opts.branch, dryRun: opts.dryRun });
    if (!res.ok) {
      console.error(res.error);
      for (const problem of res.problems) console.error(`  ${problem}`);
      process.exit(res.exitCode);
    }
    console.log(`Indexed ${res.index.length} run(s)`);
    console.log(res.pushed ? `Pushed to ${res.remoteUrl} (${opts.branch})` : "Dry run: nothing pushed");
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(1);
});
