import fs from "node:fs";
import path from "node:path";
import { GitPublisher } from "../collaborators/publisher.js";
import type { PublishCollaborator } from "../collaborators/types.js";
import { walkProjectFiles } from "../core/walk.js";
import { stableStringify } from "../report/serialize.js";
import { schemaRegistry } from "../schema/registry.js";
import { EXIT } from "./exit-codes.js";
import { REPORT_FILE } from "./run.js";

export const INDEX_FILE = "index.json";

export type IndexEntry = {
  runId: string;
  path: string;
  project: string;
  startedAt: string;
  success: boolean;
  exitCode: number;
};

export type PublishOptions = {
  resultsDir: string;
  repo: string;
  branch?: string;
  dryRun?: boolean;
};

export type PublishResult =
  | { ok: true; exitCode: number; index: IndexEntry[]; remoteUrl: string; pushed: boolean }
  | { ok: false; exitCode: number; error: string; problems: string[] };

const REPO_PATTERN = /^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/;

type ReportHead = { runId: string; startedAt: string; success: boolean; exitCode: number; project: { name: string } };

function isReportHead(value: unknown): value is ReportHead {
  return schemaRegistry().check("run-report", value).valid;
}

/**
 * `comfy-test publish`: check every run-report.json under the results
 * directory, write index.json (newest run first) and push the directory.
 */
export async function publish(
  opts: PublishOptions,
  publisher: PublishCollaborator = new GitPublisher(),
): Promise<PublishResult> {
  if (!REPO_PATTERN.test(opts.repo)) {
    return { ok: false, exitCode: EXIT.INVALID_ARGS, error: `--repo must look like owner/repo, got '${opts.repo}'`, problems: [] };
  }
  const resultsDir = path.resolve(opts.resultsDir);
  if (!fs.existsSync(resultsDir) || !fs.statSync(resultsDir).isDirectory()) {
    return { ok: false, exitCode: EXIT.INVALID_ARGS, error: `Results directory not found: ${resultsDir}`, problems: [] };
  }

  const problems: string[] = [];
  const index: IndexEntry[] = [];
  for (const rel of walkProjectFiles(resultsDir, (name) => name === REPORT_FILE)) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(path.join(resultsDir, rel), "utf8"));
    } catch (err) {
      problems.push(`${rel}: ${err instanceof Error ? err.message : String(err)}`);
      continue;
    }
    if (!isReportHead(parsed)) {
      const check = schemaRegistry().check("run-report", parsed);
      problems.push(...(check.valid ? [] : check.errors.map((e) => `${rel}: ${e}`)));
      continue;
    }
    index.push({
      runId: parsed.runId,
      path: rel,
      project: parsed.project.name,
      startedAt: parsed.startedAt,
      success: parsed.success,
      exitCode: parsed.exitCode,
    });
  }

  if (problems.length > 0) {
    return { ok: false, exitCode: EXIT.CONFIG_ERROR, error: `${problems.length} invalid run report(s)`, problems };
  }
  if (index.length === 0) {
    return { ok: false, exitCode: EXIT.CONFIG_ERROR, error: `No ${REPORT_FILE} found under ${resultsDir}`, problems };
  }

  index.sort((a, b) => (a.startedAt < b.startedAt ? 1 : a.startedAt > b.startedAt ? -1 : a.runId < b.runId ? -1 : 1));
  fs.writeFileSync(path.join(resultsDir, INDEX_FILE), stableStringify({ runs: index }), "utf8");

  const remoteUrl = `https://github.com/${opts.repo}.git`;
  if (opts.dryRun) return { ok: true, exitCode: EXIT.SUCCESS, index, remoteUrl, pushed: false };

  await publisher.publish(resultsDir, { remoteUrl, branch: opts.branch ?? "gh-pages" });
  return { ok: true, exitCode: EXIT.SUCCESS, index, remoteUrl, pushed: true };
}
