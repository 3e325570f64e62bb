import { createHash } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { stableStringify } from "../report/serialize.js";

export type ArtifactRecord = {
  /** Relative to the output directory, forward slashes. */
  path: string;
  sha256: string;
  bytes: number;
  produced_by: string;
};

export type ArtifactManifest = {
  schema_version: string;
  run_id: string;
  created_at: string;
  artifacts: ArtifactRecord[];
};

export const MANIFEST_FILE = "manifest.json";

export function computeSha256(filePath: string): string {
  return createHash("sha256").update(fs.readFileSync(filePath)).digest("hex");
}

/**
 * Artifact Writer: owns a run's output directory. Every file written or
 * registered through it is listed with its checksum in manifest.json.
 */
export class ArtifactWriter {
  private readonly records = new Map<string, ArtifactRecord>();

  constructor(
    readonly outputDir: string,
    private readonly runId: string,
  ) {
    fs.mkdirSync(outputDir, { recursive: true });
  }

  /** Absolute path for a relative artifact path; parent directories are created. */
  resolve(relativePath: string): string {
    const fullPath = path.resolve(this.outputDir, relativePath);
    const rel = path.relative(this.outputDir, fullPath);
    if (rel === "" || rel.startsWith("..") || path.isAbsolute(rel)) {
      throw new Error(`Artifact path escapes the output directory: ${relativePath}`);
    }
    fs.mkdirSync(path.dirname(fullPath), { recursive: true });
    return fullPath;
  }

  /** Returns the normalized relative path recorded in the manifest. */
  writeJson(relativePath: string, content: unknown, producedBy: string): string {
    return this.writeText(relativePath, stableStringify(content), producedBy);
  }

  writeText(relativePath: string, text: string, producedBy: string): string {
    fs.writeFileSync(this.resolve(relativePath), text, "utf8");
    return this.track(relativePath, producedBy).path;
  }

  /** Record a file a collaborator wrote at `resolve(relativePath)`. */
  track(relativePath: string, producedBy: string): ArtifactRecord {
    const fullPath = path.resolve(this.outputDir, relativePath);
    const rel = path.relative(this.outputDir, fullPath).split(path.sep).join("/");
    const record: ArtifactRecord = {
      path: rel,
      sha256: computeSha256(fullPath),
      bytes: fs.statSync(fullPath).size,
      produced_by: producedBy,
    };
    this.records.set(rel, record);
    return record;
  }

  list(): ArtifactRecord[] {
    return [...this.records.values()].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  }

  /** Write manifest.json over everything recorded so far. */
  writeManifest(now: Date = new Date()): ArtifactManifest {
    const manifest: ArtifactManifest = {
      schema_version: "1.0.0",
      run_id: this.runId,
      created_at: now.toISOString(),
      artifacts: this.list(),
    };
    fs.writeFileSync(path.join(this.outputDir, MANIFEST_FILE), stableStringify(manifest), "utf8");
    return manifest;
  }
}
