import fs from "node:fs";
import path from "node:path";
import type { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import axios from "axios";
import { CancelledError, EnvironmentError } from "../core/errors.js";
import type { Project } from "../types/config.js";
import { copyExtension, runInstallScript, runStep } from "./environment.js";
import type { EnvironmentCollaborator, InstalledEnvironment, RunScope } from "./types.js";

const RELEASES_URL = "https://github.com/comfyanonymous/ComfyUI/releases";
const LATEST_RELEASE_API = "https://api.github.com/repos/comfyanonymous/ComfyUI/releases/latest";
export const PORTABLE_ARCHIVE = "ComfyUI_windows_portable_nvidia.7z";
const API_TIMEOUT_MS = 30_000;
const DOWNLOAD_TIMEOUT_MS = 300_000;

export function portableArchiveUrl(version: string): string {
  return `${RELEASES_URL}/download/${version}/${PORTABLE_ARCHIVE}`;
}

/** `tag_name` of a GitHub release response. */
export function releaseTag(body: unknown): string {
  if (typeof body === "object" && body !== null && "tag_name" in body) {
    const tag = body.tag_name;
    if (typeof tag === "string" && tag !== "") return tag;
  }
  throw new EnvironmentError("No tag_name in the latest ComfyUI release response");
}

export type PortableLayout = { comfyuiDir: string; python: string };

function isDir(p: string): boolean {
  return fs.statSync(p, { throwIfNoEntry: false })?.isDirectory() ?? false;
}

function subdirs(dir: string): string[] {
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((e) => e.isDirectory())
    .map((e) => path.join(dir, e.name))
    .sort();
}

/**
 * Locate ComfyUI and the embedded interpreter in an extracted portable
 * archive. Both may sit at the top level or one directory down.
 */
export function findPortableLayout(extractDir: string): PortableLayout {
  const candidates = [
    path.join(extractDir, "ComfyUI"),
    path.join(extractDir, "ComfyUI_windows_portable", "ComfyUI"),
    ...subdirs(extractDir).map((d) => path.join(d, "ComfyUI")),
  ];
  const comfyuiDir = candidates.find((c) => fs.existsSync(path.join(c, "main.py")));
  if (!comfyuiDir) {
    throw new EnvironmentError("Could not find ComfyUI in the portable archive", { details: `Searched in: ${extractDir}` });
  }

  const embedded = [extractDir, ...subdirs(extractDir)].map((d) => path.join(d, "python_embeded")).find(isDir);
  if (!embedded) {
    throw new EnvironmentError("Could not find python_embeded in the portable archive", { details: `Searched in: ${extractDir}` });
  }
  return { comfyuiDir, python: path.join(embedded, "python.exe") };
}

export type PortableOptions = {
  /** Sent as a GitHub token to raise the API rate limit. */
  token?: string;
};

/**
 * Windows portable build: downloads the release archive, extracts it with
 * 7z and installs the extension with the embedded interpreter.
 */
export class PortableEnvironment implements EnvironmentCollaborator {
  constructor(private readonly opts: PortableOptions = {}) {}

  async install(scope: RunScope, project: Project): Promise<InstalledEnvironment> {
    const work = scope.workspaceDir;
    const version = await this.resolveVersion(scope);

    const archive = path.join(work, `ComfyUI_portable_${version}.7z`);
    if (!fs.existsSync(archive)) await this.download(scope, portableArchiveUrl(version), archive);

    const extractDir = path.join(work, "ComfyUI_portable");
    fs.rmSync(extractDir, { recursive: true, force: true });
    fs.mkdirSync(extractDir, { recursive: true });
    await runStep(scope, `extract ${path.basename(archive)}`, "7z", ["x", archive, `-o${extractDir}`, "-y"], { cwd: work });

    const { comfyuiDir, python } = findPortableLayout(extractDir);
    const customNodesDir = path.join(comfyuiDir, "custom_nodes");
    fs.mkdirSync(customNodesDir, { recursive: true });

    const target = copyExtension(project, customNodesDir);
    const requirements = path.join(target, "requirements.txt");
    if (fs.existsSync(requirements)) {
      await runStep(scope, "install requirements.txt", python, ["-m", "pip", "install", "-r", requirements], { cwd: target });
    }
    await runInstallScript(scope, python, target);

    return { comfyuiDir, python, customNodesDir, extensionDir: target, portable: true };
  }

  private headers(): Record<string, string> {
    return this.opts.token ? { Authorization: `token ${this.opts.token}` } : {};
  }

  private async resolveVersion(scope: RunScope): Promise<string> {
    const requested = scope.portableVersion ?? "latest";
    if (requested !== "latest") return requested;

    scope.logger.info("resolving latest portable release");
    try {
      const res = await axios.get<unknown>(LATEST_RELEASE_API, {
        headers: this.headers(),
        timeout: API_TIMEOUT_MS,
        signal: scope.signal,
      });
      return releaseTag(res.data);
    } catch (err) {
      if (scope.signal.aborted) throw new CancelledError("resolve portable release");
      if (err instanceof EnvironmentError) throw err;
      throw new EnvironmentError("Failed to fetch the latest ComfyUI release", { cause: err, details: LATEST_RELEASE_API });
    }
  }

  private async download(scope: RunScope, url: string, dest: string): Promise<void> {
    scope.logger.info("downloading portable ComfyUI", { url });
    const partial = `${dest}.part`;
    try {
      const res = await axios.get<Readable>(url, {
        headers: this.headers(),
        responseType: "stream",
        timeout: DOWNLOAD_TIMEOUT_MS,
        signal: scope.signal,
      });
      await pipeline(res.data, fs.createWriteStream(partial));
      fs.renameSync(partial, dest);
    } catch (err) {
      fs.rmSync(partial, { force: true });
      if (scope.signal.aborted) throw new CancelledError("download portable ComfyUI");
      throw new EnvironmentError(`Failed to download ${PORTABLE_ARCHIVE}`, { cause: err, details: url });
    }
  }
}
