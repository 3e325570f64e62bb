import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { CONFIG_FILE } from "../config/loader.js";

export const TEMPLATE_DIR = fileURLToPath(new URL("../../templates/", import.meta.url));

export type InitResult =
  | { ok: true; created: string[] }
  | { ok: false; error: string; existing: string[] };

function copyTree(from: string, to: string, created: string[]): void {
  for (const entry of fs.readdirSync(from, { withFileTypes: true })) {
    const src = path.join(from, entry.name);
    const dest = path.join(to, entry.name);
    if (entry.isDirectory()) {
      copyTree(src, dest, created);
    } else {
      fs.mkdirSync(to, { recursive: true });
      fs.copyFileSync(src, dest);
      created.push(dest);
    }
  }
}

/**
 * `comfy-test init`: write comfy-test.yaml and the CI workflow under .github/.
 * An existing config is left alone unless `force` is set.
 */
export function init(opts: { projectDir: string; force?: boolean; templateDir?: string }): InitResult {
  const templates = opts.templateDir ?? TEMPLATE_DIR;
  const configPath = path.join(opts.projectDir, CONFIG_FILE);

  if (!opts.force && fs.existsSync(configPath)) {
    return { ok: false, error: `${configPath} already exists; use --force to overwrite`, existing: [configPath] };
  }

  const created: string[] = [];
  fs.mkdirSync(opts.projectDir, { recursive: true });
  fs.copyFileSync(path.join(templates, CONFIG_FILE), configPath);
  created.push(configPath);

  const github = path.join(templates, "github");
  if (fs.existsSync(github)) copyTree(github, path.join(opts.projectDir, ".github"), created);

  return { ok: true, created };
}
