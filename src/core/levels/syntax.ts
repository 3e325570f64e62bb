import fs from "node:fs";
import path from "node:path";
import { diag, hasErrors, type Diagnostic } from "../../types/diagnostic.js";
import { EngineError } from "../errors.js";
import { walkProjectFiles } from "../walk.js";
import { failed, passed, type LevelRunner } from "./context.js";

/** At least one of these must exist at the project root. */
export const MANIFEST_FILES = ["pyproject.toml", "requirements.txt"] as const;

/** Code points cp1252 maps into 0x80-0x9F. */
const CP1252_EXTRA = new Set([
  0x20ac, 0x201a, 0x0192, 0x201e, 0x2026, 0x2020, 0x2021, 0x02c6, 0x2030, 0x0160, 0x2039, 0x0152, 0x017d, 0x2018,
  0x2019, 0x201c, 0x201d, 0x2022, 0x2013, 0x2014, 0x02dc, 0x2122, 0x0161, 0x203a, 0x0153, 0x017e, 0x0178,
]);

export function isCp1252Encodable(codePoint: number): boolean {
  return codePoint < 0x80 || (codePoint >= 0xa0 && codePoint <= 0xff) || CP1252_EXTRA.has(codePoint);
}

function hex(codePoint: number): string {
  return `U+${codePoint.toString(16).toUpperCase().padStart(4, "0")}`;
}

export function checkManifests(projectDir: string): Diagnostic[] {
  if (MANIFEST_FILES.some((f) => fs.existsSync(path.join(projectDir, f)))) return [];
  return [
    diag("error", "SYNTAX_NO_MANIFEST", `Project has neither ${MANIFEST_FILES.join(" nor ")}`, { path: projectDir }),
  ];
}

/** Characters a Windows console running cp1252 cannot print. */
export function checkEncoding(rel: string, content: Buffer): Diagnostic[] {
  let text: string;
  try {
    text = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(content);
  } catch {
    return [diag("error", "SYNTAX_NOT_UTF8", `${rel}: not valid UTF-8`, { path: rel })];
  }

  const out: Diagnostic[] = [];
  text.split(/\r?\n/).forEach((lineText, lineIdx) => {
    let col = 0;
    for (const ch of lineText) {
      col++;
      const cp = ch.codePointAt(0) ?? 0;
      if (isCp1252Encodable(cp)) continue;
      out.push(
        diag("error", "SYNTAX_ENCODING", `${rel}:${lineIdx + 1}:${col}: ${hex(cp)} '${ch}' cannot be encoded in cp1252`, {
          path: rel,
          details: { line: lineIdx + 1, column: col, codePoint: hex(cp) },
        }),
      );
    }
  });
  return out;
}

/**
 * SYNTAX level: a dependency manifest is present and every Python source
 * is printable under cp1252.
 */
export const runSyntax: LevelRunner = async (ctx) => {
  const root = ctx.project.projectDir;
  const diagnostics = checkManifests(root);

  const sources = walkProjectFiles(root, (name) => name.endsWith(".py"));
  for (const rel of sources) {
    diagnostics.push(...checkEncoding(rel, fs.readFileSync(path.join(root, rel))));
  }

  if (!hasErrors(diagnostics)) {
    diagnostics.push(diag("info", "SYNTAX_OK", `Checked ${sources.length} Python files`));
    return passed(diagnostics);
  }
  const count = diagnostics.filter((d) => d.level === "error").length;
  return failed(new EngineError("SyntaxError", `${count} syntax problem(s) found`), diagnostics);
};
