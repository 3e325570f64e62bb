import { diag } from "../../types/diagnostic.js";
import { InstantiationError } from "../errors.js";
import { withTimeout } from "../timeout.js";
import { failed, passed, requireEnvironment, type LevelRunner } from "./context.js";

export const INSTANTIATION_TIMEOUT_MS = 60_000;

/**
 * INSTANTIATION level: construct every extension node in isolation. Per-node
 * failures become diagnostics; the level fails only when no node survives.
 */
export const runInstantiation: LevelRunner = async (ctx) => {
  const { scope, state } = ctx;
  const environment = requireEnvironment(ctx);
  const classTypes = state.extensionClassTypes;

  const report = await withTimeout(
    (signal) => ctx.collaborators.instantiation.instantiate({ ...scope, signal }, environment, classTypes),
    { label: "node instantiation", timeoutMs: INSTANTIATION_TIMEOUT_MS, signal: scope.signal },
  );

  const allFailed = report.instantiated.length === 0 && report.failures.length > 0;
  const diagnostics = report.failures.map((f) =>
    diag(allFailed ? "error" : "warn", "INSTANTIATION_FAILED", `${f.classType}: ${f.error}`, { field: f.classType }),
  );
  state.failedClassTypes = new Set(report.failures.map((f) => f.classType));

  if (allFailed) {
    return failed(new InstantiationError(`All ${report.failures.length} node(s) failed to instantiate`), diagnostics);
  }
  diagnostics.push(
    diag("info", "INSTANTIATION_OK", `Instantiated ${report.instantiated.length} of ${classTypes.length} node(s)`),
  );
  return passed(diagnostics);
};
