import { diag, type Diagnostic } from "../../types/diagnostic.js";
import {
  extensionClassTypes,
  parseObjectInfo,
  withDependencies,
} from "../../workflow/node-definitions.js";
import { RegistrationError } from "../errors.js";
import { passed, requireEnvironment, type LevelRunner } from "./context.js";

/**
 * REGISTRATION level: start the host server, refuse import failures, and
 * load the node definitions the later levels inspect.
 */
export const runRegistration: LevelRunner = async (ctx) => {
  const { scope, project, state } = ctx;
  const environment = requireEnvironment(ctx);

  const mockPackages = scope.runner === "gpu" ? [] : project.cudaPackages;
  // Stored before any check so the pipeline stops it whatever happens next
  state.server = await ctx.collaborators.server.start(scope, environment, { mockPackages });
  const server = state.server;

  const importErrors = server.importErrors();
  if (importErrors.length > 0) {
    throw new RegistrationError(`${project.name} failed to import: ${importErrors[0]}`, {
      details: importErrors.join("\n"),
    });
  }

  const all = parseObjectInfo(await server.objectInfo(scope.signal));
  const ours = extensionClassTypes(all, project.name);
  if (ours.length === 0) {
    throw new RegistrationError(`No nodes from ${project.name} were registered (${all.size} nodes total)`);
  }

  const closures = await server.dependencyClosures(ours, scope.signal);
  state.definitions = withDependencies(all, closures);
  state.extensionClassTypes = ours;
  state.cudaFlags = ctx.classifier.classify(
    project.cudaPackages,
    ours.map((classType) => ({ classType, dependencies: state.definitions.get(classType)?.dependencies ?? [] })),
  );

  const diagnostics: Diagnostic[] = [
    diag("info", "REGISTRATION_OK", `Registered ${ours.length} node(s) from ${project.name}`, {
      details: { nodes: ours },
    }),
  ];
  if (state.cudaFlags.size > 0) {
    diagnostics.push(
      diag("info", "CUDA_NODES", `CUDA-only nodes: ${[...state.cudaFlags].sort().join(", ")}`, {
        details: { packages: [...project.cudaPackages] },
      }),
    );
  }
  return passed(diagnostics);
};
