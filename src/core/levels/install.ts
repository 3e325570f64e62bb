import { diag } from "../../types/diagnostic.js";
import { passed, type LevelRunner } from "./context.js";

/**
 * INSTALL level: the environment collaborator clones the host, creates the
 * runtime and installs the extension. Its failures propagate as
 * EnvironmentError.
 */
export const runInstall: LevelRunner = async (ctx) => {
  const { scope, project } = ctx;
  scope.logger.info("installing environment", { comfyui: scope.comfyuiVersion, python: scope.pythonVersion });

  const environment = await ctx.collaborators.environment.install(scope, project);
  ctx.state.environment = environment;

  return passed([
    diag(
      "info",
      "INSTALL_OK",
      `Installed ComfyUI ${scope.comfyuiVersion} with Python ${scope.pythonVersion} and ${project.name}`,
      { path: environment.comfyuiDir },
    ),
  ]);
};
