import type { Project } from "../types/config.js";
import { PlatformEnvironment, UvEnvironment } from "./environment.js";
import { HttpExecution } from "./execution.js";
import { ScriptInstantiation } from "./instantiation.js";
import { PortableEnvironment } from "./portable.js";
import { NoScreenshots } from "./screenshot.js";
import { ComfyServerLauncher } from "./server.js";
import type { Collaborators } from "./types.js";

export function createDefaultCollaborators(project: Project, env: NodeJS.ProcessEnv): Collaborators {
  return {
    environment: new PlatformEnvironment(new UvEnvironment(), {
      windows_portable: new PortableEnvironment({ token: env.GITHUB_TOKEN }),
    }),
    server: new ComfyServerLauncher(),
    instantiation: new ScriptInstantiation(project.cudaPackages),
    screenshots: new NoScreenshots(),
    execution: new HttpExecution(),
  };
}
