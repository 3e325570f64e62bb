import path from "node:path";
import type {
  Collaborators,
  ExecutionRequest,
  ExecutionResult,
  HostServer,
  InstalledEnvironment,
  InstantiationReport,
  RunScope,
  ScreenshotSession,
  ServerStartOptions,
} from "../../src/collaborators/types.js";
import type { PromptGraph } from "../../src/workflow/prompt.js";
import { CLOSURES, objectInfo } from "./fixtures.js";

export type FakeOptions = {
  objectInfo?: unknown;
  importErrors?: string[];
  closures?: Record<string, string[]>;
  instantiation?: InstantiationReport;
  installError?: Error;
  screenshots?: ScreenshotSession | null;
  execute?: (scope: RunScope, request: ExecutionRequest) => Promise<ExecutionResult>;
};

export class FakeServer implements HostServer {
  readonly baseUrl = "http://127.0.0.1:8188";
  stopped = 0;

  constructor(private readonly opts: FakeOptions) {}

  importErrors(): string[] {
    return [...(this.opts.importErrors ?? [])];
  }

  async objectInfo(): Promise<unknown> {
    return this.opts.objectInfo ?? objectInfo();
  }

  async dependencyClosures(classTypes: readonly string[]): Promise<Record<string, string[]>> {
    const all = this.opts.closures ?? CLOSURES;
    return Object.fromEntries(classTypes.filter((c) => c in all).map((c) => [c, all[c]]));
  }

  async stop(): Promise<void> {
    this.stopped++;
  }
}

/** In-process collaborators that record every call. */
export class FakeCollaborators {
  readonly calls: string[] = [];
  readonly scopes: RunScope[] = [];
  readonly servers: FakeServer[] = [];
  readonly startOptions: ServerStartOptions[] = [];
  readonly prompts: { label: string; prompt: PromptGraph }[] = [];

  constructor(private readonly opts: FakeOptions = {}) {}

  get collaborators(): Collaborators {
    return {
      environment: {
        install: async (scope): Promise<InstalledEnvironment> => {
          this.calls.push(`install:${scope.platform}`);
          this.scopes.push(scope);
          if (this.opts.installError) throw this.opts.installError;
          const comfyuiDir = path.join(scope.workspaceDir, "ComfyUI");
          const customNodesDir = path.join(comfyuiDir, "custom_nodes");
          return {
            comfyuiDir,
            python: path.join(scope.workspaceDir, ".venv", "bin", "python"),
            customNodesDir,
            extensionDir: path.join(customNodesDir, "ComfyUI-Example"),
            portable: false,
          };
        },
      },
      server: {
        start: async (scope, _environment, startOpts) => {
          this.calls.push(`server:${scope.platform}`);
          this.startOptions.push(startOpts);
          const server = new FakeServer(this.opts);
          this.servers.push(server);
          return server;
        },
      },
      instantiation: {
        instantiate: async (scope, _environment, classTypes) => {
          this.calls.push(`instantiate:${scope.platform}`);
          return this.opts.instantiation ?? { instantiated: [...classTypes], failures: [] };
        },
      },
      screenshots: {
        open: async (scope) => {
          this.calls.push(`screenshots:${scope.platform}`);
          return this.opts.screenshots ?? null;
        },
      },
      execution: {
        run: async (scope, _server, request) => {
          this.calls.push(`execute:${scope.platform}:${request.label}`);
          this.prompts.push({ label: request.label, prompt: request.prompt });
          if (this.opts.execute) return this.opts.execute(scope, request);
          return { promptId: `prompt-${this.prompts.length}`, outputs: {} };
        },
      },
    };
  }
}
