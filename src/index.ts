export { runTests, type RunOptions, type RunCommandResult } from "./commands/run.js";
export { init } from "./commands/init.js";
export { publish } from "./commands/publish.js";
export { EXIT, type ExitCode } from "./commands/exit-codes.js";
export { loadConfig } from "./config/loader.js";
export { loadProject } from "./config/project.js";
export { PlatformMatrixRunner, planMatrix, type MatrixPlan } from "./core/matrix.js";
export { LevelPipeline } from "./core/pipeline.js";
export { ALL_LEVELS, planLevels, type LevelName } from "./core/state-machine.js";
export { EngineError, type ErrorInfo, type ErrorKind } from "./core/errors.js";
export { CudaClassifier, classifyCudaNodes } from "./cuda/classifier.js";
export { ValidationEngine } from "./validation/engine.js";
export { ResultAggregator } from "./report/aggregator.js";
export { parseWorkflow } from "./workflow/model.js";
export { parseObjectInfo } from "./workflow/node-definitions.js";
export type { Collaborators } from "./collaborators/types.js";
export type { RunReport } from "./types/report.js";
export type { TestConfig, Project } from "./types/config.js";
