import type { LevelDescriptor } from "./context.js";
import { runExecution } from "./execution.js";
import { runInstall } from "./install.js";
import { runInstantiation } from "./instantiation.js";
import { runRegistration } from "./registration.js";
import { runStaticCapture } from "./static-capture.js";
import { runSyntax } from "./syntax.js";
import { runValidation } from "./validation.js";

/** Level descriptors in execution order. */
export const LEVELS: readonly LevelDescriptor[] = [
  { level: "syntax", failureKind: "SyntaxError", run: runSyntax },
  { level: "install", failureKind: "EnvironmentError", run: runInstall },
  { level: "registration", failureKind: "RegistrationError", run: runRegistration },
  { level: "instantiation", failureKind: "InstantiationError", run: runInstantiation },
  { level: "static_capture", failureKind: "CaptureError", run: runStaticCapture },
  { level: "validation", failureKind: "ValidationError.Schema", run: runValidation },
  { level: "execution", failureKind: "ExecutionError", run: runExecution },
];
