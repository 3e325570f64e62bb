/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  LEVEL_FAILED: 1,
  CONFIG_ERROR: 2,
  INVALID_ARGS: 3,
  WORKSPACE_CONFLICT: 4,
  CANCELLED: 130,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];
