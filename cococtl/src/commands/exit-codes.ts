/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  STAGE_FAILED: 1,
  CONFIG_INVALID: 2,
  INVALID_ARGS: 3,
  TIMED_OUT: 4,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];
