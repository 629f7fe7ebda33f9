/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  VALIDATION_FAILED: 1,
  INVALID_ARGS: 2,
  BUNDLE_INACCESSIBLE: 3,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];
