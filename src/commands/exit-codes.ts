/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  PUSH_FAILED: 1,
  UNAUTHORIZED: 2,
  INVALID_ARGS: 3,
  RELEASE_CONFLICT: 4,
  BAD_REQUEST: 5,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];
