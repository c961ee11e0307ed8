import { LabError, type LabErrorCode } from "../core/errors.js";

/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  FAILED: 1,
  INVALID_ARGS: 2,
  NOT_FOUND: 3,
  PORT_CONFLICT: 4,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

export function exitCodeFor(code: LabErrorCode): ExitCode {
  switch (code) {
    case "INVALID_IDENTIFIER":
    case "ROOT_NOT_FOUND":
      return EXIT.NOT_FOUND;
    case "PORT_CONFLICT":
      return EXIT.PORT_CONFLICT;
    case "CONFIG_INVALID":
      return EXIT.INVALID_ARGS;
    case "SUBPROCESS_FAILED":
      return EXIT.FAILED;
  }
}

export type CommandFailure = { ok: false; error: string; exitCode: ExitCode };

/** Maps a thrown error onto a command failure; anything that is not a LabError is a plain failure. */
export function failureFromError(e: unknown): CommandFailure {
  if (e instanceof LabError) {
    const error = e.detail ? `${e.message}\n${e.detail}` : e.message;
    return { ok: false, error, exitCode: exitCodeFor(e.code) };
  }
  return { ok: false, error: e instanceof Error ? e.message : String(e), exitCode: EXIT.FAILED };
}
