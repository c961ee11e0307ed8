export type LabErrorCode =
  | "ROOT_NOT_FOUND"
  | "INVALID_IDENTIFIER"
  | "SUBPROCESS_FAILED"
  | "PORT_CONFLICT"
  | "CONFIG_INVALID";

/**
 * Error raised by the registry core. `detail` carries the verbatim diagnostic
 * text of a failed subprocess, when there is one.
 */
export class LabError extends Error {
  readonly code: LabErrorCode;
  readonly detail?: string;

  constructor(code: LabErrorCode, message: string, detail?: string) {
    super(message);
    this.name = "LabError";
    this.code = code;
    this.detail = detail;
  }
}

export function isLabError(err: unknown, code?: LabErrorCode): err is LabError {
  return err instanceof LabError && (code === undefined || err.code === code);
}

const PORT_CONFLICT_PATTERNS = [
  /address already in use/i,
  /port is already allocated/i,
  /ports are not available/i,
];

/** True when compose diagnostics describe a host port that cannot be bound. */
export function isPortConflict(text: string): boolean {
  return PORT_CONFLICT_PATTERNS.some((re) => re.test(text));
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
