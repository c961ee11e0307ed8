import type { LabErrorCode } from "../core/errors.js";

export type LifecycleFailure = {
  ok: false;
  code: LabErrorCode;
  /** Diagnostic text of the failing command, verbatim. */
  error: string;
  portConflict?: boolean;
};

export type LifecycleResult = { ok: true } | LifecycleFailure;

export type ImageCheckResult = {
  missing: string[];
  warning?: string;
};

export type ReadinessResult = {
  ready: boolean;
  port?: number;
};

export type ContainerSummary = {
  id: string;
  name: string;
  image: string;
  status: string;
  ports: string;
};
