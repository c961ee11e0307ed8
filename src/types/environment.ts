/** Environment registry data model. */
export const ENVIRONMENT_STATUSES = ["unknown", "running", "stopped"] as const;

export type EnvironmentStatus = (typeof ENVIRONMENT_STATUSES)[number];

/** One compose-manifest directory. `identifier` is the root-relative, forward-slash path. */
export type EnvironmentRecord = {
  identifier: string;
  category: string;
  label: string;
  services: string[];
  hostPorts: Record<string, string>;
  status: EnvironmentStatus;
  hasExploitArtifacts: boolean;
  hasBundledImages: boolean;
  hasDocumentation: boolean;
  hasLocalizedDocumentation: boolean;
  hasAllImagesLocally: boolean;
};

/** Sorted by identifier, ascending. */
export type RegistrySnapshot = EnvironmentRecord[];

/** Persisted form of a snapshot. */
export type CacheEnvelope = {
  snapshot: RegistrySnapshot;
  /** Epoch milliseconds. */
  capturedAt: number;
  manifestSetFingerprint: string;
  rootPath: string;
};

export type ImageFile = {
  name: string;
  path: string;
  bytes: number;
};

export type ExploitFile = {
  filename: string;
  /** Path relative to the environment directory. */
  path: string;
  content: string;
  size: number;
  lines: number;
  usage: string;
};

export type Readme = {
  filename: string;
  localized: boolean;
  text: string;
};

/** Raw contents of a single environment, for presentation layers to render. */
export type EnvironmentDetail = {
  identifier: string;
  category: string;
  label: string;
  directory: string;
  manifestPath: string;
  manifestText: string;
  images: ImageFile[];
  exploitFiles: ExploitFile[];
  readme: Readme | null;
  record: EnvironmentRecord | null;
};

export type RegistryStats = {
  total: number;
  running: number;
  withExploit: number;
  withImages: number;
  categories: Record<string, number>;
};
