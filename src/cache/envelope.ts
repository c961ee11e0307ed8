import { compileGuard, type SchemaGuard } from "../schema/ajv.js";
import { ENVIRONMENT_STATUSES, type CacheEnvelope } from "../types/environment.js";

const RECORD_SCHEMA = {
  type: "object",
  required: [
    "identifier",
    "category",
    "label",
    "services",
    "hostPorts",
    "status",
    "hasExploitArtifacts",
    "hasBundledImages",
    "hasDocumentation",
    "hasLocalizedDocumentation",
    "hasAllImagesLocally",
  ],
  properties: {
    identifier: { type: "string", minLength: 1 },
    category: { type: "string" },
    label: { type: "string" },
    services: { type: "array", items: { type: "string" } },
    hostPorts: { type: "object", additionalProperties: { type: "string" } },
    status: { type: "string", enum: [...ENVIRONMENT_STATUSES] },
    hasExploitArtifacts: { type: "boolean" },
    hasBundledImages: { type: "boolean" },
    hasDocumentation: { type: "boolean" },
    hasLocalizedDocumentation: { type: "boolean" },
    hasAllImagesLocally: { type: "boolean" },
  },
};

export const ENVELOPE_SCHEMA = {
  type: "object",
  required: ["snapshot", "capturedAt", "manifestSetFingerprint", "rootPath"],
  properties: {
    snapshot: { type: "array", items: RECORD_SCHEMA },
    capturedAt: { type: "number", minimum: 0 },
    manifestSetFingerprint: { type: "string", minLength: 1 },
    rootPath: { type: "string", minLength: 1 },
  },
};

let guard: SchemaGuard<CacheEnvelope> | null = null;

function envelopeGuard(): SchemaGuard<CacheEnvelope> {
  guard ??= compileGuard<CacheEnvelope>(ENVELOPE_SCHEMA);
  return guard;
}

export type EnvelopeParseResult = { ok: true; envelope: CacheEnvelope } | { ok: false; error: string };

export function parseEnvelope(text: string): EnvelopeParseResult {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (e) {
    return { ok: false, error: `not JSON: ${e instanceof Error ? e.message : String(e)}` };
  }
  const g = envelopeGuard();
  if (!g.is(data)) return { ok: false, error: g.errors() };
  return { ok: true, envelope: data };
}

export function serializeEnvelope(envelope: CacheEnvelope): string {
  return JSON.stringify(envelope, null, 2) + "\n";
}
