/*
Purpose: catalog of configuration keys, their stages, defaults, value schemas and composites.
Assumptions: the catalog is fixed at build time; unknown keys in the file are ignored except
  AGENT_ENV_* pass-through variables.
Usage: CONFIG_KEYS.GCP_PROJECT_ID; requiredKeysForStage(2); COMPOSITE_KEYS.
*/

import { z } from "zod";

// =============================================================================
// TYPES
// =============================================================================

export type Stage = 1 | 2 | 3;

export const STAGES: readonly Stage[] = [1, 2, 3];

export const STAGE_LABELS: Record<Stage, string> = {
  1: "prerequisites",
  2: "deployment outputs",
  3: "integration outputs",
};

export type ConfigKeySpec = {
  key: string;
  stage: Stage;
  /** Required once the given stage is resolved. */
  required: boolean;
  description: string;
  default?: string;
  secret?: boolean;
  schema?: z.ZodType<string>;
};

export type CompositeKeySpec = {
  key: string;
  /** Path template; `{KEY}` placeholders name the component keys. */
  template: string;
  pattern: RegExp;
  /** Named capture group -> component key. */
  components: Record<string, string>;
  /** Capture groups that may hold either the project id or the project number. */
  projectGroups: string[];
};

// =============================================================================
// VALUE SCHEMAS
// =============================================================================

const projectIdSchema = z
  .string()
  .regex(/^[a-z][a-z0-9-]{4,28}[a-z0-9]$/, "must be a lowercase project id (6-30 chars)");
const projectNumberSchema = z.string().regex(/^\d+$/, "must be numeric");
const locationSchema = z
  .string()
  .regex(/^(global|us|eu|[a-z]+-[a-z]+\d+)$/, "must be a region such as us-central1");
const gcsUriSchema = z.string().regex(/^gs:\/\/[^/]+/, "must be a gs:// URI");
const httpsUrlSchema = z.string().url().startsWith("https://", "must be an https URL");
const resourceIdSchema = z
  .string()
  .regex(/^[a-zA-Z0-9][a-zA-Z0-9_-]*$/, "must contain only letters, digits, '-' or '_'");
const positiveIntSchema = z.string().regex(/^[1-9]\d*$/, "must be a positive integer");

// =============================================================================
// KEY CATALOG
// =============================================================================

const KEY_SPECS: ConfigKeySpec[] = [
  // Stage 1: prerequisites
  {
    key: "GCP_PROJECT_ID",
    stage: 1,
    required: true,
    description: "Cloud project id",
    schema: projectIdSchema,
  },
  {
    key: "GCP_PROJECT_NUMBER",
    stage: 1,
    required: true,
    description: "Cloud project number (integration service calls)",
    schema: projectNumberSchema,
  },
  {
    key: "GCP_LOCATION",
    stage: 1,
    required: true,
    default: "us-central1",
    description: "Region hosting the compute agent",
    schema: locationSchema,
  },
  {
    key: "GCP_STAGING_BUCKET",
    stage: 1,
    required: true,
    description: "Staging bucket for agent packages",
    schema: gcsUriSchema,
  },
  { key: "RAG_GCP_LOCATION", stage: 1, required: false, description: "Region of the document corpus", schema: locationSchema },
  { key: "RAG_CORPUS_SHORT_ID", stage: 1, required: false, description: "Document corpus id", schema: resourceIdSchema },
  { key: "RAG_CORPUS_ID", stage: 1, required: false, description: "Full document corpus resource name" },
  { key: "RAG_CORPUS_DISPLAY_NAME", stage: 1, required: false, default: "agent-knowledge-base", description: "Document corpus display name" },
  { key: "RAG_CORPUS_DESCRIPTION", stage: 1, required: false, description: "Document corpus description" },
  {
    key: "RAG_EMBEDDING_MODEL",
    stage: 1,
    required: false,
    default: "publishers/google/models/text-embedding-005",
    description: "Embedding model used by the document corpus",
  },
  { key: "AGENT_DISPLAY_NAME", stage: 1, required: false, default: "Deployed Agent", description: "Agent display name" },
  {
    key: "AGENT_DESCRIPTION",
    stage: 1,
    required: false,
    default: "AI agent hosted on the compute engine",
    description: "Agent description",
  },
  {
    key: "AGENT_TOOL_DESCRIPTION",
    stage: 1,
    required: false,
    default: "Answers questions using the deployed agent",
    description: "Tool description shown by the integration layer",
  },
  { key: "AGENT_PACKAGE_URI", stage: 1, required: false, description: "Serialized agent package", schema: gcsUriSchema },
  { key: "AGENT_REQUIREMENTS_URI", stage: 1, required: false, description: "Agent requirements file", schema: gcsUriSchema },
  { key: "AGENT_DEPENDENCIES_URI", stage: 1, required: false, description: "Agent dependency archive", schema: gcsUriSchema },
  {
    key: "OPERATION_TIMEOUT_SECONDS",
    stage: 1,
    required: false,
    default: "1200",
    description: "Ceiling for long-running remote operations",
    schema: positiveIntSchema,
  },

  // Stage 2: deployment outputs
  { key: "AGENT_ENGINE_ID", stage: 2, required: false, description: "Compute agent id", schema: resourceIdSchema },
  { key: "AGENT_ENGINE_RESOURCE_NAME", stage: 2, required: true, description: "Full compute agent resource name" },

  // Stage 3: integration outputs
  { key: "AGENTSPACE_APP_ID", stage: 3, required: true, description: "Integration app id", schema: resourceIdSchema },
  { key: "AGENTSPACE_AGENT_ID", stage: 3, required: true, description: "Agent link id", schema: resourceIdSchema },
  { key: "AGENTSPACE_APP_DISPLAY_NAME", stage: 3, required: false, default: "agent-app", description: "Integration app display name" },
  { key: "AGENTSPACE_COLLECTION", stage: 3, required: false, default: "default_collection", description: "Integration collection" },
  { key: "AGENTSPACE_ASSISTANT", stage: 3, required: false, default: "default_assistant", description: "Integration assistant" },
  { key: "OAUTH_AUTH_ID", stage: 3, required: false, description: "OAuth authorization id", schema: resourceIdSchema },
  { key: "OAUTH_CLIENT_ID", stage: 3, required: false, description: "OAuth client id" },
  { key: "OAUTH_CLIENT_SECRET", stage: 3, required: false, secret: true, description: "OAuth client secret" },
  { key: "OAUTH_AUTH_URI", stage: 3, required: false, description: "OAuth consent URL", schema: httpsUrlSchema },
  {
    key: "OAUTH_TOKEN_URI",
    stage: 3,
    required: false,
    default: "https://oauth2.googleapis.com/token",
    description: "OAuth token endpoint",
    schema: httpsUrlSchema,
  },
  { key: "DATA_STORE_ID", stage: 3, required: false, description: "Search data store id", schema: resourceIdSchema },
  {
    key: "DATA_STORE_DISPLAY_NAME",
    stage: 3,
    required: false,
    default: "agent-data-store",
    description: "Search data store display name",
  },
];

export const CONFIG_KEYS: ReadonlyMap<string, ConfigKeySpec> = new Map(
  KEY_SPECS.map((spec) => [spec.key, spec]),
);

export function listConfigKeys(): ConfigKeySpec[] {
  return [...KEY_SPECS];
}

export function requiredKeysForStage(stage: Stage): string[] {
  return KEY_SPECS.filter((spec) => spec.required && spec.stage <= stage).map((spec) => spec.key);
}

// =============================================================================
// DEPRECATED NAMES
// =============================================================================

/** Deprecated name -> canonical name. */
export const DEPRECATED_KEYS: Readonly<Record<string, string>> = {
  PROJECT_ID: "GCP_PROJECT_ID",
  PROJECT_NUMBER: "GCP_PROJECT_NUMBER",
  LOCATION: "GCP_LOCATION",
  RAG_CORPUS: "RAG_CORPUS_ID",
};

export const PASSTHROUGH_PREFIX = "AGENT_ENV_";

// =============================================================================
// COMPOSITES
// =============================================================================

export const COMPOSITE_KEYS: CompositeKeySpec[] = [
  {
    key: "AGENT_ENGINE_RESOURCE_NAME",
    template: "projects/{GCP_PROJECT_ID}/locations/{GCP_LOCATION}/reasoningEngines/{AGENT_ENGINE_ID}",
    pattern:
      /^projects\/(?<project>[^/]+)\/locations\/(?<location>[^/]+)\/reasoningEngines\/(?<id>[^/]+)$/,
    components: { project: "GCP_PROJECT_ID", location: "GCP_LOCATION", id: "AGENT_ENGINE_ID" },
    projectGroups: ["project"],
  },
  {
    key: "RAG_CORPUS_ID",
    template: "projects/{GCP_PROJECT_ID}/locations/{RAG_GCP_LOCATION}/ragCorpora/{RAG_CORPUS_SHORT_ID}",
    pattern:
      /^projects\/(?<project>[^/]+)\/locations\/(?<location>[^/]+)\/ragCorpora\/(?<id>[a-zA-Z0-9_-]+)$/,
    components: { project: "GCP_PROJECT_ID", location: "RAG_GCP_LOCATION", id: "RAG_CORPUS_SHORT_ID" },
    projectGroups: ["project"],
  },
];

/** Keys filled from another key when absent. */
export const FALLBACK_KEYS: Readonly<Record<string, string>> = {
  RAG_GCP_LOCATION: "GCP_LOCATION",
};

// =============================================================================
// PLACEHOLDERS
// =============================================================================

const PLACEHOLDER_VALUES = new Set([
  "your-project-id",
  "your-project-number",
  "your-bucket",
  "123456789012",
  "changeme",
  "change_me",
  "todo",
]);

const PLACEHOLDER_PATTERNS = [/\byour-[a-z-]+/i, /\/path\/to\//, /\b123456789012\b/, /^<.+>$/];

export function isPlaceholderValue(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (PLACEHOLDER_VALUES.has(normalized)) return true;
  return PLACEHOLDER_PATTERNS.some((pattern) => pattern.test(value));
}
