/**
 * Resource model shared by clients, the orchestrator and the status reporter.
 */

// =============================================================================
// KINDS + STATES
// =============================================================================

export const RESOURCE_KINDS = [
  "DocumentCorpus",
  "ComputeAgent",
  "IntegrationApp",
  "SearchDataStore",
  "OAuthAuthorization",
  "IntegrationAgentLink",
] as const;

export type ResourceKind = (typeof RESOURCE_KINDS)[number];

export const LIFECYCLE_STATES = [
  "Absent",
  "Creating",
  "Active",
  "Updating",
  "Deleting",
  "Failed",
] as const;

export type LifecycleState = (typeof LIFECYCLE_STATES)[number];

const LIVE_STATES: ReadonlySet<LifecycleState> = new Set(["Creating", "Active", "Updating"]);

/** CLI noun used for each kind in commands and remediation hints. */
export const RESOURCE_COMMAND_NAMES: Record<ResourceKind, string> = {
  DocumentCorpus: "corpus",
  ComputeAgent: "compute-agent",
  IntegrationApp: "app",
  SearchDataStore: "datastore",
  OAuthAuthorization: "oauth",
  IntegrationAgentLink: "agent-link",
};

// =============================================================================
// HANDLES + SPECS
// =============================================================================

export type SpecValue = string | readonly string[];

/** Normalized, comparable view of a resource's configuration. */
export type SpecFields = Readonly<Record<string, SpecValue>>;

export type ResourceHandle = {
  kind: ResourceKind;
  /** Full remote resource path. */
  id: string;
  displayName: string;
  state: LifecycleState;
  spec: SpecFields;
};

export type DesiredSpec = {
  displayName: string;
  fields: SpecFields;
  /** Caller-chosen identifier for kinds whose API takes one on create. */
  requestedId?: string;
  /** Values sent on create/update but never returned by the remote service. */
  secrets?: Readonly<Record<string, string>>;
  /** Resource path new instances are created under, for nested kinds. */
  parent?: string;
  warnings?: string[];
};

export function isLive(handle: ResourceHandle): boolean {
  return LIVE_STATES.has(handle.state);
}

export function specMatches(desired: SpecFields, actual: SpecFields): boolean {
  return Object.keys(desired).every((key) => {
    const want = desired[key];
    const have = actual[key];
    if (want === undefined) return true;
    if (have === undefined) return false;
    return normalizeSpecValue(want) === normalizeSpecValue(have);
  });
}

export function diffSpecFields(desired: SpecFields, actual: SpecFields): string[] {
  return Object.keys(desired).filter((key) => {
    const want = desired[key];
    const have = actual[key];
    if (want === undefined) return false;
    return have === undefined || normalizeSpecValue(want) !== normalizeSpecValue(have);
  });
}

function normalizeSpecValue(value: SpecValue): string {
  if (typeof value === "string") return value;
  return [...value].sort().join("\n");
}

export function shortName(fullPath: string): string {
  return fullPath.split("/").pop() ?? fullPath;
}
