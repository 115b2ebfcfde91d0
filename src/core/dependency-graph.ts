/*
Purpose: the fixed prerequisite graph between resource kinds, and the identity keys each kind persists.
Assumptions: the graph is acyclic and known at build time; RESOURCE_KINDS lists kinds in dependency order.
Usage: prerequisitesFor("IntegrationAgentLink") -> edges to locate before acting on a link.
*/

import type { Stage } from "./config.js";
import { RESOURCE_COMMAND_NAMES, RESOURCE_KINDS, type ResourceKind } from "./resources.js";

// =============================================================================
// TYPES
// =============================================================================

export type Cardinality = "exactly-one" | "zero-or-one";

export type Verb = "create" | "get" | "update" | "delete" | "list";

export const MUTATING_VERBS: ReadonlySet<Verb> = new Set(["create", "update", "delete"]);

export type DependencyEdge = {
  prerequisite: ResourceKind;
  dependent: ResourceKind;
  cardinality: Cardinality;
  /** Verbs on the dependent for which the prerequisite is enforced. */
  verbs: readonly Verb[];
  /** Shown when a zero-or-one prerequisite is absent. */
  reducedCapability?: string;
};

/** Where a kind's identifier lives once it exists. */
export type KindIdentity = {
  stage: Stage;
  keys: readonly string[];
};

// =============================================================================
// GRAPH
// =============================================================================

export const DEPENDENCY_EDGES: readonly DependencyEdge[] = [
  {
    prerequisite: "DocumentCorpus",
    dependent: "ComputeAgent",
    cardinality: "zero-or-one",
    verbs: ["create", "update"],
    reducedCapability: "No document corpus found; the agent is deployed without corpus retrieval.",
  },
  {
    prerequisite: "IntegrationApp",
    dependent: "SearchDataStore",
    cardinality: "exactly-one",
    verbs: ["create", "update"],
  },
  {
    prerequisite: "ComputeAgent",
    dependent: "IntegrationAgentLink",
    cardinality: "exactly-one",
    verbs: ["create", "update"],
  },
  {
    prerequisite: "IntegrationApp",
    dependent: "IntegrationAgentLink",
    cardinality: "exactly-one",
    verbs: ["create", "update"],
  },
  {
    prerequisite: "OAuthAuthorization",
    dependent: "IntegrationAgentLink",
    cardinality: "zero-or-one",
    verbs: ["create", "update"],
    reducedCapability: "No OAuth authorization configured; the agent is linked without user-delegated access.",
  },
];

/** Update resolves `stage` with `keys` required on top of it. */
export const KIND_IDENTITY: Readonly<Record<ResourceKind, KindIdentity>> = {
  DocumentCorpus: { stage: 1, keys: ["RAG_CORPUS_ID"] },
  ComputeAgent: { stage: 2, keys: ["AGENT_ENGINE_RESOURCE_NAME"] },
  IntegrationApp: { stage: 1, keys: ["AGENTSPACE_APP_ID"] },
  SearchDataStore: { stage: 1, keys: ["AGENTSPACE_APP_ID", "DATA_STORE_ID"] },
  OAuthAuthorization: { stage: 1, keys: ["OAUTH_AUTH_ID"] },
  IntegrationAgentLink: { stage: 3, keys: ["AGENTSPACE_APP_ID", "AGENTSPACE_AGENT_ID"] },
};

/** Kinds that `register --force` deletes and recreates even when the instance already matches. */
export const REPLACE_MATCHING_ON_FORCE: ReadonlySet<ResourceKind> = new Set(["IntegrationAgentLink"]);

// =============================================================================
// QUERIES
// =============================================================================

/** Direct prerequisites of `kind`, in RESOURCE_KINDS order. */
export function prerequisitesFor(kind: ResourceKind): DependencyEdge[] {
  return DEPENDENCY_EDGES.filter((edge) => edge.dependent === kind).sort(
    (a, b) => RESOURCE_KINDS.indexOf(a.prerequisite) - RESOURCE_KINDS.indexOf(b.prerequisite),
  );
}

export function isEnforced(edge: DependencyEdge, verb: Verb): boolean {
  return edge.verbs.includes(verb);
}

export function registerCommand(kind: ResourceKind): string {
  return `agentctl ${RESOURCE_COMMAND_NAMES[kind]} register`;
}

/**
 * Kind to create first so that `kind` can exist: the earliest missing exactly-one prerequisite
 * (searched transitively), or `kind` itself when all of them are present.
 */
export function earliestMissing(kind: ResourceKind, present: ReadonlySet<ResourceKind>): ResourceKind {
  for (const edge of prerequisitesFor(kind)) {
    if (edge.cardinality !== "exactly-one" || present.has(edge.prerequisite)) continue;
    return earliestMissing(edge.prerequisite, present);
  }
  return kind;
}

export function remediationFor(kind: ResourceKind, present: ReadonlySet<ResourceKind>): string {
  return registerCommand(earliestMissing(kind, present));
}
