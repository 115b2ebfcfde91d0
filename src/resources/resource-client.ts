/**
 * Uniform resource client contract.
 * Purpose: let the orchestrator walk dependencies without branching on resource kind.
 * Assumptions: handles returned by get/list/create reflect live remote state; nothing is cached.
 * Usage: implement per kind by extending BaseResourceClient.
 */

import type { ConfigurationSet } from "../core/config-set.js";
import { isDeployError } from "../core/errors.js";
import type { EventSink } from "../core/logger.js";
import type { DesiredSpec, ResourceHandle, ResourceKind, SpecFields } from "../core/resources.js";
import type { GcpHttpClient } from "../gcp/http.js";
import { OperationPoller, type Clock } from "../gcp/operations.js";

// =============================================================================
// TYPES
// =============================================================================

/** Handles of prerequisites already located during the current operation. */
export type Prerequisites = Partial<Record<ResourceKind, ResourceHandle>>;

export interface ResourceClient {
  readonly kind: ResourceKind;

  /** Remote identifier persisted in configuration, if any. */
  configuredId(prerequisites: Prerequisites): string | undefined;
  /** Name used to find an instance when no identifier is configured. */
  displayName(): string;
  /** Desired state built from configuration and prerequisite handles; may fail with ConfigMissing. */
  desiredSpec(prerequisites: Prerequisites): DesiredSpec;
  /** Identifiers the caller must persist for later stages. */
  outputs(handle: ResourceHandle): Record<string, string>;

  locate(prerequisites: Prerequisites): Promise<ResourceHandle | undefined>;

  create(spec: DesiredSpec): Promise<ResourceHandle>;
  get(id: string): Promise<ResourceHandle>;
  update(id: string, spec: DesiredSpec): Promise<ResourceHandle>;
  delete(id: string): Promise<void>;
  list(prerequisites: Prerequisites): AsyncIterable<ResourceHandle>;
}

export type SearchHit = {
  id: string;
  title: string;
  link?: string;
};

export type SearchResult = {
  totalSize: number;
  hits: SearchHit[];
};

/** The integration app client also serves the console link and test searches. */
export interface AppResourceClient extends ResourceClient {
  consoleUrl(handle: ResourceHandle): string;
  search(handle: ResourceHandle, query: string, pageSize?: number): Promise<SearchResult>;
}

export type ResourceClientRegistry = {
  DocumentCorpus: ResourceClient;
  ComputeAgent: ResourceClient;
  IntegrationApp: AppResourceClient;
  SearchDataStore: ResourceClient;
  OAuthAuthorization: ResourceClient;
  IntegrationAgentLink: ResourceClient;
};

export type ResourceClientDeps = {
  config: ConfigurationSet;
  /** Client for the integration service (carries the quota project header). */
  discovery: GcpHttpClient;
  /** Client for the compute and corpus services. */
  aiPlatform: GcpHttpClient;
  clock: Clock;
  events: EventSink;
  operationTimeoutMs?: number;
};

// =============================================================================
// BASE CLASS
// =============================================================================

export abstract class BaseResourceClient implements ResourceClient {
  abstract readonly kind: ResourceKind;

  constructor(protected readonly deps: ResourceClientDeps) {}

  abstract configuredId(prerequisites: Prerequisites): string | undefined;
  abstract displayName(): string;
  abstract desiredSpec(prerequisites: Prerequisites): DesiredSpec;
  abstract outputs(handle: ResourceHandle): Record<string, string>;
  abstract create(spec: DesiredSpec): Promise<ResourceHandle>;
  abstract get(id: string): Promise<ResourceHandle>;
  abstract update(id: string, spec: DesiredSpec): Promise<ResourceHandle>;
  abstract delete(id: string): Promise<void>;
  abstract list(prerequisites: Prerequisites): AsyncIterable<ResourceHandle>;

  async locate(prerequisites: Prerequisites): Promise<ResourceHandle | undefined> {
    const id = this.configuredId(prerequisites);
    if (id) {
      return this.getIfPresent(id);
    }

    const name = this.displayName();
    for await (const handle of this.list(prerequisites)) {
      if (handle.displayName === name) return handle;
    }
    return undefined;
  }

  protected get config(): ConfigurationSet {
    return this.deps.config;
  }

  protected async getIfPresent(id: string): Promise<ResourceHandle | undefined> {
    try {
      return await this.get(id);
    } catch (err) {
      if (isDeployError(err, "NotFound")) return undefined;
      throw err;
    }
  }

  protected createPoller(http: GcpHttpClient, baseUrl: string): OperationPoller {
    return new OperationPoller({
      http,
      operationUrl: (name) => `${baseUrl}/${name}`,
      clock: this.deps.clock,
      timeoutMs: this.deps.operationTimeoutMs,
      events: this.deps.events,
    });
  }

  protected timestampSuffix(): number {
    return Math.floor(this.deps.clock.now() / 1000);
  }
}

export function slugify(value: string): string {
  const slug = value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return slug || "agent";
}

export function stringField(spec: { fields: SpecFields }, key: string): string | undefined {
  const value = spec.fields[key];
  return typeof value === "string" ? value : undefined;
}

export function listField(spec: { fields: SpecFields }, key: string): string[] {
  const value = spec.fields[key];
  if (value === undefined) return [];
  return typeof value === "string" ? [value] : [...value];
}
