import { z } from "zod";

import type { DesiredSpec, ResourceHandle } from "../core/resources.js";
import { shortName } from "../core/resources.js";
import {
  collectionPath,
  consoleAppUrl,
  discoveryUrl,
  DISCOVERY_ENGINE_BASE,
  enginePath,
} from "../gcp/endpoints.js";
import { operationSchema, type OperationPoller } from "../gcp/operations.js";

import {
  BaseResourceClient,
  slugify,
  stringField,
  type AppResourceClient,
  type Prerequisites,
  type SearchResult,
} from "./resource-client.js";

// =============================================================================
// REMOTE SHAPES
// =============================================================================

export const engineSchema = z.object({
  name: z.string(),
  displayName: z.string().optional(),
  solutionType: z.string().optional(),
  dataStoreIds: z.array(z.string()).optional(),
});

type Engine = z.infer<typeof engineSchema>;

const searchResponseSchema = z.object({
  totalSize: z.number().optional(),
  results: z
    .array(
      z.object({
        id: z.string().optional(),
        document: z
          .object({
            name: z.string().optional(),
            derivedStructData: z.record(z.unknown()).optional(),
          })
          .optional(),
      }),
    )
    .optional(),
});

const SOLUTION_TYPE = "SOLUTION_TYPE_SEARCH";

// =============================================================================
// CLIENT
// =============================================================================

/** UI-integration app (a search engine record) that agents are linked into. */
export class IntegrationAppClient extends BaseResourceClient implements AppResourceClient {
  readonly kind = "IntegrationApp" as const;

  configuredId(_prerequisites: Prerequisites): string | undefined {
    const appId = this.config.get("AGENTSPACE_APP_ID");
    return appId ? enginePath(this.projectNumber(), this.collection(), appId) : undefined;
  }

  displayName(): string {
    return this.config.require("AGENTSPACE_APP_DISPLAY_NAME");
  }

  desiredSpec(_prerequisites: Prerequisites): DesiredSpec {
    const displayName = this.displayName();
    return {
      displayName,
      requestedId:
        this.config.get("AGENTSPACE_APP_ID") ?? `${slugify(displayName)}_${this.timestampSuffix()}`,
      fields: { displayName, solutionType: SOLUTION_TYPE },
    };
  }

  outputs(handle: ResourceHandle): Record<string, string> {
    return { AGENTSPACE_APP_ID: shortName(handle.id) };
  }

  async create(spec: DesiredSpec): Promise<ResourceHandle> {
    const appId = spec.requestedId ?? `${slugify(spec.displayName)}_${this.timestampSuffix()}`;
    const operation = await this.deps.discovery.request(
      discoveryUrl(`${this.collectionPath()}/engines`),
      operationSchema,
      {
        method: "POST",
        intent: "create",
        query: { engineId: appId },
        resource: this.kind,
        body: {
          displayName: spec.displayName,
          solutionType: stringField(spec, "solutionType") ?? SOLUTION_TYPE,
        },
      },
    );

    const id = enginePath(this.projectNumber(), this.collection(), appId);
    const done = await this.poller().wait(operation, { resource: this.kind, remoteId: id });
    const created = engineSchema.safeParse(done.response);
    return created.success ? toHandle(created.data) : this.get(id);
  }

  async get(id: string): Promise<ResourceHandle> {
    const engine = await this.deps.discovery.request(discoveryUrl(id), engineSchema, {
      resource: this.kind,
      remoteId: id,
    });
    return toHandle(engine);
  }

  async update(id: string, spec: DesiredSpec): Promise<ResourceHandle> {
    const engine = await this.deps.discovery.request(discoveryUrl(id), engineSchema, {
      method: "PATCH",
      intent: "mutate",
      query: { updateMask: "displayName" },
      resource: this.kind,
      remoteId: id,
      body: { displayName: spec.displayName },
    });
    return toHandle(engine);
  }

  async delete(id: string): Promise<void> {
    const operation = await this.deps.discovery.request(discoveryUrl(id), operationSchema, {
      method: "DELETE",
      intent: "mutate",
      resource: this.kind,
      remoteId: id,
    });
    await this.poller().wait(operation, { resource: this.kind, remoteId: id });
  }

  async *list(_prerequisites: Prerequisites): AsyncGenerator<ResourceHandle> {
    const engines = this.deps.discovery.paginate(
      discoveryUrl(`${this.collectionPath()}/engines`),
      "engines",
      engineSchema,
      { resource: this.kind },
    );
    for await (const engine of engines) {
      yield toHandle(engine);
    }
  }

  // ===========================================================================
  // APP EXTRAS
  // ===========================================================================

  consoleUrl(handle: ResourceHandle): string {
    return consoleAppUrl(this.config.require("GCP_PROJECT_ID"), shortName(handle.id));
  }

  /** Runs a test query against the app's default serving config. */
  async search(handle: ResourceHandle, query: string, pageSize = 10): Promise<SearchResult> {
    const response = await this.deps.discovery.request(
      discoveryUrl(`${handle.id}/servingConfigs/default_search:search`),
      searchResponseSchema,
      {
        method: "POST",
        intent: "read",
        resource: this.kind,
        remoteId: handle.id,
        body: {
          query,
          pageSize,
          spellCorrectionSpec: { mode: "AUTO" },
          contentSearchSpec: { snippetSpec: { returnSnippet: true } },
        },
      },
    );

    const hits = (response.results ?? []).map((result, index) => {
      const data = result.document?.derivedStructData ?? {};
      const title = typeof data.title === "string" ? data.title : "(untitled)";
      const link = typeof data.link === "string" ? data.link : undefined;
      return { id: result.id ?? String(index + 1), title, link };
    });

    return { totalSize: response.totalSize ?? hits.length, hits };
  }

  private projectNumber(): string {
    return this.config.require("GCP_PROJECT_NUMBER");
  }

  private collection(): string {
    return this.config.require("AGENTSPACE_COLLECTION");
  }

  private collectionPath(): string {
    return collectionPath(this.projectNumber(), this.collection());
  }

  private poller(): OperationPoller {
    return this.createPoller(this.deps.discovery, DISCOVERY_ENGINE_BASE);
  }
}

function toHandle(engine: Engine): ResourceHandle {
  return {
    kind: "IntegrationApp",
    id: engine.name,
    displayName: engine.displayName ?? "",
    state: "Active",
    spec: {
      displayName: engine.displayName ?? "",
      solutionType: engine.solutionType ?? SOLUTION_TYPE,
      dataStoreIds: engine.dataStoreIds ?? [],
    },
  };
}
