import { z } from "zod";

import { PrerequisiteError, isDeployError } from "../core/errors.js";
import type { DesiredSpec, ResourceHandle } from "../core/resources.js";
import { shortName } from "../core/resources.js";
import {
  collectionPath,
  discoveryUrl,
  DISCOVERY_ENGINE_BASE,
  enginePath,
} from "../gcp/endpoints.js";
import { operationSchema, type OperationPoller } from "../gcp/operations.js";

import { engineSchema } from "./integration-app.js";
import { BaseResourceClient, slugify, stringField, type Prerequisites } from "./resource-client.js";

const dataStoreSchema = z.object({
  name: z.string(),
  displayName: z.string().optional(),
  industryVertical: z.string().optional(),
});

type DataStore = z.infer<typeof dataStoreSchema>;

const INDUSTRY_VERTICAL = "GENERIC";

/**
 * Legacy search data store attached to the integration app.
 * `attachedTo` in the handle spec names the app whose dataStoreIds include this store.
 */
export class SearchDataStoreClient extends BaseResourceClient {
  readonly kind = "SearchDataStore" as const;

  configuredId(_prerequisites: Prerequisites): string | undefined {
    const id = this.config.get("DATA_STORE_ID");
    return id ? `${this.collectionPath()}/dataStores/${id}` : undefined;
  }

  displayName(): string {
    return this.config.require("DATA_STORE_DISPLAY_NAME");
  }

  async locate(prerequisites: Prerequisites): Promise<ResourceHandle | undefined> {
    const handle = await super.locate(prerequisites);
    if (!handle) return undefined;

    const app = prerequisites.IntegrationApp;
    const attached = app?.spec.dataStoreIds ?? [];
    const storeId = shortName(handle.id);
    const isAttached = typeof attached === "string" ? attached === storeId : attached.includes(storeId);
    return {
      ...handle,
      spec: { ...handle.spec, attachedTo: app && isAttached ? shortName(app.id) : "" },
    };
  }

  desiredSpec(prerequisites: Prerequisites): DesiredSpec {
    const app = prerequisites.IntegrationApp;
    if (!app) {
      throw new PrerequisiteError("PrerequisiteMissing", "A data store can only be attached to an existing app.", {
        resource: "IntegrationApp",
        suggestion: "agentctl app register",
      });
    }

    const displayName = this.displayName();
    return {
      displayName,
      requestedId:
        this.config.get("DATA_STORE_ID") ?? `${slugify(displayName)}_${this.timestampSuffix()}`,
      parent: app.id,
      fields: {
        displayName,
        industryVertical: INDUSTRY_VERTICAL,
        attachedTo: shortName(app.id),
      },
    };
  }

  outputs(handle: ResourceHandle): Record<string, string> {
    return { DATA_STORE_ID: shortName(handle.id) };
  }

  async create(spec: DesiredSpec): Promise<ResourceHandle> {
    const storeId = spec.requestedId ?? `${slugify(spec.displayName)}_${this.timestampSuffix()}`;
    const id = `${this.collectionPath()}/dataStores/${storeId}`;

    const operation = await this.deps.discovery.request(
      discoveryUrl(`${this.collectionPath()}/dataStores`),
      operationSchema,
      {
        method: "POST",
        intent: "create",
        query: { dataStoreId: storeId },
        resource: this.kind,
        body: {
          displayName: spec.displayName,
          industryVertical: stringField(spec, "industryVertical") ?? INDUSTRY_VERTICAL,
          solutionTypes: ["SOLUTION_TYPE_SEARCH"],
          contentConfig: "CONTENT_REQUIRED",
        },
      },
    );
    await this.poller().wait(operation, { resource: this.kind, remoteId: id });

    const handle = await this.get(id);
    return spec.parent ? this.attach(handle, spec.parent) : handle;
  }

  async get(id: string): Promise<ResourceHandle> {
    const store = await this.deps.discovery.request(discoveryUrl(id), dataStoreSchema, {
      resource: this.kind,
      remoteId: id,
    });
    return toHandle(store);
  }

  /** Re-attaches the store to the app named in the desired spec; display names are immutable here. */
  async update(id: string, spec: DesiredSpec): Promise<ResourceHandle> {
    const handle = await this.get(id);
    return spec.parent ? this.attach(handle, spec.parent) : handle;
  }

  async delete(id: string): Promise<void> {
    const appId = this.config.get("AGENTSPACE_APP_ID");
    if (appId) {
      await this.detach(id, enginePath(this.projectNumber(), this.collection(), appId));
    }

    const operation = await this.deps.discovery.request(discoveryUrl(id), operationSchema, {
      method: "DELETE",
      intent: "mutate",
      resource: this.kind,
      remoteId: id,
    });
    await this.poller().wait(operation, { resource: this.kind, remoteId: id });
  }

  async *list(_prerequisites: Prerequisites): AsyncGenerator<ResourceHandle> {
    const stores = this.deps.discovery.paginate(
      discoveryUrl(`${this.collectionPath()}/dataStores`),
      "dataStores",
      dataStoreSchema,
      { resource: this.kind },
    );
    for await (const store of stores) {
      yield toHandle(store);
    }
  }

  // ===========================================================================
  // ATTACHMENT
  // ===========================================================================

  private async attach(handle: ResourceHandle, appPath: string): Promise<ResourceHandle> {
    const storeId = shortName(handle.id);
    const engine = await this.deps.discovery.request(discoveryUrl(appPath), engineSchema, {
      resource: "IntegrationApp",
      remoteId: appPath,
    });
    const current = engine.dataStoreIds ?? [];

    if (!current.includes(storeId)) {
      await this.deps.discovery.request(discoveryUrl(appPath), engineSchema, {
        method: "PATCH",
        intent: "mutate",
        query: { updateMask: "dataStoreIds" },
        resource: "IntegrationApp",
        remoteId: appPath,
        body: { dataStoreIds: [...current, storeId] },
      });
    }

    return { ...handle, spec: { ...handle.spec, attachedTo: shortName(appPath) } };
  }

  private async detach(id: string, appPath: string): Promise<void> {
    const storeId = shortName(id);
    let engine: z.infer<typeof engineSchema>;
    try {
      engine = await this.deps.discovery.request(discoveryUrl(appPath), engineSchema, {
        resource: "IntegrationApp",
        remoteId: appPath,
      });
    } catch (err) {
      // A deleted app holds no references to the store.
      if (isDeployError(err, "NotFound")) return;
      throw err;
    }
    const current = engine.dataStoreIds ?? [];
    if (!current.includes(storeId)) return;

    await this.deps.discovery.request(discoveryUrl(appPath), engineSchema, {
      method: "PATCH",
      intent: "mutate",
      query: { updateMask: "dataStoreIds" },
      resource: "IntegrationApp",
      remoteId: appPath,
      body: { dataStoreIds: current.filter((item) => item !== storeId) },
    });
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

function toHandle(store: DataStore): ResourceHandle {
  return {
    kind: "SearchDataStore",
    id: store.name,
    displayName: store.displayName ?? "",
    state: "Active",
    spec: {
      displayName: store.displayName ?? "",
      industryVertical: store.industryVertical ?? INDUSTRY_VERTICAL,
    },
  };
}
