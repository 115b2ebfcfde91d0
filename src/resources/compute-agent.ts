import { z } from "zod";

import { RemoteError } from "../core/errors.js";
import type { JsonObject } from "../core/logger.js";
import type { DesiredSpec, ResourceHandle } from "../core/resources.js";
import { aiPlatformBase, locationPath } from "../gcp/endpoints.js";
import { operationSchema, type OperationPoller } from "../gcp/operations.js";

import {
  BaseResourceClient,
  listField,
  stringField,
  type Prerequisites,
} from "./resource-client.js";

// =============================================================================
// REMOTE SHAPES
// =============================================================================

const engineSchema = z.object({
  name: z.string(),
  displayName: z.string().optional(),
  description: z.string().optional(),
  spec: z
    .object({
      packageSpec: z
        .object({
          pickleObjectGcsUri: z.string().optional(),
          requirementsGcsUri: z.string().optional(),
          dependencyFilesGcsUri: z.string().optional(),
        })
        .optional(),
      deploymentSpec: z
        .object({
          env: z.array(z.object({ name: z.string(), value: z.string().optional() })).optional(),
        })
        .optional(),
    })
    .optional(),
});

type ReasoningEngine = z.infer<typeof engineSchema>;

const UPDATE_MASK = ["displayName", "description", "spec.packageSpec", "spec.deploymentSpec.env"];

// =============================================================================
// CLIENT
// =============================================================================

/** Agent runtime registered with the compute engine service. */
export class ComputeAgentClient extends BaseResourceClient {
  readonly kind = "ComputeAgent" as const;

  configuredId(_prerequisites: Prerequisites): string | undefined {
    return this.config.get("AGENT_ENGINE_RESOURCE_NAME");
  }

  displayName(): string {
    return this.config.require("AGENT_DISPLAY_NAME");
  }

  desiredSpec(prerequisites: Prerequisites): DesiredSpec {
    const artifacts = this.config.requireAll(
      ["AGENT_PACKAGE_URI", "AGENT_REQUIREMENTS_URI"],
      "deploy the compute agent",
    );
    const warnings: string[] = [];
    const env: Record<string, string> = {
      GCP_PROJECT_ID: this.config.require("GCP_PROJECT_ID"),
      GCP_LOCATION: this.location(),
      ...this.config.passthroughEnv(),
    };

    const corpus = prerequisites.DocumentCorpus;
    const legacyDataStore = this.config.get("DATA_STORE_ID");
    if (corpus) {
      env.RAG_CORPUS_ID = corpus.id;
      if (legacyDataStore) {
        warnings.push(
          "Both a document corpus and DATA_STORE_ID are configured; the document corpus is used and the data store retrieval path is ignored (deprecated).",
        );
      }
    } else if (legacyDataStore) {
      env.DATA_STORE_ID = legacyDataStore;
      warnings.push(
        "Using DATA_STORE_ID as the agent's retrieval source is deprecated; register a document corpus instead.",
      );
    }

    const dependencies = this.config.get("AGENT_DEPENDENCIES_URI");
    return {
      displayName: this.displayName(),
      fields: {
        displayName: this.displayName(),
        description: this.config.require("AGENT_DESCRIPTION"),
        packageUri: artifacts.AGENT_PACKAGE_URI,
        requirementsUri: artifacts.AGENT_REQUIREMENTS_URI,
        ...(dependencies !== undefined ? { dependenciesUri: dependencies } : {}),
        env: Object.entries(env).map(([name, value]) => `${name}=${value}`),
      },
      warnings,
    };
  }

  outputs(handle: ResourceHandle): Record<string, string> {
    return { AGENT_ENGINE_RESOURCE_NAME: handle.id };
  }

  async create(spec: DesiredSpec): Promise<ResourceHandle> {
    const operation = await this.deps.aiPlatform.request(
      `${this.base()}/${this.parent()}/reasoningEngines`,
      operationSchema,
      { method: "POST", intent: "create", resource: this.kind, body: buildEngineBody(spec) },
    );
    const done = await this.poller().wait(operation, { resource: this.kind });
    return this.handleFromOperation(done.response);
  }

  async get(id: string): Promise<ResourceHandle> {
    const engine = await this.deps.aiPlatform.request(`${this.base()}/${id}`, engineSchema, {
      resource: this.kind,
      remoteId: id,
    });
    return toHandle(engine);
  }

  async update(id: string, spec: DesiredSpec): Promise<ResourceHandle> {
    const operation = await this.deps.aiPlatform.request(`${this.base()}/${id}`, operationSchema, {
      method: "PATCH",
      intent: "mutate",
      query: { updateMask: UPDATE_MASK.join(",") },
      resource: this.kind,
      remoteId: id,
      body: buildEngineBody(spec),
    });
    await this.poller().wait(operation, { resource: this.kind, remoteId: id });
    return this.get(id);
  }

  async delete(id: string): Promise<void> {
    const operation = await this.deps.aiPlatform.request(`${this.base()}/${id}`, operationSchema, {
      method: "DELETE",
      intent: "mutate",
      query: { force: "true" },
      resource: this.kind,
      remoteId: id,
    });
    await this.poller().wait(operation, { resource: this.kind, remoteId: id });
  }

  async *list(_prerequisites: Prerequisites): AsyncGenerator<ResourceHandle> {
    const engines = this.deps.aiPlatform.paginate(
      `${this.base()}/${this.parent()}/reasoningEngines`,
      "reasoningEngines",
      engineSchema,
      { resource: this.kind },
    );
    for await (const engine of engines) {
      yield toHandle(engine);
    }
  }

  private handleFromOperation(response: unknown): ResourceHandle {
    const parsed = engineSchema.safeParse(response);
    if (!parsed.success) {
      throw new RemoteError("RemoteUnavailable", "Deployment finished without an engine resource.", {
        resource: this.kind,
      });
    }
    return toHandle(parsed.data);
  }

  private location(): string {
    return this.config.require("GCP_LOCATION");
  }

  private parent(): string {
    return locationPath(this.config.require("GCP_PROJECT_ID"), this.location());
  }

  private base(): string {
    return aiPlatformBase(this.location());
  }

  private poller(): OperationPoller {
    return this.createPoller(this.deps.aiPlatform, this.base());
  }
}

// =============================================================================
// MAPPING
// =============================================================================

export function buildEngineBody(spec: DesiredSpec): JsonObject {
  return {
    displayName: spec.displayName,
    description: stringField(spec, "description"),
    spec: {
      packageSpec: {
        pickleObjectGcsUri: stringField(spec, "packageUri"),
        requirementsGcsUri: stringField(spec, "requirementsUri"),
        dependencyFilesGcsUri: stringField(spec, "dependenciesUri"),
      },
      deploymentSpec: {
        env: listField(spec, "env").map((entry) => {
          const eq = entry.indexOf("=");
          return { name: entry.slice(0, eq), value: entry.slice(eq + 1) };
        }),
      },
    },
  };
}

function toHandle(engine: ReasoningEngine): ResourceHandle {
  const pkg = engine.spec?.packageSpec;
  const env = engine.spec?.deploymentSpec?.env ?? [];
  return {
    kind: "ComputeAgent",
    id: engine.name,
    displayName: engine.displayName ?? "",
    state: "Active",
    spec: {
      displayName: engine.displayName ?? "",
      description: engine.description ?? "",
      packageUri: pkg?.pickleObjectGcsUri ?? "",
      requirementsUri: pkg?.requirementsGcsUri ?? "",
      ...(pkg?.dependencyFilesGcsUri !== undefined ? { dependenciesUri: pkg.dependencyFilesGcsUri } : {}),
      env: env.map((item) => `${item.name}=${item.value ?? ""}`),
    },
  };
}
