import { z } from "zod";

import { RemoteError } from "../core/errors.js";
import type { DesiredSpec, LifecycleState, ResourceHandle } from "../core/resources.js";
import { aiPlatformBase, locationPath } from "../gcp/endpoints.js";
import { OperationPoller, operationSchema } from "../gcp/operations.js";

import { BaseResourceClient, stringField, type Prerequisites } from "./resource-client.js";

const corpusSchema = z.object({
  name: z.string(),
  displayName: z.string().optional(),
  description: z.string().optional(),
  ragEmbeddingModelConfig: z
    .object({
      vertexPredictionEndpoint: z.object({ endpoint: z.string().optional() }).optional(),
    })
    .optional(),
  corpusStatus: z.object({ state: z.string().optional() }).optional(),
});

type Corpus = z.infer<typeof corpusSchema>;

const CORPUS_STATES: Record<string, LifecycleState> = {
  INITIALIZED: "Creating",
  ACTIVE: "Active",
  ERROR: "Failed",
};

/** Managed document collection used for retrieval by the compute agent. */
export class DocumentCorpusClient extends BaseResourceClient {
  readonly kind = "DocumentCorpus" as const;

  configuredId(_prerequisites: Prerequisites): string | undefined {
    return this.config.get("RAG_CORPUS_ID");
  }

  displayName(): string {
    return this.config.require("RAG_CORPUS_DISPLAY_NAME");
  }

  desiredSpec(_prerequisites: Prerequisites): DesiredSpec {
    const model = this.config.require("RAG_EMBEDDING_MODEL");
    const description = this.config.get("RAG_CORPUS_DESCRIPTION");
    return {
      displayName: this.displayName(),
      fields: {
        displayName: this.displayName(),
        embeddingModel: normalizeModel(model),
        ...(description !== undefined ? { description } : {}),
      },
    };
  }

  outputs(handle: ResourceHandle): Record<string, string> {
    return { RAG_CORPUS_ID: handle.id };
  }

  async create(spec: DesiredSpec): Promise<ResourceHandle> {
    const operation = await this.deps.aiPlatform.request(
      `${this.base()}/${this.parent()}/ragCorpora`,
      operationSchema,
      {
        method: "POST",
        intent: "create",
        resource: this.kind,
        body: {
          displayName: spec.displayName,
          description: stringField(spec, "description"),
          ragEmbeddingModelConfig: {
            vertexPredictionEndpoint: {
              endpoint: `${this.parent()}/${stringField(spec, "embeddingModel") ?? ""}`,
            },
          },
        },
      },
    );
    const done = await this.poller().wait(operation, { resource: this.kind });
    return this.handleFromOperation(done.response);
  }

  async get(id: string): Promise<ResourceHandle> {
    const corpus = await this.deps.aiPlatform.request(`${this.base()}/${id}`, corpusSchema, {
      resource: this.kind,
      remoteId: id,
    });
    return this.toHandle(corpus);
  }

  async update(id: string, spec: DesiredSpec): Promise<ResourceHandle> {
    const operation = await this.deps.aiPlatform.request(`${this.base()}/${id}`, operationSchema, {
      method: "PATCH",
      intent: "mutate",
      resource: this.kind,
      remoteId: id,
      body: {
        name: id,
        displayName: spec.displayName,
        description: stringField(spec, "description"),
      },
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
    const corpora = this.deps.aiPlatform.paginate(
      `${this.base()}/${this.parent()}/ragCorpora`,
      "ragCorpora",
      corpusSchema,
      { resource: this.kind },
    );
    for await (const corpus of corpora) {
      yield this.toHandle(corpus);
    }
  }

  private handleFromOperation(response: unknown): ResourceHandle {
    const parsed = corpusSchema.safeParse(response);
    if (!parsed.success) {
      throw new RemoteError("RemoteUnavailable", "Corpus operation finished without a corpus.", {
        resource: this.kind,
      });
    }
    return this.toHandle(parsed.data);
  }

  private toHandle(corpus: Corpus): ResourceHandle {
    const endpoint = corpus.ragEmbeddingModelConfig?.vertexPredictionEndpoint?.endpoint;
    const state = corpus.corpusStatus?.state;
    return {
      kind: this.kind,
      id: corpus.name,
      displayName: corpus.displayName ?? "",
      state: (state && CORPUS_STATES[state]) || "Active",
      spec: {
        displayName: corpus.displayName ?? "",
        embeddingModel: endpoint ? normalizeModel(endpoint) : "",
        ...(corpus.description !== undefined ? { description: corpus.description } : {}),
      },
    };
  }

  private location(): string {
    return this.config.require("RAG_GCP_LOCATION");
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

/** Reduces a model reference to its `publishers/...` suffix so project-qualified forms compare equal. */
export function normalizeModel(model: string): string {
  const index = model.indexOf("publishers/");
  return index >= 0 ? model.slice(index) : model;
}
