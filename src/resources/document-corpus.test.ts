import { describe, expect, it } from "vitest";

import { BASE_CONFIG, FakeFetch, createClientDeps } from "../app/orchestrator/__tests__/fakes.js";

import { DocumentCorpusClient, normalizeModel } from "./document-corpus.js";

const AI_BASE = "https://us-central1-aiplatform.googleapis.com/v1";
const PARENT = "projects/demo-project/locations/us-central1";
const CORPUS = `${PARENT}/ragCorpora/kb1`;

function makeClient(fake: FakeFetch, file: Record<string, string> = BASE_CONFIG): DocumentCorpusClient {
  return new DocumentCorpusClient(createClientDeps(fake, file));
}

describe("DocumentCorpusClient", () => {
  it("compares embedding models by their publisher path", () => {
    expect(normalizeModel(`${PARENT}/publishers/google/models/text-embedding-005`)).toBe(
      "publishers/google/models/text-embedding-005",
    );
    expect(normalizeModel("custom-model")).toBe("custom-model");
  });

  it("creates the corpus with a project-qualified embedding endpoint", async () => {
    const fake = new FakeFetch().respond(200, {
      name: `${PARENT}/operations/op1`,
      done: true,
      response: {
        name: CORPUS,
        displayName: "kb",
        ragEmbeddingModelConfig: {
          vertexPredictionEndpoint: { endpoint: `${PARENT}/publishers/google/models/text-embedding-005` },
        },
      },
    });
    const client = makeClient(fake, { ...BASE_CONFIG, RAG_CORPUS_DISPLAY_NAME: "kb" });
    const spec = client.desiredSpec({});

    const handle = await client.create(spec);

    expect(fake.requests[0]?.url).toBe(`${AI_BASE}/${PARENT}/ragCorpora`);
    expect(fake.requests[0]?.body).toEqual({
      displayName: "kb",
      ragEmbeddingModelConfig: {
        vertexPredictionEndpoint: { endpoint: `${PARENT}/publishers/google/models/text-embedding-005` },
      },
    });
    expect(handle.spec).toEqual(spec.fields);
    expect(client.outputs(handle)).toEqual({ RAG_CORPUS_ID: CORPUS });
  });

  it("maps the corpus status to lifecycle states", async () => {
    const fake = new FakeFetch()
      .respond(200, { name: CORPUS, corpusStatus: { state: "INITIALIZED" } })
      .respond(200, { name: CORPUS, corpusStatus: { state: "ERROR" } })
      .respond(200, { name: CORPUS });
    const client = makeClient(fake);

    await expect(client.get(CORPUS)).resolves.toMatchObject({ state: "Creating" });
    await expect(client.get(CORPUS)).resolves.toMatchObject({ state: "Failed" });
    await expect(client.get(CORPUS)).resolves.toMatchObject({ state: "Active" });
  });

  it("locates the configured corpus by its resource name", async () => {
    const fake = new FakeFetch().respond(200, { name: CORPUS, displayName: "kb" });
    const client = makeClient(fake, { ...BASE_CONFIG, RAG_CORPUS_SHORT_ID: "kb1" });

    const handle = await client.locate({});

    expect(handle?.id).toBe(CORPUS);
    expect(fake.requests[0]?.url).toBe(`${AI_BASE}/${CORPUS}`);
  });
});
