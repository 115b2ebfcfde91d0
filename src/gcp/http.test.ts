import { describe, expect, it } from "vitest";
import { z } from "zod";

import { FakeFetch } from "../app/orchestrator/__tests__/fakes.js";
import { RemoteError } from "../core/errors.js";

import { StaticTokenProvider } from "./auth.js";
import { GcpHttpClient, classifyStatus, toRemoteError } from "./http.js";

const URL_BASE = "https://api.test/v1/things";
const nameSchema = z.object({ name: z.string() });

function makeClient(fake: FakeFetch, quotaProject?: string): GcpHttpClient {
  return new GcpHttpClient({
    tokens: new StaticTokenProvider("test-token"),
    fetch: fake.fetch,
    quotaProject,
  });
}

describe("GcpHttpClient.request", () => {
  it("sends the bearer token, quota project and JSON body", async () => {
    const fake = new FakeFetch().respond(200, { name: "things/t1", done: true });
    const http = makeClient(fake, "4242");

    const result = await http.request(URL_BASE, nameSchema, {
      method: "POST",
      query: { thingId: "t1", skipped: undefined },
      body: { displayName: "Thing" },
    });

    expect(result).toEqual({ name: "things/t1" });
    expect(fake.requests).toEqual([
      {
        url: `${URL_BASE}?thingId=t1`,
        method: "POST",
        headers: {
          accept: "application/json",
          authorization: "Bearer test-token",
          "content-type": "application/json",
          "x-goog-user-project": "4242",
        },
        body: { displayName: "Thing" },
      },
    ]);
  });

  it("omits the quota project header when none is configured", async () => {
    const fake = new FakeFetch().respond(200, { name: "things/t1" });

    await makeClient(fake).request(URL_BASE, nameSchema);

    expect(fake.requests[0]?.headers).toEqual({
      accept: "application/json",
      authorization: "Bearer test-token",
    });
  });

  it("maps error responses into the taxonomy", async () => {
    const fake = new FakeFetch().respond(404, {
      error: { code: 404, message: "engine missing", status: "NOT_FOUND" },
    });

    const error = await makeClient(fake)
      .request(URL_BASE, nameSchema, { resource: "IntegrationApp", remoteId: "engines/app1" })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RemoteError);
    expect(error).toMatchObject({
      kind: "NotFound",
      message: "NOT_FOUND: engine missing",
      resource: "IntegrationApp",
      remoteId: "engines/app1",
      statusCode: 404,
    });
  });

  it("reports transport failures as RemoteUnavailable", async () => {
    const fake = new FakeFetch().fail(new Error("socket hang up"));

    await expect(makeClient(fake).request(URL_BASE, nameSchema)).rejects.toMatchObject({
      kind: "RemoteUnavailable",
      message: `GET ${URL_BASE} failed: socket hang up`,
    });
  });

  it("rejects responses that do not match the schema", async () => {
    const fake = new FakeFetch().respond(200, { id: 7 });

    await expect(makeClient(fake).request(URL_BASE, nameSchema)).rejects.toMatchObject({
      kind: "RemoteUnavailable",
      message: `Unexpected response from GET ${URL_BASE}: name Required`,
    });
  });

  it("accepts an empty body", async () => {
    const fake = new FakeFetch().respond(200);

    await expect(makeClient(fake).request(URL_BASE, z.unknown(), { method: "DELETE" })).resolves.toEqual({});
  });
});

describe("GcpHttpClient.paginate", () => {
  it("follows nextPageToken until it is absent", async () => {
    const fake = new FakeFetch()
      .respond(200, { things: [{ name: "a" }, { name: "b" }], nextPageToken: "p2" })
      .respond(200, { things: [{ name: "c" }] });
    const names: string[] = [];

    for await (const item of makeClient(fake).paginate(URL_BASE, "things", nameSchema)) {
      names.push(item.name);
    }

    expect(names).toEqual(["a", "b", "c"]);
    expect(fake.requests.map((request) => request.url)).toEqual([URL_BASE, `${URL_BASE}?pageToken=p2`]);
  });

  it("treats a page without items as empty", async () => {
    const fake = new FakeFetch().respond(200, {});
    const names: string[] = [];

    for await (const item of makeClient(fake).paginate(URL_BASE, "things", nameSchema)) {
      names.push(item.name);
    }

    expect(names).toEqual([]);
  });
});

describe("status classification", () => {
  it("reads 409 by intent and groups retryable statuses", () => {
    expect(classifyStatus(409, "create")).toBe("AlreadyExists");
    expect(classifyStatus(409, "mutate")).toBe("Conflict");
    expect(classifyStatus(412, "mutate")).toBe("Conflict");
    expect(classifyStatus(403, "read")).toBe("PermissionDenied");
    expect(classifyStatus(401, "read")).toBe("PermissionDenied");
    expect(classifyStatus(429, "read")).toBe("RemoteUnavailable");
    expect(classifyStatus(503, "create")).toBe("RemoteUnavailable");
    expect(classifyStatus(400, "create")).toBe("InvalidSpec");
  });

  it("falls back to the HTTP status when the body has no error message", () => {
    const error = toRemoteError(502, "<html>bad gateway</html>", { resource: "ComputeAgent" });

    expect(error.kind).toBe("RemoteUnavailable");
    expect(error.message).toBe("HTTP 502");
    expect(error.resource).toBe("ComputeAgent");
  });
});
