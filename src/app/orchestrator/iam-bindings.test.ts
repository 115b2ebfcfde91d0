import { describe, expect, it } from "vitest";

import { StaticTokenProvider } from "../../gcp/auth.js";
import { GcpHttpClient } from "../../gcp/http.js";
import { ProjectIamClient } from "../../gcp/iam-policy.js";

import { FakeFetch, MemorySink } from "./__tests__/fakes.js";
import { IamBindingManager } from "./iam-bindings.js";

const ENGINE_AGENT = "serviceAccount:service-4242@gcp-sa-aiplatform-re.iam.gserviceaccount.com";
const DISCOVERY_AGENT = "serviceAccount:service-4242@gcp-sa-discoveryengine.iam.gserviceaccount.com";

const PARTIAL_POLICY = {
  version: 1,
  etag: "etag-1",
  bindings: [
    { role: "roles/aiplatform.user", members: ["user:dev@example.com", ENGINE_AGENT] },
    { role: "roles/owner", members: ["user:dev@example.com"] },
  ],
};

const FULL_POLICY = {
  etag: "etag-2",
  bindings: [
    { role: "roles/aiplatform.user", members: [ENGINE_AGENT, DISCOVERY_AGENT] },
    { role: "roles/aiplatform.viewer", members: [DISCOVERY_AGENT] },
  ],
};

function makeManager(fake: FakeFetch, events = new MemorySink()): IamBindingManager {
  const http = new GcpHttpClient({ tokens: new StaticTokenProvider("test-token"), fetch: fake.fetch });
  return new IamBindingManager({ iam: new ProjectIamClient(http, "demo-project"), projectNumber: "4242", events });
}

describe("IamBindingManager.verify", () => {
  it("reports every required role of both service agents", async () => {
    const manager = makeManager(new FakeFetch().respond(200, PARTIAL_POLICY));

    const statuses = await manager.verify();

    expect(statuses.map((status) => [status.member, status.role, status.granted])).toEqual([
      [ENGINE_AGENT, "roles/aiplatform.user", true],
      [DISCOVERY_AGENT, "roles/aiplatform.user", false],
      [DISCOVERY_AGENT, "roles/aiplatform.viewer", false],
    ]);
  });
});

describe("IamBindingManager.setup", () => {
  it("grants every missing role in a single policy write", async () => {
    const fake = new FakeFetch().respond(200, PARTIAL_POLICY).respond(200, FULL_POLICY);
    const events = new MemorySink();

    const result = await makeManager(fake, events).setup({ dryRun: false });

    expect(result.added.map((status) => status.role)).toEqual(["roles/aiplatform.user", "roles/aiplatform.viewer"]);
    expect(result.existing.map((status) => status.member)).toEqual([ENGINE_AGENT]);
    expect(fake.requests).toHaveLength(2);
    expect(fake.requests[1]?.body).toEqual({
      policy: {
        version: 3,
        etag: "etag-1",
        bindings: [
          { role: "roles/aiplatform.user", members: ["user:dev@example.com", ENGINE_AGENT, DISCOVERY_AGENT] },
          { role: "roles/owner", members: ["user:dev@example.com"] },
          { role: "roles/aiplatform.viewer", members: [DISCOVERY_AGENT] },
        ],
      },
    });
    expect(events.events).toEqual([
      {
        type: "iam.setup",
        payload: {
          dryRun: false,
          added: [`${DISCOVERY_AGENT} roles/aiplatform.user`, `${DISCOVERY_AGENT} roles/aiplatform.viewer`],
        },
      },
    ]);
  });

  it("only reads the policy on a dry run", async () => {
    const fake = new FakeFetch().respond(200, PARTIAL_POLICY);

    const result = await makeManager(fake).setup({ dryRun: true });

    expect(result).toMatchObject({ dryRun: true });
    expect(result.added).toHaveLength(2);
    expect(fake.requests.map((request) => request.url)).toEqual([
      "https://cloudresourcemanager.googleapis.com/v3/projects/demo-project:getIamPolicy",
    ]);
  });

  it("leaves a complete policy untouched", async () => {
    const fake = new FakeFetch().respond(200, FULL_POLICY);

    const result = await makeManager(fake).setup({ dryRun: false });

    expect(result.added).toEqual([]);
    expect(result.existing).toHaveLength(3);
    expect(fake.requests).toHaveLength(1);
  });

  it("surfaces a concurrent policy change as a conflict", async () => {
    const fake = new FakeFetch()
      .respond(200, PARTIAL_POLICY)
      .respond(409, { error: { code: 409, status: "ABORTED", message: "etag mismatch" } });

    const error = await makeManager(fake).setup({ dryRun: false }).catch((err: unknown) => err);

    expect(error).toMatchObject({ kind: "Conflict", message: "ABORTED: etag mismatch", statusCode: 409 });
  });
});
