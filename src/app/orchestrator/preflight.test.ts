import { describe, expect, it } from "vitest";

import { RemoteError } from "../../core/errors.js";
import { StaticTokenProvider, type TokenProvider } from "../../gcp/auth.js";
import { GcpHttpClient } from "../../gcp/http.js";

import { FakeFetch } from "./__tests__/fakes.js";
import { ProjectPreflight, REQUIRED_APIS } from "./preflight.js";

class FailingTokens implements TokenProvider {
  async getToken(): Promise<string> {
    throw new RemoteError("PermissionDenied", "Could not obtain an access token from gcloud.", {
      suggestion: "Run `gcloud auth login` or set GOOGLE_OAUTH_ACCESS_TOKEN",
    });
  }
}

function makePreflight(fake: FakeFetch, tokens: TokenProvider = new StaticTokenProvider("test-token")): ProjectPreflight {
  const http = new GcpHttpClient({ tokens, fetch: fake.fetch });
  return new ProjectPreflight({ tokens, http, projectId: "demo-project" });
}

function respondApis(fake: FakeFetch, disabled: string[] = []): FakeFetch {
  for (const api of REQUIRED_APIS) {
    fake.respond(200, { name: `projects/4242/services/${api}`, state: disabled.includes(api) ? "DISABLED" : "ENABLED" });
  }
  return fake;
}

describe("ProjectPreflight", () => {
  it("passes when the project is reachable and every API is enabled", async () => {
    const fake = respondApis(new FakeFetch().respond(200, { projectId: "demo-project", state: "ACTIVE" }));

    const report = await makePreflight(fake).run();

    expect(report.ok).toBe(true);
    expect(report.checks.map((check) => check.name)).toEqual(["credentials", "project", ...REQUIRED_APIS]);
    expect(fake.requests.slice(0, 2).map((request) => request.url)).toEqual([
      "https://cloudresourcemanager.googleapis.com/v3/projects/demo-project",
      "https://serviceusage.googleapis.com/v1/projects/demo-project/services/aiplatform.googleapis.com",
    ]);
  });

  it("names the command that enables a disabled API", async () => {
    const fake = respondApis(new FakeFetch().respond(200, { state: "ACTIVE" }), ["discoveryengine.googleapis.com"]);

    const report = await makePreflight(fake).run();

    expect(report.ok).toBe(false);
    expect(report.checks.filter((check) => !check.ok)).toEqual([
      {
        name: "discoveryengine.googleapis.com",
        ok: false,
        detail: "not enabled",
        errorKind: "PrerequisiteMissing",
        remediation: "gcloud services enable discoveryengine.googleapis.com --project=demo-project",
      },
    ]);
  });

  it("keeps checking the APIs after the project lookup is refused", async () => {
    const fake = respondApis(
      new FakeFetch().respond(403, { error: { code: 403, status: "PERMISSION_DENIED", message: "caller lacks access" } }),
    );

    const report = await makePreflight(fake).run();

    expect(report.checks[1]).toEqual({
      name: "project",
      ok: false,
      detail: "PERMISSION_DENIED: caller lacks access",
      errorKind: "PermissionDenied",
      remediation: undefined,
    });
    expect(report.checks).toHaveLength(2 + REQUIRED_APIS.length);
    expect(report.checks.slice(2).every((check) => check.ok)).toBe(true);
  });

  it("stops after the credential check fails", async () => {
    const fake = new FakeFetch();

    const report = await makePreflight(fake, new FailingTokens()).run();

    expect(report).toEqual({
      ok: false,
      checks: [
        {
          name: "credentials",
          ok: false,
          detail: "Could not obtain an access token from gcloud.",
          errorKind: "PermissionDenied",
          remediation: "Run `gcloud auth login` or set GOOGLE_OAUTH_ACCESS_TOKEN",
        },
      ],
    });
    expect(fake.requests).toEqual([]);
  });
});
