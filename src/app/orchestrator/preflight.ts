/*
Purpose: read-only remote checks run before a first deployment: credentials, project access, enabled APIs.
Assumptions: a failed credential check skips the rest; any other failure is reported and the checks continue.
Usage: const report = await new ProjectPreflight({ tokens, http, projectId }).run().
*/

import { z } from "zod";

import { DeployError, type DeployErrorKind } from "../../core/errors.js";
import { NULL_SINK, logOrchestratorEvent, type EventSink } from "../../core/logger.js";
import type { TokenProvider } from "../../gcp/auth.js";
import { RESOURCE_MANAGER_BASE, SERVICE_USAGE_BASE } from "../../gcp/endpoints.js";
import type { GcpHttpClient } from "../../gcp/http.js";

export const REQUIRED_APIS = [
  "aiplatform.googleapis.com",
  "storage.googleapis.com",
  "cloudbuild.googleapis.com",
  "compute.googleapis.com",
  "discoveryengine.googleapis.com",
] as const;

export type PreflightCheck = {
  name: string;
  ok: boolean;
  detail: string;
  /** Set on every failed check. */
  errorKind?: DeployErrorKind;
  remediation?: string;
};

export type PreflightReport = {
  checks: PreflightCheck[];
  ok: boolean;
};

export type ProjectPreflightDeps = {
  tokens: TokenProvider;
  http: Pick<GcpHttpClient, "request">;
  projectId: string;
  events?: EventSink;
};

const projectSchema = z.object({ projectId: z.string().optional(), state: z.string().optional() });
const serviceSchema = z.object({ state: z.string().optional() });

export class ProjectPreflight {
  private readonly events: EventSink;

  constructor(private readonly deps: ProjectPreflightDeps) {
    this.events = deps.events ?? NULL_SINK;
  }

  async run(): Promise<PreflightReport> {
    const checks: PreflightCheck[] = [];

    const credentials = await this.check("credentials", async () => {
      await this.deps.tokens.getToken();
      return { ok: true, detail: "access token available" };
    });
    checks.push(credentials);

    if (credentials.ok) {
      checks.push(await this.check("project", () => this.checkProject()));
      for (const api of REQUIRED_APIS) {
        checks.push(await this.check(api, () => this.checkApi(api)));
      }
    }

    const report = { checks, ok: checks.every((check) => check.ok) };
    logOrchestratorEvent(this.events, "preflight.finished", {
      failed: checks.filter((check) => !check.ok).map((check) => check.name),
    });
    return report;
  }

  private async checkProject(): Promise<Omit<PreflightCheck, "name">> {
    const { projectId } = this.deps;
    const project = await this.deps.http.request(`${RESOURCE_MANAGER_BASE}/projects/${projectId}`, projectSchema);
    if (project.state && project.state !== "ACTIVE") {
      return {
        ok: false,
        detail: `project ${projectId} is ${project.state}`,
        errorKind: "PrerequisiteNotReady",
        remediation: "Pick an active project in GCP_PROJECT_ID",
      };
    }
    return { ok: true, detail: `project ${projectId} is reachable` };
  }

  private async checkApi(api: string): Promise<Omit<PreflightCheck, "name">> {
    const { projectId } = this.deps;
    const service = await this.deps.http.request(
      `${SERVICE_USAGE_BASE}/projects/${projectId}/services/${api}`,
      serviceSchema,
    );
    if (service.state === "ENABLED") return { ok: true, detail: "enabled" };
    return {
      ok: false,
      detail: "not enabled",
      errorKind: "PrerequisiteMissing",
      remediation: `gcloud services enable ${api} --project=${projectId}`,
    };
  }

  private async check(
    name: string,
    body: () => Promise<Omit<PreflightCheck, "name">>,
  ): Promise<PreflightCheck> {
    try {
      return { name, ...(await body()) };
    } catch (err) {
      if (!(err instanceof DeployError)) throw err;
      return { name, ok: false, detail: err.message, errorKind: err.kind, remediation: err.suggestion };
    }
  }
}
