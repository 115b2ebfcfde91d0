/*
Purpose: grant and check the project roles the managed service agents need before a deployment can work.
Assumptions: roles are granted on the project; one read-modify-write of the policy per setup run.
Usage: const result = await new IamBindingManager({ iam, projectNumber }).setup({ dryRun: false }).
*/

import { NULL_SINK, logOrchestratorEvent, type EventSink } from "../../core/logger.js";
import { serviceAgentEmail } from "../../gcp/endpoints.js";
import { hasBinding, withBinding, type IamPolicy, type ProjectIamClient } from "../../gcp/iam-policy.js";

// =============================================================================
// REQUIRED BINDINGS
// =============================================================================

export type ServiceAgentGrant = {
  /** Suffix of the gcp-sa-* service agent domain. */
  service: string;
  label: string;
  roles: readonly string[];
  purpose: string;
};

export const SERVICE_AGENT_GRANTS: readonly ServiceAgentGrant[] = [
  {
    service: "aiplatform-re",
    label: "Reasoning Engine service agent",
    roles: ["roles/aiplatform.user"],
    purpose: "Query the document corpus while the agent runs",
  },
  {
    service: "discoveryengine",
    label: "Discovery Engine service agent",
    roles: ["roles/aiplatform.user", "roles/aiplatform.viewer"],
    purpose: "Call the deployed agent from the integration app",
  },
];

export type RoleBindingStatus = {
  label: string;
  member: string;
  role: string;
  granted: boolean;
};

export type IamSetupResult = {
  dryRun: boolean;
  added: RoleBindingStatus[];
  existing: RoleBindingStatus[];
};

export type IamBindingManagerDeps = {
  iam: Pick<ProjectIamClient, "getPolicy" | "setPolicy">;
  projectNumber: string;
  events?: EventSink;
};

// =============================================================================
// MANAGER
// =============================================================================

export class IamBindingManager {
  private readonly events: EventSink;

  constructor(private readonly deps: IamBindingManagerDeps) {
    this.events = deps.events ?? NULL_SINK;
  }

  async verify(): Promise<RoleBindingStatus[]> {
    const statuses = this.inspect(await this.deps.iam.getPolicy());
    logOrchestratorEvent(this.events, "iam.verified", {
      missing: statuses.filter((status) => !status.granted).map((status) => `${status.member} ${status.role}`),
    });
    return statuses;
  }

  async setup(options: { dryRun: boolean }): Promise<IamSetupResult> {
    const policy = await this.deps.iam.getPolicy();
    const statuses = this.inspect(policy);
    const added = statuses.filter((status) => !status.granted);
    const existing = statuses.filter((status) => status.granted);

    if (added.length > 0 && !options.dryRun) {
      const updated = added.reduce(
        (next: IamPolicy, status) => withBinding(next, status.role, status.member),
        policy,
      );
      await this.deps.iam.setPolicy(updated);
    }

    logOrchestratorEvent(this.events, "iam.setup", {
      dryRun: options.dryRun,
      added: added.map((status) => `${status.member} ${status.role}`),
    });
    return { dryRun: options.dryRun, added, existing };
  }

  private inspect(policy: IamPolicy): RoleBindingStatus[] {
    return SERVICE_AGENT_GRANTS.flatMap((grant) => {
      const member = `serviceAccount:${serviceAgentEmail(this.deps.projectNumber, grant.service)}`;
      return grant.roles.map((role) => ({
        label: grant.label,
        member,
        role,
        granted: hasBinding(policy, role, member),
      }));
    });
  }
}
