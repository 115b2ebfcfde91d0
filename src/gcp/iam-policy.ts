/*
Purpose: read and write a project's IAM policy through the Resource Manager REST API.
Assumptions: policies are read at version 3 so conditional bindings survive a write; the etag guards concurrent edits.
Usage: const policy = await iam.getPolicy(); policy.bindings.push(...); await iam.setPolicy(policy).
*/

import { z } from "zod";

import type { JsonValue } from "../core/logger.js";

import { RESOURCE_MANAGER_BASE } from "./endpoints.js";
import type { GcpHttpClient } from "./http.js";

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)]),
);

const bindingSchema = z.object({
  role: z.string(),
  members: z.array(z.string()).default([]),
  condition: jsonValueSchema.optional(),
});

const policySchema = z
  .object({
    version: z.number().optional(),
    etag: z.string().optional(),
    bindings: z.array(bindingSchema).default([]),
  })
  .catchall(jsonValueSchema);

export type IamBinding = z.infer<typeof bindingSchema>;
export type IamPolicy = z.infer<typeof policySchema>;

export const POLICY_VERSION = 3;

export class ProjectIamClient {
  constructor(
    private readonly http: GcpHttpClient,
    private readonly projectId: string,
  ) {}

  getPolicy(): Promise<IamPolicy> {
    return this.http.request(`${RESOURCE_MANAGER_BASE}/projects/${this.projectId}:getIamPolicy`, policySchema, {
      method: "POST",
      intent: "read",
      body: { options: { requestedPolicyVersion: POLICY_VERSION } },
    });
  }

  /** A stale etag comes back as a Conflict RemoteError. */
  setPolicy(policy: IamPolicy): Promise<IamPolicy> {
    return this.http.request(`${RESOURCE_MANAGER_BASE}/projects/${this.projectId}:setIamPolicy`, policySchema, {
      method: "POST",
      intent: "mutate",
      body: { policy: { ...policy, version: POLICY_VERSION } },
    });
  }
}

/** Whether `member` holds `role` through a binding without a condition. */
export function hasBinding(policy: IamPolicy, role: string, member: string): boolean {
  return policy.bindings.some(
    (binding) => binding.role === role && binding.condition === undefined && binding.members.includes(member),
  );
}

/** Returns a copy of `policy` with `member` granted `role`; conditional bindings are left alone. */
export function withBinding(policy: IamPolicy, role: string, member: string): IamPolicy {
  if (hasBinding(policy, role, member)) return policy;

  const index = policy.bindings.findIndex((binding) => binding.role === role && binding.condition === undefined);
  const bindings = policy.bindings.map((binding, i) =>
    i === index ? { ...binding, members: [...binding.members, member] } : binding,
  );
  if (index === -1) bindings.push({ role, members: [member] });
  return { ...policy, bindings };
}
