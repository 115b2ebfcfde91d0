import { z } from "zod";

import type { JsonObject } from "../core/logger.js";
import type { DesiredSpec, ResourceHandle } from "../core/resources.js";
import { diffSpecFields, shortName } from "../core/resources.js";
import { discoveryUrl, enginePath } from "../gcp/endpoints.js";

import { BaseResourceClient, listField, stringField, type Prerequisites } from "./resource-client.js";

// =============================================================================
// REMOTE SHAPES
// =============================================================================

// The service echoes the agent definition in either casing depending on API revision.
const adkDefinitionSchema = z.object({
  toolSettings: z.object({ toolDescription: z.string().optional() }).optional(),
  tool_settings: z.object({ tool_description: z.string().optional() }).optional(),
  provisionedReasoningEngine: z.object({ reasoningEngine: z.string().optional() }).optional(),
  provisioned_reasoning_engine: z.object({ reasoning_engine: z.string().optional() }).optional(),
  authorizations: z.array(z.string()).optional(),
});

const agentSchema = z.object({
  name: z.string(),
  displayName: z.string().optional(),
  description: z.string().optional(),
  adkAgentDefinition: adkDefinitionSchema.optional(),
  adk_agent_definition: adkDefinitionSchema.optional(),
});

type Agent = z.infer<typeof agentSchema>;

/** Field name -> update mask path. */
const UPDATE_MASK_PATHS: Record<string, string> = {
  displayName: "displayName",
  description: "description",
  toolDescription: "adk_agent_definition.tool_settings.tool_description",
  reasoningEngine: "adk_agent_definition.provisioned_reasoning_engine.reasoning_engine",
  authorizations: "adk_agent_definition.authorizations",
};

// =============================================================================
// CLIENT
// =============================================================================

/** Registration of a compute agent inside an integration app's assistant. */
export class AgentLinkClient extends BaseResourceClient {
  readonly kind = "IntegrationAgentLink" as const;

  configuredId(prerequisites: Prerequisites): string | undefined {
    const agentId = this.config.get("AGENTSPACE_AGENT_ID");
    const assistant = this.assistantPath(prerequisites);
    return agentId && assistant ? `${assistant}/agents/${agentId}` : undefined;
  }

  displayName(): string {
    return this.config.require("AGENT_DISPLAY_NAME");
  }

  desiredSpec(prerequisites: Prerequisites): DesiredSpec {
    const engine = prerequisites.ComputeAgent;
    const auth = prerequisites.OAuthAuthorization;
    return {
      displayName: this.displayName(),
      parent: this.assistantPath(prerequisites),
      fields: {
        displayName: this.displayName(),
        description: this.config.require("AGENT_DESCRIPTION"),
        toolDescription: this.config.require("AGENT_TOOL_DESCRIPTION"),
        reasoningEngine: engine?.id ?? this.config.require("AGENT_ENGINE_RESOURCE_NAME"),
        authorizations: auth ? [auth.id] : [],
      },
    };
  }

  outputs(handle: ResourceHandle): Record<string, string> {
    return { AGENTSPACE_AGENT_ID: shortName(handle.id) };
  }

  async create(spec: DesiredSpec): Promise<ResourceHandle> {
    const parent = spec.parent ?? this.assistantPath({});
    const agent = await this.deps.discovery.request(discoveryUrl(`${parent}/agents`), agentSchema, {
      method: "POST",
      intent: "create",
      resource: this.kind,
      body: buildAgentBody(spec),
    });
    return toHandle(agent);
  }

  async get(id: string): Promise<ResourceHandle> {
    const agent = await this.deps.discovery.request(discoveryUrl(id), agentSchema, {
      resource: this.kind,
      remoteId: id,
    });
    return toHandle(agent);
  }

  /** Patches only the fields that differ; an empty diff is a no-op. */
  async update(id: string, spec: DesiredSpec): Promise<ResourceHandle> {
    const current = await this.get(id);
    const mask = diffSpecFields(spec.fields, current.spec).flatMap((field) => {
      const path = UPDATE_MASK_PATHS[field];
      return path ? [path] : [];
    });
    if (mask.length === 0) return current;

    const agent = await this.deps.discovery.request(discoveryUrl(id), agentSchema, {
      method: "PATCH",
      intent: "mutate",
      query: { updateMask: mask.join(",") },
      resource: this.kind,
      remoteId: id,
      body: buildAgentBody(spec),
    });
    return toHandle(agent);
  }

  async delete(id: string): Promise<void> {
    await this.deps.discovery.request(discoveryUrl(id), z.unknown(), {
      method: "DELETE",
      intent: "mutate",
      resource: this.kind,
      remoteId: id,
    });
  }

  async *list(prerequisites: Prerequisites): AsyncGenerator<ResourceHandle> {
    const assistant = this.assistantPath(prerequisites);
    if (!assistant) return;

    const agents = this.deps.discovery.paginate(discoveryUrl(`${assistant}/agents`), "agents", agentSchema, {
      resource: this.kind,
    });
    for await (const agent of agents) {
      yield toHandle(agent);
    }
  }

  private assistantPath(prerequisites: Prerequisites): string | undefined {
    const app = prerequisites.IntegrationApp?.id ?? this.configuredAppPath();
    if (!app) return undefined;
    return `${app}/assistants/${this.config.require("AGENTSPACE_ASSISTANT")}`;
  }

  private configuredAppPath(): string | undefined {
    const appId = this.config.get("AGENTSPACE_APP_ID");
    if (!appId) return undefined;
    return enginePath(
      this.config.require("GCP_PROJECT_NUMBER"),
      this.config.require("AGENTSPACE_COLLECTION"),
      appId,
    );
  }
}

// =============================================================================
// MAPPING
// =============================================================================

export function buildAgentBody(spec: DesiredSpec): JsonObject {
  return {
    displayName: spec.displayName,
    description: stringField(spec, "description"),
    adk_agent_definition: {
      tool_settings: { tool_description: stringField(spec, "toolDescription") },
      provisioned_reasoning_engine: { reasoning_engine: stringField(spec, "reasoningEngine") },
      authorizations: listField(spec, "authorizations"),
    },
  };
}

function toHandle(agent: Agent): ResourceHandle {
  const adk = agent.adkAgentDefinition ?? agent.adk_agent_definition;
  const toolDescription = adk?.toolSettings?.toolDescription ?? adk?.tool_settings?.tool_description;
  const reasoningEngine =
    adk?.provisionedReasoningEngine?.reasoningEngine ?? adk?.provisioned_reasoning_engine?.reasoning_engine;

  return {
    kind: "IntegrationAgentLink",
    id: agent.name,
    displayName: agent.displayName ?? "",
    state: "Active",
    spec: {
      displayName: agent.displayName ?? "",
      description: agent.description ?? "",
      toolDescription: toolDescription ?? "",
      reasoningEngine: reasoningEngine ?? "",
      authorizations: adk?.authorizations ?? [],
    },
  };
}
