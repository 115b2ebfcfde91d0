import { AgentLinkClient } from "./agent-link.js";
import { ComputeAgentClient } from "./compute-agent.js";
import { DocumentCorpusClient } from "./document-corpus.js";
import { IntegrationAppClient } from "./integration-app.js";
import { OAuthAuthorizationClient } from "./oauth-authorization.js";
import type { ResourceClientDeps, ResourceClientRegistry } from "./resource-client.js";
import { SearchDataStoreClient } from "./search-data-store.js";

export type {
  AppResourceClient,
  Prerequisites,
  ResourceClient,
  ResourceClientDeps,
  ResourceClientRegistry,
  SearchResult,
} from "./resource-client.js";

export function createResourceClients(deps: ResourceClientDeps): ResourceClientRegistry {
  return {
    DocumentCorpus: new DocumentCorpusClient(deps),
    ComputeAgent: new ComputeAgentClient(deps),
    IntegrationApp: new IntegrationAppClient(deps),
    SearchDataStore: new SearchDataStoreClient(deps),
    OAuthAuthorization: new OAuthAuthorizationClient(deps),
    IntegrationAgentLink: new AgentLinkClient(deps),
  };
}
