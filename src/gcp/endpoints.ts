// Base URLs and resource paths for the integration and compute services.

export const DISCOVERY_ENGINE_BASE = "https://discoveryengine.googleapis.com/v1alpha";

export function aiPlatformBase(location: string): string {
  return `https://${location}-aiplatform.googleapis.com/v1`;
}

export function discoveryUrl(path: string): string {
  return `${DISCOVERY_ENGINE_BASE}/${path}`;
}

export function collectionPath(projectNumber: string, collection: string): string {
  return `projects/${projectNumber}/locations/global/collections/${collection}`;
}

export function enginePath(projectNumber: string, collection: string, appId: string): string {
  return `${collectionPath(projectNumber, collection)}/engines/${appId}`;
}

export function authorizationsPath(projectNumber: string): string {
  return `projects/${projectNumber}/locations/global/authorizations`;
}

export function locationPath(project: string, location: string): string {
  return `projects/${project}/locations/${location}`;
}

export function consoleAppUrl(projectId: string, appId: string): string {
  return `https://console.cloud.google.com/gen-ai-studio/agentspace/apps/${appId}?project=${projectId}`;
}

export const RESOURCE_MANAGER_BASE = "https://cloudresourcemanager.googleapis.com/v3";

export const SERVICE_USAGE_BASE = "https://serviceusage.googleapis.com/v1";

/** Google-managed service agent of `service` (e.g. "discoveryengine") in a project. */
export function serviceAgentEmail(projectNumber: string, service: string): string {
  return `service-${projectNumber}@gcp-sa-${service}.iam.gserviceaccount.com`;
}
