/**
 * RunContext + composition root for one CLI invocation.
 * Purpose: centralize resolved options and injected ports to avoid globals.
 * Assumptions: ports are thin adapters over Node and the cloud services and are overrideable for tests.
 * Usage: buildRunContext({ options, ports }) then ctx.orchestrator.run(...) or ctx.statusReporter.verify().
 */

import { resolveConfigPath } from "../../core/config-discovery.js";
import { ConfigurationResolver, loadConfigSources } from "../../core/config-loader.js";
import type { ConfigurationSet } from "../../core/config-set.js";
import {
  ConsoleEventSink,
  JsonlLogger,
  NULL_SINK,
  fanOut,
  type EventSink,
} from "../../core/logger.js";
import { GcloudTokenProvider } from "../../gcp/auth.js";
import { GcpHttpClient } from "../../gcp/http.js";
import { ProjectIamClient } from "../../gcp/iam-policy.js";
import { systemClock } from "../../gcp/operations.js";
import { createResourceClients } from "../../resources/index.js";
import type { ResourceClientRegistry } from "../../resources/resource-client.js";

import { TtyConfirmer } from "./confirmer.js";
import { IdempotencyGuard } from "./guard.js";
import { IamBindingManager } from "./iam-bindings.js";
import {
  DeploymentOrchestrator,
  type ClientFactory,
  type ConfigResolverPort,
} from "./orchestrator.js";
import type { OrchestratorPorts } from "./ports.js";
import { ProjectPreflight } from "./preflight.js";
import { StatusReporter } from "./status-reporter.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunOptions = {
  configPath?: string;
  force: boolean;
  verbose: boolean;
  logFile?: string;
};

/** Project-level checks and grants that sit outside the resource graph. */
export type ProjectServices = {
  iam: IamBindingManager;
  preflight: ProjectPreflight;
};

export type ProjectServicesFactory = (config: ConfigurationSet) => ProjectServices;

export type RunContext = {
  options: RunOptions;
  /** Configuration file actually read, if any. */
  configPath?: string;
  ports: OrchestratorPorts;
  events: EventSink;
  resolver: ConfigResolverPort;
  createClients: ClientFactory;
  guard: IdempotencyGuard;
  orchestrator: DeploymentOrchestrator;
  statusReporter: StatusReporter;
  createProjectServices: ProjectServicesFactory;
};

export type BuildRunContextInput = {
  options: RunOptions;
  ports?: Partial<OrchestratorPorts>;
  /** Extra sinks (e.g. test recorders) added to the run's event stream. */
  sinks?: EventSink[];
};

// =============================================================================
// DEFAULT ADAPTERS
// =============================================================================

export function createDefaultPorts(environment: Record<string, string | undefined> = process.env): OrchestratorPorts {
  return {
    environment,
    cwd: process.cwd(),
    fetch: globalThis.fetch,
    tokens: new GcloudTokenProvider({ environment }),
    clock: systemClock,
    confirmer: new TtyConfirmer(),
  };
}

export function createHttpClientFactory(ports: OrchestratorPorts, events: EventSink, verbose: boolean): ClientFactory {
  return (config: ConfigurationSet): ResourceClientRegistry => {
    const timeoutSeconds = Number(config.get("OPERATION_TIMEOUT_SECONDS"));
    const base = { tokens: ports.tokens, fetch: ports.fetch, events, verbose };

    return createResourceClients({
      config,
      discovery: new GcpHttpClient({ ...base, quotaProject: config.get("GCP_PROJECT_NUMBER") }),
      aiPlatform: new GcpHttpClient(base),
      clock: ports.clock,
      events,
      operationTimeoutMs: Number.isFinite(timeoutSeconds) && timeoutSeconds > 0 ? timeoutSeconds * 1000 : undefined,
    });
  };
}

export function createProjectServicesFactory(
  ports: OrchestratorPorts,
  events: EventSink,
  verbose: boolean,
): ProjectServicesFactory {
  return (config: ConfigurationSet): ProjectServices => {
    const http = new GcpHttpClient({ tokens: ports.tokens, fetch: ports.fetch, events, verbose });
    const projectId = config.require("GCP_PROJECT_ID", "address the project");
    return {
      iam: new IamBindingManager({
        iam: new ProjectIamClient(http, projectId),
        projectNumber: config.require("GCP_PROJECT_NUMBER", "name the service agents"),
        events,
      }),
      preflight: new ProjectPreflight({ tokens: ports.tokens, http, projectId, events }),
    };
  };
}

// =============================================================================
// COMPOSITION ROOT
// =============================================================================

export function buildRunContext(input: BuildRunContextInput): RunContext {
  const defaults = createDefaultPorts(input.ports?.environment);
  const ports: OrchestratorPorts = {
    ...defaults,
    ...input.ports,
  };

  const sinks: EventSink[] = [...(input.sinks ?? [])];
  if (input.options.verbose) sinks.push(new ConsoleEventSink());
  if (input.options.logFile) sinks.push(new JsonlLogger(input.options.logFile));
  const events = sinks.length > 0 ? fanOut(sinks) : NULL_SINK;

  const { configPath } = resolveConfigPath({ explicitPath: input.options.configPath, cwd: ports.cwd });
  const resolver =
    ports.resolver ??
    new ConfigurationResolver(loadConfigSources({ configPath, environment: ports.environment }));
  const createClients = ports.createClients ?? createHttpClientFactory(ports, events, input.options.verbose);

  const guard = new IdempotencyGuard(ports.confirmer, events);
  return {
    options: input.options,
    configPath,
    ports,
    events,
    resolver,
    createClients,
    guard,
    orchestrator: new DeploymentOrchestrator({ resolver, createClients, guard, events }),
    statusReporter: new StatusReporter({ resolver, createClients, events }),
    createProjectServices: createProjectServicesFactory(ports, events, input.options.verbose),
  };
}
