/*
Purpose: read-only report of every resource kind plus the resolved configuration.
Assumptions: never mutates; missing resources are a normal outcome, not an error.
Usage: const report = await new StatusReporter({ resolver, createClients }).verify().
*/

import type { ConfigOrigin, ConfigurationSet } from "../../core/config-set.js";
import type { Stage } from "../../core/config.js";
import { remediationFor } from "../../core/dependency-graph.js";
import { DeployError, type DeployErrorKind } from "../../core/errors.js";
import { NULL_SINK, logOrchestratorEvent, type EventSink } from "../../core/logger.js";
import {
  RESOURCE_KINDS,
  type LifecycleState,
  type ResourceHandle,
  type ResourceKind,
} from "../../core/resources.js";
import type { Prerequisites } from "../../resources/resource-client.js";

import type { ClientFactory, ConfigResolverPort } from "./orchestrator.js";

// =============================================================================
// TYPES
// =============================================================================

export type StatusState = LifecycleState | "Unknown" | "ConfigIncomplete";

export type StatusEntry = {
  /** Resource kind, or undefined for a configuration entry. */
  kind?: ResourceKind;
  /** Configuration key for ConfigIncomplete entries. */
  key?: string;
  state: StatusState;
  id?: string;
  displayName?: string;
  remediation?: string;
  error?: { kind: DeployErrorKind; message: string };
};

export type ConfigSummaryEntry = {
  key: string;
  value: string;
  origin: ConfigOrigin;
  stage: Stage;
  via?: string;
};

export type StatusReport = {
  entries: StatusEntry[];
  config: ConfigSummaryEntry[];
  warnings: string[];
};

export type StatusReporterDeps = {
  resolver: ConfigResolverPort;
  createClients: ClientFactory;
  events?: EventSink;
};

const MAX_VALUE_LENGTH = 60;
const SECRET_MASK = "********";

// =============================================================================
// REPORTER
// =============================================================================

export class StatusReporter {
  private readonly events: EventSink;

  constructor(private readonly deps: StatusReporterDeps) {
    this.events = deps.events ?? NULL_SINK;
  }

  async verify(): Promise<StatusReport> {
    const inspection = this.deps.resolver.inspect(1);
    const config = summarizeConfig(inspection.set);
    const warnings = inspection.set.warnings.map((warning) => warning.message);

    if (inspection.missing.length > 0 || inspection.conflicts.length > 0) {
      const entries: StatusEntry[] = [
        ...inspection.missing.map((item) => ({
          key: item.key,
          state: "ConfigIncomplete" as const,
          remediation:
            item.reason === "placeholder"
              ? `Replace the placeholder value of ${item.key}`
              : `Set ${item.key} in your configuration file or environment`,
        })),
        ...inspection.conflicts.map((conflict) => ({
          key: conflict.key,
          state: "ConfigIncomplete" as const,
          remediation: conflict.message,
        })),
      ];
      logOrchestratorEvent(this.events, "status.config_incomplete", {
        keys: entries.flatMap((entry) => (entry.key ? [entry.key] : [])),
      });
      return { entries, config, warnings };
    }

    const clients = this.deps.createClients(inspection.set);
    const located: Prerequisites = {};
    const handles = new Map<ResourceKind, ResourceHandle | DeployError>();

    for (const kind of RESOURCE_KINDS) {
      try {
        const handle = await clients[kind].locate(located);
        if (handle) {
          handles.set(kind, handle);
          if (handle.state === "Active") located[kind] = handle;
        }
      } catch (err) {
        if (!(err instanceof DeployError)) throw err;
        handles.set(kind, err);
      }
    }

    const present = new Set<ResourceKind>(
      RESOURCE_KINDS.filter((kind) => located[kind] !== undefined),
    );
    const entries = RESOURCE_KINDS.map((kind) => toEntry(kind, handles.get(kind), present));
    logOrchestratorEvent(this.events, "status.verified", {
      states: entries.map((entry) => `${entry.kind ?? ""}=${entry.state}`),
    });

    return { entries, config, warnings };
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function toEntry(
  kind: ResourceKind,
  located: ResourceHandle | DeployError | undefined,
  present: ReadonlySet<ResourceKind>,
): StatusEntry {
  if (located instanceof DeployError) {
    return {
      kind,
      state: "Unknown",
      error: { kind: located.kind, message: located.message },
      remediation: located.suggestion,
    };
  }

  if (!located) {
    return { kind, state: "Absent", remediation: remediationFor(kind, present) };
  }

  return {
    kind,
    state: located.state,
    id: located.id,
    displayName: located.displayName,
  };
}

export function summarizeConfig(config: ConfigurationSet): ConfigSummaryEntry[] {
  return config.list().map((entry) => ({
    key: entry.key,
    value: config.isSecret(entry.key) ? SECRET_MASK : truncate(entry.value),
    origin: entry.origin,
    stage: entry.stage,
    via: entry.via,
  }));
}

function truncate(value: string): string {
  if (value.length <= MAX_VALUE_LENGTH) return value;
  return `${value.slice(0, MAX_VALUE_LENGTH - 3)}...`;
}
