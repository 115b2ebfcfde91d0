/*
Purpose: run one resource operation: resolve configuration, locate and check prerequisites, guard, mutate.
Assumptions: prerequisites are always re-located remotely; nothing is cached between operations.
Usage: await orchestrator.run({ kind: "IntegrationAgentLink", verb: "create", force: false }).
*/

import type { ConfigurationResolver } from "../../core/config-loader.js";
import type { ConfigurationSet } from "../../core/config-set.js";
import {
  KIND_IDENTITY,
  isEnforced,
  prerequisitesFor,
  registerCommand,
  type DependencyEdge,
  type Verb,
} from "../../core/dependency-graph.js";
import { DeployError, PrerequisiteError, type DeployErrorKind } from "../../core/errors.js";
import { NULL_SINK, logOrchestratorEvent, type EventSink } from "../../core/logger.js";
import type { LifecycleState, ResourceHandle, ResourceKind } from "../../core/resources.js";
import type {
  Prerequisites,
  ResourceClient,
  ResourceClientRegistry,
} from "../../resources/resource-client.js";

import type { GuardDecision, IdempotencyGuard } from "./guard.js";

// =============================================================================
// TYPES
// =============================================================================

export type OperationOutcome = "succeeded" | "skipped" | "failed";

export type OperationRecord = {
  kind: ResourceKind;
  verb: Verb;
  target?: ResourceHandle;
  outcome: OperationOutcome;
  diagnostic?: string;
  errorKind?: DeployErrorKind;
  warnings: string[];
  /** Identifiers the caller must persist (KEY -> value). */
  outputs: Record<string, string>;
};

export type OperationRequest = {
  kind: ResourceKind;
  verb: Verb;
  force?: boolean;
};

export type OperationResult = {
  record: OperationRecord;
  /** Lifecycle state of the target after the operation (Absent when there is none). */
  state: LifecycleState;
  /** Populated for list. */
  items: ResourceHandle[];
  config: ConfigurationSet;
  clients: ResourceClientRegistry;
};

export type ConfigResolverPort = Pick<ConfigurationResolver, "resolve" | "inspect">;

export type ClientFactory = (config: ConfigurationSet) => ResourceClientRegistry;

export type OrchestratorDeps = {
  resolver: ConfigResolverPort;
  createClients: ClientFactory;
  guard: IdempotencyGuard;
  events?: EventSink;
};

type Context = {
  kind: ResourceKind;
  verb: Verb;
  force: boolean;
  warnings: string[];
};

// =============================================================================
// ORCHESTRATOR
// =============================================================================

export class DeploymentOrchestrator {
  readonly records: OperationRecord[] = [];
  private readonly events: EventSink;

  constructor(private readonly deps: OrchestratorDeps) {
    this.events = deps.events ?? NULL_SINK;
  }

  async run(request: OperationRequest): Promise<OperationResult> {
    const ctx: Context = {
      kind: request.kind,
      verb: request.verb,
      force: request.force ?? false,
      warnings: [],
    };
    logOrchestratorEvent(this.events, "orchestrator.start", {
      kind: ctx.kind,
      verb: ctx.verb,
      force: ctx.force,
    });

    try {
      const config = this.resolveConfig(ctx);
      ctx.warnings.push(...config.warnings.map((warning) => warning.message));

      const clients = this.deps.createClients(config);
      const client = clients[ctx.kind];
      const prerequisites = await this.locatePrerequisites(ctx, clients);

      if (ctx.verb === "list") {
        const items: ResourceHandle[] = [];
        for await (const handle of client.list(prerequisites)) items.push(handle);
        const record = this.record(ctx, { outcome: "succeeded", diagnostic: `${items.length} found` });
        return { record, state: "Absent", items, config, clients };
      }

      const current = await client.locate(prerequisites);
      const handle = await this.execute(ctx, client, prerequisites, current);
      const record = this.record(ctx, {
        outcome: handle.skipped ? "skipped" : "succeeded",
        target: handle.target,
        diagnostic: handle.diagnostic,
        outputs: handle.target && ctx.verb !== "delete" ? client.outputs(handle.target) : {},
      });
      return {
        record,
        state: ctx.verb === "delete" ? "Absent" : (handle.target?.state ?? "Absent"),
        items: [],
        config,
        clients,
      };
    } catch (err) {
      this.record(ctx, {
        outcome: "failed",
        diagnostic: err instanceof Error ? err.message : String(err),
        errorKind: err instanceof DeployError ? err.kind : undefined,
      });
      throw err;
    }
  }

  // ===========================================================================
  // STAGES
  // ===========================================================================

  private resolveConfig(ctx: Context): ConfigurationSet {
    if (ctx.verb !== "update") return this.deps.resolver.resolve(1);

    const identity = KIND_IDENTITY[ctx.kind];
    return this.deps.resolver.resolve(identity.stage, { require: [...identity.keys] });
  }

  private async locatePrerequisites(
    ctx: Context,
    clients: ResourceClientRegistry,
  ): Promise<Prerequisites> {
    const prerequisites: Prerequisites = {};

    for (const edge of prerequisitesFor(ctx.kind)) {
      const client = clients[edge.prerequisite];
      const handle = await client.locate(prerequisites);
      logOrchestratorEvent(this.events, "orchestrator.prerequisite", {
        kind: ctx.kind,
        prerequisite: edge.prerequisite,
        state: handle?.state ?? "Absent",
      });

      if (!isEnforced(edge, ctx.verb)) {
        // Still needed to address the dependent (e.g. the app a link lives in).
        if (handle?.state === "Active") prerequisites[edge.prerequisite] = handle;
        continue;
      }

      const accepted = this.checkPrerequisite(ctx, edge, client, prerequisites, handle);
      if (accepted) prerequisites[edge.prerequisite] = accepted;
    }

    return prerequisites;
  }

  private checkPrerequisite(
    ctx: Context,
    edge: DependencyEdge,
    client: ResourceClient,
    prerequisites: Prerequisites,
    handle: ResourceHandle | undefined,
  ): ResourceHandle | undefined {
    if (handle && handle.state !== "Active") {
      throw new PrerequisiteError(
        "PrerequisiteNotReady",
        `${edge.prerequisite} ${handle.id} is ${handle.state}; ${ctx.kind} ${ctx.verb} needs it Active.`,
        {
          resource: edge.prerequisite,
          remoteId: handle.id,
          state: handle.state,
          suggestion: "Wait for it to finish, then check with agentctl status",
        },
      );
    }
    if (handle) return handle;

    const configuredId = client.configuredId(prerequisites);
    if (edge.cardinality === "exactly-one" || configuredId !== undefined) {
      const where = configuredId ? ` at ${configuredId}` : "";
      throw new PrerequisiteError(
        "PrerequisiteMissing",
        `${ctx.kind} ${ctx.verb} requires ${edge.prerequisite}, but none was found${where}.`,
        {
          resource: edge.prerequisite,
          remoteId: configuredId,
          suggestion: registerCommand(edge.prerequisite),
        },
      );
    }

    const warning = edge.reducedCapability ?? `${edge.prerequisite} not found; continuing without it.`;
    ctx.warnings.push(warning);
    logOrchestratorEvent(this.events, "orchestrator.reduced_capability", {
      kind: ctx.kind,
      prerequisite: edge.prerequisite,
    });
    return undefined;
  }

  // ===========================================================================
  // VERBS
  // ===========================================================================

  private async execute(
    ctx: Context,
    client: ResourceClient,
    prerequisites: Prerequisites,
    current: ResourceHandle | undefined,
  ): Promise<{ target?: ResourceHandle; skipped: boolean; diagnostic?: string }> {
    switch (ctx.verb) {
      case "get":
        return { target: current, skipped: false, diagnostic: current ? undefined : "absent" };

      case "create": {
        const desired = client.desiredSpec(prerequisites);
        ctx.warnings.push(...(desired.warnings ?? []));
        const decision = this.deps.guard.checkCreate(ctx.kind, current, desired, ctx.force);
        if (decision.action === "skip") return skipped(decision);
        if (decision.action === "replace") {
          await client.delete(decision.current.id);
          const target = await client.create(desired);
          return { target, skipped: false, diagnostic: "replaced" };
        }
        return { target: await client.create(desired), skipped: false, diagnostic: "created" };
      }

      case "update": {
        const desired = client.desiredSpec(prerequisites);
        ctx.warnings.push(...(desired.warnings ?? []));
        const decision = this.deps.guard.checkUpdate(ctx.kind, current, desired, ctx.force);
        if (decision.action === "skip") return skipped(decision);
        if (!current) return { skipped: false };
        return { target: await client.update(current.id, desired), skipped: false, diagnostic: "updated" };
      }

      case "delete": {
        const decision = await this.deps.guard.checkDelete(ctx.kind, current, ctx.force);
        if (decision.action === "skip") return skipped(decision);
        if (current) await client.delete(current.id);
        return { target: current, skipped: false, diagnostic: "deleted" };
      }

      case "list":
        return { skipped: false };
    }
  }

  private record(
    ctx: Context,
    fields: Omit<OperationRecord, "kind" | "verb" | "warnings" | "outputs"> & {
      outputs?: Record<string, string>;
    },
  ): OperationRecord {
    const record: OperationRecord = {
      kind: ctx.kind,
      verb: ctx.verb,
      warnings: [...ctx.warnings],
      ...fields,
      outputs: fields.outputs ?? {},
    };
    this.records.push(record);

    logOrchestratorEvent(this.events, "orchestrator.record", {
      kind: record.kind,
      verb: record.verb,
      outcome: record.outcome,
      target: record.target?.id,
      diagnostic: record.diagnostic,
      errorKind: record.errorKind,
      warnings: record.warnings,
    });
    return record;
  }
}

function skipped(decision: Extract<GuardDecision, { action: "skip" }>): {
  target?: ResourceHandle;
  skipped: boolean;
  diagnostic: string;
} {
  return { target: decision.current, skipped: true, diagnostic: decision.reason };
}
