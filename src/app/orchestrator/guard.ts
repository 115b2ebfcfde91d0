/*
Purpose: decide whether a mutation should run, be skipped, replace the current instance, or stop.
Assumptions: `current` is a freshly located handle (undefined when absent); nothing here calls the remote.
Usage: const decision = guard.checkCreate(kind, current, desired, force); if (decision.action === "skip") ...
*/

import { REPLACE_MATCHING_ON_FORCE, registerCommand } from "../../core/dependency-graph.js";
import { GuardError, RemoteError } from "../../core/errors.js";
import { NULL_SINK, logOrchestratorEvent, type EventSink } from "../../core/logger.js";
import {
  diffSpecFields,
  specMatches,
  type DesiredSpec,
  type LifecycleState,
  type ResourceHandle,
  type ResourceKind,
} from "../../core/resources.js";

// =============================================================================
// TYPES
// =============================================================================

export type GuardDecision =
  | { action: "proceed" }
  | { action: "replace"; current: ResourceHandle }
  | { action: "skip"; reason: string; current?: ResourceHandle };

export interface Confirmer {
  isInteractive(): boolean;
  confirm(question: string): Promise<boolean>;
}

const TRANSITIONAL_STATES: ReadonlySet<LifecycleState> = new Set(["Creating", "Updating", "Deleting"]);

// =============================================================================
// GUARD
// =============================================================================

export class IdempotencyGuard {
  constructor(
    private readonly confirmer: Confirmer,
    private readonly events: EventSink = NULL_SINK,
  ) {}

  checkCreate(
    kind: ResourceKind,
    current: ResourceHandle | undefined,
    desired: DesiredSpec,
    force: boolean,
  ): GuardDecision {
    if (!current) return this.decide(kind, { action: "proceed" });

    assertSettled(kind, current);

    if (current.state === "Failed") {
      if (force) return this.decide(kind, { action: "replace", current });
      throw new GuardError("SpecConflict", `${kind} ${current.id} is in a failed state.`, {
        resource: kind,
        remoteId: current.id,
        suggestion: "Rerun with --force to delete and recreate it",
      });
    }

    if (specMatches(desired.fields, current.spec)) {
      if (force && REPLACE_MATCHING_ON_FORCE.has(kind)) return this.decide(kind, { action: "replace", current });
      return this.decide(kind, { action: "skip", reason: "already exists", current });
    }

    if (force) return this.decide(kind, { action: "replace", current });

    const differing = diffSpecFields(desired.fields, current.spec);
    throw new GuardError(
      "SpecConflict",
      `${kind} ${current.id} exists with a different configuration (${differing.join(", ")}).`,
      {
        resource: kind,
        remoteId: current.id,
        suggestion: "Run update, or rerun register with --force to replace it",
      },
    );
  }

  checkUpdate(
    kind: ResourceKind,
    current: ResourceHandle | undefined,
    desired: DesiredSpec,
    force: boolean,
  ): GuardDecision {
    if (!current) {
      throw new RemoteError("NotFound", `No ${kind} to update.`, {
        resource: kind,
        suggestion: `Register it first: ${registerCommand(kind)}`,
      });
    }

    assertSettled(kind, current);

    // Secrets are write-only, so a matching spec cannot show they are current.
    const carriesSecrets = Object.keys(desired.secrets ?? {}).length > 0;
    if (!force && !carriesSecrets && current.state === "Active" && specMatches(desired.fields, current.spec)) {
      return this.decide(kind, { action: "skip", reason: "already up to date", current });
    }
    return this.decide(kind, { action: "proceed" });
  }

  async checkDelete(
    kind: ResourceKind,
    current: ResourceHandle | undefined,
    force: boolean,
  ): Promise<GuardDecision> {
    if (!current) return this.decide(kind, { action: "skip", reason: "already absent" });
    if (force) return this.decide(kind, { action: "proceed" });

    if (!this.confirmer.isInteractive()) {
      throw new GuardError("ConfirmationRequired", `Deleting ${kind} ${current.id} requires confirmation.`, {
        resource: kind,
        remoteId: current.id,
        suggestion: "Rerun with --force to delete without a prompt",
      });
    }

    const confirmed = await this.confirmer.confirm(`Delete ${kind} ${current.id}?`);
    if (!confirmed) {
      throw new GuardError("UserAborted", `Deletion of ${kind} ${current.id} was cancelled.`, {
        resource: kind,
        remoteId: current.id,
      });
    }
    return this.decide(kind, { action: "proceed" });
  }

  private decide(kind: ResourceKind, decision: GuardDecision): GuardDecision {
    logOrchestratorEvent(this.events, `guard.${decision.action}`, {
      kind,
      reason: decision.action === "skip" ? decision.reason : undefined,
    });
    return decision;
  }
}

function assertSettled(kind: ResourceKind, current: ResourceHandle): void {
  if (!TRANSITIONAL_STATES.has(current.state)) return;
  throw new RemoteError("Conflict", `${kind} ${current.id} is ${current.state.toLowerCase()}.`, {
    resource: kind,
    remoteId: current.id,
    suggestion: "Wait for it to settle, then check with agentctl status",
  });
}
