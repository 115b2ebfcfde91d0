/*
Purpose: composite workflows that chain orchestrator operations in dependency order.
Assumptions: each step re-locates its prerequisites remotely, so later steps see earlier results.
Usage: const report = await runWorkflow("full-deploy", { orchestrator, resolver, force });
*/

import type { Verb } from "../../core/dependency-graph.js";
import { NULL_SINK, logOrchestratorEvent, type EventSink } from "../../core/logger.js";
import type { ResourceKind } from "../../core/resources.js";

import type { ConfigResolverPort, DeploymentOrchestrator, OperationRecord } from "./orchestrator.js";

// =============================================================================
// TYPES
// =============================================================================

export const WORKFLOW_NAMES = ["full-deploy", "redeploy-all"] as const;

export type WorkflowName = (typeof WORKFLOW_NAMES)[number];

export type WorkflowStep = {
  kind: ResourceKind;
  verb: Verb;
  /** Why the step was left out, when it was. */
  omitted?: string;
};

export type WorkflowReport = {
  name: WorkflowName;
  steps: OperationRecord[];
  warnings: string[];
  /** The error that stopped the workflow; completed steps are still listed. */
  failure?: unknown;
};

export type WorkflowDeps = {
  orchestrator: DeploymentOrchestrator;
  resolver: ConfigResolverPort;
  force?: boolean;
  events?: EventSink;
};

// =============================================================================
// PLANS
// =============================================================================

export function planWorkflow(name: WorkflowName, resolver: ConfigResolverPort): WorkflowStep[] {
  if (name === "redeploy-all") {
    return [
      { kind: "ComputeAgent", verb: "update" },
      { kind: "IntegrationAgentLink", verb: "update" },
    ];
  }

  const config = resolver.resolve(1);
  const corpusName = config.entry("RAG_CORPUS_DISPLAY_NAME");
  const corpusConfigured =
    config.has("RAG_CORPUS_ID") || (corpusName !== undefined && corpusName.origin !== "default");
  const oauthConfigured = config.has("OAUTH_CLIENT_ID") && config.has("OAUTH_CLIENT_SECRET");

  return [
    {
      kind: "DocumentCorpus",
      verb: "create",
      omitted: corpusConfigured ? undefined : "no document corpus configured",
    },
    { kind: "ComputeAgent", verb: "create" },
    { kind: "IntegrationApp", verb: "create" },
    {
      kind: "OAuthAuthorization",
      verb: "create",
      omitted: oauthConfigured
        ? undefined
        : "OAuth client credentials are not configured; the agent will be linked without an authorization",
    },
    { kind: "IntegrationAgentLink", verb: "create" },
  ];
}

// =============================================================================
// RUNNER
// =============================================================================

/** Runs steps in order and stops at the first failure; skips count as success. */
export async function runWorkflow(name: WorkflowName, deps: WorkflowDeps): Promise<WorkflowReport> {
  const events = deps.events ?? NULL_SINK;
  const report: WorkflowReport = { name, steps: [], warnings: [] };

  let plan: WorkflowStep[];
  try {
    plan = planWorkflow(name, deps.resolver);
  } catch (err) {
    report.failure = err;
    return report;
  }

  logOrchestratorEvent(events, "workflow.start", {
    name,
    steps: plan.map((step) => `${step.kind}:${step.verb}`),
  });

  for (const step of plan) {
    if (step.omitted) {
      if (step.kind === "OAuthAuthorization") report.warnings.push(step.omitted);
      logOrchestratorEvent(events, "workflow.step_omitted", { kind: step.kind, reason: step.omitted });
      continue;
    }

    try {
      const result = await deps.orchestrator.run({ kind: step.kind, verb: step.verb, force: deps.force });
      report.steps.push(result.record);
      addWarnings(report, result.record.warnings);
    } catch (err) {
      const failed = deps.orchestrator.records.at(-1);
      if (failed && failed.kind === step.kind && failed.outcome === "failed") {
        report.steps.push(failed);
        addWarnings(report, failed.warnings);
      }
      report.failure = err;
      logOrchestratorEvent(events, "workflow.aborted", { name, kind: step.kind });
      return report;
    }
  }

  logOrchestratorEvent(events, "workflow.complete", { name, steps: report.steps.length });
  return report;
}

function addWarnings(report: WorkflowReport, warnings: string[]): void {
  for (const warning of warnings) {
    if (!report.warnings.includes(warning)) report.warnings.push(warning);
  }
}
