import type { OperationRecord } from "../app/orchestrator/orchestrator.js";
import type { PreflightReport } from "../app/orchestrator/preflight.js";
import type { StatusReport } from "../app/orchestrator/status-reporter.js";
import type { WorkflowReport } from "../app/orchestrator/workflows.js";
import { formatEnvLine } from "../core/env-file.js";
import type { ResourceHandle } from "../core/resources.js";

// =============================================================================
// OPERATIONS
// =============================================================================

export function printRecord(record: OperationRecord): void {
  printWarnings(record.warnings);

  const target = record.target ? ` ${record.target.id}` : "";
  const detail = record.diagnostic ? ` (${record.diagnostic})` : "";
  console.log(`${record.kind} ${record.verb}: ${record.outcome}${target}${detail}`);
  printOutputs(record.outputs);
}

/** Identifiers are printed as KEY=value lines for the user to persist; nothing is written back. */
export function printOutputs(outputs: Record<string, string>): void {
  const entries = Object.entries(outputs);
  if (entries.length === 0) return;

  console.log("");
  console.log("Add to your configuration:");
  for (const [key, value] of entries) {
    console.log(formatEnvLine(key, value));
  }
}

export function printWarnings(warnings: readonly string[]): void {
  for (const warning of warnings) {
    console.warn(`Warning: ${warning}`);
  }
}

export function printHandles(handles: ResourceHandle[]): void {
  if (handles.length === 0) {
    console.log("(none)");
    return;
  }

  const nameWidth = Math.max("Display name".length, ...handles.map((h) => h.displayName.length));
  const stateWidth = Math.max("State".length, ...handles.map((h) => h.state.length));
  console.log(`${"Display name".padEnd(nameWidth)}  ${"State".padEnd(stateWidth)}  ID`);
  for (const handle of handles) {
    console.log(`${handle.displayName.padEnd(nameWidth)}  ${handle.state.padEnd(stateWidth)}  ${handle.id}`);
  }
}

// =============================================================================
// WORKFLOWS
// =============================================================================

export function printWorkflowReport(report: WorkflowReport): void {
  printWarnings(report.warnings);
  console.log(`Workflow ${report.name}:`);
  for (const step of report.steps) {
    const detail = step.diagnostic ? ` (${step.diagnostic})` : "";
    console.log(`  ${step.kind} ${step.verb}: ${step.outcome}${detail}`);
  }

  const outputs: Record<string, string> = {};
  for (const step of report.steps) Object.assign(outputs, step.outputs);
  printOutputs(outputs);
}

// =============================================================================
// STATUS
// =============================================================================

export function printStatusReport(report: StatusReport): void {
  printWarnings(report.warnings);

  console.log("Resources:");
  for (const entry of report.entries) {
    const label = entry.kind ?? entry.key ?? "";
    const id = entry.id ? `  ${entry.id}` : "";
    console.log(`  ${label.padEnd(22)} ${entry.state}${id}`);
    if (entry.error) console.log(`    error: ${entry.error.kind}: ${entry.error.message}`);
    if (entry.remediation) console.log(`    next: ${entry.remediation}`);
  }

  console.log("");
  console.log("Configuration:");
  for (const item of report.config) {
    const via = item.via ? `, via ${item.via}` : "";
    console.log(`  ${item.key}=${item.value}  [${item.origin}${via}]`);
  }
}

// =============================================================================
// PREFLIGHT
// =============================================================================

export function printPreflightReport(report: PreflightReport): void {
  console.log("Remote checks:");
  for (const check of report.checks) {
    console.log(`  ${check.ok ? "ok  " : "FAIL"}  ${check.name}: ${check.detail}`);
    if (check.remediation) console.log(`    next: ${check.remediation}`);
  }
}
