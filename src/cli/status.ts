import { Command } from "commander";

import { runWorkflow, WORKFLOW_NAMES, type WorkflowName } from "../app/orchestrator/workflows.js";

import { runAction, type CliDeps } from "./context.js";
import { reportError } from "./error-mapping.js";
import { EXIT_CODES, exitCodeFor, exitCodeForKinds } from "./exit-codes.js";
import { printStatusReport, printWorkflowReport } from "./output.js";

const WORKFLOW_DESCRIPTIONS: Record<WorkflowName, string> = {
  "full-deploy": "Register corpus, compute agent, app, OAuth authorization and link, in order",
  "redeploy-all": "Update the compute agent, then the agent link",
};

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerStatusCommand(program: Command, deps: CliDeps): void {
  program
    .command("status")
    .description("Report every resource and the resolved configuration (read-only)")
    .action(async (_opts: unknown, cmd: Command) => {
      await runAction(cmd, deps, async (ctx) => {
        const report = await ctx.statusReporter.verify();
        printStatusReport(report);
        return exitCodeForKinds(report.entries.flatMap((entry) => (entry.error ? [entry.error.kind] : [])));
      });
    });
}

export function registerWorkflowCommand(program: Command, deps: CliDeps): void {
  const workflow = program.command("workflow").description("Composite deployment workflows");

  for (const name of WORKFLOW_NAMES) {
    workflow
      .command(name)
      .description(WORKFLOW_DESCRIPTIONS[name])
      .action(async (_opts: unknown, cmd: Command) => {
        await runAction(cmd, deps, async (ctx, flags) => {
          const report = await runWorkflow(name, {
            orchestrator: ctx.orchestrator,
            resolver: ctx.resolver,
            force: flags.force,
            events: ctx.events,
          });
          printWorkflowReport(report);

          if (report.failure === undefined) return EXIT_CODES.success;
          console.log(`Stopped after ${report.steps.filter((step) => step.outcome !== "failed").length} completed step(s).`);
          reportError(report.failure, { verbose: flags.verbose, useColor: flags.color });
          return exitCodeFor(report.failure);
        });
      });
  }
}
