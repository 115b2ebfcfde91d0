import { Command } from "commander";

import type { RoleBindingStatus } from "../app/orchestrator/iam-bindings.js";

import { runAction, type CliDeps } from "./context.js";
import { EXIT_CODES } from "./exit-codes.js";

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerIamCommand(program: Command, deps: CliDeps): void {
  const iam = program.command("iam").description("Grant and verify the project roles the service agents need");

  iam
    .command("setup")
    .description("Grant every missing role in one policy update")
    .option("--dry-run", "List the roles that would be granted without changing the policy", false)
    .action(async (opts: { dryRun: boolean }, cmd: Command) => {
      await runAction(cmd, deps, async (ctx) => {
        const { iam: manager } = ctx.createProjectServices(ctx.resolver.resolve(1));
        const result = await manager.setup({ dryRun: opts.dryRun });

        if (result.added.length > 0) {
          console.log(result.dryRun ? "Would grant:" : "Granted:");
          printBindings(result.added);
        }
        if (result.existing.length > 0) {
          console.log("Already granted:");
          printBindings(result.existing);
        }
        if (result.dryRun && result.added.length > 0) {
          console.log("Dry run; rerun without --dry-run to apply.");
        }
      });
    });

  iam
    .command("verify")
    .description("Check that every required role is granted (read-only)")
    .action(async (_opts: unknown, cmd: Command) => {
      await runAction(cmd, deps, async (ctx) => {
        const { iam: manager } = ctx.createProjectServices(ctx.resolver.resolve(1));
        const statuses = await manager.verify();

        for (const status of statuses) {
          console.log(`  ${status.granted ? "granted" : "missing"}  ${status.label}: ${status.role}`);
        }
        if (statuses.every((status) => status.granted)) return EXIT_CODES.success;

        console.log("");
        console.log("Next: agentctl iam setup");
        return EXIT_CODES.prerequisiteMissing;
      });
    });
}

function printBindings(statuses: RoleBindingStatus[]): void {
  for (const status of statuses) {
    console.log(`  ${status.label}: ${status.role}`);
  }
}
