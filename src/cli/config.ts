import { Command, InvalidArgumentError } from "commander";

import { summarizeConfig } from "../app/orchestrator/status-reporter.js";
import { initConfigFile } from "../core/config-discovery.js";
import { STAGES, STAGE_LABELS, type Stage } from "../core/config.js";

import { runAction, type CliDeps } from "./context.js";
import { EXIT_CODES, exitCodeForKinds } from "./exit-codes.js";
import { printPreflightReport, printWarnings } from "./output.js";

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerConfigCommand(program: Command, deps: CliDeps): void {
  const config = program.command("config").description("Create, check and show configuration");

  config
    .command("init")
    .description("Write a commented configuration template (use --force to overwrite)")
    .action(async (_opts: unknown, cmd: Command) => {
      await runAction(cmd, deps, async (ctx, flags) => {
        const result = initConfigFile({
          cwd: ctx.ports.cwd,
          explicitPath: flags.configPath,
          force: flags.force,
        });

        if (result.status === "exists") {
          console.log(`Configuration already exists at ${result.configPath}`);
          return;
        }
        const verb = result.status === "created" ? "Created" : "Overwrote";
        console.log(`${verb} configuration at ${result.configPath}`);
        console.log("Fill in the stage 1 keys, then run: agentctl config check --stage 1");
      });
    });

  config
    .command("check")
    .description("Check that every key needed for a stage is set")
    .option("--stage <n>", "Stage to check (1, 2 or 3)", parseStage, 1)
    .option("--remote", "Also check credentials, project access and required APIs", false)
    .action(async (opts: { stage: Stage; remote: boolean }, cmd: Command) => {
      await runAction(cmd, deps, async (ctx) => {
        const inspection = ctx.resolver.inspect(opts.stage);
        printWarnings(inspection.set.warnings.map((warning) => warning.message));

        if (inspection.missing.length === 0 && inspection.conflicts.length === 0) {
          console.log(`Configuration complete for stage ${opts.stage} (${STAGE_LABELS[opts.stage]}).`);
          if (!opts.remote) return EXIT_CODES.success;

          const report = await ctx.createProjectServices(inspection.set).preflight.run();
          printPreflightReport(report);
          return exitCodeForKinds(report.checks.flatMap((check) => (check.errorKind ? [check.errorKind] : [])));
        }

        for (const item of inspection.missing) {
          const reason = item.reason === "placeholder" ? "placeholder value" : "not set";
          console.log(`  missing  ${item.key} (stage ${item.stage}, ${reason})`);
        }
        for (const conflict of inspection.conflicts) {
          console.log(`  invalid  ${conflict.key}: ${conflict.message}`);
        }
        return EXIT_CODES.config;
      });
    });

  config
    .command("show")
    .description("Show resolved configuration values and where each came from")
    .action(async (_opts: unknown, cmd: Command) => {
      await runAction(cmd, deps, async (ctx) => {
        const inspection = ctx.resolver.inspect(1);
        printWarnings(inspection.set.warnings.map((warning) => warning.message));
        console.log(`Configuration file: ${ctx.configPath ?? "(none)"}`);
        for (const item of summarizeConfig(inspection.set)) {
          const via = item.via ? `, via ${item.via}` : "";
          console.log(`  ${item.key}=${item.value}  [stage ${item.stage}, ${item.origin}${via}]`);
        }
      });
    });
}

function parseStage(value: string): Stage {
  const stage = STAGES.find((candidate) => String(candidate) === value.trim());
  if (stage === undefined) {
    throw new InvalidArgumentError(`Stage must be one of ${STAGES.join(", ")}.`);
  }
  return stage;
}
