import { Command } from "commander";

import { registerConfigCommand } from "./config.js";
import { registerGlobalFlags, type CliDeps } from "./context.js";
import { registerIamCommand } from "./iam.js";
import { registerResourceCommands } from "./resources.js";
import { registerStatusCommand, registerWorkflowCommand } from "./status.js";

export const PROGRAM_NAME = "agentctl";

export function buildProgram(deps: CliDeps = {}): Command {
  const program = new Command();
  program
    .name(PROGRAM_NAME)
    .description("Deploy and manage a cloud-hosted agent and the resources it depends on")
    .version("0.1.0");

  registerGlobalFlags(program);
  registerResourceCommands(program, deps);
  registerStatusCommand(program, deps);
  registerWorkflowCommand(program, deps);
  registerConfigCommand(program, deps);
  registerIamCommand(program, deps);

  return program;
}
