import type { Command } from "commander";

import type { OrchestratorPorts } from "../app/orchestrator/ports.js";
import { buildRunContext, type RunContext } from "../app/orchestrator/run-context.js";
import type { EventSink } from "../core/logger.js";

import { reportError } from "./error-mapping.js";
import { exitCodeFor } from "./exit-codes.js";

// =============================================================================
// TYPES
// =============================================================================

export type GlobalFlags = {
  configPath?: string;
  force: boolean;
  verbose: boolean;
  logFile?: string;
  color: boolean;
};

/** Injected into the program by tests; production uses the defaults. */
export type CliDeps = {
  ports?: Partial<OrchestratorPorts>;
  sinks?: EventSink[];
};

// =============================================================================
// FLAGS
// =============================================================================

export function registerGlobalFlags(program: Command): void {
  program
    .option("--config <path>", "Configuration file (default: ./.env)")
    .option("--force", "Skip confirmation prompts and allow replacing existing resources", false)
    .option("--verbose", "Print remote requests and responses, and full error details", false)
    .option("--log-file <path>", "Append structured events to a JSONL file")
    .option("--no-color", "Disable colored output");
}

export function resolveGlobalFlags(command: Command): GlobalFlags {
  const opts = command.optsWithGlobals();
  return {
    configPath: typeof opts.config === "string" ? opts.config : undefined,
    force: opts.force === true,
    verbose: opts.verbose === true,
    logFile: typeof opts.logFile === "string" ? opts.logFile : undefined,
    color: opts.color !== false,
  };
}

// =============================================================================
// ACTION WRAPPER
// =============================================================================

export function createRunContext(flags: GlobalFlags, deps: CliDeps): RunContext {
  return buildRunContext({
    options: {
      configPath: flags.configPath,
      force: flags.force,
      verbose: flags.verbose,
      logFile: flags.logFile,
    },
    ports: deps.ports,
    sinks: deps.sinks,
  });
}

/**
 * Runs a command body with a fresh RunContext. Errors are printed and mapped to process.exitCode;
 * the body may return a non-zero code for outcomes that are not exceptions.
 */
export async function runAction(
  command: Command,
  deps: CliDeps,
  body: (ctx: RunContext, flags: GlobalFlags) => Promise<number | void>,
): Promise<void> {
  const flags = resolveGlobalFlags(command);
  try {
    const ctx = createRunContext(flags, deps);
    const code = await body(ctx, flags);
    if (code) process.exitCode = code;
  } catch (err) {
    reportError(err, { verbose: flags.verbose, useColor: flags.color });
    process.exitCode = exitCodeFor(err);
  }
}
