import type { CliDeps } from "./cli/context.js";
import { buildProgram } from "./cli/program.js";

export { buildProgram } from "./cli/program.js";
export type { CliDeps } from "./cli/context.js";

/** Parses `argv` (process.argv layout) and runs the command; the outcome lands in process.exitCode. */
export async function main(argv: string[], deps: CliDeps = {}): Promise<void> {
  const program = buildProgram(deps);
  await program.parseAsync(argv);
}
