import { Command } from "commander";

import type { OperationResult } from "../app/orchestrator/orchestrator.js";
import type { RunContext } from "../app/orchestrator/run-context.js";
import { registerCommand, type Verb } from "../core/dependency-graph.js";
import { formatEnvLine } from "../core/env-file.js";
import { PrerequisiteError } from "../core/errors.js";
import { RESOURCE_COMMAND_NAMES, RESOURCE_KINDS, type ResourceHandle, type ResourceKind } from "../core/resources.js";
import { DEFAULT_OAUTH_SCOPES, buildAuthorizeUrl, readClientSecret } from "../gcp/oauth-consent.js";

import { runAction, type CliDeps } from "./context.js";
import { EXIT_CODES } from "./exit-codes.js";
import { printHandles, printRecord, printWarnings } from "./output.js";

const KIND_DESCRIPTIONS: Record<ResourceKind, string> = {
  DocumentCorpus: "Document corpus used for agent retrieval",
  ComputeAgent: "Agent runtime on the compute engine",
  IntegrationApp: "UI integration app",
  SearchDataStore: "Search data store attached to the app",
  OAuthAuthorization: "OAuth authorization for user-delegated access",
  IntegrationAgentLink: "Registration of the agent inside the app",
};

const SUBCOMMANDS: Array<{ name: string; verb: Verb; description: string }> = [
  { name: "register", verb: "create", description: "Create the resource unless it already exists" },
  { name: "update", verb: "update", description: "Apply the current configuration to the existing resource" },
  { name: "verify", verb: "get", description: "Show whether the resource exists and its state" },
  { name: "delete", verb: "delete", description: "Delete the resource (asks for confirmation without --force)" },
  { name: "list", verb: "list", description: "List existing resources of this kind" },
];

const DEFAULT_SEARCH_PAGE_SIZE = 10;

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerResourceCommands(program: Command, deps: CliDeps): void {
  const groups = new Map<ResourceKind, Command>();

  for (const kind of RESOURCE_KINDS) {
    const group = program.command(RESOURCE_COMMAND_NAMES[kind]).description(KIND_DESCRIPTIONS[kind]);
    groups.set(kind, group);

    for (const sub of SUBCOMMANDS) {
      const command = group
        .command(sub.name)
        .description(sub.description)
        .action(async (_opts: unknown, cmd: Command) => {
          await runAction(cmd, deps, (ctx, flags) => runOperation(ctx, kind, sub.verb, flags.force));
        });

      if (kind === "IntegrationAgentLink" && sub.verb === "create") command.alias("link");
    }
  }

  program
    .command("link-agent")
    .description("Link the deployed agent into the app (same as agent-link register)")
    .action(async (_opts: unknown, cmd: Command) => {
      await runAction(cmd, deps, (ctx, flags) => runOperation(ctx, "IntegrationAgentLink", "create", flags.force));
    });

  const app = groups.get("IntegrationApp");
  if (app) registerAppExtras(app, deps);

  const oauth = groups.get("OAuthAuthorization");
  if (oauth) registerOauthExtras(oauth, deps);
}

function registerAppExtras(app: Command, deps: CliDeps): void {
  app
    .command("url")
    .description("Print the console URL of the app")
    .action(async (_opts: unknown, cmd: Command) => {
      await runAction(cmd, deps, async (ctx) => {
        const { handle, result } = await requireApp(ctx);
        console.log(result.clients.IntegrationApp.consoleUrl(handle));
      });
    });

  app
    .command("search")
    .description("Run a test search against the app's attached data store")
    .requiredOption("--query <text>", "Search query")
    .option("--page-size <n>", "Results to return", (value) => parseInt(value, 10), DEFAULT_SEARCH_PAGE_SIZE)
    .action(async (opts: { query: string; pageSize?: number }, cmd: Command) => {
      await runAction(cmd, deps, async (ctx) => {
        const { handle, result } = await requireApp(ctx);
        const attached = handle.spec.dataStoreIds ?? [];
        if (attached.length === 0) {
          throw new PrerequisiteError("PrerequisiteMissing", "The app has no data store to search.", {
            resource: "SearchDataStore",
            suggestion: registerCommand("SearchDataStore"),
          });
        }

        const pageSize = opts.pageSize && opts.pageSize > 0 ? opts.pageSize : DEFAULT_SEARCH_PAGE_SIZE;
        const found = await result.clients.IntegrationApp.search(handle, opts.query, pageSize);
        console.log(`${found.totalSize} result(s) for "${opts.query}"`);
        for (const hit of found.hits) {
          console.log(`  ${hit.title}${hit.link ? `  ${hit.link}` : ""}`);
        }
      });
    });
}

function registerOauthExtras(oauth: Command, deps: CliDeps): void {
  oauth
    .command("authorize-url")
    .description("Build the OAuth consent URL from a client secret JSON file")
    .requiredOption("--client-secret <file>", "OAuth client secret JSON downloaded from the console")
    .option("--scopes <list>", "Comma-separated scopes", (value) => value.split(",").map((s) => s.trim()).filter(Boolean))
    .action(async (opts: { clientSecret: string; scopes?: string[] }, cmd: Command) => {
      await runAction(cmd, deps, async () => {
        const secret = await readClientSecret(opts.clientSecret);
        const scopes = opts.scopes && opts.scopes.length > 0 ? opts.scopes : DEFAULT_OAUTH_SCOPES;
        const url = buildAuthorizeUrl(secret, scopes);

        console.log(url);
        console.log("");
        console.log("Add to your configuration:");
        console.log(formatEnvLine("OAUTH_CLIENT_ID", secret.clientId));
        console.log(formatEnvLine("OAUTH_CLIENT_SECRET", secret.clientSecret));
        console.log(formatEnvLine("OAUTH_AUTH_URI", url));
        if (secret.tokenUri) console.log(formatEnvLine("OAUTH_TOKEN_URI", secret.tokenUri));
      });
    });
}

// =============================================================================
// ACTIONS
// =============================================================================

export async function runOperation(
  ctx: RunContext,
  kind: ResourceKind,
  verb: Verb,
  force: boolean,
): Promise<number> {
  const result = await ctx.orchestrator.run({ kind, verb, force });

  if (verb === "list") {
    printWarnings(result.record.warnings);
    printHandles(result.items);
    return EXIT_CODES.success;
  }

  if (verb === "get") {
    printWarnings(result.record.warnings);
    const target = result.record.target;
    console.log(`${kind}: ${result.state}${target ? ` ${target.id}` : ""}`);
    if (!target) console.log(`Create it with: ${registerCommand(kind)}`);
    return EXIT_CODES.success;
  }

  printRecord(result.record);
  return EXIT_CODES.success;
}

async function requireApp(ctx: RunContext): Promise<{ handle: ResourceHandle; result: OperationResult }> {
  const result = await ctx.orchestrator.run({ kind: "IntegrationApp", verb: "get" });
  const handle = result.record.target;
  if (!handle) {
    throw new PrerequisiteError("PrerequisiteMissing", "No integration app found.", {
      resource: "IntegrationApp",
      suggestion: registerCommand("IntegrationApp"),
    });
  }
  return { handle, result };
}
