import fs from "node:fs";
import path from "node:path";

import { STAGES, STAGE_LABELS, listConfigKeys } from "./config.js";
import { formatEnvLine } from "./env-file.js";

const CONFIG_FILE = ".env";

export type ConfigSource = "explicit" | "cwd" | "repo" | "none";

export type ConfigResolution = {
  /** Absent when no file exists; defaults and the environment still apply. */
  configPath?: string;
  source: ConfigSource;
};

export type InitResult = {
  configPath: string;
  status: "created" | "exists" | "overwritten";
};

export function resolveConfigPath(args: { explicitPath?: string; cwd?: string }): ConfigResolution {
  const cwd = args.cwd ?? process.cwd();

  if (args.explicitPath) {
    return { configPath: path.resolve(cwd, args.explicitPath), source: "explicit" };
  }

  const local = path.join(cwd, CONFIG_FILE);
  if (fs.existsSync(local)) {
    return { configPath: local, source: "cwd" };
  }

  const repoRoot = findRepoRoot(cwd);
  if (repoRoot) {
    const repoConfig = path.join(repoRoot, CONFIG_FILE);
    if (fs.existsSync(repoConfig)) {
      return { configPath: repoConfig, source: "repo" };
    }
  }

  return { source: "none" };
}

export function initConfigFile(args: { cwd?: string; explicitPath?: string; force?: boolean }): InitResult {
  const cwd = args.cwd ?? process.cwd();
  const configPath = path.resolve(cwd, args.explicitPath ?? CONFIG_FILE);
  const hasConfig = fs.existsSync(configPath);

  if (hasConfig && !(args.force ?? false)) {
    return { configPath, status: "exists" };
  }

  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, buildConfigTemplate(), "utf8");
  return { configPath, status: hasConfig ? "overwritten" : "created" };
}

export function findRepoRoot(startDir: string): string | null {
  let current = path.resolve(startDir);
  while (true) {
    if (fs.existsSync(path.join(current, ".git"))) {
      return current;
    }

    const parent = path.dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

export function buildConfigTemplate(): string {
  const keys = listConfigKeys();
  const lines: string[] = ["# agentctl configuration. Environment variables override these values.", ""];

  for (const stage of STAGES) {
    lines.push(`# --- Stage ${stage}: ${STAGE_LABELS[stage]} ---`);
    for (const spec of keys.filter((item) => item.stage === stage)) {
      const marker = spec.required ? " (required)" : "";
      lines.push(`# ${spec.description}${marker}`);
      lines.push(spec.default !== undefined ? formatEnvLine(spec.key, spec.default) : `# ${spec.key}=`);
    }
    lines.push("");
  }

  lines.push("# Variables prefixed with AGENT_ENV_ are forwarded to the agent runtime.");
  lines.push("");
  return lines.join("\n");
}
