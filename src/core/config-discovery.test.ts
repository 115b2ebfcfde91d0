import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { buildConfigTemplate, initConfigFile, resolveConfigPath } from "./config-discovery.js";
import { parseEnvFile } from "./env-file.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

function makeTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "config-discovery-"));
  tempDirs.push(dir);
  return dir;
}

describe("resolveConfigPath", () => {
  it("resolves an explicit path against the working directory", () => {
    const cwd = makeTempDir();

    expect(resolveConfigPath({ explicitPath: "conf/prod.env", cwd })).toEqual({
      configPath: path.join(cwd, "conf", "prod.env"),
      source: "explicit",
    });
  });

  it("prefers .env in the working directory", () => {
    const cwd = makeTempDir();
    fs.writeFileSync(path.join(cwd, ".env"), "GCP_PROJECT_ID=demo-project\n", "utf8");

    expect(resolveConfigPath({ cwd })).toEqual({ configPath: path.join(cwd, ".env"), source: "cwd" });
  });

  it("falls back to .env at the repository root", () => {
    const root = makeTempDir();
    fs.mkdirSync(path.join(root, ".git"));
    fs.writeFileSync(path.join(root, ".env"), "GCP_PROJECT_ID=demo-project\n", "utf8");
    const cwd = path.join(root, "packages", "agent");
    fs.mkdirSync(cwd, { recursive: true });

    expect(resolveConfigPath({ cwd })).toEqual({ configPath: path.join(root, ".env"), source: "repo" });
  });
});

describe("initConfigFile", () => {
  it("writes the template once and overwrites only with force", () => {
    const cwd = makeTempDir();
    const configPath = path.join(cwd, ".env");

    expect(initConfigFile({ cwd })).toEqual({ configPath, status: "created" });

    fs.writeFileSync(configPath, "GCP_PROJECT_ID=demo-project\n", "utf8");
    expect(initConfigFile({ cwd })).toEqual({ configPath, status: "exists" });
    expect(fs.readFileSync(configPath, "utf8")).toBe("GCP_PROJECT_ID=demo-project\n");

    expect(initConfigFile({ cwd, force: true })).toEqual({ configPath, status: "overwritten" });
    expect(fs.readFileSync(configPath, "utf8")).toBe(buildConfigTemplate());
  });
});

describe("buildConfigTemplate", () => {
  it("parses back to the catalog defaults", () => {
    const parsed = parseEnvFile(buildConfigTemplate());

    expect(parsed.issues).toEqual([]);
    expect(parsed.values.GCP_LOCATION).toBe("us-central1");
    expect(parsed.values.AGENT_DISPLAY_NAME).toBe("Deployed Agent");
    expect(parsed.values.GCP_PROJECT_ID).toBeUndefined();
  });

  it("lists required keys as commented assignments", () => {
    const lines = buildConfigTemplate().split("\n");

    expect(lines).toContain("# Cloud project id (required)");
    expect(lines).toContain("# GCP_PROJECT_ID=");
    expect(lines).toContain("# --- Stage 3: integration outputs ---");
  });
});
