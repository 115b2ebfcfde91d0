/**
 * Resolved configuration: an immutable key -> value map where each entry remembers where it came from.
 */

import { CONFIG_KEYS, PASSTHROUGH_PREFIX, type Stage } from "./config.js";
import { ConfigError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ConfigOrigin = "default" | "file" | "environment" | "derived";

export type ConfigEntry = {
  key: string;
  value: string;
  origin: ConfigOrigin;
  stage: Stage;
  /** Deprecated key name the value was read from, if any. */
  via?: string;
};

export type ConfigDiagnostic = {
  level: "warning";
  key: string;
  message: string;
};

// =============================================================================
// CONFIGURATION SET
// =============================================================================

export class ConfigurationSet {
  readonly stage: Stage;
  readonly warnings: readonly ConfigDiagnostic[];
  private readonly entries: ReadonlyMap<string, ConfigEntry>;

  constructor(stage: Stage, entries: ConfigEntry[], warnings: ConfigDiagnostic[] = []) {
    this.stage = stage;
    this.entries = new Map(entries.map((entry) => [entry.key, Object.freeze({ ...entry })]));
    this.warnings = Object.freeze([...warnings]);
    Object.freeze(this);
  }

  get(key: string): string | undefined {
    return this.entries.get(key)?.value;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  entry(key: string): ConfigEntry | undefined {
    return this.entries.get(key);
  }

  /** Returns the value or fails with ConfigMissing naming the purpose that needed it. */
  require(key: string, purpose?: string): string {
    const value = this.get(key);
    if (value !== undefined) return value;

    const reason = purpose ? ` (needed to ${purpose})` : "";
    throw new ConfigError("ConfigMissing", `Missing configuration: ${key}${reason}.`, {
      keys: [key],
      suggestion: `Set ${key} in your configuration file or environment`,
    });
  }

  requireAll(keys: string[], purpose: string): Record<string, string> {
    const missing = keys.filter((key) => this.get(key) === undefined);
    if (missing.length > 0) {
      throw new ConfigError(
        "ConfigMissing",
        `Missing configuration: ${missing.join(", ")} (needed to ${purpose}).`,
        { keys: missing, suggestion: `Set ${missing.join(", ")} in your configuration file or environment` },
      );
    }

    return Object.fromEntries(keys.map((key) => [key, this.require(key)]));
  }

  list(): ConfigEntry[] {
    return [...this.entries.values()].sort((a, b) => a.stage - b.stage || a.key.localeCompare(b.key));
  }

  /** AGENT_ENV_* entries with the prefix stripped, forwarded to the agent runtime. */
  passthroughEnv(): Record<string, string> {
    const env: Record<string, string> = {};
    for (const entry of this.entries.values()) {
      if (entry.key.startsWith(PASSTHROUGH_PREFIX)) {
        env[entry.key.slice(PASSTHROUGH_PREFIX.length)] = entry.value;
      }
    }
    return env;
  }

  isSecret(key: string): boolean {
    return CONFIG_KEYS.get(key)?.secret ?? /SECRET|TOKEN|PASSWORD|API_KEY/.test(key);
  }
}
