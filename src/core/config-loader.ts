/*
Purpose: resolve layered configuration (defaults, file, environment) into a ConfigurationSet for a stage.
Assumptions: precedence is environment > file > default for every key; a canonical key set in any
  layer beats its deprecated name; derived values only fill gaps.
Usage: new ConfigurationResolver(loadConfigSources({ configPath })).resolve(2).
*/

import type { ZodIssue } from "zod";

import {
  COMPOSITE_KEYS,
  CONFIG_KEYS,
  DEPRECATED_KEYS,
  FALLBACK_KEYS,
  PASSTHROUGH_PREFIX,
  STAGES,
  isPlaceholderValue,
  listConfigKeys,
  requiredKeysForStage,
  type CompositeKeySpec,
  type Stage,
} from "./config.js";
import {
  ConfigurationSet,
  type ConfigDiagnostic,
  type ConfigEntry,
  type ConfigOrigin,
} from "./config-set.js";
import { readEnvFile } from "./env-file.js";
import { ConfigError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ConfigSources = {
  /** Path of the configuration file, when one was found. */
  filePath?: string;
  file: Record<string, string>;
  environment: Record<string, string | undefined>;
};

export type MissingKey = {
  key: string;
  stage: Stage;
  reason: "unset" | "placeholder";
};

export type ConfigConflictDetail = {
  key: string;
  message: string;
};

export type ConfigInspection = {
  set: ConfigurationSet;
  missing: MissingKey[];
  conflicts: ConfigConflictDetail[];
};

export type ResolveOptions = {
  /** Extra keys the operation needs on top of the stage's required keys. */
  require?: string[];
};

// =============================================================================
// SOURCES
// =============================================================================

export function loadConfigSources(args: {
  configPath?: string;
  environment?: Record<string, string | undefined>;
}): ConfigSources {
  return {
    filePath: args.configPath,
    file: args.configPath ? readEnvFile(args.configPath) : {},
    environment: args.environment ?? process.env,
  };
}

// =============================================================================
// RESOLVER
// =============================================================================

export class ConfigurationResolver {
  constructor(private readonly sources: ConfigSources) {}

  resolve(stage: Stage, options: ResolveOptions = {}): ConfigurationSet {
    const inspection = this.inspect(stage, options);

    if (inspection.conflicts.length > 0) {
      throw new ConfigError("ConfigConflict", formatConflicts(inspection.conflicts), {
        keys: inspection.conflicts.map((conflict) => conflict.key),
        suggestion: "Correct or remove the conflicting keys, then rerun",
      });
    }

    if (inspection.missing.length > 0) {
      const keys = inspection.missing.map((item) => item.key);
      throw new ConfigError("ConfigMissing", formatMissing(inspection.missing, stage), {
        keys,
        suggestion: `Set ${keys.join(", ")} in ${this.sources.filePath ?? ".env"} or the environment`,
      });
    }

    return inspection.set;
  }

  /** Resolves without failing; missing and conflicting keys are returned instead of thrown. */
  inspect(stage: Stage, options: ResolveOptions = {}): ConfigInspection {
    const layered = this.layer();
    const conflicts: ConfigConflictDetail[] = [];

    for (const composite of COMPOSITE_KEYS) {
      conflicts.push(...reconcileComposite(composite, layered.entries));
    }
    applyFallbacks(layered.entries);
    for (const composite of COMPOSITE_KEYS) {
      deriveComposite(composite, layered.entries);
    }
    conflicts.push(...validateValues(layered.entries));

    const required = new Set([
      ...STAGES.filter((s) => s <= stage).flatMap((s) => requiredKeysForStage(s)),
      ...(options.require ?? []),
    ]);

    const missing: MissingKey[] = [...required]
      .filter((key) => !layered.entries.has(key))
      .map((key) => ({
        key,
        stage: CONFIG_KEYS.get(key)?.stage ?? stage,
        reason: layered.placeholders.has(key) ? "placeholder" : "unset",
      }));

    return {
      set: new ConfigurationSet(stage, [...layered.entries.values()], layered.warnings),
      missing,
      conflicts,
    };
  }

  private layer(): {
    entries: Map<string, ConfigEntry>;
    warnings: ConfigDiagnostic[];
    placeholders: Set<string>;
  } {
    const entries = new Map<string, ConfigEntry>();
    const warnings: ConfigDiagnostic[] = [];
    const placeholders = new Set<string>();
    const aliasesByKey = invertAliases();

    for (const spec of listConfigKeys()) {
      const candidates: Array<{ origin: ConfigOrigin; value: string | undefined; via?: string }> = [
        { origin: "environment", value: this.sources.environment[spec.key] },
        { origin: "file", value: this.sources.file[spec.key] },
      ];

      for (const alias of aliasesByKey.get(spec.key) ?? []) {
        const fromEnv = this.sources.environment[alias];
        const fromFile = this.sources.file[alias];
        if (fromEnv !== undefined || fromFile !== undefined) {
          warnings.push({
            level: "warning",
            key: alias,
            message: `${alias} is deprecated; use ${spec.key} instead.`,
          });
        }
        candidates.push({ origin: "environment", value: fromEnv, via: alias });
        candidates.push({ origin: "file", value: fromFile, via: alias });
      }

      candidates.push({ origin: "default", value: spec.default });

      for (const candidate of candidates) {
        const value = candidate.value?.trim();
        if (value === undefined || value.length === 0) continue;
        if (isPlaceholderValue(value)) {
          placeholders.add(spec.key);
          continue;
        }

        if (candidate.via && hasCanonical(this.sources, spec.key)) continue;

        entries.set(spec.key, {
          key: spec.key,
          value,
          origin: candidate.origin,
          stage: spec.stage,
          via: candidate.via,
        });
        break;
      }
    }

    for (const [key, value] of collectPassthrough(this.sources)) {
      entries.set(key, { key, value: value.entry, origin: value.origin, stage: 2 });
    }

    return { entries, warnings, placeholders };
  }
}

// =============================================================================
// DERIVATION
// =============================================================================

function applyFallbacks(entries: Map<string, ConfigEntry>): void {
  for (const [key, source] of Object.entries(FALLBACK_KEYS)) {
    const from = entries.get(source);
    const spec = CONFIG_KEYS.get(key);
    if (entries.has(key) || !from || !spec) continue;
    entries.set(key, { key, value: from.value, origin: "derived", stage: spec.stage });
  }
}

/** Checks an explicit composite against its components and fills absent or defaulted components from it. */
export function reconcileComposite(
  composite: CompositeKeySpec,
  entries: Map<string, ConfigEntry>,
): ConfigConflictDetail[] {
  const explicit = entries.get(composite.key);
  if (!explicit) return [];

  const groups = composite.pattern.exec(explicit.value)?.groups;
  if (!groups) {
    return [
      {
        key: composite.key,
        message: `${composite.key}=${explicit.value} must look like ${composite.template}.`,
      },
    ];
  }

  const conflicts: ConfigConflictDetail[] = [];
  for (const [group, componentKey] of Object.entries(composite.components)) {
    const segment = groups[group];
    if (segment === undefined) continue;

    const component = entries.get(componentKey);
    if (!component || component.origin === "default") {
      if (component && segmentMatches(composite, group, segment, component.value, entries)) continue;
      // A numeric project segment is the project number, not an id we can adopt.
      if (composite.projectGroups.includes(group) && /^\d+$/.test(segment)) continue;
      entries.set(componentKey, {
        key: componentKey,
        value: segment,
        origin: "derived",
        stage: CONFIG_KEYS.get(componentKey)?.stage ?? explicit.stage,
      });
      continue;
    }

    if (!segmentMatches(composite, group, segment, component.value, entries)) {
      conflicts.push({
        key: composite.key,
        message: `${composite.key}=${explicit.value} contradicts ${componentKey}=${component.value}.`,
      });
    }
  }

  return conflicts;
}

/** Builds an absent composite from its components when all of them are known. */
export function deriveComposite(
  composite: CompositeKeySpec,
  entries: Map<string, ConfigEntry>,
): void {
  if (entries.has(composite.key)) return;

  let complete = true;
  const value = composite.template.replace(/\{([A-Z0-9_]+)\}/g, (_match, key: string) => {
    const component = entries.get(key)?.value;
    if (component === undefined) {
      complete = false;
      return "";
    }
    return component;
  });

  if (complete) {
    entries.set(composite.key, {
      key: composite.key,
      value,
      origin: "derived",
      stage: CONFIG_KEYS.get(composite.key)?.stage ?? 1,
    });
  }
}

function segmentMatches(
  composite: CompositeKeySpec,
  group: string,
  segment: string,
  componentValue: string,
  entries: Map<string, ConfigEntry>,
): boolean {
  if (segment === componentValue) return true;
  if (!composite.projectGroups.includes(group)) return false;
  return entries.get("GCP_PROJECT_NUMBER")?.value === segment;
}

// =============================================================================
// VALIDATION
// =============================================================================

function validateValues(entries: Map<string, ConfigEntry>): ConfigConflictDetail[] {
  const conflicts: ConfigConflictDetail[] = [];
  for (const entry of entries.values()) {
    const schema = CONFIG_KEYS.get(entry.key)?.schema;
    if (!schema) continue;

    const result = schema.safeParse(entry.value);
    if (!result.success) {
      conflicts.push({
        key: entry.key,
        message: `${entry.key}=${entry.value} ${formatValueIssues(result.error.issues)}.`,
      });
    }
  }
  return conflicts;
}

export function formatValueIssues(issues: ZodIssue[]): string {
  return issues.map((issue) => issue.message).join("; ");
}

// =============================================================================
// HELPERS
// =============================================================================

function invertAliases(): Map<string, string[]> {
  const byKey = new Map<string, string[]>();
  for (const [alias, canonical] of Object.entries(DEPRECATED_KEYS)) {
    byKey.set(canonical, [...(byKey.get(canonical) ?? []), alias]);
  }
  return byKey;
}

function hasCanonical(sources: ConfigSources, key: string): boolean {
  const fromEnv = sources.environment[key]?.trim();
  const fromFile = sources.file[key]?.trim();
  return Boolean(fromEnv) || Boolean(fromFile);
}

function collectPassthrough(
  sources: ConfigSources,
): Map<string, { entry: string; origin: ConfigOrigin }> {
  const result = new Map<string, { entry: string; origin: ConfigOrigin }>();
  for (const [key, value] of Object.entries(sources.file)) {
    if (key.startsWith(PASSTHROUGH_PREFIX)) result.set(key, { entry: value, origin: "file" });
  }
  for (const [key, value] of Object.entries(sources.environment)) {
    if (key.startsWith(PASSTHROUGH_PREFIX) && value !== undefined) {
      result.set(key, { entry: value, origin: "environment" });
    }
  }
  return result;
}

function formatMissing(missing: MissingKey[], stage: Stage): string {
  const parts = missing.map((item) =>
    item.reason === "placeholder" ? `${item.key} (placeholder value)` : item.key,
  );
  return `Missing configuration for stage ${stage}: ${parts.join(", ")}.`;
}

function formatConflicts(conflicts: ConfigConflictDetail[]): string {
  return conflicts.map((conflict) => conflict.message).join(" ");
}
