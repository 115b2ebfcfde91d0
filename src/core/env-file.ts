/*
Purpose: read and write KEY=value configuration files.
Assumptions: one assignment per line; `#` starts a comment only at line start or after whitespace
  in an unquoted value; an optional `export ` prefix is accepted.
Usage: parseEnvFile(text) -> { values, issues }; readEnvFile(filePath) -> values or {} when absent.
*/

import fse from "fs-extra";

import { ConfigError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type EnvFileIssue = {
  line: number;
  message: string;
};

export type ParsedEnvFile = {
  values: Record<string, string>;
  issues: EnvFileIssue[];
};

const KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

// =============================================================================
// PARSING
// =============================================================================

export function parseEnvFile(text: string): ParsedEnvFile {
  const values: Record<string, string> = {};
  const issues: EnvFileIssue[] = [];

  text.split(/\r?\n/).forEach((raw, index) => {
    const lineNumber = index + 1;
    const line = raw.trim();
    if (line.length === 0 || line.startsWith("#")) return;

    const assignment = line.startsWith("export ") ? line.slice("export ".length).trim() : line;
    const eq = assignment.indexOf("=");
    if (eq <= 0) {
      issues.push({ line: lineNumber, message: "expected KEY=value" });
      return;
    }

    const key = assignment.slice(0, eq).trim();
    if (!KEY_PATTERN.test(key)) {
      issues.push({ line: lineNumber, message: `invalid key "${key}"` });
      return;
    }

    const parsed = parseValue(assignment.slice(eq + 1).trim());
    if (parsed === null) {
      issues.push({ line: lineNumber, message: `unterminated quote in value for ${key}` });
      return;
    }

    values[key] = parsed;
  });

  return { values, issues };
}

function parseValue(raw: string): string | null {
  const quote = raw[0];
  if (quote === '"' || quote === "'") {
    const end = raw.indexOf(quote, 1);
    if (end < 0) return null;
    const inner = raw.slice(1, end);
    return quote === '"' ? inner.replace(/\\n/g, "\n") : inner;
  }

  const comment = raw.search(/\s#/);
  return (comment >= 0 ? raw.slice(0, comment) : raw).trim();
}

export function readEnvFile(filePath: string): Record<string, string> {
  if (!fse.pathExistsSync(filePath)) return {};

  const parsed = parseEnvFile(fse.readFileSync(filePath, "utf8"));
  if (parsed.issues.length > 0) {
    const detail = parsed.issues.map((issue) => `line ${issue.line}: ${issue.message}`).join("; ");
    throw new ConfigError("ConfigConflict", `Configuration file ${filePath} is malformed (${detail}).`, {
      suggestion: `Fix the listed lines in ${filePath}`,
    });
  }

  return parsed.values;
}

// =============================================================================
// SERIALIZATION
// =============================================================================

export function formatEnvLine(key: string, value: string): string {
  if (!/[\s#"']/.test(value)) return `${key}=${value}`;
  return value.includes('"') ? `${key}='${value}'` : `${key}="${value}"`;
}
