/*
Purpose: render a thrown value as typed lines for the terminal, plus ANSI styling helpers.
Assumptions: the CLI wraps DeployErrors in UserFacingError first; debug lines read the wrapped DeployError.
Usage: formatErrorLines(err, { mode: "debug" }); createAnsiFormatter(resolveColorEnabled({ stream })).
*/

import {
  ConfigError,
  PrerequisiteError,
  RemoteError,
  UserFacingError,
  unwrapDeployError,
} from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatOptions = {
  mode?: ErrorFormatMode;
};

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "hint"
  | "next"
  | "code"
  | "kind"
  | "resource"
  | "state"
  | "keys"
  | "status"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "bold" | "dim" | "red" | "yellow" | "cyan";

export type AnsiFormatter = (value: string, styles?: AnsiStyle[]) => string;

export type AnsiColorOptions = {
  stream?: { isTTY?: boolean };
  useColor?: boolean;
};

// =============================================================================
// ANSI COLOR HELPERS
// =============================================================================

const ANSI_RESET = "\x1b[0m";

const ANSI_STYLES: Record<AnsiStyle, string> = {
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
};

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  return (value: string, styles: AnsiStyle[] = []): string => {
    if (!enabled || styles.length === 0) return value;
    const prefix = styles.map((style) => ANSI_STYLES[style]).join("");
    return `${prefix}${value}${ANSI_RESET}`;
  };
}

/** Color only reaches a terminal; `useColor: false` (from --no-color) turns it off there too. */
export function resolveColorEnabled(options: AnsiColorOptions = {}): boolean {
  const isTty = Boolean((options.stream ?? process.stderr).isTTY);
  return isTty && options.useColor !== false;
}

// =============================================================================
// ERROR FORMATTING
// =============================================================================

const UNEXPECTED_TITLE = "Unexpected error";

export function formatErrorLines(error: unknown, options: ErrorFormatOptions = {}): ErrorFormatLine[] {
  const lines: ErrorFormatLine[] = [];

  if (error instanceof UserFacingError) {
    lines.push({ kind: "title", text: error.title });
    if (error.message !== error.title) lines.push({ kind: "message", text: error.message });
    if (error.hint) lines.push({ kind: "hint", text: error.hint });
    if (error.next) lines.push({ kind: "next", text: error.next });
  } else {
    lines.push({ kind: "title", text: UNEXPECTED_TITLE });
    lines.push({ kind: "message", text: describeThrown(error) });
  }

  if (options.mode === "debug") lines.push(...debugLines(error));
  return lines;
}

function debugLines(error: unknown): ErrorFormatLine[] {
  const lines: ErrorFormatLine[] = [];
  if (error instanceof UserFacingError) lines.push({ kind: "code", text: error.code });

  const deployError = unwrapDeployError(error);
  if (deployError) {
    lines.push({ kind: "kind", text: deployError.kind });

    const target = [deployError.resource, deployError.remoteId].filter((part) => part !== undefined);
    if (target.length > 0) lines.push({ kind: "resource", text: target.join(" ") });

    if (deployError instanceof PrerequisiteError && deployError.state) {
      lines.push({ kind: "state", text: deployError.state });
    }
    if (deployError instanceof ConfigError && deployError.keys.length > 0) {
      lines.push({ kind: "keys", text: deployError.keys.join(", ") });
    }
    if (deployError instanceof RemoteError && deployError.statusCode !== undefined) {
      lines.push({ kind: "status", text: String(deployError.statusCode) });
    }
  }

  // The user-facing wrapper adds nothing below the DeployError it carries.
  const origin = deployError ?? error;
  if (origin instanceof Error) {
    if (origin.cause !== undefined) lines.push({ kind: "cause", text: describeThrown(origin.cause) });
    if (origin.stack) lines.push({ kind: "stack", text: origin.stack });
  }
  return lines;
}

function describeThrown(value: unknown): string {
  if (value instanceof Error) return value.message.trim() || value.name;
  return String(value);
}
