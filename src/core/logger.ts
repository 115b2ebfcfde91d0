/*
Purpose: structured event logging for orchestrator runs.
Assumptions: events are small JSON objects; sinks never throw into the caller's control flow.
Usage: const log = new JsonlLogger(filePath, { runId }); logOrchestratorEvent(log, "guard.skip", { kind }).
*/

import path from "node:path";

import fse from "fs-extra";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;
export type JsonObject = { [key: string]: JsonValue | undefined };

export type LogEvent = {
  type: string;
  payload?: JsonObject;
};

export interface EventSink {
  log(event: LogEvent): void;
}

// =============================================================================
// SINKS
// =============================================================================

export class JsonlLogger implements EventSink {
  readonly filePath: string;
  private readonly base: JsonObject;

  constructor(filePath: string, base: JsonObject = {}) {
    this.filePath = filePath;
    this.base = base;
    fse.ensureDirSync(path.dirname(filePath));
  }

  log(event: LogEvent): void {
    const line = JSON.stringify({ ts: new Date().toISOString(), ...this.base, ...event });
    fse.appendFileSync(this.filePath, `${line}\n`, "utf8");
  }
}

export class ConsoleEventSink implements EventSink {
  constructor(private readonly stream: { write(chunk: string): unknown } = process.stderr) {}

  log(event: LogEvent): void {
    const payload = event.payload ? ` ${JSON.stringify(event.payload)}` : "";
    this.stream.write(`[${event.type}]${payload}\n`);
  }
}

export const NULL_SINK: EventSink = {
  log: () => undefined,
};

export function fanOut(sinks: EventSink[]): EventSink {
  if (sinks.length === 0) return NULL_SINK;
  if (sinks.length === 1) return sinks[0] ?? NULL_SINK;
  return {
    log: (event) => {
      for (const sink of sinks) sink.log(event);
    },
  };
}

// =============================================================================
// HELPERS
// =============================================================================

export function logOrchestratorEvent(sink: EventSink, type: string, payload?: JsonObject): void {
  sink.log(payload ? { type, payload } : { type });
}
