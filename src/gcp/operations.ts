/*
Purpose: wait for long-running remote operations with bounded exponential backoff.
Assumptions: the ceiling is the only timeout; RemoteUnavailable while polling is retried, any other
  error propagates.
Usage: await poller.wait(operation, { resource: "ComputeAgent" }).
*/

import { z } from "zod";

import { RemoteError, isDeployError } from "../core/errors.js";
import { NULL_SINK, logOrchestratorEvent, type EventSink } from "../core/logger.js";
import type { ResourceKind } from "../core/resources.js";

import type { GcpHttpClient } from "./http.js";

// =============================================================================
// TYPES
// =============================================================================

export type Clock = {
  now: () => number;
  sleep: (ms: number) => Promise<void>;
};

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

export const operationSchema = z.object({
  name: z.string(),
  done: z.boolean().optional(),
  error: z
    .object({
      code: z.number().optional(),
      message: z.string().optional(),
    })
    .optional(),
  response: z.unknown().optional(),
  metadata: z.unknown().optional(),
});

export type LongRunningOperation = z.infer<typeof operationSchema>;

export type PollerOptions = {
  http: GcpHttpClient;
  /** Maps an operation name to the URL that reports its progress. */
  operationUrl: (name: string) => string;
  clock?: Clock;
  timeoutMs?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  events?: EventSink;
};

export const DEFAULT_OPERATION_TIMEOUT_MS = 20 * 60_000;
const DEFAULT_INITIAL_DELAY_MS = 5_000;
const DEFAULT_MAX_DELAY_MS = 60_000;

// =============================================================================
// POLLER
// =============================================================================

export class OperationPoller {
  private readonly http: GcpHttpClient;
  private readonly operationUrl: (name: string) => string;
  private readonly clock: Clock;
  private readonly timeoutMs: number;
  private readonly initialDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly events: EventSink;

  constructor(options: PollerOptions) {
    this.http = options.http;
    this.operationUrl = options.operationUrl;
    this.clock = options.clock ?? systemClock;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_OPERATION_TIMEOUT_MS;
    this.initialDelayMs = options.initialDelayMs ?? DEFAULT_INITIAL_DELAY_MS;
    this.maxDelayMs = options.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
    this.events = options.events ?? NULL_SINK;
  }

  async wait(
    operation: LongRunningOperation,
    context: { resource: ResourceKind; remoteId?: string },
  ): Promise<LongRunningOperation> {
    const deadline = this.clock.now() + this.timeoutMs;
    let delay = this.initialDelayMs;
    let current = operation;
    let polls = 0;

    while (!current.done) {
      const remaining = deadline - this.clock.now();
      if (remaining <= 0) {
        logOrchestratorEvent(this.events, "operation.timeout", {
          operation: current.name,
          resource: context.resource,
          polls,
        });
        throw new RemoteError(
          "Timeout",
          `Operation ${current.name} did not finish within ${Math.round(this.timeoutMs / 1000)}s.`,
          {
            resource: context.resource,
            remoteId: context.remoteId,
            suggestion: "Re-run verify later; the operation may still complete",
          },
        );
      }

      await this.clock.sleep(Math.min(delay, remaining));
      delay = Math.min(delay * 2, this.maxDelayMs);
      polls += 1;

      try {
        current = await this.http.request(this.operationUrl(current.name), operationSchema, {
          resource: context.resource,
          remoteId: context.remoteId,
        });
        logOrchestratorEvent(this.events, "operation.poll", {
          operation: current.name,
          done: current.done ?? false,
          polls,
        });
      } catch (err) {
        if (!isDeployError(err, "RemoteUnavailable")) throw err;
        logOrchestratorEvent(this.events, "operation.poll_retry", {
          operation: current.name,
          message: err.message,
        });
      }
    }

    if (current.error) {
      throw new RemoteError(
        "Failed",
        `Operation ${current.name} failed: ${current.error.message ?? `code ${current.error.code ?? "unknown"}`}`,
        { resource: context.resource, remoteId: context.remoteId },
      );
    }

    return current;
  }
}
