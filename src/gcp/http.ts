/*
Purpose: authenticated JSON requests against the cloud REST APIs with errors normalized to the taxonomy.
Assumptions: responses are JSON; error bodies follow { error: { code, message, status } }.
Usage: await http.request(url, schema, { method: "POST", body, intent: "create", resource: "IntegrationApp" }).
*/

import { z } from "zod";

import { RemoteError, type RemoteErrorKind } from "../core/errors.js";
import { NULL_SINK, logOrchestratorEvent, type EventSink, type JsonObject } from "../core/logger.js";
import type { ResourceKind } from "../core/resources.js";

import type { TokenProvider } from "./auth.js";

// =============================================================================
// TYPES
// =============================================================================

export type HttpMethod = "GET" | "POST" | "PATCH" | "DELETE";

export type RequestIntent = "create" | "read" | "mutate";

export type RequestOptions = {
  method?: HttpMethod;
  query?: Record<string, string | undefined>;
  body?: JsonObject;
  /** Decides how 409 is read: AlreadyExists on create, Conflict otherwise. */
  intent?: RequestIntent;
  resource?: ResourceKind;
  remoteId?: string;
};

export type HttpClientOptions = {
  tokens: TokenProvider;
  fetch?: typeof fetch;
  events?: EventSink;
  /** Include full response bodies in emitted events. */
  verbose?: boolean;
  /** Billing project sent as X-Goog-User-Project. */
  quotaProject?: string;
  timeoutMs?: number;
};

const DEFAULT_TIMEOUT_MS = 60_000;

const errorBodySchema = z.object({
  error: z
    .object({
      code: z.number().optional(),
      message: z.string().optional(),
      status: z.string().optional(),
    })
    .passthrough(),
});

const pageSchema = z.object({ nextPageToken: z.string().optional() }).passthrough();

// =============================================================================
// CLIENT
// =============================================================================

export class GcpHttpClient {
  private readonly tokens: TokenProvider;
  private readonly fetchImpl: typeof fetch;
  private readonly events: EventSink;
  private readonly verbose: boolean;
  private readonly quotaProject?: string;
  private readonly timeoutMs: number;

  constructor(options: HttpClientOptions) {
    this.tokens = options.tokens;
    this.fetchImpl = options.fetch ?? fetch;
    this.events = options.events ?? NULL_SINK;
    this.verbose = options.verbose ?? false;
    this.quotaProject = options.quotaProject;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async request<T>(
    url: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: RequestOptions = {},
  ): Promise<T> {
    const method = options.method ?? "GET";
    const target = withQuery(url, options.query);
    const token = await this.tokens.getToken();

    const headers: Record<string, string> = {
      Authorization: `Bearer ${token}`,
      Accept: "application/json",
    };
    if (options.body) headers["Content-Type"] = "application/json";
    if (this.quotaProject) headers["X-Goog-User-Project"] = this.quotaProject;

    logOrchestratorEvent(this.events, "http.request", { method, url: target });

    let response: Response;
    try {
      response = await this.fetchImpl(target, {
        method,
        headers,
        body: options.body ? JSON.stringify(options.body) : undefined,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new RemoteError("RemoteUnavailable", `${method} ${target} failed: ${describeCause(err)}`, {
        cause: err,
        resource: options.resource,
        remoteId: options.remoteId,
      });
    }

    const text = await response.text();
    const body = parseJson(text);

    logOrchestratorEvent(this.events, "http.response", {
      method,
      url: target,
      status: response.status,
      body: this.verbose ? text : undefined,
    });

    if (!response.ok) {
      throw toRemoteError(response.status, body, options);
    }

    const parsed = schema.safeParse(body ?? {});
    if (!parsed.success) {
      throw new RemoteError(
        "RemoteUnavailable",
        `Unexpected response from ${method} ${target}: ${parsed.error.issues.map((i) => `${i.path.join(".")} ${i.message}`).join("; ")}`,
        { resource: options.resource, remoteId: options.remoteId, statusCode: response.status },
      );
    }
    return parsed.data;
  }

  /** Follows nextPageToken; items under `itemsKey` are validated one page at a time. */
  async *paginate<T>(
    url: string,
    itemsKey: string,
    itemSchema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: Omit<RequestOptions, "method" | "body"> = {},
  ): AsyncGenerator<T> {
    const itemsSchema = z.array(itemSchema);
    let pageToken: string | undefined;

    do {
      const page = await this.request(url, pageSchema, {
        ...options,
        intent: "read",
        query: { ...options.query, pageToken },
      });
      const items = itemsSchema.safeParse(page[itemsKey] ?? []);
      if (!items.success) {
        throw new RemoteError("RemoteUnavailable", `Unexpected ${itemsKey} page from ${url}.`, {
          resource: options.resource,
        });
      }
      yield* items.data;
      pageToken = page.nextPageToken || undefined;
    } while (pageToken);
  }
}

// =============================================================================
// ERROR MAPPING
// =============================================================================

export function toRemoteError(status: number, body: unknown, options: RequestOptions = {}): RemoteError {
  const parsed = errorBodySchema.safeParse(body);
  const remote = parsed.success ? parsed.data.error : undefined;
  const kind = classifyStatus(status, options.intent ?? "read");
  const detail = remote?.message ?? `HTTP ${status}`;
  const label = remote?.status ? `${remote.status}: ` : "";

  return new RemoteError(kind, `${label}${detail}`, {
    statusCode: status,
    resource: options.resource,
    remoteId: options.remoteId,
  });
}

export function classifyStatus(status: number, intent: RequestIntent): RemoteErrorKind {
  if (status === 404) return "NotFound";
  if (status === 409) return intent === "create" ? "AlreadyExists" : "Conflict";
  if (status === 412) return "Conflict";
  if (status === 401 || status === 403) return "PermissionDenied";
  if (status === 408 || status === 429 || status >= 500) return "RemoteUnavailable";
  return "InvalidSpec";
}

// =============================================================================
// HELPERS
// =============================================================================

function withQuery(url: string, query: Record<string, string | undefined> | undefined): string {
  if (!query) return url;
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) params.set(key, value);
  }
  const encoded = params.toString();
  if (!encoded) return url;
  return `${url}${url.includes("?") ? "&" : "?"}${encoded}`;
}

function parseJson(text: string): unknown {
  if (!text.trim()) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function describeCause(err: unknown): string {
  if (err instanceof Error) {
    return err.name === "TimeoutError" ? "request timed out" : err.message;
  }
  return String(err);
}
