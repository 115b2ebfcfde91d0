import { z } from "zod";

import type { DesiredSpec, ResourceHandle } from "../core/resources.js";
import { shortName } from "../core/resources.js";
import { authorizationsPath, discoveryUrl } from "../gcp/endpoints.js";

import { BaseResourceClient, slugify, stringField, type Prerequisites } from "./resource-client.js";

const authorizationSchema = z.object({
  name: z.string(),
  serverSideOauth2: z
    .object({
      clientId: z.string().optional(),
      authorizationUri: z.string().optional(),
      tokenUri: z.string().optional(),
    })
    .optional(),
});

type Authorization = z.infer<typeof authorizationSchema>;

/**
 * Server-side OAuth authorization an agent link may reference.
 * The client secret is write-only: it is sent on create/update and never compared.
 */
export class OAuthAuthorizationClient extends BaseResourceClient {
  readonly kind = "OAuthAuthorization" as const;

  configuredId(_prerequisites: Prerequisites): string | undefined {
    const authId = this.config.get("OAUTH_AUTH_ID");
    return authId ? `${this.parent()}/${authId}` : undefined;
  }

  /** Authorizations have no display name; the id doubles as one. */
  displayName(): string {
    return this.config.get("OAUTH_AUTH_ID") ?? `${slugify(this.config.require("AGENT_DISPLAY_NAME"))}-oauth`;
  }

  desiredSpec(_prerequisites: Prerequisites): DesiredSpec {
    const credentials = this.config.requireAll(
      ["OAUTH_CLIENT_ID", "OAUTH_CLIENT_SECRET", "OAUTH_AUTH_URI"],
      "register the OAuth authorization",
    );
    const authId = this.displayName();
    return {
      displayName: authId,
      requestedId: authId,
      fields: {
        clientId: credentials.OAUTH_CLIENT_ID,
        authorizationUri: credentials.OAUTH_AUTH_URI,
        tokenUri: this.config.require("OAUTH_TOKEN_URI"),
      },
      secrets: { clientSecret: credentials.OAUTH_CLIENT_SECRET },
    };
  }

  outputs(handle: ResourceHandle): Record<string, string> {
    return { OAUTH_AUTH_ID: shortName(handle.id) };
  }

  async create(spec: DesiredSpec): Promise<ResourceHandle> {
    const authId = spec.requestedId ?? spec.displayName;
    const id = `${this.parent()}/${authId}`;
    const created = await this.deps.discovery.request(discoveryUrl(this.parent()), authorizationSchema, {
      method: "POST",
      intent: "create",
      query: { authorizationId: authId },
      resource: this.kind,
      remoteId: id,
      body: { name: id, serverSideOauth2: buildOauthBlock(spec) },
    });
    return toHandle(created);
  }

  async get(id: string): Promise<ResourceHandle> {
    const authorization = await this.deps.discovery.request(discoveryUrl(id), authorizationSchema, {
      resource: this.kind,
      remoteId: id,
    });
    return toHandle(authorization);
  }

  async update(id: string, spec: DesiredSpec): Promise<ResourceHandle> {
    const updated = await this.deps.discovery.request(discoveryUrl(id), authorizationSchema, {
      method: "PATCH",
      intent: "mutate",
      query: { updateMask: "serverSideOauth2" },
      resource: this.kind,
      remoteId: id,
      body: { name: id, serverSideOauth2: buildOauthBlock(spec) },
    });
    return toHandle(updated);
  }

  async delete(id: string): Promise<void> {
    await this.deps.discovery.request(discoveryUrl(id), z.unknown(), {
      method: "DELETE",
      intent: "mutate",
      resource: this.kind,
      remoteId: id,
    });
  }

  async *list(_prerequisites: Prerequisites): AsyncGenerator<ResourceHandle> {
    const authorizations = this.deps.discovery.paginate(
      discoveryUrl(this.parent()),
      "authorizations",
      authorizationSchema,
      { resource: this.kind },
    );
    for await (const authorization of authorizations) {
      yield toHandle(authorization);
    }
  }

  private parent(): string {
    return authorizationsPath(this.config.require("GCP_PROJECT_NUMBER"));
  }
}

function buildOauthBlock(spec: DesiredSpec): Record<string, string | undefined> {
  return {
    clientId: stringField(spec, "clientId"),
    clientSecret: spec.secrets?.clientSecret,
    authorizationUri: stringField(spec, "authorizationUri"),
    tokenUri: stringField(spec, "tokenUri"),
  };
}

function toHandle(authorization: Authorization): ResourceHandle {
  const oauth = authorization.serverSideOauth2;
  return {
    kind: "OAuthAuthorization",
    id: authorization.name,
    displayName: shortName(authorization.name),
    state: "Active",
    spec: {
      clientId: oauth?.clientId ?? "",
      authorizationUri: oauth?.authorizationUri ?? "",
      tokenUri: oauth?.tokenUri ?? "",
    },
  };
}
