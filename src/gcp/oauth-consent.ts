/*
Purpose: build the OAuth consent URL for an authorization from a downloaded client-secret JSON file.
Assumptions: the file has a "web" or an "installed" section; the consent redirect goes to the search UI.
Usage: buildAuthorizeUrl(await readClientSecret(file), DEFAULT_OAUTH_SCOPES).
*/

import fse from "fs-extra";
import { z } from "zod";

import { ConfigError } from "../core/errors.js";

export const DEFAULT_OAUTH_SCOPES = [
  "https://www.googleapis.com/auth/drive.metadata.readonly",
  "https://www.googleapis.com/auth/calendar.readonly",
];

export const DEFAULT_REDIRECT_URI = "https://vertexaisearch.cloud.google.com/oauth-redirect";

const DEFAULT_AUTH_URI = "https://accounts.google.com/o/oauth2/auth";

const clientSectionSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  auth_uri: z.string().url().optional(),
  token_uri: z.string().url().optional(),
});

const clientSecretFileSchema = z
  .object({ web: clientSectionSchema.optional(), installed: clientSectionSchema.optional() })
  .refine((value) => value.web !== undefined || value.installed !== undefined, {
    message: 'expected a "web" or "installed" section',
  });

export type ClientSecret = {
  clientId: string;
  clientSecret: string;
  authUri: string;
  tokenUri?: string;
};

export async function readClientSecret(filePath: string): Promise<ClientSecret> {
  let raw: unknown;
  try {
    raw = await fse.readJson(filePath);
  } catch (err) {
    throw new ConfigError("ConfigMissing", `Could not read client secret file ${filePath}.`, {
      cause: err,
      suggestion: "Download the OAuth client JSON from the cloud console and pass its path",
    });
  }

  const parsed = clientSecretFileSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => issue.message).join("; ");
    throw new ConfigError("ConfigConflict", `Invalid client secret file ${filePath}: ${detail}.`);
  }

  const section = parsed.data.web ?? parsed.data.installed;
  if (!section) {
    throw new ConfigError("ConfigConflict", `Invalid client secret file ${filePath}.`);
  }
  return {
    clientId: section.client_id,
    clientSecret: section.client_secret,
    authUri: section.auth_uri ?? DEFAULT_AUTH_URI,
    tokenUri: section.token_uri,
  };
}

/** Offline access with a forced consent prompt, so a refresh token is always issued. */
export function buildAuthorizeUrl(
  secret: ClientSecret,
  scopes: readonly string[] = DEFAULT_OAUTH_SCOPES,
  redirectUri: string = DEFAULT_REDIRECT_URI,
): string {
  const params = new URLSearchParams({
    response_type: "code",
    client_id: secret.clientId,
    redirect_uri: redirectUri,
    scope: scopes.join(" "),
    access_type: "offline",
    include_granted_scopes: "true",
    prompt: "consent",
  });
  return `${secret.authUri}?${params.toString()}`;
}
