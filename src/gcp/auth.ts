/**
 * Access tokens for the cloud REST APIs.
 *
 * Tokens come from GOOGLE_OAUTH_ACCESS_TOKEN when set, otherwise from the gcloud CLI.
 * A token is fetched once per process.
 */

import { execa } from "execa";

import { RemoteError } from "../core/errors.js";

export interface TokenProvider {
  getToken(): Promise<string>;
}

export const ACCESS_TOKEN_ENV = "GOOGLE_OAUTH_ACCESS_TOKEN";

export class GcloudTokenProvider implements TokenProvider {
  private cached: Promise<string> | null = null;

  constructor(
    private readonly options: {
      environment?: Record<string, string | undefined>;
      gcloudPath?: string;
    } = {},
  ) {}

  getToken(): Promise<string> {
    if (!this.cached) {
      this.cached = this.fetchToken().catch((err: unknown) => {
        this.cached = null;
        throw err;
      });
    }
    return this.cached;
  }

  private async fetchToken(): Promise<string> {
    const fromEnv = (this.options.environment ?? process.env)[ACCESS_TOKEN_ENV]?.trim();
    if (fromEnv) return fromEnv;

    const gcloud = this.options.gcloudPath ?? "gcloud";
    try {
      const result = await execa(gcloud, ["auth", "print-access-token"], { stdin: "ignore" });
      const token = result.stdout.trim();
      if (!token) {
        throw new Error("gcloud returned an empty access token");
      }
      return token;
    } catch (err) {
      throw new RemoteError("PermissionDenied", "Could not obtain an access token from gcloud.", {
        cause: err,
        suggestion: `Run \`gcloud auth login\` or set ${ACCESS_TOKEN_ENV}`,
      });
    }
  }
}

export class StaticTokenProvider implements TokenProvider {
  constructor(private readonly token: string) {}

  async getToken(): Promise<string> {
    return this.token;
  }
}
