import { execa } from "execa";
import { afterEach, describe, expect, it, vi } from "vitest";

import { RemoteError } from "../core/errors.js";

import { ACCESS_TOKEN_ENV, GcloudTokenProvider } from "./auth.js";

vi.mock("execa", () => ({
  execa: vi.fn(),
}));

const execaMock = vi.mocked(execa);

afterEach(() => {
  execaMock.mockReset();
});

describe("GcloudTokenProvider", () => {
  it("uses the access token from the environment without calling gcloud", async () => {
    const provider = new GcloudTokenProvider({ environment: { [ACCESS_TOKEN_ENV]: " test-token " } });

    await expect(provider.getToken()).resolves.toBe("test-token");
    expect(execaMock).not.toHaveBeenCalled();
  });

  it("asks gcloud once and reuses the token", async () => {
    execaMock.mockResolvedValueOnce({ stdout: "test-token\n" } as Awaited<ReturnType<typeof execa>>);
    const provider = new GcloudTokenProvider({ environment: {} });

    await expect(provider.getToken()).resolves.toBe("test-token");
    await expect(provider.getToken()).resolves.toBe("test-token");
    expect(execaMock).toHaveBeenCalledTimes(1);
    expect(execaMock).toHaveBeenCalledWith("gcloud", ["auth", "print-access-token"], { stdin: "ignore" });
  });

  it("reports a gcloud failure as PermissionDenied and retries on the next call", async () => {
    execaMock.mockRejectedValueOnce(new Error("not logged in"));
    execaMock.mockResolvedValueOnce({ stdout: "test-token" } as Awaited<ReturnType<typeof execa>>);
    const provider = new GcloudTokenProvider({ environment: {}, gcloudPath: "/opt/gcloud/bin/gcloud" });

    const error = await provider.getToken().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RemoteError);
    expect(error).toMatchObject({
      kind: "PermissionDenied",
      suggestion: `Run \`gcloud auth login\` or set ${ACCESS_TOKEN_ENV}`,
    });
    await expect(provider.getToken()).resolves.toBe("test-token");
    expect(execaMock).toHaveBeenCalledTimes(2);
  });

  it("rejects an empty token", async () => {
    execaMock.mockResolvedValueOnce({ stdout: "  \n" } as Awaited<ReturnType<typeof execa>>);
    const provider = new GcloudTokenProvider({ environment: {} });

    await expect(provider.getToken()).rejects.toMatchObject({ kind: "PermissionDenied" });
  });
});
