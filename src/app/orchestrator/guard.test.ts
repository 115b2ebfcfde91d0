import { describe, expect, it } from "vitest";

import { GuardError, RemoteError } from "../../core/errors.js";
import type { DesiredSpec, LifecycleState } from "../../core/resources.js";

import { FakeConfirmer, MemorySink, makeHandle } from "./__tests__/fakes.js";
import { IdempotencyGuard } from "./guard.js";

const DESIRED: DesiredSpec = { displayName: "agent-app", fields: { displayName: "agent-app", solutionType: "SEARCH" } };

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

function current(state: LifecycleState = "Active", displayName = "agent-app") {
  return { ...makeHandle("IntegrationApp", "engines/app1", { displayName, solutionType: "SEARCH" }), state };
}

describe("IdempotencyGuard.checkCreate", () => {
  it("proceeds when nothing exists", () => {
    const guard = new IdempotencyGuard(new FakeConfirmer(false));

    expect(guard.checkCreate("IntegrationApp", undefined, DESIRED, false)).toEqual({ action: "proceed" });
  });

  it("skips an identical instance even with force", () => {
    const events = new MemorySink();
    const guard = new IdempotencyGuard(new FakeConfirmer(false), events);

    expect(guard.checkCreate("IntegrationApp", current(), DESIRED, false)).toMatchObject({
      action: "skip",
      reason: "already exists",
    });
    expect(guard.checkCreate("IntegrationApp", current(), DESIRED, true)).toMatchObject({
      action: "skip",
      reason: "already exists",
    });
    expect(events.events).toEqual([
      { type: "guard.skip", payload: { kind: "IntegrationApp", reason: "already exists" } },
      { type: "guard.skip", payload: { kind: "IntegrationApp", reason: "already exists" } },
    ]);
  });

  it("relinks an identical agent link with force", () => {
    const events = new MemorySink();
    const guard = new IdempotencyGuard(new FakeConfirmer(false), events);
    const link = makeHandle("IntegrationAgentLink", "agents/a1", { displayName: "agent-app" });
    const desired: DesiredSpec = { displayName: "agent-app", fields: { displayName: "agent-app" } };

    expect(guard.checkCreate("IntegrationAgentLink", link, desired, false)).toMatchObject({ action: "skip" });
    expect(guard.checkCreate("IntegrationAgentLink", link, desired, true)).toEqual({ action: "replace", current: link });
    expect(events.events[1]).toEqual({
      type: "guard.replace",
      payload: { kind: "IntegrationAgentLink", reason: undefined },
    });
  });

  it("refuses a differing instance without force and names the fields", () => {
    const guard = new IdempotencyGuard(new FakeConfirmer(false));

    const error = thrown(() => guard.checkCreate("IntegrationApp", current("Active", "old-name"), DESIRED, false));

    expect(error).toBeInstanceOf(GuardError);
    expect(error).toMatchObject({
      kind: "SpecConflict",
      message: "IntegrationApp engines/app1 exists with a different configuration (displayName).",
    });
  });

  it("treats a failed instance as a conflict unless forced", () => {
    const guard = new IdempotencyGuard(new FakeConfirmer(false));

    expect(() => guard.checkCreate("IntegrationApp", current("Failed"), DESIRED, false)).toThrow(
      "IntegrationApp engines/app1 is in a failed state.",
    );
    expect(guard.checkCreate("IntegrationApp", current("Failed"), DESIRED, true)).toMatchObject({
      action: "replace",
    });
  });

  it("reports transitional states as a remote conflict even with force", () => {
    const guard = new IdempotencyGuard(new FakeConfirmer(false));

    for (const state of ["Creating", "Updating", "Deleting"] as const) {
      expect(() => guard.checkCreate("IntegrationApp", current(state), DESIRED, true)).toThrow(RemoteError);
    }
  });
});

describe("IdempotencyGuard.checkUpdate", () => {
  it("fails with NotFound and a register hint when nothing exists", () => {
    const guard = new IdempotencyGuard(new FakeConfirmer(false));

    expect(thrown(() => guard.checkUpdate("IntegrationApp", undefined, DESIRED, false))).toMatchObject({
      kind: "NotFound",
      suggestion: "Register it first: agentctl app register",
    });
  });

  it("skips an up-to-date instance unless forced", () => {
    const guard = new IdempotencyGuard(new FakeConfirmer(false));

    expect(guard.checkUpdate("IntegrationApp", current(), DESIRED, false)).toMatchObject({
      action: "skip",
      reason: "already up to date",
    });
    expect(guard.checkUpdate("IntegrationApp", current(), DESIRED, true)).toEqual({ action: "proceed" });
    expect(guard.checkUpdate("IntegrationApp", current("Active", "old-name"), DESIRED, false)).toEqual({
      action: "proceed",
    });
  });

  it("always updates when new secrets are supplied", () => {
    const guard = new IdempotencyGuard(new FakeConfirmer(false));
    const oauth = makeHandle("OAuthAuthorization", "authorizations/auth1", { clientId: "client-1" });
    const desired: DesiredSpec = {
      displayName: "auth1",
      fields: { clientId: "client-1" },
      secrets: { clientSecret: "test-secret" },
    };

    expect(guard.checkUpdate("OAuthAuthorization", oauth, desired, false)).toEqual({ action: "proceed" });
    expect(guard.checkUpdate("OAuthAuthorization", oauth, { ...desired, secrets: {} }, false)).toMatchObject({
      action: "skip",
      reason: "already up to date",
    });
  });
});

describe("IdempotencyGuard.checkDelete", () => {
  it("skips when already absent without asking", async () => {
    const confirmer = new FakeConfirmer(true, true);
    const guard = new IdempotencyGuard(confirmer);

    await expect(guard.checkDelete("IntegrationApp", undefined, false)).resolves.toEqual({
      action: "skip",
      reason: "already absent",
    });
    expect(confirmer.questions).toEqual([]);
  });

  it("requires force when no terminal is attached", async () => {
    const guard = new IdempotencyGuard(new FakeConfirmer(false));

    await expect(guard.checkDelete("IntegrationApp", current(), false)).rejects.toMatchObject({
      kind: "ConfirmationRequired",
    });
    await expect(guard.checkDelete("IntegrationApp", current(), true)).resolves.toEqual({ action: "proceed" });
  });

  it("asks on a terminal and aborts on no", async () => {
    const declined = new FakeConfirmer(true, false);
    const accepted = new FakeConfirmer(true, true);

    await expect(new IdempotencyGuard(declined).checkDelete("IntegrationApp", current(), false)).rejects.toMatchObject({
      kind: "UserAborted",
    });
    await expect(new IdempotencyGuard(accepted).checkDelete("IntegrationApp", current(), false)).resolves.toEqual({
      action: "proceed",
    });
    expect(declined.questions).toEqual(["Delete IntegrationApp engines/app1?"]);
  });
});
