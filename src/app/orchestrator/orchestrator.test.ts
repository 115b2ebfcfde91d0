import { describe, expect, it } from "vitest";

import { RESOURCE_KINDS, type ResourceKind } from "../../core/resources.js";

import {
  BASE_CONFIG,
  FakeConfirmer,
  MemorySink,
  createFakeRegistry,
  createTestResolver,
  type FakeRegistry,
} from "./__tests__/fakes.js";
import { IdempotencyGuard } from "./guard.js";
import { DeploymentOrchestrator } from "./orchestrator.js";

type Setup = {
  fakes: FakeRegistry;
  events: MemorySink;
  confirmer: FakeConfirmer;
  orchestrator: DeploymentOrchestrator;
};

function setup(
  opts: { config?: Record<string, string>; confirmer?: FakeConfirmer } = {},
): Setup {
  const fakes = createFakeRegistry();
  const events = new MemorySink();
  const confirmer = opts.confirmer ?? new FakeConfirmer(false);
  const orchestrator = new DeploymentOrchestrator({
    resolver: createTestResolver(opts.config ?? BASE_CONFIG),
    createClients: () => fakes.registry,
    guard: new IdempotencyGuard(confirmer, events),
    events,
  });
  return { fakes, events, confirmer, orchestrator };
}

function totalMutations(fakes: FakeRegistry): number {
  return RESOURCE_KINDS.reduce((sum, kind) => sum + fakes.clients[kind].mutationCount, 0);
}

function seedLinkPrerequisites(fakes: FakeRegistry): void {
  fakes.clients.ComputeAgent.seed();
  fakes.clients.IntegrationApp.seed();
}

// =============================================================================
// IDEMPOTENCY
// =============================================================================

describe("DeploymentOrchestrator idempotency", () => {
  it.each(RESOURCE_KINDS.map((kind) => [kind]))("deletes %s twice without failing", async (kind: ResourceKind) => {
    const { fakes, orchestrator } = setup();
    const seeded = fakes.clients[kind].seed();

    const first = await orchestrator.run({ kind, verb: "delete", force: true });
    const second = await orchestrator.run({ kind, verb: "delete", force: true });

    expect(first.record).toMatchObject({ outcome: "succeeded", diagnostic: "deleted" });
    expect(first.record.target?.id).toBe(seeded.id);
    expect(first.state).toBe("Absent");
    expect(second.record).toMatchObject({ outcome: "skipped", diagnostic: "already absent" });
    expect(second.state).toBe("Absent");
    expect(fakes.clients[kind].deleteCalls).toEqual([seeded.id]);
  });

  it("skips an identical second create", async () => {
    const { fakes, orchestrator } = setup();

    const first = await orchestrator.run({ kind: "IntegrationApp", verb: "create" });
    const second = await orchestrator.run({ kind: "IntegrationApp", verb: "create" });

    expect(first.record).toMatchObject({ outcome: "succeeded", diagnostic: "created" });
    expect(second.record).toMatchObject({ outcome: "skipped", diagnostic: "already exists" });
    expect(second.record.target?.id).toBe(first.record.target?.id);
    expect(second.record.outputs).toEqual({ AGENTSPACE_APP_ID: "fake/IntegrationApp/1" });
    expect(fakes.clients.IntegrationApp.createCalls).toHaveLength(1);
  });

  it("refuses to overwrite a differing instance without force", async () => {
    const { fakes, orchestrator } = setup();
    fakes.clients.IntegrationApp.seed({ spec: { displayName: "renamed" } });

    const error = await orchestrator.run({ kind: "IntegrationApp", verb: "create" }).catch((err: unknown) => err);

    expect(error).toMatchObject({ kind: "SpecConflict" });
    expect(totalMutations(fakes)).toBe(0);
    expect(orchestrator.records.at(-1)).toMatchObject({ outcome: "failed", errorKind: "SpecConflict" });
  });

  it("replaces a differing instance with force", async () => {
    const { fakes, orchestrator } = setup();
    const seeded = fakes.clients.IntegrationApp.seed({ spec: { displayName: "renamed" } });

    const result = await orchestrator.run({ kind: "IntegrationApp", verb: "create", force: true });

    expect(fakes.clients.IntegrationApp.deleteCalls).toEqual([seeded.id]);
    expect(fakes.clients.IntegrationApp.createCalls).toHaveLength(1);
    expect(result.record).toMatchObject({ outcome: "succeeded", diagnostic: "replaced" });
    expect(result.state).toBe("Active");
  });

  it("keeps an identical instance in place even with force", async () => {
    const { fakes, orchestrator } = setup();
    const seeded = fakes.clients.DocumentCorpus.seed();

    const result = await orchestrator.run({ kind: "DocumentCorpus", verb: "create", force: true });

    expect(result.record).toMatchObject({ outcome: "skipped", diagnostic: "already exists" });
    expect(result.record.target?.id).toBe(seeded.id);
    expect(fakes.clients.DocumentCorpus.deleteCalls).toEqual([]);
    expect(fakes.clients.DocumentCorpus.createCalls).toEqual([]);
  });

  it("relinks an identical agent link with force", async () => {
    const { fakes, orchestrator } = setup();
    const agent = fakes.clients.ComputeAgent.seed();
    fakes.clients.IntegrationApp.seed();
    const seeded = fakes.clients.IntegrationAgentLink.seed({
      spec: { displayName: "IntegrationAgentLink test", reasoningEngine: agent.id, authorizations: [] },
    });

    const unforced = await orchestrator.run({ kind: "IntegrationAgentLink", verb: "create" });
    const result = await orchestrator.run({ kind: "IntegrationAgentLink", verb: "create", force: true });

    expect(unforced.record).toMatchObject({ outcome: "skipped", diagnostic: "already exists" });

    expect(fakes.clients.IntegrationAgentLink.deleteCalls).toEqual([seeded.id]);
    expect(fakes.clients.IntegrationAgentLink.createCalls).toHaveLength(1);
    expect(result.record).toMatchObject({ outcome: "succeeded", diagnostic: "replaced" });
  });
});

// =============================================================================
// PREREQUISITES
// =============================================================================

describe("DeploymentOrchestrator prerequisites", () => {
  it("makes no remote mutation when a required prerequisite is absent", async () => {
    const { fakes, orchestrator } = setup();
    for (const kind of RESOURCE_KINDS) fakes.clients[kind].failOnMutation = true;

    const error = await orchestrator
      .run({ kind: "IntegrationAgentLink", verb: "create" })
      .catch((err: unknown) => err);

    expect(error).toMatchObject({
      kind: "PrerequisiteMissing",
      resource: "ComputeAgent",
      message: "IntegrationAgentLink create requires ComputeAgent, but none was found.",
      suggestion: "agentctl compute-agent register",
    });
    expect(totalMutations(fakes)).toBe(0);
    expect(fakes.clients.IntegrationAgentLink.locateCalls).toEqual([]);
  });

  it("refuses a prerequisite that is still being created", async () => {
    const { fakes, orchestrator } = setup();
    const agent = fakes.clients.ComputeAgent.seed({ state: "Creating" });
    fakes.clients.IntegrationApp.seed();

    const error = await orchestrator
      .run({ kind: "IntegrationAgentLink", verb: "create" })
      .catch((err: unknown) => err);

    expect(error).toMatchObject({
      kind: "PrerequisiteNotReady",
      resource: "ComputeAgent",
      remoteId: agent.id,
      message: `ComputeAgent ${agent.id} is Creating; IntegrationAgentLink create needs it Active.`,
    });
    expect(totalMutations(fakes)).toBe(0);
  });

  it("fails when an optional prerequisite is configured but missing", async () => {
    const { fakes, orchestrator } = setup();
    seedLinkPrerequisites(fakes);
    fakes.clients.OAuthAuthorization.pinnedId = "fake/OAuthAuthorization/9";

    const error = await orchestrator
      .run({ kind: "IntegrationAgentLink", verb: "create" })
      .catch((err: unknown) => err);

    expect(error).toMatchObject({
      kind: "PrerequisiteMissing",
      resource: "OAuthAuthorization",
      remoteId: "fake/OAuthAuthorization/9",
      message:
        "IntegrationAgentLink create requires OAuthAuthorization, but none was found at fake/OAuthAuthorization/9.",
    });
    expect(fakes.clients.IntegrationAgentLink.createCalls).toEqual([]);
  });

  it("deploys the agent without a corpus and reports reduced capability", async () => {
    const { fakes, events, orchestrator } = setup();

    const result = await orchestrator.run({ kind: "ComputeAgent", verb: "create" });

    expect(result.record.outcome).toBe("succeeded");
    expect(result.record.warnings).toEqual([
      "No document corpus found; the agent is deployed without corpus retrieval.",
    ]);
    expect(result.record.outputs).toEqual({ AGENT_ENGINE_RESOURCE_NAME: "fake/ComputeAgent/1" });
    expect(fakes.clients.ComputeAgent.createCalls[0]?.fields).toEqual({ displayName: "ComputeAgent test", corpus: "" });
    expect(events.events).toContainEqual({
      type: "orchestrator.reduced_capability",
      payload: { kind: "ComputeAgent", prerequisite: "DocumentCorpus" },
    });
  });

  it("links the agent without OAuth and hands the located prerequisites to the client", async () => {
    const { fakes, orchestrator } = setup();
    seedLinkPrerequisites(fakes);

    const result = await orchestrator.run({ kind: "IntegrationAgentLink", verb: "create" });

    expect(result.record.outcome).toBe("succeeded");
    expect(result.record.warnings).toEqual([
      "No OAuth authorization configured; the agent is linked without user-delegated access.",
    ]);
    expect(result.record.outputs).toEqual({ AGENTSPACE_AGENT_ID: "fake/IntegrationAgentLink/1" });
    expect(fakes.clients.IntegrationAgentLink.createCalls[0]?.fields).toEqual({
      displayName: "IntegrationAgentLink test",
      reasoningEngine: "fake/ComputeAgent/1",
      authorizations: [],
    });
  });

  it("re-locates prerequisites for every operation", async () => {
    const { fakes, orchestrator } = setup();
    seedLinkPrerequisites(fakes);

    await orchestrator.run({ kind: "IntegrationAgentLink", verb: "create" });
    await orchestrator.run({ kind: "IntegrationAgentLink", verb: "create" });

    expect(fakes.clients.ComputeAgent.locateCalls).toHaveLength(2);
    expect(fakes.clients.IntegrationApp.locateCalls).toHaveLength(2);
  });

  it("does not enforce prerequisites on delete", async () => {
    const { fakes, orchestrator } = setup();
    const link = fakes.clients.IntegrationAgentLink.seed();

    const result = await orchestrator.run({ kind: "IntegrationAgentLink", verb: "delete", force: true });

    expect(result.record.outcome).toBe("succeeded");
    expect(fakes.clients.IntegrationAgentLink.deleteCalls).toEqual([link.id]);
  });
});

// =============================================================================
// UPDATE / DELETE / READ
// =============================================================================

describe("DeploymentOrchestrator verbs", () => {
  it("requires the persisted identifier before an update", async () => {
    const { fakes, orchestrator } = setup();
    fakes.clients.IntegrationApp.seed();

    const error = await orchestrator
      .run({ kind: "IntegrationApp", verb: "update" })
      .catch((err: unknown) => err);

    expect(error).toMatchObject({ kind: "ConfigMissing", keys: ["AGENTSPACE_APP_ID"] });
    expect(orchestrator.records).toEqual([
      expect.objectContaining({ kind: "IntegrationApp", verb: "update", outcome: "failed", errorKind: "ConfigMissing" }),
    ]);
    expect(fakes.clients.IntegrationApp.locateCalls).toEqual([]);
  });

  it("reports NotFound when updating an instance that does not exist", async () => {
    const { fakes, orchestrator } = setup({ config: { ...BASE_CONFIG, AGENTSPACE_APP_ID: "app1" } });

    const error = await orchestrator
      .run({ kind: "IntegrationApp", verb: "update" })
      .catch((err: unknown) => err);

    expect(error).toMatchObject({ kind: "NotFound", suggestion: "Register it first: agentctl app register" });
    expect(fakes.clients.IntegrationApp.updateCalls).toEqual([]);
  });

  it("skips an up-to-date instance and updates a drifted one", async () => {
    const { fakes, orchestrator } = setup({ config: { ...BASE_CONFIG, AGENTSPACE_APP_ID: "app1" } });
    const seeded = fakes.clients.IntegrationApp.seed();

    const unchanged = await orchestrator.run({ kind: "IntegrationApp", verb: "update" });
    fakes.clients.IntegrationApp.instances.set(seeded.id, { ...seeded, spec: { displayName: "drifted" } });
    const updated = await orchestrator.run({ kind: "IntegrationApp", verb: "update" });

    expect(unchanged.record).toMatchObject({ outcome: "skipped", diagnostic: "already up to date" });
    expect(updated.record).toMatchObject({ outcome: "succeeded", diagnostic: "updated" });
    expect(fakes.clients.IntegrationApp.updateCalls.map((call) => call.id)).toEqual([seeded.id]);
  });

  it("needs force to delete without a terminal", async () => {
    const { fakes, orchestrator } = setup();
    fakes.clients.IntegrationApp.seed();

    const error = await orchestrator
      .run({ kind: "IntegrationApp", verb: "delete" })
      .catch((err: unknown) => err);

    expect(error).toMatchObject({ kind: "ConfirmationRequired" });
    expect(fakes.clients.IntegrationApp.deleteCalls).toEqual([]);
  });

  it("deletes after the user confirms", async () => {
    const confirmer = new FakeConfirmer(true, true);
    const { fakes, orchestrator } = setup({ confirmer });
    const seeded = fakes.clients.IntegrationApp.seed();

    const result = await orchestrator.run({ kind: "IntegrationApp", verb: "delete" });

    expect(confirmer.questions).toEqual([`Delete IntegrationApp ${seeded.id}?`]);
    expect(result.record.outcome).toBe("succeeded");
    expect(result.record.outputs).toEqual({});
  });

  it("lists every instance", async () => {
    const { fakes, orchestrator } = setup();
    fakes.clients.IntegrationApp.seed();
    fakes.clients.IntegrationApp.seed({ displayName: "other" });

    const result = await orchestrator.run({ kind: "IntegrationApp", verb: "list" });

    expect(result.items.map((item) => item.id)).toEqual(["fake/IntegrationApp/1", "fake/IntegrationApp/2"]);
    expect(result.record).toMatchObject({ outcome: "succeeded", diagnostic: "2 found" });
  });

  it("reports an absent instance on get without failing", async () => {
    const { orchestrator } = setup();

    const result = await orchestrator.run({ kind: "DocumentCorpus", verb: "get" });

    expect(result.state).toBe("Absent");
    expect(result.record).toMatchObject({ outcome: "succeeded", diagnostic: "absent" });
    expect(result.record.target).toBeUndefined();
  });

  it("logs the start and the record of every run", async () => {
    const { events, orchestrator } = setup();

    await orchestrator.run({ kind: "DocumentCorpus", verb: "get" });

    expect(events.types()).toEqual(["orchestrator.start", "orchestrator.record"]);
  });
});
