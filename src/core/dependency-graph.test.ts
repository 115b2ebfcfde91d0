import { describe, expect, it } from "vitest";

import {
  DEPENDENCY_EDGES,
  earliestMissing,
  isEnforced,
  prerequisitesFor,
  remediationFor,
} from "./dependency-graph.js";
import { RESOURCE_KINDS, type ResourceKind } from "./resources.js";

describe("dependency graph", () => {
  it("only points from earlier kinds to later ones", () => {
    for (const edge of DEPENDENCY_EDGES) {
      expect(RESOURCE_KINDS.indexOf(edge.prerequisite)).toBeLessThan(RESOURCE_KINDS.indexOf(edge.dependent));
    }
  });

  it("lists a link's prerequisites in creation order", () => {
    expect(prerequisitesFor("IntegrationAgentLink").map((edge) => [edge.prerequisite, edge.cardinality])).toEqual([
      ["ComputeAgent", "exactly-one"],
      ["IntegrationApp", "exactly-one"],
      ["OAuthAuthorization", "zero-or-one"],
    ]);
    expect(prerequisitesFor("DocumentCorpus")).toEqual([]);
  });

  it("enforces prerequisites for create and update only", () => {
    const [edge] = prerequisitesFor("SearchDataStore");
    if (!edge) throw new Error("expected an edge");

    expect(isEnforced(edge, "create")).toBe(true);
    expect(isEnforced(edge, "update")).toBe(true);
    expect(isEnforced(edge, "delete")).toBe(false);
    expect(isEnforced(edge, "get")).toBe(false);
  });
});

describe("remediation", () => {
  const present = (...kinds: ResourceKind[]): Set<ResourceKind> => new Set(kinds);

  it("points at the earliest missing required prerequisite", () => {
    expect(earliestMissing("IntegrationAgentLink", present())).toBe("ComputeAgent");
    expect(earliestMissing("IntegrationAgentLink", present("ComputeAgent"))).toBe("IntegrationApp");
    expect(earliestMissing("IntegrationAgentLink", present("ComputeAgent", "IntegrationApp"))).toBe(
      "IntegrationAgentLink",
    );
    expect(earliestMissing("SearchDataStore", present())).toBe("IntegrationApp");
  });

  it("does not send the user to optional prerequisites", () => {
    expect(earliestMissing("ComputeAgent", present())).toBe("ComputeAgent");
  });

  it("renders the register command", () => {
    expect(remediationFor("IntegrationAgentLink", present())).toBe("agentctl compute-agent register");
    expect(remediationFor("OAuthAuthorization", present())).toBe("agentctl oauth register");
  });
});
