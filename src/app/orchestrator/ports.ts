import type { TokenProvider } from "../../gcp/auth.js";
import type { Clock } from "../../gcp/operations.js";

import type { Confirmer } from "./guard.js";
import type { ClientFactory, ConfigResolverPort } from "./orchestrator.js";

/** Everything a run touches outside the process. Tests replace any subset. */
export type OrchestratorPorts = {
  environment: Record<string, string | undefined>;
  cwd: string;
  fetch: typeof fetch;
  tokens: TokenProvider;
  clock: Clock;
  confirmer: Confirmer;
  /** Overrides the configuration resolver built from the config file and environment. */
  resolver?: ConfigResolverPort;
  /** Overrides the HTTP-backed resource clients. */
  createClients?: ClientFactory;
};
