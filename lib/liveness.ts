import logger from "./logger";
import type { ResolverAdapter } from "./resolver";
import type { LivenessResult, NameServerSet, OutcomeKind, Verdict } from "./types";

// Outcomes meaning "this server cannot answer for the name"
const NON_ANSWERING: ReadonlySet<OutcomeKind> = new Set<OutcomeKind>(["NXDomain", "ServFail", "Timeout"]);

/**
 * Ask every delegated name server, one at a time, for the subdomain's A record.
 */
export async function checkNameServerLiveness(
  resolver: ResolverAdapter,
  subdomain: string,
  nameServers: NameServerSet,
): Promise<LivenessResult[]> {
  const results: LivenessResult[] = [];
  for (const nameServer of nameServers) {
    const outcome = await resolver.query(subdomain, "A", { server: nameServer });
    logger.info({ subdomain, nameServer, outcome: outcome.kind }, "name server liveness");
    results.push({ nameServer, outcome });
  }
  return results;
}

/**
 * Refine a Route 53 suspect verdict from per-server results:
 * any answer clears it, uniform NXDOMAIN/SERVFAIL/timeout confirms it,
 * anything else leaves it where it was.
 */
export function refineVerdict(results: LivenessResult[]): Verdict {
  if (results.some((r) => r.outcome.kind === "Answered")) return "DistinctDelegationHealthy";
  if (results.length > 0 && results.every((r) => NON_ANSWERING.has(r.outcome.kind))) {
    return "DistinctDelegationRoute53Orphaned";
  }
  return "DistinctDelegationRoute53Suspect";
}
