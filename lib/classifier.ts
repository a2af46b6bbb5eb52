import { normalizeNameServer, route53NameServers } from "./route53";
import type { ClassificationInput, ClassificationResult, NameServerSet, ResolutionOutcome, Verdict } from "./types";

/** Set equality over normalized names; order and duplicates are ignored. */
export function sameNameServers(a: NameServerSet, b: NameServerSet): boolean {
  const left = new Set(a.map(normalizeNameServer));
  const right = new Set(b.map(normalizeNameServer));
  if (left.size !== right.size) return false;
  for (const ns of left) {
    if (!right.has(ns)) return false;
  }
  return true;
}

function verdictForAddress(outcome: ResolutionOutcome): Verdict {
  switch (outcome.kind) {
    case "NXDomain":
    case "ServFail":
    case "NoData":
      return "DistinctDelegationRoute53Suspect";
    case "Answered":
      return "DistinctDelegationHealthy";
    case "Timeout":
    case "OtherError":
      return "AmbiguousError";
  }
}

/**
 * Preliminary verdict for a delegation. Ordered checks, first match wins:
 * 1. no NS records for the subdomain -> NotDelegated
 * 2. same NS set as the parent -> SameAsParent
 * 3. distinct, no Route 53 name server -> DistinctDelegationHealthy
 * 4. distinct, Route 53 -> decided by the subdomain's A lookup
 *    (NXDOMAIN/SERVFAIL/NODATA suspect, answered healthy, timeout/error ambiguous)
 */
export function classifyDelegation(input: ClassificationInput): ClassificationResult {
  const { subdomainNs, parentNs, addressOutcome } = input;

  if (subdomainNs.length === 0) {
    return { verdict: "NotDelegated", isRoute53Delegated: false, route53NameServers: [] };
  }
  if (sameNameServers(subdomainNs, parentNs)) {
    return { verdict: "SameAsParent", isRoute53Delegated: false, route53NameServers: [] };
  }

  const aws = route53NameServers(subdomainNs);
  if (aws.length === 0) {
    return { verdict: "DistinctDelegationHealthy", isRoute53Delegated: false, route53NameServers: [] };
  }

  return {
    verdict: verdictForAddress(addressOutcome),
    isRoute53Delegated: true,
    route53NameServers: aws,
  };
}

export default classifyDelegation;
