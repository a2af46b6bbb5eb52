import { classifyDelegation } from './classifier';
import { parseDomainPair } from './domain';
import { checkNameServerLiveness, refineVerdict } from './liveness';
import logger from './logger';
import { recordVerdict } from './metrics';
import { remediationFor } from './report';
import { createResolverAdapter, type ResolverAdapter } from './resolver';
import type {
  ClassificationResult,
  DelegationReport,
  LivenessResult,
  NameServerSet,
  ResolutionOutcome,
  Verdict,
} from './types';

export interface AnalyzeOptions {
  resolver?: ResolverAdapter;
}

function nameServerSet(outcome: ResolutionOutcome): NameServerSet {
  return outcome.kind === 'Answered' ? outcome.records : [];
}

// A failed lookup is not evidence of a missing delegation: a delegated zone
// with nothing behind it makes recursive NS queries SERVFAIL.
function lookupFailed(outcome: ResolutionOutcome): boolean {
  return outcome.kind === 'ServFail' || outcome.kind === 'Timeout' || outcome.kind === 'OtherError';
}

/**
 * Run the whole check for one subdomain: parse, query NS (subdomain, parent)
 * and A (subdomain), classify, and ask each delegated name server directly
 * when the delegation looks like an orphaned Route 53 zone.
 *
 * Input errors from `parseDomainPair` are thrown before any query is sent.
 * DNS failures never throw; they end up in the report.
 */
export async function analyzeDelegation(
  subdomainInput: string,
  parentInput?: string,
  opts?: AnalyzeOptions,
): Promise<DelegationReport> {
  const { subdomain, parent } = parseDomainPair(subdomainInput, parentInput);
  const resolver = opts?.resolver ?? createResolverAdapter();
  const started = Date.now();

  const finish = (fields: {
    subdomainNsOutcome: ResolutionOutcome;
    parentNsOutcome?: ResolutionOutcome;
    addressOutcome?: ResolutionOutcome;
    classification: ClassificationResult;
    liveness?: LivenessResult[];
    verdict: Verdict;
  }): DelegationReport => {
    recordVerdict(fields.verdict);
    logger.info({ subdomain, parent, verdict: fields.verdict }, 'delegation check finished');
    return {
      subdomain,
      parent,
      checkedAt: new Date(started).toISOString(),
      durationMs: Date.now() - started,
      subdomainNs: nameServerSet(fields.subdomainNsOutcome),
      parentNs: fields.parentNsOutcome ? nameServerSet(fields.parentNsOutcome) : [],
      subdomainNsOutcome: fields.subdomainNsOutcome,
      parentNsOutcome: fields.parentNsOutcome,
      addressOutcome: fields.addressOutcome,
      classification: fields.classification,
      liveness: fields.liveness ?? [],
      verdict: fields.verdict,
      remediation: remediationFor(fields.verdict),
    };
  };

  logger.debug({ subdomain, parent }, 'starting delegation check');

  const subdomainNsOutcome = await resolver.query(subdomain, 'NS');
  if (lookupFailed(subdomainNsOutcome)) {
    logger.warn({ subdomain, outcome: subdomainNsOutcome }, 'NS lookup for subdomain failed');
    return finish({
      subdomainNsOutcome,
      classification: { verdict: 'AmbiguousError', isRoute53Delegated: false, route53NameServers: [] },
      verdict: 'AmbiguousError',
    });
  }

  const subdomainNs = nameServerSet(subdomainNsOutcome);
  if (subdomainNs.length === 0) {
    // No parent or A lookup is needed; the empty set decides before either is read
    const classification = classifyDelegation({ subdomainNs, parentNs: [], addressOutcome: { kind: 'NoData' } });
    return finish({ subdomainNsOutcome, classification, verdict: classification.verdict });
  }

  const parentNsOutcome = await resolver.query(parent, 'NS');
  if (parentNsOutcome.kind !== 'Answered') {
    logger.warn({ parent, outcome: parentNsOutcome }, 'no NS records for parent domain');
  }
  const addressOutcome = await resolver.query(subdomain, 'A');

  const classification = classifyDelegation({
    subdomainNs,
    parentNs: nameServerSet(parentNsOutcome),
    addressOutcome,
  });

  if (classification.verdict !== 'DistinctDelegationRoute53Suspect') {
    return finish({ subdomainNsOutcome, parentNsOutcome, addressOutcome, classification, verdict: classification.verdict });
  }

  const liveness = await checkNameServerLiveness(resolver, subdomain, subdomainNs);
  return finish({
    subdomainNsOutcome,
    parentNsOutcome,
    addressOutcome,
    classification,
    liveness,
    verdict: refineVerdict(liveness),
  });
}

export default analyzeDelegation;
