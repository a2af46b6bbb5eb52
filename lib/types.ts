export type RecordType = 'NS' | 'A' | 'AAAA';

export type ResolutionOutcome =
  | { kind: 'Answered'; records: string[] }
  | { kind: 'NoData' }
  | { kind: 'NXDomain' }
  | { kind: 'ServFail' }
  | { kind: 'Timeout' }
  | { kind: 'OtherError'; detail: string };

export type OutcomeKind = ResolutionOutcome['kind'];

export const VERDICTS = [
  'NotDelegated',
  'SameAsParent',
  'DistinctDelegationHealthy',
  'DistinctDelegationRoute53Suspect',
  'DistinctDelegationRoute53Orphaned',
  'AmbiguousError',
] as const;

export type Verdict = (typeof VERDICTS)[number];

// Normalized NS host names, in resolver response order
export type NameServerSet = string[];

export interface DomainPair {
  subdomain: string;
  parent: string;
}

export interface ClassificationInput {
  subdomainNs: NameServerSet;
  parentNs: NameServerSet;
  addressOutcome: ResolutionOutcome;
}

export interface ClassificationResult {
  verdict: Verdict;
  isRoute53Delegated: boolean;
  route53NameServers: string[];
}

export interface LivenessResult {
  nameServer: string;
  outcome: ResolutionOutcome;
}

export interface DelegationReport extends DomainPair {
  checkedAt: string; // ISO timestamp
  durationMs: number;
  subdomainNs: NameServerSet;
  parentNs: NameServerSet;
  subdomainNsOutcome: ResolutionOutcome;
  // Absent when the pipeline stopped after the subdomain's NS lookup
  parentNsOutcome?: ResolutionOutcome;
  // Absent when the pipeline stopped before the address lookup
  addressOutcome?: ResolutionOutcome;
  classification: ClassificationResult;
  liveness: LivenessResult[];
  verdict: Verdict;
  remediation: string;
}
