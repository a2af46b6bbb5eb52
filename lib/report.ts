import chalk from 'chalk';
import type { DelegationReport, NameServerSet, ResolutionOutcome, Verdict } from './types';

export const REMEDIATIONS: Record<Verdict, string> = {
  NotDelegated: 'No action needed: the subdomain has no delegation of its own.',
  SameAsParent: 'No action needed: the subdomain is served by the same name servers as its parent.',
  DistinctDelegationHealthy:
    'No immediate action: the delegated name servers answer for the subdomain. Providers other than Route 53 are not inspected, so review the delegation by hand if it is unexpected.',
  DistinctDelegationRoute53Suspect:
    'Investigate: resolution through the Route 53 delegation is failing. Confirm that a hosted zone for this name exists in the AWS account that owns it.',
  DistinctDelegationRoute53Orphaned:
    'Claim the hosted zone or remove the delegation immediately: none of the delegated name servers answer for this subdomain.',
  AmbiguousError:
    'Inconclusive: DNS lookups failed or timed out. Re-run the check, or query the parent zone\'s authoritative servers directly.',
};

export function remediationFor(verdict: Verdict): string {
  return REMEDIATIONS[verdict];
}

export function describeOutcome(outcome: ResolutionOutcome): string {
  switch (outcome.kind) {
    case 'Answered':
      return outcome.records.join(', ');
    case 'OtherError':
      return `OtherError (${outcome.detail})`;
    default:
      return outcome.kind;
  }
}

function describeNameServers(set: NameServerSet, outcome: ResolutionOutcome | undefined): string {
  if (set.length > 0) return set.join(', ');
  if (!outcome) return '(not queried)';
  return `(none: ${describeOutcome(outcome)})`;
}

export interface FormatOptions {
  color?: boolean;
}

/**
 * Render a report as text lines for the terminal.
 */
export function formatReport(report: DelegationReport, opts?: FormatOptions): string[] {
  const c = new chalk.Instance({ level: opts?.color ? 1 : 0 });
  const paint: Record<Verdict, (s: string) => string> = {
    NotDelegated: c.green,
    SameAsParent: c.green,
    DistinctDelegationHealthy: c.green,
    DistinctDelegationRoute53Suspect: c.yellow,
    DistinctDelegationRoute53Orphaned: c.red.bold,
    AmbiguousError: c.magenta,
  };

  const lines = [
    c.bold(`Delegation check for ${report.subdomain} (parent: ${report.parent})`),
    `  Subdomain NS: ${describeNameServers(report.subdomainNs, report.subdomainNsOutcome)}`,
    `  Parent NS:    ${describeNameServers(report.parentNs, report.parentNsOutcome)}`,
  ];
  if (report.classification.isRoute53Delegated) {
    lines.push(`  Route 53 name servers: ${report.classification.route53NameServers.join(', ')}`);
  }
  if (report.addressOutcome) {
    lines.push(`  A lookup: ${describeOutcome(report.addressOutcome)}`);
  }
  if (report.liveness.length > 0) {
    lines.push('  Name server answers:');
    for (const r of report.liveness) {
      lines.push(`    ${r.nameServer}: ${describeOutcome(r.outcome)}`);
    }
  }
  lines.push(`Verdict: ${paint[report.verdict](report.verdict)}`);
  lines.push(`Remediation: ${report.remediation}`);
  return lines;
}

export function toJson(report: DelegationReport): string {
  return JSON.stringify(report, null, 2);
}
