import { isIP } from 'net';
import { Resolver } from 'dns/promises';
import { CONFIG } from './config';
import { QueryTimeoutError } from './errors';
import logger from './logger';
import { recordQuery, type QueryMode } from './metrics';
import { withTimeout } from './net/timeout';
import { normalizeNameServer } from './route53';
import type { RecordType, ResolutionOutcome } from './types';

export interface QueryOptions {
  /** Name server (host name or IP) to ask directly instead of the configured resolvers. */
  server?: string;
}

export interface ResolverAdapter {
  query(name: string, type: RecordType, opts?: QueryOptions): Promise<ResolutionOutcome>;
}

export interface ResolverAdapterOptions {
  timeoutMs?: number;
  /** Resolver addresses for non-direct queries. Empty means the system configuration. */
  servers?: string[];
}

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/**
 * Map whatever the resolver threw onto an outcome tag. c-ares reports
 * REFUSED as EREFUSED; it is a server-indicated failure like SERVFAIL.
 */
export function outcomeFromError(err: unknown): ResolutionOutcome {
  if (err instanceof QueryTimeoutError) return { kind: 'Timeout' };
  switch (errorCode(err)) {
    case 'ENOTFOUND':
      return { kind: 'NXDomain' };
    case 'ESERVFAIL':
    case 'EREFUSED':
      return { kind: 'ServFail' };
    case 'ENODATA':
      return { kind: 'NoData' };
    case 'ETIMEOUT':
      return { kind: 'Timeout' };
    default:
      return { kind: 'OtherError', detail: err instanceof Error ? err.message : String(err) };
  }
}

function lookup(resolver: Resolver, name: string, type: RecordType): Promise<string[]> {
  switch (type) {
    case 'NS':
      return resolver.resolveNs(name).then((names) => names.map(normalizeNameServer));
    case 'A':
      return resolver.resolve4(name);
    case 'AAAA':
      return resolver.resolve6(name);
  }
}

/**
 * Issue NS/A/AAAA queries and always come back with a ResolutionOutcome.
 * One try per query, no retries. Direct queries never fall back to the
 * configured resolvers.
 */
export function createResolverAdapter(opts?: ResolverAdapterOptions): ResolverAdapter {
  const timeoutMs = opts?.timeoutMs ?? CONFIG.DNS_TIMEOUT_MS;
  const defaultServers = opts?.servers ?? CONFIG.DNS_SERVERS;

  async function run(name: string, type: RecordType, servers: string[], mode: QueryMode): Promise<ResolutionOutcome> {
    const started = Date.now();
    let outcome: ResolutionOutcome;
    try {
      const resolver = new Resolver({ timeout: timeoutMs, tries: 1 });
      if (servers.length > 0) resolver.setServers(servers);
      const records = await withTimeout(lookup(resolver, name, type), timeoutMs, {
        label: `${type} ${name}`,
        onTimeout: () => resolver.cancel(),
      });
      outcome = records.length > 0 ? { kind: 'Answered', records } : { kind: 'NoData' };
    } catch (err) {
      outcome = outcomeFromError(err);
    }
    const elapsed = Date.now() - started;
    recordQuery(type, mode, outcome.kind, elapsed / 1000);
    logger.debug({ name, type, servers, mode, outcome, elapsedMs: elapsed }, 'dns query finished');
    return outcome;
  }

  // A name server given by name is looked up through the configured resolvers first.
  async function serverAddress(server: string): Promise<{ address: string } | { outcome: ResolutionOutcome }> {
    if (isIP(server)) return { address: server };

    const v4 = await run(server, 'A', defaultServers, 'system');
    if (v4.kind === 'Answered') return { address: v4.records[0] };
    const v6 = await run(server, 'AAAA', defaultServers, 'system');
    if (v6.kind === 'Answered') return { address: v6.records[0] };

    if (v4.kind === 'Timeout' || v6.kind === 'Timeout') return { outcome: { kind: 'Timeout' } };
    return {
      outcome: {
        kind: 'OtherError',
        detail: `could not resolve an address for name server ${server} (A: ${v4.kind}, AAAA: ${v6.kind})`,
      },
    };
  }

  return {
    async query(name, type, queryOpts) {
      if (!queryOpts?.server) return run(name, type, defaultServers, 'system');

      const target = await serverAddress(queryOpts.server);
      if ('outcome' in target) {
        logger.debug({ name, type, server: queryOpts.server, outcome: target.outcome }, 'name server address unavailable');
        return target.outcome;
      }
      return run(name, type, [target.address], 'direct');
    },
  };
}

export default createResolverAdapter;
