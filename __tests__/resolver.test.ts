jest.mock('dns/promises', () => ({
  __esModule: true,
  Resolver: jest.fn(),
}));

import { Resolver } from 'dns/promises';
import { QueryTimeoutError } from '../lib/errors';
import { createResolverAdapter, outcomeFromError } from '../lib/resolver';

const ResolverMock = Resolver as unknown as jest.Mock;

// Shared behaviour; each fake instance passes along the servers it was pointed at
const dnsMock = {
  resolveNs: jest.fn(),
  resolve4: jest.fn(),
  resolve6: jest.fn(),
  cancel: jest.fn(),
};
let serverSets: string[][] = [];

function dnsError(code: string): Error {
  return Object.assign(new Error(`query ${code}`), { code });
}

beforeEach(() => {
  jest.resetAllMocks();
  serverSets = [];
  ResolverMock.mockImplementation(() => {
    let servers: string[] = [];
    return {
      setServers: (s: string[]) => {
        servers = s;
        serverSets.push(s);
      },
      cancel: () => dnsMock.cancel(),
      resolveNs: (name: string) => dnsMock.resolveNs(name, servers),
      resolve4: (name: string) => dnsMock.resolve4(name, servers),
      resolve6: (name: string) => dnsMock.resolve6(name, servers),
    };
  });
});

describe('outcomeFromError', () => {
  test.each([
    ['ENOTFOUND', { kind: 'NXDomain' }],
    ['ESERVFAIL', { kind: 'ServFail' }],
    ['EREFUSED', { kind: 'ServFail' }],
    ['ENODATA', { kind: 'NoData' }],
    ['ETIMEOUT', { kind: 'Timeout' }],
    ['ECONNREFUSED', { kind: 'OtherError', detail: 'query ECONNREFUSED' }],
  ])('%s', (code, outcome) => {
    expect(outcomeFromError(dnsError(code))).toEqual(outcome);
  });

  test('timeout helper errors and non-errors', () => {
    expect(outcomeFromError(new QueryTimeoutError(100))).toEqual({ kind: 'Timeout' });
    expect(outcomeFromError('boom')).toEqual({ kind: 'OtherError', detail: 'boom' });
  });
});

describe('createResolverAdapter (system resolver)', () => {
  test('returns normalized NS names and uses one try per query', async () => {
    dnsMock.resolveNs.mockResolvedValue(['NS-1.AWSDNS-01.ORG', 'ns-2.awsdns-02.com.']);
    const adapter = createResolverAdapter({ timeoutMs: 1500 });

    const outcome = await adapter.query('dev.example.com', 'NS');

    expect(outcome).toEqual({ kind: 'Answered', records: ['ns-1.awsdns-01.org', 'ns-2.awsdns-02.com'] });
    expect(ResolverMock).toHaveBeenCalledWith({ timeout: 1500, tries: 1 });
    expect(serverSets).toEqual([]);
  });

  test('an empty answer is NoData', async () => {
    dnsMock.resolve4.mockResolvedValue([]);
    const adapter = createResolverAdapter();
    expect(await adapter.query('dev.example.com', 'A')).toEqual({ kind: 'NoData' });
  });

  test('resolver errors become outcomes instead of rejections', async () => {
    dnsMock.resolve4.mockRejectedValue(dnsError('ESERVFAIL'));
    dnsMock.resolve6.mockRejectedValue(dnsError('ENOTFOUND'));
    const adapter = createResolverAdapter();
    expect(await adapter.query('dev.example.com', 'A')).toEqual({ kind: 'ServFail' });
    expect(await adapter.query('dev.example.com', 'AAAA')).toEqual({ kind: 'NXDomain' });
  });

  test('uses configured resolver addresses when given', async () => {
    dnsMock.resolve4.mockResolvedValue(['192.0.2.10']);
    const adapter = createResolverAdapter({ servers: ['192.0.2.53'] });
    await adapter.query('dev.example.com', 'A');
    expect(serverSets).toEqual([['192.0.2.53']]);
  });

  test('a query that never settles times out and is cancelled', async () => {
    dnsMock.resolve4.mockReturnValue(new Promise<string[]>(() => undefined));
    const adapter = createResolverAdapter({ timeoutMs: 20 });
    expect(await adapter.query('slow.example.com', 'A')).toEqual({ kind: 'Timeout' });
    expect(dnsMock.cancel).toHaveBeenCalledTimes(1);
  });
});

describe('createResolverAdapter (direct server)', () => {
  test('an IP address is queried as is', async () => {
    dnsMock.resolve4.mockResolvedValue(['192.0.2.10']);
    const adapter = createResolverAdapter();

    const outcome = await adapter.query('dev.example.com', 'A', { server: '198.51.100.7' });

    expect(outcome).toEqual({ kind: 'Answered', records: ['192.0.2.10'] });
    expect(serverSets).toEqual([['198.51.100.7']]);
    expect(ResolverMock).toHaveBeenCalledTimes(1);
  });

  test('a server name is resolved first, then asked directly without fallback', async () => {
    dnsMock.resolve4.mockImplementation((name: string, servers: string[]) => {
      if (name === 'ns-1.awsdns-01.org' && servers.length === 0) return Promise.resolve(['205.251.192.1']);
      return Promise.reject(dnsError('EREFUSED'));
    });
    const adapter = createResolverAdapter();

    const outcome = await adapter.query('dev.example.com', 'A', { server: 'ns-1.awsdns-01.org' });

    expect(outcome).toEqual({ kind: 'ServFail' });
    expect(serverSets).toEqual([['205.251.192.1']]);
    expect(dnsMock.resolve4.mock.calls).toEqual([
      ['ns-1.awsdns-01.org', []],
      ['dev.example.com', ['205.251.192.1']],
    ]);
  });

  test('falls back to the IPv6 address of the server', async () => {
    dnsMock.resolve4.mockImplementation((name: string) =>
      name === 'ns-1.awsdns-01.org' ? Promise.reject(dnsError('ENODATA')) : Promise.resolve(['192.0.2.10']),
    );
    dnsMock.resolve6.mockResolvedValue(['2001:db8::53']);
    const adapter = createResolverAdapter();

    const outcome = await adapter.query('dev.example.com', 'A', { server: 'ns-1.awsdns-01.org' });

    expect(outcome).toEqual({ kind: 'Answered', records: ['192.0.2.10'] });
    expect(serverSets).toEqual([['2001:db8::53']]);
  });

  test('an unresolvable server is reported, not replaced by the system resolver', async () => {
    dnsMock.resolve4.mockRejectedValue(dnsError('ENOTFOUND'));
    dnsMock.resolve6.mockRejectedValue(dnsError('ENOTFOUND'));
    const adapter = createResolverAdapter();

    const outcome = await adapter.query('dev.example.com', 'A', { server: 'ns-9.awsdns-09.net' });

    expect(outcome).toEqual({
      kind: 'OtherError',
      detail: 'could not resolve an address for name server ns-9.awsdns-09.net (A: NXDomain, AAAA: NXDomain)',
    });
    expect(dnsMock.resolve4.mock.calls).toEqual([['ns-9.awsdns-09.net', []]]);
  });

  test('a timed-out server address lookup is a Timeout', async () => {
    dnsMock.resolve4.mockRejectedValue(dnsError('ETIMEOUT'));
    dnsMock.resolve6.mockRejectedValue(dnsError('ENODATA'));
    const adapter = createResolverAdapter();

    expect(await adapter.query('dev.example.com', 'A', { server: 'ns-9.awsdns-09.net' })).toEqual({ kind: 'Timeout' });
  });
});
