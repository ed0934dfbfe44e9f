import { describe, it, expect } from '@jest/globals';
import type { SoaRecord } from 'dns';
import { NodeDnsResolver, ResolverError, isNegativeAnswer, type DnsClient } from '../../src/index.js';

function dnsError(code: string): Error {
  return Object.assign(new Error(`queryX ${code}`), { code });
}

interface Zone {
  txt?: Record<string, string[][]>;
  ns?: Record<string, string[]>;
  a?: Record<string, string[]>;
  aaaa?: Record<string, string[]>;
  soa?: Record<string, string>;
  cname?: Record<string, string>;
  /** Names whose lookups fail with SERVFAIL */
  servfail?: string[];
}

/** Answers from static tables; records which servers each instance was pinned to */
class FakeDnsClient implements DnsClient {
  servers: string[] = [];

  constructor(private readonly zone: Zone) {}

  setServers(servers: ReadonlyArray<string>): void {
    this.servers = [...servers];
  }

  private answer<T>(table: Record<string, T> | undefined, name: string): T {
    if (this.zone.servfail?.includes(name)) throw dnsError('ESERVFAIL');
    const value = table?.[name];
    if (value === undefined) throw dnsError('ENODATA');
    return value;
  }

  async resolveTxt(name: string): Promise<string[][]> {
    return this.answer(this.zone.txt, name);
  }

  async resolveNs(name: string): Promise<string[]> {
    return this.answer(this.zone.ns, name);
  }

  async resolve4(name: string): Promise<string[]> {
    return this.answer(this.zone.a, name);
  }

  async resolve6(name: string): Promise<string[]> {
    return this.answer(this.zone.aaaa, name);
  }

  async resolveSoa(name: string): Promise<SoaRecord> {
    const nsname = this.answer(this.zone.soa, name);
    return { nsname, hostmaster: `hostmaster.${name}`, serial: 1, refresh: 3600, retry: 600, expire: 86400, minttl: 60 };
  }

  async resolveCname(name: string): Promise<string[]> {
    return [this.answer(this.zone.cname, name)];
  }
}

function setup(zone: Zone) {
  const clients: FakeDnsClient[] = [];
  const resolver = new NodeDnsResolver({
    createClient: () => {
      const client = new FakeDnsClient(zone);
      clients.push(client);
      return client;
    },
  });
  return { resolver, clients };
}

describe('isNegativeAnswer', () => {
  it('recognizes NODATA and NXDOMAIN errors', () => {
    expect(isNegativeAnswer(dnsError('ENODATA'))).toBe(true);
    expect(isNegativeAnswer(dnsError('ENOTFOUND'))).toBe(true);
    expect(isNegativeAnswer(dnsError('ETIMEOUT'))).toBe(false);
    expect(isNegativeAnswer('ENODATA')).toBe(false);
  });
});

describe('NodeDnsResolver', () => {
  it('joins TXT fragments and pins the query to the given server', async () => {
    const { resolver, clients } = setup({
      txt: { '_acme-challenge.example.com': [['dead', 'beef'], ['other']] },
    });

    expect(await resolver.queryTxt('_acme-challenge.example.com', '192.0.2.1')).toEqual(['deadbeef', 'other']);
    expect(clients.map((c) => c.servers)).toEqual([['192.0.2.1']]);
  });

  it('returns no values for a missing record', async () => {
    const { resolver } = setup({});

    expect(await resolver.queryTxt('_acme-challenge.example.com', '192.0.2.1')).toEqual([]);
  });

  it('wraps other query failures in ResolverError', async () => {
    const { resolver } = setup({ servfail: ['_acme-challenge.example.com'] });

    await expect(resolver.queryTxt('_acme-challenge.example.com')).rejects.toBeInstanceOf(ResolverError);
  });

  it('resolves a server host name to an address before querying it', async () => {
    const { resolver, clients } = setup({
      a: { 'ns1.example.com': ['192.0.2.1'] },
      txt: { '_acme-challenge.example.com': [['deadbeef']] },
    });

    await resolver.queryTxt('_acme-challenge.example.com', 'ns1.example.com');

    expect(clients[clients.length - 1].servers).toEqual(['192.0.2.1']);
  });

  it('lists nameserver addresses in NS order, falling back to IPv6', async () => {
    const { resolver } = setup({
      ns: { 'example.com': ['ns2.example.net', 'ns1.example.com', 'ns3.example.org', 'lame.example.org'] },
      a: { 'ns1.example.com': ['192.0.2.1', '192.0.2.11'], 'ns2.example.net': ['198.51.100.2'] },
      aaaa: { 'ns3.example.org': ['2001:db8::3'] },
    });

    expect(await resolver.listNameservers('example.com')).toEqual(['198.51.100.2', '192.0.2.1', '2001:db8::3']);
  });

  it('finds the apex by walking up the labels', async () => {
    const { resolver } = setup({ soa: { 'example.com': 'ns1.example.com' } });

    expect(await resolver.findApex('_acme-challenge.www.example.com')).toBe('example.com');
  });

  it('skips a suffix that is an alias', async () => {
    const { resolver } = setup({
      cname: { 'sub.example.com': 'elsewhere.example.net' },
      soa: { 'sub.example.com': 'ns1.example.net', 'example.com': 'ns1.example.com' },
    });

    expect(await resolver.findApex('_acme-challenge.sub.example.com.')).toBe('example.com');
  });

  it('fails when no suffix has an SOA', async () => {
    const { resolver } = setup({});

    await expect(resolver.findApex('_acme-challenge.example.invalid')).rejects.toThrow(
      'No zone apex found for _acme-challenge.example.invalid',
    );
  });

  it('stops walking on a lookup failure', async () => {
    const { resolver } = setup({ servfail: ['www.example.com'], soa: { 'example.com': 'ns1.example.com' } });

    await expect(resolver.findApex('_acme-challenge.www.example.com')).rejects.toBeInstanceOf(ResolverError);
  });

  it('returns the SOA MNAME as primary server', async () => {
    const { resolver } = setup({ soa: { 'example.com': 'NS1.Example.com.' } });

    expect(await resolver.primaryServer('example.com')).toBe('ns1.example.com');
  });
});
