/**
 * DNS lookups used by the hook: TXT observation at a given server, NS discovery
 * and zone apex detection.
 */

import { Resolver } from 'dns/promises';
import type { SoaRecord } from 'dns';
import { isIP } from 'net';
import { DNS_QUERY_TIMEOUT_MS } from '../constants/defaults.js';
import { ResolverError } from '../errors/hook-errors.js';
import { debugResolver } from '../utils/debug.js';
import { nameSuffixes, normalizeName, normalizeTxtFragments } from './txt.js';

export interface DnsResolver {
  /** TXT values at `name`, asked of `server` when given, else the system resolver */
  queryTxt(name: string, server?: string): Promise<string[]>;
  /** Addresses of the zone's authoritative servers, in NS answer order */
  listNameservers(zone: string): Promise<string[]>;
  /** The closest enclosing zone apex of `name` */
  findApex(name: string): Promise<string>;
  /** MNAME of the zone's SOA record */
  primaryServer(zone: string): Promise<string>;
}

/** The subset of dns/promises Resolver this module uses */
export interface DnsClient {
  setServers(servers: ReadonlyArray<string>): void;
  resolveTxt(hostname: string): Promise<string[][]>;
  resolveNs(hostname: string): Promise<string[]>;
  resolve4(hostname: string): Promise<string[]>;
  resolve6(hostname: string): Promise<string[]>;
  resolveSoa(hostname: string): Promise<SoaRecord>;
  resolveCname(hostname: string): Promise<string[]>;
}

export interface NodeDnsResolverOptions {
  /** Per-query timeout (default: 4000 ms) */
  timeoutMs?: number;
  /** Override how resolver instances are created */
  createClient?: (timeoutMs: number) => DnsClient;
}

const NEGATIVE_ANSWER_CODES = new Set(['ENODATA', 'ENOTFOUND', 'NOTFOUND', 'NODATA']);

/** True for "name exists but has no such record" and "no such name" */
export function isNegativeAnswer(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('code' in error)) return false;
  const { code } = error;
  return typeof code === 'string' && NEGATIVE_ANSWER_CODES.has(code);
}

function defaultClient(timeoutMs: number): DnsClient {
  return new Resolver({ timeout: timeoutMs, tries: 1 });
}

/**
 * DnsResolver over Node's c-ares resolver. Each call creates a fresh resolver
 * so a server pinned for one query never leaks into another.
 */
export class NodeDnsResolver implements DnsResolver {
  private readonly timeoutMs: number;
  private readonly createClient: (timeoutMs: number) => DnsClient;

  constructor(opts: NodeDnsResolverOptions = {}) {
    this.timeoutMs = opts.timeoutMs ?? DNS_QUERY_TIMEOUT_MS;
    this.createClient = opts.createClient ?? defaultClient;
  }

  private client(server?: string): DnsClient {
    const client = this.createClient(this.timeoutMs);
    if (server) client.setServers([server]);
    return client;
  }

  async queryTxt(name: string, server?: string): Promise<string[]> {
    const address = server ? await this.serverAddress(server) : undefined;
    try {
      const records = await this.client(address).resolveTxt(name);
      return records.map(normalizeTxtFragments);
    } catch (err) {
      if (isNegativeAnswer(err)) return [];
      throw ResolverError.lookupFailed('TXT', name, err);
    }
  }

  async listNameservers(zone: string): Promise<string[]> {
    const client = this.client();
    let hosts: string[];
    try {
      hosts = await client.resolveNs(zone);
    } catch (err) {
      throw ResolverError.lookupFailed('NS', zone, err);
    }

    const addresses: string[] = [];
    for (const host of hosts) {
      const address = await this.firstAddress(client, host);
      if (address && !addresses.includes(address)) {
        addresses.push(address);
      } else if (!address) {
        debugResolver('nameserver %s of %s has no address, skipping', host, zone);
      }
    }
    debugResolver('nameservers for %s: %o', zone, addresses);
    return addresses;
  }

  /** c-ares only takes addresses; resolve a server given by host name */
  private async serverAddress(server: string): Promise<string> {
    if (isIP(server)) return server;
    const address = await this.firstAddress(this.client(), server);
    if (!address) throw ResolverError.lookupFailed('A/AAAA', server, new Error('no address'));
    return address;
  }

  private async firstAddress(client: DnsClient, host: string): Promise<string | undefined> {
    for (const lookup of [client.resolve4.bind(client), client.resolve6.bind(client)]) {
      try {
        const [address] = await lookup(host);
        if (address) return address;
      } catch (err) {
        debugResolver('address lookup for %s failed: %s', host, String(err));
      }
    }
    return undefined;
  }

  /**
   * Walk the label suffixes of `name`, longest first. A suffix that is an alias
   * is skipped; the first suffix answering SOA is the apex.
   */
  async findApex(name: string): Promise<string> {
    const client = this.client();
    for (const candidate of nameSuffixes(name)) {
      if (await this.hasCname(client, candidate)) {
        debugResolver('%s is an alias, walking up', candidate);
        continue;
      }
      try {
        await client.resolveSoa(candidate);
        debugResolver('apex of %s is %s', name, candidate);
        return candidate;
      } catch (err) {
        if (!isNegativeAnswer(err)) throw ResolverError.lookupFailed('SOA', candidate, err);
      }
    }
    throw ResolverError.zoneNotFound(normalizeName(name));
  }

  private async hasCname(client: DnsClient, name: string): Promise<boolean> {
    try {
      const targets = await client.resolveCname(name);
      return targets.length > 0;
    } catch (err) {
      if (isNegativeAnswer(err)) return false;
      throw ResolverError.lookupFailed('CNAME', name, err);
    }
  }

  async primaryServer(zone: string): Promise<string> {
    try {
      const soa = await this.client().resolveSoa(zone);
      return normalizeName(soa.nsname);
    } catch (err) {
      throw ResolverError.lookupFailed('SOA', zone, err);
    }
  }
}
