/**
 * Dynamic update (RFC 2136) backend driving BIND's `nsupdate`
 *
 * add/remove queue update lines; commit sends them, one script per zone.
 * TSIG signing is left to nsupdate through its `-k` key file.
 */

import { constants } from 'fs';
import { access } from 'fs/promises';
import { NSUPDATE_BIN } from '../constants/defaults.js';
import type { DnsResolver } from '../dns/resolver.js';
import { normalizeName } from '../dns/txt.js';
import type { CommandRunner } from '../utils/command.js';
import { debugBackend } from '../utils/debug.js';
import type { RecordBackend } from './types.js';

export interface NsupdateBackendOptions {
  resolver: DnsResolver;
  runner: CommandRunner;
  ttl: number;
  /** Update target; defaults to the zone's SOA MNAME */
  server?: string;
  /** TSIG key file handed to nsupdate -k */
  keyFile?: string;
  /** nsupdate binary (default: nsupdate) */
  nsupdateBin?: string;
}

export interface PendingUpdate {
  action: 'add' | 'delete';
  name: string;
  value: string;
}

/** Quote a TXT value as a single character-string for nsupdate */
export function quoteTxt(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

export function formatUpdateLine(update: PendingUpdate, ttl: number): string {
  const owner = `${normalizeName(update.name)}.`;
  return update.action === 'add'
    ? `update add ${owner} ${ttl} IN TXT ${quoteTxt(update.value)}`
    : `update delete ${owner} IN TXT ${quoteTxt(update.value)}`;
}

export class NsupdateBackend implements RecordBackend {
  readonly name = 'nsupdate';
  private pending: PendingUpdate[] = [];
  private readonly servers = new Map<string, string>();

  constructor(private readonly opts: NsupdateBackendOptions) {}

  async probe(): Promise<void> {
    await this.opts.runner.run(this.bin, ['-V']);
    if (this.opts.keyFile) {
      await access(this.opts.keyFile, constants.R_OK);
    }
  }

  /** TXT values as served by the update server */
  async read(name: string): Promise<string[]> {
    const zone = await this.opts.resolver.findApex(name);
    const server = await this.serverFor(zone);
    return this.opts.resolver.queryTxt(name, server);
  }

  async add(name: string, value: string): Promise<void> {
    this.pending.push({ action: 'add', name, value });
  }

  async remove(name: string, value: string): Promise<void> {
    this.pending.push({ action: 'delete', name, value });
  }

  async commit(): Promise<void> {
    const updates = this.pending;
    this.pending = [];
    if (updates.length === 0) {
      debugBackend('nsupdate: nothing to commit');
      return;
    }

    const byZone = new Map<string, PendingUpdate[]>();
    for (const update of updates) {
      const zone = await this.opts.resolver.findApex(update.name);
      byZone.set(zone, [...(byZone.get(zone) ?? []), update]);
    }

    for (const [zone, zoneUpdates] of byZone) {
      const script = await this.script(zone, zoneUpdates);
      debugBackend('nsupdate: sending %d update(s) for %s', zoneUpdates.length, zone);
      await this.opts.runner.run(this.bin, this.args, { input: script });
    }
  }

  /** The nsupdate script sending `updates` to the zone's update server */
  async script(zone: string, updates: readonly PendingUpdate[]): Promise<string> {
    const server = await this.serverFor(zone);
    const lines = [
      `server ${server}`,
      `zone ${zone}.`,
      ...updates.map((u) => formatUpdateLine(u, this.opts.ttl)),
      'send',
    ];
    return `${lines.join('\n')}\n`;
  }

  private get bin(): string {
    return this.opts.nsupdateBin ?? NSUPDATE_BIN;
  }

  private get args(): string[] {
    return this.opts.keyFile ? ['-k', this.opts.keyFile] : [];
  }

  private async serverFor(zone: string): Promise<string> {
    if (this.opts.server) return this.opts.server;
    let server = this.servers.get(zone);
    if (!server) {
      server = await this.opts.resolver.primaryServer(zone);
      this.servers.set(zone, server);
    }
    return server;
  }
}
