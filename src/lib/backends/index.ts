/**
 * Record backend construction from configuration
 */

import type { HookConfig } from '../config/config.js';
import type { DnsResolver } from '../dns/resolver.js';
import type { CommandRunner } from '../utils/command.js';
import { NsupdateBackend } from './nsupdate.js';
import { TinydnsBackend } from './tinydns.js';
import type { RecordBackend } from './types.js';

export interface BackendDependencies {
  resolver: DnsResolver;
  runner: CommandRunner;
}

export function createBackend(config: HookConfig, deps: BackendDependencies): RecordBackend {
  switch (config.backend) {
    case 'tinydns':
      return new TinydnsBackend({
        root: config.tinydns.root,
        ttl: config.ttlSeconds,
        runner: deps.runner,
        makeBin: config.tinydns.makeBin,
      });
    case 'nsupdate':
      return new NsupdateBackend({
        resolver: deps.resolver,
        runner: deps.runner,
        ttl: config.ttlSeconds,
        server: config.nsupdate.server,
        keyFile: config.nsupdate.keyFile,
        nsupdateBin: config.nsupdate.bin,
      });
  }
}

export { TinydnsBackend } from './tinydns.js';
export { NsupdateBackend } from './nsupdate.js';
export type { RecordBackend } from './types.js';
