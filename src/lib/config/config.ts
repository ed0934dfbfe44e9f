/**
 * Hook configuration
 *
 * Built once per invocation from the environment, then overridden by CLI flags,
 * and passed explicitly to the poller and backends.
 */

import {
  CHALLENGE_RECORD_TTL_SECONDS,
  MAKE_BIN,
  NSUPDATE_BIN,
  PROPAGATION_POLL_INTERVAL_SECONDS,
  PROPAGATION_TIMEOUT_SECONDS,
  TINYDNS_ROOT,
} from '../constants/defaults.js';
import { ConfigError } from '../errors/hook-errors.js';

export const BACKEND_KIND = {
  TINYDNS: 'tinydns' as const,
  NSUPDATE: 'nsupdate' as const,
} as const;

export type BackendKind = (typeof BACKEND_KIND)[keyof typeof BACKEND_KIND];

export interface HookConfig {
  readonly backend: BackendKind;
  readonly timeoutSeconds: number;
  readonly intervalSeconds: number;
  readonly ttlSeconds: number;
  readonly tinydns: {
    readonly root: string;
    readonly makeBin: string;
  };
  readonly nsupdate: {
    readonly server?: string;
    readonly keyFile?: string;
    readonly bin: string;
  };
}

/** Values a caller (the CLI) may set over the environment */
export interface ConfigOverrides {
  backend?: string;
  timeout?: string;
  interval?: string;
  ttl?: string;
  tinydnsRoot?: string;
  nsupdateServer?: string;
  nsupdateKey?: string;
}

export type Environment = Readonly<Record<string, string | undefined>>;

function isBackendKind(value: string): value is BackendKind {
  return value === BACKEND_KIND.TINYDNS || value === BACKEND_KIND.NSUPDATE;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function parseSeconds(key: string, raw: string | undefined, fallback: number): number {
  const value = nonEmpty(raw);
  if (value === undefined) return fallback;
  if (!/^\d+$/.test(value) || Number(value) <= 0) {
    throw ConfigError.invalid(key, value, 'a positive whole number of seconds');
  }
  return Number(value);
}

/**
 * Resolve configuration from environment variables and overrides.
 * Overrides win over the environment; both fall back to defaults.
 */
export function loadConfig(env: Environment = process.env, overrides: ConfigOverrides = {}): HookConfig {
  const backend = nonEmpty(overrides.backend) ?? nonEmpty(env.ACME_DNS_BACKEND) ?? BACKEND_KIND.TINYDNS;
  if (!isBackendKind(backend)) {
    throw ConfigError.invalid('ACME_DNS_BACKEND', backend, `one of ${Object.values(BACKEND_KIND).join(', ')}`);
  }

  const timeoutSeconds = parseSeconds(
    'ACME_DNS_TIMEOUT',
    overrides.timeout ?? env.ACME_DNS_TIMEOUT,
    PROPAGATION_TIMEOUT_SECONDS,
  );
  const intervalSeconds = parseSeconds(
    'ACME_DNS_INTERVAL',
    overrides.interval ?? env.ACME_DNS_INTERVAL,
    PROPAGATION_POLL_INTERVAL_SECONDS,
  );
  const ttlSeconds = parseSeconds('ACME_DNS_TTL', overrides.ttl ?? env.ACME_DNS_TTL, CHALLENGE_RECORD_TTL_SECONDS);

  return Object.freeze({
    backend,
    timeoutSeconds,
    intervalSeconds,
    ttlSeconds,
    tinydns: Object.freeze({
      root: nonEmpty(overrides.tinydnsRoot) ?? nonEmpty(env.TINYDNS_ROOT) ?? TINYDNS_ROOT,
      makeBin: nonEmpty(env.MAKE_BIN) ?? MAKE_BIN,
    }),
    nsupdate: Object.freeze({
      server: nonEmpty(overrides.nsupdateServer) ?? nonEmpty(env.NSUPDATE_SERVER),
      keyFile: nonEmpty(overrides.nsupdateKey) ?? nonEmpty(env.NSUPDATE_KEY),
      bin: nonEmpty(env.NSUPDATE_BIN) ?? NSUPDATE_BIN,
    }),
  });
}
