import { describe, it, expect } from '@jest/globals';
import { ConfigError, loadConfig } from '../../src/index.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      backend: 'tinydns',
      timeoutSeconds: 90,
      intervalSeconds: 5,
      ttlSeconds: 60,
      tinydns: { root: '/etc/tinydns/root', makeBin: 'make' },
      nsupdate: { server: undefined, keyFile: undefined, bin: 'nsupdate' },
    });
  });

  it('reads the environment', () => {
    const config = loadConfig({
      ACME_DNS_BACKEND: 'nsupdate',
      ACME_DNS_TIMEOUT: '120',
      ACME_DNS_INTERVAL: '2',
      ACME_DNS_TTL: '30',
      NSUPDATE_SERVER: '192.0.2.53',
      NSUPDATE_KEY: '/etc/acme/tsig.key',
      NSUPDATE_BIN: '/usr/local/bin/nsupdate',
    });

    expect(config.backend).toBe('nsupdate');
    expect(config.timeoutSeconds).toBe(120);
    expect(config.intervalSeconds).toBe(2);
    expect(config.ttlSeconds).toBe(30);
    expect(config.nsupdate).toEqual({
      server: '192.0.2.53',
      keyFile: '/etc/acme/tsig.key',
      bin: '/usr/local/bin/nsupdate',
    });
  });

  it('lets overrides win over the environment', () => {
    const config = loadConfig(
      { ACME_DNS_BACKEND: 'nsupdate', ACME_DNS_TIMEOUT: '120', TINYDNS_ROOT: '/srv/tinydns' },
      { backend: 'tinydns', timeout: '30', tinydnsRoot: '/var/tinydns/root' },
    );

    expect(config.backend).toBe('tinydns');
    expect(config.timeoutSeconds).toBe(30);
    expect(config.tinydns.root).toBe('/var/tinydns/root');
  });

  it('ignores blank values', () => {
    expect(loadConfig({ ACME_DNS_BACKEND: ' ', ACME_DNS_TIMEOUT: '' }).timeoutSeconds).toBe(90);
  });

  it('rejects an unknown backend', () => {
    expect(() => loadConfig({ ACME_DNS_BACKEND: 'route53' })).toThrow(
      new ConfigError("Invalid value for ACME_DNS_BACKEND: 'route53' (expected one of tinydns, nsupdate)"),
    );
  });

  it.each(['0', '-5', '1.5', 'soon'])('rejects timeout %p', (value) => {
    expect(() => loadConfig({ ACME_DNS_TIMEOUT: value })).toThrow(ConfigError);
  });

  it('returns a frozen config', () => {
    const config = loadConfig({});
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.tinydns)).toBe(true);
  });
});
