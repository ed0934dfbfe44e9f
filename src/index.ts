/**
 * acme-dns-hooks - DNS-01 challenge hooks for ACME clients
 *
 * Main entry point: publish and retract challenge TXT records through a
 * tinydns data file or RFC 2136 dynamic updates, and wait for propagation.
 */

export * from './lib/index.js';
