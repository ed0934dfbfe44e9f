/**
 * Default configuration constants for acme-dns-hooks
 *
 * Used as fallbacks when neither the environment nor CLI flags provide a value.
 */

// Propagation polling defaults
export const PROPAGATION_TIMEOUT_SECONDS = 90;
export const PROPAGATION_POLL_INTERVAL_SECONDS = 5;

// Record defaults
export const CHALLENGE_RECORD_TTL_SECONDS = 60;
export const CHALLENGE_LABEL = '_acme-challenge';

// Backend defaults
export const TINYDNS_ROOT = '/etc/tinydns/root';
export const TINYDNS_DATA_FILE = 'data';
export const NSUPDATE_BIN = 'nsupdate';
export const MAKE_BIN = 'make';

// Per-query resolver timeout
export const DNS_QUERY_TIMEOUT_MS = 4_000;
