/**
 * Challenge record naming and TXT value helpers
 */

import { CHALLENGE_LABEL } from '../constants/defaults.js';

/** Concatenate TXT record fragments (as returned by dns.resolveTxt) */
export function normalizeTxtFragments(fragments: ReadonlyArray<string>): string {
  // DNS TXT can come as ["part1","part2"]; they need to be joined
  return fragments.join('');
}

/** Lower-case a domain name and drop any trailing dot */
export function normalizeName(name: string): string {
  return name.trim().replace(/\.$/, '').toLowerCase();
}

/** `_acme-challenge.<hostname>` for a validated hostname */
export function challengeRecordName(hostname: string): string {
  const host = normalizeName(hostname).replace(/^\*\./, '');
  return `${CHALLENGE_LABEL}.${host}`;
}

/** Every suffix of a name, longest first: a.b.c -> [a.b.c, b.c, c] */
export function nameSuffixes(name: string): string[] {
  const labels = normalizeName(name).split('.').filter(Boolean);
  return labels.map((_, i) => labels.slice(i).join('.'));
}
