/**
 * Propagation Poller
 *
 * Confirms that every authoritative nameserver of a zone serves the expected
 * state of a challenge record. Servers are checked one after another in the
 * order given; all of them share a single time budget, so a slow server
 * shortens the time left for the ones after it.
 */

import { PROPAGATION_POLL_INTERVAL_SECONDS } from '../constants/defaults.js';
import type { DnsResolver } from '../dns/resolver.js';
import { PropagationTimeoutError } from '../errors/hook-errors.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { debugPoller } from '../utils/debug.js';

/** What a nameserver should serve at the record name */
export type Expectation =
  | { kind: 'present'; value: string }
  | { kind: 'absent' }
  | { kind: 'withdrawn'; value: string };

export function expectPresent(value: string): Expectation {
  return { kind: 'present', value };
}

export function expectAbsent(): Expectation {
  return { kind: 'absent' };
}

/** The value is gone but other TXT strings may remain at the name */
export function expectWithdrawn(value: string): Expectation {
  return { kind: 'withdrawn', value };
}

/** Presence: one TXT string equals the value. Absence: no TXT strings at all. */
export function matchesExpectation(expectation: Expectation, observed: readonly string[]): boolean {
  switch (expectation.kind) {
    case 'present':
      return observed.includes(expectation.value);
    case 'absent':
      return observed.length === 0;
    case 'withdrawn':
      return !observed.includes(expectation.value);
  }
}

/** One query of one nameserver */
export interface PollObservation {
  name: string;
  server: string;
  /** 1-based attempt number against this server */
  attempt: number;
  /** Time since confirm() started */
  elapsedMs: number;
  observed: string[];
  matched: boolean;
}

export interface PropagationPollerOptions {
  resolver: Pick<DnsResolver, 'queryTxt'>;
  /** Fixed wait between polls of the same server (default: 5 s) */
  intervalSeconds?: number;
  clock?: Clock;
  /** Called after every query */
  onPoll?: (observation: PollObservation) => void;
}

export class PropagationPoller {
  private readonly resolver: Pick<DnsResolver, 'queryTxt'>;
  private readonly intervalMs: number;
  private readonly clock: Clock;
  private readonly onPoll?: (observation: PollObservation) => void;

  constructor(opts: PropagationPollerOptions) {
    this.resolver = opts.resolver;
    this.intervalMs = (opts.intervalSeconds ?? PROPAGATION_POLL_INTERVAL_SECONDS) * 1000;
    this.clock = opts.clock ?? systemClock;
    this.onPoll = opts.onPoll;
  }

  /**
   * Resolve once every server in `nameservers` serves `expectation` at `name`.
   * Rejects with PropagationTimeoutError when the shared budget runs out; servers
   * after the one being polled at that point are never queried.
   */
  async confirm(
    name: string,
    expectation: Expectation,
    nameservers: readonly string[],
    timeoutSeconds: number,
  ): Promise<void> {
    const timeoutMs = timeoutSeconds * 1000;
    const started = this.clock.now();

    if (nameservers.length === 0) {
      debugPoller('no nameservers to confirm %s against', name);
      return;
    }

    for (const server of nameservers) {
      for (let attempt = 1; ; attempt++) {
        const observed = await this.observe(name, server);
        const elapsedMs = this.clock.now() - started;
        const matched = matchesExpectation(expectation, observed);

        debugPoller(
          '%s @%s attempt=%d elapsed=%dms observed=%o matched=%s',
          name,
          server,
          attempt,
          elapsedMs,
          observed,
          matched,
        );
        this.onPoll?.({ name, server, attempt, elapsedMs, observed, matched });

        if (matched) break;
        if (elapsedMs >= timeoutMs) {
          throw PropagationTimeoutError.of(name, server, timeoutSeconds, elapsedMs, observed);
        }
        await this.clock.sleep(Math.min(this.intervalMs, timeoutMs - elapsedMs));
      }
    }
  }

  /** A failed query counts as seeing nothing */
  private async observe(name: string, server: string): Promise<string[]> {
    try {
      return await this.resolver.queryTxt(name, server);
    } catch (err) {
      debugPoller('query %s @%s failed: %s', name, server, err instanceof Error ? err.message : String(err));
      return [];
    }
  }
}
