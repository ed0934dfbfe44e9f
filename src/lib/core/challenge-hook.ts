/**
 * Challenge Hook
 *
 * Publishes or retracts one DNS-01 challenge record and waits for the zone's
 * nameservers to serve the change. A change that does not propagate in time is
 * undone before the failure is reported.
 *
 * idle -> mutating -> polling -> (confirmed|timed_out)
 * timed_out -> compensating -> (reverted|revert_failed)
 *
 * A commit that fails right after the mutation is undone the same way, but the
 * commit failure is what gets reported.
 */

import type { RecordBackend } from '../backends/types.js';
import {
  CHALLENGE_STATE,
  CHALLENGE_TRANSITIONS,
  type ChallengeState,
} from '../constants/status.js';
import type { DnsResolver } from '../dns/resolver.js';
import { challengeRecordName } from '../dns/txt.js';
import {
  BackendUnreachableError,
  PropagationTimeoutError,
  RevertFailedError,
} from '../errors/hook-errors.js';
import { debugHook } from '../utils/debug.js';
import {
  expectAbsent,
  expectPresent,
  expectWithdrawn,
  type Expectation,
  type PropagationPoller,
} from './propagation-poller.js';

/** The TXT record to publish or retract for one validated hostname */
export interface ChallengeRecord {
  hostname: string;
  value: string;
}

export interface ChallengeOutcome {
  /** Fully qualified record name (`_acme-challenge.<hostname>`) */
  name: string;
  state: ChallengeState;
  /** False when the record was already in the requested state */
  changed: boolean;
}

export interface ChallengeHookOptions {
  backend: RecordBackend;
  resolver: Pick<DnsResolver, 'findApex' | 'listNameservers'>;
  poller: Pick<PropagationPoller, 'confirm'>;
  timeoutSeconds: number;
  onTransition?: (from: ChallengeState, to: ChallengeState) => void;
}

interface Mutation {
  expectation: Expectation;
  apply: () => Promise<void>;
  undo: () => Promise<void>;
}

export class ChallengeHook {
  private current: ChallengeState = CHALLENGE_STATE.IDLE;

  constructor(private readonly opts: ChallengeHookOptions) {}

  get state(): ChallengeState {
    return this.current;
  }

  /** Publish the record; a no-op when the backend already holds the value */
  async start(record: ChallengeRecord): Promise<ChallengeOutcome> {
    const { backend } = this.opts;
    const name = challengeRecordName(record.hostname);
    this.current = CHALLENGE_STATE.IDLE;

    const held = await this.readReachable(name);
    if (held.includes(record.value)) {
      debugHook('%s already holds the challenge value, nothing to do', name);
      this.transition(CHALLENGE_STATE.CONFIRMED);
      return { name, state: this.current, changed: false };
    }

    return this.mutate(name, {
      expectation: expectPresent(record.value),
      apply: () => backend.add(name, record.value),
      undo: () => backend.remove(name, record.value),
    });
  }

  /**
   * Retract the record; a no-op when the backend does not hold the value.
   * Other values at the same name are left alone, and then only the value
   * itself has to disappear from the nameservers.
   */
  async stop(record: ChallengeRecord): Promise<ChallengeOutcome> {
    const { backend } = this.opts;
    const name = challengeRecordName(record.hostname);
    this.current = CHALLENGE_STATE.IDLE;

    const held = await this.readReachable(name);
    if (!held.includes(record.value)) {
      debugHook('%s does not hold the challenge value, nothing to remove', name);
      this.transition(CHALLENGE_STATE.CONFIRMED);
      return { name, state: this.current, changed: false };
    }

    const others = held.filter((value) => value !== record.value);
    return this.mutate(name, {
      expectation: others.length === 0 ? expectAbsent() : expectWithdrawn(record.value),
      apply: () => backend.remove(name, record.value),
      undo: () => backend.add(name, record.value),
    });
  }

  /** Probe then read; any failure here happens before a mutation */
  private async readReachable(name: string): Promise<string[]> {
    const { backend } = this.opts;
    try {
      await backend.probe();
      return await backend.read(name);
    } catch (err) {
      throw BackendUnreachableError.of(backend.name, err);
    }
  }

  private async mutate(name: string, mutation: Mutation): Promise<ChallengeOutcome> {
    const { backend, resolver, poller, timeoutSeconds } = this.opts;

    const zone = await resolver.findApex(name);
    const nameservers = await resolver.listNameservers(zone);
    debugHook('%s: zone %s, nameservers %o', name, zone, nameservers);

    this.transition(CHALLENGE_STATE.MUTATING);
    await mutation.apply();
    try {
      await backend.commit();
    } catch (commitErr) {
      await this.rollBackUncommitted(name, mutation);
      throw commitErr;
    }

    this.transition(CHALLENGE_STATE.POLLING);
    try {
      await poller.confirm(name, mutation.expectation, nameservers, timeoutSeconds);
    } catch (err) {
      if (!(err instanceof PropagationTimeoutError)) throw err;
      this.transition(CHALLENGE_STATE.TIMED_OUT);
      return this.compensate(name, mutation, err);
    }

    this.transition(CHALLENGE_STATE.CONFIRMED);
    return { name, state: this.current, changed: true };
  }

  /** Undo the mutation once; always rejects */
  private async compensate(name: string, mutation: Mutation, timeout: PropagationTimeoutError): Promise<never> {
    this.transition(CHALLENGE_STATE.COMPENSATING);
    try {
      await mutation.undo();
      await this.opts.backend.commit();
    } catch (revertErr) {
      this.transition(CHALLENGE_STATE.REVERT_FAILED);
      debugHook('revert of %s failed: %s', name, String(revertErr));
      throw RevertFailedError.of(name, timeout, revertErr);
    }
    this.transition(CHALLENGE_STATE.REVERTED);
    throw timeout;
  }

  /** Undo an applied mutation whose commit failed; the commit error stays the one reported */
  private async rollBackUncommitted(name: string, mutation: Mutation): Promise<void> {
    this.transition(CHALLENGE_STATE.COMPENSATING);
    try {
      await mutation.undo();
      await this.opts.backend.commit();
    } catch (revertErr) {
      this.transition(CHALLENGE_STATE.REVERT_FAILED);
      debugHook('undoing uncommitted change to %s failed: %s', name, String(revertErr));
      return;
    }
    this.transition(CHALLENGE_STATE.REVERTED);
  }

  private transition(to: ChallengeState): void {
    const from = this.current;
    if (!CHALLENGE_TRANSITIONS[from].includes(to)) {
      throw new Error(`Illegal challenge state transition ${from} -> ${to}`);
    }
    debugHook('state %s -> %s', from, to);
    this.current = to;
    this.opts.onTransition?.(from, to);
  }
}
