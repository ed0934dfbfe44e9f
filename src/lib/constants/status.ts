/**
 * Challenge State Constants
 *
 * State of a single hook invocation. Transitions:
 *
 * idle -> mutating -> polling -> (confirmed|timed_out)
 * timed_out -> compensating -> (reverted|revert_failed)
 * mutating -> compensating, when the commit of the mutation fails
 *
 * An invocation whose record already has the requested state goes
 * straight from idle to confirmed.
 */
export const CHALLENGE_STATE = {
  /** Nothing written yet */
  IDLE: 'idle' as const,
  /** Backend add/remove and commit in progress */
  MUTATING: 'mutating' as const,
  /** Waiting for authoritative nameservers to converge */
  POLLING: 'polling' as const,
  /** Every nameserver serves the expected state */
  CONFIRMED: 'confirmed' as const,
  /** The shared propagation budget ran out */
  TIMED_OUT: 'timed_out' as const,
  /** Undoing the mutation after a timeout or a failed commit */
  COMPENSATING: 'compensating' as const,
  /** Mutation undone and recommitted */
  REVERTED: 'reverted' as const,
  /** The compensating write or commit failed */
  REVERT_FAILED: 'revert_failed' as const,
} as const;

export type ChallengeState = (typeof CHALLENGE_STATE)[keyof typeof CHALLENGE_STATE];

/** Allowed transitions of the per-invocation state machine */
export const CHALLENGE_TRANSITIONS: Readonly<Record<ChallengeState, readonly ChallengeState[]>> = {
  idle: [CHALLENGE_STATE.MUTATING, CHALLENGE_STATE.CONFIRMED],
  mutating: [CHALLENGE_STATE.POLLING, CHALLENGE_STATE.COMPENSATING],
  polling: [CHALLENGE_STATE.CONFIRMED, CHALLENGE_STATE.TIMED_OUT],
  confirmed: [],
  timed_out: [CHALLENGE_STATE.COMPENSATING],
  compensating: [CHALLENGE_STATE.REVERTED, CHALLENGE_STATE.REVERT_FAILED],
  reverted: [],
  revert_failed: [],
};
