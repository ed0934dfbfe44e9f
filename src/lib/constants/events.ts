/**
 * Hook lifecycle events and process exit codes
 */

export const HOOK_EVENT = {
  CHALLENGE_DNS_START: 'challenge-dns-start',
  CHALLENGE_DNS_STOP: 'challenge-dns-stop',
} as const;

export type HookEvent = (typeof HOOK_EVENT)[keyof typeof HOOK_EVENT];

export const EXIT_CODE = {
  SUCCESS: 0,
  FAILURE: 1,
  /** Tells the ACME client the event is not handled by this hook */
  UNKNOWN_EVENT: 42,
} as const;

export type ExitCode = (typeof EXIT_CODE)[keyof typeof EXIT_CODE];

export function isHookEvent(event: string): event is HookEvent {
  return event === HOOK_EVENT.CHALLENGE_DNS_START || event === HOOK_EVENT.CHALLENGE_DNS_STOP;
}
