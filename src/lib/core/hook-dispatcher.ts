/**
 * Hook Dispatcher
 *
 * Maps one ACME client hook invocation to a challenge operation and an exit
 * code: 0 on success, 42 for events this hook does not handle, 1 on failure.
 */

import { EXIT_CODE, HOOK_EVENT, isHookEvent, type ExitCode } from '../constants/events.js';
import { ConfigError, UnknownEventError } from '../errors/hook-errors.js';
import { debugMain } from '../utils/debug.js';
import type { ChallengeHook, ChallengeOutcome } from './challenge-hook.js';

export interface HookInvocation {
  event: string;
  hostname?: string;
  /** Only meaningful to HTTP challenge hooks; accepted and ignored */
  targetFile?: string;
  value?: string;
}

export interface HookDispatcherOptions {
  /** Builds the hook; only called for DNS challenge events */
  createHook: () => Pick<ChallengeHook, 'start' | 'stop'>;
  onSuccess?: (event: string, outcome: ChallengeOutcome) => void;
  /** Told about events answered with exit code 42; these are not failures */
  onUnknownEvent?: (error: UnknownEventError) => void;
  onError?: (error: unknown) => void;
}

function required(value: string | undefined, key: string): string {
  if (!value) throw ConfigError.missing(key);
  return value;
}

export async function dispatchHookEvent(
  invocation: HookInvocation,
  opts: HookDispatcherOptions,
): Promise<ExitCode> {
  const { event } = invocation;
  if (!isHookEvent(event)) {
    const unknown = UnknownEventError.of(event);
    debugMain('%s', unknown.message);
    opts.onUnknownEvent?.(unknown);
    return EXIT_CODE.UNKNOWN_EVENT;
  }

  try {
    const record = {
      hostname: required(invocation.hostname, 'hostname'),
      value: required(invocation.value, 'challenge value'),
    };
    const hook = opts.createHook();
    const outcome =
      event === HOOK_EVENT.CHALLENGE_DNS_START ? await hook.start(record) : await hook.stop(record);
    debugMain('%s for %s finished in state %s', event, outcome.name, outcome.state);
    opts.onSuccess?.(event, outcome);
    return EXIT_CODE.SUCCESS;
  } catch (err) {
    opts.onError?.(err);
    return EXIT_CODE.FAILURE;
  }
}
