/**
 * acme-dns-hooks Library - Core Exports
 */

// Propagation and challenge lifecycle
export {
  PropagationPoller,
  expectAbsent,
  expectPresent,
  expectWithdrawn,
  matchesExpectation,
  type Expectation,
  type PollObservation,
  type PropagationPollerOptions,
} from './core/propagation-poller.js';
export {
  ChallengeHook,
  type ChallengeHookOptions,
  type ChallengeOutcome,
  type ChallengeRecord,
} from './core/challenge-hook.js';
export {
  dispatchHookEvent,
  type HookDispatcherOptions,
  type HookInvocation,
} from './core/hook-dispatcher.js';

// Record backends
export { createBackend, type BackendDependencies } from './backends/index.js';
export {
  TinydnsBackend,
  escapeTinydnsText,
  unescapeTinydnsText,
  formatTxtLine,
  parseTxtLine,
  type TinydnsBackendOptions,
  type TxtLine,
} from './backends/tinydns.js';
export {
  NsupdateBackend,
  formatUpdateLine,
  quoteTxt,
  type NsupdateBackendOptions,
  type PendingUpdate,
} from './backends/nsupdate.js';
export type { RecordBackend } from './backends/types.js';

// DNS
export {
  NodeDnsResolver,
  isNegativeAnswer,
  type DnsClient,
  type DnsResolver,
  type NodeDnsResolverOptions,
} from './dns/resolver.js';
export { challengeRecordName, nameSuffixes, normalizeName, normalizeTxtFragments } from './dns/txt.js';

// Configuration
export {
  BACKEND_KIND,
  loadConfig,
  type BackendKind,
  type ConfigOverrides,
  type Environment,
  type HookConfig,
} from './config/config.js';

// Error handling
export {
  HookOperationError,
  UnknownEventError,
  ConfigError,
  CommandError,
  ResolverError,
  BackendUnreachableError,
  PropagationTimeoutError,
  RevertFailedError,
  type HookOperationErrorType,
} from './errors/hook-errors.js';

// Constants
export { EXIT_CODE, HOOK_EVENT, isHookEvent, type ExitCode, type HookEvent } from './constants/events.js';
export {
  CHALLENGE_STATE,
  CHALLENGE_TRANSITIONS,
  type ChallengeState,
} from './constants/status.js';
export * as defaults from './constants/defaults.js';

// Utilities
export { systemClock, type Clock } from './utils/clock.js';
export {
  ProcessCommandRunner,
  type CommandOptions,
  type CommandResult,
  type CommandRunner,
} from './utils/command.js';
export { getPackageInfo, type PackageInfo } from './utils/package-info.js';
