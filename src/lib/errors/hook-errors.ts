/**
 * Hook operation errors
 *
 * Typed representation of the ways a challenge hook invocation can fail.
 * Each error carries a stable `code`, a coarse `type` and a context record
 * for logging.
 */

/**
 * Base class for all hook operation errors
 */
export abstract class HookOperationError extends Error {
  abstract readonly code: string;
  abstract readonly type: string;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * The hook was invoked with an event it does not handle
 */
export class UnknownEventError extends HookOperationError {
  readonly code = 'UNKNOWN_EVENT';
  readonly type = 'event';

  static of(event: string): UnknownEventError {
    return new UnknownEventError(`Unknown hook event: ${event}`, { event });
  }
}

/**
 * Configuration is missing or invalid
 */
export class ConfigError extends HookOperationError {
  readonly code = 'CONFIG_ERROR';
  readonly type = 'config';

  static invalid(key: string, value: string, expected: string): ConfigError {
    return new ConfigError(`Invalid value for ${key}: '${value}' (expected ${expected})`, {
      key,
      value,
      expected,
    });
  }

  static missing(key: string): ConfigError {
    return new ConfigError(`Missing required value: ${key}`, { key });
  }
}

/**
 * An external command exited unsuccessfully
 */
export class CommandError extends HookOperationError {
  readonly code = 'COMMAND_ERROR';
  readonly type = 'command';

  static failed(command: string, args: readonly string[], exitCode: number | null, stderr: string): CommandError {
    const status = exitCode === null ? 'was terminated' : `exited with code ${exitCode}`;
    const detail = stderr.trim();
    return new CommandError(`${command} ${status}${detail ? `: ${detail}` : ''}`, {
      command,
      args: [...args],
      exitCode,
      stderr: detail,
    });
  }

  static spawnFailed(command: string, cause: unknown): CommandError {
    return new CommandError(`Failed to run ${command}: ${describe(cause)}`, { command });
  }
}

/**
 * A DNS lookup needed to locate the zone or its servers failed
 */
export class ResolverError extends HookOperationError {
  readonly code = 'RESOLVER_ERROR';
  readonly type = 'resolver';

  static zoneNotFound(name: string): ResolverError {
    return new ResolverError(`No zone apex found for ${name}`, { name });
  }

  static lookupFailed(rrtype: string, name: string, cause: unknown): ResolverError {
    return new ResolverError(`${rrtype} lookup for ${name} failed: ${describe(cause)}`, {
      rrtype,
      name,
    });
  }
}

/**
 * The record backend cannot be used; raised before any mutation
 */
export class BackendUnreachableError extends HookOperationError {
  readonly code = 'BACKEND_UNREACHABLE';
  readonly type = 'backend';

  static of(backend: string, cause: unknown): BackendUnreachableError {
    return new BackendUnreachableError(`${backend} backend is unreachable: ${describe(cause)}`, {
      backend,
    });
  }
}

/**
 * Authoritative nameservers did not converge within the timeout
 */
export class PropagationTimeoutError extends HookOperationError {
  readonly code = 'PROPAGATION_TIMEOUT';
  readonly type = 'propagation';

  static of(
    name: string,
    server: string,
    timeoutSeconds: number,
    elapsedMs: number,
    observed: readonly string[],
  ): PropagationTimeoutError {
    const seen = observed.length > 0 ? observed.map((v) => `"${v}"`).join(', ') : 'nothing';
    return new PropagationTimeoutError(
      `${name} did not converge on ${server} within ${timeoutSeconds}s (last saw ${seen})`,
      { name, server, timeoutSeconds, elapsedMs, observed: [...observed] },
    );
  }
}

/**
 * The compensating mutation after a propagation timeout failed
 */
export class RevertFailedError extends HookOperationError {
  readonly code = 'REVERT_FAILED';
  readonly type = 'revert';

  constructor(
    message: string,
    public readonly timeout: PropagationTimeoutError,
    public readonly revertError: unknown,
    context?: Record<string, unknown>,
  ) {
    super(message, context);
  }

  static of(name: string, timeout: PropagationTimeoutError, revertError: unknown): RevertFailedError {
    return new RevertFailedError(
      `Failed to revert ${name} after propagation timeout: ${describe(revertError)}`,
      timeout,
      revertError,
      { name },
    );
  }
}

/**
 * Union type for all hook operation errors
 */
export type HookOperationErrorType =
  | UnknownEventError
  | ConfigError
  | CommandError
  | ResolverError
  | BackendUnreachableError
  | PropagationTimeoutError
  | RevertFailedError;
