import { describe, it, expect } from '@jest/globals';
import {
  BackendUnreachableError,
  CommandError,
  HookOperationError,
  ProcessCommandRunner,
  PropagationTimeoutError,
  ResolverError,
  RevertFailedError,
  UnknownEventError,
} from '../../src/index.js';

describe('hook operation errors', () => {
  it('carries code, type and name', () => {
    const err = UnknownEventError.of('live-updated');
    expect(err).toBeInstanceOf(HookOperationError);
    expect(err.name).toBe('UnknownEventError');
    expect(err.code).toBe('UNKNOWN_EVENT');
    expect(err.type).toBe('event');
    expect(err.message).toBe('Unknown hook event: live-updated');
    expect(err.context).toEqual({ event: 'live-updated' });
  });

  it('describes command failures', () => {
    expect(CommandError.failed('make', [], 2, 'bad line\n').message).toBe('make exited with code 2: bad line');
    expect(CommandError.failed('nsupdate', ['-k', 'key'], null, '').message).toBe('nsupdate was terminated');
    expect(CommandError.spawnFailed('nsupdate', new Error('spawn nsupdate ENOENT')).message).toBe(
      'Failed to run nsupdate: spawn nsupdate ENOENT',
    );
  });

  it('quotes what was last observed on timeout', () => {
    const err = PropagationTimeoutError.of('_acme-challenge.example.com', '192.0.2.1', 60, 61_000, ['a', 'b']);
    expect(err.message).toBe('_acme-challenge.example.com did not converge on 192.0.2.1 within 60s (last saw "a", "b")');
  });

  it('keeps the timeout behind a failed revert', () => {
    const timeout = PropagationTimeoutError.of('_acme-challenge.example.com', 'ns1', 60, 60_000, []);
    const cause = new Error('make: *** [data.cdb] Error 111');
    const err = RevertFailedError.of('_acme-challenge.example.com', timeout, cause);

    expect(err.code).toBe('REVERT_FAILED');
    expect(err.timeout).toBe(timeout);
    expect(err.revertError).toBe(cause);
    expect(err.message).toBe(
      'Failed to revert _acme-challenge.example.com after propagation timeout: make: *** [data.cdb] Error 111',
    );
  });

  it('describes unreachable backends and failed lookups', () => {
    expect(BackendUnreachableError.of('nsupdate', 'not installed').message).toBe(
      'nsupdate backend is unreachable: not installed',
    );
    expect(ResolverError.zoneNotFound('_acme-challenge.example.invalid').code).toBe('RESOLVER_ERROR');
  });
});

describe('ProcessCommandRunner', () => {
  it('rejects with CommandError when the command does not exist', async () => {
    const runner = new ProcessCommandRunner();

    await expect(runner.run('acme-dns-hooks-no-such-command', [])).rejects.toBeInstanceOf(CommandError);
  });
});
