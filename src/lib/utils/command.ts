/**
 * External command execution
 *
 * Backends shell out to `make` and `nsupdate`. The working directory and stdin
 * are always passed explicitly; nothing depends on the process cwd.
 */

import { spawn } from 'child_process';
import { CommandError } from '../errors/hook-errors.js';
import { debugCommand } from './debug.js';

export interface CommandOptions {
  /** Working directory for the child process */
  cwd?: string;
  /** Text written to the child's stdin before it is closed */
  input?: string;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
}

/**
 * Runs a command to completion. Implementations reject with CommandError
 * when the command cannot be started or exits non-zero.
 */
export interface CommandRunner {
  run(command: string, args: readonly string[], options?: CommandOptions): Promise<CommandResult>;
}

/** CommandRunner backed by child_process.spawn */
export class ProcessCommandRunner implements CommandRunner {
  run(command: string, args: readonly string[], options: CommandOptions = {}): Promise<CommandResult> {
    debugCommand('run %s %o cwd=%s', command, args, options.cwd ?? '(inherit)');

    return new Promise<CommandResult>((resolve, reject) => {
      const child = spawn(command, [...args], {
        cwd: options.cwd,
        stdio: ['pipe', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';
      child.stdout.on('data', (chunk: Buffer) => {
        stdout += chunk.toString();
      });
      child.stderr.on('data', (chunk: Buffer) => {
        stderr += chunk.toString();
      });

      child.on('error', (err) => {
        reject(CommandError.spawnFailed(command, err));
      });

      child.on('close', (code) => {
        debugCommand('%s exited code=%s', command, code);
        if (code === 0) {
          resolve({ stdout, stderr });
        } else {
          reject(CommandError.failed(command, args, code, stderr));
        }
      });

      // EPIPE when the child exits without reading stdin surfaces through 'close'
      child.stdin.on('error', (err) => {
        debugCommand('%s stdin error: %s', command, err.message);
      });
      child.stdin.end(options.input ?? '');
    });
  }
}
