import chalk from 'chalk';
import {
  BackendUnreachableError,
  ConfigError,
  HookOperationError,
  PropagationTimeoutError,
  RevertFailedError,
} from '../../index.js';

/** Central error handler for the hook CLI. Everything goes to stderr. */
export function handleError(error: unknown): void {
  if (error instanceof RevertFailedError) {
    console.error('\n' + chalk.red('Revert failed'));
    console.error(error.timeout.message);
    console.error(error.message);
    console.error(chalk.gray('The backend may still hold the change; check the record by hand.'));
  } else if (error instanceof PropagationTimeoutError) {
    console.error('\n' + chalk.yellow('Propagation timeout'));
    console.error(error.message);
    console.error(chalk.gray('The record change was reverted.'));
  } else if (error instanceof BackendUnreachableError) {
    console.error('\n' + chalk.red('Backend unreachable'));
    console.error(error.message);
  } else if (error instanceof ConfigError) {
    console.error(chalk.red('Configuration error:'), error.message);
  } else if (error instanceof HookOperationError) {
    console.error(chalk.red(`Error [${error.code}]:`), error.message);
  } else if (error instanceof Error) {
    console.error(chalk.red('Error:'), error.message);
  } else {
    console.error('Unknown error:', error);
  }
}
