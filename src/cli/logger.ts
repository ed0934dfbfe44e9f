import chalk from 'chalk';
import ora from 'ora';

export interface SpinnerHandle {
  start(text: string): SpinnerHandle;
  stop(): void;
}

export interface SpinnerOptions {
  /** Suppress all spinner output */
  silent?: boolean;
}

/**
 * Wrapper around ora showing the current wait; the text is replaced on every start().
 * Ora writes to stderr and only animates on a TTY.
 */
export function createSpinner(opts: SpinnerOptions = {}): SpinnerHandle {
  let spinner: ora.Ora | undefined;

  function ensure(text: string) {
    if (!spinner) spinner = ora({ text, isSilent: opts.silent ?? false }).start();
    else spinner.text = text;
  }

  return {
    start(text: string) {
      ensure(text);
      return this;
    },
    stop() {
      spinner?.stop();
    },
  };
}

export const symbols = {
  success: chalk.green('✔'),
  info: chalk.cyan('ℹ'),
};

/** Lightweight render helpers to avoid scattered console formatting */
export const render = {
  success(msg: string) {
    console.log(symbols.success + ' ' + chalk.green(msg));
  },
  info(msg: string) {
    console.log(symbols.info + ' ' + chalk.cyan(msg));
  },
};
