import {
  ChallengeHook,
  NodeDnsResolver,
  ProcessCommandRunner,
  PropagationPoller,
  createBackend,
  dispatchHookEvent,
  loadConfig,
  systemClock,
  type Clock,
  type CommandRunner,
  type DnsResolver,
  type Environment,
  type ExitCode,
  type PollObservation,
} from '../../index.js';
import { createSpinner, render } from '../logger.js';
import { handleError } from '../utils/errors.js';

/** Flags accepted by the hook command; each overrides its environment variable */
export interface HookCommandOptions {
  backend?: string;
  timeout?: string;
  interval?: string;
  ttl?: string;
  tinydnsRoot?: string;
  nsupdateServer?: string;
  nsupdateKey?: string;
  quiet?: boolean;
}

/** Collaborators the command builds by default; tests substitute them */
export interface HookCommandDependencies {
  env?: Environment;
  resolver?: DnsResolver;
  runner?: CommandRunner;
  clock?: Clock;
}

export interface HookCommandArguments {
  event: string;
  hostname?: string;
  targetFile?: string;
  value?: string;
}

function describePoll(poll: PollObservation): string {
  const seconds = Math.round(poll.elapsedMs / 1000);
  return `Waiting for ${poll.name} on ${poll.server} (attempt ${poll.attempt}, ${seconds}s elapsed)`;
}

/** Run one hook invocation and return the process exit code */
export async function handleHookCommand(
  args: HookCommandArguments,
  options: HookCommandOptions = {},
  deps: HookCommandDependencies = {},
): Promise<ExitCode> {
  const quiet = options.quiet ?? false;
  const spinner = createSpinner({ silent: quiet });

  return dispatchHookEvent(args, {
    createHook: () => {
      const config = loadConfig(deps.env ?? process.env, options);
      const resolver = deps.resolver ?? new NodeDnsResolver();
      const runner = deps.runner ?? new ProcessCommandRunner();
      const poller = new PropagationPoller({
        resolver,
        intervalSeconds: config.intervalSeconds,
        clock: deps.clock ?? systemClock,
        onPoll: (poll) => {
          if (!poll.matched) spinner.start(describePoll(poll));
        },
      });
      return new ChallengeHook({
        backend: createBackend(config, { resolver, runner }),
        resolver,
        poller,
        timeoutSeconds: config.timeoutSeconds,
      });
    },
    onSuccess: (event, outcome) => {
      spinner.stop();
      if (quiet) return;
      if (outcome.changed) render.success(`${event}: ${outcome.name} confirmed on all nameservers`);
      else render.info(`${event}: ${outcome.name} already up to date`);
    },
    onError: (error) => {
      spinner.stop();
      handleError(error);
    },
  });
}
