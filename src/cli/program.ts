import { Command, CommanderError } from 'commander';
import { EXIT_CODE, getPackageInfo } from '../index.js';
import { handleHookCommand, type HookCommandDependencies } from './commands/hook.js';

/**
 * Build a Commander program for the acme-dns-hook binary.
 * The exit code of the hook run is handed to `onExit` instead of exiting.
 */
export function createCli(deps: HookCommandDependencies = {}, onExit: (code: number) => void = () => {}): Command {
  const program = new Command();

  program
    .name('acme-dns-hook')
    .description('ACME client hook publishing DNS-01 challenge records and waiting for propagation')
    .version(getPackageInfo().version)
    .argument('<event>', 'hook event, e.g. challenge-dns-start or challenge-dns-stop')
    .argument('[hostname]', 'hostname being validated')
    .argument('[target-file]', 'unused by DNS challenges')
    .argument('[value]', 'TXT record value')
    .allowExcessArguments(true)
    .option('--backend <kind>', 'record backend: tinydns or nsupdate (env ACME_DNS_BACKEND)')
    .option('--timeout <seconds>', 'propagation timeout (env ACME_DNS_TIMEOUT)')
    .option('--interval <seconds>', 'poll interval (env ACME_DNS_INTERVAL)')
    .option('--ttl <seconds>', 'challenge record TTL (env ACME_DNS_TTL)')
    .option('--tinydns-root <dir>', 'tinydns data directory (env TINYDNS_ROOT)')
    .option('--nsupdate-server <server>', 'dynamic update server (env NSUPDATE_SERVER)')
    .option('--nsupdate-key <file>', 'TSIG key file for nsupdate (env NSUPDATE_KEY)')
    .option('-q, --quiet', 'only print errors')
    .action(async (event: string, hostname: string | undefined, targetFile: string | undefined, value: string | undefined) => {
      const code = await handleHookCommand({ event, hostname, targetFile, value }, program.opts(), deps);
      onExit(code);
    });

  return program;
}

/** Parse arguments, run the hook and resolve with the exit code (no automatic exit). */
export async function runCli(argv: string[], deps: HookCommandDependencies = {}): Promise<number> {
  let exitCode: number = EXIT_CODE.SUCCESS;
  const program = createCli(deps, (code) => {
    exitCode = code;
  });
  program.exitOverride();
  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (err: unknown) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }
  return exitCode;
}
