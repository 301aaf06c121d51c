import chalk from 'chalk';
import { parseArgs } from './cli.js';
import { CLI_COMMANDS, formatResult, resolveCommand } from './commands.js';
import { loadConfig } from './config.js';
import { LinkplayClient } from './device/client.js';
import { errorMessage, exitCodeFor } from './errors.js';
import logger, { setVerbosity } from './logger.js';

function printCommands(): void {
  console.log(chalk.bold('Available commands:'));
  for (const [phrase, command] of Object.entries(CLI_COMMANDS)) {
    console.log(`  ${chalk.cyan(phrase.padEnd(28))} ${command.summary}`);
  }
}

function printUsage(): void {
  console.error(chalk.red('Please provide a device address and a command, e.g.:'));
  console.error(chalk.cyan('  linkplayctl 192.168.1.55 volume'));
  console.error(chalk.cyan('  linkplayctl 192.168.1.55 volume 30'));
  console.error(chalk.cyan('  linkplayctl 192.168.1.55 -v quiet reboot'));
  console.error(chalk.gray('\nOr use --list to see every command'));
}

/** Runs one `linkplayctl` invocation and resolves to its exit code. */
export async function main(argv: string[] = process.argv, env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const log = logger.child({ module: 'main' });
  let verbosity = 0;

  try {
    const config = loadConfig({ env });
    const options = parseArgs(argv, config);
    verbosity = options.verbosity;
    setVerbosity(verbosity);

    if (options.list) {
      printCommands();
      return 0;
    }
    if (!options.address || options.words.length === 0) {
      printUsage();
      return 2;
    }
    log.debug(`Device address: '${options.address}' Verbosity: ${verbosity}`);

    const resolved = resolveCommand(options.words);
    if (!resolved) {
      console.error(chalk.red(`ERROR - Unknown command '${options.words.join(' ')}'`));
      console.error(chalk.gray('Use --list to see every command'));
      return 2;
    }
    log.debug(
      `Found command '${resolved.phrase}'` + (resolved.args.length ? ` with argument(s) [${resolved.args.join(' ')}]` : ''),
    );

    const client = new LinkplayClient(options.address, {
      timeoutMs: options.timeoutMs,
      commandIntervalMs: options.commandIntervalMs,
      rebootDelayMs: config.rebootDelayMs,
      quietRebootVolume: config.quietRebootVolume,
      equalizerModes: config.equalizerModes,
    });

    const result = await resolved.command.run(client, resolved.args);
    console.log(formatResult(result));
    return 0;
  } catch (error) {
    if (verbosity > 1) {
      log.error(errorMessage(error), { stack: error instanceof Error ? error.stack : undefined, showStack: verbosity > 2 });
    }
    console.error(chalk.red(`ERROR - ${errorMessage(error)}`));
    return exitCodeFor(error);
  }
}
