import { Command, InvalidArgumentError as OptionError } from 'commander';
import { Config, loadConfig } from './config.js';

export interface CliOptions {
  address: string;
  words: string[];
  verbosity: number;
  timeoutMs: number;
  commandIntervalMs: number;
  list: boolean;
}

const increase = (_value: string, previous: number) => previous + 1;

// "-5" and "+10" are volume changes, not flags.
const SIGNED_NUMBER = /^[+-]\d/;

function integerOption(value: string): number {
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    throw new OptionError(`Expected a non-negative integer, got '${value}'`);
  }
  return parsed;
}

/**
 * Splits argv into what commander parses (options and the address) and the
 * command words. Options are read up to the first word after the address;
 * from there on everything, including "-5" in "volume -5", is the command's.
 */
function splitCommandWords(program: Command, args: string[]): { head: string[]; words: string[] } {
  const head: string[] = [];
  let seenAddress = false;

  for (let index = 0; index < args.length; index++) {
    const arg = args[index];
    if (arg === '--') {
      const rest = args.slice(index + 1);
      if (seenAddress || rest.length === 0) {
        return { head, words: rest };
      }
      return { head: [...head, '--', rest[0]], words: rest.slice(1) };
    }
    if (arg.startsWith('-') && !SIGNED_NUMBER.test(arg)) {
      head.push(arg);
      const option = program.options.find((candidate) => candidate.short === arg || candidate.long === arg);
      if (option?.required && index + 1 < args.length) {
        head.push(args[++index]);
      }
      continue;
    }
    if (seenAddress) {
      return { head, words: args.slice(index) };
    }
    seenAddress = true;
    head.push(arg);
  }
  return { head, words: [] };
}

export function parseArgs(
  argv: string[] = process.argv,
  config: Pick<Config, 'timeoutMs' | 'commandIntervalMs'> = loadConfig(),
): CliOptions {
  const program = new Command();

  program
    .name('linkplayctl')
    .description('Control a LinkPlay wireless speaker')
    .usage('<address> [options] <command> [args...]')
    .version('1.0.0')
    .argument('[address]', 'address (hostname or IP, optionally :port) of the device')
    .argument('[command...]', 'one or more words naming the command, followed by its arguments')
    .option('-v, --verbose', 'increase logging verbosity (repeatable)', increase, 0)
    .option('-t, --timeout <ms>', 'request timeout in milliseconds', integerOption, config.timeoutMs)
    .option(
      '-i, --interval <ms>',
      'minimum delay between requests to the device',
      integerOption,
      config.commandIntervalMs,
    )
    .option('-l, --list', 'list the available commands', false);

  const { head, words } = splitCommandWords(program, argv.slice(2));
  program.parse([...argv.slice(0, 2), ...head]);

  const options = program.opts<{ verbose: number; timeout: number; interval: number; list: boolean }>();
  const [address = ''] = program.args;

  return {
    address,
    words,
    verbosity: options.verbose,
    timeoutMs: options.timeout,
    commandIntervalMs: options.interval,
    list: options.list,
  };
}
