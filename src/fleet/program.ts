import chalk from 'chalk';
import { Command, InvalidArgumentError as OptionError, Option } from 'commander';
import { Config, loadConfig } from '../config.js';
import { LinkplayClient } from '../device/client.js';
import { InvalidArgumentError, errorMessage, exitCodeFor } from '../errors.js';
import { setVerbosity } from '../logger.js';
import { DeviceReport, REBOOT_VARIANTS, RebootVariant, StepOutcome, rebootLoop, resetDevices } from './index.js';

function integerOption(value: string): number {
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    throw new OptionError(`Expected a non-negative integer, got '${value}'`);
  }
  return parsed;
}

function printStep(address: string, outcome: StepOutcome): void {
  if (outcome.ok) {
    const value = outcome.value === true ? 'OK' : JSON.stringify(outcome.value);
    console.log(`${chalk.gray(address)} ${outcome.step}: ${chalk.green(value)}`);
  } else {
    console.log(`${chalk.gray(address)} ${outcome.step}: ${chalk.red(`ERROR - ${outcome.error}`)}`);
  }
}

function summarize(reports: DeviceReport[]): number {
  let failures = 0;
  console.log(chalk.bold('\nSummary:'));
  for (const report of reports) {
    const failed = report.steps.filter((step) => !step.ok).length;
    failures += failed;
    const line = `  ${report.address}: ${report.steps.length - failed} ok, ${failed} failed`;
    console.log(failed ? chalk.yellow(line) : chalk.green(line));
  }
  return failures > 0 ? 1 : 0;
}

function buildProgram(config: Config, setExitCode: (code: number) => void): Command {
  const program = new Command();

  const clientFactory = () => {
    const { timeout } = program.opts<{ timeout: number }>();
    return (address: string) =>
      new LinkplayClient(address, {
        timeoutMs: timeout,
        commandIntervalMs: config.commandIntervalMs,
        rebootDelayMs: config.rebootDelayMs,
        quietRebootVolume: config.quietRebootVolume,
        equalizerModes: config.equalizerModes,
      });
  };

  const devicesFrom = (args: string[]): string[] => {
    const devices = args.length > 0 ? args : config.devices;
    if (devices.length === 0) {
      throw new InvalidArgumentError(
        'No devices given: pass addresses, set LINKPLAY_DEVICES, or add "devices" to the config file',
      );
    }
    return devices;
  };

  program
    .name('linkplayctl-fleet')
    .description('Run maintenance sequences across several LinkPlay devices, one at a time')
    .version('1.0.0')
    .option('-v, --verbose', 'increase logging verbosity (repeatable)', (_value: string, previous: number) => previous + 1, 0)
    .option('-t, --timeout <ms>', 'request timeout in milliseconds', integerOption, config.timeoutMs)
    .hook('preAction', (command) => {
      setVerbosity(command.opts<{ verbose: number }>().verbose);
    });

  program
    .command('reset')
    .description('Quiet reboot, disable voice prompts and reset the volume on each device')
    .argument('[addresses...]', 'devices to reset (defaults to the configured list)')
    .option('--volume <level>', 'volume to leave each device at', integerOption, config.defaultVolume)
    .option('--delay <ms>', 'pause between steps', integerOption, 2000)
    .action(async (addresses: string[], options: { volume?: number; delay: number }) => {
      const reports = await resetDevices(devicesFrom(addresses), {
        defaultVolume: options.volume,
        stepDelayMs: options.delay,
        createClient: clientFactory(),
        onStep: printStep,
      });
      setExitCode(summarize(reports));
    });

  program
    .command('reboot-loop')
    .description('Reboot each device repeatedly and read its volume back after every round')
    .argument('[addresses...]', 'devices to reboot (defaults to the configured list)')
    .option('-c, --count <n>', 'number of rounds', integerOption, 20)
    .addOption(new Option('--variant <variant>', 'reboot variant').choices(REBOOT_VARIANTS).default('quiet'))
    .option('--delay <ms>', 'pause after each round of reboots', integerOption)
    .action(async (addresses: string[], options: { count: number; variant: RebootVariant; delay?: number }) => {
      const reports = await rebootLoop(devicesFrom(addresses), {
        count: options.count,
        variant: options.variant,
        rebootDelayMs: options.delay,
        createClient: clientFactory(),
        onStep: printStep,
      });
      setExitCode(summarize(reports));
    });

  return program;
}

/** Runs one `linkplayctl-fleet` invocation and resolves to its exit code. */
export async function runFleet(argv: string[] = process.argv, env: NodeJS.ProcessEnv = process.env): Promise<number> {
  let exitCode = 0;
  try {
    const config = loadConfig({ env });
    await buildProgram(config, (code) => {
      exitCode = code;
    }).parseAsync(argv);
    return exitCode;
  } catch (error) {
    console.error(chalk.red(`ERROR - ${errorMessage(error)}`));
    return exitCodeFor(error);
  }
}
