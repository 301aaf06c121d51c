import { setTimeout as sleep } from 'node:timers/promises';
import { LinkplayClient } from '../device/client.js';
import { COMMANDS } from '../device/catalog.js';
import { LinkplayError, errorMessage } from '../errors.js';
import logger, { Logger } from '../logger.js';

export type RebootVariant = 'normal' | 'quiet' | 'safe';

export const REBOOT_VARIANTS: readonly RebootVariant[] = ['normal', 'quiet', 'safe'];

export interface StepOutcome {
  step: string;
  ok: boolean;
  value?: unknown;
  error?: string;
  kind?: LinkplayError['kind'];
}

export interface DeviceReport {
  address: string;
  steps: StepOutcome[];
}

export interface FleetOptions {
  createClient?: (address: string) => LinkplayClient;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
  onStep?: (address: string, outcome: StepOutcome) => void;
}

export interface ResetOptions extends FleetOptions {
  /** Volume to leave each device at; omitted leaves the volume unchanged. */
  defaultVolume?: number;
  stepDelayMs?: number;
}

export interface RebootLoopOptions extends FleetOptions {
  count?: number;
  variant?: RebootVariant;
  /** Wait after rebooting every device, before reading volumes back. */
  rebootDelayMs?: number;
  settleDelayMs?: number;
}

type Step = readonly [name: string, action: (client: LinkplayClient) => Promise<unknown>];

class FleetRun {
  private readonly reports = new Map<string, DeviceReport>();
  private readonly clients = new Map<string, LinkplayClient>();
  readonly log: Logger;
  readonly wait: (ms: number) => Promise<void>;

  constructor(private readonly options: FleetOptions) {
    this.log = (options.logger ?? logger).child({ module: 'fleet' });
    this.wait = options.sleep ?? ((ms) => sleep(ms));
  }

  report(address: string): DeviceReport {
    let report = this.reports.get(address);
    if (!report) {
      report = { address, steps: [] };
      this.reports.set(address, report);
    }
    return report;
  }

  results(): DeviceReport[] {
    return [...this.reports.values()];
  }

  async step(address: string, [name, action]: Step): Promise<StepOutcome> {
    let outcome: StepOutcome;
    try {
      const value = await action(this.client(address));
      outcome = { step: name, ok: true, value };
      this.log.info(`${address}: ${name} -> ${JSON.stringify(value)}`);
    } catch (error) {
      outcome = {
        step: name,
        ok: false,
        error: errorMessage(error),
        kind: error instanceof LinkplayError ? error.kind : undefined,
      };
      this.log.error(`${address}: ${name} failed: ${errorMessage(error)}`);
    }
    this.report(address).steps.push(outcome);
    this.options.onStep?.(address, outcome);
    return outcome;
  }

  private client(address: string): LinkplayClient {
    let client = this.clients.get(address);
    if (!client) {
      client = this.options.createClient ? this.options.createClient(address) : new LinkplayClient(address);
      this.clients.set(address, client);
    }
    return client;
  }
}

function rebootStep(variant: RebootVariant): Step {
  switch (variant) {
    case 'normal':
      return ['reboot', (client) => client.reboot()];
    case 'quiet':
      return ['quiet reboot', (client) => client.quietReboot()];
    case 'safe':
      return ['safe reboot', (client) => client.safeReboot()];
  }
}

const volumeStep: Step = ['volume', (client) => client.volume()];

/**
 * Brings each device back to a known state, one device at a time: quiet
 * reboot, voice prompts off, and optionally a default volume.
 */
export async function resetDevices(devices: readonly string[], options: ResetOptions = {}): Promise<DeviceReport[]> {
  const run = new FleetRun(options);
  const stepDelayMs = options.stepDelayMs ?? 2000;
  const { defaultVolume } = options;

  const steps: Step[] = [
    ['name', (client) => client.name()],
    volumeStep,
    rebootStep('quiet'),
    volumeStep,
    ['prompt off', (client) => client.run(COMMANDS.promptOff)],
  ];
  if (defaultVolume !== undefined) {
    steps.push([`volume ${defaultVolume}`, (client) => client.volume(defaultVolume)], volumeStep);
  }

  for (const address of devices) {
    run.log.info(`Resetting device ${address}...`);
    run.report(address);
    for (const step of steps) {
      await run.step(address, step);
      await run.wait(stepDelayMs);
    }
  }
  return run.results();
}

/** Reboots every device over and over, reading volumes back after each round. */
export async function rebootLoop(devices: readonly string[], options: RebootLoopOptions = {}): Promise<DeviceReport[]> {
  const run = new FleetRun(options);
  const count = options.count ?? 20;
  const variant = options.variant ?? 'quiet';
  const reboot = rebootStep(variant);
  const rebootDelayMs = options.rebootDelayMs ?? (variant === 'normal' ? 60_000 : 5000);
  const settleDelayMs = options.settleDelayMs ?? 5000;

  for (const address of devices) {
    run.report(address);
  }

  for (let round = 1; round <= count; round++) {
    run.log.info(`Loop # ${round} of ${count}...`);
    for (const address of devices) {
      await run.step(address, [`round ${round}: ${reboot[0]}`, reboot[1]]);
    }
    run.log.info(`Sleeping ${rebootDelayMs}ms...`);
    await run.wait(rebootDelayMs);

    for (const address of devices) {
      await run.step(address, [`round ${round}: volume`, volumeStep[1]]);
    }
    run.log.info(`Sleeping ${settleDelayMs}ms...`);
    await run.wait(settleDelayMs);
  }
  return run.results();
}
