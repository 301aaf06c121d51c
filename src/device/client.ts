import { setTimeout as sleep } from 'node:timers/promises';
import { DeviceError, InvalidArgumentError, LinkplayError } from '../errors.js';
import logger, { Logger } from '../logger.js';
import { COMMANDS, Command, volumeLevel } from './catalog.js';
import { DeviceEndpoint, formatEndpoint, parseEndpoint } from './endpoint.js';
import {
  AUTH_TYPES,
  AuthType,
  DEFAULT_EQUALIZER_MODES,
  LOOP_MODES,
  LoopMode,
  RepeatSetting,
  ShuffleSetting,
  isKeyOf,
  loopModeName,
  splitLoopMode,
} from './modes.js';
import { DeviceRecord, enumeration, normalize, unwrap } from './normalizer.js';
import { HttpTransport, Transport } from './transport.js';

export interface ClientOptions {
  transport?: Transport;
  logger?: Logger;
  /** Used only when no transport is given. */
  timeoutMs?: number;
  /** Minimum gap between two requests to the same device. */
  commandIntervalMs?: number;
  /** How long to wait for the device to come back after a reboot. */
  rebootDelayMs?: number;
  quietRebootVolume?: number;
  equalizerModes?: Readonly<Record<string, number>>;
  sleep?: (ms: number) => Promise<void>;
}

export const CLIENT_DEFAULTS = {
  commandIntervalMs: 2000,
  rebootDelayMs: 60_000,
  quietRebootVolume: 1,
};

export type MultiroomInfo = DeviceRecord & {
  status: 'master' | 'slave';
  master?: { ip: string };
};

const WIFI_AUTH_KEYS = ['securemode', 'auth', 'encry', 'psk'];

export class LinkplayClient {
  readonly endpoint: DeviceEndpoint;
  private readonly transport: Transport;
  private readonly log: Logger;
  private readonly commandIntervalMs: number;
  private readonly rebootDelayMs: number;
  private readonly quietRebootVolume: number;
  private readonly equalizerTable: Readonly<Record<string, number>>;
  private readonly wait: (ms: number) => Promise<void>;
  private lastCommandAt = 0;

  constructor(address: string | DeviceEndpoint, private readonly options: ClientOptions = {}) {
    this.endpoint = typeof address === 'string' ? parseEndpoint(address) : address;
    this.transport = options.transport ?? new HttpTransport({ timeoutMs: options.timeoutMs });
    this.log = (options.logger ?? logger).child({ module: `client ${formatEndpoint(this.endpoint)}` });
    this.commandIntervalMs = options.commandIntervalMs ?? CLIENT_DEFAULTS.commandIntervalMs;
    this.rebootDelayMs = options.rebootDelayMs ?? CLIENT_DEFAULTS.rebootDelayMs;
    this.quietRebootVolume = volumeLevel(options.quietRebootVolume ?? CLIENT_DEFAULTS.quietRebootVolume);
    this.equalizerTable = options.equalizerModes ?? DEFAULT_EQUALIZER_MODES;
    this.wait = options.sleep ?? ((ms) => sleep(ms));
  }

  /**
   * Builds the wire command, sends it and normalizes the answer. Argument
   * validation happens before the request is sent.
   */
  async run<A extends unknown[], T>(command: Command<A, T>, ...args: A): Promise<T> {
    const wire = command.request(...args);
    await this.pace();
    try {
      const raw = await this.transport.send(this.endpoint, wire);
      return unwrap(normalize(command.response, raw));
    } finally {
      this.lastCommandAt = Date.now();
    }
  }

  private async pace(): Promise<void> {
    const remaining = this.commandIntervalMs - (Date.now() - this.lastCommandAt);
    if (this.lastCommandAt > 0 && remaining > 0) {
      this.log.debug(`Waiting ${remaining}ms before starting another request...`);
      await this.wait(remaining);
    }
  }

  // --- Information ---

  async info(): Promise<DeviceRecord> {
    this.log.info('Retrieving combined device and player info...');
    const device = await this.run(COMMANDS.deviceInfo);
    const player = await this.run(COMMANDS.playerInfo);
    return { ...device, ...player };
  }

  async isResponsive(): Promise<boolean> {
    try {
      const player = await this.run(COMMANDS.playerInfo);
      if (!('vol' in player)) {
        this.log.debug('Device is not okay: player status has no volume');
        return false;
      }
      return true;
    } catch (error) {
      if (error instanceof LinkplayError) {
        this.log.debug(`Device is not okay: ${error.message}`);
        return false;
      }
      throw error;
    }
  }

  // --- Power ---

  async reboot(): Promise<true> {
    this.log.info('Requesting reboot...');
    return this.run(COMMANDS.reboot);
  }

  /**
   * Reboots and waits until the device answers again, rebooting again up to
   * `maxRetries` more times. A negative value retries without limit.
   */
  async safeReboot(maxRetries = 3): Promise<true> {
    this.log.info('Requesting safe reboot...');
    if (this.rebootDelayMs > 5000) {
      this.log.info(`Note: This call may take ${Math.round(this.rebootDelayMs / 1000)} seconds or more to return`);
    }
    const started = Date.now();
    const limit = maxRetries < 0 ? 'unlimited' : String(maxRetries + 1);

    for (let attempt = 1; ; attempt++) {
      this.log.debug(`Starting reboot attempt ${attempt} of ${limit}...`);
      await this.run(COMMANDS.reboot);
      this.log.debug(`Waiting ${this.rebootDelayMs}ms while device reboots...`);
      await this.wait(this.rebootDelayMs);

      if (await this.isResponsive()) {
        const elapsed = ((Date.now() - started) / 1000).toFixed(1);
        this.log.debug(`Safe reboot complete after ${attempt} attempt(s) and ${elapsed} seconds`);
        return true;
      }
      if (maxRetries >= 0 && attempt >= maxRetries + 1) {
        throw new DeviceError(`Failed to bring device back up after ${attempt} reboot attempts. Giving up.`);
      }
      this.log.debug('Device is not responding after reboot. Trying again...');
    }
  }

  /** Reboots without the boot jingle being heard: volume is lowered first and restored afterwards. */
  async quietReboot(): Promise<true> {
    this.log.info('Requesting quiet reboot...');
    const previous = await this.run(COMMANDS.volume);
    this.log.debug(`Saving current volume '${previous}' and setting volume to '${this.quietRebootVolume}'...`);
    await this.run(COMMANDS.setVolume, this.quietRebootVolume);
    if ((await this.run(COMMANDS.volume)) !== this.quietRebootVolume) {
      throw new DeviceError('Failed to set volume to minimum before quiet reboot');
    }

    await this.safeReboot();

    this.log.debug(`Restoring previous volume '${previous}'...`);
    await this.run(COMMANDS.setVolume, previous);
    if ((await this.run(COMMANDS.volume)) !== previous) {
      throw new DeviceError(`Failed to restore old volume '${previous}' after reboot`);
    }
    return true;
  }

  async shutdown(): Promise<true> {
    this.log.info('Requesting shutdown...');
    return this.run(COMMANDS.shutdown);
  }

  // --- Device ---

  name(): Promise<string>;
  name(name: string): Promise<true>;
  async name(name?: string): Promise<string | true> {
    if (name === undefined) {
      this.log.info('Retrieving device name...');
      return this.run(COMMANDS.name);
    }
    this.log.info(`Setting device name to '${name}'...`);
    return this.run(COMMANDS.setName, name);
  }

  // --- Volume ---

  volume(): Promise<number>;
  volume(level: number): Promise<true>;
  async volume(level?: number): Promise<number | true> {
    if (level === undefined) {
      this.log.info('Retrieving device volume...');
      return this.run(COMMANDS.volume);
    }
    this.log.info(`Setting volume to '${level}'...`);
    return this.run(COMMANDS.setVolume, level);
  }

  /** Moves the volume by a signed amount; the result is clamped to 0..100. */
  async adjustVolume(delta: number): Promise<number> {
    if (!Number.isFinite(delta)) {
      throw new InvalidArgumentError(`Volume change must be a number between -100 and +100, not '${delta}'`);
    }
    const current = await this.run(COMMANDS.volume);
    const target = Math.max(0, Math.min(100, current + Math.floor(delta)));
    this.log.debug(`Adjusting volume ${current} by ${delta} to ${target}...`);
    await this.run(COMMANDS.setVolume, target);
    return target;
  }

  async volumeUp(step = 5): Promise<number> {
    return this.adjustVolume(Math.abs(step));
  }

  async volumeDown(step = 5): Promise<number> {
    return this.adjustVolume(-Math.abs(step));
  }

  mute(): Promise<boolean>;
  mute(on: boolean): Promise<true>;
  async mute(on?: boolean): Promise<boolean> {
    if (on === undefined) {
      this.log.info('Retrieving state of muting function...');
      return this.run(COMMANDS.muted);
    }
    this.log.info(`Turning muting ${on ? 'on' : 'off'}`);
    return this.run(on ? COMMANDS.muteOn : COMMANDS.muteOff);
  }

  async toggleMute(): Promise<boolean> {
    const muted = await this.run(COMMANDS.muted);
    await this.run(muted ? COMMANDS.muteOff : COMMANDS.muteOn);
    return !muted;
  }

  // --- Equalizer ---

  equalizerModes(): Readonly<Record<string, number>> {
    return this.equalizerTable;
  }

  equalizer(): Promise<string>;
  equalizer(mode: string): Promise<true>;
  async equalizer(mode?: string): Promise<string | true> {
    if (mode === undefined) {
      this.log.info('Retrieving current equalizer setting...');
      return this.run({ ...COMMANDS.equalizer, response: enumeration(this.equalizerTable) });
    }
    if (!isKeyOf(this.equalizerTable, mode)) {
      const names = Object.keys(this.equalizerTable).join(' ');
      throw new InvalidArgumentError(`Equalizer mode must be one of [${names}], not '${mode}'`);
    }
    const value = this.equalizerTable[mode];
    this.log.info(`Setting equalizer to '${mode}' (value ${value})...`);
    return this.run(COMMANDS.setEqualizer, value);
  }

  // --- Position ---

  position(): Promise<number>;
  position(ms: number): Promise<true>;
  async position(ms?: number): Promise<number | true> {
    if (ms === undefined) {
      this.log.info("Retrieving player's current position in media...");
      return this.run(COMMANDS.position);
    }
    if (!Number.isFinite(ms)) {
      throw new InvalidArgumentError(`Position must be a number of milliseconds, not '${ms}'`);
    }
    const length = await this.run(COMMANDS.length);
    const target = Math.max(0, Math.min(length, Math.floor(ms)));
    this.log.debug(`Setting player media position to ${target} (of ${length} ms)...`);
    return this.run(COMMANDS.seekTo, Math.floor(target / 1000));
  }

  async seek(seconds: number): Promise<true> {
    this.log.info(`Seeking to '${seconds}' second mark in media...`);
    return this.position(toMilliseconds(seconds, 'Seek position'));
  }

  async back(seconds = 10): Promise<true> {
    this.log.info(`Rewinding playback by '${seconds}' seconds...`);
    const offset = toMilliseconds(seconds, 'Rewind offset');
    return this.position((await this.run(COMMANDS.position)) - offset);
  }

  async forward(seconds = 10): Promise<true> {
    this.log.info(`Fast-forwarding playback by '${seconds}' seconds...`);
    const offset = toMilliseconds(seconds, 'Fast-forward offset');
    return this.position((await this.run(COMMANDS.position)) + offset);
  }

  // --- Shuffle and repeat ---

  loopMode(): Promise<LoopMode>;
  loopMode(mode: LoopMode): Promise<true>;
  async loopMode(mode?: LoopMode): Promise<LoopMode | true> {
    if (mode === undefined) {
      return this.run(COMMANDS.loopMode);
    }
    this.log.debug(`Setting loop mode to '${mode}' [value: '${LOOP_MODES[mode]}']...`);
    return this.run(COMMANDS.setLoopMode, LOOP_MODES[mode]);
  }

  shuffle(): Promise<ShuffleSetting>;
  shuffle(on: boolean): Promise<true>;
  async shuffle(on?: boolean): Promise<ShuffleSetting | true> {
    const current = splitLoopMode(await this.run(COMMANDS.loopMode));
    if (on === undefined) {
      this.log.info('Retrieving shuffle setting...');
      return current.shuffle;
    }
    this.log.info(`Setting shuffle to '${on ? 'on' : 'off'}'`);
    // Shuffle cannot be combined with repeating a single track.
    const repeat = on && current.repeat === 'one' ? 'all' : current.repeat;
    return this.setLoop(repeat, on ? 'on' : 'off');
  }

  repeat(): Promise<RepeatSetting>;
  repeat(mode: RepeatSetting): Promise<true>;
  async repeat(mode?: RepeatSetting): Promise<RepeatSetting | true> {
    const current = splitLoopMode(await this.run(COMMANDS.loopMode));
    if (mode === undefined) {
      this.log.info('Retrieving repeat setting...');
      return current.repeat;
    }
    this.log.info(`Setting repeat to '${mode}'`);
    return this.setLoop(mode, mode === 'one' ? 'off' : current.shuffle);
  }

  private async setLoop(repeat: RepeatSetting, shuffle: ShuffleSetting): Promise<true> {
    const mode = loopModeName(repeat, shuffle);
    if (!mode) {
      throw new InvalidArgumentError(`Repeat '${repeat}' cannot be combined with shuffle '${shuffle}'`);
    }
    return this.loopMode(mode);
  }

  // --- Wi-Fi ---

  wifiAuth(): Promise<DeviceRecord>;
  wifiAuth(type: AuthType, password?: string): Promise<true>;
  async wifiAuth(type?: AuthType, password?: string): Promise<DeviceRecord | true> {
    if (type === undefined) {
      this.log.info('Retrieving WiFi authentication information...');
      const info = await this.run(COMMANDS.deviceInfo);
      return Object.fromEntries(Object.entries(info).filter(([key]) => WIFI_AUTH_KEYS.includes(key)));
    }
    if (!isKeyOf(AUTH_TYPES, type)) {
      throw new InvalidArgumentError(`Authentication type must be one of [${Object.keys(AUTH_TYPES).join(', ')}]`);
    }
    this.log.info(`Setting WiFi authentication type to '${type}'...`);
    return this.run(COMMANDS.setWifiAuth, type, password);
  }

  // --- Multiroom ---

  async multiroomInfo(): Promise<MultiroomInfo> {
    this.log.info('Retrieving multiroom master and slaves of this device, if any...');
    const device = await this.run(COMMANDS.deviceInfo);
    const masterIp = device.master_ip;
    const slaves = await this.run(COMMANDS.multiroomSlaves);
    if (typeof masterIp === 'string' && masterIp) {
      return { ...slaves, status: 'slave', master: { ip: masterIp } };
    }
    return { ...slaves, status: 'master' };
  }

  /** Makes the device at `slaveAddress` join this device's multiroom group. */
  async multiroomAdd(slaveAddress: string): Promise<true> {
    this.log.info(`Slaving '${slaveAddress}' to this device...`);
    const info = await this.run(COMMANDS.deviceInfo);
    const secure = String(info.securemode ?? '0') !== '0';
    const slave = new LinkplayClient(slaveAddress, this.options);
    return slave.run(COMMANDS.joinMaster, {
      ssid: stringOf(info.ssid),
      channel: Number(info.WifiChannel ?? 0),
      auth: secure ? stringOf(info.auth) : 'OPEN',
      encryption: secure ? stringOf(info.encry) : '',
      password: secure ? stringOf(info.psk) : '',
    });
  }
}

function toMilliseconds(seconds: number, label: string): number {
  if (!Number.isFinite(seconds)) {
    throw new InvalidArgumentError(`${label} must be a number of seconds, not '${seconds}'`);
  }
  return Math.floor(seconds * 1000);
}

function stringOf(value: unknown): string {
  return typeof value === 'string' || typeof value === 'number' ? String(value) : '';
}
