import { InvalidArgumentError } from '../errors.js';
import { hex } from './hex.js';
import {
  AUTH_TYPES,
  AuthType,
  DEFAULT_EQUALIZER_MODES,
  LOOP_MODES,
  PLAYER_MODES,
  WIFI_STATES,
} from './modes.js';
import {
  ResponseShape,
  enumeration,
  flagField,
  hexField,
  integer,
  integerField,
  ok,
  record,
  stringField,
  text,
} from './normalizer.js';

/**
 * One firmware command: how to build its wire text from typed arguments and
 * what the device answers. Builders throw {@link InvalidArgumentError} before
 * anything reaches the network.
 */
export interface Command<A extends unknown[], T> {
  readonly summary: string;
  readonly request: (...args: A) => string;
  readonly response: ResponseShape<T>;
}

function command<A extends unknown[], T>(
  summary: string,
  request: (...args: A) => string,
  response: ResponseShape<T>,
): Command<A, T> {
  return { summary, request, response };
}

export interface MasterNetwork {
  ssid: string;
  channel: number;
  auth: string;
  encryption: string;
  password: string;
}

export function volumeLevel(level: number): number {
  if (!Number.isFinite(level)) {
    throw new InvalidArgumentError(`Volume must be a number between 0 and 100, not '${level}'`);
  }
  const value = Math.floor(level);
  if (value < 0 || value > 100) {
    throw new InvalidArgumentError(`Volume must be between 0 and 100, inclusive, not '${level}'`);
  }
  return value;
}

function integerIn(label: string, value: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
  if (!Number.isInteger(value) || value < min || value > max) {
    const range = max === Number.MAX_SAFE_INTEGER ? `an integer of at least ${min}` : `an integer between ${min} and ${max}, inclusive`;
    throw new InvalidArgumentError(`${label} must be ${range}, not '${value}'`);
  }
  return value;
}

function nonEmpty(label: string, value: string): string {
  if (!value.trim()) {
    throw new InvalidArgumentError(`${label} must be a non-empty string`);
  }
  return value;
}

function oneOf(label: string, value: number, allowed: readonly number[]): number {
  if (!allowed.includes(value)) {
    throw new InvalidArgumentError(`${label} must be one of [${allowed.join(', ')}], not '${value}'`);
  }
  return value;
}

const playerCmd = (action: string) => `setPlayerCmd:${action}`;

export const COMMANDS = {
  // Power
  reboot: command('Reboot immediately', () => 'reboot', ok),
  shutdown: command('Shut down immediately', () => 'getShutdown', ok),

  // Device information
  deviceInfo: command('Device and hardware status', () => 'getStatus', record),
  name: command('Device name', () => 'getStatus', stringField('DeviceName')),
  setName: command(
    'Set the device name used by AirPlay and DLNA',
    (name: string) => `setDeviceName:${nonEmpty('Device name', name)}`,
    ok,
  ),
  group: command('Multiroom group name', () => 'getStatus', stringField('GroupName')),
  uuid: command('Device UUID', () => 'getStatus', stringField('uuid')),
  hardware: command('Hardware version', () => 'getStatus', stringField('hardware')),
  model: command('Model (project) name', () => 'getStatus', stringField('project')),
  firmware: command('Firmware version', () => 'getStatus', stringField('firmware')),
  firmwareUpdateVersion: command('Version of a pending firmware update', () => 'getStatus', stringField('NewVer')),
  promptLanguage: command('Voice prompt language', () => 'getStatus', stringField('language')),

  // Wi-Fi
  wifiSsid: command('Wi-Fi SSID', () => 'getStatus', stringField('ssid')),
  wifiSsidHidden: command('Whether the SSID is hidden', () => 'getStatus', flagField('hideSSID')),
  wifiChannel: command('Wi-Fi channel', () => 'getStatus', integerField('WifiChannel')),
  wifiMac: command('Wi-Fi MAC address', () => 'getStatus', stringField('MAC')),
  wifiNetworks: command('Visible access points', () => 'wlanGetApList', record),
  wifiStatus: command('Wi-Fi connection state', () => 'wlanGetConnectState', enumeration(WIFI_STATES)),
  wifiOff: command('Power down the Wi-Fi radio', () => 'setWifiPowerDown', ok),
  setWifiAuth: command(
    'Set network authentication (device reboots)',
    (type: AuthType, password = '') => {
      const value = AUTH_TYPES[type];
      if (value !== AUTH_TYPES.off && !password) {
        throw new InvalidArgumentError(`Authentication type '${type}' requires a non-empty password`);
      }
      return `setNetwork:${value}:${password}`;
    },
    ok,
  ),

  // Player
  playerInfo: command('Player status', () => 'getPlayerStatus', record),
  transport: command('Transport state (play, pause, stop...)', () => 'getPlayerStatus', stringField('status')),
  title: command('Current title', () => 'getPlayerStatus', hexField('Title')),
  album: command('Current album', () => 'getPlayerStatus', hexField('Album')),
  artist: command('Current artist', () => 'getPlayerStatus', hexField('Artist')),
  position: command('Position in current media (ms)', () => 'getPlayerStatus', integerField('curpos')),
  length: command('Length of current media (ms)', () => 'getPlayerStatus', integerField('totlen')),
  loopMode: command('Shuffle and repeat mode', () => 'getPlayerStatus', enumeration(LOOP_MODES, 'loop')),
  setLoopMode: command(
    'Set shuffle and repeat mode',
    (value: number) => playerCmd(`loopmode:${oneOf('Loop mode', value, Object.values(LOOP_MODES))}`),
    ok,
  ),
  play: command(
    'Play current media, or the given URI',
    (uri?: string) => playerCmd(uri ? `play:${uri}` : 'play'),
    ok,
  ),
  pause: command('Pause', () => playerCmd('pause'), ok),
  resume: command('Resume', () => playerCmd('resume'), ok),
  stop: command('Stop', () => playerCmd('stop'), ok),
  previous: command('Previous track', () => playerCmd('prev'), ok),
  next: command('Next track', () => playerCmd('next'), ok),
  seekTo: command(
    'Seek to an absolute second mark',
    (seconds: number) => playerCmd(`seek:${integerIn('Seek position', seconds, 0)}`),
    ok,
  ),

  // Volume
  volume: command('Volume (0-100)', () => 'getPlayerStatus', integer('vol')),
  setVolume: command(
    'Set volume (0-100)',
    (level: number) => playerCmd(`vol:${volumeLevel(level)}`),
    ok,
  ),
  muted: command('Mute state', () => 'getPlayerStatus', flagField('mute')),
  muteOn: command('Mute', () => playerCmd('mute:1'), ok),
  muteOff: command('Unmute', () => playerCmd('mute:0'), ok),

  // Sources
  source: command('Current source', () => 'getPlayerStatus', enumeration(PLAYER_MODES, 'mode')),
  playlist: command(
    'Play the playlist at a URI',
    (uri: string) => playerCmd(`playlist:${nonEmpty('Playlist URI', uri)}`),
    ok,
  ),
  bluetooth: command('Switch to Bluetooth', () => playerCmd('switchmode:bluetooth'), ok),
  lineIn: command('Switch to line-in', () => playerCmd('switchmode:line-in'), ok),
  optical: command('Switch to optical input', () => playerCmd('switchmode:optical'), ok),
  local: command(
    'Play local storage (USB, SD) from a track index',
    (index: number = 1) => playerCmd(`playLocalList:${integerIn('Track index', index, 1)}`),
    ok,
  ),
  preset: command(
    'Load a numbered preset',
    (number: number) => `MCUKeyShortClick:${integerIn('Preset number', number, 1, 6)}`,
    ok,
  ),

  // Equalizer
  equalizer: command('Equalizer preset', () => 'getEqualizer', enumeration(DEFAULT_EQUALIZER_MODES)),
  setEqualizer: command(
    'Set equalizer preset by firmware value',
    (value: number) => playerCmd(`equalizer:${integerIn('Equalizer value', value, 0)}`),
    ok,
  ),

  // Prompts
  promptOn: command('Enable voice prompts and jingles', () => 'PromptEnable', ok),
  promptOff: command('Disable voice prompts and jingles', () => 'PromptDisable', ok),

  // Firmware
  firmwareUpdateSearch: command('Start a search for new firmware', () => 'getMvRemoteUpdateStartCheck', text),
  firmwareUpdateStatus: command('Result of the last firmware search', () => 'getMvRemoteUpdateStatus', record),

  // Multiroom
  multiroomSlaves: command('Slaves of this device', () => 'multiroom:getSlaveList', record),
  joinMaster: command(
    'Join the multiroom network of a master',
    (network: MasterNetwork) =>
      `ConnectMasterAp:ssid=${hex(network.ssid)}:ch=${network.channel}:auth=${network.auth}` +
      `:encry=${network.encryption}:pwd=${hex(network.password)}:chext=0`,
    ok,
  ),
  kickSlave: command(
    'Remove a slave from the group',
    (ip: string) => `multiroom:SlaveKickout:${nonEmpty('Slave address', ip)}`,
    ok,
  ),
  hideSlave: command(
    'Hide a slave from the network',
    (ip: string) => `multiroom:SlaveMask:${nonEmpty('Slave address', ip)}`,
    ok,
  ),
  showSlave: command(
    'Show a hidden slave on the network',
    (ip: string) => `multiroom:SlaveUnMask:${nonEmpty('Slave address', ip)}`,
    ok,
  ),
  ungroup: command('Leave (or, as master, dissolve) the multiroom group', () => 'multiroom:Ungroup', ok),

  // Raw
  raw: command('Send raw command text', (wire: string) => nonEmpty('Command', wire), text),
};

export type CommandId = keyof typeof COMMANDS;
