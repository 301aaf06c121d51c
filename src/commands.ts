import { COMMANDS } from './device/catalog.js';
import { LinkplayClient } from './device/client.js';
import { AuthType, AUTH_TYPES, RepeatSetting, isKeyOf } from './device/modes.js';
import { InvalidArgumentError } from './errors.js';

export interface CliCommand {
  summary: string;
  maxArgs: number;
  run: (client: LinkplayClient, args: string[]) => Promise<unknown>;
}

export interface ResolvedCommand {
  phrase: string;
  command: CliCommand;
  args: string[];
}

function parseNumber(label: string, value: string): number {
  const number = Number(value);
  if (value.trim() === '' || !Number.isFinite(number)) {
    throw new InvalidArgumentError(`${label} must be a number, not '${value}'`);
  }
  return number;
}

function parseSwitch(label: string, value: string): boolean {
  const normalized = value.toLowerCase();
  if (['on', '1', 'true', 'yes'].includes(normalized)) return true;
  if (['off', '0', 'false', 'no'].includes(normalized)) return false;
  throw new InvalidArgumentError(`${label} must be 'on' or 'off', not '${value}'`);
}

function parseRepeat(value: string): RepeatSetting {
  const normalized = value.toLowerCase();
  if (normalized === 'one' || normalized === 'all') return normalized;
  if (normalized === 'off' || normalized === '0' || normalized === 'none') return 'off';
  throw new InvalidArgumentError(`Repeat must be one of [off, all, one], not '${value}'`);
}

function parseAuthType(value: string): AuthType {
  if (!isKeyOf(AUTH_TYPES, value)) {
    throw new InvalidArgumentError(
      `Authentication type must be one of [${Object.keys(AUTH_TYPES).join(', ')}], not '${value}'`,
    );
  }
  return value;
}

const onOff = (value: boolean) => (value ? 'on' : 'off');

const simple = (summary: string, run: (client: LinkplayClient) => Promise<unknown>): CliCommand => ({
  summary,
  maxArgs: 0,
  run: (client) => run(client),
});

const withArgs = (
  summary: string,
  maxArgs: number,
  run: (client: LinkplayClient, args: string[]) => Promise<unknown>,
): CliCommand => ({ summary, maxArgs, run });

const requireArg = (args: string[], label: string): string => {
  if (args.length === 0) {
    throw new InvalidArgumentError(`Missing ${label}`);
  }
  return args[0];
};

const safeReboot = withArgs('Reboot and wait until the device answers again', 1, (client, [retries]) =>
  client.safeReboot(retries === undefined ? 3 : parseNumber('Retry count', retries)),
);
const quietReboot = simple('Reboot without the boot jingle being heard', (client) => client.quietReboot());
const previous = simple('Skip to the previous track', (client) => client.run(COMMANDS.previous));
const back = withArgs('Rewind by seconds (default 10)', 1, (client, [seconds]) =>
  client.back(seconds === undefined ? 10 : parseNumber('Rewind offset', seconds)),
);
const lineIn = simple('Switch to line-in', (client) => client.run(COMMANDS.lineIn));
const firmware = simple('Firmware version', (client) => client.run(COMMANDS.firmware));

/**
 * Command phrases the CLI understands. Multi-word phrases are matched before
 * shorter ones; whatever follows the phrase is passed as arguments.
 */
export const CLI_COMMANDS: Record<string, CliCommand> = {
  // Power
  'info': simple('Combined device and player information', (client) => client.info()),
  'reboot': simple('Reboot immediately', (client) => client.reboot()),
  'safe reboot': safeReboot,
  'reboot safe': safeReboot,
  'quiet reboot': quietReboot,
  'reboot quiet': quietReboot,
  'silent reboot': quietReboot,
  'reboot silent': quietReboot,
  'shutdown': simple('Shut down immediately', (client) => client.shutdown()),
  'command': withArgs('Send raw command text', Infinity, (client, args) =>
    client.run(COMMANDS.raw, args.join(' ')),
  ),

  // Device
  'device info': simple('Device and hardware status', (client) => client.run(COMMANDS.deviceInfo)),
  'name': withArgs('Get or set the device name', Infinity, (client, args) =>
    args.length === 0 ? client.name() : client.name(args.join(' ')),
  ),
  'group': simple('Multiroom group name', (client) => client.run(COMMANDS.group)),
  'uuid': simple('Device UUID', (client) => client.run(COMMANDS.uuid)),
  'hardware': simple('Hardware version', (client) => client.run(COMMANDS.hardware)),
  'model': simple('Model (project) name', (client) => client.run(COMMANDS.model)),

  // Wi-Fi
  'wifi ssid': simple('Wi-Fi SSID', (client) => client.run(COMMANDS.wifiSsid)),
  'wifi ssid hidden': simple('Whether the SSID is hidden', async (client) =>
    String(await client.run(COMMANDS.wifiSsidHidden)),
  ),
  'wifi channel': simple('Wi-Fi channel', (client) => client.run(COMMANDS.wifiChannel)),
  'wifi mac': simple('Wi-Fi MAC address', (client) => client.run(COMMANDS.wifiMac)),
  'wifi auth': withArgs('Get or set authentication: off | psk <password>', 2, (client, [type, password]) =>
    type === undefined ? client.wifiAuth() : client.wifiAuth(parseAuthType(type), password),
  ),
  'wifi networks': simple('Visible access points', (client) => client.run(COMMANDS.wifiNetworks)),
  'wifi status': simple('Wi-Fi connection state', (client) => client.run(COMMANDS.wifiStatus)),
  'wifi off': simple('Power down the Wi-Fi radio', (client) => client.run(COMMANDS.wifiOff)),

  // Player
  'player info': simple('Player status', (client) => client.run(COMMANDS.playerInfo)),
  'transport': simple('Transport state', (client) => client.run(COMMANDS.transport)),
  'play': withArgs('Play current media, or a URI', 1, (client, [uri]) => client.run(COMMANDS.play, uri)),
  'pause': simple('Pause', (client) => client.run(COMMANDS.pause)),
  'resume': simple('Resume', (client) => client.run(COMMANDS.resume)),
  'stop': simple('Stop', (client) => client.run(COMMANDS.stop)),
  'previous': previous,
  'prev': previous,
  'next': simple('Skip to the next track', (client) => client.run(COMMANDS.next)),
  'seek': withArgs('Seek to a second mark', 1, (client, args) =>
    client.seek(parseNumber('Seek position', requireArg(args, 'seek position'))),
  ),
  'back': back,
  'rewind': back,
  'forward': withArgs('Fast-forward by seconds (default 10)', 1, (client, [seconds]) =>
    client.forward(seconds === undefined ? 10 : parseNumber('Fast-forward offset', seconds)),
  ),
  'position': withArgs('Get or set the position in ms', 1, (client, [ms]) =>
    ms === undefined ? client.position() : client.position(parseNumber('Position', ms)),
  ),
  'length': simple('Length of current media in ms', (client) => client.run(COMMANDS.length)),
  'title': simple('Current title', (client) => client.run(COMMANDS.title)),
  'album': simple('Current album', (client) => client.run(COMMANDS.album)),
  'artist': simple('Current artist', (client) => client.run(COMMANDS.artist)),
  'shuffle': withArgs('Get or set shuffle: on | off', 1, (client, [value]) =>
    value === undefined ? client.shuffle() : client.shuffle(parseSwitch('Shuffle', value)),
  ),
  'repeat': withArgs('Get or set repeat: off | all | one', 1, (client, [value]) =>
    value === undefined ? client.repeat() : client.repeat(parseRepeat(value)),
  ),

  // Volume
  'volume': withArgs('Get volume, set 0-100, or adjust by +n / -n', 1, (client, [value]) => {
    if (value === undefined) return client.volume();
    const level = parseNumber('Volume', value);
    return /^[+-]/.test(value) ? client.adjustVolume(level) : client.volume(level);
  }),
  'volume up': withArgs('Raise volume by n (default 5)', 1, (client, [step]) =>
    client.volumeUp(step === undefined ? 5 : parseNumber('Volume step', step)),
  ),
  'volume down': withArgs('Lower volume by n (default 5)', 1, (client, [step]) =>
    client.volumeDown(step === undefined ? 5 : parseNumber('Volume step', step)),
  ),
  'mute': withArgs('Get or set muting: on | off', 1, async (client, [value]) =>
    value === undefined ? onOff(await client.mute()) : client.mute(parseSwitch('Mute', value)),
  ),
  'mute on': simple('Mute', (client) => client.mute(true)),
  'mute off': simple('Unmute', (client) => client.mute(false)),
  'unmute': simple('Unmute', (client) => client.mute(false)),
  'mute toggle': simple('Toggle muting', async (client) => onOff(await client.toggleMute())),

  // Sources
  'source': simple('Current source', (client) => client.run(COMMANDS.source)),
  'playlist': withArgs('Play the playlist at a URI', 1, (client, args) =>
    client.run(COMMANDS.playlist, requireArg(args, 'playlist URI')),
  ),
  'bluetooth': simple('Switch to Bluetooth', (client) => client.run(COMMANDS.bluetooth)),
  'aux': lineIn,
  'linein': lineIn,
  'line in': lineIn,
  'optical': simple('Switch to optical input', (client) => client.run(COMMANDS.optical)),
  'local': withArgs('Play local storage from a track index (default 1)', 1, (client, [index]) =>
    client.run(COMMANDS.local, index === undefined ? 1 : parseNumber('Track index', index)),
  ),
  'preset': withArgs('Load preset 1-6', 1, (client, args) =>
    client.run(COMMANDS.preset, parseNumber('Preset number', requireArg(args, 'preset number'))),
  ),

  // Equalizer
  'equalizer': withArgs('Get or set the equalizer preset', 1, (client, [mode]) =>
    mode === undefined ? client.equalizer() : client.equalizer(mode.toLowerCase()),
  ),
  'equalizer modes': simple('Known equalizer presets', async (client) => client.equalizerModes()),

  // Prompts
  'prompt on': simple('Enable voice prompts and jingles', (client) => client.run(COMMANDS.promptOn)),
  'prompt off': simple('Disable voice prompts and jingles', (client) => client.run(COMMANDS.promptOff)),
  'prompt language': simple('Voice prompt language', (client) => client.run(COMMANDS.promptLanguage)),

  // Firmware
  'firmware': firmware,
  'firmware version': firmware,
  'firmware update search': simple('Start a firmware search', (client) =>
    client.run(COMMANDS.firmwareUpdateSearch),
  ),
  'firmware update available': simple('Result of the last firmware search', (client) =>
    client.run(COMMANDS.firmwareUpdateStatus),
  ),
  'firmware update version': simple('Version of a pending update', (client) =>
    client.run(COMMANDS.firmwareUpdateVersion),
  ),

  // Multiroom
  'multiroom info': simple('Multiroom master and slaves', (client) => client.multiroomInfo()),
  'multiroom add': withArgs('Make a device a slave of this one', 1, (client, args) =>
    client.multiroomAdd(requireArg(args, 'slave address')),
  ),
  'multiroom remove': withArgs('Remove a slave', 1, (client, args) =>
    client.run(COMMANDS.kickSlave, requireArg(args, 'slave address')),
  ),
  'multiroom hide': withArgs('Hide a slave from the network', 1, (client, args) =>
    client.run(COMMANDS.hideSlave, requireArg(args, 'slave address')),
  ),
  'multiroom show': withArgs('Show a hidden slave', 1, (client, args) =>
    client.run(COMMANDS.showSlave, requireArg(args, 'slave address')),
  ),
  'multiroom off': simple('Leave or dissolve the multiroom group', (client) => client.run(COMMANDS.ungroup)),
};

function phraseOf(words: string[]): string {
  return words
    .join(' ')
    .toLowerCase()
    .replace(/[-_]+/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Finds the longest leading run of words that names a command; the rest of
 * the words become its arguments.
 */
export function resolveCommand(words: string[]): ResolvedCommand | undefined {
  for (let split = words.length; split > 0; split--) {
    const phrase = phraseOf(words.slice(0, split));
    if (isKeyOf(CLI_COMMANDS, phrase)) {
      const command = CLI_COMMANDS[phrase];
      const args = words.slice(split);
      if (args.length > command.maxArgs) {
        throw new InvalidArgumentError(
          `'${phrase}' takes at most ${command.maxArgs} argument(s), got ${args.length}: ${args.join(' ')}`,
        );
      }
      return { phrase, command, args };
    }
  }
  return undefined;
}

export function formatResult(value: unknown): string {
  if (value === true) return 'OK';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value, null, 2);
}
