/** Wire values the firmware uses for its closed settings. */

export type ModeTable = Readonly<Record<string, number | string>>;

export const DEFAULT_EQUALIZER_MODES: Readonly<Record<string, number>> = {
  off: 0,
  classical: 1,
  pop: 2,
  jazz: 3,
  vocal: 4,
};

export const PLAYER_MODES = {
  none: 0,
  airplay: 1,
  dlna: 2,
  wiimu: 10,
  'wiimu-local': 11,
  'wiimu-station': 12,
  'wiimu-radio': 13,
  'wiimu-songlist': 14,
  'wiimu-max': 19,
  http: 20,
  'http-local': 21,
  'http-max': 29,
  alarm: 30,
  'line-in': 40,
  bluetooth: 41,
  'ext-local': 42,
  optical: 43,
  'line-in-max': 49,
  mirror: 50,
  talk: 60,
  slave: 99,
} as const satisfies ModeTable;

export type PlayerMode = keyof typeof PLAYER_MODES;

// Shuffle and repeat share one firmware setting; there is no "repeat one" with shuffle.
export const LOOP_MODES = {
  'repeat:off:shuffle:off': -1,
  'repeat:all:shuffle:off': 0,
  'repeat:one:shuffle:off': 1,
  'repeat:off:shuffle:on': 3,
  'repeat:all:shuffle:on': 2,
} as const satisfies ModeTable;

export type LoopMode = keyof typeof LOOP_MODES;
export type RepeatSetting = 'off' | 'all' | 'one';
export type ShuffleSetting = 'off' | 'on';

export function loopModeName(repeat: RepeatSetting, shuffle: ShuffleSetting): LoopMode | undefined {
  const name = `repeat:${repeat}:shuffle:${shuffle}`;
  return isKeyOf(LOOP_MODES, name) ? name : undefined;
}

export function splitLoopMode(mode: LoopMode): { repeat: RepeatSetting; shuffle: ShuffleSetting } {
  const [, repeat, , shuffle] = mode.split(':');
  return {
    repeat: repeat === 'all' || repeat === 'one' ? repeat : 'off',
    shuffle: shuffle === 'on' ? 'on' : 'off',
  };
}

export const WIFI_STATES = {
  connecting: 'PROCESS',
  'error-password': 'PAIRFAIL',
  disconnected: 'FAIL',
  connected: 'ok',
} as const satisfies ModeTable;

export type WifiState = keyof typeof WIFI_STATES;

export const AUTH_TYPES = {
  off: 0,
  psk: 1,
} as const satisfies ModeTable;

export type AuthType = keyof typeof AUTH_TYPES;

export function isKeyOf<T extends object>(table: T, key: string): key is Extract<keyof T, string> {
  return Object.prototype.hasOwnProperty.call(table, key);
}
