import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { CLIENT_DEFAULTS } from './device/client.js';
import { DEFAULT_EQUALIZER_MODES } from './device/modes.js';
import { DEFAULT_TIMEOUT_MS } from './device/transport.js';
import { InvalidArgumentError } from './errors.js';

dotenv.config();

export interface Config {
  timeoutMs: number;
  commandIntervalMs: number;
  rebootDelayMs: number;
  quietRebootVolume: number;
  equalizerModes: Record<string, number>;
  devices: string[];
  defaultVolume?: number;
}

const fileConfigSchema = z
  .object({
    timeoutMs: z.number().int().positive(),
    commandIntervalMs: z.number().int().nonnegative(),
    rebootDelayMs: z.number().int().nonnegative(),
    quietRebootVolume: z.number().int().min(0).max(100),
    equalizerModes: z.record(z.string().min(1), z.number().int().nonnegative()),
    devices: z.array(z.string().min(1)),
    defaultVolume: z.number().int().min(0).max(100),
  })
  .partial()
  .strict();

type FileConfig = z.infer<typeof fileConfigSchema>;

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  configPath?: string;
}

export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.LINKPLAYCTL_CONFIG || join(homedir(), '.config', 'linkplayctl', 'config.json');
}

function loadFileConfig(configPath: string): FileConfig {
  if (!existsSync(configPath)) {
    return {};
  }
  let content: unknown;
  try {
    content = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new InvalidArgumentError(`Could not read config file '${configPath}'`, { cause: error });
  }
  const parsed = fileConfigSchema.safeParse(content);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new InvalidArgumentError(`Invalid config file '${configPath}': ${issues}`);
  }
  return parsed.data;
}

function envInteger(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const value = env[name];
  if (value === undefined || value === '') {
    return undefined;
  }
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer, not '${value}'`);
  }
  return parseInt(value, 10);
}

function envList(env: NodeJS.ProcessEnv, name: string): string[] | undefined {
  const value = env[name];
  if (!value) {
    return undefined;
  }
  return value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

export function loadConfig(options: LoadConfigOptions = {}): Config {
  const env = options.env ?? process.env;
  const fileConfig = loadFileConfig(options.configPath ?? defaultConfigPath(env));

  return {
    timeoutMs: envInteger(env, 'LINKPLAY_TIMEOUT_MS') ?? fileConfig.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    commandIntervalMs:
      envInteger(env, 'LINKPLAY_COMMAND_INTERVAL_MS') ??
      fileConfig.commandIntervalMs ??
      CLIENT_DEFAULTS.commandIntervalMs,
    rebootDelayMs:
      envInteger(env, 'LINKPLAY_REBOOT_DELAY_MS') ?? fileConfig.rebootDelayMs ?? CLIENT_DEFAULTS.rebootDelayMs,
    quietRebootVolume: fileConfig.quietRebootVolume ?? CLIENT_DEFAULTS.quietRebootVolume,
    equalizerModes: fileConfig.equalizerModes ?? { ...DEFAULT_EQUALIZER_MODES },
    devices: envList(env, 'LINKPLAY_DEVICES') ?? fileConfig.devices ?? [],
    defaultVolume: envInteger(env, 'LINKPLAY_DEFAULT_VOLUME') ?? fileConfig.defaultVolume,
  };
}
