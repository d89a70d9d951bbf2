/**
 * Daemon configuration from environment variables
 */

import * as os from 'os';
import * as path from 'path';
import type { LevelWithSilent } from 'pino';
import {
  ChorusPaths,
  ControlEndpoint,
  DEFAULT_MEDIA_API_CONFIG,
  MediaApiConfig,
  resolveControlEndpoint,
  resolvePaths
} from '@chorus/shared';
import { MpvOptions, RetryPolicy } from '../../domain/playback/types';
import { DEFAULT_RETRY_POLICY } from '../playback/StreamResolver';

export class DaemonConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DaemonConfigError';
  }
}

export interface DaemonConfig {
  readonly paths: ChorusPaths;
  readonly control: ControlEndpoint;
  readonly logLevel: LevelWithSilent;
  readonly mpv: MpvOptions;
  readonly audioDevice: string;
  readonly mediaApi: MediaApiConfig;
  readonly retry: RetryPolicy;
  /** Commands buffered before control requests wait for the dispatcher */
  readonly commandCapacity: number;
  readonly skipUnplayable: boolean;
}

type Env = Record<string, string | undefined>;

const LOG_LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function readString(env: Env, name: string, fallback: string): string {
  const value = env[name]?.trim();
  return value ? value : fallback;
}

function readInteger(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new DaemonConfigError(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) {
    return fallback;
  }
  if (['1', 'true', 'yes', 'on'].includes(raw)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(raw)) {
    return false;
  }
  throw new DaemonConfigError(`${name} must be a boolean, got "${raw}"`);
}

function readLogLevel(env: Env): LevelWithSilent {
  const raw = readString(env, 'CHORUS_LOG_LEVEL', 'info').toLowerCase();
  const level = LOG_LEVELS.find(candidate => candidate === raw);
  if (!level) {
    throw new DaemonConfigError(`CHORUS_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${raw}"`);
  }
  return level;
}

/**
 * Load the daemon configuration; throws DaemonConfigError on values that
 * cannot be used
 */
export function loadDaemonConfig(env: Env = process.env): DaemonConfig {
  const retry: RetryPolicy = {
    ...DEFAULT_RETRY_POLICY,
    maxAttempts: readInteger(env, 'CHORUS_RESOLVE_RETRIES', DEFAULT_RETRY_POLICY.maxAttempts, 1),
    initialDelayMs: readInteger(env, 'CHORUS_RESOLVE_DELAY_MS', DEFAULT_RETRY_POLICY.initialDelayMs, 0)
  };

  if (retry.maxAttempts > 10) {
    console.warn(`CHORUS_RESOLVE_RETRIES ${retry.maxAttempts} is high; an unplayable track blocks commands while it retries`);
  }
  if (retry.initialDelayMs > 10000) {
    console.warn(`CHORUS_RESOLVE_DELAY_MS ${retry.initialDelayMs}ms is outside the recommended range (0-10000ms)`);
  }

  const commandCapacity = readInteger(env, 'CHORUS_COMMAND_CAPACITY', 1, 1);
  if (commandCapacity > 64) {
    console.warn(`CHORUS_COMMAND_CAPACITY ${commandCapacity} is unusually large`);
  }

  const mediaApi: MediaApiConfig = {
    ...DEFAULT_MEDIA_API_CONFIG,
    baseUrl: readString(env, 'CHORUS_API_BASE_URL', DEFAULT_MEDIA_API_CONFIG.baseUrl),
    userAgent: readString(env, 'CHORUS_USER_AGENT', DEFAULT_MEDIA_API_CONFIG.userAgent),
    referer: readString(env, 'CHORUS_REFERER', DEFAULT_MEDIA_API_CONFIG.referer)
  };

  return {
    paths: resolvePaths(env),
    control: resolveControlEndpoint(env),
    logLevel: readLogLevel(env),
    mpv: {
      executable: readString(env, 'CHORUS_MPV_PATH', 'mpv'),
      socketPath: readString(env, 'CHORUS_MPV_SOCKET', path.join(os.tmpdir(), 'chorus-mpv.sock')),
      volume: 100
    },
    audioDevice: readString(env, 'CHORUS_AUDIO_DEVICE', 'auto'),
    mediaApi,
    retry,
    commandCapacity,
    skipUnplayable: readBoolean(env, 'CHORUS_SKIP_UNPLAYABLE', true)
  };
}
