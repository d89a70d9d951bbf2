/**
 * On-disk layout and control endpoint shared by the daemon and the CLI
 */

import * as os from 'os';
import * as path from 'path';

export const DEFAULT_CONTROL_HOST = '127.0.0.1';
export const DEFAULT_CONTROL_PORT = 47291;

export interface ChorusPaths {
  readonly home: string;
  readonly logsDir: string;
  readonly playlistsDir: string;
  readonly playlistFile: string;
}

export interface ControlEndpoint {
  readonly host: string;
  readonly port: number;
}

type Env = Record<string, string | undefined>;

export function resolvePaths(env: Env = process.env): ChorusPaths {
  const configured = env.CHORUS_HOME?.trim();
  const home = configured ? path.resolve(configured) : path.join(os.homedir(), '.config', 'chorus');
  const playlistsDir = path.join(home, 'playlists');

  return {
    home,
    logsDir: path.join(home, 'logs'),
    playlistsDir,
    playlistFile: path.join(playlistsDir, 'playlist.toml')
  };
}

/**
 * Host and port of the daemon's control surface. An unparseable port falls
 * back to the default.
 */
export function resolveControlEndpoint(env: Env = process.env): ControlEndpoint {
  const host = env.CHORUS_CONTROL_HOST?.trim() || DEFAULT_CONTROL_HOST;
  const port = parseInt(env.CHORUS_CONTROL_PORT ?? '', 10);

  return {
    host,
    port: Number.isInteger(port) && port > 0 && port < 65536 ? port : DEFAULT_CONTROL_PORT
  };
}
