/**
 * HTTP client for the daemon's control surface
 */

import {
  CONTROL_ROUTES,
  ControlEndpoint,
  ControlRoute,
  PlayMode,
  PlayTrackRequest,
  PlayerStatus,
  Result,
  SetModeRequest,
  TrackValidator,
  isPlayMode,
} from '@chorus/shared';

export type PlayerClientErrorCode = 'DAEMON_UNREACHABLE' | 'TIMEOUT' | 'REJECTED' | 'BAD_RESPONSE';

export interface PlayerClientError {
  code: PlayerClientErrorCode;
  message: string;
}

type CommandBody = PlayTrackRequest | SetModeRequest;

export interface PlayerClientConfig extends ControlEndpoint {
  timeoutMs: number;
}

export interface IPlayerClient {
  isRunning(): Promise<boolean>;
  status(): Promise<Result<PlayerStatus, PlayerClientError>>;
  play(): Promise<Result<void, PlayerClientError>>;
  playTrack(bvid: string): Promise<Result<void, PlayerClientError>>;
  pause(): Promise<Result<void, PlayerClientError>>;
  next(): Promise<Result<void, PlayerClientError>>;
  previous(): Promise<Result<void, PlayerClientError>>;
  stop(): Promise<Result<void, PlayerClientError>>;
  setMode(mode: PlayMode): Promise<Result<void, PlayerClientError>>;
  playlistChanged(): Promise<Result<void, PlayerClientError>>;
  playlistIsEmpty(): Promise<Result<void, PlayerClientError>>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseStatus(data: unknown): PlayerStatus | null {
  if (!isRecord(data)) return null;
  const { state, mode, cursor, trackCount, currentTrack, idle } = data;
  if (
    (state !== 'NULL' && state !== 'READY' && state !== 'PAUSED' && state !== 'PLAYING') ||
    !isPlayMode(mode) ||
    typeof cursor !== 'number' ||
    typeof trackCount !== 'number' ||
    typeof idle !== 'boolean'
  ) {
    return null;
  }

  let track: PlayerStatus['currentTrack'] = null;
  if (isRecord(currentTrack)) {
    const created = TrackValidator.create({
      bvid: currentTrack.bvid,
      cid: currentTrack.cid,
      title: currentTrack.title,
      owner: currentTrack.owner,
    });
    if (!created.success) return null;
    track = created.value;
  }

  return { state, mode, cursor, trackCount, currentTrack: track, idle };
}

export class PlayerClient implements IPlayerClient {
  private readonly config: PlayerClientConfig;

  constructor(config: Partial<PlayerClientConfig> & ControlEndpoint) {
    this.config = {
      timeoutMs: 3000,
      ...config,
    };
  }

  getBaseUrl(): string {
    return `http://${this.config.host}:${this.config.port}`;
  }

  async isRunning(): Promise<boolean> {
    const response = await this.request('GET', CONTROL_ROUTES.TEST_CONNECTION);
    return response.success;
  }

  async status(): Promise<Result<PlayerStatus, PlayerClientError>> {
    const response = await this.request('GET', CONTROL_ROUTES.STATUS);
    if (!response.success) {
      return response;
    }
    const status = parseStatus(response.value);
    if (!status) {
      return { success: false, error: { code: 'BAD_RESPONSE', message: 'Daemon sent an unexpected status' } };
    }
    return { success: true, value: status };
  }

  play(): Promise<Result<void, PlayerClientError>> {
    return this.command(CONTROL_ROUTES.PLAY);
  }

  playTrack(bvid: string): Promise<Result<void, PlayerClientError>> {
    return this.command(CONTROL_ROUTES.PLAY_TRACK, { bvid });
  }

  pause(): Promise<Result<void, PlayerClientError>> {
    return this.command(CONTROL_ROUTES.PAUSE);
  }

  next(): Promise<Result<void, PlayerClientError>> {
    return this.command(CONTROL_ROUTES.NEXT);
  }

  previous(): Promise<Result<void, PlayerClientError>> {
    return this.command(CONTROL_ROUTES.PREVIOUS);
  }

  stop(): Promise<Result<void, PlayerClientError>> {
    return this.command(CONTROL_ROUTES.STOP);
  }

  setMode(mode: PlayMode): Promise<Result<void, PlayerClientError>> {
    return this.command(CONTROL_ROUTES.MODE, { mode });
  }

  playlistChanged(): Promise<Result<void, PlayerClientError>> {
    return this.command(CONTROL_ROUTES.PLAYLIST_CHANGE);
  }

  playlistIsEmpty(): Promise<Result<void, PlayerClientError>> {
    return this.command(CONTROL_ROUTES.PLAYLIST_IS_EMPTY);
  }

  private async command(route: ControlRoute, body?: CommandBody): Promise<Result<void, PlayerClientError>> {
    const response = await this.request('POST', route, body);
    if (!response.success) {
      return response;
    }
    return { success: true, value: undefined };
  }

  /**
   * Send one request and unwrap the response envelope. Bodyless requests
   * carry no content type, which the server would reject as empty JSON.
   */
  private async request(
    method: 'GET' | 'POST',
    route: ControlRoute,
    body?: CommandBody
  ): Promise<Result<unknown, PlayerClientError>> {
    const init: RequestInit = { method, signal: AbortSignal.timeout(this.config.timeoutMs) };
    if (body !== undefined) {
      init.headers = { 'Content-Type': 'application/json' };
      init.body = JSON.stringify(body);
    }

    let response: Response;
    try {
      response = await fetch(`${this.getBaseUrl()}${route}`, init);
    } catch (error) {
      if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        return { success: false, error: { code: 'TIMEOUT', message: 'Daemon did not answer in time' } };
      }
      return { success: false, error: { code: 'DAEMON_UNREACHABLE', message: 'Daemon is not running' } };
    }

    let envelope: unknown;
    try {
      envelope = await response.json();
    } catch {
      return { success: false, error: { code: 'BAD_RESPONSE', message: `Unreadable response (HTTP ${response.status})` } };
    }

    if (!isRecord(envelope) || typeof envelope.success !== 'boolean') {
      return { success: false, error: { code: 'BAD_RESPONSE', message: `Unexpected response (HTTP ${response.status})` } };
    }

    if (!envelope.success) {
      const message = isRecord(envelope.error) && typeof envelope.error.message === 'string'
        ? envelope.error.message
        : `Request failed (HTTP ${response.status})`;
      return { success: false, error: { code: 'REJECTED', message } };
    }

    return { success: true, value: envelope.data };
  }
}
