/**
 * Wire contract of the daemon's control surface
 */

import type { Track } from '../domain/Track';
import type { PlayMode } from '../domain/PlayMode';

/**
 * Lifecycle states of the media pipeline
 */
export type PipelineState = 'NULL' | 'READY' | 'PAUSED' | 'PLAYING';

export const CONTROL_ROUTES = {
  TEST_CONNECTION: '/player/test-connection',
  STATUS: '/player/status',
  PLAY: '/player/play',
  PLAY_TRACK: '/player/play-track',
  PAUSE: '/player/pause',
  NEXT: '/player/next',
  PREVIOUS: '/player/previous',
  STOP: '/player/stop',
  MODE: '/player/mode',
  PLAYLIST_CHANGE: '/player/playlist-change',
  PLAYLIST_IS_EMPTY: '/player/playlist-is-empty'
} as const;

export type ControlRoute = typeof CONTROL_ROUTES[keyof typeof CONTROL_ROUTES];

/**
 * Standard API error format
 */
export interface APIError {
  code: string;
  message: string;
  details?: unknown;
  timestamp?: string;
}

/**
 * Standard API response envelope
 */
export interface APIResponse<T> {
  success: boolean;
  data?: T;
  error?: APIError;
  timestamp: string;
}

export interface ConnectionInfo {
  alive: true;
  pid: number;
}

/**
 * Acknowledgement that a command was queued for the dispatcher
 */
export interface CommandAck {
  accepted: string;
}

export interface PlayerStatus {
  state: PipelineState;
  mode: PlayMode;
  cursor: number;
  trackCount: number;
  currentTrack: Track | null;
  idle: boolean;
}

export interface SetModeRequest {
  mode: string;
}

export interface PlayTrackRequest {
  bvid: string;
}
