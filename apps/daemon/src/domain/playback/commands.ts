/**
 * Messages drained by the command dispatcher
 */

import type { PlayMode } from '@chorus/shared';

/**
 * Commands that arrive from the control surface
 */
export type PlayerCommand =
  | { readonly type: 'PLAY' }
  | { readonly type: 'PAUSE' }
  | { readonly type: 'NEXT' }
  | { readonly type: 'PREVIOUS' }
  | { readonly type: 'JUMP_TO'; readonly bvid: string }
  | { readonly type: 'STOP' }
  | { readonly type: 'SET_MODE'; readonly mode: PlayMode }
  | { readonly type: 'RELOAD_PLAYLIST' }
  | { readonly type: 'PLAYLIST_BECAME_EMPTY' };

/**
 * Messages the daemon posts to itself
 */
export type InternalMessage =
  | { readonly type: 'START' }
  | { readonly type: 'TRACK_FINISHED'; readonly generation: number }
  | { readonly type: 'PIPELINE_ERROR'; readonly generation: number; readonly message: string }
  | { readonly type: 'TRACK_UNPLAYABLE'; readonly generation: number };

export type DispatcherMessage = PlayerCommand | InternalMessage;

export function assertNever(value: never): never {
  throw new Error(`Unhandled dispatcher message: ${JSON.stringify(value)}`);
}
