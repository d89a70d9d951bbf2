/**
 * Error types shared by the daemon and the command-line client
 */

import type { TrackError } from './Track';
import type { PlayModeError } from './PlayMode';

export type { TrackError, PlayModeError };

/**
 * Playlist persistence and navigation error types
 */
export type PlaylistError =
  | 'IO_ERROR'
  | 'DATA_PARSING'
  | 'EMPTY_PLAYLIST'
  | 'INDEX_OUT_OF_BOUNDS'
  | 'PLAYLIST_EMPTY';

/**
 * Remote metadata API error types
 */
export type MediaApiError =
  | 'NETWORK_ERROR'
  | 'HTTP_ERROR'
  | 'DATA_PARSING'
  | 'NOT_FOUND';

/**
 * Error details with context information
 */
export interface ErrorDetails {
  code: string;
  message: string;
  context?: Record<string, unknown> | undefined;
  suggestion?: string | undefined;
}

/**
 * Error factory for creating consistent error descriptions
 */
export class ErrorFactory {
  static createPlaylistError(error: PlaylistError, context?: Record<string, unknown> | undefined): ErrorDetails {
    const messages: Record<PlaylistError, string> = {
      IO_ERROR: 'The playlist file could not be read or written',
      DATA_PARSING: 'The playlist file is not a valid track list',
      EMPTY_PLAYLIST: 'The playlist file contains no tracks',
      INDEX_OUT_OF_BOUNDS: 'The playlist cursor points past the end of the list',
      PLAYLIST_EMPTY: 'There are no tracks to navigate'
    };

    const suggestions: Record<PlaylistError, string> = {
      IO_ERROR: 'Check that the playlist directory exists and is writable',
      DATA_PARSING: 'Fix or delete the playlist file, then add tracks again',
      EMPTY_PLAYLIST: 'Add tracks with `chorus add -b <bvid>` or `chorus add -f <fid>`',
      INDEX_OUT_OF_BOUNDS: 'Reload the playlist',
      PLAYLIST_EMPTY: 'Add tracks to the playlist first'
    };

    return {
      code: error,
      message: messages[error],
      context: context || undefined,
      suggestion: suggestions[error]
    };
  }

  static createMediaApiError(error: MediaApiError, context?: Record<string, unknown> | undefined): ErrorDetails {
    const messages: Record<MediaApiError, string> = {
      NETWORK_ERROR: 'The metadata API could not be reached',
      HTTP_ERROR: 'The metadata API answered with an error status',
      DATA_PARSING: 'The metadata API response had an unexpected shape',
      NOT_FOUND: 'The requested resource does not exist or is not accessible'
    };

    return {
      code: error,
      message: messages[error],
      context: context || undefined,
      suggestion: error === 'NETWORK_ERROR' ? 'Check your internet connection and try again' : 'Check the id and try again'
    };
  }

  static createPlayModeError(error: PlayModeError, context?: Record<string, unknown> | undefined): ErrorDetails {
    return {
      code: error,
      message: 'Unknown play mode',
      context: context || undefined,
      suggestion: 'Use one of Loop, Shuffle or SingleRepeat'
    };
  }
}
