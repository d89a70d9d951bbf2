/**
 * Error types for the playback control core
 */

import type { MediaApiError } from '@chorus/shared';

/**
 * Terminal stream resolution failure, raised once the retry budget is spent
 */
export type ResolutionError = 'FETCH_EXHAUSTED';

/**
 * Failure of a single resolution attempt
 */
export type ResolutionAttemptError = MediaApiError | 'STREAM_UNVERIFIED';

/**
 * Media pipeline error types
 */
export type PipelineError =
  | 'PIPELINE_STATE'
  | 'PIPELINE_ELEMENT'
  | 'PIPELINE_LINK'
  | 'ENGINE_UNAVAILABLE';

/**
 * External process error types
 */
export type ProcessError =
  | 'PROCESS_START_FAILED'
  | 'DEPENDENCY_MISSING'
  | 'PROCESS_CRASHED';

/**
 * Errors play_track can report
 */
export type EngineError = ResolutionError | PipelineError;

const PIPELINE_ERRORS: readonly PipelineError[] = ['PIPELINE_STATE', 'PIPELINE_ELEMENT', 'PIPELINE_LINK', 'ENGINE_UNAVAILABLE'];

export function isPipelineError(error: string): error is PipelineError {
  return PIPELINE_ERRORS.some(candidate => candidate === error);
}

/**
 * Error details with context information
 * Consistent with the error pattern of the shared package
 */
export interface PlaybackErrorDetails {
  readonly code: string;
  readonly message: string;
  readonly context?: Record<string, unknown>;
  readonly suggestion?: string;
}

/**
 * Error factory for creating consistent playback error descriptions
 */
export class PlaybackErrorFactory {
  static createResolutionError(error: ResolutionError, context?: Record<string, unknown>): PlaybackErrorDetails {
    return {
      code: error,
      message: 'No verified stream URL could be obtained for the track',
      context,
      suggestion: 'The track may be region-restricted or removed; it will be skipped when skipping is enabled'
    };
  }

  static createPipelineError(error: PipelineError, context?: Record<string, unknown>): PlaybackErrorDetails {
    const messages: Record<PipelineError, string> = {
      PIPELINE_STATE: 'The media pipeline refused the state change',
      PIPELINE_ELEMENT: 'A decode graph element could not be configured',
      PIPELINE_LINK: 'The decode graph could not be linked to the stream',
      ENGINE_UNAVAILABLE: 'The media engine is not running or not responding'
    };

    const suggestions: Record<PipelineError, string> = {
      PIPELINE_STATE: 'Load a track before resuming or pausing',
      PIPELINE_ELEMENT: 'Check the audio device and format settings',
      PIPELINE_LINK: 'The track will be retried on the next play command',
      ENGINE_UNAVAILABLE: 'The media engine will be restarted on the next command'
    };

    return {
      code: error,
      message: messages[error],
      context,
      suggestion: suggestions[error]
    };
  }

  static createProcessError(error: ProcessError, context?: Record<string, unknown>): PlaybackErrorDetails {
    const messages: Record<ProcessError, string> = {
      PROCESS_START_FAILED: 'Failed to start the media engine process',
      DEPENDENCY_MISSING: 'The media engine executable is missing',
      PROCESS_CRASHED: 'The media engine process exited unexpectedly'
    };

    const suggestions: Record<ProcessError, string> = {
      PROCESS_START_FAILED: 'Check system resources and the CHORUS_MPV_PATH setting',
      DEPENDENCY_MISSING: 'Install mpv or point CHORUS_MPV_PATH at it',
      PROCESS_CRASHED: 'The process will be restarted automatically'
    };

    return {
      code: error,
      message: messages[error],
      context,
      suggestion: suggestions[error]
    };
  }

  static createEngineError(error: EngineError, context?: Record<string, unknown>): PlaybackErrorDetails {
    if (isPipelineError(error)) {
      return this.createPipelineError(error, context);
    }
    return this.createResolutionError(error, context);
  }
}
