/**
 * Shared types and contracts for the playback daemon and its command-line client
 *
 * This package contains the domain types, the playlist file codec, the remote
 * metadata API client and the control-surface wire types.
 */

// Domain entities and value objects
export type { Track, TrackCreateData, TrackError, Result } from './domain/Track';
export { TrackValidator, BvidUtils } from './domain/Track';

export type { PlayMode, PlayModeError } from './domain/PlayMode';
export { PLAY_MODES, isPlayMode, parsePlayMode } from './domain/PlayMode';

// Error types and utilities
export type { PlaylistError, MediaApiError, ErrorDetails } from './domain/errors';
export { ErrorFactory } from './domain/errors';

// Persistence
export type { PlaylistParseError } from './playlist/PlaylistFile';
export { PlaylistFile } from './playlist/PlaylistFile';

// Remote metadata API
export type { MediaApiConfig, VideoInfo, IMediaApi, ICatalogApi } from './api/MediaApiClient';
export { MediaApiClient, DEFAULT_MEDIA_API_CONFIG } from './api/MediaApiClient';

// Configuration
export type { ChorusPaths, ControlEndpoint } from './config/paths';
export { resolvePaths, resolveControlEndpoint, DEFAULT_CONTROL_HOST, DEFAULT_CONTROL_PORT } from './config/paths';

// Control surface protocol
export type {
  PipelineState,
  ControlRoute,
  APIError,
  APIResponse,
  ConnectionInfo,
  CommandAck,
  PlayerStatus,
  SetModeRequest,
  PlayTrackRequest
} from './protocol/control';
export { CONTROL_ROUTES } from './protocol/control';
