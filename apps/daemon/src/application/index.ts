/**
 * Application layer exports
 * Playlist sequencing, the playback engine and the command dispatcher
 */

export { PlaylistStore } from './PlaylistStore';
export type { PlaylistSnapshot, ReloadOutcome } from './PlaylistStore';
export { PlaybackEngine } from './PlaybackEngine';
export type { PlaybackEngineOptions } from './PlaybackEngine';
export { CommandDispatcher } from './CommandDispatcher';
export type { CommandDispatcherOptions } from './CommandDispatcher';
