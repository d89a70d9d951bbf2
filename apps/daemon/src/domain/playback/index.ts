/**
 * Playback control core domain exports
 */

// Core types
export type {
  PipelineState,
  SourceElement,
  DecodeGraph,
  BusMessage,
  BusListener,
  EngineSignal,
  EngineSignalListener,
  ResolvedStream,
  RetryPolicy,
  MpvOptions,
  MPVArgument,
  MPVCommand,
  MPVResponse,
  MPVEvent,
  IPCEventListener,
  ProcessExitListener,
  SpawnedProcess,
  SpawnProcess
} from './types';

// Error types
export type {
  ResolutionError,
  ResolutionAttemptError,
  PipelineError,
  ProcessError,
  EngineError,
  PlaybackErrorDetails
} from './errors';

export { PlaybackErrorFactory, isPipelineError } from './errors';

// Interfaces
export type {
  IStreamResolver,
  IMediaPipeline,
  IPlaybackEngine,
  IIPCClient,
  IProcessManager
} from './interfaces';

// Dispatcher messages
export type { PlayerCommand, InternalMessage, DispatcherMessage } from './commands';
export { assertNever } from './commands';
