/**
 * Core interfaces for the playback control core
 * Following clean architecture principles with ports & adapters pattern
 */

import type { Result, Track } from '@chorus/shared';
import {
  PipelineState,
  DecodeGraph,
  BusListener,
  EngineSignalListener,
  ResolvedStream,
  MpvOptions,
  MPVCommand,
  MPVResponse,
  IPCEventListener,
  ProcessExitListener
} from './types';
import {
  ResolutionError,
  PipelineError,
  ProcessError,
  EngineError
} from './errors';

/**
 * Turns a track identifier pair into a verified playable URL
 */
export interface IStreamResolver {
  resolve(bvid: string, cid: string): Promise<Result<ResolvedStream, ResolutionError>>;

  /**
   * Partial-range probe of a candidate URL; true on a 2xx answer
   */
  validateStream(streamUrl: string): Promise<boolean>;
}

/**
 * External media pipeline driven through its lifecycle states.
 * NULL → READY → PLAYING ⇄ PAUSED, any state → NULL.
 */
export interface IMediaPipeline {
  setState(state: PipelineState): Promise<Result<void, PipelineError>>;

  getState(): PipelineState;

  /**
   * Remove every decode-graph element so a fresh graph can be attached
   */
  removeAll(): Promise<Result<void, PipelineError>>;

  /**
   * Wire and link a fresh decode graph
   */
  attach(graph: DecodeGraph): Promise<Result<void, PipelineError>>;

  hasGraph(): boolean;

  addBusListener(listener: BusListener): void;

  removeBusListener(listener: BusListener): void;

  /**
   * Release the engine and everything it holds
   */
  shutdown(): Promise<void>;
}

/**
 * Owns the pipeline and plays one track at a time
 */
export interface IPlaybackEngine {
  /**
   * Flush, rebuild the decode graph for `track` and start playing it
   */
  playTrack(track: Track): Promise<Result<void, EngineError>>;

  /**
   * Direct transition without rebuilding the graph
   */
  setState(state: PipelineState): Promise<Result<void, PipelineError>>;

  getState(): PipelineState;

  /**
   * Whether a decode graph is attached, i.e. there is something to resume
   */
  isLoaded(): boolean;

  /**
   * Number of play_track calls so far; tags every signal
   */
  getGeneration(): number;

  addSignalListener(listener: EngineSignalListener): void;

  removeSignalListener(listener: EngineSignalListener): void;
}

/**
 * IPC client interface for MPV communication
 */
export interface IIPCClient {
  connect(socketPath: string): Promise<void>;

  disconnect(): Promise<void>;

  sendCommand(command: MPVCommand): Promise<MPVResponse>;

  isConnected(): boolean;

  /**
   * Listen for asynchronous MPV events (messages without a request id)
   */
  addEventListener(listener: IPCEventListener): void;

  removeEventListener(listener: IPCEventListener): void;
}

/**
 * Process manager interface for the media engine lifecycle
 */
export interface IProcessManager {
  /**
   * Start MPV; resolves with the pid once the process survived startup
   */
  startMpv(options: MpvOptions): Promise<Result<number, ProcessError>>;

  stopMpv(): Promise<Result<void, ProcessError>>;

  restartMpv(): Promise<Result<number, ProcessError>>;

  isRunning(): boolean;

  /**
   * Notified when the process exits without stopMpv having been called
   */
  addExitListener(listener: ProcessExitListener): void;

  removeExitListener(listener: ProcessExitListener): void;

  cleanup(): Promise<void>;
}
