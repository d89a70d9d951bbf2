/**
 * Core types for the playback control core
 */

import type { EventEmitter } from 'events';
import type { Readable } from 'stream';
import type { SpawnOptions } from 'child_process';
import type { PipelineState } from '@chorus/shared';

export type { PipelineState };

/**
 * Source element: where the stream comes from and the request headers the
 * host requires
 */
export interface SourceElement {
  readonly location: string;
  readonly headers: Readonly<Record<string, string>>;
}

/**
 * Decode graph wired for a single track:
 * source → decode → convert → resample → sink
 */
export interface DecodeGraph {
  readonly source: SourceElement;
  readonly convert: { readonly format?: string };
  readonly resample: { readonly sampleRate?: number };
  readonly sink: { readonly device: string };
}

/**
 * Messages posted on the pipeline bus
 */
export type BusMessage =
  | { readonly type: 'EOS' }
  | { readonly type: 'ERROR'; readonly message: string };

export type BusListener = (message: BusMessage) => void;

/**
 * Signals the playback engine raises for the dispatcher. `generation`
 * identifies the play_track call whose graph produced the signal.
 */
export type EngineSignal =
  | { readonly type: 'TRACK_FINISHED'; readonly generation: number }
  | { readonly type: 'PIPELINE_ERROR'; readonly generation: number; readonly message: string };

export type EngineSignalListener = (signal: EngineSignal) => void;

/**
 * A verified, short-lived stream URL together with the headers it must be
 * requested with. Never cached.
 */
export interface ResolvedStream {
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly attempts: number;
}

/**
 * Backoff schedule for stream resolution
 */
export interface RetryPolicy {
  readonly maxAttempts: number;
  readonly initialDelayMs: number;
  readonly multiplier: number;
  readonly maxDelayMs?: number;
}

/**
 * MPV player configuration
 */
export interface MpvOptions {
  readonly executable: string;
  readonly socketPath: string;
  readonly volume: number;
}

export type MPVArgument = string | number | boolean | readonly string[];

/**
 * MPV IPC command structure
 */
export interface MPVCommand {
  readonly command: readonly MPVArgument[];
  readonly request_id?: number;
}

/**
 * MPV IPC response structure
 */
export interface MPVResponse {
  readonly data?: unknown;
  readonly error: string;
  readonly request_id?: number;
}

/**
 * Asynchronous MPV event, e.g. `{ "event": "end-file", "reason": "eof" }`
 */
export interface MPVEvent {
  readonly event: string;
  readonly reason?: string;
  readonly file_error?: string;
  readonly [key: string]: unknown;
}

/**
 * IPC event listener function type
 */
export type IPCEventListener = (event: MPVEvent) => void;

export type ProcessExitListener = (code: number | null, signal: NodeJS.Signals | null) => void;

/**
 * The part of a spawned child process the process manager relies on
 */
export interface SpawnedProcess extends EventEmitter {
  readonly pid?: number;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  readonly killed: boolean;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnProcess = (command: string, args: readonly string[], options: SpawnOptions) => SpawnedProcess;
