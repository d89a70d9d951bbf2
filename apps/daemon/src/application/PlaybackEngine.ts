/**
 * PlaybackEngine: owns the media pipeline and plays one track at a time
 *
 * Every playTrack call starts a new generation. Bus messages are translated
 * into signals tagged with the generation of the graph that produced them,
 * so the dispatcher can tell a stale end-of-stream from a current one.
 */

import { EventEmitter } from 'events';
import type { Logger } from 'pino';
import { Result, Track } from '@chorus/shared';
import { IMediaPipeline, IPlaybackEngine, IStreamResolver } from '../domain/playback/interfaces';
import {
  BusMessage,
  DecodeGraph,
  EngineSignal,
  EngineSignalListener,
  PipelineState
} from '../domain/playback/types';
import { EngineError, PipelineError, PlaybackErrorFactory } from '../domain/playback/errors';

export interface PlaybackEngineOptions {
  /** Output device handed to the sink, `auto` for the system default */
  readonly audioDevice: string;
  readonly sampleRate?: number;
  readonly sampleFormat?: string;
}

export class PlaybackEngine extends EventEmitter implements IPlaybackEngine {
  private generation = 0;
  private attachedGeneration: number | null = null;

  constructor(
    private readonly pipeline: IMediaPipeline,
    private readonly resolver: IStreamResolver,
    private readonly options: PlaybackEngineOptions,
    private readonly logger: Logger
  ) {
    super();
    this.pipeline.addBusListener(this.handleBusMessage);
  }

  async playTrack(track: Track): Promise<Result<void, EngineError>> {
    const generation = ++this.generation;
    this.attachedGeneration = null;
    const log = this.logger.child({ bvid: track.bvid, generation });

    const flushed = await this.pipeline.setState('NULL');
    if (!flushed.success) {
      return this.fail(flushed.error, log);
    }

    const removed = await this.pipeline.removeAll();
    if (!removed.success) {
      return this.fail(removed.error, log);
    }

    const ready = await this.pipeline.setState('READY');
    if (!ready.success) {
      return this.fail(ready.error, log);
    }

    const stream = await this.resolver.resolve(track.bvid, track.cid);
    if (!stream.success) {
      log.warn(PlaybackErrorFactory.createResolutionError(stream.error), 'Could not resolve a stream for the track');
      return stream;
    }

    const graph: DecodeGraph = {
      source: { location: stream.value.url, headers: stream.value.headers },
      convert: { format: this.options.sampleFormat },
      resample: { sampleRate: this.options.sampleRate },
      sink: { device: this.options.audioDevice }
    };

    const attached = await this.pipeline.attach(graph);
    if (!attached.success) {
      return this.fail(attached.error, log);
    }
    this.attachedGeneration = generation;

    const playing = await this.pipeline.setState('PLAYING');
    if (!playing.success) {
      return this.fail(playing.error, log);
    }

    log.info({ title: track.title, attempts: stream.value.attempts }, 'Playing track');
    return { success: true, value: undefined };
  }

  async setState(state: PipelineState): Promise<Result<void, PipelineError>> {
    if ((state === 'PLAYING' || state === 'PAUSED') && !this.pipeline.hasGraph()) {
      return { success: false, error: 'PIPELINE_STATE' };
    }

    const result = await this.pipeline.setState(state);
    if (state === 'NULL') {
      this.attachedGeneration = null;
    }
    return result;
  }

  getState(): PipelineState {
    return this.pipeline.getState();
  }

  isLoaded(): boolean {
    return this.pipeline.hasGraph();
  }

  getGeneration(): number {
    return this.generation;
  }

  addSignalListener(listener: EngineSignalListener): void {
    this.on('signal', listener);
  }

  removeSignalListener(listener: EngineSignalListener): void {
    this.off('signal', listener);
  }

  async shutdown(): Promise<void> {
    this.pipeline.removeBusListener(this.handleBusMessage);
    this.attachedGeneration = null;
    await this.pipeline.shutdown();
    this.removeAllListeners();
  }

  /**
   * Tear the half-built graph down so the engine rests in NULL
   */
  private async fail(error: PipelineError, log: Logger): Promise<Result<void, EngineError>> {
    log.error(PlaybackErrorFactory.createPipelineError(error), 'Pipeline failed while starting a track');
    this.attachedGeneration = null;
    const teardown = await this.pipeline.setState('NULL');
    if (!teardown.success) {
      log.error({ error: teardown.error }, 'Pipeline teardown failed');
    }
    return { success: false, error };
  }

  private emitSignal(signal: EngineSignal): void {
    this.emit('signal', signal);
  }

  private readonly handleBusMessage = (message: BusMessage): void => {
    const generation = this.attachedGeneration;
    if (generation === null) {
      return;
    }

    // one signal per graph
    this.attachedGeneration = null;
    switch (message.type) {
      case 'EOS':
        this.emitSignal({ type: 'TRACK_FINISHED', generation });
        return;
      case 'ERROR':
        this.logger.error({ generation, message: message.message }, 'Pipeline reported an error');
        this.emitSignal({ type: 'PIPELINE_ERROR', generation, message: message.message });
        return;
    }
  };
}
