/**
 * MpvPipeline: the media pipeline backed by an mpv process driven over IPC
 *
 * The decode graph maps onto mpv properties: the source headers become
 * user-agent, referrer and http-header-fields, the sink becomes
 * audio-device, convert/resample become audio-format/audio-samplerate.
 * Linking is `loadfile`. PAUSED and PLAYING toggle the pause property.
 */

import { EventEmitter } from 'events';
import type { Logger } from 'pino';
import { Result } from '@chorus/shared';
import { IIPCClient, IMediaPipeline, IProcessManager } from '../../domain/playback/interfaces';
import {
  BusListener,
  BusMessage,
  DecodeGraph,
  MPVArgument,
  MPVEvent,
  MpvOptions,
  PipelineState
} from '../../domain/playback/types';
import { PipelineError } from '../../domain/playback/errors';
import { sleep as defaultSleep, Sleep } from '../../utils/retry';

export interface MpvPipelineOptions {
  readonly mpv: MpvOptions;
  /** Time mpv gets to create its socket after a (re)start */
  readonly socketWaitMs: number;
  /** Extra attempts per command, each preceded by an mpv restart */
  readonly commandRetries: number;
  readonly sleep?: Sleep;
}

const OK: Result<void, PipelineError> = { success: true, value: undefined };

export class MpvPipeline extends EventEmitter implements IMediaPipeline {
  private state: PipelineState = 'NULL';
  private graph: DecodeGraph | null = null;
  private readonly sleep: Sleep;
  private shuttingDown = false;

  constructor(
    private readonly ipcClient: IIPCClient,
    private readonly processManager: IProcessManager,
    private readonly options: MpvPipelineOptions,
    private readonly logger: Logger
  ) {
    super();
    this.sleep = options.sleep ?? defaultSleep;
    this.ipcClient.addEventListener(this.handleMpvEvent);
    this.processManager.addExitListener(this.handleProcessExit);
  }

  async setState(target: PipelineState): Promise<Result<void, PipelineError>> {
    switch (target) {
      case 'NULL':
        return this.toNull();
      case 'READY':
        return this.toReady();
      case 'PAUSED':
      case 'PLAYING':
        return this.toActive(target);
    }
  }

  getState(): PipelineState {
    return this.state;
  }

  async removeAll(): Promise<Result<void, PipelineError>> {
    this.graph = null;
    if (!this.ipcClient.isConnected()) {
      return OK;
    }

    const cleared = await this.run(['playlist-clear']);
    const stopped = await this.run(['stop']);
    if (!cleared || !stopped) {
      return { success: false, error: 'PIPELINE_STATE' };
    }
    return OK;
  }

  async attach(graph: DecodeGraph): Promise<Result<void, PipelineError>> {
    const ready = await this.ensureMpvReady();
    if (!ready.success) {
      return ready;
    }

    for (const [property, value] of this.graphProperties(graph)) {
      if (!(await this.run(['set_property', property, value]))) {
        this.logger.error({ property }, 'Failed to configure decode graph element');
        return { success: false, error: 'PIPELINE_ELEMENT' };
      }
    }

    if (!(await this.run(['loadfile', graph.source.location, 'replace']))) {
      return { success: false, error: 'PIPELINE_LINK' };
    }

    this.graph = graph;
    return OK;
  }

  hasGraph(): boolean {
    return this.graph !== null;
  }

  addBusListener(listener: BusListener): void {
    this.on('bus', listener);
  }

  removeBusListener(listener: BusListener): void {
    this.off('bus', listener);
  }

  async shutdown(): Promise<void> {
    this.shuttingDown = true;
    this.graph = null;
    this.state = 'NULL';
    this.ipcClient.removeEventListener(this.handleMpvEvent);
    this.processManager.removeExitListener(this.handleProcessExit);

    if (this.ipcClient.isConnected()) {
      await this.ipcClient.disconnect();
    }
    await this.processManager.cleanup();
    this.removeAllListeners();
  }

  private async toNull(): Promise<Result<void, PipelineError>> {
    if (this.ipcClient.isConnected() && !(await this.run(['stop']))) {
      this.logger.warn('mpv did not acknowledge stop, treating the pipeline as torn down');
    }
    this.graph = null;
    this.state = 'NULL';
    return OK;
  }

  private async toReady(): Promise<Result<void, PipelineError>> {
    const ready = await this.ensureMpvReady();
    if (!ready.success) {
      return ready;
    }
    if (!(await this.run(['set_property', 'pause', true]))) {
      return { success: false, error: 'PIPELINE_STATE' };
    }
    this.state = 'READY';
    return OK;
  }

  private async toActive(target: 'PAUSED' | 'PLAYING'): Promise<Result<void, PipelineError>> {
    if (!this.graph || !this.ipcClient.isConnected()) {
      return { success: false, error: 'PIPELINE_STATE' };
    }
    if (!(await this.run(['set_property', 'pause', target === 'PAUSED']))) {
      return { success: false, error: 'PIPELINE_STATE' };
    }
    this.state = target;
    return OK;
  }

  private graphProperties(graph: DecodeGraph): Array<[string, MPVArgument]> {
    const extraHeaders: string[] = [];
    let userAgent = '';
    let referrer = '';

    for (const [name, value] of Object.entries(graph.source.headers)) {
      const lower = name.toLowerCase();
      if (lower === 'user-agent') {
        userAgent = value;
      } else if (lower === 'referer') {
        referrer = value;
      } else {
        extraHeaders.push(`${name}: ${value}`);
      }
    }

    const properties: Array<[string, MPVArgument]> = [
      ['user-agent', userAgent],
      ['referrer', referrer],
      ['http-header-fields', extraHeaders],
      ['audio-device', graph.sink.device]
    ];
    if (graph.resample.sampleRate !== undefined) {
      properties.push(['audio-samplerate', graph.resample.sampleRate]);
    }
    if (graph.convert.format !== undefined) {
      properties.push(['audio-format', graph.convert.format]);
    }
    return properties;
  }

  /**
   * Ensure the mpv process is running and the IPC socket is connected
   */
  private async ensureMpvReady(): Promise<Result<void, PipelineError>> {
    if (this.ipcClient.isConnected()) {
      return OK;
    }

    const started = this.processManager.isRunning()
      ? { success: true as const, value: 0 }
      : await this.processManager.startMpv(this.options.mpv);
    if (!started.success) {
      this.logger.error({ error: started.error }, 'Failed to start mpv');
      return { success: false, error: 'ENGINE_UNAVAILABLE' };
    }

    // mpv creates its socket shortly after startup
    await this.sleep(this.options.socketWaitMs);

    try {
      await this.ipcClient.connect(this.options.mpv.socketPath);
    } catch (error) {
      this.logger.error({ err: error, socketPath: this.options.mpv.socketPath }, 'Failed to connect to mpv IPC');
      return { success: false, error: 'ENGINE_UNAVAILABLE' };
    }
    return OK;
  }

  /**
   * Send a command; on a transport failure restart mpv and try again.
   * Resolves true when mpv answered `success`.
   */
  private async run(command: readonly MPVArgument[]): Promise<boolean> {
    for (let attempt = 0; attempt <= this.options.commandRetries; attempt++) {
      if (attempt > 0 && !(await this.recoverConnection())) {
        continue;
      }
      if (!this.ipcClient.isConnected()) {
        continue;
      }

      try {
        const response = await this.ipcClient.sendCommand({ command });
        if (response.error !== 'success') {
          this.logger.warn({ command: command[0], error: response.error }, 'mpv rejected command');
        }
        return response.error === 'success';
      } catch (error) {
        this.logger.warn({ err: error, command: command[0], attempt: attempt + 1 }, 'mpv command failed');
      }
    }
    return false;
  }

  private async recoverConnection(): Promise<boolean> {
    this.logger.info('Restarting mpv to recover the IPC connection');
    if (this.ipcClient.isConnected()) {
      await this.ipcClient.disconnect();
    }

    const restarted = await this.processManager.restartMpv();
    if (!restarted.success) {
      this.logger.error({ error: restarted.error }, 'Failed to restart mpv');
      return false;
    }

    await this.sleep(this.options.socketWaitMs);
    try {
      await this.ipcClient.connect(this.options.mpv.socketPath);
      return true;
    } catch (error) {
      this.logger.error({ err: error }, 'Failed to reconnect to mpv IPC');
      return false;
    }
  }

  private readonly handleMpvEvent = (event: MPVEvent): void => {
    if (event.event !== 'end-file' || !this.graph) {
      return;
    }

    if (event.reason === 'eof') {
      this.post({ type: 'EOS' });
    } else if (event.reason === 'error') {
      this.post({ type: 'ERROR', message: event.file_error ?? 'playback error' });
    }
  };

  private readonly handleProcessExit = (code: number | null, signal: NodeJS.Signals | null): void => {
    if (this.shuttingDown) {
      return;
    }
    const hadGraph = this.graph !== null;
    this.graph = null;
    this.state = 'NULL';
    if (hadGraph) {
      this.post({ type: 'ERROR', message: `mpv exited (code ${code ?? 'none'}, signal ${signal ?? 'none'})` });
    }
  };

  private post(message: BusMessage): void {
    this.emit('bus', message);
  }
}
