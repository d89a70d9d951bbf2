/**
 * ProcessManager for the media engine process
 * Spawns mpv in idle mode with its IPC server enabled, and reports exits
 * that nobody asked for
 */

import { spawn, SpawnOptions } from 'child_process';
import { EventEmitter } from 'events';
import type { Logger } from 'pino';
import { Result } from '@chorus/shared';
import { IProcessManager } from '../../domain/playback/interfaces';
import { MpvOptions, ProcessExitListener, SpawnedProcess, SpawnProcess } from '../../domain/playback/types';
import { ProcessError } from '../../domain/playback/errors';

export interface ProcessManagerTimings {
  /** How long mpv must stay alive before startup counts as successful */
  readonly startupGraceMs: number;
  /** How long to wait for SIGTERM before sending SIGKILL */
  readonly stopTimeoutMs: number;
}

const DEFAULT_TIMINGS: ProcessManagerTimings = {
  startupGraceMs: 1000,
  stopTimeoutMs: 5000
};

export function buildMpvArgs(options: MpvOptions): string[] {
  return [
    '--no-video',
    '--quiet',
    '--no-terminal',
    '--idle=yes',
    `--input-ipc-server=${options.socketPath}`,
    `--volume=${options.volume}`,
    '--audio-display=no',
    '--gapless-audio=yes'
  ];
}

export class ProcessManager extends EventEmitter implements IProcessManager {
  private mpvProcess: SpawnedProcess | null = null;
  private mpvOptions: MpvOptions | null = null;
  private readonly timings: ProcessManagerTimings;

  constructor(
    private readonly logger: Logger,
    timings: Partial<ProcessManagerTimings> = {},
    private readonly spawnProcess: SpawnProcess = spawn
  ) {
    super();
    this.timings = { ...DEFAULT_TIMINGS, ...timings };
  }

  async startMpv(options: MpvOptions): Promise<Result<number, ProcessError>> {
    // only one mpv instance at a time
    if (this.mpvProcess) {
      await this.stopMpv();
    }

    const spawnOptions: SpawnOptions = {
      stdio: ['ignore', 'ignore', 'pipe'],
      detached: false
    };

    let mpvProcess: SpawnedProcess;
    try {
      mpvProcess = this.spawnProcess(options.executable, buildMpvArgs(options), spawnOptions);
    } catch (error) {
      this.logger.error({ err: error }, 'Failed to spawn mpv');
      return { success: false, error: 'PROCESS_START_FAILED' };
    }

    mpvProcess.stderr?.on('data', (chunk: Buffer) => {
      this.logger.debug({ stderr: chunk.toString('utf8').trim() }, 'mpv stderr');
    });

    return new Promise((resolve) => {
      let resolved = false;
      let graceTimer: NodeJS.Timeout | undefined;

      const onError = (error: Error) => {
        if (resolved) return;
        resolved = true;
        clearTimeout(graceTimer);
        this.logger.error({ err: error }, 'mpv startup failed');
        const missing = 'code' in error && error.code === 'ENOENT';
        resolve({ success: false, error: missing ? 'DEPENDENCY_MISSING' : 'PROCESS_START_FAILED' });
      };

      const onEarlyExit = (code: number | null) => {
        if (resolved) return;
        resolved = true;
        clearTimeout(graceTimer);
        this.logger.error({ code }, 'mpv exited during startup');
        resolve({ success: false, error: 'PROCESS_START_FAILED' });
      };

      mpvProcess.once('error', onError);
      mpvProcess.once('exit', onEarlyExit);

      graceTimer = setTimeout(() => {
        if (resolved) return;
        const pid = mpvProcess.pid;
        if (pid === undefined || mpvProcess.killed) {
          onError(new Error('mpv failed to start within the grace period'));
          return;
        }

        resolved = true;
        mpvProcess.off('exit', onEarlyExit);
        this.mpvProcess = mpvProcess;
        this.mpvOptions = options;
        this.watchExit(mpvProcess);
        this.logger.info({ pid }, 'mpv started');
        resolve({ success: true, value: pid });
      }, this.timings.startupGraceMs);
    });
  }

  async stopMpv(): Promise<Result<void, ProcessError>> {
    const mpvProcess = this.mpvProcess;
    if (!mpvProcess) {
      return { success: true, value: undefined };
    }

    // cleared first so the exit is not reported as unexpected
    this.mpvProcess = null;

    if (mpvProcess.exitCode !== null || mpvProcess.signalCode !== null) {
      return { success: true, value: undefined };
    }

    return new Promise((resolve) => {
      const killTimer = setTimeout(() => {
        this.logger.warn({ pid: mpvProcess.pid }, 'mpv ignored SIGTERM, sending SIGKILL');
        mpvProcess.kill('SIGKILL');
      }, this.timings.stopTimeoutMs);

      mpvProcess.once('exit', () => {
        clearTimeout(killTimer);
        resolve({ success: true, value: undefined });
      });

      mpvProcess.kill('SIGTERM');
    });
  }

  async restartMpv(): Promise<Result<number, ProcessError>> {
    const options = this.mpvOptions;
    if (!options) {
      return { success: false, error: 'PROCESS_START_FAILED' };
    }

    const stopResult = await this.stopMpv();
    if (!stopResult.success) {
      return { success: false, error: stopResult.error };
    }

    return this.startMpv(options);
  }

  isRunning(): boolean {
    return this.mpvProcess !== null && this.mpvProcess.exitCode === null && !this.mpvProcess.killed;
  }

  addExitListener(listener: ProcessExitListener): void {
    this.on('unexpected-exit', listener);
  }

  removeExitListener(listener: ProcessExitListener): void {
    this.off('unexpected-exit', listener);
  }

  async cleanup(): Promise<void> {
    await this.stopMpv();
    this.mpvOptions = null;
  }

  private watchExit(mpvProcess: SpawnedProcess): void {
    mpvProcess.once('exit', (code: number | null, signal: NodeJS.Signals | null) => {
      if (this.mpvProcess !== mpvProcess) {
        return;
      }
      this.mpvProcess = null;
      this.logger.error({ code, signal }, 'mpv exited unexpectedly');
      this.emit('unexpected-exit', code, signal);
    });
  }
}
