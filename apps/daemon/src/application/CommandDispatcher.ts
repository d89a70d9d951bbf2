/**
 * CommandDispatcher: the single consumer of the command mailbox
 *
 * Control-surface commands and engine signals are handled strictly one at a
 * time. Engine signals first land in an unbounded buffer and a pump forwards
 * them to the mailbox, so the engine never blocks and the dispatcher never
 * waits on its own mailbox.
 */

import type { Logger } from 'pino';
import { ErrorFactory, PlayMode, PlaylistError, PlayerStatus } from '@chorus/shared';
import { IPlaybackEngine } from '../domain/playback/interfaces';
import { EngineSignal } from '../domain/playback/types';
import { PlaybackErrorFactory } from '../domain/playback/errors';
import { DispatcherMessage, InternalMessage, assertNever } from '../domain/playback/commands';
import { AsyncChannel, ChannelClosedError } from '../utils/AsyncChannel';
import { PlaylistStore } from './PlaylistStore';

export interface CommandDispatcherOptions {
  readonly initialMode: PlayMode;
  /** Move on to the next track when a stream cannot be resolved */
  readonly skipUnplayable: boolean;
}

/**
 * Who asked for a track to start. Skips count towards the consecutive
 * unplayable limit, everything else starts a fresh count.
 */
type PlayOrigin = 'command' | 'skip';

export class CommandDispatcher {
  private mode: PlayMode;
  private playlistEmpty = false;
  private consecutiveUnplayable = 0;
  private readonly signals = new AsyncChannel<InternalMessage>();
  private pumpTask: Promise<void> | null = null;
  private resolveStopped: () => void = () => undefined;
  private readonly stopped: Promise<void>;

  constructor(
    private readonly mailbox: AsyncChannel<DispatcherMessage>,
    private readonly store: PlaylistStore,
    private readonly engine: IPlaybackEngine,
    private readonly options: CommandDispatcherOptions,
    private readonly logger: Logger
  ) {
    this.mode = options.initialMode;
    this.stopped = new Promise(resolve => {
      this.resolveStopped = resolve;
    });
    this.engine.addSignalListener(this.handleEngineSignal);
  }

  /**
   * Drain the mailbox until a STOP was handled or the mailbox is closed
   */
  async run(): Promise<void> {
    this.pumpTask = this.pumpSignals().catch(error => {
      this.logger.error({ err: error }, 'Signal pump failed');
    });

    try {
      for (;;) {
        const message = await this.mailbox.receive();
        if (message === undefined) {
          break;
        }

        await this.handle(message);
        if (message.type === 'STOP') {
          break;
        }
      }
    } finally {
      this.engine.removeSignalListener(this.handleEngineSignal);
      this.signals.close();
      this.resolveStopped();
    }
  }

  /**
   * Settles once the signal pump has exited. The pump may be parked on a
   * full mailbox after the loop ended; closing the mailbox releases it.
   */
  async pumpDrained(): Promise<void> {
    await this.pumpTask;
  }

  /**
   * Resolves once the dispatcher loop has ended
   */
  whenStopped(): Promise<void> {
    return this.stopped;
  }

  getMode(): PlayMode {
    return this.mode;
  }

  async status(): Promise<PlayerStatus> {
    const { tracks, cursor } = await this.store.snapshot();
    return {
      state: this.engine.getState(),
      mode: this.mode,
      cursor,
      trackCount: tracks.length,
      currentTrack: tracks[cursor] ?? null,
      idle: this.playlistEmpty
    };
  }

  private async handle(message: DispatcherMessage): Promise<void> {
    this.logger.debug({ message }, 'Handling dispatcher message');

    switch (message.type) {
      case 'START':
        if (await this.store.isEmpty()) {
          this.playlistEmpty = true;
          this.logger.info('Playlist is empty, waiting for tracks');
          return;
        }
        await this.playCurrent('command');
        return;

      case 'PLAY':
        if (this.engine.isLoaded()) {
          await this.transition('PLAYING');
        } else if (await this.store.isEmpty()) {
          this.logger.info('Nothing to play, the playlist is empty');
        } else {
          await this.playCurrent('command');
        }
        return;

      case 'PAUSE':
        await this.transition('PAUSED');
        return;

      case 'NEXT':
        await this.navigate('advance', this.linearMode(), 'command');
        return;

      case 'PREVIOUS':
        await this.navigate('retreat', this.linearMode(), 'command');
        return;

      case 'JUMP_TO': {
        const index = await this.store.find(message.bvid);
        if (index === undefined) {
          this.logger.warn({ bvid: message.bvid }, 'Track is not in the playlist');
          return;
        }
        await this.store.setCursor(index);
        await this.playCurrent('command');
        return;
      }

      case 'STOP':
        await this.transition('NULL');
        this.logger.info('Stop requested');
        return;

      case 'SET_MODE':
        this.mode = message.mode;
        this.logger.info({ mode: message.mode }, 'Play mode changed');
        return;

      case 'RELOAD_PLAYLIST':
        await this.reloadPlaylist();
        return;

      case 'PLAYLIST_BECAME_EMPTY':
        await this.becomeEmpty();
        return;

      case 'TRACK_FINISHED':
        if (this.isStale(message)) {
          return;
        }
        if (this.mode === 'SingleRepeat') {
          await this.playCurrent('command');
          return;
        }
        await this.navigate('advance', this.mode, 'command');
        return;

      case 'PIPELINE_ERROR':
        if (this.isStale(message)) {
          return;
        }
        this.logger.error({ generation: message.generation, reason: message.message }, 'Playback stopped by a pipeline error');
        await this.transition('NULL');
        return;

      case 'TRACK_UNPLAYABLE':
        if (this.isStale(message)) {
          return;
        }
        await this.navigate('advance', this.linearMode(), 'skip');
        return;

      default:
        assertNever(message);
    }
  }

  private async reloadPlaylist(): Promise<void> {
    if (this.playlistEmpty) {
      const reset = await this.store.resetTo();
      if (!reset.success) {
        await this.reloadFailed(reset.error);
        return;
      }
      this.playlistEmpty = false;
      this.logger.info({ trackCount: reset.value }, 'Playlist filled, starting from the first track');
      await this.playCurrent('command');
      return;
    }

    const reloaded = await this.store.reload();
    if (!reloaded.success) {
      await this.reloadFailed(reloaded.error);
      return;
    }

    this.logger.info(reloaded.value, 'Playlist reloaded');
    if (reloaded.value.replay) {
      await this.playCurrent('command');
    }
  }

  private async reloadFailed(error: PlaylistError): Promise<void> {
    if (error === 'EMPTY_PLAYLIST') {
      await this.becomeEmpty();
      return;
    }
    this.logger.warn(ErrorFactory.createPlaylistError(error), 'Reload failed, keeping the current playlist');
  }

  private async becomeEmpty(): Promise<void> {
    await this.transition('NULL');
    await this.store.clear();
    this.playlistEmpty = true;
    this.logger.info('Playlist is empty, playback is idle');
  }

  private async navigate(direction: 'advance' | 'retreat', mode: PlayMode, origin: PlayOrigin): Promise<void> {
    const moved = direction === 'advance'
      ? await this.store.advance(mode)
      : await this.store.retreat(mode);
    if (!moved.success) {
      this.logger.info('Nothing to play, the playlist is empty');
      return;
    }
    await this.playCurrent(origin);
  }

  private async playCurrent(origin: PlayOrigin): Promise<void> {
    if (origin === 'command') {
      this.consecutiveUnplayable = 0;
    }

    const current = await this.store.current();
    if (!current.success) {
      this.logger.warn({ error: current.error }, 'No current track to play');
      return;
    }

    const played = await this.engine.playTrack(current.value);
    if (played.success) {
      this.consecutiveUnplayable = 0;
      return;
    }

    const details = PlaybackErrorFactory.createEngineError(played.error, { bvid: current.value.bvid });
    if (played.error !== 'FETCH_EXHAUSTED' || !this.options.skipUnplayable) {
      this.logger.error(details, 'Could not start the track');
      return;
    }

    this.consecutiveUnplayable++;
    const { tracks } = await this.store.snapshot();
    if (this.consecutiveUnplayable < tracks.length) {
      this.logger.warn(details, 'Skipping unplayable track');
      this.signals.trySend({ type: 'TRACK_UNPLAYABLE', generation: this.engine.getGeneration() });
      return;
    }

    this.logger.error({ attempted: this.consecutiveUnplayable }, 'No track in the playlist is playable, staying idle');
    this.consecutiveUnplayable = 0;
    await this.transition('NULL');
  }

  private async transition(state: 'PLAYING' | 'PAUSED' | 'NULL'): Promise<void> {
    const result = await this.engine.setState(state);
    if (!result.success) {
      this.logger.warn({ state, error: result.error }, 'Engine refused the state change');
    }
  }

  /**
   * Next and Previous step through the list even in SingleRepeat
   */
  private linearMode(): PlayMode {
    return this.mode === 'SingleRepeat' ? 'Loop' : this.mode;
  }

  private isStale(message: { readonly type: string; readonly generation: number }): boolean {
    const current = this.engine.getGeneration();
    if (message.generation === current) {
      return false;
    }
    this.logger.debug({ type: message.type, generation: message.generation, current }, 'Dropping stale engine signal');
    return true;
  }

  private async pumpSignals(): Promise<void> {
    for (;;) {
      const signal = await this.signals.receive();
      if (signal === undefined) {
        return;
      }
      try {
        await this.mailbox.send(signal);
      } catch (error) {
        if (error instanceof ChannelClosedError) {
          return;
        }
        throw error;
      }
    }
  }

  private readonly handleEngineSignal = (signal: EngineSignal): void => {
    if (!this.signals.trySend(signal)) {
      this.logger.debug({ signal }, 'Engine signal after shutdown');
    }
  };
}
