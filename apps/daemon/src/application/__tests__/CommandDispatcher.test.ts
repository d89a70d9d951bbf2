/**
 * Tests for the CommandDispatcher against a real PlaylistStore and a
 * recording engine
 */

import { EventEmitter } from 'events';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { PlaylistFile, Result, Track } from '@chorus/shared';
import { CommandDispatcher, CommandDispatcherOptions } from '../CommandDispatcher';
import { PlaylistStore } from '../PlaylistStore';
import { IPlaybackEngine } from '../../domain/playback/interfaces';
import { EngineSignal, EngineSignalListener, PipelineState } from '../../domain/playback/types';
import { EngineError, PipelineError } from '../../domain/playback/errors';
import { DispatcherMessage } from '../../domain/playback/commands';
import { AsyncChannel } from '../../utils/AsyncChannel';
import { createTestLogger, testUtils } from '../../__tests__/setup/playback-mocks';

function track(n: number): Track {
  return { bvid: `BV1${String(n).padStart(9, '0')}`, cid: String(1000 + n) };
}

/**
 * Engine that records what it was asked and how many playTrack calls were
 * in flight at once
 */
class RecordingEngine extends EventEmitter implements IPlaybackEngine {
  public readonly played: string[] = [];
  public readonly states: PipelineState[] = [];
  public readonly unplayable = new Set<string>();
  public delayMs = 0;
  public inFlight = 0;
  public maxInFlight = 0;
  private generation = 0;
  private loaded = false;
  private state: PipelineState = 'NULL';

  async playTrack(track: Track): Promise<Result<void, EngineError>> {
    this.generation++;
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    this.played.push(track.bvid);
    try {
      if (this.delayMs > 0) {
        await testUtils.wait(this.delayMs);
      }
      if (this.unplayable.has(track.bvid)) {
        this.loaded = false;
        this.state = 'READY';
        return { success: false, error: 'FETCH_EXHAUSTED' };
      }
      this.loaded = true;
      this.state = 'PLAYING';
      return { success: true, value: undefined };
    } finally {
      this.inFlight--;
    }
  }

  async setState(state: PipelineState): Promise<Result<void, PipelineError>> {
    if ((state === 'PLAYING' || state === 'PAUSED') && !this.loaded) {
      return { success: false, error: 'PIPELINE_STATE' };
    }
    if (state === 'NULL') {
      this.loaded = false;
    }
    this.states.push(state);
    this.state = state;
    return { success: true, value: undefined };
  }

  getState(): PipelineState {
    return this.state;
  }

  isLoaded(): boolean {
    return this.loaded;
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

  signal(signal: EngineSignal): void {
    this.emit('signal', signal);
  }

  finishCurrent(): void {
    this.signal({ type: 'TRACK_FINISHED', generation: this.generation });
  }
}

describe('CommandDispatcher', () => {
  let dir: string;
  let file: string;
  let engine: RecordingEngine;
  let mailbox: AsyncChannel<DispatcherMessage>;
  let dispatcher: CommandDispatcher;
  let running: Promise<void>;

  const writeTracks = (...ids: number[]) => fs.writeFile(file, PlaylistFile.serialize(ids.map(track)), 'utf8');
  const bvid = (n: number) => track(n).bvid;
  const send = (message: DispatcherMessage) => mailbox.send(message);

  /**
   * Waits until every message sent so far has been handled: the second
   * barrier can only be buffered once the first one was taken, which
   * happens after the message before it finished.
   */
  async function settle(): Promise<void> {
    await testUtils.flush();
    await send({ type: 'SET_MODE', mode: dispatcher.getMode() });
    await send({ type: 'SET_MODE', mode: dispatcher.getMode() });
    await testUtils.flush();
  }

  async function start(ids: number[], options: Partial<CommandDispatcherOptions> = {}): Promise<PlaylistStore> {
    if (ids.length > 0) {
      await writeTracks(...ids);
    } else {
      await fs.writeFile(file, '', 'utf8');
    }
    const store = new PlaylistStore(file);
    await store.resetTo();

    dispatcher = new CommandDispatcher(
      mailbox,
      store,
      engine,
      { initialMode: 'Loop', skipUnplayable: true, ...options },
      createTestLogger()
    );
    running = dispatcher.run();
    return store;
  }

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'chorus-dispatch-'));
    file = path.join(dir, 'playlist.toml');
    engine = new RecordingEngine();
    mailbox = new AsyncChannel<DispatcherMessage>(1);
  });

  afterEach(async () => {
    mailbox.close();
    await running;
    await dispatcher.pumpDrained();
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('startup', () => {
    it('plays the first track on START', async () => {
      await start([1, 2, 3]);

      await send({ type: 'START' });
      await settle();

      expect(engine.played).toEqual([bvid(1)]);
      expect((await dispatcher.status()).idle).toBe(false);
    });

    it('stays idle on START with an empty playlist', async () => {
      await start([]);

      await send({ type: 'START' });
      await send({ type: 'PLAY' });
      await settle();

      expect(engine.played).toEqual([]);
      expect(await dispatcher.status()).toEqual({
        state: 'NULL',
        mode: 'Loop',
        cursor: 0,
        trackCount: 0,
        currentTrack: null,
        idle: true
      });
    });
  });

  describe('navigation', () => {
    it('NEXT and PREVIOUS move through the list and wrap around', async () => {
      await start([1, 2, 3]);

      await send({ type: 'START' });
      await send({ type: 'PREVIOUS' });
      await send({ type: 'NEXT' });
      await send({ type: 'NEXT' });
      await settle();

      expect(engine.played).toEqual([bvid(1), bvid(3), bvid(1), bvid(2)]);
    });

    it('NEXT steps forward even in SingleRepeat', async () => {
      await start([1, 2, 3]);

      await send({ type: 'START' });
      await send({ type: 'SET_MODE', mode: 'SingleRepeat' });
      await send({ type: 'NEXT' });
      await settle();

      expect(engine.played).toEqual([bvid(1), bvid(2)]);
    });

    it('JUMP_TO plays the first matching track and ignores unknown ids', async () => {
      await start([1, 2, 3]);

      await send({ type: 'JUMP_TO', bvid: bvid(3) });
      await send({ type: 'JUMP_TO', bvid: bvid(9) });
      await settle();

      expect(engine.played).toEqual([bvid(3)]);
      expect((await dispatcher.status()).cursor).toBe(2);
    });

    it('SET_MODE changes the mode without touching playback', async () => {
      await start([1, 2]);

      await send({ type: 'START' });
      await send({ type: 'SET_MODE', mode: 'Shuffle' });
      await settle();

      expect(engine.played).toEqual([bvid(1)]);
      expect((await dispatcher.status()).mode).toBe('Shuffle');
    });
  });

  describe('transport', () => {
    it('PAUSE and PLAY toggle the engine state without a rebuild', async () => {
      await start([1, 2]);

      await send({ type: 'START' });
      await send({ type: 'PAUSE' });
      await send({ type: 'PLAY' });
      await settle();

      expect(engine.states).toEqual(['PAUSED', 'PLAYING']);
      expect(engine.played).toEqual([bvid(1)]);
    });

    it('PLAY restarts the current track when nothing is loaded', async () => {
      await start([1, 2]);

      await send({ type: 'PLAY' });
      await settle();

      expect(engine.played).toEqual([bvid(1)]);
    });

    it('STOP drops the engine to NULL and ends the loop', async () => {
      await start([1]);

      await send({ type: 'START' });
      await send({ type: 'STOP' });
      await running;
      await dispatcher.whenStopped();

      expect(engine.states).toEqual(['NULL']);
    });

    it('ends the loop when the mailbox is closed', async () => {
      await start([1]);

      mailbox.close();

      await expect(running).resolves.toBeUndefined();
    });
  });

  describe('end of stream', () => {
    it('advances and plays the next track in Loop mode', async () => {
      await start([1, 2]);

      await send({ type: 'START' });
      await settle();
      engine.finishCurrent();
      await settle();

      expect(engine.played).toEqual([bvid(1), bvid(2)]);
    });

    it('replays the same track in SingleRepeat mode', async () => {
      await start([1, 2]);

      await send({ type: 'SET_MODE', mode: 'SingleRepeat' });
      await send({ type: 'START' });
      await settle();
      engine.finishCurrent();
      await settle();

      expect(engine.played).toEqual([bvid(1), bvid(1)]);
    });

    it('discards a finished signal from an older generation', async () => {
      await start([1, 2, 3]);

      await send({ type: 'START' });
      await send({ type: 'NEXT' });
      await settle();
      engine.signal({ type: 'TRACK_FINISHED', generation: 1 });
      await settle();

      expect(engine.played).toEqual([bvid(1), bvid(2)]);
    });

    it('never overlaps playTrack calls when NEXT races an end of stream', async () => {
      await start([1, 2, 3]);
      engine.delayMs = 20;

      await send({ type: 'START' });
      await testUtils.waitFor(() => engine.played.length === 1);
      engine.finishCurrent();
      await testUtils.flush();
      await send({ type: 'NEXT' });
      await testUtils.waitFor(() => engine.played.length === 3 && engine.inFlight === 0);

      expect(engine.maxInFlight).toBe(1);
      expect(engine.played).toEqual([bvid(1), bvid(2), bvid(3)]);
    });
  });

  describe('pipeline errors', () => {
    it('drops the engine to NULL on a current-generation error', async () => {
      await start([1]);

      await send({ type: 'START' });
      await settle();
      engine.signal({ type: 'PIPELINE_ERROR', generation: 1, message: 'decoder failed' });
      await settle();

      expect(engine.states).toEqual(['NULL']);
    });

    it('ignores an error from an older generation', async () => {
      await start([1]);

      await send({ type: 'START' });
      await settle();
      engine.signal({ type: 'PIPELINE_ERROR', generation: 0, message: 'late' });
      await settle();

      expect(engine.states).toEqual([]);
    });
  });

  describe('unplayable tracks', () => {
    it('skips to the next track when a stream cannot be resolved', async () => {
      await start([1, 2, 3]);
      engine.unplayable.add(bvid(1));

      await send({ type: 'START' });
      await testUtils.waitFor(() => engine.played.length === 2);
      await settle();

      expect(engine.played).toEqual([bvid(1), bvid(2)]);
    });

    it('gives up after trying every track once', async () => {
      await start([1, 2, 3]);
      [1, 2, 3].forEach(n => engine.unplayable.add(bvid(n)));

      await send({ type: 'START' });
      await testUtils.waitFor(() => engine.states.includes('NULL'));
      await settle();

      expect(engine.played).toEqual([bvid(1), bvid(2), bvid(3)]);
    });

    it('does not skip when skipping is disabled', async () => {
      await start([1, 2], { skipUnplayable: false });
      engine.unplayable.add(bvid(1));

      await send({ type: 'START' });
      await settle();

      expect(engine.played).toEqual([bvid(1)]);
    });
  });

  describe('playlist changes', () => {
    it('keeps playing when the current track survived the edit', async () => {
      await start([1, 2, 3]);
      await send({ type: 'START' });
      await settle();

      await writeTracks(9, 1, 2);
      await send({ type: 'RELOAD_PLAYLIST' });
      await settle();

      expect(engine.played).toEqual([bvid(1)]);
      expect((await dispatcher.status()).cursor).toBe(1);
    });

    it('replays at the clamped cursor when the current track was removed', async () => {
      await start([1, 2, 3]);
      await send({ type: 'START' });
      await settle();

      await writeTracks(2, 3);
      await send({ type: 'RELOAD_PLAYLIST' });
      await settle();

      expect(engine.played).toEqual([bvid(1), bvid(2)]);
    });

    it('keeps the current list when the new file is malformed', async () => {
      await start([1, 2, 3]);

      await fs.writeFile(file, 'tracks = 3', 'utf8');
      await send({ type: 'RELOAD_PLAYLIST' });
      await settle();

      expect((await dispatcher.status()).trackCount).toBe(3);
    });

    it('goes idle when a reload finds the file empty', async () => {
      await start([1, 2]);
      await send({ type: 'START' });
      await settle();

      await fs.writeFile(file, '', 'utf8');
      await send({ type: 'RELOAD_PLAYLIST' });
      await settle();

      expect(engine.states).toEqual(['NULL']);
      expect((await dispatcher.status()).idle).toBe(true);
    });

    it('restarts from the first track after the playlist became empty', async () => {
      await start([1, 2, 3]);
      await send({ type: 'JUMP_TO', bvid: bvid(3) });
      await send({ type: 'PLAYLIST_BECAME_EMPTY' });
      await settle();

      expect(await dispatcher.status()).toMatchObject({ idle: true, trackCount: 0, state: 'NULL' });

      await writeTracks(4, 5);
      await send({ type: 'RELOAD_PLAYLIST' });
      await settle();

      expect(engine.played).toEqual([bvid(3), bvid(4)]);
      expect(await dispatcher.status()).toMatchObject({ idle: false, cursor: 0, trackCount: 2 });
    });

    it('starts from the first track when an empty daemon receives a playlist', async () => {
      await start([]);
      await send({ type: 'START' });
      await settle();

      await writeTracks(7, 8);
      await send({ type: 'RELOAD_PLAYLIST' });
      await settle();

      expect(engine.played).toEqual([bvid(7)]);
    });
  });
});
