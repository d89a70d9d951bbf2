/**
 * PlaylistStore: the active playlist and its cursor behind one reader/writer lock
 *
 * Parsing always happens outside the lock. Navigation and reload take it
 * exclusively, inspection shares it.
 */

import { PlayMode, PlaylistError, PlaylistFile, Result, Track } from '@chorus/shared';
import { ReadWriteLock } from '../utils/ReadWriteLock';
import { nextIndex, previousIndex, RandomSource } from '../domain/playlist/navigation';

export interface PlaylistSnapshot {
  readonly tracks: readonly Track[];
  readonly cursor: number;
}

/**
 * Result of reconciling the cursor after a reload. `replay` is true when the
 * track that was current is gone and the one now under the cursor should
 * start.
 */
export interface ReloadOutcome {
  readonly trackCount: number;
  readonly cursor: number;
  readonly replay: boolean;
}

export class PlaylistStore {
  private tracks: readonly Track[] = [];
  private cursor = 0;
  private readonly lock = new ReadWriteLock();

  constructor(
    private readonly filePath: string,
    private readonly random: RandomSource = Math.random
  ) {}

  /**
   * Parse the playlist file without touching the active list
   */
  async load(filePath: string = this.filePath): Promise<Result<Track[], PlaylistError>> {
    return PlaylistFile.read(filePath);
  }

  /**
   * Fresh start: replace the list and put the cursor on the first track
   */
  async resetTo(filePath: string = this.filePath): Promise<Result<number, PlaylistError>> {
    const loaded = await this.load(filePath);
    if (!loaded.success) {
      return loaded;
    }

    const tracks = loaded.value;
    await this.lock.withWrite(() => {
      this.tracks = tracks;
      this.cursor = 0;
    });
    return { success: true, value: tracks.length };
  }

  /**
   * Swap in the file's current content and keep the cursor on the same track
   * when it survived the edit
   */
  async reload(filePath: string = this.filePath): Promise<Result<ReloadOutcome, PlaylistError>> {
    const loaded = await this.load(filePath);
    if (!loaded.success) {
      return loaded;
    }

    const tracks = loaded.value;
    const outcome = await this.lock.withWrite((): ReloadOutcome => {
      const previous = this.cursor < this.tracks.length ? this.tracks[this.cursor] : undefined;
      this.tracks = tracks;
      const lastIndex = tracks.length - 1;

      if (previous === undefined) {
        this.cursor = Math.min(this.cursor, lastIndex);
        return { trackCount: tracks.length, cursor: this.cursor, replay: false };
      }

      const found = tracks.findIndex(track => track.bvid === previous.bvid);
      if (found >= 0) {
        this.cursor = found;
        return { trackCount: tracks.length, cursor: found, replay: false };
      }

      this.cursor = Math.min(this.cursor, lastIndex);
      return { trackCount: tracks.length, cursor: this.cursor, replay: true };
    });

    return { success: true, value: outcome };
  }

  async current(): Promise<Result<Track, 'INDEX_OUT_OF_BOUNDS'>> {
    return this.lock.withRead((): Result<Track, 'INDEX_OUT_OF_BOUNDS'> => {
      const track = this.tracks[this.cursor];
      if (track === undefined) {
        return { success: false, error: 'INDEX_OUT_OF_BOUNDS' };
      }
      return { success: true, value: track };
    });
  }

  async advance(mode: PlayMode): Promise<Result<number, 'PLAYLIST_EMPTY'>> {
    return this.move(cursor => nextIndex(cursor, this.tracks.length, mode, this.random));
  }

  async retreat(mode: PlayMode): Promise<Result<number, 'PLAYLIST_EMPTY'>> {
    return this.move(cursor => previousIndex(cursor, this.tracks.length, mode, this.random));
  }

  /**
   * Index of the first track with this id
   */
  async find(bvid: string): Promise<number | undefined> {
    return this.lock.withRead(() => {
      const index = this.tracks.findIndex(track => track.bvid === bvid);
      return index >= 0 ? index : undefined;
    });
  }

  async setCursor(index: number): Promise<void> {
    await this.lock.withWrite(() => {
      this.cursor = index;
    });
  }

  async snapshot(): Promise<PlaylistSnapshot> {
    return this.lock.withRead(() => ({ tracks: [...this.tracks], cursor: this.cursor }));
  }

  async isEmpty(): Promise<boolean> {
    return this.lock.withRead(() => this.tracks.length === 0);
  }

  async clear(): Promise<void> {
    await this.lock.withWrite(() => {
      this.tracks = [];
      this.cursor = 0;
    });
  }

  private async move(step: (cursor: number) => number): Promise<Result<number, 'PLAYLIST_EMPTY'>> {
    return this.lock.withWrite((): Result<number, 'PLAYLIST_EMPTY'> => {
      if (this.tracks.length === 0) {
        return { success: false, error: 'PLAYLIST_EMPTY' };
      }
      this.cursor = step(this.cursor);
      return { success: true, value: this.cursor };
    });
  }
}
