/**
 * Playlist file access for the CLI
 *
 * Edits hold an advisory lock on the playlist file and replace it through a
 * temporary file, so the daemon never reads a half-written playlist.
 */

import { promises as fs } from 'fs';
import * as lockfile from 'proper-lockfile';
import { PlaylistError, PlaylistFile, Result, Track } from '@chorus/shared';

export interface PlaylistUpdate {
  before: Track[];
  after: Track[];
  changed: boolean;
}

export interface IPlaylistRepository {
  read(): Promise<Result<Track[], PlaylistError>>;
  update(edit: (tracks: Track[]) => Track[]): Promise<Result<PlaylistUpdate, PlaylistError>>;
}

const LOCK_OPTIONS: lockfile.LockOptions = {
  retries: { retries: 10, minTimeout: 20, maxTimeout: 200 },
  stale: 10000,
};

function sameTracks(a: readonly Track[], b: readonly Track[]): boolean {
  return PlaylistFile.serialize(a) === PlaylistFile.serialize(b);
}

export class PlaylistRepository implements IPlaylistRepository {
  constructor(private readonly filePath: string) {}

  /**
   * Current tracks; an empty file is an empty playlist, not an error
   */
  async read(): Promise<Result<Track[], PlaylistError>> {
    const result = await PlaylistFile.read(this.filePath);
    if (!result.success && result.error === 'EMPTY_PLAYLIST') {
      return { success: true, value: [] };
    }
    return result;
  }

  async update(edit: (tracks: Track[]) => Track[]): Promise<Result<PlaylistUpdate, PlaylistError>> {
    await PlaylistFile.ensureExists(this.filePath);

    let release: () => Promise<void>;
    try {
      release = await lockfile.lock(this.filePath, LOCK_OPTIONS);
    } catch {
      return { success: false, error: 'IO_ERROR' };
    }

    try {
      const current = await this.read();
      if (!current.success) {
        return current;
      }

      const before = current.value;
      const after = edit([...before]);
      const changed = !sameTracks(before, after);
      if (changed) {
        await this.write(after);
      }
      return { success: true, value: { before, after, changed } };
    } catch {
      return { success: false, error: 'IO_ERROR' };
    } finally {
      await release();
    }
  }

  private async write(tracks: readonly Track[]): Promise<void> {
    const temporary = `${this.filePath}.${process.pid}.tmp`;
    await fs.writeFile(temporary, PlaylistFile.serialize(tracks), 'utf8');
    await fs.rename(temporary, this.filePath);
  }
}
