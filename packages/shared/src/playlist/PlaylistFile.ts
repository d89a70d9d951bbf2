/**
 * TOML codec for the persisted playlist.
 *
 * ```toml
 * [[tracks]]
 * bvid = "BV1aa411c7aa"
 * cid = "1176840"
 * title = "optional"
 * owner = "optional"
 * ```
 *
 * Whitespace-only content means "no tracks".
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import * as TOML from '@iarna/toml';
import { Result, Track, TrackValidator } from '../domain/Track';
import { PlaylistError } from '../domain/errors';

export type PlaylistParseError = Extract<PlaylistError, 'DATA_PARSING' | 'EMPTY_PLAYLIST'>;

type TomlDocument = Parameters<typeof TOML.stringify>[0];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class PlaylistFile {
  /**
   * Parse the whole document; any invalid entry rejects the document.
   */
  static parse(content: string): Result<Track[], PlaylistParseError> {
    if (content.trim().length === 0) {
      return { success: false, error: 'EMPTY_PLAYLIST' };
    }

    let document: unknown;
    try {
      document = TOML.parse(content);
    } catch {
      return { success: false, error: 'DATA_PARSING' };
    }

    if (!isRecord(document)) {
      return { success: false, error: 'DATA_PARSING' };
    }

    const entries = document.tracks;
    if (entries === undefined) {
      return { success: false, error: 'EMPTY_PLAYLIST' };
    }
    if (!Array.isArray(entries)) {
      return { success: false, error: 'DATA_PARSING' };
    }

    const tracks: Track[] = [];
    for (const entry of entries) {
      if (!isRecord(entry)) {
        return { success: false, error: 'DATA_PARSING' };
      }
      const created = TrackValidator.create({
        bvid: entry.bvid,
        cid: entry.cid,
        title: entry.title,
        owner: entry.owner
      });
      if (!created.success) {
        return { success: false, error: 'DATA_PARSING' };
      }
      tracks.push(created.value);
    }

    if (tracks.length === 0) {
      return { success: false, error: 'EMPTY_PLAYLIST' };
    }

    return { success: true, value: tracks };
  }

  static serialize(tracks: readonly Track[]): string {
    if (tracks.length === 0) {
      return '';
    }

    const entries = tracks.map(track => {
      const entry: Record<string, string> = { bvid: track.bvid, cid: track.cid };
      if (track.title !== undefined) {
        entry.title = track.title;
      }
      if (track.owner !== undefined) {
        entry.owner = track.owner;
      }
      return entry;
    });

    const document: TomlDocument = { tracks: entries };
    return TOML.stringify(document);
  }

  /**
   * Read and parse a playlist file. The caller's list is untouched on failure.
   */
  static async read(filePath: string): Promise<Result<Track[], PlaylistError>> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf8');
    } catch {
      return { success: false, error: 'IO_ERROR' };
    }
    return this.parse(content);
  }

  /**
   * Create the playlist directory and an empty playlist file when missing.
   */
  static async ensureExists(filePath: string): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    try {
      await fs.writeFile(filePath, '', { flag: 'wx' });
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'EEXIST')) {
        throw error;
      }
    }
  }
}
