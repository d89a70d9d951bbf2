/**
 * Tests for PlaylistStore: loading, navigation and reload reconciliation
 */

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as fc from 'fast-check';
import { PlaylistFile, Track } from '@chorus/shared';
import { PlaylistStore } from '../PlaylistStore';

function track(n: number): Track {
  return { bvid: `BV1${String(n).padStart(9, '0')}`, cid: String(1000 + n) };
}

function tracks(...ids: number[]): Track[] {
  return ids.map(track);
}

describe('PlaylistStore', () => {
  let dir: string;
  let file: string;

  const write = (list: Track[]) => fs.writeFile(file, PlaylistFile.serialize(list), 'utf8');

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'chorus-store-'));
    file = path.join(dir, 'playlist.toml');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('load and resetTo', () => {
    it('load parses the file without touching the active list', async () => {
      await write(tracks(1, 2));
      const store = new PlaylistStore(file);

      expect(await store.load()).toEqual({ success: true, value: tracks(1, 2) });
      expect(await store.isEmpty()).toBe(true);
    });

    it('resetTo swaps the list in with the cursor on the first track', async () => {
      await write(tracks(1, 2, 3));
      const store = new PlaylistStore(file);
      await store.setCursor(2);

      expect(await store.resetTo()).toEqual({ success: true, value: 3 });
      expect(await store.snapshot()).toEqual({ tracks: tracks(1, 2, 3), cursor: 0 });
    });

    it('reports EMPTY_PLAYLIST for an empty file and keeps the previous list', async () => {
      await write(tracks(1));
      const store = new PlaylistStore(file);
      await store.resetTo();
      await fs.writeFile(file, '', 'utf8');

      expect(await store.resetTo()).toEqual({ success: false, error: 'EMPTY_PLAYLIST' });
      expect(await store.current()).toEqual({ success: true, value: track(1) });
    });

    it('reports DATA_PARSING for malformed content', async () => {
      await fs.writeFile(file, '[[tracks]\n', 'utf8');
      const store = new PlaylistStore(file);

      expect(await store.resetTo()).toEqual({ success: false, error: 'DATA_PARSING' });
    });

    it('reports IO_ERROR for a missing file', async () => {
      const store = new PlaylistStore(path.join(dir, 'missing.toml'));

      expect(await store.resetTo()).toEqual({ success: false, error: 'IO_ERROR' });
    });

    it('reads an explicitly given path instead of its own', async () => {
      const other = path.join(dir, 'other.toml');
      await fs.writeFile(other, PlaylistFile.serialize(tracks(7)), 'utf8');
      const store = new PlaylistStore(file);

      expect(await store.resetTo(other)).toEqual({ success: true, value: 1 });
    });
  });

  describe('navigation', () => {
    it('current fails with INDEX_OUT_OF_BOUNDS on an empty store', async () => {
      const store = new PlaylistStore(file);

      expect(await store.current()).toEqual({ success: false, error: 'INDEX_OUT_OF_BOUNDS' });
    });

    it('current fails with INDEX_OUT_OF_BOUNDS after an out-of-range setCursor', async () => {
      await write(tracks(1, 2));
      const store = new PlaylistStore(file);
      await store.resetTo();
      await store.setCursor(5);

      expect(await store.current()).toEqual({ success: false, error: 'INDEX_OUT_OF_BOUNDS' });
    });

    it('advance and retreat report PLAYLIST_EMPTY on an empty store', async () => {
      const store = new PlaylistStore(file);

      expect(await store.advance('Loop')).toEqual({ success: false, error: 'PLAYLIST_EMPTY' });
      expect(await store.retreat('Loop')).toEqual({ success: false, error: 'PLAYLIST_EMPTY' });
    });

    it('moves through the list in Loop mode and wraps at both ends', async () => {
      await write(tracks(1, 2, 3));
      const store = new PlaylistStore(file);
      await store.resetTo();

      expect(await store.retreat('Loop')).toEqual({ success: true, value: 2 });
      expect(await store.advance('Loop')).toEqual({ success: true, value: 0 });
      expect(await store.advance('Loop')).toEqual({ success: true, value: 1 });
      expect(await store.current()).toEqual({ success: true, value: track(2) });
    });

    it('draws Shuffle positions from its random source', async () => {
      await write(tracks(1, 2, 3, 4));
      const samples = [0.6, 0.1];
      const store = new PlaylistStore(file, () => samples.shift() ?? 0);
      await store.resetTo();

      expect(await store.advance('Shuffle')).toEqual({ success: true, value: 2 });
      expect(await store.retreat('Shuffle')).toEqual({ success: true, value: 0 });
    });

    it('find returns the first duplicate and undefined when absent', async () => {
      await write([track(1), track(2), track(1)]);
      const store = new PlaylistStore(file);
      await store.resetTo();

      expect(await store.find(track(1).bvid)).toBe(0);
      expect(await store.find(track(2).bvid)).toBe(1);
      expect(await store.find(track(9).bvid)).toBeUndefined();
    });

    it('clear empties the list and resets the cursor', async () => {
      await write(tracks(1, 2));
      const store = new PlaylistStore(file);
      await store.resetTo();
      await store.setCursor(1);

      await store.clear();

      expect(await store.snapshot()).toEqual({ tracks: [], cursor: 0 });
    });
  });

  describe('reload', () => {
    it('follows the current track to its new index without replaying', async () => {
      await write(tracks(1, 2, 3));
      const store = new PlaylistStore(file);
      await store.resetTo();
      await store.setCursor(1);
      await write(tracks(9, 8, 1, 2));

      expect(await store.reload()).toEqual({ success: true, value: { trackCount: 4, cursor: 3, replay: false } });
      expect(await store.current()).toEqual({ success: true, value: track(2) });
    });

    it('clamps the cursor and asks for a replay when the current track was removed', async () => {
      await write(tracks(1, 2, 3, 4));
      const store = new PlaylistStore(file);
      await store.resetTo();
      await store.setCursor(3);
      await write(tracks(1, 2));

      expect(await store.reload()).toEqual({ success: true, value: { trackCount: 2, cursor: 1, replay: true } });
    });

    it('keeps the old index when the removed track was not the last', async () => {
      await write(tracks(1, 2, 3));
      const store = new PlaylistStore(file);
      await store.resetTo();
      await store.setCursor(1);
      await write(tracks(1, 3, 4));

      expect(await store.reload()).toEqual({ success: true, value: { trackCount: 3, cursor: 1, replay: true } });
      expect(await store.current()).toEqual({ success: true, value: track(3) });
    });

    it('starts at the clamped cursor without replay when nothing was current', async () => {
      await write(tracks(1, 2));
      const store = new PlaylistStore(file);

      expect(await store.reload()).toEqual({ success: true, value: { trackCount: 2, cursor: 0, replay: false } });
    });

    it('keeps the active list when the new content is malformed', async () => {
      await write(tracks(1, 2));
      const store = new PlaylistStore(file);
      await store.resetTo();
      await fs.writeFile(file, 'tracks = 3', 'utf8');

      expect(await store.reload()).toEqual({ success: false, error: 'DATA_PARSING' });
      expect(await store.snapshot()).toEqual({ tracks: tracks(1, 2), cursor: 0 });
    });

    test('the cursor always ends inside the new list and on the old track when it survived', async () => {
      const listArb = fc.uniqueArray(fc.integer({ min: 1, max: 40 }), { minLength: 1, maxLength: 12 });

      await fc.assert(fc.asyncProperty(listArb, listArb, fc.nat(), async (before, after, pick) => {
        await write(tracks(...before));
        const store = new PlaylistStore(file);
        await store.resetTo();
        const cursor = pick % before.length;
        await store.setCursor(cursor);

        await write(tracks(...after));
        const reloaded = await store.reload();
        if (!reloaded.success) {
          return false;
        }

        const { cursor: next, replay, trackCount } = reloaded.value;
        const survivor = after.indexOf(before[cursor]);
        const expectedCursor = survivor >= 0 ? survivor : Math.min(cursor, after.length - 1);
        return trackCount === after.length
          && next === expectedCursor
          && replay === (survivor < 0);
      }), { numRuns: 40 });
    });
  });
});
