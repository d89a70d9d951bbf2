/**
 * Tests for the TOML playlist codec
 */

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as fc from 'fast-check';
import { PlaylistFile, Track } from '../index';

const SAMPLE = `
[[tracks]]
bvid = "BV1aa411c7aa"
cid = "100"
title = "First"
owner = "Alice"

[[tracks]]
bvid = "BV1bb411c7bb"
cid = 200
`;

describe('PlaylistFile.parse', () => {
  test('parses every track in order', () => {
    const result = PlaylistFile.parse(SAMPLE);

    expect(result).toEqual({
      success: true,
      value: [
        { bvid: 'BV1aa411c7aa', cid: '100', title: 'First', owner: 'Alice' },
        { bvid: 'BV1bb411c7bb', cid: '200' }
      ]
    });
  });

  test('keeps an integer cid beyond the safe range exactly', () => {
    const content = '[[tracks]]\nbvid = "BV1aa411c7aa"\ncid = 9007199254740993\n';

    expect(PlaylistFile.parse(content)).toEqual({
      success: true,
      value: [{ bvid: 'BV1aa411c7aa', cid: '9007199254740993' }]
    });
  });

  test('treats whitespace-only content as an empty playlist', () => {
    expect(PlaylistFile.parse('')).toEqual({ success: false, error: 'EMPTY_PLAYLIST' });
    expect(PlaylistFile.parse('  \n\t\n')).toEqual({ success: false, error: 'EMPTY_PLAYLIST' });
  });

  test('treats a document without tracks as an empty playlist', () => {
    expect(PlaylistFile.parse('tracks = []')).toEqual({ success: false, error: 'EMPTY_PLAYLIST' });
    expect(PlaylistFile.parse('title = "mine"')).toEqual({ success: false, error: 'EMPTY_PLAYLIST' });
  });

  test('rejects malformed TOML', () => {
    expect(PlaylistFile.parse('[[tracks]\nbvid = ')).toEqual({ success: false, error: 'DATA_PARSING' });
  });

  test('rejects the whole document when one entry is invalid', () => {
    const content = `${SAMPLE}\n[[tracks]]\nbvid = "BV1cc411c7cc"\n`;
    expect(PlaylistFile.parse(content)).toEqual({ success: false, error: 'DATA_PARSING' });
  });

  test('rejects a tracks key that is not a list', () => {
    expect(PlaylistFile.parse('tracks = "BV1aa411c7aa"')).toEqual({ success: false, error: 'DATA_PARSING' });
  });
});

describe('PlaylistFile.serialize', () => {
  test('writes nothing for an empty list', () => {
    expect(PlaylistFile.serialize([])).toBe('');
  });

  test('output parses back to the same tracks', () => {
    const trackArb: fc.Arbitrary<Track> = fc.record(
      {
        bvid: fc.stringMatching(/^BV[0-9A-Za-z]{10}$/),
        cid: fc.integer({ min: 1, max: 1_000_000_000 }).map(String),
        title: fc.string({ minLength: 1, maxLength: 20 }).filter(s => s.trim() === s && s.length > 0),
        owner: fc.string({ minLength: 1, maxLength: 20 }).filter(s => s.trim() === s && s.length > 0)
      },
      { requiredKeys: ['bvid', 'cid'] }
    );

    fc.assert(
      fc.property(fc.array(trackArb, { minLength: 1, maxLength: 10 }), (tracks) => {
        const parsed = PlaylistFile.parse(PlaylistFile.serialize(tracks));
        expect(parsed).toEqual({ success: true, value: tracks });
      }),
      { numRuns: 50 }
    );
  });
});

describe('PlaylistFile on disk', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'chorus-playlist-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  test('ensureExists creates the directory and an empty file', async () => {
    const file = path.join(dir, 'playlists', 'playlist.toml');

    await PlaylistFile.ensureExists(file);

    expect(await fs.readFile(file, 'utf8')).toBe('');
    expect(await PlaylistFile.read(file)).toEqual({ success: false, error: 'EMPTY_PLAYLIST' });
  });

  test('ensureExists leaves an existing file alone', async () => {
    const file = path.join(dir, 'playlist.toml');
    await fs.writeFile(file, SAMPLE);

    await PlaylistFile.ensureExists(file);

    expect(await fs.readFile(file, 'utf8')).toBe(SAMPLE);
  });

  test('read reports a missing file as an IO error', async () => {
    expect(await PlaylistFile.read(path.join(dir, 'missing.toml'))).toEqual({ success: false, error: 'IO_ERROR' });
  });
});
