/**
 * Pure playlist edits behind the add, find and delete commands
 */

import type { Track } from '@chorus/shared';

export interface MergeOutcome {
  tracks: Track[];
  added: number;
  updated: number;
}

/**
 * Exact bvid and cid, case-insensitive substring for title and owner.
 * Every given field must match; an empty filter matches nothing.
 */
export interface TrackFilter {
  bvid?: string;
  cid?: string;
  title?: string;
  owner?: string;
}

export interface RemovalOutcome {
  kept: Track[];
  removed: Track[];
}

function sameTrack(a: Track, b: Track): boolean {
  return a.bvid === b.bvid && a.cid === b.cid && a.title === b.title && a.owner === b.owner;
}

/**
 * Tracks already present (by bvid) are replaced in place, new ones are
 * appended in the order given. A bvid repeated in `incoming` counts once.
 */
export function mergeTracks(existing: readonly Track[], incoming: readonly Track[]): MergeOutcome {
  const tracks = [...existing];
  const positions = new Map(tracks.map((track, index) => [track.bvid, index]));
  let added = 0;
  let updated = 0;

  for (const track of incoming) {
    const index = positions.get(track.bvid);
    if (index === undefined) {
      positions.set(track.bvid, tracks.length);
      tracks.push(track);
      added++;
      continue;
    }

    const current = tracks[index];
    if (current !== undefined && !sameTrack(current, track)) {
      tracks[index] = track;
      updated++;
    }
  }

  return { tracks, added, updated };
}

export function isEmptyFilter(filter: TrackFilter): boolean {
  return filter.bvid === undefined && filter.cid === undefined && filter.title === undefined && filter.owner === undefined;
}

function containsIgnoringCase(value: string | undefined, needle: string): boolean {
  return value !== undefined && value.toLowerCase().includes(needle.toLowerCase());
}

export function matchesFilter(track: Track, filter: TrackFilter): boolean {
  if (isEmptyFilter(filter)) return false;
  if (filter.bvid !== undefined && track.bvid !== filter.bvid) return false;
  if (filter.cid !== undefined && track.cid !== filter.cid) return false;
  if (filter.title !== undefined && !containsIgnoringCase(track.title, filter.title)) return false;
  if (filter.owner !== undefined && !containsIgnoringCase(track.owner, filter.owner)) return false;
  return true;
}

/**
 * Matching tracks with their position in the playlist
 */
export function findTracks(tracks: readonly Track[], filter: TrackFilter): Array<{ index: number; track: Track }> {
  return tracks
    .map((track, index) => ({ index, track }))
    .filter(({ track }) => matchesFilter(track, filter));
}

export function removeTracks(tracks: readonly Track[], filter: TrackFilter): RemovalOutcome {
  const kept: Track[] = [];
  const removed: Track[] = [];
  for (const track of tracks) {
    (matchesFilter(track, filter) ? removed : kept).push(track);
  }
  return { kept, removed };
}

export function formatTrack(track: Track, index: number): string {
  let line = `${index + 1}. ${track.bvid} (cid ${track.cid})`;
  if (track.title !== undefined) line += ` ${track.title}`;
  if (track.owner !== undefined) line += ` - ${track.owner}`;
  return line;
}
