/**
 * Cursor arithmetic for playlist navigation. Callers guarantee `length > 0`.
 */

import type { PlayMode } from '@chorus/shared';

/**
 * Returns a number in [0, 1), like Math.random
 */
export type RandomSource = () => number;

function randomIndex(length: number, random: RandomSource): number {
  return Math.min(length - 1, Math.floor(random() * length));
}

export function nextIndex(cursor: number, length: number, mode: PlayMode, random: RandomSource): number {
  switch (mode) {
    case 'Loop':
      return (cursor + 1) % length;
    case 'Shuffle':
      // may land on the current track again
      return randomIndex(length, random);
    case 'SingleRepeat':
      return cursor;
  }
}

export function previousIndex(cursor: number, length: number, mode: PlayMode, random: RandomSource): number {
  switch (mode) {
    case 'Loop':
      return cursor === 0 ? length - 1 : cursor - 1;
    case 'Shuffle':
      return randomIndex(length, random);
    case 'SingleRepeat':
      return cursor;
  }
}
