import { Result } from './Track';

/**
 * Navigation policy applied when moving through the playlist.
 *
 * - `Loop`: sequential with wraparound
 * - `Shuffle`: uniform random index, the current one included
 * - `SingleRepeat`: the cursor stays where it is
 */
export type PlayMode = 'Loop' | 'Shuffle' | 'SingleRepeat';

export type PlayModeError = 'INVALID_MODE';

export const PLAY_MODES: readonly PlayMode[] = ['Loop', 'Shuffle', 'SingleRepeat'];

const MODE_ALIASES: ReadonlyMap<string, PlayMode> = new Map<string, PlayMode>([
  ['loop', 'Loop'],
  ['shuffle', 'Shuffle'],
  ['singlerepeat', 'SingleRepeat'],
  ['repeat', 'SingleRepeat']
]);

export function isPlayMode(value: unknown): value is PlayMode {
  return typeof value === 'string' && PLAY_MODES.some(mode => mode === value);
}

/**
 * Parse a mode name as sent over the control surface. Matching ignores case,
 * and `Repeat` is accepted for `SingleRepeat`.
 */
export function parsePlayMode(value: unknown): Result<PlayMode, PlayModeError> {
  if (typeof value !== 'string') {
    return { success: false, error: 'INVALID_MODE' };
  }

  const mode = MODE_ALIASES.get(value.trim().toLowerCase());
  if (mode === undefined) {
    return { success: false, error: 'INVALID_MODE' };
  }

  return { success: true, value: mode };
}
