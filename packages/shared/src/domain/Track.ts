/**
 * Track entity: a remote video resource identified by its primary id (bvid)
 * and the sub-id (cid) of the part whose audio is played.
 */
export interface Track {
  readonly bvid: string;
  readonly cid: string;
  readonly title?: string;
  readonly owner?: string;
}

/**
 * Track creation data as found in a playlist file or an API payload
 */
export interface TrackCreateData {
  bvid: unknown;
  cid: unknown;
  title?: unknown;
  owner?: unknown;
}

/**
 * Result type for operations that can fail
 */
export type Result<T, E> =
  | { success: true; value: T }
  | { success: false; error: E };

/**
 * Track-related error types
 */
export type TrackError =
  | 'INVALID_BVID'
  | 'INVALID_CID';

/**
 * Utility functions for bvid handling
 */
export class BvidUtils {
  static constructVideoUrl(bvid: string): string {
    return `https://www.bilibili.com/video/${bvid}`;
  }

  static isValidBvid(value: string): boolean {
    // "BV" followed by ten base58-ish characters
    return /^BV[0-9A-Za-z]{10}$/.test(value);
  }

  static extractBvidFromUrl(url: string): string | null {
    const match = url.match(/\/video\/(BV[0-9A-Za-z]{10})/);
    return match ? match[1] : null;
  }

  /**
   * Accepts either a bare bvid or a video page URL
   */
  static normalize(input: string): string | null {
    const trimmed = input.trim();
    if (this.isValidBvid(trimmed)) {
      return trimmed;
    }
    return this.extractBvidFromUrl(trimmed);
  }
}

/**
 * Track validation and creation functions
 */
export class TrackValidator {
  static validateBvid(bvid: unknown): bvid is string {
    return typeof bvid === 'string' && bvid.trim().length > 0;
  }

  /**
   * TOML integers beyond the safe range arrive as bigint
   */
  static validateCid(cid: unknown): cid is string | number | bigint {
    if (typeof cid === 'number') {
      return Number.isInteger(cid) && cid > 0;
    }
    if (typeof cid === 'bigint') {
      return cid > 0n;
    }
    return typeof cid === 'string' && /^\d+$/.test(cid.trim());
  }

  static create(data: TrackCreateData): Result<Track, TrackError> {
    if (!this.validateBvid(data.bvid)) {
      return { success: false, error: 'INVALID_BVID' };
    }

    if (!this.validateCid(data.cid)) {
      return { success: false, error: 'INVALID_CID' };
    }

    const title = optionalText(data.title);
    const owner = optionalText(data.owner);

    const track: Track = {
      bvid: data.bvid.trim(),
      cid: String(data.cid).trim(),
      ...(title !== undefined && { title }),
      ...(owner !== undefined && { owner })
    };

    return { success: true, value: track };
  }
}

function optionalText(value: unknown): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}
