/**
 * Client for the remote video metadata API.
 *
 * Every endpoint answers with an envelope `{ code, message, data }` where a
 * non-zero `code` means the resource is missing or not accessible.
 */

import { Result } from '../domain/Track';
import { MediaApiError } from '../domain/errors';

export interface MediaApiConfig {
  baseUrl: string;
  timeoutMs: number;
  userAgent: string;
  referer: string;
}

export const DEFAULT_MEDIA_API_CONFIG: MediaApiConfig = {
  baseUrl: 'https://api.bilibili.com',
  timeoutMs: 10000,
  userAgent: 'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36',
  referer: 'https://www.bilibili.com'
};

/**
 * Display metadata of one video, with the cid of its first part
 */
export interface VideoInfo {
  readonly bvid: string;
  readonly cid: string;
  readonly title: string;
  readonly owner: string;
}

/**
 * Port used by components that need a candidate stream URL
 */
export interface IMediaApi {
  fetchAudioUrl(bvid: string, cid: string): Promise<Result<string, MediaApiError>>;
}

/**
 * Port used by the playlist editor to look videos and collections up
 */
export interface ICatalogApi {
  fetchVideoInfo(bvid: string): Promise<Result<VideoInfo, MediaApiError>>;
  fetchCollectionIds(mediaId: string): Promise<Result<string[], MediaApiError>>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class MediaApiClient implements IMediaApi, ICatalogApi {
  private readonly config: MediaApiConfig;

  constructor(config: Partial<MediaApiConfig> = {}) {
    this.config = {
      ...DEFAULT_MEDIA_API_CONFIG,
      ...config,
      baseUrl: (config.baseUrl ?? DEFAULT_MEDIA_API_CONFIG.baseUrl).replace(/\/$/, '')
    };
  }

  /**
   * Headers the media host requires on metadata and stream requests alike
   */
  requestHeaders(): Record<string, string> {
    return {
      'User-Agent': this.config.userAgent,
      Referer: this.config.referer,
      Accept: '*/*'
    };
  }

  /**
   * Candidate audio stream URL for one part of a video (first DASH audio track)
   */
  async fetchAudioUrl(bvid: string, cid: string): Promise<Result<string, MediaApiError>> {
    const query = new URLSearchParams({ fnval: '16', bvid, cid });
    const envelope = await this.getData(`/x/player/playurl?${query.toString()}`);
    if (!envelope.success) {
      return envelope;
    }

    const data = envelope.value;
    const dash = isRecord(data) ? data.dash : undefined;
    const audio = isRecord(dash) ? dash.audio : undefined;
    const first: unknown = Array.isArray(audio) ? audio[0] : undefined;
    const url = isRecord(first) ? first.baseUrl : undefined;

    if (typeof url !== 'string' || url.length === 0) {
      return { success: false, error: 'DATA_PARSING' };
    }
    return { success: true, value: url };
  }

  async fetchVideoInfo(bvid: string): Promise<Result<VideoInfo, MediaApiError>> {
    const query = new URLSearchParams({ bvid });
    const envelope = await this.getData(`/x/web-interface/view?${query.toString()}`);
    if (!envelope.success) {
      return envelope;
    }

    const data = envelope.value;
    if (!isRecord(data)) {
      return { success: false, error: 'DATA_PARSING' };
    }

    const owner = isRecord(data.owner) ? data.owner.name : undefined;
    const cid = data.cid;
    if (
      typeof data.bvid !== 'string' ||
      typeof data.title !== 'string' ||
      typeof owner !== 'string' ||
      (typeof cid !== 'number' && typeof cid !== 'string')
    ) {
      return { success: false, error: 'DATA_PARSING' };
    }

    return {
      success: true,
      value: { bvid: data.bvid, cid: String(cid), title: data.title, owner }
    };
  }

  /**
   * Bvids of every video in a favorites collection, in collection order
   */
  async fetchCollectionIds(mediaId: string): Promise<Result<string[], MediaApiError>> {
    const query = new URLSearchParams({ media_id: mediaId });
    const envelope = await this.getData(`/x/v3/fav/resource/ids?${query.toString()}`);
    if (!envelope.success) {
      return envelope;
    }

    const data = envelope.value;
    if (!Array.isArray(data)) {
      return { success: false, error: 'DATA_PARSING' };
    }

    const bvids: string[] = [];
    for (const item of data) {
      if (isRecord(item) && typeof item.bvid === 'string' && item.bvid.length > 0) {
        bvids.push(item.bvid);
      }
    }
    return { success: true, value: bvids };
  }

  private async getData(endpoint: string): Promise<Result<unknown, MediaApiError>> {
    let response: Response;
    try {
      response = await fetch(`${this.config.baseUrl}${endpoint}`, {
        method: 'GET',
        headers: this.requestHeaders(),
        signal: AbortSignal.timeout(this.config.timeoutMs)
      });
    } catch {
      return { success: false, error: 'NETWORK_ERROR' };
    }

    if (!response.ok) {
      return { success: false, error: 'HTTP_ERROR' };
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      return { success: false, error: 'DATA_PARSING' };
    }

    if (!isRecord(body) || typeof body.code !== 'number') {
      return { success: false, error: 'DATA_PARSING' };
    }
    if (body.code !== 0) {
      return { success: false, error: 'NOT_FOUND' };
    }

    return { success: true, value: body.data };
  }
}
