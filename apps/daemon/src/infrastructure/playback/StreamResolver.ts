/**
 * StreamResolver: candidate URL from the metadata API, verified with a
 * partial-range request, retried with exponential backoff
 */

import type { Logger } from 'pino';
import { Result, IMediaApi } from '@chorus/shared';
import { IStreamResolver } from '../../domain/playback/interfaces';
import { ResolvedStream, RetryPolicy } from '../../domain/playback/types';
import { ResolutionError, ResolutionAttemptError } from '../../domain/playback/errors';
import { retryWithBackoff, Sleep } from '../../utils/retry';

/**
 * Three attempts, one second apart at first, doubling
 */
export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  multiplier: 2
};

export interface StreamResolverOptions {
  /** Headers sent on verification and later on playback */
  readonly headers: Readonly<Record<string, string>>;
  readonly retry: RetryPolicy;
  readonly verifyTimeoutMs: number;
  readonly sleep?: Sleep;
}

/**
 * Only the first KiB is requested; a 2xx answer proves the URL is live
 */
const VERIFY_RANGE = 'bytes=0-1024';

export class StreamResolver implements IStreamResolver {
  private readonly options: StreamResolverOptions;

  constructor(
    private readonly api: IMediaApi,
    options: Partial<StreamResolverOptions> & Pick<StreamResolverOptions, 'headers'>,
    private readonly logger: Logger
  ) {
    this.options = {
      retry: DEFAULT_RETRY_POLICY,
      verifyTimeoutMs: 5000,
      ...options
    };
  }

  async resolve(bvid: string, cid: string): Promise<Result<ResolvedStream, ResolutionError>> {
    const outcome = await retryWithBackoff(
      async (attempt): Promise<Result<ResolvedStream, ResolutionAttemptError>> => {
        const candidate = await this.api.fetchAudioUrl(bvid, cid);
        if (!candidate.success) {
          return candidate;
        }

        if (!(await this.validateStream(candidate.value))) {
          return { success: false, error: 'STREAM_UNVERIFIED' };
        }

        return {
          success: true,
          value: { url: candidate.value, headers: this.options.headers, attempts: attempt }
        };
      },
      this.options.retry,
      {
        sleep: this.options.sleep,
        onRetry: (error, attempt, delayMs) => {
          this.logger.warn({ bvid, cid, error, attempt, delayMs }, 'Stream resolution attempt failed, retrying');
        }
      }
    );

    if (!outcome.success) {
      this.logger.error(
        { bvid, cid, attempts: outcome.error.attempts, lastError: outcome.error.lastError },
        'Stream resolution exhausted its retries'
      );
      return { success: false, error: 'FETCH_EXHAUSTED' };
    }

    this.logger.debug({ bvid, cid, attempts: outcome.value.attempts }, 'Stream resolved');
    return outcome;
  }

  async validateStream(streamUrl: string): Promise<boolean> {
    try {
      const response = await fetch(streamUrl, {
        method: 'GET',
        headers: { ...this.options.headers, Range: VERIFY_RANGE },
        signal: AbortSignal.timeout(this.options.verifyTimeoutMs)
      });
      await response.body?.cancel();
      return response.ok;
    } catch (error) {
      this.logger.debug({ err: error, streamUrl }, 'Stream verification request failed');
      return false;
    }
  }
}
