import { AxiosError } from 'axios';
import { YoutubeErrorBody } from '@/types/youtube';

const QUOTA_REASONS = new Set([
  'quotaExceeded',
  'dailyLimitExceeded',
  'rateLimitExceeded',
  'userRateLimitExceeded',
]);

export class YoutubeApiError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly reason: string | null = null,
  ) {
    super(message);
    this.name = 'YoutubeApiError';
  }
}

/** The day's request volume is gone; nothing further will succeed. */
export class YoutubeQuotaError extends YoutubeApiError {
  constructor(message: string, status: number, reason: string | null = null) {
    super(message, status, reason);
    this.name = 'YoutubeQuotaError';
  }
}

export function isQuotaError(err: unknown): err is YoutubeQuotaError {
  return err instanceof YoutubeQuotaError;
}

function isErrorBody(data: unknown): data is YoutubeErrorBody {
  return typeof data === 'object' && data !== null && 'error' in data;
}

/** Maps a failed axios call onto the client's error taxonomy. */
export function toYoutubeError(err: unknown, endpoint: string): Error {
  if (!(err instanceof AxiosError)) {
    return err instanceof Error ? err : new Error(String(err));
  }

  if (err.code === AxiosError.ECONNABORTED || err.code === 'ETIMEDOUT') {
    return new YoutubeApiError(`${endpoint}: request timed out`, 408);
  }

  const status = err.response?.status;
  if (status === undefined) {
    return new YoutubeApiError(`${endpoint}: ${err.message}`, 0);
  }

  const body = err.response?.data;
  const apiError = isErrorBody(body) ? body.error : undefined;
  const reason = apiError?.errors?.find((e) => e.reason)?.reason ?? null;
  const detail = apiError?.message ?? err.message;

  const quota =
    status === 403 || status === 429 || (reason && QUOTA_REASONS.has(reason));
  if (quota) {
    const code = reason ? `${status} ${reason}` : String(status);
    return new YoutubeQuotaError(
      `${endpoint}: quota or rate limit hit (${code}): ${detail}`,
      status,
      reason,
    );
  }
  return new YoutubeApiError(
    `${endpoint}: ${status} ${detail}`,
    status,
    reason,
  );
}
