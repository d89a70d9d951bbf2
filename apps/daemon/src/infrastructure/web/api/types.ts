/**
 * API types and envelope helpers for the control surface
 */

import type { APIError, APIResponse, PlayerStatus } from '@chorus/shared';
import type { PlayerCommand } from '../../../domain/playback/commands';

export type { APIError, APIResponse };

/**
 * HTTP status codes used by the API
 */
export const HTTP_STATUS = {
  OK: 200,
  BAD_REQUEST: 400,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  INTERNAL_SERVER_ERROR: 500,
  SERVICE_UNAVAILABLE: 503,
} as const;

/**
 * API error codes
 */
export const API_ERROR_CODES = {
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  INVALID_JSON: 'INVALID_JSON',
  INVALID_MODE: 'INVALID_MODE',
  INVALID_REQUEST: 'INVALID_REQUEST',
  FORBIDDEN: 'FORBIDDEN',
  NOT_FOUND: 'NOT_FOUND',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type APIErrorCode = typeof API_ERROR_CODES[keyof typeof API_ERROR_CODES];

/**
 * Where accepted commands go. The dispatcher mailbox satisfies this; `send`
 * suspends while the mailbox is full and rejects once it is closed.
 */
export interface ICommandSink {
  send(command: PlayerCommand): Promise<void>;
}

export interface ControlServerDependencies {
  commands: ICommandSink;
  status: () => Promise<PlayerStatus>;
  /** Reported by the liveness probe */
  pid?: number;
}

export function successResponse<T>(data: T): APIResponse<T> {
  return {
    success: true,
    data,
    timestamp: new Date().toISOString(),
  };
}

export function errorResponse(code: APIErrorCode, message: string, details?: unknown): APIResponse<never> {
  const timestamp = new Date().toISOString();
  const error: APIError = { code, message, timestamp };
  if (details !== undefined) {
    error.details = details;
  }
  return { success: false, error, timestamp };
}
