/**
 * API middleware: loopback guard, security headers and error envelopes
 */

import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { API_ERROR_CODES, HTTP_STATUS, errorResponse } from './types';

const LOOPBACK_PATTERNS: readonly RegExp[] = [
  /^127\./,
  /^::1$/,
];

/**
 * True for loopback peers, including IPv4-mapped IPv6 addresses
 */
export function isLoopbackAddress(ip: string | undefined): boolean {
  if (!ip) return false;
  const clean = ip.replace(/^::ffff:/, '');
  return LOOPBACK_PATTERNS.some(pattern => pattern.test(clean));
}

/**
 * Refuses every request that does not come from this machine
 */
export function createLoopbackOnlyMiddleware() {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    if (!isLoopbackAddress(request.ip)) {
      request.log.warn({ ip: request.ip, url: request.url }, 'Refused non-loopback request');
      return reply
        .code(HTTP_STATUS.FORBIDDEN)
        .send(errorResponse(API_ERROR_CODES.FORBIDDEN, 'Access denied: loopback only'));
    }
  };
}

export function createSecurityHeadersMiddleware() {
  return async (_request: FastifyRequest, reply: FastifyReply) => {
    reply.header('X-Content-Type-Options', 'nosniff');
    reply.header('Cache-Control', 'no-store');
  };
}

/**
 * Maps thrown errors onto the API envelope. Client mistakes keep their 4xx
 * status, anything else becomes a 500 without internal details.
 */
export function createErrorHandlingMiddleware() {
  return (error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
    const status = error.statusCode ?? HTTP_STATUS.INTERNAL_SERVER_ERROR;

    if (error instanceof SyntaxError || error.name === 'SyntaxError') {
      return reply
        .code(HTTP_STATUS.BAD_REQUEST)
        .send(errorResponse(API_ERROR_CODES.INVALID_JSON, 'Invalid JSON in request body'));
    }

    if (status >= 400 && status < 500) {
      return reply
        .code(status)
        .send(errorResponse(API_ERROR_CODES.INVALID_REQUEST, error.message));
    }

    request.log.error({ err: error, url: request.url, method: request.method }, 'Request failed');
    return reply
      .code(HTTP_STATUS.INTERNAL_SERVER_ERROR)
      .send(errorResponse(API_ERROR_CODES.INTERNAL_ERROR, 'Internal server error'));
  };
}

export function createNotFoundHandler() {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    return reply
      .code(HTTP_STATUS.NOT_FOUND)
      .send(errorResponse(API_ERROR_CODES.NOT_FOUND, `Route ${request.method} ${request.url} not found`));
  };
}

/**
 * Register all API middleware with a Fastify instance
 */
export function registerAPIMiddleware(fastify: FastifyInstance): void {
  fastify.addHook('onRequest', createLoopbackOnlyMiddleware());
  fastify.addHook('onRequest', createSecurityHeadersMiddleware());
  fastify.setErrorHandler(createErrorHandlingMiddleware());
  fastify.setNotFoundHandler(createNotFoundHandler());
}
