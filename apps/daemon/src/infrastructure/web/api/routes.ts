/**
 * Control-surface routes
 *
 * Each command route validates its body, awaits the back-pressured send onto
 * the dispatcher mailbox and acknowledges. Whether the command succeeds is
 * the dispatcher's business; callers only learn that it was accepted.
 */

import type { FastifyInstance, FastifyReply } from 'fastify';
import {
  BvidUtils,
  CONTROL_ROUTES,
  CommandAck,
  ConnectionInfo,
  ControlRoute,
  ErrorFactory,
  PlayTrackRequest,
  SetModeRequest,
  parsePlayMode,
} from '@chorus/shared';
import type { PlayerCommand } from '../../../domain/playback/commands';
import { ChannelClosedError } from '../../../utils/AsyncChannel';
import { registerAPIMiddleware } from './middleware';
import {
  API_ERROR_CODES,
  ControlServerDependencies,
  HTTP_STATUS,
  errorResponse,
  successResponse,
} from './types';

/**
 * Read one field of a request body without trusting its shape; the type
 * argument names the body the route expects
 */
function readField<TBody extends object>(body: unknown, field: keyof TBody & string): unknown {
  if (typeof body !== 'object' || body === null) {
    return undefined;
  }
  return Reflect.get(body, field);
}

async function submit(
  dependencies: ControlServerDependencies,
  command: PlayerCommand,
  reply: FastifyReply
): Promise<FastifyReply> {
  try {
    await dependencies.commands.send(command);
  } catch (error) {
    if (error instanceof ChannelClosedError) {
      return reply
        .code(HTTP_STATUS.SERVICE_UNAVAILABLE)
        .send(errorResponse(API_ERROR_CODES.SERVICE_UNAVAILABLE, 'Player is shutting down'));
    }
    throw error;
  }

  reply.log.info({ command }, 'Command accepted');
  const ack: CommandAck = { accepted: command.type };
  return reply.code(HTTP_STATUS.OK).send(successResponse(ack));
}

/**
 * Register the control routes and middleware on a Fastify instance
 */
export async function registerAPIRoutes(
  fastify: FastifyInstance,
  dependencies: ControlServerDependencies
): Promise<void> {
  registerAPIMiddleware(fastify);

  fastify.get(CONTROL_ROUTES.TEST_CONNECTION, async (_request, reply) => {
    const info: ConnectionInfo = { alive: true, pid: dependencies.pid ?? process.pid };
    return reply.code(HTTP_STATUS.OK).send(successResponse(info));
  });

  fastify.get(CONTROL_ROUTES.STATUS, async (_request, reply) => {
    const status = await dependencies.status();
    return reply.code(HTTP_STATUS.OK).send(successResponse(status));
  });

  const simpleCommands: ReadonlyArray<[ControlRoute, PlayerCommand]> = [
    [CONTROL_ROUTES.PLAY, { type: 'PLAY' }],
    [CONTROL_ROUTES.PAUSE, { type: 'PAUSE' }],
    [CONTROL_ROUTES.NEXT, { type: 'NEXT' }],
    [CONTROL_ROUTES.PREVIOUS, { type: 'PREVIOUS' }],
    [CONTROL_ROUTES.STOP, { type: 'STOP' }],
    [CONTROL_ROUTES.PLAYLIST_CHANGE, { type: 'RELOAD_PLAYLIST' }],
    [CONTROL_ROUTES.PLAYLIST_IS_EMPTY, { type: 'PLAYLIST_BECAME_EMPTY' }],
  ];

  for (const [url, command] of simpleCommands) {
    fastify.post(url, async (_request, reply) => submit(dependencies, command, reply));
  }

  fastify.post<{ Body: unknown }>(CONTROL_ROUTES.PLAY_TRACK, async (request, reply) => {
    const bvid = readField<PlayTrackRequest>(request.body, 'bvid');
    if (typeof bvid !== 'string' || !BvidUtils.isValidBvid(bvid)) {
      return reply
        .code(HTTP_STATUS.BAD_REQUEST)
        .send(errorResponse(API_ERROR_CODES.VALIDATION_FAILED, 'Body must contain a valid "bvid"', { bvid }));
    }
    return submit(dependencies, { type: 'JUMP_TO', bvid }, reply);
  });

  fastify.post<{ Body: unknown }>(CONTROL_ROUTES.MODE, async (request, reply) => {
    const requested = readField<SetModeRequest>(request.body, 'mode');
    const mode = parsePlayMode(requested);
    if (!mode.success) {
      const details = ErrorFactory.createPlayModeError(mode.error, { mode: requested });
      return reply
        .code(HTTP_STATUS.BAD_REQUEST)
        .send(errorResponse(API_ERROR_CODES.INVALID_MODE, details.message, { suggestion: details.suggestion }));
    }
    return submit(dependencies, { type: 'SET_MODE', mode: mode.value }, reply);
  });
}
