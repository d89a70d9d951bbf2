/**
 * API infrastructure exports
 */

export type {
  APIError,
  APIResponse,
  APIErrorCode,
  ICommandSink,
  ControlServerDependencies,
} from './types';

export {
  HTTP_STATUS,
  API_ERROR_CODES,
  successResponse,
  errorResponse,
} from './types';

export {
  isLoopbackAddress,
  createLoopbackOnlyMiddleware,
  createSecurityHeadersMiddleware,
  createErrorHandlingMiddleware,
  createNotFoundHandler,
  registerAPIMiddleware,
} from './middleware';

export { registerAPIRoutes } from './routes';
