/**
 * Web infrastructure exports
 */

export { ControlServer } from './ControlServer';
export type { ControlServerConfig, ServerInfo } from './ControlServer';

export * from './api';
