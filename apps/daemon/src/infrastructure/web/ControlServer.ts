/**
 * Control server
 *
 * Fastify HTTP service bound to the loopback interface that turns remote
 * calls into dispatcher commands.
 */

import Fastify, { FastifyBaseLogger, FastifyInstance } from 'fastify';
import { registerAPIRoutes } from './api';
import type { ControlServerDependencies } from './api';

export interface ControlServerConfig {
  port: number;
  host: string;
  logger: FastifyBaseLogger;
}

export interface ServerInfo {
  port: number;
  host: string;
  uptime: number;
}

export class ControlServer {
  private readonly fastify: FastifyInstance;
  private startTime: Date | null = null;
  private initialized = false;

  constructor(private readonly config: ControlServerConfig) {
    this.fastify = Fastify({
      logger: config.logger,
      disableRequestLogging: true,
      trustProxy: false,
    });
  }

  async initialize(dependencies: ControlServerDependencies): Promise<void> {
    if (this.initialized) {
      throw new Error('Control server is already initialized');
    }
    await registerAPIRoutes(this.fastify, dependencies);
    await this.fastify.ready();
    this.initialized = true;
  }

  /**
   * Listen on the configured address. Port 0 picks a free port, which
   * `getServerInfo` then reports.
   */
  async start(): Promise<void> {
    await this.fastify.listen({ port: this.config.port, host: this.config.host });
    this.startTime = new Date();
    this.config.logger.info(this.getServerInfo(), 'Control server listening');
  }

  async stop(): Promise<void> {
    await this.fastify.close();
    this.startTime = null;
    this.config.logger.info('Control server stopped');
  }

  getServerInfo(): ServerInfo {
    const address = this.fastify.server.address();
    const port = typeof address === 'object' && address !== null ? address.port : this.config.port;
    return {
      port,
      host: this.config.host,
      uptime: this.startTime ? Date.now() - this.startTime.getTime() : 0,
    };
  }

  getFastifyInstance(): FastifyInstance {
    return this.fastify;
  }
}
