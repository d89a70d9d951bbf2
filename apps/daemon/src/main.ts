#!/usr/bin/env node
/**
 * chorusd entry point
 *
 * Bootstraps configuration, logging and the playback core, serves the
 * control surface and runs the command dispatcher until a Stop arrives.
 * Stop and a failed bootstrap exit 0, SIGINT and SIGTERM shut down
 * gracefully with 0, an uncaught error exits 1.
 */

import { promises as fs } from 'fs';
import type { Logger } from 'pino';
import { ErrorFactory, MediaApiClient, PlaylistFile } from '@chorus/shared';
import { CommandDispatcher, PlaybackEngine, PlaylistStore } from './application';
import { DispatcherMessage } from './domain/playback/commands';
import { DaemonConfig, DaemonConfigError, loadDaemonConfig } from './infrastructure/config/config';
import { DaemonLogger, createDaemonLogger } from './infrastructure/logging/logger';
import { IPCClient, MpvPipeline, ProcessManager, StreamResolver } from './infrastructure/playback';
import { DependencyValidator } from './infrastructure/validation/dependency-validator';
import { ControlServer } from './infrastructure/web';
import { AsyncChannel } from './utils/AsyncChannel';

/**
 * A bootstrap step failed; the daemon exits without serving anything
 */
export class BootstrapError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BootstrapError';
  }
}

/** Grace period for mpv to create its IPC socket */
const MPV_SOCKET_WAIT_MS = 500;

// Global service instances
let daemonLogger: DaemonLogger | null = null;
let mailbox: AsyncChannel<DispatcherMessage> | null = null;
let dispatcher: CommandDispatcher | null = null;
let engine: PlaybackEngine | null = null;
let controlServer: ControlServer | null = null;
let dispatcherTask: Promise<void> | null = null;
let cleanupTask: Promise<void> | null = null;

function log(): Logger | null {
  return daemonLogger?.logger ?? null;
}

async function prepareDirectories(config: DaemonConfig): Promise<void> {
  await fs.mkdir(config.paths.logsDir, { recursive: true });
  await fs.mkdir(config.paths.playlistsDir, { recursive: true });
  await PlaylistFile.ensureExists(config.paths.playlistFile);
}

/**
 * Build the daemon and start the dispatcher loop. Resolves once the daemon
 * is serving; `dispatcherTask` settles when it stops.
 */
async function initializeDaemon(env: NodeJS.ProcessEnv = process.env): Promise<void> {
  const config = loadDaemonConfig(env);
  await prepareDirectories(config);

  daemonLogger = await createDaemonLogger({ logsDir: config.paths.logsDir, level: config.logLevel });
  const logger = daemonLogger.logger;
  logger.info({ home: config.paths.home, logFile: daemonLogger.file }, 'chorusd starting');

  const dependencies = await DependencyValidator.validateAtStartup(config.mpv.executable, logger);
  if (!dependencies.success) {
    throw new BootstrapError('mpv is not installed');
  }

  const api = new MediaApiClient(config.mediaApi);
  const resolver = new StreamResolver(
    api,
    { headers: api.requestHeaders(), retry: config.retry },
    logger.child({ component: 'resolver' })
  );

  const processManager = new ProcessManager(logger.child({ component: 'mpv' }));
  const ipcClient = new IPCClient(logger.child({ component: 'ipc' }));
  const pipeline = new MpvPipeline(
    ipcClient,
    processManager,
    {
      mpv: { ...config.mpv, executable: dependencies.value.mpv },
      socketWaitMs: MPV_SOCKET_WAIT_MS,
      commandRetries: 1
    },
    logger.child({ component: 'pipeline' })
  );
  engine = new PlaybackEngine(pipeline, resolver, { audioDevice: config.audioDevice }, logger.child({ component: 'engine' }));

  const store = new PlaylistStore(config.paths.playlistFile);
  const loaded = await store.resetTo();
  if (loaded.success) {
    logger.info({ trackCount: loaded.value, file: config.paths.playlistFile }, 'Playlist loaded');
  } else if (loaded.error === 'EMPTY_PLAYLIST') {
    logger.info({ file: config.paths.playlistFile }, 'Playlist is empty, starting idle');
  } else {
    logger.warn(ErrorFactory.createPlaylistError(loaded.error, { file: config.paths.playlistFile }), 'Playlist could not be read, starting idle');
  }

  const commands = new AsyncChannel<DispatcherMessage>(config.commandCapacity);
  mailbox = commands;
  const activeDispatcher = new CommandDispatcher(
    commands,
    store,
    engine,
    { initialMode: 'Loop', skipUnplayable: config.skipUnplayable },
    logger.child({ component: 'dispatcher' })
  );
  dispatcher = activeDispatcher;

  controlServer = new ControlServer({
    host: config.control.host,
    port: config.control.port,
    logger: logger.child({ component: 'control' })
  });
  await controlServer.initialize({
    commands,
    status: () => activeDispatcher.status()
  });
  await controlServer.start();

  dispatcherTask = activeDispatcher.run();
  await commands.send({ type: 'START' });

  logger.info('chorusd ready');
}

/**
 * Stop accepting commands, let the dispatcher finish and release mpv.
 * Safe to call more than once; later calls share the first run.
 */
function cleanup(): Promise<void> {
  cleanupTask ??= runCleanup();
  return cleanupTask;
}

async function runCleanup(): Promise<void> {
  const logger = log();
  logger?.info('Cleaning up');

  // Rejects pending control requests and lets the dispatcher loop end
  mailbox?.close();

  try {
    if (controlServer) {
      await controlServer.stop();
      controlServer = null;
    }

    if (dispatcherTask) {
      await dispatcherTask;
    }
    if (dispatcher) {
      await dispatcher.pumpDrained();
      dispatcher = null;
    }

    if (engine) {
      await engine.shutdown();
      engine = null;
    }

    logger?.info('Cleanup completed');
  } catch (error) {
    logger?.error({ err: error }, 'Cleanup failed');
  }
}

function exitProcess(code: number): never {
  daemonLogger?.flush();
  process.exit(code);
}

function reportStartupFailure(error: unknown): void {
  const logger = log();
  const message = error instanceof Error ? error.message : String(error);

  if (logger) {
    logger.fatal({ err: error }, 'Startup failed');
  } else {
    // Logging is not up yet, configuration or directories failed
    console.error(`chorusd: ${error instanceof DaemonConfigError ? 'invalid configuration: ' : ''}${message}`);
  }
}

/**
 * Set up graceful shutdown handlers
 */
function setupGracefulShutdown(): void {
  const shutdownHandler = async (signal: NodeJS.Signals) => {
    log()?.info({ signal }, 'Shutting down');
    await cleanup();
    exitProcess(0);
  };

  process.once('SIGINT', signal => void shutdownHandler(signal));
  process.once('SIGTERM', signal => void shutdownHandler(signal));

  process.on('uncaughtException', error => {
    log()?.fatal({ err: error }, 'Uncaught exception');
    void cleanup().finally(() => exitProcess(1));
  });

  process.on('unhandledRejection', reason => {
    log()?.fatal({ err: reason }, 'Unhandled rejection');
    void cleanup().finally(() => exitProcess(1));
  });
}

async function main(): Promise<void> {
  setupGracefulShutdown();

  try {
    await initializeDaemon();
  } catch (error) {
    reportStartupFailure(error);
    await cleanup();
    exitProcess(0);
  }

  try {
    await dispatcherTask;
  } catch (error) {
    log()?.fatal({ err: error }, 'Command dispatcher crashed');
    await cleanup();
    exitProcess(1);
  }

  log()?.info('Stopped');
  await cleanup();
  exitProcess(0);
}

// Start the daemon if this file is run directly
if (require.main === module) {
  void main();
}

export { initializeDaemon, cleanup };
