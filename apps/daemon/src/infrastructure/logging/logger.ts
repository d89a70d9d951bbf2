/**
 * Root logger of the daemon: one JSON log file per start, mirrored to stderr
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import pino, { Logger, LevelWithSilent, StreamEntry } from 'pino';

const LOG_FILE_PATTERN = /^chorusd-.+\.log$/;

export interface DaemonLoggerOptions {
  readonly logsDir: string;
  readonly level: LevelWithSilent;
  /** Log files kept, including the new one */
  readonly keep?: number;
  readonly now?: Date;
  /** Mirror records to stderr as well */
  readonly stderr?: boolean;
}

export interface DaemonLogger {
  readonly logger: Logger;
  readonly file: string;
  /** Write out buffered records; call before the process exits */
  flush(): void;
}

export function logFileName(now: Date): string {
  return `chorusd-${now.toISOString().replace(/[:.]/g, '-')}.log`;
}

/**
 * Delete the oldest log files so that at most `keep` remain. File names sort
 * by their start time.
 */
export async function pruneLogFiles(logsDir: string, keep: number): Promise<string[]> {
  const entries = await fs.readdir(logsDir);
  const logs = entries.filter(name => LOG_FILE_PATTERN.test(name)).sort();
  const stale = logs.slice(0, Math.max(0, logs.length - keep));

  await Promise.all(stale.map(name => fs.rm(path.join(logsDir, name), { force: true })));
  return stale;
}

export async function createDaemonLogger(options: DaemonLoggerOptions): Promise<DaemonLogger> {
  await fs.mkdir(options.logsDir, { recursive: true });

  const file = path.join(options.logsDir, logFileName(options.now ?? new Date()));
  const destination = pino.destination({ dest: file, sync: true, mkdir: true });

  const streams: StreamEntry[] = [{ level: 'trace', stream: destination }];
  if (options.stderr ?? true) {
    streams.push({ level: 'trace', stream: process.stderr });
  }

  const logger = pino(
    {
      level: options.level,
      base: { pid: process.pid },
      timestamp: pino.stdTimeFunctions.isoTime
    },
    pino.multistream(streams)
  );

  await pruneLogFiles(options.logsDir, options.keep ?? 3);

  return {
    logger,
    file,
    flush: () => destination.flushSync()
  };
}
