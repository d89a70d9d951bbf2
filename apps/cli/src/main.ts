#!/usr/bin/env node
/**
 * chorus entry point
 */

import { spawn } from 'child_process';
import { createInterface } from 'readline/promises';
import which from 'which';
import { MediaApiClient, Result, resolveControlEndpoint, resolvePaths } from '@chorus/shared';
import { PlayerClient } from './PlayerClient';
import { PlaylistRepository } from './PlaylistRepository';
import { CliDependencies, CliError, createProgram } from './program';

const DAEMON_EXECUTABLE = 'chorusd';

async function confirm(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(`${question} [y/N] `);
    return ['y', 'yes'].includes(answer.trim().toLowerCase());
  } finally {
    rl.close();
  }
}

/**
 * Launch chorusd detached from this terminal so it outlives the CLI
 */
async function startDaemon(): Promise<Result<number, string>> {
  const executable = process.env.CHORUS_DAEMON_PATH?.trim() || await which(DAEMON_EXECUTABLE, { nothrow: true });
  if (!executable) {
    return { success: false, error: `${DAEMON_EXECUTABLE} was not found in PATH` };
  }

  return new Promise(resolve => {
    const child = spawn(executable, [], { detached: true, stdio: 'ignore', env: process.env });
    child.once('error', error => {
      resolve({ success: false, error: `Could not start ${executable}: ${error.message}` });
    });
    child.once('spawn', () => {
      child.unref();
      resolve({ success: true, value: child.pid ?? 0 });
    });
  });
}

function createDependencies(): CliDependencies {
  const paths = resolvePaths();
  const api = new MediaApiClient({
    ...(process.env.CHORUS_API_BASE_URL ? { baseUrl: process.env.CHORUS_API_BASE_URL } : {}),
  });

  return {
    client: new PlayerClient(resolveControlEndpoint()),
    repository: new PlaylistRepository(paths.playlistFile),
    api,
    confirm,
    startDaemon,
    out: line => console.log(line),
    err: line => console.error(line),
  };
}

async function main(argv: string[]): Promise<number> {
  const program = createProgram(createDependencies());
  try {
    await program.parseAsync(argv);
    return 0;
  } catch (error) {
    if (error instanceof CliError) {
      console.error(`chorus: ${error.message}`);
      return 1;
    }
    throw error;
  }
}

if (require.main === module) {
  main(process.argv)
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      console.error('Unexpected error:', error);
      process.exitCode = 1;
    });
}

export { main };
