/**
 * Command definitions of the `chorus` CLI
 */

import { Command } from 'commander';
import {
  BvidUtils,
  ErrorFactory,
  ICatalogApi,
  PlayMode,
  PlayerStatus,
  PlaylistError,
  Result,
  Track,
} from '@chorus/shared';
import { IPlayerClient, PlayerClientError } from './PlayerClient';
import { IPlaylistRepository } from './PlaylistRepository';
import {
  TrackFilter,
  findTracks,
  formatTrack,
  isEmptyFilter,
  mergeTracks,
  removeTracks,
} from './PlaylistEditor';

/**
 * A command could not do what was asked; the message is shown to the user
 */
export class CliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliError';
  }
}

export interface CliDependencies {
  client: IPlayerClient;
  repository: IPlaylistRepository;
  api: ICatalogApi;
  confirm: (question: string) => Promise<boolean>;
  /** Launch the daemon in the background, resolving with its pid */
  startDaemon: () => Promise<Result<number, string>>;
  out: (line: string) => void;
  err: (line: string) => void;
}

interface FilterOptions {
  bvid?: string;
  cid?: string;
  title?: string;
  owner?: string;
}

interface DeleteOptions extends FilterOptions {
  all?: boolean;
  yes?: boolean;
}

interface ModeOptions {
  loop?: boolean;
  shuffle?: boolean;
  repeat?: boolean;
}

interface AddOptions {
  fid?: string;
  bvid?: string;
}

function unwrap<T>(result: Result<T, PlayerClientError>): T {
  if (!result.success) {
    throw new CliError(result.error.message);
  }
  return result.value;
}

function playlistFailure(error: PlaylistError): CliError {
  const details = ErrorFactory.createPlaylistError(error);
  return new CliError(details.suggestion ? `${details.message}. ${details.suggestion}` : details.message);
}

function toFilter(options: FilterOptions): TrackFilter {
  const filter: TrackFilter = {};
  if (options.bvid !== undefined) filter.bvid = options.bvid;
  if (options.cid !== undefined) filter.cid = options.cid;
  if (options.title !== undefined) filter.title = options.title;
  if (options.owner !== undefined) filter.owner = options.owner;
  return filter;
}

function describeStatus(status: PlayerStatus): string[] {
  const lines = [
    `State: ${status.state}`,
    `Mode: ${status.mode}`,
  ];
  if (status.idle) {
    lines.push('Playlist is empty');
  } else if (status.currentTrack) {
    lines.push(`Track: ${formatTrack(status.currentTrack, status.cursor)} of ${status.trackCount}`);
  }
  return lines;
}

export function createProgram(deps: CliDependencies): Command {
  const { client, repository, api, out, err } = deps;

  const readTracks = async (): Promise<Track[]> => {
    const tracks = await repository.read();
    if (!tracks.success) {
      throw playlistFailure(tracks.error);
    }
    return tracks.value;
  };

  const requireDaemon = async (): Promise<void> => {
    if (!(await client.isRunning())) {
      throw new CliError('Daemon is not running, start it with `chorus start`');
    }
  };

  const requirePlayable = async (): Promise<void> => {
    await requireDaemon();
    if ((await readTracks()).length === 0) {
      throw new CliError('Playlist is empty, add tracks with `chorus add`');
    }
  };

  /**
   * Tell a running daemon that the file changed; a stopped daemon reads it
   * on its next start anyway
   */
  const notifyDaemon = async (tracks: readonly Track[]): Promise<void> => {
    if (!(await client.isRunning())) {
      return;
    }
    unwrap(tracks.length === 0 ? await client.playlistIsEmpty() : await client.playlistChanged());
  };

  const fetchTracks = async (options: AddOptions): Promise<Track[]> => {
    let bvids: string[];
    if (options.fid !== undefined) {
      const collection = await api.fetchCollectionIds(options.fid);
      if (!collection.success) {
        throw new CliError(ErrorFactory.createMediaApiError(collection.error, { fid: options.fid }).message);
      }
      bvids = collection.value;
    } else if (options.bvid !== undefined) {
      const bvid = BvidUtils.normalize(options.bvid);
      if (!bvid) {
        throw new CliError(`Not a video id or URL: ${options.bvid}`);
      }
      bvids = [bvid];
    } else {
      throw new CliError('Give a collection with -f or a video with -b');
    }

    const tracks: Track[] = [];
    for (const bvid of bvids) {
      const info = await api.fetchVideoInfo(bvid);
      if (!info.success) {
        err(`Skipping ${bvid}: ${ErrorFactory.createMediaApiError(info.error).message}`);
        continue;
      }
      tracks.push(info.value);
    }
    return tracks;
  };

  const program = new Command();
  program
    .name('chorus')
    .description('Remote control and playlist editor for the chorus playback daemon')
    .showHelpAfterError();

  program
    .command('start')
    .description('start the daemon unless it is already running')
    .action(async () => {
      if (await client.isRunning()) {
        out('Daemon is already running');
        return;
      }
      const started = await deps.startDaemon();
      if (!started.success) {
        throw new CliError(started.error);
      }
      out(`Daemon started (pid ${started.value})`);
    });

  program
    .command('play')
    .description('resume playback, or jump to a track of the playlist')
    .option('-b, --bvid <bvid>', 'track to jump to')
    .action(async (options: { bvid?: string }) => {
      await requirePlayable();
      if (options.bvid !== undefined) {
        const tracks = await readTracks();
        if (!tracks.some(track => track.bvid === options.bvid)) {
          throw new CliError(`${options.bvid} is not in the playlist`);
        }
        unwrap(await client.playTrack(options.bvid));
        return;
      }
      unwrap(await client.play());
    });

  program
    .command('pause')
    .description('pause playback')
    .action(async () => {
      await requirePlayable();
      unwrap(await client.pause());
    });

  program
    .command('next')
    .description('play the next track')
    .action(async () => {
      await requirePlayable();
      unwrap(await client.next());
    });

  program
    .command('previous')
    .description('play the previous track')
    .action(async () => {
      await requirePlayable();
      unwrap(await client.previous());
    });

  program
    .command('stop')
    .description('stop playback and shut the daemon down')
    .action(async () => {
      await requireDaemon();
      unwrap(await client.stop());
    });

  program
    .command('mode')
    .description('choose how the next track is picked')
    .option('-l, --loop', 'play the playlist in order, wrapping around')
    .option('-s, --shuffle', 'pick a random track')
    .option('-r, --repeat', 'repeat the current track')
    .action(async (options: ModeOptions) => {
      const chosen: PlayMode[] = [];
      if (options.loop) chosen.push('Loop');
      if (options.shuffle) chosen.push('Shuffle');
      if (options.repeat) chosen.push('SingleRepeat');
      const [mode] = chosen;
      if (mode === undefined || chosen.length > 1) {
        throw new CliError('Choose exactly one of -l, -s or -r');
      }

      await requireDaemon();
      unwrap(await client.setMode(mode));
      out(`Mode set to ${mode}`);
    });

  program
    .command('status')
    .description('show what the daemon is doing')
    .action(async () => {
      await requireDaemon();
      describeStatus(unwrap(await client.status())).forEach(line => out(line));
    });

  program
    .command('add')
    .description('add a collection or a single video to the playlist')
    .option('-f, --fid <fid>', 'favorites collection id')
    .option('-b, --bvid <bvid>', 'video id or URL')
    .action(async (options: AddOptions) => {
      const incoming = await fetchTracks(options);
      if (incoming.length === 0) {
        out('Nothing to add');
        return;
      }

      let added = 0;
      let updated = 0;
      const result = await repository.update(tracks => {
        const merged = mergeTracks(tracks, incoming);
        added = merged.added;
        updated = merged.updated;
        return merged.tracks;
      });
      if (!result.success) {
        throw playlistFailure(result.error);
      }

      out(`Added ${added}, updated ${updated}`);
      if (result.value.changed) {
        await notifyDaemon(result.value.after);
      }
    });

  program
    .command('find')
    .description('list playlist tracks matching every given filter')
    .option('-b, --bvid <bvid>', 'exact video id')
    .option('-c, --cid <cid>', 'exact part id')
    .option('-t, --title <text>', 'title contains')
    .option('-o, --owner <text>', 'uploader contains')
    .action(async (options: FilterOptions) => {
      const filter = toFilter(options);
      if (isEmptyFilter(filter)) {
        throw new CliError('Give at least one of -b, -c, -t or -o');
      }
      const matches = findTracks(await readTracks(), filter);
      if (matches.length === 0) {
        out('No matching tracks');
        return;
      }
      matches.forEach(({ index, track }) => out(formatTrack(track, index)));
    });

  program
    .command('delete')
    .description('remove matching tracks from the playlist')
    .option('-b, --bvid <bvid>', 'exact video id')
    .option('-c, --cid <cid>', 'exact part id')
    .option('-o, --owner <text>', 'uploader contains')
    .option('-a, --all', 'remove every track')
    .option('-y, --yes', 'do not ask for confirmation')
    .action(async (options: DeleteOptions) => {
      const filter = toFilter({ bvid: options.bvid, cid: options.cid, owner: options.owner });
      if (!options.all && isEmptyFilter(filter)) {
        throw new CliError('Give at least one of -b, -c or -o, or -a for every track');
      }

      const doomed = options.all ? await readTracks() : removeTracks(await readTracks(), filter).removed;
      if (doomed.length === 0) {
        out('No matching tracks');
        return;
      }

      doomed.forEach((track, index) => out(formatTrack(track, index)));
      if (!options.yes && !(await deps.confirm(`Delete ${doomed.length} track(s)?`))) {
        out('Cancelled');
        return;
      }

      const result = await repository.update(tracks => (options.all ? [] : removeTracks(tracks, filter).kept));
      if (!result.success) {
        throw playlistFailure(result.error);
      }

      out(`Deleted ${result.value.before.length - result.value.after.length} track(s)`);
      if (result.value.changed) {
        await notifyDaemon(result.value.after);
      }
    });

  program
    .command('playlist')
    .description('print the playlist')
    .action(async () => {
      const tracks = await readTracks();
      if (tracks.length === 0) {
        out('Playlist is empty');
        return;
      }
      tracks.forEach((track, index) => out(formatTrack(track, index)));
    });

  return program;
}
