import { Command } from "commander";
import { AuthService } from "./auth-service";
import type { AppConfig } from "./config";
import { LibraryService } from "./library-service";
import { extractPlaylistId } from "./mappers";
import { PlaylistStore } from "./playlist-store";
import { SpotifyClient } from "./spotify-client";
import { SyncService } from "./sync-service";

export type ResultWriter = (value: unknown) => void;

export function printResult(value: unknown): void {
  process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

async function withStore<T>(config: AppConfig, work: (store: PlaylistStore) => Promise<T>): Promise<T> {
  const store = await PlaylistStore.open(config.databasePath);
  try {
    return await work(store);
  } finally {
    await store.close();
  }
}

async function withSync<T>(
  config: AppConfig,
  work: (sync: SyncService, store: PlaylistStore) => Promise<T>
): Promise<T> {
  const accessToken = await new AuthService(config).getAccessToken();
  const spotifyClient = new SpotifyClient(accessToken);

  return withStore(config, (store) => work(new SyncService(store, spotifyClient), store));
}

export function buildProgram(config: AppConfig, write: ResultWriter = printResult): Command {
  const program: Command = new Command();

  program
    .name("playlist-vault")
    .description("Keep a local copy of your Spotify playlists and reconcile it with Spotify.")
    .showHelpAfterError();

  const auth = program.command("auth").description("Manage Spotify authentication.");

  auth
    .command("login")
    .description("Log in to Spotify through the browser.")
    .option("--no-browser", "print the authorization URL without opening a browser")
    .action(async (options: { browser: boolean }) => {
      const service = new AuthService(config, options.browser ? {} : { openUrl: () => undefined });
      const { credential, user } = await service.login();
      write({
        status: "logged_in",
        user: user.display_name ?? user.id,
        expiresAt: new Date(credential.expires_at * 1000).toISOString()
      });
    });

  auth
    .command("status")
    .description("Show the state of the saved credential.")
    .action(async () => {
      write(await new AuthService(config).status());
    });

  auth
    .command("refresh")
    .description("Refresh the access token now.")
    .action(async () => {
      const credential = await new AuthService(config).refresh();
      write({ status: "refreshed", expiresAt: new Date(credential.expires_at * 1000).toISOString() });
    });

  auth
    .command("clean")
    .description("Remove the saved credential.")
    .action(async () => {
      const removed = await new AuthService(config).clean();
      write({ status: removed ? "removed" : "absent" });
    });

  program
    .command("add")
    .description("Store a Spotify playlist and its tracks.")
    .argument("<playlist>", "playlist ID or URL")
    .action(async (playlist: string) => {
      write(await withSync(config, (sync) => sync.add(playlist)));
    });

  program
    .command("update")
    .description("Overwrite a stored playlist with its current Spotify state.")
    .argument("<playlist>", "playlist ID or URL")
    .action(async (playlist: string) => {
      write(await withSync(config, (sync) => sync.update(playlist)));
    });

  program
    .command("sync")
    .description("Update a stored playlist and drop tracks no longer on Spotify.")
    .argument("[playlist]", "playlist ID or URL")
    .option("-a, --all", "sync every stored playlist")
    .action(async (playlist: string | undefined, options: { all?: boolean }) => {
      if (options.all) {
        write(await withSync(config, (sync) => sync.syncAll()));
        return;
      }

      if (!playlist) {
        program.error("sync needs a playlist or --all");
      }

      const target: string = playlist;
      write(await withSync(config, (sync) => sync.sync(target)));
    });

  program
    .command("pull")
    .description("Bring a playlist up to date from Spotify, adding it when it is not stored yet.")
    .argument("<playlist>", "playlist ID or URL")
    .option("-r, --rm", "remove tracks that are no longer in the Spotify playlist")
    .action(async (playlist: string, options: { rm?: boolean }) => {
      write(await withSync(config, (sync) => sync.pull(playlist, options.rm === true)));
    });

  program
    .command("push")
    .description("Create a new Spotify playlist from a stored one.")
    .argument("<playlist>", "stored playlist ID or URL")
    .option("-n, --name <name>", "name for the new playlist (defaults to the stored name)")
    .option("-d, --description <text>", "description for the new playlist", "")
    .option("-p, --public", "make the new playlist public")
    .option("-i, --image <path>", "JPEG file to use as cover image")
    .action(
      async (
        playlist: string,
        options: { name?: string; description: string; public?: boolean; image?: string }
      ) => {
        const result = await withSync(config, async (sync, store) => {
          const stored = await store.fetchPlaylist(extractPlaylistId(playlist));
          return sync.push(playlist, {
            name: options.name ?? stored?.name ?? "",
            description: options.description,
            public: options.public === true,
            imagePath: options.image
          });
        });
        write(result);
      }
    );

  program
    .command("diff")
    .description("Compare a stored playlist with Spotify without changing anything.")
    .argument("<playlist>", "playlist ID or URL")
    .option("--detailed", "also compare playlist metadata")
    .action(async (playlist: string, options: { detailed?: boolean }) => {
      write(await withSync(config, (sync) => sync.diff(playlist, options.detailed === true)));
    });

  program
    .command("list")
    .description("List stored playlists, or the tracks of one playlist.")
    .option("-p, --playlist <playlist>", "playlist ID or URL to list tracks for")
    .action(async (options: { playlist?: string }) => {
      const playlistOption = options.playlist;
      if (playlistOption) {
        write({ tracks: await withStore(config, (store) => new LibraryService(store).listTracks(playlistOption)) });
        return;
      }

      write({ playlists: await withStore(config, (store) => new LibraryService(store).listPlaylists()) });
    });

  program
    .command("rm")
    .description("Remove a stored playlist, or a single track from it.")
    .argument("<playlist>", "playlist ID or URL")
    .option("-t, --track <trackId>", "remove only this track")
    .action(async (playlist: string, options: { track?: string }) => {
      const trackId = options.track;
      if (trackId) {
        write(await withStore(config, (store) => new LibraryService(store).removeTrack(playlist, trackId)));
        return;
      }

      write(await withStore(config, (store) => new LibraryService(store).removePlaylist(playlist)));
    });

  program
    .command("dump")
    .description("Export a stored playlist and its tracks to a JSON file.")
    .argument("<playlist>", "playlist ID or URL")
    .option("-o, --output <file>", "output file")
    .action(async (playlist: string, options: { output?: string }) => {
      write(await withStore(config, (store) => new LibraryService(store).dumpPlaylist(playlist, options.output)));
    });

  program
    .command("stats")
    .description("Show statistics about the stored playlists.")
    .option("--top-tracks", "most frequent tracks")
    .option("--top-artists", "most frequent artists")
    .option("--top-users", "accounts that added the most tracks")
    .option("--recent-tracks", "most recently added tracks")
    .action(
      async (options: { topTracks?: boolean; topArtists?: boolean; topUsers?: boolean; recentTracks?: boolean }) => {
        const result = await withStore(config, async (store) => {
          const library = new LibraryService(store);
          if (options.topTracks) {
            return { topTracks: await library.topTracks() };
          }

          if (options.topArtists) {
            return { topArtists: await library.topArtists() };
          }

          if (options.topUsers) {
            return { topUsers: await library.topUsers() };
          }

          if (options.recentTracks) {
            return { recentTracks: await library.recentTracks() };
          }

          return library.stats();
        });
        write(result);
      }
    );

  return program;
}
