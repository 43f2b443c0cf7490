import { promises as fs } from "node:fs";
import {
  NotFoundLocallyError,
  NotFoundRemotelyError,
  PartialApplicationError,
  SpotifyApiError,
  describeError
} from "./errors";
import { logger } from "./logger";
import { extractPlaylistId, playlistFromPayload, trackFromPayload } from "./mappers";
import type { PlaylistStore } from "./playlist-store";
import type { SpotifyClient } from "./spotify-client";
import type {
  CreatedResult,
  DiffResult,
  FieldChange,
  IngestSummary,
  MetadataDiff,
  Playlist,
  PlaylistPayload,
  PullResult,
  PushRequest,
  PushResult,
  Track,
  UpdatedResult
} from "./types";

export type RemoteClient = Pick<
  SpotifyClient,
  "getPlaylist" | "getPlaylistTracks" | "createPlaylist" | "addTracks" | "setCoverImage" | "getCurrentUserId"
>;

export type LocalStore = Pick<
  PlaylistStore,
  "upsertPlaylist" | "upsertTrack" | "fetchPlaylist" | "fetchPlaylists" | "fetchTracks" | "deleteTrack"
>;

interface RemoteSnapshot {
  playlist: Playlist;
  tracks: Track[];
  skippedCount: number;
}

interface WriteProgress {
  applied: number;
}

const PLAYLIST_FIELDS: (keyof Playlist)[] = [
  "id",
  "name",
  "ownerId",
  "ownerName",
  "ownerUrl",
  "url",
  "description",
  "public",
  "collaborative",
  "followers",
  "snapshotId",
  "imageUrl",
  "trackCount"
];

function recordChange<K extends keyof Playlist>(
  changes: { [P in K]?: FieldChange<Playlist[P]> },
  key: K,
  local: Playlist,
  remote: Playlist
): void {
  if (local[key] !== remote[key]) {
    changes[key] = { local: local[key], remote: remote[key] };
  }
}

/** Field-by-field comparison; an empty object means the metadata matches. */
export function diffPlaylistMetadata(local: Playlist, remote: Playlist): MetadataDiff {
  const changes: MetadataDiff = {};

  for (const key of PLAYLIST_FIELDS) {
    recordChange(changes, key, local, remote);
  }

  return changes;
}

function uniqueById(tracks: Track[]): Track[] {
  const seen = new Set<string>();
  return tracks.filter((track) => {
    if (seen.has(track.id)) {
      return false;
    }

    seen.add(track.id);
    return true;
  });
}

export function diffTrackSets(localTracks: Track[], remoteTracks: Track[]): { added: Track[]; removed: Track[] } {
  const localIds = new Set(localTracks.map((track) => track.id));
  const remoteIds = new Set(remoteTracks.map((track) => track.id));

  return {
    added: uniqueById(remoteTracks).filter((track) => !localIds.has(track.id)),
    removed: uniqueById(localTracks).filter((track) => !remoteIds.has(track.id))
  };
}

async function encodeImage(imagePath: string): Promise<string> {
  const data = await fs.readFile(imagePath);
  return data.toString("base64");
}

/**
 * Reconciles the local store with Spotify. Holds no state of its own beyond
 * the two collaborators for the duration of a command.
 */
export class SyncService {
  constructor(
    private readonly store: LocalStore,
    private readonly remote: RemoteClient
  ) {}

  async add(identifier: string): Promise<CreatedResult> {
    const playlistId = extractPlaylistId(identifier);
    logger.info(`Stage: adding playlist ${playlistId}.`);

    const snapshot = await this.fetchRemote(playlistId);
    await this.applyWrites("Add", playlistId, (progress) => this.ingest(snapshot, progress));

    logger.info(`Added playlist '${snapshot.playlist.name}' with ${this.countTracks(snapshot)} tracks.`);
    return { status: "created", ...this.summarize(snapshot) };
  }

  /** Ingests the remote state; a playlist not stored yet is added. */
  async update(identifier: string): Promise<PullResult> {
    return this.pull(identifier, false);
  }

  /** Update plus removal of local tracks that are gone remotely. */
  async sync(identifier: string): Promise<PullResult> {
    return this.pull(identifier, true);
  }

  /** Syncs every stored playlist in turn, stopping at the first failure. */
  async syncAll(): Promise<UpdatedResult[]> {
    const playlists = await this.store.fetchPlaylists();
    const results: UpdatedResult[] = [];

    for (const playlist of playlists) {
      results.push(await this.refreshKnown(playlist.id, true));
    }

    return results;
  }

  async pull(identifier: string, remove = false): Promise<PullResult> {
    const playlistId = extractPlaylistId(identifier);

    if (!(await this.store.fetchPlaylist(playlistId))) {
      logger.info(`Playlist ${playlistId} is not stored locally yet; adding it.`);
      return this.add(playlistId);
    }

    return this.refreshKnown(playlistId, remove);
  }

  /**
   * Creates a new Spotify playlist from a stored one. The stored playlist keeps
   * its own ID; the new remote playlist is not linked back to it.
   */
  async push(identifier: string, request: PushRequest): Promise<PushResult> {
    const playlistId = extractPlaylistId(identifier);

    const playlist = await this.store.fetchPlaylist(playlistId);
    if (!playlist) {
      throw new NotFoundLocallyError(`Playlist with ID ${playlistId} not found.`);
    }

    const tracks = await this.store.fetchTracks(playlistId);
    if (tracks.length === 0) {
      throw new NotFoundLocallyError(`No tracks found for playlist with ID ${playlistId}.`);
    }

    const image = request.imagePath ? await encodeImage(request.imagePath) : null;

    logger.info(`Stage: creating Spotify playlist '${request.name}' from ${playlistId}.`);
    const userId = await this.remote.getCurrentUserId();
    const created = await this.remote.createPlaylist(userId, {
      name: request.name,
      description: request.description,
      public: request.public
    });

    const uris = tracks.map((track) => track.uri);

    try {
      await this.remote.addTracks(created.id, uris);
      if (image) {
        await this.remote.setCoverImage(created.id, image);
      }
    } catch (error) {
      throw new PartialApplicationError(
        `Created Spotify playlist ${created.id} but could not finish filling it: ${describeError(error)}`,
        1,
        { cause: error }
      );
    }

    logger.info(`Pushed ${uris.length} tracks to Spotify playlist ${created.id}.`);

    return {
      playlistId: created.id,
      playlistUrl: created.external_urls?.spotify ?? null,
      trackCount: uris.length,
      public: request.public,
      imageUploaded: image !== null
    };
  }

  /** Read-only comparison of the stored playlist with its current Spotify state. */
  async diff(identifier: string, detailed = false): Promise<DiffResult> {
    const playlistId = extractPlaylistId(identifier);

    const localPlaylist = await this.store.fetchPlaylist(playlistId);
    if (!localPlaylist) {
      throw new NotFoundLocallyError(`Playlist with ID ${playlistId} not found.`);
    }

    const localTracks = await this.store.fetchTracks(playlistId);
    const snapshot = await this.fetchRemote(playlistId);
    const { added, removed } = diffTrackSets(localTracks, snapshot.tracks);

    const result: DiffResult = { playlistId, added, removed };
    if (detailed) {
      result.metadataChanged = diffPlaylistMetadata(localPlaylist, snapshot.playlist);
    }

    return result;
  }

  private async refreshKnown(playlistId: string, removeMissing: boolean): Promise<UpdatedResult> {
    logger.info(`Stage: updating playlist ${playlistId}${removeMissing ? " with track removal" : ""}.`);

    // No local write happens until every remote page is in hand.
    const snapshot = await this.fetchRemote(playlistId);

    const removedTrackIds = await this.applyWrites(removeMissing ? "Sync" : "Update", playlistId, async (progress) => {
      await this.ingest(snapshot, progress);
      return removeMissing ? this.removeMissingTracks(playlistId, snapshot.tracks, progress) : [];
    });

    logger.info(
      `Updated playlist '${snapshot.playlist.name}': ${this.countTracks(snapshot)} tracks, ${removedTrackIds.length} removed.`
    );

    return { status: "updated", ...this.summarize(snapshot), removedTrackIds };
  }

  private async fetchRemote(playlistId: string): Promise<RemoteSnapshot> {
    let payload: PlaylistPayload;
    try {
      payload = await this.remote.getPlaylist(playlistId);
    } catch (error) {
      if (error instanceof SpotifyApiError && error.status === 404) {
        throw new NotFoundRemotelyError(`Playlist with ID ${playlistId} not found on Spotify.`);
      }

      throw error;
    }

    const items = await this.remote.getPlaylistTracks(playlistId);

    const tracks: Track[] = [];
    let skippedCount = 0;
    for (const item of items) {
      const track = trackFromPayload(item, playlistId);
      if (!track) {
        skippedCount += 1;
        continue;
      }

      tracks.push(track);
    }

    if (skippedCount > 0) {
      logger.debug(`Skipping ${skippedCount} items without a track ID in playlist ${playlistId}.`);
    }

    return {
      playlist: { ...playlistFromPayload(payload), id: playlistId },
      tracks,
      skippedCount
    };
  }

  private async ingest(snapshot: RemoteSnapshot, progress: WriteProgress): Promise<void> {
    await this.store.upsertPlaylist(snapshot.playlist);
    progress.applied += 1;

    for (const track of snapshot.tracks) {
      await this.store.upsertTrack(track);
      progress.applied += 1;
    }
  }

  private async removeMissingTracks(
    playlistId: string,
    remoteTracks: Track[],
    progress: WriteProgress
  ): Promise<string[]> {
    const remoteIds = new Set(remoteTracks.map((track) => track.id));
    const localTracks = await this.store.fetchTracks(playlistId);
    const removed: string[] = [];

    for (const track of localTracks) {
      if (remoteIds.has(track.id)) {
        continue;
      }

      await this.store.deleteTrack(track.id, playlistId);
      progress.applied += 1;
      removed.push(track.id);
      logger.debug(`Removed track '${track.name}' (${track.id}) from playlist ${playlistId}.`);
    }

    return removed;
  }

  private async applyWrites<T>(
    operation: string,
    playlistId: string,
    work: (progress: WriteProgress) => Promise<T>
  ): Promise<T> {
    const progress: WriteProgress = { applied: 0 };

    try {
      return await work(progress);
    } catch (error) {
      if (progress.applied === 0) {
        throw error;
      }

      throw new PartialApplicationError(
        `${operation} of playlist ${playlistId} stopped after ${progress.applied} writes: ${describeError(error)}. Running it again is safe.`,
        progress.applied,
        { cause: error }
      );
    }
  }

  private countTracks(snapshot: RemoteSnapshot): number {
    return new Set(snapshot.tracks.map((track) => track.id)).size;
  }

  private summarize(snapshot: RemoteSnapshot): IngestSummary {
    return {
      playlistId: snapshot.playlist.id,
      name: snapshot.playlist.name,
      trackCount: this.countTracks(snapshot),
      skippedCount: snapshot.skippedCount
    };
  }
}
