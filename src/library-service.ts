import { promises as fs } from "node:fs";
import { NotFoundLocallyError } from "./errors";
import { logger } from "./logger";
import { extractPlaylistId } from "./mappers";
import type { PlaylistStore } from "./playlist-store";
import type {
  ArtistOccurrence,
  DumpResult,
  LibraryStats,
  Playlist,
  RecentTrack,
  RemovedPlaylistResult,
  RemovedTrackResult,
  Track,
  TrackOccurrence,
  UserOccurrence
} from "./types";

export function defaultDumpFileName(playlistName: string): string {
  return `${playlistName.replace(/[^\p{L}\p{N}]/gu, "_")}.json`;
}

export class LibraryService {
  constructor(private readonly store: PlaylistStore) {}

  async listPlaylists(): Promise<Playlist[]> {
    const playlists = await this.store.fetchPlaylists();
    if (playlists.length === 0) {
      throw new NotFoundLocallyError("No playlists found in the database.");
    }

    return playlists;
  }

  async listTracks(identifier: string): Promise<Track[]> {
    const playlistId = extractPlaylistId(identifier);
    const tracks = await this.store.fetchTracks(playlistId);
    if (tracks.length === 0) {
      throw new NotFoundLocallyError(`No tracks found for playlist ID ${playlistId}.`);
    }

    return tracks;
  }

  async removePlaylist(identifier: string): Promise<RemovedPlaylistResult> {
    const playlistId = extractPlaylistId(identifier);
    const playlist = await this.store.fetchPlaylist(playlistId);
    if (!playlist) {
      throw new NotFoundLocallyError(`Playlist with ID '${playlistId}' not found.`);
    }

    await this.store.deletePlaylist(playlistId);
    logger.info(`Removed playlist '${playlist.name}' and its tracks.`);

    return { status: "removed", playlistId, name: playlist.name };
  }

  async removeTrack(identifier: string, trackId: string): Promise<RemovedTrackResult> {
    const playlistId = extractPlaylistId(identifier);
    const track = await this.store.fetchTrack(playlistId, trackId);
    if (!track) {
      throw new NotFoundLocallyError(`Track with ID '${trackId}' not found in playlist '${playlistId}'.`);
    }

    await this.store.deleteTrack(trackId, playlistId);

    return { status: "removed", playlistId, trackId, name: track.name };
  }

  /** Writes the playlist and its tracks as JSON; defaults to `<playlist name>.json` in the working directory. */
  async dumpPlaylist(identifier: string, outputFile?: string): Promise<DumpResult> {
    const playlistId = extractPlaylistId(identifier);
    const playlist = await this.store.fetchPlaylist(playlistId);
    if (!playlist) {
      throw new NotFoundLocallyError(`Playlist with ID ${playlistId} not found.`);
    }

    const tracks = await this.store.fetchTracks(playlistId);
    if (tracks.length === 0) {
      throw new NotFoundLocallyError(`No tracks found for playlist with ID ${playlistId}.`);
    }

    const target = outputFile ?? defaultDumpFileName(playlist.name);
    await fs.writeFile(target, `${JSON.stringify({ metadata: playlist, tracks }, null, 2)}\n`, "utf8");

    return { status: "success", outputFile: target };
  }

  async stats(): Promise<LibraryStats> {
    return this.store.stats();
  }

  async topTracks(limit?: number): Promise<TrackOccurrence[]> {
    return this.store.topTracks(limit);
  }

  async topArtists(limit?: number): Promise<ArtistOccurrence[]> {
    return this.store.topArtists(limit);
  }

  async topUsers(limit?: number): Promise<UserOccurrence[]> {
    return this.store.topUsers(limit);
  }

  async recentTracks(limit?: number): Promise<RecentTrack[]> {
    return this.store.recentTracks(limit);
  }
}
