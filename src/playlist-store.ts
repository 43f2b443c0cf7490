import { promises as fs } from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { Kysely, SqliteDialect, sql } from "kysely";
import { type VaultDatabase, type VaultDb, createSchema } from "./db-schema";
import { logger } from "./logger";
import { playlistFromRow, playlistToRow, trackFromRow, trackToRow } from "./mappers";
import type {
  ArtistOccurrence,
  LibraryStats,
  Playlist,
  RecentTrack,
  Track,
  TrackOccurrence,
  UserOccurrence
} from "./types";

export const IN_MEMORY = ":memory:";

/**
 * SQLite-backed store for playlists and their tracks. Every write is a single
 * upsert statement; tracks are unique per (track_id, playlist_id) and are
 * returned in insertion order.
 */
export class PlaylistStore {
  private constructor(private readonly db: VaultDb) {}

  static async open(databasePath: string): Promise<PlaylistStore> {
    if (databasePath !== IN_MEMORY) {
      await fs.mkdir(path.dirname(databasePath), { recursive: true });
    }

    const sqlite = new Database(databasePath);
    sqlite.pragma("foreign_keys = ON");

    const db = new Kysely<VaultDatabase>({
      dialect: new SqliteDialect({ database: sqlite })
    });
    await createSchema(db);
    logger.debug(`Opened playlist store at ${databasePath}`);

    return new PlaylistStore(db);
  }

  async close(): Promise<void> {
    await this.db.destroy();
  }

  async upsertPlaylist(playlist: Playlist): Promise<void> {
    const { playlist_id: _playlistId, ...changes } = playlistToRow(playlist);

    await this.db
      .insertInto("playlists")
      .values(playlistToRow(playlist))
      .onConflict((oc) => oc.column("playlist_id").doUpdateSet(changes))
      .execute();
  }

  async upsertTrack(track: Track): Promise<void> {
    const { track_id: _trackId, playlist_id: _playlistId, ...changes } = trackToRow(track);

    await this.db
      .insertInto("tracks")
      .values(trackToRow(track))
      .onConflict((oc) => oc.columns(["track_id", "playlist_id"]).doUpdateSet(changes))
      .execute();
  }

  async fetchPlaylist(playlistId: string): Promise<Playlist | null> {
    const row = await this.db
      .selectFrom("playlists")
      .selectAll()
      .where("playlist_id", "=", playlistId)
      .executeTakeFirst();

    return row ? playlistFromRow(row) : null;
  }

  async fetchPlaylists(): Promise<Playlist[]> {
    const rows = await this.db.selectFrom("playlists").selectAll().orderBy(sql`rowid`).execute();
    return rows.map(playlistFromRow);
  }

  async fetchTracks(playlistId: string): Promise<Track[]> {
    const rows = await this.db
      .selectFrom("tracks")
      .selectAll()
      .where("playlist_id", "=", playlistId)
      .orderBy(sql`rowid`)
      .execute();

    return rows.map(trackFromRow);
  }

  async fetchTrack(playlistId: string, trackId: string): Promise<Track | null> {
    const row = await this.db
      .selectFrom("tracks")
      .selectAll()
      .where("playlist_id", "=", playlistId)
      .where("track_id", "=", trackId)
      .executeTakeFirst();

    return row ? trackFromRow(row) : null;
  }

  /** Returns whether a row was deleted. */
  async deleteTrack(trackId: string, playlistId: string): Promise<boolean> {
    const result = await this.db
      .deleteFrom("tracks")
      .where("track_id", "=", trackId)
      .where("playlist_id", "=", playlistId)
      .executeTakeFirst();

    return result.numDeletedRows > 0n;
  }

  async deletePlaylist(playlistId: string): Promise<boolean> {
    return this.db.transaction().execute(async (trx) => {
      await trx.deleteFrom("tracks").where("playlist_id", "=", playlistId).execute();
      const result = await trx.deleteFrom("playlists").where("playlist_id", "=", playlistId).executeTakeFirst();
      return result.numDeletedRows > 0n;
    });
  }

  async stats(): Promise<LibraryStats> {
    const playlists = await this.db
      .selectFrom("playlists")
      .select((eb) => eb.fn.countAll<number>().as("count"))
      .executeTakeFirstOrThrow();

    const tracks = await this.db
      .selectFrom("tracks")
      .select((eb) => [
        eb.fn.countAll<number>().as("total"),
        eb.fn.count<number>("track_name").distinct().as("unique_tracks"),
        eb.fn.count<number>("artist_name").distinct().as("artists"),
        eb.fn.count<number>("added_by").distinct().as("users")
      ])
      .executeTakeFirstOrThrow();

    return {
      totalPlaylists: Number(playlists.count),
      totalTracks: Number(tracks.total),
      uniqueTracks: Number(tracks.unique_tracks),
      totalArtists: Number(tracks.artists),
      totalUsers: Number(tracks.users)
    };
  }

  async topTracks(limit = 10): Promise<TrackOccurrence[]> {
    const rows = await this.db
      .selectFrom("tracks")
      .select((eb) => ["track_name", "artist_name", eb.fn.countAll<number>().as("occurrences")])
      .groupBy(["track_name", "artist_name"])
      .orderBy("occurrences", "desc")
      .orderBy("track_name")
      .limit(limit)
      .execute();

    return rows.map((row) => ({
      trackName: row.track_name,
      artistName: row.artist_name,
      occurrences: Number(row.occurrences)
    }));
  }

  async topArtists(limit = 10): Promise<ArtistOccurrence[]> {
    const rows = await this.db
      .selectFrom("tracks")
      .select((eb) => ["artist_name", eb.fn.countAll<number>().as("occurrences")])
      .groupBy("artist_name")
      .orderBy("occurrences", "desc")
      .orderBy("artist_name")
      .limit(limit)
      .execute();

    return rows.map((row) => ({ artistName: row.artist_name, occurrences: Number(row.occurrences) }));
  }

  async topUsers(limit = 3): Promise<UserOccurrence[]> {
    const rows = await this.db
      .selectFrom("tracks")
      .select((eb) => ["added_by", eb.fn.countAll<number>().as("occurrences")])
      .groupBy("added_by")
      .orderBy("occurrences", "desc")
      .orderBy("added_by")
      .limit(limit)
      .execute();

    return rows.map((row) => ({ userId: row.added_by, occurrences: Number(row.occurrences) }));
  }

  async recentTracks(limit = 10): Promise<RecentTrack[]> {
    const rows = await this.db
      .selectFrom("tracks")
      .select(["track_name", "artist_name", "playlist_id", "added_at"])
      .orderBy("added_at", "desc")
      .limit(limit)
      .execute();

    return rows.map((row) => ({
      trackName: row.track_name,
      artistName: row.artist_name,
      playlistId: row.playlist_id,
      addedAt: row.added_at
    }));
  }
}
