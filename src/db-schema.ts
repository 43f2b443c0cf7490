import type { Kysely } from "kysely";

// SQLite has no boolean type; flags are stored as 0/1.
export interface PlaylistRow {
  playlist_id: string;
  playlist_name: string;
  owner_id: string;
  owner_name: string;
  owner_url: string;
  playlist_url: string;
  description: string;
  public: number;
  collaborative: number;
  followers_total: number;
  snapshot_id: string;
  image_url: string | null;
  track_count: number;
}

export interface TrackRow {
  track_id: string;
  track_name: string;
  track_url: string;
  track_uri: string;
  preview_url: string | null;
  popularity: number;
  album_id: string | null;
  album_name: string;
  album_url: string | null;
  artist_id: string | null;
  artist_name: string;
  artist_url: string | null;
  is_explicit: number;
  is_local: number;
  disc_number: number;
  isrc: string | null;
  playlist_id: string;
  added_by: string;
  added_at: string;
}

export interface VaultDatabase {
  playlists: PlaylistRow;
  tracks: TrackRow;
}

export type VaultDb = Kysely<VaultDatabase>;

export async function createSchema(db: VaultDb): Promise<void> {
  await db.schema
    .createTable("playlists")
    .ifNotExists()
    .addColumn("playlist_id", "text", (col) => col.primaryKey().notNull())
    .addColumn("playlist_name", "text", (col) => col.notNull())
    .addColumn("owner_id", "text", (col) => col.notNull())
    .addColumn("owner_name", "text", (col) => col.notNull())
    .addColumn("owner_url", "text", (col) => col.notNull())
    .addColumn("playlist_url", "text", (col) => col.notNull())
    .addColumn("description", "text", (col) => col.notNull().defaultTo(""))
    .addColumn("public", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("collaborative", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("followers_total", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("snapshot_id", "text", (col) => col.notNull())
    .addColumn("image_url", "text")
    .addColumn("track_count", "integer", (col) => col.notNull().defaultTo(0))
    .execute();

  await db.schema
    .createTable("tracks")
    .ifNotExists()
    .addColumn("track_id", "text", (col) => col.notNull())
    .addColumn("track_name", "text", (col) => col.notNull())
    .addColumn("track_url", "text", (col) => col.notNull())
    .addColumn("track_uri", "text", (col) => col.notNull())
    .addColumn("preview_url", "text")
    .addColumn("popularity", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("album_id", "text")
    .addColumn("album_name", "text", (col) => col.notNull())
    .addColumn("album_url", "text")
    .addColumn("artist_id", "text")
    .addColumn("artist_name", "text", (col) => col.notNull())
    .addColumn("artist_url", "text")
    .addColumn("is_explicit", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("is_local", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("disc_number", "integer", (col) => col.notNull().defaultTo(1))
    .addColumn("isrc", "text")
    .addColumn("playlist_id", "text", (col) =>
      col.notNull().references("playlists.playlist_id").onDelete("cascade")
    )
    .addColumn("added_by", "text", (col) => col.notNull())
    .addColumn("added_at", "text", (col) => col.notNull())
    .addPrimaryKeyConstraint("tracks_pk", ["track_id", "playlist_id"])
    .execute();

  await db.schema.createIndex("tracks_playlist_idx").ifNotExists().on("tracks").column("playlist_id").execute();
}
