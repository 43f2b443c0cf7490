import type { PlaylistRow, TrackRow } from "./db-schema";
import type { PlaylistPayload, PlaylistTrackItem, Playlist, Track } from "./types";

export function playlistFromPayload(payload: PlaylistPayload): Playlist {
  return {
    id: payload.id,
    name: payload.name,
    ownerId: payload.owner.id,
    ownerName: payload.owner.display_name ?? "",
    ownerUrl: payload.owner.external_urls?.spotify ?? "",
    url: payload.external_urls.spotify ?? "",
    description: payload.description ?? "",
    public: payload.public === true,
    collaborative: payload.collaborative === true,
    followers: payload.followers?.total ?? 0,
    snapshotId: payload.snapshot_id,
    imageUrl: payload.images?.[0]?.url ?? null,
    trackCount: payload.tracks?.total ?? 0
  };
}

/** Returns null for items without a track ID; those are never stored or compared. */
export function trackFromPayload(item: PlaylistTrackItem, playlistId: string): Track | null {
  const track = item.track;
  if (!track || !track.id) {
    return null;
  }

  const album = track.album;
  const artist = track.artists?.[0];

  return {
    id: track.id,
    name: track.name,
    url: track.external_urls?.spotify ?? "",
    uri: track.uri,
    previewUrl: track.preview_url ?? null,
    popularity: track.popularity ?? 0,
    albumId: album?.id ?? null,
    albumName: album?.name ?? "",
    albumUrl: album?.external_urls?.spotify ?? null,
    artistId: artist?.id ?? null,
    artistName: artist?.name ?? "",
    artistUrl: artist?.external_urls?.spotify ?? null,
    explicit: track.explicit === true,
    isLocal: track.is_local === true,
    discNumber: track.disc_number ?? 1,
    isrc: track.external_ids?.isrc || null,
    playlistId,
    addedBy: item.added_by?.id ?? "",
    addedAt: item.added_at ?? ""
  };
}

export function playlistFromRow(row: PlaylistRow): Playlist {
  return {
    id: row.playlist_id,
    name: row.playlist_name,
    ownerId: row.owner_id,
    ownerName: row.owner_name,
    ownerUrl: row.owner_url,
    url: row.playlist_url,
    description: row.description,
    public: row.public === 1,
    collaborative: row.collaborative === 1,
    followers: row.followers_total,
    snapshotId: row.snapshot_id,
    imageUrl: row.image_url,
    trackCount: row.track_count
  };
}

export function playlistToRow(playlist: Playlist): PlaylistRow {
  return {
    playlist_id: playlist.id,
    playlist_name: playlist.name,
    owner_id: playlist.ownerId,
    owner_name: playlist.ownerName,
    owner_url: playlist.ownerUrl,
    playlist_url: playlist.url,
    description: playlist.description,
    public: playlist.public ? 1 : 0,
    collaborative: playlist.collaborative ? 1 : 0,
    followers_total: playlist.followers,
    snapshot_id: playlist.snapshotId,
    image_url: playlist.imageUrl,
    track_count: playlist.trackCount
  };
}

export function trackFromRow(row: TrackRow): Track {
  return {
    id: row.track_id,
    name: row.track_name,
    url: row.track_url,
    uri: row.track_uri,
    previewUrl: row.preview_url,
    popularity: row.popularity,
    albumId: row.album_id,
    albumName: row.album_name,
    albumUrl: row.album_url,
    artistId: row.artist_id,
    artistName: row.artist_name,
    artistUrl: row.artist_url,
    explicit: row.is_explicit === 1,
    isLocal: row.is_local === 1,
    discNumber: row.disc_number,
    isrc: row.isrc,
    playlistId: row.playlist_id,
    addedBy: row.added_by,
    addedAt: row.added_at
  };
}

export function trackToRow(track: Track): TrackRow {
  return {
    track_id: track.id,
    track_name: track.name,
    track_url: track.url,
    track_uri: track.uri,
    preview_url: track.previewUrl,
    popularity: track.popularity,
    album_id: track.albumId,
    album_name: track.albumName,
    album_url: track.albumUrl,
    artist_id: track.artistId,
    artist_name: track.artistName,
    artist_url: track.artistUrl,
    is_explicit: track.explicit ? 1 : 0,
    is_local: track.isLocal ? 1 : 0,
    disc_number: track.discNumber,
    isrc: track.isrc,
    playlist_id: track.playlistId,
    added_by: track.addedBy,
    added_at: track.addedAt
  };
}

/** Accepts a bare ID or a playlist URL such as https://open.spotify.com/playlist/<id>?si=... */
export function extractPlaylistId(identifier: string): string {
  const trimmed = identifier.trim();
  if (!trimmed.includes("/")) {
    return trimmed.split("?")[0];
  }

  const lastSegment = trimmed.split("/").pop() ?? "";
  return lastSegment.split("?")[0];
}
