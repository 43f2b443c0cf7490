export interface ExternalUrls {
  spotify?: string;
}

export interface SpotifyUser {
  id: string;
  display_name: string | null;
  external_urls?: ExternalUrls;
}

export interface SpotifyImage {
  url: string;
  height?: number | null;
  width?: number | null;
}

export interface PlaylistPayload {
  id: string;
  name: string;
  description: string | null;
  public: boolean | null;
  collaborative: boolean;
  snapshot_id: string;
  external_urls: ExternalUrls;
  owner: SpotifyUser;
  followers?: { total: number };
  images: SpotifyImage[] | null;
  tracks?: { total: number };
}

export interface ArtistPayload {
  id: string | null;
  name: string;
  external_urls?: ExternalUrls;
}

export interface AlbumPayload {
  id: string | null;
  name: string;
  external_urls?: ExternalUrls;
}

export interface TrackPayload {
  id: string | null;
  name: string;
  uri: string;
  external_urls?: ExternalUrls;
  preview_url?: string | null;
  popularity?: number;
  album?: AlbumPayload;
  artists?: ArtistPayload[];
  explicit?: boolean;
  is_local?: boolean;
  disc_number?: number;
  external_ids?: { isrc?: string };
}

export interface PlaylistTrackItem {
  added_at: string | null;
  added_by?: { id: string } | null;
  track: TrackPayload | null;
}

export interface PagingResponse<T> {
  items: T[];
  limit: number;
  offset: number;
  total: number;
  next: string | null;
}

export interface NewPlaylistSpec {
  name: string;
  description: string;
  public: boolean;
}

export interface TokenResponse {
  access_token: string;
  token_type?: string;
  scope?: string;
  expires_in: number;
  refresh_token?: string;
}

/** Token file contents: the provider's fields plus a locally computed absolute expiry. */
export interface Credential extends TokenResponse {
  refresh_token: string;
  /** Unix time in seconds, fractional. */
  expires_at: number;
}

export type CredentialState = "NoCredential" | "Valid" | "Expired";

export interface AuthStatus {
  state: CredentialState;
  expiresAt: string | null;
  displayName: string | null;
}

export interface Playlist {
  id: string;
  name: string;
  ownerId: string;
  ownerName: string;
  ownerUrl: string;
  url: string;
  description: string;
  public: boolean;
  collaborative: boolean;
  followers: number;
  snapshotId: string;
  imageUrl: string | null;
  trackCount: number;
}

export interface Track {
  id: string;
  name: string;
  url: string;
  uri: string;
  previewUrl: string | null;
  popularity: number;
  albumId: string | null;
  albumName: string;
  albumUrl: string | null;
  artistId: string | null;
  artistName: string;
  artistUrl: string | null;
  explicit: boolean;
  isLocal: boolean;
  discNumber: number;
  isrc: string | null;
  playlistId: string;
  addedBy: string;
  addedAt: string;
}

export interface IngestSummary {
  playlistId: string;
  name: string;
  trackCount: number;
  skippedCount: number;
}

export interface CreatedResult extends IngestSummary {
  status: "created";
}

export interface UpdatedResult extends IngestSummary {
  status: "updated";
  removedTrackIds: string[];
}

export type PullResult = CreatedResult | UpdatedResult;

export interface PushRequest {
  name: string;
  description: string;
  public: boolean;
  imagePath?: string;
}

export interface PushResult {
  playlistId: string;
  playlistUrl: string | null;
  trackCount: number;
  public: boolean;
  imageUploaded: boolean;
}

export interface FieldChange<T> {
  local: T;
  remote: T;
}

export type MetadataDiff = {
  [K in keyof Playlist]?: FieldChange<Playlist[K]>;
};

export interface DiffResult {
  playlistId: string;
  added: Track[];
  removed: Track[];
  /** Present only for a detailed diff; `{}` means every field matched. */
  metadataChanged?: MetadataDiff;
}

export interface RemovedPlaylistResult {
  status: "removed";
  playlistId: string;
  name: string;
}

export interface RemovedTrackResult {
  status: "removed";
  playlistId: string;
  trackId: string;
  name: string;
}

export interface DumpResult {
  status: "success";
  outputFile: string;
}

export interface LibraryStats {
  totalPlaylists: number;
  totalTracks: number;
  uniqueTracks: number;
  totalArtists: number;
  totalUsers: number;
}

export interface TrackOccurrence {
  trackName: string;
  artistName: string;
  occurrences: number;
}

export interface ArtistOccurrence {
  artistName: string;
  occurrences: number;
}

export interface UserOccurrence {
  userId: string;
  occurrences: number;
}

export interface RecentTrack {
  trackName: string;
  artistName: string;
  playlistId: string;
  addedAt: string;
}
