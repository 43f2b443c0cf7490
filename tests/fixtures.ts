import http from "node:http";
import net from "node:net";
import { SpotifyApiError } from "../src/errors";
import type { RemoteClient } from "../src/sync-service";
import type { NewPlaylistSpec, PlaylistPayload, PlaylistTrackItem, SpotifyUser, TrackPayload } from "../src/types";

export function playlistPayload(id: string, overrides: Partial<PlaylistPayload> = {}): PlaylistPayload {
  return {
    id,
    name: `Playlist ${id}`,
    description: "Songs for testing",
    public: true,
    collaborative: false,
    snapshot_id: "snapshot-1",
    external_urls: { spotify: `https://open.spotify.com/playlist/${id}` },
    owner: {
      id: "owner-1",
      display_name: "Owner One",
      external_urls: { spotify: "https://open.spotify.com/user/owner-1" }
    },
    followers: { total: 3 },
    images: [{ url: `https://images.example.test/${id}.jpg` }],
    tracks: { total: 0 },
    ...overrides
  };
}

export function trackItem(
  id: string | null,
  overrides: Partial<TrackPayload> = {},
  addedAt = "2026-01-01T00:00:00Z"
): PlaylistTrackItem {
  return {
    added_at: addedAt,
    added_by: { id: "adder-1" },
    track: {
      id,
      name: `Track ${id ?? "local"}`,
      uri: id ? `spotify:track:${id}` : "spotify:local:Someone:Something:Local+Song:180",
      external_urls: id ? { spotify: `https://open.spotify.com/track/${id}` } : {},
      preview_url: null,
      popularity: 40,
      album: {
        id: "album-1",
        name: "Album One",
        external_urls: { spotify: "https://open.spotify.com/album/album-1" }
      },
      artists: [
        {
          id: "artist-1",
          name: "Artist One",
          external_urls: { spotify: "https://open.spotify.com/artist/artist-1" }
        }
      ],
      explicit: false,
      is_local: id === null,
      disc_number: 1,
      external_ids: id ? { isrc: `TEST${id.toUpperCase()}` } : {},
      ...overrides
    }
  };
}

/** In-memory stand-in for the Spotify Web API, recording every write. */
export class FakeSpotify implements RemoteClient {
  readonly playlists = new Map<string, PlaylistPayload>();
  readonly items = new Map<string, PlaylistTrackItem[]>();
  readonly calls: string[] = [];
  readonly created: Array<{ userId: string; spec: NewPlaylistSpec }> = [];
  readonly addedUris: Array<{ playlistId: string; uris: string[] }> = [];
  readonly covers: Array<{ playlistId: string; image: string }> = [];

  tracksError: Error | null = null;
  addTracksError: Error | null = null;
  user: SpotifyUser = { id: "user-1", display_name: "Test User" };

  setPlaylist(payload: PlaylistPayload, items: PlaylistTrackItem[]): void {
    this.playlists.set(payload.id, { ...payload, tracks: { total: items.length } });
    this.items.set(payload.id, items);
  }

  async getPlaylist(playlistId: string): Promise<PlaylistPayload> {
    this.calls.push(`getPlaylist:${playlistId}`);
    const payload = this.playlists.get(playlistId);
    if (!payload) {
      throw new SpotifyApiError(404, "Spotify API request failed with status 404: Resource not found");
    }

    return payload;
  }

  async getPlaylistTracks(playlistId: string): Promise<PlaylistTrackItem[]> {
    this.calls.push(`getPlaylistTracks:${playlistId}`);
    if (this.tracksError) {
      throw this.tracksError;
    }

    return [...(this.items.get(playlistId) ?? [])];
  }

  async getCurrentUserId(): Promise<string> {
    this.calls.push("getCurrentUserId");
    return this.user.id;
  }

  async createPlaylist(userId: string, spec: NewPlaylistSpec): Promise<PlaylistPayload> {
    this.calls.push("createPlaylist");
    this.created.push({ userId, spec });
    return playlistPayload("created-1", {
      name: spec.name,
      description: spec.description,
      public: spec.public,
      owner: { id: userId, display_name: this.user.display_name }
    });
  }

  async addTracks(playlistId: string, uris: string[]): Promise<void> {
    this.calls.push("addTracks");
    if (this.addTracksError) {
      throw this.addTracksError;
    }

    this.addedUris.push({ playlistId, uris });
  }

  async setCoverImage(playlistId: string, base64Jpeg: string): Promise<void> {
    this.calls.push("setCoverImage");
    this.covers.push({ playlistId, image: base64Jpeg });
  }
}

export interface HttpReply {
  status: number;
  body: string;
}

export function httpGet(url: string): Promise<HttpReply> {
  return new Promise((resolve, reject) => {
    http
      .get(url, { agent: false }, (res) => {
        let body = "";
        res.setEncoding("utf8");
        res.on("data", (chunk: string) => {
          body += chunk;
        });
        res.on("end", () => resolve({ status: res.statusCode ?? 0, body }));
      })
      .on("error", reject);
  });
}

export async function freePort(): Promise<number> {
  const server = net.createServer();
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  const port = typeof address === "object" && address ? address.port : 0;
  await new Promise<void>((resolve) => server.close(() => resolve()));
  return port;
}
