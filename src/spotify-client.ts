import { NetworkError, SpotifyApiError } from "./errors";
import { logger } from "./logger";
import type {
  NewPlaylistSpec,
  PagingResponse,
  PlaylistPayload,
  PlaylistTrackItem,
  SpotifyUser
} from "./types";

export const SPOTIFY_API_BASE = "https://api.spotify.com/v1";
const REQUEST_TIMEOUT_MS = 30000;
const TRACKS_PAGE_SIZE = 100;
const ADD_TRACKS_BATCH_SIZE = 100;

export function buildErrorMessage(status: number, bodyText: string): string {
  if (!bodyText) {
    return `Spotify API request failed with status ${status}`;
  }

  try {
    const parsed = JSON.parse(bodyText) as {
      error?: { message?: string } | string;
      error_description?: string;
      message?: string;
    };

    if (typeof parsed.error === "string") {
      const detail = parsed.error_description ? `${parsed.error} (${parsed.error_description})` : parsed.error;
      return `Spotify API request failed with status ${status}: ${detail}`;
    }

    const errorMessage = parsed.error?.message || parsed.message;
    if (errorMessage) {
      return `Spotify API request failed with status ${status}: ${errorMessage}`;
    }
  } catch {
    // Not JSON; fall through to the raw body.
  }

  return `Spotify API request failed with status ${status}: ${bodyText}`;
}

export interface HttpRequest {
  method?: "GET" | "POST" | "PUT" | "DELETE";
  headers?: Record<string, string>;
  body?: string | URLSearchParams;
}

/**
 * Single fetch with a timeout. Transport failures become NetworkError and
 * non-2xx responses become SpotifyApiError; nothing is retried.
 */
export async function sendRequest(url: string, init: HttpRequest): Promise<string> {
  const method = init.method || "GET";
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), REQUEST_TIMEOUT_MS);

  logger.debug(`Spotify request: ${method} ${url}`);

  let response: Response;
  try {
    response = await fetch(url, {
      method,
      headers: init.headers,
      body: init.body,
      signal: controller.signal
    });
  } catch (error) {
    const isAbortError = error instanceof Error && error.name === "AbortError";
    if (isAbortError) {
      throw new NetworkError(`${method} ${url} timed out after ${REQUEST_TIMEOUT_MS}ms`, { cause: error });
    }

    const message = error instanceof Error ? error.message : String(error);
    throw new NetworkError(`${method} ${url} failed: ${message}`, { cause: error });
  } finally {
    clearTimeout(timeoutId);
  }

  const bodyText = await response.text();

  if (!response.ok) {
    throw new SpotifyApiError(response.status, buildErrorMessage(response.status, bodyText), bodyText);
  }

  return bodyText;
}

interface RequestOptions {
  method?: "GET" | "POST" | "PUT";
  json?: unknown;
  rawBody?: { contentType: string; data: string };
}

export class SpotifyClient {
  constructor(private readonly accessToken: string) {}

  async getCurrentUser(): Promise<SpotifyUser> {
    return this.request<SpotifyUser>(`${SPOTIFY_API_BASE}/me`);
  }

  async getCurrentUserId(): Promise<string> {
    const user = await this.getCurrentUser();
    return user.id;
  }

  async getPlaylist(playlistId: string): Promise<PlaylistPayload> {
    return this.request<PlaylistPayload>(`${SPOTIFY_API_BASE}/playlists/${encodeURIComponent(playlistId)}`);
  }

  /** Follows `next` links until the last page; a failing page fails the whole call. */
  async getPlaylistTracks(playlistId: string): Promise<PlaylistTrackItem[]> {
    const results: PlaylistTrackItem[] = [];
    let url: string | null =
      `${SPOTIFY_API_BASE}/playlists/${encodeURIComponent(playlistId)}/items?limit=${TRACKS_PAGE_SIZE}`;

    while (url) {
      const page: PagingResponse<PlaylistTrackItem> = await this.request<PagingResponse<PlaylistTrackItem>>(url);
      results.push(...page.items);
      logger.debug(
        `Fetched playlist tracks page offset=${page.offset} items=${page.items.length} collected=${results.length}/${page.total}`
      );
      url = page.next;
    }

    return results;
  }

  async createPlaylist(userId: string, spec: NewPlaylistSpec): Promise<PlaylistPayload> {
    return this.request<PlaylistPayload>(`${SPOTIFY_API_BASE}/users/${encodeURIComponent(userId)}/playlists`, {
      method: "POST",
      json: spec
    });
  }

  async addTracks(playlistId: string, uris: string[]): Promise<void> {
    for (let i = 0; i < uris.length; i += ADD_TRACKS_BATCH_SIZE) {
      await this.request<unknown>(`${SPOTIFY_API_BASE}/playlists/${encodeURIComponent(playlistId)}/items`, {
        method: "POST",
        json: { uris: uris.slice(i, i + ADD_TRACKS_BATCH_SIZE) }
      });
    }
  }

  async setCoverImage(playlistId: string, base64Jpeg: string): Promise<void> {
    await this.request<unknown>(`${SPOTIFY_API_BASE}/playlists/${encodeURIComponent(playlistId)}/images`, {
      method: "PUT",
      rawBody: { contentType: "image/jpeg", data: base64Jpeg }
    });
  }

  private async request<T>(url: string, options: RequestOptions = {}): Promise<T> {
    const headers: Record<string, string> = {
      Accept: "application/json",
      Authorization: `Bearer ${this.accessToken}`
    };

    let body: string | undefined;
    if (options.json !== undefined) {
      headers["Content-Type"] = "application/json";
      body = JSON.stringify(options.json);
    } else if (options.rawBody) {
      headers["Content-Type"] = options.rawBody.contentType;
      body = options.rawBody.data;
    }

    const bodyText = await sendRequest(url, { method: options.method, headers, body });
    if (!bodyText) {
      return undefined as T;
    }

    return JSON.parse(bodyText) as T;
  }
}
