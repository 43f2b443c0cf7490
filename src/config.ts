import "dotenv/config";
import os from "node:os";
import path from "node:path";
import { ConfigError } from "./errors";

const DEFAULT_REDIRECT_URI = "http://127.0.0.1:5000/callback";

export interface AppConfig {
  spotifyClientId: string | null;
  spotifyClientSecret: string | null;
  redirectUri: URL;
  databasePath: string;
  tokenFilePath: string;
}

export interface SpotifyCredentials {
  clientId: string;
  clientSecret: string;
  redirectUri: URL;
}

type Env = Record<string, string | undefined>;

function optionalEnv(env: Env, name: string): string | null {
  const value = env[name]?.trim();
  return value ? value : null;
}

export function expandHome(filePath: string): string {
  if (filePath === "~") {
    return os.homedir();
  }

  if (filePath.startsWith("~/")) {
    return path.join(os.homedir(), filePath.slice(2));
  }

  return path.resolve(filePath);
}

function parseRedirectUri(value: string): URL {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new ConfigError(`SPOTIFY_REDIRECT_URI is not a valid URL: ${value}`);
  }

  if (url.protocol !== "http:") {
    throw new ConfigError(`SPOTIFY_REDIRECT_URI must use http for the local callback: ${value}`);
  }

  return url;
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    spotifyClientId: optionalEnv(env, "SPOTIFY_CLIENT_ID"),
    spotifyClientSecret: optionalEnv(env, "SPOTIFY_CLIENT_SECRET"),
    redirectUri: parseRedirectUri(optionalEnv(env, "SPOTIFY_REDIRECT_URI") ?? DEFAULT_REDIRECT_URI),
    databasePath: expandHome(optionalEnv(env, "PLAYLIST_VAULT_DB") ?? "~/.playlist-vault.db"),
    tokenFilePath: expandHome(optionalEnv(env, "PLAYLIST_VAULT_TOKEN_FILE") ?? "~/.playlist-vault-token.json")
  };
}

// Local-only commands never reach this, so they run without app credentials.
export function requireSpotifyCredentials(config: AppConfig): SpotifyCredentials {
  if (!config.spotifyClientId) {
    throw new ConfigError("Missing required environment variable: SPOTIFY_CLIENT_ID");
  }

  if (!config.spotifyClientSecret) {
    throw new ConfigError("Missing required environment variable: SPOTIFY_CLIENT_SECRET");
  }

  return {
    clientId: config.spotifyClientId,
    clientSecret: config.spotifyClientSecret,
    redirectUri: config.redirectUri
  };
}
