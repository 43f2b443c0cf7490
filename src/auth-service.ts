import { randomBytes } from "node:crypto";
import { openBrowser } from "./browser";
import { waitForAuthorizationCode } from "./callback-server";
import { type AppConfig, type SpotifyCredentials, requireSpotifyCredentials } from "./config";
import { AuthorizationError, NoCredentialError, RefreshFailedError, describeError } from "./errors";
import { logger } from "./logger";
import { SpotifyClient, sendRequest } from "./spotify-client";
import { deleteCredential, loadCredential, readCredential, saveCredential } from "./token-store";
import type { AuthStatus, Credential, SpotifyUser, TokenResponse } from "./types";

const SPOTIFY_ACCOUNTS_BASE = "https://accounts.spotify.com";

const AUTH_SCOPES = [
  "user-read-private",
  "user-read-email",
  "playlist-read-private",
  "playlist-read-collaborative",
  "playlist-modify-private",
  "playlist-modify-public",
  "ugc-image-upload"
];

export interface AuthServiceOptions {
  /** Wall clock in milliseconds. */
  now?: () => number;
  /** Called with the authorization URL once the callback listener is up. */
  openUrl?: (url: string) => void;
}

export interface LoginResult {
  credential: Credential;
  user: SpotifyUser;
}

function parseTokenResponse(bodyText: string): TokenResponse {
  let parsed: Partial<TokenResponse> | null;
  try {
    parsed = JSON.parse(bodyText) as Partial<TokenResponse> | null;
  } catch (error) {
    throw new AuthorizationError("Spotify token response is not valid JSON.", { cause: error });
  }

  if (!parsed || typeof parsed.access_token !== "string" || !parsed.access_token) {
    throw new AuthorizationError("Spotify token response did not include access_token.");
  }

  if (typeof parsed.expires_in !== "number") {
    throw new AuthorizationError("Spotify token response did not include expires_in.");
  }

  return { ...parsed, access_token: parsed.access_token, expires_in: parsed.expires_in };
}

/**
 * Owns the token file. States: no credential, valid, expired (implicit, by
 * wall clock) and refresh-failed (surfaced as RefreshFailedError).
 */
export class AuthService {
  private readonly now: () => number;
  private readonly openUrl: (url: string) => void;

  constructor(
    private readonly config: AppConfig,
    options: AuthServiceOptions = {}
  ) {
    this.now = options.now ?? Date.now;
    this.openUrl = options.openUrl ?? openBrowser;
  }

  buildAuthorizationUrl(state: string): string {
    const { clientId, redirectUri } = requireSpotifyCredentials(this.config);
    const query = new URLSearchParams({
      client_id: clientId,
      response_type: "code",
      redirect_uri: redirectUri.toString(),
      scope: AUTH_SCOPES.join(" "),
      show_dialog: "true",
      state
    });

    return `${SPOTIFY_ACCOUNTS_BASE}/authorize?${query.toString()}`;
  }

  async login(): Promise<LoginResult> {
    const credentials = requireSpotifyCredentials(this.config);
    const state = randomBytes(16).toString("hex");
    const authUrl = this.buildAuthorizationUrl(state);

    const callback = await waitForAuthorizationCode(credentials.redirectUri, {
      expectedState: state,
      onListening: () => {
        logger.info(`Open this URL to authorize playlist-vault:\n${authUrl}`);
        this.openUrl(authUrl);
      }
    });

    logger.info("Authorization code received. Exchanging it for tokens.");
    const token = await this.exchangeCode(credentials, callback.code);

    if (!token.refresh_token) {
      throw new AuthorizationError("Spotify token response did not include refresh_token.");
    }

    const credential: Credential = {
      ...token,
      refresh_token: token.refresh_token,
      expires_at: this.nowSeconds() + token.expires_in
    };
    await saveCredential(this.config.tokenFilePath, credential);

    const user = await this.verify(credential.access_token);
    logger.info(`Logged in as ${user.display_name ?? user.id}.`);

    return { credential, user };
  }

  /**
   * Trades the refresh token for a new access token, verifies it and persists
   * it. A response without refresh_token keeps the previous one.
   */
  async refresh(credential?: Credential): Promise<Credential> {
    const credentials = requireSpotifyCredentials(this.config);
    const current = credential ?? (await loadCredential(this.config.tokenFilePath));
    if (!current) {
      throw new NoCredentialError();
    }

    let token: TokenResponse;
    try {
      token = await this.requestToken({
        grant_type: "refresh_token",
        refresh_token: current.refresh_token,
        client_id: credentials.clientId,
        client_secret: credentials.clientSecret
      });
    } catch (error) {
      throw new RefreshFailedError(
        `Could not refresh the Spotify access token: ${describeError(error)}. Run \`auth login\` again.`,
        { cause: error }
      );
    }

    const next: Credential = {
      ...current,
      ...token,
      refresh_token: token.refresh_token || current.refresh_token,
      expires_at: this.nowSeconds() + token.expires_in
    };

    try {
      await this.verify(next.access_token);
    } catch (error) {
      throw new RefreshFailedError(
        `Refreshed access token was rejected: ${describeError(error)}. Run \`auth login\` again.`,
        { cause: error }
      );
    }

    await saveCredential(this.config.tokenFilePath, next);
    logger.info("Access token refreshed.");

    return next;
  }

  async getAccessToken(): Promise<string> {
    const stored = await readCredential(this.config.tokenFilePath);

    if (stored.status === "corrupt") {
      logger.warn(stored.error.message);
      throw new NoCredentialError("Saved Spotify credential is unreadable. Run `auth login` again.", {
        cause: stored.error
      });
    }

    if (stored.status === "missing") {
      throw new NoCredentialError();
    }

    if (this.isExpired(stored.credential)) {
      logger.info("Access token expired. Refreshing.");
      const refreshed = await this.refresh(stored.credential);
      return refreshed.access_token;
    }

    return stored.credential.access_token;
  }

  async status(): Promise<AuthStatus> {
    const credential = await loadCredential(this.config.tokenFilePath);
    if (!credential) {
      return { state: "NoCredential", expiresAt: null, displayName: null };
    }

    const expiresAt = new Date(credential.expires_at * 1000).toISOString();
    if (this.isExpired(credential)) {
      return { state: "Expired", expiresAt, displayName: null };
    }

    const user = await this.verify(credential.access_token);
    return { state: "Valid", expiresAt, displayName: user.display_name ?? user.id };
  }

  /** Deletes the token file; returns false when there was none. */
  async clean(): Promise<boolean> {
    return deleteCredential(this.config.tokenFilePath);
  }

  async verify(accessToken: string): Promise<SpotifyUser> {
    return new SpotifyClient(accessToken).getCurrentUser();
  }

  private isExpired(credential: Credential): boolean {
    return this.nowSeconds() > credential.expires_at;
  }

  private nowSeconds(): number {
    return this.now() / 1000;
  }

  private async exchangeCode(credentials: SpotifyCredentials, code: string): Promise<TokenResponse> {
    return this.requestToken({
      grant_type: "authorization_code",
      code,
      redirect_uri: credentials.redirectUri.toString(),
      client_id: credentials.clientId,
      client_secret: credentials.clientSecret
    });
  }

  private async requestToken(params: Record<string, string>): Promise<TokenResponse> {
    const bodyText = await sendRequest(`${SPOTIFY_ACCOUNTS_BASE}/api/token`, {
      method: "POST",
      headers: {
        "Content-Type": "application/x-www-form-urlencoded",
        Accept: "application/json"
      },
      body: new URLSearchParams(params)
    });

    return parseTokenResponse(bodyText);
  }
}
