import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { AuthService } from "../src/auth-service";
import type { AppConfig } from "../src/config";
import { AuthorizationError, ConfigError, NoCredentialError, RefreshFailedError } from "../src/errors";
import { readCredential, saveCredential } from "../src/token-store";
import type { Credential } from "../src/types";
import { type HttpReply, freePort, httpGet } from "./fixtures";

const NOW_MS = 1_000_000_000_000;
const NOW_SECONDS = NOW_MS / 1000;

interface RecordedRequest {
  url: string;
  method: string;
  authorization: string | null;
  form: URLSearchParams | null;
}

interface StubReply {
  status: number;
  body: unknown;
}

const originalFetch = globalThis.fetch;

let tokenReply: StubReply;
let meReply: StubReply;
let requests: RecordedRequest[];
let dir: string;
let tokenFile: string;

function stubSpotify(): void {
  globalThis.fetch = (async (input: string | URL | Request, init?: RequestInit) => {
    const url = String(input);
    const body = init?.body;
    requests.push({
      url,
      method: init?.method ?? "GET",
      authorization: new Headers(init?.headers).get("Authorization"),
      form: body instanceof URLSearchParams ? body : null
    });

    const reply = url.endsWith("/api/token") ? tokenReply : meReply;
    return new Response(JSON.stringify(reply.body), { status: reply.status });
  }) as typeof fetch;
}

function testConfig(redirectUri = "http://127.0.0.1:5000/callback"): AppConfig {
  return {
    spotifyClientId: "test-client",
    spotifyClientSecret: "test-secret",
    redirectUri: new URL(redirectUri),
    databasePath: ":memory:",
    tokenFilePath: tokenFile
  };
}

function savedCredential(expiresAt: number): Credential {
  return {
    access_token: "old-access",
    token_type: "Bearer",
    expires_in: 3600,
    refresh_token: "test-refresh",
    expires_at: expiresAt
  };
}

function createService(config = testConfig(), openUrl: (url: string) => void = () => undefined): AuthService {
  return new AuthService(config, { now: () => NOW_MS, openUrl });
}

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "playlist-vault-auth-"));
  tokenFile = path.join(dir, "token.json");
  requests = [];
  tokenReply = { status: 200, body: { access_token: "new-access", token_type: "Bearer", expires_in: 3600 } };
  meReply = { status: 200, body: { id: "user-1", display_name: "Test User" } };
  stubSpotify();
});

afterEach(async () => {
  globalThis.fetch = originalFetch;
  await fs.rm(dir, { recursive: true, force: true });
});

describe("getAccessToken", () => {
  it("returns the saved token while it is valid", async () => {
    await saveCredential(tokenFile, savedCredential(NOW_SECONDS + 100));

    expect(await createService().getAccessToken()).toBe("old-access");
    expect(requests).toEqual([]);
  });

  it("refreshes an expired token and keeps the old refresh token", async () => {
    await saveCredential(tokenFile, savedCredential(NOW_SECONDS - 1));

    const accessToken = await createService().getAccessToken();

    expect(accessToken).toBe("new-access");
    expect(requests.map((request) => [request.method, request.url])).toEqual([
      ["POST", "https://accounts.spotify.com/api/token"],
      ["GET", "https://api.spotify.com/v1/me"]
    ]);
    expect(requests[0].form?.get("grant_type")).toBe("refresh_token");
    expect(requests[0].form?.get("refresh_token")).toBe("test-refresh");
    expect(requests[1].authorization).toBe("Bearer new-access");

    const stored = await readCredential(tokenFile);
    expect(stored).toEqual({
      status: "present",
      credential: {
        access_token: "new-access",
        token_type: "Bearer",
        expires_in: 3600,
        refresh_token: "test-refresh",
        expires_at: NOW_SECONDS + 3600
      }
    });
  });

  it("fails without a saved credential", async () => {
    await expect(createService().getAccessToken()).rejects.toBeInstanceOf(NoCredentialError);
  });

  it("fails on an unreadable token file", async () => {
    await fs.writeFile(tokenFile, "][", "utf8");

    await expect(createService().getAccessToken()).rejects.toBeInstanceOf(NoCredentialError);
  });
});

describe("refresh", () => {
  it("replaces the refresh token when Spotify rotates it", async () => {
    await saveCredential(tokenFile, savedCredential(NOW_SECONDS - 1));
    tokenReply = {
      status: 200,
      body: { access_token: "new-access", expires_in: 1800, refresh_token: "rotated-refresh" }
    };

    const refreshed = await createService().refresh();

    expect(refreshed.refresh_token).toBe("rotated-refresh");
    expect(refreshed.expires_at).toBe(NOW_SECONDS + 1800);
  });

  it("keeps the saved credential when the grant is rejected", async () => {
    await saveCredential(tokenFile, savedCredential(NOW_SECONDS - 1));
    tokenReply = { status: 400, body: { error: "invalid_grant", error_description: "Refresh token revoked" } };

    const error = await createService().refresh().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(RefreshFailedError);
    expect(error).toMatchObject({
      message:
        "Could not refresh the Spotify access token: Spotify API request failed with status 400: invalid_grant (Refresh token revoked). Run `auth login` again."
    });
    expect(await readCredential(tokenFile)).toEqual({ status: "present", credential: savedCredential(NOW_SECONDS - 1) });
  });

  it("does not save a token that fails verification", async () => {
    await saveCredential(tokenFile, savedCredential(NOW_SECONDS - 1));
    meReply = { status: 401, body: { error: { status: 401, message: "Invalid access token" } } };

    await expect(createService().refresh()).rejects.toBeInstanceOf(RefreshFailedError);
    expect(await readCredential(tokenFile)).toEqual({ status: "present", credential: savedCredential(NOW_SECONDS - 1) });
  });

  it("needs the app credentials", async () => {
    await saveCredential(tokenFile, savedCredential(NOW_SECONDS - 1));
    const config = { ...testConfig(), spotifyClientSecret: null };

    await expect(createService(config).refresh()).rejects.toThrow(
      new ConfigError("Missing required environment variable: SPOTIFY_CLIENT_SECRET")
    );
    expect(requests).toEqual([]);
  });
});

describe("status and clean", () => {
  it("reports each credential state", async () => {
    const service = createService();
    expect(await service.status()).toEqual({ state: "NoCredential", expiresAt: null, displayName: null });

    await saveCredential(tokenFile, savedCredential(NOW_SECONDS - 1));
    expect(await service.status()).toEqual({
      state: "Expired",
      expiresAt: new Date((NOW_SECONDS - 1) * 1000).toISOString(),
      displayName: null
    });
    expect(requests).toEqual([]);

    await saveCredential(tokenFile, savedCredential(NOW_SECONDS + 60));
    expect(await service.status()).toMatchObject({ state: "Valid", displayName: "Test User" });
  });

  it("reports no credential when the saved expiry is out of range", async () => {
    await fs.writeFile(
      tokenFile,
      JSON.stringify({ access_token: "old-access", refresh_token: "test-refresh", expires_at: 1e20 }),
      "utf8"
    );

    expect(await createService().status()).toEqual({ state: "NoCredential", expiresAt: null, displayName: null });
  });

  it("removes the token file once", async () => {
    await saveCredential(tokenFile, savedCredential(NOW_SECONDS + 60));
    const service = createService();

    expect(await service.clean()).toBe(true);
    expect(await service.clean()).toBe(false);
    expect(await readCredential(tokenFile)).toEqual({ status: "missing" });
  });
});

describe("login", () => {
  it("builds the authorization URL with every scope", () => {
    const url = new URL(createService().buildAuthorizationUrl("state-1"));

    expect(url.origin + url.pathname).toBe("https://accounts.spotify.com/authorize");
    expect(url.searchParams.get("client_id")).toBe("test-client");
    expect(url.searchParams.get("redirect_uri")).toBe("http://127.0.0.1:5000/callback");
    expect(url.searchParams.get("state")).toBe("state-1");
    expect(url.searchParams.get("scope")?.split(" ")).toContain("ugc-image-upload");
  });

  it("exchanges the callback code and saves the credential", async () => {
    const port = await freePort();
    const browserReplies: Promise<HttpReply>[] = [];
    tokenReply = {
      status: 200,
      body: { access_token: "fresh-access", token_type: "Bearer", expires_in: 3600, refresh_token: "fresh-refresh" }
    };

    const service = createService(testConfig(`http://127.0.0.1:${port}/callback`), (authUrl) => {
      const params = new URL(authUrl).searchParams;
      browserReplies.push(httpGet(`${params.get("redirect_uri")}?code=test-code&state=${params.get("state")}`));
    });

    const result = await service.login();

    expect(result.user.display_name).toBe("Test User");
    expect(result.credential).toMatchObject({
      access_token: "fresh-access",
      refresh_token: "fresh-refresh",
      expires_at: NOW_SECONDS + 3600
    });
    expect((await Promise.all(browserReplies)).map((reply) => reply.status)).toEqual([200]);

    const form = requests[0].form;
    expect(form?.get("grant_type")).toBe("authorization_code");
    expect(form?.get("code")).toBe("test-code");
    expect(form?.get("redirect_uri")).toBe(`http://127.0.0.1:${port}/callback`);
    expect(await readCredential(tokenFile)).toEqual({ status: "present", credential: result.credential });
  });

  it("rejects a token response without an access token", async () => {
    const port = await freePort();
    const browserReplies: Promise<HttpReply>[] = [];
    tokenReply = { status: 200, body: { token_type: "Bearer", expires_in: 3600, refresh_token: "fresh-refresh" } };

    const service = createService(testConfig(`http://127.0.0.1:${port}/callback`), (authUrl) => {
      const params = new URL(authUrl).searchParams;
      browserReplies.push(httpGet(`${params.get("redirect_uri")}?code=test-code&state=${params.get("state")}`));
    });

    const error = await service.login().catch((caught: unknown) => caught);
    await Promise.all(browserReplies);

    expect(error).toBeInstanceOf(AuthorizationError);
    expect(error).toMatchObject({ message: "Spotify token response did not include access_token." });
    expect(await readCredential(tokenFile)).toEqual({ status: "missing" });
  });

  it("saves nothing when the user denies access", async () => {
    const port = await freePort();
    const browserReplies: Promise<HttpReply>[] = [];
    const service = createService(testConfig(`http://127.0.0.1:${port}/callback`), (authUrl) => {
      const params = new URL(authUrl).searchParams;
      browserReplies.push(httpGet(`${params.get("redirect_uri")}?error=access_denied`));
    });

    await expect(service.login()).rejects.toBeInstanceOf(AuthorizationError);
    await Promise.all(browserReplies);
    expect(requests).toEqual([]);
    expect(await readCredential(tokenFile)).toEqual({ status: "missing" });
  });
});
