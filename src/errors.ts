export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class SpotifyApiError extends Error {
  readonly status: number;
  readonly body: string;

  constructor(status: number, message: string, body = "") {
    super(message);
    this.name = "SpotifyApiError";
    this.status = status;
    this.body = body;
  }
}

export class NetworkError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "NetworkError";
  }
}

export class NoCredentialError extends Error {
  constructor(message = "No saved Spotify credential. Run `auth login` first.", options?: { cause?: unknown }) {
    super(message, options);
    this.name = "NoCredentialError";
  }
}

/**
 * The refresh grant or the verification of its result failed. The saved
 * credential is unusable until the user logs in again.
 */
export class RefreshFailedError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RefreshFailedError";
  }
}

export class AuthorizationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AuthorizationError";
  }
}

export class CorruptStateError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CorruptStateError";
    this.filePath = filePath;
  }
}

export class NotFoundLocallyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NotFoundLocallyError";
  }
}

export class NotFoundRemotelyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NotFoundRemotelyError";
  }
}

/**
 * Some writes of an operation landed before it failed. Every write is an
 * upsert keyed on playlist ID or (track ID, playlist ID), so running the
 * operation again converges on the same rows.
 */
export class PartialApplicationError extends Error {
  readonly appliedCount: number;

  constructor(message: string, appliedCount: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PartialApplicationError";
    this.appliedCount = appliedCount;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
