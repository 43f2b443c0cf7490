import { promises as fs } from "node:fs";
import path from "node:path";
import { CorruptStateError, describeError } from "./errors";
import { logger } from "./logger";
import type { Credential } from "./types";

// Largest instant a Date can hold.
const MAX_DATE_MS = 8.64e15;

export type StoredCredential =
  | { status: "missing" }
  | { status: "corrupt"; error: CorruptStateError }
  | { status: "present"; credential: Credential };

function parseCredential(tokenFilePath: string, raw: string): Credential {
  let parsed: Partial<Credential> | null;
  try {
    parsed = JSON.parse(raw) as Partial<Credential> | null;
  } catch (error) {
    throw new CorruptStateError(tokenFilePath, `Token file is not valid JSON (${tokenFilePath})`, { cause: error });
  }

  if (
    !parsed ||
    typeof parsed.access_token !== "string" ||
    typeof parsed.refresh_token !== "string" ||
    typeof parsed.expires_at !== "number" ||
    !Number.isFinite(parsed.expires_at)
  ) {
    throw new CorruptStateError(
      tokenFilePath,
      `Token file is missing access_token, refresh_token or expires_at (${tokenFilePath})`
    );
  }

  if (Math.abs(parsed.expires_at) * 1000 > MAX_DATE_MS) {
    throw new CorruptStateError(tokenFilePath, `Token file has an out-of-range expires_at (${tokenFilePath})`);
  }

  return {
    ...parsed,
    access_token: parsed.access_token,
    refresh_token: parsed.refresh_token,
    expires_at: parsed.expires_at,
    expires_in: typeof parsed.expires_in === "number" ? parsed.expires_in : 0
  };
}

export async function readCredential(tokenFilePath: string): Promise<StoredCredential> {
  let raw: string;
  try {
    raw = await fs.readFile(tokenFilePath, "utf8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return { status: "missing" };
    }

    return {
      status: "corrupt",
      error: new CorruptStateError(
        tokenFilePath,
        `Failed to read token file (${tokenFilePath}): ${describeError(error)}`,
        { cause: error }
      )
    };
  }

  try {
    return { status: "present", credential: parseCredential(tokenFilePath, raw) };
  } catch (error) {
    if (error instanceof CorruptStateError) {
      return { status: "corrupt", error };
    }

    throw error;
  }
}

/** A corrupt token file is reported and then treated like a missing one. */
export async function loadCredential(tokenFilePath: string): Promise<Credential | null> {
  const stored = await readCredential(tokenFilePath);

  if (stored.status === "corrupt") {
    logger.warn(`${stored.error.message}. Ignoring it; log in again to replace it.`);
    return null;
  }

  return stored.status === "present" ? stored.credential : null;
}

export async function saveCredential(tokenFilePath: string, credential: Credential): Promise<void> {
  await fs.mkdir(path.dirname(tokenFilePath), { recursive: true });
  await fs.writeFile(tokenFilePath, `${JSON.stringify(credential, null, 2)}\n`, { encoding: "utf8", mode: 0o600 });
}

export async function deleteCredential(tokenFilePath: string): Promise<boolean> {
  try {
    await fs.unlink(tokenFilePath);
    return true;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return false;
    }

    throw error;
  }
}
