function timestamp(): string {
  return new Date().toISOString();
}

function debugEnabled(): boolean {
  const value = process.env.PLAYLIST_VAULT_DEBUG?.trim();
  return Boolean(value) && value !== "0";
}

// Everything goes to stderr; stdout is reserved for command results.
export const logger = {
  debug(message: string): void {
    if (debugEnabled()) {
      console.error(`[${timestamp()}] DEBUG ${message}`);
    }
  },
  info(message: string): void {
    console.error(`[${timestamp()}] INFO ${message}`);
  },
  warn(message: string): void {
    console.error(`[${timestamp()}] WARN ${message}`);
  },
  error(message: string): void {
    console.error(`[${timestamp()}] ERROR ${message}`);
  }
};
