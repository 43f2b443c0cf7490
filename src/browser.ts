import { spawn } from "node:child_process";
import { logger } from "./logger";

export function openBrowser(url: string): void {
  const platform = process.platform;

  const [command, args]: [string, string[]] =
    platform === "win32"
      ? ["cmd", ["/c", "start", "", url]]
      : platform === "darwin"
        ? ["open", [url]]
        : ["xdg-open", [url]];

  const child = spawn(command, args, { detached: true, stdio: "ignore" });
  child.on("error", (error) => {
    logger.warn(`Could not open a browser (${error.message}). Open the URL above manually.`);
  });
  child.unref();
}
