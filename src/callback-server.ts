import http from "node:http";
import { AuthorizationError } from "./errors";
import { logger } from "./logger";

export interface AuthorizationCallback {
  code: string;
  state: string | null;
}

export interface CallbackOptions {
  /** When set, a callback whose `state` differs is rejected. */
  expectedState?: string;
  /** Runs once the socket is bound, with the URL the browser should call back. */
  onListening?: (callbackUrl: URL) => void | Promise<void>;
}

function listenHost(redirectUri: URL): string {
  return redirectUri.hostname.replace(/^\[(.*)\]$/, "$1");
}

function listenPort(redirectUri: URL): number {
  return redirectUri.port ? Number(redirectUri.port) : 80;
}

/**
 * Binds a loopback listener for the redirect URI and resolves with the first
 * request on the redirect path. That request is answered before the promise
 * settles, and the listener is closed whatever the outcome; requests on other
 * paths get a 404 and are not counted.
 */
export function waitForAuthorizationCode(
  redirectUri: URL,
  options: CallbackOptions = {}
): Promise<AuthorizationCallback> {
  return new Promise<AuthorizationCallback>((resolve, reject) => {
    let handled = false;

    const shutdown = (): void => {
      server.close();
      server.closeAllConnections();
    };

    const server = http.createServer((req, res) => {
      const requestUrl = new URL(req.url ?? "/", redirectUri);

      if (handled || requestUrl.pathname !== redirectUri.pathname) {
        res.statusCode = 404;
        res.end("Not found");
        return;
      }

      handled = true;

      const respond = (statusCode: number, text: string, settle: () => void): void => {
        res.statusCode = statusCode;
        res.setHeader("Content-Type", "text/plain; charset=utf-8");
        res.setHeader("Connection", "close");
        res.end(text, () => {
          shutdown();
          settle();
        });
      };

      const error = requestUrl.searchParams.get("error");
      const code = requestUrl.searchParams.get("code");
      const state = requestUrl.searchParams.get("state");

      if (error) {
        respond(400, `Spotify authorization failed: ${error}. You can close this window.`, () =>
          reject(new AuthorizationError(`Spotify authorization failed: ${error}`))
        );
        return;
      }

      if (!code) {
        respond(400, "Missing code in callback.", () =>
          reject(new AuthorizationError("Authorization callback did not include a code."))
        );
        return;
      }

      if (options.expectedState !== undefined && state !== options.expectedState) {
        respond(400, "State mismatch in callback.", () =>
          reject(new AuthorizationError("State mismatch in OAuth callback."))
        );
        return;
      }

      respond(200, "Authentication successful! You can close this window.", () => resolve({ code, state }));
    });

    server.on("error", (error) => {
      shutdown();
      reject(error);
    });

    server.listen(listenPort(redirectUri), listenHost(redirectUri), () => {
      const address = server.address();
      const callbackUrl = new URL(redirectUri.toString());
      callbackUrl.port = String(typeof address === "object" && address ? address.port : listenPort(redirectUri));
      logger.debug(`Waiting for the authorization callback on ${callbackUrl.toString()}`);

      const announce = async (): Promise<void> => {
        await options.onListening?.(callbackUrl);
      };

      announce().catch((error: unknown) => {
        handled = true;
        shutdown();
        reject(error);
      });
    });
  });
}
