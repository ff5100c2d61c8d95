import { z } from "zod";
import { ConnectError } from "./errors.ts";

/**
 * Where to connect for a room, and the token to present at login.
 */
export interface GatewayEndpoint {
  url: string;
  token: string | null;
}

/**
 * Resolves the websocket endpoint for a room. Called before every
 * connection attempt, so tokens are fresh on reconnect. The session
 * aborts `signal` when it is stopped while the lookup is pending.
 */
export interface Gateway {
  resolve(room: string, signal?: AbortSignal): Promise<GatewayEndpoint>;
}

/**
 * Gateway that always returns the same endpoint.
 *
 * @param url - Websocket URL of the chat server
 * @param token - Token sent with login, if the server expects one
 */
export function createStaticGateway(url: string, token: string | null = null): Gateway {
  return {
    resolve: async () => ({ url, token }),
  };
}

const tokenResponseSchema = z.object({
  result: z.string().min(1),
  endpoint: z.string().url(),
});

export interface HttpGatewayOptions {
  /** Base URL of the token API, e.g. "https://chat.example.com/api" */
  apiBase: string;
  /** Extra headers for the token request */
  headers?: Record<string, string>;
  /** Request timeout in milliseconds. Default: 10000 */
  timeoutMs?: number;
  /** Fetch implementation. Default: global fetch */
  fetch?: typeof fetch;
}

/**
 * Gateway that asks an HTTP endpoint for a room token.
 * Requests `GET {apiBase}/room/token/{room}` and expects
 * `{ "result": "<token>", "endpoint": "<wss url>" }`.
 *
 * @example
 * ```ts
 * const gateway = createHttpGateway({ apiBase: "https://chat.example.com/api" });
 * const client = createRoomClient({ room: "lobby", gateway });
 * ```
 */
export function createHttpGateway(options: HttpGatewayOptions): Gateway {
  const base = options.apiBase.replace(/\/+$/, "");
  const timeoutMs = options.timeoutMs ?? 10_000;

  return {
    async resolve(room: string, signal?: AbortSignal): Promise<GatewayEndpoint> {
      const doFetch = options.fetch ?? fetch;
      const url = `${base}/room/token/${encodeURIComponent(room)}`;

      let response: Response;
      try {
        response = await doFetch(url, {
          headers: { accept: "application/json", ...options.headers },
          signal: signal
            ? AbortSignal.any([signal, AbortSignal.timeout(timeoutMs)])
            : AbortSignal.timeout(timeoutMs),
        });
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ConnectError(url, `Token request failed: ${reason}`, { cause: error });
      }

      if (!response.ok) {
        throw new ConnectError(url, `Token request returned HTTP ${response.status}`);
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (error) {
        throw new ConnectError(url, "Token response is not JSON", { cause: error });
      }

      const parsed = tokenResponseSchema.safeParse(body);
      if (!parsed.success) {
        const issues = parsed.error.issues
          .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
          .join(", ");
        throw new ConnectError(url, `Token response is malformed: ${issues}`);
      }
      return { url: parsed.data.endpoint, token: parsed.data.result };
    },
  };
}
