import WebSocket from "ws";
import { ConnectError, NotConnectedError } from "./errors.ts";
import { createKeepalive } from "./keepalive.ts";
import type { Logger } from "./types.ts";

/** Websocket subprotocol the chat server speaks */
export const DEFAULT_PROTOCOLS = ["tc"];

/** Close codes that count as a normal end of the connection */
const CLEAN_CLOSE_CODES = new Set([1000, 1001]);

/** How long close() waits for the peer before dropping the socket */
const CLOSE_GRACE_MS = 5000;

/**
 * Callbacks a socket implementation reports into.
 */
export interface SocketListeners {
  onOpen: () => void;
  onMessage: (data: string) => void;
  onPong: () => void;
  onError: (error: Error) => void;
  onClose: (code: number, reason: string) => void;
}

/**
 * The subset of a websocket the transport drives.
 */
export interface SocketLike {
  send(data: string, callback: (error?: Error) => void): void;
  ping(): void;
  close(code?: number, reason?: string): void;
  terminate(): void;
}

export interface SocketInit {
  protocols: string[];
  headers: Record<string, string>;
  origin?: string;
  handshakeTimeoutMs: number;
}

/**
 * Opens a socket to `url` and wires its events to `listeners`.
 * Replace it in tests to run the client against an in-process peer.
 */
export type SocketFactory = (
  url: string,
  listeners: SocketListeners,
  init: SocketInit
) => SocketLike;

function rawDataToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
}

/**
 * Socket factory backed by the `ws` package.
 */
export const createWsSocket: SocketFactory = (url, listeners, init) => {
  const socket = new WebSocket(url, init.protocols, {
    headers: init.headers,
    origin: init.origin,
    handshakeTimeout: init.handshakeTimeoutMs,
  });
  socket.on("open", () => listeners.onOpen());
  socket.on("message", (data) => listeners.onMessage(rawDataToString(data)));
  socket.on("pong", () => listeners.onPong());
  socket.on("error", (error) => listeners.onError(error));
  socket.on("close", (code, reason) => listeners.onClose(code, reason.toString()));
  return socket;
};

export type TransportState =
  | "idle"
  | "connecting"
  | "open"
  | "closing"
  | "closed"
  | "failed";

/**
 * How the connection ended. `closed` is a requested or normal close;
 * `failed` is an error, an abnormal close code or a dead peer.
 */
export interface TransportCloseInfo {
  state: "closed" | "failed";
  code: number;
  reason: string;
  error: ConnectError | null;
}

export interface TransportOptions {
  url: string;
  logger: Logger;
  socketFactory: SocketFactory;
  connectTimeoutMs: number;
  /** 0 disables the keepalive */
  pingIntervalMs: number;
  pongTimeoutMs: number;
  protocols?: string[];
  headers?: Record<string, string>;
  origin?: string;
  /** Receives each text frame while the connection is open */
  onFrame: (data: string) => void;
  /** Called exactly once, when the transport reaches closed or failed */
  onClose: (info: TransportCloseInfo) => void;
}

export interface Transport {
  readonly state: TransportState;
  /** Opens the socket; rejects with ConnectError */
  connect(): Promise<void>;
  /** Writes one frame; frames are written in call order */
  send(frame: string): Promise<void>;
  /** Closes the socket and resolves once the transport is closed */
  close(code?: number, reason?: string): Promise<void>;
}

/**
 * Creates a single-use websocket transport.
 *
 * @param options - Endpoint, timing and callbacks
 * @returns Transport in the `idle` state
 */
export function createTransport(options: TransportOptions): Transport {
  const { url, logger } = options;
  let state: TransportState = "idle";
  let socket: SocketLike | null = null;
  let closeRequested = false;
  let connectTimer: ReturnType<typeof setTimeout> | null = null;
  let closeTimer: ReturnType<typeof setTimeout> | null = null;
  let pendingConnect: {
    resolve: () => void;
    reject: (error: ConnectError) => void;
  } | null = null;
  let writeChain: Promise<void> = Promise.resolve();

  let markClosed: () => void = () => undefined;
  const closed = new Promise<void>((resolve) => {
    markClosed = resolve;
  });

  const keepalive = createKeepalive({
    intervalMs: options.pingIntervalMs,
    timeoutMs: options.pongTimeoutMs,
    logger,
    ping: () => socket?.ping(),
    onTimeout: () => fail(new ConnectError(url, "Peer stopped answering pings")),
  });

  function clearTimers(): void {
    if (connectTimer !== null) {
      clearTimeout(connectTimer);
      connectTimer = null;
    }
    if (closeTimer !== null) {
      clearTimeout(closeTimer);
      closeTimer = null;
    }
  }

  function settle(
    next: "closed" | "failed",
    code: number,
    reason: string,
    error: ConnectError | null
  ): void {
    if (state === "closed" || state === "failed") return;
    state = next;
    keepalive.stop();
    clearTimers();

    if (pendingConnect) {
      pendingConnect.reject(
        error ?? new ConnectError(url, `Connection closed before it opened (${code})`)
      );
      pendingConnect = null;
    }

    logger.debug({
      message: `Transport ${next}`,
      atFunction: "transport.settle",
      data: { url, code, reason, error: error?.message ?? null },
    });
    markClosed();
    options.onClose({ state: next, code, reason, error });
  }

  function fail(error: ConnectError): void {
    if (state === "closed" || state === "failed") return;
    const current = socket;
    settle("failed", 1006, error.message, error);
    current?.terminate();
  }

  const listeners: SocketListeners = {
    onOpen() {
      if (state !== "connecting") return;
      if (connectTimer !== null) {
        clearTimeout(connectTimer);
        connectTimer = null;
      }
      state = "open";
      keepalive.start();
      pendingConnect?.resolve();
      pendingConnect = null;
    },

    onMessage(data) {
      if (state !== "open" && state !== "closing") return;
      keepalive.recordPong();
      options.onFrame(data);
    },

    onPong() {
      keepalive.recordPong();
    },

    onError(error) {
      logger.warn({
        message: `Socket error: ${error.message}`,
        atFunction: "transport.onError",
        data: { url },
      });
      if (closeRequested) return;
      fail(new ConnectError(url, error.message, { cause: error }));
    },

    onClose(code, reason) {
      if (closeRequested || CLEAN_CLOSE_CODES.has(code)) {
        settle("closed", code, reason, null);
        return;
      }
      settle(
        "failed",
        code,
        reason,
        new ConnectError(url, `Connection closed abnormally (${code}${reason ? `: ${reason}` : ""})`)
      );
    },
  };

  return {
    get state() {
      return state;
    },

    connect(): Promise<void> {
      if (state !== "idle") {
        return Promise.reject(new ConnectError(url, `Cannot connect from state '${state}'`));
      }
      state = "connecting";

      return new Promise<void>((resolve, reject) => {
        pendingConnect = { resolve, reject };
        connectTimer = setTimeout(() => {
          fail(new ConnectError(url, `Connection timed out after ${options.connectTimeoutMs}ms`));
        }, options.connectTimeoutMs);

        try {
          socket = options.socketFactory(url, listeners, {
            protocols: options.protocols ?? DEFAULT_PROTOCOLS,
            headers: options.headers ?? {},
            origin: options.origin,
            handshakeTimeoutMs: options.connectTimeoutMs,
          });
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          fail(new ConnectError(url, `Failed to open socket: ${message}`, { cause: error }));
        }
      });
    },

    send(frame: string): Promise<void> {
      if (state !== "open") {
        return Promise.reject(new NotConnectedError("send"));
      }

      const write = writeChain.then(
        () =>
          new Promise<void>((resolve, reject) => {
            const current = socket;
            if (state !== "open" || current === null) {
              reject(new NotConnectedError("send"));
              return;
            }
            current.send(frame, (error) => {
              if (error) {
                reject(new ConnectError(url, `Write failed: ${error.message}`, { cause: error }));
              } else {
                resolve();
              }
            });
          })
      );
      writeChain = write.catch(() => undefined);
      return write;
    },

    close(code = 1000, reason = "Client closing"): Promise<void> {
      if (state === "closed" || state === "failed") return closed;
      closeRequested = true;

      const current = socket;
      if (state === "idle" || current === null) {
        settle("closed", code, reason, null);
        return closed;
      }
      if (state === "connecting") {
        current.terminate();
        settle("closed", code, "Aborted before open", null);
        return closed;
      }
      if (state === "closing") return closed;

      state = "closing";
      keepalive.stop();
      closeTimer = setTimeout(() => {
        current.terminate();
        settle("closed", code, reason, null);
      }, CLOSE_GRACE_MS);
      closeTimer.unref?.();
      current.close(code, reason);
      return closed;
    },
  };
}
