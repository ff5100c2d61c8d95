import { Err, Ok, type Result } from "slang-ts";
import { type AuthChannel, authenticate } from "./auth-flow.ts";
import { type CancellableDelay, computeBackoffDelay, createDelay } from "./backoff.ts";
import { decodeFrame, encodeCommand } from "./codec.ts";
import type { ResolvedClientConfig } from "./config.ts";
import type { EventDispatcher } from "./dispatcher.ts";
import {
  type AuthError,
  ConnectError,
  type EncodingError,
  NotConnectedError,
  type RoomwireError,
  SessionError,
} from "./errors.ts";
import { toSessionEvents } from "./events.ts";
import type { GatewayEndpoint } from "./gateway.ts";
import { withLogContext } from "./logger.ts";
import { applyMessage, createRoomState, snapshotRoom, strayHandle } from "./room-state.ts";
import { createTransport, type Transport, type TransportCloseInfo } from "./transport.ts";
import type {
  AuthIdentity,
  DisconnectOutcome,
  RoomSnapshot,
  RoomState,
  SessionEvent,
  SessionState,
  UserRole,
} from "./types.ts";
import type { Command, InboundMessage } from "./wire.ts";

export interface SessionManagerOptions {
  config: ResolvedClientConfig;
  dispatcher: EventDispatcher;
}

export interface SessionManager {
  readonly state: SessionState;
  readonly identity: AuthIdentity | null;
  /** Time of the last inbound frame, null before the first one */
  readonly lastActivity: number | null;
  /** Snapshot of the joined room, null when not joined */
  room(): RoomSnapshot | null;
  /** This client's role in the room, null when unknown */
  selfRole(): UserRole | null;
  /**
   * Starts the session and resolves once the room is joined.
   * Rejects with AuthError when login is refused and with SessionError when
   * the session gives up. Resolves early if stop() is called first.
   */
  start(): Promise<void>;
  /** Ends the session and cancels any pending reconnect */
  stop(): Promise<void>;
  /** Encodes and sends a command on the current connection */
  send(command: Command): Result<void, EncodingError | NotConnectedError>;
}

/**
 * How one connection attempt ended.
 */
type AttemptOutcome =
  | { kind: "stopped" }
  | { kind: "auth_failed"; error: AuthError }
  | { kind: "closed"; joined: boolean }
  | { kind: "failed"; joined: boolean; error: RoomwireError };

type JoinWait = "joined" | "timeout" | "closed";

/**
 * A live connection and the listeners scoped to it.
 */
interface Link {
  readonly url: string;
  readonly transport: Transport;
  /** Resolves when the transport reaches closed or failed */
  readonly ended: Promise<TransportCloseInfo>;
  closeInfo: TransportCloseInfo | null;
  readonly messageListeners: Set<(message: InboundMessage) => void>;
  readonly closeListeners: Set<() => void>;
  joinWaiter: ((result: JoinWait) => void) | null;
}

interface Deferred {
  promise: Promise<void>;
  resolve: () => void;
  reject: (error: unknown) => void;
}

function createDeferred(): Deferred {
  let resolve: () => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<void>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

const STOPPED: AttemptOutcome = { kind: "stopped" };

/**
 * Settles with `promise`, or rejects as soon as `signal` aborts.
 */
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });
    void promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Creates the session manager: the state machine that drives connect,
 * login, room join, the receive loop and reconnects.
 *
 * Frames are processed one at a time in arrival order. Each frame is decoded,
 * applied to the room state, translated into events and handed to the
 * dispatcher, which never blocks the loop. Callbacks of a superseded
 * connection are ignored.
 *
 * @param options - Resolved configuration and the dispatcher to publish to
 * @returns SessionManager instance
 */
export function createSessionManager(options: SessionManagerOptions): SessionManager {
  const { config, dispatcher } = options;
  const logger = withLogContext(config.logger, { room: config.room });

  let state: SessionState = "disconnected";
  let identity: AuthIdentity | null = null;
  let room: RoomState | null = null;
  let lastActivity: number | null = null;
  let link: Link | null = null;
  let attemptCounter = 0;
  let req = 1;
  let stopRequested = false;
  let running: Promise<void> | null = null;
  let ready: Deferred | null = null;
  let backoffDelay: CancellableDelay | null = null;
  let lookup: AbortController | null = null;

  function emit(event: SessionEvent): void {
    dispatcher.dispatch(event);
  }

  function setState(next: SessionState): void {
    if (state === next) return;
    const from = state;
    state = next;
    logger.debug({
      message: `Session ${from} -> ${next}`,
      atFunction: "session.setState",
      data: { from, to: next },
    });
    emit({ kind: "stateChanged", timestamp: Date.now(), from, to: next });
  }

  function send(command: Command): Result<void, EncodingError | NotConnectedError> {
    const frame = encodeCommand(command, req);
    if (frame.isErr) {
      logger.warn({
        message: frame.error.message,
        atFunction: "session.send",
        data: { command: command.kind },
      });
      return Err(frame.error);
    }

    const current = link;
    if (current === null || current.transport.state !== "open") {
      return Err(new NotConnectedError(`send '${command.kind}'`));
    }

    req += 1;
    current.transport.send(frame.value).catch((error: unknown) => {
      logger.error({
        message: `Failed to send '${command.kind}'`,
        atFunction: "session.send",
        data: { error: error instanceof Error ? error.message : String(error) },
      });
    });
    return Ok(undefined);
  }

  function handleFrame(current: Link, raw: string): void {
    if (link !== current) return;

    const decoded = decodeFrame(raw);
    if (decoded.isErr) {
      logger.warn({
        message: `Dropping frame: ${decoded.error.message}`,
        atFunction: "session.handleFrame",
        data: { opcode: decoded.error.opcode },
      });
      return;
    }

    const message = decoded.value;
    const now = Date.now();
    lastActivity = now;

    if (message.kind === "ping") {
      send({ kind: "pong" });
      return;
    }

    for (const listener of [...current.messageListeners]) listener(message);

    const previous = room ?? createRoomState(config.room);
    const stray = strayHandle(previous, message);
    if (stray !== null) {
      logger.debug({
        message: `'${message.kind}' references unknown handle ${stray}, inserting placeholder`,
        atFunction: "session.handleFrame",
        data: { handle: stray },
      });
    }

    const next = applyMessage(previous, message, now);
    if (room !== null) room = next;

    if (message.kind === "joined" && state === "joining_room") {
      room = next;
      setState("joined");
    }

    for (const event of toSessionEvents(message, previous, next, now)) emit(event);

    if (message.kind === "joined") {
      current.joinWaiter?.("joined");
    }
  }

  function openLink(endpoint: GatewayEndpoint): Link {
    let markEnded: (info: TransportCloseInfo) => void = () => undefined;
    const ended = new Promise<TransportCloseInfo>((resolve) => {
      markEnded = resolve;
    });

    const next: Link = {
      url: endpoint.url,
      ended,
      closeInfo: null,
      messageListeners: new Set(),
      closeListeners: new Set(),
      joinWaiter: null,
      transport: createTransport({
        url: endpoint.url,
        logger,
        socketFactory: config.socketFactory,
        connectTimeoutMs: config.connectTimeoutMs,
        pingIntervalMs: config.pingIntervalMs,
        pongTimeoutMs: config.pongTimeoutMs,
        origin: config.origin,
        onFrame: (raw) => handleFrame(next, raw),
        onClose: (info) => {
          next.closeInfo = info;
          for (const listener of [...next.closeListeners]) listener();
          next.joinWaiter?.("closed");
          markEnded(info);
        },
      }),
    };
    return next;
  }

  function channelFor(current: Link): AuthChannel {
    return {
      send,
      onMessage(listener) {
        current.messageListeners.add(listener);
        return () => current.messageListeners.delete(listener);
      },
      onClose(listener) {
        current.closeListeners.add(listener);
        return () => current.closeListeners.delete(listener);
      },
    };
  }

  function waitForJoin(current: Link): Promise<JoinWait> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => settle("timeout"), config.joinTimeoutMs);
      function settle(result: JoinWait): void {
        clearTimeout(timer);
        current.joinWaiter = null;
        resolve(result);
      }
      if (current.closeInfo !== null) {
        settle("closed");
        return;
      }
      current.joinWaiter = settle;
    });
  }

  async function teardown(current: Link): Promise<void> {
    if (current.closeInfo === null) {
      await current.transport.close(1001, "Going away");
    }
    if (link === current) link = null;
  }

  function lostConnection(current: Link, joined: boolean, fallback: string): AttemptOutcome {
    const error = current.closeInfo?.error ?? new ConnectError(current.url, fallback);
    return { kind: "failed", joined, error };
  }

  async function runAttempt(): Promise<AttemptOutcome> {
    attemptCounter += 1;
    const attempt = attemptCounter;
    req = 1;
    room = null;
    identity = null;
    setState("connecting");

    let endpoint: GatewayEndpoint;
    const controller = new AbortController();
    lookup = controller;
    try {
      endpoint = await untilAborted(
        config.gateway.resolve(config.room, controller.signal),
        controller.signal
      );
    } catch (error) {
      if (stopRequested) return STOPPED;
      const message = error instanceof Error ? error.message : String(error);
      return {
        kind: "failed",
        joined: false,
        error:
          error instanceof ConnectError
            ? error
            : new ConnectError("gateway", `Gateway failed: ${message}`, { cause: error }),
      };
    } finally {
      lookup = null;
    }
    if (stopRequested) return STOPPED;

    const current = openLink(endpoint);
    link = current;
    logger.info({
      message: `Connecting to ${endpoint.url}`,
      atFunction: "session.runAttempt",
      data: { attempt },
    });

    try {
      await current.transport.connect();
    } catch (error) {
      await teardown(current);
      if (stopRequested) return STOPPED;
      return {
        kind: "failed",
        joined: false,
        error:
          error instanceof ConnectError
            ? error
            : new ConnectError(endpoint.url, String(error), { cause: error }),
      };
    }
    if (stopRequested) {
      await teardown(current);
      return STOPPED;
    }

    setState("authenticating");
    const auth = await authenticate(
      channelFor(current),
      {
        nick: config.nick,
        account: config.account ?? null,
        password: config.password ?? null,
        token: endpoint.token,
        userAgent: config.userAgent,
      },
      config.authTimeoutMs,
      logger
    );
    if (stopRequested) {
      await teardown(current);
      return STOPPED;
    }
    if (auth.isErr) {
      if (current.closeInfo?.state === "failed") {
        return lostConnection(current, false, "Connection lost during login");
      }
      setState("disconnecting");
      await teardown(current);
      return { kind: "auth_failed", error: auth.error };
    }

    identity = auth.value;
    room = createRoomState(config.room);
    setState("joining_room");

    const joinSent = send({ kind: "join", room: config.room });
    if (joinSent.isErr) {
      await teardown(current);
      return stopRequested ? STOPPED : lostConnection(current, false, joinSent.error.message);
    }

    const joinResult = await waitForJoin(current);
    if (stopRequested) {
      await teardown(current);
      return STOPPED;
    }
    if (joinResult === "timeout") {
      setState("disconnecting");
      await teardown(current);
      return {
        kind: "failed",
        joined: false,
        error: new SessionError(`Room join timed out after ${config.joinTimeoutMs}ms`),
      };
    }
    if (joinResult === "closed") {
      const info = current.closeInfo;
      if (info?.state === "closed") return { kind: "closed", joined: false };
      return lostConnection(current, false, "Connection lost while joining");
    }

    logger.info({
      message: `Joined room '${config.room}'`,
      atFunction: "session.runAttempt",
      data: { attempt, handle: auth.value.handle },
    });
    ready?.resolve();

    const info = await current.ended;
    if (link === current) link = null;
    if (stopRequested) return STOPPED;
    return info.state === "failed"
      ? lostConnection(current, true, "Connection lost")
      : { kind: "closed", joined: true };
  }

  function finish(outcome: DisconnectOutcome, error: RoomwireError | null): void {
    setState("disconnecting");
    room = null;
    identity = null;
    setState("disconnected");
    emit({ kind: "disconnected", timestamp: Date.now(), outcome, error });
  }

  async function run(): Promise<void> {
    let failures = 0;

    for (;;) {
      const outcome = await runAttempt();

      if (outcome.kind === "stopped") {
        finish("stopped", null);
        ready?.resolve();
        return;
      }

      if (outcome.kind === "auth_failed") {
        finish("gave_up", outcome.error);
        ready?.reject(outcome.error);
        return;
      }

      if (outcome.joined) failures = 0;

      if (outcome.kind === "closed") {
        logger.info({
          message: "Server closed the session",
          atFunction: "session.run",
          data: { joined: outcome.joined },
        });
        finish("closed", null);
        ready?.reject(new SessionError("Server closed the session before the room was joined"));
        return;
      }

      logger.warn({
        message: `Connection lost: ${outcome.error.message}`,
        atFunction: "session.run",
        data: { joined: outcome.joined, failures },
      });

      if (!config.reconnect) {
        const error = new SessionError(`Connection lost: ${outcome.error.message}`, {
          cause: outcome.error,
        });
        finish("gave_up", error);
        ready?.reject(error);
        return;
      }

      failures += 1;
      if (failures > config.maxReconnectAttempts) {
        const error = new SessionError(
          `Giving up after ${config.maxReconnectAttempts} reconnect attempts`,
          { cause: outcome.error }
        );
        logger.error({
          message: error.message,
          atFunction: "session.run",
          data: { lastError: outcome.error.message },
        });
        finish("gave_up", error);
        ready?.reject(error);
        return;
      }

      const delayMs = computeBackoffDelay(failures, config.backoff, config.random);
      finish("retrying", outcome.error);
      emit({ kind: "reconnecting", timestamp: Date.now(), attempt: failures, delayMs });

      backoffDelay = createDelay(delayMs);
      const elapsed = await backoffDelay.done;
      backoffDelay = null;
      if (!elapsed || stopRequested) {
        emit({ kind: "disconnected", timestamp: Date.now(), outcome: "stopped", error: null });
        ready?.resolve();
        return;
      }
    }
  }

  return {
    get state() {
      return state;
    },

    get identity() {
      return identity;
    },

    get lastActivity() {
      return lastActivity;
    },

    room() {
      return room === null || state !== "joined" ? null : snapshotRoom(room);
    },

    selfRole() {
      if (room === null || room.selfHandle === null) return identity?.role ?? null;
      return room.users.get(room.selfHandle)?.role ?? identity?.role ?? null;
    },

    start(): Promise<void> {
      if (running !== null && ready !== null) return ready.promise;

      stopRequested = false;
      const deferred = createDeferred();
      ready = deferred;
      running = run()
        .catch((error: unknown) => {
          logger.error({
            message: "Session loop crashed",
            atFunction: "session.start",
            data: { error: error instanceof Error ? error.message : String(error) },
          });
          deferred.reject(new SessionError("Session loop crashed", { cause: error }));
        })
        .finally(() => {
          running = null;
        });
      return deferred.promise;
    },

    async stop(): Promise<void> {
      const current = running;
      if (current === null) return;
      stopRequested = true;
      backoffDelay?.cancel();
      lookup?.abort();
      const active = link;
      if (active !== null) {
        if (state === "joined") setState("disconnecting");
        await active.transport.close(1001, "Going away");
      }
      await current;
    },

    send,
  };
}
