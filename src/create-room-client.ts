import { Err } from "slang-ts";
import { type ClientConfig, resolveClientConfig } from "./config.ts";
import { createEventDispatcher } from "./dispatcher.ts";
import { ConfigurationError, PermissionError } from "./errors.ts";
import { createSessionManager } from "./session-manager.ts";
import type {
  ActionResult,
  AnyEventHandler,
  AuthIdentity,
  PlaylistItem,
  RoomSnapshot,
  SessionEventHandler,
  SessionEventKind,
  SessionState,
  UserRole,
} from "./types.ts";
import type { Command } from "./wire.ts";

/**
 * Video to share in the room. Playing from a non-zero offset seeks.
 */
export interface MediaRequest {
  videoId: string;
  /** Length of the video in seconds */
  duration: number;
  title?: string;
  /** Position in seconds. Default: 0 */
  offset?: number;
}

/**
 * How the room playlist advances after each video.
 */
export interface PlaylistMode {
  random: boolean;
  repeat: boolean;
}

/**
 * Room client instance returned by createRoomClient
 */
export interface RoomClientInstance {
  /** Current session state */
  readonly state: SessionState;
  /** Whether the client is in the room */
  readonly connected: boolean;
  /** Identity assigned at login, null when not logged in */
  readonly identity: AuthIdentity | null;
  /** Copy of the room state, null when not joined */
  readonly room: RoomSnapshot | null;
  /** Time of the last frame received, null before the first one */
  readonly lastActivity: number | null;

  /**
   * Connect, log in and join the room.
   * @returns Promise that resolves when the room is joined
   */
  start(): Promise<void>;

  /**
   * Leave the room and close the connection. Cancels pending reconnects.
   */
  stop(): Promise<void>;

  /** Send a chat message to the room */
  sendChat(text: string): ActionResult;
  /** Send a private message to one user */
  sendPrivate(handle: number, text: string): ActionResult;
  /** Change this client's nick */
  setNick(nick: string): ActionResult;

  /** Remove a user from the room. Requires moderator rights */
  kick(handle: number): ActionResult;
  /** Ban a user. Requires moderator rights */
  ban(handle: number): ActionResult;
  /** Lift a ban. Requires moderator rights */
  unban(banId: number): ActionResult;
  /** Ask for the ban list; it arrives as a `banlist` event */
  requestBanlist(): ActionResult;
  /** Let a pending broadcast in a green room go live */
  approveBroadcast(handle: number): ActionResult;
  /** Stop another user's broadcast */
  closeBroadcast(handle: number): ActionResult;

  /** Answer a `passwordRequired` prompt */
  sendRoomPassword(password: string): ActionResult;
  /** Answer a `captchaRequired` prompt */
  sendCaptcha(token: string): ActionResult;

  playMedia(media: MediaRequest): ActionResult;
  pauseMedia(media: MediaRequest): ActionResult;
  stopMedia(media: MediaRequest): ActionResult;

  /** Ask for the room playlist; it arrives as a `playlist` event */
  requestPlaylist(): ActionResult;
  addToPlaylist(item: PlaylistItem): ActionResult;
  removeFromPlaylist(item: PlaylistItem): ActionResult;
  setPlaylistMode(mode: PlaylistMode): ActionResult;

  /**
   * Register a handler for one event kind
   * @param kind - Event kind to listen for
   * @param handler - Called with each event of that kind
   * @returns Unsubscribe function
   */
  on<K extends SessionEventKind>(kind: K, handler: SessionEventHandler<K>): () => void;

  /**
   * Remove a handler registered with on()
   */
  off<K extends SessionEventKind>(kind: K, handler: SessionEventHandler<K>): void;

  /**
   * Register a handler for every event
   * @returns Unsubscribe function
   */
  onAny(handler: AnyEventHandler): () => void;
}

const MODERATOR_ROLES: ReadonlySet<UserRole> = new Set(["moderator", "owner"]);

/**
 * Creates a client for one chat room.
 *
 * @param config - Room, credentials, endpoint and tuning
 * @returns RoomClientInstance
 * @throws ConfigurationError when the configuration is invalid
 *
 * @example
 * ```ts
 * const client = createRoomClient({ room: "lobby", url: "wss://chat.example.com/ws" });
 *
 * client.on("chat", (event) => {
 *   console.log(`${event.user?.nick ?? event.handle}: ${event.text}`);
 * });
 *
 * await client.start();
 * client.sendChat("hello");
 * ```
 */
export function createRoomClient(config: ClientConfig): RoomClientInstance {
  const resolved = resolveClientConfig(config);
  if (resolved.isErr) {
    throw new ConfigurationError(resolved.error);
  }

  const settings = resolved.value;
  const logger = settings.logger;

  const dispatcher = createEventDispatcher({
    logger,
    onHandlerError: (error, source) => {
      if (source === "error") return;
      dispatcher.dispatch({ kind: "error", timestamp: Date.now(), error, source });
    },
  });

  const session = createSessionManager({ config: settings, dispatcher });

  function act(command: Command): ActionResult {
    return session.send(command);
  }

  function moderate(command: Command): ActionResult {
    // null: not logged in yet, so the connection check in act() decides
    const role = session.selfRole();
    if (role !== null && !MODERATOR_ROLES.has(role)) {
      logger.warn({
        message: `Refusing '${command.kind}' without moderator rights`,
        atFunction: "roomClient.moderate",
        data: { role, state: session.state },
      });
      return Err(new PermissionError(command.kind, role));
    }
    return act(command);
  }

  function playlist(kind: "yut_playlist_add" | "yut_playlist_remove", item: PlaylistItem) {
    return act({
      kind,
      videoId: item.videoId,
      duration: item.duration,
      title: item.title,
      image: item.image,
    });
  }

  function media(kind: "yut_pause" | "yut_stop", request: MediaRequest): ActionResult {
    return act({
      kind,
      videoId: request.videoId,
      duration: request.duration,
      offset: request.offset ?? 0,
    });
  }

  return {
    get state() {
      return session.state;
    },

    get connected() {
      return session.state === "joined";
    },

    get identity() {
      return session.identity;
    },

    get room() {
      return session.room();
    },

    get lastActivity() {
      return session.lastActivity;
    },

    start: () => session.start(),
    stop: () => session.stop(),

    sendChat: (text) => act({ kind: "msg", text }),
    sendPrivate: (handle, text) => act({ kind: "pvtmsg", handle, text }),
    setNick: (nick) => act({ kind: "nick", nick }),

    kick: (handle) => moderate({ kind: "kick", handle }),
    ban: (handle) => moderate({ kind: "ban", handle }),
    unban: (banId) => moderate({ kind: "unban", banId }),
    requestBanlist: () => moderate({ kind: "banlist" }),
    approveBroadcast: (handle) => moderate({ kind: "stream_moder_allow", handle }),
    closeBroadcast: (handle) => moderate({ kind: "stream_moder_close", handle }),

    sendRoomPassword: (password) => act({ kind: "password", password }),
    sendCaptcha: (token) => act({ kind: "captcha", token }),

    playMedia: (request) =>
      act({
        kind: "yut_play",
        videoId: request.videoId,
        duration: request.duration,
        title: request.title ?? "",
        offset: request.offset ?? 0,
      }),
    pauseMedia: (request) => media("yut_pause", request),
    stopMedia: (request) => media("yut_stop", request),

    requestPlaylist: () => act({ kind: "yut_playlist" }),
    addToPlaylist: (item) => playlist("yut_playlist_add", item),
    removeFromPlaylist: (item) => playlist("yut_playlist_remove", item),
    setPlaylistMode: (mode) =>
      act({ kind: "yut_playlist_mode", random: mode.random, repeat: mode.repeat }),

    on<K extends SessionEventKind>(kind: K, handler: SessionEventHandler<K>) {
      return dispatcher.on(kind, handler);
    },

    off<K extends SessionEventKind>(kind: K, handler: SessionEventHandler<K>) {
      dispatcher.off(kind, handler);
    },

    onAny: (handler) => dispatcher.onAny(handler),
  };
}
