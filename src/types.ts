import type { Result } from "slang-ts";
import type {
  EncodingError,
  NotConnectedError,
  PermissionError,
  RoomwireError,
} from "./errors.ts";

/**
 * One diagnostic record from the client. The session stamps room and
 * attempt into `data` through withLogContext.
 */
export interface LogEntry {
  message: string;
  /** Component and function that wrote the entry, e.g. "session.runAttempt" */
  atFunction: string;
  data: unknown;
}

/**
 * Sink for client diagnostics, passed as `logger` in ClientConfig.
 * Frames, state changes and reconnect decisions are logged at debug;
 * dropped frames and refused actions at warn.
 */
export interface Logger {
  debug: (entry: LogEntry) => void;
  info: (entry: LogEntry) => void;
  warn: (entry: LogEntry) => void;
  /** Handler failures and fatal session errors */
  error: (entry: LogEntry) => void;
}

/**
 * Permission level of a user inside a room.
 * Moderators and the owner may kick, ban and manage broadcasts.
 */
export type UserRole = "guest" | "member" | "moderator" | "owner";

/**
 * A user present in the room, keyed by handle.
 */
export interface UserRecord {
  /** Per-session numeric identifier assigned by the server */
  readonly handle: number;
  readonly nick: string;
  /** Account name, null for guests */
  readonly account: string | null;
  readonly role: UserRole;
  readonly broadcasting: boolean;
  /** Lurkers are present but cannot chat */
  readonly lurker: boolean;
  /** Millisecond timestamp of when the client observed the join */
  readonly joinedAt: number;
  /** Nicks this user went by earlier in the session, oldest first */
  readonly previousNicks: readonly string[];
}

/**
 * An entry of the room ban list.
 */
export interface BannedUser {
  readonly banId: number;
  readonly nick: string;
  readonly account: string | null;
  /** Moderator who issued the ban, when the server reports it */
  readonly bannedBy: string | null;
}

/**
 * Room-wide switches that change what the client may do.
 */
export interface RoomFlags {
  /** Broadcasts need moderator approval */
  readonly greenRoom: boolean;
  /** Entering requires the room password */
  readonly passwordProtected: boolean;
}

/**
 * Partial room settings as carried by snapshot and settings frames.
 */
export interface RoomSettings {
  topic?: string | null;
  greenRoom?: boolean;
  passwordProtected?: boolean;
}

/**
 * Client-side view of the joined room.
 * Never mutated in place: every change produces a new object.
 */
export interface RoomState {
  readonly name: string;
  readonly topic: string | null;
  readonly flags: RoomFlags;
  /** Handle of this client, known once the snapshot arrives */
  readonly selfHandle: number | null;
  /** Insertion-ordered roster */
  readonly users: ReadonlyMap<number, UserRecord>;
  /** Handles with an active broadcast */
  readonly broadcasting: ReadonlySet<number>;
  /** Handles waiting for broadcast approval in a green room */
  readonly pending: ReadonlySet<number>;
  /** Ban list keyed by ban id */
  readonly banlist: ReadonlyMap<number, BannedUser>;
}

/**
 * Plain copy of RoomState handed to callers.
 */
export interface RoomSnapshot {
  name: string;
  topic: string | null;
  flags: RoomFlags;
  selfHandle: number | null;
  users: UserRecord[];
  broadcasting: number[];
  pending: number[];
  banlist: BannedUser[];
}

/**
 * A video shared in the room.
 */
export interface MediaItem {
  videoId: string;
  title: string;
  /** Length of the video in seconds */
  duration: number;
  /** Playback position in seconds */
  offset: number;
}

/**
 * An entry of the room's shared video playlist.
 */
export interface PlaylistItem {
  videoId: string;
  title: string;
  /** Length of the video in seconds */
  duration: number;
  /** Thumbnail URL, null when the server sent none */
  image: string | null;
}

/**
 * The identity the server assigned after login.
 */
export interface AuthIdentity {
  kind: "guest" | "account";
  handle: number;
  nick: string;
  account: string | null;
  role: UserRole;
}

/**
 * Session lifecycle state.
 */
export type SessionState =
  | "disconnected"
  | "connecting"
  | "authenticating"
  | "joining_room"
  | "joined"
  | "disconnecting";

/**
 * How a session ended:
 * - stopped: stop() was called
 * - retrying: the connection dropped and a reconnect is scheduled
 * - closed: the server ended the session normally (kick, ban, double sign-in)
 * - gave_up: login failed or the reconnect budget ran out
 */
export type DisconnectOutcome = "stopped" | "retrying" | "closed" | "gave_up";

/**
 * Reason behind a server `closed` frame.
 */
export type CloseReason =
  | "closed"
  | "banned"
  | "reconnect"
  | "double_sign_in"
  | "timeout"
  | "server_error"
  | "kicked"
  | "unknown";

/**
 * Payloads of every event the client delivers, keyed by event kind.
 */
export interface SessionEventMap {
  /** This client entered the room; carries the initial snapshot */
  ready: { self: UserRecord; room: RoomSnapshot };
  userlist: { users: UserRecord[] };
  joined: { user: UserRecord };
  left: { user: UserRecord };
  nickChanged: { user: UserRecord; previousNick: string | null };
  /** user is null when the sender is not in the roster */
  chat: { handle: number; user: UserRecord | null; text: string };
  privateChat: { handle: number; user: UserRecord | null; text: string };
  broadcastStarted: { user: UserRecord };
  broadcastStopped: { user: UserRecord };
  broadcastPending: { user: UserRecord };
  broadcastApproved: { user: UserRecord };
  broadcastClosed: { user: UserRecord };
  kicked: { user: UserRecord };
  banned: { banned: BannedUser };
  unbanned: { banned: BannedUser };
  banlist: { items: BannedUser[] };
  roomUpdated: { room: RoomSnapshot };
  systemMessage: { text: string };
  passwordRequired: { req: number | null };
  captchaRequired: { siteKey: string };
  mediaPlay: { user: UserRecord | null; media: MediaItem };
  mediaPause: { user: UserRecord | null; media: MediaItem };
  mediaStop: { media: MediaItem };
  /** Reply to requestPlaylist() */
  playlist: { items: PlaylistItem[] };
  serverClosed: { code: number; reason: CloseReason };
  unknown: { opcode: string; payload: Record<string, unknown> };
  stateChanged: { from: SessionState; to: SessionState };
  reconnecting: { attempt: number; delayMs: number };
  disconnected: { outcome: DisconnectOutcome; error: RoomwireError | null };
  /** A handler failed; source is the kind of the event it was handling */
  error: { error: unknown; source: SessionEventKind };
}

export type SessionEventKind = keyof SessionEventMap;

/**
 * Event delivered to handlers. Without a type argument this is the union of
 * every event; with one it is the event of that kind.
 */
export type SessionEvent<K extends SessionEventKind = SessionEventKind> = {
  [P in K]: { kind: P; timestamp: number } & SessionEventMap[P];
}[K];

/**
 * Handler for one event kind. A returned promise is not awaited by the
 * dispatcher, but the next event for this handler waits until it settles.
 */
export type SessionEventHandler<K extends SessionEventKind> = (
  event: SessionEvent<K>
) => void | Promise<void>;

/**
 * Handler receiving every event.
 */
export type AnyEventHandler = (event: SessionEvent) => void | Promise<void>;

/**
 * Failure of an outbound action, returned synchronously.
 */
export type ActionError = EncodingError | NotConnectedError | PermissionError;

/**
 * Result of an outbound action.
 */
export type ActionResult = Result<void, ActionError>;
