import type {
  BannedUser,
  RoomFlags,
  RoomSettings,
  RoomSnapshot,
  RoomState,
  UserRecord,
} from "./types.ts";
import type { InboundMessage, WireUser } from "./wire.ts";

/** System message text the server sends when green room mode toggles */
const GREEN_ROOM_ENABLED = "enabled green room";
const GREEN_ROOM_DISABLED = "disabled green room";

const DEFAULT_FLAGS: RoomFlags = { greenRoom: false, passwordProtected: false };

/**
 * Creates an empty room with no users and default flags.
 *
 * @param name - Room name requested at join time
 */
export function createRoomState(name: string): RoomState {
  return {
    name,
    topic: null,
    flags: DEFAULT_FLAGS,
    selfHandle: null,
    users: new Map(),
    broadcasting: new Set(),
    pending: new Set(),
    banlist: new Map(),
  };
}

function toUserRecord(user: WireUser, now: number): UserRecord {
  return {
    handle: user.handle,
    nick: user.nick,
    account: user.account,
    role: user.role,
    broadcasting: false,
    lurker: user.lurker,
    joinedAt: now,
    previousNicks: [],
  };
}

/**
 * Record inserted when a message references a handle the roster lacks.
 */
function placeholderRecord(handle: number, now: number): UserRecord {
  return {
    handle,
    nick: "",
    account: null,
    role: "guest",
    broadcasting: false,
    lurker: false,
    joinedAt: now,
    previousNicks: [],
  };
}

function withoutHandle(set: ReadonlySet<number>, handle: number): ReadonlySet<number> {
  if (!set.has(handle)) return set;
  const next = new Set(set);
  next.delete(handle);
  return next;
}

function withHandle(set: ReadonlySet<number>, handle: number): ReadonlySet<number> {
  if (set.has(handle)) return set;
  return new Set(set).add(handle);
}

function putUser(state: RoomState, record: UserRecord): RoomState {
  const users = new Map(state.users);
  users.set(record.handle, record);
  return {
    ...state,
    users,
    broadcasting: record.broadcasting
      ? withHandle(state.broadcasting, record.handle)
      : withoutHandle(state.broadcasting, record.handle),
    pending: withoutHandle(state.pending, record.handle),
  };
}

function removeUser(state: RoomState, handle: number): RoomState {
  if (!state.users.has(handle)) return state;
  const users = new Map(state.users);
  users.delete(handle);
  return {
    ...state,
    users,
    broadcasting: withoutHandle(state.broadcasting, handle),
    pending: withoutHandle(state.pending, handle),
  };
}

/**
 * Applies a change to one user, creating a placeholder first when the
 * handle is unknown.
 */
function updateUser(
  state: RoomState,
  handle: number,
  now: number,
  change: (user: UserRecord) => UserRecord
): RoomState {
  const current = state.users.get(handle) ?? placeholderRecord(handle, now);
  const next = change(current);
  if (next === current && state.users.has(handle)) return state;
  const users = new Map(state.users);
  users.set(handle, next);
  return { ...state, users };
}

function setBroadcasting(
  state: RoomState,
  handle: number,
  broadcasting: boolean,
  now: number
): RoomState {
  const updated = updateUser(state, handle, now, (user) =>
    user.broadcasting === broadcasting ? user : { ...user, broadcasting }
  );
  const set = broadcasting
    ? withHandle(updated.broadcasting, handle)
    : withoutHandle(updated.broadcasting, handle);
  const pending = broadcasting ? withoutHandle(updated.pending, handle) : updated.pending;
  if (updated === state && set === state.broadcasting && pending === state.pending) {
    return state;
  }
  return { ...updated, broadcasting: set, pending };
}

function applySettings(state: RoomState, settings: RoomSettings): RoomState {
  const topic = settings.topic === undefined ? state.topic : settings.topic;
  const greenRoom = settings.greenRoom ?? state.flags.greenRoom;
  const passwordProtected =
    settings.passwordProtected ?? state.flags.passwordProtected;
  const flagsChanged =
    greenRoom !== state.flags.greenRoom ||
    passwordProtected !== state.flags.passwordProtected;
  if (!flagsChanged && topic === state.topic) return state;
  return {
    ...state,
    topic,
    flags: flagsChanged ? { greenRoom, passwordProtected } : state.flags,
  };
}

function applyBan(state: RoomState, banned: BannedUser, handle: number | null): RoomState {
  const banlist = new Map(state.banlist);
  banlist.set(banned.banId, banned);
  const withBan: RoomState = { ...state, banlist };
  return handle === null ? withBan : removeUser(withBan, handle);
}

function applyUnban(state: RoomState, banId: number): RoomState {
  if (!state.banlist.has(banId)) return state;
  const banlist = new Map(state.banlist);
  banlist.delete(banId);
  return { ...state, banlist };
}

/**
 * Returns the room state that results from one inbound message.
 *
 * Never mutates its input. Messages that change nothing return the same
 * object, so `next === previous` means "no change". Mutations of a handle
 * the roster does not know insert a placeholder record; removals of an
 * unknown handle are ignored.
 *
 * @param state - Current room state
 * @param message - Decoded inbound message
 * @param now - Timestamp recorded on newly observed users
 * @returns The next room state
 *
 * @example
 * ```ts
 * let room = createRoomState("lobby");
 * room = applyMessage(room, { kind: "join", user }, Date.now());
 * ```
 */
export function applyMessage(
  state: RoomState,
  message: InboundMessage,
  now: number = Date.now()
): RoomState {
  switch (message.kind) {
    case "joined": {
      const initial: RoomState = applySettings(
        { ...createRoomState(message.room.name ?? state.name), banlist: state.banlist },
        message.room
      );
      const roster = message.users.reduce(
        (acc, user) => putUser(acc, toUserRecord(user, now)),
        initial
      );
      return {
        ...putUser(roster, toUserRecord(message.self, now)),
        selfHandle: message.self.handle,
      };
    }

    case "userlist":
      return message.users.reduce(
        (acc, user) => putUser(acc, toUserRecord(user, now)),
        state
      );

    case "join":
      return putUser(state, toUserRecord(message.user, now));

    case "quit":
    case "kick":
      return removeUser(state, message.handle);

    case "nick":
      return updateUser(state, message.handle, now, (user) =>
        user.nick === message.nick
          ? user
          : {
              ...user,
              nick: message.nick,
              previousNicks: user.nick ? [...user.previousNicks, user.nick] : user.previousNicks,
            }
      );

    case "publish":
      return setBroadcasting(state, message.handle, true, now);

    case "unpublish":
      if (!state.users.has(message.handle)) return state;
      return setBroadcasting(state, message.handle, false, now);

    case "pending_moderation": {
      const updated = updateUser(state, message.handle, now, (user) => user);
      const pending = withHandle(updated.pending, message.handle);
      if (updated === state && pending === state.pending) return state;
      return { ...updated, pending };
    }

    case "stream_moder_allow": {
      if (!message.success) return state;
      const pending = withoutHandle(state.pending, message.handle);
      return pending === state.pending ? state : { ...state, pending };
    }

    case "stream_moder_close":
      if (!message.success || !state.users.has(message.handle)) return state;
      return setBroadcasting(state, message.handle, false, now);

    case "ban":
      return message.success ? applyBan(state, message.banned, message.handle) : state;

    case "unban":
      return message.success ? applyUnban(state, message.banId) : state;

    case "banlist":
      return {
        ...state,
        banlist: new Map(message.items.map((item) => [item.banId, item])),
      };

    case "room_settings":
      return applySettings(state, message.settings);

    case "sysmsg":
      if (message.text.includes(GREEN_ROOM_ENABLED)) {
        return applySettings(state, { greenRoom: true });
      }
      if (message.text.includes(GREEN_ROOM_DISABLED)) {
        return applySettings(state, { greenRoom: false });
      }
      return state;

    case "password":
      return applySettings(state, { passwordProtected: true });

    default:
      return state;
  }
}

/**
 * Returns the handle a message mutates when the roster does not know it,
 * i.e. when applyMessage would insert a placeholder record.
 */
export function strayHandle(state: RoomState, message: InboundMessage): number | null {
  switch (message.kind) {
    case "nick":
    case "publish":
    case "pending_moderation":
      return state.users.has(message.handle) ? null : message.handle;
    default:
      return null;
  }
}

/**
 * Finds the first user with the given nick, case-insensitively.
 */
export function findUserByNick(state: RoomState, nick: string): UserRecord | null {
  const wanted = nick.toLowerCase();
  for (const user of state.users.values()) {
    if (user.nick.toLowerCase() === wanted) return user;
  }
  return null;
}

/**
 * Copies a room state into plain arrays and objects for callers.
 */
export function snapshotRoom(state: RoomState): RoomSnapshot {
  return {
    name: state.name,
    topic: state.topic,
    flags: { ...state.flags },
    selfHandle: state.selfHandle,
    users: [...state.users.values()].map((user) => ({
      ...user,
      previousNicks: [...user.previousNicks],
    })),
    broadcasting: [...state.broadcasting],
    pending: [...state.pending],
    banlist: [...state.banlist.values()].map((banned) => ({ ...banned })),
  };
}
