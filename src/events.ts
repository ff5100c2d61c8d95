import { snapshotRoom } from "./room-state.ts";
import type {
  BannedUser,
  CloseReason,
  RoomState,
  SessionEvent,
} from "./types.ts";
import type { InboundMessage } from "./wire.ts";

const CLOSE_REASONS: Readonly<Record<number, CloseReason>> = {
  3: "closed",
  4: "banned",
  5: "reconnect",
  6: "double_sign_in",
  8: "timeout",
  11: "server_error",
  12: "kicked",
};

/**
 * Maps the numeric code of a server `closed` frame to a reason.
 */
export function closeReason(code: number): CloseReason {
  return CLOSE_REASONS[code] ?? "unknown";
}

/**
 * Translates one inbound message into the events handlers receive.
 *
 * Users are resolved against the room state: departures against the state
 * before the message, arrivals and changes against the state after it.
 * Messages without an observable effect yield no events.
 *
 * @param message - Decoded inbound message
 * @param previous - Room state before the message was applied
 * @param next - Room state after the message was applied
 * @param timestamp - Time the frame arrived
 */
export function toSessionEvents(
  message: InboundMessage,
  previous: RoomState,
  next: RoomState,
  timestamp: number
): SessionEvent[] {
  const roomUpdated = (): SessionEvent[] =>
    next.flags !== previous.flags || next.topic !== previous.topic
      ? [{ kind: "roomUpdated", timestamp, room: snapshotRoom(next) }]
      : [];

  switch (message.kind) {
    case "joined": {
      const self = next.users.get(message.self.handle);
      if (!self) return [];
      return [{ kind: "ready", timestamp, self, room: snapshotRoom(next) }];
    }

    case "userlist":
      return [
        {
          kind: "userlist",
          timestamp,
          users: message.users.flatMap((user) => next.users.get(user.handle) ?? []),
        },
      ];

    case "join": {
      const user = next.users.get(message.user.handle);
      return user ? [{ kind: "joined", timestamp, user }] : [];
    }

    case "quit": {
      const user = previous.users.get(message.handle);
      return user ? [{ kind: "left", timestamp, user }] : [];
    }

    case "kick": {
      const user = previous.users.get(message.handle);
      return user ? [{ kind: "kicked", timestamp, user }] : [];
    }

    case "nick": {
      const user = next.users.get(message.handle);
      if (!user) return [];
      const before = previous.users.get(message.handle);
      return [
        {
          kind: "nickChanged",
          timestamp,
          user,
          previousNick: before?.nick || null,
        },
      ];
    }

    case "msg":
      return [
        {
          kind: "chat",
          timestamp,
          handle: message.handle,
          user: next.users.get(message.handle) ?? null,
          text: message.text,
        },
      ];

    case "pvtmsg":
      return [
        {
          kind: "privateChat",
          timestamp,
          handle: message.handle,
          user: next.users.get(message.handle) ?? null,
          text: message.text,
        },
      ];

    case "publish": {
      const user = next.users.get(message.handle);
      return user ? [{ kind: "broadcastStarted", timestamp, user }] : [];
    }

    case "unpublish": {
      const user = next.users.get(message.handle);
      return user ? [{ kind: "broadcastStopped", timestamp, user }] : [];
    }

    case "pending_moderation": {
      const user = next.users.get(message.handle);
      return user ? [{ kind: "broadcastPending", timestamp, user }] : [];
    }

    case "stream_moder_allow": {
      const user = next.users.get(message.handle);
      return message.success && user
        ? [{ kind: "broadcastApproved", timestamp, user }]
        : [];
    }

    case "stream_moder_close": {
      const user = next.users.get(message.handle);
      return message.success && user
        ? [{ kind: "broadcastClosed", timestamp, user }]
        : [];
    }

    case "ban":
      return message.success
        ? [{ kind: "banned", timestamp, banned: message.banned }]
        : [];

    case "unban": {
      if (!message.success) return [];
      const banned: BannedUser = previous.banlist.get(message.banId) ?? {
        banId: message.banId,
        nick: "",
        account: null,
        bannedBy: null,
      };
      return [{ kind: "unbanned", timestamp, banned }];
    }

    case "banlist":
      return [{ kind: "banlist", timestamp, items: [...next.banlist.values()] }];

    case "room_settings":
      return roomUpdated();

    case "sysmsg":
      return [{ kind: "systemMessage", timestamp, text: message.text }, ...roomUpdated()];

    case "password":
      return [{ kind: "passwordRequired", timestamp, req: message.req }, ...roomUpdated()];

    case "captcha":
      return [{ kind: "captchaRequired", timestamp, siteKey: message.siteKey }];

    case "yut_play":
      return [
        {
          kind: "mediaPlay",
          timestamp,
          user: message.handle === null ? null : (next.users.get(message.handle) ?? null),
          media: message.media,
        },
      ];

    case "yut_pause":
      return [
        {
          kind: "mediaPause",
          timestamp,
          user: message.handle === null ? null : (next.users.get(message.handle) ?? null),
          media: message.media,
        },
      ];

    case "yut_stop":
      return [{ kind: "mediaStop", timestamp, media: message.media }];

    case "yut_playlist":
      return [{ kind: "playlist", timestamp, items: message.items }];

    case "closed":
      return [
        {
          kind: "serverClosed",
          timestamp,
          code: message.code,
          reason: closeReason(message.code),
        },
      ];

    case "unknown":
      return [
        { kind: "unknown", timestamp, opcode: message.opcode, payload: message.payload },
      ];

    case "ping":
    case "login_ok":
    case "login_fail":
    case "rate_limited":
      return [];
  }
}
