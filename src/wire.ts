import { z } from "zod";
import type {
  BannedUser,
  MediaItem,
  PlaylistItem,
  RoomSettings,
  UserRole,
} from "./types.ts";

/** Longest chat or private message the server accepts */
export const MAX_TEXT_LENGTH = 2000;
/** Longest nick the server accepts */
export const MAX_NICK_LENGTH = 32;
/** Upper bound on an encoded outbound frame, in bytes */
export const MAX_FRAME_BYTES = 16 * 1024;

// ---------------------------------------------------------------------------
// Inbound frames
// ---------------------------------------------------------------------------

const handleSchema = z.number().int().nonnegative();

const userFields = {
  handle: handleSchema,
  nick: z.string(),
  username: z.string().nullish(),
  mod: z.boolean().optional(),
  owner: z.boolean().optional(),
  lurker: z.boolean().optional(),
};

const userFrameSchema = z.object(userFields);
type UserFrame = z.infer<typeof userFrameSchema>;

const roomFrameSchema = z.object({
  name: z.string().optional(),
  topic: z.string().nullish(),
  greenroom: z.boolean().optional(),
  pass: z.boolean().optional(),
});

const mediaFrameSchema = z.object({
  id: z.string().min(1),
  duration: z.number().nonnegative(),
  offset: z.number().nonnegative().optional(),
  title: z.string().optional(),
});

const playlistFrameSchema = z.object({
  id: z.string().min(1),
  duration: z.number().nonnegative(),
  title: z.string().optional(),
  image: z.string().nullish(),
});

const bannedFrameSchema = z.object({
  id: z.number().int(),
  nick: z.string(),
  username: z.string().nullish(),
  moderator: z.string().nullish(),
});

const inboundFrameSchema = z.discriminatedUnion("tc", [
  z.object({ tc: z.literal("ping") }),
  z.object({ tc: z.literal("login_ok"), ...userFields }),
  z.object({
    tc: z.literal("login_fail"),
    reason: z.string(),
    text: z.string().optional(),
  }),
  z.object({
    tc: z.literal("rate_limited"),
    retry_after: z.number().nonnegative().optional(),
  }),
  z.object({
    tc: z.literal("joined"),
    self: userFrameSchema,
    room: roomFrameSchema,
    users: z.array(userFrameSchema).default([]),
  }),
  z.object({ tc: z.literal("userlist"), users: z.array(userFrameSchema) }),
  z.object({ tc: z.literal("join"), ...userFields }),
  z.object({ tc: z.literal("quit"), handle: handleSchema }),
  z.object({ tc: z.literal("nick"), handle: handleSchema, nick: z.string() }),
  z.object({ tc: z.literal("msg"), handle: handleSchema, text: z.string() }),
  z.object({ tc: z.literal("pvtmsg"), handle: handleSchema, text: z.string() }),
  z.object({ tc: z.literal("publish"), handle: handleSchema }),
  z.object({ tc: z.literal("unpublish"), handle: handleSchema }),
  z.object({ tc: z.literal("pending_moderation"), handle: handleSchema }),
  z.object({
    tc: z.literal("stream_moder_allow"),
    success: z.boolean().default(true),
    handle: handleSchema,
  }),
  z.object({
    tc: z.literal("stream_moder_close"),
    success: z.boolean().default(true),
    handle: handleSchema,
  }),
  z.object({ tc: z.literal("kick"), handle: handleSchema }),
  z.object({
    tc: z.literal("ban"),
    success: z.boolean().default(true),
    id: z.number().int(),
    nick: z.string(),
    username: z.string().nullish(),
    handle: handleSchema.optional(),
    moderator: z.string().nullish(),
  }),
  z.object({
    tc: z.literal("unban"),
    success: z.boolean().default(true),
    id: z.number().int(),
  }),
  z.object({ tc: z.literal("banlist"), items: z.array(bannedFrameSchema) }),
  z.object({ tc: z.literal("room_settings"), ...roomFrameSchema.shape }),
  z.object({ tc: z.literal("sysmsg"), text: z.string() }),
  z.object({ tc: z.literal("password"), req: z.number().int().nullish() }),
  z.object({ tc: z.literal("captcha"), key: z.string() }),
  z.object({ tc: z.literal("closed"), error: z.number().int() }),
  z.object({
    tc: z.literal("yut_play"),
    handle: handleSchema.optional(),
    item: mediaFrameSchema,
  }),
  z.object({
    tc: z.literal("yut_pause"),
    handle: handleSchema.optional(),
    item: mediaFrameSchema,
  }),
  z.object({ tc: z.literal("yut_stop"), item: mediaFrameSchema }),
  z.object({
    tc: z.literal("yut_playlist"),
    items: z.array(playlistFrameSchema).default([]),
  }),
]);

type InboundFrame = z.infer<typeof inboundFrameSchema>;

/** Opcodes with a typed inbound schema */
export const KNOWN_INBOUND_OPCODES: ReadonlySet<string> = new Set(
  inboundFrameSchema.options.map((option) => option.shape.tc.value)
);

/**
 * A user as carried on the wire, already mapped to domain fields.
 */
export interface WireUser {
  handle: number;
  nick: string;
  account: string | null;
  role: UserRole;
  lurker: boolean;
}

/**
 * Typed inbound message, one variant per known opcode plus `unknown`.
 */
export type InboundMessage =
  | { kind: "ping" }
  | ({ kind: "login_ok" } & WireUser)
  | { kind: "login_fail"; reason: string; text: string | null }
  | { kind: "rate_limited"; retryAfterMs: number | null }
  | {
      kind: "joined";
      self: WireUser;
      room: RoomSettings & { name: string | null };
      users: WireUser[];
    }
  | { kind: "userlist"; users: WireUser[] }
  | { kind: "join"; user: WireUser }
  | { kind: "quit"; handle: number }
  | { kind: "nick"; handle: number; nick: string }
  | { kind: "msg"; handle: number; text: string }
  | { kind: "pvtmsg"; handle: number; text: string }
  | { kind: "publish"; handle: number }
  | { kind: "unpublish"; handle: number }
  | { kind: "pending_moderation"; handle: number }
  | { kind: "stream_moder_allow"; success: boolean; handle: number }
  | { kind: "stream_moder_close"; success: boolean; handle: number }
  | { kind: "kick"; handle: number }
  | {
      kind: "ban";
      success: boolean;
      banned: BannedUser;
      handle: number | null;
    }
  | { kind: "unban"; success: boolean; banId: number }
  | { kind: "banlist"; items: BannedUser[] }
  | { kind: "room_settings"; settings: RoomSettings }
  | { kind: "sysmsg"; text: string }
  | { kind: "password"; req: number | null }
  | { kind: "captcha"; siteKey: string }
  | { kind: "closed"; code: number }
  | { kind: "yut_play"; handle: number | null; media: MediaItem }
  | { kind: "yut_pause"; handle: number | null; media: MediaItem }
  | { kind: "yut_stop"; media: MediaItem }
  | { kind: "yut_playlist"; items: PlaylistItem[] }
  | { kind: "unknown"; opcode: string; payload: Record<string, unknown> };

export type InboundKind = InboundMessage["kind"];

/**
 * Derives a user's role from the flags the server sends.
 */
export function roleOf(frame: {
  username?: string | null;
  mod?: boolean;
  owner?: boolean;
}): UserRole {
  if (frame.owner) return "owner";
  if (frame.mod) return "moderator";
  if (frame.username) return "member";
  return "guest";
}

function toWireUser(frame: UserFrame): WireUser {
  return {
    handle: frame.handle,
    nick: frame.nick,
    account: frame.username || null,
    role: roleOf(frame),
    lurker: frame.lurker ?? false,
  };
}

function toRoomSettings(frame: z.infer<typeof roomFrameSchema>): RoomSettings {
  const settings: RoomSettings = {};
  if (frame.topic !== undefined) settings.topic = frame.topic;
  if (frame.greenroom !== undefined) settings.greenRoom = frame.greenroom;
  if (frame.pass !== undefined) settings.passwordProtected = frame.pass;
  return settings;
}

function toMediaItem(frame: z.infer<typeof mediaFrameSchema>): MediaItem {
  return {
    videoId: frame.id,
    title: frame.title ?? "",
    duration: frame.duration,
    offset: frame.offset ?? 0,
  };
}

function toPlaylistItem(frame: z.infer<typeof playlistFrameSchema>): PlaylistItem {
  return {
    videoId: frame.id,
    title: frame.title ?? "",
    duration: frame.duration,
    image: frame.image || null,
  };
}

function toBannedUser(frame: z.infer<typeof bannedFrameSchema>): BannedUser {
  return {
    banId: frame.id,
    nick: frame.nick,
    account: frame.username || null,
    bannedBy: frame.moderator || null,
  };
}

/**
 * Maps a validated inbound frame to its domain message.
 */
function toInboundMessage(frame: InboundFrame): InboundMessage {
  switch (frame.tc) {
    case "ping":
      return { kind: "ping" };
    case "login_ok":
      return { kind: "login_ok", ...toWireUser(frame) };
    case "login_fail":
      return { kind: "login_fail", reason: frame.reason, text: frame.text ?? null };
    case "rate_limited":
      return {
        kind: "rate_limited",
        retryAfterMs:
          frame.retry_after === undefined ? null : frame.retry_after * 1000,
      };
    case "joined":
      return {
        kind: "joined",
        self: toWireUser(frame.self),
        room: { ...toRoomSettings(frame.room), name: frame.room.name ?? null },
        users: frame.users.map(toWireUser),
      };
    case "userlist":
      return { kind: "userlist", users: frame.users.map(toWireUser) };
    case "join":
      return { kind: "join", user: toWireUser(frame) };
    case "quit":
    case "publish":
    case "unpublish":
    case "pending_moderation":
    case "kick":
      return { kind: frame.tc, handle: frame.handle };
    case "nick":
      return { kind: "nick", handle: frame.handle, nick: frame.nick };
    case "msg":
    case "pvtmsg":
      return { kind: frame.tc, handle: frame.handle, text: frame.text };
    case "stream_moder_allow":
    case "stream_moder_close":
      return { kind: frame.tc, success: frame.success, handle: frame.handle };
    case "ban":
      return {
        kind: "ban",
        success: frame.success,
        banned: toBannedUser(frame),
        handle: frame.handle ?? null,
      };
    case "unban":
      return { kind: "unban", success: frame.success, banId: frame.id };
    case "banlist":
      return { kind: "banlist", items: frame.items.map(toBannedUser) };
    case "room_settings":
      return { kind: "room_settings", settings: toRoomSettings(frame) };
    case "sysmsg":
      return { kind: "sysmsg", text: frame.text };
    case "password":
      return { kind: "password", req: frame.req ?? null };
    case "captcha":
      return { kind: "captcha", siteKey: frame.key };
    case "closed":
      return { kind: "closed", code: frame.error };
    case "yut_play":
    case "yut_pause":
      return {
        kind: frame.tc,
        handle: frame.handle ?? null,
        media: toMediaItem(frame.item),
      };
    case "yut_stop":
      return { kind: "yut_stop", media: toMediaItem(frame.item) };
    case "yut_playlist":
      return { kind: "yut_playlist", items: frame.items.map(toPlaylistItem) };
  }
}

/**
 * Validates a parsed JSON object whose opcode is known.
 */
export function parseInboundFrame(payload: Record<string, unknown>) {
  return inboundFrameSchema.transform(toInboundMessage).safeParse(payload);
}

// ---------------------------------------------------------------------------
// Outbound commands
// ---------------------------------------------------------------------------

const nickSchema = z
  .string()
  .min(1, "nick cannot be empty")
  .max(MAX_NICK_LENGTH, `nick cannot exceed ${MAX_NICK_LENGTH} characters`)
  .regex(/^\S+$/, "nick cannot contain whitespace");

const textSchema = z
  .string()
  .max(MAX_TEXT_LENGTH, `text cannot exceed ${MAX_TEXT_LENGTH} characters`)
  .refine((text) => text.trim().length > 0, "text cannot be empty");

const secretSchema = z.string().min(1, "value cannot be empty");

const mediaFields = {
  videoId: z.string().min(1, "videoId cannot be empty"),
  duration: z.number().nonnegative(),
  offset: z.number().nonnegative(),
};

const playlistFields = {
  videoId: z.string().min(1, "videoId cannot be empty"),
  duration: z.number().nonnegative(),
  title: z.string(),
  image: z.string().nullable(),
};

/**
 * Validation schema for every command the client can send.
 */
export const commandSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("login"),
    userAgent: z.string().min(1),
    nick: nickSchema,
    account: secretSchema.nullable(),
    password: secretSchema.nullable(),
    token: z.string().nullable(),
  }),
  z.object({ kind: z.literal("join"), room: z.string().min(1) }),
  z.object({ kind: z.literal("pong") }),
  z.object({ kind: z.literal("nick"), nick: nickSchema }),
  z.object({ kind: z.literal("msg"), text: textSchema }),
  z.object({ kind: z.literal("pvtmsg"), text: textSchema, handle: handleSchema }),
  z.object({ kind: z.literal("kick"), handle: handleSchema }),
  z.object({ kind: z.literal("ban"), handle: handleSchema }),
  z.object({ kind: z.literal("unban"), banId: z.number().int() }),
  z.object({ kind: z.literal("banlist") }),
  z.object({ kind: z.literal("password"), password: secretSchema }),
  z.object({ kind: z.literal("captcha"), token: secretSchema }),
  z.object({ kind: z.literal("stream_moder_allow"), handle: handleSchema }),
  z.object({ kind: z.literal("stream_moder_close"), handle: handleSchema }),
  z.object({ kind: z.literal("yut_play"), title: z.string(), ...mediaFields }),
  z.object({ kind: z.literal("yut_pause"), ...mediaFields }),
  z.object({ kind: z.literal("yut_stop"), ...mediaFields }),
  z.object({ kind: z.literal("yut_playlist") }),
  z.object({ kind: z.literal("yut_playlist_add"), ...playlistFields }),
  z.object({ kind: z.literal("yut_playlist_remove"), ...playlistFields }),
  z.object({
    kind: z.literal("yut_playlist_mode"),
    random: z.boolean(),
    repeat: z.boolean(),
  }),
]);

/**
 * Outbound command. Type is inferred from `commandSchema`.
 */
export type Command = z.infer<typeof commandSchema>;
export type CommandKind = Command["kind"];

/**
 * Builds the JSON object sent for a validated command.
 */
export function toCommandFrame(
  command: Command,
  req: number
): Record<string, unknown> {
  switch (command.kind) {
    case "login": {
      const frame: Record<string, unknown> = {
        tc: "login",
        req,
        useragent: command.userAgent,
        nick: command.nick,
      };
      if (command.account !== null) frame.account = command.account;
      if (command.password !== null) frame.password = command.password;
      if (command.token !== null) frame.token = command.token;
      return frame;
    }
    case "join":
      return { tc: "join", req, room: command.room };
    case "pong":
    case "banlist":
    case "yut_playlist":
      return { tc: command.kind, req };
    case "nick":
      return { tc: "nick", req, nick: command.nick };
    case "msg":
      return { tc: "msg", req, text: command.text };
    case "pvtmsg":
      return { tc: "pvtmsg", req, text: command.text, handle: command.handle };
    case "kick":
    case "ban":
    case "stream_moder_allow":
    case "stream_moder_close":
      return { tc: command.kind, req, handle: command.handle };
    case "unban":
      return { tc: "unban", req, id: command.banId };
    case "password":
      return { tc: "password", req, password: command.password };
    case "captcha":
      return { tc: "captcha", req, token: command.token };
    case "yut_play":
      // A play from a non-zero offset is a seek: the server wants no title.
      return {
        tc: "yut_play",
        req,
        item:
          command.offset === 0
            ? {
                id: command.videoId,
                duration: command.duration,
                offset: 0,
                title: command.title,
              }
            : {
                id: command.videoId,
                duration: command.duration,
                offset: command.offset,
                playlist: false,
                seek: true,
              },
      };
    case "yut_pause":
    case "yut_stop":
      return {
        tc: command.kind,
        req,
        item: {
          id: command.videoId,
          duration: command.duration,
          offset: command.offset,
        },
      };
    case "yut_playlist_add":
    case "yut_playlist_remove":
      return {
        tc: command.kind,
        req,
        item: {
          id: command.videoId,
          duration: command.duration,
          title: command.title,
          image: command.image,
        },
      };
    case "yut_playlist_mode":
      return {
        tc: "yut_playlist_mode",
        req,
        mode: { random: command.random, repeat: command.repeat },
      };
  }
}

const reqSchema = z.number().int().nonnegative();

const outboundItemSchema = z.object({
  id: z.string(),
  duration: z.number(),
  offset: z.number(),
  title: z.string().optional(),
});

const outboundPlaylistItemSchema = z.object({
  id: z.string(),
  duration: z.number(),
  title: z.string(),
  image: z.string().nullable(),
});

const outboundFrameSchema = z.discriminatedUnion("tc", [
  z.object({
    tc: z.literal("login"),
    req: reqSchema,
    useragent: z.string(),
    nick: z.string(),
    account: z.string().optional(),
    password: z.string().optional(),
    token: z.string().optional(),
  }),
  z.object({ tc: z.literal("join"), req: reqSchema, room: z.string() }),
  z.object({ tc: z.literal("pong"), req: reqSchema }),
  z.object({ tc: z.literal("nick"), req: reqSchema, nick: z.string() }),
  z.object({ tc: z.literal("msg"), req: reqSchema, text: z.string() }),
  z.object({
    tc: z.literal("pvtmsg"),
    req: reqSchema,
    text: z.string(),
    handle: z.number(),
  }),
  z.object({ tc: z.literal("kick"), req: reqSchema, handle: z.number() }),
  z.object({ tc: z.literal("ban"), req: reqSchema, handle: z.number() }),
  z.object({ tc: z.literal("unban"), req: reqSchema, id: z.number() }),
  z.object({ tc: z.literal("banlist"), req: reqSchema }),
  z.object({ tc: z.literal("password"), req: reqSchema, password: z.string() }),
  z.object({ tc: z.literal("captcha"), req: reqSchema, token: z.string() }),
  z.object({
    tc: z.literal("stream_moder_allow"),
    req: reqSchema,
    handle: z.number(),
  }),
  z.object({
    tc: z.literal("stream_moder_close"),
    req: reqSchema,
    handle: z.number(),
  }),
  z.object({ tc: z.literal("yut_play"), req: reqSchema, item: outboundItemSchema }),
  z.object({ tc: z.literal("yut_pause"), req: reqSchema, item: outboundItemSchema }),
  z.object({ tc: z.literal("yut_stop"), req: reqSchema, item: outboundItemSchema }),
  z.object({ tc: z.literal("yut_playlist"), req: reqSchema }),
  z.object({
    tc: z.literal("yut_playlist_add"),
    req: reqSchema,
    item: outboundPlaylistItemSchema,
  }),
  z.object({
    tc: z.literal("yut_playlist_remove"),
    req: reqSchema,
    item: outboundPlaylistItemSchema,
  }),
  z.object({
    tc: z.literal("yut_playlist_mode"),
    req: reqSchema,
    mode: z.object({ random: z.boolean(), repeat: z.boolean() }),
  }),
]);

type OutboundFrame = z.infer<typeof outboundFrameSchema>;

function toCommand(frame: OutboundFrame): Command {
  switch (frame.tc) {
    case "login":
      return {
        kind: "login",
        userAgent: frame.useragent,
        nick: frame.nick,
        account: frame.account ?? null,
        password: frame.password ?? null,
        token: frame.token ?? null,
      };
    case "join":
      return { kind: "join", room: frame.room };
    case "pong":
    case "banlist":
    case "yut_playlist":
      return { kind: frame.tc };
    case "nick":
      return { kind: "nick", nick: frame.nick };
    case "msg":
      return { kind: "msg", text: frame.text };
    case "pvtmsg":
      return { kind: "pvtmsg", text: frame.text, handle: frame.handle };
    case "kick":
    case "ban":
    case "stream_moder_allow":
    case "stream_moder_close":
      return { kind: frame.tc, handle: frame.handle };
    case "unban":
      return { kind: "unban", banId: frame.id };
    case "password":
      return { kind: "password", password: frame.password };
    case "captcha":
      return { kind: "captcha", token: frame.token };
    case "yut_play":
      return {
        kind: "yut_play",
        videoId: frame.item.id,
        title: frame.item.title ?? "",
        duration: frame.item.duration,
        offset: frame.item.offset,
      };
    case "yut_pause":
    case "yut_stop":
      return {
        kind: frame.tc,
        videoId: frame.item.id,
        duration: frame.item.duration,
        offset: frame.item.offset,
      };
    case "yut_playlist_add":
    case "yut_playlist_remove":
      return {
        kind: frame.tc,
        videoId: frame.item.id,
        duration: frame.item.duration,
        title: frame.item.title,
        image: frame.item.image,
      };
    case "yut_playlist_mode":
      return { kind: "yut_playlist_mode", random: frame.mode.random, repeat: frame.mode.repeat };
  }
}

/**
 * Validates an outbound frame object and maps it back to its command.
 */
export function parseCommandFrame(payload: unknown) {
  return outboundFrameSchema
    .transform((frame) => ({ req: frame.req, command: toCommand(frame) }))
    .safeParse(payload);
}
