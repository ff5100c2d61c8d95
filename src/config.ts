import { customAlphabet } from "nanoid";
import { Err, Ok, type Result } from "slang-ts";
import { z } from "zod";
import { createStaticGateway, type Gateway } from "./gateway.ts";
import { createDefaultLogger } from "./logger.ts";
import { createWsSocket, type SocketFactory } from "./transport.ts";
import type { Logger } from "./types.ts";
import { MAX_NICK_LENGTH } from "./wire.ts";

export const DEFAULT_USER_AGENT = "roomwire/0.1.0 (node)";

const NICK_ALPHABET = "abcdefghijklmnopqrstuvwxyz0123456789";
const RANDOM_NICK_MIN = 5;
const RANDOM_NICK_MAX = 15;
const randomNick = customAlphabet(NICK_ALPHABET, RANDOM_NICK_MAX);

/**
 * Client configuration as passed to createRoomClient.
 */
export interface ClientConfig {
  /** Room to join */
  room: string;
  /** Nick to use; a random one is generated when omitted */
  nick?: string;
  /** Account name; requires password */
  account?: string;
  password?: string;
  /** Websocket URL; required unless gateway is given */
  url?: string;
  /** Token sent with login when connecting through `url` */
  token?: string;
  /** Resolves the endpoint per attempt; takes precedence over url */
  gateway?: Gateway;
  /** Reconnect after an abnormal disconnect. Default: true */
  reconnect?: boolean;
  /** Reconnect attempts before giving up. Default: 5 */
  maxReconnectAttempts?: number;
  /** Default: 10000 */
  connectTimeoutMs?: number;
  /** Default: 10000 */
  authTimeoutMs?: number;
  /** Default: 10000 */
  joinTimeoutMs?: number;
  /** Interval between keepalive pings; 0 disables. Default: 25000 */
  pingIntervalMs?: number;
  /** Default: 10000 */
  pongTimeoutMs?: number;
  backoff?: {
    /** Default: 1000 */
    baseDelayMs?: number;
    /** Default: 30000 */
    maxDelayMs?: number;
  };
  /** Sent with login. Default: DEFAULT_USER_AGENT */
  userAgent?: string;
  /** Origin header for the websocket handshake */
  origin?: string;
  /** Custom logger. Default: console logger */
  logger?: Logger;
  /** Socket implementation. Default: the `ws` package */
  socketFactory?: SocketFactory;
  /** Source of randomness for backoff jitter and nick generation. Default: Math.random */
  random?: () => number;
}

const optionsSchema = z
  .object({
    room: z.string().min(1, "room cannot be empty"),
    nick: z
      .string()
      .min(1)
      .max(MAX_NICK_LENGTH)
      .regex(/^\S+$/, "nick cannot contain whitespace")
      .optional(),
    account: z.string().min(1).optional(),
    password: z.string().min(1).optional(),
    url: z.string().url().optional(),
    token: z.string().optional(),
    reconnect: z.boolean().default(true),
    maxReconnectAttempts: z.number().int().nonnegative().default(5),
    connectTimeoutMs: z.number().int().positive().default(10_000),
    authTimeoutMs: z.number().int().positive().default(10_000),
    joinTimeoutMs: z.number().int().positive().default(10_000),
    pingIntervalMs: z.number().int().nonnegative().default(25_000),
    pongTimeoutMs: z.number().int().positive().default(10_000),
    backoff: z
      .object({
        baseDelayMs: z.number().int().positive().default(1000),
        maxDelayMs: z.number().int().positive().default(30_000),
      })
      .default({}),
    userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
    origin: z.string().optional(),
  })
  .refine((options) => (options.account === undefined) === (options.password === undefined), {
    message: "account and password must be given together",
    path: ["account"],
  })
  .refine((options) => options.backoff.maxDelayMs >= options.backoff.baseDelayMs, {
    message: "maxDelayMs must not be below baseDelayMs",
    path: ["backoff", "maxDelayMs"],
  });

type ResolvedOptions = z.infer<typeof optionsSchema>;

/**
 * Configuration with every default applied.
 */
export type ResolvedClientConfig = Omit<ResolvedOptions, "nick"> & {
  nick: string;
  gateway: Gateway;
  logger: Logger;
  socketFactory: SocketFactory;
  random: () => number;
};

/**
 * Generates a guest nick of 5 to 15 lowercase letters and digits.
 *
 * @param random - Picks the length
 */
export function createRandomNick(random: () => number = Math.random): string {
  const span = RANDOM_NICK_MAX - RANDOM_NICK_MIN + 1;
  const length = RANDOM_NICK_MIN + Math.min(span - 1, Math.floor(random() * span));
  return randomNick(length);
}

/**
 * Validates a client configuration and fills in defaults.
 *
 * @param config - Configuration passed by the caller
 * @returns The resolved configuration, or the validation issues as "path: message"
 */
export function resolveClientConfig(
  config: ClientConfig
): Result<ResolvedClientConfig, string> {
  const { gateway, logger, socketFactory, random, ...options } = config;

  const parsed = optionsSchema.safeParse(options);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join(", ");
    return Err(`Invalid client config: ${issues}`);
  }

  const data = parsed.data;
  let resolvedGateway: Gateway;
  if (gateway) {
    resolvedGateway = gateway;
  } else if (data.url) {
    resolvedGateway = createStaticGateway(data.url, data.token ?? null);
  } else {
    return Err("Invalid client config: either url or gateway is required");
  }

  const pickRandom = random ?? Math.random;
  return Ok({
    ...data,
    nick: data.nick ?? createRandomNick(pickRandom),
    gateway: resolvedGateway,
    logger: logger ?? createDefaultLogger(),
    socketFactory: socketFactory ?? createWsSocket,
    random: pickRandom,
  });
}
