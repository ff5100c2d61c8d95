/**
 * Roomwire - A typed client for websocket chat rooms
 *
 * @example
 * import { createRoomClient } from 'roomwire'
 *
 * const client = createRoomClient({
 *   room: 'lobby',
 *   nick: 'guest42',
 *   url: 'wss://chat.example.com/ws'
 * })
 *
 * client.on('chat', (event) => console.log(event.text))
 * await client.start()
 * client.sendChat('hello')
 */

// biome-ignore lint/performance/noBarrelFile: Intentional public API barrel export
export { type AuthChannel, authenticate, type LoginRequest } from "./auth-flow.ts";
export {
  type BackoffOptions,
  type CancellableDelay,
  computeBackoffDelay,
  createDelay,
} from "./backoff.ts";
export { decodeCommand, decodeFrame, encodeCommand } from "./codec.ts";
export {
  type ClientConfig,
  createRandomNick,
  DEFAULT_USER_AGENT,
  type ResolvedClientConfig,
  resolveClientConfig,
} from "./config.ts";
export {
  createRoomClient,
  type MediaRequest,
  type PlaylistMode,
  type RoomClientInstance,
} from "./create-room-client.ts";
export {
  createEventDispatcher,
  type EventDispatcher,
  type EventDispatcherOptions,
  type HandlerErrorSink,
} from "./dispatcher.ts";
export {
  AuthError,
  type AuthFailureReason,
  ConfigurationError,
  ConnectError,
  DecodeError,
  EncodingError,
  type ErrorCode,
  NotConnectedError,
  PermissionError,
  RoomwireError,
  SessionError,
} from "./errors.ts";
export { closeReason, toSessionEvents } from "./events.ts";
export {
  createHttpGateway,
  createStaticGateway,
  type Gateway,
  type GatewayEndpoint,
  type HttpGatewayOptions,
} from "./gateway.ts";
export { createKeepalive, type Keepalive, type KeepaliveOptions } from "./keepalive.ts";
export { createDefaultLogger, createSilentLogger, withLogContext } from "./logger.ts";
export {
  applyMessage,
  createRoomState,
  findUserByNick,
  snapshotRoom,
} from "./room-state.ts";
export {
  createSessionManager,
  type SessionManager,
  type SessionManagerOptions,
} from "./session-manager.ts";
export {
  createTransport,
  createWsSocket,
  type SocketFactory,
  type SocketInit,
  type SocketLike,
  type SocketListeners,
  type Transport,
  type TransportCloseInfo,
  type TransportOptions,
  type TransportState,
} from "./transport.ts";
export type {
  ActionError,
  ActionResult,
  AnyEventHandler,
  AuthIdentity,
  BannedUser,
  CloseReason,
  DisconnectOutcome,
  LogEntry,
  Logger,
  MediaItem,
  PlaylistItem,
  RoomFlags,
  RoomSettings,
  RoomSnapshot,
  RoomState,
  SessionEvent,
  SessionEventHandler,
  SessionEventKind,
  SessionEventMap,
  SessionState,
  UserRecord,
  UserRole,
} from "./types.ts";
export {
  type Command,
  type CommandKind,
  type InboundKind,
  type InboundMessage,
  MAX_FRAME_BYTES,
  MAX_NICK_LENGTH,
  MAX_TEXT_LENGTH,
  type WireUser,
} from "./wire.ts";
