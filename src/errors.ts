import type { UserRole } from "./types.ts";

/**
 * Machine-readable error codes carried by every Roomwire error.
 */
export type ErrorCode =
  | "CONNECT_FAILED"
  | "NOT_CONNECTED"
  | "AUTH_FAILED"
  | "DECODE_FAILED"
  | "ENCODING_FAILED"
  | "PERMISSION_DENIED"
  | "SESSION_FAILED"
  | "INVALID_CONFIG";

/**
 * Base class of all errors raised or returned by Roomwire.
 * Narrow with `instanceof` or switch on `code`.
 */
export class RoomwireError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * The websocket could not be opened, or dropped abnormally.
 */
export class ConnectError extends RoomwireError {
  readonly url: string;

  constructor(url: string, message: string, options?: ErrorOptions) {
    super("CONNECT_FAILED", message, options);
    this.url = url;
  }
}

/**
 * A command was issued while no session was open.
 */
export class NotConnectedError extends RoomwireError {
  readonly action: string;

  constructor(action: string) {
    super("NOT_CONNECTED", `Cannot ${action}: not connected`);
    this.action = action;
  }
}

export type AuthFailureReason =
  | "invalid_credentials"
  | "nick_taken"
  | "rate_limited"
  | "timeout"
  | "protocol_error";

/**
 * Login was refused or never answered.
 */
export class AuthError extends RoomwireError {
  readonly reason: AuthFailureReason;
  /** Server-suggested wait before retrying, for rate_limited */
  readonly retryAfterMs: number | null;

  constructor(
    reason: AuthFailureReason,
    message: string,
    options?: ErrorOptions & { retryAfterMs?: number | null }
  ) {
    super("AUTH_FAILED", message, options);
    this.reason = reason;
    this.retryAfterMs = options?.retryAfterMs ?? null;
  }
}

/**
 * An inbound frame was not valid JSON or did not match its opcode's shape.
 */
export class DecodeError extends RoomwireError {
  /** Opcode of the frame when it could be read */
  readonly opcode: string | null;

  constructor(message: string, opcode: string | null = null) {
    super("DECODE_FAILED", message);
    this.opcode = opcode;
  }
}

/**
 * An outbound command failed validation and was not sent.
 */
export class EncodingError extends RoomwireError {
  readonly command: string;

  constructor(command: string, message: string) {
    super("ENCODING_FAILED", `Command '${command}' is invalid: ${message}`);
    this.command = command;
  }
}

/**
 * The client's role in the room does not allow the requested action.
 */
export class PermissionError extends RoomwireError {
  readonly action: string;
  readonly role: UserRole | null;

  constructor(action: string, role: UserRole | null) {
    super(
      "PERMISSION_DENIED",
      `Action '${action}' requires moderator rights (current role: ${role ?? "none"})`
    );
    this.action = action;
    this.role = role;
  }
}

/**
 * The session ended for good: reconnects were disabled or exhausted.
 */
export class SessionError extends RoomwireError {
  constructor(message: string, options?: ErrorOptions) {
    super("SESSION_FAILED", message, options);
  }
}

/**
 * Client configuration failed validation.
 */
export class ConfigurationError extends RoomwireError {
  constructor(message: string) {
    super("INVALID_CONFIG", message);
  }
}
