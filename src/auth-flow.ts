import { Err, Ok, type Result } from "slang-ts";
import { AuthError, type AuthFailureReason } from "./errors.ts";
import type { AuthIdentity, Logger } from "./types.ts";
import type { Command, InboundMessage } from "./wire.ts";

/**
 * Credentials and client details sent in the login frame.
 */
export interface LoginRequest {
  nick: string;
  account: string | null;
  password: string | null;
  /** Room token issued by the gateway, when one was used */
  token: string | null;
  userAgent: string;
}

/**
 * The slice of an open connection the login exchange needs.
 */
export interface AuthChannel {
  send(command: Command): Result<void, Error>;
  /** Subscribes to decoded inbound messages; returns an unsubscribe function */
  onMessage(listener: (message: InboundMessage) => void): () => void;
  /** Subscribes to the connection closing; returns an unsubscribe function */
  onClose(listener: () => void): () => void;
}

const FAIL_REASONS: Readonly<Record<string, AuthFailureReason>> = {
  invalid_credentials: "invalid_credentials",
  bad_password: "invalid_credentials",
  nick_taken: "nick_taken",
  nick_in_use: "nick_taken",
};

function toIdentity(message: Extract<InboundMessage, { kind: "login_ok" }>): AuthIdentity {
  return {
    kind: message.account ? "account" : "guest",
    handle: message.handle,
    nick: message.nick,
    account: message.account,
    role: message.role,
  };
}

/**
 * Maps a login reply to its outcome; null for messages that are not replies.
 */
function interpretReply(message: InboundMessage): Result<AuthIdentity, AuthError> | null {
  switch (message.kind) {
    case "login_ok":
      return Ok(toIdentity(message));
    case "login_fail": {
      const reason = FAIL_REASONS[message.reason] ?? "protocol_error";
      return Err(
        new AuthError(reason, `Login refused: ${message.text ?? message.reason}`)
      );
    }
    case "rate_limited":
      return Err(
        new AuthError("rate_limited", "Login rate limited by server", {
          retryAfterMs: message.retryAfterMs,
        })
      );
    case "closed":
      return Err(
        new AuthError("protocol_error", `Server closed the session during login (code ${message.code})`)
      );
    default:
      return null;
  }
}

/**
 * Runs the login exchange on an open connection.
 * Sends the login frame and waits for the server's verdict.
 *
 * @param channel - Connection to authenticate on
 * @param request - Credentials to present; guests pass null account and password
 * @param timeoutMs - How long to wait for a reply
 * @param logger - Logger for the exchange
 * @returns The identity the server assigned, or an AuthError
 *
 * @example
 * ```ts
 * const result = await authenticate(channel, request, 10_000, logger);
 * if (result.isErr) console.log(result.error.reason);
 * ```
 */
export function authenticate(
  channel: AuthChannel,
  request: LoginRequest,
  timeoutMs: number,
  logger: Logger
): Promise<Result<AuthIdentity, AuthError>> {
  return new Promise((resolve) => {
    let settled = false;

    const finish = (result: Result<AuthIdentity, AuthError>): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      stopMessages();
      stopClose();
      if (result.isOk) {
        logger.info({
          message: `Logged in as '${result.value.nick}'`,
          atFunction: "authenticate",
          data: { handle: result.value.handle, kind: result.value.kind },
        });
      } else {
        logger.warn({
          message: result.error.message,
          atFunction: "authenticate",
          data: { reason: result.error.reason },
        });
      }
      resolve(result);
    };

    const timer = setTimeout(() => {
      finish(Err(new AuthError("timeout", `No login reply within ${timeoutMs}ms`)));
    }, timeoutMs);

    const stopMessages = channel.onMessage((message) => {
      const outcome = interpretReply(message);
      if (outcome) finish(outcome);
    });

    const stopClose = channel.onClose(() => {
      finish(Err(new AuthError("protocol_error", "Connection closed during login")));
    });

    const sent = channel.send({
      kind: "login",
      userAgent: request.userAgent,
      nick: request.nick,
      account: request.account,
      password: request.password,
      token: request.token,
    });
    if (sent.isErr) {
      finish(
        Err(
          new AuthError("protocol_error", `Could not send login: ${sent.error.message}`, {
            cause: sent.error,
          })
        )
      );
    }
  });
}
