import { Err, Ok, type Result } from "slang-ts";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { type AuthChannel, authenticate, type LoginRequest } from "../src/auth-flow.ts";
import { NotConnectedError } from "../src/errors.ts";
import { createSilentLogger } from "../src/logger.ts";
import type { Command, InboundMessage } from "../src/wire.ts";

/** Silent logger for tests - suppresses all output */
const testLogger = createSilentLogger();

const guest: LoginRequest = {
  nick: "guest42",
  account: null,
  password: null,
  token: null,
  userAgent: "roomwire-test",
};

/**
 * Creates an in-memory channel the test can push server replies into
 */
function createMockChannel() {
  const messageListeners = new Set<(message: InboundMessage) => void>();
  const closeListeners = new Set<() => void>();
  const sent: Command[] = [];

  const channel: AuthChannel = {
    send: vi.fn((command: Command): Result<void, Error> => {
      sent.push(command);
      return Ok(undefined);
    }),
    onMessage(listener) {
      messageListeners.add(listener);
      return () => messageListeners.delete(listener);
    },
    onClose(listener) {
      closeListeners.add(listener);
      return () => closeListeners.delete(listener);
    },
  };

  return {
    channel,
    sent,
    reply: (message: InboundMessage) => {
      for (const listener of [...messageListeners]) listener(message);
    },
    close: () => {
      for (const listener of [...closeListeners]) listener();
    },
    listenerCount: () => messageListeners.size + closeListeners.size,
  };
}

describe("authenticate", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should send the login frame", () => {
    const mock = createMockChannel();

    void authenticate(mock.channel, guest, 1000, testLogger);

    expect(mock.sent).toEqual([
      {
        kind: "login",
        userAgent: "roomwire-test",
        nick: "guest42",
        account: null,
        password: null,
        token: null,
      },
    ]);
  });

  it("should resolve with the identity on login_ok", async () => {
    const mock = createMockChannel();

    const pending = authenticate(mock.channel, guest, 1000, testLogger);
    mock.reply({ kind: "login_ok", handle: 7, nick: "guest42", account: null, role: "guest", lurker: false });
    const result = await pending;

    expect(result.isOk).toBe(true);
    if (result.isOk) {
      expect(result.value).toEqual({
        kind: "guest",
        handle: 7,
        nick: "guest42",
        account: null,
        role: "guest",
      });
    }
    expect(mock.listenerCount()).toBe(0);
  });

  it("should report account logins as such", async () => {
    const mock = createMockChannel();

    const pending = authenticate(
      mock.channel,
      { ...guest, nick: "alice", account: "alice", password: "test-secret" },
      1000,
      testLogger
    );
    mock.reply({ kind: "login_ok", handle: 3, nick: "alice", account: "alice", role: "member", lurker: false });
    const result = await pending;

    expect(result.isOk && result.value.kind).toBe("account");
  });

  it("should ignore unrelated messages while waiting", async () => {
    const mock = createMockChannel();

    const pending = authenticate(mock.channel, guest, 1000, testLogger);
    mock.reply({ kind: "sysmsg", text: "welcome" });
    mock.reply({ kind: "login_ok", handle: 7, nick: "guest42", account: null, role: "guest", lurker: false });

    expect((await pending).isOk).toBe(true);
  });

  it.each([
    ["invalid_credentials", "invalid_credentials"],
    ["nick_taken", "nick_taken"],
    ["something_else", "protocol_error"],
  ])("should map login_fail reason %s to %s", async (wireReason, expected) => {
    const mock = createMockChannel();

    const pending = authenticate(mock.channel, guest, 1000, testLogger);
    mock.reply({ kind: "login_fail", reason: wireReason, text: null });
    const result = await pending;

    expect(result.isErr).toBe(true);
    if (result.isErr) {
      expect(result.error.reason).toBe(expected);
    }
  });

  it("should carry the retry hint when rate limited", async () => {
    const mock = createMockChannel();

    const pending = authenticate(mock.channel, guest, 1000, testLogger);
    mock.reply({ kind: "rate_limited", retryAfterMs: 5000 });
    const result = await pending;

    expect(result.isErr).toBe(true);
    if (result.isErr) {
      expect(result.error.reason).toBe("rate_limited");
      expect(result.error.retryAfterMs).toBe(5000);
    }
  });

  it("should time out without a reply", async () => {
    const mock = createMockChannel();

    const pending = authenticate(mock.channel, guest, 1000, testLogger);
    await vi.advanceTimersByTimeAsync(1000);
    const result = await pending;

    expect(result.isErr).toBe(true);
    if (result.isErr) {
      expect(result.error.reason).toBe("timeout");
      expect(result.error.message).toBe("No login reply within 1000ms");
    }
  });

  it("should fail with protocol_error when the connection closes", async () => {
    const mock = createMockChannel();

    const pending = authenticate(mock.channel, guest, 1000, testLogger);
    mock.close();
    const result = await pending;

    expect(result.isErr && result.error.reason).toBe("protocol_error");
    expect(vi.getTimerCount()).toBe(0);
  });

  it("should fail with protocol_error when the server sends closed", async () => {
    const mock = createMockChannel();

    const pending = authenticate(mock.channel, guest, 1000, testLogger);
    mock.reply({ kind: "closed", code: 4 });
    const result = await pending;

    expect(result.isErr && result.error.reason).toBe("protocol_error");
  });

  it("should fail immediately when the login cannot be sent", async () => {
    const mock = createMockChannel();
    mock.channel.send = (): Result<void, Error> => Err(new NotConnectedError("send 'login'"));

    const result = await authenticate(mock.channel, guest, 1000, testLogger);

    expect(result.isErr).toBe(true);
    if (result.isErr) {
      expect(result.error.reason).toBe("protocol_error");
      expect(result.error.message).toBe("Could not send login: Cannot send 'login': not connected");
    }
  });
});
