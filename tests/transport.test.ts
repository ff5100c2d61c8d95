import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ConnectError, NotConnectedError } from "../src/errors.ts";
import { createSilentLogger } from "../src/logger.ts";
import { createTransport, type TransportOptions } from "../src/transport.ts";
import { createFakeSocketFactory, type FakeSocket } from "./fake-socket.ts";

/** Silent logger for tests - suppresses all output */
const testLogger = createSilentLogger();

function setup(overrides: Partial<TransportOptions> = {}) {
  const { factory, sockets } = createFakeSocketFactory();
  const onFrame = vi.fn();
  const onClose = vi.fn();
  const transport = createTransport({
    url: "wss://chat.test/ws",
    logger: testLogger,
    socketFactory: factory,
    connectTimeoutMs: 1000,
    pingIntervalMs: 0,
    pongTimeoutMs: 1000,
    onFrame,
    onClose,
    ...overrides,
  });
  const socket = (): FakeSocket => {
    const current = sockets[0];
    if (!current) throw new Error("No socket was created");
    return current;
  };
  return { transport, sockets, socket, onFrame, onClose };
}

describe("createTransport", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe("connect", () => {
    it("should resolve when the socket opens", async () => {
      const { transport, socket } = setup();

      const connecting = transport.connect();
      expect(transport.state).toBe("connecting");
      socket().open();

      await expect(connecting).resolves.toBeUndefined();
      expect(transport.state).toBe("open");
    });

    it("should pass the chat subprotocol to the socket factory", () => {
      const factory = vi.fn(createFakeSocketFactory().factory);
      const { transport } = setup({ socketFactory: factory });

      void transport.connect().catch(() => undefined);

      expect(factory.mock.calls[0]?.[2]).toEqual({
        protocols: ["tc"],
        headers: {},
        origin: undefined,
        handshakeTimeoutMs: 1000,
      });
    });

    it("should reject with ConnectError on a socket error", async () => {
      const { transport, socket, onClose } = setup();

      const connecting = transport.connect();
      socket().fail("ECONNREFUSED");

      await expect(connecting).rejects.toBeInstanceOf(ConnectError);
      expect(transport.state).toBe("failed");
      expect(onClose).toHaveBeenCalledTimes(1);
    });

    it("should time out when the socket never opens", async () => {
      const { transport, socket } = setup();

      const connecting = transport.connect();
      const assertion = expect(connecting).rejects.toThrow("Connection timed out after 1000ms");
      await vi.advanceTimersByTimeAsync(1000);

      await assertion;
      expect(socket().terminated).toBe(true);
    });

    it("should reject a second connect", async () => {
      const { transport, socket } = setup();

      const first = transport.connect();
      socket().open();
      await first;

      await expect(transport.connect()).rejects.toThrow("Cannot connect from state 'open'");
    });
  });

  describe("send", () => {
    it("should write frames in call order", async () => {
      const { transport, socket } = setup();
      const connecting = transport.connect();
      socket().open();
      await connecting;

      await Promise.all([transport.send("a"), transport.send("b"), transport.send("c")]);

      expect(socket().sent).toEqual(["a", "b", "c"]);
    });

    it("should reject when not open", async () => {
      const { transport } = setup();

      await expect(transport.send("a")).rejects.toBeInstanceOf(NotConnectedError);
    });
  });

  describe("receive", () => {
    it("should hand text frames to onFrame", async () => {
      const { transport, socket, onFrame } = setup();
      const connecting = transport.connect();
      socket().open();
      await connecting;

      socket().receive('{"tc":"ping"}');

      expect(onFrame).toHaveBeenCalledWith('{"tc":"ping"}');
    });
  });

  describe("close", () => {
    it("should end in closed after a requested close", async () => {
      const { transport, socket, onClose } = setup();
      const connecting = transport.connect();
      socket().open();
      await connecting;

      await transport.close();

      expect(transport.state).toBe("closed");
      expect(socket().closedWith).toEqual({ code: 1000, reason: "Client closing" });
      expect(onClose).toHaveBeenCalledWith({
        state: "closed",
        code: 1000,
        reason: "Client closing",
        error: null,
      });
    });

    it("should treat a normal server close as closed", async () => {
      const { transport, socket, onClose } = setup();
      const connecting = transport.connect();
      socket().open();
      await connecting;

      socket().drop(1000, "bye");

      expect(transport.state).toBe("closed");
      expect(onClose).toHaveBeenCalledWith({ state: "closed", code: 1000, reason: "bye", error: null });
    });

    it("should treat an abnormal close as failed", async () => {
      const { transport, socket, onClose } = setup();
      const connecting = transport.connect();
      socket().open();
      await connecting;

      socket().drop(1006);

      expect(transport.state).toBe("failed");
      expect(onClose).toHaveBeenCalledWith(
        expect.objectContaining({ state: "failed", code: 1006, error: expect.any(ConnectError) })
      );
    });

    it("should abort a pending connect", async () => {
      const { transport, socket } = setup();

      const connecting = transport.connect();
      const assertion = expect(connecting).rejects.toBeInstanceOf(ConnectError);
      await transport.close();

      await assertion;
      expect(transport.state).toBe("closed");
      expect(socket().terminated).toBe(true);
    });
  });

  describe("keepalive", () => {
    it("should ping on every interval", async () => {
      const { transport, socket } = setup({ pingIntervalMs: 100, pongTimeoutMs: 50 });
      const connecting = transport.connect();
      socket().open();
      await connecting;

      await vi.advanceTimersByTimeAsync(100);
      socket().pong();
      await vi.advanceTimersByTimeAsync(100);

      expect(socket().pings).toBe(2);
      expect(transport.state).toBe("open");
    });

    it("should fail the connection when pongs stop", async () => {
      const { transport, socket, onClose } = setup({ pingIntervalMs: 100, pongTimeoutMs: 50 });
      const connecting = transport.connect();
      socket().open();
      await connecting;

      await vi.advanceTimersByTimeAsync(200);

      expect(transport.state).toBe("failed");
      expect(socket().terminated).toBe(true);
      expect(onClose).toHaveBeenCalledWith(
        expect.objectContaining({ state: "failed", reason: "Peer stopped answering pings" })
      );
    });
  });
});
