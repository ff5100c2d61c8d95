import type { SocketFactory, SocketLike, SocketListeners } from "../src/transport.ts";

/**
 * In-process stand-in for a websocket. The test plays the server by
 * calling open(), receive() and drop().
 */
export class FakeSocket implements SocketLike {
  readonly sent: string[] = [];
  pings = 0;
  terminated = false;
  closedWith: { code: number; reason: string } | null = null;

  constructor(
    readonly url: string,
    private readonly listeners: SocketListeners
  ) {}

  send(data: string, callback: (error?: Error) => void): void {
    this.sent.push(data);
    callback();
  }

  ping(): void {
    this.pings += 1;
  }

  close(code = 1000, reason = ""): void {
    this.closedWith = { code, reason };
    this.listeners.onClose(code, reason);
  }

  terminate(): void {
    this.terminated = true;
    this.listeners.onClose(1006, "");
  }

  // Server side

  open(): void {
    this.listeners.onOpen();
  }

  receive(frame: Record<string, unknown> | string): void {
    this.listeners.onMessage(typeof frame === "string" ? frame : JSON.stringify(frame));
  }

  pong(): void {
    this.listeners.onPong();
  }

  fail(message: string): void {
    this.listeners.onError(new Error(message));
  }

  drop(code = 1006, reason = ""): void {
    this.listeners.onClose(code, reason);
  }

  /** Sent frames parsed back to objects */
  frames(): Array<Record<string, unknown>> {
    return this.sent.map((text) => JSON.parse(text));
  }

  /** Opcodes of the sent frames, in order */
  opcodes(): unknown[] {
    return this.frames().map((frame) => frame.tc);
  }
}

/**
 * Factory recording every socket it creates.
 * `onCreate` runs right after a socket is created, to script the server.
 */
export function createFakeSocketFactory(onCreate?: (socket: FakeSocket, index: number) => void): {
  factory: SocketFactory;
  sockets: FakeSocket[];
} {
  const sockets: FakeSocket[] = [];
  const factory: SocketFactory = (url, listeners) => {
    const socket = new FakeSocket(url, listeners);
    sockets.push(socket);
    onCreate?.(socket, sockets.length - 1);
    return socket;
  };
  return { factory, sockets };
}

/**
 * Scripts a well-behaved server: opens, accepts the login as `nick`
 * and answers the join with a snapshot holding only this client.
 * With `answerJoin: false` the join is left pending.
 */
export function acceptingServer(
  socket: FakeSocket,
  options: {
    nick?: string;
    handle?: number;
    mod?: boolean;
    users?: Array<Record<string, unknown>>;
    answerJoin?: boolean;
  } = {}
): void {
  const nick = options.nick ?? "guest42";
  const handle = options.handle ?? 1;
  const originalSend = socket.send.bind(socket);
  socket.send = (data, callback) => {
    originalSend(data, callback);
    const frame = JSON.parse(data);
    if (frame.tc === "login") {
      queueMicrotask(() => socket.receive({ tc: "login_ok", handle, nick, mod: options.mod ?? false }));
    }
    if (frame.tc === "join" && options.answerJoin !== false) {
      queueMicrotask(() =>
        socket.receive({
          tc: "joined",
          self: { handle, nick, mod: options.mod ?? false },
          room: { name: frame.room },
          users: options.users ?? [],
        })
      );
    }
  };
  queueMicrotask(() => socket.open());
}

/** Lets queued promise callbacks and microtasks run */
export async function flush(): Promise<void> {
  for (let i = 0; i < 10; i += 1) {
    await Promise.resolve();
  }
}
