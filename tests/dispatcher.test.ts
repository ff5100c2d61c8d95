import { describe, expect, it, vi } from "vitest";
import { createEventDispatcher } from "../src/dispatcher.ts";
import { createSilentLogger } from "../src/logger.ts";
import type { SessionEvent } from "../src/types.ts";

/** Silent logger for tests - suppresses all output */
const testLogger = createSilentLogger();

function systemMessage(text: string): SessionEvent {
  return { kind: "systemMessage", timestamp: 0, text };
}

describe("createEventDispatcher", () => {
  it("should call handlers in registration order, then wildcard handlers", () => {
    const dispatcher = createEventDispatcher({ logger: testLogger });
    const calls: string[] = [];

    dispatcher.onAny(() => {
      calls.push("any");
    });
    dispatcher.on("systemMessage", () => {
      calls.push("first");
    });
    dispatcher.on("systemMessage", () => {
      calls.push("second");
    });

    dispatcher.dispatch(systemMessage("hi"));

    expect(calls).toEqual(["first", "second", "any"]);
  });

  it("should only deliver events of the registered kind", () => {
    const dispatcher = createEventDispatcher({ logger: testLogger });
    const handler = vi.fn();

    dispatcher.on("chat", handler);
    dispatcher.dispatch(systemMessage("hi"));

    expect(handler).not.toHaveBeenCalled();
  });

  it("should keep per-handler order while a slow handler is busy", async () => {
    const dispatcher = createEventDispatcher({ logger: testLogger });
    const slowSeen: string[] = [];
    const fastSeen: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    dispatcher.on("systemMessage", async (event) => {
      slowSeen.push(event.text);
      if (event.text === "1") await gate;
    });
    dispatcher.on("systemMessage", (event) => {
      fastSeen.push(event.text);
    });

    dispatcher.dispatch(systemMessage("1"));
    dispatcher.dispatch(systemMessage("2"));
    dispatcher.dispatch(systemMessage("3"));

    expect(fastSeen).toEqual(["1", "2", "3"]);
    expect(slowSeen).toEqual(["1"]);

    release();
    await vi.waitFor(() => expect(slowSeen).toEqual(["1", "2", "3"]));
  });

  it("should isolate a throwing handler and report it", () => {
    const onHandlerError = vi.fn();
    const dispatcher = createEventDispatcher({ logger: testLogger, onHandlerError });
    const survivor = vi.fn();
    const failure = new Error("boom");

    dispatcher.on("systemMessage", () => {
      throw failure;
    });
    dispatcher.on("systemMessage", survivor);

    dispatcher.dispatch(systemMessage("hi"));

    expect(survivor).toHaveBeenCalledTimes(1);
    expect(onHandlerError).toHaveBeenCalledWith(failure, "systemMessage");
  });

  it("should report rejected promises", async () => {
    const onHandlerError = vi.fn();
    const dispatcher = createEventDispatcher({ logger: testLogger, onHandlerError });

    dispatcher.on("systemMessage", async () => {
      throw new Error("async boom");
    });
    dispatcher.dispatch(systemMessage("hi"));

    await vi.waitFor(() => expect(onHandlerError).toHaveBeenCalledTimes(1));
  });

  it("should deliver an event raised during delivery after the current one", () => {
    const dispatcher = createEventDispatcher({
      logger: testLogger,
      onHandlerError: (error, source) => {
        dispatcher.dispatch({ kind: "error", timestamp: 0, error, source });
      },
    });
    const first: string[] = [];
    const second: string[] = [];

    dispatcher.onAny((event) => {
      first.push(event.kind);
      if (event.kind === "chat") throw new Error("boom");
    });
    dispatcher.onAny((event) => {
      second.push(event.kind);
    });

    dispatcher.dispatch({ kind: "chat", timestamp: 0, handle: 1, user: null, text: "hi" });

    expect(first).toEqual(["chat", "error"]);
    expect(second).toEqual(["chat", "error"]);
  });

  it("should queue an event raised by a handler behind its own backlog", () => {
    const dispatcher = createEventDispatcher({ logger: testLogger });
    const seen: string[] = [];

    dispatcher.on("systemMessage", (event) => {
      seen.push(event.text);
      if (event.text === "outer") dispatcher.dispatch(systemMessage("inner"));
    });
    dispatcher.on("systemMessage", (event) => {
      seen.push(`second:${event.text}`);
    });

    dispatcher.dispatch(systemMessage("outer"));

    expect(seen).toEqual(["outer", "second:outer", "inner", "second:inner"]);
  });

  it("should stop delivering after unsubscribe", () => {
    const dispatcher = createEventDispatcher({ logger: testLogger });
    const handler = vi.fn();

    const unsubscribe = dispatcher.on("systemMessage", handler);
    unsubscribe();
    dispatcher.dispatch(systemMessage("hi"));

    expect(handler).not.toHaveBeenCalled();
    expect(dispatcher.listenerCount("systemMessage")).toBe(0);
  });

  it("should remove a handler with off", () => {
    const dispatcher = createEventDispatcher({ logger: testLogger });
    const handler = vi.fn();

    dispatcher.on("systemMessage", handler);
    dispatcher.off("systemMessage", handler);
    dispatcher.dispatch(systemMessage("hi"));

    expect(handler).not.toHaveBeenCalled();
  });

  it("should not deliver the current event to handlers added during dispatch", () => {
    const dispatcher = createEventDispatcher({ logger: testLogger });
    const late = vi.fn();

    dispatcher.on("systemMessage", () => {
      dispatcher.on("systemMessage", late);
    });
    dispatcher.dispatch(systemMessage("first"));
    expect(late).not.toHaveBeenCalled();

    dispatcher.dispatch(systemMessage("second"));
    expect(late).toHaveBeenCalledTimes(1);
  });

  it("should drop queued events of a handler removed while busy", async () => {
    const dispatcher = createEventDispatcher({ logger: testLogger });
    const seen: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const unsubscribe = dispatcher.on("systemMessage", async (event) => {
      seen.push(event.text);
      await gate;
    });

    dispatcher.dispatch(systemMessage("1"));
    dispatcher.dispatch(systemMessage("2"));
    unsubscribe();
    release();
    await gate;
    await Promise.resolve();

    expect(seen).toEqual(["1"]);
  });

  it("should remove all handlers on clear", () => {
    const dispatcher = createEventDispatcher({ logger: testLogger });
    const handler = vi.fn();
    const wildcard = vi.fn();

    dispatcher.on("systemMessage", handler);
    dispatcher.onAny(wildcard);
    dispatcher.clear();
    dispatcher.dispatch(systemMessage("hi"));

    expect(handler).not.toHaveBeenCalled();
    expect(wildcard).not.toHaveBeenCalled();
  });
});
