import { describe, expect, it } from "vitest";
import { closeReason, toSessionEvents } from "../src/events.ts";
import { applyMessage, createRoomState } from "../src/room-state.ts";
import type { RoomState } from "../src/types.ts";
import type { InboundMessage } from "../src/wire.ts";

const NOW = 1_700_000_000_000;

function room(): RoomState {
  return applyMessage(
    createRoomState("testroom"),
    {
      kind: "joined",
      self: { handle: 1, nick: "guest42", account: null, role: "guest", lurker: false },
      room: { name: "testroom" },
      users: [{ handle: 2, nick: "alice", account: null, role: "guest", lurker: false }],
    },
    NOW
  );
}

function translate(previous: RoomState, message: InboundMessage) {
  const next = applyMessage(previous, message, NOW);
  return { next, events: toSessionEvents(message, previous, next, NOW) };
}

describe("toSessionEvents", () => {
  it("should announce the snapshot as ready", () => {
    const previous = createRoomState("testroom");
    const { events } = translate(previous, {
      kind: "joined",
      self: { handle: 1, nick: "guest42", account: null, role: "guest", lurker: false },
      room: { name: "testroom" },
      users: [],
    });

    expect(events).toHaveLength(1);
    const [ready] = events;
    expect(ready?.kind).toBe("ready");
    if (ready?.kind === "ready") {
      expect(ready.self.nick).toBe("guest42");
      expect(ready.room.users.map((user) => user.nick)).toEqual(["guest42"]);
    }
  });

  it("should resolve a leaving user from the state before the message", () => {
    const { events } = translate(room(), { kind: "quit", handle: 2 });

    expect(events).toEqual([
      expect.objectContaining({ kind: "left", user: expect.objectContaining({ nick: "alice" }) }),
    ]);
  });

  it("should emit nothing when an unknown user leaves", () => {
    expect(translate(room(), { kind: "quit", handle: 99 }).events).toEqual([]);
  });

  it("should report the previous nick on a rename", () => {
    const { events } = translate(room(), { kind: "nick", handle: 2, nick: "alicia" });

    expect(events).toEqual([
      {
        kind: "nickChanged",
        timestamp: NOW,
        previousNick: "alice",
        user: expect.objectContaining({ handle: 2, nick: "alicia" }),
      },
    ]);
  });

  it("should deliver chat from users outside the roster with a null user", () => {
    const { events } = translate(room(), { kind: "msg", handle: 50, text: "hi" });

    expect(events).toEqual([{ kind: "chat", timestamp: NOW, handle: 50, user: null, text: "hi" }]);
  });

  it("should add a room update when a system message flips green room", () => {
    const { events } = translate(room(), { kind: "sysmsg", text: "mod enabled green room" });

    expect(events.map((event) => event.kind)).toEqual(["systemMessage", "roomUpdated"]);
  });

  it("should emit a single system message when nothing changes", () => {
    const { events } = translate(room(), { kind: "sysmsg", text: "welcome" });

    expect(events.map((event) => event.kind)).toEqual(["systemMessage"]);
  });

  it("should map server close codes to reasons", () => {
    const { events } = translate(room(), { kind: "closed", code: 6 });

    expect(events).toEqual([
      { kind: "serverClosed", timestamp: NOW, code: 6, reason: "double_sign_in" },
    ]);
  });

  it("should skip failed moderation replies", () => {
    const { events } = translate(room(), {
      kind: "stream_moder_allow",
      success: false,
      handle: 2,
    });

    expect(events).toEqual([]);
  });

  it("should pass unknown opcodes through", () => {
    const { events } = translate(room(), { kind: "unknown", opcode: "gift", payload: { n: 1 } });

    expect(events).toEqual([
      { kind: "unknown", timestamp: NOW, opcode: "gift", payload: { n: 1 } },
    ]);
  });

  it("should produce no events for login replies", () => {
    const { events } = translate(room(), {
      kind: "login_ok",
      handle: 1,
      nick: "guest42",
      account: null,
      role: "guest",
      lurker: false,
    });

    expect(events).toEqual([]);
  });
});

describe("closeReason", () => {
  it("should name known codes and fall back to unknown", () => {
    expect(closeReason(4)).toBe("banned");
    expect(closeReason(12)).toBe("kicked");
    expect(closeReason(99)).toBe("unknown");
  });
});
