import type {
  AnyEventHandler,
  Logger,
  SessionEvent,
  SessionEventHandler,
  SessionEventKind,
} from "./types.ts";

/**
 * One handler and the events queued for it while it is busy.
 */
interface Lane<E> {
  readonly handler: (event: E) => void | Promise<void>;
  /** Kind reported when the handler fails on an event */
  readonly sourceOf: (event: E) => SessionEventKind;
  readonly backlog: E[];
  busy: boolean;
  removed: boolean;
}

type LaneRegistry = {
  [K in SessionEventKind]?: Lane<SessionEvent<K>>[];
};

/**
 * Called when a handler throws or its promise rejects.
 */
export type HandlerErrorSink = (error: unknown, source: SessionEventKind) => void;

export interface EventDispatcherOptions {
  logger: Logger;
  /** Receives handler failures after they are logged */
  onHandlerError?: HandlerErrorSink;
}

export interface EventDispatcher {
  /** Registers a handler for one event kind; returns an unsubscribe function */
  on<K extends SessionEventKind>(kind: K, handler: SessionEventHandler<K>): () => void;
  /** Removes a handler registered with on(); its queued events are dropped */
  off<K extends SessionEventKind>(kind: K, handler: SessionEventHandler<K>): void;
  /** Registers a handler for every event; returns an unsubscribe function */
  onAny(handler: AnyEventHandler): () => void;
  /** Delivers an event to the handlers registered at this moment */
  dispatch(event: SessionEvent): void;
  /** Number of handlers registered for a kind, wildcard handlers excluded */
  listenerCount(kind: SessionEventKind): number;
  /** Removes every handler */
  clear(): void;
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Creates the event dispatcher.
 *
 * Handlers for a kind run in registration order, followed by wildcard
 * handlers. A handler that returns a promise is not awaited, but later
 * events for that same handler are queued until the promise settles, so
 * each handler observes events in arrival order while the receive loop
 * never waits. A failing handler is reported and does not affect others.
 *
 * The set of handlers is captured when an event is dispatched: handlers
 * added during delivery see only later events, and removed handlers
 * receive nothing further. Events dispatched while another event is being
 * delivered, such as the `error` event raised for a failing handler, are
 * queued behind it.
 *
 * @param options - Logger and error sink
 * @returns EventDispatcher instance
 */
export function createEventDispatcher(
  options: EventDispatcherOptions
): EventDispatcher {
  const { logger, onHandlerError } = options;
  const registry: LaneRegistry = {};
  let wildcards: Lane<SessionEvent>[] = [];
  const subscriptions = new Set<() => void>();
  const pending: Array<() => void> = [];
  let draining = false;

  function report(error: unknown, source: SessionEventKind): void {
    logger.error({
      message: `Handler for '${source}' failed`,
      atFunction: "dispatcher.dispatch",
      data: { error: describe(error) },
    });
    if (!onHandlerError) return;
    try {
      onHandlerError(error, source);
    } catch (sinkError) {
      logger.error({
        message: "Handler error sink failed",
        atFunction: "dispatcher.report",
        data: { error: describe(sinkError) },
      });
    }
  }

  function run<E>(lane: Lane<E>, first: E): void {
    // Busy for the whole synchronous loop too, so an event raised by one of
    // this lane's handlers lands in its backlog.
    lane.busy = true;
    let event: E | undefined = first;
    while (event !== undefined && !lane.removed) {
      const source = lane.sourceOf(event);
      let result: void | Promise<void>;
      try {
        result = lane.handler(event);
      } catch (error) {
        report(error, source);
        event = lane.backlog.shift();
        continue;
      }

      if (isPromiseLike(result)) {
        Promise.resolve(result)
          .then(
            () => undefined,
            (error: unknown) => report(error, source)
          )
          .then(() => {
            lane.busy = false;
            const queued = lane.backlog.shift();
            if (queued !== undefined) run(lane, queued);
          })
          .catch((error: unknown) => {
            logger.error({
              message: "Failed to drain handler backlog",
              atFunction: "dispatcher.run",
              data: { error: describe(error) },
            });
          });
        return;
      }
      event = lane.backlog.shift();
    }
    lane.busy = false;
  }

  function push<E>(lane: Lane<E>, event: E): void {
    if (lane.removed) return;
    if (lane.busy) {
      lane.backlog.push(event);
      return;
    }
    run(lane, event);
  }

  function delivery<K extends SessionEventKind>(
    kind: K,
    event: SessionEvent<K>
  ): () => void {
    const lanes = registry[kind] ?? [];
    const anyLanes = wildcards;
    return () => {
      for (const lane of lanes) push(lane, event);
      for (const lane of anyLanes) push(lane, event);
    };
  }

  function drain(): void {
    draining = true;
    try {
      for (let next = pending.shift(); next !== undefined; next = pending.shift()) {
        next();
      }
    } finally {
      draining = false;
    }
  }

  function retire<E>(lane: Lane<E>): void {
    lane.removed = true;
    lane.backlog.length = 0;
  }

  function detach<K extends SessionEventKind>(
    kind: K,
    matches: (lane: Lane<SessionEvent<K>>) => boolean
  ): void {
    const lanes = registry[kind];
    if (!lanes) return;
    const remaining = lanes.filter((lane) => {
      if (!matches(lane)) return true;
      retire(lane);
      return false;
    });
    if (remaining.length === lanes.length) return;
    if (remaining.length === 0) {
      delete registry[kind];
    } else {
      registry[kind] = remaining;
    }
  }

  return {
    on<K extends SessionEventKind>(kind: K, handler: SessionEventHandler<K>): () => void {
      const lane: Lane<SessionEvent<K>> = {
        handler,
        sourceOf: () => kind,
        backlog: [],
        busy: false,
        removed: false,
      };
      registry[kind] = [...(registry[kind] ?? []), lane];
      const unsubscribe = (): void => {
        subscriptions.delete(unsubscribe);
        detach(kind, (entry) => entry === lane);
      };
      subscriptions.add(unsubscribe);
      return unsubscribe;
    },

    off<K extends SessionEventKind>(kind: K, handler: SessionEventHandler<K>): void {
      detach(kind, (lane) => lane.handler === handler);
    },

    onAny(handler: AnyEventHandler): () => void {
      const lane: Lane<SessionEvent> = {
        handler,
        sourceOf: (event) => event.kind,
        backlog: [],
        busy: false,
        removed: false,
      };
      wildcards = [...wildcards, lane];
      const unsubscribe = (): void => {
        subscriptions.delete(unsubscribe);
        if (!wildcards.includes(lane)) return;
        retire(lane);
        wildcards = wildcards.filter((entry) => entry !== lane);
      };
      subscriptions.add(unsubscribe);
      return unsubscribe;
    },

    dispatch(event: SessionEvent): void {
      pending.push(delivery(event.kind, event));
      if (!draining) drain();
    },

    listenerCount(kind: SessionEventKind): number {
      return registry[kind]?.length ?? 0;
    },

    clear(): void {
      for (const unsubscribe of [...subscriptions]) unsubscribe();
    },
  };
}
