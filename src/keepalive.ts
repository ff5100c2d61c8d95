import type { Logger } from "./types.ts";

export interface KeepaliveOptions {
  /** Interval between pings in milliseconds. 0 disables the keepalive */
  intervalMs: number;
  /** Grace period after a missed interval before the peer is declared dead */
  timeoutMs: number;
  /** Sends one ping frame */
  ping: () => void;
  /** Called once when no pong arrived within intervalMs + timeoutMs */
  onTimeout: () => void;
  logger: Logger;
}

export interface Keepalive {
  start(): void;
  stop(): void;
  /** Records a pong (or any other sign of life) from the peer */
  recordPong(): void;
  readonly running: boolean;
}

/**
 * Creates a ping/pong liveness check.
 *
 * Each tick first checks how long ago the last pong arrived; past the
 * window the check stops and onTimeout fires, otherwise a ping is sent.
 *
 * @param options - Timing and callbacks
 * @returns Keepalive controller
 */
export function createKeepalive(options: KeepaliveOptions): Keepalive {
  const { intervalMs, timeoutMs, logger } = options;
  let timer: ReturnType<typeof setInterval> | null = null;
  let lastPongAt = 0;

  function stop(): void {
    if (timer !== null) {
      clearInterval(timer);
      timer = null;
    }
  }

  function tick(): void {
    const silentFor = Date.now() - lastPongAt;
    if (silentFor > intervalMs + timeoutMs) {
      logger.warn({
        message: `No pong for ${silentFor}ms, declaring connection dead`,
        atFunction: "keepalive.tick",
        data: { intervalMs, timeoutMs },
      });
      stop();
      options.onTimeout();
      return;
    }
    try {
      options.ping();
    } catch (error) {
      logger.error({
        message: "Failed to send ping",
        atFunction: "keepalive.tick",
        data: { error: error instanceof Error ? error.message : String(error) },
      });
    }
  }

  return {
    start() {
      if (intervalMs <= 0 || timer !== null) return;
      lastPongAt = Date.now();
      timer = setInterval(tick, intervalMs);
    },

    stop,

    recordPong() {
      lastPongAt = Date.now();
    },

    get running() {
      return timer !== null;
    },
  };
}
