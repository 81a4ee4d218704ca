/**
 * slotlist - Event Emitter
 * Ordered, synchronous observer list
 */

import type { EventHandler, Unsubscribe, EventMap, Logger } from "../types";
import { LOG_PREFIX } from "../constants";

/** Internal listener storage */
type Listeners<T extends EventMap> = {
  [K in keyof T]?: Set<EventHandler<T[K]>>;
};

// =============================================================================
// Event Emitter
// =============================================================================

/**
 * Create a type-safe event emitter.
 *
 * Handlers run in subscription order, synchronously, inside `emit`. A handler
 * that throws is reported to `logger` and the remaining handlers still run.
 */
export const createEmitter = <T extends EventMap>(
  logger: Pick<Logger, "error"> = console,
) => {
  const listeners: Listeners<T> = {};

  const on = <K extends keyof T>(
    event: K,
    handler: EventHandler<T[K]>,
  ): Unsubscribe => {
    const set = listeners[event] ?? new Set<EventHandler<T[K]>>();
    listeners[event] = set;
    set.add(handler);

    return () => off(event, handler);
  };

  const off = <K extends keyof T>(
    event: K,
    handler: EventHandler<T[K]>,
  ): void => {
    listeners[event]?.delete(handler);
  };

  const emit = <K extends keyof T>(event: K, payload: T[K]): void => {
    const set = listeners[event];
    if (!set) return;

    // Snapshot so a handler that unsubscribes (once) doesn't skip its neighbour
    for (const handler of Array.from(set)) {
      try {
        handler(payload);
      } catch (error) {
        logger.error(
          `${LOG_PREFIX} Error in event handler for "${String(event)}":`,
          error,
        );
      }
    }
  };

  /**
   * Subscribe to an event once (auto-unsubscribe after first call)
   */
  const once = <K extends keyof T>(
    event: K,
    handler: EventHandler<T[K]>,
  ): Unsubscribe => {
    const onceHandler: EventHandler<T[K]> = (payload) => {
      off(event, onceHandler);
      handler(payload);
    };
    return on(event, onceHandler);
  };

  return {
    on,
    off,
    emit,
    once,
  };
};

/** Event emitter type */
export type Emitter<T extends EventMap> = ReturnType<typeof createEmitter<T>>;
