// ---------------------------------------------------------------------------
// Typed Emitter
// ---------------------------------------------------------------------------

/**
 * Event map: event name → handler argument tuple.
 */
export type EventMap = { [event: string]: unknown[] };

export type Handler<Args extends unknown[]> = (...args: Args) => void;

export interface Emitter<Events extends EventMap> {
  /** Register a handler. Returns an idempotent disposer. */
  on<E extends keyof Events>(event: E, handler: Handler<Events[E]>): () => void;
  /**
   * Call every handler registered for the event, in registration order.
   * A throwing handler does not prevent the others from running.
   */
  emit<E extends keyof Events>(event: E, ...args: Events[E]): void;
  /** Remove the handlers of one event, or of every event. */
  clear(event?: keyof Events): void;
  count(event: keyof Events): number;
}

export interface EmitterOptions {
  /** Receives errors thrown by handlers (default: console.error) */
  readonly onHandlerError?: (error: unknown, event: string) => void;
}

function defaultHandlerError(error: unknown, event: string): void {
  console.error(`[emitter] Handler for "${event}" threw:`, error);
}

export function createEmitter<Events extends EventMap>(
  options: EmitterOptions = {},
): Emitter<Events> {
  let handlers: { [E in keyof Events]?: Set<Handler<Events[E]>> } = {};
  const onHandlerError = options.onHandlerError ?? defaultHandlerError;

  function setFor<E extends keyof Events>(event: E): Set<Handler<Events[E]>> {
    const existing = handlers[event];
    if (existing) return existing;
    const created = new Set<Handler<Events[E]>>();
    handlers[event] = created;
    return created;
  }

  return {
    on(event, handler) {
      const set = setFor(event);
      set.add(handler);
      return () => {
        set.delete(handler);
      };
    },

    emit(event, ...args) {
      const set = handlers[event];
      if (!set || set.size === 0) return;
      // Snapshot: handlers added or removed during emit affect the next one
      for (const handler of [...set]) {
        try {
          handler(...args);
        } catch (error) {
          onHandlerError(error, String(event));
        }
      }
    },

    clear(event) {
      if (event === undefined) {
        handlers = {};
      } else {
        delete handlers[event];
      }
    },

    count(event) {
      return handlers[event]?.size ?? 0;
    },
  };
}
