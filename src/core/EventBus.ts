import type { AppEventBus, EventHandler, EventMap, EventName } from '../types';
import { logger } from '../utils/logger';

type HandlerSets = { [K in EventName]: Set<EventHandler<K>> };

function emptyHandlerSets(): HandlerSets {
  return {
    'state:changed': new Set(),
    'event:handled': new Set(),
    'app:exit': new Set(),
  };
}

/**
 * Connects the event loop to its observers (the renderer, the CLI entry).
 * Handlers are awaited one after another in subscription order. A handler
 * that throws is logged and the rest still run, so a broken redraw never
 * stalls the loop.
 */
export class EventBus implements AppEventBus {
  private handlers = emptyHandlerSets();

  on<K extends EventName>(event: K, handler: EventHandler<K>): () => void {
    const set: Set<EventHandler<K>> = this.handlers[event];
    set.add(handler);
    return () => {
      set.delete(handler);
    };
  }

  once<K extends EventName>(event: K, handler: EventHandler<K>): () => void {
    const unsubscribe: () => void = this.on(event, async (payload: EventMap[K]) => {
      unsubscribe();
      await handler(payload);
    });
    return unsubscribe;
  }

  async emit<K extends EventName>(event: K, payload: EventMap[K]): Promise<void> {
    const set: Set<EventHandler<K>> = this.handlers[event];
    for (const handler of [...set]) {
      try {
        await handler(payload);
      } catch (error) {
        logger.error(`Listener for '${event}' failed`, error);
      }
    }
  }

  listenerCount(event: EventName): number {
    return this.handlers[event].size;
  }

  clear(): void {
    this.handlers = emptyHandlerSets();
  }
}
