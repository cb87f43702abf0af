import type { AppEvent, AppState } from './app.types';

export interface EventMap {
  'state:changed': AppState;
  'event:handled': AppEvent;
  'app:exit': { code: number };
}

export type EventName = keyof EventMap;

export type EventHandler<K extends EventName> = (payload: EventMap[K]) => void | Promise<void>;

/** Publish side used by the runner; subscribe side used by the CLI entry. */
export interface AppEventBus {
  on<K extends EventName>(event: K, handler: EventHandler<K>): () => void;
  once<K extends EventName>(event: K, handler: EventHandler<K>): () => void;
  emit<K extends EventName>(event: K, payload: EventMap[K]): Promise<void>;
  listenerCount(event: EventName): number;
  clear(): void;
}
