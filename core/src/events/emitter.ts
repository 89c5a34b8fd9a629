/**
 * Typed Event Emitter
 * @module events/emitter
 */

import type { ILogger } from '../logger/interface.js';
import { NoopLogger } from '../logger/noop.js';

type EventHandler<T> = (payload: T) => void;

interface ListenerEntry<T> {
  handler: EventHandler<T>;
  once: boolean;
}

type ListenerMap<TEvents> = {
  [E in keyof TEvents]?: ListenerEntry<TEvents[E]>[];
};

/**
 * Type-safe event emitter keyed by an event → payload map.
 * A throwing listener is logged at error level; delivery continues.
 */
export class TypedEventEmitter<TEvents extends { [K in keyof TEvents]: unknown }> {
  private listeners: ListenerMap<TEvents> = {};
  private readonly logger: ILogger;

  constructor(options: { logger?: ILogger } = {}) {
    this.logger = options.logger ?? new NoopLogger();
  }

  /**
   * Subscribe to an event
   * @returns Unsubscribe function
   */
  on<E extends keyof TEvents>(event: E, handler: EventHandler<TEvents[E]>): () => void {
    this.add(event, { handler, once: false });
    return () => this.off(event, handler);
  }

  /**
   * Subscribe to the next occurrence of an event only
   */
  once<E extends keyof TEvents>(event: E, handler: EventHandler<TEvents[E]>): () => void {
    this.add(event, { handler, once: true });
    return () => this.off(event, handler);
  }

  off<E extends keyof TEvents>(event: E, handler: EventHandler<TEvents[E]>): void {
    const entries = this.listeners[event];
    if (!entries) return;

    const filtered = entries.filter((entry) => entry.handler !== handler);
    this.listeners[event] = filtered.length > 0 ? filtered : undefined;
  }

  /**
   * Deliver a payload to every listener of an event, in subscription order
   */
  emit<E extends keyof TEvents>(event: E, payload: TEvents[E]): void {
    const entries = this.listeners[event];
    if (!entries) return;

    const remaining = entries.filter((entry) => !entry.once);
    this.listeners[event] = remaining.length > 0 ? remaining : undefined;

    for (const entry of entries) {
      try {
        entry.handler(payload);
      } catch (error) {
        this.logger.error(`Listener for "${String(event)}" threw`, error);
      }
    }
  }

  /**
   * Remove all listeners for an event (or all events)
   */
  removeAllListeners(event?: keyof TEvents): void {
    if (event === undefined) {
      this.listeners = {};
    } else {
      this.listeners[event] = undefined;
    }
  }

  listenerCount(event: keyof TEvents): number {
    return this.listeners[event]?.length ?? 0;
  }

  private add<E extends keyof TEvents>(event: E, entry: ListenerEntry<TEvents[E]>): void {
    const entries = this.listeners[event] ?? [];
    this.listeners[event] = [...entries, entry];
  }
}
