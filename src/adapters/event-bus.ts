/**
 * TypedEventBus — type-safe publish/subscribe with wildcard and once support.
 *
 * Listeners are snapshot-copied before each emit so unsubscribing during
 * dispatch never skips a sibling. A throwing listener is logged and the
 * remaining listeners still run.
 */

import { logger } from '../utils/logger';

/** Listener for a specific event type */
type EventListener<T> = (data: T) => void;

/** Listener for every event */
type WildcardListener<T> = (type: keyof T, data: T[keyof T]) => void;

type ListenerTable<T> = { [K in keyof T]?: Set<EventListener<T[K]>> };

export class TypedEventBus<T extends { [K in keyof T]: unknown }> {
  private typed: ListenerTable<T> = {};
  private readonly sizes = new Map<keyof T, ReadonlySet<unknown>>();
  private readonly wildcard = new Set<WildcardListener<T>>();

  /** Subscribe to one event type. Returns an unsubscribe function. */
  on<K extends keyof T>(type: K, listener: EventListener<T[K]>): () => void {
    const listeners: Set<EventListener<T[K]>> = this.typed[type] ?? new Set<EventListener<T[K]>>();
    this.typed[type] = listeners;
    this.sizes.set(type, listeners);
    listeners.add(listener);
    return () => { listeners.delete(listener); };
  }

  /** Subscribe to every event. */
  onAny(listener: WildcardListener<T>): () => void {
    this.wildcard.add(listener);
    return () => { this.wildcard.delete(listener); };
  }

  /** Subscribe to the next occurrence of an event type only. */
  once<K extends keyof T>(type: K, listener: EventListener<T[K]>): () => void {
    const unsub = this.on(type, (data) => {
      unsub();
      listener(data);
    });
    return unsub;
  }

  /** Events without a payload are emitted with `undefined`. */
  emit<K extends keyof T>(type: K, data: T[K]): void {
    const typed: Set<EventListener<T[K]>> | undefined = this.typed[type];
    if (typed) {
      for (const fn of [...typed]) {
        this.invoke(type, () => fn(data));
      }
    }

    for (const fn of [...this.wildcard]) {
      this.invoke(type, () => fn(type, data));
    }
  }

  /** Remove all listeners. */
  dispose(): void {
    this.typed = {};
    this.sizes.clear();
    this.wildcard.clear();
  }

  /**
   * Number of listeners for one type (`'*'` for wildcard listeners), or the
   * total when called without arguments.
   */
  listenerCount(type?: keyof T | '*'): number {
    if (type === '*') return this.wildcard.size;
    if (type !== undefined) return this.sizes.get(type)?.size ?? 0;

    let total = this.wildcard.size;
    for (const set of this.sizes.values()) {
      total += set.size;
    }
    return total;
  }

  // ── Private ──

  private invoke(type: keyof T, call: () => void): void {
    try {
      call();
    } catch (err) {
      logger.error('EventBus', `Listener for "${String(type)}" threw`, {
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
