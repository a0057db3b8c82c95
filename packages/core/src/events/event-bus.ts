import {
  EventOfType,
  EventType,
  referencedEventId,
  SenateEvent,
} from '../types/event.types';
import { Senator } from '../types/senate.types';
import { getErrorMessage } from '../utils/common';
import { EngineLogger, SILENT_LOGGER } from '../utils/logger';

export const DEFAULT_MAX_HISTORY = 100;

/** A subscriber callback. Returned promises are awaited before the next handler runs. */
export type EventHandler<E extends SenateEvent = SenateEvent> = (event: E) => void | Promise<void>;

/** Returns false to block an event before it is recorded or delivered. */
export type EventFilter = (event: SenateEvent) => boolean;

export interface SubscribeOptions {
  priority?: number; // Explicit dispatch priority; wins over the subscriber's rank.
  subscriber?: Senator; // Senator owning the handler; its rank is the default priority.
  name?: string; // Label used in failure logs; defaults to the function name.
}

export interface EventBusOptions {
  maxHistory?: number; // History capacity (FIFO eviction beyond it).
  logger?: EngineLogger;
}

/**
 * Outcome of a single {@link EventBus.publish} call.
 */
export interface PublishReport {
  eventId: string;
  delivered: number; // Handlers that completed without throwing.
  failed: number; // Handlers that threw or rejected.
  filtered: boolean; // True when a filter blocked the event; nothing was recorded or delivered.
}

interface Subscription {
  handler: unknown; // Identity of the registered callback, used for idempotence and removal.
  invoke: (event: SenateEvent) => void | Promise<void>;
  priority: number;
  name: string;
  sequence: number;
}

function isEventOfType<T extends EventType>(event: SenateEvent, type: T): event is EventOfType<T> {
  return event.type === type;
}

/**
 * Central dispatcher for a single debate.
 *
 * Handlers for an event are awaited one at a time in descending priority order; equal
 * priorities keep subscription order. A failing handler is logged and skipped, never
 * retried, and never stops delivery to the handlers after it. A bounded history of
 * published events is kept for inspection and for checking that reactions and
 * interjections refer to speeches that were actually published.
 *
 * One bus instance serves one debate; it is not shared across concurrently running debates.
 */
export class EventBus {
  private readonly subscribers = new Map<EventType, Subscription[]>();
  private wildcardSubscribers: Subscription[] = [];
  private readonly filters: EventFilter[] = [];
  private history: SenateEvent[] = [];
  private readonly historyIds = new Set<string>();
  private readonly orphanIds = new Set<string>();
  private sequence = 0;
  private readonly logger: EngineLogger;
  readonly maxHistory: number;

  constructor(options: EventBusOptions = {}) {
    const maxHistory = options.maxHistory ?? DEFAULT_MAX_HISTORY;
    if (!Number.isInteger(maxHistory) || maxHistory < 1) {
      throw new RangeError(`maxHistory must be a positive integer, got ${maxHistory}`);
    }
    this.maxHistory = maxHistory;
    this.logger = options.logger ?? SILENT_LOGGER;
  }

  /**
   * Registers a handler for one event type. Registering the same handler twice for the
   * same type is a no-op.
   */
  subscribe<T extends EventType>(eventType: T, handler: EventHandler<EventOfType<T>>, options: SubscribeOptions = {}): void {
    const list = this.subscribers.get(eventType) ?? [];
    if (list.some((sub) => sub.handler === handler)) return;

    const invoke = (event: SenateEvent): void | Promise<void> => {
      if (isEventOfType(event, eventType)) {
        return handler(event);
      }
    };
    list.push(this.createSubscription(handler, invoke, options));
    this.subscribers.set(eventType, list);
  }

  unsubscribe<T extends EventType>(eventType: T, handler: EventHandler<EventOfType<T>>): void {
    const list = this.subscribers.get(eventType);
    if (!list) return;
    const remaining = list.filter((sub) => sub.handler !== handler);
    if (remaining.length === 0) {
      this.subscribers.delete(eventType);
    } else {
      this.subscribers.set(eventType, remaining);
    }
  }

  /**
   * Registers a handler that receives every event type.
   */
  subscribeToAll(handler: EventHandler, options: SubscribeOptions = {}): void {
    if (this.wildcardSubscribers.some((sub) => sub.handler === handler)) return;
    this.wildcardSubscribers.push(this.createSubscription(handler, handler, options));
  }

  unsubscribeFromAll(handler: EventHandler): void {
    this.wildcardSubscribers = this.wildcardSubscribers.filter((sub) => sub.handler !== handler);
  }

  addFilter(filter: EventFilter): void {
    if (!this.filters.includes(filter)) this.filters.push(filter);
  }

  removeFilter(filter: EventFilter): void {
    const index = this.filters.indexOf(filter);
    if (index >= 0) this.filters.splice(index, 1);
  }

  /**
   * Number of handlers that would receive an event of the given type, wildcard handlers included.
   */
  getSubscriberCount(eventType: EventType): number {
    return (this.subscribers.get(eventType)?.length ?? 0) + this.wildcardSubscribers.length;
  }

  /**
   * Names of the handlers for an event type in the order they would be invoked.
   */
  getSubscribers(eventType: EventType): string[] {
    return this.orderedSubscriptions(eventType).map((sub) => sub.name);
  }

  /**
   * Records the event and delivers it to every matching handler in priority order.
   * Resolves once all handlers have settled.
   */
  async publish(event: SenateEvent): Promise<PublishReport> {
    if (!this.passesFilters(event)) {
      return { eventId: event.id, delivered: 0, failed: 0, filtered: true };
    }

    this.checkReference(event);
    this.record(event);

    // Snapshot so subscribe/unsubscribe calls made by handlers do not affect this dispatch.
    const targets = this.orderedSubscriptions(event.type);
    let delivered = 0;
    let failed = 0;
    for (const sub of targets) {
      try {
        await sub.invoke(event);
        delivered++;
      } catch (error: unknown) {
        failed++;
        this.logger.warn('Event handler failed', {
          eventId: event.id,
          eventType: event.type,
          handler: sub.name,
          error: getErrorMessage(error),
        });
      }
    }
    return { eventId: event.id, delivered, failed, filtered: false };
  }

  /**
   * Returns up to `count` of the most recent events, newest last.
   */
  getRecentEvents(count: number = this.maxHistory): SenateEvent[] {
    if (count <= 0) return [];
    return this.history.slice(-count);
  }

  /**
   * Whether a published reaction or interjection referred to an event missing from history.
   * Flags are dropped together with the flagged event when it is evicted.
   */
  isOrphan(eventId: string): boolean {
    return this.orphanIds.has(eventId);
  }

  /** Whether an event with this id is currently retained in history. */
  hasEvent(eventId: string): boolean {
    return this.historyIds.has(eventId);
  }

  get historySize(): number {
    return this.history.length;
  }

  /** Empties history; subscriptions and filters are untouched. */
  clearHistory(): void {
    this.history = [];
    this.historyIds.clear();
    this.orphanIds.clear();
  }

  private createSubscription(
    handler: unknown,
    invoke: (event: SenateEvent) => void | Promise<void>,
    options: SubscribeOptions
  ): Subscription {
    const fnName = typeof handler === 'function' && handler.name ? handler.name : 'anonymous';
    return {
      handler,
      invoke,
      priority: options.priority ?? options.subscriber?.rank ?? 0,
      name: options.name ?? (options.subscriber ? `${options.subscriber.name}:${fnName}` : fnName),
      sequence: this.sequence++,
    };
  }

  private orderedSubscriptions(eventType: EventType): Subscription[] {
    const typed = this.subscribers.get(eventType) ?? [];
    return [...typed, ...this.wildcardSubscribers].sort(
      (a, b) => b.priority - a.priority || a.sequence - b.sequence
    );
  }

  /** A filter that throws blocks the event. */
  private passesFilters(event: SenateEvent): boolean {
    for (const filter of this.filters) {
      let pass: boolean;
      try {
        pass = filter(event);
      } catch (error: unknown) {
        this.logger.warn('Event filter failed; event blocked', {
          eventId: event.id,
          eventType: event.type,
          error: getErrorMessage(error),
        });
        return false;
      }
      if (!pass) {
        this.logger.debug('Event blocked by filter', { eventId: event.id, eventType: event.type });
        return false;
      }
    }
    return true;
  }

  private checkReference(event: SenateEvent): void {
    const referenced = referencedEventId(event);
    if (referenced === undefined || this.historyIds.has(referenced)) return;
    this.orphanIds.add(event.id);
    this.logger.warn('Event references an unknown event', {
      eventId: event.id,
      eventType: event.type,
      referencedEventId: referenced,
    });
  }

  private record(event: SenateEvent): void {
    this.history.push(event);
    this.historyIds.add(event.id);
    while (this.history.length > this.maxHistory) {
      const evicted = this.history.shift();
      if (evicted) {
        this.historyIds.delete(evicted.id);
        this.orphanIds.delete(evicted.id);
      }
    }
  }
}
