import { EventEmitter } from "node:events";
import { logger } from "../../../infrastructure/utils/logger";
import { LogCategory } from "../../../shared/constants/LogEnums";
import {
  ANY_LIFECYCLE_EVENT,
  QuestLifecycleEventType,
} from "../../../shared/constants/EventEnums";
import type {
  LifecycleEventOf,
  PendingLifecycleEvent,
  QuestLifecycleEvent,
} from "../../types/quests/events";

export type LifecycleHandler<E extends QuestLifecycleEvent = QuestLifecycleEvent> =
  (event: E) => void | Promise<void>;

/**
 * EventEmitter for outbound quest lifecycle events with a commit buffer.
 *
 * The engine queues events while it performs a transition and flushes them
 * once the new state is stored, so subscribers only ever observe committed
 * transitions. A throwing or rejecting subscriber is logged and skipped; the
 * remaining subscribers still receive the event.
 *
 * Bound as a constant in the container: inversify cannot plan a class whose
 * base constructor (EventEmitter) carries no injection metadata.
 */
export class LifecycleEventBus extends EventEmitter {
  private eventQueue: QuestLifecycleEvent[] = [];
  private sequence = 0;
  private delivered = 0;
  private flushing = false;

  constructor() {
    super();
    this.setMaxListeners(50);
  }

  /**
   * Isolates each listener so one failing subscriber cannot affect the
   * engine or the other subscribers.
   */
  public override emit(eventName: string | symbol, ...args: unknown[]): boolean {
    const listeners = this.rawListeners(eventName);
    for (const listener of listeners) {
      try {
        const result: unknown = Reflect.apply(listener, this, args);
        if (result instanceof Promise) {
          result.catch((error: unknown) =>
            this.reportSubscriberFailure(eventName, error),
          );
        }
      } catch (error) {
        this.reportSubscriberFailure(eventName, error);
      }
    }
    return listeners.length > 0;
  }

  private reportSubscriberFailure(
    eventName: string | symbol,
    error: unknown,
  ): void {
    logger.error(
      `Lifecycle subscriber failed on ${String(eventName)}`,
      LogCategory.EVENTS,
      { error: error instanceof Error ? error.message : String(error) },
    );
  }

  public subscribe<T extends QuestLifecycleEventType>(
    type: T,
    handler: LifecycleHandler<LifecycleEventOf<T>>,
  ): () => void {
    this.on(type, handler);
    return () => {
      this.off(type, handler);
    };
  }

  public subscribeAll(handler: LifecycleHandler): () => void {
    this.on(ANY_LIFECYCLE_EVENT, handler);
    return () => {
      this.off(ANY_LIFECYCLE_EVENT, handler);
    };
  }

  /**
   * Buffers an event until the next flush, stamping its sequence number.
   */
  public queueEvent(event: PendingLifecycleEvent): QuestLifecycleEvent {
    const stamped: QuestLifecycleEvent = { ...event, sequence: ++this.sequence };
    this.eventQueue.push(stamped);
    return stamped;
  }

  /**
   * Delivers queued events in sequence order. A flush requested by a
   * subscriber while delivery is underway leaves its events queued for the
   * outer flush and returns an empty list; the outer flush returns every
   * event it delivered, including those.
   */
  public flushEvents(): QuestLifecycleEvent[] {
    if (this.flushing || this.eventQueue.length === 0) return [];

    this.flushing = true;
    const delivered: QuestLifecycleEvent[] = [];
    try {
      let event = this.eventQueue.shift();
      while (event) {
        this.emit(event.type, event);
        this.emit(ANY_LIFECYCLE_EVENT, event);
        this.delivered++;
        delivered.push(event);
        event = this.eventQueue.shift();
      }
    } finally {
      this.flushing = false;
    }
    return delivered;
  }

  /**
   * Drops queued events; used when a transition is rejected before commit.
   */
  public discardQueued(): void {
    this.eventQueue = [];
  }

  public getQueueSize(): number {
    return this.eventQueue.length;
  }

  public getDeliveredCount(): number {
    return this.delivered;
  }
}
