import { injectable, inject } from "inversify";
import { TYPES } from "../../../config/Types";
import type { QuestEngineConfig } from "../../../config/config";
import { logger } from "../../../infrastructure/utils/logger";
import { LogCategory } from "../../../shared/constants/LogEnums";
import type { QuestLifecycleEventType } from "../../../shared/constants/EventEnums";
import type {
  GameplayEvent,
  LifecycleEventOf,
} from "../../types/quests/events";
import type { PlayerId } from "../../types/quests/identifiers";
import type {
  LifecycleEventBus,
  LifecycleHandler,
} from "../core/LifecycleEventBus";
import { formatIssues, gameplayEventSchema } from "../core/schema";
import type { QuestEngine } from "./QuestEngine";

export interface DispatcherStats {
  accepted: number;
  processed: number;
  /** Payloads that failed validation */
  rejected: number;
  /** Events dropped because the player's queue was full */
  overflowed: number;
  /** Events the engine failed on */
  failed: number;
}

/**
 * Routes inbound gameplay events to the QuestEngine and outbound lifecycle
 * events to subscribers.
 *
 * Each player has a bounded FIFO queue drained in arrival order. An event
 * submitted while that player's queue is draining (e.g. by a lifecycle
 * subscriber) is appended and handled after the current one, never nested.
 * Nothing is thrown back to the submitter: invalid payloads, overflow and
 * engine failures are logged and the event is dropped.
 */
@injectable()
export class EventDispatcher {
  private queues = new Map<PlayerId, GameplayEvent[]>();
  private draining = new Set<PlayerId>();
  private stats: DispatcherStats = {
    accepted: 0,
    processed: 0,
    rejected: 0,
    overflowed: 0,
    failed: 0,
  };

  constructor(
    @inject(TYPES.QuestEngine) private readonly engine: QuestEngine,
    @inject(TYPES.LifecycleEventBus) private readonly bus: LifecycleEventBus,
    @inject(TYPES.QuestEngineConfig) private readonly config: QuestEngineConfig,
  ) {}

  /**
   * Queues a gameplay event for the player. Returns false when the event was
   * dropped.
   */
  public submitEvent(playerId: PlayerId, event: unknown): boolean {
    const parsed = gameplayEventSchema.safeParse(event);
    if (!parsed.success) {
      this.stats.rejected++;
      logger.warn("Dropped malformed gameplay event", LogCategory.EVENTS, {
        playerId,
        issues: formatIssues(parsed.error),
      });
      return false;
    }

    let queue = this.queues.get(playerId);
    if (!queue) {
      queue = [];
      this.queues.set(playerId, queue);
    }
    if (queue.length >= this.config.EVENT_QUEUE_CAPACITY) {
      this.stats.overflowed++;
      logger.warn("Gameplay event queue full, event dropped", LogCategory.EVENTS, {
        playerId,
        type: parsed.data.type,
        capacity: this.config.EVENT_QUEUE_CAPACITY,
      });
      return false;
    }

    queue.push(parsed.data);
    this.stats.accepted++;
    this.drain(playerId);
    return true;
  }

  private drain(playerId: PlayerId): void {
    if (this.draining.has(playerId)) return;
    this.draining.add(playerId);

    try {
      const queue = this.queues.get(playerId) ?? [];
      let event = queue.shift();
      while (event) {
        this.process(playerId, event);
        event = queue.shift();
      }
      this.queues.delete(playerId);
    } finally {
      this.draining.delete(playerId);
    }
  }

  private process(playerId: PlayerId, event: GameplayEvent): void {
    try {
      this.engine.handleGameplayEvent(playerId, event);
      this.stats.processed++;
    } catch (error) {
      this.stats.failed++;
      logger.error("Gameplay event dropped after engine failure", LogCategory.EVENTS, {
        playerId,
        type: event.type,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  public subscribe<T extends QuestLifecycleEventType>(
    type: T,
    handler: LifecycleHandler<LifecycleEventOf<T>>,
  ): () => void {
    return this.bus.subscribe(type, handler);
  }

  public subscribeAll(handler: LifecycleHandler): () => void {
    return this.bus.subscribeAll(handler);
  }

  public getPendingCount(playerId: PlayerId): number {
    return this.queues.get(playerId)?.length ?? 0;
  }

  public getStats(): DispatcherStats {
    return { ...this.stats };
  }
}
