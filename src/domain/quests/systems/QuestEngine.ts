import { injectable, inject } from "inversify";
import { TYPES } from "../../../config/Types";
import type { QuestEngineConfig } from "../../../config/config";
import type { Clock } from "../../../shared/Clock";
import { logger } from "../../../infrastructure/utils/logger";
import { LogCategory, LogLevel } from "../../../shared/constants/LogEnums";
import {
  GameplayEventType,
  QuestLifecycleEventType,
} from "../../../shared/constants/EventEnums";
import {
  QuestErrorCode,
  QuestFailureReason,
  QuestStatus,
  isTerminalStatus,
} from "../../../shared/constants/QuestEnums";
import type { FactSnapshot } from "../../types/quests/conditions";
import type { QuestDefinition } from "../../types/quests/definitions";
import type {
  GameplayEvent,
  QuestLifecycleEvent,
} from "../../types/quests/events";
import type { ChoiceId, PlayerId, QuestId } from "../../types/quests/identifiers";
import {
  PLAYER_STATE_VERSION,
  type ObjectiveDelta,
  type PendingReward,
  type PlayerQuestState,
  type QuestInstance,
} from "../../types/quests/instances";
import { fail, ok, type QuestResult } from "../core/errors";
import type { LifecycleEventBus } from "../core/LifecycleEventBus";
import type { ConditionEvaluator } from "./ConditionEvaluator";
import type { FactProvider } from "./FactProvider";
import type { ObjectiveTracker } from "./ObjectiveTracker";
import type { QuestDefinitionRegistry } from "./QuestDefinitionRegistry";
import { cloneInstance, type QuestInstanceStore } from "./QuestInstanceStore";
import { validatePlayerState } from "./QuestStateValidator";

/**
 * Quest state machine and orchestrator.
 *
 * Owns every quest instance transition:
 * - Locked -> Available is a query result, announced once per transition
 * - Available -> Active on acceptQuest
 * - Active -> Active / Completed as the tracker reports objective deltas
 * - Active -> Failed, Active|Available -> Abandoned
 *
 * Each command builds its change on a copy, saves it, and only then flushes
 * the lifecycle events it queued, so subscribers observe committed state and
 * each transition is announced exactly once. Commands are synchronous; the
 * EventDispatcher serializes gameplay events per player.
 */
@injectable()
export class QuestEngine {
  constructor(
    @inject(TYPES.QuestDefinitionRegistry)
    private readonly registry: QuestDefinitionRegistry,
    @inject(TYPES.ConditionEvaluator)
    private readonly evaluator: ConditionEvaluator,
    @inject(TYPES.ObjectiveTracker)
    private readonly tracker: ObjectiveTracker,
    @inject(TYPES.QuestInstanceStore)
    private readonly store: QuestInstanceStore,
    @inject(TYPES.LifecycleEventBus)
    private readonly bus: LifecycleEventBus,
    @inject(TYPES.FactProvider)
    private readonly facts: FactProvider,
    @inject(TYPES.Clock)
    private readonly clock: Clock,
    @inject(TYPES.QuestEngineConfig)
    private readonly config: QuestEngineConfig,
  ) {}

  // ---------------------------------------------------------------------------
  // Commands
  // ---------------------------------------------------------------------------

  /**
   * Creates an Available instance for a quest giver to present.
   * Offering an already offered quest returns the existing instance.
   */
  public offerQuest(
    playerId: PlayerId,
    questId: QuestId,
  ): QuestResult<QuestInstance> {
    const definition = this.registry.get(questId);
    if (!definition) return this.notFound(questId);

    const existing = this.store.get(playerId, questId);
    if (existing?.status === QuestStatus.AVAILABLE) return ok(existing);

    const blocked = this.checkStartable<QuestInstance>(
      playerId,
      definition,
      existing,
    );
    if (blocked) return blocked;

    if (existing) this.store.archive(playerId, questId);

    const now = this.clock();
    const instance: QuestInstance = {
      ...this.freshInstance(playerId, definition),
      status: QuestStatus.AVAILABLE,
      offeredAt: now,
    };
    this.store.save(instance);

    if (!this.store.isAnnounced(playerId, questId)) {
      this.store.setAnnounced(playerId, questId, true);
      this.bus.queueEvent({
        type: QuestLifecycleEventType.QUEST_AVAILABLE,
        playerId,
        questId,
        timestamp: now,
      });
    }
    this.bus.flushEvents();

    logger.debug(`Quest ${questId} offered`, LogCategory.QUESTS, {
      playerId,
      questId,
    });
    return ok(instance);
  }

  public acceptQuest(
    playerId: PlayerId,
    questId: QuestId,
  ): QuestResult<QuestInstance> {
    const definition = this.registry.get(questId);
    if (!definition) return this.notFound(questId);

    const existing = this.store.get(playerId, questId);
    const blocked = this.checkStartable<QuestInstance>(
      playerId,
      definition,
      existing,
    );
    if (blocked) return blocked;

    const activeCount = this.store.countByStatus(playerId, QuestStatus.ACTIVE);
    if (activeCount >= this.config.MAX_ACTIVE_QUESTS) {
      return this.reject(
        QuestErrorCode.CAPACITY_EXCEEDED,
        `Player already has ${activeCount} active quests (max ${this.config.MAX_ACTIVE_QUESTS})`,
        playerId,
        questId,
      );
    }

    if (existing && isTerminalStatus(existing.status)) {
      this.store.archive(playerId, questId);
    }

    const now = this.clock();
    const instance: QuestInstance = {
      ...this.freshInstance(playerId, definition),
      status: QuestStatus.ACTIVE,
      offeredAt:
        existing?.status === QuestStatus.AVAILABLE
          ? existing.offeredAt
          : undefined,
      acceptedAt: now,
    };
    this.store.save(instance);
    this.store.setAnnounced(playerId, questId, false);

    this.bus.queueEvent({
      type: QuestLifecycleEventType.QUEST_ACCEPTED,
      playerId,
      questId,
      timestamp: now,
    });
    this.bus.flushEvents();

    logger.playerLog(
      LogLevel.INFO,
      LogCategory.QUESTS,
      playerId,
      `Quest accepted: ${definition.name}`,
      { questId },
    );
    return ok(instance);
  }

  /**
   * Abandons an Active or Available quest. A quest that is currently
   * available but was never offered gets an Abandoned instance directly.
   */
  public abandonQuest(
    playerId: PlayerId,
    questId: QuestId,
  ): QuestResult<QuestInstance> {
    const definition = this.registry.get(questId);
    if (!definition) return this.notFound(questId);

    const existing = this.store.get(playerId, questId);
    if (existing && isTerminalStatus(existing.status)) {
      return this.terminal(existing);
    }

    let base: QuestInstance;
    if (existing) {
      base = existing;
    } else {
      const snapshot = this.buildSnapshot(playerId);
      if (!this.checkAvailability(playerId, definition, snapshot)) {
        return this.reject(
          QuestErrorCode.NOT_AVAILABLE,
          `Quest ${questId} is not available`,
          playerId,
          questId,
        );
      }
      base = {
        ...this.freshInstance(playerId, definition),
        status: QuestStatus.AVAILABLE,
      };
    }

    const now = this.clock();
    const previousStatus = base.status;
    const instance: QuestInstance = {
      ...cloneInstance(base),
      status: QuestStatus.ABANDONED,
      endedAt: now,
    };
    this.store.save(instance);
    this.store.setAnnounced(playerId, questId, false);

    this.bus.queueEvent({
      type: QuestLifecycleEventType.QUEST_ABANDONED,
      playerId,
      questId,
      timestamp: now,
      previousStatus,
    });
    this.bus.flushEvents();

    logger.playerLog(
      LogLevel.INFO,
      LogCategory.QUESTS,
      playerId,
      `Quest abandoned: ${definition.name}`,
      { questId, previousStatus },
    );
    return ok(instance);
  }

  public failQuest(
    playerId: PlayerId,
    questId: QuestId,
    reason: string,
  ): QuestResult<QuestInstance> {
    const definition = this.registry.get(questId);
    if (!definition) return this.notFound(questId);

    const existing = this.store.get(playerId, questId);
    if (!existing) {
      return this.reject(
        QuestErrorCode.NOT_FOUND,
        `Player has no instance of quest ${questId}`,
        playerId,
        questId,
      );
    }
    if (isTerminalStatus(existing.status)) return this.terminal(existing);
    if (existing.status !== QuestStatus.ACTIVE) {
      return this.reject(
        QuestErrorCode.INVALID_TRANSITION,
        `Cannot fail a quest in status ${existing.status}`,
        playerId,
        questId,
      );
    }

    const instance = this.commitFailure(existing, reason);
    this.bus.flushEvents();
    return ok(instance);
  }

  /**
   * Fails every active instance whose time limit has elapsed since acceptance.
   */
  public expireOverdueQuests(): QuestInstance[] {
    const now = this.clock();
    const expired: QuestInstance[] = [];

    for (const playerId of this.store.listPlayers()) {
      for (const instance of this.store.listByStatus(playerId, QuestStatus.ACTIVE)) {
        const limit = this.registry.get(instance.questId)?.timeLimitMs;
        if (limit === undefined || instance.acceptedAt === undefined) continue;
        if (now - instance.acceptedAt >= limit) {
          expired.push(this.commitFailure(instance, QuestFailureReason.TIMEOUT));
        }
      }
    }

    this.bus.flushEvents();
    return expired;
  }

  /**
   * Applies a gameplay event to every active quest of the player.
   * Returns the lifecycle events the event produced. Log entries written
   * while handling the event share one correlation id; commands issued by
   * subscribers during delivery join it.
   */
  public handleGameplayEvent(
    playerId: PlayerId,
    event: GameplayEvent,
  ): QuestLifecycleEvent[] {
    const ownsCorrelation = logger.getActiveCorrelationId() === undefined;
    if (ownsCorrelation) logger.startCorrelation(event.type);
    try {
      return this.applyGameplayEvent(playerId, event);
    } finally {
      if (ownsCorrelation) logger.endCorrelation();
    }
  }

  private applyGameplayEvent(
    playerId: PlayerId,
    event: GameplayEvent,
  ): QuestLifecycleEvent[] {
    if (event.type === GameplayEventType.PLAYER_JOINED) {
      this.sweepAvailability(playerId, this.registry.list());
      return this.bus.flushEvents();
    }

    const touched = new Set<QuestId>();
    for (const instance of this.store.listByStatus(playerId, QuestStatus.ACTIVE)) {
      const delta = this.tracker.apply(instance, event);
      if (!delta) continue;
      if (this.commitDelta(instance, delta)) touched.add(instance.questId);
    }

    this.sweepDependents(playerId, touched);
    return this.bus.flushEvents();
  }

  /**
   * Applies a gameplay event to a single quest instance.
   * Resolves to null when the event does not match the current objective.
   */
  public applyEventToQuest(
    playerId: PlayerId,
    questId: QuestId,
    event: GameplayEvent,
  ): QuestResult<ObjectiveDelta | null> {
    if (!this.registry.has(questId)) return this.notFound(questId);

    const instance = this.store.get(playerId, questId);
    if (!instance) {
      return this.reject(
        QuestErrorCode.NOT_FOUND,
        `Player has no instance of quest ${questId}`,
        playerId,
        questId,
      );
    }
    if (isTerminalStatus(instance.status)) return this.terminal(instance);
    if (instance.status !== QuestStatus.ACTIVE) {
      return this.reject(
        QuestErrorCode.INVALID_TRANSITION,
        `Quest ${questId} has not been accepted`,
        playerId,
        questId,
      );
    }

    const delta = this.tracker.apply(instance, event);
    if (delta && this.commitDelta(instance, delta)) {
      this.sweepDependents(playerId, new Set([questId]));
    }
    this.bus.flushEvents();
    return ok(delta);
  }

  /**
   * Re-evaluates every quest for the player, announcing those that became
   * available. Hosts call this after facts they own changed, e.g. a level up.
   */
  public refreshAvailability(playerId: PlayerId): QuestId[] {
    const announced = this.sweepAvailability(playerId, this.registry.list());
    this.bus.flushEvents();
    return announced;
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  public isAvailable(playerId: PlayerId, questId: QuestId): boolean {
    const definition = this.registry.get(questId);
    if (!definition) return false;
    return this.checkAvailability(
      playerId,
      definition,
      this.buildSnapshot(playerId),
    );
  }

  public listAvailableQuests(playerId: PlayerId): QuestDefinition[] {
    const snapshot = this.buildSnapshot(playerId);
    return this.registry
      .list()
      .filter((definition) =>
        this.checkAvailability(playerId, definition, snapshot),
      );
  }

  public listActiveQuests(playerId: PlayerId): QuestInstance[] {
    return this.store.listByStatus(playerId, QuestStatus.ACTIVE);
  }

  public listQuests(playerId: PlayerId): QuestInstance[] {
    return this.store.list(playerId);
  }

  public getProgress(
    playerId: PlayerId,
    questId: QuestId,
  ): QuestInstance | undefined {
    return this.store.get(playerId, questId);
  }

  public getHistory(playerId: PlayerId): QuestInstance[] {
    return this.store.getHistory(playerId);
  }

  public getPendingRewards(playerId: PlayerId): PendingReward[] {
    return this.store.getPendingRewards(playerId);
  }

  /**
   * Hands pending rewards to the reward collaborator and forgets them.
   */
  public claimPendingRewards(playerId: PlayerId): PendingReward[] {
    return this.store.drainPendingRewards(playerId);
  }

  // ---------------------------------------------------------------------------
  // Persistence
  // ---------------------------------------------------------------------------

  public exportState(playerId: PlayerId): PlayerQuestState {
    return {
      version: PLAYER_STATE_VERSION,
      playerId,
      instances: this.store.list(playerId),
      history: this.store.getHistory(playerId),
      pendingRewards: this.store.getPendingRewards(playerId),
    };
  }

  /**
   * Replaces the player's quest state with a validated snapshot.
   * Emits no lifecycle events; a rejected snapshot leaves state untouched.
   */
  public restoreState(
    playerId: PlayerId,
    snapshot: unknown,
  ): QuestResult<PlayerQuestState> {
    const result = validatePlayerState(this.registry, playerId, snapshot);
    if (!result.success) {
      logger.warn(
        `Rejected corrupt quest snapshot for ${playerId}`,
        LogCategory.STORAGE,
        { playerId, ...result.error.details },
      );
      return result;
    }

    this.store.replacePlayer(playerId, result.value);
    logger.info(
      `Restored ${result.value.instances.length} quest instance(s)`,
      LogCategory.STORAGE,
      { playerId },
    );
    return result;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  /**
   * Host facts merged with what the engine itself knows: quests the player
   * completed and choices recorded in their instances.
   */
  private buildSnapshot(playerId: PlayerId): FactSnapshot {
    const base = this.facts.getSnapshot(playerId);
    const completedQuests = new Set(base.completedQuests);
    const choices: Record<QuestId, Record<ChoiceId, string>> = {};
    for (const [questId, recorded] of Object.entries(base.choices)) {
      choices[questId] = { ...recorded };
    }

    const instances = [
      ...this.store.getHistory(playerId),
      ...this.store.list(playerId),
    ];
    for (const instance of instances) {
      if (instance.status === QuestStatus.COMPLETED) {
        completedQuests.add(instance.questId);
      }
      if (Object.keys(instance.choices).length > 0) {
        choices[instance.questId] = {
          ...choices[instance.questId],
          ...instance.choices,
        };
      }
    }

    return { ...base, completedQuests, choices };
  }

  private checkAvailability(
    playerId: PlayerId,
    definition: QuestDefinition,
    snapshot: FactSnapshot,
  ): boolean {
    const existing = this.store.get(playerId, definition.id);
    if (existing?.status === QuestStatus.ACTIVE) return false;
    if (existing && isTerminalStatus(existing.status) && !definition.repeatable) {
      return false;
    }
    return this.evaluator.evaluateAll(definition.prerequisites, snapshot);
  }

  /**
   * Shared guard of offer and accept, in the order the errors take priority.
   */
  private checkStartable<T>(
    playerId: PlayerId,
    definition: QuestDefinition,
    existing: QuestInstance | undefined,
  ): QuestResult<T> | undefined {
    if (existing?.status === QuestStatus.ACTIVE) {
      return this.reject(
        QuestErrorCode.ALREADY_ACTIVE,
        `Quest ${definition.id} is already active`,
        playerId,
        definition.id,
      );
    }
    if (existing && isTerminalStatus(existing.status) && !definition.repeatable) {
      return this.terminal(existing);
    }
    const snapshot = this.buildSnapshot(playerId);
    if (!this.evaluator.evaluateAll(definition.prerequisites, snapshot)) {
      return this.reject(
        QuestErrorCode.NOT_AVAILABLE,
        `Prerequisites of quest ${definition.id} are not met`,
        playerId,
        definition.id,
        {
          unmet: this.evaluator.unmetConditions(
            definition.prerequisites,
            snapshot,
          ),
        },
      );
    }
    return undefined;
  }

  /**
   * Announces quests that became available and withdraws announcements of
   * quests that no longer are. Returns the newly announced quest ids.
   */
  private sweepAvailability(
    playerId: PlayerId,
    candidates: readonly QuestDefinition[],
  ): QuestId[] {
    const snapshot = this.buildSnapshot(playerId);
    const now = this.clock();
    const announced: QuestId[] = [];

    for (const definition of candidates) {
      const available = this.checkAvailability(playerId, definition, snapshot);
      const wasAnnounced = this.store.isAnnounced(playerId, definition.id);
      if (available && !wasAnnounced) {
        this.store.setAnnounced(playerId, definition.id, true);
        this.bus.queueEvent({
          type: QuestLifecycleEventType.QUEST_AVAILABLE,
          playerId,
          questId: definition.id,
          timestamp: now,
        });
        announced.push(definition.id);
      } else if (!available && wasAnnounced) {
        this.store.setAnnounced(playerId, definition.id, false);
      }
    }
    return announced;
  }

  private sweepDependents(playerId: PlayerId, questIds: Set<QuestId>): void {
    if (questIds.size === 0) return;
    const candidates = new Set<QuestDefinition>();
    for (const questId of questIds) {
      for (const dependent of this.registry.getDependents(questId)) {
        candidates.add(dependent);
      }
      // A repeatable quest becomes available again once it completes.
      const definition = this.registry.get(questId);
      if (definition?.repeatable) candidates.add(definition);
    }
    this.sweepAvailability(playerId, Array.from(candidates));
  }

  /**
   * Stores the advanced instance and queues its events. Returns true when the
   * change can affect availability of other quests (a choice or completion).
   */
  private commitDelta(instance: QuestInstance, delta: ObjectiveDelta): boolean {
    const definition = this.registry.get(instance.questId);
    if (!definition) return false;

    const now = this.clock();
    const { playerId, questId } = instance;
    const next = cloneInstance(instance);
    next.progress[delta.objectiveIndex] = delta.progress;

    this.bus.queueEvent({
      type: QuestLifecycleEventType.QUEST_OBJECTIVE_PROGRESSED,
      playerId,
      questId,
      timestamp: now,
      objectiveIndex: delta.objectiveIndex,
      progress: delta.progress,
      required: delta.required,
    });

    if (delta.choice) {
      const { choiceId, option } = delta.choice;
      next.choices[choiceId] = option;
      const followUpQuestId = this.registry.getFollowUp(questId, option);
      this.bus.queueEvent({
        type: QuestLifecycleEventType.QUEST_CHOICE_MADE,
        playerId,
        questId,
        timestamp: now,
        choiceId,
        option,
        ...(followUpQuestId !== undefined ? { followUpQuestId } : {}),
      });
    }

    let completed = false;
    if (delta.satisfied) {
      next.currentObjectiveIndex = delta.objectiveIndex + 1;
      if (next.currentObjectiveIndex === definition.objectives.length) {
        completed = true;
        next.status = QuestStatus.COMPLETED;
        next.completedAt = now;
      }
    }

    this.store.save(next);

    if (completed) {
      this.store.addPendingReward(playerId, {
        questId,
        rewards: definition.rewards,
        completedAt: now,
      });
      this.bus.queueEvent({
        type: QuestLifecycleEventType.QUEST_COMPLETED,
        playerId,
        questId,
        timestamp: now,
        rewards: definition.rewards,
      });
      logger.playerLog(
        LogLevel.INFO,
        LogCategory.QUESTS,
        playerId,
        `Quest completed: ${definition.name}`,
        { questId },
      );
    } else {
      logger.debug(
        `Objective ${delta.objectiveIndex} of ${questId}: ${delta.progress}/${delta.required}`,
        LogCategory.QUESTS,
        { playerId, questId },
      );
    }

    return completed || delta.choice !== undefined;
  }

  private commitFailure(instance: QuestInstance, reason: string): QuestInstance {
    const now = this.clock();
    const failed: QuestInstance = {
      ...cloneInstance(instance),
      status: QuestStatus.FAILED,
      endedAt: now,
      failureReason: reason,
    };
    this.store.save(failed);
    this.bus.queueEvent({
      type: QuestLifecycleEventType.QUEST_FAILED,
      playerId: instance.playerId,
      questId: instance.questId,
      timestamp: now,
      reason,
    });
    logger.playerLog(
      LogLevel.INFO,
      LogCategory.QUESTS,
      instance.playerId,
      `Quest failed: ${instance.questId}`,
      { questId: instance.questId, reason },
    );
    return failed;
  }

  private freshInstance(
    playerId: PlayerId,
    definition: QuestDefinition,
  ): QuestInstance {
    return {
      questId: definition.id,
      playerId,
      status: QuestStatus.AVAILABLE,
      currentObjectiveIndex: 0,
      progress: definition.objectives.map(() => 0),
      choices: {},
    };
  }

  private notFound<T>(questId: QuestId): QuestResult<T> {
    return fail(QuestErrorCode.NOT_FOUND, `Unknown quest ${questId}`, {
      questId,
    });
  }

  private terminal<T>(instance: QuestInstance): QuestResult<T> {
    return this.reject(
      QuestErrorCode.INSTANCE_TERMINAL,
      `Quest ${instance.questId} is already ${instance.status}`,
      instance.playerId,
      instance.questId,
    );
  }

  private reject<T>(
    code: QuestErrorCode,
    message: string,
    playerId: PlayerId,
    questId: QuestId,
    details: Record<string, unknown> = {},
  ): QuestResult<T> {
    logger.debug(message, LogCategory.QUESTS, { playerId, questId, code });
    return fail(code, message, { playerId, questId, ...details });
  }
}
