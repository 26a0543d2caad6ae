import { injectable, inject } from "inversify";
import { TYPES } from "../../../config/Types";
import { GameplayEventType } from "../../../shared/constants/EventEnums";
import {
  ObjectiveKind,
  QuestStatus,
} from "../../../shared/constants/QuestEnums";
import type { ObjectiveTemplate } from "../../types/quests/definitions";
import type { GameplayEvent } from "../../types/quests/events";
import type {
  ObjectiveDelta,
  QuestInstanceSnapshot,
} from "../../types/quests/instances";
import type { QuestDefinitionRegistry } from "./QuestDefinitionRegistry";

interface ObjectiveMatch {
  increment: number;
  choice?: { choiceId: string; option: string };
}

/**
 * Matches a gameplay event against the current objective of an instance.
 *
 * Only the current objective can advance: events for later objectives are
 * dropped, not buffered. The tracker never mutates the instance; the engine
 * commits the returned delta.
 */
@injectable()
export class ObjectiveTracker {
  constructor(
    @inject(TYPES.QuestDefinitionRegistry)
    private readonly registry: QuestDefinitionRegistry,
  ) {}

  public apply(
    instance: QuestInstanceSnapshot,
    event: GameplayEvent,
  ): ObjectiveDelta | null {
    if (instance.status !== QuestStatus.ACTIVE) return null;

    const definition = this.registry.get(instance.questId);
    const objective = definition?.objectives[instance.currentObjectiveIndex];
    if (!objective) return null;

    const match = this.match(objective, event);
    if (!match) return null;

    const index = instance.currentObjectiveIndex;
    const previousProgress = instance.progress[index] ?? 0;
    const required = objective.requiredCount;
    // Already at the cap: a repeated event changes nothing.
    if (previousProgress >= required) return null;

    const progress = Math.min(required, previousProgress + match.increment);
    return {
      objectiveIndex: index,
      previousProgress,
      progress,
      required,
      satisfied: progress >= required,
      choice: match.choice,
    };
  }

  private match(
    objective: ObjectiveTemplate,
    event: GameplayEvent,
  ): ObjectiveMatch | null {
    switch (event.type) {
      case GameplayEventType.INTERACTED:
        if (
          (objective.kind === ObjectiveKind.TALK_TO_NPC ||
            objective.kind === ObjectiveKind.RETURN_TO_NPC) &&
          objective.target === event.npcId
        ) {
          return { increment: 1 };
        }
        return null;

      case GameplayEventType.ITEM_COLLECTED:
        if (
          objective.kind === ObjectiveKind.COLLECT_ITEM &&
          objective.target === event.itemId &&
          Number.isInteger(event.quantity) &&
          event.quantity > 0
        ) {
          return { increment: event.quantity };
        }
        return null;

      case GameplayEventType.CHOICE_MADE:
        if (
          objective.kind === ObjectiveKind.MAKE_CHOICE &&
          objective.target === event.choiceId &&
          (objective.options === undefined ||
            objective.options.includes(event.option))
        ) {
          return {
            increment: 1,
            choice: { choiceId: event.choiceId, option: event.option },
          };
        }
        return null;

      case GameplayEventType.PLAYER_JOINED:
        return null;
    }
  }
}
