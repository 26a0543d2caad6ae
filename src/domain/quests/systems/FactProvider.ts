import type {
  ConditionParameter,
  FactSnapshot,
} from "../../types/quests/conditions";
import type { ChoiceId, PlayerId, QuestId } from "../../types/quests/identifiers";

/**
 * Host hook returning the current facts of a player.
 */
export interface FactProvider {
  getSnapshot(playerId: PlayerId): FactSnapshot;
}

interface PlayerFacts {
  level: number;
  completedQuests: Set<QuestId>;
  choices: Map<QuestId, Map<ChoiceId, string>>;
  attributes: Map<string, ConditionParameter>;
}

/**
 * Mutable fact store for hosts without their own game state, and for tests.
 * Every snapshot is a fresh copy.
 */
export class InMemoryFactProvider implements FactProvider {
  private facts = new Map<PlayerId, PlayerFacts>();

  constructor(private readonly defaultLevel = 1) {}

  private entry(playerId: PlayerId): PlayerFacts {
    let facts = this.facts.get(playerId);
    if (!facts) {
      facts = {
        level: this.defaultLevel,
        completedQuests: new Set(),
        choices: new Map(),
        attributes: new Map(),
      };
      this.facts.set(playerId, facts);
    }
    return facts;
  }

  public setLevel(playerId: PlayerId, level: number): this {
    this.entry(playerId).level = level;
    return this;
  }

  public markCompleted(playerId: PlayerId, questId: QuestId): this {
    this.entry(playerId).completedQuests.add(questId);
    return this;
  }

  public recordChoice(
    playerId: PlayerId,
    questId: QuestId,
    choiceId: ChoiceId,
    option: string,
  ): this {
    const choices = this.entry(playerId).choices;
    const perQuest = choices.get(questId) ?? new Map<ChoiceId, string>();
    perQuest.set(choiceId, option);
    choices.set(questId, perQuest);
    return this;
  }

  public setAttribute(
    playerId: PlayerId,
    key: string,
    value: ConditionParameter,
  ): this {
    this.entry(playerId).attributes.set(key, value);
    return this;
  }

  public getSnapshot(playerId: PlayerId): FactSnapshot {
    const facts = this.entry(playerId);
    const choices: Record<QuestId, Record<ChoiceId, string>> = {};
    for (const [questId, perQuest] of facts.choices) {
      choices[questId] = Object.fromEntries(perQuest);
    }
    return {
      playerLevel: facts.level,
      completedQuests: new Set(facts.completedQuests),
      choices,
      attributes: Object.fromEntries(facts.attributes),
    };
  }
}
