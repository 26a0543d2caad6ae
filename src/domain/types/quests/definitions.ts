import type { ObjectiveKind } from "../../../shared/constants/QuestEnums";
import type { Condition } from "./conditions";
import type { QuestId } from "./identifiers";

export interface ObjectiveTemplate {
  readonly kind: ObjectiveKind;
  /** npc id, item id or choice id depending on kind */
  readonly target: string;
  readonly requiredCount: number;
  readonly description?: string;
  /** Allowed options of a make-choice objective; any option when absent */
  readonly options?: readonly string[];
}

/** reward key -> amount */
export type QuestRewards = Readonly<Record<string, number>>;

export interface QuestDefinition {
  readonly id: QuestId;
  readonly name: string;
  readonly description: string;
  readonly objectives: readonly ObjectiveTemplate[];
  /** All must hold for the quest to be available */
  readonly prerequisites: readonly Condition[];
  readonly rewards: QuestRewards;
  /** Opaque reference to the quest giver */
  readonly giverId?: string;
  /** choice option -> follow-up quest id */
  readonly branches?: Readonly<Record<string, QuestId>>;
  readonly timeLimitMs?: number;
  readonly repeatable?: boolean;
  readonly tags?: readonly string[];
}
