import type {
  ConditionKind,
  QuestErrorCode,
} from "../../../shared/constants/QuestEnums";
import type { ChoiceId, QuestId } from "./identifiers";

export type ConditionParameter = string | number | boolean;

export type ConditionParameters = Readonly<Record<string, ConditionParameter>>;

export interface PlayerLevelCondition {
  readonly kind: ConditionKind.PLAYER_LEVEL;
  readonly min: number;
}

export interface QuestCompletedCondition {
  readonly kind: ConditionKind.QUEST_COMPLETED;
  readonly questId: QuestId;
}

export interface QuestChoiceCondition {
  readonly kind: ConditionKind.QUEST_CHOICE;
  readonly questId: QuestId;
  readonly option: string;
}

/**
 * Fallback for condition kinds the engine has no dedicated variant for.
 * Resolved through handlers registered on the ConditionEvaluator.
 */
export interface CustomCondition {
  readonly kind: ConditionKind.CUSTOM;
  readonly customKind: string;
  readonly parameters: ConditionParameters;
}

export type Condition =
  | PlayerLevelCondition
  | QuestCompletedCondition
  | QuestChoiceCondition
  | CustomCondition;

/**
 * Read-only view of player facts consulted by the evaluator.
 * Supplied fresh per evaluation; never mutated by the engine.
 */
export interface FactSnapshot {
  readonly playerLevel: number;
  readonly completedQuests: ReadonlySet<QuestId>;
  /** questId -> (choiceId -> chosen option) */
  readonly choices: Readonly<Record<QuestId, Readonly<Record<ChoiceId, string>>>>;
  /** Free-form facts read by custom condition handlers */
  readonly attributes?: ConditionParameters;
}

export type CustomConditionHandler = (
  parameters: ConditionParameters,
  snapshot: FactSnapshot,
) => boolean;

export interface ConditionDiagnostic {
  code: QuestErrorCode.UNKNOWN_CONDITION_KIND;
  customKind: string;
  message: string;
  timestamp: number;
}
