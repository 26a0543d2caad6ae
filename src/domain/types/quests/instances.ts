import type { QuestStatus } from "../../../shared/constants/QuestEnums";
import type { QuestRewards } from "./definitions";
import type { ChoiceId, PlayerId, QuestId } from "./identifiers";

/**
 * A player's progress record against one quest definition.
 * Only the QuestEngine writes instances.
 */
export interface QuestInstance {
  questId: QuestId;
  playerId: PlayerId;
  status: QuestStatus;
  currentObjectiveIndex: number;
  /** One counter per objective of the definition */
  progress: number[];
  choices: Record<ChoiceId, string>;
  offeredAt?: number;
  acceptedAt?: number;
  completedAt?: number;
  /** Set when the instance failed or was abandoned */
  endedAt?: number;
  failureReason?: string;
}

export type QuestInstanceSnapshot = Readonly<
  Omit<QuestInstance, "progress" | "choices">
> & {
  readonly progress: readonly number[];
  readonly choices: Readonly<Record<ChoiceId, string>>;
};

export interface PendingReward {
  questId: QuestId;
  rewards: QuestRewards;
  completedAt: number;
}

/**
 * Change reported by the ObjectiveTracker for the current objective.
 */
export interface ObjectiveDelta {
  objectiveIndex: number;
  previousProgress: number;
  progress: number;
  required: number;
  /** True when this change reached the required count */
  satisfied: boolean;
  choice?: { choiceId: ChoiceId; option: string };
}

export const PLAYER_STATE_VERSION = 1;

/**
 * Serializable export of every instance a player owns.
 */
export interface PlayerQuestState {
  version: typeof PLAYER_STATE_VERSION;
  playerId: PlayerId;
  instances: QuestInstance[];
  history: QuestInstance[];
  pendingRewards: PendingReward[];
}
