import type {
  GameplayEventType,
  QuestLifecycleEventType,
} from "../../../shared/constants/EventEnums";
import type { QuestStatus } from "../../../shared/constants/QuestEnums";
import type { QuestRewards } from "./definitions";
import type { ChoiceId, ItemId, NpcId, PlayerId, QuestId } from "./identifiers";

export interface InteractedEvent {
  type: GameplayEventType.INTERACTED;
  npcId: NpcId;
}

export interface ItemCollectedEvent {
  type: GameplayEventType.ITEM_COLLECTED;
  itemId: ItemId;
  quantity: number;
}

export interface ChoiceMadeEvent {
  type: GameplayEventType.CHOICE_MADE;
  choiceId: ChoiceId;
  option: string;
}

export interface PlayerJoinedEvent {
  type: GameplayEventType.PLAYER_JOINED;
}

export type GameplayEvent =
  | InteractedEvent
  | ItemCollectedEvent
  | ChoiceMadeEvent
  | PlayerJoinedEvent;

interface LifecycleEventBase {
  playerId: PlayerId;
  questId: QuestId;
  timestamp: number;
  /** Monotonic across the bus; assigned when the event is queued */
  sequence: number;
}

export interface QuestAvailableEvent extends LifecycleEventBase {
  type: QuestLifecycleEventType.QUEST_AVAILABLE;
}

export interface QuestAcceptedEvent extends LifecycleEventBase {
  type: QuestLifecycleEventType.QUEST_ACCEPTED;
}

export interface QuestObjectiveProgressedEvent extends LifecycleEventBase {
  type: QuestLifecycleEventType.QUEST_OBJECTIVE_PROGRESSED;
  objectiveIndex: number;
  progress: number;
  required: number;
}

export interface QuestCompletedEvent extends LifecycleEventBase {
  type: QuestLifecycleEventType.QUEST_COMPLETED;
  rewards: QuestRewards;
}

export interface QuestFailedEvent extends LifecycleEventBase {
  type: QuestLifecycleEventType.QUEST_FAILED;
  reason: string;
}

export interface QuestAbandonedEvent extends LifecycleEventBase {
  type: QuestLifecycleEventType.QUEST_ABANDONED;
  previousStatus: QuestStatus;
}

export interface QuestChoiceMadeEvent extends LifecycleEventBase {
  type: QuestLifecycleEventType.QUEST_CHOICE_MADE;
  choiceId: ChoiceId;
  option: string;
  followUpQuestId?: QuestId;
}

export type QuestLifecycleEvent =
  | QuestAvailableEvent
  | QuestAcceptedEvent
  | QuestObjectiveProgressedEvent
  | QuestCompletedEvent
  | QuestFailedEvent
  | QuestAbandonedEvent
  | QuestChoiceMadeEvent;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown
  ? Omit<T, K>
  : never;

/**
 * Lifecycle event before the bus stamps its sequence number.
 */
export type PendingLifecycleEvent = DistributiveOmit<
  QuestLifecycleEvent,
  "sequence"
>;

/**
 * Narrows the lifecycle union to the member carrying the given type.
 */
export type LifecycleEventOf<T extends QuestLifecycleEventType> = Extract<
  QuestLifecycleEvent,
  { type: T }
>;
