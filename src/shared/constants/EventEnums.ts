/**
 * Event type enumerations for the quest event bus.
 *
 * Inbound gameplay events drive objective advancement; outbound lifecycle
 * events describe committed quest transitions.
 *
 * @module constants/EventEnums
 */

export enum GameplayEventType {
  INTERACTED = "interacted",
  ITEM_COLLECTED = "item_collected",
  CHOICE_MADE = "choice_made",
  PLAYER_JOINED = "player_joined",
}

export enum QuestLifecycleEventType {
  QUEST_AVAILABLE = "quest:available",
  QUEST_ACCEPTED = "quest:accepted",
  QUEST_OBJECTIVE_PROGRESSED = "quest:objective_progressed",
  QUEST_COMPLETED = "quest:completed",
  QUEST_FAILED = "quest:failed",
  QUEST_ABANDONED = "quest:abandoned",
  QUEST_CHOICE_MADE = "quest:choice_made",
}

/**
 * Channel on which every lifecycle event is also delivered.
 */
export const ANY_LIFECYCLE_EVENT = "quest:*";

export const ALL_QUEST_LIFECYCLE_EVENT_TYPES: readonly QuestLifecycleEventType[] =
  Object.values(QuestLifecycleEventType);

export const ALL_GAMEPLAY_EVENT_TYPES: readonly GameplayEventType[] =
  Object.values(GameplayEventType);
