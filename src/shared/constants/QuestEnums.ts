/**
 * Quest enumerations shared by the engine, its collaborators and the tests.
 *
 * @module constants/QuestEnums
 */

/**
 * Enumeration of quest instance statuses.
 *
 * `Locked` has no member: a locked quest is one for which no instance exists
 * and whose prerequisites do not hold.
 */
export enum QuestStatus {
  AVAILABLE = "available",
  ACTIVE = "active",
  COMPLETED = "completed",
  FAILED = "failed",
  ABANDONED = "abandoned",
}

/**
 * Enumeration of objective kinds a quest definition can declare.
 */
export enum ObjectiveKind {
  TALK_TO_NPC = "talk_to_npc",
  COLLECT_ITEM = "collect_item",
  RETURN_TO_NPC = "return_to_npc",
  MAKE_CHOICE = "make_choice",
}

/**
 * Enumeration of prerequisite condition kinds.
 */
export enum ConditionKind {
  PLAYER_LEVEL = "player_level",
  QUEST_COMPLETED = "quest_completed",
  QUEST_CHOICE = "quest_choice",
  CUSTOM = "custom",
}

/**
 * Error codes returned by engine operations.
 */
export enum QuestErrorCode {
  NOT_FOUND = "not_found",
  NOT_AVAILABLE = "not_available",
  ALREADY_ACTIVE = "already_active",
  INSTANCE_TERMINAL = "instance_terminal",
  CAPACITY_EXCEEDED = "capacity_exceeded",
  CORRUPT_SNAPSHOT = "corrupt_snapshot",
  UNKNOWN_CONDITION_KIND = "unknown_condition_kind",
  INVALID_TRANSITION = "invalid_transition",
}

/**
 * Reasons recorded on failed instances by the engine itself.
 * Hosts may pass any other string to `failQuest`.
 */
export enum QuestFailureReason {
  TIMEOUT = "timeout",
  OBJECTIVE_UNSATISFIABLE = "objective_unsatisfiable",
}

/**
 * Built-in custom condition kinds registered by the evaluator.
 */
export enum BuiltinCustomCondition {
  ATTRIBUTE_AT_LEAST = "attribute_at_least",
}

/**
 * Statuses from which no further transition is permitted.
 */
export const TERMINAL_QUEST_STATUSES: readonly QuestStatus[] = [
  QuestStatus.COMPLETED,
  QuestStatus.FAILED,
  QuestStatus.ABANDONED,
];

/**
 * Array of all quest statuses for iteration.
 */
export const ALL_QUEST_STATUSES: readonly QuestStatus[] =
  Object.values(QuestStatus);

export function isTerminalStatus(status: QuestStatus): boolean {
  return TERMINAL_QUEST_STATUSES.includes(status);
}

/**
 * Type guard to check if a string is a valid QuestStatus.
 */
export function isQuestStatus(value: string): value is QuestStatus {
  return ALL_QUEST_STATUSES.some((status) => status === value);
}
