export type PlayerId = string;
export type QuestId = string;
export type NpcId = string;
export type ItemId = string;
export type ChoiceId = string;
