import { z } from "zod";
import {
  ConditionKind,
  ObjectiveKind,
  QuestStatus,
} from "../../../shared/constants/QuestEnums";
import { GameplayEventType } from "../../../shared/constants/EventEnums";
import { PLAYER_STATE_VERSION } from "../../types/quests/instances";

/**
 * zod schemas for everything that enters the engine from outside:
 * catalogs, gameplay events and restored player state.
 */

const conditionParameterSchema = z.union([z.string(), z.number(), z.boolean()]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isConditionKind(value: string): value is ConditionKind {
  return Object.values(ConditionKind).some((kind) => kind === value);
}

/**
 * Kinds the catalog declares but the engine has no variant for are kept as
 * custom conditions, so they evaluate to false instead of rejecting the catalog.
 */
function normalizeForwardDeclaredCondition(value: unknown): unknown {
  if (!isRecord(value) || typeof value.kind !== "string") return value;
  if (isConditionKind(value.kind)) return value;

  const { kind, ...rest } = value;
  const parameters: Record<string, unknown> = {};
  for (const [key, param] of Object.entries(rest)) {
    if (conditionParameterSchema.safeParse(param).success) {
      parameters[key] = param;
    }
  }
  return { kind: ConditionKind.CUSTOM, customKind: kind, parameters };
}

export const conditionSchema = z.preprocess(
  normalizeForwardDeclaredCondition,
  z.discriminatedUnion("kind", [
    z
      .object({
        kind: z.literal(ConditionKind.PLAYER_LEVEL),
        min: z.number().int().nonnegative(),
      })
      .strict(),
    z
      .object({
        kind: z.literal(ConditionKind.QUEST_COMPLETED),
        questId: z.string().min(1),
      })
      .strict(),
    z
      .object({
        kind: z.literal(ConditionKind.QUEST_CHOICE),
        questId: z.string().min(1),
        option: z.string().min(1),
      })
      .strict(),
    z
      .object({
        kind: z.literal(ConditionKind.CUSTOM),
        customKind: z.string().min(1),
        parameters: z.record(conditionParameterSchema).default({}),
      })
      .strict(),
  ]),
);

export const objectiveTemplateSchema = z
  .object({
    kind: z.nativeEnum(ObjectiveKind),
    target: z.string().min(1),
    requiredCount: z.number().int().positive().default(1),
    description: z.string().optional(),
    options: z.array(z.string().min(1)).min(1).optional(),
  })
  .strict();

export const questDefinitionSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1),
    description: z.string().default(""),
    objectives: z.array(objectiveTemplateSchema).min(1),
    prerequisites: z.array(conditionSchema).default([]),
    rewards: z.record(z.number().nonnegative()).default({}),
    giverId: z.string().min(1).optional(),
    branches: z.record(z.string().min(1)).optional(),
    timeLimitMs: z.number().int().positive().optional(),
    repeatable: z.boolean().optional(),
    tags: z.array(z.string()).optional(),
  })
  .strict();

export const questCatalogSchema = z.array(questDefinitionSchema);

export type QuestDefinitionInput = z.input<typeof questDefinitionSchema>;

export const gameplayEventSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal(GameplayEventType.INTERACTED),
    npcId: z.string().min(1),
  }),
  z.object({
    type: z.literal(GameplayEventType.ITEM_COLLECTED),
    itemId: z.string().min(1),
    quantity: z.number().int().positive().default(1),
  }),
  z.object({
    type: z.literal(GameplayEventType.CHOICE_MADE),
    choiceId: z.string().min(1),
    option: z.string().min(1),
  }),
  z.object({
    type: z.literal(GameplayEventType.PLAYER_JOINED),
  }),
]);

const timestampSchema = z.number().finite().nonnegative();

export const questInstanceSchema = z.object({
  questId: z.string().min(1),
  playerId: z.string().min(1),
  status: z.nativeEnum(QuestStatus),
  currentObjectiveIndex: z.number().int().nonnegative(),
  progress: z.array(z.number().int().nonnegative()),
  choices: z.record(z.string()),
  offeredAt: timestampSchema.optional(),
  acceptedAt: timestampSchema.optional(),
  completedAt: timestampSchema.optional(),
  endedAt: timestampSchema.optional(),
  failureReason: z.string().optional(),
});

export const pendingRewardSchema = z.object({
  questId: z.string().min(1),
  rewards: z.record(z.number()),
  completedAt: timestampSchema,
});

export const playerQuestStateSchema = z.object({
  version: z.literal(PLAYER_STATE_VERSION),
  playerId: z.string().min(1),
  instances: z.array(questInstanceSchema),
  history: z.array(questInstanceSchema).default([]),
  pendingRewards: z.array(pendingRewardSchema).default([]),
});

/**
 * Flattens zod issues into "path: message" lines.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(
    (issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`,
  );
}
