import "dotenv/config";
import { z } from "zod";
import { QuestConfigurationError } from "../domain/quests/core/errors";
import { formatIssues } from "../domain/quests/core/schema";

/**
 * Engine configuration loaded from environment variables.
 *
 * @module config
 */

const unsetWhenEmpty = (value: unknown): unknown =>
  value === "" ? undefined : value;

const envSchema = z.object({
  MAX_ACTIVE_QUESTS: z.preprocess(
    unsetWhenEmpty,
    z.coerce.number().int().positive().default(5),
  ),
  EVENT_QUEUE_CAPACITY: z.preprocess(
    unsetWhenEmpty,
    z.coerce.number().int().positive().default(256),
  ),
  QUEST_CATALOG_PATH: z.preprocess(unsetWhenEmpty, z.string().optional()),
});

/**
 * @property MAX_ACTIVE_QUESTS - Active instances a player may hold at once (default: 5)
 * @property EVENT_QUEUE_CAPACITY - Pending gameplay events kept per player (default: 256)
 * @property QUEST_CATALOG_PATH - JSON catalog loaded instead of the bundled one
 */
export type QuestEngineConfig = Readonly<z.infer<typeof envSchema>>;

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): QuestEngineConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new QuestConfigurationError(
      "Invalid environment configuration",
      formatIssues(parsed.error),
    );
  }
  return Object.freeze(parsed.data);
}

export const CONFIG = loadConfig(process.env);
