import * as fs from "fs";
import * as path from "path";
import bundledCatalog from "../../data/quests.json";
import { logger } from "../../../infrastructure/utils/logger";
import { LogCategory } from "../../../shared/constants/LogEnums";
import { QuestConfigurationError } from "../core/errors";

/**
 * Reads a JSON quest catalog from disk. The content is validated by the
 * QuestDefinitionRegistry, not here.
 */
export function loadQuestCatalog(filePath: string): unknown[] {
  const resolved = path.resolve(filePath);

  let raw: string;
  try {
    raw = fs.readFileSync(resolved, "utf-8");
  } catch (error) {
    throw new QuestConfigurationError(`Cannot read quest catalog ${resolved}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new QuestConfigurationError(`Quest catalog ${resolved} is not valid JSON`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  if (!Array.isArray(parsed)) {
    throw new QuestConfigurationError(`Quest catalog ${resolved} is invalid`, [
      "<root>: expected an array of quest definitions",
    ]);
  }

  logger.debug(`Read quest catalog from ${resolved}`, LogCategory.CONFIG);
  return parsed;
}

/**
 * Sample catalog shipped with the engine.
 */
export function defaultQuestCatalog(): unknown[] {
  return structuredClone(bundledCatalog);
}
