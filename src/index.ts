import "reflect-metadata";

export { TYPES } from "./config/Types";
export { CONFIG, loadConfig, type QuestEngineConfig } from "./config/config";
export {
  createQuestContainer,
  type QuestContainerOptions,
} from "./config/container";

export { logger, Logger, createDefaultLoggerConfig } from "./infrastructure/utils/logger";
export type { LogEntry, LogFilter, LogMetrics, LoggerConfig } from "./infrastructure/utils/logger";
export { LogLevel, LogCategory } from "./shared/constants/LogEnums";

export { systemClock, createManualClock, type Clock } from "./shared/Clock";
export * from "./shared/constants/QuestEnums";
export * from "./shared/constants/EventEnums";
export * from "./domain/types/quests";

export {
  QuestError,
  QuestConfigurationError,
  ok,
  fail,
  type QuestResult,
} from "./domain/quests/core/errors";
export {
  LifecycleEventBus,
  type LifecycleHandler,
} from "./domain/quests/core/LifecycleEventBus";
export {
  questDefinitionSchema,
  questCatalogSchema,
  gameplayEventSchema,
  playerQuestStateSchema,
  type QuestDefinitionInput,
} from "./domain/quests/core/schema";

export { ConditionEvaluator } from "./domain/quests/systems/ConditionEvaluator";
export { QuestDefinitionRegistry } from "./domain/quests/systems/QuestDefinitionRegistry";
export { QuestInstanceStore } from "./domain/quests/systems/QuestInstanceStore";
export { ObjectiveTracker } from "./domain/quests/systems/ObjectiveTracker";
export { QuestEngine } from "./domain/quests/systems/QuestEngine";
export {
  EventDispatcher,
  type DispatcherStats,
} from "./domain/quests/systems/EventDispatcher";
export {
  InMemoryFactProvider,
  type FactProvider,
} from "./domain/quests/systems/FactProvider";
export { validatePlayerState } from "./domain/quests/systems/QuestStateValidator";
export {
  loadQuestCatalog,
  defaultQuestCatalog,
} from "./domain/quests/systems/QuestCatalogLoader";
