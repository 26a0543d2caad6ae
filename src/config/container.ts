import "reflect-metadata";
import { Container } from "inversify";
import { TYPES } from "./Types";
import { CONFIG, type QuestEngineConfig } from "./config";
import { systemClock, type Clock } from "../shared/Clock";
import { LifecycleEventBus } from "../domain/quests/core/LifecycleEventBus";
import { ConditionEvaluator } from "../domain/quests/systems/ConditionEvaluator";
import { QuestDefinitionRegistry } from "../domain/quests/systems/QuestDefinitionRegistry";
import { QuestInstanceStore } from "../domain/quests/systems/QuestInstanceStore";
import { ObjectiveTracker } from "../domain/quests/systems/ObjectiveTracker";
import { QuestEngine } from "../domain/quests/systems/QuestEngine";
import { EventDispatcher } from "../domain/quests/systems/EventDispatcher";
import {
  InMemoryFactProvider,
  type FactProvider,
} from "../domain/quests/systems/FactProvider";
import {
  defaultQuestCatalog,
  loadQuestCatalog,
} from "../domain/quests/systems/QuestCatalogLoader";

/**
 * Dependency injection container configuration.
 *
 * Every quest component is registered as a singleton, so one container holds
 * exactly one engine and its state. Hosts running several independent
 * engines build one container each.
 *
 * @module config
 */

export interface QuestContainerOptions {
  /** Raw catalog; defaults to QUEST_CATALOG_PATH or the bundled catalog */
  definitions?: readonly unknown[];
  factProvider?: FactProvider;
  clock?: Clock;
  config?: Partial<QuestEngineConfig>;
}

export function createQuestContainer(
  options: QuestContainerOptions = {},
): Container {
  const config: QuestEngineConfig = Object.freeze({
    ...CONFIG,
    ...options.config,
  });
  const definitions =
    options.definitions ??
    (config.QUEST_CATALOG_PATH
      ? loadQuestCatalog(config.QUEST_CATALOG_PATH)
      : defaultQuestCatalog());

  const container = new Container();

  container
    .bind<QuestEngineConfig>(TYPES.QuestEngineConfig)
    .toConstantValue(config);
  container
    .bind<readonly unknown[]>(TYPES.QuestDefinitions)
    .toConstantValue(definitions);
  container
    .bind<FactProvider>(TYPES.FactProvider)
    .toConstantValue(options.factProvider ?? new InMemoryFactProvider());
  container.bind<Clock>(TYPES.Clock).toConstantValue(options.clock ?? systemClock);
  container
    .bind<LifecycleEventBus>(TYPES.LifecycleEventBus)
    .toConstantValue(new LifecycleEventBus());

  container
    .bind<ConditionEvaluator>(TYPES.ConditionEvaluator)
    .to(ConditionEvaluator)
    .inSingletonScope();
  container
    .bind<QuestDefinitionRegistry>(TYPES.QuestDefinitionRegistry)
    .to(QuestDefinitionRegistry)
    .inSingletonScope();
  container
    .bind<QuestInstanceStore>(TYPES.QuestInstanceStore)
    .to(QuestInstanceStore)
    .inSingletonScope();
  container
    .bind<ObjectiveTracker>(TYPES.ObjectiveTracker)
    .to(ObjectiveTracker)
    .inSingletonScope();
  container
    .bind<QuestEngine>(TYPES.QuestEngine)
    .to(QuestEngine)
    .inSingletonScope();
  container
    .bind<EventDispatcher>(TYPES.EventDispatcher)
    .to(EventDispatcher)
    .inSingletonScope();

  return container;
}
