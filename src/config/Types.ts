/**
 * Dependency injection type symbols.
 *
 * Used by the Inversify container to identify and resolve dependencies.
 * Each symbol represents a unique service or component of the quest engine.
 *
 * @module config
 */
export const TYPES = {
  QuestEngineConfig: Symbol.for("QuestEngineConfig"),
  QuestDefinitions: Symbol.for("QuestDefinitions"),
  FactProvider: Symbol.for("FactProvider"),
  Clock: Symbol.for("Clock"),

  ConditionEvaluator: Symbol.for("ConditionEvaluator"),
  QuestDefinitionRegistry: Symbol.for("QuestDefinitionRegistry"),
  QuestInstanceStore: Symbol.for("QuestInstanceStore"),
  ObjectiveTracker: Symbol.for("ObjectiveTracker"),
  LifecycleEventBus: Symbol.for("LifecycleEventBus"),
  QuestEngine: Symbol.for("QuestEngine"),
  EventDispatcher: Symbol.for("EventDispatcher"),
};
