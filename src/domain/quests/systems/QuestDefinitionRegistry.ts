import { injectable, inject } from "inversify";
import { TYPES } from "../../../config/Types";
import { logger } from "../../../infrastructure/utils/logger";
import { LogCategory } from "../../../shared/constants/LogEnums";
import {
  ConditionKind,
  ObjectiveKind,
} from "../../../shared/constants/QuestEnums";
import type { Condition } from "../../types/quests/conditions";
import type { QuestDefinition } from "../../types/quests/definitions";
import type { QuestId } from "../../types/quests/identifiers";
import { QuestConfigurationError } from "../core/errors";
import { formatIssues, questCatalogSchema } from "../core/schema";

function referencedQuest(condition: Condition): QuestId | undefined {
  switch (condition.kind) {
    case ConditionKind.QUEST_COMPLETED:
    case ConditionKind.QUEST_CHOICE:
      return condition.questId;
    default:
      return undefined;
  }
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/**
 * Cross-reference checks the schema cannot express.
 */
function collectCatalogIssues(definitions: readonly QuestDefinition[]): string[] {
  const issues: string[] = [];
  const ids = new Set<QuestId>();

  for (const definition of definitions) {
    if (ids.has(definition.id)) {
      issues.push(`${definition.id}: duplicate quest id`);
    }
    ids.add(definition.id);
  }

  for (const definition of definitions) {
    const { id } = definition;

    definition.objectives.forEach((objective, index) => {
      if (objective.kind === ObjectiveKind.MAKE_CHOICE) {
        if (objective.requiredCount !== 1) {
          issues.push(`${id}.objectives.${index}: make_choice objectives require a count of 1`);
        }
      } else if (objective.options !== undefined) {
        issues.push(`${id}.objectives.${index}: options are only allowed on make_choice objectives`);
      }
    });

    definition.prerequisites.forEach((condition, index) => {
      const target = referencedQuest(condition);
      if (target === undefined) return;
      if (target === id) {
        issues.push(`${id}.prerequisites.${index}: quest cannot require itself`);
      } else if (!ids.has(target)) {
        issues.push(`${id}.prerequisites.${index}: unknown quest "${target}"`);
      }
    });

    const declaredOptions = definition.objectives.flatMap((objective) =>
      objective.kind === ObjectiveKind.MAKE_CHOICE ? (objective.options ?? []) : [],
    );
    const hasOpenChoice = definition.objectives.some(
      (objective) =>
        objective.kind === ObjectiveKind.MAKE_CHOICE && objective.options === undefined,
    );

    for (const [option, followUp] of Object.entries(definition.branches ?? {})) {
      if (!ids.has(followUp)) {
        issues.push(`${id}.branches.${option}: unknown follow-up quest "${followUp}"`);
      }
      if (followUp === id) {
        issues.push(`${id}.branches.${option}: quest cannot branch into itself`);
      }
      if (!hasOpenChoice && !declaredOptions.includes(option)) {
        issues.push(`${id}.branches.${option}: no make_choice objective offers this option`);
      }
    }
  }

  return issues;
}

/**
 * Returns the quest ids of one prerequisite cycle, or undefined.
 */
function findPrerequisiteCycle(
  definitions: ReadonlyMap<QuestId, QuestDefinition>,
): QuestId[] | undefined {
  const visiting = new Set<QuestId>();
  const done = new Set<QuestId>();
  const path: QuestId[] = [];

  const visit = (id: QuestId): QuestId[] | undefined => {
    if (done.has(id)) return undefined;
    if (visiting.has(id)) return [...path.slice(path.indexOf(id)), id];

    visiting.add(id);
    path.push(id);
    for (const condition of definitions.get(id)?.prerequisites ?? []) {
      const target = referencedQuest(condition);
      if (target === undefined || !definitions.has(target)) continue;
      const cycle = visit(target);
      if (cycle) return cycle;
    }
    path.pop();
    visiting.delete(id);
    done.add(id);
    return undefined;
  };

  for (const id of definitions.keys()) {
    const cycle = visit(id);
    if (cycle) return cycle;
  }
  return undefined;
}

/**
 * Immutable catalog of quest definitions, validated at construction.
 *
 * Also indexes, for every quest, the quests whose prerequisites reference it,
 * so the engine can re-evaluate only the quests a transition may unlock.
 */
@injectable()
export class QuestDefinitionRegistry {
  private readonly definitions = new Map<QuestId, QuestDefinition>();
  private readonly dependents = new Map<QuestId, QuestDefinition[]>();

  constructor(@inject(TYPES.QuestDefinitions) catalog: readonly unknown[]) {
    const parsed = questCatalogSchema.safeParse(catalog);
    if (!parsed.success) {
      throw new QuestConfigurationError(
        "Invalid quest catalog",
        formatIssues(parsed.error),
      );
    }

    const issues = collectCatalogIssues(parsed.data);
    if (issues.length > 0) {
      throw new QuestConfigurationError("Invalid quest catalog", issues);
    }

    for (const definition of parsed.data) {
      this.definitions.set(definition.id, deepFreeze(definition));
    }

    const cycle = findPrerequisiteCycle(this.definitions);
    if (cycle) {
      throw new QuestConfigurationError("Invalid quest catalog", [
        `prerequisite cycle: ${cycle.join(" -> ")}`,
      ]);
    }

    for (const definition of this.definitions.values()) {
      for (const condition of definition.prerequisites) {
        const target = referencedQuest(condition);
        if (target === undefined) continue;
        const list = this.dependents.get(target) ?? [];
        if (!list.includes(definition)) list.push(definition);
        this.dependents.set(target, list);
      }
    }

    logger.info(
      `Quest catalog loaded with ${this.definitions.size} definition(s)`,
      LogCategory.CONFIG,
    );
  }

  public get(questId: QuestId): QuestDefinition | undefined {
    return this.definitions.get(questId);
  }

  public has(questId: QuestId): boolean {
    return this.definitions.has(questId);
  }

  public list(): QuestDefinition[] {
    return Array.from(this.definitions.values());
  }

  public get size(): number {
    return this.definitions.size;
  }

  /**
   * Quests whose prerequisites reference the given quest.
   */
  public getDependents(questId: QuestId): readonly QuestDefinition[] {
    return this.dependents.get(questId) ?? [];
  }

  public getFollowUp(questId: QuestId, option: string): QuestId | undefined {
    return this.definitions.get(questId)?.branches?.[option];
  }
}
