import {
  isTerminalStatus,
  ObjectiveKind,
  QuestErrorCode,
  QuestStatus,
} from "../../../shared/constants/QuestEnums";
import type { QuestDefinition } from "../../types/quests/definitions";
import type { PlayerId } from "../../types/quests/identifiers";
import type {
  PlayerQuestState,
  QuestInstance,
} from "../../types/quests/instances";
import { fail, ok, type QuestResult } from "../core/errors";
import { formatIssues, playerQuestStateSchema } from "../core/schema";
import type { QuestDefinitionRegistry } from "./QuestDefinitionRegistry";

function instanceIssues(
  instance: QuestInstance,
  definition: QuestDefinition,
  label: string,
): string[] {
  const issues: string[] = [];
  const { objectives } = definition;
  const index = instance.currentObjectiveIndex;

  if (instance.progress.length !== objectives.length) {
    issues.push(
      `${label}: expected ${objectives.length} progress counters, got ${instance.progress.length}`,
    );
    return issues;
  }

  if (index > objectives.length) {
    issues.push(`${label}: objective index ${index} is out of bounds`);
    return issues;
  }

  if (instance.status === QuestStatus.COMPLETED) {
    if (index !== objectives.length) {
      issues.push(`${label}: completed instance must point past its last objective`);
    }
    if (instance.completedAt === undefined) {
      issues.push(`${label}: completed instance has no completion time`);
    }
  } else {
    if (index === objectives.length) {
      issues.push(`${label}: only completed instances may point past the last objective`);
    }
    if (instance.completedAt !== undefined) {
      issues.push(`${label}: ${instance.status} instance carries a completion time`);
    }
  }

  instance.progress.forEach((count, position) => {
    const required = objectives[position]?.requiredCount ?? 0;
    if (count > required) {
      issues.push(`${label}.progress.${position}: ${count} exceeds required ${required}`);
    } else if (position < index && count !== required) {
      issues.push(`${label}.progress.${position}: passed objective is not satisfied`);
    } else if (position > index && count !== 0) {
      issues.push(`${label}.progress.${position}: objective ahead of the current one has progress`);
    } else if (position === index && count === required) {
      issues.push(`${label}.progress.${position}: current objective is already satisfied`);
    }
  });

  if (
    instance.status === QuestStatus.AVAILABLE &&
    (index !== 0 || instance.progress.some((count) => count !== 0))
  ) {
    issues.push(`${label}: available instance has progress`);
  }

  const choiceTargets = new Set(
    objectives
      .filter((objective) => objective.kind === ObjectiveKind.MAKE_CHOICE)
      .map((objective) => objective.target),
  );
  for (const choiceId of Object.keys(instance.choices)) {
    if (!choiceTargets.has(choiceId)) {
      issues.push(`${label}.choices.${choiceId}: quest has no such choice objective`);
    }
  }

  return issues;
}

/**
 * Parses and checks a player state snapshot before it replaces live state.
 *
 * Returns `corrupt_snapshot` listing every violated invariant; nothing is
 * coerced or repaired.
 */
export function validatePlayerState(
  registry: QuestDefinitionRegistry,
  playerId: PlayerId,
  snapshot: unknown,
): QuestResult<PlayerQuestState> {
  const parsed = playerQuestStateSchema.safeParse(snapshot);
  if (!parsed.success) {
    return fail(QuestErrorCode.CORRUPT_SNAPSHOT, "Snapshot does not match the player state format", {
      issues: formatIssues(parsed.error),
    });
  }

  const state = parsed.data;
  const issues: string[] = [];

  if (state.playerId !== playerId) {
    issues.push(`playerId: snapshot belongs to "${state.playerId}"`);
  }

  const check = (instances: QuestInstance[], group: string): void => {
    instances.forEach((instance, position) => {
      const label = `${group}.${position}(${instance.questId})`;
      if (instance.playerId !== playerId) {
        issues.push(`${label}: owned by "${instance.playerId}"`);
      }
      const definition = registry.get(instance.questId);
      if (!definition) {
        issues.push(`${label}: unknown quest`);
        return;
      }
      issues.push(...instanceIssues(instance, definition, label));
      if (group === "history") {
        if (!isTerminalStatus(instance.status)) {
          issues.push(`${label}: ${instance.status} instance cannot be in history`);
        }
        if (!definition.repeatable) {
          issues.push(`${label}: quest is not repeatable`);
        }
      }
    });
  };

  check(state.instances, "instances");
  check(state.history, "history");

  const seen = new Set<string>();
  for (const instance of state.instances) {
    if (seen.has(instance.questId)) {
      issues.push(`instances: more than one instance of "${instance.questId}"`);
    }
    seen.add(instance.questId);
  }

  state.pendingRewards.forEach((reward, position) => {
    if (!registry.has(reward.questId)) {
      issues.push(`pendingRewards.${position}: unknown quest "${reward.questId}"`);
    }
  });

  if (issues.length > 0) {
    return fail(QuestErrorCode.CORRUPT_SNAPSHOT, "Snapshot violates quest instance invariants", {
      issues,
    });
  }
  return ok(state);
}
