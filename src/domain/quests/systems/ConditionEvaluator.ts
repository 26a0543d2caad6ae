import { injectable, inject } from "inversify";
import { TYPES } from "../../../config/Types";
import type { Clock } from "../../../shared/Clock";
import { logger } from "../../../infrastructure/utils/logger";
import { LogCategory } from "../../../shared/constants/LogEnums";
import {
  BuiltinCustomCondition,
  ConditionKind,
  QuestErrorCode,
} from "../../../shared/constants/QuestEnums";
import type {
  Condition,
  ConditionDiagnostic,
  ConditionParameters,
  CustomCondition,
  CustomConditionHandler,
  FactSnapshot,
} from "../../types/quests/conditions";

const MAX_DIAGNOSTICS = 200;

/**
 * `attribute_at_least { attribute, min }`: numeric fact attribute threshold.
 */
const attributeAtLeast: CustomConditionHandler = (parameters, snapshot) => {
  const { attribute, min } = parameters;
  if (typeof attribute !== "string" || typeof min !== "number") return false;
  const value = snapshot.attributes?.[attribute];
  return typeof value === "number" && value >= min;
};

/**
 * Pure predicate evaluation of prerequisite conditions over a fact snapshot.
 *
 * Evaluation is total: unrecognized kinds, unregistered custom kinds and
 * handlers that throw all evaluate to `false` and leave a diagnostic, so a
 * malformed or forward-declared condition blocks progress.
 */
@injectable()
export class ConditionEvaluator {
  private customHandlers = new Map<string, CustomConditionHandler>();
  private diagnostics: ConditionDiagnostic[] = [];

  constructor(@inject(TYPES.Clock) private readonly clock: Clock) {
    this.registerCustomCondition(
      BuiltinCustomCondition.ATTRIBUTE_AT_LEAST,
      attributeAtLeast,
    );
  }

  public registerCustomCondition(
    customKind: string,
    handler: CustomConditionHandler,
  ): void {
    this.customHandlers.set(customKind, handler);
  }

  public hasCustomCondition(customKind: string): boolean {
    return this.customHandlers.has(customKind);
  }

  public evaluate(condition: Condition, snapshot: FactSnapshot): boolean {
    switch (condition.kind) {
      case ConditionKind.PLAYER_LEVEL:
        return snapshot.playerLevel >= condition.min;

      case ConditionKind.QUEST_COMPLETED:
        return snapshot.completedQuests.has(condition.questId);

      case ConditionKind.QUEST_CHOICE: {
        const recorded = snapshot.choices[condition.questId];
        return recorded !== undefined
          ? Object.values(recorded).includes(condition.option)
          : false;
      }

      case ConditionKind.CUSTOM:
        return this.evaluateCustom(condition, snapshot);

      default:
        return this.unknownKind(condition, "unrecognized condition kind");
    }
  }

  /**
   * Conjunction of every condition; vacuously true for an empty set.
   */
  public evaluateAll(
    conditions: readonly Condition[],
    snapshot: FactSnapshot,
  ): boolean {
    return conditions.every((condition) => this.evaluate(condition, snapshot));
  }

  /**
   * Returns the conditions that do not hold, for diagnostics and UI hints.
   */
  public unmetConditions(
    conditions: readonly Condition[],
    snapshot: FactSnapshot,
  ): Condition[] {
    return conditions.filter((condition) => !this.evaluate(condition, snapshot));
  }

  private evaluateCustom(
    condition: CustomCondition,
    snapshot: FactSnapshot,
  ): boolean {
    const handler = this.customHandlers.get(condition.customKind);
    if (!handler) {
      return this.recordDiagnostic(
        condition.customKind,
        "no handler registered for custom condition",
        condition.parameters,
      );
    }

    try {
      return handler(condition.parameters, snapshot) === true;
    } catch (error) {
      return this.recordDiagnostic(
        condition.customKind,
        `custom condition handler threw: ${error instanceof Error ? error.message : String(error)}`,
        condition.parameters,
      );
    }
  }

  private unknownKind(condition: never, message: string): false {
    const kind: unknown = Reflect.get(Object(condition), "kind");
    return this.recordDiagnostic(String(kind), message, {});
  }

  private recordDiagnostic(
    customKind: string,
    message: string,
    parameters: ConditionParameters,
  ): false {
    this.diagnostics.push({
      code: QuestErrorCode.UNKNOWN_CONDITION_KIND,
      customKind,
      message,
      timestamp: this.clock(),
    });
    if (this.diagnostics.length > MAX_DIAGNOSTICS) {
      this.diagnostics.shift();
    }
    logger.warn(
      `Condition "${customKind}" treated as unmet: ${message}`,
      LogCategory.CONDITIONS,
      { customKind, parameters },
    );
    return false;
  }

  public getDiagnostics(): readonly ConditionDiagnostic[] {
    return [...this.diagnostics];
  }

  public clearDiagnostics(): void {
    this.diagnostics = [];
  }
}
