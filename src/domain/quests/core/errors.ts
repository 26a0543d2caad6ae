import { QuestErrorCode } from "../../../shared/constants/QuestEnums";

/**
 * Domain error returned (never thrown) by engine commands.
 */
export class QuestError extends Error {
  public readonly code: QuestErrorCode;
  public readonly details?: Readonly<Record<string, unknown>>;

  constructor(
    code: QuestErrorCode,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "QuestError";
    this.code = code;
    this.details = details;
  }
}

/**
 * Thrown at startup when configuration or a quest catalog fails validation.
 */
export class QuestConfigurationError extends Error {
  public readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[]) {
    super(`${message}:\n  - ${issues.join("\n  - ")}`);
    this.name = "QuestConfigurationError";
    this.issues = issues;
  }
}

export type QuestResult<T> =
  | { success: true; value: T }
  | { success: false; error: QuestError };

export function ok<T>(value: T): QuestResult<T> {
  return { success: true, value };
}

export function fail<T>(
  code: QuestErrorCode,
  message: string,
  details?: Record<string, unknown>,
): QuestResult<T> {
  return { success: false, error: new QuestError(code, message, details) };
}
