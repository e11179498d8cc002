export interface ValidationIssue {
  loc: Array<string | number>;
  msg: string;
  type: string;
}

/** Bad query or configuration. Raised before any task exists. */
export class ValidationError extends Error {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super(issues.map((issue) => `${issue.loc.join(".")}: ${issue.msg}`).join("; ") || "validation failed");
    this.name = "ValidationError";
    this.issues = issues;
  }
}

export class RetrievalUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RetrievalUnavailableError";
  }
}

export class RerankUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RerankUnavailableError";
  }
}

export class LlmUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LlmUnavailableError";
  }
}

export class ParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ParseError";
  }
}

export class CancelledByUserError extends Error {
  constructor(message = "Task cancelled by user") {
    super(message);
    this.name = "CancelledByUserError";
  }
}

const RETRIEVAL_UNAVAILABLE_MESSAGE = "Поиск по документам временно недоступен. Повторите попытку позже.";
const LLM_UNAVAILABLE_MESSAGE = "Сервис языковой модели недоступен. Повторите попытку позже.";
const CANCELLED_MESSAGE = "Задача отменена пользователем.";
const GENERIC_MESSAGE = "Не удалось выполнить задачу. Повторите попытку или обратитесь в поддержку.";

export const toSafeUserErrorMessage = (error: unknown): string => {
  if (error instanceof ValidationError) {
    return error.message;
  }
  if (error instanceof RetrievalUnavailableError) {
    return RETRIEVAL_UNAVAILABLE_MESSAGE;
  }
  if (error instanceof LlmUnavailableError) {
    return LLM_UNAVAILABLE_MESSAGE;
  }
  if (error instanceof CancelledByUserError) {
    return CANCELLED_MESSAGE;
  }
  return GENERIC_MESSAGE;
};
