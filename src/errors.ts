export type AutomationStage =
  | 'config'
  | 'load-prompts'
  | 'results'
  | 'connect'
  | 'navigate'
  | 'submit-prompt'
  | 'capture-reply'
  | 'speech';

export interface AutomationErrorInfo {
  stage: AutomationStage;
  code?: string;
  details?: Record<string, unknown>;
}

export class AutomationError extends Error {
  readonly stage: AutomationStage;
  readonly code?: string;
  readonly details?: Record<string, unknown>;

  constructor(message: string, info: AutomationErrorInfo, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'AutomationError';
    this.stage = info.stage;
    this.code = info.code;
    this.details = info.details;
  }
}

export function isAutomationError(error: unknown): error is AutomationError {
  return error instanceof AutomationError;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/** Walks `cause` links, outermost first. */
export function collectCauseMessages(error: unknown): string[] {
  const messages: string[] = [];
  const seen = new Set<unknown>();
  let current: unknown = error;
  while (current instanceof Error && !seen.has(current)) {
    seen.add(current);
    messages.push(current.message);
    current = current.cause;
  }
  return messages;
}

/** The `code` of a Node system error (`ENOENT`, `ECONNREFUSED`, ...), when there is one. */
export function systemErrorCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
