export class AppError extends Error {
  readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
  }
}

export class ActionError extends AppError {
  constructor(action: string, reason?: string) {
    const detail = reason ? `: ${reason}` : '';
    super(`Action failed: ${action}${detail}`, 'ACTION_FAILED');
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
  }
}

export class NavigationError extends AppError {
  constructor(url: string, reason?: string) {
    const detail = reason ? `: ${reason}` : '';
    super(`Navigation failed for ${url}${detail}`, 'NAVIGATION_FAILED');
  }
}

export class ScenarioInProgressError extends AppError {
  constructor(runningId: string) {
    super(`Scenario ${runningId} is still running`, 'SCENARIO_IN_PROGRESS');
  }
}

/** The model answered, but nothing in the answer could be executed. */
export class ParseError extends AppError {
  constructor(message: string) {
    super(message, 'NO_ACTIONS');
  }
}

export class LlmRequestError extends AppError {
  readonly status?: number;
  readonly rateLimited: boolean;

  constructor(message: string, options: { status?: number; rateLimited?: boolean } = {}) {
    super(message, 'LLM_REQUEST_FAILED');
    this.status = options.status;
    this.rateLimited = options.rateLimited ?? false;
  }
}

export class ConfigError extends AppError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
