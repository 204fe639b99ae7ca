/** Base error for the data analyst server; subclasses use fixed codes. */
export class DataAnalystError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly isError: boolean = true,
  ) {
    super(message);
    this.name = 'DataAnalystError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Missing or rejected credentials / model access. Never retried. */
export class ConfigurationError extends DataAnalystError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

/** The requested model id cannot serve requests (404 / "not found"). */
export class ModelUnavailableError extends DataAnalystError {
  constructor(
    public readonly model: string,
    message: string = `Model not available: ${model}`,
  ) {
    super(message, 'MODEL_UNAVAILABLE');
    this.name = 'ModelUnavailableError';
  }
}

export class ModelCallError extends DataAnalystError {
  constructor(message: string, public readonly statusCode?: number) {
    super(message, 'MODEL_CALL_ERROR');
    this.name = 'ModelCallError';
  }
}

export class ModelTimeoutError extends DataAnalystError {
  constructor(model: string, timeoutMs: number) {
    super(`Model "${model}" did not respond within ${timeoutMs}ms`, 'MODEL_TIMEOUT');
    this.name = 'ModelTimeoutError';
  }
}

export class ModelRetriesExhaustedError extends DataAnalystError {
  constructor(public readonly attempts: number, lastMessage: string) {
    super(
      `Model selection failed after ${attempts} attempt(s). Last error: ${lastMessage}`,
      'MODEL_RETRIES_EXHAUSTED',
    );
    this.name = 'ModelRetriesExhaustedError';
  }
}

export class EmptyModelResponseError extends DataAnalystError {
  constructor(model: string) {
    super(`Model "${model}" returned no code`, 'EMPTY_MODEL_RESPONSE');
    this.name = 'EmptyModelResponseError';
  }
}

export class InvalidInputError extends DataAnalystError {
  constructor(message: string) {
    super(message, 'INVALID_INPUT');
    this.name = 'InvalidInputError';
  }
}

export class NotFoundError extends DataAnalystError {
  constructor(message: string) {
    super(message, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends DataAnalystError {
  constructor(message: string) {
    super(message, 'CONFLICT');
    this.name = 'ConflictError';
  }
}

export class HistoryStoreError extends DataAnalystError {
  constructor(message: string) {
    super(message, 'HISTORY_STORE_ERROR');
    this.name = 'HistoryStoreError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
