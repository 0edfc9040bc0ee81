import { AppError } from './app-error';

export interface EngineErrorOptions {
  cause?: unknown;
  details?: unknown;
}

/**
 * Base for every error the tutoring engine raises on purpose. Carries an HTTP
 * status so the Express error handler can render it like any other AppError.
 */
export abstract class EngineError extends AppError {
  protected constructor(statusCode: number, code: string, message: string, options: EngineErrorOptions = {}) {
    super(statusCode, message, code, options.details);
    this.name = new.target.name;

    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export type ProviderErrorKind = 'auth' | 'rate_limit' | 'timeout' | 'generic';

export abstract class ProviderError extends EngineError {
  public abstract readonly kind: ProviderErrorKind;
  public readonly retryable: boolean;

  protected constructor(
    statusCode: number,
    code: string,
    message: string,
    retryable: boolean,
    options?: EngineErrorOptions,
  ) {
    super(statusCode, code, message, options);
    this.retryable = retryable;
  }
}

export class ProviderAuthError extends ProviderError {
  public readonly kind = 'auth' as const;

  public constructor(message = 'Language model rejected the credentials.', options?: EngineErrorOptions) {
    super(502, 'PROVIDER_AUTH_FAILED', message, false, options);
  }
}

export class ProviderRateLimitError extends ProviderError {
  public readonly kind = 'rate_limit' as const;

  public constructor(message = 'Language model rate limit reached.', options?: EngineErrorOptions) {
    super(503, 'PROVIDER_RATE_LIMITED', message, true, options);
  }
}

export class ProviderTimeoutError extends ProviderError {
  public readonly kind = 'timeout' as const;

  public constructor(message = 'Language model call timed out.', options?: EngineErrorOptions) {
    super(504, 'PROVIDER_TIMEOUT', message, true, options);
  }
}

export class ProviderGenericError extends ProviderError {
  public readonly kind = 'generic' as const;

  public constructor(message = 'Language model call failed.', options?: EngineErrorOptions) {
    super(502, 'PROVIDER_FAILED', message, true, options);
  }
}

export class ControlParseError extends EngineError {
  public constructor(public readonly rawBlock: string, options?: EngineErrorOptions) {
    super(422, 'CONTROL_PARSE_FAILED', 'Control block is not valid JSON.', options);
  }
}

export class ControlValidationError extends EngineError {
  public constructor(message: string, options?: EngineErrorOptions) {
    super(422, 'CONTROL_VALIDATION_FAILED', message, options);
  }
}

export class GradingParseError extends EngineError {
  public constructor(public readonly rawOutput: string, missingField: 'SCORE' | 'REASONING') {
    super(422, 'GRADING_PARSE_FAILED', `Grader output has no usable ${missingField} field.`);
  }
}

export class ContextNotFoundError extends EngineError {
  public constructor(public readonly nodeId: string) {
    super(404, 'CONTEXT_NOT_FOUND', `Node ${nodeId} was not found.`);
  }
}

export class IllegalPhaseTransitionError extends EngineError {
  public constructor(from: string, to: string) {
    super(500, 'ILLEGAL_PHASE_TRANSITION', `Transition ${from} -> ${to} is not a declared edge.`, {
      details: { from, to },
    });
  }
}

export class TickLimitExceededError extends EngineError {
  public constructor(limit: number, phase: string) {
    super(500, 'TICK_LIMIT_EXCEEDED', `Session did not settle within ${limit} ticks (stuck in ${phase}).`, {
      details: { limit, phase },
    });
  }
}

export class SessionInvariantError extends EngineError {
  public constructor(message: string, details?: unknown) {
    super(500, 'SESSION_INVARIANT_VIOLATED', message, { details });
  }
}

export const isProviderError = (error: unknown): error is ProviderError => {
  return error instanceof ProviderError;
};

export const describeError = (error: unknown): string => {
  return error instanceof Error ? error.message : String(error);
};
