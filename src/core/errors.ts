export interface AppErrorOptions {
  code?: string;
  statusCode?: number;
  cause?: unknown;
  context?: Record<string, unknown>;
}

/**
 * Base class for errors surfaced to API callers
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, options: AppErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.code = options.code ?? 'INTERNAL_ERROR';
    this.statusCode = options.statusCode ?? 500;
    this.context = options.context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      ...(this.context ? { context: this.context } : {}),
    };
  }
}

export class InvalidIdentifierError extends AppError {
  constructor(id: string) {
    super('Invalid conversation id', {
      code: 'INVALID_IDENTIFIER',
      statusCode: 400,
      context: { id },
    });
  }
}

export class ConversationNotFoundError extends AppError {
  constructor(conversationId: string) {
    super('Conversation not found', {
      code: 'CONVERSATION_NOT_FOUND',
      statusCode: 404,
      context: { conversationId },
    });
  }
}

export class StoreUnavailableError extends AppError {
  constructor(reason: string) {
    super('Database not available', {
      code: 'STORE_UNAVAILABLE',
      statusCode: 500,
      context: { reason },
    });
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export class ValidationError extends AppError {
  constructor(
    public readonly issues: ValidationIssue[],
    message = 'Request validation failed'
  ) {
    super(message, {
      code: 'VALIDATION_ERROR',
      statusCode: 422,
      context: { issues },
    });
  }
}

/**
 * Request body rejected before it reached a route: too large, wrong
 * charset or encoding. Carries the parser's 4xx status.
 */
export class RequestBodyError extends AppError {
  constructor(message: string, statusCode: number, type?: string) {
    super(message, {
      code: statusCode === 413 ? 'PAYLOAD_TOO_LARGE' : 'INVALID_REQUEST_BODY',
      statusCode,
      context: type ? { type } : undefined,
    });
  }
}

export class ConfigurationError extends AppError {
  constructor(public readonly issues: ValidationIssue[]) {
    super(
      `Invalid configuration: ${issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ')}`,
      { code: 'CONFIGURATION_ERROR', context: { issues } }
    );
  }
}
