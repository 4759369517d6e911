import { ErrorCode, type ErrorPayload } from '@packets/shared';

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }

  toErrorPayload(runId: string): ErrorPayload {
    return {
      error: {
        code: this.code,
        message: this.message,
        runId,
        ...(this.details && { details: this.details }),
      },
    };
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.VALIDATION_ERROR, message, details);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id: string) {
    super(ErrorCode.NOT_FOUND, `${resource} not found: ${id}`);
    this.name = 'NotFoundError';
  }
}

export class ConfigurationError extends AppError {
  constructor(file: string, reason: string) {
    super(ErrorCode.CONFIGURATION_ERROR, `Invalid configuration file ${file}: ${reason}`, {
      file,
    });
    this.name = 'ConfigurationError';
  }
}

export class InvalidEntityIdError extends ValidationError {
  constructor(entityId: string) {
    super(`Invalid entity id: ${JSON.stringify(entityId)}`, { entityId });
    this.name = 'InvalidEntityIdError';
  }
}
