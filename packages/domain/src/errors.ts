export class AppError extends Error {
  constructor(
    readonly code: string,
    message: string,
    readonly statusCode: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidInputError extends AppError {
  constructor(message: string) {
    super('invalid_input', message, 400);
  }
}

export class NotFoundError extends AppError {
  constructor(entity: string, key: string) {
    super(`${entity}_not_found`, `${entity.replace(/_/g, ' ')} ${key} not found`, 404);
  }
}

export class ConflictError extends AppError {
  constructor(code: string, message: string) {
    super(code, message, 409);
  }
}

export class InvalidTransitionError extends ConflictError {
  constructor(
    readonly from: string,
    readonly to: string
  ) {
    super('invalid_status_transition', `cannot move call status from ${from} to ${to}`);
  }
}

export class StorageError extends AppError {
  constructor(
    readonly collection: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super('storage_error', `${collection}: ${message}`, 500, options);
  }
}

export class TelephonyError extends AppError {
  constructor(
    message: string,
    readonly providerStatus?: number,
    options?: { cause?: unknown }
  ) {
    super('telephony_error', message, 502, options);
  }
}

export type GenerationFailureKind =
  | 'model_not_found'
  | 'quota_exceeded'
  | 'unauthorized'
  | 'transient'
  | 'empty_response'
  | 'models_exhausted';

export class GenerationError extends AppError {
  constructor(
    readonly kind: GenerationFailureKind,
    message: string,
    readonly model?: string,
    options?: { cause?: unknown }
  ) {
    super('generation_error', message, 502, options);
  }
}

export class FeatureUnavailableError extends AppError {
  constructor(feature: 'telephony' | 'generation', reason: string) {
    super(`${feature}_not_configured`, reason, 503);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'unknown_error';
}
