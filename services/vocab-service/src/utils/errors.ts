/**
 * Error taxonomy for the practice pipeline.
 *
 * Every error carries a machine-readable `code`, the HTTP status the API
 * answers with, and a `details` bag naming the field, stage or key involved.
 */
export class AppError extends Error {
  readonly code: string;
  readonly status: number;
  readonly details: Record<string, unknown>;

  constructor(message: string, code: string, status: number, details: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
    this.details = details;
  }
}

export class ValidationError extends AppError {
  readonly field: string | undefined;

  constructor(message: string, field?: string) {
    super(message, 'validation_error', 400, field ? { field } : {});
    this.field = field;
  }
}

export interface EntryKey {
  word: string;
  language: string;
}

export class ConflictError extends AppError {
  readonly key: EntryKey;

  constructor(key: EntryKey) {
    super(`"${key.word}" already exists for ${key.language}`, 'conflict', 409, { word: key.word, language: key.language });
    this.key = key;
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, identifier: Record<string, string>) {
    const label = Object.values(identifier).join('/');
    super(`${resource} not found: ${label}`, 'not_found', 404, { resource, ...identifier });
  }
}

export class InvalidSessionStateError extends AppError {
  constructor(operation: string, current: string, expected: string) {
    super(
      `Cannot ${operation} while session is ${current} (expected ${expected})`,
      'invalid_session_state',
      409,
      { operation, current, expected }
    );
  }
}

export class InsufficientVocabularyError extends AppError {
  constructor(language: string) {
    super(`No vocabulary saved for ${language}`, 'insufficient_vocabulary', 422, { language });
  }
}

export type GatewayErrorKind = 'unreachable' | 'timeout' | 'status' | 'cancelled';

export class GatewayError extends AppError {
  readonly kind: GatewayErrorKind;
  readonly statusCode: number | undefined;

  constructor(kind: GatewayErrorKind, message: string, context: { model?: string; statusCode?: number } = {}) {
    super(message, `gateway_${kind}`, kind === 'timeout' ? 504 : 502, { kind, ...context });
    this.kind = kind;
    this.statusCode = context.statusCode;
  }
}

export type ExtractionReason = 'malformed' | 'incomplete' | 'count-mismatch' | 'gateway-unreachable';
export type ExtractionStage = 'initial' | 'retry';

export class ExtractionError extends AppError {
  readonly reason: ExtractionReason;
  readonly stage: ExtractionStage;
  readonly field: string | undefined;
  readonly rawText: string | undefined;
  readonly cause: unknown;

  constructor(
    reason: ExtractionReason,
    stage: ExtractionStage,
    message: string,
    context: { field?: string; rawText?: string; cause?: unknown } = {}
  ) {
    super(
      message,
      'extraction_failed',
      reason === 'gateway-unreachable' ? 502 : 422,
      { reason, stage, ...(context.field ? { field: context.field } : {}) }
    );
    this.reason = reason;
    this.stage = stage;
    this.field = context.field;
    this.rawText = context.rawText;
    this.cause = context.cause;
  }
}
