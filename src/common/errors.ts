export type ErrorContext = Record<string, string | number | boolean | null>;

export class IngestionError extends Error {
  readonly context: ErrorContext;

  constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.context = context;
  }
}

/** Network timeout, 5xx, DNS: worth another attempt. */
export class TransientSourceError extends IngestionError {}

/** Response arrived but does not have the expected shape. */
export class MalformedPayloadError extends IngestionError {}

/** Database could not be opened or connected to. */
export class StoreUnavailableError extends IngestionError {}

/** A batch insert collided with an existing unique key. */
export class UniqueViolationError extends IngestionError {}

/** No category rule matches a datastream label. */
export class UnclassifiableCategoryError extends IngestionError {}

export function isRetryable(error: unknown): boolean {
  return (
    error instanceof TransientSourceError ||
    error instanceof StoreUnavailableError
  );
}

const UNIQUE_VIOLATION =
  /(duplicate key|unique constraint|primary key constraint|write-write conflict)/i;

/** Recognises the engine's uniqueness / write-conflict failures by message. */
export function isUniqueViolation(error: unknown): boolean {
  if (error instanceof UniqueViolationError) return true;
  return error instanceof Error && UNIQUE_VIOLATION.test(error.message);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
