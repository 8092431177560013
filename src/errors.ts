/**
 * Picking system error family
 *
 * Every failure the pipeline reports is a PickingSystemError carrying a
 * `kind`, so callers can either catch the whole family or switch on the kind.
 * Stage functions return StageResult values instead of throwing.
 */

export type PickingErrorKind =
  | 'file-not-found'
  | 'invalid-file-format'
  | 'validation-error'
  | 'master-catalog-error'
  | 'processing-error'
  | 'reference-db-error'
  | 'output-error';

export class PickingSystemError extends Error {
  readonly kind: PickingErrorKind;

  constructor(kind: PickingErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PickingSystemError';
    this.kind = kind;
  }
}

export class FileNotFoundError extends PickingSystemError {
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    super('file-not-found', `File not found: ${path}`, options);
    this.name = 'FileNotFoundError';
    this.path = path;
  }
}

export class InvalidFileFormatError extends PickingSystemError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('invalid-file-format', message, options);
    this.name = 'InvalidFileFormatError';
  }
}

export class ValidationError extends PickingSystemError {
  readonly errors: readonly string[];

  constructor(errors: readonly string[]) {
    super('validation-error', `Input validation failed: ${errors.join('; ')}`);
    this.name = 'ValidationError';
    this.errors = errors;
  }
}

export class MasterCatalogError extends PickingSystemError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('master-catalog-error', message, options);
    this.name = 'MasterCatalogError';
  }
}

export class ProcessingError extends PickingSystemError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('processing-error', message, options);
    this.name = 'ProcessingError';
  }
}

/**
 * Failure while building the reference tables (kind `reference-db-error`)
 */
export class ReferenceTableError extends PickingSystemError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('reference-db-error', message, options);
    this.name = 'ReferenceTableError';
  }
}

export class OutputError extends PickingSystemError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('output-error', message, options);
    this.name = 'OutputError';
  }
}

export function isPickingSystemError(error: unknown): error is PickingSystemError {
  return error instanceof PickingSystemError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Stage boundary results

export type StageResult<T, E extends PickingSystemError = PickingSystemError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E extends PickingSystemError>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/**
 * Run a stage body and report anything it throws as the stage's error kind.
 * Errors already in the family pass through unchanged.
 */
export function runStage<T, E extends PickingSystemError>(
  toError: (message: string, cause: unknown) => E,
  body: () => T
): StageResult<T, E | PickingSystemError> {
  try {
    return ok(body());
  } catch (error) {
    if (isPickingSystemError(error)) {
      return fail(error);
    }
    return fail(toError(errorMessage(error), error));
  }
}

export async function runStageAsync<T, E extends PickingSystemError>(
  toError: (message: string, cause: unknown) => E,
  body: () => Promise<T>
): Promise<StageResult<T, E | PickingSystemError>> {
  try {
    return ok(await body());
  } catch (error) {
    if (isPickingSystemError(error)) {
      return fail(error);
    }
    return fail(toError(errorMessage(error), error));
  }
}
