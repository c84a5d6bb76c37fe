export class StagingError extends Error {
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(statusCode: number, message: string, details?: unknown) {
    super(message);
    this.name = this.constructor.name;
    this.statusCode = statusCode;
    this.details = details;
  }
}

// Raised before any write: duplicate headers, missing or empty key columns.
export class SchemaError extends StagingError {
  constructor(message: string, details?: unknown) {
    super(422, message, details);
  }
}

export class DataFormatError extends StagingError {
  constructor(message: string, details?: unknown) {
    super(422, message, details);
  }
}

export class NotFoundError extends StagingError {
  constructor(message = 'not found') {
    super(404, message);
  }
}

export class ConflictError extends StagingError {
  constructor(message: string, details?: unknown) {
    super(409, message, details);
  }
}

export class MaterializationError extends StagingError {
  readonly target: string;

  constructor(target: string, cause: unknown) {
    super(500, `Failed to materialize ${target}: ${errorMessage(cause)}`);
    this.target = target;
  }
}

export const errorMessage = (err: unknown) => (err instanceof Error ? err.message : String(err));
