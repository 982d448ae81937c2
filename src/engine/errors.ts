/**
 * Error taxonomy. Every error names the operation that raised it and,
 * where there is one, the offending identifier (column, mode, file, table).
 */
export class RowpipeError extends Error {
  constructor(
    message: string,
    readonly operation: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigInvalidError extends RowpipeError {
  override readonly name = 'ConfigInvalid';

  constructor(
    readonly field: string,
    reason: string,
    operation = 'load-config',
  ) {
    super(`Invalid config field "${field}": ${reason}`, operation);
  }
}

export class SourceReadFailedError extends RowpipeError {
  override readonly name = 'SourceReadFailed';

  constructor(
    readonly filePath: string,
    reason: string,
    cause?: unknown,
  ) {
    super(`Failed to read ${filePath}: ${reason}`, 'read-source', cause);
  }
}

export class UnknownColumnError extends RowpipeError {
  override readonly name = 'UnknownColumn';

  constructor(
    readonly column: string,
    readonly allowed: readonly string[],
    operation: string,
  ) {
    super(`Unknown column "${column}" in ${operation}. Allowed: ${allowed.join(', ')}`, operation);
  }
}

export class UnsupportedModeError extends RowpipeError {
  override readonly name = 'UnsupportedMode';

  constructor(
    readonly mode: string,
    operation = 'load',
  ) {
    super(`Unsupported load mode "${mode}". Expected one of: append, replace`, operation);
  }
}

export class EmptyCriteriaValueError extends RowpipeError {
  override readonly name = 'EmptyCriteriaValue';

  constructor(
    readonly column: string,
    operation: string,
  ) {
    super(`Criteria value for "${column}" is an empty list`, operation);
  }
}

export class SinkWriteFailedError extends RowpipeError {
  override readonly name = 'SinkWriteFailed';

  constructor(
    readonly table: string,
    operation: string,
    readonly diagnostic: string,
    cause?: unknown,
  ) {
    super(`Write to "${table}" failed during ${operation}: ${diagnostic}`, operation, cause);
  }
}

export class QueryFailedError extends RowpipeError {
  override readonly name = 'QueryFailed';

  constructor(
    readonly table: string,
    operation: string,
    readonly diagnostic: string,
    cause?: unknown,
  ) {
    super(`Query on "${table}" failed during ${operation}: ${diagnostic}`, operation, cause);
  }
}
