/**
 * Error taxonomy of the mapping engine. Every error carries a stable `code`
 * (surfaced by the HTTP API) and a message naming the table, column or field
 * involved. Validation findings are not errors: see `ValidationFinding`.
 */
export class MappingEngineError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class SchemaNotLoadedError extends MappingEngineError {
  constructor(missing: Array<'source' | 'target'>, hint?: string) {
    const what = missing.map((m) => `${m} schema`).join(' and ');
    super(
      'SCHEMA_NOT_LOADED',
      `${what} not loaded${hint ? `: ${hint}` : ''}`,
      { missing },
    );
  }
}

export class InvalidSchemaError extends MappingEngineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_SCHEMA', message, details);
  }
}

export class UnknownTableError extends MappingEngineError {
  constructor(readonly table: string) {
    super('UNKNOWN_TABLE', `Unknown source table "${table}"`, { table });
  }
}

export class UnknownEndpointError extends MappingEngineError {
  constructor(readonly endpoint: string) {
    super('UNKNOWN_ENDPOINT', `Unknown target endpoint "${endpoint}"`, { endpoint });
  }
}

export class UnknownColumnError extends MappingEngineError {
  constructor(readonly table: string, readonly column: string) {
    super('UNKNOWN_COLUMN', `Column "${column}" does not exist in source table "${table}"`, {
      table,
      column,
    });
  }
}

export class UnknownFieldError extends MappingEngineError {
  constructor(readonly table: string, readonly endpoint: string, readonly field: string) {
    super(
      'UNKNOWN_FIELD',
      `Field "${field}" does not exist on endpoint ${endpoint} (table "${table}")`,
      { table, endpoint, field },
    );
  }
}

export class InvalidEditError extends MappingEngineError {
  constructor(readonly table: string, message: string) {
    super('INVALID_EDIT', `Table "${table}": ${message}`, { table });
  }
}

export class MappingNotValidatedError extends MappingEngineError {
  constructor(readonly table: string, status: string) {
    super(
      'MAPPING_NOT_VALIDATED',
      `Table "${table}" is ${status}; run validation before generating payloads`,
      { table, status },
    );
  }
}

export class MappingSetFormatError extends MappingEngineError {
  constructor(message: string, issues?: unknown) {
    super('MAPPING_SET_FORMAT', message, issues === undefined ? undefined : { issues });
  }
}

export class UnsupportedFormatError extends MappingEngineError {
  constructor(filename: string, reason: string) {
    super('UNSUPPORTED_FORMAT', `Cannot read "${filename}": ${reason}`, { filename });
  }
}

export class SourceParseError extends MappingEngineError {
  constructor(filename: string, reason: string) {
    super('SOURCE_PARSE_FAILED', `Failed to parse "${filename}": ${reason}`, { filename });
  }
}

export class TransformError extends MappingEngineError {
  constructor(readonly transformer: string, readonly value: unknown, reason: string) {
    super('TRANSFORM_FAILED', `${transformer}: ${reason} (value: ${describeValue(value)})`, {
      transformer,
    });
  }
}

function describeValue(value: unknown): string {
  if (typeof value === 'string') return JSON.stringify(value);
  if (value instanceof Date) return value.toISOString();
  return String(value);
}
