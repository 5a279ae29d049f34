export type ErrorCode =
  | 'CONFIG/INVALID_OPTION'
  | 'CONFIG/DEPRECATED_OPTION'
  | 'CONFIG/POPULATION_INCONSISTENT'
  | 'CONFIG/POPULATION_MISMATCH'
  | 'CONFIG/PALETTE_EXHAUSTED'
  | 'INPUT/TABLE_MISSING'
  | 'SCHEMA/COLUMN_MISSING'
  | 'SCHEMA/INVALID_VALUE'
  | 'SCHEMA/DUPLICATE_NODE'
  | 'SCHEMA/LINK_ENDPOINT_UNKNOWN'
  | 'COMPUTE/TIME_ORDER'
  | 'COMPUTE/ZERO_POPULATION';

export class AlluvialError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = 'AlluvialError';
    this.code = code;
  }
}

export class ConfigurationError extends AlluvialError {
  constructor(code: Extract<ErrorCode, `CONFIG/${string}`>, message: string) {
    super(code, message);
    this.name = 'ConfigurationError';
  }
}

export class InputMissingError extends AlluvialError {
  constructor(table: string) {
    super('INPUT/TABLE_MISSING', `Required ${table} table is missing`);
    this.name = 'InputMissingError';
  }
}

export class SchemaError extends AlluvialError {
  readonly issues: string[];

  constructor(code: Extract<ErrorCode, `SCHEMA/${string}`>, message: string, issues: string[] = []) {
    super(code, issues.length ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'SchemaError';
    this.issues = issues;
  }
}

export class ComputationError extends AlluvialError {
  constructor(code: Extract<ErrorCode, `COMPUTE/${string}`>, message: string) {
    super(code, message);
    this.name = 'ComputationError';
  }
}

export function isAlluvialError(error: unknown): error is AlluvialError {
  return error instanceof AlluvialError;
}
