import { ExecutionResult, ValidationResult } from './types';

export class SfddlError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// Missing or unreadable configuration. Raised before any network action.
export class ConfigError extends SfddlError {}

export class ConnectionError extends SfddlError {
  readonly result: ExecutionResult;

  constructor(result: ExecutionResult) {
    super(`Connection test failed (exit code ${result.exitCode ?? 'none'})`);
    this.result = result;
  }
}

export class SchemaMismatchError extends SfddlError {
  readonly mismatches: ValidationResult[];

  constructor(prefix: string, mismatches: ValidationResult[]) {
    const names = mismatches.map(m => `${m.file.fileName} (${m.detectedSchema})`).join(', ');
    super(`Schema mismatch for prefix '${prefix}': ${names}`);
    this.mismatches = mismatches;
  }
}

export class BatchExecutionError extends SfddlError {
  readonly result: ExecutionResult;

  constructor(schema: string, result: ExecutionResult) {
    super(`Batch execution failed for ${schema.toUpperCase()} schema (${result.outcome})`);
    this.result = result;
  }
}
