import { DdlFile, ValidationResult } from './types';

// Best-effort: the first CREATE statement wins and comments or string literals are not skipped.
const CREATE_PATTERNS = [
  /CREATE\s+(?:OR\s+REPLACE\s+)?TABLE\s+(\w+)\./i,
  /CREATE\s+(?:OR\s+REPLACE\s+)?VIEW\s+(\w+)\./i,
];

export const UNKNOWN_SCHEMA = 'unknown';

/**
 * Schema named by the first `CREATE [OR REPLACE] TABLE <schema>.` in the text, falling back to
 * the first `CREATE [OR REPLACE] VIEW <schema>.`. Lower-cased.
 */
export function detectSchema(sql: string): string | undefined {
  for (const pattern of CREATE_PATTERNS) {
    const match = sql.match(pattern);
    if (match) {
      return match[1].toLowerCase();
    }
  }
  return undefined;
}

export function validateFile(file: DdlFile): ValidationResult {
  const detected = detectSchema(file.sql);
  if (detected === undefined) {
    return { file, detectedSchema: UNKNOWN_SCHEMA, passed: true };
  }
  return { file, detectedSchema: detected, passed: detected === file.prefix.toLowerCase() };
}

export function validateFiles(files: DdlFile[]): { results: ValidationResult[]; mismatches: ValidationResult[] } {
  const results = files.map(validateFile);
  return { results, mismatches: results.filter(r => !r.passed) };
}
