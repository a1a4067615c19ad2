import { collectDdlFiles } from './discovery';
import { rewriteSchemaPrefixes, SchemaMapping } from './schema';
import { Batch, BatchEntry, StageBatch, ValidationResult } from './types';
import { detectSchema, UNKNOWN_SCHEMA, validateFiles } from './validator';

export const STATEMENT_SEPARATOR = ';\n\n';

export interface BatchInput extends BatchEntry {
  sql: string;
}

export interface StageBatchOptions {
  // Rewrite `raw.`/`stage.`/`curated.` prefixes before batching
  mapping?: SchemaMapping;
  // Abort on any file whose CREATE target differs from its prefix
  validate: boolean;
}

// Trailing terminators are dropped so the joined batch ends with exactly one `;`
function stripTerminator(sql: string): string {
  return sql.replace(/[;\s]+$/, '');
}

/**
 * Joins the inputs into one multi-statement query. Returns undefined when there is nothing to run.
 */
export function buildBatch(prefix: string, inputs: BatchInput[]): Batch | undefined {
  if (inputs.length === 0) {
    return undefined;
  }
  return {
    prefix,
    query: inputs.map(input => stripTerminator(input.sql)).join(STATEMENT_SEPARATOR) + ';',
    files: inputs.map(({ fileName, detectedSchema }) => ({ fileName, detectedSchema })),
    statementCount: inputs.length,
  };
}

export async function collectStageBatch(ddlRoot: string, prefix: string, options: StageBatchOptions): Promise<StageBatch> {
  const files = await collectDdlFiles(ddlRoot, prefix);
  if (files.length === 0) {
    return { kind: 'empty' };
  }

  let validated: ValidationResult[] | undefined;
  if (options.validate) {
    // Validation looks at the file as written, before any rewrite
    const { results, mismatches } = validateFiles(files);
    if (mismatches.length > 0) {
      return { kind: 'mismatch', results, mismatches };
    }
    validated = results;
  }

  const inputs = files.map((file, i): BatchInput => {
    const sql = options.mapping ? rewriteSchemaPrefixes(file.sql, options.mapping) : file.sql;
    const detectedSchema = validated ? validated[i].detectedSchema : detectSchema(sql) ?? UNKNOWN_SCHEMA;
    return { fileName: file.fileName, detectedSchema, sql };
  });

  const batch = buildBatch(prefix, inputs);
  return batch ? { kind: 'ready', batch } : { kind: 'empty' };
}
