import { SfddlConfig, StageToken } from './types';

// Logical stages in execution order
export const STAGE_TOKENS: readonly StageToken[] = ['raw', 'stage', 'curated'];

export type SchemaMapping = Readonly<Record<StageToken, string>>;

export function schemaMappingFrom(config: SfddlConfig): SchemaMapping {
  return { raw: config.schemas.raw, stage: config.schemas.stage, curated: config.schemas.curated };
}

/**
 * Replaces every `raw.`, `stage.` and `curated.` prefix with the configured schema name.
 *
 * Matching is case-sensitive and word-boundary delimited. Occurrences inside string literals
 * and comments are rewritten too. Tokens are applied in stage order, so a configured name that
 * is itself a later token gets rewritten again.
 */
export function rewriteSchemaPrefixes(sql: string, mapping: SchemaMapping): string {
  let rewritten = sql;
  for (const token of STAGE_TOKENS) {
    const actual = mapping[token];
    rewritten = rewritten.replace(new RegExp(`\\b${token}\\.`, 'g'), () => `${actual}.`);
  }
  return rewritten;
}
