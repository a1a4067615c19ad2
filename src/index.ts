import * as path from 'path';
import { Context } from './types';

// Export public API for programmatic usage
export { Runner } from './runner';
export type { DropOptions, DropSelection, StageTarget } from './runner';
export { SnowSql, buildArgs, classifyOutcome, detectKnownErrors, strictOutcome, exitCodeOutcome } from './snowsql';
export { Dropper, parseObjectList, buildDropStatements, listObjectsQuery } from './drop';
export { loadConfig, resolveConfig } from './config';
export { rewriteSchemaPrefixes, schemaMappingFrom, STAGE_TOKENS } from './schema';
export { discoverDdlFiles, collectDdlFiles, listTableFolders } from './discovery';
export { detectSchema, validateFile, validateFiles } from './validator';
export { buildBatch, collectStageBatch } from './batch';
export { Confirmation, confirmationPhrase } from './confirmation';
export * from './errors';
export * from './types';

export const DEFAULT_CONFIG_FILE = 'sfddl.yml';

export interface ContextArgs {
  config?: string;
  nonInteractive?: boolean;
  dryRun?: boolean;
  verbose?: boolean;
}

export function getContext(argv: ContextArgs): Context {
  const configPath = path.resolve(argv.config || process.env.SFDDL_CONFIG || DEFAULT_CONFIG_FILE);

  return {
    configPath,
    nonInteractive: argv.nonInteractive !== undefined ? argv.nonInteractive : !!process.env.CI,
    dryRun: argv.dryRun !== undefined ? argv.dryRun : false,
    verbose: argv.verbose !== undefined ? argv.verbose : process.env.SFDDL_VERBOSE === 'true',
  };
}
