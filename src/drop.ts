import chalk from 'chalk';
import { PLAIN_OUTPUT_OPTIONS, SnowSql } from './snowsql';
import { DropAllResult, DropResult, ExecutionResult, ObjectType } from './types';

export function listObjectsQuery(database: string, schema: string, type: ObjectType): string {
  const schemaFilter = schema.toUpperCase();
  if (type === 'VIEW') {
    return `SELECT TABLE_NAME FROM ${database}.INFORMATION_SCHEMA.VIEWS WHERE TABLE_SCHEMA = '${schemaFilter}';`;
  }
  return `SELECT TABLE_NAME FROM ${database}.INFORMATION_SCHEMA.TABLES WHERE TABLE_SCHEMA = '${schemaFilter}' AND TABLE_TYPE = 'BASE TABLE';`;
}

export function describeSchemaQuery(database: string, schema: string): string {
  return `SELECT TABLE_NAME, TABLE_TYPE FROM ${database}.INFORMATION_SCHEMA.TABLES WHERE TABLE_SCHEMA = '${schema.toUpperCase()}' ORDER BY TABLE_TYPE, TABLE_NAME;`;
}

/**
 * Recovers bare object names from snowsql plain output. Border rows (`*`, `+`) and the
 * `Goodbye!` sign-off are dropped, table pipes and padding are stripped.
 */
export function parseObjectList(output: string): string[] {
  const names: string[] = [];
  for (const rawLine of output.split('\n')) {
    const line = rawLine.trim();
    if (!line || line.startsWith('*') || line.startsWith('+') || line === 'Goodbye!') {
      continue;
    }
    const name = line.replace(/^[|\s]+|[|\s]+$/g, '');
    if (name) {
      names.push(name);
    }
  }
  return names;
}

// Names are interpolated as-is, without quoting
export function buildDropStatements(schema: string, type: ObjectType, names: string[]): string[] {
  return names.map(name =>
    type === 'VIEW'
      ? `DROP VIEW IF EXISTS ${schema}.${name};`
      : `DROP TABLE IF EXISTS ${schema}.${name} CASCADE;`
  );
}

export class Dropper {
  private client: SnowSql;
  private database: string;
  private dryRun: boolean;

  constructor(client: SnowSql, database: string, options: { dryRun?: boolean } = {}) {
    this.client = client;
    this.database = database;
    this.dryRun = options.dryRun ?? false;
  }

  async describeSchema(schema: string): Promise<ExecutionResult> {
    console.log(chalk.blue(`\n🔍 Fetching objects from ${schema.toUpperCase()} schema...`));
    const result = await this.client.execute(describeSchemaQuery(this.database, schema));
    if (result.success) {
      console.log(chalk.green(`✅ Successfully retrieved object list from ${schema.toUpperCase()} schema`));
    } else {
      console.error(chalk.bold.red(`❌ Failed to retrieve objects from ${schema.toUpperCase()} schema`));
    }
    return result;
  }

  async listObjects(schema: string, type: ObjectType): Promise<string[] | undefined> {
    console.log(chalk.gray(`📋 Listing ${type}s...`));
    const result = await this.client.execute(listObjectsQuery(this.database, schema, type), {
      outputOptions: PLAIN_OUTPUT_OPTIONS,
      quiet: true,
    });
    if (!result.success) {
      console.error(chalk.bold.red(`❌ Failed to list ${type}s in ${schema.toUpperCase()} schema:`), result.stderr.trim());
      return undefined;
    }
    return parseObjectList(result.stdout);
  }

  async dropObjects(schema: string, type: ObjectType): Promise<DropResult> {
    const started = Date.now();
    console.log(chalk.magenta(`\n${'='.repeat(80)}`));
    console.log(chalk.magenta(`🗑️  Dropping all ${type}s from ${schema.toUpperCase()} schema`));
    console.log(chalk.magenta('='.repeat(80)));

    const names = await this.listObjects(schema, type);
    if (names === undefined) {
      return { type, success: false, dropped: [], durationMs: Date.now() - started };
    }
    if (names.length === 0) {
      console.log(chalk.yellow(`ℹ️  No ${type}s found in ${schema.toUpperCase()} schema`));
      return { type, success: true, dropped: [], durationMs: Date.now() - started };
    }

    console.log(chalk.cyan(`📦 Found ${names.length} ${type}(s) to drop:`));
    names.forEach(name => console.log(chalk.cyan(`    - ${name}`)));

    const statements = buildDropStatements(schema, type, names);
    if (this.dryRun) {
      console.log(chalk.cyan('\n🔍 DRY RUN: The following statements would be executed:'));
      statements.forEach(statement => console.log(chalk.cyan(`    ${statement}`)));
      return { type, success: true, dropped: [], durationMs: Date.now() - started };
    }

    console.log(chalk.blue('\n🗑️  Executing DROP statements...'));
    const result = await this.client.execute(statements.join('\n'));
    const durationMs = Date.now() - started;

    if (result.success) {
      console.log(chalk.green(`✅ Successfully dropped ${names.length} ${type}(s)`));
      console.log(chalk.gray(`⏱️  Execution time: ${(durationMs / 1000).toFixed(2)} seconds`));
    } else {
      console.error(chalk.bold.red(`❌ Failed to drop some ${type}s`));
    }
    return { type, success: result.success, dropped: result.success ? names : [], durationMs };
  }

  /**
   * Views first, then tables. A failure on views does not stop the table pass.
   */
  async dropAll(schema: string): Promise<DropAllResult> {
    const started = Date.now();
    console.log(chalk.magenta(`\n${'='.repeat(80)}`));
    console.log(chalk.magenta.bold(`🗑️  DROPPING ALL OBJECTS FROM ${schema.toUpperCase()} SCHEMA`));
    console.log(chalk.magenta('='.repeat(80)));

    console.log(chalk.blue('\n🔷 Step 1: Dropping VIEWS...'));
    const views = await this.dropObjects(schema, 'VIEW');
    if (!views.success) {
      console.warn(chalk.yellow('\n⚠️  Warning: Failed to drop views, but continuing...'));
    }

    console.log(chalk.blue('\n🔷 Step 2: Dropping TABLES...'));
    const tables = await this.dropObjects(schema, 'TABLE');
    const durationMs = Date.now() - started;

    console.log(chalk.bold(`\n${'='.repeat(80)}`));
    console.log(chalk.bold('📊 DROP SUMMARY'));
    console.log(chalk.bold('='.repeat(80)));
    console.log(`  Schema: ${schema.toUpperCase()}`);
    console.log(`  Views: ${views.success ? chalk.green('✅ Dropped') : chalk.red('❌ Failed')}`);
    console.log(`  Tables: ${tables.success ? chalk.green('✅ Dropped') : chalk.red('❌ Failed')}`);
    console.log(`  ⏱️  Total time: ${(durationMs / 1000).toFixed(2)} seconds`);
    console.log(chalk.bold('='.repeat(80)));

    return { schema, views, tables, durationMs };
  }
}
