import * as fs from 'fs/promises';
import * as path from 'path';
import chalk from 'chalk';
import inquirer from 'inquirer';
import { collectStageBatch, StageBatchOptions } from './batch';
import { Confirmation } from './confirmation';
import { collectDdlFiles, listTableFolders } from './discovery';
import { Dropper } from './drop';
import { BatchExecutionError, ConfigError, ConnectionError, SchemaMismatchError, SfddlError } from './errors';
import { schemaMappingFrom, STAGE_TOKENS } from './schema';
import { exitCodeOutcome, OutcomePolicy, SnowSql, strictOutcome } from './snowsql';
import { Batch, Context, DropAllResult, DropResult, SfddlConfig, StageRunResult } from './types';
import { UNKNOWN_SCHEMA, validateFiles } from './validator';

export interface StageTarget {
  schema: string; // Schema the batch is reported against
  prefix: string; // File name prefix selecting the batch
}

export type DropSelection = 'views' | 'tables' | 'all';

export interface DropOptions {
  confirm?: string; // Confirmation phrase supplied up front instead of prompting
  objects?: DropSelection;
}

const RULE = '='.repeat(80);

function seconds(ms: number): string {
  return (ms / 1000).toFixed(2);
}

export class Runner {
  private context: Context;
  private config: SfddlConfig;
  private client: SnowSql;

  constructor(context: Context, config: SfddlConfig) {
    this.context = context;
    this.config = config;
    this.client = new SnowSql(config, { verbose: context.verbose });
  }

  /**
   * Stages of the validating flow: files are prefixed with the configured schema names.
   */
  executionStages(): StageTarget[] {
    return STAGE_TOKENS.map(token => ({ schema: this.config.schemas[token], prefix: this.config.schemas[token] }));
  }

  /**
   * Runs the connection test query. Under `strictOutcome` error markers on a zero exit also fail it.
   */
  async testConnection(acceptOutcome: OutcomePolicy = exitCodeOutcome) {
    console.log(chalk.blue('🔌 Testing Snowflake connection...'));
    const result = await this.client.ping(acceptOutcome);
    if (!result.success) {
      console.error(chalk.bold.red('❌ Connection failed.'));
      throw new ConnectionError(result);
    }
    console.log(chalk.green('✅ Connection successful!\n'));
  }

  // Dry-run batch previews skip the connection test
  private async _ensureConnection(acceptOutcome: OutcomePolicy) {
    if (!this.context.dryRun) {
      await this.testConnection(acceptOutcome);
    }
  }

  private _printBatchPreview(batch: Batch) {
    console.log(chalk.cyan('┌─') + chalk.cyan(`─ DRY RUN: ${batch.prefix}.* batch `).padEnd(70, '─') + chalk.cyan('─'));
    console.log(chalk.cyan('│') + ` Statements: ${batch.statementCount}`);
    console.log(chalk.cyan('│') + ' ');
    batch.query.split('\n').forEach(line => console.log(chalk.cyan('│') + `   ${line}`));
    console.log(chalk.cyan('└') + chalk.cyan('─'.repeat(70)));
  }

  private async _runStage(target: StageTarget, options: StageBatchOptions, acceptOutcome: OutcomePolicy): Promise<StageRunResult> {
    const started = Date.now();
    const { schema, prefix } = target;

    console.log(chalk.magenta(`\n${RULE}`));
    console.log(chalk.magenta.bold(`🔷 Executing ${schema.toUpperCase()} schema objects (from ${prefix}.* files)`));
    console.log(chalk.magenta(RULE));

    const staged = await collectStageBatch(this.config.ddl.root, prefix, options);

    if (staged.kind === 'empty') {
      console.warn(chalk.yellow(`  ⚠️  No SQL files found with prefix '${prefix}'`));
      return { schema, prefix, success: false, fileCount: 0, durationMs: Date.now() - started };
    }

    if (staged.kind === 'mismatch') {
      for (const mismatch of staged.mismatches) {
        console.error(chalk.bold.red(`  ❌ SCHEMA MISMATCH: ${mismatch.file.fileName}`));
        console.error(chalk.red(`     File prefix: '${prefix}' but SQL creates objects in '${mismatch.detectedSchema}' schema`));
        console.error(chalk.red(`     Expected: ${prefix}.* files should only create objects in '${prefix}' schema`));
      }
      console.error(chalk.bold.red('\n  🛑 Stopping execution due to schema mismatches'));
      console.log(chalk.yellow('  💡 Tip: File prefix must match the schema used in SQL statements'));
      throw new SchemaMismatchError(prefix, staged.mismatches);
    }

    const { batch } = staged;
    if (options.validate) {
      batch.files
        .filter(file => file.detectedSchema === UNKNOWN_SCHEMA)
        .forEach(file => console.warn(chalk.yellow(`  ⚠️  Warning: Could not detect schema in ${file.fileName}`)));
      console.log(chalk.green(`  ✅ Validation passed: All ${batch.statementCount} file(s) use correct schema '${prefix}'`));
    }
    console.log(chalk.cyan(`  📦 Batching ${batch.statementCount} DDL statement(s):`));
    batch.files.forEach(file => console.log(chalk.cyan(`     ✓ ${file.fileName} → ${file.detectedSchema} schema`)));

    if (this.context.dryRun) {
      this._printBatchPreview(batch);
      return { schema, prefix, success: true, fileCount: batch.statementCount, durationMs: Date.now() - started };
    }

    if (this.context.verbose) {
      console.log(chalk.gray('--- BATCH SQL ---'));
      console.log(chalk.gray(batch.query));
      console.log(chalk.gray('-----------------'));
    }

    console.log(chalk.blue(`\n  🚀 Executing batch for ${schema.toUpperCase()} schema...`));
    const result = await this.client.execute(batch.query, { acceptOutcome });
    const durationMs = Date.now() - started;

    if (!result.success) {
      console.error(chalk.bold.red(`  ❌ Batch execution failed for ${schema.toUpperCase()} schema`));
      console.log(chalk.yellow(`  💡 Tip: Check that '${schema}' schema exists and check individual files for syntax errors`));
      throw new BatchExecutionError(schema, result);
    }

    console.log(chalk.green(`  ✅ Successfully executed ${batch.statementCount} statement(s)`));
    console.log(chalk.gray(`  ⏱️  Execution time: ${seconds(durationMs)} seconds`));
    return { schema, prefix, success: true, fileCount: batch.statementCount, durationMs };
  }

  private _printSummary(results: StageRunResult[], overallMs: number) {
    const totalFiles = results.reduce((sum, r) => sum + r.fileCount, 0);
    if (totalFiles === 0) {
      return;
    }
    console.log(chalk.bold(`\n${RULE}`));
    console.log(chalk.bold('📊 EXECUTION SUMMARY'));
    console.log(chalk.bold(RULE));
    for (const r of results.filter(r => r.fileCount > 0)) {
      const status = r.success ? '✅' : '❌';
      console.log(`  ${status} ${r.schema.toUpperCase()}: ${seconds(r.durationMs)}s | ${r.fileCount} files | ${seconds(r.durationMs / r.fileCount)}s per file`);
    }
    console.log(`\n  📁 TOTAL FILES EXECUTED: ${totalFiles}`);
    console.log(`  ⏱️  TOTAL EXECUTION TIME: ${seconds(overallMs)} seconds (${(overallMs / 60000).toFixed(2)} minutes)`);
    console.log(`  ⚡ AVERAGE TIME PER FILE: ${seconds(overallMs / totalFiles)} seconds`);
    console.log(chalk.bold(RULE));
  }

  /**
   * Runs raw, stage and curated files in that order, rewriting schema prefixes to the configured names.
   * A failed stage is reported and the next stage still runs.
   */
  async run(): Promise<StageRunResult[]> {
    await this._ensureConnection(exitCodeOutcome);
    const overallStart = Date.now();
    const mapping = schemaMappingFrom(this.config);
    const folders = await listTableFolders(this.config.ddl.root);

    console.log(chalk.blue(`📊 Found ${folders.length} table folders`));
    console.log(chalk.blue(`🔄 Execution order: ${STAGE_TOKENS.map(token => mapping[token]).join(' -> ')}`));
    console.log(chalk.blue(`📝 Schema mapping: ${STAGE_TOKENS.map(token => `${token}=${mapping[token]}`).join(', ')}`));

    const results: StageRunResult[] = [];
    for (const token of STAGE_TOKENS) {
      try {
        const result = await this._runStage({ schema: mapping[token], prefix: token }, { mapping, validate: false }, exitCodeOutcome);
        if (result.fileCount > 0) {
          results.push(result);
        }
      } catch (error: unknown) {
        if (!(error instanceof BatchExecutionError)) {
          throw error;
        }
        results.push({ schema: mapping[token], prefix: token, success: false, fileCount: 0, durationMs: error.result.durationMs });
      }
    }

    const failed = results.filter(r => !r.success);
    console.log(chalk.bold(`\n${RULE}`));
    if (failed.length > 0) {
      console.error(chalk.bold.red(`❌ DDL execution finished with ${failed.length} failed stage(s): ${failed.map(r => r.schema.toUpperCase()).join(', ')}`));
      console.log(chalk.bold(RULE));
      throw new SfddlError(`${failed.length} stage(s) failed`);
    }
    console.log(chalk.greenBright('🎉 DDL Execution Complete!'));
    console.log(chalk.bold(RULE));
    this._printSummary(results, Date.now() - overallStart);
    return results;
  }

  /**
   * Validating run of one configured schema. Any mismatch aborts before anything is sent.
   */
  async executeStage(schemaName: string): Promise<StageRunResult> {
    const target = this.executionStages().find(stage => stage.schema.toLowerCase() === schemaName.toLowerCase());
    if (!target) {
      throw new SfddlError(`Unknown schema '${schemaName}'. Configured: ${this.executionStages().map(s => s.schema).join(', ')}`);
    }
    await this._ensureConnection(strictOutcome);
    const result = await this._runStage(target, { validate: true }, strictOutcome);
    if (result.fileCount === 0) {
      throw new SfddlError(`No SQL files found with prefix '${target.prefix}'`);
    }
    this._printSummary([result], result.durationMs);
    return result;
  }

  /**
   * Interactive loop over the validating flow: pick a schema, run it, then decide whether to go again.
   */
  async executeMenu() {
    if (this.context.nonInteractive) {
      throw new SfddlError('The execute menu needs an interactive terminal. Use execute:stage <schema> instead.');
    }
    await this._ensureConnection(strictOutcome);
    const stages = this.executionStages();
    const folders = await listTableFolders(this.config.ddl.root);
    console.log(chalk.blue(`📊 Found ${folders.length} table folders\n`));

    while (true) {
      console.log(chalk.bold(`\n${RULE}`));
      console.log(chalk.bold('📋 SCHEMA EXECUTION MENU'));
      console.log(chalk.bold(RULE));
      console.log(chalk.gray('💡 Note: Files are executed AS-IS. Schema names in SQL files are NOT modified.'));

      const { choice } = await inquirer.prompt<{ choice: number }>([
        {
          type: 'list',
          name: 'choice',
          message: 'Enter your choice:',
          choices: [
            ...stages.map((stage, i) => ({
              name: `${i + 1}. Execute ${stage.schema.toUpperCase()} schema (${stage.prefix}.* files)`,
              value: i + 1,
            })),
            { name: '0. Exit', value: 0 },
          ],
        },
      ]);

      if (choice === 0) {
        console.log(chalk.gray('\n👋 Exiting...'));
        return;
      }
      const target = stages[choice - 1];
      if (!target) {
        console.error(chalk.bold.red('❌ Invalid choice.'));
        continue;
      }

      const overallStart = Date.now();
      console.log(chalk.blue('\n⚡ Executing 1 schema(s)...'));
      try {
        const result = await this._runStage(target, { validate: true }, strictOutcome);
        if (result.success) {
          this._printSummary([result], Date.now() - overallStart);
          console.log(chalk.greenBright('\n🎉 Execution Complete!'));
        } else {
          console.error(chalk.bold.red('\n🛑 Execution stopped due to failure'));
        }
      } catch (error: unknown) {
        if (!(error instanceof SfddlError)) {
          throw error;
        }
        console.error(chalk.bold.red('\n🛑 Execution stopped due to failure'));
      }

      const { again } = await inquirer.prompt<{ again: boolean }>([
        { type: 'confirm', name: 'again', message: 'Run another execution?', default: false },
      ]);
      if (!again) {
        console.log(chalk.gray('\n👋 Goodbye!'));
        return;
      }
    }
  }

  /**
   * Lists discovered files per stage and their validation state without touching the warehouse.
   */
  async status() {
    const folders = await listTableFolders(this.config.ddl.root);
    console.log(chalk.bold(`\nDDL Status (root: ${this.config.ddl.root}, ${folders.length} table folders):`));
    console.log(chalk.gray('-------------------------------------------------------------------------------------'));

    let total = 0;
    for (const token of STAGE_TOKENS) {
      const prefixes = Array.from(new Set([token, this.config.schemas[token]]));
      for (const prefix of prefixes) {
        const files = await collectDdlFiles(this.config.ddl.root, prefix);
        if (files.length === 0) {
          continue;
        }
        total += files.length;
        console.log(chalk.cyan(`\n${prefix}.* (${files.length} file(s), stage ${token} → ${this.config.schemas[token]})`));
        for (const result of validateFiles(files).results) {
          let label = chalk.green.bold('OK'.padEnd(10));
          if (!result.passed) label = chalk.red.bold('MISMATCH'.padEnd(10));
          else if (result.detectedSchema === UNKNOWN_SCHEMA) label = chalk.yellow.bold('UNKNOWN'.padEnd(10));
          console.log(`${label}${result.file.folder}/${result.file.fileName} ${chalk.dim(`→ ${result.detectedSchema}`)}`);
        }
      }
    }

    if (total === 0) {
      console.log(chalk.yellow('ℹ️  No DDL files found.'));
    }
    console.log(chalk.gray('-------------------------------------------------------------------------------------'));
  }

  /**
   * Scaffold a new DDL file under a table folder.
   */
  async generate(folder: string, prefix: string, objectName: string): Promise<string> {
    const safeName = objectName.trim().replace(/\s+/g, '_').replace(/[^a-zA-Z0-9_]/g, '').toLowerCase();
    const safeFolder = folder.trim().replace(/[^a-zA-Z0-9_-]/g, '');
    if (!safeName || !safeFolder) {
      throw new SfddlError('Folder and object name must contain at least one letter, digit or underscore');
    }
    const folderPath = path.join(this.config.ddl.root, safeFolder);
    const filePath = path.join(folderPath, `${prefix}.${safeName}.sql`);
    const content = `-- DDL for ${safeFolder} ${safeName.replace(/_/g, ' ')}
CREATE OR REPLACE TABLE ${prefix}.${safeName} (
    id INT
);
`;

    try {
      await fs.mkdir(folderPath, { recursive: true });
      await fs.writeFile(filePath, content, { flag: 'wx' });
    } catch (e: unknown) {
      const message = e instanceof Error ? e.message : String(e);
      console.error(chalk.bold.red(`❌ Error generating DDL file ${filePath}:`), message);
      throw e;
    }
    console.log(chalk.green(`✅ Generated new DDL file: ${filePath}`));
    console.log(chalk.yellow('ℹ️  Please edit this file to add the column definitions.'));
    return filePath;
  }

  private async _askForPhrase(confirmation: Confirmation, supplied?: string): Promise<string> {
    if (supplied !== undefined) {
      return supplied;
    }
    if (this.context.nonInteractive) {
      throw new SfddlError(`Non-interactive drop needs --confirm "${confirmation.phrase}"`);
    }
    const { phrase } = await inquirer.prompt<{ phrase: string }>([
      { type: 'input', name: 'phrase', message: confirmation.message },
    ]);
    return phrase;
  }

  private async _askForSelection(supplied?: DropSelection): Promise<DropSelection> {
    if (supplied) {
      return supplied;
    }
    if (this.context.nonInteractive) {
      throw new SfddlError('Non-interactive drop needs --objects views|tables|all');
    }
    const { selection } = await inquirer.prompt<{ selection: DropSelection }>([
      {
        type: 'list',
        name: 'selection',
        message: 'What would you like to drop?',
        choices: [
          { name: '1. Only VIEWS', value: 'views' },
          { name: '2. Only TABLES', value: 'tables' },
          { name: '3. ALL OBJECTS (Views + Tables)', value: 'all' },
        ],
      },
    ]);
    return selection;
  }

  /**
   * Drops objects from the configured target schema after the operator types `DELETE <SCHEMA>`.
   * Returns undefined when the operator cancels.
   */
  async drop(options: DropOptions = {}): Promise<DropResult | DropAllResult | undefined> {
    const target = this.config.drop.targetSchema;
    if (!target) {
      console.error(chalk.bold.red('❌ Error: target_schema not specified in [drop] section'));
      console.log(chalk.yellow('💡 Please add the following to your configuration file:'));
      console.log(chalk.gray('\ndrop:\n  target_schema: raw'));
      throw new ConfigError("'target_schema' not specified in [drop] section");
    }

    await this.testConnection();
    const dropper = new Dropper(this.client, this.config.connection.database, { dryRun: this.context.dryRun });
    await dropper.describeSchema(target);

    const confirmation = new Confirmation(target);
    console.warn(chalk.yellow.bold(`\n${RULE}`));
    console.warn(chalk.yellow.bold(`⚠️  WARNING: You are about to DROP ALL OBJECTS from '${target.toUpperCase()}' schema!`));
    console.warn(chalk.yellow.bold(RULE));

    if (confirmation.submit(await this._askForPhrase(confirmation, options.confirm)) !== 'CONFIRMED') {
      console.log(chalk.gray('\n❌ Drop operation cancelled.'));
      return undefined;
    }

    const selection = await this._askForSelection(options.objects);
    let result: DropResult | DropAllResult;
    if (selection === 'views') {
      result = await dropper.dropObjects(target, 'VIEW');
    } else if (selection === 'tables') {
      result = await dropper.dropObjects(target, 'TABLE');
    } else {
      result = await dropper.dropAll(target);
    }

    console.log(chalk.greenBright('\n🎉 Drop operation complete!'));
    return result;
  }
}
