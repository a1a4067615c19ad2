#!/usr/bin/env node
import chalk from 'chalk';
import dotenv from 'dotenv';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { loadConfig } from './config';
import { ContextArgs, getContext } from './index';
import { Runner } from './runner';

dotenv.config();

async function withRunner(argv: ContextArgs, action: (runner: Runner) => Promise<unknown>) {
  try {
    const context = getContext(argv);
    const config = await loadConfig(context.configPath);
    await action(new Runner(context, config));
  } catch (error: unknown) {
    console.error(chalk.bold.red('❌ Error:'), error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

export function createCli() {
  return yargs(hideBin(process.argv))
    .scriptName('sfddl')
    .usage('$0 <command> [options]')
    .option('config', {
      alias: 'c',
      type: 'string',
      description: 'Path to the YAML configuration file (default: $SFDDL_CONFIG or ./sfddl.yml)',
    })
    .option('dry-run', {
      type: 'boolean',
      description: 'Show the batches that would be sent without executing them',
    })
    .option('verbose', {
      alias: 'v',
      type: 'boolean',
      description: 'Echo batch SQL and snowsql output',
    })
    .option('non-interactive', {
      type: 'boolean',
      description: 'Never prompt (defaults to true when CI is set)',
    })
    .command(
      'test-connection',
      'Check that snowsql can connect with the configured credentials',
      () => {},
      async argv => withRunner(argv, runner => runner.testConnection())
    )
    .command(
      'run',
      'Execute raw, stage and curated DDL files in order, rewriting schema prefixes',
      () => {},
      async argv => withRunner(argv, runner => runner.run())
    )
    .command(
      'execute',
      'Interactive menu to execute one schema batch with prefix validation',
      () => {},
      async argv => withRunner(argv, runner => runner.executeMenu())
    )
    .command(
      'execute:stage <schema>',
      'Execute the batch for one configured schema with prefix validation',
      y => y.positional('schema', { type: 'string', demandOption: true, describe: 'Configured schema name' }),
      async argv => withRunner(argv, runner => runner.executeStage(argv.schema))
    )
    .command(
      'status',
      'List discovered DDL files per stage and their validation state',
      () => {},
      async argv => withRunner(argv, runner => runner.status())
    )
    .command(
      'generate <folder> <prefix> <name>',
      'Create a template DDL file in a table folder',
      y =>
        y
          .positional('folder', { type: 'string', demandOption: true, describe: 'Table folder name' })
          .positional('prefix', { type: 'string', demandOption: true, describe: 'Stage prefix, e.g. raw' })
          .positional('name', { type: 'string', demandOption: true, describe: 'Object name' }),
      async argv => withRunner(argv, runner => runner.generate(argv.folder, argv.prefix, argv.name))
    )
    .command(
      'drop',
      'Drop views and/or tables from drop.target_schema',
      y =>
        y
          .option('confirm', { type: 'string', description: 'Confirmation phrase, e.g. "DELETE RAW"' })
          .option('objects', { choices: ['views', 'tables', 'all'] as const, description: 'Objects to drop' }),
      async argv => withRunner(argv, runner => runner.drop({ confirm: argv.confirm, objects: argv.objects }))
    )
    .demandCommand(1, 'Please specify a command.')
    .strict()
    .alias('h', 'help')
    .epilogue('Configuration is read from a YAML file with connection, snowsql, schemas, ddl and drop sections.');
}

if (require.main === module) {
  createCli()
    .parseAsync()
    .catch((error: unknown) => {
      console.error(chalk.bold.red('❌ Error:'), error instanceof Error ? error.message : error);
      process.exit(1);
    });
}
