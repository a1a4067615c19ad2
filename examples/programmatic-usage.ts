// Example of using sfddl programmatically with TypeScript
import {
  Context,
  Dropper,
  SnowSql,
  collectStageBatch,
  getContext,
  loadConfig,
  Runner,
  schemaMappingFrom,
  SchemaMismatchError,
} from '../src';

// Build a context the same way the CLI does (SFDDL_CONFIG, CI and SFDDL_VERBOSE are honoured)
const context: Context = getContext({ config: 'sfddl.yml', nonInteractive: true });

async function runAllStages() {
  const config = await loadConfig(context.configPath);
  const runner = new Runner(context, config);

  try {
    // Check credentials first
    await runner.testConnection();

    // Rewrite raw./stage./curated. prefixes and run every stage
    const results = await runner.run();
    console.log('Stages run:', results.map(r => r.schema));

    // Or run one configured schema as written, with prefix validation
    await runner.executeStage(config.schemas.raw);

    // Scaffold a new DDL file
    await runner.generate('customers', 'raw', 'customers');
  } catch (error) {
    if (error instanceof SchemaMismatchError) {
      console.error('Mismatched files:', error.mismatches.map(m => m.file.fileName));
    } else {
      console.error('Execution failed:', error);
    }
  }
}

async function previewAndDrop() {
  const config = await loadConfig(context.configPath);

  // Inspect the batch the run command would send for the raw stage
  const staged = await collectStageBatch(config.ddl.root, 'raw', { mapping: schemaMappingFrom(config), validate: false });
  if (staged.kind === 'ready') {
    console.log(staged.batch.query);
  }

  // Direct client access
  const client = new SnowSql(config);
  const ping = await client.ping();
  console.log('Connection:', ping.success ? 'OK' : 'Failed');

  // Preview what a drop of the raw schema would remove
  const dropper = new Dropper(client, config.connection.database, { dryRun: true });
  await dropper.dropObjects('raw', 'VIEW');
}

// Example usage
runAllStages().catch(console.error);
previewAndDrop().catch(console.error);
