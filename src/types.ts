export interface Context {
  configPath: string; // Absolute path to the YAML configuration file
  nonInteractive?: boolean; // Skip prompts; destructive commands then need an explicit confirmation phrase
  dryRun?: boolean; // Print batches without sending them to snowsql
  verbose?: boolean; // Echo client output and batch SQL
}

export type StageToken = 'raw' | 'stage' | 'curated';

export interface ConnectionConfig {
  account: string;
  user: string;
  password: string;
  warehouse: string;
  database: string;
  role: string;
  region?: string;
}

// Resolved, validated configuration. Built once per run and frozen.
export interface SfddlConfig {
  readonly connection: Readonly<ConnectionConfig>;
  readonly client: { readonly path: string };
  readonly schemas: Readonly<Record<StageToken, string>>;
  readonly ddl: { readonly root: string };
  readonly drop: { readonly targetSchema?: string };
}

export type ConfigSectionName = 'connection' | 'snowsql' | 'schemas' | 'ddl' | 'drop';

// Raw shape of the parsed YAML file before validation
export type RawConfigFileContent = Partial<Record<ConfigSectionName, unknown>>;

export interface DdlFile {
  path: string;      // Full path to the .sql file
  fileName: string;  // e.g. "raw.customers.sql"
  folder: string;    // Table folder name the file lives in
  prefix: string;    // Stage prefix parsed from the file name
  sql: string;       // Trimmed file content
}

export interface ValidationResult {
  file: DdlFile;
  detectedSchema: string; // 'unknown' when no CREATE TABLE/VIEW was found
  passed: boolean;
}

export interface BatchEntry {
  fileName: string;
  detectedSchema: string;
}

export interface Batch {
  prefix: string;
  query: string;
  files: BatchEntry[];
  statementCount: number; // One per file; semicolons inside a file are not split
}

export type StageBatch =
  | { kind: 'ready'; batch: Batch }
  | { kind: 'empty' }
  | { kind: 'mismatch'; results: ValidationResult[]; mismatches: ValidationResult[] };

export type ExecutionOutcome = 'SUCCESS' | 'CLIENT_ERROR' | 'PROTOCOL_AMBIGUOUS';

export interface ExecutionResult {
  success: boolean;
  outcome: ExecutionOutcome;
  stdout: string;
  stderr: string;
  exitCode: number | null; // null when the client could not be spawned or was killed by a signal
  durationMs: number;
}

export type ObjectType = 'TABLE' | 'VIEW';

export interface DropResult {
  type: ObjectType;
  success: boolean;
  dropped: string[];
  durationMs: number;
}

export interface DropAllResult {
  schema: string;
  views: DropResult;
  tables: DropResult;
  durationMs: number;
}

// Per-stage outcome used for the execution summary
export interface StageRunResult {
  schema: string;
  prefix: string;
  success: boolean;
  fileCount: number;
  durationMs: number;
}
