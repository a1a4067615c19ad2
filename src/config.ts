import * as fs from 'fs/promises';
import * as path from 'path';
import chalk from 'chalk';
import yaml from 'js-yaml';
import { ConfigError } from './errors';
import { ConfigSectionName, RawConfigFileContent, SfddlConfig, StageToken } from './types';

// Config keys holding the actual schema name for each logical stage
export const SCHEMA_CONFIG_KEYS: Record<StageToken, string> = {
  raw: '1st_schema',
  stage: '2nd_schema',
  curated: '3rd_schema',
};

type Section = Record<string, unknown>;

function isSection(value: unknown): value is Section {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Helper function to interpolate environment variables in config values
export function interpolateEnvVars(value: string, env: NodeJS.ProcessEnv = process.env): string {
  return value.replace(/\$\{([^}]+)\}/g, (_, envVarName: string) => {
    const envValue = env[envVarName];
    if (envValue === undefined) {
      console.warn(chalk.yellow(`⚠️  Warning: Environment variable '${envVarName}' is not set. Using empty string.`));
      return '';
    }
    return envValue;
  });
}

function readValue(section: Section | undefined, key: string, env: NodeJS.ProcessEnv): string | undefined {
  const raw = section?.[key];
  if (raw === undefined || raw === null) {
    return undefined;
  }
  if (typeof raw !== 'string' && typeof raw !== 'number' && typeof raw !== 'boolean') {
    return undefined;
  }
  const value = interpolateEnvVars(String(raw), env).trim();
  return value === '' ? undefined : value;
}

function requireSection(content: RawConfigFileContent, name: ConfigSectionName): Section {
  const section = content[name];
  if (!isSection(section)) {
    throw new ConfigError(`[${name}] section not found in configuration file`);
  }
  return section;
}

function requireValue(section: Section, sectionName: string, key: string, env: NodeJS.ProcessEnv): string {
  const value = readValue(section, key, env);
  if (value === undefined) {
    throw new ConfigError(`'${key}' not specified in [${sectionName}] section`);
  }
  return value;
}

/**
 * Validates parsed configuration content and resolves it into a frozen {@link SfddlConfig}.
 * Relative `ddl_root` paths resolve against `baseDir`.
 */
export function resolveConfig(content: unknown, baseDir: string, env: NodeJS.ProcessEnv = process.env): SfddlConfig {
  if (!isSection(content)) {
    throw new ConfigError('Configuration file is empty or not a mapping');
  }
  const raw: RawConfigFileContent = content;

  const connectionSection = requireSection(raw, 'connection');
  const connection = {
    account: requireValue(connectionSection, 'connection', 'account', env),
    user: requireValue(connectionSection, 'connection', 'user', env),
    password: requireValue(connectionSection, 'connection', 'password', env),
    warehouse: requireValue(connectionSection, 'connection', 'warehouse', env),
    database: requireValue(connectionSection, 'connection', 'database', env),
    role: requireValue(connectionSection, 'connection', 'role', env),
    region: readValue(connectionSection, 'region', env),
  };
  const clientSection = requireSection(raw, 'snowsql');
  const schemasSection = requireSection(raw, 'schemas');
  const ddlSection = requireSection(raw, 'ddl');
  const dropSection = isSection(raw.drop) ? raw.drop : undefined;

  const schemas: Record<StageToken, string> = {
    raw: requireValue(schemasSection, 'schemas', SCHEMA_CONFIG_KEYS.raw, env),
    stage: requireValue(schemasSection, 'schemas', SCHEMA_CONFIG_KEYS.stage, env),
    curated: requireValue(schemasSection, 'schemas', SCHEMA_CONFIG_KEYS.curated, env),
  };

  const config: SfddlConfig = {
    connection: Object.freeze(connection),
    client: Object.freeze({ path: requireValue(clientSection, 'snowsql', 'snowsql_path', env) }),
    schemas: Object.freeze(schemas),
    ddl: Object.freeze({ root: path.resolve(baseDir, requireValue(ddlSection, 'ddl', 'ddl_root', env)) }),
    drop: Object.freeze({ targetSchema: readValue(dropSection, 'target_schema', env) }),
  };
  return Object.freeze(config);
}

export async function loadConfig(configPath: string, env: NodeJS.ProcessEnv = process.env): Promise<SfddlConfig> {
  let fileContent: string;
  try {
    fileContent = await fs.readFile(configPath, 'utf-8');
  } catch (e: unknown) {
    if (e instanceof Error && 'code' in e && e.code === 'ENOENT') {
      throw new ConfigError(`Configuration file ${configPath} not found`);
    }
    throw e;
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(fileContent);
  } catch (e: unknown) {
    if (e instanceof yaml.YAMLException) {
      // js-yaml provides error location
      const location = e.mark ? ` at line ${e.mark.line + 1}, column ${e.mark.column + 1}` : '';
      throw new ConfigError(`Error parsing ${configPath}${location}: ${e.reason}`);
    }
    throw e;
  }

  return resolveConfig(parsed, path.dirname(configPath), env);
}
