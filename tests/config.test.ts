import * as fs from 'fs/promises';
import * as path from 'path';
import { interpolateEnvVars, loadConfig, resolveConfig } from '../src/config';
import { ConfigError } from '../src/errors';
import { makeTempDir, removeTempDir } from './fixtures';

const VALID_YAML = `connection:
  account: test-account
  user: test-user
  password: \${SFDDL_TEST_PWD}
  warehouse: TEST_WH
  database: TEST_DB
  role: TEST_ROLE
  region: us-east-1

snowsql:
  snowsql_path: /usr/local/bin/snowsql

schemas:
  1st_schema: RAW_DB
  2nd_schema: STAGE_DB
  3rd_schema: CURATED_DB

ddl:
  ddl_root: ./ddl

drop:
  target_schema: raw
`;

function validContent(): Record<string, Record<string, unknown>> {
  return {
    connection: {
      account: 'test-account',
      user: 'test-user',
      password: 'test-secret',
      warehouse: 'TEST_WH',
      database: 'TEST_DB',
      role: 'TEST_ROLE',
    },
    snowsql: { snowsql_path: 'snowsql' },
    schemas: { '1st_schema': 'raw', '2nd_schema': 'stage', '3rd_schema': 'curated' },
    ddl: { ddl_root: '/abs/ddl' },
  };
}

describe('Config Loader', () => {
  describe('interpolateEnvVars', () => {
    it('should substitute environment variables', () => {
      expect(interpolateEnvVars('${A}-${B}', { A: 'one', B: 'two' })).toBe('one-two');
    });

    it('should use an empty string for unset variables', () => {
      expect(interpolateEnvVars('pwd=${MISSING}', {})).toBe('pwd=');
      expect(console.warn).toHaveBeenCalled();
    });
  });

  describe('resolveConfig', () => {
    it('should map sections and keys to the config record', () => {
      const config = resolveConfig(validContent(), '/base', {});

      expect(config).toEqual({
        connection: {
          account: 'test-account',
          user: 'test-user',
          password: 'test-secret',
          warehouse: 'TEST_WH',
          database: 'TEST_DB',
          role: 'TEST_ROLE',
          region: undefined,
        },
        client: { path: 'snowsql' },
        schemas: { raw: 'raw', stage: 'stage', curated: 'curated' },
        ddl: { root: '/abs/ddl' },
        drop: { targetSchema: undefined },
      });
    });

    it('should freeze the result', () => {
      const config = resolveConfig(validContent(), '/base', {});

      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.connection)).toBe(true);
      expect(Object.isFrozen(config.schemas)).toBe(true);
    });

    it('should resolve a relative ddl_root against the base directory', () => {
      const content = validContent();
      content.ddl = { ddl_root: '../scripts' };

      expect(resolveConfig(content, '/project/conf', {}).ddl.root).toBe(path.resolve('/project/conf', '../scripts'));
    });

    it('should stringify numeric values', () => {
      const content = validContent();
      content.connection.password = 12345;

      expect(resolveConfig(content, '/base', {}).connection.password).toBe('12345');
    });

    it('should report a missing section', () => {
      const content = validContent();
      delete content.schemas;

      expect(() => resolveConfig(content, '/base', {})).toThrow(new ConfigError('[schemas] section not found in configuration file'));
    });

    it('should report a missing key', () => {
      const content = validContent();
      delete content.connection.role;

      expect(() => resolveConfig(content, '/base', {})).toThrow("'role' not specified in [connection] section");
    });

    it('should treat a blank value as missing', () => {
      const content = validContent();
      content.schemas['2nd_schema'] = '   ';

      expect(() => resolveConfig(content, '/base', {})).toThrow("'2nd_schema' not specified in [schemas] section");
    });

    it('should treat a password from an unset variable as missing', () => {
      const content = validContent();
      content.connection.password = '${NOT_SET}';

      expect(() => resolveConfig(content, '/base', {})).toThrow(ConfigError);
    });

    it('should reject non-mapping content', () => {
      expect(() => resolveConfig(undefined, '/base', {})).toThrow('Configuration file is empty or not a mapping');
      expect(() => resolveConfig(['a'], '/base', {})).toThrow(ConfigError);
    });

    it('should read the optional drop section', () => {
      const content = validContent();
      content.drop = { target_schema: ' raw ' };

      expect(resolveConfig(content, '/base', {}).drop.targetSchema).toBe('raw');
    });
  });

  describe('loadConfig', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await makeTempDir();
    });

    afterEach(async () => {
      await removeTempDir(dir);
    });

    it('should load a YAML file and interpolate variables', async () => {
      const configPath = path.join(dir, 'sfddl.yml');
      await fs.writeFile(configPath, VALID_YAML);

      const config = await loadConfig(configPath, { SFDDL_TEST_PWD: 'test-secret' });

      expect(config.connection.password).toBe('test-secret');
      expect(config.connection.region).toBe('us-east-1');
      expect(config.client.path).toBe('/usr/local/bin/snowsql');
      expect(config.schemas).toEqual({ raw: 'RAW_DB', stage: 'STAGE_DB', curated: 'CURATED_DB' });
      expect(config.ddl.root).toBe(path.join(dir, 'ddl'));
      expect(config.drop.targetSchema).toBe('raw');
    });

    it('should raise ConfigError for a missing file', async () => {
      await expect(loadConfig(path.join(dir, 'nope.yml'), {})).rejects.toThrow(`Configuration file ${path.join(dir, 'nope.yml')} not found`);
    });

    it('should raise ConfigError with the location of a YAML syntax error', async () => {
      const configPath = path.join(dir, 'broken.yml');
      await fs.writeFile(configPath, 'connection:\n  account: [unclosed\n');

      await expect(loadConfig(configPath, {})).rejects.toBeInstanceOf(ConfigError);
    });
  });
});
