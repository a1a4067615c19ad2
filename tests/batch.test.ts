import { buildBatch, collectStageBatch, STATEMENT_SEPARATOR } from '../src/batch';
import { makeTempDir, removeTempDir, writeDdl } from './fixtures';

describe('Batch Builder', () => {
  describe('buildBatch', () => {
    it('should join three files with two separators and one trailing semicolon', () => {
      const batch = buildBatch('raw', [
        { fileName: 'raw.a.sql', detectedSchema: 'raw', sql: 'CREATE TABLE raw.a (id INT)' },
        { fileName: 'raw.b.sql', detectedSchema: 'raw', sql: 'CREATE TABLE raw.b (id INT);' },
        { fileName: 'raw.c.sql', detectedSchema: 'unknown', sql: 'COMMENT ON TABLE raw.a IS \'x\';\n' },
      ]);

      expect(batch).toBeDefined();
      expect(batch?.query).toBe(
        "CREATE TABLE raw.a (id INT);\n\nCREATE TABLE raw.b (id INT);\n\nCOMMENT ON TABLE raw.a IS 'x';"
      );
      expect(batch?.query.split(STATEMENT_SEPARATOR)).toHaveLength(3);
      expect(batch?.query.endsWith(';')).toBe(true);
      expect(batch?.query.endsWith(';;')).toBe(false);
    });

    it('should count files, not semicolons', () => {
      const batch = buildBatch('raw', [
        { fileName: 'raw.a.sql', detectedSchema: 'raw', sql: 'CREATE TABLE raw.a (id INT); CREATE TABLE raw.a2 (id INT)' },
      ]);

      expect(batch?.statementCount).toBe(1);
      expect(batch?.query).toBe('CREATE TABLE raw.a (id INT); CREATE TABLE raw.a2 (id INT);');
    });

    it('should record provenance per file', () => {
      const batch = buildBatch('raw', [
        { fileName: 'raw.a.sql', detectedSchema: 'raw', sql: 'CREATE TABLE raw.a (id INT)' },
        { fileName: 'raw.b.sql', detectedSchema: 'unknown', sql: 'SELECT 1' },
      ]);

      expect(batch?.files).toEqual([
        { fileName: 'raw.a.sql', detectedSchema: 'raw' },
        { fileName: 'raw.b.sql', detectedSchema: 'unknown' },
      ]);
    });

    it('should return undefined without files', () => {
      expect(buildBatch('raw', [])).toBeUndefined();
    });
  });

  describe('collectStageBatch', () => {
    let root: string;

    beforeEach(async () => {
      root = await makeTempDir();
    });

    afterEach(async () => {
      await removeTempDir(root);
    });

    it('should rewrite schema prefixes with the configured mapping', async () => {
      await writeDdl(root, 'customers', 'raw.customers.sql', 'CREATE TABLE raw.customers(id INT);');
      const mapping = { raw: 'RAW_DB', stage: 'STAGE_DB', curated: 'CURATED_DB' };

      const staged = await collectStageBatch(root, 'raw', { mapping, validate: false });

      expect(staged).toEqual({
        kind: 'ready',
        batch: {
          prefix: 'raw',
          query: 'CREATE TABLE RAW_DB.customers(id INT);',
          files: [{ fileName: 'raw.customers.sql', detectedSchema: 'raw_db' }],
          statementCount: 1,
        },
      });
    });

    it('should report a mismatch and build no batch', async () => {
      await writeDdl(root, 'customers', 'raw.customers.sql', 'CREATE TABLE stage.customers (id INT);');
      await writeDdl(root, 'orders', 'raw.orders.sql', 'CREATE TABLE raw.orders (id INT);');

      const staged = await collectStageBatch(root, 'raw', { validate: true });

      expect(staged.kind).toBe('mismatch');
      if (staged.kind === 'mismatch') {
        expect(staged.results).toHaveLength(2);
        expect(staged.mismatches).toHaveLength(1);
        expect(staged.mismatches[0].file.fileName).toBe('raw.customers.sql');
        expect(staged.mismatches[0].detectedSchema).toBe('stage');
      }
    });

    it('should validate the text as written before rewriting', async () => {
      await writeDdl(root, 'customers', 'raw.customers.sql', 'CREATE TABLE raw.customers (id INT);');
      const mapping = { raw: 'RAW_DB', stage: 'STAGE_DB', curated: 'CURATED_DB' };

      const staged = await collectStageBatch(root, 'raw', { mapping, validate: true });

      expect(staged.kind).toBe('ready');
      if (staged.kind === 'ready') {
        expect(staged.batch.query).toBe('CREATE TABLE RAW_DB.customers (id INT);');
        expect(staged.batch.files[0].detectedSchema).toBe('raw');
      }
    });

    it('should pass files without a detectable schema', async () => {
      await writeDdl(root, 'grants', 'raw.grants.sql', 'GRANT USAGE ON SCHEMA raw TO ROLE analyst;');

      const staged = await collectStageBatch(root, 'raw', { validate: true });

      expect(staged.kind).toBe('ready');
      if (staged.kind === 'ready') {
        expect(staged.batch.files).toEqual([{ fileName: 'raw.grants.sql', detectedSchema: 'unknown' }]);
      }
    });

    it('should be empty when no file has the prefix', async () => {
      await writeDdl(root, 'customers', 'raw.customers.sql', 'CREATE TABLE raw.customers (id INT);');

      expect(await collectStageBatch(root, 'curated', { validate: true })).toEqual({ kind: 'empty' });
    });
  });
});
