import { describe, it, expect, vi } from 'vitest';
import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { splitSqlStatements } from './migrate.js';

vi.mock('../utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const __dirname = dirname(fileURLToPath(import.meta.url));

describe('splitSqlStatements', () => {
  it('should split on top-level semicolons and drop comments', () => {
    const sql = `
-- vehicles
CREATE TABLE a (id INT);
CREATE INDEX idx_a ON a(id); -- trailing comment
`;
    expect(splitSqlStatements(sql)).toEqual(['CREATE TABLE a (id INT)', 'CREATE INDEX idx_a ON a(id)']);
  });

  it('should keep semicolons inside strings', () => {
    expect(splitSqlStatements("INSERT INTO t VALUES ('a;b'); SELECT 1")).toEqual([
      "INSERT INTO t VALUES ('a;b')",
      'SELECT 1',
    ]);
  });

  it('should keep dollar-quoted function bodies whole', () => {
    const sql = `CREATE FUNCTION f() RETURNS void AS $$
BEGIN
  UPDATE t SET x = 1;
  DELETE FROM t WHERE x = 2;
END;
$$ LANGUAGE plpgsql;
SELECT 2;`;

    const statements = splitSqlStatements(sql);

    expect(statements).toHaveLength(2);
    expect(statements[0].startsWith('CREATE FUNCTION f()')).toBe(true);
    expect(statements[0].endsWith('$$ LANGUAGE plpgsql')).toBe(true);
    expect(statements[1]).toBe('SELECT 2');
  });

  it('should match tagged dollar quotes', () => {
    expect(splitSqlStatements('SELECT $body$ a; $$ b; $body$; SELECT 3')).toEqual([
      'SELECT $body$ a; $$ b; $body$',
      'SELECT 3',
    ]);
  });

  it('should keep commit_vehicle_batch as one statement in the schema', () => {
    const schema = readFileSync(join(__dirname, '../database/schema.sql'), 'utf-8');
    const statements = splitSqlStatements(schema);
    const fn = statements.filter(s => s.includes('commit_vehicle_batch'));

    expect(fn).toHaveLength(1);
    expect(fn[0].startsWith('CREATE OR REPLACE FUNCTION commit_vehicle_batch')).toBe(true);
    expect(fn[0].endsWith('END;\n$$')).toBe(true);
  });
});
