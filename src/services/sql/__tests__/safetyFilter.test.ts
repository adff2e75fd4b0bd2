import { describe, expect, it } from 'vitest';
import { checkQuery } from '../safetyFilter.js';

describe('checkQuery', () => {
  it('allows a plain SELECT', () => {
    expect(checkQuery('SELECT * FROM t')).toEqual({ allowed: true });
  });

  it('allows lower-case select with surrounding whitespace', () => {
    expect(checkQuery('  select id, name from dbo.Users where id = 3  ')).toEqual({ allowed: true });
  });

  it('rejects a chained DROP', () => {
    expect(checkQuery('select 1; DROP TABLE t')).toEqual({
      allowed: false,
      keyword: 'DROP',
      reason: "Query contains blocked keyword 'DROP'. Only read-only SELECT statements are allowed.",
    });
  });

  it('rejects UPDATE', () => {
    expect(checkQuery('UPDATE t SET x=1')).toMatchObject({ allowed: false, keyword: 'UPDATE' });
  });

  it.each([
    ['DELETE FROM t', 'DELETE'],
    ['insert into t values (1)', 'INSERT'],
    ['ALTER TABLE t ADD c INT', 'ALTER'],
    ['TRUNCATE TABLE t', 'TRUNCATE'],
    ['exec sp_who', 'EXEC'],
    ['EXECUTE sp_who', 'EXECUTE'],
    ['MERGE INTO t USING s ON 1=1', 'MERGE'],
    ['CREATE TABLE t (id INT)', 'CREATE'],
  ])('rejects %s', (query, keyword) => {
    expect(checkQuery(query)).toMatchObject({ allowed: false, keyword });
  });

  it('reports the earliest blocked keyword', () => {
    expect(checkQuery('SELECT 1; DELETE FROM a; DROP TABLE b')).toMatchObject({ keyword: 'DELETE' });
  });

  it('ignores keywords embedded in longer identifiers', () => {
    expect(checkQuery('SELECT updated_at, dropped FROM audit')).toEqual({ allowed: true });
  });

  it('rejects a standalone column named update', () => {
    expect(checkQuery('SELECT [update] FROM audit')).toMatchObject({ allowed: false, keyword: 'UPDATE' });
  });

  it('rejects statements that do not start with SELECT', () => {
    expect(checkQuery('WITH x AS (SELECT 1) SELECT * FROM x')).toEqual({
      allowed: false,
      reason: 'Only SELECT queries are allowed',
    });
  });

  it('rejects empty queries', () => {
    expect(checkQuery('   ')).toEqual({ allowed: false, reason: 'Query must be a non-empty SELECT statement' });
  });
});
