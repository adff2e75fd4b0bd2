import { beforeEach, describe, expect, it, vi } from 'vitest';
import { makeProfile } from '../../__tests__/fixtures.js';
import { MssqlClient, normalizeSqlValue, toQueryResult } from '../mssqlClient.js';

const driver = vi.hoisted(() => ({
  configs: [] as unknown[],
  inputs: [] as Array<[string, unknown, unknown]>,
  queries: [] as string[],
  closed: 0,
  cancelled: 0,
  stall: false,
  onQuery: undefined as (() => void) | undefined,
}));

vi.mock('mssql', () => {
  class FakeRequest {
    private rejectPending?: (error: Error) => void;

    input(name: string, type: unknown, value: unknown): this {
      driver.inputs.push([name, type, value]);
      return this;
    }

    async query(text: string) {
      driver.queries.push(text);
      if (driver.stall) {
        return new Promise<never>((_resolve, reject) => {
          this.rejectPending = reject;
          driver.onQuery?.();
        });
      }
      const recordset = Object.assign(
        [{ created: new Date('2024-01-02T03:04:05.000Z'), id: 1, payload: Buffer.from('hi') }],
        {
          columns: {
            created: { index: 1, name: 'created' },
            id: { index: 0, name: 'id' },
            payload: { index: 2, name: 'payload' },
          },
        }
      );
      return { recordset };
    }

    cancel(): void {
      driver.cancelled++;
      this.rejectPending?.(Object.assign(new Error('Canceled.'), { name: 'RequestError', code: 'ECANCEL' }));
    }
  }

  class FakeConnectionPool {
    constructor(config: unknown) {
      driver.configs.push(config);
    }

    async connect(): Promise<this> {
      return this;
    }

    request(): FakeRequest {
      return new FakeRequest();
    }

    async close(): Promise<void> {
      driver.closed++;
    }
  }

  return { default: { ConnectionPool: FakeConnectionPool, NVarChar: 'NVarChar' } };
});

describe('normalizeSqlValue', () => {
  it('keeps JSON primitives', () => {
    expect(normalizeSqlValue('text')).toBe('text');
    expect(normalizeSqlValue(4.5)).toBe(4.5);
    expect(normalizeSqlValue(false)).toBe(false);
    expect(normalizeSqlValue(null)).toBeNull();
    expect(normalizeSqlValue(undefined)).toBeNull();
  });

  it('converts driver types', () => {
    expect(normalizeSqlValue(new Date('2024-05-06T07:08:09.000Z'))).toBe('2024-05-06T07:08:09.000Z');
    expect(normalizeSqlValue(Buffer.from('abc'))).toBe('YWJj');
    expect(normalizeSqlValue(9007199254740993n)).toBe('9007199254740993');
  });
});

describe('toQueryResult', () => {
  it('orders columns by driver index', () => {
    const result = toQueryResult([{ b: 2, a: 1 }], {
      a: { index: 0, name: 'a' },
      b: { index: 1, name: 'b' },
    });
    expect(result).toEqual({ columns: ['a', 'b'], rows: [{ a: 1, b: 2 }] });
  });

  it('falls back to row keys without column metadata', () => {
    expect(toQueryResult([{ x: 1 }])).toEqual({ columns: ['x'], rows: [{ x: 1 }] });
    expect(toQueryResult([])).toEqual({ columns: [], rows: [] });
  });
});

describe('MssqlClient', () => {
  beforeEach(() => {
    driver.configs.length = 0;
    driver.inputs.length = 0;
    driver.queries.length = 0;
    driver.closed = 0;
    driver.cancelled = 0;
    driver.stall = false;
    driver.onQuery = undefined;
  });

  it('runs a parameterised query on a fresh connection and closes it', async () => {
    const client = new MssqlClient(makeProfile(), { env: { TEST_SQL_PASSWORD: 'test-secret' } });

    const result = await client.query('SELECT * FROM t WHERE name = @name', [{ name: 'name', value: 'Ada' }]);

    expect(result).toEqual({
      columns: ['id', 'created', 'payload'],
      rows: [{ id: 1, created: '2024-01-02T03:04:05.000Z', payload: 'aGk=' }],
    });
    expect(driver.queries).toEqual(['SELECT * FROM t WHERE name = @name']);
    expect(driver.inputs).toEqual([['name', 'NVarChar', 'Ada']]);
    expect(driver.configs[0]).toMatchObject({ user: 'sa', password: 'test-secret', requestTimeout: 30_000 });
    expect(driver.closed).toBe(1);
  });

  it('does not connect when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const client = new MssqlClient(makeProfile(), {
      env: { TEST_SQL_PASSWORD: 'test-secret' },
      signal: controller.signal,
    });

    await expect(client.query('SELECT 1')).rejects.toMatchObject({ name: 'AbortError' });
    expect(driver.configs).toHaveLength(0);
  });

  it('cancels the running request when aborted mid-query', async () => {
    const controller = new AbortController();
    driver.stall = true;
    driver.onQuery = () => controller.abort();
    const client = new MssqlClient(makeProfile(), {
      env: { TEST_SQL_PASSWORD: 'test-secret' },
      signal: controller.signal,
    });

    await expect(client.query('WAITFOR DELAY \'00:01:00\'')).rejects.toMatchObject({ code: 'ECANCEL' });
    expect(driver.cancelled).toBe(1);
    expect(driver.closed).toBe(1);
  });

  it('fails before connecting when credentials are missing', async () => {
    const client = new MssqlClient(makeProfile(), { env: {} });
    await expect(client.query('SELECT 1')).rejects.toThrow('requires TEST_SQL_PASSWORD');
    expect(driver.configs).toHaveLength(0);
  });
});
