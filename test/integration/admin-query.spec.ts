import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  BadRequestException,
  ForbiddenException,
  ServiceUnavailableException,
} from '@nestjs/common';
import { DataSource } from 'typeorm';
import {
  TypeORMStorageAdapter,
  MockStorageAdapter,
  AdminQueryService,
  QueryController,
  OperationLock,
  ReadOnlyQueryError,
  createDataSource,
  runReadOnlyQuery,
} from '../../src';

async function rejection(run: () => Promise<unknown>): Promise<ReadOnlyQueryError> {
  try {
    await run();
  } catch (error) {
    if (error instanceof ReadOnlyQueryError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected the query to be rejected');
}

describe('Read-only query', () => {
  let dir: string;
  let databasePath: string;
  let dataSource: DataSource;
  let lock: OperationLock;
  let adapter: TypeORMStorageAdapter;

  beforeEach(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'relay-query-'));
    databasePath = path.join(dir, 'state.db');
    dataSource = createDataSource({ database: databasePath, logging: false });
    await dataSource.initialize();
    lock = new OperationLock();
    adapter = new TypeORMStorageAdapter(dataSource, lock);

    await adapter.markProcessed(-1001, 1);
    await adapter.markProcessed(-1001, 2);
  });

  afterEach(async () => {
    await adapter.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should return columns and rows of a select', async () => {
    const result = await adapter.runReadOnlyQuery(
      'SELECT source_id, message_id FROM processed ORDER BY message_id',
    );

    expect(result).toEqual({
      columns: ['source_id', 'message_id'],
      rows: [
        [-1001, 1],
        [-1001, 2],
      ],
    });
  });

  it('should accept read-only statements that do not start with SELECT', async () => {
    const result = await adapter.runReadOnlyQuery('WITH x AS (SELECT 41 + 1 AS n) SELECT n FROM x');

    expect(result).toEqual({ columns: ['n'], rows: [[42]] });
  });

  it('should reject statements that write', async () => {
    const error = await rejection(() => adapter.runReadOnlyQuery('DELETE FROM processed'));

    expect(error.reason).toBe('not_read_only');
    expect(await adapter.isProcessed(-1001, 1)).toBe(true);
  });

  it('should reject statements that return no rows', async () => {
    expect((await rejection(() => adapter.runReadOnlyQuery('BEGIN'))).reason).toBe('not_read_only');
  });

  it('should reject more than one statement', async () => {
    const error = await rejection(() =>
      adapter.runReadOnlyQuery('SELECT 1; DELETE FROM processed'),
    );

    expect(error.reason).toBe('syntax');
  });

  it('should report SQL errors', async () => {
    const error = await rejection(() => adapter.runReadOnlyQuery('SELEC 1'));

    expect(error.reason).toBe('syntax');
    expect(error.message).toMatch(/^SQL Error: /);
  });

  it('should reject an empty query', async () => {
    expect((await rejection(() => adapter.runReadOnlyQuery('   '))).reason).toBe('empty');
  });

  it('should report a missing database as unavailable', () => {
    const missing = path.join(dir, 'missing.db');

    let reason: string | undefined;
    try {
      runReadOnlyQuery(missing, 'SELECT 1');
    } catch (error) {
      reason = error instanceof ReadOnlyQueryError ? error.reason : undefined;
    }

    expect(reason).toBe('unavailable');
    expect(fs.existsSync(missing)).toBe(false);
  });

  it('should wait for an operation holding the store lock', async () => {
    const order: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const write = lock.runExclusive(async () => {
      await gate;
      order.push('write');
    });
    const query = adapter.runReadOnlyQuery('SELECT COUNT(*) AS n FROM processed').then((result) => {
      order.push('query');
      return result;
    });

    await new Promise((resolve) => setImmediate(resolve));
    expect(order).toEqual([]);

    release();
    await write;
    const result = await query;

    expect(order).toEqual(['write', 'query']);
    expect(result).toEqual({ columns: ['n'], rows: [[2]] });
  });

  it('should report an in-memory database as unavailable', async () => {
    const memory = createDataSource({ database: ':memory:', logging: false });
    await memory.initialize();
    const memoryAdapter = new TypeORMStorageAdapter(memory);

    try {
      expect((await rejection(() => memoryAdapter.runReadOnlyQuery('SELECT 1'))).reason).toBe(
        'unavailable',
      );
    } finally {
      await memoryAdapter.close();
    }
  });
});

describe('QueryController', () => {
  const controllerFor = (storage: MockStorageAdapter) =>
    new QueryController(new AdminQueryService(storage));

  it('should return the rows answered by the store', async () => {
    const storage = new MockStorageAdapter({
      queryResponder: () => ({ columns: ['n'], rows: [[1]] }),
    });

    await expect(controllerFor(storage).execute({ query: 'SELECT 1 AS n' })).resolves.toEqual({
      columns: ['n'],
      rows: [[1]],
    });
  });

  it('should map rejected statements to 403', async () => {
    const storage = new MockStorageAdapter({
      queryResponder: () => {
        throw new ReadOnlyQueryError('Only read-only queries that return rows are allowed', 'not_read_only');
      },
    });

    await expect(controllerFor(storage).execute({ query: 'DELETE FROM processed' })).rejects.toBeInstanceOf(
      ForbiddenException,
    );
  });

  it('should map SQL errors to 400', async () => {
    const storage = new MockStorageAdapter({
      queryResponder: () => {
        throw new ReadOnlyQueryError('SQL Error: near "SELEC"', 'syntax');
      },
    });

    await expect(controllerFor(storage).execute({ query: 'SELEC 1' })).rejects.toBeInstanceOf(
      BadRequestException,
    );
  });

  it('should map a store without a database file to 503', async () => {
    await expect(
      controllerFor(new MockStorageAdapter()).execute({ query: 'SELECT 1' }),
    ).rejects.toBeInstanceOf(ServiceUnavailableException);
  });

  it('should map a failing store to 503', async () => {
    const storage = new MockStorageAdapter({ failOn: ['runReadOnlyQuery'] });

    await expect(controllerFor(storage).execute({ query: 'SELECT 1' })).rejects.toBeInstanceOf(
      ServiceUnavailableException,
    );
  });

  it('should queue behind a pending store write', async () => {
    const storage = new MockStorageAdapter({
      simulateLatency: true,
      latencyMs: 20,
      queryResponder: () => ({ columns: [], rows: [] }),
    });
    const order: string[] = [];

    const write = storage.markProcessed(-1001, 7).then(() => order.push('write'));
    const query = storage.runReadOnlyQuery('SELECT 1').then(() => order.push('query'));
    await Promise.all([write, query]);

    expect(order).toEqual(['write', 'query']);
  });
});
