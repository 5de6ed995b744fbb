import { Logger } from '@nestjs/common';
import { IntegrityError, TransientIoError } from '../common/errors';
import {
  MERGE_SQL,
  PostgresWarehouse,
  TransactionRunner,
  classifyDatabaseError,
} from './postgres.warehouse';

/** Mock query runner answering each query call with the next queued response */
function makeRunner(responses: unknown[] = []) {
  let call = 0;
  const runner = {
    connect: jest.fn(() => Promise.resolve()),
    startTransaction: jest.fn(() => Promise.resolve()),
    commitTransaction: jest.fn(() => Promise.resolve()),
    rollbackTransaction: jest.fn(() => Promise.resolve()),
    release: jest.fn(() => Promise.resolve()),
    query: jest.fn((_sql: string, _params?: unknown[]): Promise<unknown> => {
      const next = responses[call++];
      return next instanceof Error ? Promise.reject(next) : Promise.resolve(next ?? []);
    }),
  } satisfies TransactionRunner;
  return runner;
}

function makeWarehouse(runner: TransactionRunner, rows: unknown[] = []) {
  return new PostgresWarehouse({
    createQueryRunner: () => runner,
    query: jest.fn(() => Promise.resolve(rows)),
  });
}

const driverError = (code: string, message = 'driver error') =>
  Object.assign(new Error(message), { code });

describe('PostgresWarehouse', () => {
  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => jest.restoreAllMocks());

  describe('transaction', () => {
    it('commits and releases when the work resolves', async () => {
      const runner = makeRunner();
      const result = await makeWarehouse(runner).transaction(async () => 'done');

      expect(result).toBe('done');
      expect(runner.startTransaction).toHaveBeenCalledTimes(1);
      expect(runner.commitTransaction).toHaveBeenCalledTimes(1);
      expect(runner.rollbackTransaction).not.toHaveBeenCalled();
      expect(runner.release).toHaveBeenCalledTimes(1);
    });

    it('rolls back and releases when the merge fails', async () => {
      const runner = makeRunner([[], driverError('23502', 'null value in column "city_key"')]);
      const warehouse = makeWarehouse(runner);

      const attempt = warehouse.transaction(async (session) => {
        await session.stageFacts([]);
        await session.mergeFacts();
      });

      await expect(attempt).rejects.toBeInstanceOf(IntegrityError);
      expect(runner.commitTransaction).not.toHaveBeenCalled();
      expect(runner.rollbackTransaction).toHaveBeenCalledTimes(1);
      expect(runner.release).toHaveBeenCalledTimes(1);
    });

    it('keeps the original error when the rollback itself fails', async () => {
      const runner = makeRunner();
      runner.rollbackTransaction.mockImplementation(() => Promise.reject(new Error('socket closed')));

      const attempt = makeWarehouse(runner).transaction(async () => {
        throw driverError('ECONNRESET', 'read ECONNRESET');
      });

      await expect(attempt).rejects.toThrow('Warehouse unavailable (ECONNRESET): read ECONNRESET');
      expect(runner.release).toHaveBeenCalledTimes(1);
      expect(Logger.prototype.error).toHaveBeenCalledWith(
        'Rollback failed after "read ECONNRESET": socket closed',
      );
    });
  });

  describe('session', () => {
    it('stages rows through a temp table and counts merged rows', async () => {
      const runner = makeRunner([[], [], [{ '?column?': 1 }, { '?column?': 1 }]]);

      const count = await makeWarehouse(runner).transaction((session) =>
        session.upsertCities([{ city_name: 'Delhi' }, { city_name: 'Pune' }]),
      );

      expect(count).toBe(2);
      expect(runner.query).toHaveBeenNthCalledWith(
        1,
        'CREATE TEMP TABLE stage_dim_city (city_name varchar) ON COMMIT DROP',
      );
      expect(runner.query).toHaveBeenNthCalledWith(
        2,
        'INSERT INTO stage_dim_city (city_name) SELECT * FROM UNNEST($1::varchar[])',
        [['Delhi', 'Pune']],
      );
      expect(runner.query).toHaveBeenNthCalledWith(3, MERGE_SQL.cities);
    });

    it('creates each staging table once per transaction', async () => {
      const runner = makeRunner();

      await makeWarehouse(runner).transaction(async (session) => {
        await session.upsertChannels([{ channel_name: 'UPI', fee_percent: 0.5 }]);
        await session.upsertChannels([{ channel_name: 'Debit Card', fee_percent: 1 }]);
      });

      const creates = runner.query.mock.calls.filter(([sql]) => sql.startsWith('CREATE TEMP TABLE'));
      expect(creates).toHaveLength(1);
    });

    it('skips the insert for an empty batch', async () => {
      const runner = makeRunner();

      await makeWarehouse(runner).transaction((session) => session.stageFacts([]));

      expect(runner.query).toHaveBeenCalledTimes(1);
    });

    it('returns colliding transaction ids', async () => {
      const runner = makeRunner([[{ transaction_id: 'TXN-1' }, { transaction_id: 'TXN-2' }]]);

      const ids = await makeWarehouse(runner).transaction((session) =>
        session.findForeignTransactionIds('2024-03-01'),
      );

      expect(ids).toEqual(['TXN-1', 'TXN-2']);
      expect(runner.query).toHaveBeenCalledWith(MERGE_SQL.foreignTransactions, ['2024-03-01']);
    });
  });

  describe('findLoadAudit', () => {
    it('returns the audit row with numeric counters', async () => {
      const warehouse = makeWarehouse(makeRunner(), [
        { full_date: '2024-03-01', source_checksum: 'abc', facts_written: '12', dims_upserted: 3 },
      ]);

      expect(await warehouse.findLoadAudit('2024-03-01')).toEqual({
        full_date: '2024-03-01',
        source_checksum: 'abc',
        facts_written: 12,
        dims_upserted: 3,
      });
    });

    it('returns null when the date was never loaded', async () => {
      expect(await makeWarehouse(makeRunner(), []).findLoadAudit('2024-03-01')).toBeNull();
    });
  });
});

describe('classifyDatabaseError', () => {
  it.each(['08006', '08001', '57P01', '40001', '40P01', '53300', 'ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED'])(
    'treats %s as transient',
    (code) => {
      expect(classifyDatabaseError(driverError(code))).toBeInstanceOf(TransientIoError);
    },
  );

  it.each(['23505', '23502', '23503'])('treats %s as an integrity violation', (code) => {
    expect(classifyDatabaseError(driverError(code))).toBeInstanceOf(IntegrityError);
  });

  it('passes other errors through unchanged', () => {
    const syntax = driverError('42601');
    expect(classifyDatabaseError(syntax)).toBe(syntax);
  });

  it('keeps pipeline errors as they are', () => {
    const integrity = new IntegrityError('collision');
    expect(classifyDatabaseError(integrity)).toBe(integrity);
  });
});
