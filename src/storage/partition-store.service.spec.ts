import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as zlib from 'zlib';
import { Logger } from '@nestjs/common';
import { buildPipelineConfig } from '../config/pipeline.config';
import { IntegrityError, PartitionMissingError, TransientIoError } from '../common/errors';
import { PartitionStore } from './partition-store.service';
import { ProcessedTransaction, RawTransaction } from './partition.types';

describe('PartitionStore', () => {
  let dataDir: string;
  let store: PartitionStore;

  const rawRecord = (overrides: Partial<RawTransaction> = {}): RawTransaction => ({
    transaction_id: 'TXN-20240301-a',
    timestamp: '2024-03-01T10:15:00.000Z',
    customer_id: 'CUST-0007',
    channel: 'UPI',
    city: 'Pune',
    amount: 120.5,
    status: 'success',
    processing_time: 1.25,
    ...overrides,
  });

  const processedRecord = (overrides: Partial<ProcessedTransaction> = {}): ProcessedTransaction => ({
    ...rawRecord(),
    status: 'success',
    fee_percent: 0.5,
    revenue: 0.6,
    processing_delay_bucket: 'fast',
    customer_segment: 'Retail',
    ...overrides,
  });

  beforeEach(async () => {
    dataDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'partition-store-'));
    store = new PartitionStore(buildPipelineConfig({ DATA_DIR: dataDir }));
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.promises.rm(dataDir, { recursive: true, force: true });
  });

  it('addresses partitions by YYYY/MM/DD', () => {
    expect(store.pathFor('raw', '2024-03-01')).toBe(
      path.join(dataDir, 'raw', '2024', '03', '01', 'transactions.csv'),
    );
    expect(store.pathFor('processed', '2024-03-01')).toBe(
      path.join(dataDir, 'processed', '2024', '03', '01', 'transactions.csv.gz'),
    );
  });

  describe('raw partitions', () => {
    it('writes the header in the contract column order', async () => {
      const file = await store.writeRaw({ date: '2024-03-01', records: [rawRecord()] });
      const lines = (await fs.promises.readFile(file, 'utf8')).trim().split('\n');

      expect(lines[0]).toBe(
        'transaction_id,timestamp,customer_id,channel,city,amount,status,processing_time',
      );
      expect(lines[1]).toBe('TXN-20240301-a,2024-03-01T10:15:00.000Z,CUST-0007,UPI,Pune,120.5,success,1.25');
    });

    it('round-trips records, keeping unparseable numbers as NaN', async () => {
      await store.writeRaw({
        date: '2024-03-01',
        records: [rawRecord(), rawRecord({ transaction_id: 'TXN-20240301-b', amount: NaN, status: 'bogus' })],
      });

      const { records } = await store.readRaw('2024-03-01');
      expect(records).toHaveLength(2);
      expect(records[0]).toEqual(rawRecord());
      expect(records[1].amount).toBeNaN();
      expect(records[1].status).toBe('bogus');
    });

    it('reads rows with too many or too few fields and flags them', async () => {
      const warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
      const file = store.pathFor('raw', '2024-03-01');
      await fs.promises.mkdir(path.dirname(file), { recursive: true });
      await fs.promises.writeFile(
        file,
        [
          'transaction_id,timestamp,customer_id,channel,city,amount,status,processing_time',
          'a,2024-03-01T10:00:00Z,CUST-0001,UPI,Pune,10,success,1',
          'b,2024-03-01T10:01:00Z,CUST-0002,UPI,Pune,20,success,2,extra',
          'c,2024-03-01T10:02:00Z,CUST-0003,UPI,Pune,30,success',
          'd,2024-03-01T10:03:00Z,CUST-0004,UPI,Pune,40,failed,4',
          '',
        ].join('\n'),
      );

      const { records } = await store.readRaw('2024-03-01');

      expect(records.map((r) => r.transaction_id)).toEqual(['a', 'b', 'c', 'd']);
      expect(records.map((r) => r.malformed)).toEqual([undefined, true, true, undefined]);
      expect(records[1].processing_time).toBe(2);
      expect(records[2].processing_time).toBeNaN();
      expect(warn).toHaveBeenCalledWith('Raw partition 2024-03-01 has 2 row(s) with the wrong number of fields');
    });

    it('reports completeness only after publishing', async () => {
      expect(await store.isComplete('raw', '2024-03-01')).toBe(false);
      await store.writeRaw({ date: '2024-03-01', records: [rawRecord()] });
      expect(await store.isComplete('raw', '2024-03-01')).toBe(true);
    });

    it('throws PartitionMissingError for an absent partition', async () => {
      await expect(store.readRaw('2024-03-02')).rejects.toBeInstanceOf(PartitionMissingError);
    });
  });

  describe('processed partitions', () => {
    it('stores gzip-compressed CSV and reads typed records back', async () => {
      const file = await store.writeProcessed({ date: '2024-03-01', records: [processedRecord()] });
      const csv = zlib.gunzipSync(await fs.promises.readFile(file)).toString('utf8');

      expect(csv.split('\n')[0]).toBe(
        'transaction_id,timestamp,customer_id,channel,city,amount,status,processing_time,' +
          'fee_percent,revenue,processing_delay_bucket,customer_segment',
      );
      expect((await store.readProcessed('2024-03-01')).records).toEqual([processedRecord()]);
    });

    it('rejects a processed file with invalid rows as corrupt', async () => {
      await store.writeProcessed({
        date: '2024-03-01',
        records: [processedRecord({ amount: -1 })],
      });
      await expect(store.readProcessed('2024-03-01')).rejects.toBeInstanceOf(IntegrityError);
    });
  });

  describe('atomic publish', () => {
    it('overwrites an existing partition in place', async () => {
      await store.writeRaw({ date: '2024-03-01', records: [rawRecord()] });
      await store.writeRaw({ date: '2024-03-01', records: [rawRecord({ amount: 99 })] });

      const { records } = await store.readRaw('2024-03-01');
      expect(records.map((r) => r.amount)).toEqual([99]);
      expect(await fs.promises.readdir(path.join(dataDir, 'raw', '2024', '03', '01'))).toEqual([
        'transactions.csv',
      ]);
    });

    it('leaves neither the partition nor a temp file behind when the write fails', async () => {
      jest
        .spyOn(fs.promises, 'writeFile')
        .mockRejectedValue(Object.assign(new Error('store unavailable'), { code: 'EIO' }));

      await expect(
        store.writeRaw({ date: '2024-03-01', records: [rawRecord()] }),
      ).rejects.toBeInstanceOf(TransientIoError);

      expect(await store.isComplete('raw', '2024-03-01')).toBe(false);
      expect(await fs.promises.readdir(path.join(dataDir, 'raw', '2024', '03', '01'))).toEqual([]);
    });
  });

  it('checksums identical content identically', async () => {
    await store.writeProcessed({ date: '2024-03-01', records: [processedRecord()] });
    const first = await store.checksum('processed', '2024-03-01');
    await store.writeProcessed({ date: '2024-03-01', records: [processedRecord()] });

    expect(await store.checksum('processed', '2024-03-01')).toBe(first);
    expect(first).toMatch(/^[0-9a-f]{64}$/);
  });
});
