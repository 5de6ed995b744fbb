import { Injectable, Logger } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { z } from 'zod';
import { BATCH_SIZE } from '../common/constants';
import { PartitionDate } from '../common/dates';
import {
  IntegrityError,
  PipelineError,
  TransientIoError,
  errorCode,
  errorMessage,
} from '../common/errors';
import {
  ChannelDimensionRow,
  CityDimensionRow,
  CustomerDimensionRow,
  DateDimensionRow,
  FactStagingRow,
  LoadAuditRow,
  Warehouse,
  WarehouseSession,
} from './warehouse.types';

/** The parts of a TypeORM query runner a load transaction uses */
export interface TransactionRunner {
  connect(): Promise<unknown>;
  startTransaction(): Promise<void>;
  commitTransaction(): Promise<void>;
  rollbackTransaction(): Promise<void>;
  release(): Promise<void>;
  query(sql: string, parameters?: unknown[]): Promise<unknown>;
}

/** Satisfied by a TypeORM DataSource */
export interface WarehouseConnection {
  createQueryRunner(): TransactionRunner;
  query(sql: string, parameters?: unknown[]): Promise<unknown>;
}

interface StagedColumn<T> {
  name: string;
  /** Postgres type used for the staging column and the UNNEST array cast */
  type: string;
  value: (row: T) => string | number | boolean | null;
}

const DATE_COLUMNS: StagedColumn<DateDimensionRow>[] = [
  { name: 'full_date', type: 'date', value: (r) => r.full_date },
  { name: 'year', type: 'smallint', value: (r) => r.year },
  { name: 'quarter', type: 'smallint', value: (r) => r.quarter },
  { name: 'month', type: 'smallint', value: (r) => r.month },
  { name: 'day_of_month', type: 'smallint', value: (r) => r.day_of_month },
  { name: 'day_of_week', type: 'smallint', value: (r) => r.day_of_week },
  { name: 'is_weekend', type: 'boolean', value: (r) => r.is_weekend },
];

const CHANNEL_COLUMNS: StagedColumn<ChannelDimensionRow>[] = [
  { name: 'channel_name', type: 'varchar', value: (r) => r.channel_name },
  { name: 'fee_percent', type: 'numeric(5,2)', value: (r) => r.fee_percent },
];

const CUSTOMER_COLUMNS: StagedColumn<CustomerDimensionRow>[] = [
  { name: 'customer_id', type: 'varchar', value: (r) => r.customer_id },
  { name: 'segment', type: 'varchar', value: (r) => r.segment },
  { name: 'first_seen_date', type: 'date', value: (r) => r.first_seen_date },
];

const CITY_COLUMNS: StagedColumn<CityDimensionRow>[] = [
  { name: 'city_name', type: 'varchar', value: (r) => r.city_name },
];

const FACT_COLUMNS: StagedColumn<FactStagingRow>[] = [
  { name: 'transaction_id', type: 'varchar', value: (r) => r.transaction_id },
  { name: 'transaction_ts', type: 'timestamptz', value: (r) => r.transaction_ts },
  { name: 'full_date', type: 'date', value: (r) => r.full_date },
  { name: 'channel_name', type: 'varchar', value: (r) => r.channel_name },
  { name: 'customer_id', type: 'varchar', value: (r) => r.customer_id },
  { name: 'city_name', type: 'varchar', value: (r) => r.city_name },
  { name: 'amount', type: 'numeric(18,2)', value: (r) => r.amount },
  { name: 'status', type: 'varchar', value: (r) => r.status },
  { name: 'processing_time', type: 'numeric(10,2)', value: (r) => r.processing_time },
  { name: 'processing_delay_bucket', type: 'varchar', value: (r) => r.processing_delay_bucket },
  { name: 'revenue', type: 'numeric(18,2)', value: (r) => r.revenue },
];

/** Columns overwritten when a transaction_id is merged again */
const FACT_MERGE_COLUMNS = [
  'date_key',
  'channel_key',
  'customer_key',
  'city_key',
  'transaction_ts',
  'amount',
  'status',
  'processing_time',
  'processing_delay_bucket',
  'revenue',
];

export const MERGE_SQL = {
  dates: `
    INSERT INTO dim_date (full_date, year, quarter, month, day_of_month, day_of_week, is_weekend)
    SELECT full_date, year, quarter, month, day_of_month, day_of_week, is_weekend FROM stage_dim_date
    ON CONFLICT (full_date) DO NOTHING
    RETURNING 1`,

  channels: `
    INSERT INTO dim_channel (channel_name, fee_percent)
    SELECT channel_name, fee_percent FROM stage_dim_channel
    ON CONFLICT (channel_name) DO UPDATE
      SET fee_percent = EXCLUDED.fee_percent, updated_at = now()
      WHERE dim_channel.fee_percent IS DISTINCT FROM EXCLUDED.fee_percent
    RETURNING 1`,

  customers: `
    INSERT INTO dim_customer (customer_id, segment, first_seen_date)
    SELECT customer_id, segment, first_seen_date FROM stage_dim_customer
    ON CONFLICT (customer_id) DO UPDATE
      SET segment = EXCLUDED.segment,
          first_seen_date = LEAST(dim_customer.first_seen_date, EXCLUDED.first_seen_date),
          updated_at = now()
      WHERE dim_customer.segment IS DISTINCT FROM EXCLUDED.segment
         OR EXCLUDED.first_seen_date < dim_customer.first_seen_date
    RETURNING 1`,

  cities: `
    INSERT INTO dim_city (city_name)
    SELECT city_name FROM stage_dim_city
    ON CONFLICT (city_name) DO NOTHING
    RETURNING 1`,

  // LEFT JOINs: a fact without its dimension row hits the NOT NULL constraint instead of vanishing
  facts: `
    INSERT INTO fact_transactions (transaction_id, ${FACT_MERGE_COLUMNS.join(', ')}, updated_at)
    SELECT s.transaction_id, d.date_key, ch.channel_key, cu.customer_key, ci.city_key,
           s.transaction_ts, s.amount, s.status, s.processing_time, s.processing_delay_bucket, s.revenue, now()
    FROM stage_fact_transactions s
    LEFT JOIN dim_date d ON d.full_date = s.full_date
    LEFT JOIN dim_channel ch ON ch.channel_name = s.channel_name
    LEFT JOIN dim_customer cu ON cu.customer_id = s.customer_id
    LEFT JOIN dim_city ci ON ci.city_name = s.city_name
    ON CONFLICT (transaction_id) DO UPDATE
      SET ${FACT_MERGE_COLUMNS.map((c) => `${c} = EXCLUDED.${c}`).join(', ')}, updated_at = now()
    RETURNING 1`,

  foreignTransactions: `
    SELECT s.transaction_id
    FROM stage_fact_transactions s
    JOIN fact_transactions f ON f.transaction_id = s.transaction_id
    JOIN dim_date d ON d.date_key = f.date_key
    WHERE d.full_date <> $1::date
    ORDER BY s.transaction_id
    LIMIT 20`,

  recordLoad: `
    INSERT INTO etl_load_audit (full_date, source_checksum, facts_written, dims_upserted, loaded_at)
    VALUES ($1::date, $2, $3, $4, now())
    ON CONFLICT (full_date) DO UPDATE
      SET source_checksum = EXCLUDED.source_checksum,
          facts_written = EXCLUDED.facts_written,
          dims_upserted = EXCLUDED.dims_upserted,
          loaded_at = EXCLUDED.loaded_at`,

  findLoadAudit: `
    SELECT full_date::text AS full_date, source_checksum, facts_written, dims_upserted
    FROM etl_load_audit
    WHERE full_date = $1::date`,
};

const transactionIdRows = z.array(z.object({ transaction_id: z.string() }));

const auditRows = z.array(
  z.object({
    full_date: z.string(),
    source_checksum: z.string(),
    facts_written: z.coerce.number().int(),
    dims_upserted: z.coerce.number().int(),
  }),
);

// SQLSTATEs worth retrying: connection exceptions, admin shutdown, serialization failure,
// deadlock, too many connections
const TRANSIENT_SQLSTATES = new Set(['57P01', '57P02', '57P03', '40001', '40P01', '53300']);

const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNRESET',
  'ETIMEDOUT',
  'ECONNREFUSED',
  'EPIPE',
  'EAI_AGAIN',
  'EHOSTUNREACH',
]);

/** Maps driver errors onto the pipeline taxonomy; anything unrecognised is returned as is */
export function classifyDatabaseError(err: unknown): unknown {
  if (err instanceof PipelineError) return err;

  const code = errorCode(err);
  if (!code) return err;

  if (code.startsWith('08') || TRANSIENT_SQLSTATES.has(code) || TRANSIENT_NETWORK_CODES.has(code)) {
    return new TransientIoError(`Warehouse unavailable (${code}): ${errorMessage(err)}`, { cause: err });
  }
  if (code.startsWith('23')) {
    return new IntegrityError(`Warehouse constraint violated (${code}): ${errorMessage(err)}`, [], {
      cause: err,
    });
  }
  return err;
}

function countRows(result: unknown): number {
  return Array.isArray(result) ? result.length : 0;
}

class PostgresSession implements WarehouseSession {
  private readonly staged = new Set<string>();

  constructor(private readonly runner: TransactionRunner) {}

  async upsertDates(rows: DateDimensionRow[]): Promise<number> {
    await this.stage('stage_dim_date', DATE_COLUMNS, rows);
    return countRows(await this.runner.query(MERGE_SQL.dates));
  }

  async upsertChannels(rows: ChannelDimensionRow[]): Promise<number> {
    await this.stage('stage_dim_channel', CHANNEL_COLUMNS, rows);
    return countRows(await this.runner.query(MERGE_SQL.channels));
  }

  async upsertCustomers(rows: CustomerDimensionRow[]): Promise<number> {
    await this.stage('stage_dim_customer', CUSTOMER_COLUMNS, rows);
    return countRows(await this.runner.query(MERGE_SQL.customers));
  }

  async upsertCities(rows: CityDimensionRow[]): Promise<number> {
    await this.stage('stage_dim_city', CITY_COLUMNS, rows);
    return countRows(await this.runner.query(MERGE_SQL.cities));
  }

  async stageFacts(rows: FactStagingRow[]): Promise<void> {
    await this.stage('stage_fact_transactions', FACT_COLUMNS, rows);
  }

  async findForeignTransactionIds(date: PartitionDate): Promise<string[]> {
    const rows = transactionIdRows.parse(await this.runner.query(MERGE_SQL.foreignTransactions, [date]));
    return rows.map((r) => r.transaction_id);
  }

  async mergeFacts(): Promise<number> {
    return countRows(await this.runner.query(MERGE_SQL.facts));
  }

  async recordLoad(audit: LoadAuditRow): Promise<void> {
    await this.runner.query(MERGE_SQL.recordLoad, [
      audit.full_date,
      audit.source_checksum,
      audit.facts_written,
      audit.dims_upserted,
    ]);
  }

  /**
   * Creates (once per transaction) a temp table dropped at commit and fills it
   * in BATCH_SIZE chunks, one array parameter per column.
   */
  private async stage<T>(table: string, columns: StagedColumn<T>[], rows: T[]): Promise<void> {
    if (!this.staged.has(table)) {
      const definition = columns.map((c) => `${c.name} ${c.type}`).join(', ');
      await this.runner.query(`CREATE TEMP TABLE ${table} (${definition}) ON COMMIT DROP`);
      this.staged.add(table);
    }

    const names = columns.map((c) => c.name).join(', ');
    const arrays = columns.map((c, i) => `$${i + 1}::${c.type}[]`).join(', ');
    const sql = `INSERT INTO ${table} (${names}) SELECT * FROM UNNEST(${arrays})`;

    for (let offset = 0; offset < rows.length; offset += BATCH_SIZE) {
      const batch = rows.slice(offset, offset + BATCH_SIZE);
      await this.runner.query(
        sql,
        columns.map((c) => batch.map((row) => c.value(row))),
      );
    }
  }
}

/** Warehouse backed by the TypeORM Postgres connection pool */
@Injectable()
export class PostgresWarehouse implements Warehouse {
  private readonly logger = new Logger(PostgresWarehouse.name);

  constructor(@InjectDataSource() private readonly connection: WarehouseConnection) {}

  async transaction<T>(work: (session: WarehouseSession) => Promise<T>): Promise<T> {
    const runner = this.connection.createQueryRunner();

    try {
      await runner.connect();
      await runner.startTransaction();
      const result = await work(new PostgresSession(runner));
      await runner.commitTransaction();
      return result;
    } catch (err) {
      await this.rollback(runner, err);
      throw classifyDatabaseError(err);
    } finally {
      await runner.release();
    }
  }

  async findLoadAudit(date: PartitionDate): Promise<LoadAuditRow | null> {
    try {
      const [row] = auditRows.parse(await this.connection.query(MERGE_SQL.findLoadAudit, [date]));
      return row ?? null;
    } catch (err) {
      throw classifyDatabaseError(err);
    }
  }

  private async rollback(runner: TransactionRunner, cause: unknown): Promise<void> {
    try {
      await runner.rollbackTransaction();
    } catch (rollbackErr) {
      // Connection already gone or transaction never started: keep the original error
      this.logger.error(
        `Rollback failed after "${errorMessage(cause)}": ${errorMessage(rollbackErr)}`,
      );
    }
  }
}
