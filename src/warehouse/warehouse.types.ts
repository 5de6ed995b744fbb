import { PartitionDate } from '../common/dates';
import { CustomerSegment, DelayBucket, TransactionStatus } from '../storage/partition.types';

export const WAREHOUSE = Symbol('WAREHOUSE');

export interface DateDimensionRow {
  full_date: PartitionDate;
  year: number;
  quarter: number;
  month: number;
  day_of_month: number;
  day_of_week: number;
  is_weekend: boolean;
}

export interface ChannelDimensionRow {
  channel_name: string;
  fee_percent: number;
}

export interface CustomerDimensionRow {
  customer_id: string;
  segment: CustomerSegment;
  first_seen_date: PartitionDate;
}

export interface CityDimensionRow {
  city_name: string;
}

/** Distinct natural keys per dimension for one partition */
export interface DimensionSet {
  dates: DateDimensionRow[];
  channels: ChannelDimensionRow[];
  customers: CustomerDimensionRow[];
  cities: CityDimensionRow[];
}

/** A fact row addressed by natural keys; surrogate keys are resolved during the merge */
export interface FactStagingRow {
  transaction_id: string;
  transaction_ts: string | null;
  full_date: PartitionDate;
  channel_name: string;
  customer_id: string;
  city_name: string;
  amount: number;
  status: TransactionStatus;
  processing_time: number;
  processing_delay_bucket: DelayBucket;
  revenue: number;
}

export interface LoadAuditRow {
  full_date: PartitionDate;
  source_checksum: string;
  facts_written: number;
  dims_upserted: number;
}

export interface LoadResult {
  factsWritten: number;
  dimsUpserted: number;
}

/**
 * Operations available inside one warehouse transaction. Upserts return the
 * number of rows inserted or changed.
 */
export interface WarehouseSession {
  upsertDates(rows: DateDimensionRow[]): Promise<number>;
  upsertChannels(rows: ChannelDimensionRow[]): Promise<number>;
  upsertCustomers(rows: CustomerDimensionRow[]): Promise<number>;
  upsertCities(rows: CityDimensionRow[]): Promise<number>;
  /** Bulk-loads facts into the transaction's staging area */
  stageFacts(rows: FactStagingRow[]): Promise<void>;
  /** Staged transaction_ids already stored in the fact table under another date */
  findForeignTransactionIds(date: PartitionDate): Promise<string[]>;
  /** Merges staged facts on transaction_id, overwriting non-key columns */
  mergeFacts(): Promise<number>;
  recordLoad(audit: LoadAuditRow): Promise<void>;
}

export interface Warehouse {
  /**
   * Runs `work` in one transaction: committed when it resolves, rolled back
   * when it throws. Connection resources are released on every path.
   */
  transaction<T>(work: (session: WarehouseSession) => Promise<T>): Promise<T>;
  findLoadAudit(date: PartitionDate): Promise<LoadAuditRow | null>;
}
