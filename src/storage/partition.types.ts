import { CUSTOMER_SEGMENTS, DELAY_BUCKETS, TRANSACTION_STATUSES } from '../common/constants';
import { PartitionDate } from '../common/dates';

export type TransactionStatus = (typeof TRANSACTION_STATUSES)[number];
export type DelayBucket = (typeof DELAY_BUCKETS)[number];
export type CustomerSegment = (typeof CUSTOMER_SEGMENTS)[number];

export type PartitionKind = 'raw' | 'processed';

/**
 * A transaction as read from the raw partition. Values are not trusted:
 * numbers may be NaN and status may be anything until validated.
 */
export interface RawTransaction {
  transaction_id: string;
  timestamp: string;
  customer_id: string;
  channel: string;
  city: string;
  amount: number;
  status: string;
  processing_time: number;
  /** The CSV row had more or fewer fields than the header */
  malformed?: boolean;
}

export interface ProcessedTransaction extends RawTransaction {
  status: TransactionStatus;
  fee_percent: number;
  revenue: number;
  processing_delay_bucket: DelayBucket;
  customer_segment: CustomerSegment;
}

export interface RawPartition {
  date: PartitionDate;
  records: RawTransaction[];
}

export interface ProcessedPartition {
  date: PartitionDate;
  records: ProcessedTransaction[];
}
