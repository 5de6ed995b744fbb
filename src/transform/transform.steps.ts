import { CUSTOMER_SEGMENTS } from '../common/constants';
import { DelayThresholds } from '../config/pipeline.config';
import {
  CustomerSegment,
  DelayBucket,
  ProcessedTransaction,
  RawTransaction,
  TransactionStatus,
} from '../storage/partition.types';
import { ValidTransaction } from './validation.service';

export type EnrichedTransaction = ValidTransaction & {
  fee_percent: number;
  customer_segment: CustomerSegment;
};

export const roundMoney = (value: number): number =>
  Math.round((value + Number.EPSILON) * 100) / 100;

/**
 * Removes repeated transaction_ids, keeping the first occurrence in input order.
 * Records with a blank id are left for validation to reject.
 */
export function deduplicate<T extends Pick<RawTransaction, 'transaction_id'>>(
  records: T[],
): { unique: T[]; duplicatesRemoved: number } {
  const seen = new Set<string>();
  const unique: T[] = [];

  for (const record of records) {
    const id = record.transaction_id;
    if (id.trim() !== '') {
      if (seen.has(id)) continue;
      seen.add(id);
    }
    unique.push(record);
  }

  return { unique, duplicatesRemoved: records.length - unique.length };
}

/**
 * Joins each record to the channel fee table and assigns the customer segment.
 * Records whose channel has no fee entry are returned separately.
 */
export function enrich(
  records: ValidTransaction[],
  feeTable: Readonly<Record<string, number>>,
): { enriched: EnrichedTransaction[]; unknownChannel: ValidTransaction[] } {
  const enriched: EnrichedTransaction[] = [];
  const unknownChannel: ValidTransaction[] = [];

  for (const record of records) {
    const fee = Object.prototype.hasOwnProperty.call(feeTable, record.channel)
      ? feeTable[record.channel]
      : undefined;

    if (fee === undefined) {
      unknownChannel.push(record);
      continue;
    }

    enriched.push({
      ...record,
      fee_percent: fee,
      customer_segment: customerSegment(record.customer_id),
    });
  }

  return { enriched, unknownChannel };
}

/** Revenue is the fee earned on a successful transaction; nothing otherwise */
export function computeRevenue(amount: number, status: TransactionStatus, feePercent: number): number {
  return status === 'success' ? roundMoney((amount * feePercent) / 100) : 0;
}

/** A value equal to a threshold falls into the slower bucket */
export function delayBucket(seconds: number, thresholds: DelayThresholds): DelayBucket {
  if (seconds < thresholds.fastBelowSeconds) return 'fast';
  if (seconds < thresholds.mediumBelowSeconds) return 'medium';
  return 'slow';
}

export function derive(
  records: EnrichedTransaction[],
  thresholds: DelayThresholds,
): ProcessedTransaction[] {
  return records.map((record) => ({
    ...record,
    revenue: computeRevenue(record.amount, record.status, record.fee_percent),
    processing_delay_bucket: delayBucket(record.processing_time, thresholds),
  }));
}

/** Stable FNV-1a hash of the customer id, so a customer always lands in the same segment */
export function customerSegment(customerId: string): CustomerSegment {
  let hash = 0x811c9dc5;
  for (let i = 0; i < customerId.length; i++) {
    hash ^= customerId.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return CUSTOMER_SEGMENTS[hash % CUSTOMER_SEGMENTS.length];
}
