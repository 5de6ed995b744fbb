import { Injectable, Logger } from '@nestjs/common';
import { MAX_AMOUNT, TRANSACTION_STATUSES } from '../common/constants';
import { RawTransaction, TransactionStatus } from '../storage/partition.types';

export type ValidTransaction = Omit<RawTransaction, 'status'> & { status: TransactionStatus };

export type DropReason =
  | 'malformedRow'
  | 'missingFields'
  | 'invalidAmount'
  | 'invalidStatus'
  | 'invalidProcessingTime';

export interface ValidationStats {
  total: number;
  valid: number;
  malformedRow: number;
  missingFields: number;
  invalidAmount: number;
  invalidStatus: number;
  invalidProcessingTime: number;
}

export interface ValidationResult {
  valid: ValidTransaction[];
  stats: ValidationStats;
}

const VALID_STATUSES: ReadonlySet<string> = new Set(TRANSACTION_STATUSES);

export function isTransactionStatus(value: string): value is TransactionStatus {
  return VALID_STATUSES.has(value);
}

export function emptyValidationStats(): ValidationStats {
  return {
    total: 0,
    valid: 0,
    malformedRow: 0,
    missingFields: 0,
    invalidAmount: 0,
    invalidStatus: 0,
    invalidProcessingTime: 0,
  };
}

@Injectable()
export class ValidationService {
  private readonly logger = new Logger(ValidationService.name);

  /**
   * Returns the record with its status narrowed, or the reason it must be dropped.
   * Checked in order: row shape, required fields, amount, status, processing time.
   */
  check(record: RawTransaction): ValidTransaction | DropReason {
    const { malformed, ...fields } = record;
    const { transaction_id, customer_id, channel, city, status } = fields;

    if (malformed) {
      return 'malformedRow';
    }

    // transaction_id is the fact key; the others resolve to dimension rows
    if (!transaction_id.trim() || !customer_id.trim() || !channel.trim() || !city.trim()) {
      return 'missingFields';
    }

    if (!Number.isFinite(record.amount) || record.amount <= 0 || record.amount >= MAX_AMOUNT) {
      return 'invalidAmount';
    }

    if (!isTransactionStatus(status)) {
      return 'invalidStatus';
    }

    // Needed to derive the delay bucket
    if (!Number.isFinite(record.processing_time) || record.processing_time < 0) {
      return 'invalidProcessingTime';
    }

    return { ...fields, status };
  }

  /**
   * Splits a record set into valid records and per-reason drop counts.
   * Input order is preserved; valid records are returned unchanged.
   */
  validate(records: RawTransaction[]): ValidationResult {
    const stats = emptyValidationStats();
    const valid: ValidTransaction[] = [];

    records.forEach((record, index) => {
      stats.total++;
      const result = this.check(record);

      if (typeof result === 'string') {
        stats[result]++;
        this.logger.warn(
          `Row ${index + 1}: ${describe(result, record)} (transaction_id="${record.transaction_id}") — dropping`,
        );
        return;
      }

      stats.valid++;
      valid.push(result);
    });

    return { valid, stats };
  }
}

function describe(reason: DropReason, record: RawTransaction): string {
  switch (reason) {
    case 'malformedRow':
      return 'wrong number of fields';
    case 'missingFields':
      return 'missing required field(s)';
    case 'invalidAmount':
      return `out-of-range or unparseable amount ${record.amount}`;
    case 'invalidStatus':
      return `unknown status "${record.status}"`;
    case 'invalidProcessingTime':
      return `invalid processing_time ${record.processing_time}`;
  }
}

export function droppedCount(stats: ValidationStats): number {
  return stats.total - stats.valid;
}
