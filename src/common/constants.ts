/** Rows per UNNEST batch when staging facts and dimensions */
export const BATCH_SIZE = 5000;

/** Max dates processed at once during a backfill */
export const DEFAULT_CONCURRENCY = 2;

/** Synthetic records generated per day unless overridden */
export const DEFAULT_RECORDS_PER_DAY = 500;

/** Probability that a generated transaction is marked failed */
export const DEFAULT_FAILURE_RATE = 0.1;

/** Allowed transaction status values */
export const TRANSACTION_STATUSES = ['success', 'failed', 'pending'] as const;

/** Processing delay buckets, fastest first */
export const DELAY_BUCKETS = ['fast', 'medium', 'slow'] as const;

/** Exclusive upper bound of fact_transactions.amount, a numeric(18,2) column */
export const MAX_AMOUNT = 1e16;

/** Channel reference table; fee_percent is mutable in dim_channel */
export const CHANNEL_FEES: Readonly<Record<string, number>> = {
  'Credit Card': 2.5,
  'Debit Card': 1.0,
  UPI: 0.5,
  'Net Banking': 1.5,
};

/** Cities the generator draws from */
export const CITIES = [
  'Mumbai',
  'Delhi',
  'Bengaluru',
  'Hyderabad',
  'Chennai',
  'Kolkata',
  'Pune',
  'Ahmedabad',
] as const;

/** Customer segments assigned to dim_customer */
export const CUSTOMER_SEGMENTS = ['Retail', 'Corporate', 'SMB', 'Enterprise'] as const;

/** Size of the synthetic customer pool (CUST-0001 … CUST-1000) */
export const CUSTOMER_POOL_SIZE = 1000;

/** Column order of the raw partition file — part of the external contract */
export const RAW_COLUMNS = [
  'transaction_id',
  'timestamp',
  'customer_id',
  'channel',
  'city',
  'amount',
  'status',
  'processing_time',
] as const;

/** Column order of the processed partition file */
export const PROCESSED_COLUMNS = [
  ...RAW_COLUMNS,
  'fee_percent',
  'revenue',
  'processing_delay_bucket',
  'customer_segment',
] as const;

export const RAW_FILENAME = 'transactions.csv';
export const PROCESSED_FILENAME = 'transactions.csv.gz';

/** Generated ids: TXN-YYYYMMDD-<uuid> */
export const TRANSACTION_ID_PREFIX = 'TXN';
