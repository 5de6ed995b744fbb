import { calendarAttributes } from '../common/dates';
import { ProcessedPartition } from '../storage/partition.types';
import { DimensionSet, FactStagingRow } from './warehouse.types';

/** Distinct dimension rows referenced by a processed partition, in first-seen order */
export function buildDimensions({ date, records }: ProcessedPartition): DimensionSet {
  const channels = new Map<string, number>();
  const customers = new Map<string, DimensionSet['customers'][number]>();
  const cities = new Set<string>();

  for (const r of records) {
    // Last record wins
    channels.set(r.channel, r.fee_percent);
    if (!customers.has(r.customer_id)) {
      customers.set(r.customer_id, {
        customer_id: r.customer_id,
        segment: r.customer_segment,
        first_seen_date: date,
      });
    }
    cities.add(r.city);
  }

  const cal = calendarAttributes(date);

  return {
    dates:
      records.length === 0
        ? []
        : [
            {
              full_date: date,
              year: cal.year,
              quarter: cal.quarter,
              month: cal.month,
              day_of_month: cal.dayOfMonth,
              day_of_week: cal.dayOfWeek,
              is_weekend: cal.isWeekend,
            },
          ],
    channels: [...channels].map(([channel_name, fee_percent]) => ({ channel_name, fee_percent })),
    customers: [...customers.values()],
    cities: [...cities].map((city_name) => ({ city_name })),
  };
}

export function buildFacts({ date, records }: ProcessedPartition): FactStagingRow[] {
  return records.map((r) => ({
    transaction_id: r.transaction_id,
    transaction_ts: toTimestamp(r.timestamp),
    full_date: date,
    channel_name: r.channel,
    customer_id: r.customer_id,
    city_name: r.city,
    amount: r.amount,
    status: r.status,
    processing_time: r.processing_time,
    processing_delay_bucket: r.processing_delay_bucket,
    revenue: r.revenue,
  }));
}

/** ISO string, or null when the raw timestamp cannot be parsed */
export function toTimestamp(value: string): string | null {
  if (value.trim() === '') return null;
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? null : parsed.toISOString();
}
