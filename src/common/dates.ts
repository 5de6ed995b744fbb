import { addDays, format, isValid, parse, subDays } from 'date-fns';
import { ConfigurationError } from './errors';

/** A calendar date in YYYY-MM-DD form, the partition key */
export type PartitionDate = string;

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/** Parses and validates a YYYY-MM-DD date; rejects impossible dates like 2024-02-30 */
export function parsePartitionDate(value: string): PartitionDate {
  const trimmed = value.trim();
  if (!DATE_PATTERN.test(trimmed)) {
    throw new ConfigurationError(`Invalid date "${value}" — expected YYYY-MM-DD`);
  }

  const parsed = parse(trimmed, 'yyyy-MM-dd', new Date());
  if (!isValid(parsed) || format(parsed, 'yyyy-MM-dd') !== trimmed) {
    throw new ConfigurationError(`Invalid date "${value}" — no such calendar day`);
  }
  return trimmed;
}

/** The default run date: yesterday in the local calendar */
export function yesterday(now: Date = new Date()): PartitionDate {
  return format(subDays(now, 1), 'yyyy-MM-dd');
}

/** ["YYYY", "MM", "DD"] */
export function partitionSegments(date: PartitionDate): [string, string, string] {
  const [year, month, day] = date.split('-');
  return [year, month, day];
}

/** 2024-03-01 → "20240301" */
export function compactDate(date: PartitionDate): string {
  return date.replace(/-/g, '');
}

/** Inclusive list of dates between two partition dates */
export function dateRange(from: PartitionDate, to: PartitionDate): PartitionDate[] {
  const start = parse(from, 'yyyy-MM-dd', new Date());
  const end = parse(to, 'yyyy-MM-dd', new Date());
  if (start > end) {
    throw new ConfigurationError(`Invalid range: ${from} is after ${to}`);
  }

  const dates: PartitionDate[] = [];
  for (let d = start; d <= end; d = addDays(d, 1)) {
    dates.push(format(d, 'yyyy-MM-dd'));
  }
  return dates;
}

export interface CalendarAttributes {
  year: number;
  quarter: number;
  month: number;
  dayOfMonth: number;
  /** 0 = Sunday */
  dayOfWeek: number;
  isWeekend: boolean;
}

export function calendarAttributes(date: PartitionDate): CalendarAttributes {
  const d = parse(date, 'yyyy-MM-dd', new Date());
  const month = d.getMonth() + 1;
  const dayOfWeek = d.getDay();
  return {
    year: d.getFullYear(),
    quarter: Math.ceil(month / 3),
    month,
    dayOfMonth: d.getDate(),
    dayOfWeek,
    isWeekend: dayOfWeek === 0 || dayOfWeek === 6,
  };
}
