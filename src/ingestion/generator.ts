import { Faker, en } from '@faker-js/faker';
import {
  CITIES,
  CUSTOMER_POOL_SIZE,
  TRANSACTION_ID_PREFIX,
} from '../common/constants';
import { PartitionDate, compactDate } from '../common/dates';
import { IntegrityError } from '../common/errors';
import { RawTransaction } from '../storage/partition.types';

export interface GeneratorOptions {
  count: number;
  channels: readonly string[];
  failureRate: number;
  cities?: readonly string[];
}

const SECONDS_PER_DAY = 86_400;

const round2 = (value: number) => Math.round(value * 100) / 100;

/** Seed derived from the date so regenerating a day reproduces it exactly */
export function seedForDate(date: PartitionDate, baseSeed: number | null = null): number {
  const dateSeed = Number(compactDate(date));
  return baseSeed === null ? dateSeed : baseSeed * 100_000_000 + dateSeed;
}

export function createFaker(seed: number): Faker {
  const faker = new Faker({ locale: [en] });
  faker.seed(seed);
  return faker;
}

/**
 * Produces one day of synthetic transactions. Channels are drawn uniformly,
 * `failureRate` of records are marked failed and the rest succeed.
 * A repeated transaction_id within the run is a defect and aborts generation.
 */
export function generateTransactions(
  date: PartitionDate,
  { count, channels, failureRate, cities = CITIES }: GeneratorOptions,
  faker: Faker,
): RawTransaction[] {
  const dayStart = Date.parse(`${date}T00:00:00.000Z`);
  const idPrefix = `${TRANSACTION_ID_PREFIX}-${compactDate(date)}`;
  const seen = new Set<string>();
  const records: RawTransaction[] = [];

  for (let i = 0; i < count; i++) {
    const transactionId = `${idPrefix}-${faker.string.uuid()}`;
    if (seen.has(transactionId)) {
      throw new IntegrityError(`Generated duplicate transaction_id ${transactionId} at record ${i + 1}`);
    }
    seen.add(transactionId);

    const customerNumber = faker.number.int({ min: 1, max: CUSTOMER_POOL_SIZE });
    const offsetSeconds = faker.number.int({ min: 0, max: SECONDS_PER_DAY - 1 });

    records.push({
      transaction_id: transactionId,
      timestamp: new Date(dayStart + offsetSeconds * 1000).toISOString(),
      customer_id: `CUST-${String(customerNumber).padStart(4, '0')}`,
      channel: faker.helpers.arrayElement(channels),
      city: faker.helpers.arrayElement(cities),
      amount: round2(faker.number.float({ min: 10, max: 1000 })),
      status: faker.datatype.boolean({ probability: failureRate }) ? 'failed' : 'success',
      processing_time: round2(faker.number.float({ min: 0.5, max: 8 })),
    });
  }

  return records;
}
