import { CITIES } from '../common/constants';
import { IntegrityError } from '../common/errors';
import { createFaker, generateTransactions, seedForDate } from './generator';

describe('generateTransactions', () => {
  const channels = ['Credit Card', 'UPI'];

  it('produces the requested number of records with unique date-prefixed ids', () => {
    const records = generateTransactions(
      '2024-03-01',
      { count: 200, channels, failureRate: 0.1 },
      createFaker(1),
    );

    expect(records).toHaveLength(200);
    expect(new Set(records.map((r) => r.transaction_id)).size).toBe(200);
    for (const r of records) {
      expect(r.transaction_id).toMatch(/^TXN-20240301-[0-9a-f-]{36}$/);
    }
  });

  it('keeps every field inside its generated range', () => {
    const records = generateTransactions(
      '2024-03-01',
      { count: 100, channels, failureRate: 0.1 },
      createFaker(2),
    );

    for (const r of records) {
      expect(channels).toContain(r.channel);
      expect(CITIES).toContain(r.city);
      expect(r.customer_id).toMatch(/^CUST-\d{4}$/);
      expect(r.amount).toBeGreaterThanOrEqual(10);
      expect(r.amount).toBeLessThanOrEqual(1000);
      expect(r.processing_time).toBeGreaterThanOrEqual(0.5);
      expect(r.processing_time).toBeLessThanOrEqual(8);
      expect(r.timestamp.startsWith('2024-03-01T')).toBe(true);
      expect(['success', 'failed']).toContain(r.status);
    }
  });

  it('marks every record failed at failureRate 1 and none at 0', () => {
    const all = generateTransactions('2024-03-01', { count: 50, channels, failureRate: 1 }, createFaker(3));
    const none = generateTransactions('2024-03-01', { count: 50, channels, failureRate: 0 }, createFaker(3));

    expect(all.every((r) => r.status === 'failed')).toBe(true);
    expect(none.every((r) => r.status === 'success')).toBe(true);
  });

  it('never emits pending', () => {
    const records = generateTransactions('2024-03-01', { count: 300, channels, failureRate: 0.5 }, createFaker(4));
    expect(records.some((r) => r.status === 'pending')).toBe(false);
  });

  it('is reproducible for the same seed', () => {
    const seed = seedForDate('2024-03-01');
    const first = generateTransactions('2024-03-01', { count: 20, channels, failureRate: 0.1 }, createFaker(seed));
    const second = generateTransactions('2024-03-01', { count: 20, channels, failureRate: 0.1 }, createFaker(seed));
    expect(second).toEqual(first);
  });

  it('treats an id collision within a run as an integrity defect', () => {
    const faker = createFaker(5);
    jest.spyOn(faker.string, 'uuid').mockReturnValue('00000000-0000-4000-8000-000000000000');

    expect(() =>
      generateTransactions('2024-03-01', { count: 2, channels, failureRate: 0 }, faker),
    ).toThrow(IntegrityError);
  });
});

describe('seedForDate', () => {
  it('derives the seed from the date', () => {
    expect(seedForDate('2024-03-01')).toBe(20240301);
  });

  it('combines a fixed base seed with the date', () => {
    expect(seedForDate('2024-03-01', 7)).toBe(720240301);
  });
});
