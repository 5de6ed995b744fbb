import { CommanderError } from 'commander';
import { ConfigurationError } from '../common/errors';
import { PipelineResult } from '../pipeline/pipeline.types';
import { exitCodeFor, parseCommand, parseStages, summarize } from './program';

const now = () => new Date(2024, 2, 15, 10, 30);

describe('parseCommand', () => {
  describe('run', () => {
    it('defaults to yesterday with every stage', () => {
      expect(parseCommand(['run'], now)).toEqual({
        name: 'run',
        date: '2024-03-14',
        options: { force: false, generate: {} },
      });
    });

    it('reads every flag', () => {
      const command = parseCommand(
        [
          'run',
          '--date',
          '2024-02-29',
          '--stages',
          'load,transform',
          '--force',
          '--count',
          '250',
          '--failure-rate',
          '0.2',
          '--channels',
          'UPI,Debit Card',
        ],
        now,
      );

      expect(command).toEqual({
        name: 'run',
        date: '2024-02-29',
        options: {
          stages: ['transform', 'load'],
          force: true,
          generate: { count: 250, failureRate: 0.2, channels: ['UPI', 'Debit Card'] },
        },
      });
    });

    it.each([
      ['--date', '2024-02-30'],
      ['--date', '03/01/2024'],
      ['--count', '0'],
      ['--count', '1.5'],
      ['--failure-rate', '1.2'],
      ['--failure-rate', 'abc'],
      ['--stages', 'extract'],
      ['--channels', 'Cheque'],
    ])('rejects %s %s as invalid input', (flag, value) => {
      expect(() => parseCommand(['run', flag, value], now)).toThrow(ConfigurationError);
    });
  });

  describe('backfill', () => {
    it('reads the range and concurrency', () => {
      expect(
        parseCommand(['backfill', '--from', '2024-03-01', '--to', '2024-03-07', '--concurrency', '3'], now),
      ).toEqual({
        name: 'backfill',
        from: '2024-03-01',
        to: '2024-03-07',
        options: { force: false, concurrency: 3 },
      });
    });

    it('rejects a reversed range', () => {
      expect(() => parseCommand(['backfill', '--from', '2024-03-07', '--to', '2024-03-01'], now)).toThrow(
        '--from 2024-03-07 is after --to 2024-03-01',
      );
    });

    it('requires both ends of the range', () => {
      const stderr = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
      expect(() => parseCommand(['backfill', '--from', '2024-03-01'], now)).toThrow(CommanderError);
      stderr.mockRestore();
    });
  });
});

describe('parseStages', () => {
  it('returns stages in pipeline order', () => {
    expect(parseStages('load, generate')).toEqual(['generate', 'load']);
  });

  it('rejects an empty list', () => {
    expect(() => parseStages(' , ')).toThrow('--stages needs at least one stage');
  });
});

describe('exitCodeFor', () => {
  const ok: PipelineResult = { date: '2024-03-01', stagesCompleted: ['generate'], stages: [] };

  it('is 0 when every date succeeded', () => {
    expect(exitCodeFor([ok, { ...ok, date: '2024-03-02' }])).toBe(0);
  });

  it('is 1 when a stage failed', () => {
    expect(
      exitCodeFor([ok, { ...ok, error: { stage: 'load', kind: 'transient', message: 'reset' } }]),
    ).toBe(1);
  });

  it('is 2 when a stage rejected its parameters', () => {
    expect(
      exitCodeFor([{ ...ok, error: { stage: 'generate', kind: 'configuration', message: 'bad count' } }]),
    ).toBe(2);
  });
});

describe('summarize', () => {
  it('lists stage outcomes for a successful run', () => {
    expect(
      summarize({
        date: '2024-03-01',
        stagesCompleted: ['generate', 'transform'],
        stages: [
          { stage: 'generate', date: '2024-03-01', status: 'skipped', warnings: [], metrics: {}, durationMs: 0 },
          {
            stage: 'transform',
            date: '2024-03-01',
            status: 'succeeded_with_warnings',
            warnings: ['Dropped 1 invalid record(s) (2.0%)'],
            metrics: {},
            durationMs: 12,
          },
        ],
      }),
    ).toBe('2024-03-01 ok | generate=skipped transform=succeeded_with_warnings');
  });

  it('names the failing stage and error kind', () => {
    expect(
      summarize({
        date: '2024-03-01',
        stagesCompleted: [],
        stages: [],
        error: { stage: 'transform', kind: 'missing_input', message: 'No raw partition' },
      }),
    ).toBe('2024-03-01 FAILED at transform (missing_input): No raw partition');
  });
});
