import { Command } from 'commander';
import { CHANNEL_FEES } from '../common/constants';
import { PartitionDate, parsePartitionDate, yesterday } from '../common/dates';
import { ConfigurationError, PipelineErrorKind } from '../common/errors';
import { STAGE_ORDER, StageName } from '../common/stage.types';
import { PipelineResult, RangeOptions, RunOptions } from '../pipeline/pipeline.types';

export const EXIT_CODES = {
  success: 0,
  stageFailed: 1,
  invalidInput: 2,
} as const;

export type CliCommand =
  | { name: 'run'; date: PartitionDate; options: RunOptions }
  | { name: 'backfill'; from: PartitionDate; to: PartitionDate; options: RangeOptions };

interface RunFlags {
  date?: PartitionDate;
  stages?: StageName[];
  force?: boolean;
  count?: number;
  failureRate?: number;
  channels?: string[];
}

interface BackfillFlags {
  from: PartitionDate;
  to: PartitionDate;
  stages?: StageName[];
  force?: boolean;
  concurrency?: number;
}

export function parseStages(value: string): StageName[] {
  const names = value.split(',').map((s) => s.trim()).filter(Boolean);
  const stages = STAGE_ORDER.filter((stage) => names.includes(stage));
  const unknown = names.filter((name) => !stages.some((stage) => stage === name));

  if (unknown.length > 0) {
    throw new ConfigurationError(`Unknown stage(s): ${unknown.join(', ')} (expected ${STAGE_ORDER.join(', ')})`);
  }
  if (stages.length === 0) {
    throw new ConfigurationError('--stages needs at least one stage');
  }
  return stages;
}

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new ConfigurationError(`Expected a positive integer, got "${value}"`);
  }
  return n;
}

export function parseRate(value: string): number {
  const n = Number(value);
  if (value.trim() === '' || !(n >= 0 && n <= 1)) {
    throw new ConfigurationError(`Expected a rate between 0 and 1, got "${value}"`);
  }
  return n;
}

export function parseChannels(value: string): string[] {
  const channels = value.split(',').map((c) => c.trim()).filter(Boolean);
  const unknown = channels.filter((c) => !Object.prototype.hasOwnProperty.call(CHANNEL_FEES, c));
  if (channels.length === 0 || unknown.length > 0) {
    throw new ConfigurationError(
      `Invalid channel set "${value}" (known: ${Object.keys(CHANNEL_FEES).join(', ')})`,
    );
  }
  return channels;
}

/**
 * Builds the command-line program. Parsing never exits the process: commander
 * errors are thrown as CommanderError and value errors as ConfigurationError.
 */
export function createProgram(
  onCommand: (command: CliCommand) => void,
  now: () => Date = () => new Date(),
): Command {
  const program = new Command('warehouse-pipeline')
    .description('Daily transaction pipeline: generate → transform → load into the warehouse')
    .exitOverride()
    .showHelpAfterError();

  program
    .command('run')
    .description('Run the pipeline for one date')
    .option('--date <YYYY-MM-DD>', 'partition date (default: yesterday)', parsePartitionDate)
    .option('--stages <list>', 'comma-separated stages to run', parseStages)
    .option('--force', 're-run stages whose output already exists')
    .option('--count <n>', 'records to generate', parsePositiveInt)
    .option('--failure-rate <rate>', 'share of generated transactions that fail', parseRate)
    .option('--channels <list>', 'comma-separated channels to generate', parseChannels)
    .action((flags: RunFlags) =>
      onCommand({
        name: 'run',
        date: flags.date ?? yesterday(now()),
        options: {
          stages: flags.stages,
          force: flags.force ?? false,
          generate: {
            count: flags.count,
            failureRate: flags.failureRate,
            channels: flags.channels,
          },
        },
      }),
    );

  program
    .command('backfill')
    .description('Run the pipeline for every date in an inclusive range')
    .requiredOption('--from <YYYY-MM-DD>', 'first date', parsePartitionDate)
    .requiredOption('--to <YYYY-MM-DD>', 'last date', parsePartitionDate)
    .option('--stages <list>', 'comma-separated stages to run', parseStages)
    .option('--force', 're-run stages whose output already exists')
    .option('--concurrency <n>', 'dates processed at once', parsePositiveInt)
    .action((flags: BackfillFlags) => {
      if (flags.from > flags.to) {
        throw new ConfigurationError(`--from ${flags.from} is after --to ${flags.to}`);
      }
      onCommand({
        name: 'backfill',
        from: flags.from,
        to: flags.to,
        options: {
          stages: flags.stages,
          force: flags.force ?? false,
          concurrency: flags.concurrency,
        },
      });
    });

  return program;
}

/** Parses user arguments (without the node and script paths) into a command */
export function parseCommand(argv: readonly string[], now?: () => Date): CliCommand {
  const parsed: { command?: CliCommand } = {};
  createProgram((command) => (parsed.command = command), now).parse([...argv], { from: 'user' });

  if (!parsed.command) {
    throw new ConfigurationError('No command given (expected run or backfill)');
  }
  return parsed.command;
}

/** 0 when every date succeeded, 2 when any failed on invalid input, otherwise 1 */
export function exitCodeFor(results: PipelineResult[]): number {
  const kinds = results.flatMap((r) => (r.error ? [r.error.kind] : []));
  if (kinds.length === 0) return EXIT_CODES.success;
  return kinds.includes('configuration') ? EXIT_CODES.invalidInput : EXIT_CODES.stageFailed;
}

export function exitCodeForError(kind: PipelineErrorKind): number {
  return kind === 'configuration' ? EXIT_CODES.invalidInput : EXIT_CODES.stageFailed;
}

/** One-line outcome of a run, e.g. "2024-03-01 ok | generate=succeeded ..." */
export function summarize(result: PipelineResult): string {
  const stages = result.stages.map((s) => `${s.stage}=${s.status}`).join(' ');
  if (!result.error) {
    return `${result.date} ok | ${stages}`;
  }
  const { stage, kind, message } = result.error;
  return `${result.date} FAILED at ${stage} (${kind}): ${message}${stages ? ` | ${stages}` : ''}`;
}
