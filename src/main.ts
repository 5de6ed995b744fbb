#!/usr/bin/env node
import 'reflect-metadata';
import { LogLevel, Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { CommanderError } from 'commander';
import { AppModule } from './app.module';
import {
  CliCommand,
  EXIT_CODES,
  exitCodeFor,
  exitCodeForError,
  parseCommand,
  summarize,
} from './cli/program';
import { errorKind, errorMessage } from './common/errors';
import { logLevelsFor } from './config/logging';
import { PipelineResult } from './pipeline/pipeline.types';
import { PipelineService } from './pipeline/pipeline.service';

const logger = new Logger('Main');

async function bootstrap(argv: string[]): Promise<number> {
  let command: CliCommand;
  let logLevels: LogLevel[];
  try {
    logLevels = logLevelsFor(process.env.LOG_LEVEL);
    Logger.overrideLogger(logLevels);
    command = parseCommand(argv);
  } catch (err) {
    // --help and --version also end up here, with exit code 0
    if (err instanceof CommanderError) return err.exitCode === 0 ? EXIT_CODES.success : EXIT_CODES.invalidInput;
    logger.error(errorMessage(err));
    return EXIT_CODES.invalidInput;
  }

  const app = await NestFactory.createApplicationContext(AppModule, {
    abortOnError: false,
    logger: logLevels,
  });

  // First signal stops the run at the next stage boundary; a stage in flight finishes or rolls back
  const controller = new AbortController();
  const cancel = (signal: NodeJS.Signals) => {
    logger.warn(`Received ${signal}, cancelling after the current stage`);
    controller.abort();
  };
  process.once('SIGINT', cancel);
  process.once('SIGTERM', cancel);

  try {
    const pipeline = app.get(PipelineService);
    const options = { ...command.options, signal: controller.signal };

    const results: PipelineResult[] =
      command.name === 'run'
        ? [await pipeline.run(command.date, options)]
        : await pipeline.runRange(command.from, command.to, options);

    for (const result of results) {
      if (result.error) logger.error(summarize(result));
      else logger.log(summarize(result));
    }
    return exitCodeFor(results);
  } catch (err) {
    logger.error(errorMessage(err));
    return exitCodeForError(errorKind(err));
  } finally {
    process.off('SIGINT', cancel);
    process.off('SIGTERM', cancel);
    await app.close();
  }
}

bootstrap(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    logger.error(`Startup failed: ${errorMessage(err)}`);
    process.exitCode = exitCodeForError(errorKind(err));
  },
);
