#!/usr/bin/env node
/**
 * Command-line flow file importer
 *
 * Usage:
 *   npm run import-flow -- data/DR1234_20230615.uff
 *   npm run import-flow -- --dry-run data/*.uff
 */
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { IngestionService } from '../ingestion';
import { CliModule } from './cli.module';
import {
  CLI_LOG_LEVELS,
  CommandOutput,
  ImportCommandArgs,
  parseImportArgs,
  runImportCommand,
  USAGE,
} from './import-command';

const output: CommandOutput = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

async function main(): Promise<number> {
  let args: ImportCommandArgs;
  try {
    args = parseImportArgs(process.argv.slice(2));
  } catch (error) {
    output.err(error instanceof Error ? error.message : String(error));
    output.err(USAGE);
    return 2;
  }

  if (args.help) {
    output.out(USAGE);
    return 0;
  }
  if (args.files.length === 0) {
    output.err(USAGE);
    return 2;
  }

  const app = await NestFactory.createApplicationContext(CliModule, {
    logger: CLI_LOG_LEVELS,
  });
  try {
    return await runImportCommand(args, app.get(IngestionService), output);
  } finally {
    await app.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    output.err(
      error instanceof Error ? (error.stack ?? error.message) : String(error),
    );
    process.exitCode = 1;
  });
