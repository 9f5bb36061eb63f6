#!/usr/bin/env node
import { Command } from 'commander';
import { loadSettings } from '../config';
import { createRandomTestFile } from '../engine/randomSample';
import { ConfigError, ParseError, errorMessage } from '../errors';
import { createLogger } from '../util/logger';
import { exitOnInterrupt } from './interrupt';
import { runBatchCommand } from './runBatch';
import { selectAndRun } from './selectFile';

const logger = createLogger('CLI');

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('health-batch')
    .description('Answer annotated health questions through an OpenAI assistant and collect the replies in CSV');

  program
    .command('run')
    .description('Process one topic file, resuming into an existing output CSV')
    .requiredOption('-i, --input <file>', 'annotated topic file')
    .requiredOption('-o, --output <file>', 'CSV file to append results to')
    .action(async (opts: { input: string; output: string }) => {
      await runBatchCommand(opts.input, opts.output);
    });

  program
    .command('select')
    .description('Choose a topic file from the data directory interactively')
    .action(async () => {
      await selectAndRun();
    });

  program
    .command('random-test')
    .description('Write a test file with one random question per numbered topic file')
    .option('-d, --data-dir <dir>', 'directory holding the topic files')
    .option('-n, --output-name <name>', 'file name to write inside the data directory', '10_random_test.txt')
    .action((opts: { dataDir?: string; outputName: string }) => {
      const settings = loadSettings();
      createRandomTestFile({
        dataDir: opts.dataDir ?? settings.DATA_DIR,
        outputName: opts.outputName,
        logger: createLogger('RandomTest', settings.LOG_LEVEL)
      });
    });

  return program;
}

async function main() {
  process.on('SIGINT', exitOnInterrupt);

  try {
    await buildProgram().parseAsync(process.argv);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(`Configuration error: ${error.message}`);
    } else if (error instanceof ParseError) {
      logger.error(`Malformed topic file: ${error.message}`, { line: error.line });
    } else {
      logger.error('Batch failed', { error: errorMessage(error) });
    }
    process.exit(1);
  }
}

if (require.main === module) {
  main().catch(e => {
    console.error(e);
    process.exit(1);
  });
}
