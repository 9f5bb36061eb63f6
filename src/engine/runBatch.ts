import { existsSync } from 'node:fs';
import { ConfigError } from '../errors';
import { parseTopicFile } from '../parse/parseTopics';
import { OutputTable } from '../state/outputTable';
import { filterUnprocessed, loadResumeLedger } from '../state/resumeLedger';
import type { ResultStatus } from '../types';
import { silentLogger } from '../util/logger';
import { processQuestion, type QuestionDeps, type QuestionOptions } from './processQuestion';

export interface BatchOptions extends QuestionOptions {
  inputPath: string;
  outputPath: string;
  includePrompt?: boolean;
}

export interface BatchSummary {
  totalQuestions: number;
  skipped: number;
  processed: number;
  byStatus: Record<ResultStatus, number>;
}

function emptyCounts(): Record<ResultStatus, number> {
  return { completed: 0, failed: 0, timeout: 0, cancelled: 0, expired: 0 };
}

function preview(question: string): string {
  return question.length > 60 ? `${question.slice(0, 60)}...` : question;
}

/**
 * Answer every question in `inputPath` that `outputPath` does not hold yet.
 *
 * Questions run one at a time, in file order. Each result row is appended as
 * soon as its question finishes, so re-running after an interruption picks up
 * at the first unanswered question and never writes a question twice.
 */
export async function runBatch(options: BatchOptions, deps: QuestionDeps): Promise<BatchSummary> {
  const logger = deps.logger ?? silentLogger;

  if (!existsSync(options.inputPath)) {
    throw new ConfigError(`Input file not found: ${options.inputPath}`);
  }

  logger.info(`Reading questions from: ${options.inputPath}`);
  const records = parseTopicFile(options.inputPath, logger);
  logger.info(`Found ${records.length} questions`);

  const ledger = loadResumeLedger(options.outputPath, logger);
  const pending = filterUnprocessed(records, ledger);
  const skipped = records.length - pending.length;
  if (skipped > 0) {
    logger.info(`Resuming: ${skipped} questions already processed, ${pending.length} remaining`);
  }

  const summary: BatchSummary = {
    totalQuestions: records.length,
    skipped,
    processed: 0,
    byStatus: emptyCounts()
  };

  if (pending.length === 0) {
    logger.info('All questions already processed');
    return summary;
  }

  const table = new OutputTable(options.outputPath, { includePrompt: options.includePrompt });
  const total = pending.length;

  for (const [index, record] of pending.entries()) {
    logger.info(`Processing ${index + 1} of ${total}: ${preview(record.question)}`);

    const row = await processQuestion(record, deps, options);
    table.append(row);

    summary.processed++;
    summary.byStatus[row.status]++;

    if (row.status === 'completed') {
      logger.info(`  ✓ Success (thread: ${row.threadId.slice(0, 8)}...)`);
    } else {
      logger.warn(`  ✗ ${row.status}: ${row.error}`);
    }
  }

  logger.info(`Batch complete. Results saved to: ${options.outputPath}`, {
    processed: summary.processed,
    skipped: summary.skipped,
    ...summary.byStatus
  });

  return summary;
}
