import { loadConfig, type AppConfig } from '../config';
import { runBatch, type BatchOptions, type BatchSummary } from '../engine/runBatch';
import { OpenAIAssistantClient } from '../openai/client';
import { createLogger } from '../util/logger';

export function batchOptionsFromConfig(config: AppConfig, inputPath: string, outputPath: string): BatchOptions {
  return {
    inputPath,
    outputPath,
    includePrompt: config.INCLUDE_PROMPT_COLUMN,
    pollIntervalMs: config.POLL_INTERVAL_MS,
    runTimeoutMs: config.RUN_TIMEOUT_MS,
    retry: {
      maxAttempts: config.MAX_ATTEMPTS,
      baseDelayMs: config.BACKOFF_BASE_MS,
      maxDelayMs: config.BACKOFF_MAX_MS,
      jitter: config.BACKOFF_JITTER
    }
  };
}

/** Load configuration, wire the OpenAI client and answer one topic file. */
export async function runBatchCommand(inputPath: string, outputPath: string, config: AppConfig = loadConfig()): Promise<BatchSummary> {
  const logger = createLogger('Batch', config.LOG_LEVEL);
  const client = new OpenAIAssistantClient(config);

  logger.info('=== Health Questions Batch Processor ===');
  logger.info(`Input:  ${inputPath}`);
  logger.info(`Output: ${outputPath}`);

  const summary = await runBatch(batchOptionsFromConfig(config, inputPath, outputPath), { client, logger });

  logger.info('=== BATCH COMPLETED ===');
  logger.info(`Questions in file: ${summary.totalQuestions}`);
  logger.info(`Already answered:  ${summary.skipped}`);
  logger.info(`Processed now:     ${summary.processed}`);
  for (const [status, count] of Object.entries(summary.byStatus)) {
    if (count > 0) logger.info(`  ${status}: ${count}`);
  }

  return summary;
}
