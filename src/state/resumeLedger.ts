import { readFileSync } from 'node:fs';
import { LedgerRowSchema } from '../schemas/resultRow';
import { errorMessage } from '../errors';
import { decodeRecords } from '../util/csv';
import { silentLogger, type Logger } from '../util/logger';

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Questions already written to an earlier output file, whatever their status.
 * Keys are compared by exact string equality. Problems with the file degrade
 * to "not answered yet" instead of stopping the run.
 */
export function loadResumeLedger(outputPath: string, logger: Logger = silentLogger): Set<string> {
  const processed = new Set<string>();

  let text: string;
  try {
    text = readFileSync(outputPath, 'utf-8');
  } catch (error) {
    if (!isNotFound(error)) {
      logger.warn(`Could not read ${outputPath}, starting without resume data`, { error: errorMessage(error) });
    }
    return processed;
  }

  if (text.trim() === '') return processed;

  const { header, records } = decodeRecords(text);
  if (!header.includes('question')) {
    logger.warn(`${outputPath} has no "question" column, starting without resume data`);
    return processed;
  }

  for (const record of records) {
    const parsed = LedgerRowSchema.safeParse(record.fields);
    if (!record.complete || !parsed.success) {
      logger.warn(`Skipping malformed row ${record.rowNumber} in ${outputPath}`);
      continue;
    }
    processed.add(parsed.data.question);
  }

  return processed;
}

export function filterUnprocessed<T extends { question: string }>(records: readonly T[], ledger: ReadonlySet<string>): T[] {
  return records.filter(r => !ledger.has(r.question));
}
