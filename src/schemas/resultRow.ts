import { z } from 'zod';
import type { ResultRow } from '../types';

export const OUTPUT_COLUMNS = [
  'topic',
  'gender',
  'care_focus',
  'has_kids',
  'role',
  'prompt',
  'question',
  'response',
  'thread_id',
  'run_id',
  'status',
  'error'
] as const;

export type OutputColumn = typeof OUTPUT_COLUMNS[number];

export const REDUCED_OUTPUT_COLUMNS: readonly OutputColumn[] = OUTPUT_COLUMNS.filter(c => c !== 'prompt');

export function toColumns(row: ResultRow): Record<OutputColumn, string> {
  return {
    topic: row.topic,
    gender: row.gender,
    care_focus: row.careFocus,
    has_kids: row.hasKids,
    role: row.role,
    prompt: row.prompt,
    question: row.question,
    response: row.response,
    thread_id: row.threadId,
    run_id: row.runId,
    status: row.status,
    error: row.error
  };
}

// Only the resume key matters when reading an earlier run back
export const LedgerRowSchema = z.object({
  question: z.string().min(1)
});
