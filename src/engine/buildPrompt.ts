import { RESPONSE_TEMPLATE } from '../prompts/response';
import type { QuestionRecord, Role } from '../types';

export function buildContextSummary(record: QuestionRecord, role: Role): string {
  return [
    'Context:',
    `• Topic: ${record.topic}`,
    `• Gender: ${record.gender}`,
    `• Care focus: ${record.careFocus}`,
    `• Has kids: ${record.hasKids}`,
    `• Inferred role: ${role}`
  ].join('\n');
}

/**
 * Full user message for one question: context block, reply brief, then the
 * question exactly as parsed.
 */
export function buildPrompt(record: QuestionRecord, role: Role): string {
  return `${buildContextSummary(record, role)}\n\n${RESPONSE_TEMPLATE}${record.question}`;
}
