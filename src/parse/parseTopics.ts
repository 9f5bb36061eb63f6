import { readFileSync } from 'node:fs';
import { ParseError } from '../errors';
import type { CareFocus, Gender, HasKids, QuestionRecord } from '../types';
import { silentLogger, type Logger } from '../util/logger';
import { CONTEXT_HEADERS, CONTEXT_MARKERS, GENDER_HEADERS, type ContextHeader, type GenderHeader } from './markers';

const TOPIC_LINE = /^Topic\s+\d+\s*:\s*(.+)$/;
const NUMBERING = /^\d+[.)](\s+|$)/;

/** "12. What is X?" -> "What is X?". Lines without numbering come back unchanged. */
export function stripNumbering(line: string): string {
  return line.replace(NUMBERING, '');
}

export function matchTopicHeader(line: string): string | null {
  const match = TOPIC_LINE.exec(line);
  return match ? match[1].trim() : null;
}

/**
 * Returns the gender header this line declares, null when the line is not a
 * gender header at all. A gender marker followed by an unknown label throws.
 */
export function matchGenderHeader(line: string, lineNumber = 0): GenderHeader | null {
  const byMarker = GENDER_HEADERS.find(h => line.startsWith(h.marker));
  if (!byMarker) return null;
  if (!line.includes(byMarker.label)) {
    throw new ParseError(`gender marker ${byMarker.marker} without "${byMarker.label}" label`, lineNumber, line);
  }
  return byMarker;
}

export function matchContextHeader(line: string, lineNumber = 0): ContextHeader | null {
  const marker = CONTEXT_MARKERS.find(m => line.startsWith(m));
  if (!marker) return null;
  const label = line.slice(marker.length);
  const header = CONTEXT_HEADERS.find(h => label.includes(h.label));
  if (!header) {
    throw new ParseError(`unrecognised context header after ${marker}`, lineNumber, line);
  }
  return header;
}

interface ParseState {
  topic?: string;
  gender?: Gender;
  careFocus?: CareFocus;
  hasKids?: HasKids;
}

function missingContext(state: ParseState): string[] {
  const missing: string[] = [];
  if (!state.topic) missing.push('topic');
  if (!state.gender) missing.push('gender');
  if (!state.careFocus || !state.hasKids) missing.push('care focus');
  return missing;
}

/**
 * Parse an annotated topic file into question records.
 *
 * Header lines update the running context, every other non-blank line is a
 * question inheriting the latest topic, gender and care focus. A topic header
 * only replaces the topic; gender and care focus carry over until overridden.
 * A question before its context is complete aborts the parse.
 */
export function parseTopicText(text: string, logger: Logger = silentLogger): QuestionRecord[] {
  const records: QuestionRecord[] = [];
  const state: ParseState = {};
  const lines = text.replace(/^\uFEFF/, '').split(/\r?\n/);

  lines.forEach((rawLine, index) => {
    const lineNumber = index + 1;
    const line = rawLine.trim();
    if (!line) return;

    const topic = matchTopicHeader(line);
    if (topic !== null) {
      state.topic = topic;
      return;
    }

    const genderHeader = matchGenderHeader(line, lineNumber);
    if (genderHeader) {
      state.gender = genderHeader.gender;
      return;
    }

    const contextHeader = matchContextHeader(line, lineNumber);
    if (contextHeader) {
      state.careFocus = contextHeader.careFocus;
      state.hasKids = contextHeader.hasKids;
      return;
    }

    const { topic: currentTopic, gender, careFocus, hasKids } = state;
    if (!currentTopic || !gender || !careFocus || !hasKids) {
      throw new ParseError(`question before ${missingContext(state).join(', ')} header`, lineNumber, line);
    }

    const question = stripNumbering(line);
    if (!question) {
      logger.debug(`Skipping bare numbering on line ${lineNumber}`);
      return;
    }

    records.push({ topic: currentTopic, gender, careFocus, hasKids, question, lineNumber });
  });

  return records;
}

export function parseTopicFile(filePath: string, logger: Logger = silentLogger): QuestionRecord[] {
  return parseTopicText(readFileSync(filePath, 'utf-8'), logger);
}
