import { writeFileSync } from 'node:fs';
import { basename, join } from 'node:path';
import { findContextHeader, genderMarker } from '../parse/markers';
import { parseTopicFile } from '../parse/parseTopics';
import type { QuestionRecord } from '../types';
import { silentLogger, type Logger } from '../util/logger';
import { listSourceTopicFiles } from '../util/topicFiles';

const FREE_PICKS = 3;
const MAX_ATTEMPTS = 50;

export interface RandomTestOptions {
  dataDir: string;
  outputName?: string;
  random?: () => number;
  logger?: Logger;
}

export interface RandomTestResult {
  outputPath: string;
  selected: QuestionRecord[];
}

function contextKey(record: QuestionRecord): string {
  return `${record.gender}|${record.careFocus}|${record.hasKids}`;
}

function pick<T>(items: readonly T[], random: () => number): T {
  return items[Math.min(Math.floor(random() * items.length), items.length - 1)];
}

function contextMarker(record: QuestionRecord): string {
  if (record.careFocus === 'Myself' && record.hasKids === 'Yes') {
    if (record.gender === 'Female') return '👩‍👧';
    if (record.gender === 'Male') return '👨‍👧';
    return '💬';
  }
  return findContextHeader(record.careFocus, record.hasKids)?.markers[0] ?? '💬';
}

function contextLabel(record: QuestionRecord): string {
  if (record.careFocus === 'My Kids') return record.careFocus;
  return `${record.careFocus} (${record.hasKids === 'Yes' ? 'With' : 'No'} Kids)`;
}

/** One question written back out in the annotated input format. */
export function renderTopicSection(index: number, record: QuestionRecord): string {
  return [
    `Topic ${index}: ${record.topic}`,
    '',
    `${genderMarker(record.gender)} ${record.gender}`,
    '',
    `${contextMarker(record)} ${contextLabel(record)}`,
    record.question,
    '',
    '',
    ''
  ].join('\n');
}

/**
 * After the first few picks, keep drawing until a gender/context combination
 * not used yet turns up, or give up and keep the last draw.
 */
export function pickDiverse(
  records: readonly QuestionRecord[],
  used: ReadonlySet<string>,
  picksSoFar: number,
  random: () => number
): QuestionRecord {
  let candidate = pick(records, random);
  if (picksSoFar < FREE_PICKS) return candidate;

  for (let attempt = 1; attempt < MAX_ATTEMPTS && used.has(contextKey(candidate)); attempt++) {
    candidate = pick(records, random);
  }
  return candidate;
}

/**
 * Build a small smoke-test input: one random question from each numbered
 * topic file, spread across gender and care-focus combinations.
 */
export function createRandomTestFile(options: RandomTestOptions): RandomTestResult {
  const { dataDir, outputName = '10_random_test.txt', random = Math.random, logger = silentLogger } = options;
  const topicFiles = listSourceTopicFiles(dataDir);
  if (topicFiles.length === 0) {
    throw new Error(`No topic files found in ${dataDir}`);
  }

  const selected: QuestionRecord[] = [];
  const used = new Set<string>();

  for (const file of topicFiles) {
    const records = parseTopicFile(file, logger);
    if (records.length === 0) {
      logger.warn(`No questions found in ${basename(file)}`);
      continue;
    }

    const choice = pickDiverse(records, used, selected.length, random);
    used.add(contextKey(choice));
    selected.push(choice);

    logger.info(`Selected from ${basename(file)}: ${choice.topic}`, {
      gender: choice.gender,
      careFocus: choice.careFocus,
      hasKids: choice.hasKids
    });
  }

  const outputPath = join(dataDir, outputName);
  writeFileSync(outputPath, selected.map((record, i) => renderTopicSection(i + 1, record)).join(''), 'utf-8');
  logger.info(`Created ${outputName} with ${selected.length} questions`);

  return { outputPath, selected };
}
