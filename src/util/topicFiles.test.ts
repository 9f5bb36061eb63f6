import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { listSourceTopicFiles, listTopicFiles, outputFileName } from './topicFiles';

describe('topic files', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'topics-'));
    for (const name of ['2_diet.txt', '1_sleep.txt', '10_random_test.txt', '9_extra.txt', 'readme.md']) {
      writeFileSync(join(dir, name), '');
    }
    mkdirSync(join(dir, '3_folder.txt'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('lists text files sorted by name', () => {
    expect(listTopicFiles(dir)).toEqual(['10_random_test.txt', '1_sleep.txt', '2_diet.txt', '9_extra.txt'].map(n => join(dir, n)));
  });

  it('keeps only numbered source files', () => {
    expect(listSourceTopicFiles(dir)).toEqual(['1_sleep.txt', '2_diet.txt'].map(n => join(dir, n)));
  });

  it('names the output after the input and the time in seconds', () => {
    expect(outputFileName('data/1_sleep.txt', new Date(1700000000123))).toBe('1_sleep_1700000000.csv');
  });
});
