import { appendFileSync, existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { OUTPUT_COLUMNS, REDUCED_OUTPUT_COLUMNS, toColumns, type OutputColumn } from '../schemas/resultRow';
import type { ResultRow } from '../types';
import { decodeRecords, encodeRow } from '../util/csv';

function isOutputColumn(name: string): name is OutputColumn {
  return OUTPUT_COLUMNS.some(column => column === name);
}

function readExisting(filePath: string): string {
  return existsSync(filePath) ? readFileSync(filePath, 'utf-8') : '';
}

/**
 * Append-only CSV of result rows. Every `append` opens, writes and closes the
 * file so an interrupted batch keeps every finished question.
 *
 * When the file already exists its header wins, so a resumed run keeps the
 * column layout it started with.
 */
export class OutputTable {
  readonly filePath: string;
  readonly columns: readonly OutputColumn[];
  private headerWritten: boolean;
  /** Line break owed to an existing file whose last row is unterminated. */
  private pendingBreak = '';

  constructor(filePath: string, options: { includePrompt?: boolean } = {}) {
    this.filePath = filePath;
    const text = readExisting(filePath);
    const existing = text.trim() === '' ? [] : decodeRecords(text).header;
    if (existing.length > 0) {
      const unknown = existing.filter(name => !isOutputColumn(name));
      if (unknown.length > 0) {
        throw new Error(`${filePath} has unexpected columns: ${unknown.join(', ')}`);
      }
      this.columns = existing.filter(isOutputColumn);
      this.headerWritten = true;
      this.pendingBreak = /[\r\n]$/.test(text) ? '' : '\n';
    } else {
      this.columns = options.includePrompt === false ? REDUCED_OUTPUT_COLUMNS : OUTPUT_COLUMNS;
      this.headerWritten = false;
    }
  }

  append(row: ResultRow): void {
    const values = toColumns(row);
    const line = encodeRow(this.columns.map(c => values[c]));
    if (!this.headerWritten) {
      // a missing or whitespace-only file starts over with the header at offset 0
      mkdirSync(dirname(this.filePath), { recursive: true });
      writeFileSync(this.filePath, encodeRow(this.columns) + line, 'utf-8');
      this.headerWritten = true;
      return;
    }
    appendFileSync(this.filePath, this.pendingBreak + line, 'utf-8');
    this.pendingBreak = '';
  }
}
