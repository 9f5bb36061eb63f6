const NEEDS_QUOTING = /[",\r\n]/;

export function encodeField(value: string): string {
  return NEEDS_QUOTING.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function encodeRow(values: readonly string[]): string {
  return values.map(encodeField).join(',') + '\n';
}

/**
 * Split CSV text into rows of fields. Quoted fields may span lines and
 * contain doubled quotes. An unterminated quote runs to end of input.
 */
export function decodeRows(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;
  let i = text.charCodeAt(0) === 0xfeff ? 1 : 0;

  const endField = () => {
    row.push(field);
    field = '';
  };
  const endRow = () => {
    endField();
    rows.push(row);
    row = [];
  };

  for (; i < text.length; i++) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += ch;
      }
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
    } else if (ch === ',') {
      endField();
    } else if (ch === '\n') {
      endRow();
    } else if (ch === '\r') {
      if (text[i + 1] === '\n') i++;
      endRow();
    } else {
      field += ch;
    }
  }

  // Trailing row without a final newline
  if (field !== '' || row.length > 0 || inQuotes) {
    endRow();
  }

  return rows;
}

const isBlankRow = (values: readonly string[]) => values.length === 1 && values[0] === '';

/**
 * Rows keyed by header name. The first non-blank row is the header and blank
 * rows are dropped. Short rows are reported rather than padded.
 */
export function decodeRecords(text: string): {
  header: string[];
  records: Array<{ rowNumber: number; fields: Record<string, string>; complete: boolean }>;
} {
  const rows = decodeRows(text);
  const start = rows.findIndex(values => !isBlankRow(values));
  if (start === -1) return { header: [], records: [] };

  const header = rows[start];
  const records: Array<{ rowNumber: number; fields: Record<string, string>; complete: boolean }> = [];
  rows.slice(start + 1).forEach((values, index) => {
    if (isBlankRow(values)) return;
    const fields: Record<string, string> = {};
    header.forEach((name, col) => {
      if (col < values.length) fields[name] = values[col];
    });
    records.push({ rowNumber: index + 1, fields, complete: values.length >= header.length });
  });
  return { header, records };
}
