/**
 * Minimal RFC 4180 CSV reader and writer for platform exports and reports.
 *
 * Handles a UTF-8 BOM, CRLF or LF line endings, and quoted fields with
 * embedded commas, newlines and doubled quotes.
 */

export type CsvRow = Record<string, string>;

export interface ParsedCsv {
  headers: string[];
  rows: CsvRow[];
}

export type CsvValue = string | number | boolean | null | undefined;

/** Split CSV text into records of raw fields. Blank lines are skipped. */
function parseRecords(text: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let inQuotes = false;
  let i = 0;

  const endRecord = () => {
    record.push(field);
    field = '';
    if (!(record.length === 1 && record[0] === '')) {
      records.push(record);
    }
    record = [];
  };

  while (i < text.length) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
        i++;
        continue;
      }
      field += ch;
      i++;
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
    } else if (ch === ',') {
      record.push(field);
      field = '';
    } else if (ch === '\r') {
      if (text[i + 1] === '\n') i++;
      endRecord();
    } else if (ch === '\n') {
      endRecord();
    } else {
      field += ch;
    }
    i++;
  }

  if (field !== '' || record.length > 0) {
    endRecord();
  }

  return records;
}

/**
 * Parse CSV text with a header row.
 * Short rows are padded with empty strings; surplus cells are dropped.
 */
export function parseCsv(text: string): ParsedCsv {
  const stripped = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  const [headerRecord, ...dataRecords] = parseRecords(stripped);

  if (headerRecord === undefined) {
    return { headers: [], rows: [] };
  }

  const headers = headerRecord.map((h) => h.trim());
  const rows = dataRecords.map((record) => {
    const row: CsvRow = {};
    headers.forEach((header, index) => {
      row[header] = record[index] ?? '';
    });
    return row;
  });

  return { headers, rows };
}

function escapeField(value: CsvValue): string {
  if (value === null || value === undefined) {
    return '';
  }

  const str = String(value);
  if (str.includes(',') || str.includes('"') || str.includes('\n') || str.includes('\r')) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

/**
 * Serialize rows under `headers`. Each row is read by header name; absent
 * values become empty cells. Output ends with a trailing newline.
 */
export function generateCsv(headers: readonly string[], rows: ReadonlyArray<Record<string, CsvValue>>): string {
  const lines = [headers.map(escapeField).join(',')];
  for (const row of rows) {
    lines.push(headers.map((header) => escapeField(row[header])).join(','));
  }
  return `${lines.join('\n')}\n`;
}
