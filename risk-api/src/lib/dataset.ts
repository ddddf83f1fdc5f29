import fs from 'node:fs/promises';
import { DatasetLoadError } from './errors.js';

export const DELIMITERS = [';', ','] as const;
export type Delimiter = (typeof DELIMITERS)[number];

export const REQUIRED_COLUMNS = ['G2', 'absences'];

export type StudentTable = {
  delimiter: Delimiter;
  headers: string[];
  records: Array<Record<string, string>>;
};

export function parseDelimited(text: string, delimiter: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let cell = '';
  let quoted = false;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (quoted) {
      if (char === '"' && text[i + 1] === '"') {
        cell += '"';
        i++;
      } else if (char === '"') {
        quoted = false;
      } else {
        cell += char;
      }
      continue;
    }

    if (char === '"') {
      quoted = true;
    } else if (char === delimiter) {
      row.push(cell);
      cell = '';
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && text[i + 1] === '\n') i++;
      row.push(cell);
      rows.push(row);
      row = [];
      cell = '';
    } else {
      cell += char;
    }
  }

  if (cell !== '' || row.length > 0) {
    row.push(cell);
    rows.push(row);
  }

  return rows.filter((cells) => cells.some((value) => value.trim() !== ''));
}

function toTable(rows: string[][], delimiter: Delimiter): StudentTable {
  const headers = rows[0].map((header) => header.trim());
  const records = rows.slice(1).map((cells) => {
    const record: Record<string, string> = {};
    headers.forEach((header, column) => {
      record[header] = (cells[column] ?? '').trim();
    });
    return record;
  });
  return { delimiter, headers, records };
}

// Semicolon first, then comma. A delimiter is taken when its header splits
// into several columns that include every required one.
export function parseStudentTable(text: string): StudentTable {
  const content = text.replace(/^\uFEFF/, '');
  let missing: string[] = [];

  for (const delimiter of DELIMITERS) {
    const rows = parseDelimited(content, delimiter);
    if (rows.length === 0 || rows[0].length < 2) continue;

    const table = toTable(rows, delimiter);
    const absent = REQUIRED_COLUMNS.filter((column) => !table.headers.includes(column));
    if (absent.length === 0) return table;
    if (missing.length === 0) missing = absent;
  }

  if (missing.length > 0) {
    throw new DatasetLoadError(`Dataset is missing required columns: ${missing.join(', ')}`);
  }
  throw new DatasetLoadError(`Dataset could not be split with any of: ${DELIMITERS.join(' ')}`);
}

export async function loadStudentDataset(filePath: string): Promise<StudentTable> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new DatasetLoadError(`Could not read dataset at ${filePath}: ${reason}`);
  }
  return parseStudentTable(text);
}
