import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { loadStudentDataset, parseDelimited, parseStudentTable } from '../src/lib/dataset.js';
import { DatasetLoadError } from '../src/lib/errors.js';

describe('student dataset loader', () => {
  it('reads a semicolon file with quoted cells', () => {
    const table = parseStudentTable('school;sex;G1;G2;G3;absences\n"GP";"F";"5";"6";6;6\n');

    expect(table.delimiter).toBe(';');
    expect(table.headers).toEqual(['school', 'sex', 'G1', 'G2', 'G3', 'absences']);
    expect(table.records).toEqual([{ school: 'GP', sex: 'F', G1: '5', G2: '6', G3: '6', absences: '6' }]);
  });

  it('falls back to commas and handles CRLF and blank lines', () => {
    const table = parseStudentTable('\uFEFFG2,absences\r\n12,3\r\n\r\n14,0\n');

    expect(table.delimiter).toBe(',');
    expect(table.headers).toEqual(['G2', 'absences']);
    expect(table.records).toEqual([
      { G2: '12', absences: '3' },
      { G2: '14', absences: '0' },
    ]);
  });

  it('moves on to commas when the semicolon header lacks required columns', () => {
    const table = parseStudentTable('id;name,G2,absences\n1;x,12,3\n');

    expect(table.delimiter).toBe(',');
    expect(table.headers).toEqual(['id;name', 'G2', 'absences']);
    expect(table.records).toEqual([{ 'id;name': '1;x', G2: '12', absences: '3' }]);
  });

  it('fills short rows with empty cells', () => {
    const table = parseStudentTable('G2;absences;famsup\n12;3\n');

    expect(table.records).toEqual([{ G2: '12', absences: '3', famsup: '' }]);
  });

  it('keeps delimiters and escaped quotes inside quoted cells', () => {
    expect(parseDelimited('a,"b ""x"", c"\n', ',')).toEqual([['a', 'b "x", c']]);
  });

  it('rejects a file without the required columns', () => {
    expect(() => parseStudentTable('a;b\n1;2\n')).toThrow('Dataset is missing required columns: G2, absences');
  });

  it('rejects a file that no delimiter splits', () => {
    expect(() => parseStudentTable('G2\n12\n')).toThrow(DatasetLoadError);
  });

  it('loads a dataset from disk', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'risk-dataset-'));
    const file = path.join(dir, 'students.csv');
    await fs.writeFile(file, 'G1;G2;G3;absences\n10;11;12;4\n', 'utf8');

    const table = await loadStudentDataset(file);

    expect(table.records).toEqual([{ G1: '10', G2: '11', G3: '12', absences: '4' }]);
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('reports a missing file as a dataset error', async () => {
    await expect(loadStudentDataset(path.join(os.tmpdir(), 'no-such-dir', 'missing.csv'))).rejects.toThrow(
      DatasetLoadError
    );
  });
});
