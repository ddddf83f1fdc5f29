import { MissingRequiredFieldError } from '../../lib/errors.js';
import type { NormalizedFeatures, RowLike, StudentRecord } from './contracts.js';

export const FEATURE_DEFAULTS = {
  studytime: 2,
  failures: 0,
  famsup: 'yes',
  Medu: 2,
  Fedu: 2,
  Dalc: 1,
  Walc: 1,
  goout: 2,
} as const;

function isRowLike(record: StudentRecord): record is RowLike {
  return 'get' in record && typeof record.get === 'function';
}

export function readField(record: StudentRecord, field: string): unknown {
  if (isRowLike(record)) return record.get(field);
  return Object.prototype.hasOwnProperty.call(record, field) ? record[field] : undefined;
}

export function readNumber(record: StudentRecord, field: string): number | null {
  const value = readField(record, field);
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (!trimmed) return null;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function readText(record: StudentRecord, field: string): string | null {
  const value = readField(record, field);
  if (typeof value !== 'string') return null;
  const trimmed = value.trim().toLowerCase();
  return trimmed ? trimmed : null;
}

function required(record: StudentRecord, field: 'G2' | 'absences') {
  const value = readNumber(record, field);
  if (value === null) {
    throw new MissingRequiredFieldError(field);
  }
  return value;
}

export function extract(record: StudentRecord): NormalizedFeatures {
  return {
    G1: readNumber(record, 'G1'),
    G2: required(record, 'G2'),
    G3: readNumber(record, 'G3'),
    absences: required(record, 'absences'),
    studytime: readNumber(record, 'studytime') ?? FEATURE_DEFAULTS.studytime,
    failures: readNumber(record, 'failures') ?? FEATURE_DEFAULTS.failures,
    famsup: readText(record, 'famsup') ?? FEATURE_DEFAULTS.famsup,
    Medu: readNumber(record, 'Medu') ?? FEATURE_DEFAULTS.Medu,
    Fedu: readNumber(record, 'Fedu') ?? FEATURE_DEFAULTS.Fedu,
    Dalc: readNumber(record, 'Dalc') ?? FEATURE_DEFAULTS.Dalc,
    Walc: readNumber(record, 'Walc') ?? FEATURE_DEFAULTS.Walc,
    goout: readNumber(record, 'goout') ?? FEATURE_DEFAULTS.goout,
  };
}

