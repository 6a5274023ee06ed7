import { ValidationError } from './errors.js';

// Calendar dates travel as 'YYYY-MM-DD' strings and are compared in UTC.

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

export type IsoDate = string;

export const toIsoDate = (date: Date): IsoDate => date.toISOString().slice(0, 10);

export const isIsoDate = (value: unknown): value is IsoDate => {
  if (typeof value !== 'string' || !ISO_DATE.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && toIsoDate(parsed) === value;
};

export const parseIsoDate = (value: unknown, field: string): IsoDate => {
  if (!isIsoDate(value)) {
    throw ValidationError.field(field, `${field} must be a calendar date (YYYY-MM-DD)`);
  }
  return value;
};

export const addDays = (date: IsoDate, days: number): IsoDate =>
  toIsoDate(new Date(Date.parse(`${date}T00:00:00Z`) + days * MS_PER_DAY));

/** Whole days from `from` to `to` (negative when `to` is earlier). */
export const daysBetween = (from: IsoDate, to: IsoDate): number =>
  Math.round((Date.parse(`${to}T00:00:00Z`) - Date.parse(`${from}T00:00:00Z`)) / MS_PER_DAY);
