import type { Request } from 'express';
import { isOneOf } from '../constants/enums.js';
import type { PageRequest } from '../services/audit.service.js';

// Readers over request data already shaped by the validator chains.
// Absent keys read as undefined; explicit nulls are kept.

type Source = Record<string, unknown>;

export const bodyOf = (req: Request): Source => {
  const value: unknown = req.body;
  return typeof value === 'object' && value !== null && !Array.isArray(value) ? { ...value } : {};
};

export const queryOf = (req: Request): Source => ({ ...req.query });

export const intParam = (req: Request, name = 'id'): number => Number(req.params[name]);

export const str = (source: Source, key: string): string | undefined => {
  const value = source[key];
  return typeof value === 'string' ? value : undefined;
};

export const nullableStr = (source: Source, key: string): string | null | undefined =>
  source[key] === null ? null : str(source, key);

export const int = (source: Source, key: string): number | undefined => {
  const value = source[key];
  return typeof value === 'number' && Number.isInteger(value) ? value : undefined;
};

export const nullableInt = (source: Source, key: string): number | null | undefined =>
  source[key] === null ? null : int(source, key);

export const bool = (source: Source, key: string): boolean | undefined => {
  const value = source[key];
  return typeof value === 'boolean' ? value : undefined;
};

export const intList = (source: Source, key: string): number[] | undefined => {
  const value = source[key];
  if (!Array.isArray(value)) return undefined;
  return value.filter((item): item is number => typeof item === 'number' && Number.isInteger(item));
};

export const oneOf = <T extends string>(values: readonly T[], source: Source, key: string): T | undefined => {
  const value = source[key];
  return isOneOf(values, value) ? value : undefined;
};

export const nullableOneOf = <T extends string>(
  values: readonly T[],
  source: Source,
  key: string,
): T | null | undefined => (source[key] === null ? null : oneOf(values, source, key));

export const pageOf = (req: Request): PageRequest => {
  const query = queryOf(req);
  return { limit: int(query, 'limit'), offset: int(query, 'offset') };
};
