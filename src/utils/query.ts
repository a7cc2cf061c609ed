import { NotFoundError, ValidationError } from './errors';

const DAY = /^\d{4}-\d{2}-\d{2}$/;

function single(value: unknown): string | undefined {
  if (Array.isArray(value)) return single(value[0]);
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

/** Route `:id` segments; anything that is not a positive integer cannot exist. */
export function idParam(value: string, what = 'Resource'): number {
  const id = Number(value);
  if (!Number.isInteger(id) || id < 1) throw new NotFoundError(`${what} not found`);
  return id;
}

export function textQuery(value: unknown): string | undefined {
  return single(value);
}

export function intQuery(value: unknown, field: string): number | undefined {
  const raw = single(value);
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1) throw ValidationError.field(field, `${field} must be a positive integer`);
  return n;
}

export function boolQuery(value: unknown, field: string): boolean | undefined {
  const raw = single(value);
  if (raw === undefined) return undefined;
  if (raw === 'true' || raw === '1') return true;
  if (raw === 'false' || raw === '0') return false;
  throw ValidationError.field(field, `${field} must be true or false`);
}

export function enumQuery<T extends string>(value: unknown, field: string, allowed: readonly T[]): T | undefined {
  const raw = single(value);
  if (raw === undefined) return undefined;
  const match = allowed.find((a) => a === raw);
  if (!match) throw ValidationError.field(field, `${field} must be one of: ${allowed.join(', ')}`);
  return match;
}

export function dateQuery(value: unknown, field: string): Date | undefined {
  const raw = single(value);
  if (raw === undefined) return undefined;
  const date = DAY.test(raw) ? new Date(`${raw}T00:00:00`) : new Date(raw);
  if (Number.isNaN(date.getTime())) throw ValidationError.field(field, `${field} must be a date`);
  return date;
}
