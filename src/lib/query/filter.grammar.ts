import type { FilterClause, FilterOp, QueryValues } from './types';

/** Keys consumed by pagination and ordering; never treated as filters. */
export const PAGE_KEYS = ['page', 'size'] as const;
export const ORDER_KEYS = ['order', 'sort', 'order_by', 'orderBy'] as const;

const RESERVED_KEYS: ReadonlySet<string> = new Set<string>([
  ...PAGE_KEYS,
  ...ORDER_KEYS,
]);

const OP_SEPARATOR = '__';

const OP_ALIASES: Readonly<Record<string, FilterOp>> = {
  eq: 'eq',
  '=': 'eq',
  ne: 'ne',
  neq: 'ne',
  '!=': 'ne',
  '<>': 'ne',
  gt: 'gt',
  '>': 'gt',
  gte: 'gte',
  ge: 'gte',
  '>=': 'gte',
  lt: 'lt',
  '<': 'lt',
  lte: 'lte',
  le: 'lte',
  '<=': 'lte',
  like: 'like',
  contains: 'like',
  contain: 'like',
  in: 'in',
  nin: 'nin',
  notin: 'nin',
  not_in: 'nin',
  between: 'between',
  range: 'between',
  isnull: 'isnull',
  null: 'isnull',
  notnull: 'notnull',
  not_null: 'notnull',
  isnotnull: 'notnull',
};

/** Operators whose operands may be comma-separated lists. */
const LIST_OPS: ReadonlySet<FilterOp> = new Set<FilterOp>(['in', 'nin', 'between']);

export function normalizeFilterOp(raw: string): FilterOp | undefined {
  const key = raw.trim().toLowerCase();
  return Object.prototype.hasOwnProperty.call(OP_ALIASES, key)
    ? OP_ALIASES[key]
    : undefined;
}

/**
 * Split `<column>__<op>` on the last separator strictly inside the key.
 * Keys without a recognized operator suffix are equality filters on the
 * whole key, so columns containing `__` keep working.
 */
export function parseFilterKey(key: string): { column: string; operator: FilterOp } {
  const trimmed = key.trim();
  if (trimmed === '') return { column: '', operator: 'eq' };

  const idx = trimmed.lastIndexOf(OP_SEPARATOR);
  if (idx > 0 && idx < trimmed.length - OP_SEPARATOR.length) {
    const op = normalizeFilterOp(trimmed.slice(idx + OP_SEPARATOR.length));
    if (op) return { column: trimmed.slice(0, idx), operator: op };
  }

  return { column: trimmed, operator: 'eq' };
}

export function normalizeFilterValues(values: ReadonlyArray<string>): string[] {
  return values.map((v) => v.trim()).filter((v) => v !== '');
}

export function splitCommaValues(values: ReadonlyArray<string>): string[] {
  return values.flatMap((v) => normalizeFilterValues(v.split(',')));
}

/** 1/true/yes/y/on and 0/false/no/n/off; anything else is undefined. */
export function parseBoolValue(raw: string | undefined): boolean | undefined {
  switch ((raw ?? '').trim().toLowerCase()) {
    case '1':
    case 'true':
    case 'yes':
    case 'y':
    case 'on':
      return true;
    case '0':
    case 'false':
    case 'no':
    case 'n':
    case 'off':
      return false;
    default:
      return undefined;
  }
}

/** Turn a filter mapping into clauses, one per key, in key order. */
export function parseFilters(filters: QueryValues): FilterClause[] {
  const clauses: FilterClause[] = [];
  for (const [key, raw] of Object.entries(filters)) {
    const { column, operator } = parseFilterKey(key);
    if (column === '') continue;
    const values = LIST_OPS.has(operator)
      ? splitCommaValues(raw)
      : normalizeFilterValues(raw);
    clauses.push({ column, operator, values });
  }
  return clauses;
}

/**
 * Normalize a decoded query object (e.g. Express `req.query`) into string
 * lists. Nested objects and non-string values are dropped.
 */
export function toQueryValues(query: unknown): Record<string, string[]> {
  const out: Record<string, string[]> = {};
  if (!query || typeof query !== 'object') return out;

  for (const [key, raw] of Object.entries(query)) {
    if (typeof raw === 'string') {
      out[key] = [raw];
    } else if (Array.isArray(raw)) {
      const strings = raw.filter((v): v is string => typeof v === 'string');
      if (strings.length > 0) out[key] = strings;
    }
  }
  return out;
}

/**
 * Split untrusted query values into filters and raw order directives.
 * Order directives are merged from `order`, `sort`, `order_by`, `orderBy`
 * in that sequence.
 */
export function extractQueryDirectives(values: QueryValues): {
  filters: Record<string, string[]>;
  orders: string[];
} {
  const filters: Record<string, string[]> = {};
  for (const [key, raw] of Object.entries(values)) {
    if (RESERVED_KEYS.has(key)) continue;
    const kept = raw.filter((v) => v.trim() !== '');
    if (kept.length > 0) filters[key] = kept;
  }

  const orders: string[] = [];
  for (const key of ORDER_KEYS) {
    const raw = values[key];
    if (raw) orders.push(...raw);
  }

  return { filters, orders };
}
