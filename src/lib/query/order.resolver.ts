import { ORDER_KEYS } from './filter.grammar';
import type { OrderSpec, QueryValues } from './types';

const TOKEN_SEPARATORS = /[ :,]+/;
const DESC_WORDS: ReadonlySet<string> = new Set(['desc', 'descend', 'descending']);

/**
 * Parse one sort directive: `-name`, `+name`, `name desc`, `name:asc`.
 * A direction word overrides the sign prefix.
 */
export function parseOrderOption(raw: string): OrderSpec | undefined {
  const parts = raw.trim().split(TOKEN_SEPARATORS).filter((p) => p !== '');
  if (parts.length === 0) return undefined;

  let column = parts[0];
  let descending = false;
  if (column.startsWith('-')) {
    column = column.slice(1);
    descending = true;
  } else if (column.startsWith('+')) {
    column = column.slice(1);
  }
  if (column === '') return undefined;

  if (parts.length > 1) {
    descending = DESC_WORDS.has(parts[1].toLowerCase());
  }

  return { column, descending };
}

/** Collect directives from the reserved order keys of a query mapping. */
export function parseOrderOptions(values: QueryValues): OrderSpec[] {
  const out: OrderSpec[] = [];
  for (const key of ORDER_KEYS) {
    for (const raw of values[key] ?? []) {
      const opt = parseOrderOption(raw);
      if (opt) out.push(opt);
    }
  }
  return out;
}

/** Keep allowlisted columns only, first occurrence per column wins. */
export function sanitizeOrders(
  orders: ReadonlyArray<OrderSpec>,
  allowlist: ReadonlySet<string>,
): OrderSpec[] {
  const out: OrderSpec[] = [];
  const seen = new Set<string>();
  for (const opt of orders) {
    const column = opt.column.trim();
    if (column === '' || !allowlist.has(column) || seen.has(column)) continue;
    seen.add(column);
    out.push({ column, descending: opt.descending });
  }
  return out;
}

export function resolveOrder(
  raw: ReadonlyArray<string>,
  allowlist: ReadonlySet<string>,
): OrderSpec[] {
  const parsed: OrderSpec[] = [];
  for (const token of raw) {
    const opt = parseOrderOption(token);
    if (opt) parsed.push(opt);
  }
  return sanitizeOrders(parsed, allowlist);
}
