import { parseBoolValue, splitCommaValues } from './filter.grammar';
import type { CompareOp, FilterClause, Predicate } from './types';

const LIKE_WILDCARDS = /[%_]/;

/** Substring match unless the caller already placed a wildcard. */
export function toLikePattern(value: string): string {
  if (value === '' || LIKE_WILDCARDS.test(value)) return value;
  return `%${value}%`;
}

/**
 * Build the conjunction for a set of clauses. Clauses on columns outside
 * the allowlist, or without the operands their operator needs, produce no
 * predicate at all.
 */
export function buildPredicate(
  clauses: ReadonlyArray<FilterClause>,
  allowlist: ReadonlySet<string>,
): Predicate[] {
  const out: Predicate[] = [];
  for (const clause of clauses) {
    if (clause.column === '' || !allowlist.has(clause.column)) continue;
    out.push(...clauseToPredicates(clause));
  }
  return out;
}

function clauseToPredicates(clause: FilterClause): Predicate[] {
  const { column, operator, values } = clause;
  const first = values.length > 0 ? values[0] : undefined;

  switch (operator) {
    case 'eq':
    case 'ne':
    case 'gt':
    case 'gte':
    case 'lt':
    case 'lte':
      return first === undefined ? [] : [compare(column, operator, first)];

    case 'like': {
      const pattern = toLikePattern(first ?? '');
      return pattern === '' ? [] : [{ kind: 'like', column, pattern }];
    }

    case 'in':
    case 'nin': {
      const list = splitCommaValues(values);
      if (list.length === 0) return [];
      return [{ kind: 'in', column, values: list, negated: operator === 'nin' }];
    }

    case 'between': {
      const parts = splitCommaValues(values);
      if (parts.length < 2) return [];
      return [compare(column, 'gte', parts[0]), compare(column, 'lte', parts[1])];
    }

    case 'isnull':
      return [{ kind: 'null', column, isNull: parseBoolValue(first) !== false }];

    case 'notnull':
      return [{ kind: 'null', column, isNull: false }];
  }
}

function compare(column: string, op: CompareOp, value: string): Predicate {
  return { kind: 'compare', column, op, value };
}
