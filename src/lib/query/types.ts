/** Untrusted query input: every key may carry several raw values. */
export type QueryValues = Readonly<Record<string, ReadonlyArray<string>>>;

export const FILTER_OPS = [
  'eq',
  'ne',
  'gt',
  'gte',
  'lt',
  'lte',
  'like',
  'in',
  'nin',
  'between',
  'isnull',
  'notnull',
] as const;

export type FilterOp = (typeof FILTER_OPS)[number];

export interface FilterClause {
  readonly column: string;
  readonly operator: FilterOp;
  /** Trimmed operands, empty strings dropped. */
  readonly values: ReadonlyArray<string>;
}

export interface OrderSpec {
  readonly column: string;
  readonly descending: boolean;
}

export type CompareOp = 'eq' | 'ne' | 'gt' | 'gte' | 'lt' | 'lte';

/**
 * A condition over one column. A query filter is the conjunction of a list
 * of predicates; there is no OR and no nesting.
 */
export type Predicate =
  | {
      readonly kind: 'compare';
      readonly column: string;
      readonly op: CompareOp;
      readonly value: string;
    }
  | { readonly kind: 'like'; readonly column: string; readonly pattern: string }
  | {
      readonly kind: 'in';
      readonly column: string;
      readonly values: ReadonlyArray<string>;
      readonly negated: boolean;
    }
  | { readonly kind: 'null'; readonly column: string; readonly isNull: boolean };

export interface PageRequest {
  readonly page: number;
  readonly size: number;
}

export interface PageResult<T> {
  readonly items: T[];
  /** Filtered row count before pagination. */
  readonly total: number;
}
