import { SchemaDefinitionError } from '../errors/CrudError';
import {
  columnOf,
  type AutoManaged,
  type FieldKind,
  type FieldMap,
  type ResourceSchema,
} from './schema';

/** Column names that may ever be referenced by filters or ordering. */
export const SAFE_COLUMN_RX = /^[A-Za-z0-9_]+$/;

const PRIMARY_KINDS: ReadonlySet<FieldKind> = new Set<FieldKind>([
  'string',
  'number',
  'objectId',
]);

export interface ColumnInfo {
  /** Record field name. */
  readonly key: string;
  /** Store-facing column name. */
  readonly column: string;
  readonly kind: FieldKind;
  readonly primary: boolean;
  readonly auto?: AutoManaged;
  /** Written by partial updates. */
  readonly updatable: boolean;
}

export interface ResourceShape {
  readonly resource: string;
  readonly collection: string;
  readonly columns: ReadonlyArray<ColumnInfo>;
  readonly primary: ColumnInfo;
  readonly allowlist: ReadonlySet<string>;
  /** Column kinds keyed by column name. */
  readonly kinds: ReadonlyMap<string, FieldKind>;
}

const EMPTY_ALLOWLIST: ReadonlySet<string> = new Set<string>();

/**
 * Safe, store-facing column names of a resource. A descriptor that cannot
 * be read yields an empty set: listing still works, unfiltered and ordered
 * by primary key.
 */
export function allowedColumns(
  schema: { readonly fields?: FieldMap } | null | undefined,
): ReadonlySet<string> {
  const fields = schema?.fields;
  if (!fields || typeof fields !== 'object') return EMPTY_ALLOWLIST;

  const out = new Set<string>();
  for (const [key, f] of Object.entries(fields)) {
    if (!f || typeof f !== 'object') continue;
    const name = columnOf(key, f);
    if (SAFE_COLUMN_RX.test(name)) out.add(name);
  }
  return out;
}

export function introspect(schema: ResourceSchema<object>): ResourceShape {
  const columns: ColumnInfo[] = [];
  const seen = new Set<string>();

  for (const [key, f] of Object.entries(schema.fields)) {
    const column = columnOf(key, f);
    if (seen.has(column)) {
      throw new SchemaDefinitionError(schema.name, `duplicate column "${column}"`);
    }
    seen.add(column);

    const primary = f.primary === true;
    columns.push(
      Object.freeze({
        key,
        column,
        kind: f.kind,
        primary,
        auto: f.auto,
        updatable: !primary && f.readonly !== true && f.auto !== 'createTime',
      }),
    );
  }

  const primaries = columns.filter((c) => c.primary);
  if (primaries.length !== 1) {
    throw new SchemaDefinitionError(
      schema.name,
      `expected exactly one primary field, found ${primaries.length}`,
    );
  }
  const primary = primaries[0];
  if (!PRIMARY_KINDS.has(primary.kind)) {
    throw new SchemaDefinitionError(
      schema.name,
      `primary field "${primary.key}" cannot be of kind ${primary.kind}`,
    );
  }

  return Object.freeze({
    resource: schema.name,
    collection: schema.collection,
    columns: Object.freeze(columns),
    primary,
    allowlist: allowedColumns(schema),
    kinds: new Map(columns.map((c) => [c.column, c.kind] as const)),
  });
}
