import type { ResourceShape } from './introspect';
import { isZeroValue, zeroValue, type PrimaryKey, type Row } from './schema';

export type SavePlan<T> =
  | { readonly kind: 'create'; readonly record: T; readonly row: Row }
  | {
      readonly kind: 'update';
      readonly record: T;
      readonly key: PrimaryKey;
      readonly changes: Row;
    }
  | { readonly kind: 'noop'; readonly record: T; readonly key: PrimaryKey };

function readField(record: object, key: string): unknown {
  return Object.prototype.hasOwnProperty.call(record, key)
    ? Reflect.get(record, key)
    : undefined;
}

/**
 * Decide create vs update for a record and compute what to write.
 *
 * A zero primary key means create: the whole record is written and the
 * store assigns the key. Otherwise only non-zero fields plus update
 * timestamps go out. Zero means "not supplied", so a field cannot be reset
 * to its zero value through this path.
 */
export function planSave<T extends object>(
  shape: ResourceShape,
  record: T,
  now: Date,
): SavePlan<T> {
  const pk = readField(record, shape.primary.key);

  if (isZeroValue(pk)) {
    let next: T = record;
    const row: Row = {};
    for (const col of shape.columns) {
      if (col.primary) continue;
      let value = readField(next, col.key);
      if (col.auto && isZeroValue(value)) {
        value = now;
        next = { ...next, [col.key]: now };
      }
      row[col.column] = value === undefined ? zeroValue(col.kind) : value;
    }
    return { kind: 'create', record: next, row };
  }

  const key = toPrimaryKey(pk);
  let next: T = record;
  const changes: Row = {};
  for (const col of shape.columns) {
    if (!col.updatable) continue;
    if (col.auto === 'updateTime') {
      changes[col.column] = now;
      next = { ...next, [col.key]: now };
      continue;
    }
    const value = readField(next, col.key);
    if (!isZeroValue(value)) changes[col.column] = value;
  }

  return Object.keys(changes).length === 0
    ? { kind: 'noop', record: next, key }
    : { kind: 'update', record: next, key, changes };
}

function toPrimaryKey(value: unknown): PrimaryKey {
  if (typeof value === 'string' || typeof value === 'number') return value;
  return String(value);
}
