import { InvalidInputError, SchemaDefinitionError } from '../errors/CrudError';

export type FieldKind = 'string' | 'number' | 'boolean' | 'date' | 'objectId';

export interface FieldValueByKind {
  string: string;
  number: number;
  boolean: boolean;
  date: Date | null;
  /** Hex string form; stores convert it to their native id type. */
  objectId: string;
}

/** Store-maintained timestamps. */
export type AutoManaged = 'createTime' | 'updateTime';

export interface FieldOptions {
  /** Store-facing column name; defaults to the field name. */
  readonly column?: string;
  readonly primary?: boolean;
  readonly auto?: AutoManaged;
  /** Never written by partial updates. */
  readonly readonly?: boolean;
}

export interface FieldSpec<K extends FieldKind = FieldKind> extends FieldOptions {
  readonly kind: K;
}

export type FieldMap = Readonly<Record<string, FieldSpec>>;

export type RecordOf<F extends FieldMap> = {
  [P in keyof F]: FieldValueByKind[F[P]['kind']];
};

/** A store row keyed by column name. */
export type Row = Record<string, unknown>;

export type PrimaryKey = string | number;

export interface ResourceSchema<T extends object> {
  readonly name: string;
  readonly collection: string;
  readonly fields: FieldMap;
  /** Decode a request body. Unknown keys are ignored, missing keys are zero. */
  fromPayload(input: unknown): T;
  /** Decode a store row keyed by column name. */
  fromRow(row: Readonly<Row>): T;
}

export type ResourceRecord<S> = S extends ResourceSchema<infer T> ? T : never;

function spec<K extends FieldKind>(kind: K, opts: FieldOptions = {}): FieldSpec<K> {
  return { ...opts, kind };
}

export const field = {
  string: (opts?: FieldOptions): FieldSpec<'string'> => spec('string', opts),
  number: (opts?: FieldOptions): FieldSpec<'number'> => spec('number', opts),
  boolean: (opts?: FieldOptions): FieldSpec<'boolean'> => spec('boolean', opts),
  date: (opts?: FieldOptions): FieldSpec<'date'> => spec('date', opts),
  objectId: (opts?: FieldOptions): FieldSpec<'objectId'> => spec('objectId', opts),
};

export function zeroValue(kind: FieldKind): FieldValueByKind[FieldKind] {
  switch (kind) {
    case 'string':
    case 'objectId':
      return '';
    case 'number':
      return 0;
    case 'boolean':
      return false;
    case 'date':
      return null;
  }
}

/**
 * Zero values stand for "not supplied". Absent and null values are zero for
 * every kind; so are invalid dates and NaN.
 */
export function isZeroValue(value: unknown): boolean {
  if (value === undefined || value === null) return true;
  if (value === '' || value === 0 || value === false) return true;
  if (typeof value === 'number') return Number.isNaN(value);
  if (value instanceof Date) return Number.isNaN(value.getTime());
  return false;
}

export function columnOf(key: string, f: FieldSpec): string {
  return f.column ?? key;
}

/* -----------------------------
   Value coercion
   ----------------------------- */

type Coerced = { ok: true; value: unknown } | { ok: false; error: string };

function coercePayloadValue(kind: FieldKind, val: unknown): Coerced {
  if (val === undefined || val === null) return { ok: true, value: zeroValue(kind) };
  switch (kind) {
    case 'string':
    case 'objectId':
      return typeof val === 'string'
        ? { ok: true, value: val }
        : { ok: false, error: 'expected_string' };
    case 'number': {
      const n = typeof val === 'number' ? val : typeof val === 'string' ? Number(val) : NaN;
      return Number.isFinite(n)
        ? { ok: true, value: n }
        : { ok: false, error: 'expected_number' };
    }
    case 'boolean':
      if (typeof val === 'boolean') return { ok: true, value: val };
      if (val === 'true') return { ok: true, value: true };
      if (val === 'false') return { ok: true, value: false };
      return { ok: false, error: 'expected_boolean' };
    case 'date': {
      if (val === '') return { ok: true, value: null };
      const d =
        val instanceof Date
          ? val
          : typeof val === 'string' || typeof val === 'number'
            ? new Date(val)
            : undefined;
      return d && !Number.isNaN(d.getTime())
        ? { ok: true, value: d }
        : { ok: false, error: 'expected_date' };
    }
  }
}

function decodeStoredValue(kind: FieldKind, val: unknown): unknown {
  if (val === undefined || val === null) return zeroValue(kind);
  switch (kind) {
    case 'string':
    case 'objectId':
      return typeof val === 'string' ? val : String(val);
    case 'number': {
      const n = typeof val === 'number' ? val : Number(val);
      return Number.isFinite(n) ? n : 0;
    }
    case 'boolean':
      return val === true || val === 1 || val === 'true';
    case 'date': {
      const d =
        val instanceof Date
          ? val
          : typeof val === 'string' || typeof val === 'number'
            ? new Date(val)
            : undefined;
      return d && !Number.isNaN(d.getTime()) ? d : null;
    }
  }
}

function matchesKind(kind: FieldKind, value: unknown): boolean {
  switch (kind) {
    case 'string':
    case 'objectId':
      return typeof value === 'string';
    case 'number':
      return typeof value === 'number';
    case 'boolean':
      return typeof value === 'boolean';
    case 'date':
      return value === null || value instanceof Date;
  }
}

function conformsTo<F extends FieldMap>(fields: F, values: object): values is RecordOf<F> {
  return Object.entries(fields).every(([key, f]) =>
    matchesKind(f.kind, Reflect.get(values, key)),
  );
}

/* -----------------------------
   Resource definition
   ----------------------------- */

/**
 * Describe a record type once; the engine derives allowlists, zero-value
 * checks and row mapping from this descriptor.
 *
 * @example
 * const notes = defineResource('notes', {
 *   id: field.number({ primary: true }),
 *   title: field.string(),
 *   updatedAt: field.date({ column: 'updated_at', auto: 'updateTime' }),
 * });
 */
export function defineResource<F extends FieldMap>(
  name: string,
  fields: F,
  opts: { collection?: string } = {},
): ResourceSchema<RecordOf<F>> {
  const entries = Object.entries(fields);

  const materialize = (values: Record<string, unknown>): RecordOf<F> => {
    if (!conformsTo(fields, values)) {
      throw new SchemaDefinitionError(name, 'decoded values do not match the field kinds');
    }
    return values;
  };

  return {
    name,
    collection: opts.collection ?? name,
    fields,
    fromPayload(input: unknown): RecordOf<F> {
      if (!input || typeof input !== 'object' || Array.isArray(input)) {
        throw new InvalidInputError(`${name}: record payload must be a JSON object`);
      }
      const values: Record<string, unknown> = {};
      const errors: Record<string, string> = {};
      for (const [key, f] of entries) {
        const res = coercePayloadValue(f.kind, Reflect.get(input, key));
        if (res.ok) values[key] = res.value;
        else errors[key] = res.error;
      }
      if (Object.keys(errors).length > 0) {
        throw new InvalidInputError(`${name}: invalid record payload`, errors);
      }
      return materialize(values);
    },
    fromRow(row: Readonly<Row>): RecordOf<F> {
      const values: Record<string, unknown> = {};
      for (const [key, f] of entries) {
        values[key] = decodeStoredValue(f.kind, row[columnOf(key, f)]);
      }
      return materialize(values);
    },
  };
}
