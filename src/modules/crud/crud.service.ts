import { Logger } from '@nestjs/common';
import { InvalidInputError, RecordNotFoundError } from '../../lib/errors/CrudError';
import { extractQueryDirectives, parseFilters } from '../../lib/query/filter.grammar';
import { normalizePageRequest, pageOffset } from '../../lib/query/pagination';
import { buildPredicate } from '../../lib/query/predicate.builder';
import { resolveOrder, sanitizeOrders } from '../../lib/query/order.resolver';
import type { OrderSpec, PageResult, QueryValues } from '../../lib/query/types';
import type { ResourceShape } from '../../lib/resources/introspect';
import { planSave } from '../../lib/resources/save.plan';
import type { FieldKind, PrimaryKey, ResourceSchema } from '../../lib/resources/schema';
import type { ResourceStore, StoreCallOptions } from './store/resource.store';

const NUMERIC_ID_RX = /^\d+$/;

export type Clock = () => Date;

/**
 * Generic upsert, delete and listing for one resource.
 * Holds no per-call state; every operation is one store request
 * (count + find for a page).
 */
export class CrudService<T extends object> {
  private readonly logger: Logger;

  public constructor(
    private readonly schema: ResourceSchema<T>,
    private readonly shape: ResourceShape,
    private readonly store: ResourceStore,
    private readonly clock: Clock = () => new Date(),
  ) {
    this.logger = new Logger(`CrudService:${shape.resource}`);
  }

  public get resource(): string {
    return this.shape.resource;
  }

  public get allowlist(): ReadonlySet<string> {
    return this.shape.allowlist;
  }

  /**
   * Insert when the primary key is zero, otherwise write the non-zero
   * fields plus update timestamps. Resolves to the record as saved.
   */
  public async saveOrUpdate(
    record: T | null | undefined,
    options: StoreCallOptions = {},
  ): Promise<T> {
    if (record == null) {
      throw new InvalidInputError(`${this.resource}: record is required`);
    }

    const plan = planSave(this.shape, record, this.clock());
    switch (plan.kind) {
      case 'create': {
        const key = await this.store.insert(plan.row, options);
        this.logger.debug(`created ${String(key)}`);
        return { ...plan.record, [this.shape.primary.key]: key };
      }
      case 'update': {
        const matched = await this.store.update(plan.key, plan.changes, options);
        this.logger.debug(
          `updated ${String(plan.key)} (${Object.keys(plan.changes).join(', ')}); matched=${matched}`,
        );
        return plan.record;
      }
      case 'noop':
        return plan.record;
    }
  }

  /**
   * Delete by primary key. For numeric keys a digit-only id is converted to
   * a number; string and objectId keys keep the trimmed id as given.
   */
  public async deleteById(id: string, options: StoreCallOptions = {}): Promise<void> {
    const trimmed = typeof id === 'string' ? id.trim() : '';
    if (trimmed === '') {
      throw new InvalidInputError(`${this.resource}: id is required`);
    }

    const key = resolveKey(this.shape.primary.kind, trimmed);
    const deleted = await this.store.delete(key, options);
    if (deleted === 0) throw new RecordNotFoundError(this.resource, key);
  }

  /**
   * One page of records matching the filters. `total` counts every match,
   * independent of page and size. Filters and orders on columns outside the
   * allowlist are dropped.
   */
  public async paginate(
    page: number,
    size: number,
    filters: QueryValues,
    orders: ReadonlyArray<OrderSpec>,
    options: StoreCallOptions = {},
  ): Promise<PageResult<T>> {
    const req = normalizePageRequest(page, size);
    const predicates = buildPredicate(parseFilters(filters), this.shape.allowlist);

    const total = await this.store.count(predicates, options);

    const resolved = sanitizeOrders(orders, this.shape.allowlist);
    const effective: OrderSpec[] =
      resolved.length > 0
        ? resolved
        : [{ column: this.shape.primary.column, descending: false }];

    const rows = await this.store.find(
      { predicates, orders: effective, limit: req.size, offset: pageOffset(req) },
      options,
    );
    this.logger.debug(
      `page ${req.page}/${req.size}: ${predicates.length} predicate(s), ${rows.length} of ${total}`,
    );

    return { items: rows.map((row) => this.schema.fromRow(row)), total };
  }

  /** Paginate straight from an untrusted query mapping. */
  public async list(
    values: QueryValues,
    options: StoreCallOptions = {},
  ): Promise<PageResult<T>> {
    const { filters, orders } = extractQueryDirectives(values);
    return this.paginate(
      Number(values.page?.[0]),
      Number(values.size?.[0]),
      filters,
      resolveOrder(orders, this.shape.allowlist),
      options,
    );
  }
}

function resolveKey(kind: FieldKind, id: string): PrimaryKey {
  if (kind === 'number' && NUMERIC_ID_RX.test(id)) {
    const n = Number(id);
    if (Number.isSafeInteger(n)) return n;
  }
  return id;
}
