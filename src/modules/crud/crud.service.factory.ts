import { Inject, Injectable } from '@nestjs/common';
import type { ResourceSchema } from '../../lib/resources/schema';
import { CrudService } from './crud.service';
import { SchemaRegistry } from './schema.registry';
import {
  RESOURCE_STORE_FACTORY,
  type ResourceStoreFactory,
} from './store/resource.store';

@Injectable()
export class CrudServiceFactory {
  public constructor(
    private readonly registry: SchemaRegistry,
    @Inject(RESOURCE_STORE_FACTORY) private readonly stores: ResourceStoreFactory,
  ) {}

  public create<T extends object>(schema: ResourceSchema<T>): CrudService<T> {
    const shape = this.registry.resolve(schema);
    return new CrudService(schema, shape, this.stores.forResource(shape));
  }
}
