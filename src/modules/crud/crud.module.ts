import { Module } from '@nestjs/common';
import { MongodbModule } from '../mongodb/mongodb.module';
import { CrudServiceFactory } from './crud.service.factory';
import { SchemaRegistry } from './schema.registry';
import { MongoResourceStoreFactory } from './store/mongo.resource.store';
import { RESOURCE_STORE_FACTORY } from './store/resource.store';

/**
 * Engine wiring. Resource modules import this and mount controllers built
 * with createCrudController(); the store is swappable via
 * RESOURCE_STORE_FACTORY.
 */
@Module({
  imports: [MongodbModule],
  providers: [
    SchemaRegistry,
    CrudServiceFactory,
    MongoResourceStoreFactory,
    { provide: RESOURCE_STORE_FACTORY, useExisting: MongoResourceStoreFactory },
  ],
  exports: [SchemaRegistry, CrudServiceFactory],
})
export class CrudModule {}
