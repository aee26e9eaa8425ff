import { Module } from '@nestjs/common';
import { CrudModule } from '../crud/crud.module';
import { createCrudController } from '../crud/crud.controller';
import { usersResource } from './users.resource';

@Module({
  imports: [CrudModule],
  controllers: [createCrudController(usersResource)],
})
export class UsersModule {}
