import { Module } from '@nestjs/common';
import { MongodbService } from './mongodb.service';

/**
 * Internal-only MongoDB module: a thin bridge to the native driver.
 * No controllers; other modules consume MongodbService.
 */
@Module({
  providers: [MongodbService],
  exports: [MongodbService],
})
export class MongodbModule {}
