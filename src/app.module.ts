// src/app.module.ts
import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { ConfigModule } from '@nestjs/config';
import { EnvelopeExceptionFilter } from './modules/crud/crud.exception.filter';
import { UsersModule } from './modules/users/users.module';

@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true }), UsersModule],
  providers: [{ provide: APP_FILTER, useClass: EnvelopeExceptionFilter }],
})
export class AppModule {}
