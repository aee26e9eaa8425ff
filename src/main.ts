// src/main.ts
import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';

function resolvePort(value: string | undefined): number {
  const n = value ? Number.parseInt(value, 10) : Number.NaN;
  return Number.isFinite(n) && n > 0 && n <= 65535 ? n : 3000;
}

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule);

  app.setGlobalPrefix('api');

  // Typed DTOs only; raw query/body parameters are left alone
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      forbidUnknownValues: false,
    }),
  );
  app.enableShutdownHooks();

  const port = resolvePort(process.env.PORT);
  await app.listen(port);
  new Logger('Bootstrap').log(`Listening on :${port}`);
}

void bootstrap();
