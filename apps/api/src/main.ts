// src/main.ts
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import type { Env } from '@/config/env.zod';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    logger: ['error', 'warn', 'debug', 'log', 'verbose'],
  });
  // closes the pg pool and stops the token sweeper on SIGINT/SIGTERM
  app.enableShutdownHooks();
  app.enableCors();

  const cfg = app.get<ConfigService<Env, true>>(ConfigService);
  const port = cfg.get('PORT', { infer: true });
  await app.listen(port, '0.0.0.0');

  new Logger('Bootstrap').log(`Todo API up on :${port}`);
}
void bootstrap();
