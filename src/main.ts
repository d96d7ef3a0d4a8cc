// src/main.ts
import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { DataSource } from 'typeorm';
import { AppModule } from './app.module';
import { corsOptions, parseOrigins } from './common/cors';
import { describeTarget } from './db/data-source';

const log = new Logger('Bootstrap');

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const cfg = app.get(ConfigService);

  // mismos DTOs que valida ProductsService; transform convierte los query strings a number
  app.useGlobalPipes(new ValidationPipe({ transform: true, whitelist: true }));
  app.enableShutdownHooks();

  const origins = parseOrigins(cfg.get<string>('CORS_ORIGINS'));
  app.enableCors(corsOptions(origins));

  const port = Number(cfg.get<string>('PORT') ?? 3000);
  const host = cfg.get<string>('HOST') ?? '127.0.0.1';
  await app.listen(port, host);

  const url = await app.getUrl();
  log.log(`🚀 Product catalog listening on ${url}`);
  log.log(`🗄️  DB: ${describeTarget(app.get(DataSource).options)}`);
  log.log(`🔐 CORS: ${origins === true ? '* (todos los orígenes)' : origins.join(', ')}`);
}

bootstrap().catch((e: unknown) => {
  log.error('❌ bootstrap failed', e instanceof Error ? e.stack : String(e));
  process.exit(1);
});
