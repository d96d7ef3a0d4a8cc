// src/app.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';

import { buildDataSourceOptions } from './db/data-source';
import { ProductsModule } from './products/products.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),

    // por defecto SQLite en memoria (ver db/data-source.ts); DB_TYPE=postgres para PostgreSQL
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (cfg: ConfigService) => buildDataSourceOptions((k) => cfg.get<string>(k)),
    }),

    ProductsModule,
  ],
})
export class AppModule {}
