// src/db/data-source.ts
import 'reflect-metadata';
import 'dotenv/config';
import type BetterSqlite3 from 'better-sqlite3';
import { DataSourceOptions } from 'typeorm';
import { SnakeNamingStrategy } from 'typeorm-naming-strategies';
import { Product } from '../products/product.entity';

export type DatabaseType = 'better-sqlite3' | 'postgres';
export type EnvReader = (key: string) => string | undefined;

export const processEnv: EnvReader = (k) => process.env[k];

// === helpers .env
const env = (read: EnvReader, k: string, d: string) => {
  const v = read(k);
  return v && v.length ? v : d;
};
const envN = (read: EnvReader, k: string, d: number) => {
  const v = read(k);
  const n = v ? Number(v) : NaN;
  return Number.isFinite(n) ? n : d;
};
const envB = (read: EnvReader, k: string, d: boolean) => {
  const v = read(k);
  return v && v.length ? v.trim().toLowerCase() === 'true' : d;
};

function databaseType(read: EnvReader): DatabaseType {
  const t = env(read, 'DB_TYPE', 'better-sqlite3').trim().toLowerCase();
  if (t === 'sqlite' || t === 'better-sqlite3') return 'better-sqlite3';
  if (t === 'postgres' || t === 'postgresql') return 'postgres';
  throw new Error(`DB_TYPE no soportado: "${t}". Use better-sqlite3 o postgres.`);
}

// LOWER() de SQLite sólo pliega ASCII; se reemplaza por uno Unicode ('Á' → 'á')
export function registerUnicodeLower(db: BetterSqlite3.Database): void {
  db.function('lower', { deterministic: true }, (value: unknown) =>
    typeof value === 'string' ? value.toLowerCase() : value,
  );
}

/**
 * Opciones de TypeORM a partir de variables de entorno.
 * Sin nada configurado: SQLite embebido en memoria con el esquema sincronizado al arrancar.
 */
export function buildDataSourceOptions(read: EnvReader = processEnv): DataSourceOptions {
  const common = {
    synchronize: envB(read, 'DB_SYNCHRONIZE', true),
    logging: envB(read, 'DB_LOGGING', false),
    // 👇 camelCase ↔ snake_case en columnas (stockQuantity → stock_quantity)
    namingStrategy: new SnakeNamingStrategy(),
    entities: [Product],
  };

  if (databaseType(read) === 'postgres') {
    return {
      ...common,
      type: 'postgres',
      host: env(read, 'PG_HOST', '127.0.0.1'),
      port: envN(read, 'PG_PORT', 5432),
      username: env(read, 'PG_USER', 'postgres'),
      password: read('PG_PASSWORD') ?? '',
      database: env(read, 'PG_DATABASE', 'productdb'),
    };
  }

  return {
    ...common,
    type: 'better-sqlite3',
    database: env(read, 'DB_DATABASE', ':memory:'),
    prepareDatabase: registerUnicodeLower,
  };
}

// Para logs: "postgres 127.0.0.1:5432/productdb" o "better-sqlite3 :memory:"
export function describeTarget(options: DataSourceOptions): string {
  if (options.type === 'postgres') {
    return `postgres ${options.host}:${options.port}/${options.database}`;
  }
  if (options.type === 'better-sqlite3') {
    return `better-sqlite3 ${options.database}`;
  }
  return options.type;
}
