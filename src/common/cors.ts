// src/common/cors.ts
import type { CorsOptions } from '@nestjs/common/interfaces/external/cors-options.interface';

function expandLocalhost(origin: string): string[] {
  if (!URL.canParse(origin)) return [origin];
  const u = new URL(origin);
  const port = u.port ? `:${u.port}` : '';
  if (u.hostname === 'localhost') return [origin, `${u.protocol}//127.0.0.1${port}`];
  if (u.hostname === '127.0.0.1') return [origin, `${u.protocol}//localhost${port}`];
  return [origin];
}

export function parseOrigins(env?: string): string[] | true {
  const raw = (env ?? '').trim();

  // Por defecto permitimos localhost:5173 si no hay nada
  if (!raw) return ['http://localhost:5173'];

  // Si contiene '*', cualquier origen (Nest refleja el Origin)
  if (raw.includes('*')) return true;

  const items = raw
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean)
    .flatMap(expandLocalhost);

  return Array.from(new Set(items));
}

export function corsOptions(origins: string[] | true): CorsOptions {
  return {
    origin: origins,
    credentials: true,
    methods: ['GET', 'POST', 'PATCH', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'Accept', 'X-Requested-With'],
    maxAge: 86400, // preflight 24h
  };
}
