import { ValueTransformer } from 'typeorm';

// 2 decimales exactos: SQLite guarda REAL sin redondear, postgres sí redondea.
export const toCents = (value: number) => Math.round(value * 100) / 100;

// pg devuelve numeric como string; better-sqlite3 ya lo da como number.
export const decimalTransformer: ValueTransformer = {
  to: (value?: number | null) => (value == null ? value : toCents(value)),
  from: (value?: string | number | null) => (value == null ? value : Number(value)),
};
