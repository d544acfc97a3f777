// PostgreSQL access shared by the stores, plus the idempotent schema bootstrap
import { Pool } from 'pg';
import {
  CREATE_POSTGIS_EXTENSION_SQL,
  CREATE_CAP_ALERTS_TABLE_SQL,
  CREATE_CAP_ALERTS_INDEXES_SQL,
} from './alert.model.js';
import { CREATE_SENSOR_STATUS_TABLE_SQL, CREATE_SENSOR_STATUS_INDEXES_SQL } from './sensor.model.js';

export type Row = Record<string, unknown>;

export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: Row[]; rowCount: number | null }>;
}

export interface DatabaseClient extends Queryable {
  release(err?: Error | boolean): void;
}

// The subset of pg.Pool the stores rely on; fakes implement the same shape in tests
export interface Database extends Queryable {
  connect(): Promise<DatabaseClient>;
}

export function createPool(connectionString: string): Pool {
  return new Pool({ connectionString });
}

export const SCHEMA_STATEMENTS: readonly string[] = [
  CREATE_POSTGIS_EXTENSION_SQL,
  CREATE_CAP_ALERTS_TABLE_SQL,
  ...CREATE_CAP_ALERTS_INDEXES_SQL,
  CREATE_SENSOR_STATUS_TABLE_SQL,
  ...CREATE_SENSOR_STATUS_INDEXES_SQL,
];

/**
 * Ensures the PostGIS extension, both tables and their indexes exist.
 * Every statement is IF NOT EXISTS, so re-running is a no-op.
 */
export async function initializeSchema(db: Queryable): Promise<void> {
  for (const statement of SCHEMA_STATEMENTS) {
    await db.query(statement);
  }
}

// Row readers: pg hands back loosely typed rows, these narrow single columns

export function readString(row: Row, column: string): string | null {
  const value = row[column];
  return typeof value === 'string' ? value : null;
}

export function readNumber(row: Row, column: string): number | null {
  const value = row[column];
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  // NUMERIC and BIGINT columns arrive as strings
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function readDate(row: Row, column: string): Date | null {
  const value = row[column];
  if (value instanceof Date) return value;
  if (typeof value === 'string' || typeof value === 'number') {
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? null : date;
  }
  return null;
}
