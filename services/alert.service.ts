import type { AlertLanguage, AlertRecord, StoredAlert } from '../alert.model.js';
import { type Database, type Row, readDate, readString } from '../db.js';
import { isGeometry } from '../utils/geometry.js';
import { isJsonObject } from '../utils/json.js';
import { errorMessage } from '../middleware/error.js';
import { alertsIngestedCounter } from '../metrics.js';
import { logger } from '../logger.js';
import { categorize, type Categorizer } from './categorizer.service.js';

export interface UpsertFailure {
  // Position in the submitted batch, so rows without an identifier can still be traced
  index: number;
  identifier: string | null;
  error: string;
}

export interface UpsertResult {
  inserted: number;
  updatedOrSkipped: number;
  failed: UpsertFailure[];
}

export type BoundingBox = [minLon: number, minLat: number, maxLon: number, maxLat: number];

export interface AlertFilter {
  category?: string;
  severity?: string;
  disasterType?: string;
  bbox?: BoundingBox;
}

export interface AlertStore {
  upsert(records: readonly AlertRecord[]): Promise<UpsertResult>;
  findAlerts(opts?: { skip?: number; limit?: number; filter?: AlertFilter }): Promise<StoredAlert[]>;
  findAlertsNear(opts: { lat: number; lng: number; distanceKm: number }): Promise<StoredAlert[]>;
  findAlertsContainingPoint(
    lon: number,
    lat: number,
    categories?: readonly string[],
  ): Promise<StoredAlert[]>;
}

// Column order drives both the VALUES placeholders and the update list
export const ALERT_COLUMNS = [
  'identifier',
  'alert_category',
  'feature_type',
  'geometry',
  'severity',
  'effective_start_time',
  'effective_end_time',
  'disaster_type',
  'area_description',
  'type',
  'language',
  'warning_message',
  'properties',
] as const;

type AlertColumn = (typeof ALERT_COLUMNS)[number];

function placeholder(column: AlertColumn, index: number): string {
  switch (column) {
    case 'geometry':
      return `ST_SetSRID(ST_GeomFromGeoJSON($${index}::text), 4326)`;
    case 'effective_start_time':
    case 'effective_end_time':
      return `$${index}::timestamptz`;
    case 'properties':
      return `$${index}::jsonb`;
    default:
      return `$${index}`;
  }
}

/**
 * INSERT ... ON CONFLICT (identifier) DO UPDATE over every mutable column.
 * created_at is left to its column default and never updated; the RETURNING
 * clause reports whether the row was freshly inserted.
 */
export function buildUpsertAlertSql(): string {
  const values = ALERT_COLUMNS.map((column, i) => placeholder(column, i + 1));
  const updates = ALERT_COLUMNS.filter((column) => column !== 'identifier').map(
    (column) => `${column} = EXCLUDED.${column}`,
  );
  return `INSERT INTO cap_alerts (${ALERT_COLUMNS.join(', ')})
     VALUES (${values.join(', ')})
     ON CONFLICT (identifier) DO UPDATE SET ${updates.join(', ')}, updated_at = NOW()
     RETURNING (xmax = 0) AS inserted`;
}

export const UPSERT_ALERT_SQL = buildUpsertAlertSql();

export function toUpsertValues(record: AlertRecord & { identifier: string }, category: string): unknown[] {
  const byColumn: Record<AlertColumn, unknown> = {
    identifier: record.identifier,
    alert_category: category,
    feature_type: record.featureType,
    geometry: record.geometry ? JSON.stringify(record.geometry) : null,
    severity: record.severity,
    effective_start_time: record.effectiveStartTime ? record.effectiveStartTime.toISOString() : null,
    effective_end_time: record.effectiveEndTime ? record.effectiveEndTime.toISOString() : null,
    disaster_type: record.disasterType,
    area_description: record.areaDescription,
    type: record.type,
    language: record.language,
    warning_message: record.warningMessage,
    properties: JSON.stringify(record.properties),
  };
  return ALERT_COLUMNS.map((column) => byColumn[column]);
}

const SELECT_ALERT_COLUMNS = `identifier, alert_category, feature_type, ST_AsGeoJSON(geometry)::json AS geometry,
       severity, effective_start_time, effective_end_time, disaster_type, area_description, type,
       language, warning_message, properties, created_at, updated_at`;

function readLanguage(row: Row): AlertLanguage | null {
  const value = readString(row, 'language');
  return value === 'en' || value === 'hi' ? value : null;
}

export function rowToStoredAlert(row: Row): StoredAlert {
  const geometry = row.geometry;
  const properties = row.properties;
  return {
    identifier: readString(row, 'identifier') ?? '',
    category: readString(row, 'alert_category'),
    featureType: readString(row, 'feature_type'),
    geometry: isGeometry(geometry) ? geometry : null,
    severity: readString(row, 'severity'),
    effectiveStartTime: readDate(row, 'effective_start_time'),
    effectiveEndTime: readDate(row, 'effective_end_time'),
    disasterType: readString(row, 'disaster_type'),
    areaDescription: readString(row, 'area_description'),
    type: readString(row, 'type'),
    language: readLanguage(row),
    warningMessage: readString(row, 'warning_message'),
    properties: isJsonObject(properties) ? properties : {},
    createdAt: readDate(row, 'created_at') ?? new Date(0),
    updatedAt: readDate(row, 'updated_at') ?? new Date(0),
  };
}

function hasIdentifier(record: AlertRecord): record is AlertRecord & { identifier: string } {
  return typeof record.identifier === 'string' && record.identifier.trim() !== '';
}

export class PgAlertStore implements AlertStore {
  constructor(
    private readonly db: Database,
    private readonly categorizer: Categorizer = categorize,
  ) {}

  /**
   * Upserts every record on one pooled connection. Each statement commits on
   * its own, so a failure part-way leaves earlier rows intact. Failing to get
   * a connection at all rejects the whole call.
   */
  async upsert(records: readonly AlertRecord[]): Promise<UpsertResult> {
    const result: UpsertResult = { inserted: 0, updatedOrSkipped: 0, failed: [] };
    if (records.length === 0) return result;

    const client = await this.db.connect();
    try {
      for (const [index, record] of records.entries()) {
        if (!hasIdentifier(record)) {
          result.failed.push({ index, identifier: null, error: 'identifier is required' });
          alertsIngestedCounter.inc({ outcome: 'failed' });
          logger.warn('Skipping alert without identifier', { index });
          continue;
        }
        try {
          const category = this.categorizer(record).slug;
          const { rows } = await client.query(UPSERT_ALERT_SQL, toUpsertValues(record, category));
          if (rows[0]?.inserted === true) {
            result.inserted++;
            alertsIngestedCounter.inc({ outcome: 'inserted' });
          } else {
            result.updatedOrSkipped++;
            alertsIngestedCounter.inc({ outcome: 'updated' });
          }
        } catch (err) {
          result.failed.push({ index, identifier: record.identifier, error: errorMessage(err) });
          alertsIngestedCounter.inc({ outcome: 'failed' });
          logger.warn('Error upserting alert', {
            identifier: record.identifier,
            error: errorMessage(err),
          });
        }
      }
    } finally {
      client.release();
    }

    logger.info('Alert upsert finished', {
      inserted: result.inserted,
      updatedOrSkipped: result.updatedOrSkipped,
      failed: result.failed.length,
    });
    return result;
  }

  /**
   * Lists stored alerts, newest first, with optional filters and pagination.
   */
  async findAlerts(
    opts: { skip?: number; limit?: number; filter?: AlertFilter } = {},
  ): Promise<StoredAlert[]> {
    const { skip = 0, limit = 20, filter = {} } = opts;
    const sanitizedSkip = Number.isFinite(skip) && skip > 0 ? skip : 0;
    const sanitizedLimit = Number.isFinite(limit) && limit > 0 ? Math.min(limit, 500) : 20;
    // Build WHERE clause and values
    const conditions: string[] = [];
    const values: unknown[] = [];
    let paramIndex = 1;
    if (filter.category) {
      conditions.push(`alert_category = $${paramIndex++}`);
      values.push(filter.category);
    }
    if (filter.severity) {
      conditions.push(`severity = $${paramIndex++}`);
      values.push(filter.severity);
    }
    if (filter.disasterType) {
      conditions.push(`disaster_type = $${paramIndex++}`);
      values.push(filter.disasterType);
    }
    if (filter.bbox) {
      conditions.push(
        `geometry && ST_MakeEnvelope($${paramIndex++}, $${paramIndex++}, $${paramIndex++}, $${paramIndex++}, 4326)`,
      );
      values.push(...filter.bbox);
    }
    const whereClause = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    values.push(sanitizedSkip, sanitizedLimit);
    const { rows } = await this.db.query(
      `SELECT ${SELECT_ALERT_COLUMNS}
       FROM cap_alerts
       ${whereClause}
       ORDER BY created_at DESC
       OFFSET $${paramIndex++} LIMIT $${paramIndex++}`,
      values,
    );
    return rows.map(rowToStoredAlert);
  }

  async findAlertsNear({
    lat,
    lng,
    distanceKm,
  }: {
    lat: number;
    lng: number;
    distanceKm: number;
  }): Promise<StoredAlert[]> {
    const { rows } = await this.db.query(
      `SELECT ${SELECT_ALERT_COLUMNS},
              ST_Distance(geometry::geography, ST_SetSRID(ST_MakePoint($1, $2), 4326)::geography) / 1000 AS distance_km
       FROM cap_alerts
       WHERE geometry IS NOT NULL
         AND ST_DWithin(geometry::geography, ST_SetSRID(ST_MakePoint($1, $2), 4326)::geography, $3 * 1000)
       ORDER BY distance_km`,
      [lng, lat, distanceKm],
    );
    return rows.map(rowToStoredAlert);
  }

  async findAlertsContainingPoint(
    lon: number,
    lat: number,
    categories?: readonly string[],
  ): Promise<StoredAlert[]> {
    const values: unknown[] = [lon, lat];
    let categoryClause = '';
    if (categories && categories.length > 0) {
      categoryClause = 'AND alert_category = ANY($3::text[])';
      values.push([...categories]);
    }
    const { rows } = await this.db.query(
      `SELECT ${SELECT_ALERT_COLUMNS}
       FROM cap_alerts
       WHERE geometry IS NOT NULL
         ${categoryClause}
         AND ST_Contains(geometry, ST_SetSRID(ST_Point($1, $2), 4326))
       ORDER BY identifier`,
      values,
    );
    return rows.map(rowToStoredAlert);
  }
}
