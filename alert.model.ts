// CAP alert model for PostgreSQL/PostGIS
// This file defines the in-memory alert record and the SQL for the cap_alerts table
import type { JsonObject } from './utils/json.js';

/** [longitude, latitude], optionally followed by altitude */
export type Position = number[];

export type Geometry =
  | { type: 'Point'; coordinates: Position }
  | { type: 'MultiPoint'; coordinates: Position[] }
  | { type: 'LineString'; coordinates: Position[] }
  | { type: 'MultiLineString'; coordinates: Position[][] }
  | { type: 'Polygon'; coordinates: Position[][] }
  | { type: 'MultiPolygon'; coordinates: Position[][][] };

export const GEOMETRY_TYPES = [
  'Point',
  'MultiPoint',
  'LineString',
  'MultiLineString',
  'Polygon',
  'MultiPolygon',
] as const;

export type AlertLanguage = 'en' | 'hi';

export interface AlertRecord {
  // Missing on malformed feed entries; the store rejects those rows individually
  identifier: string | null;
  featureType: string | null;
  geometry: Geometry | null;
  severity: string | null;
  effectiveStartTime: Date | null;
  effectiveEndTime: Date | null;
  disasterType: string | null;
  areaDescription: string | null;
  type: string | null;
  language: AlertLanguage | null;
  warningMessage: string | null;
  properties: JsonObject;
}

export interface StoredAlert extends AlertRecord {
  identifier: string;
  category: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export const CREATE_POSTGIS_EXTENSION_SQL = `CREATE EXTENSION IF NOT EXISTS postgis;`;

// Helper: SQL for creating the cap_alerts table
export const CREATE_CAP_ALERTS_TABLE_SQL = `
CREATE TABLE IF NOT EXISTS cap_alerts (
  id SERIAL PRIMARY KEY,
  identifier VARCHAR(255) NOT NULL UNIQUE,
  alert_category VARCHAR(100),
  feature_type VARCHAR(50),
  geometry GEOMETRY(Geometry, 4326),
  severity VARCHAR(50),
  effective_start_time TIMESTAMPTZ,
  effective_end_time TIMESTAMPTZ,
  disaster_type VARCHAR(255),
  area_description TEXT,
  type VARCHAR(50),
  language VARCHAR(10),
  warning_message TEXT,
  properties JSONB NOT NULL DEFAULT '{}'::jsonb,
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);
`;

// Helper: SQL for the spatial and lookup indexes
export const CREATE_CAP_ALERTS_INDEXES_SQL = [
  `CREATE INDEX IF NOT EXISTS idx_cap_alerts_geometry ON cap_alerts USING GIST(geometry);`,
  `CREATE INDEX IF NOT EXISTS idx_cap_alerts_disaster_type ON cap_alerts (disaster_type);`,
  `CREATE INDEX IF NOT EXISTS idx_cap_alerts_severity ON cap_alerts (severity);`,
  `CREATE INDEX IF NOT EXISTS idx_cap_alerts_identifier ON cap_alerts (identifier);`,
  `CREATE INDEX IF NOT EXISTS idx_cap_alerts_alert_category ON cap_alerts (alert_category);`,
];
