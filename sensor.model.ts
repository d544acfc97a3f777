// Sensor telemetry model: an append-only log of every reception
import type { JsonObject } from './utils/json.js';

export interface SensorRecord {
  sensorId: string;
  topic: string;
  latitude: number | null;
  longitude: number | null;
  rawPayload: JsonObject;
  receivedAt: Date;
}

export interface LocatedSensor extends SensorRecord {
  latitude: number;
  longitude: number;
}

export const CREATE_SENSOR_STATUS_TABLE_SQL = `
CREATE TABLE IF NOT EXISTS sensor_status (
  id SERIAL PRIMARY KEY,
  sensor_id VARCHAR(255) NOT NULL,
  topic VARCHAR(255) NOT NULL,
  latitude DOUBLE PRECISION,
  longitude DOUBLE PRECISION,
  raw_data JSONB NOT NULL,
  received_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);
`;

export const CREATE_SENSOR_STATUS_INDEXES_SQL = [
  `CREATE INDEX IF NOT EXISTS idx_sensor_status_sensor_id ON sensor_status (sensor_id);`,
  `CREATE INDEX IF NOT EXISTS idx_sensor_status_topic ON sensor_status (topic);`,
  `CREATE INDEX IF NOT EXISTS idx_sensor_status_received_at ON sensor_status (received_at);`,
];
