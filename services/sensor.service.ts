import type { LocatedSensor, SensorRecord } from '../sensor.model.js';
import { type Queryable, type Row, readDate, readNumber, readString } from '../db.js';
import { isJsonObject, parseJsonObject, type JsonObject, type JsonValue } from '../utils/json.js';
import { pointInRing, validateRing } from '../utils/geometry.js';
import { sensorMessagesCounter } from '../metrics.js';
import { logger } from '../logger.js';

export interface SensorStore {
  /** Appends one reception. Readings are never deduplicated. */
  insert(record: SensorRecord): Promise<void>;
  /** Latest reading per (sensor, topic), located or not. */
  latestReadings(topic?: string): Promise<SensorRecord[]>;
  /** Latest reading with coordinates per sensor id. */
  latestLocations(topic?: string): Promise<LocatedSensor[]>;
  /** Latest reading with coordinates per (sensor, topic). */
  latestLocatedReadings(): Promise<LocatedSensor[]>;
}

export type SensorMessageOutcome =
  | { status: 'stored'; record: SensorRecord }
  | { status: 'rejected'; reason: string };

export interface ParsedSensorMessage {
  sensorId: string;
  latitude: number | null;
  longitude: number | null;
  payload: JsonObject;
}

const ID_ALIASES = ['id', 'sensor_id'];
const LATITUDE_ALIASES = ['lat', 'latitude'];
const LONGITUDE_ALIASES = ['long', 'longitude'];

// Case-insensitive, alias order first; null and blank values fall through to the next alias
function lookup(data: JsonObject, aliases: readonly string[]): JsonValue | undefined {
  const keys = Object.keys(data);
  for (const alias of aliases) {
    for (const key of keys) {
      if (key.toLowerCase() !== alias) continue;
      const value = data[key];
      if (value === null || (typeof value === 'string' && value.trim() === '')) continue;
      return value;
    }
  }
  return undefined;
}

function parseCoordinate(value: JsonValue | undefined, limit: number): number | null {
  let parsed: number;
  if (typeof value === 'number') {
    parsed = value;
  } else if (typeof value === 'string' && value.trim() !== '') {
    parsed = Number(value.trim());
  } else {
    return null;
  }
  return Number.isFinite(parsed) && Math.abs(parsed) <= limit ? parsed : null;
}

function parseSensorId(value: JsonValue | undefined): string | null {
  if (typeof value === 'string') return value.trim() || null;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

/**
 * Extracts id and coordinates from a telemetry message. Returns null when
 * there is no usable id. A half-present or unparseable location yields null
 * for both coordinates.
 */
export function parseSensorMessage(raw: string | Buffer | JsonObject): ParsedSensorMessage | null {
  const payload = parseJsonObject(raw);
  if (!payload) return null;
  const sensorId = parseSensorId(lookup(payload, ID_ALIASES));
  if (!sensorId) return null;
  const latitude = parseCoordinate(lookup(payload, LATITUDE_ALIASES), 90);
  const longitude = parseCoordinate(lookup(payload, LONGITUDE_ALIASES), 180);
  const located = latitude !== null && longitude !== null;
  return {
    sensorId,
    latitude: located ? latitude : null,
    longitude: located ? longitude : null,
    payload,
  };
}

/** "rainfall/status" is stored as the stream type "rainfall". */
export function topicType(topic: string): string {
  const [head] = topic.split('/');
  return head || topic;
}

export async function recordSensorMessage(
  store: SensorStore,
  topic: string,
  raw: string | Buffer | JsonObject,
  now: () => Date = () => new Date(),
): Promise<SensorMessageOutcome> {
  const parsed = parseSensorMessage(raw);
  if (!parsed) {
    sensorMessagesCounter.inc({ outcome: 'rejected' });
    logger.warn('Rejected sensor message without id', { topic });
    return { status: 'rejected', reason: 'message has no sensor id' };
  }

  const record: SensorRecord = {
    sensorId: parsed.sensorId,
    topic: topicType(topic),
    latitude: parsed.latitude,
    longitude: parsed.longitude,
    rawPayload: parsed.payload,
    receivedAt: now(),
  };
  await store.insert(record);
  sensorMessagesCounter.inc({ outcome: 'stored' });
  logger.debug('Stored sensor reading', {
    sensorId: record.sensorId,
    topic: record.topic,
    latitude: record.latitude,
    longitude: record.longitude,
  });
  return { status: 'stored', record };
}

/**
 * Sensors whose most recent known location lies inside or on the boundary
 * of the ring. Planar test on raw (longitude, latitude) values.
 */
export async function sensorsInPolygon(
  store: SensorStore,
  ring: readonly (readonly number[])[],
): Promise<LocatedSensor[]> {
  const polygon = validateRing(ring);
  const sensors = await store.latestLocations();
  return sensors.filter((sensor) => pointInRing([sensor.longitude, sensor.latitude], polygon));
}

export function rowToSensorRecord(row: Row): SensorRecord {
  const rawData = row.raw_data;
  return {
    sensorId: readString(row, 'sensor_id') ?? '',
    topic: readString(row, 'topic') ?? '',
    latitude: readNumber(row, 'latitude'),
    longitude: readNumber(row, 'longitude'),
    rawPayload: isJsonObject(rawData) ? rawData : {},
    receivedAt: readDate(row, 'received_at') ?? new Date(0),
  };
}

export function sensorRecordToJson(record: SensorRecord): JsonObject {
  return {
    sensor_id: record.sensorId,
    topic: record.topic,
    latitude: record.latitude,
    longitude: record.longitude,
    received_at: record.receivedAt.toISOString(),
    raw_data: record.rawPayload,
  };
}

function isLocated(record: SensorRecord): record is LocatedSensor {
  return record.latitude !== null && record.longitude !== null;
}

export const INSERT_SENSOR_SQL = `INSERT INTO sensor_status (sensor_id, topic, latitude, longitude, raw_data, received_at)
     VALUES ($1, $2, $3, $4, $5::jsonb, $6::timestamptz)`;

export class PgSensorStore implements SensorStore {
  constructor(private readonly db: Queryable) {}

  async insert(record: SensorRecord): Promise<void> {
    await this.db.query(INSERT_SENSOR_SQL, [
      record.sensorId,
      record.topic,
      record.latitude,
      record.longitude,
      JSON.stringify(record.rawPayload),
      record.receivedAt.toISOString(),
    ]);
  }

  async latestReadings(topic?: string): Promise<SensorRecord[]> {
    const { rows } = await this.db.query(
      `SELECT DISTINCT ON (sensor_id, topic)
              sensor_id, topic, latitude, longitude, raw_data, received_at
       FROM sensor_status
       ${topic ? 'WHERE topic = $1' : ''}
       ORDER BY sensor_id, topic, received_at DESC`,
      topic ? [topic] : [],
    );
    return rows.map(rowToSensorRecord);
  }

  async latestLocations(topic?: string): Promise<LocatedSensor[]> {
    const { rows } = await this.db.query(
      `SELECT DISTINCT ON (sensor_id)
              sensor_id, topic, latitude, longitude, raw_data, received_at
       FROM sensor_status
       WHERE latitude IS NOT NULL
         AND longitude IS NOT NULL
         ${topic ? 'AND topic = $1' : ''}
       ORDER BY sensor_id, received_at DESC`,
      topic ? [topic] : [],
    );
    return rows.map(rowToSensorRecord).filter(isLocated);
  }

  async latestLocatedReadings(): Promise<LocatedSensor[]> {
    const { rows } = await this.db.query(
      `SELECT DISTINCT ON (sensor_id, topic)
              sensor_id, topic, latitude, longitude, raw_data, received_at
       FROM sensor_status
       WHERE latitude IS NOT NULL
         AND longitude IS NOT NULL
       ORDER BY sensor_id, topic, received_at DESC`,
    );
    return rows.map(rowToSensorRecord).filter(isLocated);
  }
}
