// In-process stand-ins for PostgreSQL and the MQTT broker
import winston from 'winston';
import type { AlertRecord, Geometry, StoredAlert } from '../alert.model.js';
import type { LocatedSensor, SensorRecord } from '../sensor.model.js';
import type { Database, DatabaseClient, Row } from '../db.js';
import type { AlertFeature } from '../dto/alert.dto.js';
import type {
  AlertFilter,
  AlertStore,
  UpsertResult,
} from '../services/alert.service.js';
import { categorize } from '../services/categorizer.service.js';
import type { SensorStore } from '../services/sensor.service.js';
import type {
  AlertTransport,
  TelemetryHandler,
  TelemetrySource,
} from '../transport/mqtt.transport.js';
import { pointInRing, type LonLat } from '../utils/geometry.js';
import type { JsonObject } from '../utils/json.js';

export const silentLogger = winston.createLogger({
  silent: true,
  transports: [new winston.transports.Console()],
});

export interface QueryCall {
  text: string;
  values: unknown[];
}

export type QueryResponder = (
  text: string,
  values: unknown[],
) => { rows: Row[]; rowCount?: number | null };

/**
 * Records every statement and answers with whatever the responder returns.
 * A responder that throws stands in for a failing statement.
 */
export class FakeDatabase implements Database {
  readonly calls: QueryCall[] = [];
  released = 0;
  connectError: Error | null = null;

  constructor(private readonly responder: QueryResponder = () => ({ rows: [] })) {}

  async query(text: string, values: unknown[] = []): Promise<{ rows: Row[]; rowCount: number | null }> {
    this.calls.push({ text, values });
    const { rows, rowCount } = this.responder(text, values);
    return { rows, rowCount: rowCount === undefined ? rows.length : rowCount };
  }

  async connect(): Promise<DatabaseClient> {
    if (this.connectError) throw this.connectError;
    return {
      query: (text, values) => this.query(text, values),
      release: () => {
        this.released++;
      },
    };
  }
}

export interface PublishedMessage {
  topic: string;
  payload: string;
}

export class RecordingTransport implements AlertTransport {
  readonly messages: PublishedMessage[] = [];
  readonly failingTopics = new Set<string>();

  async publish(topic: string, payload: string): Promise<void> {
    if (this.failingTopics.has(topic)) {
      throw new Error(`broker refused ${topic}`);
    }
    this.messages.push({ topic, payload });
  }

  parsed(index: number): unknown {
    return JSON.parse(this.messages[index].payload);
  }
}

export class FakeTelemetrySource implements TelemetrySource {
  readonly subscriptions: string[] = [];
  private handler: TelemetryHandler | null = null;

  async subscribe(topics: readonly string[], handler: TelemetryHandler): Promise<void> {
    this.subscriptions.push(...topics);
    this.handler = handler;
  }

  emit(topic: string, message: JsonObject | string): void {
    if (!this.handler) throw new Error('not subscribed');
    const text = typeof message === 'string' ? message : JSON.stringify(message);
    this.handler(topic, Buffer.from(text, 'utf8'));
  }
}

function outerRings(geometry: Geometry): LonLat[][] {
  const toRing = (ring: number[][]): LonLat[] => ring.map(([lon, lat]): LonLat => [lon, lat]);
  if (geometry.type === 'Polygon') return [toRing(geometry.coordinates[0])];
  if (geometry.type === 'MultiPolygon') return geometry.coordinates.map((p) => toRing(p[0]));
  return [];
}

/** Alert store keyed by identifier; containment uses the same planar test as the correlator. */
export class InMemoryAlertStore implements AlertStore {
  readonly alerts = new Map<string, StoredAlert>();
  failWith: Error | null = null;

  constructor(private readonly clock: () => Date = () => new Date('2026-02-01T05:00:00Z')) {}

  async upsert(records: readonly AlertRecord[]): Promise<UpsertResult> {
    if (this.failWith) throw this.failWith;
    const result: UpsertResult = { inserted: 0, updatedOrSkipped: 0, failed: [] };
    records.forEach((record, index) => {
      const identifier = record.identifier;
      if (!identifier) {
        result.failed.push({ index, identifier: null, error: 'identifier is required' });
        return;
      }
      const existing = this.alerts.get(identifier);
      const now = this.clock();
      this.alerts.set(identifier, {
        ...record,
        identifier,
        category: categorize(record).slug,
        createdAt: existing ? existing.createdAt : now,
        updatedAt: now,
      });
      if (existing) result.updatedOrSkipped++;
      else result.inserted++;
    });
    return result;
  }

  async findAlerts(
    opts: { skip?: number; limit?: number; filter?: AlertFilter } = {},
  ): Promise<StoredAlert[]> {
    const { skip = 0, limit = 20, filter = {} } = opts;
    return [...this.alerts.values()]
      .filter((a) => !filter.category || a.category === filter.category)
      .filter((a) => !filter.severity || a.severity === filter.severity)
      .filter((a) => !filter.disasterType || a.disasterType === filter.disasterType)
      .slice(skip, skip + limit);
  }

  async findAlertsNear(): Promise<StoredAlert[]> {
    return [...this.alerts.values()];
  }

  async findAlertsContainingPoint(
    lon: number,
    lat: number,
    categories?: readonly string[],
  ): Promise<StoredAlert[]> {
    return [...this.alerts.values()]
      .filter((a) => !categories || (a.category !== null && categories.includes(a.category)))
      .filter((a) => a.geometry !== null && outerRings(a.geometry).some((ring) => pointInRing([lon, lat], ring)))
      .sort((a, b) => a.identifier.localeCompare(b.identifier));
  }
}

/** Append-only sensor log with the (id, topic, time) uniqueness of the real table. */
export class InMemorySensorStore implements SensorStore {
  readonly rows: SensorRecord[] = [];
  failWith: Error | null = null;

  async insert(record: SensorRecord): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.rows.push(record);
  }

  async latestReadings(topic?: string): Promise<SensorRecord[]> {
    const latest = new Map<string, SensorRecord>();
    for (const row of this.rows) {
      if (topic && row.topic !== topic) continue;
      const key = `${row.sensorId}\u0000${row.topic}`;
      const current = latest.get(key);
      if (!current || row.receivedAt > current.receivedAt) latest.set(key, row);
    }
    return [...latest.values()];
  }

  async latestLocations(topic?: string): Promise<LocatedSensor[]> {
    return this.latestLocated((row) => row.sensorId, topic);
  }

  async latestLocatedReadings(): Promise<LocatedSensor[]> {
    return this.latestLocated((row) => `${row.sensorId}\u0000${row.topic}`);
  }

  private latestLocated(keyOf: (row: SensorRecord) => string, topic?: string): LocatedSensor[] {
    const latest = new Map<string, LocatedSensor>();
    for (const row of this.rows) {
      if (topic && row.topic !== topic) continue;
      const { latitude, longitude } = row;
      if (latitude === null || longitude === null) continue;
      const key = keyOf(row);
      const current = latest.get(key);
      if (!current || row.receivedAt > current.receivedAt) {
        latest.set(key, { ...row, latitude, longitude });
      }
    }
    return [...latest.values()];
  }
}

export function alertRecord(overrides: Partial<AlertRecord> = {}): AlertRecord {
  return {
    identifier: 'alert-1',
    featureType: 'alert',
    geometry: null,
    severity: 'WARNING',
    effectiveStartTime: null,
    effectiveEndTime: null,
    disasterType: null,
    areaDescription: null,
    type: null,
    language: 'en',
    warningMessage: null,
    properties: {},
    ...overrides,
  };
}

export function alertFeature(properties: JsonObject, geometry: Geometry | null = null): AlertFeature {
  return { type: 'Feature', geometry, properties };
}

export function sensorRecord(overrides: Partial<SensorRecord> = {}): SensorRecord {
  return {
    sensorId: 'S-1',
    topic: 'rainfall',
    latitude: 28.4,
    longitude: 77.2,
    rawPayload: {},
    receivedAt: new Date('2026-02-01T05:00:00Z'),
    ...overrides,
  };
}

export const SQUARE_AROUND_TEST_SITE: Geometry = {
  type: 'Polygon',
  coordinates: [
    [
      [77, 28],
      [77.5, 28],
      [77.5, 28.8],
      [77, 28.8],
      [77, 28],
    ],
  ],
};
