import { describe, it, expect } from '@jest/globals';
import {
  INSERT_SENSOR_SQL,
  PgSensorStore,
  parseSensorMessage,
  recordSensorMessage,
  sensorsInPolygon,
  topicType,
} from './sensor.service.js';
import { InvalidPolygonError } from '../middleware/error.js';
import { FakeDatabase, InMemorySensorStore, sensorRecord } from '../test-utils/fakes.js';

const RING_AROUND_SITE = [
  [77, 28],
  [77.5, 28],
  [77.5, 28.8],
  [77, 28.8],
  [77, 28],
];
const FAR_RING = [
  [10, 10],
  [11, 10],
  [11, 11],
  [10, 11],
  [10, 10],
];

describe('parseSensorMessage', () => {
  it('looks fields up case-insensitively across aliases', () => {
    expect(parseSensorMessage('{"ID":"S-9","Lat":"28.4","LONG":77.2,"rain_mm":12}')).toEqual({
      sensorId: 'S-9',
      latitude: 28.4,
      longitude: 77.2,
      payload: { ID: 'S-9', Lat: '28.4', LONG: 77.2, rain_mm: 12 },
    });
  });

  it('accepts sensor_id and the long-form coordinate names', () => {
    const parsed = parseSensorMessage(
      Buffer.from('{"sensor_id":42,"latitude":28.4,"longitude":"77.2"}', 'utf8'),
    );
    expect(parsed).toMatchObject({ sensorId: '42', latitude: 28.4, longitude: 77.2 });
  });

  it('falls through a null id to the next alias', () => {
    expect(parseSensorMessage({ id: null, sensor_id: 'S-2' })?.sensorId).toBe('S-2');
  });

  it('nulls both coordinates when one is missing', () => {
    expect(parseSensorMessage({ id: 'S-1', lat: 28.4 })).toMatchObject({
      latitude: null,
      longitude: null,
    });
  });

  it('nulls both coordinates when one is out of range', () => {
    expect(parseSensorMessage({ id: 'S-1', lat: 95, long: 77.2 })).toMatchObject({
      latitude: null,
      longitude: null,
    });
  });

  it('returns null without an id', () => {
    expect(parseSensorMessage({ lat: 28.4, long: 77.2 })).toBeNull();
    expect(parseSensorMessage({ id: '  ' })).toBeNull();
  });

  it('returns null for anything but a JSON object', () => {
    expect(parseSensorMessage('not json')).toBeNull();
    expect(parseSensorMessage('[1,2]')).toBeNull();
  });
});

describe('topicType', () => {
  it('keeps the first topic segment', () => {
    expect(topicType('rainfall/status')).toBe('rainfall');
    expect(topicType('temperature')).toBe('temperature');
  });
});

describe('recordSensorMessage', () => {
  const at = new Date('2026-02-01T05:00:00Z');

  it('stores an accepted message under its stream type', async () => {
    const store = new InMemorySensorStore();
    const outcome = await recordSensorMessage(
      store,
      'rainfall/status',
      '{"id":"S-1","lat":28.4,"long":77.2}',
      () => at,
    );
    expect(outcome).toEqual({
      status: 'stored',
      record: {
        sensorId: 'S-1',
        topic: 'rainfall',
        latitude: 28.4,
        longitude: 77.2,
        rawPayload: { id: 'S-1', lat: 28.4, long: 77.2 },
        receivedAt: at,
      },
    });
    expect(store.rows).toHaveLength(1);
  });

  it('stores a message without coordinates with null location', async () => {
    const store = new InMemorySensorStore();
    const outcome = await recordSensorMessage(store, 'rainfall/status', '{"id":"S-1"}', () => at);
    expect(outcome.status).toBe('stored');
    expect(store.rows[0]).toMatchObject({ latitude: null, longitude: null });
  });

  it('rejects a message without id and stores nothing', async () => {
    const store = new InMemorySensorStore();
    const outcome = await recordSensorMessage(store, 'rainfall/status', '{"lat":28.4}', () => at);
    expect(outcome).toEqual({ status: 'rejected', reason: 'message has no sensor id' });
    expect(store.rows).toHaveLength(0);
  });

  it('appends every reception, including two at the same instant', async () => {
    const store = new InMemorySensorStore();
    const later = new Date('2026-02-01T05:01:00Z');
    await recordSensorMessage(store, 'rainfall/status', '{"id":"S-1"}', () => at);
    await recordSensorMessage(store, 'rainfall/status', '{"id":"S-1"}', () => later);
    const repeat = await recordSensorMessage(store, 'rainfall/status', '{"id":"S-1","rain_mm":2}', () => at);

    expect(repeat.status).toBe('stored');
    expect(store.rows.map((r) => r.receivedAt)).toEqual([at, later, at]);
  });

  it('propagates store failures', async () => {
    const store = new InMemorySensorStore();
    store.failWith = new Error('connection terminated');
    await expect(recordSensorMessage(store, 'rainfall/status', '{"id":"S-1"}')).rejects.toThrow(
      'connection terminated',
    );
  });
});

describe('sensorsInPolygon', () => {
  it('returns a sensor inside the ring and nothing for a far ring', async () => {
    const store = new InMemorySensorStore();
    await store.insert(sensorRecord({ sensorId: 'S-1', latitude: 28.4, longitude: 77.2 }));

    expect((await sensorsInPolygon(store, RING_AROUND_SITE)).map((s) => s.sensorId)).toEqual(['S-1']);
    expect(await sensorsInPolygon(store, FAR_RING)).toEqual([]);
  });

  it('uses each sensor latest known location', async () => {
    const store = new InMemorySensorStore();
    await store.insert(
      sensorRecord({ sensorId: 'S-2', latitude: 28.4, longitude: 77.2, receivedAt: new Date('2026-02-01T05:00:00Z') }),
    );
    await store.insert(
      sensorRecord({ sensorId: 'S-2', latitude: 10.5, longitude: 10.5, receivedAt: new Date('2026-02-01T06:00:00Z') }),
    );
    await store.insert(
      sensorRecord({ sensorId: 'S-3', latitude: 28.5, longitude: 77.3, receivedAt: new Date('2026-02-01T05:00:00Z') }),
    );
    await store.insert(
      sensorRecord({ sensorId: 'S-3', latitude: null, longitude: null, receivedAt: new Date('2026-02-01T06:00:00Z') }),
    );

    expect((await sensorsInPolygon(store, RING_AROUND_SITE)).map((s) => s.sensorId)).toEqual(['S-3']);
    expect((await sensorsInPolygon(store, FAR_RING)).map((s) => s.sensorId)).toEqual(['S-2']);
  });

  it('counts a sensor on the boundary as inside', async () => {
    const store = new InMemorySensorStore();
    await store.insert(sensorRecord({ sensorId: 'edge', latitude: 28.4, longitude: 77 }));
    await store.insert(sensorRecord({ sensorId: 'corner', latitude: 28, longitude: 77.5 }));
    const inside = await sensorsInPolygon(store, RING_AROUND_SITE);
    expect(inside.map((s) => s.sensorId)).toEqual(['edge', 'corner']);
  });

  it('rejects an open ring', async () => {
    const store = new InMemorySensorStore();
    await expect(sensorsInPolygon(store, RING_AROUND_SITE.slice(0, 4))).rejects.toBeInstanceOf(
      InvalidPolygonError,
    );
  });
});

describe('PgSensorStore', () => {
  it('appends a row per reception', async () => {
    const db = new FakeDatabase();
    const store = new PgSensorStore(db);
    const record = sensorRecord({ rawPayload: { id: 'S-1' } });

    await store.insert(record);
    expect(db.calls[0].text).toBe(INSERT_SENSOR_SQL);
    expect(INSERT_SENSOR_SQL).not.toContain('ON CONFLICT');
    expect(db.calls[0].values).toEqual([
      'S-1',
      'rainfall',
      28.4,
      77.2,
      '{"id":"S-1"}',
      '2026-02-01T05:00:00.000Z',
    ]);
  });

  it('reads the latest located row per sensor', async () => {
    const db = new FakeDatabase(() => ({
      rows: [
        {
          sensor_id: 'S-1',
          topic: 'rainfall',
          latitude: '28.4',
          longitude: 77.2,
          raw_data: { id: 'S-1' },
          received_at: new Date('2026-02-01T05:00:00Z'),
        },
      ],
    }));
    const sensors = await new PgSensorStore(db).latestLocations('rainfall');

    expect(db.calls[0].text).toContain('DISTINCT ON (sensor_id)');
    expect(db.calls[0].text).toContain('AND topic = $1');
    expect(db.calls[0].values).toEqual(['rainfall']);
    expect(sensors).toEqual([
      {
        sensorId: 'S-1',
        topic: 'rainfall',
        latitude: 28.4,
        longitude: 77.2,
        rawPayload: { id: 'S-1' },
        receivedAt: new Date('2026-02-01T05:00:00Z'),
      },
    ]);
  });

  it('reads the latest located row per sensor and stream', async () => {
    const db = new FakeDatabase();
    await new PgSensorStore(db).latestLocatedReadings();

    expect(db.calls[0].text).toContain('DISTINCT ON (sensor_id, topic)');
    expect(db.calls[0].text).toContain('ORDER BY sensor_id, topic, received_at DESC');
    expect(db.calls[0].values).toEqual([]);
  });
});
