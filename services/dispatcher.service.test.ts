import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import { categoriesForTopic, dispatchSensorAlerts } from './dispatcher.service.js';
import {
  InMemoryAlertStore,
  InMemorySensorStore,
  RecordingTransport,
  SQUARE_AROUND_TEST_SITE,
  alertRecord,
  sensorRecord,
} from '../test-utils/fakes.js';

const FAR_SQUARE = {
  type: 'Polygon' as const,
  coordinates: [
    [
      [10, 10],
      [11, 10],
      [11, 11],
      [10, 11],
      [10, 10],
    ],
  ],
};

describe('categoriesForTopic', () => {
  it('maps stream types to the categories they watch', () => {
    expect(categoriesForTopic('rainfall')).toEqual(['rainfall_floods', 'cloud_burst']);
    expect(categoriesForTopic('seismic')).toEqual(['earthquake', 'tsunami']);
  });

  it('leaves unknown streams unrestricted', () => {
    expect(categoriesForTopic('all')).toBeUndefined();
    expect(categoriesForTopic('toString')).toBeUndefined();
  });
});

describe('dispatchSensorAlerts', () => {
  let alerts: InMemoryAlertStore;
  let sensors: InMemorySensorStore;
  let transport: RecordingTransport;

  beforeEach(async () => {
    alerts = new InMemoryAlertStore();
    sensors = new InMemorySensorStore();
    transport = new RecordingTransport();
    await alerts.upsert([
      alertRecord({ identifier: 'flood-1', disasterType: 'Flood', geometry: SQUARE_AROUND_TEST_SITE }),
      alertRecord({ identifier: 'quake-1', disasterType: 'Earthquake', geometry: SQUARE_AROUND_TEST_SITE }),
      alertRecord({ identifier: 'flood-far', disasterType: 'Flood', geometry: FAR_SQUARE }),
    ]);
    await sensors.insert(sensorRecord({ sensorId: 'S-1', topic: 'rainfall', latitude: 28.4, longitude: 77.2 }));
    await sensors.insert(sensorRecord({ sensorId: 'T-1', topic: 'temperature', latitude: 28.5, longitude: 77.3 }));
    await sensors.insert(sensorRecord({ sensorId: 'X-1', topic: 'all', latitude: 28.1, longitude: 77.1 }));
  });

  it('publishes each covering alert of a watched category to the sensor topic', async () => {
    const report = await dispatchSensorAlerts(alerts, sensors, transport);

    expect(report).toEqual({ sensorsChecked: 3, published: 3, noMatch: 1, failed: 0 });
    expect(transport.messages.map((m) => m.topic)).toEqual(['rainfall/S-1', 'all/X-1', 'all/X-1']);
    expect(transport.parsed(0)).toMatchObject({
      type: 'cap_alert_match',
      sensor: { sensor_id: 'S-1', topic: 'rainfall', latitude: 28.4, longitude: 77.2 },
      alert: {
        type: 'Feature',
        properties: { identifier: 'flood-1', alert_category: 'rainfall_floods' },
      },
    });
    expect(transport.parsed(2)).toMatchObject({ alert: { properties: { identifier: 'quake-1' } } });
  });

  it('counts failed publishes and keeps going', async () => {
    transport.failingTopics.add('rainfall/S-1');
    const report = await dispatchSensorAlerts(alerts, sensors, transport);
    expect(report).toEqual({ sensorsChecked: 3, published: 2, noMatch: 1, failed: 1 });
  });

  it('counts a failed lookup against that sensor only', async () => {
    jest
      .spyOn(alerts, 'findAlertsContainingPoint')
      .mockRejectedValueOnce(new Error('statement timeout'));
    const report = await dispatchSensorAlerts(alerts, sensors, transport);
    expect(report).toEqual({ sensorsChecked: 3, published: 2, noMatch: 1, failed: 1 });
    expect(transport.messages.map((m) => m.topic)).toEqual(['all/X-1', 'all/X-1']);
  });

  it('checks each stream a sensor reports on against its own categories', async () => {
    const multiStream = new InMemorySensorStore();
    await multiStream.insert(
      sensorRecord({ sensorId: 'S-1', topic: 'rainfall', receivedAt: new Date('2026-02-01T05:00:00Z') }),
    );
    await multiStream.insert(
      sensorRecord({ sensorId: 'S-1', topic: 'temperature', receivedAt: new Date('2026-02-01T05:01:00Z') }),
    );

    const report = await dispatchSensorAlerts(alerts, multiStream, transport);
    expect(report).toEqual({ sensorsChecked: 2, published: 1, noMatch: 1, failed: 0 });
    expect(transport.messages.map((m) => m.topic)).toEqual(['rainfall/S-1']);
    expect(transport.parsed(0)).toMatchObject({ alert: { properties: { identifier: 'flood-1' } } });
  });
});
