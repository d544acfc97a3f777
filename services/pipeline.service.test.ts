import { describe, it, expect } from '@jest/globals';
import { countByCategory, runPipeline } from './pipeline.service.js';
import { InMemoryAlertStore, RecordingTransport, alertRecord } from '../test-utils/fakes.js';

const batch = [
  alertRecord({ identifier: 'cyc-1', disasterType: 'Cyclonic Storm' }),
  alertRecord({ identifier: 'eq-1', disasterType: 'भूकंप', language: 'hi' }),
];

describe('countByCategory', () => {
  it('counts alerts per category slug', () => {
    expect(
      countByCategory([...batch, alertRecord({ identifier: 'cyc-2', disasterType: 'Cyclone' })]),
    ).toEqual({ weather_cyclone: 2, earthquake: 1 });
  });
});

describe('runPipeline', () => {
  it('upserts, categorizes and publishes one payload per category', async () => {
    const alertStore = new InMemoryAlertStore();
    const transport = new RecordingTransport();
    const report = await runPipeline(batch, { alertStore, transport });

    expect(report).toEqual({
      received: 2,
      ingestion: { status: 'completed', result: { inserted: 2, updatedOrSkipped: 0, failed: [] } },
      categorization: { status: 'completed', result: { weather_cyclone: 1, earthquake: 1 } },
      dissemination: {
        status: 'completed',
        result: { published: { weather_cyclone: 1, earthquake: 1 }, failed: [] },
      },
    });
    expect(transport.messages.map((m) => m.topic)).toEqual([
      'alerts/weather_cyclone',
      'alerts/earthquake',
    ]);
    expect(alertStore.alerts.get('eq-1')?.category).toBe('earthquake');
  });

  it('is idempotent across re-ingestion', async () => {
    const alertStore = new InMemoryAlertStore();
    await runPipeline(batch, { alertStore });
    const second = await runPipeline(batch, { alertStore });

    expect(second.ingestion).toEqual({
      status: 'completed',
      result: { inserted: 0, updatedOrSkipped: 2, failed: [] },
    });
    expect(alertStore.alerts.size).toBe(2);
  });

  it('skips stages whose collaborator is not configured', async () => {
    const report = await runPipeline(batch, {});
    expect(report.ingestion).toEqual({ status: 'skipped', reason: 'alert store not configured' });
    expect(report.categorization.status).toBe('completed');
    expect(report.dissemination).toEqual({ status: 'skipped', reason: 'broker not configured' });
  });

  it('still categorizes and publishes when the store is down', async () => {
    const alertStore = new InMemoryAlertStore();
    alertStore.failWith = new Error('connect ECONNREFUSED 127.0.0.1:5432');
    const transport = new RecordingTransport();
    const report = await runPipeline(batch, { alertStore, transport });

    expect(report.ingestion).toEqual({
      status: 'failed',
      error: 'connect ECONNREFUSED 127.0.0.1:5432',
    });
    expect(report.dissemination.status).toBe('completed');
    expect(transport.messages).toHaveLength(2);
  });

  it('reports records without identifier and disseminates them anyway', async () => {
    const transport = new RecordingTransport();
    const report = await runPipeline(
      [alertRecord({ identifier: null, disasterType: 'Dust storm' })],
      { alertStore: new InMemoryAlertStore(), transport },
    );

    expect(report.ingestion).toEqual({
      status: 'completed',
      result: {
        inserted: 0,
        updatedOrSkipped: 0,
        failed: [{ index: 0, identifier: null, error: 'identifier is required' }],
      },
    });
    expect(transport.messages.map((m) => m.topic)).toEqual(['alerts/dust_storm']);
  });

  it('skips dissemination for an empty batch', async () => {
    const transport = new RecordingTransport();
    const report = await runPipeline([], { alertStore: new InMemoryAlertStore(), transport });
    expect(report.categorization).toEqual({ status: 'completed', result: {} });
    expect(report.dissemination).toEqual({ status: 'skipped', reason: 'no alerts in batch' });
  });

  it('publishes under a custom topic prefix', async () => {
    const transport = new RecordingTransport();
    await runPipeline(batch.slice(0, 1), { transport }, { topicPrefix: 'cap' });
    expect(transport.messages.map((m) => m.topic)).toEqual(['cap/weather_cyclone']);
  });
});
