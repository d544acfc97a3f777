import type { StoredAlert } from '../alert.model.js';
import type { AlertTransport } from '../transport/mqtt.transport.js';
import { storedAlertToFeature } from '../dto/alert.dto.js';
import { errorMessage } from '../middleware/error.js';
import { topicPublishCounter } from '../metrics.js';
import { logger } from '../logger.js';
import type { AlertStore } from './alert.service.js';
import { sensorRecordToJson, type SensorStore } from './sensor.service.js';

// Alert categories each sensor stream cares about; unlisted streams get every category
export const TOPIC_CATEGORIES: Readonly<Record<string, readonly string[]>> = {
  rainfall: ['rainfall_floods', 'cloud_burst'],
  temperature: ['frost_cold_wave', 'heat_wave'],
  wind: ['weather_cyclone', 'thunderstorm_lightning'],
  seismic: ['earthquake', 'tsunami'],
  soil: ['landslide', 'avalanche'],
  humidity: ['drought'],
  fire: ['pre_fire'],
  agriculture: ['pest_attack'],
};

export interface DispatchReport {
  sensorsChecked: number;
  published: number;
  noMatch: number;
  failed: number;
}

export function categoriesForTopic(topic: string): readonly string[] | undefined {
  return Object.prototype.hasOwnProperty.call(TOPIC_CATEGORIES, topic)
    ? TOPIC_CATEGORIES[topic]
    : undefined;
}

/**
 * Sends every stored alert covering a sensor's latest location on each of
 * its streams to that stream's sensor topic (`<stream>/<sensor id>`). One failed publish or lookup
 * is counted and the rest carry on.
 */
export async function dispatchSensorAlerts(
  alertStore: AlertStore,
  sensorStore: SensorStore,
  transport: AlertTransport,
): Promise<DispatchReport> {
  const report: DispatchReport = { sensorsChecked: 0, published: 0, noMatch: 0, failed: 0 };
  const sensors = await sensorStore.latestLocatedReadings();

  for (const sensor of sensors) {
    report.sensorsChecked++;
    let alerts: StoredAlert[];
    try {
      alerts = await alertStore.findAlertsContainingPoint(
        sensor.longitude,
        sensor.latitude,
        categoriesForTopic(sensor.topic),
      );
    } catch (err) {
      report.failed++;
      logger.error('Alert lookup failed for sensor', {
        sensorId: sensor.sensorId,
        error: errorMessage(err),
      });
      continue;
    }
    if (alerts.length === 0) {
      report.noMatch++;
      continue;
    }

    const topic = `${sensor.topic}/${sensor.sensorId}`;
    for (const alert of alerts) {
      const message = {
        type: 'cap_alert_match',
        sensor: sensorRecordToJson(sensor),
        alert: storedAlertToFeature(alert),
      };
      try {
        await transport.publish(topic, JSON.stringify(message));
        report.published++;
        topicPublishCounter.inc({ kind: 'sensor', outcome: 'published' });
      } catch (err) {
        report.failed++;
        topicPublishCounter.inc({ kind: 'sensor', outcome: 'failed' });
        logger.error('Failed to publish sensor alert', { topic, error: errorMessage(err) });
      }
    }
  }

  logger.info('Sensor alert dispatch finished', { ...report });
  return report;
}
