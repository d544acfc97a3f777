import type { AlertRecord } from '../alert.model.js';
import {
  alertRecordToFeature,
  toFeatureCollection,
  type AlertFeatureCollection,
} from '../dto/alert.dto.js';
import type { AlertTransport } from '../transport/mqtt.transport.js';
import { errorMessage } from '../middleware/error.js';
import { topicPublishCounter } from '../metrics.js';
import { logger } from '../logger.js';
import {
  DEFAULT_TOPIC_PREFIX,
  categorize,
  partitionByCategory,
  topicFor,
  type Categorizer,
} from './categorizer.service.js';

// A type alias, not an interface, so it stays assignable to JsonObject
export type CategoryPayloadMetadata = {
  alert_type: string;
  alert_count: number;
  topic: string;
};

export type CategoryPayload = AlertFeatureCollection<CategoryPayloadMetadata>;

export interface CategoryPublication {
  category: string;
  topic: string;
  payload: CategoryPayload;
}

export interface DisseminationResult {
  published: Record<string, number>;
  failed: string[];
}

export interface DisseminationOptions {
  topicPrefix?: string;
  categorizer?: Categorizer;
}

/**
 * One FeatureCollection per non-empty category, in order of first appearance.
 */
export function buildCategoryPayloads(
  records: readonly AlertRecord[],
  { topicPrefix = DEFAULT_TOPIC_PREFIX, categorizer = categorize }: DisseminationOptions = {},
): CategoryPublication[] {
  const partitions = partitionByCategory(records, categorizer);
  return [...partitions.values()].map(({ category, records: alerts }) => {
    const topic = topicFor(category.slug, topicPrefix);
    return {
      category: category.slug,
      topic,
      payload: toFeatureCollection(
        alerts.map((alert) => alertRecordToFeature(alert, category.slug)),
        { alert_type: category.slug, alert_count: alerts.length, topic },
      ),
    };
  });
}

/**
 * Publishes each category payload to its own topic. Publishes are
 * independent: a failing topic is reported and the others still go out.
 */
export async function disseminate(
  records: readonly AlertRecord[],
  transport: AlertTransport,
  options: DisseminationOptions = {},
): Promise<DisseminationResult> {
  const publications = buildCategoryPayloads(records, options);
  const outcomes = await Promise.allSettled(
    publications.map(({ topic, payload }) => transport.publish(topic, JSON.stringify(payload))),
  );

  const result: DisseminationResult = { published: {}, failed: [] };
  outcomes.forEach((outcome, i) => {
    const { category, topic, payload } = publications[i];
    if (outcome.status === 'fulfilled') {
      result.published[category] = payload.features.length;
      topicPublishCounter.inc({ kind: 'category', outcome: 'published' });
      logger.info('Published alert category', { topic, alerts: payload.features.length });
    } else {
      result.failed.push(category);
      topicPublishCounter.inc({ kind: 'category', outcome: 'failed' });
      logger.error('Failed to publish alert category', {
        topic,
        error: errorMessage(outcome.reason),
      });
    }
  });
  return result;
}
