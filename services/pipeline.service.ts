import type { AlertRecord } from '../alert.model.js';
import type { Capabilities } from '../capabilities.js';
import { errorMessage } from '../middleware/error.js';
import { alertsCategorizedCounter } from '../metrics.js';
import { logger } from '../logger.js';
import type { UpsertResult } from './alert.service.js';
import { categorize, type Categorizer } from './categorizer.service.js';
import { disseminate, type DisseminationResult } from './dissemination.service.js';

export type StageOutcome<T> =
  | { status: 'completed'; result: T }
  | { status: 'skipped'; reason: string }
  | { status: 'failed'; error: string };

export interface PipelineReport {
  received: number;
  ingestion: StageOutcome<UpsertResult>;
  // Alert count per category slug
  categorization: StageOutcome<Record<string, number>>;
  dissemination: StageOutcome<DisseminationResult>;
}

export interface PipelineOptions {
  topicPrefix?: string;
  categorizer?: Categorizer;
}

type PipelineCapabilities = Pick<Capabilities, 'alertStore' | 'transport'>;

export function countByCategory(
  records: readonly AlertRecord[],
  categorizer: Categorizer = categorize,
): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const record of records) {
    const { slug } = categorizer(record);
    counts[slug] = (counts[slug] ?? 0) + 1;
  }
  return counts;
}

/**
 * Upsert, categorize, then fan out one batch. Stages are independent: a
 * store that is missing or down does not stop categorization or
 * dissemination of the in-memory batch.
 */
export async function runPipeline(
  records: readonly AlertRecord[],
  caps: PipelineCapabilities,
  { topicPrefix, categorizer = categorize }: PipelineOptions = {},
): Promise<PipelineReport> {
  let ingestion: StageOutcome<UpsertResult>;
  if (!caps.alertStore) {
    ingestion = { status: 'skipped', reason: 'alert store not configured' };
  } else {
    try {
      ingestion = { status: 'completed', result: await caps.alertStore.upsert(records) };
    } catch (err) {
      logger.error('Alert ingestion failed', { error: errorMessage(err) });
      ingestion = { status: 'failed', error: errorMessage(err) };
    }
  }

  const counts = countByCategory(records, categorizer);
  for (const [category, count] of Object.entries(counts)) {
    alertsCategorizedCounter.inc({ category }, count);
  }
  const categorization: StageOutcome<Record<string, number>> = {
    status: 'completed',
    result: counts,
  };

  let dissemination: StageOutcome<DisseminationResult>;
  if (!caps.transport) {
    dissemination = { status: 'skipped', reason: 'broker not configured' };
  } else if (records.length === 0) {
    dissemination = { status: 'skipped', reason: 'no alerts in batch' };
  } else {
    dissemination = {
      status: 'completed',
      result: await disseminate(records, caps.transport, { topicPrefix, categorizer }),
    };
  }

  const report: PipelineReport = {
    received: records.length,
    ingestion,
    categorization,
    dissemination,
  };
  logger.info('Pipeline run finished', {
    received: report.received,
    ingestion: ingestion.status,
    dissemination: dissemination.status,
  });
  return report;
}
