// Alert DTOs: GeoJSON features in from the feed, GeoJSON features out to consumers
import type { AlertLanguage, AlertRecord, Geometry, StoredAlert } from '../alert.model.js';
import { isGeometry } from '../utils/geometry.js';
import type { JsonObject, JsonValue } from '../utils/json.js';

export interface AlertFeature {
  type: 'Feature';
  geometry: Geometry | null;
  properties: JsonObject;
}

export interface AlertFeatureCollection<M extends JsonObject = JsonObject> {
  type: 'FeatureCollection';
  features: AlertFeature[];
  metadata?: M;
}

const MONTHS: Record<string, string> = {
  Jan: '01',
  Feb: '02',
  Mar: '03',
  Apr: '04',
  May: '05',
  Jun: '06',
  Jul: '07',
  Aug: '08',
  Sep: '09',
  Oct: '10',
  Nov: '11',
  Dec: '12',
};

const ZONE_OFFSETS: Record<string, string> = {
  IST: '+05:30',
  UTC: 'Z',
  GMT: 'Z',
};

// e.g. "Sun Feb 01 10:34:17 IST 2026"
const FEED_TIMESTAMP = /^\w{3} (\w{3}) (\d{1,2}) (\d{2}:\d{2}:\d{2}) (\w+) (\d{4})$/;

/**
 * Parses feed timestamps. Accepts ISO-8601 and the feed's
 * `EEE MMM dd HH:mm:ss zzz yyyy` form; unknown zone names are read as UTC.
 */
export function parseFeedTimestamp(value: JsonValue | undefined): Date | null {
  if (typeof value !== 'string' || value.trim() === '') return null;
  const trimmed = value.trim();
  const match = FEED_TIMESTAMP.exec(trimmed);
  if (match) {
    const [, monthName, day, time, zone, year] = match;
    const month = MONTHS[monthName];
    if (!month) return null;
    const offset = ZONE_OFFSETS[zone] ?? 'Z';
    const date = new Date(`${year}-${month}-${day.padStart(2, '0')}T${time}${offset}`);
    return Number.isNaN(date.getTime()) ? null : date;
  }
  const date = new Date(trimmed);
  return Number.isNaN(date.getTime()) ? null : date;
}

export function parseLanguage(value: JsonValue | undefined): AlertLanguage | null {
  if (typeof value !== 'string') return null;
  const tag = value.trim().toLowerCase();
  if (tag === 'en' || tag.startsWith('en-') || tag === 'eng' || tag === 'english') return 'en';
  if (tag === 'hi' || tag.startsWith('hi-') || tag === 'hin' || tag === 'hindi') return 'hi';
  return null;
}

function text(value: JsonValue | undefined): string | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return null;
}

export function featureToAlertRecord(feature: AlertFeature): AlertRecord {
  const props = feature.properties;
  const identifier = text(props.identifier);
  return {
    identifier: identifier && identifier.trim() !== '' ? identifier.trim() : null,
    featureType: text(props.feature_type),
    geometry: isGeometry(feature.geometry) ? feature.geometry : null,
    severity: text(props.severity),
    effectiveStartTime: parseFeedTimestamp(props.effective_start_time),
    effectiveEndTime: parseFeedTimestamp(props.effective_end_time),
    disasterType: text(props.disaster_type),
    areaDescription: text(props.area_description),
    type: text(props.type),
    language: parseLanguage(props.actual_lang ?? props.language),
    warningMessage: text(props.warning_message),
    // Preserved verbatim for downstream consumers
    properties: props,
  };
}

function fillMissing(properties: JsonObject, fields: JsonObject): void {
  for (const [key, value] of Object.entries(fields)) {
    if (!Object.prototype.hasOwnProperty.call(properties, key)) properties[key] = value;
  }
}

/**
 * Wraps an alert as a feature. Source properties are passed on as received;
 * normalized fields and the category only fill keys the source lacks.
 */
export function alertRecordToFeature(record: AlertRecord, category?: string): AlertFeature {
  const properties: JsonObject = { ...record.properties };
  fillMissing(properties, {
    identifier: record.identifier,
    feature_type: record.featureType,
    severity: record.severity,
    effective_start_time: record.effectiveStartTime ? record.effectiveStartTime.toISOString() : null,
    effective_end_time: record.effectiveEndTime ? record.effectiveEndTime.toISOString() : null,
    disaster_type: record.disasterType,
    area_description: record.areaDescription,
    type: record.type,
    language: record.language,
    warning_message: record.warningMessage,
  });
  if (category) fillMissing(properties, { alert_category: category });
  return { type: 'Feature', geometry: record.geometry, properties };
}

export function storedAlertToFeature(alert: StoredAlert): AlertFeature {
  const feature = alertRecordToFeature(alert, alert.category ?? undefined);
  fillMissing(feature.properties, {
    created_at: alert.createdAt.toISOString(),
    updated_at: alert.updatedAt.toISOString(),
  });
  return feature;
}

export function toFeatureCollection<M extends JsonObject>(
  features: AlertFeature[],
  metadata?: M,
): AlertFeatureCollection<M> {
  const collection: AlertFeatureCollection<M> = { type: 'FeatureCollection', features };
  if (metadata) collection.metadata = metadata;
  return collection;
}
