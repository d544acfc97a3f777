// Joi validation schemas and helpers for alerts
import Joi from 'joi';
import { GEOMETRY_TYPES } from '../alert.model.js';
import type { AlertFeature } from '../dto/alert.dto.js';
import type { BoundingBox } from '../services/alert.service.js';
import { CATEGORY_TABLE } from '../services/categorizer.service.js';

export interface FeatureCollectionBody {
  type: 'FeatureCollection';
  features: AlertFeature[];
}

export interface AlertListQuery {
  page: number;
  limit: number;
  category?: string;
  severity?: string;
  disasterType?: string;
  bbox?: BoundingBox;
}

export interface NearQuery {
  lat: number;
  lng: number;
  distance: number;
}

export const MAX_FEATURES_PER_BATCH = 5000;

const geometrySchema = Joi.object({
  type: Joi.string()
    .valid(...GEOMETRY_TYPES)
    .required(),
  coordinates: Joi.array().required(),
}).unknown();

const featureSchema = Joi.object({
  type: Joi.string().valid('Feature').required(),
  geometry: geometrySchema.allow(null).default(null),
  properties: Joi.object().unknown().default({}),
}).unknown();

const featureCollectionSchema = Joi.object<FeatureCollectionBody>({
  type: Joi.string().valid('FeatureCollection').required(),
  features: Joi.array().items(featureSchema).max(MAX_FEATURES_PER_BATCH).required(),
}).unknown();

function parseBoundingBox(value: string, helpers: Joi.CustomHelpers): BoundingBox | Joi.ErrorReport {
  const parts = value.split(',').map((part) => Number(part.trim()));
  if (parts.length !== 4 || parts.some((n) => !Number.isFinite(n))) {
    return helpers.error('any.invalid');
  }
  const [minLon, minLat, maxLon, maxLat] = parts;
  if (
    minLon < -180 ||
    maxLon > 180 ||
    minLat < -90 ||
    maxLat > 90 ||
    minLon > maxLon ||
    minLat > maxLat
  ) {
    return helpers.error('any.invalid');
  }
  return [minLon, minLat, maxLon, maxLat];
}

const alertListQuerySchema = Joi.object<AlertListQuery>({
  page: Joi.number().integer().min(1).default(1),
  limit: Joi.number().integer().min(1).max(500).default(20),
  category: Joi.string().valid(...CATEGORY_TABLE.map((c) => c.slug)),
  severity: Joi.string().max(50),
  disasterType: Joi.string().max(255),
  bbox: Joi.string().custom(parseBoundingBox, 'bounding box'),
});

const nearQuerySchema = Joi.object<NearQuery>({
  lat: Joi.number().min(-90).max(90).required(),
  lng: Joi.number().min(-180).max(180).required(),
  distance: Joi.number().min(0).required(),
});

function mapJoiErrorMessage(msg: string): string {
  return msg
    .replace('"type" must be [FeatureCollection]', 'type must be "FeatureCollection"')
    .replace('"features" is required', 'features (array) is required')
    .replace('"bbox" contains an invalid value', 'bbox must be minLon,minLat,maxLon,maxLat')
    .replace('"lat" must be a number', 'lat (number) is required as query parameter')
    .replace('"lng" must be a number', 'lng (number) is required as query parameter')
    .replace('"distance" must be a number', 'distance (number, km) is required as query parameter');
}

export { featureCollectionSchema, alertListQuerySchema, nearQuerySchema, mapJoiErrorMessage };
