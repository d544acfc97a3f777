import { Request, Response, Router } from 'express';
import Joi from 'joi';
import type { Capabilities } from '../capabilities.js';
import { featureToAlertRecord, storedAlertToFeature, toFeatureCollection } from '../dto/alert.dto.js';
import { CATEGORY_TABLE, topicFor } from '../services/categorizer.service.js';
import { runPipeline } from '../services/pipeline.service.js';
import {
  alertListQuerySchema,
  featureCollectionSchema,
  mapJoiErrorMessage,
  nearQuerySchema,
} from '../validation/alert.js';
import { asyncHandler } from '../middleware/async-handler.js';
import { StoreUnavailableError, errorResponse } from '../middleware/error.js';

export interface AlertRouterOptions {
  topicPrefix?: string;
}

function joiDetails(error: Joi.ValidationError): string[] {
  return error.details.map((d: Joi.ValidationErrorItem) => mapJoiErrorMessage(d.message));
}

export function createAlertsRouter(
  caps: Pick<Capabilities, 'alertStore' | 'transport'>,
  { topicPrefix }: AlertRouterOptions = {},
): Router {
  const router = Router();

  // List stored alerts with pagination and filtering
  router.get(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const { error, value } = alertListQuerySchema.validate({ ...req.query }, { abortEarly: false });
      if (error) {
        return errorResponse(res, {
          error: 'Invalid query parameters',
          details: joiDetails(error),
          code: 'INVALID_QUERY',
          status: 400,
        });
      }
      if (!caps.alertStore) throw new StoreUnavailableError('Alert');
      const { page, limit, ...filter } = value;
      const alerts = await caps.alertStore.findAlerts({
        skip: (page - 1) * limit,
        limit,
        filter,
      });
      res.json(
        toFeatureCollection(alerts.map(storedAlertToFeature), { page, limit, count: alerts.length }),
      );
    }),
  );

  // GET /alerts/near?lat=...&lng=...&distance=... (km)
  router.get(
    '/near',
    asyncHandler(async (req: Request, res: Response) => {
      const { error, value } = nearQuerySchema.validate({ ...req.query }, { abortEarly: false });
      if (error) {
        return errorResponse(res, {
          error: 'Invalid query parameters',
          details: joiDetails(error),
          code: 'INVALID_QUERY',
          status: 400,
        });
      }
      if (!caps.alertStore) throw new StoreUnavailableError('Alert');
      const alerts = await caps.alertStore.findAlertsNear({
        lat: value.lat,
        lng: value.lng,
        distanceKm: value.distance,
      });
      res.json(toFeatureCollection(alerts.map(storedAlertToFeature)));
    }),
  );

  // The rule table in priority order, with the topic each category publishes to
  router.get('/categories', (req: Request, res: Response) => {
    res.json({
      data: CATEGORY_TABLE.map((category, index) => ({
        priority: index + 1,
        slug: category.slug,
        group: category.group,
        topic: topicFor(category.slug, topicPrefix),
        english: category.english,
        hindi: category.hindi,
      })),
    });
  });

  // Ingest one feed batch: upsert, categorize, publish
  router.post(
    '/ingest',
    asyncHandler(async (req: Request, res: Response) => {
      const { error, value } = featureCollectionSchema.validate(req.body, { abortEarly: false });
      if (error) {
        return errorResponse(res, {
          error: 'Invalid input',
          details: joiDetails(error),
          code: 'INVALID_BODY',
          status: 400,
        });
      }
      const records = value.features.map(featureToAlertRecord);
      const report = await runPipeline(records, caps, { topicPrefix });
      res.json(report);
    }),
  );

  return router;
}
