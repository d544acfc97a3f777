import { Request, Response, Router } from 'express';
import Joi from 'joi';
import type { Capabilities } from '../capabilities.js';
import { sensorRecordToJson, sensorsInPolygon } from '../services/sensor.service.js';
import { polygonBodySchema, sensorListQuerySchema } from '../validation/sensor.js';
import { asyncHandler } from '../middleware/async-handler.js';
import { StoreUnavailableError, errorResponse } from '../middleware/error.js';

function joiDetails(error: Joi.ValidationError): string[] {
  return error.details.map((d: Joi.ValidationErrorItem) => d.message);
}

export function createSensorsRouter(caps: Pick<Capabilities, 'sensorStore'>): Router {
  const router = Router();

  // Latest reading per sensor, optionally for one stream type
  router.get(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const { error, value } = sensorListQuerySchema.validate({ ...req.query }, { abortEarly: false });
      if (error) {
        return errorResponse(res, {
          error: 'Invalid query parameters',
          details: joiDetails(error),
          code: 'INVALID_QUERY',
          status: 400,
        });
      }
      if (!caps.sensorStore) throw new StoreUnavailableError('Sensor');
      const sensors = await caps.sensorStore.latestReadings(value.topic);
      res.json({ data: sensors.map(sensorRecordToJson) });
    }),
  );

  // POST /sensors/in-polygon { polygon: [[lon, lat], ...] }
  router.post(
    '/in-polygon',
    asyncHandler(async (req: Request, res: Response) => {
      const { error, value } = polygonBodySchema.validate(req.body, { abortEarly: false });
      if (error) {
        return errorResponse(res, {
          error: 'Invalid input',
          details: joiDetails(error),
          code: 'INVALID_BODY',
          status: 400,
        });
      }
      if (!caps.sensorStore) throw new StoreUnavailableError('Sensor');
      const sensors = await sensorsInPolygon(caps.sensorStore, value.polygon);
      res.json({ data: sensors.map(sensorRecordToJson), count: sensors.length });
    }),
  );

  return router;
}
