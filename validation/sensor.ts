// Joi validation schemas for sensor queries
import Joi from 'joi';

export interface SensorListQuery {
  topic?: string;
}

export interface PolygonBody {
  polygon: number[][];
}

const sensorListQuerySchema = Joi.object<SensorListQuery>({
  topic: Joi.string().pattern(/^[\w-]+$/),
});

// Ring closure and ranges are checked by validateRing so they map to INVALID_POLYGON
const polygonBodySchema = Joi.object<PolygonBody>({
  polygon: Joi.array().items(Joi.array().items(Joi.number())).required(),
});

export { sensorListQuerySchema, polygonBodySchema };
