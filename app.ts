import express from 'express';
import cors from 'cors';
import bodyParser from 'body-parser';
import winston from 'winston';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import swaggerUi from 'swagger-ui-express';
import fs from 'fs';
import path from 'path';
import hpp from 'hpp';
import { randomUUID } from 'crypto';
import { register } from './metrics.js';
import { logger as defaultLogger } from './logger.js';
import { describeCapabilities, type Capabilities } from './capabilities.js';
import { createAlertsRouter } from './routes/alerts.js';
import { createSensorsRouter } from './routes/sensors.js';
import { errorHandler, errorMessage } from './middleware/error.js';
import { isJsonObject, type JsonObject } from './utils/json.js';

export interface AppOptions {
  corsOrigin?: string;
  topicPrefix?: string;
  nodeEnv?: string;
  logger?: winston.Logger;
}

// 404 handler (module scope)
function register404Handler(req: express.Request, res: express.Response) {
  res.status(404).json({ error: 'Not found', url: req.originalUrl });
}

export function loadOpenApiSpec(log: winston.Logger = defaultLogger): JsonObject | null {
  const candidates = [
    path.join(process.cwd(), 'openapi.json'),
    path.join(__dirname, 'openapi.json'),
    path.join(__dirname, '..', 'openapi.json'),
  ];
  for (const candidate of candidates) {
    if (!fs.existsSync(candidate)) continue;
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(candidate, 'utf8'));
      if (isJsonObject(parsed)) return parsed;
    } catch (err) {
      log.error('Failed to load OpenAPI spec', { path: candidate, error: errorMessage(err) });
    }
  }
  return null;
}

/**
 * Builds the HTTP app over whatever collaborators are available. Routes
 * that need a missing store answer 503 instead of failing at startup.
 */
export function createApp(caps: Capabilities, options: AppOptions = {}): express.Application {
  const { corsOrigin = '*', topicPrefix, nodeEnv = process.env.NODE_ENV } = options;
  const log = options.logger ?? defaultLogger;
  const app = express();

  app.use((req, res, next) => {
    const requestId = randomUUID();
    res.locals.requestId = requestId;
    res.setHeader('X-Request-Id', requestId);
    next();
  });

  // Security headers
  app.use(
    helmet({
      hsts: { maxAge: 31536000, includeSubDomains: true, preload: true },
      referrerPolicy: { policy: 'no-referrer' },
    }),
  );

  // Rate limiting: relaxed for tests
  app.use(
    rateLimit({
      windowMs: nodeEnv === 'test' ? 60 * 1000 : 15 * 60 * 1000,
      max: nodeEnv === 'test' ? 10000 : 100,
      standardHeaders: true,
      legacyHeaders: false,
      message: { error: 'Too many requests, please try again later.' },
    }),
  );

  app.use(
    cors({
      origin: corsOrigin === '*' ? true : corsOrigin.split(',').map((s: string) => s.trim()),
      credentials: true,
    }),
  );

  // Feed batches can be large
  app.use('/api', bodyParser.json({ limit: '10mb' }));
  app.use(hpp());

  const openApiSpec = loadOpenApiSpec(log);
  if (openApiSpec) {
    app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(openApiSpec));
  }

  app.use('/api/v1/alerts', createAlertsRouter(caps, { topicPrefix }));
  app.use('/api/v1/sensors', createSensorsRouter(caps));

  // Health check endpoint
  app.get('/healthz', (req, res) => {
    res.status(200).json({ status: 'ok', uptime: process.uptime(), timestamp: Date.now() });
  });

  // Ready when every configured collaborator answers; missing ones only degrade
  app.get('/readyz', (req, res) => {
    const capabilities = describeCapabilities(caps);
    const degraded = Object.values(capabilities).some((present) => !present);
    const status = degraded ? 'degraded' : 'ready';
    if (!caps.database) {
      res.status(200).json({ status, db: 'not configured', capabilities });
      return;
    }
    caps.database
      .query('SELECT 1')
      .then(() => res.status(200).json({ status, db: 'connected', capabilities }))
      .catch((err: unknown) =>
        res
          .status(503)
          .json({ status: 'not ready', db: 'error', error: errorMessage(err), capabilities }),
      );
  });

  // /metrics endpoint
  app.get('/metrics', async (req, res) => {
    try {
      const metrics = await register.metrics();
      res.set('Content-Type', register.contentType);
      res.end(metrics);
    } catch (err) {
      if (!res.headersSent) {
        res.status(500).json({ error: errorMessage(err) || 'Prometheus metrics error' });
      }
    }
  });

  // Centralized error handler
  app.use(errorHandler(log));

  // Register 404 handler after all other middleware/routes
  app.use(register404Handler);

  return app;
}
