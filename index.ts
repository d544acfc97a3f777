import 'dotenv/config';
import { Server } from 'http';
import { loadConfig, type AppConfig } from './config.js';
import { createLogger } from './logger.js';
import { createApp } from './app.js';
import { createRuntime, type Runtime } from './capabilities.js';
import { initializeSchema } from './db.js';
import { SensorListener } from './listeners/sensor.listener.js';
import { dispatchSensorAlerts } from './services/dispatcher.service.js';
import { errorMessage } from './middleware/error.js';

export interface StartedService {
  server: Server;
  runtime: Runtime;
  listener?: SensorListener;
  stop(): Promise<void>;
}

export async function start(config: AppConfig = loadConfig()): Promise<StartedService> {
  const logger = createLogger(config.logLevel);
  const runtime = createRuntime(config, logger);
  const caps = runtime.capabilities;

  if (caps.database) {
    try {
      await initializeSchema(caps.database);
      logger.info('Database schema ensured');
    } catch (err) {
      // Stores stay wired; their calls fail and are reported per stage
      logger.error('Schema initialization failed', { error: errorMessage(err) });
    }
  }

  const app = createApp(caps, {
    corsOrigin: config.corsOrigin,
    topicPrefix: config.alertTopicPrefix,
    nodeEnv: config.nodeEnv,
    logger,
  });
  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(config.port, () => resolve(listening));
    listening.once('error', reject);
  });
  logger.info(`CAP alert pipeline listening on port ${config.port}`);

  let listener: SensorListener | undefined;
  if (caps.telemetry && caps.sensorStore) {
    listener = new SensorListener(caps.telemetry, caps.sensorStore, {
      topics: config.sensorTopics,
      queueLimit: config.sensorQueueLimit,
      logger,
    });
    try {
      await listener.start();
    } catch (err) {
      logger.error('Sensor subscription failed', { error: errorMessage(err) });
    }
  } else {
    logger.warn('Sensor listener disabled: needs both a broker and a database');
  }

  let dispatchTimer: NodeJS.Timeout | undefined;
  const { alertStore, sensorStore, transport } = caps;
  if (config.dispatchIntervalMs && alertStore && sensorStore && transport) {
    let running = false;
    dispatchTimer = setInterval(() => {
      if (running) return;
      running = true;
      dispatchSensorAlerts(alertStore, sensorStore, transport)
        .catch((err: unknown) => {
          logger.error('Sensor alert dispatch failed', { error: errorMessage(err) });
        })
        .finally(() => {
          running = false;
        });
    }, config.dispatchIntervalMs);
    logger.info('Sensor alert dispatcher scheduled', { intervalMs: config.dispatchIntervalMs });
  }

  const stop = async () => {
    if (dispatchTimer) clearInterval(dispatchTimer);
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    if (listener) await listener.idle();
    await runtime.close();
    logger.info('Shutdown complete');
  };

  return { server, runtime, listener, stop };
}

if (require.main === module) {
  start()
    .then(({ stop }) => {
      let stopping = false;
      const shutdown = (signal: string) => {
        if (stopping) return;
        stopping = true;
        console.log(`Received ${signal}, shutting down...`);
        // Force exit if not closed in 10s
        setTimeout(() => {
          console.error('Force exiting after 10s.');
          process.exit(1);
        }, 10000).unref();
        stop()
          .then(() => process.exit(0))
          .catch((err: unknown) => {
            console.error('Error during shutdown:', err);
            process.exit(1);
          });
      };
      process.on('SIGTERM', () => shutdown('SIGTERM'));
      process.on('SIGINT', () => shutdown('SIGINT'));
    })
    .catch((err: unknown) => {
      console.error('Fatal error during startup:', err);
      process.exit(1);
    });
}
