// Wires the optional collaborators named in the config into stores and transports
import type winston from 'winston';
import type { AppConfig } from './config.js';
import { createPool, type Queryable } from './db.js';
import { PgAlertStore, type AlertStore } from './services/alert.service.js';
import { PgSensorStore, type SensorStore } from './services/sensor.service.js';
import {
  connectMqtt,
  type AlertTransport,
  type TelemetrySource,
} from './transport/mqtt.transport.js';
import { logger as defaultLogger } from './logger.js';

/**
 * What this process can reach. Every field is optional: a missing store or
 * transport turns the stages that need it into reported skips.
 */
export interface Capabilities {
  alertStore?: AlertStore;
  sensorStore?: SensorStore;
  transport?: AlertTransport;
  telemetry?: TelemetrySource;
  // Used by /readyz
  database?: Queryable;
}

export interface Runtime {
  capabilities: Capabilities;
  close(): Promise<void>;
}

export function describeCapabilities(caps: Capabilities): Record<string, boolean> {
  return {
    alertStore: caps.alertStore !== undefined,
    sensorStore: caps.sensorStore !== undefined,
    transport: caps.transport !== undefined,
    telemetry: caps.telemetry !== undefined,
  };
}

export function createRuntime(config: AppConfig, log: winston.Logger = defaultLogger): Runtime {
  const capabilities: Capabilities = {};
  const closers: Array<() => Promise<void>> = [];

  if (config.database) {
    const pool = createPool(config.database.connectionString);
    pool.on('error', (err) => {
      log.error('Idle PostgreSQL client error', { error: err.message });
    });
    capabilities.database = pool;
    capabilities.alertStore = new PgAlertStore(pool);
    capabilities.sensorStore = new PgSensorStore(pool);
    closers.push(() => pool.end());
  } else {
    log.warn('DATABASE_URL not set; alert and sensor storage disabled');
  }

  if (config.broker) {
    const transport = connectMqtt(config.broker, log);
    capabilities.transport = transport;
    capabilities.telemetry = transport;
    closers.push(() => transport.close());
  } else {
    log.warn('BROKER_URL not set; dissemination and sensor listening disabled');
  }

  log.info('Capabilities resolved', describeCapabilities(capabilities));

  return {
    capabilities,
    async close() {
      const results = await Promise.allSettled(closers.map((close) => close()));
      for (const result of results) {
        if (result.status === 'rejected') {
          log.error('Error while closing a collaborator', {
            error: result.reason instanceof Error ? result.reason.message : String(result.reason),
          });
        }
      }
    },
  };
}
