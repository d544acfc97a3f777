import Joi from 'joi';

export interface DatabaseConfig {
  connectionString: string;
}

export interface BrokerConfig {
  url: string;
  port: number;
  username?: string;
  password?: string;
  clientId: string;
  publishTimeoutMs: number;
}

export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test' | 'ci';
  port: number;
  logLevel: string;
  corsOrigin: string;
  // Absent collaborators degrade their stage instead of stopping the process
  database?: DatabaseConfig;
  broker?: BrokerConfig;
  alertTopicPrefix: string;
  sensorTopics: string[];
  sensorQueueLimit: number;
  dispatchIntervalMs?: number;
}

interface EnvVars {
  NODE_ENV: AppConfig['nodeEnv'];
  PORT: number;
  LOG_LEVEL: string;
  CORS_ORIGIN: string;
  DATABASE_URL?: string;
  BROKER_URL?: string;
  BROKER_PORT: number;
  BROKER_USERNAME?: string;
  BROKER_PASSWORD?: string;
  BROKER_CLIENT_ID?: string;
  BROKER_PUBLISH_TIMEOUT_MS: number;
  ALERT_TOPIC_PREFIX: string;
  SENSOR_TOPICS: string;
  SENSOR_QUEUE_LIMIT: number;
  DISPATCH_INTERVAL_MS?: number;
}

// Validate and load environment variables
const envSchema = Joi.object<EnvVars>({
  NODE_ENV: Joi.string().valid('development', 'production', 'test', 'ci').default('development'),
  PORT: Joi.number().integer().min(1).max(65535).default(3000),
  LOG_LEVEL: Joi.string().valid('error', 'warn', 'info', 'http', 'verbose', 'debug').default('info'),
  CORS_ORIGIN: Joi.string().default('*'),
  DATABASE_URL: Joi.string()
    .uri({ scheme: ['postgres', 'postgresql'] })
    .empty('')
    .optional(),
  BROKER_URL: Joi.string()
    .uri({ scheme: ['mqtt', 'mqtts', 'ws', 'wss'] })
    .empty('')
    .optional(),
  BROKER_PORT: Joi.number().integer().min(1).max(65535).default(8883),
  BROKER_USERNAME: Joi.string().empty('').optional(),
  BROKER_PASSWORD: Joi.string().empty('').optional(),
  BROKER_CLIENT_ID: Joi.string().empty('').optional(),
  BROKER_PUBLISH_TIMEOUT_MS: Joi.number().integer().min(100).default(10000),
  ALERT_TOPIC_PREFIX: Joi.string()
    .pattern(/^[^#+]+$/)
    .default('alerts'),
  SENSOR_TOPICS: Joi.string().default('rainfall/status'),
  SENSOR_QUEUE_LIMIT: Joi.number().integer().min(1).default(1000),
  DISPATCH_INTERVAL_MS: Joi.number().integer().min(1000).empty('').optional(),
}).unknown();

export class ConfigError extends Error {
  constructor(public readonly details: string[]) {
    super(`Invalid environment configuration: ${details.join(', ')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const { value, error } = envSchema.validate(env, { abortEarly: false });
  if (error) {
    throw new ConfigError(error.details.map((d: Joi.ValidationErrorItem) => d.message));
  }

  return {
    nodeEnv: value.NODE_ENV,
    port: value.PORT,
    logLevel: value.LOG_LEVEL,
    corsOrigin: value.CORS_ORIGIN,
    database: value.DATABASE_URL ? { connectionString: value.DATABASE_URL } : undefined,
    broker: value.BROKER_URL
      ? {
          url: value.BROKER_URL,
          port: value.BROKER_PORT,
          username: value.BROKER_USERNAME,
          password: value.BROKER_PASSWORD,
          clientId: value.BROKER_CLIENT_ID || `cap-alert-pipeline-${process.pid}`,
          publishTimeoutMs: value.BROKER_PUBLISH_TIMEOUT_MS,
        }
      : undefined,
    alertTopicPrefix: value.ALERT_TOPIC_PREFIX,
    sensorTopics: value.SENSOR_TOPICS.split(',')
      .map((t) => t.trim())
      .filter(Boolean),
    sensorQueueLimit: value.SENSOR_QUEUE_LIMIT,
    dispatchIntervalMs: value.DISPATCH_INTERVAL_MS,
  };
}
