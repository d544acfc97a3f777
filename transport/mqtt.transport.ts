import { connect, type IClientPublishOptions, type MqttClient } from 'mqtt';
import type winston from 'winston';
import type { BrokerConfig } from '../config.js';

export type TelemetryHandler = (topic: string, payload: Buffer) => void;

// What the dissemination side needs from a broker
export interface AlertTransport {
  publish(topic: string, payload: string): Promise<void>;
}

// What the sensor listener needs from a broker
export interface TelemetrySource {
  subscribe(topics: readonly string[], handler: TelemetryHandler): Promise<void>;
}

type QoS = NonNullable<IClientPublishOptions['qos']>;

export const DEFAULT_PUBLISH_TIMEOUT_MS = 10_000;

/**
 * Thin adapter over an mqtt.js client. Reconnects are left to mqtt.js.
 * Publishing rejects at once while disconnected, and a publish the broker
 * has not acknowledged within `publishTimeoutMs` rejects too.
 */
export class MqttTransport implements AlertTransport, TelemetrySource {
  constructor(
    private readonly client: MqttClient,
    private readonly qos: QoS = 1,
    private readonly publishTimeoutMs: number = DEFAULT_PUBLISH_TIMEOUT_MS,
  ) {}

  async publish(topic: string, payload: string): Promise<void> {
    if (!this.client.connected) {
      throw new Error(`MQTT client is not connected, cannot publish to ${topic}`);
    }
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new Error(`MQTT publish to ${topic} timed out after ${this.publishTimeoutMs}ms`)),
        this.publishTimeoutMs,
      );
    });
    try {
      await Promise.race([this.client.publishAsync(topic, payload, { qos: this.qos }), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  async subscribe(topics: readonly string[], handler: TelemetryHandler): Promise<void> {
    this.client.on('message', (topic, payload) => handler(topic, payload));
    await this.client.subscribeAsync([...topics], { qos: this.qos });
  }

  async close(): Promise<void> {
    await this.client.endAsync();
  }
}

export function connectMqtt(config: BrokerConfig, logger: winston.Logger): MqttTransport {
  const client = connect(config.url, {
    port: config.port,
    username: config.username,
    password: config.password,
    clientId: config.clientId,
    protocolVersion: 5,
    keepalive: 60,
    queueQoSZero: false,
  });

  client.on('connect', () => {
    logger.info('Connected to MQTT broker', { url: config.url, port: config.port });
  });
  client.on('reconnect', () => {
    logger.warn('Reconnecting to MQTT broker', { url: config.url });
  });
  client.on('close', () => {
    logger.warn('MQTT connection closed', { url: config.url });
  });
  client.on('error', (err) => {
    logger.error('MQTT client error', { error: err.message });
  });

  return new MqttTransport(client, 1, config.publishTimeoutMs);
}
