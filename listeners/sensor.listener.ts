import type winston from 'winston';
import type { TelemetrySource } from '../transport/mqtt.transport.js';
import { recordSensorMessage, type SensorStore } from '../services/sensor.service.js';
import { errorMessage } from '../middleware/error.js';
import { sensorMessagesCounter } from '../metrics.js';
import { logger as defaultLogger } from '../logger.js';

export interface SensorListenerOptions {
  topics: readonly string[];
  queueLimit: number;
  now?: () => Date;
  logger?: winston.Logger;
}

interface QueuedMessage {
  topic: string;
  payload: Buffer;
}

/**
 * Moves telemetry from the broker callback onto a bounded queue drained by
 * a single worker. When the queue is full the incoming message is dropped.
 */
export class SensorListener {
  private readonly queue: QueuedMessage[] = [];
  private draining: Promise<void> | null = null;
  private droppedCount = 0;
  private readonly log: winston.Logger;

  constructor(
    private readonly source: TelemetrySource,
    private readonly store: SensorStore,
    private readonly options: SensorListenerOptions,
  ) {
    this.log = options.logger ?? defaultLogger;
  }

  async start(): Promise<void> {
    await this.source.subscribe(this.options.topics, (topic, payload) => {
      this.enqueue(topic, payload);
    });
    this.log.info('Sensor listener subscribed', { topics: this.options.topics });
  }

  /** Returns false when the message was dropped. */
  enqueue(topic: string, payload: Buffer): boolean {
    if (this.queue.length >= this.options.queueLimit) {
      this.droppedCount++;
      sensorMessagesCounter.inc({ outcome: 'dropped' });
      this.log.warn('Sensor queue full, dropping message', {
        topic,
        queueLimit: this.options.queueLimit,
      });
      return false;
    }
    this.queue.push({ topic, payload });
    if (!this.draining) this.draining = this.drain();
    return true;
  }

  get pending(): number {
    return this.queue.length;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  /** Resolves once the queue is empty and the worker has stopped. */
  idle(): Promise<void> {
    return this.draining ?? Promise.resolve();
  }

  private async drain(): Promise<void> {
    let message = this.queue.shift();
    while (message) {
      try {
        await recordSensorMessage(this.store, message.topic, message.payload, this.options.now);
      } catch (err) {
        sensorMessagesCounter.inc({ outcome: 'failed' });
        this.log.error('Failed to store sensor message', {
          topic: message.topic,
          error: errorMessage(err),
        });
      }
      message = this.queue.shift();
    }
    this.draining = null;
  }
}
