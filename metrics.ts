import client from 'prom-client';

// Default metrics
client.collectDefaultMetrics();

// Custom metrics
export const alertsIngestedCounter = new client.Counter({
  name: 'cap_alerts_ingested_total',
  help: 'Alert records processed by the store, by outcome',
  labelNames: ['outcome'],
});

export const alertsCategorizedCounter = new client.Counter({
  name: 'cap_alerts_categorized_total',
  help: 'Alert records categorized, by category slug',
  labelNames: ['category'],
});

export const topicPublishCounter = new client.Counter({
  name: 'mqtt_publishes_total',
  help: 'Payloads published to the broker, by kind and outcome',
  labelNames: ['kind', 'outcome'],
});

export const sensorMessagesCounter = new client.Counter({
  name: 'sensor_messages_total',
  help: 'Sensor telemetry messages received, by outcome',
  labelNames: ['outcome'],
});

export const register = client.register;
