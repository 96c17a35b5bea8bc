export default () => ({
  kafka: {
    clientId: process.env.KAFKA_CLIENT_ID || 'order-service',
    brokers: (process.env.KAFKA_BROKERS || 'localhost:9092')
      .split(',')
      .map((broker) => broker.trim())
      .filter((broker) => broker.length > 0),
    topicPrefix: process.env.KAFKA_TOPIC_PREFIX || 'events',
  },
});
