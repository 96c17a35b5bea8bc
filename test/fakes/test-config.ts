import { ConfigService } from '@nestjs/config';
import type { OrdersConfig } from '../../src/config/orders.config';
import type { OutboxConfig } from '../../src/config/outbox.config';

export function testConfig(
  overrides: { orders?: Partial<OrdersConfig>; outbox?: Partial<OutboxConfig> } = {},
): ConfigService {
  return new ConfigService({
    app: { port: 0, serviceName: 'order-service-test' },
    kafka: { clientId: 'test', brokers: ['localhost:9092'], topicPrefix: 'events' },
    orders: {
      maxItems: 5,
      defaultCurrency: 'USD',
      maxConflictRetries: 3,
      ...overrides.orders,
    },
    outbox: {
      enabled: true,
      pollIntervalMs: 1000,
      batchSize: 100,
      maxRetries: 3,
      publishTimeoutMs: 5000,
      ...overrides.outbox,
    },
  });
}
