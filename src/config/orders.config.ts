import { intFromEnv } from './env';

export interface OrdersConfig {
  maxItems: number;
  defaultCurrency: string;
  maxConflictRetries: number;
}

export default () => ({
  orders: {
    maxItems: intFromEnv('ORDER_MAX_ITEMS', 50),
    defaultCurrency: process.env.ORDER_DEFAULT_CURRENCY || 'USD',
    maxConflictRetries: intFromEnv('ORDER_MAX_CONFLICT_RETRIES', 3),
  } satisfies OrdersConfig,
});
