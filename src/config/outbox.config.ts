import { boolFromEnv, intFromEnv } from './env';

export interface OutboxConfig {
  enabled: boolean;
  pollIntervalMs: number;
  batchSize: number;
  maxRetries: number;
  publishTimeoutMs: number;
}

export default () => ({
  outbox: {
    enabled: boolFromEnv('OUTBOX_ENABLED', true),
    pollIntervalMs: intFromEnv('OUTBOX_POLL_INTERVAL_MS', 1000),
    batchSize: intFromEnv('OUTBOX_BATCH_SIZE', 100),
    maxRetries: intFromEnv('OUTBOX_MAX_RETRIES', 3),
    publishTimeoutMs: intFromEnv('OUTBOX_PUBLISH_TIMEOUT_MS', 5000),
  } satisfies OutboxConfig,
});
