import type { JsonObject } from '../modules/outbox/outbox-event.entity';

export interface EventEnvelope<T = JsonObject> {
  id: string;
  type: string;
  source: string;
  aggregateType: string;
  aggregateId: string;
  time: string;
  schemaVersion: '1';
  traceId?: string;
  data: T;
}
