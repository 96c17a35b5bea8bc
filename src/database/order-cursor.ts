import { ValidationError } from '../common/errors/domain-errors';

export interface OrderCursor {
  createdAt: Date;
  id: string;
}

export function encodeOrderCursor(cursor: OrderCursor): string {
  return Buffer.from(
    JSON.stringify({ createdAt: cursor.createdAt.toISOString(), id: cursor.id }),
  ).toString('base64');
}

export function decodeOrderCursor(raw: string): OrderCursor {
  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(raw, 'base64').toString('utf8'));
  } catch {
    throw new ValidationError('Malformed pagination cursor', { cursor: raw });
  }
  if (
    typeof parsed !== 'object' ||
    parsed === null ||
    !('createdAt' in parsed) ||
    !('id' in parsed) ||
    typeof parsed.createdAt !== 'string' ||
    typeof parsed.id !== 'string'
  ) {
    throw new ValidationError('Malformed pagination cursor', { cursor: raw });
  }
  const createdAt = new Date(parsed.createdAt);
  if (Number.isNaN(createdAt.getTime())) {
    throw new ValidationError('Malformed pagination cursor', { cursor: raw });
  }
  return { createdAt, id: parsed.id };
}
