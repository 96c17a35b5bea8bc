import { InvalidTransitionError } from '../../../src/common/errors/domain-errors';
import {
  ORDER_STATUSES,
  OrderLifecycle,
  OrderStatus,
  allowedTransitions,
  canTransition,
  isOrderStatus,
  isTerminal,
  transition,
} from '../../../src/modules/orders/order-status';

const EDGES: Array<[OrderStatus, OrderStatus]> = [
  ['CREATED', 'PAYMENT_PENDING'],
  ['CREATED', 'CANCELLED'],
  ['PAYMENT_PENDING', 'PAYMENT_CONFIRMED'],
  ['PAYMENT_PENDING', 'CANCELLED'],
  ['PAYMENT_CONFIRMED', 'PROCESSING'],
  ['PAYMENT_CONFIRMED', 'CANCELLED'],
  ['PROCESSING', 'COMPLETED'],
  ['PROCESSING', 'CANCELLED'],
];

function lifecycle(status: OrderStatus, updatedAt = new Date('2026-01-01T00:00:00.000Z')): OrderLifecycle {
  return {
    status,
    updatedAt,
    completedAt: null,
    cancelledAt: null,
    cancellationReason: null,
  };
}

describe('order status machine', () => {
  describe('canTransition', () => {
    it('accepts exactly the edges in the transition table', () => {
      for (const from of ORDER_STATUSES) {
        for (const to of ORDER_STATUSES) {
          const expected = EDGES.some(([a, b]) => a === from && b === to);
          expect({ from, to, allowed: canTransition(from, to) }).toEqual({
            from,
            to,
            allowed: expected,
          });
        }
      }
    });

    it('never allows a status to transition to itself', () => {
      for (const status of ORDER_STATUSES) {
        expect(canTransition(status, status)).toBe(false);
      }
    });
  });

  describe('isTerminal / allowedTransitions', () => {
    it('treats COMPLETED and CANCELLED as terminal', () => {
      expect(ORDER_STATUSES.filter(isTerminal)).toEqual(['COMPLETED', 'CANCELLED']);
    });

    it('lists destinations in declaration order', () => {
      expect(allowedTransitions('CREATED')).toEqual(['PAYMENT_PENDING', 'CANCELLED']);
      expect(allowedTransitions('PROCESSING')).toEqual(['COMPLETED', 'CANCELLED']);
      expect(allowedTransitions('COMPLETED')).toEqual([]);
    });
  });

  describe('isOrderStatus', () => {
    it('recognises only known statuses', () => {
      expect(isOrderStatus('PAYMENT_PENDING')).toBe(true);
      expect(isOrderStatus('payment_pending')).toBe(false);
      expect(isOrderStatus(3)).toBe(false);
    });
  });

  describe('transition', () => {
    it('returns a moved copy and leaves the input untouched', () => {
      // given
      const order = lifecycle('CREATED');
      const at = new Date('2026-01-01T00:05:00.000Z');

      // when
      const next = transition(order, 'PAYMENT_PENDING', { at });

      // then
      expect(next).toEqual({
        status: 'PAYMENT_PENDING',
        updatedAt: at,
        completedAt: null,
        cancelledAt: null,
        cancellationReason: null,
      });
      expect(order.status).toBe('CREATED');
    });

    it('stamps completedAt when entering COMPLETED', () => {
      const at = new Date('2026-01-02T00:00:00.000Z');

      const next = transition(lifecycle('PROCESSING'), 'COMPLETED', { at });

      expect(next.completedAt).toEqual(at);
      expect(next.cancelledAt).toBeNull();
      expect(next.cancellationReason).toBeNull();
    });

    it('stamps cancelledAt and the reason when entering CANCELLED', () => {
      const at = new Date('2026-01-02T00:00:00.000Z');

      const next = transition(lifecycle('PAYMENT_CONFIRMED'), 'CANCELLED', {
        at,
        reason: 'customer request',
      });

      expect(next.cancelledAt).toEqual(at);
      expect(next.cancellationReason).toBe('customer request');
      expect(next.completedAt).toBeNull();
    });

    it('stores an empty reason when cancelling without one', () => {
      const next = transition(lifecycle('CREATED'), 'CANCELLED');

      expect(next.cancellationReason).toBe('');
    });

    it('keeps updatedAt strictly increasing when the clock lags', () => {
      const updatedAt = new Date('2026-01-01T00:00:00.000Z');
      const earlier = new Date('2025-12-31T23:59:59.000Z');

      const next = transition(lifecycle('CREATED', updatedAt), 'PAYMENT_PENDING', {
        at: earlier,
      });

      expect(next.updatedAt.toISOString()).toBe('2026-01-01T00:00:00.001Z');
    });

    it('rejects an edge outside the table, naming both states', () => {
      const order = lifecycle('CREATED');

      expect(() => transition(order, 'COMPLETED')).toThrow(InvalidTransitionError);
      expect(() => transition(order, 'COMPLETED')).toThrow(
        'Cannot transition order from CREATED to COMPLETED',
      );
      expect(order.status).toBe('CREATED');
    });

    it.each(['COMPLETED', 'CANCELLED'] as const)(
      'rejects every transition out of terminal %s',
      (terminal) => {
        for (const to of ORDER_STATUSES) {
          expect(() => transition(lifecycle(terminal), to)).toThrow(
            InvalidTransitionError,
          );
        }
      },
    );
  });
});
