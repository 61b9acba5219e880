import type { OrderStatus, PaymentStatus, RefundStatus } from '../types/commerce.types';
import { InvalidTransitionError } from '../utils/errors';

export type TransitionTable<S extends string> = Readonly<Record<S, readonly S[]>>;

export class StateMachine<S extends string> {
     constructor(
          private readonly entity: string,
          private readonly transitions: TransitionTable<S>
     ) {}

     canTransition(from: S, to: S): boolean {
          return this.transitions[from].includes(to);
     }

     assertTransition(from: S, to: S): void {
          if (!this.canTransition(from, to)) {
               throw new InvalidTransitionError(this.entity, from, to);
          }
     }

     isTerminal(state: S): boolean {
          return this.transitions[state].length === 0;
     }
}

export const orderStateMachine = new StateMachine<OrderStatus>('order', {
     pending: ['paid', 'cancelled'],
     paid: ['shipped', 'cancelled'],
     shipped: ['delivered'],
     delivered: ['returned'],
     cancelled: [],
     returned: [],
});

export const paymentStateMachine = new StateMachine<PaymentStatus>('payment', {
     initiated: ['authorized', 'failed'],
     authorized: ['captured', 'failed'],
     captured: ['refunded'],
     failed: [],
     refunded: [],
});

export const refundStateMachine = new StateMachine<RefundStatus>('refund', {
     pending: ['processing', 'completed', 'failed'],
     processing: ['completed', 'failed'],
     completed: [],
     failed: [],
});

/** Payment states that block creating another payment for the same order */
export const OPEN_PAYMENT_STATUSES: readonly PaymentStatus[] = ['initiated', 'authorized', 'captured'];
