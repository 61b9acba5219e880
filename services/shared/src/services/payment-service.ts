import type { UnitOfWork } from '../db/unit-of-work';
import type { GatewayOutcome, Order, Payment, RequestContext } from '../types/commerce.types';
import { assertPaidMatchesCaptured } from '../domain/invariants';
import { OPEN_PAYMENT_STATUSES, orderStateMachine, paymentStateMachine } from '../domain/state-machines';
import { InvalidQuantityError, InvalidTransitionError, PaymentNotFoundError } from '../utils/errors';
import { logger } from '../utils/logger';
import { paymentSnapshot, recordAudit } from './audit';
import { OrderService } from './order-service';

export type CaptureResult =
     | { status: 'OK'; payment: Payment; order: Order }
     | { status: 'FAILED'; payment: Payment; reason: string };

export class PaymentService {
     constructor(private readonly orders: OrderService) {}

     async getPayment(uow: UnitOfWork, paymentId: number): Promise<Payment> {
          const payment = await uow.payments.findById(paymentId);
          if (!payment) {
               throw new PaymentNotFoundError(paymentId);
          }
          return payment;
     }

     async listPayments(uow: UnitOfWork, orderId: number): Promise<Payment[]> {
          await this.orders.getOrder(uow, orderId);
          return uow.payments.listByOrderId(orderId);
     }

     /**
      * New payment attempt for a pending order whose previous attempts failed
      */
     async createPayment(uow: UnitOfWork, ctx: RequestContext, orderId: number): Promise<Payment> {
          const order = await this.orders.lockOrder(uow, orderId);
          if (order.status !== 'pending') {
               throw new InvalidTransitionError(
                    'order',
                    order.status,
                    'paid',
                    'payments can only be created for pending orders'
               );
          }

          const existing = await uow.payments.listByOrderId(order.id);
          const open = existing.find((p) => OPEN_PAYMENT_STATUSES.includes(p.status));
          if (open) {
               throw new InvalidTransitionError(
                    'payment',
                    open.status,
                    'initiated',
                    `order ${order.orderNumber} already has open payment ${open.id}`
               );
          }

          const payment = await uow.payments.insert({
               orderId: order.id,
               method: order.paymentMethod,
               amount: order.totalAmount,
          });
          await recordAudit(uow, ctx, {
               action: 'payment.create',
               entityType: 'payment',
               entityId: payment.id,
               before: null,
               after: paymentSnapshot(payment),
          });

          logger.info({ orderId, paymentId: payment.id, attempt: existing.length + 1 }, 'Payment attempt created');
          return payment;
     }

     /**
      * initiated -> authorized, reported by the gateway before capture
      */
     async authorize(
          uow: UnitOfWork,
          ctx: RequestContext,
          paymentId: number,
          gatewayReference?: string
     ): Promise<Payment> {
          const { payment } = await this.lockOrderAndPayment(uow, paymentId);
          if (payment.method === 'cash_on_delivery') {
               throw new InvalidTransitionError(
                    'payment',
                    payment.status,
                    'authorized',
                    'cash on delivery payments are not authorized by a gateway'
               );
          }
          return this.authorizeLocked(uow, ctx, payment, gatewayReference);
     }

     /**
      * Gateway callback. A success captures the payment and marks the order paid in
      * the same transaction; a failure only fails the payment.
      */
     async capturePayment(
          uow: UnitOfWork,
          ctx: RequestContext,
          paymentId: number,
          outcome: GatewayOutcome
     ): Promise<CaptureResult> {
          const { order, payment } = await this.lockOrderAndPayment(uow, paymentId);
          if (payment.method === 'cash_on_delivery') {
               throw new InvalidTransitionError(
                    'payment',
                    payment.status,
                    'captured',
                    'cash on delivery payments are captured by delivery confirmation'
               );
          }
          return this.settle(uow, ctx, order, payment, outcome, null);
     }

     /**
      * Manual capture of a cash-on-delivery payment once the courier has the cash
      */
     async confirmCashOnDelivery(
          uow: UnitOfWork,
          ctx: RequestContext,
          paymentId: number,
          cashReceived?: number
     ): Promise<CaptureResult> {
          const { order, payment } = await this.lockOrderAndPayment(uow, paymentId);
          if (payment.method !== 'cash_on_delivery') {
               throw new InvalidTransitionError(
                    'payment',
                    payment.status,
                    'captured',
                    `${payment.method} payments are captured by the gateway`
               );
          }

          const received = cashReceived ?? payment.amount;
          if (!Number.isInteger(received) || received < payment.amount) {
               throw new InvalidQuantityError(
                    `Cash received (${received}) must be an integer covering the amount due (${payment.amount})`
               );
          }
          return this.settle(uow, ctx, order, payment, { result: 'success' }, received);
     }

     private async settle(
          uow: UnitOfWork,
          ctx: RequestContext,
          order: Order,
          payment: Payment,
          outcome: GatewayOutcome,
          cashReceived: number | null
     ): Promise<CaptureResult> {
          if (outcome.result === 'failure') {
               paymentStateMachine.assertTransition(payment.status, 'failed');
               const failed: Payment = { ...payment, status: 'failed', failureReason: outcome.reason };
               await uow.payments.update(failed);
               await recordAudit(uow, ctx, {
                    action: 'payment.fail',
                    entityType: 'payment',
                    entityId: payment.id,
                    before: paymentSnapshot(payment),
                    after: paymentSnapshot(failed),
               });

               logger.warn({ paymentId: payment.id, orderId: order.id, reason: outcome.reason }, 'Payment failed');
               return { status: 'FAILED', payment: failed, reason: outcome.reason };
          }

          orderStateMachine.assertTransition(order.status, 'paid');

          let current = payment;
          if (current.status === 'initiated') {
               current = await this.authorizeLocked(uow, ctx, current, outcome.reference);
          }
          paymentStateMachine.assertTransition(current.status, 'captured');

          const captured: Payment = {
               ...current,
               status: 'captured',
               capturedAt: new Date(),
               gatewayReference: outcome.reference ?? current.gatewayReference,
               cashReceived,
          };
          await uow.payments.update(captured);
          await recordAudit(uow, ctx, {
               action: 'payment.capture',
               entityType: 'payment',
               entityId: payment.id,
               before: paymentSnapshot(current),
               after: { ...paymentSnapshot(captured), cashReceived },
          });

          const paid = await this.orders.markPaid(uow, ctx, order, captured);
          assertPaidMatchesCaptured(paid, captured);

          logger.info(
               { paymentId: payment.id, orderId: order.id, orderNumber: order.orderNumber, amount: payment.amount },
               'Payment captured'
          );
          return { status: 'OK', payment: captured, order: paid };
     }

     private async authorizeLocked(
          uow: UnitOfWork,
          ctx: RequestContext,
          payment: Payment,
          gatewayReference?: string
     ): Promise<Payment> {
          paymentStateMachine.assertTransition(payment.status, 'authorized');

          const authorized: Payment = {
               ...payment,
               status: 'authorized',
               authorizedAt: new Date(),
               gatewayReference: gatewayReference ?? payment.gatewayReference,
          };
          await uow.payments.update(authorized);
          await recordAudit(uow, ctx, {
               action: 'payment.authorize',
               entityType: 'payment',
               entityId: payment.id,
               before: paymentSnapshot(payment),
               after: paymentSnapshot(authorized),
          });
          return authorized;
     }

     /** Order first, then payment, matching every other writer */
     private async lockOrderAndPayment(
          uow: UnitOfWork,
          paymentId: number
     ): Promise<{ order: Order; payment: Payment }> {
          const unlocked = await this.getPayment(uow, paymentId);
          const order = await this.orders.lockOrder(uow, unlocked.orderId);
          const payment = await uow.payments.findByIdForUpdate(paymentId);
          if (!payment) {
               throw new PaymentNotFoundError(paymentId);
          }
          return { order, payment };
     }
}
