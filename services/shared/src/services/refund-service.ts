import type { UnitOfWork } from '../db/unit-of-work';
import type {
     Order,
     Payment,
     Refund,
     RefundReason,
     RefundRequest,
     RequestContext,
} from '../types/commerce.types';
import { paymentStateMachine, refundStateMachine } from '../domain/state-machines';
import {
     InvalidQuantityError,
     InvalidTransitionError,
     OrderNotFoundError,
     PaymentNotFoundError,
     RefundNotFoundError,
} from '../utils/errors';
import { logger } from '../utils/logger';
import { orderSnapshot, paymentSnapshot, recordAudit, refundSnapshot } from './audit';
import { StockLedgerService } from './stock-ledger-service';

export interface OpenRefundOptions {
     reason: RefundReason;
     amount?: number;
     description?: string | null;
}

export interface CompletedRefund {
     refund: Refund;
     payment: Payment;
     order: Order;
}

const REFUNDABLE_ORDER_STATUSES: ReadonlyArray<Order['status']> = ['cancelled', 'returned'];

export class RefundService {
     constructor(private readonly ledger: StockLedgerService) {}

     /**
      * Ask for a refund of the captured payment of a cancelled or returned order
      */
     async requestRefund(uow: UnitOfWork, ctx: RequestContext, request: RefundRequest): Promise<Refund> {
          const order = await uow.orders.findByIdForUpdate(request.orderId);
          if (!order) {
               throw new OrderNotFoundError(request.orderId);
          }
          if (!REFUNDABLE_ORDER_STATUSES.includes(order.status)) {
               throw new InvalidTransitionError(
                    'order',
                    order.status,
                    'refund',
                    'refunds are requested for cancelled or returned orders'
               );
          }

          const payment = await this.lockCapturedPayment(uow, order);
          return this.openRefund(uow, ctx, order, payment, {
               reason: request.reason,
               amount: request.amount,
               description: request.description,
          });
     }

     /**
      * Open a pending refund. The caller holds the order and payment locks.
      */
     async openRefund(
          uow: UnitOfWork,
          ctx: RequestContext,
          order: Order,
          payment: Payment,
          options: OpenRefundOptions
     ): Promise<Refund> {
          if (payment.status !== 'captured') {
               throw new InvalidTransitionError(
                    'payment',
                    payment.status,
                    'refunded',
                    'only captured payments can be refunded'
               );
          }

          const existing = await uow.refunds.listByPaymentId(payment.id);
          const open = existing.find((r) => r.status !== 'failed');
          if (open) {
               throw new InvalidTransitionError(
                    'refund',
                    open.status,
                    'pending',
                    `payment ${payment.id} already has refund ${open.id}`
               );
          }

          const amount = options.amount ?? payment.amount;
          if (!Number.isInteger(amount) || amount <= 0 || amount > payment.amount) {
               throw new InvalidQuantityError(
                    `Refund amount must be an integer between 1 and ${payment.amount}, got ${amount}`
               );
          }

          const refund = await uow.refunds.insert({
               paymentId: payment.id,
               orderId: order.id,
               amount,
               reason: options.reason,
               description: options.description ?? null,
               requestedBy: ctx.actor,
          });

          await recordAudit(uow, ctx, {
               action: 'refund.request',
               entityType: 'refund',
               entityId: refund.id,
               before: null,
               after: refundSnapshot(refund),
          });
          await uow.events.enqueue('RefundRequested', {
               refundId: refund.id,
               orderId: order.id,
               orderNumber: order.orderNumber,
               paymentId: payment.id,
               amount,
               reason: refund.reason,
          });

          logger.info(
               { refundId: refund.id, orderId: order.id, paymentId: payment.id, amount, reason: refund.reason },
               'Refund requested'
          );
          return refund;
     }

     async startRefund(uow: UnitOfWork, ctx: RequestContext, refundId: number): Promise<Refund> {
          const refund = await this.lockRefund(uow, refundId);
          refundStateMachine.assertTransition(refund.status, 'processing');

          const next: Refund = {
               ...refund,
               status: 'processing',
               processedBy: ctx.actor,
               processedAt: new Date(),
          };
          await uow.refunds.update(next);
          await recordAudit(uow, ctx, {
               action: 'refund.start',
               entityType: 'refund',
               entityId: refund.id,
               before: refundSnapshot(refund),
               after: refundSnapshot(next),
          });

          logger.info({ refundId }, 'Refund processing started');
          return next;
     }

     /**
      * Complete a refund: the payment becomes refunded and, when the order's units
      * were deducted and never put back, compensating return movements restock them.
      */
     async completeRefund(uow: UnitOfWork, ctx: RequestContext, refundId: number): Promise<CompletedRefund> {
          const unlocked = await uow.refunds.findById(refundId);
          if (!unlocked) {
               throw new RefundNotFoundError(refundId);
          }

          const order = await uow.orders.findByIdForUpdate(unlocked.orderId);
          if (!order) {
               throw new OrderNotFoundError(unlocked.orderId);
          }
          const payment = await uow.payments.findByIdForUpdate(unlocked.paymentId);
          if (!payment) {
               throw new PaymentNotFoundError(unlocked.paymentId);
          }
          const refund = await this.lockRefund(uow, refundId);

          refundStateMachine.assertTransition(refund.status, 'completed');
          paymentStateMachine.assertTransition(payment.status, 'refunded');

          const now = new Date();
          const refundedPayment: Payment = { ...payment, status: 'refunded', refundedAt: now };
          await uow.payments.update(refundedPayment);
          await recordAudit(uow, ctx, {
               action: 'payment.refund',
               entityType: 'payment',
               entityId: payment.id,
               before: paymentSnapshot(payment),
               after: paymentSnapshot(refundedPayment),
          });

          let nextOrder = order;
          if (order.stockState === 'committed') {
               await this.ledger.returnItems(
                    uow,
                    ctx,
                    order.items,
                    'order_return',
                    `refund ${refund.id}`,
                    order.orderNumber
               );
               nextOrder = { ...order, stockState: 'restocked', updatedAt: now };
               await uow.orders.update(nextOrder);
               await recordAudit(uow, ctx, {
                    action: 'order.restock',
                    entityType: 'order',
                    entityId: order.id,
                    before: orderSnapshot(order),
                    after: orderSnapshot(nextOrder),
               });
          }

          const completed: Refund = {
               ...refund,
               status: 'completed',
               processedBy: refund.processedBy ?? ctx.actor,
               processedAt: refund.processedAt ?? now,
               completedAt: now,
          };
          await uow.refunds.update(completed);
          await recordAudit(uow, ctx, {
               action: 'refund.complete',
               entityType: 'refund',
               entityId: refund.id,
               before: refundSnapshot(refund),
               after: refundSnapshot(completed),
          });
          await uow.events.enqueue('RefundProcessed', {
               refundId: refund.id,
               orderId: order.id,
               orderNumber: order.orderNumber,
               paymentId: payment.id,
               amount: refund.amount,
          });

          logger.info(
               { refundId, orderId: order.id, paymentId: payment.id, restocked: order.stockState === 'committed' },
               'Refund completed'
          );
          return { refund: completed, payment: refundedPayment, order: nextOrder };
     }

     async failRefund(uow: UnitOfWork, ctx: RequestContext, refundId: number, reason: string): Promise<Refund> {
          const refund = await this.lockRefund(uow, refundId);
          refundStateMachine.assertTransition(refund.status, 'failed');

          const failed: Refund = {
               ...refund,
               status: 'failed',
               failureReason: reason,
               processedBy: refund.processedBy ?? ctx.actor,
               processedAt: refund.processedAt ?? new Date(),
          };
          await uow.refunds.update(failed);
          await recordAudit(uow, ctx, {
               action: 'refund.fail',
               entityType: 'refund',
               entityId: refund.id,
               before: refundSnapshot(refund),
               after: { ...refundSnapshot(failed), failureReason: reason },
          });

          logger.warn({ refundId, reason }, 'Refund failed');
          return failed;
     }

     async getRefund(uow: UnitOfWork, refundId: number): Promise<Refund> {
          const refund = await uow.refunds.findById(refundId);
          if (!refund) {
               throw new RefundNotFoundError(refundId);
          }
          return refund;
     }

     /** Lock the captured payment of an order */
     async lockCapturedPayment(uow: UnitOfWork, order: Order): Promise<Payment> {
          const payments = await uow.payments.listByOrderId(order.id);
          const captured = payments.find((p) => p.status === 'captured');
          if (!captured) {
               throw new InvalidTransitionError(
                    'order',
                    order.status,
                    'refund',
                    `order ${order.orderNumber} has no captured payment`
               );
          }
          const locked = await uow.payments.findByIdForUpdate(captured.id);
          if (!locked || locked.status !== 'captured') {
               throw new InvalidTransitionError(
                    'payment',
                    locked?.status ?? 'missing',
                    'refunded',
                    'payment changed while locking'
               );
          }
          return locked;
     }

     private async lockRefund(uow: UnitOfWork, refundId: number): Promise<Refund> {
          const refund = await uow.refunds.findByIdForUpdate(refundId);
          if (!refund) {
               throw new RefundNotFoundError(refundId);
          }
          return refund;
     }
}
