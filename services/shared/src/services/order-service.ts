import type { UnitOfWork } from '../db/unit-of-work';
import type {
     CreateOrderRequest,
     Order,
     OrderStatus,
     Payment,
     RefundReason,
     RequestContext,
     Refund,
} from '../types/commerce.types';
import { orderStateMachine } from '../domain/state-machines';
import {
     DomainError,
     InvalidQuantityError,
     InvalidTransitionError,
     OrderNotFoundError,
} from '../utils/errors';
import { logger } from '../utils/logger';
import { orderSnapshot, paymentSnapshot, recordAudit } from './audit';
import { ReservationService } from './reservation-service';
import { RefundService } from './refund-service';
import { StockLedgerService } from './stock-ledger-service';

export interface CreatedOrder {
     order: Order;
     payment: Payment;
}

export interface CancelOptions {
     reason?: string;
     /** Close reservations as EXPIRED instead of RELEASED */
     expired?: boolean;
}

export interface CancelledOrder {
     order: Order;
     /** Refund opened for the captured payment of a paid order */
     refund: Refund | null;
}

export interface ReturnOptions {
     reason?: RefundReason;
     description?: string;
     amount?: number;
}

export interface ReturnedOrder {
     order: Order;
     refund: Refund;
}

type TimestampField = 'paidAt' | 'shippedAt' | 'deliveredAt' | 'cancelledAt' | 'returnedAt';

const TIMESTAMP_FOR: Partial<Record<OrderStatus, TimestampField>> = {
     paid: 'paidAt',
     shipped: 'shippedAt',
     delivered: 'deliveredAt',
     cancelled: 'cancelledAt',
     returned: 'returnedAt',
};

export class OrderService {
     constructor(
          private readonly reservations: ReservationService,
          private readonly refunds: RefundService,
          private readonly ledger: StockLedgerService
     ) {}

     /**
      * Create a pending order: reserve every line, then record the order and its
      * initiated payment. Any failure rolls back the reservations with it.
      */
     async createOrder(uow: UnitOfWork, ctx: RequestContext, request: CreateOrderRequest): Promise<CreatedOrder> {
          const { customerId, paymentMethod, deliveryAddress, lines } = request;
          const deliveryFee = request.deliveryFee ?? 0;

          if (!customerId.trim()) {
               throw new DomainError('customerId is required', 'VALIDATION_ERROR', 400);
          }
          if (lines.length === 0) {
               throw new InvalidQuantityError('Order must have at least one line');
          }
          for (const line of lines) {
               if (!Number.isInteger(line.unitPrice) || line.unitPrice < 0) {
                    throw new InvalidQuantityError(
                         `Unit price must be a non-negative integer for product ${line.productId}`
                    );
               }
          }
          if (!Number.isInteger(deliveryFee) || deliveryFee < 0) {
               throw new InvalidQuantityError(`Delivery fee must be a non-negative integer, got ${deliveryFee}`);
          }

          const subtotal = lines.reduce((sum, line) => sum + line.quantity * line.unitPrice, 0);
          const totalAmount = subtotal + deliveryFee;

          logger.info({ customerId, lineCount: lines.length, totalAmount }, 'Creating order');

          // Numbered after stock is locked and checked; the counter row stays locked until commit
          const reservations = await this.reservations.reserveMany(
               uow,
               ctx,
               () => uow.orders.nextOrderNumber(new Date()),
               lines
          );
          const orderNumber = reservations[0].orderRef;

          const order = await uow.orders.insert({
               orderNumber,
               customerId,
               paymentMethod,
               deliveryAddress,
               subtotal,
               deliveryFee,
               totalAmount,
               items: lines.map((line, i) => ({
                    productId: line.productId,
                    quantity: line.quantity,
                    unitPrice: line.unitPrice,
                    reservationId: reservations[i].id,
               })),
          });
          const payment = await uow.payments.insert({
               orderId: order.id,
               method: paymentMethod,
               amount: totalAmount,
          });

          await recordAudit(uow, ctx, {
               action: 'order.create',
               entityType: 'order',
               entityId: order.id,
               before: null,
               after: { ...orderSnapshot(order), orderNumber, totalAmount },
          });
          await recordAudit(uow, ctx, {
               action: 'payment.create',
               entityType: 'payment',
               entityId: payment.id,
               before: null,
               after: paymentSnapshot(payment),
          });

          logger.info({ orderId: order.id, orderNumber, paymentId: payment.id }, 'Order created');
          return { order, payment };
     }

     async getOrder(uow: UnitOfWork, orderId: number): Promise<Order> {
          const order = await uow.orders.findById(orderId);
          if (!order) {
               throw new OrderNotFoundError(orderId);
          }
          return order;
     }

     async getOrderByNumber(uow: UnitOfWork, orderNumber: string): Promise<Order> {
          const order = await uow.orders.findByOrderNumber(orderNumber);
          if (!order) {
               throw new OrderNotFoundError(orderNumber);
          }
          return order;
     }

     async lockOrder(uow: UnitOfWork, orderId: number): Promise<Order> {
          const order = await uow.orders.findByIdForUpdate(orderId);
          if (!order) {
               throw new OrderNotFoundError(orderId);
          }
          return order;
     }

     /**
      * pending -> paid. Only reachable from a payment capture, with the order and
      * payment already locked by the caller.
      */
     async markPaid(uow: UnitOfWork, ctx: RequestContext, order: Order, payment: Payment): Promise<Order> {
          orderStateMachine.assertTransition(order.status, 'paid');

          const committed = await this.reservations.commitForOrder(uow, ctx, order);
          if (committed.length !== order.items.length) {
               throw new InvalidTransitionError(
                    'order',
                    order.status,
                    'paid',
                    `expected ${order.items.length} active reservations for ${order.orderNumber}, found ${committed.length}`
               );
          }
          const paid = await this.transition(uow, ctx, order, 'paid', { stockState: 'committed' });

          await uow.events.enqueue('OrderConfirmed', {
               orderId: order.id,
               orderNumber: order.orderNumber,
               customerId: order.customerId,
               paymentId: payment.id,
               totalAmount: order.totalAmount,
          });
          return paid;
     }

     async ship(uow: UnitOfWork, ctx: RequestContext, orderId: number): Promise<Order> {
          const order = await this.lockOrder(uow, orderId);
          const shipped = await this.transition(uow, ctx, order, 'shipped');

          await uow.events.enqueue('OrderShipped', {
               orderId: order.id,
               orderNumber: order.orderNumber,
               customerId: order.customerId,
          });
          return shipped;
     }

     async deliver(uow: UnitOfWork, ctx: RequestContext, orderId: number): Promise<Order> {
          const order = await this.lockOrder(uow, orderId);
          const delivered = await this.transition(uow, ctx, order, 'delivered');

          await uow.events.enqueue('OrderDelivered', {
               orderId: order.id,
               orderNumber: order.orderNumber,
               customerId: order.customerId,
          });
          return delivered;
     }

     /**
      * Cancel a pending or paid order. Cancelling twice is a no-op.
      *
      * Pending orders give their reservations back. Paid orders have already
      * deducted stock, so compensating return movements put it back and a refund of
      * the captured payment is opened. Open payment attempts are failed.
      */
     async cancel(
          uow: UnitOfWork,
          ctx: RequestContext,
          orderId: number,
          options: CancelOptions = {}
     ): Promise<CancelledOrder> {
          const order = await this.lockOrder(uow, orderId);
          if (order.status === 'cancelled') {
               logger.debug({ orderId }, 'Order already cancelled');
               return { order, refund: null };
          }
          orderStateMachine.assertTransition(order.status, 'cancelled');

          const reason = options.reason ?? (options.expired ? 'reservation expired' : 'order cancelled');
          const payments = await this.lockPayments(uow, order);

          let refund: Refund | null = null;
          let stockState = order.stockState;
          if (order.stockState === 'reserved') {
               const closing = options.expired ? 'EXPIRED' : 'RELEASED';
               await this.reservations.releaseForOrder(uow, ctx, order, closing);
               stockState = 'released';
          } else if (order.stockState === 'committed') {
               await this.ledger.returnItems(uow, ctx, order.items, 'order_cancellation', reason, order.orderNumber);
               stockState = 'restocked';
          }

          const captured = payments.find((p) => p.status === 'captured');
          for (const payment of payments) {
               if (payment.status !== 'initiated' && payment.status !== 'authorized') {
                    continue;
               }
               const failed: Payment = { ...payment, status: 'failed', failureReason: reason };
               await uow.payments.update(failed);
               await recordAudit(uow, ctx, {
                    action: 'payment.fail',
                    entityType: 'payment',
                    entityId: payment.id,
                    before: paymentSnapshot(payment),
                    after: paymentSnapshot(failed),
               });
          }

          const cancelled = await this.transition(uow, ctx, order, 'cancelled', { stockState });

          if (captured) {
               refund = await this.refunds.openRefund(uow, ctx, cancelled, captured, {
                    reason: 'order_cancelled',
                    description: reason,
               });
          }

          logger.info(
               { orderId, orderNumber: order.orderNumber, stockState, refundId: refund?.id ?? null },
               'Order cancelled'
          );
          return { order: cancelled, refund };
     }

     /**
      * delivered -> returned, opening a refund of the captured payment. Stock comes
      * back when the refund completes.
      */
     async returnOrder(
          uow: UnitOfWork,
          ctx: RequestContext,
          orderId: number,
          options: ReturnOptions = {}
     ): Promise<ReturnedOrder> {
          const order = await this.lockOrder(uow, orderId);
          orderStateMachine.assertTransition(order.status, 'returned');

          const payment = await this.refunds.lockCapturedPayment(uow, order);
          const returned = await this.transition(uow, ctx, order, 'returned');
          const refund = await this.refunds.openRefund(uow, ctx, returned, payment, {
               reason: options.reason ?? 'customer_request',
               amount: options.amount,
               description: options.description,
          });

          return { order: returned, refund };
     }

     private async transition(
          uow: UnitOfWork,
          ctx: RequestContext,
          order: Order,
          to: OrderStatus,
          changes: Partial<Pick<Order, 'stockState'>> = {}
     ): Promise<Order> {
          orderStateMachine.assertTransition(order.status, to);

          const now = new Date();
          const next: Order = { ...order, ...changes, status: to, updatedAt: now };
          const field = TIMESTAMP_FOR[to];
          if (field) {
               next[field] = now;
          }
          await uow.orders.update(next);

          await recordAudit(uow, ctx, {
               action: `order.${to}`,
               entityType: 'order',
               entityId: order.id,
               before: orderSnapshot(order),
               after: orderSnapshot(next),
          });

          logger.info({ orderId: order.id, from: order.status, to }, 'Order transitioned');
          return next;
     }

     private async lockPayments(uow: UnitOfWork, order: Order): Promise<Payment[]> {
          const payments = await uow.payments.listByOrderId(order.id);
          const locked: Payment[] = [];
          for (const payment of payments) {
               const row = await uow.payments.findByIdForUpdate(payment.id);
               if (row) {
                    locked.push(row);
               }
          }
          return locked;
     }
}
