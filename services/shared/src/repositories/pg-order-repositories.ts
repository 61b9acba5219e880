import { PoolClient } from 'pg';
import type {
     DeliveryAddress,
     Order,
     OrderItem,
     OrderStatus,
     OrderStockState,
     Payment,
     PaymentMethod,
     PaymentStatus,
     Refund,
     RefundReason,
     RefundStatus,
} from '../types/commerce.types';
import { formatOrderNumber, orderNumberPrefix } from '../domain/order-number';
import type {
     NewOrder,
     NewPayment,
     NewRefund,
     OrderRepository,
     PaymentRepository,
     RefundRepository,
} from './types';
import { toInt, toIntOrNull } from './rows';

interface OrderRow {
     id: string | number;
     order_number: string;
     customer_id: string;
     status: OrderStatus;
     stock_state: OrderStockState;
     payment_method: PaymentMethod;
     delivery_address: DeliveryAddress;
     subtotal: string | number;
     delivery_fee: string | number;
     total_amount: string | number;
     created_at: Date;
     updated_at: Date;
     paid_at: Date | null;
     shipped_at: Date | null;
     delivered_at: Date | null;
     cancelled_at: Date | null;
     returned_at: Date | null;
}

interface OrderItemRow {
     id: string | number;
     product_id: string | number;
     quantity: number;
     unit_price: string | number;
     reservation_id: string | number | null;
}

interface PaymentRow {
     id: string | number;
     order_id: string | number;
     method: PaymentMethod;
     status: PaymentStatus;
     amount: string | number;
     gateway_reference: string | null;
     failure_reason: string | null;
     cash_received: string | number | null;
     created_at: Date;
     authorized_at: Date | null;
     captured_at: Date | null;
     refunded_at: Date | null;
}

interface RefundRow {
     id: string | number;
     payment_id: string | number;
     order_id: string | number;
     amount: string | number;
     reason: RefundReason;
     description: string | null;
     status: RefundStatus;
     requested_by: string;
     processed_by: string | null;
     failure_reason: string | null;
     created_at: Date;
     processed_at: Date | null;
     completed_at: Date | null;
}

const ORDER_COLUMNS = `
  id, order_number, customer_id, status, stock_state, payment_method, delivery_address,
  subtotal, delivery_fee, total_amount, created_at, updated_at,
  paid_at, shipped_at, delivered_at, cancelled_at, returned_at
`;
const PAYMENT_COLUMNS = `
  id, order_id, method, status, amount, gateway_reference, failure_reason, cash_received,
  created_at, authorized_at, captured_at, refunded_at
`;
const REFUND_COLUMNS = `
  id, payment_id, order_id, amount, reason, description, status, requested_by, processed_by,
  failure_reason, created_at, processed_at, completed_at
`;

function mapOrder(row: OrderRow, items: OrderItem[]): Order {
     return {
          id: toInt(row.id),
          orderNumber: row.order_number,
          customerId: row.customer_id,
          status: row.status,
          stockState: row.stock_state,
          paymentMethod: row.payment_method,
          deliveryAddress: row.delivery_address,
          items,
          subtotal: toInt(row.subtotal),
          deliveryFee: toInt(row.delivery_fee),
          totalAmount: toInt(row.total_amount),
          createdAt: row.created_at,
          updatedAt: row.updated_at,
          paidAt: row.paid_at,
          shippedAt: row.shipped_at,
          deliveredAt: row.delivered_at,
          cancelledAt: row.cancelled_at,
          returnedAt: row.returned_at,
     };
}

function mapOrderItem(row: OrderItemRow): OrderItem {
     return {
          id: toInt(row.id),
          productId: toInt(row.product_id),
          quantity: row.quantity,
          unitPrice: toInt(row.unit_price),
          reservationId: toIntOrNull(row.reservation_id),
     };
}

function mapPayment(row: PaymentRow): Payment {
     return {
          id: toInt(row.id),
          orderId: toInt(row.order_id),
          method: row.method,
          status: row.status,
          amount: toInt(row.amount),
          gatewayReference: row.gateway_reference,
          failureReason: row.failure_reason,
          cashReceived: toIntOrNull(row.cash_received),
          createdAt: row.created_at,
          authorizedAt: row.authorized_at,
          capturedAt: row.captured_at,
          refundedAt: row.refunded_at,
     };
}

function mapRefund(row: RefundRow): Refund {
     return {
          id: toInt(row.id),
          paymentId: toInt(row.payment_id),
          orderId: toInt(row.order_id),
          amount: toInt(row.amount),
          reason: row.reason,
          description: row.description,
          status: row.status,
          requestedBy: row.requested_by,
          processedBy: row.processed_by,
          failureReason: row.failure_reason,
          createdAt: row.created_at,
          processedAt: row.processed_at,
          completedAt: row.completed_at,
     };
}

export class PgOrderRepository implements OrderRepository {
     constructor(private readonly client: PoolClient) {}

     async nextOrderNumber(now: Date): Promise<string> {
          const prefix = orderNumberPrefix(now);
          const { rows } = await this.client.query<{ last_value: number }>(
               `
      INSERT INTO order_number_counter (prefix, last_value)
      VALUES ($1, 1)
      ON CONFLICT (prefix) DO UPDATE
      SET last_value = order_number_counter.last_value + 1
      RETURNING last_value
    `,
               [prefix]
          );
          return formatOrderNumber(prefix, rows[0].last_value);
     }

     async insert(order: NewOrder): Promise<Order> {
          const { rows } = await this.client.query<OrderRow>(
               `
      INSERT INTO customer_order (
        order_number,
        customer_id,
        payment_method,
        delivery_address,
        subtotal,
        delivery_fee,
        total_amount
      ) VALUES ($1, $2, $3, $4::jsonb, $5, $6, $7)
      RETURNING ${ORDER_COLUMNS}
    `,
               [
                    order.orderNumber,
                    order.customerId,
                    order.paymentMethod,
                    JSON.stringify(order.deliveryAddress),
                    order.subtotal,
                    order.deliveryFee,
                    order.totalAmount,
               ]
          );
          const orderId = toInt(rows[0].id);

          const items: OrderItem[] = [];
          for (const item of order.items) {
               const { rows: itemRows } = await this.client.query<OrderItemRow>(
                    `
        INSERT INTO order_item (order_id, product_id, quantity, unit_price, reservation_id)
        VALUES ($1, $2, $3, $4, $5)
        RETURNING id, product_id, quantity, unit_price, reservation_id
      `,
                    [orderId, item.productId, item.quantity, item.unitPrice, item.reservationId]
               );
               items.push(mapOrderItem(itemRows[0]));
          }

          return mapOrder(rows[0], items);
     }

     async findById(id: number): Promise<Order | null> {
          return this.findOne(`SELECT ${ORDER_COLUMNS} FROM customer_order WHERE id = $1`, id);
     }

     async findByIdForUpdate(id: number): Promise<Order | null> {
          return this.findOne(`SELECT ${ORDER_COLUMNS} FROM customer_order WHERE id = $1 FOR UPDATE`, id);
     }

     async findByOrderNumber(orderNumber: string): Promise<Order | null> {
          return this.findOne(
               `SELECT ${ORDER_COLUMNS} FROM customer_order WHERE order_number = $1`,
               orderNumber
          );
     }

     async update(order: Order): Promise<void> {
          await this.client.query(
               `
      UPDATE customer_order
      SET status = $2,
          stock_state = $3,
          paid_at = $4,
          shipped_at = $5,
          delivered_at = $6,
          cancelled_at = $7,
          returned_at = $8,
          updated_at = $9
      WHERE id = $1
    `,
               [
                    order.id,
                    order.status,
                    order.stockState,
                    order.paidAt,
                    order.shippedAt,
                    order.deliveredAt,
                    order.cancelledAt,
                    order.returnedAt,
                    order.updatedAt,
               ]
          );
     }

     private async findOne(sql: string, param: number | string): Promise<Order | null> {
          const { rows } = await this.client.query<OrderRow>(sql, [param]);
          if (rows.length === 0) {
               return null;
          }

          const { rows: itemRows } = await this.client.query<OrderItemRow>(
               `
      SELECT id, product_id, quantity, unit_price, reservation_id
      FROM order_item
      WHERE order_id = $1
      ORDER BY id
    `,
               [rows[0].id]
          );

          return mapOrder(rows[0], itemRows.map(mapOrderItem));
     }
}

export class PgPaymentRepository implements PaymentRepository {
     constructor(private readonly client: PoolClient) {}

     async insert(payment: NewPayment): Promise<Payment> {
          const { rows } = await this.client.query<PaymentRow>(
               `
      INSERT INTO payment (order_id, method, status, amount)
      VALUES ($1, $2, 'initiated', $3)
      RETURNING ${PAYMENT_COLUMNS}
    `,
               [payment.orderId, payment.method, payment.amount]
          );
          return mapPayment(rows[0]);
     }

     async findById(id: number): Promise<Payment | null> {
          const { rows } = await this.client.query<PaymentRow>(
               `SELECT ${PAYMENT_COLUMNS} FROM payment WHERE id = $1`,
               [id]
          );
          return rows.length > 0 ? mapPayment(rows[0]) : null;
     }

     async findByIdForUpdate(id: number): Promise<Payment | null> {
          const { rows } = await this.client.query<PaymentRow>(
               `SELECT ${PAYMENT_COLUMNS} FROM payment WHERE id = $1 FOR UPDATE`,
               [id]
          );
          return rows.length > 0 ? mapPayment(rows[0]) : null;
     }

     async listByOrderId(orderId: number): Promise<Payment[]> {
          const { rows } = await this.client.query<PaymentRow>(
               `SELECT ${PAYMENT_COLUMNS} FROM payment WHERE order_id = $1 ORDER BY id`,
               [orderId]
          );
          return rows.map(mapPayment);
     }

     async update(payment: Payment): Promise<void> {
          await this.client.query(
               `
      UPDATE payment
      SET status = $2,
          gateway_reference = $3,
          failure_reason = $4,
          cash_received = $5,
          authorized_at = $6,
          captured_at = $7,
          refunded_at = $8
      WHERE id = $1
    `,
               [
                    payment.id,
                    payment.status,
                    payment.gatewayReference,
                    payment.failureReason,
                    payment.cashReceived,
                    payment.authorizedAt,
                    payment.capturedAt,
                    payment.refundedAt,
               ]
          );
     }
}

export class PgRefundRepository implements RefundRepository {
     constructor(private readonly client: PoolClient) {}

     async insert(refund: NewRefund): Promise<Refund> {
          const { rows } = await this.client.query<RefundRow>(
               `
      INSERT INTO refund (payment_id, order_id, amount, reason, description, status, requested_by)
      VALUES ($1, $2, $3, $4, $5, 'pending', $6)
      RETURNING ${REFUND_COLUMNS}
    `,
               [
                    refund.paymentId,
                    refund.orderId,
                    refund.amount,
                    refund.reason,
                    refund.description,
                    refund.requestedBy,
               ]
          );
          return mapRefund(rows[0]);
     }

     async findById(id: number): Promise<Refund | null> {
          const { rows } = await this.client.query<RefundRow>(
               `SELECT ${REFUND_COLUMNS} FROM refund WHERE id = $1`,
               [id]
          );
          return rows.length > 0 ? mapRefund(rows[0]) : null;
     }

     async findByIdForUpdate(id: number): Promise<Refund | null> {
          const { rows } = await this.client.query<RefundRow>(
               `SELECT ${REFUND_COLUMNS} FROM refund WHERE id = $1 FOR UPDATE`,
               [id]
          );
          return rows.length > 0 ? mapRefund(rows[0]) : null;
     }

     async listByPaymentId(paymentId: number): Promise<Refund[]> {
          const { rows } = await this.client.query<RefundRow>(
               `SELECT ${REFUND_COLUMNS} FROM refund WHERE payment_id = $1 ORDER BY id`,
               [paymentId]
          );
          return rows.map(mapRefund);
     }

     async update(refund: Refund): Promise<void> {
          await this.client.query(
               `
      UPDATE refund
      SET status = $2,
          processed_by = $3,
          failure_reason = $4,
          processed_at = $5,
          completed_at = $6
      WHERE id = $1
    `,
               [
                    refund.id,
                    refund.status,
                    refund.processedBy,
                    refund.failureReason,
                    refund.processedAt,
                    refund.completedAt,
               ]
          );
     }
}
