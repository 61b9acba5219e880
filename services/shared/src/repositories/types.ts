import type {
     AuditRecord,
     DomainEvent,
     MovementFilter,
     NotificationEventType,
     Order,
     OrderItem,
     Payment,
     Product,
     Refund,
     Reservation,
     ReservationStatus,
     Stock,
     StockAlert,
     StockMovement,
} from '../types/commerce.types';

export interface ProductRepository {
     insert(product: Pick<Product, 'sku' | 'name'>): Promise<Product>;
     findById(id: number): Promise<Product | null>;
     findBySku(sku: string): Promise<Product | null>;
}

export type NewStock = Omit<Stock, 'availableQuantity' | 'lastMovementAt' | 'updatedAt'>;

export interface StockRepository {
     insert(stock: NewStock): Promise<Stock>;
     findByProductId(productId: number): Promise<Stock | null>;
     /** Row-locks the stocks until the transaction ends, in ascending product id order */
     lockByProductIds(productIds: number[]): Promise<Stock[]>;
     update(stock: Stock): Promise<void>;
     listAll(): Promise<Stock[]>;
}

export type NewMovement = Omit<StockMovement, 'id' | 'createdAt'>;

export interface MovementRepository {
     append(movement: NewMovement): Promise<StockMovement>;
     query(filter: MovementFilter): Promise<StockMovement[]>;
     /** Every movement of a product, oldest first */
     listByProduct(productId: number): Promise<StockMovement[]>;
}

export type NewReservation = Pick<Reservation, 'productId' | 'orderRef' | 'quantity' | 'expiresAt'>;

export interface ReservationRepository {
     insert(reservation: NewReservation): Promise<Reservation>;
     findById(id: number): Promise<Reservation | null>;
     findByIdForUpdate(id: number): Promise<Reservation | null>;
     /** Locks the given reservations in ascending product id, then id, order */
     listByIdsForUpdate(ids: number[]): Promise<Reservation[]>;
     updateStatus(id: number, status: ReservationStatus): Promise<void>;
     sumActiveByProduct(productId: number): Promise<number>;
     listExpired(asOf: Date, limit: number): Promise<Reservation[]>;
}

export type NewOrder = Pick<
     Order,
     | 'orderNumber'
     | 'customerId'
     | 'paymentMethod'
     | 'deliveryAddress'
     | 'subtotal'
     | 'deliveryFee'
     | 'totalAmount'
> & { items: Array<Omit<OrderItem, 'id'>> };

export interface OrderRepository {
     /** Next CMD-YYYY-MM-NNNN number for the month of `now` */
     nextOrderNumber(now: Date): Promise<string>;
     insert(order: NewOrder): Promise<Order>;
     findById(id: number): Promise<Order | null>;
     findByIdForUpdate(id: number): Promise<Order | null>;
     findByOrderNumber(orderNumber: string): Promise<Order | null>;
     update(order: Order): Promise<void>;
}

export type NewPayment = Pick<Payment, 'orderId' | 'method' | 'amount'>;

export interface PaymentRepository {
     insert(payment: NewPayment): Promise<Payment>;
     findById(id: number): Promise<Payment | null>;
     findByIdForUpdate(id: number): Promise<Payment | null>;
     /** Oldest first */
     listByOrderId(orderId: number): Promise<Payment[]>;
     update(payment: Payment): Promise<void>;
}

export type NewRefund = Pick<
     Refund,
     'paymentId' | 'orderId' | 'amount' | 'reason' | 'description' | 'requestedBy'
>;

export interface RefundRepository {
     insert(refund: NewRefund): Promise<Refund>;
     findById(id: number): Promise<Refund | null>;
     findByIdForUpdate(id: number): Promise<Refund | null>;
     listByPaymentId(paymentId: number): Promise<Refund[]>;
     update(refund: Refund): Promise<void>;
}

export interface AuditRepository {
     append(record: AuditRecord): Promise<void>;
}

export interface EventRetryPolicy {
     maxRetries: number;
     backoffMs: number;
}

export interface DomainEventRepository {
     enqueue(type: NotificationEventType, payload: Record<string, unknown>): Promise<number>;
     /**
      * Locks pending events, and failed ones still under `retry.maxRetries` whose
      * last attempt is at least `retry.backoffMs` old, skipping rows another
      * dispatcher holds.
      */
     claimPending(limit: number, retry: EventRetryPolicy): Promise<DomainEvent[]>;
     markSent(id: number): Promise<void>;
     markFailed(id: number, error: string): Promise<void>;
}

export type NewStockAlert = Pick<
     StockAlert,
     'productId' | 'type' | 'currentQuantity' | 'thresholdQuantity' | 'message'
>;

export interface StockAlertRepository {
     listActive(): Promise<StockAlert[]>;
     insert(alert: NewStockAlert): Promise<StockAlert>;
     resolve(id: number, resolvedAt: Date): Promise<void>;
}
