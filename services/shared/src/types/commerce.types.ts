// Type definitions for domain models

export type StockStatus = 'available' | 'low_stock' | 'out_of_stock' | 'discontinued';

export type MovementType = 'inbound' | 'outbound' | 'adjustment' | 'transfer' | 'return';

export type MovementTag =
     | 'receipt'
     | 'removal'
     | 'manual_correction'
     | 'stocktake'
     | 'order_fulfillment'
     | 'order_cancellation'
     | 'order_return';

export type AdjustmentCategory = Extract<MovementTag, 'manual_correction' | 'stocktake'>;

export interface Product {
     id: number;
     sku: string;
     name: string;
     createdAt: Date;
}

export interface StockThresholds {
     minQuantity: number;
     maxQuantity: number;
     reorderQuantity: number;
}

export interface Stock extends StockThresholds {
     productId: number;
     currentQuantity: number;
     reservedQuantity: number;
     availableQuantity: number;
     status: StockStatus;
     discontinued: boolean;
     autoReorder: boolean;
     lastMovementAt: Date | null;
     updatedAt: Date;
}

export interface StockMovement {
     id: number;
     productId: number;
     type: MovementType;
     tag: MovementTag;
     /** Signed effect on current quantity */
     quantity: number;
     quantityBefore: number;
     quantityAfter: number;
     reason: string;
     actor: string;
     referenceId: string | null;
     createdAt: Date;
}

export interface MovementFilter {
     productId?: number;
     actor?: string;
     from?: Date;
     to?: Date;
     limit?: number;
     offset?: number;
}

export type ReservationStatus = 'ACTIVE' | 'COMMITTED' | 'RELEASED' | 'EXPIRED';

export interface Reservation {
     id: number;
     productId: number;
     orderRef: string;
     quantity: number;
     status: ReservationStatus;
     createdAt: Date;
     expiresAt: Date | null;
}

export type OrderStatus = 'pending' | 'paid' | 'shipped' | 'delivered' | 'cancelled' | 'returned';

/** Where the order's units sit in the ledger */
export type OrderStockState = 'reserved' | 'committed' | 'released' | 'restocked';

export type PaymentMethod = 'mobile_money' | 'card' | 'cash_on_delivery';

export interface DeliveryAddress {
     recipient: string;
     phone: string;
     line1: string;
     city: string;
     notes?: string;
}

export interface OrderLine {
     productId: number;
     quantity: number;
     unitPrice: number;
}

export interface OrderItem extends OrderLine {
     id: number;
     reservationId: number | null;
}

export interface Order {
     id: number;
     orderNumber: string;
     customerId: string;
     status: OrderStatus;
     stockState: OrderStockState;
     paymentMethod: PaymentMethod;
     deliveryAddress: DeliveryAddress;
     items: OrderItem[];
     subtotal: number;
     deliveryFee: number;
     totalAmount: number;
     createdAt: Date;
     updatedAt: Date;
     paidAt: Date | null;
     shippedAt: Date | null;
     deliveredAt: Date | null;
     cancelledAt: Date | null;
     returnedAt: Date | null;
}

export interface CreateOrderRequest {
     customerId: string;
     paymentMethod: PaymentMethod;
     deliveryAddress: DeliveryAddress;
     deliveryFee?: number;
     lines: OrderLine[];
}

export type PaymentStatus = 'initiated' | 'authorized' | 'failed' | 'captured' | 'refunded';

export interface Payment {
     id: number;
     orderId: number;
     method: PaymentMethod;
     status: PaymentStatus;
     amount: number;
     gatewayReference: string | null;
     failureReason: string | null;
     cashReceived: number | null;
     createdAt: Date;
     authorizedAt: Date | null;
     capturedAt: Date | null;
     refundedAt: Date | null;
}

/** Abstract result reported by a payment gateway callback */
export type GatewayOutcome =
     | { result: 'success'; reference?: string }
     | { result: 'failure'; reason: string };

export type RefundStatus = 'pending' | 'processing' | 'completed' | 'failed';

export type RefundReason =
     | 'customer_request'
     | 'defective_product'
     | 'wrong_item'
     | 'late_delivery'
     | 'order_cancelled'
     | 'other';

export interface Refund {
     id: number;
     paymentId: number;
     orderId: number;
     amount: number;
     reason: RefundReason;
     description: string | null;
     status: RefundStatus;
     requestedBy: string;
     processedBy: string | null;
     failureReason: string | null;
     createdAt: Date;
     processedAt: Date | null;
     completedAt: Date | null;
}

export interface RefundRequest {
     orderId: number;
     reason: RefundReason;
     amount?: number;
     description?: string;
}

export type AuditEntityType = 'stock' | 'reservation' | 'order' | 'payment' | 'refund' | 'product';

export interface AuditRecord {
     actor: string;
     action: string;
     entityType: AuditEntityType;
     entityId: string;
     before: Record<string, unknown> | null;
     after: Record<string, unknown> | null;
     requestOrigin: string;
     createdAt: Date;
}

/** Who is calling the core, and from where */
export interface RequestContext {
     actor: string;
     origin: string;
}

// Domain events
export type NotificationEventType =
     | 'OrderConfirmed'
     | 'OrderShipped'
     | 'OrderDelivered'
     | 'RefundRequested'
     | 'RefundProcessed'
     | 'StockAlertRaised';

export interface DomainEvent {
     id: number;
     type: NotificationEventType;
     payload: Record<string, unknown>;
     status: 'PENDING' | 'SENT' | 'FAILED';
     /** Failed publish attempts so far */
     retryCount: number;
     createdAt: Date;
}

export type StockAlertType = 'low_stock' | 'out_of_stock' | 'overstock' | 'reorder';

export interface StockAlert {
     id: number;
     productId: number;
     type: StockAlertType;
     currentQuantity: number;
     thresholdQuantity: number;
     message: string;
     status: 'active' | 'resolved';
     createdAt: Date;
     resolvedAt: Date | null;
}
