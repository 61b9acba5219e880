// Custom error classes for domain-specific errors

export class DomainError extends Error {
     constructor(
          message: string,
          public readonly code: string,
          public readonly statusCode: number = 400
     ) {
          super(message);
          this.name = this.constructor.name;
          Error.captureStackTrace(this, this.constructor);
     }
}

export class InsufficientStockError extends DomainError {
     constructor(
          message: string,
          public readonly productId: number,
          public readonly requested: number,
          public readonly available: number
     ) {
          super(message, 'INSUFFICIENT_STOCK', 409);
     }
}

export class InvalidQuantityError extends DomainError {
     constructor(message: string) {
          super(message, 'INVALID_QUANTITY', 400);
     }
}

export class InvalidThresholdsError extends DomainError {
     constructor(message: string) {
          super(message, 'INVALID_THRESHOLDS', 400);
     }
}

export class ReservationNotFoundError extends DomainError {
     constructor(public readonly reservationId: number) {
          super(`Reservation ${reservationId} not found or no longer active`, 'RESERVATION_NOT_FOUND', 404);
     }
}

export class InvalidTransitionError extends DomainError {
     constructor(
          public readonly entity: string,
          public readonly from: string,
          public readonly to: string,
          detail?: string
     ) {
          super(
               `Invalid ${entity} transition ${from} -> ${to}${detail ? `: ${detail}` : ''}`,
               'INVALID_TRANSITION',
               409
          );
     }
}

/**
 * An invariant of the ledger or of the order/payment pair was breached.
 * Thrown inside the mutating transaction so nothing is persisted.
 */
export type ConsistencyRule =
     | 'stock_quantities'
     | 'movement_balance'
     | 'reservation_total'
     | 'paid_captured';

export class ConsistencyViolationError extends DomainError {
     constructor(
          public readonly rule: ConsistencyRule,
          message: string
     ) {
          super(`[${rule}] ${message}`, 'CONSISTENCY_VIOLATION', 500);
     }
}

export class ProductNotFoundError extends DomainError {
     constructor(public readonly productId: number) {
          super(`Product ${productId} not found`, 'PRODUCT_NOT_FOUND', 404);
     }
}

export class DuplicateSkuError extends DomainError {
     constructor(public readonly sku: string) {
          super(`A product with SKU ${sku} already exists`, 'DUPLICATE_SKU', 409);
     }
}

export class OrderNotFoundError extends DomainError {
     constructor(public readonly orderId: number | string) {
          super(`Order ${orderId} not found`, 'ORDER_NOT_FOUND', 404);
     }
}

export class PaymentNotFoundError extends DomainError {
     constructor(public readonly paymentId: number) {
          super(`Payment ${paymentId} not found`, 'PAYMENT_NOT_FOUND', 404);
     }
}

export class RefundNotFoundError extends DomainError {
     constructor(public readonly refundId: number) {
          super(`Refund ${refundId} not found`, 'REFUND_NOT_FOUND', 404);
     }
}
