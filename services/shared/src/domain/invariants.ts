import type { Order, Payment, Stock, StockMovement } from '../types/commerce.types';
import { ConsistencyViolationError } from '../utils/errors';

type QuantityState = Pick<Stock, 'productId' | 'currentQuantity' | 'reservedQuantity'>;
type MovementQuantities = Pick<StockMovement, 'quantity' | 'quantityBefore' | 'quantityAfter'>;

// current >= 0, reserved >= 0, available = current - reserved >= 0
export function assertStockQuantities(stock: QuantityState): void {
     const { productId, currentQuantity, reservedQuantity } = stock;
     if (currentQuantity < 0 || reservedQuantity < 0) {
          throw new ConsistencyViolationError(
               'stock_quantities',
               `Negative quantity for product ${productId}: current=${currentQuantity}, reserved=${reservedQuantity}`
          );
     }
     if (currentQuantity - reservedQuantity < 0) {
          throw new ConsistencyViolationError(
               'stock_quantities',
               `Available quantity would be negative for product ${productId}: current=${currentQuantity}, reserved=${reservedQuantity}`
          );
     }
}

// after = before + delta, both sides non-negative
export function assertMovementBalance(movement: MovementQuantities): void {
     const { quantity, quantityBefore, quantityAfter } = movement;
     if (quantityBefore < 0 || quantityAfter < 0) {
          throw new ConsistencyViolationError(
               'movement_balance',
               `Movement leaves a negative quantity: ${quantityBefore} -> ${quantityAfter}`
          );
     }
     if (quantityAfter !== quantityBefore + quantity) {
          throw new ConsistencyViolationError(
               'movement_balance',
               `Movement does not balance: ${quantityBefore} + ${quantity} != ${quantityAfter}`
          );
     }
}

// live reservations add up to reserved_quantity
export function assertReservationsMatch(stock: QuantityState, activeReservationTotal: number): void {
     if (activeReservationTotal !== stock.reservedQuantity) {
          throw new ConsistencyViolationError(
               'reservation_total',
               `Product ${stock.productId} has reserved=${stock.reservedQuantity} but active reservations total ${activeReservationTotal}`
          );
     }
}

// An order is paid only with a captured payment, and a captured payment never
// leaves its order pending. Later order states (shipped, cancelled...) keep the
// capture until a refund completes.
export function assertPaidMatchesCaptured(
     order: Pick<Order, 'id' | 'status'>,
     payment: Pick<Payment, 'id' | 'status'>
): void {
     const mismatch =
          (order.status === 'paid' && payment.status !== 'captured') ||
          (payment.status === 'captured' && order.status === 'pending');
     if (mismatch) {
          throw new ConsistencyViolationError(
               'paid_captured',
               `Order ${order.id} is ${order.status} while payment ${payment.id} is ${payment.status}`
          );
     }
}
