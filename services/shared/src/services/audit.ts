import type { UnitOfWork } from '../db/unit-of-work';
import type {
     AuditEntityType,
     Order,
     Payment,
     Refund,
     RequestContext,
     Reservation,
     Stock,
} from '../types/commerce.types';

export interface AuditEntry {
     action: string;
     entityType: AuditEntityType;
     entityId: number | string;
     before: Record<string, unknown> | null;
     after: Record<string, unknown> | null;
}

export async function recordAudit(
     uow: UnitOfWork,
     ctx: RequestContext,
     entry: AuditEntry
): Promise<void> {
     await uow.audit.append({
          actor: ctx.actor,
          action: entry.action,
          entityType: entry.entityType,
          entityId: String(entry.entityId),
          before: entry.before,
          after: entry.after,
          requestOrigin: ctx.origin,
          createdAt: new Date(),
     });
}

export function stockSnapshot(stock: Stock): Record<string, unknown> {
     return {
          currentQuantity: stock.currentQuantity,
          reservedQuantity: stock.reservedQuantity,
          availableQuantity: stock.availableQuantity,
          minQuantity: stock.minQuantity,
          maxQuantity: stock.maxQuantity,
          reorderQuantity: stock.reorderQuantity,
          autoReorder: stock.autoReorder,
          discontinued: stock.discontinued,
          status: stock.status,
     };
}

export function reservationSnapshot(reservation: Reservation): Record<string, unknown> {
     return {
          productId: reservation.productId,
          orderRef: reservation.orderRef,
          quantity: reservation.quantity,
          status: reservation.status,
     };
}

export function orderSnapshot(order: Order): Record<string, unknown> {
     return { status: order.status, stockState: order.stockState };
}

export function paymentSnapshot(payment: Payment): Record<string, unknown> {
     return {
          status: payment.status,
          amount: payment.amount,
          gatewayReference: payment.gatewayReference,
          failureReason: payment.failureReason,
     };
}

export function refundSnapshot(refund: Refund): Record<string, unknown> {
     return { status: refund.status, amount: refund.amount, reason: refund.reason };
}
