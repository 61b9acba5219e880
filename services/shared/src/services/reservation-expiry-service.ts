import type { UnitOfWork, UnitOfWorkRunner } from '../db/unit-of-work';
import type { RequestContext, Reservation } from '../types/commerce.types';
import { logger } from '../utils/logger';
import { OrderService } from './order-service';
import { ReservationService } from './reservation-service';

export interface SweepResult {
     examined: number;
     expiredReservations: number;
     cancelledOrders: number;
     failed: number;
}

type SweepOutcome = 'order_cancelled' | 'reservation_expired' | 'skipped';

/**
 * Ends reservation leases. A lapsed reservation held by a pending order's items
 * cancels the whole order, which expires its other reservations too; any other lapsed
 * reservation is expired on its own. Each reservation is handled in its own
 * transaction so one failure does not hold back the rest.
 */
export class ReservationExpiryService {
     constructor(
          private readonly reservations: ReservationService,
          private readonly orders: OrderService
     ) {}

     async sweep(
          runUnitOfWork: UnitOfWorkRunner,
          ctx: RequestContext,
          asOf: Date = new Date(),
          limit: number = 100
     ): Promise<SweepResult> {
          const lapsed = await runUnitOfWork((uow) => uow.reservations.listExpired(asOf, limit));
          const result: SweepResult = {
               examined: lapsed.length,
               expiredReservations: 0,
               cancelledOrders: 0,
               failed: 0,
          };

          for (const reservation of lapsed) {
               try {
                    const outcome = await runUnitOfWork((uow) => this.expireOne(uow, ctx, reservation));
                    if (outcome === 'order_cancelled') {
                         result.cancelledOrders += 1;
                    } else if (outcome === 'reservation_expired') {
                         result.expiredReservations += 1;
                    }
               } catch (error) {
                    result.failed += 1;
                    logger.error(
                         { error, reservationId: reservation.id, orderRef: reservation.orderRef },
                         'Failed to expire reservation'
                    );
               }
          }

          if (lapsed.length > 0) {
               logger.info({ ...result }, 'Reservation sweep finished');
          }
          return result;
     }

     private async expireOne(uow: UnitOfWork, ctx: RequestContext, reservation: Reservation): Promise<SweepOutcome> {
          const order = await uow.orders.findByOrderNumber(reservation.orderRef);
          if (order) {
               const locked = await this.orders.lockOrder(uow, order.id);
               const heldByOrder = locked.items.some((item) => item.reservationId === reservation.id);
               if (heldByOrder && locked.status === 'pending') {
                    await this.orders.cancel(uow, ctx, locked.id, { expired: true });
                    return 'order_cancelled';
               }
          }

          const { released } = await this.reservations.expire(uow, ctx, reservation.id);
          return released ? 'reservation_expired' : 'skipped';
     }
}
