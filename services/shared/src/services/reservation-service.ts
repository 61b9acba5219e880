import type { UnitOfWork } from '../db/unit-of-work';
import type {
     Order,
     OrderLine,
     RequestContext,
     Reservation,
     ReservationStatus,
     Stock,
} from '../types/commerce.types';
import { assertReservationsMatch } from '../domain/invariants';
import {
     InsufficientStockError,
     InvalidQuantityError,
     ProductNotFoundError,
     ReservationNotFoundError,
} from '../utils/errors';
import { logger } from '../utils/logger';
import { recordAudit, reservationSnapshot } from './audit';
import { assertPositiveQuantity, StockLedgerService, StockMutationResult } from './stock-ledger-service';

export interface ReservationServiceOptions {
     /** Lease length for new reservations; 0 means they never expire */
     reservationTtlMinutes: number;
}

export type ReservationLine = Pick<OrderLine, 'productId' | 'quantity'>;

export interface ReleaseResult {
     /** False when the handle was unknown or no longer active */
     released: boolean;
     reservation: Reservation | null;
}

export interface CommitResult extends StockMutationResult {
     reservation: Reservation;
}

type ClosingStatus = Extract<ReservationStatus, 'RELEASED' | 'EXPIRED'>;

/** A fixed reference, or one resolved once every line is known to fit */
export type OrderRefSource = string | (() => Promise<string>);

function reservationIdsOf(order: Pick<Order, 'items'>): number[] {
     return order.items.flatMap((item) => (item.reservationId === null ? [] : [item.reservationId]));
}

export class ReservationService {
     constructor(
          private readonly ledger: StockLedgerService,
          private readonly options: ReservationServiceOptions = { reservationTtlMinutes: 0 }
     ) {}

     async reserve(
          uow: UnitOfWork,
          ctx: RequestContext,
          productId: number,
          quantity: number,
          orderRef: string
     ): Promise<Reservation> {
          const [reservation] = await this.reserveMany(uow, ctx, orderRef, [{ productId, quantity }]);
          return reservation;
     }

     /**
      * Reserve every line or none. Stock rows are locked in ascending product id
      * order and availability is checked for all of them before anything is written.
      * A function `orderRef` is only called after that check passes.
      * Returned reservations follow the order of `lines`.
      */
     async reserveMany(
          uow: UnitOfWork,
          ctx: RequestContext,
          orderRefSource: OrderRefSource,
          lines: ReservationLine[]
     ): Promise<Reservation[]> {
          if (lines.length === 0) {
               throw new InvalidQuantityError('At least one line is required to reserve stock');
          }
          for (const line of lines) {
               assertPositiveQuantity(line.quantity, `Quantity for product ${line.productId}`);
          }

          const requested = new Map<number, number>();
          for (const line of lines) {
               requested.set(line.productId, (requested.get(line.productId) ?? 0) + line.quantity);
          }

          const locked = await uow.stocks.lockByProductIds([...requested.keys()]);
          const stocks = new Map<number, Stock>(locked.map((s) => [s.productId, s]));

          for (const [productId, quantity] of requested) {
               const stock = stocks.get(productId);
               if (!stock) {
                    throw new ProductNotFoundError(productId);
               }
               if (quantity > stock.availableQuantity) {
                    throw new InsufficientStockError(
                         `Insufficient stock for product ${productId}: requested ${quantity}, available ${stock.availableQuantity}`,
                         productId,
                         quantity,
                         stock.availableQuantity
                    );
               }
          }

          const orderRef = typeof orderRefSource === 'string' ? orderRefSource : await orderRefSource();
          const expiresAt = this.leaseExpiry(new Date());
          const reservations: Reservation[] = [];
          for (const line of lines) {
               const stock = stocks.get(line.productId);
               if (!stock) {
                    throw new ProductNotFoundError(line.productId);
               }

               const reservation = await uow.reservations.insert({
                    productId: line.productId,
                    orderRef,
                    quantity: line.quantity,
                    expiresAt,
               });
               const next = await this.ledger.changeReserved(uow, ctx, stock, line.quantity, 'stock.reserve');
               stocks.set(line.productId, next);
               await this.checkReservedTotal(uow, next);

               await recordAudit(uow, ctx, {
                    action: 'reservation.create',
                    entityType: 'reservation',
                    entityId: reservation.id,
                    before: null,
                    after: reservationSnapshot(reservation),
               });

               logger.info(
                    {
                         reservationId: reservation.id,
                         productId: line.productId,
                         orderRef,
                         quantity: line.quantity,
                         availableQuantity: next.availableQuantity,
                    },
                    'Stock reserved'
               );
               reservations.push(reservation);
          }

          return reservations;
     }

     /**
      * Give the reserved units back. Unknown, committed, released or expired
      * handles are a successful no-op.
      */
     async release(uow: UnitOfWork, ctx: RequestContext, reservationId: number): Promise<ReleaseResult> {
          return this.close(uow, ctx, reservationId, 'RELEASED');
     }

     async expire(uow: UnitOfWork, ctx: RequestContext, reservationId: number): Promise<ReleaseResult> {
          return this.close(uow, ctx, reservationId, 'EXPIRED');
     }

     /**
      * Turn an active reservation into a permanent outbound movement. Single use.
      */
     async commit(uow: UnitOfWork, ctx: RequestContext, reservationId: number): Promise<CommitResult> {
          const reservation = await uow.reservations.findByIdForUpdate(reservationId);
          if (!reservation || reservation.status !== 'ACTIVE') {
               throw new ReservationNotFoundError(reservationId);
          }
          return this.commitLocked(uow, ctx, reservation);
     }

     /**
      * Commit the still-active reservations held by the order's items, in
      * ascending product id order. Other reservations sharing its reference are
      * left alone.
      */
     async commitForOrder(
          uow: UnitOfWork,
          ctx: RequestContext,
          order: Pick<Order, 'items'>
     ): Promise<CommitResult[]> {
          const reservations = await uow.reservations.listByIdsForUpdate(reservationIdsOf(order));
          const active = reservations.filter((r) => r.status === 'ACTIVE');

          const results: CommitResult[] = [];
          for (const reservation of active) {
               results.push(await this.commitLocked(uow, ctx, reservation));
          }
          return results;
     }

     /** Close the still-active reservations held by the order's items */
     async releaseForOrder(
          uow: UnitOfWork,
          ctx: RequestContext,
          order: Pick<Order, 'items'>,
          status: ClosingStatus = 'RELEASED'
     ): Promise<Reservation[]> {
          const reservations = await uow.reservations.listByIdsForUpdate(reservationIdsOf(order));
          const active = reservations.filter((r) => r.status === 'ACTIVE');

          const closed: Reservation[] = [];
          for (const reservation of active) {
               closed.push(await this.closeLocked(uow, ctx, reservation, status));
          }
          return closed;
     }

     private async close(
          uow: UnitOfWork,
          ctx: RequestContext,
          reservationId: number,
          status: ClosingStatus
     ): Promise<ReleaseResult> {
          const reservation = await uow.reservations.findByIdForUpdate(reservationId);
          if (!reservation || reservation.status !== 'ACTIVE') {
               logger.debug(
                    { reservationId, status: reservation?.status ?? null },
                    'Reservation not active, nothing to release'
               );
               return { released: false, reservation };
          }

          return { released: true, reservation: await this.closeLocked(uow, ctx, reservation, status) };
     }

     private async closeLocked(
          uow: UnitOfWork,
          ctx: RequestContext,
          reservation: Reservation,
          status: ClosingStatus
     ): Promise<Reservation> {
          const stock = await this.ledger.lockStock(uow, reservation.productId);

          await uow.reservations.updateStatus(reservation.id, status);
          const next = await this.ledger.changeReserved(
               uow,
               ctx,
               stock,
               -reservation.quantity,
               status === 'EXPIRED' ? 'stock.expire' : 'stock.release'
          );
          await this.checkReservedTotal(uow, next);

          const closed: Reservation = { ...reservation, status };
          await recordAudit(uow, ctx, {
               action: status === 'EXPIRED' ? 'reservation.expire' : 'reservation.release',
               entityType: 'reservation',
               entityId: reservation.id,
               before: reservationSnapshot(reservation),
               after: reservationSnapshot(closed),
          });

          logger.info(
               {
                    reservationId: reservation.id,
                    productId: reservation.productId,
                    orderRef: reservation.orderRef,
                    quantity: reservation.quantity,
                    status,
               },
               'Reservation closed'
          );
          return closed;
     }

     private async commitLocked(
          uow: UnitOfWork,
          ctx: RequestContext,
          reservation: Reservation
     ): Promise<CommitResult> {
          const stock = await this.ledger.lockStock(uow, reservation.productId);

          await uow.reservations.updateStatus(reservation.id, 'COMMITTED');
          const result = await this.ledger.writeMovement(
               uow,
               ctx,
               stock,
               {
                    type: 'outbound',
                    tag: 'order_fulfillment',
                    delta: -reservation.quantity,
                    reason: 'order fulfillment',
                    referenceId: reservation.orderRef,
               },
               -reservation.quantity
          );
          await this.checkReservedTotal(uow, result.stock);

          const committed: Reservation = { ...reservation, status: 'COMMITTED' };
          await recordAudit(uow, ctx, {
               action: 'reservation.commit',
               entityType: 'reservation',
               entityId: reservation.id,
               before: reservationSnapshot(reservation),
               after: reservationSnapshot(committed),
          });

          logger.info(
               {
                    reservationId: reservation.id,
                    productId: reservation.productId,
                    orderRef: reservation.orderRef,
                    movementId: result.movement.id,
               },
               'Reservation committed'
          );
          return { ...result, reservation: committed };
     }

     private async checkReservedTotal(uow: UnitOfWork, stock: Stock): Promise<void> {
          const activeTotal = await uow.reservations.sumActiveByProduct(stock.productId);
          assertReservationsMatch(stock, activeTotal);
     }

     private leaseExpiry(now: Date): Date | null {
          const ttl = this.options.reservationTtlMinutes;
          if (ttl <= 0) {
               return null;
          }
          return new Date(now.getTime() + ttl * 60_000);
     }
}
