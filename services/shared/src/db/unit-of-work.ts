import { PoolClient } from 'pg';
import { withTransaction } from './client';
import type {
     AuditRepository,
     DomainEventRepository,
     MovementRepository,
     OrderRepository,
     PaymentRepository,
     ProductRepository,
     RefundRepository,
     ReservationRepository,
     StockAlertRepository,
     StockRepository,
} from '../repositories/types';
import { PgProductRepository, PgStockRepository } from '../repositories/pg-catalog-repositories';
import { PgMovementRepository, PgReservationRepository } from '../repositories/pg-ledger-repositories';
import {
     PgOrderRepository,
     PgPaymentRepository,
     PgRefundRepository,
} from '../repositories/pg-order-repositories';
import {
     PgAuditRepository,
     PgDomainEventRepository,
     PgStockAlertRepository,
} from '../repositories/pg-outbox-repositories';

/**
 * Every repository bound to one transaction. Services receive a unit of work the way
 * they would receive a transactional client: whatever they write commits or rolls
 * back together.
 */
export interface UnitOfWork {
     products: ProductRepository;
     stocks: StockRepository;
     movements: MovementRepository;
     reservations: ReservationRepository;
     orders: OrderRepository;
     payments: PaymentRepository;
     refunds: RefundRepository;
     audit: AuditRepository;
     events: DomainEventRepository;
     alerts: StockAlertRepository;
}

export type UnitOfWorkRunner = <T>(fn: (uow: UnitOfWork) => Promise<T>) => Promise<T>;

export function createPgUnitOfWork(client: PoolClient): UnitOfWork {
     return {
          products: new PgProductRepository(client),
          stocks: new PgStockRepository(client),
          movements: new PgMovementRepository(client),
          reservations: new PgReservationRepository(client),
          orders: new PgOrderRepository(client),
          payments: new PgPaymentRepository(client),
          refunds: new PgRefundRepository(client),
          audit: new PgAuditRepository(client),
          events: new PgDomainEventRepository(client),
          alerts: new PgStockAlertRepository(client),
     };
}

export const withUnitOfWork: UnitOfWorkRunner = (fn) =>
     withTransaction((client) => fn(createPgUnitOfWork(client)));
