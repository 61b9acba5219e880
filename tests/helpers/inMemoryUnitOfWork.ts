import type { UnitOfWork, UnitOfWorkRunner } from '@backoffice/shared/src/db/unit-of-work';
import { formatOrderNumber, orderNumberPrefix } from '@backoffice/shared/src/domain/order-number';
import { DEFAULT_MOVEMENT_PAGE_SIZE } from '@backoffice/shared/src/repositories/pg-ledger-repositories';
import type {
     AuditRepository,
     DomainEventRepository,
     EventRetryPolicy,
     MovementRepository,
     NewMovement,
     NewOrder,
     NewPayment,
     NewRefund,
     NewReservation,
     NewStock,
     NewStockAlert,
     OrderRepository,
     PaymentRepository,
     ProductRepository,
     RefundRepository,
     ReservationRepository,
     StockAlertRepository,
     StockRepository,
} from '@backoffice/shared/src/repositories/types';
import type {
     AuditRecord,
     DomainEvent,
     MovementFilter,
     NotificationEventType,
     Order,
     Payment,
     Product,
     Refund,
     Reservation,
     ReservationStatus,
     Stock,
     StockAlert,
     StockMovement,
} from '@backoffice/shared/src/types/commerce.types';

type Undo = () => void;

const clone = <T>(value: T): T => structuredClone(value);

/**
 * Row locks keyed by table and id, held by a transaction until it ends.
 * Re-entrant for the owning transaction, like FOR UPDATE.
 */
export class KeyedLocks {
     private readonly holders = new Map<string, number>();
     private readonly waiters = new Map<string, Array<() => void>>();

     async acquire(key: string, owner: number): Promise<void> {
          for (;;) {
               const holder = this.holders.get(key);
               if (holder === undefined) {
                    this.holders.set(key, owner);
                    return;
               }
               if (holder === owner) {
                    return;
               }
               await new Promise<void>((resolve) => {
                    const queue = this.waiters.get(key) ?? [];
                    queue.push(resolve);
                    this.waiters.set(key, queue);
               });
          }
     }

     /** SKIP LOCKED: take the lock only if nobody else holds it */
     tryAcquire(key: string, owner: number): boolean {
          const holder = this.holders.get(key);
          if (holder !== undefined && holder !== owner) {
               return false;
          }
          this.holders.set(key, owner);
          return true;
     }

     releaseAll(owner: number): void {
          for (const [key, holder] of [...this.holders]) {
               if (holder !== owner) {
                    continue;
               }
               this.holders.delete(key);
               const queue = this.waiters.get(key) ?? [];
               this.waiters.delete(key);
               queue.forEach((wake) => wake());
          }
     }

     get heldCount(): number {
          return this.holders.size;
     }
}

class MemoryTransaction {
     private readonly undoLog: Undo[] = [];

     constructor(
          readonly db: InMemoryDatabase,
          readonly id: number
     ) {}

     lock(key: string): Promise<void> {
          return this.db.locks.acquire(key, this.id);
     }

     tryLock(key: string): boolean {
          return this.db.locks.tryAcquire(key, this.id);
     }

     put<K, V>(map: Map<K, V>, key: K, value: V): void {
          const previous = map.get(key);
          map.set(key, clone(value));
          this.undoLog.push(() => {
               if (previous === undefined) {
                    map.delete(key);
               } else {
                    map.set(key, previous);
               }
          });
     }

     append<V>(list: V[], value: V): void {
          const stored = clone(value);
          list.push(stored);
          this.undoLog.push(() => {
               const index = list.indexOf(stored);
               if (index >= 0) {
                    list.splice(index, 1);
               }
          });
     }

     commit(): void {
          this.db.locks.releaseAll(this.id);
     }

     rollback(): void {
          for (const undo of this.undoLog.reverse()) {
               undo();
          }
          this.db.locks.releaseAll(this.id);
     }
}

class MemoryProductRepository implements ProductRepository {
     constructor(private readonly tx: MemoryTransaction) {}

     async insert(product: Pick<Product, 'sku' | 'name'>): Promise<Product> {
          const { db } = this.tx;
          if ([...db.products.values()].some((p) => p.sku === product.sku)) {
               throw new Error(`duplicate key value violates unique constraint "product_sku_key"`);
          }
          const row: Product = { id: db.nextId('product'), sku: product.sku, name: product.name, createdAt: new Date() };
          this.tx.put(db.products, row.id, row);
          return clone(row);
     }

     async findById(id: number): Promise<Product | null> {
          const row = this.tx.db.products.get(id);
          return row ? clone(row) : null;
     }

     async findBySku(sku: string): Promise<Product | null> {
          const row = [...this.tx.db.products.values()].find((p) => p.sku === sku);
          return row ? clone(row) : null;
     }
}

class MemoryStockRepository implements StockRepository {
     constructor(private readonly tx: MemoryTransaction) {}

     async insert(stock: NewStock): Promise<Stock> {
          const row: Stock = {
               ...stock,
               availableQuantity: stock.currentQuantity - stock.reservedQuantity,
               lastMovementAt: null,
               updatedAt: new Date(),
          };
          this.tx.put(this.tx.db.stocks, row.productId, row);
          return clone(row);
     }

     async findByProductId(productId: number): Promise<Stock | null> {
          const row = this.tx.db.stocks.get(productId);
          return row ? clone(row) : null;
     }

     async lockByProductIds(productIds: number[]): Promise<Stock[]> {
          const ids = [...new Set(productIds)].sort((a, b) => a - b);
          const locked: Stock[] = [];
          for (const id of ids) {
               if (!this.tx.db.stocks.has(id)) {
                    continue;
               }
               await this.tx.lock(`stock:${id}`);
               const row = this.tx.db.stocks.get(id);
               if (row) {
                    locked.push(clone(row));
               }
          }
          return locked;
     }

     async update(stock: Stock): Promise<void> {
          if (!this.tx.db.stocks.has(stock.productId)) {
               return;
          }
          this.tx.put(this.tx.db.stocks, stock.productId, {
               ...stock,
               availableQuantity: stock.currentQuantity - stock.reservedQuantity,
               updatedAt: new Date(),
          });
     }

     async listAll(): Promise<Stock[]> {
          return [...this.tx.db.stocks.values()].sort((a, b) => a.productId - b.productId).map(clone);
     }
}

class MemoryMovementRepository implements MovementRepository {
     constructor(private readonly tx: MemoryTransaction) {}

     async append(movement: NewMovement): Promise<StockMovement> {
          const row: StockMovement = { ...movement, id: this.tx.db.nextId('stock_movement'), createdAt: new Date() };
          this.tx.append(this.tx.db.movements, row);
          return clone(row);
     }

     async query(filter: MovementFilter): Promise<StockMovement[]> {
          const { from, to } = filter;
          const offset = filter.offset ?? 0;
          const limit = filter.limit ?? DEFAULT_MOVEMENT_PAGE_SIZE;
          return this.tx.db.movements
               .filter((m) => filter.productId === undefined || m.productId === filter.productId)
               .filter((m) => filter.actor === undefined || m.actor === filter.actor)
               .filter((m) => from === undefined || m.createdAt.getTime() >= from.getTime())
               .filter((m) => to === undefined || m.createdAt.getTime() < to.getTime())
               .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id)
               .slice(offset, offset + limit)
               .map(clone);
     }

     async listByProduct(productId: number): Promise<StockMovement[]> {
          return this.tx.db.movements
               .filter((m) => m.productId === productId)
               .sort((a, b) => a.id - b.id)
               .map(clone);
     }
}

class MemoryReservationRepository implements ReservationRepository {
     constructor(private readonly tx: MemoryTransaction) {}

     async insert(reservation: NewReservation): Promise<Reservation> {
          const row: Reservation = {
               ...reservation,
               id: this.tx.db.nextId('reservation'),
               status: 'ACTIVE',
               createdAt: new Date(),
          };
          this.tx.put(this.tx.db.reservations, row.id, row);
          return clone(row);
     }

     async findById(id: number): Promise<Reservation | null> {
          const row = this.tx.db.reservations.get(id);
          return row ? clone(row) : null;
     }

     async findByIdForUpdate(id: number): Promise<Reservation | null> {
          if (!this.tx.db.reservations.has(id)) {
               return null;
          }
          await this.tx.lock(`reservation:${id}`);
          return this.findById(id);
     }

     async listByIdsForUpdate(ids: number[]): Promise<Reservation[]> {
          const wanted = new Set(ids);
          const ordered = [...this.tx.db.reservations.values()]
               .filter((r) => wanted.has(r.id))
               .sort((a, b) => a.productId - b.productId || a.id - b.id);
          const locked: Reservation[] = [];
          for (const { id } of ordered) {
               const row = await this.findByIdForUpdate(id);
               if (row) {
                    locked.push(row);
               }
          }
          return locked;
     }

     async updateStatus(id: number, status: ReservationStatus): Promise<void> {
          const row = this.tx.db.reservations.get(id);
          if (row) {
               this.tx.put(this.tx.db.reservations, id, { ...row, status });
          }
     }

     async sumActiveByProduct(productId: number): Promise<number> {
          return [...this.tx.db.reservations.values()]
               .filter((r) => r.productId === productId && r.status === 'ACTIVE')
               .reduce((sum, r) => sum + r.quantity, 0);
     }

     async listExpired(asOf: Date, limit: number): Promise<Reservation[]> {
          return [...this.tx.db.reservations.values()]
               .filter((r) => r.status === 'ACTIVE' && r.expiresAt !== null && r.expiresAt.getTime() <= asOf.getTime())
               .sort((a, b) => (a.expiresAt?.getTime() ?? 0) - (b.expiresAt?.getTime() ?? 0) || a.id - b.id)
               .slice(0, limit)
               .map(clone);
     }
}

class MemoryOrderRepository implements OrderRepository {
     constructor(private readonly tx: MemoryTransaction) {}

     async nextOrderNumber(now: Date): Promise<string> {
          const prefix = orderNumberPrefix(now);
          await this.tx.lock(`order_number_counter:${prefix}`);
          const next = (this.tx.db.orderNumberCounters.get(prefix) ?? 0) + 1;
          this.tx.put(this.tx.db.orderNumberCounters, prefix, next);
          return formatOrderNumber(prefix, next);
     }

     async insert(order: NewOrder): Promise<Order> {
          const { db } = this.tx;
          if ([...db.orders.values()].some((o) => o.orderNumber === order.orderNumber)) {
               throw new Error(`duplicate key value violates unique constraint "customer_order_order_number_key"`);
          }
          const now = new Date();
          const row: Order = {
               ...order,
               id: db.nextId('customer_order'),
               status: 'pending',
               stockState: 'reserved',
               items: order.items.map((item) => ({ ...item, id: db.nextId('order_item') })),
               createdAt: now,
               updatedAt: now,
               paidAt: null,
               shippedAt: null,
               deliveredAt: null,
               cancelledAt: null,
               returnedAt: null,
          };
          this.tx.put(db.orders, row.id, row);
          return clone(row);
     }

     async findById(id: number): Promise<Order | null> {
          const row = this.tx.db.orders.get(id);
          return row ? clone(row) : null;
     }

     async findByIdForUpdate(id: number): Promise<Order | null> {
          if (!this.tx.db.orders.has(id)) {
               return null;
          }
          await this.tx.lock(`customer_order:${id}`);
          return this.findById(id);
     }

     async findByOrderNumber(orderNumber: string): Promise<Order | null> {
          const row = [...this.tx.db.orders.values()].find((o) => o.orderNumber === orderNumber);
          return row ? clone(row) : null;
     }

     async update(order: Order): Promise<void> {
          if (this.tx.db.orders.has(order.id)) {
               this.tx.put(this.tx.db.orders, order.id, order);
          }
     }
}

class MemoryPaymentRepository implements PaymentRepository {
     constructor(private readonly tx: MemoryTransaction) {}

     async insert(payment: NewPayment): Promise<Payment> {
          const row: Payment = {
               ...payment,
               id: this.tx.db.nextId('payment'),
               status: 'initiated',
               gatewayReference: null,
               failureReason: null,
               cashReceived: null,
               createdAt: new Date(),
               authorizedAt: null,
               capturedAt: null,
               refundedAt: null,
          };
          this.tx.put(this.tx.db.payments, row.id, row);
          return clone(row);
     }

     async findById(id: number): Promise<Payment | null> {
          const row = this.tx.db.payments.get(id);
          return row ? clone(row) : null;
     }

     async findByIdForUpdate(id: number): Promise<Payment | null> {
          if (!this.tx.db.payments.has(id)) {
               return null;
          }
          await this.tx.lock(`payment:${id}`);
          return this.findById(id);
     }

     async listByOrderId(orderId: number): Promise<Payment[]> {
          return [...this.tx.db.payments.values()]
               .filter((p) => p.orderId === orderId)
               .sort((a, b) => a.id - b.id)
               .map(clone);
     }

     async update(payment: Payment): Promise<void> {
          if (this.tx.db.payments.has(payment.id)) {
               this.tx.put(this.tx.db.payments, payment.id, payment);
          }
     }
}

class MemoryRefundRepository implements RefundRepository {
     constructor(private readonly tx: MemoryTransaction) {}

     async insert(refund: NewRefund): Promise<Refund> {
          const row: Refund = {
               ...refund,
               id: this.tx.db.nextId('refund'),
               status: 'pending',
               processedBy: null,
               failureReason: null,
               createdAt: new Date(),
               processedAt: null,
               completedAt: null,
          };
          this.tx.put(this.tx.db.refunds, row.id, row);
          return clone(row);
     }

     async findById(id: number): Promise<Refund | null> {
          const row = this.tx.db.refunds.get(id);
          return row ? clone(row) : null;
     }

     async findByIdForUpdate(id: number): Promise<Refund | null> {
          if (!this.tx.db.refunds.has(id)) {
               return null;
          }
          await this.tx.lock(`refund:${id}`);
          return this.findById(id);
     }

     async listByPaymentId(paymentId: number): Promise<Refund[]> {
          return [...this.tx.db.refunds.values()]
               .filter((r) => r.paymentId === paymentId)
               .sort((a, b) => a.id - b.id)
               .map(clone);
     }

     async update(refund: Refund): Promise<void> {
          if (this.tx.db.refunds.has(refund.id)) {
               this.tx.put(this.tx.db.refunds, refund.id, refund);
          }
     }
}

class MemoryAuditRepository implements AuditRepository {
     constructor(private readonly tx: MemoryTransaction) {}

     async append(record: AuditRecord): Promise<void> {
          this.tx.append(this.tx.db.audit, record);
     }
}

class MemoryDomainEventRepository implements DomainEventRepository {
     constructor(private readonly tx: MemoryTransaction) {}

     async enqueue(type: NotificationEventType, payload: Record<string, unknown>): Promise<number> {
          const event: DomainEvent = {
               id: this.tx.db.nextId('domain_event'),
               type,
               payload,
               status: 'PENDING',
               retryCount: 0,
               createdAt: new Date(),
          };
          this.tx.put(this.tx.db.events, event.id, event);
          return event.id;
     }

     async claimPending(limit: number, retry: EventRetryPolicy): Promise<DomainEvent[]> {
          const retryBefore = Date.now() - retry.backoffMs;
          const due = (e: DomainEvent) => {
               if (e.status === 'PENDING') return true;
               const failedAt = this.tx.db.eventFailedAt.get(e.id);
               return (
                    e.status === 'FAILED' &&
                    e.retryCount < retry.maxRetries &&
                    failedAt !== undefined &&
                    failedAt.getTime() <= retryBefore
               );
          };
          const pending = [...this.tx.db.events.values()]
               .filter(due)
               .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime() || a.id - b.id);

          const claimed: DomainEvent[] = [];
          for (const event of pending) {
               if (claimed.length >= limit) {
                    break;
               }
               if (this.tx.tryLock(`domain_event:${event.id}`)) {
                    claimed.push(clone(event));
               }
          }
          return claimed;
     }

     async markSent(id: number): Promise<void> {
          const event = this.tx.db.events.get(id);
          if (event) {
               this.tx.put(this.tx.db.events, id, { ...event, status: 'SENT' });
          }
     }

     async markFailed(id: number, error: string): Promise<void> {
          const event = this.tx.db.events.get(id);
          if (event) {
               this.tx.put(this.tx.db.events, id, {
                    ...event,
                    status: 'FAILED',
                    retryCount: event.retryCount + 1,
               });
               this.tx.put(this.tx.db.eventErrors, id, error);
               this.tx.put(this.tx.db.eventFailedAt, id, new Date());
          }
     }
}

class MemoryStockAlertRepository implements StockAlertRepository {
     constructor(private readonly tx: MemoryTransaction) {}

     async listActive(): Promise<StockAlert[]> {
          return [...this.tx.db.alerts.values()]
               .filter((a) => a.status === 'active')
               .sort((a, b) => a.id - b.id)
               .map(clone);
     }

     async insert(alert: NewStockAlert): Promise<StockAlert> {
          const row: StockAlert = {
               ...alert,
               id: this.tx.db.nextId('stock_alert'),
               status: 'active',
               createdAt: new Date(),
               resolvedAt: null,
          };
          this.tx.put(this.tx.db.alerts, row.id, row);
          return clone(row);
     }

     async resolve(id: number, resolvedAt: Date): Promise<void> {
          const row = this.tx.db.alerts.get(id);
          if (row) {
               this.tx.put(this.tx.db.alerts, id, { ...row, status: 'resolved', resolvedAt });
          }
     }
}

/**
 * In-process stand-in for the PostgreSQL schema. Each unit of work is a
 * transaction: writes apply immediately, row locks are held until it ends, and a
 * thrown error undoes every write it made.
 */
export class InMemoryDatabase {
     readonly locks = new KeyedLocks();

     readonly products = new Map<number, Product>();
     readonly stocks = new Map<number, Stock>();
     readonly movements: StockMovement[] = [];
     readonly reservations = new Map<number, Reservation>();
     readonly orders = new Map<number, Order>();
     readonly payments = new Map<number, Payment>();
     readonly refunds = new Map<number, Refund>();
     readonly audit: AuditRecord[] = [];
     readonly events = new Map<number, DomainEvent>();
     readonly eventErrors = new Map<number, string>();
     readonly eventFailedAt = new Map<number, Date>();
     readonly alerts = new Map<number, StockAlert>();
     readonly orderNumberCounters = new Map<string, number>();

     private readonly sequences = new Map<string, number>();
     private transactionCount = 0;

     /** Sequences are not rolled back, as in PostgreSQL */
     nextId(table: string): number {
          const next = (this.sequences.get(table) ?? 0) + 1;
          this.sequences.set(table, next);
          return next;
     }

     readonly runUnitOfWork: UnitOfWorkRunner = async <T>(fn: (uow: UnitOfWork) => Promise<T>): Promise<T> => {
          this.transactionCount += 1;
          const tx = new MemoryTransaction(this, this.transactionCount);
          try {
               const result = await fn(createMemoryUnitOfWork(tx));
               tx.commit();
               return result;
          } catch (error) {
               tx.rollback();
               throw error;
          }
     };

     stock(productId: number): Stock {
          const row = this.stocks.get(productId);
          if (!row) {
               throw new Error(`No stock row for product ${productId}`);
          }
          return clone(row);
     }

     movementsFor(productId: number): StockMovement[] {
          return this.movements.filter((m) => m.productId === productId).map(clone);
     }

     reservationsFor(orderRef: string): Reservation[] {
          return [...this.reservations.values()].filter((r) => r.orderRef === orderRef).map(clone);
     }

     auditActions(): string[] {
          return this.audit.map((a) => a.action);
     }

     eventTypes(): NotificationEventType[] {
          return [...this.events.values()].sort((a, b) => a.id - b.id).map((e) => e.type);
     }
}

function createMemoryUnitOfWork(tx: MemoryTransaction): UnitOfWork {
     return {
          products: new MemoryProductRepository(tx),
          stocks: new MemoryStockRepository(tx),
          movements: new MemoryMovementRepository(tx),
          reservations: new MemoryReservationRepository(tx),
          orders: new MemoryOrderRepository(tx),
          payments: new MemoryPaymentRepository(tx),
          refunds: new MemoryRefundRepository(tx),
          audit: new MemoryAuditRepository(tx),
          events: new MemoryDomainEventRepository(tx),
          alerts: new MemoryStockAlertRepository(tx),
     };
}
