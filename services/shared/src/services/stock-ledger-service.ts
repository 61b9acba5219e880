import type { UnitOfWork } from '../db/unit-of-work';
import type {
     AdjustmentCategory,
     MovementFilter,
     MovementTag,
     MovementType,
     OrderItem,
     RequestContext,
     Stock,
     StockMovement,
     StockThresholds,
} from '../types/commerce.types';
import { evaluateStockStatus } from '../domain/stock-status';
import { assertMovementBalance, assertStockQuantities } from '../domain/invariants';
import {
     InsufficientStockError,
     InvalidQuantityError,
     InvalidThresholdsError,
     ProductNotFoundError,
} from '../utils/errors';
import { logger } from '../utils/logger';
import { recordAudit, stockSnapshot } from './audit';

export interface MovementRequest {
     type: MovementType;
     tag: MovementTag;
     /** Signed change to current quantity */
     delta: number;
     reason: string;
     referenceId?: string | null;
}

export interface StockMutationResult {
     stock: Stock;
     movement: StockMovement;
}

export interface AdjustStockRequest {
     productId: number;
     newQuantity: number;
     category: AdjustmentCategory;
     reason: string;
}

export interface ThresholdUpdate extends StockThresholds {
     autoReorder?: boolean;
}

export interface LedgerVerification {
     productId: number;
     movementCount: number;
     replayedQuantity: number;
     currentQuantity: number;
     consistent: boolean;
     /** Movements that do not balance or do not continue from the previous one */
     brokenMovementIds: number[];
}

export function assertPositiveQuantity(quantity: number, label: string = 'Quantity'): void {
     if (!Number.isInteger(quantity) || quantity <= 0) {
          throw new InvalidQuantityError(`${label} must be a positive integer, got ${quantity}`);
     }
}

export function assertNonNegativeQuantity(quantity: number, label: string = 'Quantity'): void {
     if (!Number.isInteger(quantity) || quantity < 0) {
          throw new InvalidQuantityError(`${label} must be a non-negative integer, got ${quantity}`);
     }
}

const THRESHOLD_KEYS = ['minQuantity', 'maxQuantity', 'reorderQuantity'] as const;

export function validateThresholds(thresholds: StockThresholds): void {
     const { minQuantity, maxQuantity } = thresholds;
     for (const key of THRESHOLD_KEYS) {
          const value = thresholds[key];
          if (!Number.isInteger(value) || value < 0) {
               throw new InvalidThresholdsError(`${key} must be a non-negative integer, got ${value}`);
          }
     }
     if (maxQuantity < minQuantity) {
          throw new InvalidThresholdsError(
               `maxQuantity (${maxQuantity}) must be greater than or equal to minQuantity (${minQuantity})`
          );
     }
}

/** New stock state with available quantity and status recomputed */
export function withQuantities(stock: Stock, currentQuantity: number, reservedQuantity: number): Stock {
     return {
          ...stock,
          currentQuantity,
          reservedQuantity,
          availableQuantity: currentQuantity - reservedQuantity,
          status: evaluateStockStatus({
               currentQuantity,
               reservedQuantity,
               minQuantity: stock.minQuantity,
               discontinued: stock.discontinued,
          }),
     };
}

export class StockLedgerService {
     /**
      * Receive units into stock
      */
     async add(
          uow: UnitOfWork,
          ctx: RequestContext,
          productId: number,
          quantity: number,
          reason: string = 'Stock receipt'
     ): Promise<StockMutationResult> {
          assertPositiveQuantity(quantity);
          const stock = await this.lockStock(uow, productId);

          return this.writeMovement(uow, ctx, stock, {
               type: 'inbound',
               tag: 'receipt',
               delta: quantity,
               reason,
          });
     }

     /**
      * Take units out of stock. Reserved units cannot be removed.
      */
     async remove(
          uow: UnitOfWork,
          ctx: RequestContext,
          productId: number,
          quantity: number,
          reason: string = 'Stock removal'
     ): Promise<StockMutationResult> {
          assertPositiveQuantity(quantity);
          const stock = await this.lockStock(uow, productId);

          if (quantity > stock.availableQuantity) {
               throw new InsufficientStockError(
                    `Insufficient stock for product ${productId}: requested ${quantity}, available ${stock.availableQuantity} (current ${stock.currentQuantity}, reserved ${stock.reservedQuantity})`,
                    productId,
                    quantity,
                    stock.availableQuantity
               );
          }

          return this.writeMovement(uow, ctx, stock, {
               type: 'outbound',
               tag: 'removal',
               delta: -quantity,
               reason,
          });
     }

     /**
      * Set current quantity to a counted value. Tagged with its category so manual
      * corrections and stocktakes stay distinguishable in the ledger.
      */
     async adjust(
          uow: UnitOfWork,
          ctx: RequestContext,
          request: AdjustStockRequest
     ): Promise<StockMutationResult> {
          const { productId, newQuantity, category, reason } = request;
          assertNonNegativeQuantity(newQuantity, 'New quantity');
          const stock = await this.lockStock(uow, productId);

          if (newQuantity < stock.reservedQuantity) {
               throw new InsufficientStockError(
                    `Cannot adjust product ${productId} to ${newQuantity}: ${stock.reservedQuantity} units are reserved`,
                    productId,
                    stock.reservedQuantity,
                    newQuantity
               );
          }

          return this.writeMovement(uow, ctx, stock, {
               type: 'adjustment',
               tag: category,
               delta: newQuantity - stock.currentQuantity,
               reason: `${reason} (adjusted from ${stock.currentQuantity} to ${newQuantity})`,
          });
     }

     async setThresholds(
          uow: UnitOfWork,
          ctx: RequestContext,
          productId: number,
          update: ThresholdUpdate
     ): Promise<Stock> {
          const thresholds: StockThresholds = {
               minQuantity: update.minQuantity,
               maxQuantity: update.maxQuantity,
               reorderQuantity: update.reorderQuantity,
          };
          validateThresholds(thresholds);
          const stock = await this.lockStock(uow, productId);

          const next = withQuantities(
               {
                    ...stock,
                    ...thresholds,
                    autoReorder: update.autoReorder ?? stock.autoReorder,
                    updatedAt: new Date(),
               },
               stock.currentQuantity,
               stock.reservedQuantity
          );
          await this.saveStock(uow, ctx, stock, next, 'stock.set_thresholds');

          logger.info({ productId, ...thresholds, status: next.status }, 'Stock thresholds updated');
          return next;
     }

     async setDiscontinued(
          uow: UnitOfWork,
          ctx: RequestContext,
          productId: number,
          discontinued: boolean
     ): Promise<Stock> {
          const stock = await this.lockStock(uow, productId);

          const next = withQuantities(
               { ...stock, discontinued, updatedAt: new Date() },
               stock.currentQuantity,
               stock.reservedQuantity
          );
          await this.saveStock(uow, ctx, stock, next, 'stock.set_discontinued');

          logger.info({ productId, discontinued, status: next.status }, 'Stock discontinued flag changed');
          return next;
     }

     async getStock(uow: UnitOfWork, productId: number): Promise<Stock> {
          const stock = await uow.stocks.findByProductId(productId);
          if (!stock) {
               throw new ProductNotFoundError(productId);
          }
          return stock;
     }

     async listMovements(uow: UnitOfWork, filter: MovementFilter): Promise<StockMovement[]> {
          return uow.movements.query(filter);
     }

     /**
      * Replay every movement of a product from genesis and compare with its current quantity
      */
     async verifyLedger(uow: UnitOfWork, productId: number): Promise<LedgerVerification> {
          const stock = await this.getStock(uow, productId);
          const movements = await uow.movements.listByProduct(productId);

          let replayed = 0;
          const broken: number[] = [];
          for (const movement of movements) {
               const balanced = movement.quantityAfter === movement.quantityBefore + movement.quantity;
               if (!balanced || movement.quantityBefore !== replayed) {
                    broken.push(movement.id);
               }
               replayed += movement.quantity;
          }

          const result: LedgerVerification = {
               productId,
               movementCount: movements.length,
               replayedQuantity: replayed,
               currentQuantity: stock.currentQuantity,
               consistent: broken.length === 0 && replayed === stock.currentQuantity,
               brokenMovementIds: broken,
          };

          if (!result.consistent) {
               logger.error({ ...result }, 'Ledger replay does not match stock');
          }
          return result;
     }

     /**
      * Lock a stock row for the rest of the transaction
      */
     async lockStock(uow: UnitOfWork, productId: number): Promise<Stock> {
          const [stock] = await uow.stocks.lockByProductIds([productId]);
          if (!stock) {
               throw new ProductNotFoundError(productId);
          }
          return stock;
     }

     /**
      * Append a movement and apply it to a locked stock row. `reservedDelta` lets a
      * reservation commit move reserved and current quantity in the same write.
      */
     async writeMovement(
          uow: UnitOfWork,
          ctx: RequestContext,
          stock: Stock,
          request: MovementRequest,
          reservedDelta: number = 0
     ): Promise<StockMutationResult> {
          const now = new Date();
          const quantityBefore = stock.currentQuantity;
          const quantityAfter = quantityBefore + request.delta;

          assertMovementBalance({ quantity: request.delta, quantityBefore, quantityAfter });

          const next = withQuantities(
               { ...stock, lastMovementAt: now, updatedAt: now },
               quantityAfter,
               stock.reservedQuantity + reservedDelta
          );
          assertStockQuantities(next);

          const movement = await uow.movements.append({
               productId: stock.productId,
               type: request.type,
               tag: request.tag,
               quantity: request.delta,
               quantityBefore,
               quantityAfter,
               reason: request.reason,
               actor: ctx.actor,
               referenceId: request.referenceId ?? null,
          });
          await uow.stocks.update(next);
          await recordAudit(uow, ctx, {
               action: `stock.${request.type}`,
               entityType: 'stock',
               entityId: stock.productId,
               before: stockSnapshot(stock),
               after: { ...stockSnapshot(next), movementId: movement.id, tag: request.tag },
          });

          logger.info(
               {
                    productId: stock.productId,
                    type: request.type,
                    tag: request.tag,
                    delta: request.delta,
                    quantityBefore,
                    quantityAfter,
                    status: next.status,
               },
               'Stock movement recorded'
          );

          return { stock: next, movement };
     }

     /**
      * Change reserved quantity on a locked stock row. Reservations do not touch
      * physical quantity, so no movement is written.
      */
     async changeReserved(
          uow: UnitOfWork,
          ctx: RequestContext,
          stock: Stock,
          reservedDelta: number,
          action: string
     ): Promise<Stock> {
          const next = withQuantities(
               { ...stock, updatedAt: new Date() },
               stock.currentQuantity,
               stock.reservedQuantity + reservedDelta
          );
          assertStockQuantities(next);
          await this.saveStock(uow, ctx, stock, next, action);
          return next;
     }

     /**
      * Compensating `return` movements for the items of an order, one per item
      */
     async returnItems(
          uow: UnitOfWork,
          ctx: RequestContext,
          items: Array<Pick<OrderItem, 'productId' | 'quantity'>>,
          tag: Extract<MovementTag, 'order_cancellation' | 'order_return'>,
          reason: string,
          referenceId: string
     ): Promise<StockMovement[]> {
          const stocks = new Map(
               (await uow.stocks.lockByProductIds(items.map((i) => i.productId))).map((s) => [
                    s.productId,
                    s,
               ])
          );

          const movements: StockMovement[] = [];
          for (const item of [...items].sort((a, b) => a.productId - b.productId)) {
               const stock = stocks.get(item.productId);
               if (!stock) {
                    throw new ProductNotFoundError(item.productId);
               }
               const result = await this.writeMovement(uow, ctx, stock, {
                    type: 'return',
                    tag,
                    delta: item.quantity,
                    reason,
                    referenceId,
               });
               stocks.set(item.productId, result.stock);
               movements.push(result.movement);
          }
          return movements;
     }

     private async saveStock(
          uow: UnitOfWork,
          ctx: RequestContext,
          before: Stock,
          after: Stock,
          action: string
     ): Promise<void> {
          await uow.stocks.update(after);
          await recordAudit(uow, ctx, {
               action,
               entityType: 'stock',
               entityId: after.productId,
               before: stockSnapshot(before),
               after: stockSnapshot(after),
          });
     }
}
