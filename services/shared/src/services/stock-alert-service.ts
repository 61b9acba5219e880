import type { UnitOfWork } from '../db/unit-of-work';
import type { NewStockAlert } from '../repositories/types';
import type { RequestContext, Stock, StockAlert, StockAlertType } from '../types/commerce.types';
import { needsReorder } from '../domain/stock-status';
import { logger } from '../utils/logger';

export interface StockCheckOptions {
     /** Report what would change without writing alerts or events */
     dryRun?: boolean;
}

export interface StockCheckSummary {
     dryRun: boolean;
     checkedProducts: number;
     raised: NewStockAlert[];
     resolvedAlertIds: number[];
}

/**
 * Conditions a stock row is currently in. Discontinued stock raises nothing.
 */
export function evaluateStockAlerts(stock: Stock): NewStockAlert[] {
     if (stock.discontinued) {
          return [];
     }

     const { productId, currentQuantity } = stock;
     const alerts: NewStockAlert[] = [];

     if (currentQuantity === 0) {
          alerts.push({
               productId,
               type: 'out_of_stock',
               currentQuantity,
               thresholdQuantity: 0,
               message: `Product ${productId} is out of stock`,
          });
     } else if (currentQuantity <= stock.minQuantity) {
          alerts.push({
               productId,
               type: 'low_stock',
               currentQuantity,
               thresholdQuantity: stock.minQuantity,
               message: `Low stock for product ${productId}: ${currentQuantity} on hand, minimum ${stock.minQuantity}`,
          });
     }

     if (currentQuantity > stock.maxQuantity) {
          alerts.push({
               productId,
               type: 'overstock',
               currentQuantity,
               thresholdQuantity: stock.maxQuantity,
               message: `Overstock for product ${productId}: ${currentQuantity} on hand, maximum ${stock.maxQuantity}`,
          });
     }

     if (needsReorder(stock)) {
          alerts.push({
               productId,
               type: 'reorder',
               currentQuantity,
               thresholdQuantity: stock.reorderQuantity,
               message: `Reorder product ${productId}: ${currentQuantity} on hand, reorder point ${stock.reorderQuantity}`,
          });
     }

     return alerts;
}

const alertKey = (productId: number, type: StockAlertType): string => `${productId}:${type}`;

export class StockAlertService {
     /**
      * Raise one alert per product and condition, and resolve active alerts whose
      * condition has cleared.
      */
     async checkStockLevels(
          uow: UnitOfWork,
          ctx: RequestContext,
          options: StockCheckOptions = {}
     ): Promise<StockCheckSummary> {
          const dryRun = options.dryRun ?? false;
          const stocks = await uow.stocks.listAll();
          const active = await uow.alerts.listActive();

          const activeByKey = new Map<string, StockAlert>(active.map((a) => [alertKey(a.productId, a.type), a]));
          const current = new Set<string>();
          const raised: NewStockAlert[] = [];

          for (const stock of stocks) {
               for (const candidate of evaluateStockAlerts(stock)) {
                    const key = alertKey(candidate.productId, candidate.type);
                    current.add(key);
                    if (!activeByKey.has(key)) {
                         raised.push(candidate);
                    }
               }
          }

          const cleared = active.filter((a) => !current.has(alertKey(a.productId, a.type)));

          if (!dryRun) {
               const now = new Date();
               for (const candidate of raised) {
                    const alert = await uow.alerts.insert(candidate);
                    await uow.events.enqueue('StockAlertRaised', {
                         alertId: alert.id,
                         productId: alert.productId,
                         type: alert.type,
                         currentQuantity: alert.currentQuantity,
                         thresholdQuantity: alert.thresholdQuantity,
                         message: alert.message,
                    });
               }
               for (const alert of cleared) {
                    await uow.alerts.resolve(alert.id, now);
               }
          }

          const summary: StockCheckSummary = {
               dryRun,
               checkedProducts: stocks.length,
               raised,
               resolvedAlertIds: cleared.map((a) => a.id),
          };

          logger.info(
               {
                    actor: ctx.actor,
                    dryRun,
                    checkedProducts: summary.checkedProducts,
                    raised: raised.length,
                    resolved: cleared.length,
               },
               'Stock levels checked'
          );
          return summary;
     }
}
