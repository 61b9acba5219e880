import type { StockStatus, StockThresholds } from '../types/commerce.types';

export interface StockStatusInput {
     currentQuantity: number;
     reservedQuantity: number;
     minQuantity: number;
     discontinued: boolean;
}

/**
 * Derive the display status of a stock row.
 *
 * `discontinued` is the only override; everything else follows physical quantity.
 * Reserved units do not lower the status: a product with 10 on hand and 8 reserved
 * is still `available` when its minimum is below 10.
 */
export function evaluateStockStatus(input: StockStatusInput): StockStatus {
     if (input.discontinued) {
          return 'discontinued';
     }
     if (input.currentQuantity === 0) {
          return 'out_of_stock';
     }
     if (input.currentQuantity <= input.minQuantity) {
          return 'low_stock';
     }
     return 'available';
}

export function needsReorder(stock: {
     autoReorder: boolean;
     currentQuantity: number;
     reorderQuantity: number;
}): boolean {
     return stock.autoReorder && stock.currentQuantity <= stock.reorderQuantity;
}

export const DEFAULT_THRESHOLDS: Readonly<StockThresholds> = {
     minQuantity: 5,
     maxQuantity: 1000,
     reorderQuantity: 10,
};
