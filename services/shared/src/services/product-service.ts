import type { UnitOfWork } from '../db/unit-of-work';
import type { Product, RequestContext, Stock, StockThresholds } from '../types/commerce.types';
import { DEFAULT_THRESHOLDS, evaluateStockStatus } from '../domain/stock-status';
import { DomainError, DuplicateSkuError, ProductNotFoundError } from '../utils/errors';
import { logger } from '../utils/logger';
import { recordAudit, stockSnapshot } from './audit';
import { validateThresholds } from './stock-ledger-service';

export interface CreateProductRequest {
     sku: string;
     name: string;
     thresholds?: Partial<StockThresholds>;
     autoReorder?: boolean;
}

export interface ProductWithStock {
     product: Product;
     stock: Stock;
}

export class ProductService {
     /**
      * Create a product and its stock row in the same transaction. Stock starts
      * empty, so its status is out_of_stock.
      */
     async createProduct(
          uow: UnitOfWork,
          ctx: RequestContext,
          request: CreateProductRequest
     ): Promise<ProductWithStock> {
          const sku = request.sku.trim();
          const name = request.name.trim();
          if (!sku || !name) {
               throw new DomainError('Product sku and name are required', 'VALIDATION_ERROR', 400);
          }

          const thresholds: StockThresholds = {
               minQuantity: request.thresholds?.minQuantity ?? DEFAULT_THRESHOLDS.minQuantity,
               maxQuantity: request.thresholds?.maxQuantity ?? DEFAULT_THRESHOLDS.maxQuantity,
               reorderQuantity: request.thresholds?.reorderQuantity ?? DEFAULT_THRESHOLDS.reorderQuantity,
          };
          validateThresholds(thresholds);

          if (await uow.products.findBySku(sku)) {
               throw new DuplicateSkuError(sku);
          }

          const product = await uow.products.insert({ sku, name });
          const stock = await uow.stocks.insert({
               productId: product.id,
               currentQuantity: 0,
               reservedQuantity: 0,
               ...thresholds,
               discontinued: false,
               autoReorder: request.autoReorder ?? false,
               status: evaluateStockStatus({
                    currentQuantity: 0,
                    reservedQuantity: 0,
                    minQuantity: thresholds.minQuantity,
                    discontinued: false,
               }),
          });

          await recordAudit(uow, ctx, {
               action: 'product.create',
               entityType: 'product',
               entityId: product.id,
               before: null,
               after: { sku: product.sku, name: product.name },
          });
          await recordAudit(uow, ctx, {
               action: 'stock.create',
               entityType: 'stock',
               entityId: product.id,
               before: null,
               after: stockSnapshot(stock),
          });

          logger.info({ productId: product.id, sku }, 'Product created');
          return { product, stock };
     }

     async getProduct(uow: UnitOfWork, productId: number): Promise<ProductWithStock> {
          const product = await uow.products.findById(productId);
          const stock = product ? await uow.stocks.findByProductId(productId) : null;
          if (!product || !stock) {
               throw new ProductNotFoundError(productId);
          }
          return { product, stock };
     }
}
