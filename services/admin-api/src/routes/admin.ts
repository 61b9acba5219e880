import { FastifyInstance } from 'fastify';
import { ApiRouteOptions, resolveRouteDependencies } from '@backoffice/shared/src/http/route-options';
import { requestContext } from '@backoffice/shared/src/http/request-context';
import type { AdjustmentCategory, MovementFilter } from '@backoffice/shared/src/types/commerce.types';
import {
     addStockSchema,
     adjustStockSchema,
     checkStockLevelsSchema,
     createProductSchema,
     getProductSchema,
     getStockSchema,
     listAlertsSchema,
     listMovementsSchema,
     removeStockSchema,
     setDiscontinuedSchema,
     setThresholdsSchema,
     verifyLedgerSchema,
} from '../schemas/admin.schemas';

const ADMIN_ACTOR = 'admin';

interface ProductParams {
     productId: number;
}

interface CreateProductBody {
     sku: string;
     name: string;
     minQuantity?: number;
     maxQuantity?: number;
     reorderQuantity?: number;
     autoReorder?: boolean;
}

interface QuantityBody {
     quantity: number;
     reason?: string;
}

interface MovementQuery {
     productId?: number;
     actor?: string;
     from?: string;
     to?: string;
     limit?: number;
     offset?: number;
}

export function toMovementFilter(query: MovementQuery): MovementFilter {
     return {
          productId: query.productId,
          actor: query.actor,
          from: query.from ? new Date(query.from) : undefined,
          to: query.to ? new Date(query.to) : undefined,
          limit: query.limit,
          offset: query.offset,
     };
}

export async function registerAdminRoutes(app: FastifyInstance, options: ApiRouteOptions) {
     const { run, services } = resolveRouteDependencies(options);
     const { products, ledger, alerts } = services;

     app.post<{ Body: CreateProductBody }>(
          '/products',
          { schema: createProductSchema },
          async (request, reply) => {
               const ctx = requestContext(request, ADMIN_ACTOR);
               const { sku, name, minQuantity, maxQuantity, reorderQuantity, autoReorder } = request.body;
               const created = await run((uow) =>
                    products.createProduct(uow, ctx, {
                         sku,
                         name,
                         thresholds: { minQuantity, maxQuantity, reorderQuantity },
                         autoReorder,
                    })
               );
               reply.code(201);
               return created;
          }
     );

     app.get<{ Params: ProductParams }>(
          '/products/:productId',
          { schema: getProductSchema },
          async (request) => {
               return run((uow) => products.getProduct(uow, request.params.productId));
          }
     );

     app.get<{ Params: ProductParams }>(
          '/stock/:productId',
          { schema: getStockSchema },
          async (request) => {
               return run((uow) => ledger.getStock(uow, request.params.productId));
          }
     );

     app.post<{ Params: ProductParams; Body: QuantityBody }>(
          '/stock/:productId/add',
          { schema: addStockSchema },
          async (request) => {
               const ctx = requestContext(request, ADMIN_ACTOR);
               const { quantity, reason } = request.body;
               return run((uow) => ledger.add(uow, ctx, request.params.productId, quantity, reason));
          }
     );

     app.post<{ Params: ProductParams; Body: QuantityBody }>(
          '/stock/:productId/remove',
          { schema: removeStockSchema },
          async (request) => {
               const ctx = requestContext(request, ADMIN_ACTOR);
               const { quantity, reason } = request.body;
               return run((uow) => ledger.remove(uow, ctx, request.params.productId, quantity, reason));
          }
     );

     app.post<{
          Params: ProductParams;
          Body: { newQuantity: number; category: AdjustmentCategory; reason: string };
     }>('/stock/:productId/adjust', { schema: adjustStockSchema }, async (request) => {
          const ctx = requestContext(request, ADMIN_ACTOR);
          return run((uow) =>
               ledger.adjust(uow, ctx, { productId: request.params.productId, ...request.body })
          );
     });

     app.put<{
          Params: ProductParams;
          Body: { minQuantity: number; maxQuantity: number; reorderQuantity: number; autoReorder?: boolean };
     }>('/stock/:productId/thresholds', { schema: setThresholdsSchema }, async (request) => {
          const ctx = requestContext(request, ADMIN_ACTOR);
          return run((uow) => ledger.setThresholds(uow, ctx, request.params.productId, request.body));
     });

     app.put<{ Params: ProductParams; Body: { discontinued: boolean } }>(
          '/stock/:productId/discontinued',
          { schema: setDiscontinuedSchema },
          async (request) => {
               const ctx = requestContext(request, ADMIN_ACTOR);
               return run((uow) =>
                    ledger.setDiscontinued(uow, ctx, request.params.productId, request.body.discontinued)
               );
          }
     );

     app.get<{ Params: ProductParams }>(
          '/stock/:productId/verify',
          { schema: verifyLedgerSchema },
          async (request) => {
               return run((uow) => ledger.verifyLedger(uow, request.params.productId));
          }
     );

     app.get<{ Querystring: MovementQuery }>(
          '/movements',
          { schema: listMovementsSchema },
          async (request) => {
               return run((uow) => ledger.listMovements(uow, toMovementFilter(request.query)));
          }
     );

     app.post<{ Body: { dryRun?: boolean } | undefined }>(
          '/stock-alerts/check',
          { schema: checkStockLevelsSchema },
          async (request) => {
               const ctx = requestContext(request, ADMIN_ACTOR);
               const dryRun = request.body?.dryRun ?? false;
               return run((uow) => alerts.checkStockLevels(uow, ctx, { dryRun }));
          }
     );

     app.get('/stock-alerts', { schema: listAlertsSchema }, async () => {
          return run((uow) => uow.alerts.listActive());
     });
}
