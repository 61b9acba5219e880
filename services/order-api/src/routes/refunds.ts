import { FastifyInstance } from 'fastify';
import { ApiRouteOptions, resolveRouteDependencies } from '@backoffice/shared/src/http/route-options';
import { requestContext } from '@backoffice/shared/src/http/request-context';
import type { RefundRequest } from '@backoffice/shared/src/types/commerce.types';
import {
     failRefundSchema,
     getRefundSchema,
     refundTransitionSchema,
     requestRefundSchema,
} from '../schemas/order.schemas';

interface RefundParams {
     refundId: number;
}

export async function registerRefundRoutes(app: FastifyInstance, options: ApiRouteOptions) {
     const { run, services } = resolveRouteDependencies(options);
     const { refunds } = services;

     app.post<{ Body: RefundRequest }>('/', { schema: requestRefundSchema }, async (request, reply) => {
          const ctx = requestContext(request);
          const refund = await run((uow) => refunds.requestRefund(uow, ctx, request.body));
          reply.code(201);
          return refund;
     });

     app.get<{ Params: RefundParams }>('/:refundId', { schema: getRefundSchema }, async (request) => {
          return run((uow) => refunds.getRefund(uow, request.params.refundId));
     });

     app.post<{ Params: RefundParams }>(
          '/:refundId/start',
          { schema: refundTransitionSchema },
          async (request) => {
               const ctx = requestContext(request);
               return run((uow) => refunds.startRefund(uow, ctx, request.params.refundId));
          }
     );

     app.post<{ Params: RefundParams }>(
          '/:refundId/complete',
          { schema: refundTransitionSchema },
          async (request) => {
               const ctx = requestContext(request);
               const { refund } = await run((uow) => refunds.completeRefund(uow, ctx, request.params.refundId));
               return refund;
          }
     );

     app.post<{ Params: RefundParams; Body: { reason: string } }>(
          '/:refundId/fail',
          { schema: failRefundSchema },
          async (request) => {
               const ctx = requestContext(request);
               return run((uow) =>
                    refunds.failRefund(uow, ctx, request.params.refundId, request.body.reason)
               );
          }
     );
}
